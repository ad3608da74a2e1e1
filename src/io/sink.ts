/**
 * Output sinks
 *
 * A sink is a scoped destination for command output. Callers must close it
 * on every path, including when the producer fails part way through.
 */

import { Writable } from "node:stream";

export interface OutputSink {
  readonly stream: Writable;
  close(): Promise<void>;
}

/**
 * A sink with a viewer on the other end that may go away before the
 * producer is done. `signal` aborts when it does.
 */
export interface PagedSink extends OutputSink {
  readonly signal: AbortSignal;
  readonly exited: boolean;
  /** Settles once the viewer is gone, with its failure or null */
  readonly done: Promise<Error | null>;
}

/**
 * A writable that keeps everything written to it in memory.
 */
export class MemoryWritable extends Writable {
  private chunks: Buffer[] = [];

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk);
    callback();
  }

  text(): string {
    return Buffer.concat(this.chunks).toString("utf-8");
  }

  reset(): void {
    this.chunks = [];
  }
}

/**
 * Collects output in memory instead of showing it.
 */
export class BufferSink implements PagedSink {
  readonly stream: MemoryWritable;
  readonly signal = new AbortController().signal;
  readonly exited = false;
  readonly done: Promise<Error | null> = Promise.resolve(null);
  private closed = false;

  constructor(stream: MemoryWritable = new MemoryWritable()) {
    this.stream = stream;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  text(): string {
    return this.stream.text();
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
