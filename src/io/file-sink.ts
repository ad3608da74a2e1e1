import { createWriteStream, type WriteStream } from "node:fs";
import { once } from "node:events";
import { finished } from "node:stream/promises";
import type { OutputSink } from "./sink.js";

/**
 * Writes output to a file, creating or truncating it.
 */
export class FileSink implements OutputSink {
  private constructor(
    readonly path: string,
    readonly stream: WriteStream,
  ) {}

  /**
   * Open the file. Rejects when it cannot be created.
   */
  static async create(path: string, mode?: number): Promise<FileSink> {
    const stream = createWriteStream(path, { mode });
    await once(stream, "open");
    return new FileSink(path, stream);
  }

  get bytesWritten(): number {
    return this.stream.bytesWritten;
  }

  async close(): Promise<void> {
    if (!this.stream.writableEnded) {
      this.stream.end();
    }
    await finished(this.stream);
  }
}
