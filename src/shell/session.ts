/**
 * JQShell - an interactive session
 *
 * Owns the filter stack, the current input source and the command library,
 * and runs the read-dispatch loop until the reader is exhausted, a quit is
 * requested or stop() is called.
 */

import { open, rm } from "node:fs/promises";
import type { Readable, Writable } from "node:stream";
import { ExecError, NoInputError, isQuit } from "../errors.js";
import { FilterStack } from "../filter/stack.js";
import { execute, resultError, testFilter, type ExecutionResult } from "../jq/index.js";
import { PagerSink } from "../io/pager.js";
import type { PagedSink } from "../io/sink.js";
import type { Library } from "../commands/library.js";
import { ShellLogger } from "./logger.js";
import type { ShellReader } from "./reader.js";

export type InputSource =
  | { kind: "none" }
  | { kind: "file"; path: string; temporary: boolean }
  | { kind: "producer"; open: () => Promise<Readable> };

export interface JQRunOptions {
  /** jq executable (default: "jq") */
  bin: string;
  /** Arguments placed before jq's own arguments */
  args: string[];
  /** Colorize output written to the pager */
  color: boolean;
  /** Limit for a filter check */
  testTimeoutMs: number;
}

export interface JQShellOptions {
  reader: ShellReader;
  library: Library;
  jq?: Partial<JQRunOptions>;
  /** Pager command (default: less -X -r) */
  pager?: readonly string[];
  /** Opens the viewer for :write; overrides `pager` */
  openPager?: () => Promise<PagedSink>;
  /** Shell for :pipe scripts */
  shellPath?: string;
  /** Informational output such as help text (default: process.stdout) */
  output?: Writable;
  /** jq diagnostics and shell logs (default: process.stderr) */
  diagnostics?: Writable;
}

export interface RunFilterOptions {
  color?: boolean;
  signal?: AbortSignal;
}

export class JQShell {
  readonly stack = new FilterStack();
  readonly log: ShellLogger;
  readonly library: Library;
  readonly output: Writable;
  readonly diagnostics: Writable;
  readonly jq: JQRunOptions;
  readonly shellPath: string | undefined;

  private reader: ShellReader;
  private input: InputSource = { kind: "none" };
  private controller = new AbortController();
  private pagerFactory: () => Promise<PagedSink>;

  constructor(options: JQShellOptions) {
    this.reader = options.reader;
    this.library = options.library;
    this.output = options.output ?? process.stdout;
    this.diagnostics = options.diagnostics ?? process.stderr;
    this.log = new ShellLogger(this.diagnostics);
    this.shellPath = options.shellPath;
    this.jq = {
      bin: options.jq?.bin ?? "jq",
      args: options.jq?.args ?? [],
      color: options.jq?.color ?? false,
      testTimeoutMs: options.jq?.testTimeoutMs ?? 10_000,
    };
    const command = options.pager;
    this.pagerFactory = options.openPager ?? (() => PagerSink.open({ command }));
  }

  /** Aborted once the session stops; running work should give up. */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get alive(): boolean {
    return !this.controller.signal.aborted;
  }

  get hasInput(): boolean {
    return this.input.kind !== "none";
  }

  get inputSource(): Readonly<InputSource> {
    return this.input;
  }

  /**
   * Use a file as input. A temporary file is deleted when it is replaced or
   * when the session ends.
   */
  async setInputFile(path: string, temporary: boolean): Promise<void> {
    await this.releaseInput();
    this.input = { kind: "file", path, temporary };
  }

  /** Use a producer that is started afresh for every read. */
  async setInputProducer(openInput: () => Promise<Readable>): Promise<void> {
    await this.releaseInput();
    this.input = { kind: "producer", open: openInput };
  }

  /**
   * Open a fresh reader over the current input.
   *
   * @throws NoInputError when no input has been declared
   */
  async openInput(): Promise<Readable> {
    const input = this.input;
    switch (input.kind) {
      case "none":
        throw new NoInputError();
      case "file": {
        const handle = await open(input.path, "r");
        return handle.createReadStream();
      }
      case "producer":
        return input.open();
    }
  }

  openPager(): Promise<PagedSink> {
    return this.pagerFactory();
  }

  /**
   * Check the current stack by running it over empty input.
   */
  async testFilter(): Promise<void> {
    await testFilter({
      bin: this.jq.bin,
      binArgs: this.jq.args,
      filter: this.stack.joined(),
      timeoutMs: this.jq.testTimeoutMs,
      signal: this.signal,
    });
  }

  /**
   * Run the stack over the current input into `stdout`. jq's diagnostics go
   * to the session's diagnostic stream. Resolves with null when there is no
   * input; nothing is run in that case.
   */
  async runFilter(stdout: Writable, options: RunFilterOptions = {}): Promise<ExecutionResult | null> {
    if (!this.hasInput) {
      return null;
    }
    const input = await this.openInput();
    return execute({
      bin: this.jq.bin,
      binArgs: this.jq.args,
      filter: this.stack.joined(),
      color: options.color,
      input,
      stdout,
      stderr: this.diagnostics,
      signal: options.signal ?? this.signal,
    });
  }

  /**
   * Throw the error describing an unsuccessful jq run.
   */
  checkResult(result: ExecutionResult): void {
    const error = resultError(result);
    if (error) {
      throw new ExecError("jq", [], error);
    }
  }

  /** Dispatch one command through the library. */
  execute(name: string, args: readonly string[]): Promise<void> {
    return this.library.execute(this, name, args);
  }

  /**
   * Read and execute commands until input ends, a quit is requested or the
   * session is stopped. Rejects only when reading fails; a temporary input
   * file is removed on every path.
   */
  async run(): Promise<void> {
    const stopped = new Promise<null>((resolve) => {
      if (this.signal.aborted) {
        resolve(null);
        return;
      }
      this.signal.addEventListener("abort", () => resolve(null), { once: true });
    });

    try {
      while (this.alive) {
        const read = await Promise.race([this.reader.readCommand(), stopped]);
        if (read === null || read.kind === "empty") {
          break;
        }
        if (read.kind === "malformed") {
          this.log.log(read.error);
        } else {
          try {
            await this.execute(read.command.name, read.command.args);
          } catch (err) {
            if (isQuit(err)) {
              break;
            }
            this.log.log(err);
          }
        }
        if (read.final) {
          break;
        }
      }
    } finally {
      this.controller.abort();
      this.reader.close();
      await this.releaseInput();
    }
  }

  /** Stop the loop and cancel whatever is running. */
  stop(): void {
    this.controller.abort();
  }

  private async releaseInput(): Promise<void> {
    const input = this.input;
    this.input = { kind: "none" };
    if (input.kind === "file" && input.temporary) {
      try {
        await rm(input.path, { force: true });
      } catch (err) {
        this.log.log(`unable to remove ${input.path}:`, err);
      }
    }
  }
}
