/**
 * Pager sink
 *
 * Output written to the sink is piped into a pager subprocess. The pager's
 * exit is observed asynchronously: `signal` aborts as soon as it exits so a
 * producer can stop early when the user quits the pager.
 */

import { spawn, type ChildProcess } from "node:child_process";
import type { Writable } from "node:stream";
import { ExitStatusError, LaunchError } from "../errors.js";
import type { PagedSink } from "./sink.js";

export const DEFAULT_PAGER: readonly string[] = ["less", "-X", "-r"];

const RESET_COLORS = "\x1b[0m";

export interface PagerOptions {
  /** Pager command and arguments (default: less -X -r) */
  command?: readonly string[];
  /** Reset terminal colors once the pager exits (default: stdout is a TTY) */
  resetTerminal?: boolean;
}

export class PagerSink implements PagedSink {
  /** Settles with the pager's failure, or null when it exited cleanly */
  readonly done: Promise<Error | null>;
  private controller = new AbortController();
  private writeError: Error | null = null;

  private constructor(
    child: ChildProcess,
    readonly stream: Writable,
    readonly program: string,
    resetTerminal: boolean,
  ) {
    this.stream.on("error", (err: Error) => {
      // EPIPE once the pager has quit; the producer sees it via write callbacks
      this.writeError ??= err;
    });
    this.done = new Promise((resolve) => {
      child.once("exit", (code, signal) => {
        if (resetTerminal) {
          process.stdout.write(RESET_COLORS);
        }
        this.controller.abort();
        resolve(code === 0 ? null : new ExitStatusError(program, code, signal));
      });
    });
  }

  /**
   * Start the pager. Rejects with a LaunchError when it cannot be started.
   */
  static async open(options: PagerOptions = {}): Promise<PagerSink> {
    const [program, ...args] = options.command && options.command.length > 0 ? options.command : DEFAULT_PAGER;
    const child = spawn(program, args, { stdio: ["pipe", "inherit", "inherit"] });

    await new Promise<void>((resolve, reject) => {
      child.once("spawn", () => resolve());
      child.once("error", (err) => reject(new LaunchError(program, err)));
    });

    if (!child.stdin) {
      child.kill();
      throw new LaunchError(program, new Error("no stdin pipe"));
    }
    return new PagerSink(child, child.stdin, program, options.resetTerminal ?? process.stdout.isTTY === true);
  }

  /** Aborted once the pager has exited */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get exited(): boolean {
    return this.controller.signal.aborted;
  }

  /** The first error writing to the pager, usually a broken pipe */
  get brokenPipe(): Error | null {
    return this.writeError;
  }

  /**
   * Finish the pager's input and wait for the user to leave it.
   */
  async close(): Promise<void> {
    if (!this.stream.writableEnded) {
      this.stream.end();
    }
    await this.done;
  }
}
