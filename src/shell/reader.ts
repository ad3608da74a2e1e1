/**
 * Command readers
 *
 * A ShellReader yields one Command per call. The `final` flag tells the
 * session that input is exhausted and it must not prompt again.
 */

import * as readline from "node:readline";
import { MalformedCommandError } from "../errors.js";
import { parseLine, type Command } from "./syntax.js";

export type ReadResult =
  | { kind: "command"; command: Command; final: boolean }
  | { kind: "malformed"; error: MalformedCommandError; final: boolean }
  | { kind: "empty"; final: true };

export interface ShellReader {
  /**
   * Read the next command. Rejects only when the underlying input fails;
   * end of input is reported through `final`.
   */
  readCommand(): Promise<ReadResult>;
  close(): void;
}

function toResult(line: string, final: boolean): ReadResult {
  try {
    return { kind: "command", command: parseLine(line), final };
  } catch (err) {
    if (err instanceof MalformedCommandError) {
      return { kind: "malformed", error: err, final };
    }
    throw err;
  }
}

/**
 * LineShellReader options
 */
export interface LineShellReaderOptions {
  /** Input stream (default: process.stdin) */
  input?: NodeJS.ReadableStream;
  /** Prompt and echo stream; no prompt is written when omitted */
  output?: NodeJS.WritableStream;
  /** Prompt string (default: "> ") */
  prompt?: string;
  /** Treat the input as a terminal (default: input is a TTY) */
  terminal?: boolean;
}

/**
 * Reads lines through node:readline, which supplies line editing and
 * history when attached to a terminal. The input is paused between reads so
 * that a pager or subprocess can own the terminal while a command runs.
 */
export class LineShellReader implements ShellReader {
  private rl: readline.Interface;
  private output: NodeJS.WritableStream | undefined;
  private terminal: boolean;
  private lines: string[] = [];
  private closed = false;
  private failure: Error | null = null;
  private wake: (() => void) | null = null;

  constructor(options: LineShellReaderOptions = {}) {
    const input = options.input ?? process.stdin;
    this.output = options.output;
    this.terminal = options.terminal ?? (input === process.stdin && process.stdin.isTTY === true);

    this.rl = readline.createInterface({
      input,
      output: this.output,
      prompt: options.prompt ?? "> ",
      terminal: this.terminal,
    });

    this.rl.on("line", (line) => {
      this.lines.push(line);
      this.rl.pause();
      this.notify();
    });

    this.rl.on("close", () => {
      this.closed = true;
      this.notify();
    });

    // Handle Ctrl+C at the prompt
    this.rl.on("SIGINT", () => {
      this.output?.write("\nUse :quit to exit\n");
      this.rl.prompt();
    });

    const fail = (err: Error): void => {
      this.failure ??= err;
      this.notify();
    };
    input.on("error", fail);
    // readline re-emits input errors on the interface
    this.rl.on("error", fail);

    this.rl.pause();
  }

  async readCommand(): Promise<ReadResult> {
    if (this.lines.length === 0 && !this.closed && !this.failure) {
      this.rl.prompt();
      await new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }

    if (this.failure) {
      throw this.failure;
    }

    const line = this.lines.shift();
    if (line === undefined) {
      if (this.terminal) {
        this.output?.write("\n");
      }
      return { kind: "empty", final: true };
    }

    return toResult(line, this.closed && this.lines.length === 0);
  }

  close(): void {
    this.rl.close();
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = null;
    wake?.();
  }
}

/**
 * Replays a list of commands before reading from another reader. Used to
 * load the files named on the command line.
 */
export class InitShellReader implements ShellReader {
  private index = 0;

  constructor(
    private readonly init: Command[],
    private readonly reader: ShellReader,
  ) {}

  async readCommand(): Promise<ReadResult> {
    if (this.index < this.init.length) {
      const command = this.init[this.index++];
      return { kind: "command", command, final: false };
    }
    return this.reader.readCommand();
  }

  close(): void {
    this.reader.close();
  }
}

/**
 * Reads commands from a fixed list of lines; the last line is final.
 */
export class ArrayShellReader implements ShellReader {
  private index = 0;

  constructor(private readonly lines: string[]) {}

  async readCommand(): Promise<ReadResult> {
    if (this.index >= this.lines.length) {
      return { kind: "empty", final: true };
    }
    const line = this.lines[this.index++];
    return toResult(line, this.index >= this.lines.length);
  }

  close(): void {
    this.index = this.lines.length;
  }
}
