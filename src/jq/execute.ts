/**
 * jq process wrapper
 *
 * Runs jq over an input stream and streams its stdout/stderr into the
 * caller's sinks, counting bytes and racing completion against an abort
 * signal.
 */

import { spawn, type ChildProcessWithoutNullStreams } from "node:child_process";
import { Readable, Writable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { CancelledError, ExitStatusError, LaunchError, toError } from "../errors.js";

export type ExecutionStatus =
  | { kind: "success" }
  | { kind: "exit"; code: number | null; signal: NodeJS.Signals | null }
  | { kind: "cancelled" }
  | { kind: "launch-failure"; error: Error }
  | { kind: "io-failure"; error: Error };

export interface ExecutionResult {
  bytesOut: number;
  bytesErr: number;
  status: ExecutionStatus;
}

export interface ExecuteOptions {
  /** jq executable (default: "jq") */
  bin?: string;
  /** Arguments placed before jq's own arguments */
  binArgs?: readonly string[];
  /** The jq program, usually a joined filter stack */
  filter: string;
  /** Pass --color-output */
  color?: boolean;
  input: Readable;
  stdout: Writable;
  stderr: Writable;
  signal?: AbortSignal;
}

/**
 * Forwards writes to a target stream, counting the bytes the target
 * accepted. Ending the counter does not end the target.
 */
export class WriteCounter extends Writable {
  bytes = 0;

  constructor(private readonly target: Writable) {
    super();
  }

  override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.target.write(chunk, (err) => {
      if (err) {
        callback(err);
        return;
      }
      this.bytes += chunk.length;
      callback();
    });
  }
}

const EXPECTED_INPUT_ERRORS = new Set(["EPIPE", "ECONNRESET", "ERR_STREAM_PREMATURE_CLOSE", "ERR_STREAM_DESTROYED"]);

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

function waitForSpawn(child: ChildProcessWithoutNullStreams): Promise<Error | null> {
  return new Promise((resolve) => {
    const onSpawn = (): void => {
      child.off("error", onError);
      resolve(null);
    };
    const onError = (err: Error): void => {
      child.off("spawn", onSpawn);
      resolve(err);
    };
    child.once("spawn", onSpawn);
    child.once("error", onError);
  });
}

function whenAborted(signal: AbortSignal | undefined): Promise<void> {
  return new Promise((resolve) => {
    if (!signal) {
      return;
    }
    if (signal.aborted) {
      resolve();
      return;
    }
    signal.addEventListener("abort", () => resolve(), { once: true });
  });
}

/**
 * Build the argument list jq is started with.
 */
export function jqArgs(filter: string, options: { binArgs?: readonly string[]; color?: boolean } = {}): string[] {
  const args = [...(options.binArgs ?? [])];
  if (options.color) {
    args.push("--color-output");
  }
  // jq reads a word starting with "-" as an option; leading blanks are ignored
  args.push(filter.startsWith("-") ? ` ${filter}` : filter);
  return args;
}

/**
 * Run jq once. The returned promise always settles: either jq exits on its
 * own, or the signal fires and the process is killed.
 */
export async function execute(options: ExecuteOptions): Promise<ExecutionResult> {
  const bin = options.bin ?? "jq";
  const { signal } = options;
  const out = new WriteCounter(options.stdout);
  const err = new WriteCounter(options.stderr);
  const result = (status: ExecutionStatus): ExecutionResult => ({
    bytesOut: out.bytes,
    bytesErr: err.bytes,
    status,
  });

  if (signal?.aborted) {
    options.input.destroy();
    return result({ kind: "cancelled" });
  }

  const child = spawn(bin, jqArgs(options.filter, options), { stdio: ["pipe", "pipe", "pipe"] });
  const launchError = await waitForSpawn(child);
  if (launchError) {
    options.input.destroy();
    return result({ kind: "launch-failure", error: launchError });
  }

  const exited = new Promise<{ code: number | null; signal: NodeJS.Signals | null }>((resolve) => {
    child.once("exit", (code, exitSignal) => resolve({ code, signal: exitSignal }));
  });
  const state: { killed: boolean; ioError: Error | null } = { killed: false, ioError: null };
  child.on("error", (e) => {
    state.ioError ??= e;
  });
  const onAbort = (): void => {
    if (!state.killed) {
      state.killed = child.kill("SIGKILL");
    }
  };
  signal?.addEventListener("abort", onAbort, { once: true });

  const outputFailed = (e: unknown): void => {
    state.ioError ??= toError(e);
    child.kill("SIGKILL");
  };
  const pumps = [
    pipeline(options.input, child.stdin).catch((e: unknown) => {
      const code = errorCode(e);
      if (code === undefined || !EXPECTED_INPUT_ERRORS.has(code)) {
        outputFailed(e);
      }
    }),
    pipeline(child.stdout, out).catch(outputFailed),
    pipeline(child.stderr, err).catch(outputFailed),
  ];

  const exit = await exited;
  signal?.removeEventListener("abort", onAbort);
  // jq no longer reads its input; a slow producer must not hold the call open
  child.stdin.destroy();

  // a sink that stops accepting writes must not hold the call open once
  // the session is shutting down
  const drained = Promise.all(pumps);
  await Promise.race([drained, whenAborted(signal)]);
  if (signal?.aborted) {
    child.stdout.destroy();
    child.stderr.destroy();
    options.input.destroy();
    await drained;
  }

  if (state.killed) {
    return result({ kind: "cancelled" });
  }
  if (state.ioError) {
    return result({ kind: "io-failure", error: state.ioError });
  }
  if (exit.code === 0) {
    return result({ kind: "success" });
  }
  return result({ kind: "exit", code: exit.code, signal: exit.signal });
}

/**
 * Convert a non-successful result into the error that describes it.
 */
export function resultError(
  result: ExecutionResult,
  program: string = "jq",
  diagnostics: string = "",
): Error | null {
  const { status } = result;
  switch (status.kind) {
    case "success":
      return null;
    case "exit":
      return new ExitStatusError(program, status.code, status.signal, diagnostics);
    case "cancelled":
      return new CancelledError(program);
    case "launch-failure":
      return new LaunchError(program, status.error);
    case "io-failure":
      return status.error;
  }
}
