/**
 * Subprocess helpers for commands that read from or write to other
 * programs (the login shell, or a program run directly).
 */

import { spawn, type ChildProcess, type StdioOptions } from "node:child_process";
import { open } from "node:fs/promises";
import type { Readable } from "node:stream";
import { ExitStatusError, LaunchError } from "../errors.js";

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

export interface StartedProcess {
  child: ChildProcess;
  exited: Promise<ExitInfo>;
}

/**
 * Spawn a program and wait until it has actually started.
 *
 * @throws LaunchError when the program cannot be started
 */
export async function startProcess(program: string, args: readonly string[], stdio: StdioOptions): Promise<StartedProcess> {
  const child = spawn(program, args, { stdio });
  const exited = new Promise<ExitInfo>((resolve) => {
    child.once("exit", (code, signal) => resolve({ code, signal }));
  });
  await new Promise<void>((resolve, reject) => {
    child.once("spawn", () => resolve());
    child.once("error", (err) => reject(new LaunchError(program, err)));
  });
  return { child, exited };
}

export function exitError(program: string, exit: ExitInfo): ExitStatusError | null {
  return exit.code === 0 ? null : new ExitStatusError(program, exit.code, exit.signal);
}

/**
 * Login shell used for user scripts: $SHELL, falling back to bash.
 */
export function loginShell(configured?: string): string {
  return configured || process.env.SHELL || "bash";
}

/**
 * Run a program with its stdout redirected into a file. Resolves with the
 * program's exit status once it has exited and the file is closed.
 */
export async function runToFile(program: string, args: readonly string[], path: string): Promise<ExitInfo> {
  const handle = await open(path, "w");
  try {
    const { exited } = await startProcess(program, args, ["ignore", handle.fd, "inherit"]);
    return await exited;
  } finally {
    await handle.close();
  }
}

/**
 * Run a program with stdout shown to the user.
 */
export async function runInherited(program: string, args: readonly string[]): Promise<ExitInfo> {
  const { exited } = await startProcess(program, args, ["ignore", "inherit", "inherit"]);
  return exited;
}

/**
 * A deferred input: each call starts the program and returns its stdout.
 * The exit status is reported through `onExit` once the program finishes.
 */
export function processProducer(
  program: string,
  args: readonly string[],
  onExit: (exit: ExitInfo) => void,
): () => Promise<Readable> {
  return async () => {
    const { child, exited } = await startProcess(program, args, ["ignore", "pipe", "inherit"]);
    void exited.then(onExit);
    if (!child.stdout) {
      throw new LaunchError(program, new Error("no stdout pipe"));
    }
    return child.stdout;
  };
}
