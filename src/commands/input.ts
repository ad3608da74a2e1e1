/**
 * Input commands: load, exec and pipe
 *
 * Each of these replaces the session's input, clears the stack unless -k is
 * given and shows the new output unless -q is given.
 */

import { randomUUID } from "node:crypto";
import { open, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { LaunchError, UsageError } from "../errors.js";
import {
  exitError,
  loginShell,
  processProducer,
  runInherited,
  runToFile,
  startProcess,
  type ExitInfo,
} from "../io/process.js";
import type { ExecutionResult } from "../jq/index.js";
import type { JQShell } from "../shell/session.js";
import type { CommandFlags } from "./flags.js";
import { writeOutput } from "./output.js";

function temporaryPath(prefix: string): string {
  return join(tmpdir(), `jqsh-${prefix}-${randomUUID()}.json`);
}

async function afterInput(shell: JQShell, keep: boolean, quiet: boolean): Promise<void> {
  if (!keep) {
    shell.stack.popAll();
  }
  if (!quiet) {
    await writeOutput(shell);
  }
}

/**
 * Run a program into a fresh temporary file and make that the input. The
 * file is removed again when the program fails (unless ignored).
 */
async function cacheOutput(
  shell: JQShell,
  program: string,
  args: readonly string[],
  ignore: boolean,
  prefix: string,
): Promise<void> {
  const path = temporaryPath(prefix);
  let exit: ExitInfo;
  try {
    exit = await runToFile(program, args, path);
  } catch (err) {
    await rm(path, { force: true });
    throw err;
  }
  const error = exitError(program, exit);
  if (error && !ignore) {
    await rm(path, { force: true });
    throw error;
  }
  await shell.setInputFile(path, true);
}

function reportExit(shell: JQShell, program: string, ignore: boolean): (exit: ExitInfo) => void {
  return (exit) => {
    const error = exitError(program, exit);
    if (error && !ignore) {
      shell.log.log(`${program}:`, error);
    }
  };
}

export async function cmdLoad(shell: JQShell, flags: CommandFlags): Promise<void> {
  flags.about("Load uses a file as input.");
  flags.argSet("filename");
  const quiet = flags.boolean("quiet", "do not write the output after loading", "q");
  const keep = flags.boolean("keep", "keep the filter stack", "k");
  if (!flags.parse()) {
    return;
  }
  if (flags.args.length !== 1) {
    throw new UsageError("expects exactly one file");
  }

  const [filename] = flags.args;
  const handle = await open(filename, "r");
  await handle.close();

  await shell.setInputFile(filename, false);
  await afterInput(shell, keep.value, quiet.value);
}

export async function cmdExec(shell: JQShell, flags: CommandFlags): Promise<void> {
  flags.about("Exec runs a program and uses its output as input.");
  flags.argSet("program", "arg", "...");
  const nocache = flags.boolean("no-cache", "run the program again for every read instead of caching its output", "c");
  const quiet = flags.boolean("quiet", "do not write the output", "q");
  const keep = flags.boolean("keep", "keep the filter stack", "k");
  const ignore = flags.boolean("ignore", "ignore the program's exit status");
  flags.docs("Flags are only read before the program name; everything after it is passed to the program.");
  if (!flags.parse()) {
    return;
  }
  if (flags.args.length === 0) {
    throw new UsageError("missing program");
  }

  const [program, ...args] = flags.args;
  if (nocache.value) {
    await shell.setInputProducer(processProducer(program, args, reportExit(shell, program, ignore.value)));
  } else {
    await cacheOutput(shell, program, args, ignore.value, "exec");
  }
  await afterInput(shell, keep.value, quiet.value);
}

export async function cmdPipe(shell: JQShell, flags: CommandFlags): Promise<void> {
  flags.about("Pipe connects the shell with a script run by the login shell.");
  flags.argSet("--in", "script");
  flags.argSet("--out", "script");
  flags.argDoc("script", "a command line for the login shell");
  const pipeIn = flags.boolean("in", "use the script's output as input (the default)");
  const pipeOut = flags.boolean("out", "send the filter stack's output to the script");
  const quiet = flags.boolean("quiet", "do not write the output (--in)", "q");
  const keep = flags.boolean("keep", "keep the filter stack (--in)", "k");
  const ignore = flags.boolean("ignore", "ignore the script's exit status (--in)");
  const nocache = flags.boolean("no-cache", "run the script again for every read (--in)", "c");
  const output = flags.string("output", "the script writes the input to this file, removed later (--in)", {
    short: "o",
    placeholder: "file",
  });
  const keepOutput = flags.string("keep-output", "the script writes the input to this file, kept (--in)", {
    short: "O",
    placeholder: "file",
  });
  const color = flags.boolean("color", "colorize the output sent to the script (--out)");
  flags.docs(
    "With --out, jq's output is written to the script's standard input.",
    "With -o or -O the script's standard output is shown instead of captured.",
  );
  if (!flags.parse()) {
    return;
  }

  if (pipeIn.value && pipeOut.value) {
    throw new UsageError("--in and --out cannot be combined");
  }
  if (flags.args.length !== 1) {
    throw new UsageError("expects exactly one script");
  }
  const [script] = flags.args;
  const program = loginShell(shell.shellPath);
  const args = ["-c", script];

  if (pipeOut.value) {
    await pipeToScript(shell, program, args, color.value);
    return;
  }

  if (output.value !== "" && keepOutput.value !== "") {
    throw new UsageError("-o and -O cannot be combined");
  }
  const named = output.value || keepOutput.value;
  if (named !== "") {
    if (nocache.value) {
      throw new UsageError("-c cannot be combined with -o or -O");
    }
    const exit = await runInherited(program, args);
    const error = exitError(program, exit);
    if (error && !ignore.value) {
      throw error;
    }
    await shell.setInputFile(named, output.value !== "");
  } else if (nocache.value) {
    await shell.setInputProducer(processProducer(program, args, reportExit(shell, program, ignore.value)));
  } else {
    await cacheOutput(shell, program, args, ignore.value, "pipe");
  }
  await afterInput(shell, keep.value, quiet.value);
}

async function pipeToScript(shell: JQShell, program: string, args: string[], color: boolean): Promise<void> {
  if (!shell.hasInput) {
    shell.log.log("no input has been declared");
  }
  const { child, exited } = await startProcess(program, args, ["pipe", "inherit", "inherit"]);
  const stdin = child.stdin;
  if (!stdin) {
    child.kill();
    throw new LaunchError(program, new Error("no stdin pipe"));
  }
  const writeFailures: Error[] = [];
  stdin.on("error", (err: Error) => {
    writeFailures.push(err);
  });

  let result: ExecutionResult | null = null;
  try {
    result = await shell.runFilter(stdin, { color });
  } finally {
    stdin.end();
  }
  const error = exitError(program, await exited);
  if (error) {
    throw error;
  }
  // a script that stops reading early (head, for one) breaks jq's pipe
  if (result && !(result.status.kind === "io-failure" && writeFailures.length > 0)) {
    shell.checkResult(result);
  }
}
