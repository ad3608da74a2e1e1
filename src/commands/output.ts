/**
 * Output commands: write, raw and quit
 */

import { pipeline } from "node:stream/promises";
import { QuitRequest, UsageError } from "../errors.js";
import { FileSink } from "../io/file-sink.js";
import { linkSignals } from "../io/signals.js";
import type { ExecutionResult } from "../jq/index.js";
import type { JQShell } from "../shell/session.js";
import type { CommandFlags } from "./flags.js";

const NO_INPUT_WARNING = "no input has been declared";

/**
 * Run the stack over the input and show the result in the pager, or write
 * it to a file when one is named.
 */
export async function writeOutput(shell: JQShell, filename?: string): Promise<void> {
  if (!shell.hasInput) {
    shell.log.log(NO_INPUT_WARNING);
  }
  if (filename === undefined) {
    await writeToPager(shell);
  } else {
    await writeToFile(shell, filename);
  }
}

async function writeToPager(shell: JQShell): Promise<void> {
  const pager = await shell.openPager();
  const linked = linkSignals(shell.signal, pager.signal);
  let result: ExecutionResult | null = null;
  try {
    result = await shell.runFilter(pager.stream, { color: shell.jq.color, signal: linked.signal });
  } finally {
    linked.dispose();
    await pager.close();
  }

  const pagerError = await pager.done;
  if (pagerError) {
    shell.log.log("pager:", pagerError);
  }
  if (!result) {
    return;
  }
  // quitting the pager early cuts jq off; that is not a failure
  const cutOff = result.status.kind === "cancelled" || result.status.kind === "io-failure";
  if (cutOff && pager.exited && shell.alive) {
    return;
  }
  shell.checkResult(result);
}

async function writeToFile(shell: JQShell, filename: string): Promise<void> {
  const sink = await FileSink.create(filename);
  let result: ExecutionResult | null = null;
  try {
    result = await shell.runFilter(sink.stream);
  } finally {
    await sink.close();
  }
  if (result) {
    shell.checkResult(result);
  }
  shell.log.log(`${result?.bytesOut ?? 0} bytes written to ${JSON.stringify(filename)}`);
}

export async function cmdWrite(shell: JQShell, flags: CommandFlags): Promise<void> {
  flags.about("Write runs the filter stack over the input and shows the output in the pager.");
  flags.argSet();
  flags.argSet("filename");
  flags.argDoc("filename", "write the output to a file instead of the pager");
  if (!flags.parse()) {
    return;
  }
  if (flags.args.length > 1) {
    throw new UsageError("at most one file may be given");
  }
  await writeOutput(shell, flags.args[0]);
}

export async function cmdRaw(shell: JQShell, flags: CommandFlags): Promise<void> {
  flags.about("Raw shows the input as it is, without running the filter stack.");
  flags.argSet();
  flags.argSet("filename");
  flags.argDoc("filename", "copy the input to a file instead of the pager");
  if (!flags.parse()) {
    return;
  }
  if (flags.args.length > 1) {
    throw new UsageError("at most one file may be given");
  }

  const input = await shell.openInput();
  const filename = flags.args[0];
  if (filename !== undefined) {
    const sink = await FileSink.create(filename);
    try {
      await pipeline(input, sink.stream, { signal: shell.signal });
    } finally {
      await sink.close();
    }
    shell.log.log(`${sink.bytesWritten} bytes written to ${JSON.stringify(filename)}`);
    return;
  }

  const pager = await shell.openPager();
  const linked = linkSignals(shell.signal, pager.signal);
  try {
    await pipeline(input, pager.stream, { signal: linked.signal, end: false });
  } catch (err) {
    if (!pager.exited) {
      throw err;
    }
  } finally {
    linked.dispose();
    input.destroy();
    await pager.close();
  }
}

export async function cmdQuit(_shell: JQShell, flags: CommandFlags): Promise<void> {
  flags.about("Quit ends the session.");
  if (!flags.parse()) {
    return;
  }
  throw new QuitRequest();
}
