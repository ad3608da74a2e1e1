/**
 * Filter stack commands: push, pop, popall, peek, filter and script
 */

import { writeFile } from "node:fs/promises";
import { UsageError, errorMessage } from "../errors.js";
import { FilterString } from "../filter/filter.js";
import type { JQShell } from "../shell/session.js";
import type { CommandFlags } from "./flags.js";
import { writeOutput } from "./output.js";

/** Quote s for a POSIX shell. */
export function shellQuote(s: string): string {
  return `'${s.replaceAll("'", `'\\''`)}'`;
}

export async function cmdPush(shell: JQShell, flags: CommandFlags): Promise<void> {
  flags.about("Push adds filters to the stack and shows the result.");
  flags.argSet("filter", "...");
  flags.argDoc("filter", "a jq filter (may contain pipes '|')");
  const quiet = flags.boolean("quiet", "do not write the output after pushing", "q");
  flags.docs(
    "The combined stack is checked by jq before anything is shown. A filter",
    "jq rejects is removed again, as is one whose output cannot be written.",
  );
  if (!flags.parse()) {
    return;
  }

  const filters = flags.args.filter((arg) => arg.trim() !== "");
  if (filters.length === 0) {
    throw new UsageError("expects at least one filter");
  }
  for (const filter of filters) {
    shell.stack.push(new FilterString(filter));
  }

  try {
    await shell.testFilter();
  } catch (err) {
    shell.stack.pop(filters.length);
    throw err;
  }

  if (quiet.value) {
    return;
  }
  try {
    await writeOutput(shell);
  } catch (err) {
    shell.log.log("reverting push operation");
    try {
      shell.stack.pop(filters.length);
    } catch (revertErr) {
      shell.log.log(revertErr);
    }
    throw err;
  }
}

export async function cmdPop(shell: JQShell, flags: CommandFlags): Promise<void> {
  flags.about("Pop removes filters from the top of the stack and shows the result.");
  flags.argSet();
  flags.argSet("n");
  flags.argDoc("n", "how many filters to remove (default 1)");
  const quiet = flags.boolean("quiet", "do not write the output after popping", "q");
  if (!flags.parse()) {
    return;
  }

  if (flags.args.length > 1) {
    throw new UsageError("at most one argument is allowed");
  }
  let n = 1;
  if (flags.args.length === 1) {
    const [arg] = flags.args;
    if (!/^\d+$/.test(arg)) {
      throw new UsageError(`argument must be a non-negative integer: ${JSON.stringify(arg)}`);
    }
    n = Number.parseInt(arg, 10);
  }

  shell.stack.pop(n);
  if (!quiet.value) {
    await writeOutput(shell);
  }
}

export async function cmdPopAll(shell: JQShell, flags: CommandFlags): Promise<void> {
  flags.about("Popall removes every filter from the stack.");
  if (!flags.parse()) {
    return;
  }
  if (flags.args.length > 0) {
    throw new UsageError("no arguments expected");
  }
  shell.stack.popAll();
}

export async function cmdPeek(shell: JQShell, flags: CommandFlags): Promise<void> {
  flags.about("Peek shows the output of filters pushed on the stack without keeping them.");
  flags.argSet("filter", "...");
  flags.argDoc("filter", "a jq filter (may contain pipes '|')");
  if (!flags.parse()) {
    return;
  }

  const filters = flags.args.filter((arg) => arg.trim() !== "");
  for (const filter of filters) {
    shell.stack.push(new FilterString(filter));
  }
  try {
    if (filters.length > 0) {
      await shell.testFilter().catch((err: unknown) => {
        throw new Error(`invalid filter: ${errorMessage(err)}`, { cause: err });
      });
    }
    await writeOutput(shell);
  } finally {
    if (filters.length > 0) {
      shell.stack.pop(filters.length);
    }
  }
}

export async function cmdFilter(shell: JQShell, flags: CommandFlags): Promise<void> {
  flags.about("Filter prints the filter stack.");
  const jq = flags.boolean("jq", "print the stack as a single jq program");
  const quote = flags.string("quote", "quote the program with Q, escaping Q inside it as E", {
    placeholder: "QE",
  });
  flags.docs(
    "Without --jq each filter is listed on its own line, oldest first, with",
    `its index. With --jq, --quote "''\\''" quotes the program for a POSIX shell.`,
  );
  if (!flags.parse()) {
    return;
  }
  if (flags.args.length > 0) {
    throw new UsageError("no arguments expected");
  }

  if (jq.value) {
    let program = shell.stack.joined();
    if (quote.value !== "") {
      const [q, ...escape] = quote.value;
      if (escape.length === 0) {
        throw new UsageError("--quote needs a quote character followed by its escape");
      }
      program = q + program.replaceAll(q, escape.join("")) + q;
    }
    shell.output.write(program + "\n");
    return;
  }

  const fragments = shell.stack.fragments();
  if (fragments.length === 0) {
    shell.log.log("no filter");
    return;
  }
  const lines = fragments.map((fragment, i) => `[${String(i).padStart(2, "0")}] ${fragment}`);
  shell.output.write(lines.join("\n") + "\n");
}

export async function cmdScript(shell: JQShell, flags: CommandFlags): Promise<void> {
  flags.about("Script prints a shell script that runs the filter stack with jq.");
  flags.argSet();
  const oneline = flags.boolean("oneline", "print only the jq command, without the #! line");
  const file = flags.string("file", "read input from this file in the script", { short: "f", placeholder: "file" });
  const useInput = flags.boolean("input-file", "read input from the current input file", "F");
  const out = flags.string("output", "write an executable script to this path", { short: "o", placeholder: "path" });
  if (!flags.parse()) {
    return;
  }
  if (flags.args.length > 0) {
    throw new UsageError("no arguments expected");
  }
  if (file.value !== "" && useInput.value) {
    throw new UsageError("-f and -F cannot be combined");
  }

  let inputArg = '"${@}"';
  if (file.value !== "") {
    inputArg = shellQuote(file.value);
  } else if (useInput.value) {
    const source = shell.inputSource;
    if (source.kind !== "file" || source.temporary) {
      throw new UsageError("the input is not a file");
    }
    inputArg = shellQuote(source.path);
  }

  const command = `jq ${shellQuote(shell.stack.joined())} ${inputArg}`;
  const script = oneline.value ? `${command}\n` : `#!/usr/bin/env sh\n\n${command}\n`;

  if (out.value === "") {
    shell.output.write(script);
    return;
  }
  await writeFile(out.value, script, { mode: 0o755 });
  shell.log.log(`script written to ${JSON.stringify(out.value)}`);
}
