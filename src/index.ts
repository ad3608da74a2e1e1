#!/usr/bin/env node
/**
 * jqsh CLI Entry Point
 *
 * Usage:
 *   jqsh [options] [file...]
 */

import { createLibrary } from "./commands/index.js";
import { loadConfig, type Config } from "./config.js";
import { errorMessage, JQNotFoundError } from "./errors.js";
import { checkJQVersion, locateJQ, type JQVersion } from "./jq/index.js";
import { InitShellReader, LineShellReader, type ShellReader } from "./shell/reader.js";
import { JQShell } from "./shell/session.js";
import type { Command } from "./shell/syntax.js";

export const VERSION = "0.1.0";

export interface CLIOptions {
  files: string[];
  config: string;
  jq: string;
  pager: string;
  help: boolean;
  version: boolean;
}

function showHelp(): void {
  console.log(`
Usage: jqsh [options] [file...]

Arguments:
  file               JSON input; several files are concatenated

Options:
  --config <path>    Path to config file (default: ~/.jqsh/config.json)
  --jq <path>        jq executable (default: jq on PATH)
  --pager <cmd>      Pager command line (default: less -X -r)
  --version          Print the version and exit
  --help             Show this help message

Type :help inside the shell for a list of commands.
`);
}

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    files: [],
    config: "",
    jq: "",
    pager: "",
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      options.help = true;
    } else if (arg === "--version" || arg === "-version") {
      options.version = true;
    } else if (arg === "--config") {
      options.config = args[++i] ?? "";
    } else if (arg === "--jq") {
      options.jq = args[++i] ?? "";
    } else if (arg === "--pager") {
      options.pager = args[++i] ?? "";
    } else if (arg === "--") {
      options.files.push(...args.slice(i + 1));
      break;
    } else if (!arg.startsWith("-") || arg === "-") {
      options.files.push(arg);
    } else {
      throw new Error(`unknown option: ${arg}`);
    }
  }

  return options;
}

/**
 * Commands run before the first prompt, loading the named files.
 */
export function startupCommands(files: string[]): Command[] {
  if (files.length === 0) {
    return [];
  }
  if (files.length === 1) {
    return [{ name: "load", args: files }];
  }
  return [{ name: "exec", args: ["-c", "cat", ...files] }];
}

function installHint(err: unknown): string {
  if (err instanceof JQNotFoundError) {
    return "install jq (https://jqlang.github.io/jq/) or name it with --jq";
  }
  return "check that --jq (or jq.path) names a working jq executable";
}

async function findJQ(config: Config): Promise<{ bin: string; version: JQVersion }> {
  const bin = await locateJQ(config.jq.path, process.env.PATH, config.jq.args);
  const version = await checkJQVersion(bin, config.jq.args);
  return { bin, version };
}

async function main(): Promise<void> {
  let options: CLIOptions;
  try {
    options = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(`[jqsh] ${errorMessage(err)}`);
    console.error("Use --help for more information.");
    process.exit(2);
  }

  if (options.help) {
    showHelp();
    return;
  }
  if (options.version) {
    console.log(VERSION);
    return;
  }

  let config: Config;
  try {
    config = await loadConfig(options.config || undefined);
  } catch (err) {
    console.error(`[jqsh] Error loading config: ${errorMessage(err)}`);
    process.exit(1);
  }
  if (options.jq) {
    config.jq.path = options.jq;
  }
  if (options.pager) {
    config.pager.command = options.pager.split(/\s+/).filter(Boolean);
  }

  let jq: { bin: string; version: JQVersion };
  try {
    jq = await findJQ(config);
  } catch (err) {
    console.error(`[jqsh] ${errorMessage(err)}`);
    console.error(`[jqsh] ${installHint(err)}`);
    process.exit(1);
  }

  const terminal = process.stdin.isTTY === true;
  const lineReader = new LineShellReader({
    input: process.stdin,
    output: terminal ? process.stdout : undefined,
    prompt: config.prompt,
    terminal,
  });
  const reader: ShellReader = new InitShellReader(startupCommands(options.files), lineReader);

  const shell = new JQShell({
    reader,
    library: createLibrary(),
    jq: {
      bin: jq.bin,
      args: config.jq.args,
      color: config.jq.color,
      testTimeoutMs: config.jq.testTimeoutMs,
    },
    pager: config.pager.command,
    shellPath: config.shell.path,
  });

  process.once("SIGTERM", () => shell.stop());

  if (terminal) {
    console.log(`jqsh ${VERSION} (${jq.version.version})`);
    console.log("Type :help for commands, :quit to exit.");
  }

  await shell.run();
}

if (process.argv[1]?.endsWith("index.ts") || process.argv[1]?.endsWith("index.js") || process.argv[1]?.endsWith("jqsh")) {
  main().catch((err) => {
    console.error("[jqsh] Fatal error:", err);
    process.exit(1);
  });
}
