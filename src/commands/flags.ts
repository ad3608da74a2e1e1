/**
 * CommandFlags - argument parsing and usage text for shell commands
 *
 * Options are only recognized before the first positional argument (or a
 * "--" terminator), so `:exec cat -n file` passes "-n" through to cat.
 * Every command accepts -h/--help, which prints usage and tells the handler
 * not to act.
 */

import { parseArgs } from "node:util";
import { UsageError } from "../errors.js";

export interface Flag<T> {
  readonly value: T;
}

class FlagValue<T> implements Flag<T> {
  constructor(public value: T) {}
}

interface FlagBase {
  name: string;
  short?: string;
  help: string;
  placeholder?: string;
}

type FlagDef =
  | (FlagBase & { type: "boolean"; holder: FlagValue<boolean> })
  | (FlagBase & { type: "string"; holder: FlagValue<string> });

interface ParseOption {
  type: "boolean" | "string";
  short?: string;
}

/**
 * First sentence of a help text, used as a one-line summary.
 */
export function synopsis(text: string): string {
  const paragraph = text.trim().split(/\n\s*\n/)[0] ?? "";
  const joined = paragraph.split("\n").map((line) => line.trim()).join(" ");
  const match = /^(.*?\.)(\s|$)/.exec(joined);
  return match ? match[1] : joined;
}

export class CommandFlags {
  private aboutLines: string[] = [];
  private docLines: string[] = [];
  private argSets: string[][] = [];
  private argDocs: Array<[string, string]> = [];
  private defs: FlagDef[] = [];
  private positionals: string[] = [];

  constructor(
    readonly name: string,
    readonly rawArgs: readonly string[],
    private readonly output: NodeJS.WritableStream,
  ) {}

  /** A short summary; the first sentence becomes the command's synopsis. */
  about(...lines: string[]): void {
    this.aboutLines = lines;
  }

  /** Detailed documentation shown after the flags. */
  docs(...lines: string[]): void {
    this.docLines = lines;
  }

  /** One accepted form of positional arguments. */
  argSet(...args: string[]): void {
    this.argSets.push(args);
  }

  argDoc(arg: string, help: string): void {
    this.argDocs.push([arg, help]);
  }

  boolean(name: string, help: string, short?: string): Flag<boolean> {
    const holder = new FlagValue(false);
    this.addDef({ name, short, type: "boolean", help, holder });
    return holder;
  }

  string(name: string, help: string, options: { short?: string; placeholder?: string } = {}): Flag<string> {
    const holder = new FlagValue("");
    this.addDef({ name, short: options.short, type: "string", help, placeholder: options.placeholder, holder });
    return holder;
  }

  /** Positional arguments, available after parse(). */
  get args(): string[] {
    return this.positionals;
  }

  /**
   * Parse the raw arguments. Returns false when help was requested (usage
   * has been printed and the command should do nothing else).
   *
   * @throws UsageError for unknown flags or missing flag values
   */
  parse(): boolean {
    const [optionArgs, positionals] = this.split();
    const options: Record<string, ParseOption> = { help: { type: "boolean", short: "h" } };
    for (const def of this.defs) {
      options[def.name] = def.short ? { type: def.type, short: def.short } : { type: def.type };
    }

    let values: Record<string, unknown>;
    try {
      values = parseArgs({ args: optionArgs, options, strict: true, allowPositionals: false }).values;
    } catch (err) {
      throw new UsageError(err instanceof Error ? err.message : String(err), { cause: err });
    }

    if (values.help === true) {
      this.printUsage();
      return false;
    }

    for (const def of this.defs) {
      const raw = values[def.name];
      if (def.type === "boolean" && typeof raw === "boolean") {
        def.holder.value = raw;
      } else if (def.type === "string" && typeof raw === "string") {
        def.holder.value = raw;
      }
    }
    this.positionals = positionals;
    return true;
  }

  usage(): string {
    const lines: string[] = [];
    if (this.aboutLines.length > 0) {
      lines.push(...this.aboutLines, "");
    }
    lines.push("usage:");
    if (this.argSets.length === 0) {
      lines.push(`  ${this.name}`);
    }
    for (const set of this.argSets) {
      lines.push(`  ${[this.name, ...set].join(" ")}`);
    }
    if (this.argDocs.length > 0 || this.defs.length > 0) {
      lines.push("arguments and flags:");
    }
    for (const [arg, help] of this.argDocs) {
      lines.push(`  ${arg}: ${help}`);
    }
    for (const def of this.defs) {
      const names = [def.short ? `-${def.short}` : "", `--${def.name}`].filter(Boolean).join(", ");
      const value = def.type === "string" ? ` <${def.placeholder ?? "value"}>` : "";
      lines.push(`  ${names}${value}`, `        ${def.help}`);
    }
    if (this.docLines.length > 0) {
      lines.push("", ...this.docLines);
    }
    return lines.join("\n") + "\n";
  }

  printUsage(): void {
    this.output.write(this.usage());
  }

  private addDef(def: FlagDef): void {
    if (def.name === "help" || def.short === "h") {
      throw new Error(`${this.name}: flag -h/--help is reserved`);
    }
    this.defs.push(def);
  }

  private lookup(token: string): FlagDef | "help" | undefined {
    const body = token.replace(/^--?/, "").split("=")[0];
    if (body === "h" || body === "help") {
      return "help";
    }
    return this.defs.find((def) => def.name === body || def.short === body);
  }

  /**
   * Separate leading flags from positional arguments. Single-dash long
   * flags ("-in") are accepted and rewritten to their "--in" form. A
   * single-dash word that names no flag ("-1", "-.a") is the first
   * positional, so filters starting with a minus need no "--".
   */
  private split(): [string[], string[]] {
    const optionArgs: string[] = [];
    let i = 0;
    while (i < this.rawArgs.length) {
      const arg = this.rawArgs[i];
      if (arg === "--") {
        return [optionArgs, this.rawArgs.slice(i + 1)];
      }
      if (!arg.startsWith("-") || arg === "-") {
        break;
      }

      const def = this.lookup(arg);
      const cluster = def === undefined && !arg.startsWith("--") ? this.shortCluster(arg) : undefined;
      if (def === undefined && !arg.startsWith("--") && cluster === undefined) {
        break;
      }

      const flag = def === "help" ? undefined : def;
      const singleDashLong = flag !== undefined && !arg.startsWith("--") && flag.name.length > 1 && arg.slice(1).split("=")[0] === flag.name;
      optionArgs.push(def === "help" ? "--help" : singleDashLong ? `-${arg}` : arg);
      i++;

      const needsValue = cluster ?? (flag?.type === "string" && !arg.includes("="));
      if (needsValue && i < this.rawArgs.length) {
        optionArgs.push(this.rawArgs[i]);
        i++;
      }
    }
    return [optionArgs, this.rawArgs.slice(i)];
  }

  /**
   * Read "-qk" or "-qofile" as grouped short flags. Returns whether the
   * next word is the value of a trailing string flag, or undefined when
   * some letter names no flag.
   */
  private shortCluster(arg: string): boolean | undefined {
    const letters = arg.slice(1);
    for (let i = 0; i < letters.length; i++) {
      const letter = letters[i];
      if (letter === "h") {
        continue;
      }
      const def = this.defs.find((candidate) => candidate.short === letter);
      if (def === undefined) {
        return undefined;
      }
      if (def.type === "string") {
        return i === letters.length - 1;
      }
    }
    return false;
  }
}
