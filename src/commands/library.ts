/**
 * Command library
 *
 * The dispatch table mapping command names to handlers, plus help topics.
 * A fresh library already contains the "help" command, which documents
 * every other registered command and topic.
 */

import { ConfigurationError, ExecError, UnknownCommandError, UsageError } from "../errors.js";
import { MemoryWritable } from "../io/sink.js";
import type { JQShell } from "../shell/session.js";
import { CommandFlags, synopsis } from "./flags.js";

/**
 * A command handler. Handlers declare their flags on `flags`, call
 * `flags.parse()` and return early when it reports that help was printed.
 */
export type CommandHandler = (shell: JQShell, flags: CommandFlags) => Promise<void>;

export class Library {
  private commands = new Map<string, CommandHandler>();
  private topics = new Map<string, string>();

  constructor() {
    this.register("help", (shell, flags) => this.help(shell, flags));
  }

  /**
   * @throws ConfigurationError when the name is already taken
   */
  register(name: string, handler: CommandHandler): void {
    if (this.commands.has(name) || this.topics.has(name)) {
      throw new ConfigurationError(`${name}: command already registered`);
    }
    this.commands.set(name, handler);
  }

  /**
   * @throws ConfigurationError when the name is already taken
   */
  registerTopic(name: string, text: string): void {
    if (this.commands.has(name) || this.topics.has(name)) {
      throw new ConfigurationError(`${name}: topic already registered`);
    }
    this.topics.set(name, text);
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  commandNames(): string[] {
    return [...this.commands.keys()].sort();
  }

  topicNames(): string[] {
    return [...this.topics.keys()].sort();
  }

  /**
   * Run a command. Handler failures are wrapped in an ExecError naming the
   * command; an unknown name is reported as is.
   */
  async execute(shell: JQShell, name: string, args: readonly string[]): Promise<void> {
    const handler = this.commands.get(name);
    if (!handler) {
      throw new UnknownCommandError(name);
    }
    const flags = new CommandFlags(name, args, shell.output);
    try {
      await handler(shell, flags);
    } catch (err) {
      throw new ExecError(name, args, err);
    }
  }

  /** One-line summary of a command, taken from its usage text. */
  async synopsis(shell: JQShell, name: string): Promise<string> {
    const handler = this.commands.get(name);
    if (!handler) {
      const topic = this.topics.get(name);
      if (topic === undefined) {
        throw new UnknownCommandError(name);
      }
      return synopsis(topic);
    }
    const usage = new MemoryWritable();
    await handler(shell, new CommandFlags(name, ["-h"], usage));
    return synopsis(usage.text());
  }

  private async help(shell: JQShell, flags: CommandFlags): Promise<void> {
    flags.about("Help prints documentation for commands and topics.");
    flags.argSet();
    flags.argSet("topic");
    flags.argDoc("topic", "a command or topic name");
    if (!flags.parse()) {
      return;
    }

    if (flags.args.length > 1) {
      throw new UsageError("at most one help topic is allowed");
    }
    if (flags.args.length === 1) {
      const [topic] = flags.args;
      const text = this.topics.get(topic);
      if (text !== undefined) {
        shell.output.write(text.endsWith("\n") ? text : text + "\n");
        return;
      }
      const handler = this.commands.get(topic);
      if (!handler) {
        throw new UsageError(`${topic}: no such command or topic`);
      }
      await handler(shell, new CommandFlags(topic, ["-h"], shell.output));
      return;
    }

    const names = [...this.commandNames(), ...this.topicNames()];
    const width = Math.max(...names.map((n) => n.length)) + 2;
    const lines = ["commands:"];
    for (const name of this.commandNames()) {
      lines.push(`  ${name.padEnd(width)}${await this.synopsis(shell, name)}`);
    }
    if (this.topics.size > 0) {
      lines.push("other topics:");
      for (const name of this.topicNames()) {
        lines.push(`  ${name.padEnd(width)}${synopsis(this.topics.get(name) ?? "")}`);
      }
    }
    lines.push("run `:help <topic>` for more information");
    shell.output.write(lines.join("\n") + "\n");
  }
}
