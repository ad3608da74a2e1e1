import { describe, it, expect } from "vitest";
import { Library } from "../../src/commands/library.js";
import { createLibrary } from "../../src/commands/index.js";
import { ConfigurationError, ExecError, UnknownCommandError, UsageError } from "../../src/errors.js";
import { createTestShell } from "../helpers.js";

describe("Library", () => {
  it("refuses to register a name twice", () => {
    const library = new Library();
    library.register("noop", async () => {});
    expect(() => library.register("noop", async () => {})).toThrow(ConfigurationError);
    expect(() => library.registerTopic("noop", "text")).toThrow(ConfigurationError);
  });

  it("registers help by default", () => {
    expect(new Library().has("help")).toBe(true);
  });

  it("reports unknown commands without wrapping", async () => {
    const { shell } = createTestShell();
    const error = await shell.library.execute(shell, "frobnicate", []).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(UnknownCommandError);
    expect(error).toHaveProperty("message", "frobnicate: unknown command");
  });

  it("wraps handler failures with the command name", async () => {
    const { shell } = createTestShell();
    const library = new Library();
    library.register("boom", async () => {
      throw new Error("it broke");
    });
    const error = await library.execute(shell, "boom", ["a"]).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ExecError);
    if (error instanceof ExecError) {
      expect(error.message).toBe("boom: it broke");
      expect(error.args).toEqual(["a"]);
    }
  });

  it("passes arguments to the handler", async () => {
    const { shell } = createTestShell();
    const library = new Library();
    const seen: string[][] = [];
    library.register("echo", async (_shell, flags) => {
      if (flags.parse()) {
        seen.push(flags.args);
      }
    });
    await library.execute(shell, "echo", ["x", "y"]);
    expect(seen).toEqual([["x", "y"]]);
  });

  it("lists commands with their synopsis", async () => {
    const { shell, output } = createTestShell();
    await shell.execute("help", []);
    const lines = output.text().split("\n");
    expect(lines[0]).toBe("commands:");
    expect(lines).toContain("  push    Push adds filters to the stack and shows the result.");
    expect(lines).toContain("  quit    Quit ends the session.");
    expect(lines).toContain("other topics:");
    expect(lines).toContain("  syntax  Topic syntax describes the line syntax of the shell.");
  });

  it("shows a topic", async () => {
    const { shell, output } = createTestShell();
    await shell.execute("help", ["syntax"]);
    expect(output.text().startsWith("Topic syntax describes the line syntax of the shell.\n")).toBe(true);
  });

  it("shows a command's usage", async () => {
    const { shell, output } = createTestShell();
    await shell.execute("help", ["quit"]);
    expect(output.text()).toBe("Quit ends the session.\n\nusage:\n  quit\n");
  });

  it("accepts at most one topic", async () => {
    const { shell } = createTestShell();
    const error = await shell.execute("help", ["push", "pop"]).catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ExecError);
    expect(error).toHaveProperty("cause");
    if (error instanceof ExecError) {
      expect(error.cause).toBeInstanceOf(UsageError);
      expect(error.message).toBe("help: at most one help topic is allowed");
    }
  });

  it("contains every built-in command", () => {
    expect(createLibrary().commandNames()).toEqual([
      "exec",
      "filter",
      "help",
      "load",
      "peek",
      "pipe",
      "pop",
      "popall",
      "push",
      "quit",
      "raw",
      "script",
      "write",
    ]);
  });
});
