import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync } from "node:fs";
import { readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { FilterString } from "../../src/filter/filter.js";
import { shellQuote } from "../../src/commands/stack.js";
import { ExecError, UsageError, isQuit } from "../../src/errors.js";
import { createTestShell, makeTempDir, removeTempDir, writeJSON } from "../helpers.js";

const DATA = { a: { b: [1, 2] } };
const FULL_OUTPUT = '{\n  "a": {\n    "b": [\n      1,\n      2\n    ]\n  }\n}\n';
const A_OUTPUT = '{\n  "b": [\n    1,\n    2\n  ]\n}\n';

async function failure(promise: Promise<void>): Promise<unknown> {
  return promise.then(
    () => {
      throw new Error("expected the command to fail");
    },
    (err: unknown) => err,
  );
}

describe("commands", () => {
  let dir: string;
  let dataPath: string;

  beforeEach(async () => {
    dir = await makeTempDir();
    dataPath = await writeJSON(dir, "data.json", DATA);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe("load", () => {
    it("clears the stack and shows the input", async () => {
      const { shell, paged } = createTestShell();
      shell.stack.push(new FilterString(".a"));
      await shell.execute("load", [dataPath]);
      expect(shell.stack.depth).toBe(0);
      expect(paged.text()).toBe(FULL_OUTPUT);
      expect(shell.inputSource).toEqual({ kind: "file", path: dataPath, temporary: false });
    });

    it("keeps the stack with -k", async () => {
      const { shell, paged } = createTestShell();
      shell.stack.push(new FilterString(".a"));
      await shell.execute("load", ["-k", dataPath]);
      expect(paged.text()).toBe(A_OUTPUT);
    });

    it("fails for a missing file and keeps the old input", async () => {
      const { shell } = createTestShell();
      await shell.execute("load", ["-q", dataPath]);
      const error = await failure(shell.execute("load", [join(dir, "missing.json")]));
      expect(error).toBeInstanceOf(ExecError);
      expect(shell.inputSource).toEqual({ kind: "file", path: dataPath, temporary: false });
    });

    it("needs exactly one file", async () => {
      const { shell } = createTestShell();
      const error = await failure(shell.execute("load", []));
      expect(error).toHaveProperty("message", "load: expects exactly one file");
    });
  });

  describe("push", () => {
    it("shows the output of the whole stack", async () => {
      const { shell, paged } = createTestShell();
      await shell.execute("load", ["-q", dataPath]);
      await shell.execute("push", [".a"]);
      await shell.execute("push", [".b[]"]);
      expect(paged.text()).toBe(A_OUTPUT + "1\n2\n");
    });

    it("does not write with -q", async () => {
      const { shell, pagersOpened } = createTestShell();
      await shell.execute("load", ["-q", dataPath]);
      await shell.execute("push", ["-q", ".a"]);
      expect(pagersOpened()).toBe(0);
      expect(shell.stack.fragments()).toEqual([".a"]);
    });

    it("leaves the stack alone when jq rejects the filter", async () => {
      const { shell, pagersOpened } = createTestShell();
      await shell.execute("push", ["-q", ".a"]);
      const error = await failure(shell.execute("push", ["!bad"]));
      expect(error).toHaveProperty(
        "message",
        "push: jq: error: syntax error, unexpected INVALID_CHARACTER\njq: 1 compile error (exit status 3)",
      );
      expect(shell.stack.fragments()).toEqual([".a"]);
      expect(pagersOpened()).toBe(0);
    });

    it("pushes a shorthand filter starting with a minus", async () => {
      const numberPath = await writeJSON(dir, "number.json", { n: 5 });
      const { shell, paged, diagnostics } = createTestShell([`:load -q '${numberPath}'`, "-.n", "?."]);
      await shell.run();
      expect(diagnostics.text()).toBe("");
      expect(paged.text()).toBe("-5\n-5\n");
      expect(shell.stack.fragments()).toEqual(["-.n"]);
    });

    it("reverts when the output cannot be written", async () => {
      const { shell, diagnostics } = createTestShell();
      await shell.execute("load", ["-q", dataPath]);
      const error = await failure(shell.execute("push", ["fail"]));
      expect(error).toHaveProperty("message", "push: jq: exit status 5");
      expect(shell.stack.depth).toBe(0);
      expect(diagnostics.text()).toBe("jq: error (at <stdin>:0): fail\njqsh: reverting push operation\n");
    });

    it("warns when there is no input", async () => {
      const { shell, paged, diagnostics } = createTestShell();
      await shell.execute("push", [".a"]);
      expect(paged.text()).toBe("");
      expect(diagnostics.text()).toBe("jqsh: no input has been declared\n");
    });

    it("needs a filter", async () => {
      const { shell } = createTestShell();
      const error = await failure(shell.execute("push", []));
      expect(error).toHaveProperty("cause");
      if (error instanceof ExecError) {
        expect(error.cause).toBeInstanceOf(UsageError);
      }
    });
  });

  describe("pop", () => {
    it("removes the top filter and shows the output", async () => {
      const { shell, paged } = createTestShell();
      await shell.execute("load", ["-q", dataPath]);
      await shell.execute("push", ["-q", ".a"]);
      await shell.execute("push", ["-q", ".b"]);
      await shell.execute("pop", []);
      expect(paged.text()).toBe(A_OUTPUT);
    });

    it("removes several filters", async () => {
      const { shell } = createTestShell();
      shell.stack.push(new FilterString(".a"));
      shell.stack.push(new FilterString(".b"));
      shell.stack.push(new FilterString(".c"));
      await shell.execute("pop", ["-q", "2"]);
      expect(shell.stack.fragments()).toEqual([".a"]);
    });

    it("rejects a non-numeric count", async () => {
      const { shell } = createTestShell();
      shell.stack.push(new FilterString(".a"));
      const error = await failure(shell.execute("pop", ["two"]));
      expect(error).toHaveProperty("message", 'pop: argument must be a non-negative integer: "two"');
      expect(shell.stack.depth).toBe(1);
    });

    it("fails on an empty stack", async () => {
      const { shell } = createTestShell();
      const error = await failure(shell.execute("pop", []));
      expect(error).toHaveProperty("message", "pop: the stack is empty");
    });
  });

  describe("popall", () => {
    it("clears the stack without writing", async () => {
      const { shell, pagersOpened } = createTestShell();
      shell.stack.push(new FilterString(".a"));
      await shell.execute("popall", []);
      expect(shell.stack.depth).toBe(0);
      expect(pagersOpened()).toBe(0);
    });
  });

  describe("peek", () => {
    it("shows the output without keeping the filter", async () => {
      const { shell, paged } = createTestShell();
      await shell.execute("load", ["-q", dataPath]);
      await shell.execute("push", ["-q", ".a"]);
      await shell.execute("peek", [".b[]"]);
      expect(paged.text()).toBe("1\n2\n");
      expect(shell.stack.fragments()).toEqual([".a"]);
    });

    it("restores the stack when the filter is invalid", async () => {
      const { shell } = createTestShell();
      await shell.execute("push", ["-q", ".a"]);
      const error = await failure(shell.execute("peek", ["!bad"]));
      expect(error).toHaveProperty(
        "message",
        "peek: invalid filter: jq: error: syntax error, unexpected INVALID_CHARACTER\njq: 1 compile error (exit status 3)",
      );
      expect(shell.stack.fragments()).toEqual([".a"]);
    });

    it("reports a failed write without calling the filter invalid", async () => {
      const { shell } = createTestShell();
      await shell.execute("load", ["-q", dataPath]);
      const error = await failure(shell.execute("peek", ["fail"]));
      expect(error).toHaveProperty("message", "peek: jq: exit status 5");
      expect(shell.stack.depth).toBe(0);
    });
  });

  describe("filter", () => {
    it("lists fragments with their index", async () => {
      const { shell, output } = createTestShell();
      shell.stack.push(new FilterString(".a"));
      shell.stack.push(new FilterString(".b[]"));
      await shell.execute("filter", []);
      expect(output.text()).toBe("[00] .a\n[01] .b[]\n");
    });

    it("logs when the stack is empty", async () => {
      const { shell, output, diagnostics } = createTestShell();
      await shell.execute("filter", []);
      expect(output.text()).toBe("");
      expect(diagnostics.text()).toBe("jqsh: no filter\n");
    });

    it("prints the joined program", async () => {
      const { shell, output } = createTestShell();
      shell.stack.push(new FilterString(".a"));
      shell.stack.push(new FilterString(".b"));
      await shell.execute("filter", ["--jq"]);
      expect(output.text()).toBe(".a | .b\n");
    });

    it("quotes the joined program", async () => {
      const { shell, output } = createTestShell();
      shell.stack.push(new FilterString(`.["it's"]`));
      await shell.execute("filter", ["--jq", "--quote", `''\\''`]);
      expect(output.text()).toBe(`'.["it'\\''s"]'\n`);
    });

    it("needs an escape after the quote character", async () => {
      const { shell } = createTestShell();
      const error = await failure(shell.execute("filter", ["--jq", "--quote", "'"]));
      expect(error).toHaveProperty("message", "filter: --quote needs a quote character followed by its escape");
    });
  });

  describe("script", () => {
    it("prints a runnable script", async () => {
      const { shell, output } = createTestShell();
      shell.stack.push(new FilterString(".a"));
      shell.stack.push(new FilterString(".b"));
      await shell.execute("script", []);
      expect(output.text()).toBe(`#!/usr/bin/env sh\n\njq '.a | .b' "\${@}"\n`);
    });

    it("prints a single command reading a named file", async () => {
      const { shell, output } = createTestShell();
      shell.stack.push(new FilterString(".a"));
      await shell.execute("script", ["--oneline", "-f", "in put.json"]);
      expect(output.text()).toBe("jq '.a' 'in put.json'\n");
    });

    it("reads from the loaded file with -F", async () => {
      const { shell, output } = createTestShell();
      await shell.execute("load", ["-q", dataPath]);
      await shell.execute("script", ["--oneline", "-F"]);
      expect(output.text()).toBe(`jq '.' '${dataPath}'\n`);
    });

    it("writes an executable script", async () => {
      const { shell } = createTestShell();
      const path = join(dir, "run.sh");
      await shell.execute("script", ["-o", path]);
      expect(await readFile(path, "utf-8")).toBe(`#!/usr/bin/env sh\n\njq '.' "\${@}"\n`);
      expect((await stat(path)).mode & 0o100).toBe(0o100);
    });

    it("escapes single quotes for the shell", () => {
      expect(shellQuote("it's")).toBe(`'it'\\''s'`);
    });
  });

  describe("exec", () => {
    it("caches the program's output in a temporary file", async () => {
      const { shell, paged } = createTestShell();
      await shell.execute("exec", ["cat", dataPath]);
      const source = shell.inputSource;
      expect(source.kind).toBe("file");
      if (source.kind === "file") {
        expect(source.temporary).toBe(true);
        expect(await readFile(source.path, "utf-8")).toBe(JSON.stringify(DATA));
      }
      expect(paged.text()).toBe(FULL_OUTPUT);
    });

    it("reruns the program with -c", async () => {
      const { shell, paged } = createTestShell();
      await shell.execute("exec", ["-c", "-q", "cat", dataPath]);
      expect(shell.inputSource.kind).toBe("producer");
      await shell.execute("write", []);
      await shell.execute("write", []);
      expect(paged.text()).toBe(FULL_OUTPUT + FULL_OUTPUT);
    });

    it("passes flags after the program name to the program", async () => {
      const { shell, paged } = createTestShell();
      await shell.execute("exec", ["cat", "-u", dataPath]);
      expect(paged.text()).toBe(FULL_OUTPUT);
    });

    it("fails and keeps no input when the program fails", async () => {
      const { shell } = createTestShell();
      const error = await failure(shell.execute("exec", ["-q", "false"]));
      expect(error).toHaveProperty("message", "exec: exit status 1");
      expect(shell.hasInput).toBe(false);
    });

    it("keeps the output of a failing program with --ignore", async () => {
      const { shell } = createTestShell();
      await shell.execute("exec", ["-q", "--ignore", "false"]);
      expect(shell.inputSource.kind).toBe("file");
    });

    it("deletes the previous cached output", async () => {
      const { shell } = createTestShell();
      await shell.execute("exec", ["-q", "cat", dataPath]);
      const first = shell.inputSource;
      await shell.execute("exec", ["-q", "cat", dataPath]);
      expect(first.kind).toBe("file");
      if (first.kind === "file") {
        expect(existsSync(first.path)).toBe(false);
      }
    });
  });

  describe("pipe", () => {
    it("uses a script's output as input", async () => {
      const { shell, paged } = createTestShell();
      await shell.execute("pipe", ["-k", `cat '${dataPath}'`]);
      expect(shell.inputSource.kind).toBe("file");
      expect(paged.text()).toBe(FULL_OUTPUT);
    });

    it("uses the file a script writes with -O", async () => {
      const { shell } = createTestShell();
      const target = join(dir, "made.json");
      await shell.execute("pipe", ["-q", "-O", target, `cp '${dataPath}' '${target}'`]);
      expect(shell.inputSource).toEqual({ kind: "file", path: target, temporary: false });
    });

    it("sends the output to a script", async () => {
      const { shell } = createTestShell();
      const target = join(dir, "piped.json");
      await shell.execute("load", ["-q", dataPath]);
      await shell.execute("push", ["-q", ".a"]);
      await shell.execute("pipe", ["--out", `cat > '${target}'`]);
      expect(await readFile(target, "utf-8")).toBe(A_OUTPUT);
    });

    it("rejects --in with --out", async () => {
      const { shell } = createTestShell();
      const error = await failure(shell.execute("pipe", ["--in", "--out", "true"]));
      expect(error).toHaveProperty("message", "pipe: --in and --out cannot be combined");
    });
  });

  describe("write", () => {
    it("writes the output to a file and reports its size", async () => {
      const { shell, diagnostics, pagersOpened } = createTestShell();
      const target = join(dir, "out.json");
      await shell.execute("load", ["-q", dataPath]);
      await shell.execute("push", ["-q", ".a"]);
      await shell.execute("write", [target]);
      expect(await readFile(target, "utf-8")).toBe(A_OUTPUT);
      expect(diagnostics.text()).toBe(`jqsh: ${A_OUTPUT.length} bytes written to ${JSON.stringify(target)}\n`);
      expect(pagersOpened()).toBe(0);
    });

    it("accepts at most one file", async () => {
      const { shell } = createTestShell();
      const error = await failure(shell.execute("write", ["a", "b"]));
      expect(error).toHaveProperty("message", "write: at most one file may be given");
    });
  });

  describe("raw", () => {
    it("shows the input without filtering", async () => {
      const { shell, paged } = createTestShell();
      await shell.execute("load", ["-q", dataPath]);
      await shell.execute("push", ["-q", ".a"]);
      await shell.execute("raw", []);
      expect(paged.text()).toBe(JSON.stringify(DATA));
    });

    it("copies the input to a file", async () => {
      const { shell } = createTestShell();
      const target = join(dir, "copy.json");
      await shell.execute("load", ["-q", dataPath]);
      await shell.execute("raw", [target]);
      expect(await readFile(target, "utf-8")).toBe(JSON.stringify(DATA));
    });

    it("fails without input", async () => {
      const { shell } = createTestShell();
      const error = await failure(shell.execute("raw", []));
      expect(error).toHaveProperty("message", "raw: no input has been declared");
    });
  });

  describe("quit", () => {
    it("requests the end of the session", async () => {
      const { shell } = createTestShell();
      const error = await failure(shell.execute("quit", []));
      expect(error).toBeInstanceOf(ExecError);
      expect(isQuit(error)).toBe(true);
    });
  });
});
