import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { createLibrary } from "../src/commands/index.js";
import { BufferSink, MemoryWritable } from "../src/io/sink.js";
import { ArrayShellReader } from "../src/shell/reader.js";
import { JQShell } from "../src/shell/session.js";

export const FAKE_JQ = fileURLToPath(new URL("./fixtures/fake-jq.mjs", import.meta.url));

/** jq options that run the fake jq script under the current node binary */
export const FAKE_JQ_OPTIONS = {
  bin: process.execPath,
  args: [FAKE_JQ],
  color: false,
  testTimeoutMs: 10_000,
};

export interface TestShell {
  shell: JQShell;
  /** Everything shown in the pager */
  paged: MemoryWritable;
  /** Informational output */
  output: MemoryWritable;
  /** Logs and jq diagnostics */
  diagnostics: MemoryWritable;
  pagersOpened: () => number;
}

export function createTestShell(lines: string[] = [], shellPath = "/bin/sh"): TestShell {
  const paged = new MemoryWritable();
  const output = new MemoryWritable();
  const diagnostics = new MemoryWritable();
  let opened = 0;
  const shell = new JQShell({
    reader: new ArrayShellReader(lines),
    library: createLibrary(),
    jq: FAKE_JQ_OPTIONS,
    openPager: async () => {
      opened++;
      return new BufferSink(paged);
    },
    output,
    diagnostics,
    shellPath,
  });
  return { shell, paged, output, diagnostics, pagersOpened: () => opened };
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), "jqsh-test-"));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export async function writeJSON(dir: string, name: string, value: unknown): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, JSON.stringify(value));
  return path;
}
