import { Readable } from "node:stream";
import { MemoryWritable } from "../io/sink.js";
import { execute, resultError } from "./execute.js";

export interface TestFilterOptions {
  bin?: string;
  binArgs?: readonly string[];
  filter: string;
  /** Give up after this long (default: 10s) */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Check that jq accepts a filter by running it over empty input. A filter
 * that does not compile fails with jq's diagnostic text.
 */
export async function testFilter(options: TestFilterOptions): Promise<void> {
  const timeout = new AbortController();
  const timer = setTimeout(() => timeout.abort(), options.timeoutMs ?? 10_000);
  const onAbort = (): void => timeout.abort();
  options.signal?.addEventListener("abort", onAbort, { once: true });

  const diagnostics = new MemoryWritable();
  try {
    const result = await execute({
      bin: options.bin,
      binArgs: options.binArgs,
      filter: options.filter,
      input: Readable.from([]),
      stdout: new MemoryWritable(),
      stderr: diagnostics,
      signal: timeout.signal,
    });

    if (result.status.kind === "cancelled" && !options.signal?.aborted) {
      throw new Error("jq timed out processing the filter");
    }
    const error = resultError(result, "jq", diagnostics.text().trim());
    if (error) {
      throw error;
    }
  } finally {
    clearTimeout(timer);
    options.signal?.removeEventListener("abort", onAbort);
  }
}
