/**
 * Locating the jq executable and checking its version.
 */

import { execFile } from "node:child_process";
import { constants } from "node:fs";
import { access } from "node:fs/promises";
import { delimiter, join } from "node:path";
import { promisify } from "node:util";
import { JQNotFoundError, JQVersionError } from "../errors.js";

const execFileAsync = promisify(execFile);

export interface JQVersion {
  /** The version string as printed by jq, trimmed */
  version: string;
  major: number;
  minor: number;
  /** Anything after the minor version, e.g. ".1" or "rc1" */
  suffix: string;
}

const VERSION_PATTERN = /^jq(?:-| version )(\d+)\.(\d+)(.*)$/;

/**
 * Parse the output of `jq --version`. Accepts "jq-1.6", "jq-1.7.1" and the
 * older "jq version 1.3" form.
 */
export function parseJQVersion(output: string): JQVersion {
  const version = output.trim();
  const match = VERSION_PATTERN.exec(version);
  if (!match) {
    throw new JQVersionError(`not a jq version: ${JSON.stringify(version)}`);
  }
  return {
    version,
    major: Number.parseInt(match[1], 10),
    minor: Number.parseInt(match[2], 10),
    suffix: match[3],
  };
}

async function isExecutable(path: string): Promise<boolean> {
  try {
    await access(path, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Find jq. Without a path, search PATH for an executable named "jq". With a
 * path, run it with --version and check that it looks like jq.
 */
export async function locateJQ(
  path?: string,
  searchPath: string = process.env.PATH ?? "",
  args: readonly string[] = [],
): Promise<string> {
  if (!path) {
    for (const dir of searchPath.split(delimiter)) {
      if (!dir) continue;
      const candidate = join(dir, "jq");
      if (await isExecutable(candidate)) {
        return candidate;
      }
    }
    throw new JQNotFoundError();
  }

  const { stdout, stderr } = await execFileAsync(path, [...args, "--version"]);
  if (!`${stdout}${stderr}`.startsWith("jq")) {
    throw new JQVersionError("executable doesn't look like jq");
  }
  return path;
}

/**
 * Run `jq --version` and parse the result.
 */
export async function checkJQVersion(path: string, args: readonly string[] = []): Promise<JQVersion> {
  const { stdout, stderr } = await execFileAsync(path, [...args, "--version"]);
  return parseJQVersion(stdout || stderr);
}
