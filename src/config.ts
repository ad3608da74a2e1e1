import { readFile } from "fs/promises";
import { homedir } from "os";
import { join } from "path";

/**
 * Configuration file types
 *
 * These mirror the JSON structure of ~/.jqsh/config.json, where every field
 * is optional. loadConfig() fills in the defaults.
 */

export interface JQConfig {
  /** jq executable; looked up on PATH when unset */
  path?: string;
  /** Arguments placed before jq's own arguments */
  args: string[];
  /** Colorize output sent to the pager */
  color: boolean;
  /** How long a filter check may run before it is abandoned */
  testTimeoutMs: number;
}

export interface PagerConfig {
  command: string[];
}

export interface ShellConfig {
  /** Shell for :pipe scripts; $SHELL (or bash) when unset */
  path?: string;
}

export interface Config {
  jq: JQConfig;
  pager: PagerConfig;
  shell: ShellConfig;
  prompt: string;
}

type UserConfig = {
  [K in keyof Config]?: Config[K] extends object ? Partial<Config[K]> : Config[K];
};

export const CONFIG_DIR = join(homedir(), ".jqsh");
export const CONFIG_FILE = join(CONFIG_DIR, "config.json");

export const DEFAULT_CONFIG: Config = {
  jq: {
    args: [],
    color: true,
    testTimeoutMs: 10_000,
  },
  pager: {
    command: ["less", "-X", "-r"],
  },
  shell: {},
  prompt: "> ",
};

export async function loadConfig(configPath?: string): Promise<Config> {
  const path = configPath || CONFIG_FILE;

  try {
    const content = await readFile(path, "utf-8");
    const userConfig = JSON.parse(content) as UserConfig;

    // Deep merge with defaults
    return {
      jq: { ...DEFAULT_CONFIG.jq, ...userConfig.jq },
      pager: { ...DEFAULT_CONFIG.pager, ...userConfig.pager },
      shell: { ...DEFAULT_CONFIG.shell, ...userConfig.shell },
      prompt: userConfig.prompt ?? DEFAULT_CONFIG.prompt,
    };
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") {
      // Config file not found, use defaults
      return structuredClone(DEFAULT_CONFIG);
    }
    throw error;
  }
}
