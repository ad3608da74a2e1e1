#!/usr/bin/env node
/**
 * MCP Server for jqsh
 *
 * Exposes one shell session as MCP tools. Every tool runs the matching
 * shell command with the pager replaced by an in-memory buffer and returns
 * whatever the command printed.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import { createLibrary } from "./commands/index.js";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { BufferSink, MemoryWritable } from "./io/sink.js";
import { locateJQ } from "./jq/index.js";
import { ArrayShellReader } from "./shell/reader.js";
import { JQShell, type JQRunOptions } from "./shell/session.js";

export interface MCPTool {
  name: string;
  description: string;
  inputSchema: {
    type: "object";
    properties: Record<string, unknown>;
    required: string[];
  };
}

export type MCPToolResult = CallToolResult;

export interface MCPServerOptions {
  /** jq settings; when `bin` is unset, jq is located from the config file */
  jq?: Partial<JQRunOptions>;
  /** Config file to read when jq must be located */
  configPath?: string;
}

export interface MCPServerInstance {
  name: string;
  getTools(): MCPTool[];
  callTool(name: string, args: Record<string, unknown>): Promise<MCPToolResult>;
  start(): Promise<void>;
}

const TOOLS: MCPTool[] = [
  {
    name: "jq_load",
    description: "Use a JSON file as input. Clears the filter stack and returns the input.",
    inputSchema: {
      type: "object",
      properties: {
        file: { type: "string", description: "Path to the JSON file" },
      },
      required: ["file"],
    },
  },
  {
    name: "jq_push",
    description: "Push a jq filter onto the stack and return the output of the whole stack.",
    inputSchema: {
      type: "object",
      properties: {
        filter: { type: "string", description: "A jq filter, which may contain pipes" },
      },
      required: ["filter"],
    },
  },
  {
    name: "jq_pop",
    description: "Remove filters from the top of the stack and return the new output.",
    inputSchema: {
      type: "object",
      properties: {
        n: { type: "number", description: "How many filters to remove (default: 1)" },
      },
      required: [],
    },
  },
  {
    name: "jq_peek",
    description: "Return the output of the stack with a filter added, without keeping the filter.",
    inputSchema: {
      type: "object",
      properties: {
        filter: { type: "string", description: "A jq filter" },
      },
      required: ["filter"],
    },
  },
  {
    name: "jq_filter",
    description: "Return the filter stack, as a list or as a single jq program.",
    inputSchema: {
      type: "object",
      properties: {
        program: { type: "boolean", description: "Return a single jq program (default: false)" },
      },
      required: [],
    },
  },
  {
    name: "jq_write",
    description: "Run the stack over the input and return the output, or write it to a file.",
    inputSchema: {
      type: "object",
      properties: {
        file: { type: "string", description: "Write to this file instead of returning the output" },
      },
      required: [],
    },
  },
  {
    name: "jq_reset",
    description: "Remove every filter from the stack.",
    inputSchema: { type: "object", properties: {}, required: [] },
  },
  {
    name: "jq_help",
    description: "Return documentation for the shell commands.",
    inputSchema: {
      type: "object",
      properties: {
        topic: { type: "string", description: "A command or topic name" },
      },
      required: [],
    },
  },
];

function stringArg(args: Record<string, unknown>, name: string): string | undefined {
  const value = args[name];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`${name} must be a string`);
  }
  return value;
}

function requiredString(args: Record<string, unknown>, name: string): string {
  const value = stringArg(args, name);
  if (value === undefined) {
    throw new Error(`${name} is required`);
  }
  return value;
}

/**
 * Translate a tool call into a shell command line.
 */
export function toolCommand(name: string, args: Record<string, unknown>): [string, string[]] | null {
  switch (name) {
    case "jq_load":
      return ["load", ["--", requiredString(args, "file")]];
    case "jq_push":
      return ["push", ["--", requiredString(args, "filter")]];
    case "jq_pop": {
      const n = args.n;
      if (n === undefined) {
        return ["pop", []];
      }
      if (typeof n !== "number" || !Number.isInteger(n)) {
        throw new Error("n must be an integer");
      }
      return ["pop", [String(n)]];
    }
    case "jq_peek":
      return ["peek", ["--", requiredString(args, "filter")]];
    case "jq_filter":
      return ["filter", args.program === true ? ["--jq"] : []];
    case "jq_write": {
      const file = stringArg(args, "file");
      return ["write", file === undefined ? [] : ["--", file]];
    }
    case "jq_reset":
      return ["popall", []];
    case "jq_help": {
      const topic = stringArg(args, "topic");
      return ["help", topic === undefined ? [] : [topic]];
    }
    default:
      return null;
  }
}

/**
 * Create an MCP server instance for testing or direct use
 */
export function createMCPServer(options: MCPServerOptions = {}): MCPServerInstance {
  const captured = new MemoryWritable();
  let shell: JQShell | undefined;

  const ensureShell = async (): Promise<JQShell> => {
    if (shell) {
      return shell;
    }

    const jq = { ...options.jq };
    if (!jq.bin) {
      const config = await loadConfig(options.configPath);
      jq.args ??= config.jq.args;
      jq.testTimeoutMs ??= config.jq.testTimeoutMs;
      jq.bin = await locateJQ(config.jq.path, process.env.PATH, jq.args);
    }

    shell = new JQShell({
      reader: new ArrayShellReader([]),
      library: createLibrary(),
      jq: { ...jq, color: false },
      openPager: async () => new BufferSink(captured),
      output: captured,
      diagnostics: captured,
    });
    return shell;
  };

  const runTool = async (name: string, args: Record<string, unknown>): Promise<MCPToolResult> => {
    captured.reset();
    try {
      const command = toolCommand(name, args);
      if (!command) {
        return {
          content: [{ type: "text", text: `Unknown tool: ${name}` }],
        };
      }

      const session = await ensureShell();
      await session.execute(command[0], command[1]);
      return {
        content: [{ type: "text", text: captured.text() }],
      };
    } catch (err) {
      const output = captured.text();
      return {
        content: [{ type: "text", text: `${output}Error: ${errorMessage(err)}` }],
        isError: true,
      };
    }
  };

  let queue: Promise<unknown> = Promise.resolve();

  return {
    name: "jqsh",

    getTools(): MCPTool[] {
      return TOOLS;
    },

    callTool(name: string, args: Record<string, unknown>): Promise<MCPToolResult> {
      // Calls share one stack, one input and one capture buffer; run them one at a time
      const run = () => runTool(name, args);
      const result = queue.then(run, run);
      queue = result;
      return result;
    },

    async start(): Promise<void> {
      const server = new Server({ name: "jqsh", version: "0.1.0" }, { capabilities: { tools: {} } });

      server.setRequestHandler(ListToolsRequestSchema, async () => ({
        tools: TOOLS,
      }));

      server.setRequestHandler(CallToolRequestSchema, async (request) => {
        const { name, arguments: args } = request.params;
        return this.callTool(name, args ?? {});
      });

      const transport = new StdioServerTransport();
      await server.connect(transport);
      console.error("[jqsh] MCP server listening on stdio");
    },
  };
}

if (process.argv[1]?.endsWith("mcp-server.ts") || process.argv[1]?.endsWith("mcp-server.js") || process.argv[1]?.endsWith("jqsh-mcp")) {
  const server = createMCPServer();
  server.start().catch((err) => {
    console.error("[jqsh] Failed to start MCP server:", err);
    process.exit(1);
  });
}
