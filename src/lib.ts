/**
 * jqsh Library Entry Point
 *
 * This module exports the public API for programmatic use.
 */

// Filter stack
export { FilterStack, FilterString, joinFilter, FILTER_JOIN, type Filter } from "./filter/index.js";

// Shell
export {
  JQShell,
  ShellLogger,
  ArrayShellReader,
  InitShellReader,
  LineShellReader,
  parseLine,
  tokenize,
  SYNTAX_DOCS,
  type Command,
  type InputSource,
  type JQRunOptions,
  type JQShellOptions,
  type ReadResult,
  type ShellReader,
} from "./shell/index.js";

// Commands
export {
  CommandFlags,
  Library,
  createLibrary,
  registerBuiltins,
  writeOutput,
  type CommandHandler,
  type Flag,
} from "./commands/index.js";

// jq process
export {
  execute,
  testFilter,
  locateJQ,
  checkJQVersion,
  parseJQVersion,
  type ExecuteOptions,
  type ExecutionResult,
  type ExecutionStatus,
  type JQVersion,
} from "./jq/index.js";

// Sinks
export { BufferSink, FileSink, PagerSink, type OutputSink, type PagedSink } from "./io/index.js";

// MCP Server
export { createMCPServer, type MCPServerOptions, type MCPServerInstance, type MCPTool } from "./mcp-server.js";

// Errors
export * from "./errors.js";

// Config
export { loadConfig, DEFAULT_CONFIG, type Config } from "./config.js";
