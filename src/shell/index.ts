/**
 * Shell Module
 *
 * Line syntax, command readers and the interactive session.
 */

export { parseLine, tokenize, SYNTAX_DOCS, type Command } from "./syntax.js";
export {
  ArrayShellReader,
  InitShellReader,
  LineShellReader,
  type LineShellReaderOptions,
  type ReadResult,
  type ShellReader,
} from "./reader.js";
export { ShellLogger } from "./logger.js";
export {
  JQShell,
  type InputSource,
  type JQRunOptions,
  type JQShellOptions,
  type RunFilterOptions,
} from "./session.js";
