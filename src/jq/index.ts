/**
 * jq Module
 *
 * Process plumbing around the external jq executable.
 */

export {
  execute,
  jqArgs,
  resultError,
  WriteCounter,
  type ExecuteOptions,
  type ExecutionResult,
  type ExecutionStatus,
} from "./execute.js";
export { locateJQ, checkJQVersion, parseJQVersion, type JQVersion } from "./locate.js";
export { testFilter, type TestFilterOptions } from "./test-filter.js";
