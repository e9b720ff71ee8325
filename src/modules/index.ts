/**
 * Module exports
 * Running a command and reading its output
 */

export { ShellExecutor, toExecResult } from "./executor";
export type { Executor, ExecResult } from "./executor";
export { ERROR_RULES, classifyOutput, matchErrorRule } from "./classifier";
export type { ErrorRule } from "./classifier";
export { parseIdentifyExplicit } from "./identify-parser";
export {
  FIELD_SEPARATOR,
  KEY_VALUE_SEPARATOR,
  formatChar,
  identifyFormatString,
  isFormatField,
} from "./format-chars";
export type { FormatField } from "./format-chars";
