/**
 * CLI utility exports.
 * @module cli/utils
 */

export { CLIError, ExitCode, handleError, toCLIError } from "./errors.js";
export type { ExitCode as ExitCodeType } from "./errors.js";

export {
  output,
  info,
  warn,
  formatTodo,
  formatTodos,
  formatStats,
  formatConfig,
} from "./output.js";
export type { OutputOptions } from "./output.js";

export { createClient, loadCliConfig, parseIdArgument } from "./context.js";
export type { ClientCommandOptions } from "./context.js";
