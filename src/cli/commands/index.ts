/**
 * CLI command exports.
 * @module cli/commands
 */

export { registerServeCommand } from "./serve.js";
export { registerConfigCommand } from "./config.js";
export { registerListCommand } from "./list.js";
export { registerAddCommand } from "./add.js";
export { registerUpdateCommand } from "./update.js";
export { registerToggleCommands } from "./toggle.js";
export { registerRemoveCommands } from "./remove.js";
export { registerCountCommand } from "./count.js";
