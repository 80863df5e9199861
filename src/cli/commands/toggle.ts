/**
 * CLI toggle commands - flip one todo, or set all of them.
 * @module cli/commands/toggle
 */

import type { CAC } from "cac";
import {
  createClient,
  formatTodo,
  formatTodos,
  output,
  parseIdArgument,
  type ClientCommandOptions,
} from "../utils/index.js";

interface ToggleAllOptions extends ClientCommandOptions {
  active?: boolean;
}

/**
 * Register the toggle and toggle-all commands.
 */
export function registerToggleCommands(cli: CAC): void {
  cli
    .command("toggle <id>", "Flip a todo between active and completed")
    .option("--url <url>", "API root (default: from configuration)")
    .option(
      "--project <path>",
      "Project directory (default: current directory)",
    )
    .option("--json", "Output as JSON")
    .option("--quiet", "Suppress output")
    .action(async (rawId: string | number, options: ClientCommandOptions) => {
      const id = parseIdArgument(rawId);
      const client = await createClient(options);
      const todo = await client.toggle(id);

      output(todo, formatTodo, options);
    });

  cli
    .command("toggle-all", "Mark every todo completed")
    .option("--active", "Mark every todo active instead")
    .option("--url <url>", "API root (default: from configuration)")
    .option(
      "--project <path>",
      "Project directory (default: current directory)",
    )
    .option("--json", "Output as JSON")
    .option("--quiet", "Suppress output")
    .action(async (options: ToggleAllOptions) => {
      const client = await createClient(options);
      const todos = await client.toggleAll(!options.active);

      output(todos, formatTodos, options);
    });
}
