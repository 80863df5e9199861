/**
 * CLI list command - print todos.
 * @module cli/commands/list
 */

import type { CAC } from "cac";
import {
  CLIError,
  ExitCode,
  createClient,
  formatTodos,
  output,
  type ClientCommandOptions,
} from "../utils/index.js";

interface ListOptions extends ClientCommandOptions {
  active?: boolean;
  completed?: boolean;
}

/**
 * Register the list command.
 */
export function registerListCommand(cli: CAC): void {
  cli
    .command("list", "List todos")
    .alias("ls")
    .option("--active", "Only todos not yet completed")
    .option("--completed", "Only completed todos")
    .option("--url <url>", "API root (default: from configuration)")
    .option(
      "--project <path>",
      "Project directory (default: current directory)",
    )
    .option("--json", "Output as JSON")
    .option("--quiet", "Suppress output")
    .action(async (options: ListOptions) => {
      if (options.active && options.completed) {
        throw new CLIError(
          "--active and --completed cannot be combined",
          ExitCode.GENERAL_ERROR,
        );
      }

      const client = await createClient(options);
      let todos = await client.list();
      if (options.active) {
        todos = todos.filter((todo) => !todo.completed);
      } else if (options.completed) {
        todos = todos.filter((todo) => todo.completed);
      }

      output(todos, formatTodos, options);
    });
}
