/**
 * CLI add command - create a todo.
 * @module cli/commands/add
 */

import type { CAC } from "cac";
import {
  createClient,
  formatTodo,
  output,
  type ClientCommandOptions,
} from "../utils/index.js";

/**
 * Register the add command. Words after the command form the title.
 */
export function registerAddCommand(cli: CAC): void {
  cli
    .command("add <...title>", "Create a todo")
    .option("--url <url>", "API root (default: from configuration)")
    .option(
      "--project <path>",
      "Project directory (default: current directory)",
    )
    .option("--json", "Output as JSON")
    .option("--quiet", "Suppress output")
    .action(async (words: Array<string | number>, options: ClientCommandOptions) => {
      const client = await createClient(options);
      const todo = await client.create(words.map(String).join(" "));

      output(todo, (t) => `Created ${formatTodo(t)}`, options);
    });
}
