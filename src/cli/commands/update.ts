/**
 * CLI update command - change a todo's title or completed flag.
 * @module cli/commands/update
 */

import type { CAC } from "cac";
import type { UpdateTodoRequest } from "../../types.js";
import {
  CLIError,
  ExitCode,
  createClient,
  formatTodo,
  output,
  parseIdArgument,
  type ClientCommandOptions,
} from "../utils/index.js";

interface UpdateOptions extends ClientCommandOptions {
  title?: string | number;
  completed?: boolean;
  active?: boolean;
}

/**
 * Build the request body from flags.
 * @internal
 */
export function buildUpdateRequest(options: UpdateOptions): UpdateTodoRequest {
  if (options.completed && options.active) {
    throw new CLIError(
      "--completed and --active cannot be combined",
      ExitCode.GENERAL_ERROR,
    );
  }

  const changes: UpdateTodoRequest = {};
  if (options.title !== undefined) changes.title = String(options.title);
  if (options.completed) changes.completed = true;
  if (options.active) changes.completed = false;

  if (Object.keys(changes).length === 0) {
    throw new CLIError(
      "Nothing to update",
      ExitCode.GENERAL_ERROR,
      "Pass --title, --completed or --active",
    );
  }
  return changes;
}

/**
 * Register the update command.
 */
export function registerUpdateCommand(cli: CAC): void {
  cli
    .command("update <id>", "Update a todo")
    .option("--title <title>", "New title")
    .option("--completed", "Mark completed")
    .option("--active", "Mark not completed")
    .option("--url <url>", "API root (default: from configuration)")
    .option(
      "--project <path>",
      "Project directory (default: current directory)",
    )
    .option("--json", "Output as JSON")
    .option("--quiet", "Suppress output")
    .action(async (rawId: string | number, options: UpdateOptions) => {
      const id = parseIdArgument(rawId);
      const changes = buildUpdateRequest(options);

      const client = await createClient(options);
      const todo = await client.update(id, changes);

      output(todo, (t) => `Updated ${formatTodo(t)}`, options);
    });
}
