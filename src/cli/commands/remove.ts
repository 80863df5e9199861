/**
 * CLI remove and clear-completed commands.
 * @module cli/commands/remove
 */

import type { CAC } from "cac";
import {
  createClient,
  output,
  parseIdArgument,
  type ClientCommandOptions,
} from "../utils/index.js";

/**
 * Register the remove and clear-completed commands.
 */
export function registerRemoveCommands(cli: CAC): void {
  cli
    .command("remove <id>", "Delete a todo")
    .alias("rm")
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
      await client.remove(id);

      output({ id, deleted: true }, (r) => `Deleted todo ${r.id}`, options);
    });

  cli
    .command("clear-completed", "Delete all completed todos")
    .option("--url <url>", "API root (default: from configuration)")
    .option(
      "--project <path>",
      "Project directory (default: current directory)",
    )
    .option("--json", "Output as JSON")
    .option("--quiet", "Suppress output")
    .action(async (options: ClientCommandOptions) => {
      const client = await createClient(options);
      const deleted = await client.clearCompleted();

      output(
        { deleted },
        (r) => `Cleared ${r.deleted} completed ${r.deleted === 1 ? "todo" : "todos"}`,
        options,
      );
    });
}
