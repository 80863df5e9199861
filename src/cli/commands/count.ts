/**
 * CLI count command - print active, completed and total counts.
 * @module cli/commands/count
 */

import type { CAC } from "cac";
import {
  createClient,
  formatStats,
  output,
  type ClientCommandOptions,
} from "../utils/index.js";

/**
 * Register the count command.
 */
export function registerCountCommand(cli: CAC): void {
  cli
    .command("count", "Show how many todos are left")
    .option("--url <url>", "API root (default: from configuration)")
    .option(
      "--project <path>",
      "Project directory (default: current directory)",
    )
    .option("--json", "Output as JSON")
    .option("--quiet", "Suppress output")
    .action(async (options: ClientCommandOptions) => {
      const client = await createClient(options);
      const stats = await client.stats();

      output(stats, formatStats, options);
    });
}
