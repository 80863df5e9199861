/**
 * CLI config command - show the effective configuration.
 * @module cli/commands/config
 */

import type { CAC } from "cac";
import { formatConfig, loadCliConfig, output } from "../utils/index.js";

interface ConfigOptions {
  project?: string;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Register the config command.
 */
export function registerConfigCommand(cli: CAC): void {
  cli
    .command("config", "Show current configuration")
    .option(
      "--project <path>",
      "Project directory (default: current directory)",
    )
    .option("--json", "Output as JSON")
    .option("--quiet", "Suppress output")
    .action(async (options: ConfigOptions) => {
      const config = await loadCliConfig(options.project);

      output(config, formatConfig, options);
    });
}
