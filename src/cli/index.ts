#!/usr/bin/env node
/**
 * CLI entry point for todomvc-api.
 * @module cli
 */

import { cac, type CAC } from "cac";
import { handleError } from "./utils/index.js";
import {
  registerServeCommand,
  registerConfigCommand,
  registerListCommand,
  registerAddCommand,
  registerUpdateCommand,
  registerToggleCommands,
  registerRemoveCommands,
  registerCountCommand,
} from "./commands/index.js";

// Keep in step with package.json
const VERSION = "0.1.0";

/**
 * Create and configure the CLI.
 */
function createCLI(): CAC {
  const cli = cac("todomvc-api");

  // Server
  registerServeCommand(cli);
  registerConfigCommand(cli);

  // Client
  registerListCommand(cli);
  registerAddCommand(cli);
  registerUpdateCommand(cli);
  registerToggleCommands(cli);
  registerRemoveCommands(cli);
  registerCountCommand(cli);

  cli.help();
  cli.version(VERSION);

  return cli;
}

/**
 * Run the CLI.
 */
async function main(): Promise<void> {
  const cli = createCLI();
  const json = process.argv.includes("--json");

  try {
    cli.parse(process.argv, { run: false });
    await cli.runMatchedCommand();
  } catch (error) {
    handleError(error, { json });
  }
}

main().catch((error: unknown) => {
  handleError(error);
});
