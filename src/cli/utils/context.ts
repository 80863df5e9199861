/**
 * Shared setup for commands: configuration and client construction.
 * @module cli/utils/context
 */

import { TodoClient } from "../../client.js";
import { loadConfig, type PartialConfig } from "../../config.js";
import type { TodoApiConfig, TodoId } from "../../types.js";
import { CLIError, ExitCode } from "./errors.js";

/** Options every client command accepts */
export interface ClientCommandOptions {
  /** API root, e.g. http://localhost:8080/api */
  url?: string;
  project?: string;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Load configuration, reporting failures with the config exit code.
 */
export async function loadCliConfig(
  projectPath: string = process.cwd(),
  overrides?: PartialConfig,
): Promise<TodoApiConfig> {
  try {
    return await loadConfig(projectPath, overrides);
  } catch (error) {
    throw new CLIError(
      error instanceof Error ? error.message : String(error),
      ExitCode.CONFIG_ERROR,
      "Check .todomvcrc, the \"todomvc\" key in package.json and TODOMVC_* variables",
    );
  }
}

/**
 * Client for the server named by --url, or by the loaded configuration.
 * A wildcard listen address is reached through loopback.
 */
export async function createClient(
  options: ClientCommandOptions,
): Promise<TodoClient> {
  if (options.url) {
    return new TodoClient({ baseUrl: options.url });
  }

  const config = await loadCliConfig(options.project);
  const host =
    config.server.host === "0.0.0.0" || config.server.host === "::"
      ? "127.0.0.1"
      : config.server.host;

  return new TodoClient({
    host,
    port: config.server.port,
    basePath: config.server.basePath,
  });
}

/**
 * Parse an <id> argument. cac hands positionals over as strings.
 */
export function parseIdArgument(raw: string | number): TodoId {
  const text = String(raw);
  const id = /^\d+$/.test(text) ? Number(text) : NaN;
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new CLIError(`Invalid todo id: ${text}`, ExitCode.VALIDATION_ERROR);
  }
  return id;
}
