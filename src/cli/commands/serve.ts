/**
 * CLI serve command - start the todo API server.
 * @module cli/commands/serve
 */

import type { CAC } from "cac";
import { LOG_LEVELS, isLogLevel, type PartialConfig } from "../../config.js";
import { rootLogger } from "../../logging/logger.js";
import { TodoServer } from "../../server.js";
import {
  CLIError,
  ExitCode,
  handleError,
  info,
  loadCliConfig,
  output,
  warn,
} from "../utils/index.js";

interface ServeOptions {
  project?: string;
  host?: string;
  port?: number | string;
  basePath?: string;
  corsOrigin?: string;
  logLevel?: string;
  json?: boolean;
  quiet?: boolean;
}

/**
 * Turn command-line flags into config overrides. The base path is checked
 * by the config schema.
 * @internal
 */
export function serveOverrides(options: ServeOptions): PartialConfig {
  const server: NonNullable<PartialConfig["server"]> = {};
  if (options.host !== undefined) server.host = options.host;
  if (options.basePath !== undefined) server.basePath = options.basePath;
  if (options.port !== undefined) {
    const port = Number(options.port);
    if (!Number.isInteger(port)) {
      throw new CLIError(`Invalid port: ${options.port}`, ExitCode.CONFIG_ERROR);
    }
    server.port = port;
  }

  const overrides: PartialConfig = { server };
  if (options.logLevel !== undefined) {
    if (!isLogLevel(options.logLevel)) {
      throw new CLIError(
        `Invalid log level: ${options.logLevel}. Use one of: ${LOG_LEVELS.join(", ")}`,
        ExitCode.CONFIG_ERROR,
      );
    }
    overrides.logging = { level: options.logLevel };
  }
  if (options.corsOrigin !== undefined) {
    overrides.cors = {
      origins: options.corsOrigin
        .split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    };
  }
  return overrides;
}

/**
 * Register the serve command.
 */
export function registerServeCommand(cli: CAC): void {
  cli
    .command("serve", "Start the todo API server")
    .option(
      "--project <path>",
      "Project directory (default: current directory)",
    )
    .option("--host <host>", "Listen address (default: 127.0.0.1)")
    .option("--port <port>", "Listen port (default: 8080)")
    .option("--base-path <path>", "Route prefix, e.g. /api (default: none)")
    .option(
      "--cors-origin <origins>",
      "Comma-separated origins allowed by CORS",
    )
    .option("--log-level <level>", "error, warn, info, http, verbose or debug")
    .option("--json", "Output as JSON")
    .option("--quiet", "Suppress output")
    .action(async (options: ServeOptions) => {
      const config = await loadCliConfig(
        options.project,
        serveOverrides(options),
      );

      rootLogger.configure(config.logging);

      if (config.cors.origins.includes("*") && config.cors.credentials) {
        warn("CORS allows any origin with credentials", options);
      }

      const server = new TodoServer({ config });
      await server.start();

      output(
        { url: server.getUrl(), port: server.getPort() },
        (data) => `Todo API listening at ${data.url}`,
        options,
      );

      const shutdown = (): void => {
        info("\nShutting down...", options);
        server.stop().then(
          () => process.exit(ExitCode.SUCCESS),
          (error: unknown) => handleError(error, options),
        );
      };

      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });
}
