/**
 * Structured logging on top of winston.
 *
 * One root logger owns the winston instance and its transports; modules ask
 * for a named child with `getLogger("http")` and log through it, so the
 * level and silence can be changed at runtime for every module at once.
 * @module logging/logger
 */

import winston from "winston";
import type { LogLevel, LoggingConfig } from "../types.js";

/** npm-style level priorities */
const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  verbose: 4,
  debug: 5,
};

/** Extra structured data attached to a log line */
export type LogData = Record<string, unknown>;

const consoleFormat = winston.format.printf(
  ({ level, message, timestamp, module, data, stack }) => {
    const dataString = data ? ` ${JSON.stringify(data)}` : "";
    const moduleString = typeof module === "string" ? ` [${module}]` : "";
    const line = `[${String(timestamp)}] [${level}]${moduleString} ${String(message)}${dataString}`;
    return typeof stack === "string" ? `${line}\n${stack}` : line;
  },
);

/**
 * Root logger. Holds the winston instance and caches module loggers.
 */
export class Logger {
  private readonly winstonLogger: winston.Logger;
  private readonly moduleLoggers = new Map<string, ModuleLogger>();
  private currentLevel: LogLevel;

  constructor(config: Partial<LoggingConfig> = {}) {
    this.currentLevel = config.level ?? "info";

    this.winstonLogger = winston.createLogger({
      levels: LEVELS,
      level: this.currentLevel,
      silent: config.silent ?? false,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
      ),
      transports: [
        new winston.transports.Console({
          // stdout stays free for CLI output
          stderrLevels: Object.keys(LEVELS),
          format: consoleFormat,
        }),
      ],
      exitOnError: false,
    });
  }

  /**
   * Get a cached logger bound to a module name.
   */
  getLogger(module: string): ModuleLogger {
    let instance = this.moduleLoggers.get(module);
    if (!instance) {
      instance = new ModuleLogger(this, module);
      this.moduleLoggers.set(module, instance);
    }
    return instance;
  }

  /**
   * Write a log line. Winston drops it if the level is filtered out.
   */
  log(level: LogLevel, module: string, message: string, data?: LogData): void {
    this.winstonLogger.log(level, message, {
      module,
      ...(data ? { data } : {}),
    });
  }

  /**
   * Apply level and silence from configuration.
   */
  configure(config: Partial<LoggingConfig>): void {
    if (config.level !== undefined) {
      this.setLevel(config.level);
    }
    if (config.silent !== undefined) {
      this.winstonLogger.silent = config.silent;
    }
  }

  setLevel(level: LogLevel): void {
    this.currentLevel = level;
    this.winstonLogger.level = level;
  }

  get level(): LogLevel {
    return this.currentLevel;
  }

  get silent(): boolean {
    return this.winstonLogger.silent;
  }
}

/**
 * Logger for a single module.
 */
export class ModuleLogger {
  constructor(
    private readonly root: Logger,
    readonly module: string,
  ) {}

  error(message: string, data?: LogData): void {
    this.root.log("error", this.module, message, data);
  }

  warn(message: string, data?: LogData): void {
    this.root.log("warn", this.module, message, data);
  }

  info(message: string, data?: LogData): void {
    this.root.log("info", this.module, message, data);
  }

  http(message: string, data?: LogData): void {
    this.root.log("http", this.module, message, data);
  }

  verbose(message: string, data?: LogData): void {
    this.root.log("verbose", this.module, message, data);
  }

  debug(message: string, data?: LogData): void {
    this.root.log("debug", this.module, message, data);
  }
}

/** Process-wide root logger */
export const rootLogger = new Logger();

/**
 * Shorthand for `rootLogger.getLogger(module)`.
 */
export function getLogger(module: string): ModuleLogger {
  return rootLogger.getLogger(module);
}
