/**
 * Configuration loading for todomvc-api.
 * Uses Zod schemas for validation and deep merging.
 * @module config
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import type { LogLevel, TodoApiConfig } from "./types.js";

// ============================================
// Zod Schemas
// ============================================

export const LOG_LEVELS = [
  "error",
  "warn",
  "info",
  "http",
  "verbose",
  "debug",
] as const satisfies readonly LogLevel[];

const serverSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(0).max(65535),
  basePath: z
    .string()
    .regex(/^(\/[^/\s]+)*$/, "must be empty or start with / and not end with /"),
});

const corsSchema = z.object({
  origins: z.array(z.string().min(1)),
  credentials: z.boolean(),
  maxAge: z.number().int().min(0),
});

const loggingSchema = z.object({
  level: z.enum(LOG_LEVELS),
  silent: z.boolean(),
});

const validationSchema = z.object({
  sanitize: z.boolean(),
});

/** Full config schema, used for final validation. */
const configSchema = z.object({
  server: serverSchema,
  cors: corsSchema,
  logging: loggingSchema,
  validation: validationSchema,
});

// ============================================
// Defaults
// ============================================

/**
 * Default configuration values.
 * Port 8080 and the Angular dev server origin suit a local TodoMVC setup.
 */
const DEFAULT_CONFIG: TodoApiConfig = {
  server: {
    host: "127.0.0.1",
    port: 8080,
    basePath: "",
  },
  cors: {
    origins: ["http://localhost:4200"],
    credentials: true,
    maxAge: 3600,
  },
  logging: {
    level: "info",
    silent: false,
  },
  validation: {
    sanitize: false,
  },
};

// ============================================
// Partial Config Type
// ============================================

type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[]
    ? U[]
    : T[P] extends object
      ? DeepPartial<T[P]>
      : T[P];
};

export type PartialConfig = DeepPartial<TodoApiConfig>;

// ============================================
// Deep Merge Utility
// ============================================

/**
 * Check if a value is a plain object (not array, null, etc.).
 * @internal
 */
function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two plain objects. Source values override target values.
 * Arrays are replaced, not merged.
 * @internal
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];

    if (isPlainObject(sourceVal) && isPlainObject(targetVal)) {
      result[key] = deepMerge(targetVal, sourceVal);
    } else if (sourceVal !== undefined) {
      result[key] = sourceVal;
    }
  }

  return result;
}

// ============================================
// File Loaders
// ============================================

/**
 * Read and parse a JSON file.
 * Returns undefined if the file doesn't exist; throws on invalid JSON.
 * @internal
 */
async function readJsonFile(path: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(content);
    return parsed;
  } catch (error) {
    throw new Error(`Invalid JSON in ${path}`, { cause: error });
  }
}

/**
 * Load configuration from package.json "todomvc" key.
 * @internal
 */
async function loadPackageJsonConfig(
  projectPath: string,
): Promise<Record<string, unknown> | undefined> {
  const pkg = await readJsonFile(join(projectPath, "package.json"));

  if (isPlainObject(pkg) && isPlainObject(pkg["todomvc"])) {
    return pkg["todomvc"];
  }

  return undefined;
}

/**
 * Load configuration from .todomvcrc file.
 * @internal
 */
async function loadRcConfig(
  projectPath: string,
): Promise<Record<string, unknown> | undefined> {
  const rc = await readJsonFile(join(projectPath, ".todomvcrc"));
  return isPlainObject(rc) ? rc : undefined;
}

// ============================================
// Environment Variables
// ============================================

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Build a partial config from environment variables.
 * Unparseable values are ignored.
 * @internal
 */
function getEnvConfig(): PartialConfig {
  const partial: PartialConfig = {};

  const host = process.env["TODOMVC_HOST"];
  if (host) {
    partial.server = { ...partial.server, host };
  }

  const port = process.env["TODOMVC_PORT"];
  if (port) {
    const parsed = parseInt(port, 10);
    if (!isNaN(parsed) && parsed >= 0 && parsed < 65536) {
      partial.server = { ...partial.server, port: parsed };
    }
  }

  const basePath = process.env["TODOMVC_BASE_PATH"];
  if (basePath !== undefined) {
    partial.server = { ...partial.server, basePath };
  }

  const origins = process.env["TODOMVC_CORS_ORIGINS"];
  if (origins) {
    partial.cors = {
      origins: origins
        .split(",")
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    };
  }

  const level = process.env["TODOMVC_LOG_LEVEL"];
  if (level && isLogLevel(level)) {
    partial.logging = { level };
  }

  return partial;
}

// ============================================
// Public API
// ============================================

/**
 * Load configuration from multiple sources with priority order:
 *
 * 1. Explicit overrides (highest priority)
 * 2. Environment variables
 * 3. .todomvcrc file
 * 4. package.json "todomvc" key
 * 5. Default values (lowest priority)
 *
 * @param projectPath - Directory holding package.json / .todomvcrc (default: process.cwd())
 * @param overrides - Explicit configuration overrides
 * @returns Merged configuration
 * @throws {Error} If the merged configuration is invalid
 *
 * @example
 * ```typescript
 * const config = await loadConfig(process.cwd(), {
 *   server: { port: 3000, basePath: "/api" },
 * });
 * ```
 */
export async function loadConfig(
  projectPath: string = process.cwd(),
  overrides?: PartialConfig,
): Promise<TodoApiConfig> {
  // Collect all config sources (lowest to highest priority)
  const sources: Record<string, unknown>[] = [];

  const pkgConfig = await loadPackageJsonConfig(projectPath);
  if (pkgConfig) {
    sources.push(pkgConfig);
  }

  const rcConfig = await loadRcConfig(projectPath);
  if (rcConfig) {
    sources.push(rcConfig);
  }

  const envConfig = getEnvConfig();
  if (Object.keys(envConfig).length > 0) {
    sources.push({ ...envConfig });
  }

  if (overrides) {
    sources.push({ ...overrides });
  }

  let merged: Record<string, unknown> = { ...structuredClone(DEFAULT_CONFIG) };
  for (const source of sources) {
    merged = deepMerge(merged, source);
  }

  const parseResult = configSchema.safeParse(merged);

  if (!parseResult.success) {
    throw new Error(
      `Invalid configuration: ${parseResult.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`,
    );
  }

  return parseResult.data;
}

/**
 * Get default configuration without loading from files.
 * Useful for testing or when you want explicit control.
 */
export function getDefaultConfig(): TodoApiConfig {
  return structuredClone(DEFAULT_CONFIG);
}
