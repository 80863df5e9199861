/**
 * CLI output utilities.
 * @module cli/utils/output
 */

import type { TodoApiConfig, TodoResponse, TodoStats } from "../../types.js";

// ============================================
// Output Options
// ============================================

/**
 * Output formatting options.
 */
export interface OutputOptions {
  /** Output as JSON */
  json?: boolean;
  /** Suppress output */
  quiet?: boolean;
}

// ============================================
// Output Function
// ============================================

/**
 * Print data as JSON or through a human-readable formatter.
 */
export function output<T>(
  data: T,
  formatter: (data: T) => string,
  options: OutputOptions = {},
): void {
  if (options.quiet) return;

  if (options.json) {
    console.log(JSON.stringify(data, null, 2));
  } else {
    console.log(formatter(data));
  }
}

/**
 * Output to stderr, so piped stdout stays clean.
 */
export function info(message: string, options: OutputOptions = {}): void {
  if (options.quiet) return;
  if (options.json) return;
  console.error(message);
}

export function warn(message: string, options: OutputOptions = {}): void {
  if (options.quiet) return;
  if (options.json) return;
  console.error(`Warning: ${message}`);
}

// ============================================
// Formatters
// ============================================

/**
 * One line per todo: `[x] 3  Buy milk`.
 */
export function formatTodo(todo: TodoResponse): string {
  return `[${todo.completed ? "x" : " "}] ${todo.id}  ${todo.title}`;
}

export function formatTodos(todos: TodoResponse[]): string {
  if (todos.length === 0) {
    return "No todos.";
  }
  return todos.map(formatTodo).join("\n");
}

export function formatStats(stats: TodoStats): string {
  const noun = stats.active === 1 ? "item" : "items";
  return [
    `${stats.active} ${noun} left`,
    `Completed: ${stats.completed}`,
    `Total: ${stats.total}`,
  ].join("\n");
}

/**
 * Format configuration for human-readable output.
 */
export function formatConfig(config: TodoApiConfig): string {
  const lines: string[] = [];

  lines.push("Server:");
  lines.push(`  Host: ${config.server.host}`);
  lines.push(`  Port: ${config.server.port}`);
  lines.push(`  Base path: ${config.server.basePath || "(none)"}`);

  lines.push("\nCORS:");
  lines.push(
    `  Origins: ${config.cors.origins.length > 0 ? config.cors.origins.join(", ") : "(none)"}`,
  );
  lines.push(`  Credentials: ${config.cors.credentials ? "yes" : "no"}`);
  lines.push(`  Max age: ${config.cors.maxAge}s`);

  lines.push("\nLogging:");
  lines.push(`  Level: ${config.logging.level}${config.logging.silent ? " (silent)" : ""}`);

  lines.push(`\nSanitize titles: ${config.validation.sanitize ? "yes" : "no"}`);

  return lines.join("\n");
}
