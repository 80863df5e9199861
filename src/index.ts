/**
 * todomvc-api - REST backend and client for TodoMVC front ends.
 *
 * @example
 * ```typescript
 * import { TodoServer, TodoClient, loadConfig } from 'todomvc-api';
 *
 * // Load configuration from .todomvcrc, package.json and env
 * const config = await loadConfig();
 *
 * const server = new TodoServer({ config });
 * await server.start();
 *
 * const client = new TodoClient({ baseUrl: server.getUrl() });
 * const todo = await client.create('Learn TypeScript');
 * await client.toggle(todo.id);
 * ```
 *
 * @packageDocumentation
 */

// Server
export { TodoServer } from "./server.js";
export type { TodoServerOptions } from "./server.js";
export { createApp, corsMiddleware } from "./http/app.js";
export type { AppOptions } from "./http/app.js";
export { createTodoRouter, parseTodoId, toTodoResponse } from "./http/routes.js";
export { mapError, errorHandler } from "./http/error-mapper.js";
export type { ErrorType, MappedError } from "./http/error-mapper.js";

// Domain
export { TodoService } from "./service.js";
export type { TodoServiceOptions } from "./service.js";
export { InMemoryTodoStore } from "./storage/todo-store.js";
export type { TodoStore } from "./storage/todo-store.js";
export {
  MAX_TITLE_LENGTH,
  validateTitle,
  parseCreateTodoRequest,
  parseUpdateTodoRequest,
  parseToggleAllRequest,
} from "./validation.js";

// Client
export { TodoClient } from "./client.js";
export { withRetry } from "./retry.js";
export type { RetryOptions } from "./retry.js";

// Configuration
export { loadConfig, getDefaultConfig } from "./config.js";
export type { PartialConfig } from "./config.js";

// Logging
export { Logger, ModuleLogger, getLogger, rootLogger } from "./logging/logger.js";

// Errors
export {
  TodoError,
  notFoundError,
  validationError,
  malformedRequestError,
} from "./errors.js";

// Types
export { TodoErrorCode } from "./types.js";
export type {
  Todo,
  TodoId,
  TodoChanges,
  TodoStats,
  TodoResponse,
  CreateTodoRequest,
  UpdateTodoRequest,
  ToggleAllRequest,
  ValidationErrorDetail,
  ErrorResponse,
  LogLevel,
  ServerConfig,
  CorsConfig,
  LoggingConfig,
  ValidationConfig,
  TodoApiConfig,
  TodoClientOptions,
} from "./types.js";
