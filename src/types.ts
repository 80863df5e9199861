/**
 * Type definitions for the todomvc-api service and client.
 * @module types
 */

// ============================================
// Error Codes
// ============================================

/**
 * Error codes for TodoError.
 */
export const TodoErrorCode = {
  /** Title is empty or whitespace-only after trimming */
  BLANK_TITLE: "BLANK_TITLE",
  /** Title is longer than MAX_TITLE_LENGTH after trimming */
  TITLE_TOO_LONG: "TITLE_TOO_LONG",
  /** Title carries script markers */
  UNSAFE_CONTENT: "UNSAFE_CONTENT",
  /** Request body field has the wrong shape */
  VALIDATION_FAILED: "VALIDATION_FAILED",
  /** Referenced todo does not exist */
  NOT_FOUND: "NOT_FOUND",
  /** Body or path could not be parsed */
  MALFORMED_REQUEST: "MALFORMED_REQUEST",
  /** Anything else */
  UNEXPECTED: "UNEXPECTED",
  /** Client could not reach the server */
  SERVER_UNAVAILABLE: "SERVER_UNAVAILABLE",
  /** Client request timed out */
  CONNECTION_TIMEOUT: "CONNECTION_TIMEOUT",
} as const;

export type TodoErrorCode = (typeof TodoErrorCode)[keyof typeof TodoErrorCode];

// ============================================
// Todo Entity
// ============================================

/** Numeric todo identifier, assigned by the store */
export type TodoId = number;

/**
 * A todo as held by the store.
 */
export interface Todo {
  id: TodoId;
  title: string;
  completed: boolean;
  /** ISO-8601 creation time */
  createdAt: string;
  /** ISO-8601 time of the last mutation */
  updatedAt: string;
}

/**
 * Fields an update may change. An omitted field is left as it is.
 */
export interface TodoChanges {
  title?: string;
  completed?: boolean;
}

/** Derived counts over the current collection */
export interface TodoStats {
  total: number;
  active: number;
  completed: number;
}

// ============================================
// Wire Types
// ============================================

/** Todo JSON shape sent to clients */
export interface TodoResponse {
  id: TodoId;
  title: string;
  completed: boolean;
}

/** Body of POST /todos */
export interface CreateTodoRequest {
  title: string;
}

/** Body of PUT /todos/{id} */
export interface UpdateTodoRequest {
  title?: string;
  completed?: boolean;
}

/** Body of PUT /todos/toggle-all */
export interface ToggleAllRequest {
  completed: boolean;
}

/**
 * Field-level validation failure.
 */
export interface ValidationErrorDetail {
  field: string;
  rejectedValue: unknown;
  message: string;
  /** Constraint name, e.g. "NotBlank" or "Size" */
  code: string;
}

/**
 * JSON body of every error response.
 */
export interface ErrorResponse {
  message: string;
  details: string;
  status: number;
  timestamp: string;
  correlationId: string;
  path: string;
  validationErrors: ValidationErrorDetail[] | null;
}

// ============================================
// Configuration
// ============================================

/** Log levels, most to least severe */
export type LogLevel = "error" | "warn" | "info" | "http" | "verbose" | "debug";

export interface ServerConfig {
  host: string;
  port: number;
  /** Prefix for every route, e.g. "/api". Empty serves /todos directly. */
  basePath: string;
}

export interface CorsConfig {
  /** Origins allowed to call the API */
  origins: string[];
  credentials: boolean;
  /** Preflight cache lifetime in seconds */
  maxAge: number;
}

export interface LoggingConfig {
  level: LogLevel;
  silent: boolean;
}

export interface ValidationConfig {
  /** Strip markup from titles and reject script markers */
  sanitize: boolean;
}

/**
 * Full todomvc-api configuration.
 */
export interface TodoApiConfig {
  server: ServerConfig;
  cors: CorsConfig;
  logging: LoggingConfig;
  validation: ValidationConfig;
}

// ============================================
// Client
// ============================================

/**
 * Options for TodoClient.
 */
export interface TodoClientOptions {
  /** Full API root, e.g. "http://localhost:8080/api". Wins over host/port/basePath. */
  baseUrl?: string;
  /** Server host (default: localhost) */
  host?: string;
  /** Server port (default: 8080) */
  port?: number;
  /** Route prefix (default: "") */
  basePath?: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeout?: number;
  /** Attempts for read requests (default: 3) */
  maxAttempts?: number;
}
