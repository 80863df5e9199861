/**
 * Error handling for todomvc-api.
 * @module errors
 */

import type {
  ErrorResponse,
  TodoErrorCode,
  TodoId,
  ValidationErrorDetail,
} from "./types.js";

/** Constraint code to error code, for decoding server validation errors */
const VALIDATION_CODE_MAP: Record<string, TodoErrorCode> = {
  NotBlank: "BLANK_TITLE",
  Size: "TITLE_TOO_LONG",
  SafeContent: "UNSAFE_CONTENT",
};

/**
 * Base error class for all todo-related errors.
 *
 * Thrown by the service on the server side and by TodoClient on the
 * client side. The HTTP layer maps `code` to a status and error body.
 *
 * @example
 * ```typescript
 * try {
 *   service.toggleTodo(42);
 * } catch (error) {
 *   if (TodoError.isTodoError(error) && error.isNotFound) {
 *     console.error(error.message);
 *   }
 * }
 * ```
 */
export class TodoError extends Error {
  /** Error code for programmatic handling */
  readonly code: TodoErrorCode;

  /** Whether the operation can be retried */
  readonly isRetryable: boolean;

  /** HTTP status code, when known */
  readonly statusCode?: number;

  /** Field-level details for validation failures */
  readonly validationErrors?: ValidationErrorDetail[];

  constructor(
    message: string,
    code: TodoErrorCode,
    options: {
      cause?: Error;
      isRetryable?: boolean;
      statusCode?: number;
      validationErrors?: ValidationErrorDetail[];
    } = {},
  ) {
    super(message, { cause: options.cause });

    // Fix prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = "TodoError";
    this.code = code;
    this.isRetryable = options.isRetryable ?? false;
    if (options.statusCode !== undefined) {
      this.statusCode = options.statusCode;
    }
    if (options.validationErrors !== undefined) {
      this.validationErrors = options.validationErrors;
    }
  }

  /**
   * Type guard to check if an error is a TodoError.
   */
  static isTodoError(error: unknown): error is TodoError {
    return error instanceof TodoError;
  }

  /** Check if the referenced todo was not found */
  get isNotFound(): boolean {
    return this.code === "NOT_FOUND";
  }

  /** Check if this is a validation error */
  get isValidationError(): boolean {
    return (
      this.code === "BLANK_TITLE" ||
      this.code === "TITLE_TOO_LONG" ||
      this.code === "UNSAFE_CONTENT" ||
      this.code === "VALIDATION_FAILED"
    );
  }

  /** Check if the server could not be reached */
  get isUnavailable(): boolean {
    return (
      this.code === "SERVER_UNAVAILABLE" || this.code === "CONNECTION_TIMEOUT"
    );
  }
}

// ============================================
// Factories
// ============================================

/**
 * Not-found error for a todo id.
 */
export function notFoundError(id: TodoId): TodoError {
  return new TodoError(`Todo not found with id: ${id}`, "NOT_FOUND", {
    statusCode: 404,
  });
}

/**
 * Validation error carrying a single field detail.
 */
export function validationError(
  code: TodoErrorCode,
  detail: ValidationErrorDetail,
): TodoError {
  return new TodoError(detail.message, code, {
    statusCode: 400,
    validationErrors: [detail],
  });
}

/**
 * Error for a body or path that could not be parsed.
 */
export function malformedRequestError(
  message: string,
  cause?: Error,
): TodoError {
  return new TodoError(message, "MALFORMED_REQUEST", {
    statusCode: 400,
    ...(cause ? { cause } : {}),
  });
}

// ============================================
// Client-side decoding
// ============================================

/**
 * Check if an unknown body looks like an ErrorResponse.
 * @internal
 */
export function isErrorResponse(body: unknown): body is ErrorResponse {
  return (
    typeof body === "object" &&
    body !== null &&
    "message" in body &&
    typeof body.message === "string" &&
    "status" in body &&
    typeof body.status === "number"
  );
}

/**
 * Create a TodoError from a non-2xx HTTP response.
 * @internal
 */
export function createErrorFromResponse(
  response: Response,
  body: unknown,
): TodoError {
  const status = response.status;
  const parsed = isErrorResponse(body) ? body : undefined;
  const message =
    parsed?.message || response.statusText || `HTTP error (${status})`;

  if (status === 400) {
    const details = parsed?.validationErrors ?? null;
    if (details && details.length > 0) {
      const first = details[0];
      const code =
        (first && VALIDATION_CODE_MAP[first.code]) ?? "VALIDATION_FAILED";
      return new TodoError(first?.message ?? message, code, {
        statusCode: 400,
        validationErrors: details,
      });
    }
    return new TodoError(message, "MALFORMED_REQUEST", { statusCode: 400 });
  }

  if (status === 404) {
    return new TodoError(message, "NOT_FOUND", { statusCode: 404 });
  }

  if (status >= 500) {
    return new TodoError(`Server error (${status}): ${message}`, "UNEXPECTED", {
      statusCode: status,
      isRetryable: true,
    });
  }

  return new TodoError(`HTTP error (${status}): ${message}`, "UNEXPECTED", {
    statusCode: status,
  });
}

/**
 * Create a TodoError from a fetch failure.
 * @internal
 */
export function createErrorFromNetworkFailure(error: Error): TodoError {
  // Timeout via AbortSignal.timeout()
  if (error.name === "TimeoutError") {
    return new TodoError("Request timed out", "CONNECTION_TIMEOUT", {
      cause: error,
      isRetryable: true,
    });
  }

  return new TodoError(
    `Cannot connect to todo server: ${error.message}`,
    "SERVER_UNAVAILABLE",
    { cause: error, isRetryable: true },
  );
}
