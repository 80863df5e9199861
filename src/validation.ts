/**
 * Title rules and request body schemas.
 * @module validation
 */

import { z, type ZodIssue } from "zod";
import {
  TodoError,
  malformedRequestError,
  validationError,
} from "./errors.js";
import type {
  CreateTodoRequest,
  ToggleAllRequest,
  UpdateTodoRequest,
  ValidationErrorDetail,
} from "./types.js";

/** Longest title accepted, counted after trimming */
export const MAX_TITLE_LENGTH = 500;

const COMPLETED_REQUIRED_MESSAGE = "Completed status must be specified";

/** Lower-cased markers that get a title rejected outright */
const UNSAFE_MARKERS = [
  "<script",
  "javascript:",
  "vbscript:",
  "onload=",
  "onerror=",
  "onclick=",
  "eval(",
  "expression(",
  "alert(",
];

const MARKUP_PATTERN = /<\/?[a-z][^>]*>/gi;

// ============================================
// Title
// ============================================

export interface TitleValidationOptions {
  /** Reject script markers and strip tags (default: false) */
  sanitize?: boolean;
}

/**
 * Check a title for script injection markers.
 */
export function containsUnsafeContent(title: string): boolean {
  const lower = title.toLowerCase();
  return UNSAFE_MARKERS.some((marker) => lower.includes(marker));
}

/**
 * Remove HTML tags. A bare `<` or `>` in text is left alone.
 */
export function stripMarkup(title: string): string {
  return title.replace(MARKUP_PATTERN, "");
}

/**
 * Validate a candidate title and return it cleaned.
 *
 * Trims, rejects blank and over-long titles, then (when sanitizing)
 * rejects script markers and strips tags. A missing title counts as blank.
 *
 * @throws {TodoError} BLANK_TITLE, TITLE_TOO_LONG or UNSAFE_CONTENT
 */
export function validateTitle(
  raw: string | null | undefined,
  options: TitleValidationOptions = {},
): string {
  const rejectedValue = raw ?? null;
  const title = (raw ?? "").trim();

  if (title.length === 0) {
    throw blankTitleError(rejectedValue);
  }

  if (title.length > MAX_TITLE_LENGTH) {
    throw validationError("TITLE_TOO_LONG", {
      field: "title",
      rejectedValue,
      message: `Title cannot exceed ${MAX_TITLE_LENGTH} characters`,
      code: "Size",
    });
  }

  if (options.sanitize ?? false) {
    if (containsUnsafeContent(title)) {
      throw validationError("UNSAFE_CONTENT", {
        field: "title",
        rejectedValue,
        message: "Title contains potentially unsafe content",
        code: "SafeContent",
      });
    }

    const stripped = stripMarkup(title).trim();
    if (stripped.length === 0) {
      throw blankTitleError(rejectedValue);
    }
    return stripped;
  }

  return title;
}

function blankTitleError(rejectedValue: unknown): TodoError {
  return validationError("BLANK_TITLE", {
    field: "title",
    rejectedValue,
    message: "Title cannot be blank",
    code: "NotBlank",
  });
}

// ============================================
// Request Schemas
// ============================================

const titleField = z
  .string({ invalid_type_error: "Title must be a string" })
  .nullish();

/**
 * Zod schema for POST /todos. Blank and missing titles are left to
 * validateTitle so they report NotBlank.
 */
export const createTodoSchema = z.object({
  title: titleField,
});

/**
 * Zod schema for PUT /todos/{id}. `null` means the same as omitted.
 */
export const updateTodoSchema = z.object({
  title: titleField,
  completed: z
    .boolean({ invalid_type_error: "Completed must be a boolean" })
    .nullish(),
});

/**
 * Zod schema for PUT /todos/toggle-all.
 */
export const toggleAllSchema = z.object({
  completed: z.boolean({
    errorMap: (issue) =>
      issue.code === "invalid_type" &&
      (issue.received === "undefined" || issue.received === "null")
        ? { message: COMPLETED_REQUIRED_MESSAGE }
        : { message: "Completed must be a boolean" },
  }),
});

// ============================================
// Body Parsing
// ============================================

/**
 * Read the value at a zod issue path from the raw body.
 * @internal
 */
function valueAtPath(body: unknown, path: (string | number)[]): unknown {
  let current: unknown = body;
  for (const key of path) {
    if (typeof current !== "object" || current === null) {
      return undefined;
    }
    current = Reflect.get(current, key);
  }
  return current ?? null;
}

/**
 * Convert zod issues to field-level details.
 */
export function issuesToValidationErrors(
  issues: ZodIssue[],
  body: unknown,
): ValidationErrorDetail[] {
  return issues.map((issue) => {
    const missing =
      issue.code === "invalid_type" &&
      (issue.received === "undefined" || issue.received === "null");
    return {
      field: issue.path.join("."),
      rejectedValue: valueAtPath(body, issue.path),
      message: issue.message,
      code: missing ? "NotNull" : "TypeMismatch",
    };
  });
}

/**
 * Parse a body with a schema, throwing a TodoError on failure.
 *
 * A body that is not a JSON object is malformed; a field of the wrong type
 * is a validation failure.
 */
function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body);
  if (result.success) {
    return result.data;
  }

  if (result.error.issues.some((issue) => issue.path.length === 0)) {
    throw malformedRequestError("Request body must be a JSON object");
  }

  const details = issuesToValidationErrors(result.error.issues, body);
  const first = details[0];
  throw new TodoError(first?.message ?? "Validation failed", "VALIDATION_FAILED", {
    statusCode: 400,
    validationErrors: details,
  });
}

/**
 * Parse a create body. The title is not checked here.
 */
export function parseCreateTodoRequest(body: unknown): CreateTodoRequest {
  const data = parseBody(createTodoSchema, body);
  return { title: data.title ?? "" };
}

/**
 * Parse an update body into only the fields that were supplied.
 */
export function parseUpdateTodoRequest(body: unknown): UpdateTodoRequest {
  const data = parseBody(updateTodoSchema, body);
  const request: UpdateTodoRequest = {};
  if (data.title !== undefined && data.title !== null) {
    request.title = data.title;
  }
  if (data.completed !== undefined && data.completed !== null) {
    request.completed = data.completed;
  }
  return request;
}

/**
 * Parse a toggle-all body.
 */
export function parseToggleAllRequest(body: unknown): ToggleAllRequest {
  const data = parseBody(toggleAllSchema, body);
  return { completed: data.completed };
}
