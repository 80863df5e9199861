/**
 * CLI error handling utilities.
 * @module cli/utils/errors
 */

import { TodoError } from "../../errors.js";

// ============================================
// Exit Codes
// ============================================

/**
 * CLI exit codes.
 */
export const ExitCode = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  CONFIG_ERROR: 2,
  CONNECTION_ERROR: 3,
  VALIDATION_ERROR: 4,
  NOT_FOUND: 5,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

// ============================================
// CLI Error Class
// ============================================

/**
 * CLI-specific error with exit code and optional hint.
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public readonly code: ExitCode = ExitCode.GENERAL_ERROR,
    public readonly hint?: string,
  ) {
    super(message);
    this.name = "CLIError";
  }
}

/**
 * Translate any thrown value into a CLIError. TodoErrors from the client
 * pick their exit code from the error code.
 */
export function toCLIError(error: unknown): CLIError {
  if (error instanceof CLIError) {
    return error;
  }

  if (TodoError.isTodoError(error)) {
    if (error.isUnavailable) {
      return new CLIError(
        error.message,
        ExitCode.CONNECTION_ERROR,
        "Start the server with `todomvc-api serve` or pass --url",
      );
    }
    if (error.isValidationError || error.code === "MALFORMED_REQUEST") {
      return new CLIError(error.message, ExitCode.VALIDATION_ERROR);
    }
    if (error.isNotFound) {
      return new CLIError(error.message, ExitCode.NOT_FOUND);
    }
  }

  return new CLIError(
    error instanceof Error ? error.message : String(error),
    ExitCode.GENERAL_ERROR,
  );
}

// ============================================
// Error Handler
// ============================================

/**
 * Report an error on stderr and exit with its code.
 */
export function handleError(
  error: unknown,
  options: { json?: boolean } = {},
): never {
  const cliError = toCLIError(error);

  if (options.json) {
    console.error(
      JSON.stringify({
        error: cliError.message,
        code: cliError.code,
        hint: cliError.hint,
      }),
    );
  } else {
    console.error(`Error: ${cliError.message}`);
    if (cliError.hint) {
      console.error(`Hint: ${cliError.hint}`);
    }
  }

  process.exit(cliError.code);
}
