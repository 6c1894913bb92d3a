/**
 * Business-path errors. Each carries a stable `code` and the HTTP status the
 * API error handler maps it to.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = "AppError";
  }
}

/** A required field is missing or malformed. */
export class ValidationError extends AppError {
  constructor(message: string, code = "INVALID_PARAM") {
    super(message, code, 400);
    this.name = "ValidationError";
  }
}

/** A referenced entity (usually an account) does not exist. */
export class NotFoundError extends AppError {
  constructor(message: string, code = "NOT_FOUND") {
    super(message, code, 404);
    this.name = "NotFoundError";
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
