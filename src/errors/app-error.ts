export type ErrorKind =
  | "Unauthorized"
  | "ValidationError"
  | "NotFound"
  | "StorageFailure";

/**
 * Base class for errors that carry an HTTP status and are answered with the
 * standard `{ success: false, message, data: null }` envelope.
 */
export class AppError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    public readonly status: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = "Unauthorized") {
    super("Unauthorized", message, 401);
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super("ValidationError", message, 400);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Item not found") {
    super("NotFound", message, 404);
  }
}

export class StorageFailureError extends AppError {
  constructor(message: string, cause?: unknown) {
    super("StorageFailure", message, 500, { cause });
  }
}
