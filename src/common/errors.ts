export class AppError extends Error {
  constructor(
    public readonly code: string,
    public readonly status: number,
    message: string
  ) {
    super(message);
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super("NOT_FOUND", 404, message);
  }
}

export class MissingParameterError extends AppError {
  constructor(message = "Missing required parameters") {
    super("MISSING_PARAMETER", 400, message);
  }
}

export class InsufficientFundsError extends AppError {
  constructor(message = "Insufficient balance") {
    super("INSUFFICIENT_FUNDS", 400, message);
  }
}

export class InvalidAmountError extends AppError {
  constructor(message = "Invalid amount") {
    super("INVALID_AMOUNT", 400, message);
  }
}

export class UpstreamServiceError extends AppError {
  constructor(message = "Upstream service unavailable") {
    super("UPSTREAM_ERROR", 502, message);
  }
}

/** SQLSTATE carried by a pg driver error, if any. */
export function pgErrorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

export function isForeignKeyViolation(error: unknown): boolean {
  return pgErrorCode(error) === "23503";
}
