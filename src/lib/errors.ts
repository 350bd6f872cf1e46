/**
 * Custom error classes for structured error handling.
 *
 * Usage:
 *   throw new ValidationError("Order is missing required fields", [{ field: "title", message: "Required" }])
 *   throw new BackendUnavailableError("Order list request failed with HTTP 502")
 *   throw new ConfigError("Invalid environment", details) // process refuses to start
 *
 * At a transport boundary:
 *   catch (error) {
 *     const appError = toAppError(error)
 *     return { status: appError.statusCode, body: appError.toJSON() }
 *   }
 */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "NOT_FOUND"
  | "INTERNAL_ERROR"
  | "CONFIG_INVALID"
  // Recommendation pipeline
  | "BACKEND_UNAVAILABLE"
  | "VECTOR_STORE_FAILED"
  | "EMBEDDING_FAILED"

export interface ErrorDetail {
  field?: string
  message: string
  code?: string
}

export interface SerializedError {
  code: ErrorCode
  message: string
  details?: ErrorDetail[]
}

/**
 * Base application error class.
 * All custom errors extend this for consistent handling.
 */
export class AppError extends Error {
  public readonly isOperational: boolean = true

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: ErrorDetail[]
  ) {
    super(message)
    this.name = this.constructor.name
    Object.setPrototypeOf(this, new.target.prototype)
    Error.captureStackTrace(this, this.constructor)
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    }
  }
}

/**
 * 400 Validation Error - an order or payload is missing required data
 */
export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: ErrorDetail[]) {
    super("VALIDATION_ERROR", message, 400, details)
  }

  static fromZodError(error: {
    issues: Array<{ path: PropertyKey[]; message: string }>
  }): ValidationError {
    const details = error.issues.map((e) => ({
      field: e.path.map(String).join("."),
      message: e.message,
    }))
    return new ValidationError("Validation failed", details)
  }

  /**
   * Build from a list of missing field names.
   */
  static missingFields(fields: string[]): ValidationError {
    return new ValidationError(
      `Missing required fields: ${fields.join(", ")}`,
      fields.map((field) => ({ field, message: "Required", code: "missing" }))
    )
  }
}

/**
 * 404 Not Found - Resource doesn't exist
 */
export class NotFoundError extends AppError {
  constructor(message = "Resource not found") {
    super("NOT_FOUND", message, 404)
  }
}

/**
 * 500 Internal Error - Unexpected server error
 */
export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred") {
    super("INTERNAL_ERROR", message, 500)
  }
}

/**
 * 503 Backend Unavailable - the order system of record timed out or answered badly
 */
export class BackendUnavailableError extends AppError {
  constructor(
    message = "Order backend unavailable",
    public readonly httpStatus?: number
  ) {
    super("BACKEND_UNAVAILABLE", message, 503)
  }
}

/**
 * 503 Vector Store Failed - writing to the order index failed
 */
export class VectorStoreError extends AppError {
  constructor(message = "Vector store operation failed", details?: ErrorDetail[]) {
    super("VECTOR_STORE_FAILED", message, 503, details)
  }
}

/**
 * 500 Embedding Failed - Vector embedding generation error
 */
export class EmbeddingFailedError extends AppError {
  constructor(message = "Embedding generation failed") {
    super("EMBEDDING_FAILED", message, 500)
  }
}

/**
 * Invalid or missing startup configuration. Not operational: the process
 * should exit rather than serve requests.
 */
export class ConfigError extends AppError {
  public readonly isOperational: boolean = false

  constructor(message = "Invalid configuration", details?: ErrorDetail[]) {
    super("CONFIG_INVALID", message, 500, details)
  }
}

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

/**
 * Convert any error to an AppError for consistent handling.
 * Preserves AppErrors, wraps others in InternalError.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error
  }

  if (error instanceof Error) {
    // Don't expose internal error messages in production
    const message =
      process.env.NODE_ENV === "production"
        ? "An unexpected error occurred"
        : error.message

    return new InternalError(message)
  }

  return new InternalError("An unexpected error occurred")
}

/**
 * Message of an unknown thrown value, for log attributes.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
