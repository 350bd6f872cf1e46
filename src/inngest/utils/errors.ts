// src/inngest/utils/errors.ts
/**
 * @fileoverview Error Handling Utilities for Inngest Functions
 *
 * Workflow errors carry `isRetriable` for Inngest retry control. Unlike
 * src/lib/errors.ts (transport-focused with statusCode), these decide
 * whether a failed step runs again.
 *
 * Inngest retries every thrown error except its own `NonRetriableError`,
 * so {@link wrapWithErrorHandling} rethrows permanent failures as that.
 *
 * @module inngest/utils/errors
 */

import { NonRetriableError as InngestNonRetriableError } from "inngest"
import {
  BackendUnavailableError,
  EmbeddingFailedError,
  NotFoundError,
  ValidationError,
  VectorStoreError,
  errorMessage,
} from "@/lib/errors"

/**
 * Base class for Inngest workflow errors.
 */
export abstract class InngestWorkflowError extends Error {
  /** Whether Inngest should retry this error */
  abstract readonly isRetriable: boolean
  /** Optional context for debugging */
  readonly context?: Record<string, unknown>

  constructor(message: string, context?: Record<string, unknown>) {
    super(message)
    this.name = this.constructor.name
    this.context = context
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * Temporary failure that should be retried.
 * Use for: backend timeouts, cache or index unavailability, soft timeouts.
 */
export class RetriableError extends InngestWorkflowError {
  readonly isRetriable = true
}

/**
 * Permanent failure that should NOT be retried.
 * Use for: invalid payloads, orders that no longer exist.
 */
export class NonRetriableError extends InngestWorkflowError {
  readonly isRetriable = false
}

/**
 * Check if an error should trigger Inngest retry.
 */
export function isRetriableError(error: unknown): boolean {
  if (error instanceof InngestWorkflowError) {
    return error.isRetriable
  }
  if (error instanceof InngestNonRetriableError) {
    return false
  }
  if (error instanceof ValidationError || error instanceof NotFoundError) {
    return false
  }
  if (
    error instanceof BackendUnavailableError ||
    error instanceof VectorStoreError ||
    error instanceof EmbeddingFailedError
  ) {
    return true
  }
  // Default: retry unknown errors
  return true
}

/**
 * Run `fn`, rethrowing permanent failures as Inngest's
 * `NonRetriableError` and everything else as {@link RetriableError}.
 */
export async function wrapWithErrorHandling<T>(
  operation: string,
  fn: () => Promise<T>
): Promise<T> {
  try {
    return await fn()
  } catch (error) {
    if (error instanceof InngestNonRetriableError) {
      throw error
    }

    const message = `${operation}: ${errorMessage(error)}`
    if (!isRetriableError(error)) {
      throw new InngestNonRetriableError(message, { cause: error })
    }
    if (error instanceof RetriableError) {
      throw error
    }
    throw new RetriableError(message, {
      originalError: error instanceof Error ? error.name : typeof error,
    })
  }
}
