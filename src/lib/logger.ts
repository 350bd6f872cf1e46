import * as Sentry from "@sentry/node"

/**
 * Structured logger using Sentry.logger
 *
 * Logs are buffered and shipped once `Sentry.init({ enableLogs: true })` has
 * run (see `src/instrument.ts`); before that, and in tests, calls are no-ops.
 *
 * @example
 * ```ts
 * import { logger, fmt } from "@/lib/logger"
 *
 * logger.info("Pool preloaded", { userId: "u1", poolSize: 150 })
 * logger.warn("Reverse mapping not written", { userId, reason })
 *
 * // Template literal formatting (creates searchable attributes)
 * logger.info(fmt`Order ${orderId} removed from ${count} user lists`)
 * ```
 */
export const logger = Sentry.logger

// Re-export for template literal formatting
export const fmt = Sentry.logger.fmt
