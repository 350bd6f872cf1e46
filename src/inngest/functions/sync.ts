/**
 * @fileoverview Scheduled Sync Functions
 *
 * | Function              | Schedule      |
 * |-----------------------|---------------|
 * | sync-all-orders       | 02:00 daily   |
 * | sync-order-events     | every 5 min   |
 * | backend-health-check  | hourly        |
 *
 * `sync-order-events` also carries the rolling recalculation: users
 * affected by the replayed events get their caches invalidated and their
 * pools rebuilt.
 *
 * @module inngest/functions/sync
 */

import { inngest } from "../client"
import { CONCURRENCY, RETRY_CONFIG } from "../utils/concurrency"
import { RetriableError, wrapWithErrorHandling } from "../utils/errors"
import { getServices, type Services } from "@/lib/services"
import { logger } from "@/lib/logger"

export interface EventSyncSummary {
  reason: string
  processed: number
  failed: number
  affectedUsers: string[]
}

export interface HealthReport {
  backend: boolean
  cache: boolean
  indexedOrders: number | null
}

/**
 * Replay new operation-log events and collect the users they affect.
 */
export async function runEventSync(
  services: Pick<Services, "sync" | "updater">
): Promise<EventSyncSummary> {
  const { processed, failed, outcome } = await services.sync.syncEvents()
  const affectedUsers = await services.updater.collectAffectedUsers(processed)
  return {
    reason: outcome.reason,
    processed: processed.length,
    failed: failed.length,
    affectedUsers,
  }
}

export async function runHealthCheck(
  services: Pick<Services, "backend" | "cache" | "vectorStore">
): Promise<HealthReport> {
  const backend = await services.backend.healthCheck()
  const cache = await services.cache.ping()
  let indexedOrders: number | null = null
  try {
    indexedOrders = await services.vectorStore.count()
  } catch (error) {
    logger.error("Order index unreachable", {
      error: error instanceof Error ? error.message : String(error),
    })
  }

  const report = { backend, cache, indexedOrders }
  if (!backend || !cache || indexedOrders === null) {
    logger.warn("Health check found a failing dependency", { ...report })
  }
  return report
}

/**
 * Nightly full rebuild of the order index.
 */
export const syncAllOrders = inngest.createFunction(
  {
    id: "sync-all-orders",
    name: "Sync: All Orders",
    concurrency: CONCURRENCY.sync,
    retries: RETRY_CONFIG.scheduled.retries,
  },
  { cron: "0 2 * * *" },
  async ({ step }) => {
    return step.run("sync-all", async () => {
      const ok = await getServices().sync.syncAll()
      if (!ok) {
        throw new RetriableError("Full sync did not complete")
      }
      return { success: ok }
    })
  }
)

/**
 * Incremental sync followed by a refresh of the affected users.
 */
export const syncOrderEvents = inngest.createFunction(
  {
    id: "sync-order-events",
    name: "Sync: Order Events",
    concurrency: CONCURRENCY.sync,
    retries: RETRY_CONFIG.scheduled.retries,
  },
  { cron: "*/5 * * * *" },
  async ({ step }) => {
    const summary = await step.run("sync-events", () =>
      wrapWithErrorHandling("Event sync", () => runEventSync(getServices()))
    )

    if (summary.affectedUsers.length === 0) {
      return { ...summary, refreshed: 0 }
    }

    const stats = await step.run("refresh-affected-users", () =>
      getServices().updater.updateAffectedUsers(summary.affectedUsers)
    )
    return { ...summary, refreshed: stats.successCount }
  }
)

export const backendHealthCheck = inngest.createFunction(
  {
    id: "backend-health-check",
    name: "Sync: Backend Health Check",
    retries: RETRY_CONFIG.none.retries,
  },
  { cron: "0 * * * *" },
  async ({ step }) => {
    return step.run("check", () => runHealthCheck(getServices()))
  }
)
