/**
 * @fileoverview HTTP Entry Point
 *
 * Serves the Inngest webhook at `/api/inngest` and a health probe at
 * `/health`. Seeds an empty order index before accepting requests.
 *
 * Environment variables required by Inngest in production:
 * - INNGEST_EVENT_KEY: For sending events
 * - INNGEST_SIGNING_KEY: For webhook signature verification
 *
 * @module server
 */

import "dotenv/config"
import "./instrument"

import { createServer, type IncomingMessage, type ServerResponse } from "http"
import * as Sentry from "@sentry/node"
import { serve } from "inngest/node"
import { inngest } from "@/inngest/client"
import { functions } from "@/inngest/functions"
import { runHealthCheck } from "@/inngest/functions/sync"
import { NotFoundError, errorMessage, toAppError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import { getServices } from "@/lib/services"

const inngestHandler = serve({ client: inngest, functions })

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" })
  res.end(JSON.stringify(body))
}

async function route(req: IncomingMessage, res: ServerResponse): Promise<void> {
  const path = new URL(req.url ?? "/", "http://localhost").pathname

  if (path === "/api/inngest") {
    // Typed as a plain listener, but resolves once the response is written
    await inngestHandler(req, res)
    return
  }

  if (path === "/health" && req.method === "GET") {
    const report = await runHealthCheck(getServices())
    const healthy = report.backend && report.cache && report.indexedOrders !== null
    return sendJson(res, healthy ? 200 : 503, report)
  }

  const notFound = new NotFoundError(`No route for ${req.method ?? "GET"} ${path}`)
  sendJson(res, notFound.statusCode, { error: notFound.toJSON() })
}

async function main(): Promise<void> {
  const services = getServices()

  if (!(await services.sync.ensureSeeded())) {
    logger.warn("Order index is empty; recommendations fall back to cold start")
  }

  const server = createServer((req, res) => {
    route(req, res).catch((error: unknown) => {
      Sentry.captureException(error)
      logger.error("Request failed", { path: req.url ?? "", error: errorMessage(error) })
      const appError = toAppError(error)
      if (!res.headersSent) {
        sendJson(res, appError.statusCode, { error: appError.toJSON() })
      }
    })
  })

  server.listen(services.config.port, () => {
    logger.info("Order recommender listening", { port: services.config.port })
  })

  process.on("SIGTERM", () => {
    server.close(() => {
      Sentry.close(2000).then(
        () => process.exit(0),
        () => process.exit(1)
      )
    })
  })
}

main().catch((error: unknown) => {
  Sentry.captureException(error)
  console.error("Failed to start:", errorMessage(error))
  process.exit(1)
})
