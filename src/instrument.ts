import * as Sentry from "@sentry/node"

/**
 * Must be imported before anything else so auto-instrumentation can patch
 * `http` and `fetch`. Without `SENTRY_DSN` nothing is sent and the logger
 * stays a no-op.
 */
Sentry.init({
  dsn: process.env.SENTRY_DSN,

  // Enable structured logging
  enableLogs: true,

  tracesSampler: ({ name, parentSampled }) => {
    // Always skip health checks
    if (name.includes("health")) {
      return 0
    }
    // Always capture background work
    if (name.includes("inngest")) {
      return 1.0
    }
    // Inherit parent sampling decision for distributed traces
    if (typeof parentSampled === "boolean") {
      return parentSampled
    }
    // Production: 10%, Development: 100%
    return process.env.NODE_ENV === "production" ? 0.1 : 1.0
  },

  debug: false,
})
