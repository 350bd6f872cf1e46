/**
 * @fileoverview Inngest Module - Main Entry Point
 *
 * Barrel export for the `@/inngest` module: the client, event schemas and
 * workflow utilities. Functions are NOT exported here; the serve handler
 * imports them from `@/inngest/functions`, which loads every service.
 *
 * Test helpers are intentionally NOT exported from this barrel. Import them
 * directly in test files:
 * ```typescript
 * import { createMockEvent, createMockStep } from "@/inngest/utils/test-helpers"
 * ```
 *
 * @module inngest
 */

// =============================================================================
// Client
// =============================================================================

export { inngest } from "./client"
export type { InngestClient } from "./client"

// =============================================================================
// Event Types & Schemas
// =============================================================================

export * from "./types"

// =============================================================================
// Concurrency & Retry Configuration
// =============================================================================

export { CONCURRENCY, RETRY_CONFIG, STEP_TIMEOUTS } from "./utils/concurrency"

// =============================================================================
// Error Handling
// =============================================================================

export {
  InngestWorkflowError,
  RetriableError,
  NonRetriableError,
  isRetriableError,
  wrapWithErrorHandling,
} from "./utils/errors"
export { withSoftTimeout } from "./utils/timeout"
