/**
 * @fileoverview Inngest Function Registry
 *
 * Barrel export for all Inngest functions. The serve handler imports
 * from this file to register all functions with Inngest.
 *
 * @module inngest/functions
 */

// Request-triggered
import { preloadPaginationPool, cleanupUserCache } from "./recommendations"

// Scheduled
import { syncAllOrders, syncOrderEvents, backendHealthCheck } from "./sync"

/**
 * All registered Inngest functions.
 * Add new functions to this array as they are created.
 */
export const functions = [
  preloadPaginationPool,
  cleanupUserCache,

  syncAllOrders,
  syncOrderEvents,
  backendHealthCheck,
]
