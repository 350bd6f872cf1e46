// src/inngest/utils/test-helpers.ts
/**
 * @fileoverview Inngest Test Helpers
 *
 * Typed mock events, a recording `step` object and payload factories for
 * exercising function handlers without the Inngest dev server.
 *
 * Not exported from the `@/inngest` barrel; import directly.
 *
 * @module inngest/utils/test-helpers
 */

import { randomUUID } from "crypto"
import type {
  InngestEvents,
  PoolPreloadRequestedPayload,
  UserCacheCleanupRequestedPayload,
} from "../types"

type EventName = keyof InngestEvents

export interface MockEvent<N extends EventName> {
  id: string
  name: N
  data: InngestEvents[N]["data"]
  ts: number
}

export function createMockEvent<N extends EventName>(
  name: N,
  data: InngestEvents[N]["data"]
): MockEvent<N> {
  return { id: randomUUID(), name, data, ts: Date.now() }
}

// ============================================================================
// Step
// ============================================================================

export interface StepResult {
  name: string
  result: unknown
  /** Zero-based execution order */
  sequence: number
}

export interface SleepCall {
  duration: string | number
}

export interface SentEvent {
  name: string
  data: Record<string, unknown>
}

/**
 * A `step` whose `run` executes immediately, whose `sleep` returns at
 * once and whose `sendEvent` only records.
 */
export function createMockStep() {
  let stepResults: StepResult[] = []
  let sleepCalls: SleepCall[] = []
  let sentEvents: SentEvent[] = []
  let sequence = 0

  const step = {
    async run<T>(name: string, fn: () => T | Promise<T>): Promise<T> {
      const result = await fn()
      stepResults.push({ name, result, sequence: sequence++ })
      return result
    },
    async sleep(duration: string | number): Promise<void> {
      sleepCalls.push({ duration })
    },
    async sendEvent(_id: string, events: SentEvent | SentEvent[]): Promise<void> {
      sentEvents.push(...(Array.isArray(events) ? events : [events]))
    },
  }

  return {
    step,
    getStepResults: () => [...stepResults],
    getSleepCalls: () => [...sleepCalls],
    getSentEvents: () => [...sentEvents],
    reset: () => {
      stepResults = []
      sleepCalls = []
      sentEvents = []
      sequence = 0
    },
  }
}

export function expectStepExecuted(results: StepResult[], name: string): StepResult {
  const found = results.find((result) => result.name === name)
  if (!found) {
    const executed = results.length > 0 ? results.map((r) => r.name).join(", ") : "none"
    throw new Error(`Expected step "${name}" to be executed. Executed steps: [${executed}]`)
  }
  return found
}

export function expectStepResult(results: StepResult[], name: string, expected: unknown): void {
  const found = expectStepExecuted(results, name)
  const actualJson = JSON.stringify(found.result, null, 2)
  const expectedJson = JSON.stringify(expected, null, 2)
  if (actualJson !== expectedJson) {
    throw new Error(
      `Step "${name}" result mismatch.\nExpected: ${expectedJson}\nActual: ${actualJson}`
    )
  }
}

// ============================================================================
// Payloads
// ============================================================================

export const testEventData = {
  poolPreloadRequested: (
    overrides: Partial<PoolPreloadRequestedPayload> = {}
  ): PoolPreloadRequestedPayload => ({
    userId: "user-1",
    poolSize: 150,
    taskId: randomUUID(),
    ...overrides,
  }),

  userCacheCleanupRequested: (
    overrides: Partial<UserCacheCleanupRequestedPayload> = {}
  ): UserCacheCleanupRequestedPayload => ({
    userId: "user-1",
    ...overrides,
  }),
}
