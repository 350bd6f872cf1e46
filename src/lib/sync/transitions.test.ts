import { describe, it, expect } from "vitest"
import { decideTransition } from "./transitions"

describe("decideTransition", () => {
  it.each([
    [null, "WaitReceive", "insert"],
    ["Accepted", "WaitReceive", "insert"],
    ["WaitReceive", "Accepted", "remove"],
    ["WaitReceive", "OffShelf", "remove"],
    ["WaitReceive", null, "remove"],
    ["Accepted", "Completed", "noop"],
    ["WaitReceive", "WaitReceive", "noop"],
    [null, null, "noop"],
  ] as const)("%s -> %s is %s", (oldState, newState, action) => {
    expect(decideTransition(oldState, newState)).toBe(action)
  })
})
