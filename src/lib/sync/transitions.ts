import { WAIT_RECEIVE } from "../orders/types"

export type SyncAction = "insert" | "remove" | "noop"

/**
 * What a state change means for the index, which holds exactly the
 * `WaitReceive` orders. An unknown new state counts as leaving.
 */
export function decideTransition(oldState: string | null, newState: string | null): SyncAction {
  const wasOpen = oldState === WAIT_RECEIVE
  const isOpen = newState === WAIT_RECEIVE
  if (isOpen && !wasOpen) return "insert"
  if (wasOpen && !isOpen) return "remove"
  return "noop"
}
