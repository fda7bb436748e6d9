/**
 * WebSocket Protocol Types
 *
 * Defines the message types exchanged between a map client and the server.
 */

import type { NodeID, NodeView, StreetView } from "../../types.js"
import type { RenderSnapshot } from "../../render.js"
import type { SweeperAction } from "../../policy-runner/types.js"

// ============================================================================
// Client -> Server Messages
//
// Note: Some messages trigger automatic responses:
// - new_session: Server responds with state (or error if the place fails to load)
// - action: Server responds with action_result, which carries the new state
// ============================================================================

/**
 * Start a new simulation. Both fields fall back to server defaults.
 * Server responds with: state
 */
export interface NewSessionMessage {
  type: "new_session"
  place?: string
  seed?: string | number
}

/**
 * Drive the sweeper.
 * Server responds with: action_result
 */
export interface ActionMessage {
  type: "action"
  action: SweeperAction
}

export interface GetStateMessage {
  type: "get_state"
}

export interface GetMapMessage {
  type: "get_map"
}

export type ClientMessage = NewSessionMessage | ActionMessage | GetStateMessage | GetMapMessage

// ============================================================================
// Server -> Client Messages
// ============================================================================

/**
 * Everything the partial view reveals at the current location.
 */
export interface SweeperState {
  location: NodeView
  outgoing: StreetView[]
  batteryLife: number
  metersCleaned: number
}

export interface StateMessage {
  type: "state"
  state: SweeperState
  seed: string
  place: string
}

/**
 * `location` is null when the engine rejected the action.
 */
export interface ActionResultMessage {
  type: "action_result"
  action: SweeperAction
  location: NodeID | null
  state: SweeperState
}

export interface MapMessage {
  type: "map"
  snapshot: RenderSnapshot
}

export interface ErrorMessage {
  type: "error"
  message: string
}

export type ServerMessage = StateMessage | ActionResultMessage | MapMessage | ErrorMessage

// ============================================================================
// Message Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

/**
 * Validate the payload of an `action` message.
 */
export function validateSweeperAction(value: unknown): SweeperAction | null {
  if (!isRecord(value)) return null

  switch (value.type) {
    case "Move":
    case "CleanAndMove":
      if (typeof value.to !== "string" || value.to === "") return null
      return value.type === "Move" ? { type: "Move", to: value.to } : { type: "CleanAndMove", to: value.to }

    case "Backup": {
      const steps = value.steps ?? 1
      if (typeof steps !== "number") return null
      return { type: "Backup", steps }
    }

    default:
      return null
  }
}

/**
 * Validate and parse a client message.
 * Returns null if the message is invalid.
 */
export function validateClientMessage(data: unknown): ClientMessage | null {
  if (!isRecord(data)) return null

  switch (data.type) {
    case "new_session": {
      const { place, seed } = data
      if (place !== undefined && typeof place !== "string") return null
      if (seed !== undefined && typeof seed !== "string" && typeof seed !== "number") return null
      const message: NewSessionMessage = { type: "new_session" }
      if (place !== undefined) message.place = place
      if (seed !== undefined) message.seed = seed
      return message
    }

    case "action": {
      const action = validateSweeperAction(data.action)
      return action ? { type: "action", action } : null
    }

    case "get_state":
      return { type: "get_state" }

    case "get_map":
      return { type: "get_map" }

    default:
      return null
  }
}
