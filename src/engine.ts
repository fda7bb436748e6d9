/**
 * Agent action protocol.
 *
 * Every operation here works on the agent's own location. Invalid adjacency
 * is routine for an agent probing the map, so it is reported with a `null`
 * result rather than an exception, and leaves the state untouched.
 */

import type { NodeID, NodeView, RoadEdge, StreetView } from "./types.js"
import type { WorldState } from "./world.js"
import { toNodeView, toStreetViews } from "./snapshots.js"

/**
 * Cleaning bills this many extra multiples of the street's travel time on top
 * of the move itself, so a clean-and-move costs three plain moves.
 */
export const CLEANING_SURCHARGE = 2

/**
 * One snapshot per street leaving the current location (parallel streets
 * included). Empty at a dead end.
 */
export function scanOutgoing(state: WorldState): StreetView[] {
  return toStreetViews(state.network, state.network.outEdges(state.agent.location))
}

/**
 * Drive to an adjacent intersection. Returns the new location, or null if
 * there is no street from here to `destination`.
 */
export function moveTo(state: WorldState, destination: NodeID): NodeID | null {
  const edge = state.network.getEdge(state.agent.location, destination)
  if (!edge) return null

  traverse(state, edge)
  return state.agent.location
}

/**
 * Clean the street to `destination` (if it is dirty) and drive along it.
 * Costs three times the street's travel time whether or not it was dirty.
 */
export function cleanAndMoveTo(state: WorldState, destination: NodeID): NodeID | null {
  const edge = state.network.getEdge(state.agent.location, destination)
  if (!edge) return null

  state.agent.batteryLife -= CLEANING_SURCHARGE * edge.travelTime
  if (state.network.markClean(edge)) {
    state.agent.metersCleaned += edge.length
  }

  traverse(state, edge)
  return state.agent.location
}

/**
 * Retrace the last `steps` moves of the route.
 *
 * In "charge" mode each step is billed like a forward move over the street
 * from the location just vacated back to the previous one, and that street
 * must exist. In "free" mode steps cost nothing and need no reverse street.
 * Either all steps apply or none do; returns null on rejection.
 */
export function backup(state: WorldState, steps: number = 1): NodeID | null {
  const { agent, network } = state

  if (!Number.isInteger(steps) || steps < 0 || steps >= agent.route.length) {
    return null
  }

  const charged: RoadEdge[] = []
  if (state.backupCost === "charge") {
    for (let i = 0; i < steps; i++) {
      const vacated = agent.route[agent.route.length - 1 - i]
      const previous = agent.route[agent.route.length - 2 - i]
      const edge = network.getEdge(vacated, previous)
      if (!edge) return null
      charged.push(edge)
    }
  }

  agent.route.splice(agent.route.length - steps, steps)
  agent.location = agent.route[agent.route.length - 1]
  for (const edge of charged) {
    agent.batteryLife -= edge.travelTime
  }

  return agent.location
}

export function getBatteryLife(state: WorldState): number {
  return state.agent.batteryLife
}

export function getMetersCleaned(state: WorldState): number {
  return state.agent.metersCleaned
}

export function getCurrentLocationInfo(state: WorldState): NodeView {
  const view = toNodeView(state.network, state.agent.location)
  if (!view) {
    throw new Error(`Agent location '${state.agent.location}' is not in the network`)
  }
  return view
}

function traverse(state: WorldState, edge: RoadEdge): void {
  state.agent.batteryLife -= edge.travelTime
  state.agent.route.push(edge.to)
  state.agent.location = edge.to
}
