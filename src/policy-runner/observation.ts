/**
 * Observation Builder
 *
 * Converts what the partial view reveals into a SweeperObservation. Visit
 * counts and route depth come from the runner's own memory of where the
 * agent has been, never from the simulation's full view.
 */

import type { NodeID } from "../types.js"
import type { PartialObservability } from "../observability.js"
import type { OutgoingStreet, SweeperAction, SweeperObservation } from "./types.js"

/**
 * What the runner remembers about the agent's trip so far.
 */
export interface RouteMemory {
  visits: Map<NodeID, number>
  depth: number
}

export function createRouteMemory(start: NodeID): RouteMemory {
  return { visits: new Map([[start, 1]]), depth: 0 }
}

/**
 * Update memory after an action succeeded and left the agent at `location`.
 */
export function recordArrival(memory: RouteMemory, action: SweeperAction, location: NodeID): void {
  memory.depth += action.type === "Backup" ? -action.steps : 1
  memory.visits.set(location, (memory.visits.get(location) ?? 0) + 1)
}

/**
 * Build the observation for the agent's current location.
 * Parallel streets collapse to the lowest-keyed one, the street a move takes.
 */
export function getObservation(
  view: PartialObservability,
  memory: RouteMemory,
  initialBattery: number
): SweeperObservation {
  const location = view.getCurrentLocationInfo().locationId
  const outgoing: OutgoingStreet[] = []

  for (const { end, street } of view.scanOutgoing()) {
    const to = end.locationId
    if (outgoing.length > 0 && outgoing[outgoing.length - 1].to === to) continue
    outgoing.push({
      to,
      length: street.length,
      travelTime: street.travelTime,
      dirty: street.cleanliness === "dirty",
      visits: memory.visits.get(to) ?? 0,
    })
  }

  return {
    location,
    outgoing,
    batteryLife: view.getBatteryLife(),
    initialBattery,
    metersCleaned: view.getMetersCleaned(),
    routeDepth: memory.depth,
    visitsHere: memory.visits.get(location) ?? 0,
  }
}

/**
 * The longest dirty street out of here, ties broken by destination id.
 */
export function findLongestDirtyStreet(obs: SweeperObservation): OutgoingStreet | null {
  let best: OutgoingStreet | null = null
  for (const street of obs.outgoing) {
    if (!street.dirty) continue
    if (!best || street.length > best.length) best = street
  }
  return best
}

/**
 * The street to the least-visited neighbour, then the quickest, then by id.
 */
export function findLeastVisitedStreet(obs: SweeperObservation): OutgoingStreet | null {
  let best: OutgoingStreet | null = null
  for (const street of obs.outgoing) {
    if (
      !best ||
      street.visits < best.visits ||
      (street.visits === best.visits && street.travelTime < best.travelTime)
    ) {
      best = street
    }
  }
  return best
}

/**
 * Battery left as a fraction of what the run started with.
 */
export function getBatteryFraction(obs: SweeperObservation): number {
  return obs.initialBattery > 0 ? obs.batteryLife / obs.initialBattery : 0
}
