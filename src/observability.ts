/**
 * Observability views
 *
 * Two capability sets over one WorldState. Which one a caller can use is
 * decided purely by the handle it was given: agents get a PartialObservability,
 * evaluators and debuggers get a FullObservability. The full view adds read-only
 * lookups; every mutation still goes through the partial protocol.
 */

import type { ContaminationRegion, NodeID, NodeView, StreetView } from "./types.js"
import type { WorldState } from "./world.js"
import {
  backup,
  cleanAndMoveTo,
  getBatteryLife,
  getCurrentLocationInfo,
  getMetersCleaned,
  moveTo,
  scanOutgoing,
} from "./engine.js"
import { toNodeView, toStreetView, toStreetViews } from "./snapshots.js"

/**
 * What an agent can do and see. All queries are scoped to its own location.
 */
export interface PartialObservability {
  scanOutgoing(): StreetView[]
  moveTo(destination: NodeID): NodeID | null
  cleanAndMoveTo(destination: NodeID): NodeID | null
  backup(steps?: number): NodeID | null
  getBatteryLife(): number
  getMetersCleaned(): number
  getCurrentLocationInfo(): NodeView
}

/**
 * Partial protocol plus arbitrary lookups for evaluation and debugging.
 */
export interface FullObservability extends PartialObservability {
  lookupNode(id: NodeID): NodeView | null
  lookupEdge(from: NodeID, to: NodeID): StreetView | null
  outgoingFrom(id: NodeID): StreetView[]
  incomingTo(id: NodeID): StreetView[]
  listContaminationRegions(): ContaminationRegion[]
  getRoute(): NodeID[]
  /** Meters of street still dirty across the whole map. */
  getRemainingDirtyLength(): number
}

export function createPartialView(state: WorldState): PartialObservability {
  return {
    scanOutgoing: () => scanOutgoing(state),
    moveTo: (destination) => moveTo(state, destination),
    cleanAndMoveTo: (destination) => cleanAndMoveTo(state, destination),
    backup: (steps) => backup(state, steps),
    getBatteryLife: () => getBatteryLife(state),
    getMetersCleaned: () => getMetersCleaned(state),
    getCurrentLocationInfo: () => getCurrentLocationInfo(state),
  }
}

export function createFullView(state: WorldState): FullObservability {
  const { network } = state

  return {
    ...createPartialView(state),

    lookupNode: (id) => toNodeView(network, id),

    lookupEdge: (from, to) => {
      const edge = network.getEdge(from, to)
      return edge ? toStreetView(network, edge) : null
    },

    outgoingFrom: (id) => toStreetViews(network, network.outEdges(id)),

    incomingTo: (id) => toStreetViews(network, network.inEdges(id)),

    listContaminationRegions: () => state.regions.map((region) => ({ ...region })),

    getRoute: () => [...state.agent.route],

    getRemainingDirtyLength: () => network.dirtyLength(),
  }
}
