/**
 * Data handed to an external map renderer. Drawing itself happens elsewhere.
 */

import type { NodeID, RoadEdge } from "./types.js"
import type { WorldState } from "./world.js"

export type EdgeColor = "brown" | "white"

export interface RenderedEdge {
  from: NodeID
  to: NodeID
  key: number
  color: EdgeColor
}

export interface RenderSnapshot {
  place: string
  edges: RenderedEdge[]
  route: NodeID[]
}

/** Dirty streets are drawn brown, clean ones white. */
export function edgeColor(edge: Pick<RoadEdge, "cleanliness">): EdgeColor {
  return edge.cleanliness === "dirty" ? "brown" : "white"
}

export function renderSnapshot(state: WorldState): RenderSnapshot {
  return {
    place: state.place,
    edges: state.network.edges().map((edge) => ({
      from: edge.from,
      to: edge.to,
      key: edge.key,
      color: edgeColor(edge),
    })),
    route: [...state.agent.route],
  }
}
