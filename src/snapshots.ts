/**
 * Owned snapshots of network data. Nothing returned from here aliases live
 * simulation storage, so callers may mutate what they get back freely.
 */

import type { NodeID, NodeView, RoadEdge, StreetView } from "./types.js"
import type { RoadNetwork } from "./roadNetwork.js"

export function toNodeView(network: RoadNetwork, id: NodeID): NodeView | null {
  const node = network.getNode(id)
  if (!node) return null
  return {
    locationId: node.id,
    x: node.x,
    y: node.y,
    metadata: structuredClone(node.metadata),
  }
}

export function toStreetView(network: RoadNetwork, edge: RoadEdge): StreetView | null {
  const start = toNodeView(network, edge.from)
  const end = toNodeView(network, edge.to)
  if (!start || !end) return null
  return {
    start,
    end,
    street: {
      key: edge.key,
      length: edge.length,
      travelTime: edge.travelTime,
      cleanliness: edge.cleanliness,
      attributes: structuredClone(edge.attributes),
    },
  }
}

export function toStreetViews(network: RoadNetwork, edges: readonly RoadEdge[]): StreetView[] {
  const views: StreetView[] = []
  for (const edge of edges) {
    const view = toStreetView(network, edge)
    if (view) views.push(view)
  }
  return views
}
