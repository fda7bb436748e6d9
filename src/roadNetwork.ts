/**
 * In-process road network.
 *
 * A directed multigraph whose topology is frozen when it is built. The only
 * mutable attribute is per-edge cleanliness, and dirtying is only possible
 * until the network is sealed (contamination generation seals it).
 */

import type { NodeID, RawRoadGraph, RoadEdge, RoadNode } from "./types.js"

function byDestinationThenKey(a: RoadEdge, b: RoadEdge): number {
  if (a.to !== b.to) return a.to < b.to ? -1 : 1
  return a.key - b.key
}

function byOriginThenKey(a: RoadEdge, b: RoadEdge): number {
  if (a.from !== b.from) return a.from < b.from ? -1 : 1
  return a.key - b.key
}

function isNonNegativeNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value) && value >= 0
}

/** A node adjacent in either direction, with the street length between them. */
export interface Neighbor {
  id: NodeID
  length: number
}

export class RoadNetwork {
  private readonly nodes: Map<NodeID, RoadNode>
  private readonly outgoing: Map<NodeID, RoadEdge[]>
  private readonly incoming: Map<NodeID, RoadEdge[]>
  private readonly edgeList: RoadEdge[]
  private sealed = false

  private constructor(nodes: Map<NodeID, RoadNode>, edgeList: RoadEdge[]) {
    this.nodes = nodes
    this.edgeList = edgeList
    this.outgoing = new Map()
    this.incoming = new Map()

    for (const id of nodes.keys()) {
      this.outgoing.set(id, [])
      this.incoming.set(id, [])
    }
    for (const edge of edgeList) {
      this.outgoing.get(edge.from)?.push(edge)
      this.incoming.get(edge.to)?.push(edge)
    }
    for (const list of this.outgoing.values()) list.sort(byDestinationThenKey)
    for (const list of this.incoming.values()) list.sort(byOriginThenKey)
  }

  /**
   * Build a network from provider data. Every edge must already carry a
   * travel time. All edges start clean.
   */
  static build(graph: RawRoadGraph): RoadNetwork {
    if (graph.nodes.length === 0) {
      throw new Error(`Road network for '${graph.place}' has no nodes`)
    }

    const nodes = new Map<NodeID, RoadNode>()
    for (const raw of graph.nodes) {
      if (nodes.has(raw.id)) {
        throw new Error(`Duplicate node id '${raw.id}' in road network for '${graph.place}'`)
      }
      nodes.set(raw.id, {
        id: raw.id,
        x: raw.x,
        y: raw.y,
        metadata: { ...(raw.metadata ?? {}) },
      })
    }

    const usedKeys = new Map<string, Set<number>>()
    const edges: RoadEdge[] = []

    for (const raw of graph.edges) {
      const label = `${raw.from}->${raw.to}`
      if (!nodes.has(raw.from) || !nodes.has(raw.to)) {
        throw new Error(`Edge ${label} references an unknown node`)
      }
      if (!isNonNegativeNumber(raw.length)) {
        throw new Error(`Edge ${label} has an invalid length: ${raw.length}`)
      }
      if (!isNonNegativeNumber(raw.travelTime)) {
        throw new Error(`Edge ${label} has no valid travel time`)
      }

      const pair = `${raw.from}\u0000${raw.to}`
      let keys = usedKeys.get(pair)
      if (!keys) {
        keys = new Set()
        usedKeys.set(pair, keys)
      }
      let key = raw.key
      if (key === undefined) {
        key = 0
        while (keys.has(key)) key++
      } else if (keys.has(key)) {
        throw new Error(`Duplicate edge ${label} with key ${key}`)
      }
      keys.add(key)

      const attributes: Record<string, unknown> = { ...(raw.attributes ?? {}) }
      if (raw.highway !== undefined) attributes.highway = raw.highway
      if (raw.speedKph !== undefined) attributes.speedKph = raw.speedKph

      edges.push({
        from: raw.from,
        to: raw.to,
        key,
        length: raw.length,
        travelTime: raw.travelTime,
        cleanliness: "clean",
        attributes,
      })
    }

    return new RoadNetwork(nodes, edges)
  }

  get nodeCount(): number {
    return this.nodes.size
  }

  get edgeCount(): number {
    return this.edgeList.length
  }

  nodeIds(): NodeID[] {
    return Array.from(this.nodes.keys())
  }

  hasNode(id: NodeID): boolean {
    return this.nodes.has(id)
  }

  getNode(id: NodeID): RoadNode | undefined {
    return this.nodes.get(id)
  }

  /**
   * The lowest-keyed edge from `from` to `to`, if any.
   */
  getEdge(from: NodeID, to: NodeID): RoadEdge | undefined {
    return this.outgoing.get(from)?.find((edge) => edge.to === to)
  }

  hasEdge(from: NodeID, to: NodeID): boolean {
    return this.getEdge(from, to) !== undefined
  }

  outEdges(id: NodeID): readonly RoadEdge[] {
    return this.outgoing.get(id) ?? []
  }

  inEdges(id: NodeID): readonly RoadEdge[] {
    return this.incoming.get(id) ?? []
  }

  /**
   * Nodes adjacent to `id` ignoring direction, one entry per incident edge.
   */
  neighbors(id: NodeID): Neighbor[] {
    return [
      ...this.outEdges(id).map((edge) => ({ id: edge.to, length: edge.length })),
      ...this.inEdges(id).map((edge) => ({ id: edge.from, length: edge.length })),
    ]
  }

  edges(): readonly RoadEdge[] {
    return this.edgeList
  }

  /** Total length of dirty streets, in meters. */
  dirtyLength(): number {
    return this.edgeList.reduce(
      (sum, edge) => (edge.cleanliness === "dirty" ? sum + edge.length : sum),
      0
    )
  }

  isSealed(): boolean {
    return this.sealed
  }

  /** After sealing, no edge can be made dirty again. */
  seal(): void {
    this.sealed = true
  }

  markDirty(edge: RoadEdge): void {
    if (this.sealed) {
      throw new Error(`Cannot dirty ${edge.from}->${edge.to}: network is sealed`)
    }
    edge.cleanliness = "dirty"
  }

  /**
   * Mark an edge clean. Returns true only on a dirty -> clean transition.
   */
  markClean(edge: RoadEdge): boolean {
    if (edge.cleanliness === "clean") return false
    edge.cleanliness = "clean"
    return true
  }
}
