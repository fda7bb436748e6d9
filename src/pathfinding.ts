/**
 * Graph searches over a RoadNetwork.
 *
 * - boundedNeighborhood: undirected, length-weighted Dijkstra capped at a radius.
 *   Contamination uses it so a dirty patch follows spatial proximity rather
 *   than one-way street direction.
 * - shortestPath: directed Dijkstra for route-planning callers. The engine's
 *   own movement never uses it.
 */

import type { NodeID, RoadEdge } from "./types.js"
import type { RoadNetwork } from "./roadNetwork.js"

interface HeapEntry {
  id: NodeID
  distance: number
}

/**
 * Binary min-heap keyed on distance. Ties are broken by node id so that
 * expansion order (and therefore every result) is deterministic.
 */
export class MinHeap {
  private items: HeapEntry[] = []

  get size(): number {
    return this.items.length
  }

  push(entry: HeapEntry): void {
    this.items.push(entry)
    this.siftUp(this.items.length - 1)
  }

  pop(): HeapEntry | undefined {
    const top = this.items[0]
    const last = this.items.pop()
    if (this.items.length > 0 && last !== undefined) {
      this.items[0] = last
      this.siftDown(0)
    }
    return top
  }

  private less(a: HeapEntry, b: HeapEntry): boolean {
    if (a.distance !== b.distance) return a.distance < b.distance
    return a.id < b.id
  }

  private siftUp(index: number): void {
    let i = index
    while (i > 0) {
      const parent = (i - 1) >> 1
      if (!this.less(this.items[i], this.items[parent])) break
      ;[this.items[i], this.items[parent]] = [this.items[parent], this.items[i]]
      i = parent
    }
  }

  private siftDown(index: number): void {
    let i = index
    const n = this.items.length
    while (true) {
      const left = 2 * i + 1
      const right = left + 1
      let smallest = i
      if (left < n && this.less(this.items[left], this.items[smallest])) smallest = left
      if (right < n && this.less(this.items[right], this.items[smallest])) smallest = right
      if (smallest === i) return
      ;[this.items[i], this.items[smallest]] = [this.items[smallest], this.items[i]]
      i = smallest
    }
  }
}

/**
 * Ids of every node whose undirected shortest distance (by length) from
 * `center` is at most `radius`. The center itself is always included.
 */
export function boundedNeighborhood(
  network: RoadNetwork,
  center: NodeID,
  radius: number
): Set<NodeID> {
  if (!network.hasNode(center)) {
    throw new Error(`Unknown center node '${center}'`)
  }

  const settled = new Set<NodeID>()
  const best = new Map<NodeID, number>([[center, 0]])
  const heap = new MinHeap()
  heap.push({ id: center, distance: 0 })

  const relax = (id: NodeID, distance: number): void => {
    if (distance > radius || settled.has(id)) return
    const known = best.get(id)
    if (known === undefined || distance < known) {
      best.set(id, distance)
      heap.push({ id, distance })
    }
  }

  while (heap.size > 0) {
    const entry = heap.pop()
    if (!entry || settled.has(entry.id)) continue
    settled.add(entry.id)

    for (const neighbor of network.neighbors(entry.id)) {
      relax(neighbor.id, entry.distance + neighbor.length)
    }
  }

  return settled
}

export type PathWeight = "length" | "travelTime"

/**
 * Directed shortest path from `from` to `to`, inclusive of both ends.
 * Returns null when `to` is unreachable.
 */
export function shortestPath(
  network: RoadNetwork,
  from: NodeID,
  to: NodeID,
  weight: PathWeight = "travelTime"
): NodeID[] | null {
  if (!network.hasNode(from) || !network.hasNode(to)) return null

  const best = new Map<NodeID, number>([[from, 0]])
  const previous = new Map<NodeID, NodeID>()
  const settled = new Set<NodeID>()
  const heap = new MinHeap()
  heap.push({ id: from, distance: 0 })

  while (heap.size > 0) {
    const entry = heap.pop()
    if (!entry || settled.has(entry.id)) continue
    settled.add(entry.id)
    if (entry.id === to) break

    for (const edge of network.outEdges(entry.id)) {
      const distance = entry.distance + edgeWeight(edge, weight)
      const known = best.get(edge.to)
      if (known === undefined || distance < known) {
        best.set(edge.to, distance)
        previous.set(edge.to, entry.id)
        heap.push({ id: edge.to, distance })
      }
    }
  }

  if (!settled.has(to)) return null

  const path: NodeID[] = [to]
  let cursor = to
  while (cursor !== from) {
    const prev = previous.get(cursor)
    if (prev === undefined) return null
    path.push(prev)
    cursor = prev
  }
  return path.reverse()
}

function edgeWeight(edge: RoadEdge, weight: PathWeight): number {
  return weight === "length" ? edge.length : edge.travelTime
}
