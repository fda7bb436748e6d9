/**
 * Small hand-built worlds for tests.
 */

import type { NodeID, RawRoadEdge, RawRoadGraph, BackupCostMode } from "./types.js"
import { RoadNetwork } from "./roadNetwork.js"
import { createRng } from "./rng.js"
import type { WorldState } from "./world.js"

export function edge(
  from: NodeID,
  to: NodeID,
  length: number,
  travelTime: number,
  extra: Partial<RawRoadEdge> = {}
): RawRoadEdge {
  return { from, to, length, travelTime, ...extra }
}

export function graphOf(nodeIds: NodeID[], edges: RawRoadEdge[], place = "Test Town"): RawRoadGraph {
  return {
    place,
    nodes: nodeIds.map((id, i) => ({ id, x: i, y: 0, metadata: { street_count: 2 } })),
    edges,
  }
}

/**
 * O -> A (100 m, 10 s), A -> B (50 m, 5 s), with the reverse streets
 * A -> O (10 s) and, unless `withBA` is false, B -> A (5 s).
 */
export function scenarioGraph(withBA = true): RawRoadGraph {
  const edges = [edge("O", "A", 100, 10), edge("A", "O", 100, 10), edge("A", "B", 50, 5)]
  if (withBA) edges.push(edge("B", "A", 50, 5))
  return graphOf(["O", "A", "B"], edges)
}

/**
 * Bidirectional grid of `width` x `height` intersections `spacing` meters apart.
 * Node ids are "r<row>c<col>". Travel time is length / 10.
 */
export function gridGraph(width: number, height: number, spacing = 100): RawRoadGraph {
  const nodes: RawRoadGraph["nodes"] = []
  const edges: RawRoadEdge[] = []
  const id = (r: number, c: number) => `r${r}c${c}`

  for (let r = 0; r < height; r++) {
    for (let c = 0; c < width; c++) {
      nodes.push({ id: id(r, c), x: c * spacing, y: r * spacing })
      if (c + 1 < width) {
        edges.push(edge(id(r, c), id(r, c + 1), spacing, spacing / 10))
        edges.push(edge(id(r, c + 1), id(r, c), spacing, spacing / 10))
      }
      if (r + 1 < height) {
        edges.push(edge(id(r, c), id(r + 1, c), spacing, spacing / 10))
        edges.push(edge(id(r + 1, c), id(r, c), spacing, spacing / 10))
      }
    }
  }

  return { place: "Grid Town", nodes, edges }
}

export interface TestWorldOptions {
  start: NodeID
  dirty?: Array<[NodeID, NodeID]>
  battery?: number
  backupCost?: BackupCostMode
}

/**
 * A world with hand-picked dirty streets and start node, bypassing random
 * contamination so expected values can be worked out by hand.
 */
export function buildTestWorld(graph: RawRoadGraph, options: TestWorldOptions): WorldState {
  const network = RoadNetwork.build(graph)
  for (const [from, to] of options.dirty ?? []) {
    const target = network.getEdge(from, to)
    if (!target) throw new Error(`No edge ${from}->${to} in test graph`)
    network.markDirty(target)
  }
  network.seal()

  return {
    place: graph.place,
    seed: "test-seed",
    rng: createRng("test-seed"),
    network,
    regions: [],
    agent: {
      location: options.start,
      route: [options.start],
      batteryLife: options.battery ?? 1000,
      metersCleaned: 0,
    },
    backupCost: options.backupCost ?? "charge",
  }
}
