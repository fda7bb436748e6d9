/**
 * Contamination generation
 *
 * Marks a sparse set of contiguous dirty patches on a freshly built network.
 * Runs once per world; the network is sealed afterwards so nothing can be
 * dirtied again.
 */

import type { ContaminationRegion, RngState } from "./types.js"
import type { RoadNetwork } from "./roadNetwork.js"
import { boundedNeighborhood } from "./pathfinding.js"
import { pickOne, rollInt } from "./rng.js"

/** Region count bounds, as fractions of the node count. */
export const MIN_REGION_FRACTION = 0.002
export const MAX_REGION_FRACTION = 0.005

export const MIN_REGION_RADIUS = 1
export const MAX_REGION_RADIUS = 2000

/**
 * Inclusive bounds on how many regions a network of `nodeCount` nodes gets.
 * Never below one, even on tiny maps.
 */
export function regionCountRange(nodeCount: number): { min: number; max: number } {
  return {
    min: Math.max(Math.floor(nodeCount * MIN_REGION_FRACTION), 1),
    max: Math.max(Math.floor(nodeCount * MAX_REGION_FRACTION), 1),
  }
}

/**
 * Dirty every edge whose endpoints both lie within `radius` meters
 * (undirected, by length) of `center`. Overlaps are harmless.
 */
export function contaminateRegion(network: RoadNetwork, region: ContaminationRegion): void {
  const reachable = boundedNeighborhood(network, region.center, region.radius)
  for (const id of reachable) {
    for (const edge of network.outEdges(id)) {
      if (reachable.has(edge.to)) {
        network.markDirty(edge)
      }
    }
  }
}

/**
 * Generate contamination regions, dirty their edges, then seal the network.
 */
export function generateContamination(
  network: RoadNetwork,
  rng: RngState
): ContaminationRegion[] {
  if (network.nodeCount === 0) {
    throw new Error("Cannot contaminate an empty road network")
  }

  const nodeIds = network.nodeIds()
  const { min, max } = regionCountRange(nodeIds.length)
  const regionCount = rollInt(rng, min, max)

  const regions: ContaminationRegion[] = []
  for (let i = 0; i < regionCount; i++) {
    const region: ContaminationRegion = {
      center: pickOne(rng, nodeIds),
      radius: rollInt(rng, MIN_REGION_RADIUS, MAX_REGION_RADIUS),
    }
    contaminateRegion(network, region)
    regions.push(region)
  }

  network.seal()
  return regions
}
