/**
 * Greedy Sweeper Policy
 *
 * Intent: clean whatever is in front of it.
 * - Cleans the longest dirty street leaving the current intersection
 * - Otherwise drives to the least-visited neighbour
 * - Backs up out of dead ends
 */

import type { Policy, SweeperObservation, SweeperAction } from "../types.js"
import { findLeastVisitedStreet, findLongestDirtyStreet } from "../observation.js"

export const greedySweeper: Policy = {
  id: "greedy",
  name: "Greedy Sweeper",

  decide(obs: SweeperObservation): SweeperAction {
    const dirty = findLongestDirtyStreet(obs)
    if (dirty) {
      return { type: "CleanAndMove", to: dirty.to }
    }

    const next = findLeastVisitedStreet(obs)
    if (next) {
      return { type: "Move", to: next.to }
    }

    return { type: "Backup", steps: 1 }
  },
}
