/**
 * Explorer Policy
 *
 * Baseline that never cleans: it wanders toward unvisited intersections so
 * the other policies have something to be compared against.
 */

import type { Policy, SweeperObservation, SweeperAction } from "../types.js"
import { findLeastVisitedStreet } from "../observation.js"

export const explorer: Policy = {
  id: "explorer",
  name: "Explorer",

  decide(obs: SweeperObservation): SweeperAction {
    const next = findLeastVisitedStreet(obs)
    return next ? { type: "Move", to: next.to } : { type: "Backup", steps: 1 }
  },
}
