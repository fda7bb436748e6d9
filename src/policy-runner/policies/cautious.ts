/**
 * Cautious Sweeper Policy
 *
 * Intent: sweep like greedy while the battery is healthy, then head home.
 * - Below the reserve fraction it stops cleaning and backs up along its route
 * - Never starts a clean it cannot pay for without dipping into the reserve
 * - Once home on reserve power, it only drives (no cleaning)
 */

import type { Policy, SweeperObservation, SweeperAction } from "../types.js"
import { CLEANING_SURCHARGE } from "../../engine.js"
import { findLeastVisitedStreet, findLongestDirtyStreet, getBatteryFraction } from "../observation.js"

/** Fraction of the starting battery kept back for the trip home. */
export const RESERVE_FRACTION = 0.25

export const cautiousSweeper: Policy = {
  id: "cautious",
  name: "Cautious Sweeper",

  decide(obs: SweeperObservation): SweeperAction {
    const onReserve = getBatteryFraction(obs) < RESERVE_FRACTION

    // 1. Head home on reserve power
    if (onReserve && obs.routeDepth > 0) {
      return { type: "Backup", steps: 1 }
    }

    // 2. Clean if it leaves the reserve intact
    const dirty = onReserve ? null : findLongestDirtyStreet(obs)
    if (dirty) {
      const cost = (CLEANING_SURCHARGE + 1) * dirty.travelTime
      const reserve = RESERVE_FRACTION * obs.initialBattery
      if (obs.batteryLife - cost >= reserve) {
        return { type: "CleanAndMove", to: dirty.to }
      }
    }

    // 3. Otherwise explore like greedy
    const next = findLeastVisitedStreet(obs)
    if (next) {
      return { type: "Move", to: next.to }
    }

    return { type: "Backup", steps: 1 }
  },
}
