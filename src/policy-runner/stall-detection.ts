/**
 * Stall Detection
 *
 * Implements a rolling window stall detector that monitors progress
 * (meters cleaned) and triggers if nothing is cleaned within the window.
 */

import type { StallDetector, StallSnapshot, SweeperAction } from "./types.js"
import type { PartialObservability } from "../observability.js"

/**
 * Default stall window size in actions.
 */
export const DEFAULT_STALL_WINDOW_SIZE = 500

/**
 * Create a new stall detector with the specified window size.
 *
 * @param windowSize Number of actions without cleaning before stall triggers
 */
export function createStallDetector(windowSize: number = DEFAULT_STALL_WINDOW_SIZE): StallDetector {
  let actionsWithoutProgress = 0

  return {
    recordAction(metersCleaned: number): void {
      if (metersCleaned > 0) {
        actionsWithoutProgress = 0
      } else {
        actionsWithoutProgress++
      }
    },

    isStalled(): boolean {
      return actionsWithoutProgress >= windowSize
    },

    reset(): void {
      actionsWithoutProgress = 0
    },
  }
}

/**
 * Capture where the agent was when a stall was detected.
 */
export function createStallSnapshot(
  view: PartialObservability,
  actionCount: number,
  lastAction: SweeperAction
): StallSnapshot {
  return {
    actionCount,
    location: view.getCurrentLocationInfo().locationId,
    batteryLife: view.getBatteryLife(),
    metersCleaned: view.getMetersCleaned(),
    lastAction,
  }
}
