/**
 * Single-Run Executor
 *
 * Executes a single policy run from start to termination.
 * The runner:
 * 1. Builds a fresh simulation from the map and seed
 * 2. Runs the policy decision loop over the partial view until termination
 * 3. Collects metrics throughout the run
 * 4. Returns structured results
 */

import type { NodeID } from "../types.js"
import type { PartialObservability } from "../observability.js"
import { WorldSimulation } from "../session/WorldSimulation.js"

import type { ActionRecord, RunConfig, RunResult, SweeperAction, TerminationReason } from "./types.js"
import { createRouteMemory, getObservation, recordArrival } from "./observation.js"
import {
  createStallDetector,
  createStallSnapshot,
  DEFAULT_STALL_WINDOW_SIZE,
} from "./stall-detection.js"
import { createMetricsCollector } from "./metrics.js"

/**
 * Apply a policy action through the partial view.
 * Returns the new location, or null if the simulation rejected it.
 */
export function applyAction(view: PartialObservability, action: SweeperAction): NodeID | null {
  switch (action.type) {
    case "Move":
      return view.moveTo(action.to)
    case "CleanAndMove":
      return view.cleanAndMoveTo(action.to)
    case "Backup":
      return view.backup(action.steps)
  }
}

/**
 * Run a single simulation with the given configuration.
 */
export function runSimulation(config: RunConfig): RunResult {
  const { seed, policy, graph, maxActions, onAction } = config
  const stallWindowSize = config.stallWindowSize ?? DEFAULT_STALL_WINDOW_SIZE
  const recordActions = config.recordActions ?? false

  // Initialize
  const simulation = WorldSimulation.fromNetwork(graph, {
    seed,
    initialBattery: config.initialBattery,
    backupCost: config.backupCost,
  })
  const view = simulation.partialView()
  const initialBattery = view.getBatteryLife()
  const memory = createRouteMemory(view.getCurrentLocationInfo().locationId)
  const stallDetector = createStallDetector(stallWindowSize)
  const metrics = createMetricsCollector()

  // Track last action for stall snapshot
  let lastAction: SweeperAction = { type: "Backup", steps: 0 }
  let actionCount = 0

  // Action log (only populated if recordActions is true)
  const actionLog: ActionRecord[] = []

  const finish = (reason: TerminationReason): RunResult => {
    const stallSnapshot =
      reason === "stall" ? createStallSnapshot(view, actionCount, lastAction) : undefined
    return {
      seed,
      policyId: policy.id,
      ...metrics.finalize(
        reason,
        view.getMetersCleaned(),
        view.getBatteryLife(),
        actionCount,
        stallSnapshot
      ),
      ...(recordActions ? { actionLog } : {}),
    }
  }

  // Main loop
  while (true) {
    // Check termination conditions (in priority order)
    if (view.getBatteryLife() <= 0) return finish("battery_depleted")
    if (actionCount >= maxActions) return finish("max_actions")
    if (stallDetector.isStalled()) return finish("stall")

    const observation = getObservation(view, memory, initialBattery)
    if (observation.outgoing.length === 0 && observation.routeDepth === 0) {
      return finish("stuck")
    }

    const action = policy.decide(observation)
    lastAction = action

    const batteryBefore = observation.batteryLife
    const metersBefore = observation.metersCleaned
    const location = applyAction(view, action)
    const success = location !== null
    if (location !== null) {
      recordArrival(memory, action, location)
    }

    const batterySpent = batteryBefore - view.getBatteryLife()
    const metersCleaned = view.getMetersCleaned() - metersBefore
    actionCount++

    metrics.recordAction(action, batterySpent, success)
    stallDetector.recordAction(metersCleaned)

    if (recordActions || onAction) {
      const record: ActionRecord = {
        index: actionCount,
        action,
        success,
        location: location ?? observation.location,
        batterySpent,
        metersCleaned,
        batteryAfter: view.getBatteryLife(),
      }
      if (recordActions) {
        actionLog.push(record)
      }
      onAction?.(record)
    }
  }
}
