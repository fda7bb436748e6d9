/**
 * Metrics Collection and Aggregation
 *
 * Provides utilities for tracking simulation metrics during a run
 * and aggregating results across multiple runs.
 */

import type {
  BatterySpent,
  MetricsCollector,
  PolicyAggregates,
  RunResult,
  StallSnapshot,
  SweeperAction,
  TerminationCounts,
  TerminationReason,
} from "./types.js"

/**
 * Create a new metrics collector for a simulation run.
 */
export function createMetricsCollector(): MetricsCollector {
  const batterySpent: BatterySpent = {
    moving: 0,
    cleaning: 0,
    backingUp: 0,
  }
  let invalidActions = 0

  return {
    recordAction(action: SweeperAction, spent: number, success: boolean): void {
      if (!success) {
        invalidActions++
        return
      }
      switch (action.type) {
        case "Move":
          batterySpent.moving += spent
          break
        case "CleanAndMove":
          batterySpent.cleaning += spent
          break
        case "Backup":
          batterySpent.backingUp += spent
          break
      }
    },

    finalize(
      terminationReason: TerminationReason,
      metersCleaned: number,
      batteryRemaining: number,
      actionCount: number,
      stallSnapshot?: StallSnapshot
    ): Omit<RunResult, "seed" | "policyId" | "actionLog"> {
      const batteryUsed = batterySpent.moving + batterySpent.cleaning + batterySpent.backingUp
      return {
        terminationReason,
        actionCount,
        invalidActions,
        metersCleaned,
        batteryUsed,
        batteryRemaining,
        batterySpent: { ...batterySpent },
        efficiency: batteryUsed > 0 ? metersCleaned / batteryUsed : 0,
        stallSnapshot,
      }
    },
  }
}

/**
 * Calculate percentile from a sorted array of numbers.
 */
export function percentile(sortedValues: number[], p: number): number {
  if (sortedValues.length === 0) return 0
  const index = Math.ceil(p * sortedValues.length) - 1
  return sortedValues[Math.max(0, Math.min(index, sortedValues.length - 1))]
}

/**
 * Compute aggregated statistics for a set of run results.
 */
export function computeAggregates(results: RunResult[], policyId: string): PolicyAggregates {
  const policyResults = results.filter((r) => r.policyId === policyId)

  if (policyResults.length === 0) {
    return {
      policyId,
      runCount: 0,
      terminationCounts: {},
      metersCleaned: { p10: 0, p50: 0, p90: 0 },
      meanEfficiency: 0,
      meanInvalidActions: 0,
    }
  }

  const terminationCounts: TerminationCounts = {}
  for (const result of policyResults) {
    terminationCounts[result.terminationReason] =
      (terminationCounts[result.terminationReason] ?? 0) + 1
  }

  const sortedMeters = policyResults.map((r) => r.metersCleaned).sort((a, b) => a - b)
  const runCount = policyResults.length

  return {
    policyId,
    runCount,
    terminationCounts,
    metersCleaned: {
      p10: percentile(sortedMeters, 0.1),
      p50: percentile(sortedMeters, 0.5),
      p90: percentile(sortedMeters, 0.9),
    },
    meanEfficiency: policyResults.reduce((sum, r) => sum + r.efficiency, 0) / runCount,
    meanInvalidActions: policyResults.reduce((sum, r) => sum + r.invalidActions, 0) / runCount,
  }
}

/**
 * Compute aggregates for all policies in a batch result.
 */
export function computeAllAggregates(
  results: RunResult[],
  policyIds: string[]
): Record<string, PolicyAggregates> {
  const aggregates: Record<string, PolicyAggregates> = {}

  for (const policyId of policyIds) {
    aggregates[policyId] = computeAggregates(results, policyId)
  }

  return aggregates
}
