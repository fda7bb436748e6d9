/**
 * Batch Executor (Monte Carlo Harness)
 *
 * Runs multiple simulations across different seeds and policies over one map,
 * then aggregates results for analysis.
 */

import type { BatchConfig, BatchResult, RunResult } from "./types.js"
import { runSimulation } from "./runner.js"
import { computeAllAggregates } from "./metrics.js"

/**
 * Generate deterministic seed strings.
 */
export function generateSeeds(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `seed-${i}`)
}

/**
 * Run batch simulations across multiple seeds and policies.
 */
export function runBatch(config: BatchConfig): BatchResult {
  const seeds = config.seeds ?? generateSeeds(config.seedCount ?? 100)
  const results: RunResult[] = []

  // Run each seed with each policy
  for (const seed of seeds) {
    for (const policy of config.policies) {
      const result = runSimulation({
        seed,
        policy,
        graph: config.graph,
        maxActions: config.maxActions,
        stallWindowSize: config.stallWindowSize,
        initialBattery: config.initialBattery,
        backupCost: config.backupCost,
      })
      results.push(result)
      config.onProgress?.()
    }
  }

  const policyIds = config.policies.map((p) => p.id)
  const aggregates = computeAllAggregates(results, policyIds)

  return {
    results,
    aggregates: {
      byPolicy: aggregates,
    },
  }
}
