/**
 * Policy Runner Public API
 *
 * A harness for running deterministic sweeping policies against the
 * simulation across many seeds. Use it for:
 * - Comparing strategies on the same map
 * - Monte Carlo analysis of meters cleaned and battery efficiency
 * - Catching stalls and dead ends
 */

// Core execution
export { runSimulation, applyAction } from "./runner.js"
export { runBatch, generateSeeds } from "./batch.js"

// Policies
export {
  greedySweeper,
  cautiousSweeper,
  explorer,
  allPolicies,
  getPolicyById,
} from "./policies/index.js"

// Observation
export {
  getObservation,
  createRouteMemory,
  recordArrival,
  findLongestDirtyStreet,
  findLeastVisitedStreet,
  getBatteryFraction,
} from "./observation.js"
export type { RouteMemory } from "./observation.js"

// Types
export type {
  Policy,
  SweeperObservation,
  SweeperAction,
  OutgoingStreet,
  RunConfig,
  BatchConfig,
  RunResult,
  BatchResult,
  PolicyAggregates,
  TerminationReason,
  BatterySpent,
  ActionRecord,
  StallSnapshot,
  StallDetector,
  MetricsCollector,
} from "./types.js"

// Utilities
export {
  createStallDetector,
  createStallSnapshot,
  DEFAULT_STALL_WINDOW_SIZE,
} from "./stall-detection.js"
export { createMetricsCollector, computeAggregates, computeAllAggregates } from "./metrics.js"
