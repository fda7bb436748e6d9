/**
 * Type definitions for the Policy Runner
 *
 * The policy runner sits above the simulation, executing deterministic policies
 * that make decisions based on what the partial view reveals. It never exposes
 * the road network or contamination to policies - only the SweeperObservation.
 */

import type { BackupCostMode, NodeID, RawRoadGraph } from "../types.js"

// ============================================================================
// Policy Observation Types
// ============================================================================

/**
 * A street leaving the current location, as seen from the agent's seat.
 */
export interface OutgoingStreet {
  to: NodeID
  length: number
  travelTime: number
  dirty: boolean
  visits: number // How many times the agent has arrived at `to`
}

/**
 * The policy's view of the world.
 * Built from the partial view plus the runner's memory of the agent's own route.
 */
export interface SweeperObservation {
  location: NodeID
  outgoing: OutgoingStreet[] // Parallel streets collapsed, sorted by destination
  batteryLife: number
  initialBattery: number
  metersCleaned: number
  routeDepth: number // Moves that could still be backed up over
  visitsHere: number
}

// ============================================================================
// Policy Action Types
// ============================================================================

export type SweeperAction =
  | { type: "Move"; to: NodeID }
  | { type: "CleanAndMove"; to: NodeID }
  | { type: "Backup"; steps: number }

// ============================================================================
// Policy Interface
// ============================================================================

/**
 * A policy is a deterministic function that decides actions based on observations.
 * Policies must be pure functions - no side effects, no learning, no RNG.
 */
export interface Policy {
  id: string
  name: string
  decide: (observation: SweeperObservation) => SweeperAction
}

// ============================================================================
// Stall Detection Types
// ============================================================================

/**
 * Snapshot of the agent when a stall is detected.
 */
export interface StallSnapshot {
  actionCount: number
  location: NodeID
  batteryLife: number
  metersCleaned: number
  lastAction: SweeperAction
}

/**
 * Tracks meters cleaned over a rolling window of actions.
 */
export interface StallDetector {
  recordAction(metersCleaned: number): void
  isStalled(): boolean
  reset(): void
}

// ============================================================================
// Run Configuration and Results
// ============================================================================

export interface RunConfig {
  seed: string
  policy: Policy
  graph: RawRoadGraph // Prepared: every edge has a travel time
  maxActions: number
  stallWindowSize?: number // Default 500
  initialBattery?: number
  backupCost?: BackupCostMode
  recordActions?: boolean // If true, include action log in result
  onAction?: (record: ActionRecord) => void // Called after each action for streaming output
}

/**
 * Battery spent by action type.
 */
export interface BatterySpent {
  moving: number
  cleaning: number
  backingUp: number
}

/**
 * - battery_depleted: battery at or below zero (the engine lets it go negative)
 * - max_actions: action limit reached
 * - stall: nothing cleaned for a whole stall window
 * - stuck: dead end with nothing to back up over
 */
export type TerminationReason = "battery_depleted" | "max_actions" | "stall" | "stuck"

/**
 * Record of a single action taken during simulation.
 */
export interface ActionRecord {
  index: number
  action: SweeperAction
  success: boolean
  location: NodeID // After the action
  batterySpent: number
  metersCleaned: number // Gained by this action
  batteryAfter: number
}

export interface RunResult {
  seed: string
  policyId: string

  terminationReason: TerminationReason
  actionCount: number
  invalidActions: number

  metersCleaned: number
  batteryUsed: number
  batteryRemaining: number
  batterySpent: BatterySpent
  efficiency: number // Meters cleaned per unit of battery used

  actionLog?: ActionRecord[]
  stallSnapshot?: StallSnapshot
}

// ============================================================================
// Batch Configuration and Results
// ============================================================================

export interface BatchConfig {
  graph: RawRoadGraph
  seeds?: string[] // Explicit seeds
  seedCount?: number // Or generate this many (default 100)
  policies: Policy[]
  maxActions: number
  stallWindowSize?: number
  initialBattery?: number
  backupCost?: BackupCostMode
  onProgress?: () => void // Called after each simulation completes
}

export type TerminationCounts = Partial<Record<TerminationReason, number>>

/**
 * Aggregated statistics for a policy across multiple runs.
 */
export interface PolicyAggregates {
  policyId: string
  runCount: number
  terminationCounts: TerminationCounts
  metersCleaned: {
    p10: number
    p50: number
    p90: number
  }
  meanEfficiency: number
  meanInvalidActions: number
}

export interface BatchResult {
  results: RunResult[]
  aggregates: {
    byPolicy: Record<string, PolicyAggregates>
  }
}

// ============================================================================
// Metrics Collector Interface
// ============================================================================

export interface MetricsCollector {
  recordAction(action: SweeperAction, batterySpent: number, success: boolean): void
  finalize(
    terminationReason: TerminationReason,
    metersCleaned: number,
    batteryRemaining: number,
    actionCount: number,
    stallSnapshot?: StallSnapshot
  ): Omit<RunResult, "seed" | "policyId" | "actionLog">
}
