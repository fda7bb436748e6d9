#!/usr/bin/env node

/**
 * Policy Runner CLI
 *
 * Run deterministic sweeping policies from the command line.
 */

import "dotenv/config"
import { runSimulation } from "./runner.js"
import { runBatch } from "./batch.js"
import { allPolicies, getPolicyById } from "./policies/index.js"
import type { ActionRecord, Policy, RunResult, SweeperAction } from "./types.js"
import type { RawRoadGraph } from "../types.js"
import { FileNetworkProvider, loadPreparedNetwork } from "../networkProvider.js"
import { getDefaultPlace, getFallbackSpeedKph } from "../config.js"
import { formatDuration as formatBattery, formatMeters } from "../utils.js"

export interface CliArgs {
  seed: string | undefined
  seeds: string[] | undefined
  seedCount: number | undefined
  policy: string
  place: string | undefined
  maxActions: number
  stallWindowSize: number | undefined
  batch: boolean
  verbose: boolean
  logActions: boolean
  help: boolean
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[] = process.argv.slice(2)): CliArgs {
  const parsed: CliArgs = {
    seed: undefined,
    seeds: undefined,
    seedCount: undefined,
    policy: "greedy",
    place: undefined,
    maxActions: 10000,
    stallWindowSize: undefined,
    batch: false,
    verbose: false,
    logActions: false,
    help: false,
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    const next = (): string => args[++i] ?? ""

    if (arg === "--help" || arg === "-h") {
      parsed.help = true
    } else if (arg === "--seed" || arg === "-s") {
      parsed.seed = next()
    } else if (arg === "--seeds") {
      parsed.seeds = next()
        .split(",")
        .filter((s) => s.length > 0)
    } else if (arg === "--seed-count" || arg === "-n") {
      parsed.seedCount = parseInt(next(), 10)
    } else if (arg === "--policy" || arg === "-p") {
      parsed.policy = next()
    } else if (arg === "--place") {
      parsed.place = next()
    } else if (arg === "--max-actions" || arg === "-m") {
      parsed.maxActions = parseInt(next(), 10)
    } else if (arg === "--stall-window") {
      parsed.stallWindowSize = parseInt(next(), 10)
    } else if (arg === "--batch" || arg === "-b") {
      parsed.batch = true
    } else if (arg === "--verbose" || arg === "-v") {
      parsed.verbose = true
    } else if (arg === "--log-actions") {
      parsed.logActions = true
    }
  }

  return parsed
}

/**
 * Print usage information
 */
function printHelp(): void {
  console.log(`
Policy Runner CLI - Run deterministic street-sweeping policies

USAGE:
  npx tsx src/policy-runner/cli.ts [options]

OPTIONS:
  -s, --seed <seed>        Single seed for reproducible run
  --seeds <s1,s2,...>      Comma-separated list of seeds for batch
  -n, --seed-count <n>     Generate N seeds for batch (default: 100)
  -p, --policy <name>      Policy to use: ${allPolicies.map((p) => p.id).join(", ")} (default: greedy)
  --place <name>           Place to load from the maps directory (default: ${getDefaultPlace()})
  -m, --max-actions <n>    Maximum actions before stopping (default: 10000)
  --stall-window <n>       Actions without cleaning before stall (default: 500)
  -b, --batch              Run batch mode (multiple seeds)
  -v, --verbose            Show per-policy seed lists in batch mode
  --log-actions            Stream every action (single run only)
  -h, --help               Show this help message

EXAMPLES:
  # Single run on the bundled sample map
  npx tsx src/policy-runner/cli.ts --place "Sample Town" --seed test-1 --policy cautious

  # Batch run comparing all policies
  npx tsx src/policy-runner/cli.ts --place "Sample Town" --batch --seed-count 20 --policy all

POLICIES:
  greedy    - Cleans the longest dirty street in reach, else explores
  cautious  - Greedy with a battery reserve; backs up toward home when low
  explorer  - Never cleans; a baseline for comparison
  all       - Run all policies (batch mode only)
`)
}

/**
 * Format wall-clock duration in human-readable form
 */
export function formatElapsed(ms: number): string {
  if (ms < 1000) return `${ms}ms`
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`
  return `${(ms / 60000).toFixed(1)}m`
}

/**
 * Format a sweeper action for display
 */
export function formatSweeperAction(action: SweeperAction): string {
  switch (action.type) {
    case "Move":
      return `Move(${action.to})`
    case "CleanAndMove":
      return `CleanAndMove(${action.to})`
    case "Backup":
      return `Backup(${action.steps})`
  }
}

/**
 * One line of the action log
 */
export function formatActionRecord(record: ActionRecord): string {
  const status = record.success ? "" : " [REJECTED]"
  const spent = String(record.batterySpent).padStart(6)
  const cleaned = String(record.metersCleaned).padStart(8)
  return `${String(record.index).padStart(5)}\t${spent}\t${cleaned}\t${formatSweeperAction(record.action)}${status}`
}

function percentOf(part: number, whole: number): string {
  return whole > 0 ? ((part / whole) * 100).toFixed(1) : "0.0"
}

/**
 * Print single run result
 */
function printResult(result: RunResult): void {
  console.log()
  console.log("=".repeat(60))
  console.log("RUN RESULT")
  console.log("=".repeat(60))
  console.log()
  console.log(`Seed: ${result.seed}`)
  console.log(`Policy: ${result.policyId}`)
  console.log(`Termination: ${result.terminationReason}`)
  console.log(`Actions: ${result.actionCount} (${result.invalidActions} rejected)`)
  console.log(`Cleaned: ${formatMeters(result.metersCleaned)}`)
  console.log(`Battery Left: ${formatBattery(result.batteryRemaining)}`)
  console.log(`Efficiency: ${result.efficiency.toFixed(3)} m/s`)
  console.log()

  const { moving, cleaning, backingUp } = result.batterySpent
  console.log("Battery Breakdown:")
  console.log(`  Moving: ${formatBattery(moving)} (${percentOf(moving, result.batteryUsed)}%)`)
  console.log(`  Cleaning: ${formatBattery(cleaning)} (${percentOf(cleaning, result.batteryUsed)}%)`)
  console.log(
    `  Backing up: ${formatBattery(backingUp)} (${percentOf(backingUp, result.batteryUsed)}%)`
  )

  if (result.stallSnapshot) {
    console.log()
    console.log("Stall Details:")
    console.log(`  Action: ${result.stallSnapshot.actionCount}`)
    console.log(`  Location: ${result.stallSnapshot.location}`)
    console.log(`  Battery: ${formatBattery(result.stallSnapshot.batteryLife)}`)
    console.log(`  Last Action: ${formatSweeperAction(result.stallSnapshot.lastAction)}`)
  }
}

/**
 * Load the map once; every run rebuilds its own world from it.
 */
async function loadGraph(args: CliArgs): Promise<RawRoadGraph> {
  const place = args.place ?? getDefaultPlace()
  return loadPreparedNetwork(new FileNetworkProvider(), place, getFallbackSpeedKph())
}

/**
 * Run a single simulation
 */
async function runSingle(args: CliArgs, seed: string): Promise<void> {
  const policy = getPolicyById(args.policy)
  if (!policy) {
    console.error(`Unknown policy: ${args.policy}`)
    console.error(`Available policies: ${allPolicies.map((p) => p.id).join(", ")}`)
    process.exit(1)
  }

  const graph = await loadGraph(args)

  console.log("=".repeat(60))
  console.log("POLICY RUNNER - Single Run")
  console.log("=".repeat(60))
  console.log()
  console.log(`Place: ${graph.place} (${graph.nodes.length} intersections, ${graph.edges.length} streets)`)
  console.log(`Seed: ${seed}`)
  console.log(`Policy: ${policy.id}`)
  console.log(`Max Actions: ${args.maxActions}`)
  console.log()

  if (args.logActions) {
    console.log("#\tSpent\tCleaned\tAction")
    console.log("-".repeat(60))
  }

  const startTime = Date.now()

  const result = runSimulation({
    seed,
    policy,
    graph,
    maxActions: args.maxActions,
    stallWindowSize: args.stallWindowSize,
    onAction: args.logActions ? (record) => console.log(formatActionRecord(record)) : undefined,
  })

  printResult(result)
  console.log()
  console.log(`Completed in ${formatElapsed(Date.now() - startTime)}`)
}

/**
 * Run batch simulations
 */
async function runBatchMode(args: CliArgs): Promise<void> {
  const selected = args.policy === "all" ? allPolicies : [getPolicyById(args.policy)]
  const policies = selected.filter((p): p is Policy => p !== undefined)

  if (policies.length === 0) {
    console.error(`Unknown policy: ${args.policy}`)
    console.error(`Available policies: ${allPolicies.map((p) => p.id).join(", ")}, all`)
    process.exit(1)
  }

  const graph = await loadGraph(args)
  const seedCount = args.seedCount ?? (args.seeds ? undefined : 100)

  console.log("=".repeat(60))
  console.log("POLICY RUNNER - Batch Mode")
  console.log("=".repeat(60))
  console.log()
  console.log(`Place: ${graph.place}`)
  console.log(`Policies: ${policies.map((p) => p.id).join(", ")}`)
  console.log(`Seeds: ${args.seeds ? args.seeds.length : seedCount}`)
  console.log(`Max Actions: ${args.maxActions}`)
  console.log()

  const startTime = Date.now()

  process.stdout.write("Running simulations")

  const result = runBatch({
    graph,
    seeds: args.seeds,
    seedCount,
    policies,
    maxActions: args.maxActions,
    stallWindowSize: args.stallWindowSize,
    onProgress: () => process.stdout.write("."),
  })

  console.log()
  console.log("=".repeat(60))
  console.log("BATCH RESULTS")
  console.log("=".repeat(60))
  console.log()
  console.log(`Total Runs: ${result.results.length}`)
  console.log(`Completed in ${formatElapsed(Date.now() - startTime)}`)
  console.log()

  for (const [policyId, agg] of Object.entries(result.aggregates.byPolicy)) {
    const { p10, p50, p90 } = agg.metersCleaned
    console.log(`Policy: ${policyId}`)
    console.log(`  Runs: ${agg.runCount}`)
    console.log(
      `  Cleaned (p10/p50/p90): ${formatMeters(p10)} / ${formatMeters(p50)} / ${formatMeters(p90)}`
    )
    console.log(`  Mean Efficiency: ${agg.meanEfficiency.toFixed(3)} m/s`)
    console.log(`  Mean Rejected Actions: ${agg.meanInvalidActions.toFixed(1)}`)

    const terminations = Object.entries(agg.terminationCounts)
      .map(([reason, count]) => `${reason} ${count}`)
      .join(", ")
    console.log(`  Terminations: ${terminations}`)

    if (args.verbose) {
      for (const reason of Object.keys(agg.terminationCounts)) {
        const seeds = result.results
          .filter((r) => r.policyId === policyId && r.terminationReason === reason)
          .map((r) => r.seed)
        console.log(`  ${reason} seeds: ${seeds.join(", ")}`)
      }
    }
    console.log()
  }

  if (policies.length > 1) {
    console.log("=".repeat(60))
    console.log("POLICY COMPARISON (by median meters cleaned)")
    console.log("=".repeat(60))
    console.log()

    const sorted = Object.values(result.aggregates.byPolicy).sort(
      (a, b) => b.metersCleaned.p50 - a.metersCleaned.p50
    )
    sorted.forEach((agg, i) => {
      console.log(
        `${i + 1}. ${agg.policyId}: ${formatMeters(agg.metersCleaned.p50)} (${agg.meanEfficiency.toFixed(3)} m/s)`
      )
    })
  }
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const args = parseArgs()

  if (args.help) {
    printHelp()
    process.exit(0)
  }

  if (args.batch || args.seeds || args.seedCount) {
    await runBatchMode(args)
  } else if (args.seed) {
    await runSingle(args, args.seed)
  } else {
    console.error("Error: --seed is required for single run, or use --batch for batch mode")
    console.error("Use --help for usage information")
    process.exit(1)
  }
}

// Run only when executed directly (not when imported for testing)
if (require.main === module) {
  main().catch((error) => {
    console.error("Fatal error:", error instanceof Error ? error.message : error)
    process.exit(1)
  })
}
