#!/usr/bin/env node

import "dotenv/config"
import { createAgentLoop } from "./loop.js"
import { formatAction } from "./formatters.js"
import { DEFAULT_MODEL } from "./config.js"
import { WorldSimulation } from "../session/WorldSimulation.js"
import { FileNetworkProvider } from "../networkProvider.js"
import { getDefaultPlace } from "../config.js"
import { formatDuration, formatMeters } from "../utils.js"

export interface AgentCliArgs {
  seed: string
  place: string | undefined
  actions: number
  objective: string
  model: string | undefined
  dryRun: boolean
  verbose: boolean
  help: boolean
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[] = process.argv.slice(2)): AgentCliArgs {
  const parsed: AgentCliArgs = {
    seed: "",
    place: undefined,
    actions: 50,
    objective: "clean as many meters of dirty street as you can before the battery runs out",
    model: undefined,
    dryRun: false,
    verbose: false,
    help: false,
  }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    const next = (): string => args[++i] ?? ""

    if (arg === "--help" || arg === "-h") {
      parsed.help = true
    } else if (arg === "--actions" || arg === "-a") {
      parsed.actions = parseInt(next(), 10)
    } else if (arg === "--place") {
      parsed.place = next()
    } else if (arg === "--objective" || arg === "-o") {
      parsed.objective = next()
    } else if (arg === "--model" || arg === "-m") {
      parsed.model = next()
    } else if (arg === "--dry-run") {
      parsed.dryRun = true
    } else if (arg === "--verbose" || arg === "-v") {
      parsed.verbose = true
    } else if (!arg.startsWith("-") && !parsed.seed) {
      parsed.seed = arg
    }
  }

  return parsed
}

/**
 * Print usage information
 */
function printHelp(): void {
  console.log(`
LLM Agent Runner - Drive the street sweeper with an AI agent

USAGE:
  npm run agent <seed> [options]

ARGUMENTS:
  seed                  Required. Seed for contamination and start position.

OPTIONS:
  --place <name>        Place to load from the maps directory (default: ${getDefaultPlace()})
  -a, --actions <n>     Maximum turns (default: 50)
  -o, --objective <s>   Goal for the agent
  -m, --model <s>       LLM model to use (default: ${DEFAULT_MODEL})
  --dry-run             Never call the LLM; the greedy policy answers instead
  -v, --verbose         Show reasoning and results for every action
  -h, --help            Show this help message

EXAMPLES:
  npm run agent test-seed-1 -- --place "Sample Town" --dry-run
  npm run agent test-seed-1 -- --place "Sample Town" --actions 20 --verbose
`)
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

  if (!args.seed) {
    console.error("Error: seed is required")
    console.error("Use --help for usage information")
    process.exit(1)
  }

  const simulation = await WorldSimulation.create(new FileNetworkProvider(), {
    place: args.place,
    seed: args.seed,
  })

  console.log("=".repeat(60))
  console.log("LLM AGENT RUNNER")
  console.log("=".repeat(60))
  console.log()
  console.log(`Place: ${simulation.getPlace()}`)
  console.log(`Seed: ${simulation.getSeed()}`)
  console.log(`Max Actions: ${args.actions}`)
  console.log(`Objective: ${args.objective}`)
  console.log(`Model: ${args.dryRun ? "(dry run)" : (args.model ?? DEFAULT_MODEL)}`)
  console.log()

  const loop = createAgentLoop({
    simulation,
    objective: args.objective,
    maxActions: args.actions,
    verbose: args.verbose,
    dryRun: args.dryRun,
    model: args.model,
  })

  console.log("Starting agent session...")

  while (!loop.isComplete()) {
    const result = await loop.step()

    if (result.error) {
      console.error(`\nError: ${result.error}`)
    } else if (!args.verbose && result.action) {
      const status = result.location === null ? "rejected" : `-> ${result.location}`
      console.log(`  ${formatAction(result.action)} ${status}`)
    }

    if (result.done) {
      break
    }
  }

  const stats = loop.getStats()

  console.log()
  console.log("=".repeat(60))
  console.log("SESSION SUMMARY")
  console.log("=".repeat(60))
  console.log()
  console.log(
    `Actions: ${stats.actionsAttempted} attempted, ${stats.actionsSucceeded} succeeded, ${stats.actionsRejected} rejected`
  )
  console.log(`Unparseable replies: ${stats.parseErrors}`)
  console.log(`Cleaned: ${formatMeters(stats.metersCleaned)}`)
  console.log(`Battery used: ${formatDuration(stats.batteryUsed)}`)
  console.log(`Battery left: ${formatDuration(simulation.getBatteryLife())}`)

  const learnings = loop.getLearnings()
  if (learnings.length > 0) {
    console.log()
    console.log("Learnings:")
    for (const learning of learnings) {
      console.log(`  - ${learning}`)
    }
  }
}

if (require.main === module) {
  main().catch((error) => {
    console.error("Fatal error:", error instanceof Error ? error.message : error)
    process.exit(1)
  })
}
