import type { NodeID } from "../types.js"
import type { SweeperAction, SweeperObservation } from "../policy-runner/types.js"
import { formatDuration, formatMeters } from "../utils.js"

/**
 * Format what the agent can see from its current intersection
 */
export function formatObservation(obs: SweeperObservation): string {
  const lines: string[] = []

  lines.push(`Location: intersection ${obs.location} (visited ${obs.visitsHere}x)`)
  lines.push(
    `Battery: ${formatDuration(obs.batteryLife)} left of ${formatDuration(obs.initialBattery)} (${Math.round(obs.batteryLife)} s)`
  )
  lines.push(`Cleaned so far: ${formatMeters(obs.metersCleaned)}`)
  lines.push(`Moves you can back up over: ${obs.routeDepth}`)
  lines.push("")

  if (obs.outgoing.length === 0) {
    lines.push("Streets out: none (dead end)")
  } else {
    lines.push("Streets out:")
    for (const street of obs.outgoing) {
      const state = street.dirty ? "DIRTY" : "clean"
      const visits = street.visits > 0 ? `, visited ${street.visits}x` : ", unvisited"
      lines.push(
        `  -> ${street.to}: ${formatMeters(street.length)}, ${Math.round(street.travelTime)} s, ${state}${visits}`
      )
    }
  }

  return lines.join("\n")
}

/**
 * Format an action for display
 */
export function formatAction(action: SweeperAction): string {
  switch (action.type) {
    case "Move":
      return `move ${action.to}`
    case "CleanAndMove":
      return `clean ${action.to}`
    case "Backup":
      return `backup ${action.steps}`
  }
}

/**
 * Format the outcome of an action for the agent
 */
export function formatActionResult(
  action: SweeperAction,
  location: NodeID | null,
  batterySpent: number,
  metersCleaned: number
): string {
  if (location === null) {
    return `REJECTED: ${formatAction(action)} is not possible from here. Nothing changed.`
  }

  const parts = [`OK: ${formatAction(action)} -> now at ${location}`]
  parts.push(`spent ${Math.round(batterySpent)} s`)
  if (action.type === "CleanAndMove") {
    parts.push(metersCleaned > 0 ? `cleaned ${formatMeters(metersCleaned)}` : "street was already clean")
  }
  return parts.join(", ")
}
