/**
 * Policy Registry
 *
 * Exports all available policies for the policy runner.
 */

export { greedySweeper } from "./greedy.js"
export { cautiousSweeper, RESERVE_FRACTION } from "./cautious.js"
export { explorer } from "./explorer.js"

import { greedySweeper } from "./greedy.js"
import { cautiousSweeper } from "./cautious.js"
import { explorer } from "./explorer.js"
import type { Policy } from "../types.js"

/**
 * All available policies.
 */
export const allPolicies: Policy[] = [greedySweeper, cautiousSweeper, explorer]

/**
 * Get a policy by ID.
 */
export function getPolicyById(id: string): Policy | undefined {
  return allPolicies.find((p) => p.id === id)
}
