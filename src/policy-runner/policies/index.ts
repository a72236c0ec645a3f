/**
 * Policy Registry
 *
 * Exports all available policies for the policy runner.
 */

export { noopPolicy } from "./noop.js"
export { randomPolicy } from "./random.js"
export { greedyPolicy } from "./greedy.js"
export { sequentialPolicy } from "./sequential.js"

import { noopPolicy } from "./noop.js"
import { randomPolicy } from "./random.js"
import { greedyPolicy } from "./greedy.js"
import { sequentialPolicy } from "./sequential.js"
import type { PolicyFactory } from "../types.js"

/**
 * All available policies, keyed by id.
 */
export const POLICIES: Record<string, PolicyFactory> = {
  noop: noopPolicy,
  random: randomPolicy,
  greedy: greedyPolicy,
  sequential: sequentialPolicy,
}

export const allPolicies: PolicyFactory[] = Object.values(POLICIES)

/**
 * Get a policy factory by ID.
 */
export function getPolicyById(id: string): PolicyFactory | undefined {
  return POLICIES[id]
}
