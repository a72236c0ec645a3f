/**
 * Metrics Aggregation
 *
 * Aggregates episode results across seeds for each policy.
 */

import type { EpisodeResult, FailureCounts, PolicyAggregates } from "./types.js"

/**
 * Calculate percentile from a sorted array of numbers.
 */
export function percentile(sortedValues: number[], p: number): number {
  if (sortedValues.length === 0) return 0
  const index = Math.ceil(p * sortedValues.length) - 1
  return sortedValues[Math.max(0, Math.min(index, sortedValues.length - 1))]
}

function average(values: number[]): number {
  if (values.length === 0) return 0
  return values.reduce((sum, v) => sum + v, 0) / values.length
}

/**
 * Compute aggregated statistics for a set of episode results.
 */
export function computeAggregates(results: EpisodeResult[], policyId: string): PolicyAggregates {
  const policyResults = results.filter((r) => r.policyId === policyId)

  if (policyResults.length === 0) {
    return {
      policyId,
      runCount: 0,
      successRate: 0,
      failureCounts: {},
      stepsToGoal: { p10: 0, p50: 0, p90: 0 },
      avgTeamReward: 0,
      avgAgentsAtGoal: 0,
      avgBlockedMoves: 0,
    }
  }

  // Count failures by type (all non-success termination reasons)
  const failureCounts: FailureCounts = {}
  for (const result of policyResults) {
    if (result.terminationReason !== "all_at_goal") {
      failureCounts[result.terminationReason] = (failureCounts[result.terminationReason] ?? 0) + 1
    }
  }

  // Steps to goal (only for episodes where every agent arrived)
  const successful = policyResults.filter((r) => r.terminationReason === "all_at_goal")
  const sortedSteps = successful.map((r) => r.steps).sort((a, b) => a - b)

  return {
    policyId,
    runCount: policyResults.length,
    successRate: successful.length / policyResults.length,
    failureCounts,
    stepsToGoal: {
      p10: percentile(sortedSteps, 0.1),
      p50: percentile(sortedSteps, 0.5),
      p90: percentile(sortedSteps, 0.9),
    },
    avgTeamReward: average(policyResults.map((r) => r.teamReward)),
    avgAgentsAtGoal: average(policyResults.map((r) => r.agentsAtGoal)),
    avgBlockedMoves: average(policyResults.map((r) => r.blockedMoves)),
  }
}

/**
 * Compute aggregates for all policies in a batch result.
 */
export function computeAllAggregates(
  results: EpisodeResult[],
  policyIds: string[]
): Record<string, PolicyAggregates> {
  const aggregates: Record<string, PolicyAggregates> = {}

  for (const policyId of policyIds) {
    aggregates[policyId] = computeAggregates(results, policyId)
  }

  return aggregates
}
