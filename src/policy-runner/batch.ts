/**
 * Batch Executor
 *
 * Runs episodes across different seeds and policies, then aggregates results
 * for analysis.
 */

import type { BatchConfig, BatchResult, EpisodeResult } from "./types.js"
import { runEpisode } from "./runner.js"
import { computeAllAggregates } from "./metrics.js"

/**
 * Generate deterministic seed strings.
 */
export function generateSeeds(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `seed-${i}`)
}

/**
 * Run episodes for every seed and policy.
 */
export function runBatch(config: BatchConfig): BatchResult {
  const seeds = config.seeds ?? generateSeeds(config.seedCount ?? 100)
  const results: EpisodeResult[] = []
  const policyIds: string[] = []

  for (const seed of seeds) {
    for (const policy of config.policies) {
      const result = runEpisode({
        seed,
        policy,
        env: config.env,
        stallWindowSize: config.stallWindowSize,
      })
      results.push(result)
      if (!policyIds.includes(result.policyId)) {
        policyIds.push(result.policyId)
      }
      config.onProgress?.()
    }
  }

  return {
    results,
    aggregates: {
      byPolicy: computeAllAggregates(results, policyIds),
    },
  }
}
