/**
 * Single-Episode Executor
 *
 * Executes a single policy episode from reset to termination.
 * The runner:
 * 1. Creates a fresh environment and resets it
 * 2. Runs the policy decision loop until every agent is done or the run stalls
 * 3. Collects per-agent rewards and goal timings
 * 4. Returns structured results
 */

import { CrossoverEnv } from "../engine.js"
import { samePosition } from "../types.js"
import type { EpisodeResult, RunConfig, StepRecord, TerminationReason } from "./types.js"
import { getPolicyObservation } from "./observation.js"
import { createStallDetector, DEFAULT_STALL_WINDOW_SIZE } from "./stall-detection.js"

/**
 * Run a single episode with the given configuration.
 */
export function runEpisode(config: RunConfig): EpisodeResult {
  const { seed, onStep } = config
  const stallWindowSize = config.stallWindowSize ?? DEFAULT_STALL_WINDOW_SIZE
  const recordSteps = config.recordSteps ?? false

  const env = new CrossoverEnv(config.env)
  const policy = config.policy(seed)
  const stallDetector = createStallDetector(stallWindowSize)

  let observations = env.reset()
  let dones = env.getDones()
  const totalRewards = new Array<number>(env.nAgents).fill(0)
  const goalSteps: (number | null)[] = new Array<number | null>(env.nAgents).fill(null)
  const stepLog: StepRecord[] = []
  let blockedMoves = 0

  const finish = (terminationReason: TerminationReason): EpisodeResult => {
    env.close()
    return {
      seed,
      policyId: policy.id,
      terminationReason,
      steps: env.getStepCount(),
      totalRewards,
      teamReward: totalRewards.reduce((sum, r) => sum + r, 0),
      goalSteps,
      agentsAtGoal: goalSteps.filter((s) => s !== null).length,
      blockedMoves,
      ...(recordSteps ? { stepLog } : {}),
    }
  }

  // Main loop
  while (!dones.every(Boolean)) {
    if (stallDetector.isStalled()) {
      return finish("stall")
    }

    const actions = policy.decide(getPolicyObservation(env, observations, dones))
    const result = env.step(actions)
    observations = result.observations
    dones = result.dones

    const step = env.getStepCount()
    const positions = env.getAgentPositions()
    const goals = env.getGoals()
    result.rewards.forEach((reward, agentId) => {
      totalRewards[agentId] += reward
      if (goalSteps[agentId] === null && samePosition(positions[agentId], goals[agentId])) {
        goalSteps[agentId] = step
      }
    })

    const outcomes = env.getLastMoveOutcomes()
    const blocked = outcomes.filter((o) => o === "blocked").length
    blockedMoves += blocked
    stallDetector.recordStep(outcomes.filter((o) => o === "moved").length)

    if (recordSteps || onStep) {
      const record: StepRecord = {
        step,
        actions,
        rewards: result.rewards,
        dones: result.dones,
        blocked,
      }
      if (recordSteps) {
        stepLog.push(record)
      }
      onStep?.(record)
    }
  }

  return finish(goalSteps.every((s) => s !== null) ? "all_at_goal" : "max_steps")
}
