/**
 * Tests for runner.ts - Single-episode executor
 */

import { runEpisode } from "./runner.js"
import { greedyPolicy, noopPolicy, randomPolicy, sequentialPolicy } from "./policies/index.js"
import type { StepRecord } from "./types.js"

describe("runner", () => {
  describe("runEpisode", () => {
    it("crosses every agent with the sequential policy", () => {
      const result = runEpisode({ seed: "seq-1", policy: sequentialPolicy })

      expect(result.seed).toBe("seq-1")
      expect(result.policyId).toBe("sequential")
      expect(result.terminationReason).toBe("all_at_goal")
      expect(result.steps).toBe(32)
      expect(result.goalSteps).toEqual([8, 16, 24, 32])
      expect(result.totalRewards).toEqual([5, 5, 5, 5])
      expect(result.teamReward).toBe(20)
      expect(result.agentsAtGoal).toBe(4)
      expect(result.blockedMoves).toBe(0)
    })

    it("charges the step cost on every step but the arrival", () => {
      const result = runEpisode({ seed: "seq-2", policy: sequentialPolicy, env: { stepCost: -1 } })

      expect(result.totalRewards).toEqual([-26, -26, -26, -26])
      expect(result.teamReward).toBe(-104)
    })

    it("runs out of steps when nobody moves", () => {
      const result = runEpisode({ seed: "noop-1", policy: noopPolicy, stallWindowSize: 1000 })

      expect(result.terminationReason).toBe("max_steps")
      expect(result.steps).toBe(100)
      expect(result.goalSteps).toEqual([null, null, null, null])
      expect(result.agentsAtGoal).toBe(0)
      expect(result.teamReward).toBe(0)
    })

    it("stops on stall detection", () => {
      const result = runEpisode({ seed: "noop-2", policy: noopPolicy })

      expect(result.terminationReason).toBe("stall")
      expect(result.steps).toBe(20)
    })

    it("detects the greedy head-on deadlock", () => {
      const result = runEpisode({ seed: "greedy-1", policy: greedyPolicy })

      expect(result.terminationReason).toBe("stall")
      expect(result.steps).toBe(23)
      expect(result.blockedMoves).toBe(82)
      expect(result.agentsAtGoal).toBe(0)
    })

    it("is deterministic for the same seed", () => {
      const a = runEpisode({ seed: "det", policy: randomPolicy, recordSteps: true })
      const b = runEpisode({ seed: "det", policy: randomPolicy, recordSteps: true })

      expect(a).toEqual(b)
    })

    it("records the step log when asked", () => {
      const result = runEpisode({ seed: "log", policy: sequentialPolicy, recordSteps: true })

      expect(result.stepLog).toHaveLength(32)
      expect(result.stepLog?.[0]).toEqual({
        step: 1,
        actions: [0, 4, 4, 4],
        rewards: [0, 0, 0, 0],
        dones: [false, false, false, false],
        blocked: 0,
      })
      expect(result.stepLog?.[7].rewards).toEqual([5, 0, 0, 0])
    })

    it("omits the step log by default", () => {
      const result = runEpisode({ seed: "nolog", policy: sequentialPolicy })
      expect(result.stepLog).toBeUndefined()
    })

    it("streams every step to onStep", () => {
      const records: StepRecord[] = []
      runEpisode({ seed: "stream", policy: sequentialPolicy, onStep: (r) => records.push(r) })

      expect(records.map((r) => r.step)).toEqual(Array.from({ length: 32 }, (_, i) => i + 1))
    })
  })
})
