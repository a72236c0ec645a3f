/**
 * Type definitions for the Policy Runner
 *
 * The policy runner sits above the environment, driving it with policies that
 * only see the observation batch and the public goal table.
 */

import type { GridShape, ObservationBatch, Position } from "../types.js"
import type { EnvOptions } from "../config.js"

// ============================================================================
// Policy Observation Types
// ============================================================================

/**
 * What a policy sees each step.
 */
export interface PolicyObservation {
  observations: ObservationBatch
  dones: boolean[]
  stepCount: number
  gridShape: GridShape
  goals: Position[]
  fullObservable: boolean
}

// ============================================================================
// Policy Interface
// ============================================================================

/**
 * A policy returns one action code per agent. Policies that need randomness
 * are built from a seed so runs stay reproducible.
 */
export interface Policy {
  id: string
  name: string
  decide: (observation: PolicyObservation) => number[]
}

export type PolicyFactory = (seed: string) => Policy

// ============================================================================
// Stall Detection Types
// ============================================================================

/**
 * Tracks steps in which no agent managed to move.
 */
export interface StallDetector {
  recordStep(movedAgents: number): void
  isStalled(): boolean
  reset(): void
}

// ============================================================================
// Run Configuration and Results
// ============================================================================

export interface RunConfig {
  seed: string
  policy: PolicyFactory
  env?: EnvOptions
  stallWindowSize?: number // Default 20
  recordSteps?: boolean // If true, include step log in result
  onStep?: (record: StepRecord) => void // Called after each step for streaming output
}

export type TerminationReason = "all_at_goal" | "max_steps" | "stall"

export interface StepRecord {
  step: number
  actions: number[]
  rewards: number[]
  dones: boolean[]
  blocked: number
}

export interface EpisodeResult {
  seed: string
  policyId: string
  terminationReason: TerminationReason
  steps: number
  totalRewards: number[] // Per agent, summed over the episode
  teamReward: number
  goalSteps: (number | null)[] // Step on which each agent reached its goal
  agentsAtGoal: number
  blockedMoves: number
  stepLog?: StepRecord[]
}

// ============================================================================
// Batch Configuration and Results
// ============================================================================

export interface BatchConfig {
  seeds?: string[] // Explicit seeds
  seedCount?: number // Or generate this many (default 100)
  policies: PolicyFactory[]
  env?: EnvOptions
  stallWindowSize?: number
  onProgress?: () => void // Called after each episode completes
}

/**
 * Counts of episodes by termination reason (excluding all_at_goal).
 */
export type FailureCounts = Partial<Record<Exclude<TerminationReason, "all_at_goal">, number>>

export interface PolicyAggregates {
  policyId: string
  runCount: number
  successRate: number
  failureCounts: FailureCounts
  stepsToGoal: {
    p10: number
    p50: number
    p90: number
  }
  avgTeamReward: number
  avgAgentsAtGoal: number
  avgBlockedMoves: number
}

export interface BatchResult {
  results: EpisodeResult[]
  aggregates: {
    byPolicy: Record<string, PolicyAggregates>
  }
}
