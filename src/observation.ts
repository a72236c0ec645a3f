/**
 * Observation Builder
 *
 * Projects internal state into the vectors policies consume. Each agent sees
 * `[(row + 1) / rows, (col + 1) / cols, stepCount / maxSteps]`; positions are
 * 1-indexed so wall-adjacent cells never map to exactly 0.
 */

import type { GridShape, Observation, ObservationBatch, Position } from "./types.js"

export const AGENT_OBSERVATION_SIZE = 3

export interface ObservationInput {
  positions: readonly Position[]
  shape: GridShape
  stepCount: number
  maxSteps: number
  fullObservable: boolean
}

export function buildAgentObservation(
  pos: Position,
  shape: GridShape,
  stepCount: number,
  maxSteps: number
): Observation {
  return [(pos.row + 1) / shape.rows, (pos.col + 1) / shape.cols, stepCount / maxSteps]
}

/**
 * In full-observability mode every agent gets the same flattened vector of
 * all agents' observations, in agent id order.
 */
export function buildObservations(input: ObservationInput): ObservationBatch {
  const { positions, shape, stepCount, maxSteps, fullObservable } = input
  const perAgent = positions.map((pos) => buildAgentObservation(pos, shape, stepCount, maxSteps))

  if (!fullObservable) {
    return perAgent
  }

  const joint = perAgent.flat()
  return perAgent.map(() => [...joint])
}

export function observationSize(nAgents: number, fullObservable: boolean): number {
  return fullObservable ? nAgents * AGENT_OBSERVATION_SIZE : AGENT_OBSERVATION_SIZE
}
