/**
 * Policy Observation
 *
 * Builds the policy's view from the environment's public surface and turns
 * normalised observation vectors back into grid positions.
 */

import type { GridShape, Observation, Position } from "../types.js"
import { Action } from "../types.js"
import type { CrossoverEnv } from "../engine.js"
import { AGENT_OBSERVATION_SIZE } from "../observation.js"
import type { PolicyObservation } from "./types.js"

export function getPolicyObservation(
  env: CrossoverEnv,
  observations: Observation[],
  dones: boolean[]
): PolicyObservation {
  return {
    observations,
    dones,
    stepCount: env.getStepCount(),
    gridShape: { ...env.shape },
    goals: env.getGoals(),
    fullObservable: env.fullObservable,
  }
}

/**
 * Invert `[(row + 1) / rows, (col + 1) / cols, ...]`.
 */
export function decodePosition(observation: Observation, shape: GridShape): Position {
  return {
    row: Math.round(observation[0] * shape.rows) - 1,
    col: Math.round(observation[1] * shape.cols) - 1,
  }
}

/**
 * Positions of every agent, from either observation mode.
 */
export function decodeAllPositions(observation: PolicyObservation): Position[] {
  const { observations, gridShape, fullObservable } = observation
  if (!fullObservable) {
    return observations.map((obs) => decodePosition(obs, gridShape))
  }
  const joint = observations[0] ?? []
  const positions: Position[] = []
  for (let i = 0; i + AGENT_OBSERVATION_SIZE <= joint.length; i += AGENT_OBSERVATION_SIZE) {
    positions.push(decodePosition(joint.slice(i, i + AGENT_OBSERVATION_SIZE), gridShape))
  }
  return positions
}

export function isLaneWall(pos: Position, shape: GridShape): boolean {
  const roadRow = Math.floor(shape.rows / 2)
  return pos.row !== roadRow && pos.col >= 2 && pos.col <= shape.cols - 3
}

/**
 * Next action along the corridor route: step along the lane if possible,
 * otherwise drop onto the road, travel to the goal column, then leave it.
 * Ignores other agents.
 */
export function routeAction(pos: Position, goal: Position, shape: GridShape): Action {
  if (pos.row === goal.row && pos.col === goal.col) return Action.NOOP

  if (pos.col === goal.col) {
    return goal.row > pos.row ? Action.DOWN : Action.UP
  }

  const towardGoal = goal.col > pos.col ? Action.RIGHT : Action.LEFT
  const nextCol = goal.col > pos.col ? pos.col + 1 : pos.col - 1
  if (!isLaneWall({ row: pos.row, col: nextCol }, shape)) {
    return towardGoal
  }

  const roadRow = Math.floor(shape.rows / 2)
  return roadRow > pos.row ? Action.DOWN : Action.UP
}
