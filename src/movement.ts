import type { AgentID, MoveOutcome, Position } from "./types.js"
import { Action, ACTION_COUNT, ACTION_OFFSETS, agentCellCode } from "./types.js"
import type { GridModel } from "./grid.js"
import { InvalidActionError } from "./errors.js"

/**
 * Turn a raw action code into an Action, rejecting anything outside 0..4.
 */
export function decodeAction(agentId: AgentID, code: unknown): Action {
  if (typeof code !== "number" || !Number.isInteger(code) || code < 0 || code >= ACTION_COUNT) {
    throw new InvalidActionError(agentId, code)
  }
  return code
}

export function nextPosition(pos: Position, action: Action): Position | null {
  if (action === Action.NOOP) return null
  const offset = ACTION_OFFSETS[action]
  return { row: pos.row + offset.row, col: pos.col + offset.col }
}

/**
 * Applies one agent's action against the live grid.
 *
 * Vacancy is checked against the grid as already mutated by earlier moves in
 * the same step, so resolution order matters.
 */
export class MovementResolver {
  private readonly grid: GridModel
  private readonly positions: Position[]

  constructor(grid: GridModel, positions: Position[]) {
    this.grid = grid
    this.positions = positions
  }

  tryMove(agentId: AgentID, action: Action): MoveOutcome {
    const current = this.positions[agentId]
    const target = nextPosition(current, action)
    if (target === null) return "noop"

    if (!this.grid.isCellVacant(target)) {
      return "blocked"
    }

    this.grid.clearCell(current)
    this.positions[agentId] = target
    this.grid.setCell(target, agentCellCode(agentId))
    return "moved"
  }
}
