import type { CellCode, GridShape, Position } from "./types.js"
import { FREE, WALL } from "./types.js"

/**
 * Build the wall layout: the middle row and the two border-most columns on
 * each side are free, everything else is wall.
 */
export function createBaseGrid(shape: GridShape): CellCode[][] {
  const { rows, cols } = shape
  const roadRow = Math.floor(rows / 2)
  const grid: CellCode[][] = []
  for (let row = 0; row < rows; row++) {
    const cells: CellCode[] = []
    for (let col = 0; col < cols; col++) {
      const isBorderColumn = col <= 1 || col >= cols - 2
      cells.push(row === roadRow || isBorderColumn ? FREE : WALL)
    }
    grid.push(cells)
  }
  return grid
}

/**
 * Authoritative occupancy grid.
 *
 * The base grid (walls only) is fixed for the lifetime of the model; the live
 * grid also carries agent codes and is mutated as agents move.
 */
export class GridModel {
  readonly shape: GridShape
  private readonly base: readonly (readonly CellCode[])[]
  private live: CellCode[][]

  constructor(shape: GridShape) {
    this.shape = { ...shape }
    this.base = createBaseGrid(shape)
    this.live = createBaseGrid(shape)
  }

  isInBounds(pos: Position): boolean {
    return (
      pos.row >= 0 && pos.row < this.shape.rows && pos.col >= 0 && pos.col < this.shape.cols
    )
  }

  /**
   * True iff the base grid marks the cell as wall. Ignores agents.
   */
  wallExists(pos: Position): boolean {
    return this.isInBounds(pos) && this.base[pos.row][pos.col] === WALL
  }

  /**
   * In bounds, not a wall and not occupied by an agent.
   */
  isCellVacant(pos: Position): boolean {
    return this.isInBounds(pos) && this.live[pos.row][pos.col] === FREE
  }

  getCell(pos: Position): CellCode {
    return this.live[pos.row][pos.col]
  }

  // No validation: callers check legality first.
  setCell(pos: Position, value: CellCode): void {
    this.live[pos.row][pos.col] = value
  }

  clearCell(pos: Position): void {
    this.live[pos.row][pos.col] = FREE
  }

  /**
   * Drop every agent from the live grid.
   */
  resetLive(): void {
    this.live = this.base.map((cells) => [...cells])
  }

  snapshot(): CellCode[][] {
    return this.live.map((cells) => [...cells])
  }
}
