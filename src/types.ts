// Core type definitions for the crossover simulation engine

// ============================================================================
// Grid
// ============================================================================

export type AgentID = number

export interface Position {
  row: number
  col: number
}

export interface GridShape {
  rows: number
  cols: number
}

/**
 * Cell codes stored in the occupancy grid.
 * Agent `i` is stored as `i + 1`.
 */
export type CellCode = number

export const WALL: CellCode = -1
export const FREE: CellCode = 0

export function agentCellCode(agentId: AgentID): CellCode {
  return agentId + 1
}

export function samePosition(a: Position, b: Position): boolean {
  return a.row === b.row && a.col === b.col
}

// ============================================================================
// Actions
// ============================================================================

export enum Action {
  DOWN = 0,
  LEFT = 1,
  UP = 2,
  RIGHT = 3,
  NOOP = 4,
}

export type MoveAction = Exclude<Action, Action.NOOP>

export const ACTION_MEANING: Record<Action, string> = {
  [Action.DOWN]: "DOWN",
  [Action.LEFT]: "LEFT",
  [Action.UP]: "UP",
  [Action.RIGHT]: "RIGHT",
  [Action.NOOP]: "NOOP",
}

export const ACTION_OFFSETS: Record<MoveAction, Position> = {
  [Action.DOWN]: { row: 1, col: 0 },
  [Action.LEFT]: { row: 0, col: -1 },
  [Action.UP]: { row: -1, col: 0 },
  [Action.RIGHT]: { row: 0, col: 1 },
}

export const ALL_ACTIONS: readonly Action[] = [
  Action.DOWN,
  Action.LEFT,
  Action.UP,
  Action.RIGHT,
  Action.NOOP,
]

export const ACTION_COUNT = ALL_ACTIONS.length

/**
 * Result of a single agent's move attempt.
 * Blocked moves (wall, off-grid, occupied) are not errors.
 */
export type MoveOutcome = "moved" | "blocked" | "noop"

// ============================================================================
// Episode
// ============================================================================

export type Observation = number[]
export type ObservationBatch = Observation[]

/** Reserved for extension; always empty. */
export type StepInfo = Record<string, never>

export interface StepResult {
  observations: ObservationBatch
  rewards: number[]
  dones: boolean[]
  info: StepInfo
}

export type EpisodePhase = "uninitialized" | "running" | "terminated"

// ============================================================================
// Rendering
// ============================================================================

export type RenderMode = "human" | "rgb_array" | "ansi"

export interface RgbImage {
  width: number
  height: number
  data: Uint8Array // row-major RGB, 3 bytes per pixel
}

/**
 * Display surface for "human" rendering.
 */
export interface Viewer {
  readonly isOpen: boolean
  imshow(image: RgbImage, text: string): void
  close(): void
}

/**
 * Minimal logger accepted by the engine and server handlers.
 * Fastify's logger satisfies it.
 */
export interface Logger {
  info(msg: string): void
  debug(msg: string): void
}
