/**
 * Crossover Environment
 *
 * Four agents start on opposite sides of a corridor and must swap sides
 * through a single shared road row. Cells hold at most one agent; blocked
 * moves leave the agent in place.
 *
 * All state is owned by the instance, so independent environments can run
 * side by side.
 */

import type {
  Action,
  EpisodePhase,
  GridShape,
  CellCode,
  MoveOutcome,
  ObservationBatch,
  Position,
  RenderMode,
  RgbImage,
  StepResult,
  Viewer,
} from "./types.js"
import { ACTION_COUNT, ACTION_MEANING, ALL_ACTIONS, agentCellCode, samePosition } from "./types.js"
import { GridModel } from "./grid.js"
import { MovementResolver, decodeAction } from "./movement.js"
import { buildObservations, observationSize } from "./observation.js"
import { DiscreteSpace, MultiAgentActionSpace, type BoxSpace } from "./spaces.js"
import {
  GOAL_REWARD,
  GRID_ROWS,
  MAX_STEPS,
  N_AGENTS,
  resolveEnvOptions,
  type EnvOptions,
  type ResolvedEnvOptions,
} from "./config.js"
import { ConsoleViewer, PixelRenderer, renderAnsi, type Renderer } from "./render.js"
import {
  ActionCountMismatchError,
  NotInitializedError,
  UnsupportedRenderModeError,
} from "./errors.js"

/**
 * The reset/step contract a training loop drives.
 * Rendering and closing are optional capabilities.
 */
export interface MultiAgentEnv {
  readonly nAgents: number
  readonly actionSpace: MultiAgentActionSpace
  reset(): ObservationBatch
  step(actions: readonly number[]): StepResult
  render?(mode: RenderMode): RgbImage | string | boolean
  close?(): void
}

export function initialPositions(cols: number): Position[] {
  return [
    { row: 0, col: 1 },
    { row: 2, col: 1 },
    { row: 0, col: cols - 2 },
    { row: 2, col: cols - 2 },
  ]
}

// Each agent ends up on the opposite side from where it started.
export function goalPositions(cols: number): Position[] {
  return [
    { row: 0, col: cols - 1 },
    { row: 2, col: cols - 1 },
    { row: 0, col: 0 },
    { row: 2, col: 0 },
  ]
}

export class CrossoverEnv implements MultiAgentEnv {
  readonly nAgents = N_AGENTS
  readonly maxSteps = MAX_STEPS
  readonly goalReward = GOAL_REWARD
  readonly shape: GridShape
  readonly actionSpace: MultiAgentActionSpace
  readonly observationSpace: BoxSpace

  private readonly options: ResolvedEnvOptions
  private readonly grid: GridModel
  private readonly goals: readonly Position[]
  // Shared with the resolver; mutated in place, never reassigned.
  private readonly positions: Position[]
  private readonly resolver: MovementResolver
  private readonly renderer: Renderer

  private phase: EpisodePhase = "uninitialized"
  private stepCount = 0
  private dones: boolean[]
  private readonly lastOutcomes: MoveOutcome[]
  private episode = 0
  private baseImage: RgbImage | null = null
  private viewer: Viewer | null

  constructor(options: EnvOptions = {}) {
    this.options = resolveEnvOptions(options)
    this.shape = { rows: GRID_ROWS, cols: this.options.gridWidth }
    this.grid = new GridModel(this.shape)
    this.goals = goalPositions(this.shape.cols)
    this.positions = initialPositions(this.shape.cols)
    this.resolver = new MovementResolver(this.grid, this.positions)
    this.renderer = this.options.renderer ?? new PixelRenderer()
    this.viewer = this.options.viewer
    this.dones = new Array<boolean>(this.nAgents).fill(false)
    this.lastOutcomes = new Array<MoveOutcome>(this.nAgents).fill("noop")

    this.actionSpace = new MultiAgentActionSpace(
      Array.from({ length: this.nAgents }, () => new DiscreteSpace(ACTION_COUNT))
    )
    this.observationSpace = {
      shape: [observationSize(this.nAgents, this.options.fullObservable)],
      low: 0,
      high: 1,
    }
  }

  get fullObservable(): boolean {
    return this.options.fullObservable
  }

  get stepCost(): number {
    return this.options.stepCost
  }

  /**
   * Start a new episode: agents back to their start cells, counter to 0.
   */
  reset(): ObservationBatch {
    this.grid.resetLive()
    const start = initialPositions(this.shape.cols)
    start.forEach((pos, agentId) => {
      this.positions[agentId] = pos
      this.grid.setCell(pos, agentCellCode(agentId))
    })
    this.stepCount = 0
    this.dones = new Array<boolean>(this.nAgents).fill(false)
    this.lastOutcomes.fill("noop")
    this.phase = "running"
    this.baseImage = null
    this.episode++
    this.options.logger?.debug(`[EPISODE ${this.episode}] reset`)
    return this.getObservations()
  }

  /**
   * Advance one step. Agents resolve in increasing id order against the live
   * grid; the whole action list is validated before anything changes.
   */
  step(actions: readonly number[]): StepResult {
    if (this.phase === "uninitialized") {
      throw new NotInitializedError()
    }
    if (actions.length !== this.nAgents) {
      throw new ActionCountMismatchError(this.nAgents, actions.length)
    }
    // Index loop: a sparse array's holes must fail validation, not be skipped
    const decoded: Action[] = []
    for (let agentId = 0; agentId < actions.length; agentId++) {
      decoded.push(decodeAction(agentId, actions[agentId]))
    }

    const rewards = new Array<number>(this.nAgents).fill(this.options.stepCost)
    if (this.phase === "terminated") {
      return { observations: this.getObservations(), rewards, dones: [...this.dones], info: {} }
    }

    this.stepCount++
    this.lastOutcomes.fill("noop")
    for (let agentId = 0; agentId < decoded.length; agentId++) {
      if (this.dones[agentId]) continue
      this.lastOutcomes[agentId] = this.resolver.tryMove(agentId, decoded[agentId])
      if (samePosition(this.positions[agentId], this.goals[agentId])) {
        this.dones[agentId] = true
        rewards[agentId] = this.goalReward
      }
    }

    if (this.stepCount >= this.maxSteps) {
      this.dones.fill(true)
    }
    if (this.dones.every(Boolean)) {
      this.phase = "terminated"
      this.options.logger?.debug(
        `[EPISODE ${this.episode}] terminated after ${this.stepCount} steps`
      )
    }

    return { observations: this.getObservations(), rewards, dones: [...this.dones], info: {} }
  }

  /**
   * Outcome of each agent's move on the most recent step. Agents that were
   * already done report "noop".
   */
  getLastMoveOutcomes(): MoveOutcome[] {
    return [...this.lastOutcomes]
  }

  getObservations(): ObservationBatch {
    return buildObservations({
      positions: this.positions,
      shape: this.shape,
      stepCount: this.stepCount,
      maxSteps: this.maxSteps,
      fullObservable: this.options.fullObservable,
    })
  }

  getAgentPositions(): Position[] {
    return this.positions.map((pos) => ({ ...pos }))
  }

  getGoals(): Position[] {
    return this.goals.map((pos) => ({ ...pos }))
  }

  getStepCount(): number {
    return this.stepCount
  }

  getDones(): boolean[] {
    return [...this.dones]
  }

  getPhase(): EpisodePhase {
    return this.phase
  }

  getGrid(): CellCode[][] {
    return this.grid.snapshot()
  }

  wallExists(pos: Position): boolean {
    return this.grid.wallExists(pos)
  }

  getActionMeanings(): string[] {
    return ALL_ACTIONS.map((action) => ACTION_MEANING[action])
  }

  render(mode: "rgb_array"): RgbImage
  render(mode: "ansi"): string
  render(mode?: "human"): boolean
  render(mode: RenderMode): RgbImage | string | boolean
  render(mode: RenderMode = "human"): RgbImage | string | boolean {
    if (mode === "ansi") {
      return renderAnsi(this.grid, this.positions, this.goals)
    }
    if (mode !== "rgb_array" && mode !== "human") {
      throw new UnsupportedRenderModeError(String(mode))
    }

    if (this.baseImage === null) {
      this.baseImage = this.renderer.drawBase(this.grid, this.goals)
    }
    const image = this.renderer.drawAgents(this.baseImage, this.positions)
    if (mode === "rgb_array") {
      return image
    }

    if (this.viewer === null) {
      this.viewer = new ConsoleViewer()
    }
    this.viewer.imshow(image, renderAnsi(this.grid, this.positions, this.goals))
    return this.viewer.isOpen
  }

  close(): void {
    if (this.viewer !== null) {
      this.viewer.close()
      this.viewer = null
    }
  }
}
