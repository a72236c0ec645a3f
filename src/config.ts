/**
 * Configuration for the environment and the remote server.
 */

import type { Logger, Viewer } from "./types.js"
import type { Renderer } from "./render.js"
import { InvalidConfigError } from "./errors.js"

export const N_AGENTS = 4
export const GRID_ROWS = 3
export const DEFAULT_GRID_WIDTH = 8
export const MIN_GRID_WIDTH = 4
export const MAX_GRID_WIDTH = 64
export const MAX_STEPS = 100
export const GOAL_REWARD = 5

export interface EnvOptions {
  /** Every agent receives the concatenation of all agents' observations. */
  fullObservable?: boolean
  /** Reward for every agent that does not newly reach its goal on a step. */
  stepCost?: number
  gridWidth?: number
  logger?: Logger
  renderer?: Renderer
  viewer?: Viewer
}

export interface ResolvedEnvOptions {
  fullObservable: boolean
  stepCost: number
  gridWidth: number
  logger: Logger | null
  renderer: Renderer | null
  viewer: Viewer | null
}

export const DEFAULT_ENV_OPTIONS = {
  fullObservable: false,
  stepCost: 0,
  gridWidth: DEFAULT_GRID_WIDTH,
} as const

export function resolveEnvOptions(options: EnvOptions = {}): ResolvedEnvOptions {
  const fullObservable = options.fullObservable ?? DEFAULT_ENV_OPTIONS.fullObservable
  const stepCost = options.stepCost ?? DEFAULT_ENV_OPTIONS.stepCost
  const gridWidth = options.gridWidth ?? DEFAULT_ENV_OPTIONS.gridWidth

  if (!Number.isFinite(stepCost)) {
    throw new InvalidConfigError(`stepCost must be a finite number, got ${stepCost}`)
  }
  if (!Number.isInteger(gridWidth) || gridWidth < MIN_GRID_WIDTH || gridWidth > MAX_GRID_WIDTH) {
    throw new InvalidConfigError(
      `gridWidth must be an integer in ${MIN_GRID_WIDTH}..${MAX_GRID_WIDTH}, got ${gridWidth}`
    )
  }

  return {
    fullObservable,
    stepCost,
    gridWidth,
    logger: options.logger ?? null,
    renderer: options.renderer ?? null,
    viewer: options.viewer ?? null,
  }
}

// ============================================================================
// Server
// ============================================================================

export interface ServerConfig {
  port: number
  host: string
  logLevel: string
}

/**
 * Read server settings from the environment, falling back to defaults.
 */
export function getServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = parseInt(env.PORT ?? "3000", 10)
  if (Number.isNaN(port) || port < 0 || port > 65535) {
    throw new InvalidConfigError(`PORT must be a valid port number, got ${env.PORT}`)
  }
  return {
    port,
    host: env.HOST ?? "0.0.0.0",
    logLevel: env.LOG_LEVEL ?? "info",
  }
}
