export { CrossoverEnv, initialPositions, goalPositions, type MultiAgentEnv } from "./engine.js"
export { GridModel, createBaseGrid } from "./grid.js"
export { MovementResolver, decodeAction, nextPosition } from "./movement.js"
export { buildObservations, buildAgentObservation, observationSize } from "./observation.js"
export { DiscreteSpace, MultiAgentActionSpace, type BoxSpace } from "./spaces.js"
export { createRng, rollFloat, rollInt, type RngState } from "./rng.js"
export {
  PixelRenderer,
  ConsoleViewer,
  renderAnsi,
  getPixel,
  AGENT_COLORS,
  CELL_SIZE,
  type Renderer,
} from "./render.js"
export {
  DEFAULT_ENV_OPTIONS,
  GOAL_REWARD,
  GRID_ROWS,
  MAX_STEPS,
  N_AGENTS,
  getServerConfig,
  resolveEnvOptions,
  type EnvOptions,
} from "./config.js"
export * from "./errors.js"
export * from "./types.js"
