/**
 * Errors raised by the environment.
 *
 * Blocked moves are never errors; only caller misuse ends up here.
 */

export class CrossoverEnvError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class InvalidActionError extends CrossoverEnvError {
  readonly agentId: number
  readonly action: unknown

  constructor(agentId: number, action: unknown) {
    super(`Invalid action ${String(action)} for agent ${agentId}: expected an integer in 0..4`)
    this.agentId = agentId
    this.action = action
  }
}

export class ActionCountMismatchError extends CrossoverEnvError {
  readonly expected: number
  readonly actual: number

  constructor(expected: number, actual: number) {
    super(`Expected ${expected} actions (one per agent) but got ${actual}`)
    this.expected = expected
    this.actual = actual
  }
}

export class NotInitializedError extends CrossoverEnvError {
  constructor() {
    super("Environment has not been reset. Call reset() before step().")
  }
}

export class InvalidConfigError extends CrossoverEnvError {}

export class UnsupportedRenderModeError extends CrossoverEnvError {
  constructor(mode: string) {
    super(`Unsupported render mode: ${mode}`)
  }
}
