/**
 * Action and observation space descriptors.
 */

import type { RngState } from "./rng.js"
import { rollInt } from "./rng.js"

export class DiscreteSpace {
  readonly n: number

  constructor(n: number) {
    if (!Number.isInteger(n) || n <= 0) {
      throw new RangeError(`Discrete space size must be a positive integer, got ${n}`)
    }
    this.n = n
  }

  contains(x: unknown): x is number {
    return typeof x === "number" && Number.isInteger(x) && x >= 0 && x < this.n
  }

  sample(rng: RngState): number {
    return rollInt(rng, this.n)
  }
}

/**
 * One discrete space per agent.
 */
export class MultiAgentActionSpace {
  readonly spaces: readonly DiscreteSpace[]

  constructor(spaces: DiscreteSpace[]) {
    this.spaces = [...spaces]
  }

  get length(): number {
    return this.spaces.length
  }

  contains(actions: readonly unknown[]): boolean {
    return (
      actions.length === this.spaces.length &&
      this.spaces.every((space, i) => space.contains(actions[i]))
    )
  }

  sample(rng: RngState): number[] {
    return this.spaces.map((space) => space.sample(rng))
  }
}

export interface BoxSpace {
  shape: number[]
  low: number
  high: number
}
