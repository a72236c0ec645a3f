/**
 * Random Policy
 *
 * Uniform over the five actions for every agent, drawn from a seeded RNG.
 */

import type { Policy, PolicyFactory, PolicyObservation } from "../types.js"
import { ACTION_COUNT } from "../../types.js"
import { createRng, rollInt } from "../../rng.js"

export const randomPolicy: PolicyFactory = (seed: string): Policy => {
  const rng = createRng(`random:${seed}`)
  return {
    id: "random",
    name: "Random",
    decide: (obs: PolicyObservation) => obs.dones.map(() => rollInt(rng, ACTION_COUNT)),
  }
}
