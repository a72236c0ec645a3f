/**
 * Sequential Policy
 *
 * Intent: cross one agent at a time.
 * - The lowest-id agent that is not done follows the corridor route
 * - Everyone else waits in place, which keeps the road clear
 */

import type { Policy, PolicyFactory, PolicyObservation } from "../types.js"
import { Action } from "../../types.js"
import { decodeAllPositions, routeAction } from "../observation.js"

export const sequentialPolicy: PolicyFactory = (): Policy => ({
  id: "sequential",
  name: "Sequential",
  decide: (obs: PolicyObservation) => {
    const positions = decodeAllPositions(obs)
    const active = obs.dones.findIndex((done) => !done)
    return positions.map((pos, agentId) =>
      agentId === active ? routeAction(pos, obs.goals[agentId], obs.gridShape) : Action.NOOP
    )
  },
})
