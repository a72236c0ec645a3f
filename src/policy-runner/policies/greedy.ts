/**
 * Greedy Policy
 *
 * Intent: every agent heads for its goal at once.
 * - Follows the corridor route and ignores the other agents
 * - Agents meeting head-on on the road block each other, so this
 *   frequently runs out of steps
 */

import type { Policy, PolicyFactory, PolicyObservation } from "../types.js"
import { Action } from "../../types.js"
import { decodeAllPositions, routeAction } from "../observation.js"

export const greedyPolicy: PolicyFactory = (): Policy => ({
  id: "greedy",
  name: "Greedy",
  decide: (obs: PolicyObservation) => {
    const positions = decodeAllPositions(obs)
    return positions.map((pos, agentId) =>
      obs.dones[agentId] ? Action.NOOP : routeAction(pos, obs.goals[agentId], obs.gridShape)
    )
  },
})
