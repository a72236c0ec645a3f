/**
 * Noop Policy
 *
 * Every agent stays put. Useful as a baseline and for truncation checks.
 */

import type { Policy, PolicyFactory, PolicyObservation } from "../types.js"
import { Action } from "../../types.js"

export const noopPolicy: PolicyFactory = (): Policy => ({
  id: "noop",
  name: "Noop",
  decide: (obs: PolicyObservation) => obs.dones.map(() => Action.NOOP),
})
