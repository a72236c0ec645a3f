/**
 * Stall Detection
 *
 * Implements a rolling window stall detector that triggers when no agent has
 * moved for the whole window. Deadlocked agents would otherwise sit until the
 * step budget runs out.
 */

import type { StallDetector } from "./types.js"

/**
 * Default stall window size in steps.
 */
export const DEFAULT_STALL_WINDOW_SIZE = 20

/**
 * Create a new stall detector with the specified window size.
 *
 * @param windowSize Number of steps without movement before stall triggers
 */
export function createStallDetector(windowSize: number = DEFAULT_STALL_WINDOW_SIZE): StallDetector {
  let stepsWithoutProgress = 0

  return {
    recordStep(movedAgents: number): void {
      if (movedAgents > 0) {
        stepsWithoutProgress = 0
      } else {
        stepsWithoutProgress++
      }
    },

    isStalled(): boolean {
      return stepsWithoutProgress >= windowSize
    },

    reset(): void {
      stepsWithoutProgress = 0
    },
  }
}
