/**
 * Frame Timing
 *
 * Stopwatch and frame-rate throttle for the driving loop.
 *
 * The throttle sleeps for whatever is left of the frame budget measured from
 * the last restart, then restarts the stopwatch. A frame that overran its
 * budget continues immediately; lost time is not caught up.
 */

import type { Task } from '../task/core'
import { createTask } from '../task/core'

const ONE_SECOND_MS = 1000

export type Clock = () => number

export type Stopwatch = {
  elapsedMs: () => number
  restart: () => void
}

export const systemClock: Clock = () => performance.now()

export function createStopwatch(clock: Clock = systemClock): Stopwatch {
  let startedAt = clock()

  return {
    elapsedMs: () => clock() - startedAt,
    restart: () => {
      startedAt = clock()
    },
  }
}

export const frameBudgetMs = (targetFPS: number): number => {
  if (!(targetFPS > 0)) {
    throw new RangeError(`targetFPS must be positive, got ${targetFPS}`)
  }
  return ONE_SECOND_MS / targetFPS
}

/**
 * Sleep out the remainder of the frame budget, then restart the stopwatch
 */
export const waitForFps = (stopwatch: Stopwatch, targetFPS: number): Task<void> =>
  createTask<void>((receiver) => {
    const remaining = frameBudgetMs(targetFPS) - stopwatch.elapsedMs()

    const finish = () => {
      stopwatch.restart()
      receiver.setValue()
    }

    if (remaining > 0) {
      setTimeout(finish, remaining)
    } else {
      finish()
    }
  })
