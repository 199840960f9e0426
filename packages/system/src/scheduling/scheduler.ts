/**
 * Schedulers
 *
 * A scheduler hands out tasks that complete from inside its execution
 * context. `on(scheduler, task)` uses them to move work there.
 */

import type { Task } from '../task/core'
import { createTask } from '../task/core'

export type Scheduler = {
  schedule: () => Task<void>
}

/**
 * Completes on the next turn of the event loop, after pending I/O callbacks
 */
export const immediateScheduler: Scheduler = {
  schedule: () =>
    createTask<void>((receiver) => {
      setImmediate(() => receiver.setValue())
    }),
}

/**
 * Completes after `ms` milliseconds
 */
export const delay = (ms: number): Task<void> =>
  createTask<void>((receiver) => {
    setTimeout(() => receiver.setValue(), Math.max(0, ms))
  })
