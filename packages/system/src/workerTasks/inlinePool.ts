/**
 * Worker Tasks - Inline Pool
 *
 * Same contract as the thread pool, executed on the calling thread's event
 * loop: at most `size` jobs run at once, queued jobs start in FIFO order, and
 * each job begins on its own `setImmediate` turn. Useful where spawning
 * threads is not wanted, and in tests.
 */

import { createAtom } from '../state'
import type { TaskRegistry } from './core'
import { poolStatusKeywords } from './core'
import type { PoolJob, PoolState, WorkerPool } from './dispatch'
import { createDispatch } from './dispatch'

export type InlinePoolOptions<TTasks extends TaskRegistry> = {
  tasks: TTasks
  size?: number
}

export function createInlinePool<TTasks extends TaskRegistry>({
  tasks,
  size = 1,
}: InlinePoolOptions<TTasks>): WorkerPool<TTasks> {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Inline pool size must be a positive integer, got ${size}`)
  }

  const state = createAtom<PoolState>({
    status: poolStatusKeywords.ready,
    queued: 0,
    running: 0,
  })
  const queue: Array<PoolJob> = []
  const running = new Set<PoolJob>()

  const isTerminated = () =>
    state.get().status === poolStatusKeywords.terminated

  const syncCounts = () => {
    state.update((s) => ({ ...s, queued: queue.length, running: running.size }))
  }

  const finish = (job: PoolJob, settle: () => void) => {
    // Terminated pools already stopped their running jobs
    if (!running.delete(job)) return
    settle()
    pump()
  }

  const run = (job: PoolJob) => {
    running.add(job)
    setImmediate(() => {
      if (!running.has(job)) return

      const definition = tasks[job.request.taskName]
      if (!definition) {
        finish(job, () => job.fail(new Error(`Unknown task: ${job.request.taskName}`)))
        return
      }

      const input = definition.parseIO
        ? definition.input.safeParse(job.request.input)
        : { success: true as const, data: job.request.input }
      if (!input.success) {
        finish(job, () => job.fail(new Error(`Invalid input: ${input.error.message}`)))
        return
      }

      void Promise.resolve()
        .then(() => definition.execute(input.data))
        .then(
          (output) => finish(job, () => job.complete(output)),
          (error: unknown) => finish(job, () => job.fail(error)),
        )
    })
  }

  const pump = () => {
    while (running.size < size && queue.length > 0) {
      const job = queue.shift()
      if (job) run(job)
    }
    syncCounts()
  }

  const dispatch = createDispatch({
    tasks,
    isTerminated,
    place: (job) => {
      queue.push(job)
      pump()
    },
  })

  const terminate = async (): Promise<void> => {
    if (isTerminated()) return
    state.update((s) => ({ ...s, status: poolStatusKeywords.terminated }))

    const stranded = [...queue.splice(0, queue.length), ...running]
    running.clear()
    syncCounts()
    stranded.forEach((job) => job.stop())
  }

  return {
    size,
    dispatch,
    getStatus: () => state.get().status,
    state,
    terminate,
  }
}
