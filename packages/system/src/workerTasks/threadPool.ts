/**
 * Worker Tasks - Thread Pool
 *
 * Main-thread side of the worker tasks abstraction: a fixed set of Node.js
 * worker threads sharing one FIFO job queue.
 *
 * - Workers are spawned at construction and announce themselves with
 *   `worker/ready`; jobs placed earlier wait in the queue.
 * - The head of the queue goes to the first idle, ready worker. Which worker
 *   runs a job, and in what order jobs finish, is not specified.
 * - A worker that crashes or exits fails its in-flight job and is replaced,
 *   so the pool keeps its size until `terminate()`.
 *
 * Dependencies:
 * - node:worker_threads
 * - zod: validation of every message coming back from a worker
 */

import type { Worker } from 'node:worker_threads'
import { availableParallelism } from 'node:os'
import { ComputeFailure, describeError } from '../errors'
import { createAtom } from '../state'
import type { TaskRegistry, WorkerEvent } from './core'
import { eventKeywords, poolStatusKeywords, workerEventSchema } from './core'
import type { PoolJob, PoolState, WorkerPool } from './dispatch'
import { createDispatch } from './dispatch'

export type ThreadPoolOptions<TTasks extends TaskRegistry> = {
  tasks: TTasks
  /** Spawns one worker running `startWorkerHost` over the same registry */
  createWorker: () => Worker
  /** Defaults to the host's available parallelism */
  size?: number
  verbose?: boolean
}

type PoolWorker = {
  id: number
  worker: Worker
  ready: boolean
  alive: boolean
  job: PoolJob | null
}

export function createThreadPool<TTasks extends TaskRegistry>({
  tasks,
  createWorker,
  size = availableParallelism(),
  verbose = false,
}: ThreadPoolOptions<TTasks>): WorkerPool<TTasks> {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Thread pool size must be a positive integer, got ${size}`)
  }

  const log = (message: string) => {
    if (verbose) console.log(`[ThreadPool] ${message}`)
  }

  const state = createAtom<PoolState>({
    status: poolStatusKeywords.starting,
    queued: 0,
    running: 0,
  })
  const queue: Array<PoolJob> = []
  const workers: Array<PoolWorker> = []
  let nextWorkerId = 0

  const isTerminated = () =>
    state.get().status === poolStatusKeywords.terminated

  const syncCounts = () => {
    state.update((s) => ({
      ...s,
      queued: queue.length,
      running: workers.filter((w) => w.job !== null).length,
    }))
  }

  // Hand queued jobs to idle workers, oldest job first
  const pump = () => {
    for (const slot of workers) {
      if (queue.length === 0) break
      if (!slot.alive || !slot.ready || slot.job) continue

      const job = queue.shift()
      if (!job) break
      slot.job = job
      slot.worker.postMessage(job.request)
    }
    syncCounts()
  }

  const handleEvent = (slot: PoolWorker, event: WorkerEvent) => {
    if (event.type === eventKeywords.workerReady) {
      slot.ready = true
      if (workers.every((w) => !w.alive || w.ready)) {
        state.update((s) => ({ ...s, status: poolStatusKeywords.ready }))
        log(`${workers.length} worker(s) ready`)
      }
      pump()
      return
    }

    const job = slot.job
    if (!job || job.request.taskId !== event.taskId) {
      console.warn(
        `[ThreadPool] Worker ${slot.id} answered unknown task ${event.taskId}`,
      )
      return
    }

    slot.job = null
    if (event.type === eventKeywords.taskComplete) {
      job.complete(event.output)
    } else {
      job.fail(
        new ComputeFailure(event.error, {
          taskName: event.taskName,
          taskId: event.taskId,
        }),
      )
    }
    pump()
  }

  const handleCrash = (slot: PoolWorker, error: unknown) => {
    if (!slot.alive) return
    slot.alive = false
    console.error(`[ThreadPool] Worker ${slot.id} crashed:`, describeError(error))

    const job = slot.job
    slot.job = null
    if (job) {
      job.fail(
        new ComputeFailure(`Worker crashed: ${describeError(error)}`, {
          taskName: job.request.taskName,
          taskId: job.request.taskId,
          cause: error,
        }),
      )
    }

    const index = workers.indexOf(slot)
    if (index > -1) workers.splice(index, 1)
    if (!isTerminated()) {
      workers.push(spawn())
    }
    pump()
  }

  const spawn = (): PoolWorker => {
    const slot: PoolWorker = {
      id: nextWorkerId++,
      worker: createWorker(),
      ready: false,
      alive: true,
      job: null,
    }

    slot.worker.on('message', (message: unknown) => {
      const parsed = workerEventSchema.safeParse(message)
      if (!parsed.success) {
        console.warn(
          `[ThreadPool] Ignoring malformed message from worker ${slot.id}:`,
          parsed.error.message,
        )
        return
      }
      handleEvent(slot, parsed.data)
    })
    slot.worker.on('error', (error: Error) => handleCrash(slot, error))
    slot.worker.on('exit', (code: number) => {
      if (isTerminated()) return
      handleCrash(slot, new Error(`exited with code ${code}`))
    })

    return slot
  }

  for (let i = 0; i < size; i++) {
    workers.push(spawn())
  }
  log(`Spawned ${size} worker(s)`)

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
    log('Terminating...')
    state.update((s) => ({ ...s, status: poolStatusKeywords.terminated }))

    const stranded = [
      ...queue.splice(0, queue.length),
      ...workers.flatMap((slot) => (slot.job ? [slot.job] : [])),
    ]
    const exiting = workers.map((slot) => {
      slot.alive = false
      slot.job = null
      return slot.worker.terminate()
    })
    workers.length = 0
    syncCounts()

    stranded.forEach((job) => job.stop())
    await Promise.all(exiting)
    log('Terminated')
  }

  return {
    size,
    dispatch,
    getStatus: () => state.get().status,
    state,
    terminate,
  }
}
