/**
 * Worker Tasks - Dispatch
 *
 * The part every pool shares: turning `dispatch(name, input)` into a cold
 * Task whose start places a job on the pool, and validating what comes back.
 */

import { ComputeFailure, describeError } from '../errors'
import type { Atom } from '../state'
import type { Task } from '../task/core'
import { createTask } from '../task/core'
import type {
  InferInput,
  InferOutput,
  PoolStatus,
  TaskName,
  TaskRegistry,
  TaskRequest,
} from './core'
import { eventKeywords, generateTaskId } from './core'

/**
 * A placed job. Exactly one of the three callbacks is used, by the pool.
 */
export type PoolJob = {
  request: TaskRequest
  complete: (output: unknown) => void
  fail: (error: unknown) => void
  stop: () => void
}

export type PoolState = {
  status: PoolStatus
  queued: number
  running: number
}

export type WorkerPool<TTasks extends TaskRegistry> = {
  /** Number of workers, fixed at construction */
  size: number
  /**
   * Place a task on the pool. Nothing is queued until the returned task is
   * started; each start queues one job.
   */
  dispatch: <TName extends TaskName<TTasks>>(
    taskName: TName,
    input: InferInput<TTasks[TName]>,
  ) => Task<InferOutput<TTasks[TName]>>
  getStatus: () => PoolStatus
  state: Atom<PoolState>
  /** Stop queued and running jobs and release the workers */
  terminate: () => Promise<void>
}

type DispatchOptions<TTasks extends TaskRegistry> = {
  tasks: TTasks
  isTerminated: () => boolean
  place: (job: PoolJob) => void
}

export function createDispatch<TTasks extends TaskRegistry>({
  tasks,
  isTerminated,
  place,
}: DispatchOptions<TTasks>): WorkerPool<TTasks>['dispatch'] {
  return <TName extends TaskName<TTasks>>(
    taskName: TName,
    input: InferInput<TTasks[TName]>,
  ): Task<InferOutput<TTasks[TName]>> =>
    createTask<InferOutput<TTasks[TName]>>((receiver) => {
      if (isTerminated()) {
        receiver.setStopped()
        return
      }

      const definition = tasks[taskName]
      const taskId = generateTaskId()

      place({
        request: {
          type: eventKeywords.taskRequest,
          taskId,
          taskName,
          input,
        },
        complete: (output) => {
          const outputSchema: TTasks[TName]['output'] = definition.output
          const parsed = outputSchema.safeParse(output)
          if (!parsed.success) {
            receiver.setError(
              new ComputeFailure(
                `Invalid output from ${taskName}: ${parsed.error.message}`,
                { taskName, taskId, cause: parsed.error },
              ),
            )
            return
          }
          receiver.setValue(parsed.data)
        },
        fail: (error) => {
          receiver.setError(
            error instanceof ComputeFailure
              ? error
              : new ComputeFailure(`${taskName} failed: ${describeError(error)}`, {
                  taskName,
                  taskId,
                  cause: error,
                }),
          )
        },
        stop: () => receiver.setStopped(),
      })
    })
}
