/**
 * Worker Tasks - Worker Side
 *
 * Runs inside a worker thread: receives task requests, executes them against
 * the registry, and posts back a completion or an error. Announces itself
 * with `worker/ready` once listening.
 *
 * Dependencies:
 * - node:worker_threads
 * - zod: request and input validation
 */

import type { MessagePort, TransferListItem } from 'node:worker_threads'
import { parentPort } from 'node:worker_threads'
import { describeError } from '../errors'
import type { TaskRegistry, WorkerEvent } from './core'
import { eventKeywords, taskRequestSchema } from './core'

type HostPort = Pick<MessagePort, 'on' | 'off' | 'postMessage'>

export type WorkerHostOptions<TTasks extends TaskRegistry> = {
  tasks: TTasks
  /** Defaults to `parentPort` of the current worker thread */
  port?: HostPort | null
}

/**
 * Execute a task and send results back to the pool
 */
const executeTask = async (
  taskId: string,
  taskName: string,
  input: unknown,
  tasks: TaskRegistry,
  send: (event: WorkerEvent, transfer?: Array<TransferListItem>) => void,
): Promise<void> => {
  const task = tasks[taskName]
  if (!task) {
    send({
      type: eventKeywords.taskError,
      taskId,
      taskName,
      error: `Unknown task: ${taskName}`,
    })
    return
  }

  const inputResult = task.parseIO
    ? task.input.safeParse(input)
    : { success: true as const, data: input }

  if (!inputResult.success) {
    send({
      type: eventKeywords.taskError,
      taskId,
      taskName,
      error: `Invalid input: ${inputResult.error.message}`,
    })
    return
  }

  try {
    const output = await task.execute(inputResult.data)
    send(
      {
        type: eventKeywords.taskComplete,
        taskId,
        taskName,
        output,
      },
      task.transfer?.(output),
    )
  } catch (error) {
    send({
      type: eventKeywords.taskError,
      taskId,
      taskName,
      error: describeError(error),
    })
  }
}

/**
 * Start serving a task registry on the worker's port.
 * Returns a function that stops listening.
 */
export function startWorkerHost<TTasks extends TaskRegistry>({
  tasks,
  port = parentPort,
}: WorkerHostOptions<TTasks>): () => void {
  if (!port) {
    throw new Error('startWorkerHost must run inside a worker thread')
  }

  const send = (event: WorkerEvent, transfer?: Array<TransferListItem>) => {
    port.postMessage(event, transfer)
  }

  const handleMessage = (message: unknown) => {
    const request = taskRequestSchema.safeParse(message)
    if (!request.success) {
      console.warn('[WorkerHost] Ignoring malformed request:', request.error.message)
      return
    }

    const { taskId, taskName, input } = request.data
    void executeTask(taskId, taskName, input, tasks, send)
  }

  port.on('message', handleMessage)
  send({ type: eventKeywords.workerReady, timestamp: Date.now() })

  return () => {
    port.off('message', handleMessage)
  }
}
