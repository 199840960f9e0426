/**
 * Task Primitive
 *
 * A Task is a cold, deferred unit of async work. Nothing runs until `start`
 * is called with a receiver, and every start delivers exactly one of three
 * signals to that receiver: a value, an error, or a stop.
 *
 * Philosophy:
 * - Completion is data (value | error | stopped)
 * - Errors travel opaque; only the final consumer looks inside
 * - Starting is the only trigger, and a task may be started again
 *
 * @example
 * ```ts
 * const answer = then(just(21), (value) => value * 2)
 * const outcome = await settle(answer)
 * // { type: 'task/value', value: 42 }
 * ```
 */

// ============================================================================
// Vocabulary
// ============================================================================

export const outcomeKeywords = {
  value: 'task/value',
  error: 'task/error',
  stopped: 'task/stopped',
} as const

export type Outcome<T> =
  | { type: typeof outcomeKeywords.value; value: T }
  | { type: typeof outcomeKeywords.error; error: unknown }
  | { type: typeof outcomeKeywords.stopped }

/**
 * Continuation handed to a task when it starts
 */
export type Receiver<T> = {
  setValue: (value: T) => void
  setError: (error: unknown) => void
  setStopped: () => void
}

export type Task<T> = {
  start: (receiver: Receiver<T>) => void
}

export type TaskValue<TTask> = TTask extends Task<infer T> ? T : never

// ============================================================================
// Construction
// ============================================================================

/**
 * Guard a receiver so that only the first completion signal reaches it
 */
const createOnceReceiver = <T>(downstream: Receiver<T>) => {
  let settled = false

  const settle = (signal: string, deliver: () => void) => {
    if (settled) {
      console.warn(`[Task] Ignoring ${signal} signal after completion`)
      return
    }
    settled = true
    deliver()
  }

  const receiver: Receiver<T> = {
    setValue: (value) =>
      settle(outcomeKeywords.value, () => downstream.setValue(value)),
    setError: (error) =>
      settle(outcomeKeywords.error, () => downstream.setError(error)),
    setStopped: () =>
      settle(outcomeKeywords.stopped, () => downstream.setStopped()),
  }

  return { receiver, isSettled: () => settled }
}

/**
 * Create a task from a body that completes its receiver.
 *
 * A synchronous throw, or a rejection of an async body, becomes `setError`
 * unless the receiver already completed. Failures raised by the downstream
 * receiver itself are not converted: a synchronous one is rethrown to the
 * starter, an asynchronous one is reported.
 */
export const createTask = <T>(
  body: (receiver: Receiver<T>) => void | Promise<void>,
): Task<T> => ({
  start: (downstream) => {
    const { receiver, isSettled } = createOnceReceiver(downstream)

    let result: void | Promise<void>
    try {
      result = body(receiver)
    } catch (error) {
      if (isSettled()) throw error
      receiver.setError(error)
      return
    }

    if (result instanceof Promise) {
      void result.catch((error: unknown) => {
        if (isSettled()) {
          console.error('[Task] Failure raised after completion:', error)
          return
        }
        receiver.setError(error)
      })
    }
  },
})

export const just = <T>(value: T): Task<T> =>
  createTask((receiver) => receiver.setValue(value))

export const justError = <T = never>(error: unknown): Task<T> =>
  createTask((receiver) => receiver.setError(error))

export const justStopped = <T = never>(): Task<T> =>
  createTask((receiver) => receiver.setStopped())

/**
 * Lift a promise factory into a task. The factory runs on every start.
 */
export const fromPromise = <T>(factory: () => Promise<T>): Task<T> =>
  createTask(async (receiver) => {
    const value = await factory()
    receiver.setValue(value)
  })

// ============================================================================
// Consumption
// ============================================================================

/**
 * Start a task and resolve with its outcome. Never rejects for task errors.
 */
export const settle = <T>(task: Task<T>): Promise<Outcome<T>> =>
  new Promise((resolve) => {
    task.start({
      setValue: (value) => resolve({ type: outcomeKeywords.value, value }),
      setError: (error) => resolve({ type: outcomeKeywords.error, error }),
      setStopped: () => resolve({ type: outcomeKeywords.stopped }),
    })
  })

/**
 * Start a task and wait for it: the value, `null` when it stopped.
 * Rejects with the task's error untouched.
 */
export const waitForTask = async <T>(task: Task<T>): Promise<T | null> => {
  const outcome = await settle(task)
  switch (outcome.type) {
    case outcomeKeywords.value:
      return outcome.value
    case outcomeKeywords.stopped:
      return null
    case outcomeKeywords.error:
      throw outcome.error
  }
}
