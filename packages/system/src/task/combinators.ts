/**
 * Task Combinators
 *
 * Every combinator returns a new cold task and keeps the single-completion
 * contract: whatever the children do, the composed task signals once.
 */

import type { Scheduler } from '../scheduling/scheduler'
import type { Receiver, Task } from './core'
import { createTask } from './core'

/**
 * Transform the value of a task. A throwing transform becomes an error.
 */
export const then = <T, U>(
  task: Task<T>,
  transform: (value: T) => U,
): Task<U> =>
  createTask((receiver) => {
    task.start({
      setValue: (value) => {
        let mapped: U
        try {
          mapped = transform(value)
        } catch (error) {
          receiver.setError(error)
          return
        }
        receiver.setValue(mapped)
      },
      setError: receiver.setError,
      setStopped: receiver.setStopped,
    })
  })

/**
 * Sequence: when the task yields a value, start the task built from it and
 * forward that task's completion. Errors and stops skip the continuation.
 */
export const letValue = <T, U>(
  task: Task<T>,
  next: (value: T) => Task<U>,
): Task<U> =>
  createTask((receiver) => {
    task.start({
      setValue: (value) => {
        let continuation: Task<U>
        try {
          continuation = next(value)
        } catch (error) {
          receiver.setError(error)
          return
        }
        continuation.start(receiver)
      },
      setError: receiver.setError,
      setStopped: receiver.setStopped,
    })
  })

/**
 * Start `task` from the scheduler's execution context
 */
export const on = <T>(scheduler: Scheduler, task: Task<T>): Task<T> =>
  letValue(scheduler.schedule(), () => task)

/**
 * Fan-out/fan-in over a known number of tasks.
 *
 * All tasks start together. Values are collected by position, so index i of
 * the result always belongs to task i regardless of completion order. The
 * aggregate completes once every child has completed: with the first error
 * observed, else stopped if any child stopped, else the values.
 * Which of several concurrent errors arrives first is not specified.
 */
export const whenAll = <T>(tasks: ReadonlyArray<Task<T>>): Task<Array<T>> =>
  createTask((receiver) => {
    if (tasks.length === 0) {
      receiver.setValue([])
      return
    }

    const values: Array<T> = new Array<T>(tasks.length)
    let remaining = tasks.length
    let failure: { error: unknown } | null = null
    let stopped = false

    const childDone = () => {
      remaining -= 1
      if (remaining > 0) return

      if (failure) {
        receiver.setError(failure.error)
      } else if (stopped) {
        receiver.setStopped()
      } else {
        receiver.setValue(values)
      }
    }

    tasks.forEach((task, index) => {
      let done = false
      const child: Receiver<T> = {
        setValue: (value) => {
          if (done) return
          done = true
          values[index] = value
          childDone()
        },
        setError: (error) => {
          if (done) return
          done = true
          failure ??= { error }
          childDone()
        },
        setStopped: () => {
          if (done) return
          done = true
          stopped = true
          childDone()
        },
      }

      try {
        task.start(child)
      } catch (error) {
        child.setError(error)
      }
    })
  })

/**
 * Run the task again each time it yields `false`; complete when it yields
 * `true`. Errors and stops end the repetition.
 *
 * Iterations that complete synchronously are trampolined, so a long run of
 * them does not grow the stack.
 */
export const repeatEffectUntil = (task: Task<boolean>): Task<void> =>
  createTask<void>((receiver) => {
    let looping = false
    let pending = false

    const iteration: Receiver<boolean> = {
      setValue: (done) => {
        if (done) {
          receiver.setValue()
          return
        }
        next()
      },
      setError: receiver.setError,
      setStopped: receiver.setStopped,
    }

    const next = () => {
      pending = true
      if (looping) return

      looping = true
      while (pending) {
        pending = false
        task.start(iteration)
      }
      looping = false
    }

    next()
  })
