/**
 * Task Primitive Tests
 */

import { describe, expect, it, vi } from 'vitest'
import {
  createTask,
  fromPromise,
  just,
  justError,
  justStopped,
  outcomeKeywords,
  settle,
  waitForTask,
} from '@fractalflow/system'
import type { Receiver } from '@fractalflow/system'

const createRecorder = <T>() => {
  const signals: Array<string> = []
  const receiver: Receiver<T> = {
    setValue: (value) => signals.push(`value:${String(value)}`),
    setError: (error) => signals.push(`error:${String(error)}`),
    setStopped: () => signals.push('stopped'),
  }
  return { signals, receiver }
}

describe('createTask', () => {
  it('should not run the body until started', () => {
    const body = vi.fn((receiver: Receiver<number>) => receiver.setValue(1))
    const task = createTask(body)

    expect(body).not.toHaveBeenCalled()

    task.start(createRecorder<number>().receiver)
    expect(body).toHaveBeenCalledTimes(1)
  })

  it('should run the body again on every start', () => {
    let runs = 0
    const task = createTask<number>((receiver) => receiver.setValue(++runs))

    const first = createRecorder<number>()
    const second = createRecorder<number>()
    task.start(first.receiver)
    task.start(second.receiver)

    expect(first.signals).toEqual(['value:1'])
    expect(second.signals).toEqual(['value:2'])
  })

  it('should deliver only the first completion signal', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
    const task = createTask<number>((receiver) => {
      receiver.setValue(1)
      receiver.setError('late')
      receiver.setStopped()
      receiver.setValue(2)
    })

    const { signals, receiver } = createRecorder<number>()
    task.start(receiver)

    expect(signals).toEqual(['value:1'])
    expect(warn).toHaveBeenCalledTimes(3)
    warn.mockRestore()
  })

  it('should turn a synchronous throw into an error', () => {
    const task = createTask<number>(() => {
      throw 'boom'
    })

    const { signals, receiver } = createRecorder<number>()
    task.start(receiver)

    expect(signals).toEqual(['error:boom'])
  })

  it('should turn a rejected async body into an error', async () => {
    const failure = new Error('async boom')
    const task = createTask<number>(async () => {
      await Promise.resolve()
      throw failure
    })

    const outcome = await settle(task)
    expect(outcome).toEqual({ type: outcomeKeywords.error, error: failure })
  })

  it('should rethrow failures raised by the receiver after completion', () => {
    const task = createTask<number>((receiver) => receiver.setValue(1))

    expect(() =>
      task.start({
        setValue: () => {
          throw new Error('consumer failed')
        },
        setError: () => {},
        setStopped: () => {},
      }),
    ).toThrow('consumer failed')
  })
})

describe('constructors', () => {
  it('should complete just() with its value', async () => {
    expect(await settle(just(42))).toEqual({
      type: outcomeKeywords.value,
      value: 42,
    })
  })

  it('should complete justError() with the error untouched', async () => {
    const error = { code: 7 }
    expect(await settle(justError(error))).toEqual({
      type: outcomeKeywords.error,
      error,
    })
  })

  it('should complete justStopped() as stopped', async () => {
    expect(await settle(justStopped())).toEqual({
      type: outcomeKeywords.stopped,
    })
  })

  it('should call the promise factory only when started', async () => {
    const factory = vi.fn(async () => 'ready')
    const task = fromPromise(factory)

    expect(factory).not.toHaveBeenCalled()
    expect(await waitForTask(task)).toBe('ready')
    expect(factory).toHaveBeenCalledTimes(1)
  })
})

describe('waitForTask', () => {
  it('should resolve null for a stopped task', async () => {
    expect(await waitForTask(justStopped<number>())).toBeNull()
  })

  it('should reject with the task error', async () => {
    const error = new Error('compute failed')
    await expect(waitForTask(justError(error))).rejects.toBe(error)
  })
})
