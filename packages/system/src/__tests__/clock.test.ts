/**
 * Frame Timing Tests
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import {
  createStopwatch,
  delay,
  frameBudgetMs,
  outcomeKeywords,
  settle,
  waitForFps,
} from '@fractalflow/system'

describe('createStopwatch', () => {
  it('should measure from creation and from each restart', () => {
    let now = 1000
    const stopwatch = createStopwatch(() => now)

    now = 1040
    expect(stopwatch.elapsedMs()).toBe(40)

    stopwatch.restart()
    now = 1050
    expect(stopwatch.elapsedMs()).toBe(10)
  })
})

describe('frameBudgetMs', () => {
  it('should divide one second by the target rate', () => {
    expect(frameBudgetMs(50)).toBe(20)
  })

  it('should reject a non-positive rate', () => {
    expect(() => frameBudgetMs(0)).toThrow(RangeError)
  })
})

describe('waitForFps', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('should sleep out the remainder of the frame budget', async () => {
    let now = 0
    const stopwatch = createStopwatch(() => now)
    now = 5

    let finished = false
    const pending = settle(waitForFps(stopwatch, 50)).then((outcome) => {
      finished = true
      return outcome
    })

    await vi.advanceTimersByTimeAsync(14)
    expect(finished).toBe(false)

    now = 20
    await vi.advanceTimersByTimeAsync(1)
    expect(await pending).toEqual({ type: outcomeKeywords.value, value: undefined })
    expect(stopwatch.elapsedMs()).toBe(0)
  })

  it('should continue at once when the frame overran its budget', async () => {
    let now = 0
    const stopwatch = createStopwatch(() => now)
    now = 35

    const outcome = await settle(waitForFps(stopwatch, 50))

    expect(outcome.type).toBe(outcomeKeywords.value)
    expect(stopwatch.elapsedMs()).toBe(0)
  })
})

describe('delay', () => {
  beforeEach(() => {
    vi.useFakeTimers()
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('should complete after the given time', async () => {
    let finished = false
    void settle(delay(100)).then(() => {
      finished = true
    })

    await vi.advanceTimersByTimeAsync(99)
    expect(finished).toBe(false)

    await vi.advanceTimersByTimeAsync(1)
    expect(finished).toBe(true)
  })
})
