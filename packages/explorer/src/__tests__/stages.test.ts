/**
 * Frame Stage Tests
 */

import { describe, expect, it, vi } from 'vitest'
import {
  ComputeFailure,
  createInlinePool,
  createStopwatch,
  outcomeKeywords,
  settle,
} from '@fractalflow/system'
import {
  DEFAULT_VIEWPORT,
  applyInputEvent,
  calculateFrame,
  createAppState,
  createFractalRenderer,
  createHeadlessDisplay,
  createInitialState,
  emptyRenderResult,
  explorerKeywords,
  handleEvents,
  presentFrame,
  regionTasks,
  viewportHeight,
  viewportWidth,
} from '@fractalflow/explorer'
import type {
  PresentationBackend,
  RenderResult,
  RenderSettings,
} from '@fractalflow/explorer'
import { createHookedRegionPool } from '../testing/regionPools'

const { inputEvents, buttons } = explorerKeywords

const settings: RenderSettings = {
  width: 40,
  height: 30,
  maxIterations: 40,
  escapeRadius: 2,
}

// ============================================================================
// Input/Viewport Stage
// ============================================================================

describe('applyInputEvent', () => {
  const idle = { ...createInitialState(), needsRecompute: false }

  it('should request exit on close', () => {
    expect(applyInputEvent(idle, { type: inputEvents.closed }).shouldExit).toBe(true)
  })

  it('should hold the button and request a redraw on press', () => {
    expect(
      applyInputEvent(idle, { type: inputEvents.buttonPressed, button: buttons.right }),
    ).toEqual({ ...idle, rightPressed: true, needsRecompute: true })
  })

  it('should only release the button on release', () => {
    const held = { ...idle, leftPressed: true }
    expect(
      applyInputEvent(held, { type: inputEvents.buttonReleased, button: buttons.left }),
    ).toEqual(idle)
  })

  it('should ignore other events', () => {
    expect(applyInputEvent(idle, { type: inputEvents.other })).toBe(idle)
  })
})

describe('handleEvents', () => {
  const setup = (elapsedMs = 0) => {
    let now = 1000
    const zoomStopwatch = createStopwatch(() => now)
    now += elapsedMs
    const display = createHeadlessDisplay(settings)
    const state = createAppState()
    state.update((s) => ({ ...s, needsRecompute: false }))

    return {
      display,
      state,
      zoomStopwatch,
      advance: (ms: number) => {
        now += ms
      },
      stage: handleEvents({ input: display, state, settings, zoomStopwatch }),
    }
  }

  it('should drain every pending event in one step', async () => {
    const { display, state, stage } = setup()
    display.pushEvents(
      { type: inputEvents.buttonPressed, button: buttons.left },
      { type: inputEvents.other },
      { type: inputEvents.buttonReleased, button: buttons.left },
    )

    expect(await settle(stage)).toEqual({ type: outcomeKeywords.value, value: undefined })
    expect(display.pollEvent()).toBeNull()
    expect(state.get()).toMatchObject({ leftPressed: false, needsRecompute: true })
  })

  it('should complete stopped once exit is requested', async () => {
    const { display, state, stage } = setup()
    display.pushEvents({ type: inputEvents.closed })

    expect(await settle(stage)).toEqual({ type: outcomeKeywords.stopped })
    expect(state.get().shouldExit).toBe(true)
  })

  it('should zoom in around the pointer while the left button is held', async () => {
    const { display, state, stage } = setup(100)
    display.movePointer({ x: 20, y: 15 })
    display.pushEvents({ type: inputEvents.buttonPressed, button: buttons.left })

    await settle(stage)

    const { viewport, needsRecompute } = state.get()
    expect(viewportWidth(viewport)).toBeCloseTo(3 * 0.8, 12)
    expect(viewportHeight(viewport)).toBeCloseTo(3 * 0.8, 12)
    expect(viewportWidth(viewport)).toBeLessThan(viewportWidth(DEFAULT_VIEWPORT))
    // (20, 15) is the centre of a 40x30 raster: (-0.5, 0)
    expect((viewport.xMin + viewport.xMax) / 2).toBeCloseTo(-0.5, 12)
    expect((viewport.yMin + viewport.yMax) / 2).toBeCloseTo(0, 12)
    expect(needsRecompute).toBe(true)
  })

  it('should zoom out while the right button is held', async () => {
    const { display, state, stage } = setup(150)
    display.movePointer({ x: 20, y: 15 })
    display.pushEvents({ type: inputEvents.buttonPressed, button: buttons.right })

    await settle(stage)

    expect(viewportWidth(state.get().viewport)).toBeCloseTo(3 / 0.8, 12)
  })

  it('should wait for the zoom interval between steps', async () => {
    const { display, state, stage, advance } = setup(100)
    display.movePointer({ x: 20, y: 15 })
    display.pushEvents({ type: inputEvents.buttonPressed, button: buttons.left })

    await settle(stage)
    const afterFirst = state.get().viewport

    advance(99)
    await settle(stage)
    expect(state.get().viewport).toBe(afterFirst)

    advance(1)
    await settle(stage)
    expect(viewportWidth(state.get().viewport)).toBeCloseTo(3 * 0.8 * 0.8, 12)
  })

  it('should not zoom while the pointer is outside the raster', async () => {
    const { display, state, stage, zoomStopwatch } = setup(500)
    display.movePointer({ x: 40, y: 10 })
    display.pushEvents({ type: inputEvents.buttonPressed, button: buttons.left })

    await settle(stage)

    expect(state.get().viewport).toEqual(DEFAULT_VIEWPORT)
    expect(zoomStopwatch.elapsedMs()).toBe(500)
  })

  it('should not zoom when no button is held', async () => {
    const { display, state, stage } = setup(500)
    display.movePointer({ x: 20, y: 15 })

    await settle(stage)

    expect(state.get().viewport).toEqual(DEFAULT_VIEWPORT)
    expect(state.get().needsRecompute).toBe(false)
  })
})

// ============================================================================
// Render-Decision Stage
// ============================================================================

describe('calculateFrame', () => {
  it('should short-circuit without placing anything on the pool', async () => {
    const pool = createInlinePool({ tasks: regionTasks })
    const dispatch = vi.spyOn(pool, 'dispatch')
    const renderer = createFractalRenderer({ pool, bandCount: 4 })
    const state = createAppState()
    state.update((s) => ({ ...s, needsRecompute: false }))

    const outcome = await settle(calculateFrame({ state, settings, renderer }))

    expect(outcome).toEqual({
      type: outcomeKeywords.value,
      value: emptyRenderResult(DEFAULT_VIEWPORT, settings),
    })
    expect(dispatch).not.toHaveBeenCalled()
  })

  it('should render the full raster and clear the flag', async () => {
    const pool = createInlinePool({ tasks: regionTasks, size: 2 })
    const dispatch = vi.spyOn(pool, 'dispatch')
    const renderer = createFractalRenderer({ pool, bandCount: 4 })
    const state = createAppState()

    const outcome = await settle(calculateFrame({ state, settings, renderer }))

    expect(outcome.type).toBe(outcomeKeywords.value)
    if (outcome.type !== outcomeKeywords.value) return
    expect(outcome.value.colors.rows).toBe(30)
    expect(outcome.value.colors.cols).toBe(40)
    expect(outcome.value.iterations.rows).toBe(30)
    expect(outcome.value.iterations.cols).toBe(40)
    expect(state.get().needsRecompute).toBe(false)
    expect(dispatch).toHaveBeenCalledTimes(4)
  })

  it('should keep the flag set when a region fails', async () => {
    const pool = createHookedRegionPool(({ region }) => {
      if (region.startRow > 0) throw new Error('out of memory')
    })
    const renderer = createFractalRenderer({ pool, bandCount: 3 })
    const state = createAppState()

    const outcome = await settle(calculateFrame({ state, settings, renderer }))

    expect(outcome.type).toBe(outcomeKeywords.error)
    if (outcome.type !== outcomeKeywords.error) return
    expect(outcome.error).toBeInstanceOf(ComputeFailure)
    expect(state.get().needsRecompute).toBe(true)
  })

  it('should stop when the render is stopped', async () => {
    const pool = createInlinePool({ tasks: regionTasks })
    const renderer = createFractalRenderer({ pool, bandCount: 2 })
    const state = createAppState()
    await pool.terminate()

    expect(await settle(calculateFrame({ state, settings, renderer }))).toEqual({
      type: outcomeKeywords.stopped,
    })
    expect(state.get().needsRecompute).toBe(true)
  })
})

// ============================================================================
// Presentation Stage
// ============================================================================

const createRecordingBackend = () => {
  const calls: Array<string> = []
  const backend: PresentationBackend = {
    setPixel: (x, y, { r, g, b }) => calls.push(`pixel ${x},${y} ${r},${g},${b}`),
    commit: () => calls.push('commit'),
    present: () => calls.push('present'),
  }
  return { calls, backend }
}

describe('presentFrame', () => {
  it('should draw nothing for an empty result', async () => {
    const { calls, backend } = createRecordingBackend()

    await settle(presentFrame(backend, emptyRenderResult(DEFAULT_VIEWPORT, settings)))

    expect(calls).toEqual([])
  })

  it('should write every pixel, then commit and present', async () => {
    const { calls, backend } = createRecordingBackend()
    const result: RenderResult = {
      viewport: DEFAULT_VIEWPORT,
      settings: { ...settings, width: 2, height: 2 },
      iterations: { rows: 2, cols: 2, data: new Uint32Array(4) },
      colors: {
        rows: 2,
        cols: 2,
        data: new Uint8ClampedArray([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]),
      },
    }

    const outcome = await settle(presentFrame(backend, result))

    expect(outcome.type).toBe(outcomeKeywords.value)
    expect(calls).toEqual([
      'pixel 0,0 1,2,3',
      'pixel 1,0 4,5,6',
      'pixel 0,1 7,8,9',
      'pixel 1,1 10,11,12',
      'commit',
      'present',
    ])
  })

  it('should show the frame on the headless display', async () => {
    const display = createHeadlessDisplay({ width: 1, height: 2 })
    const result: RenderResult = {
      viewport: DEFAULT_VIEWPORT,
      settings: { ...settings, width: 1, height: 2 },
      iterations: { rows: 2, cols: 1, data: new Uint32Array(2) },
      colors: { rows: 2, cols: 1, data: new Uint8ClampedArray([9, 8, 7, 6, 5, 4]) },
    }

    await settle(presentFrame(display, result))

    expect(display.pixelAt(0, 1)).toEqual({ r: 6, g: 5, b: 4 })
    expect(display.presentedFrames()).toBe(1)
  })
})
