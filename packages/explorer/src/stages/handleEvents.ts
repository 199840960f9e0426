/**
 * Input/Viewport Stage
 *
 * One step of the input state machine per frame:
 * 1. drain every pending input event into the application state
 * 2. continuous zoom: while a button is held, at most one zoom step per
 *    interval, recentred on the pointer
 *
 * Completes stopped once an exit was requested, so the rest of the frame and
 * the repeat loop end; otherwise completes with no value.
 */

import { createTask } from '@fractalflow/system'
import type { Stopwatch, Task } from '@fractalflow/system'
import type { InputBackend } from '../backends/types'
import { isInsideRaster, zoomToPoint } from '../math/viewport'
import type { AppStateAtom } from '../state/appState'
import type { ApplicationState, InputEvent, RenderSettings } from '../vocabulary'
import { explorerKeywords } from '../vocabulary'

export const DEFAULT_ZOOM_INTERVAL_MS = 100
export const DEFAULT_ZOOM_FACTOR = 0.8

export type HandleEventsOptions = {
  input: InputBackend
  state: AppStateAtom
  settings: Pick<RenderSettings, 'width' | 'height'>
  zoomStopwatch: Stopwatch
  zoomIntervalMs?: number
  /** Span scale per zoom-in step; zoom-out uses its inverse */
  zoomFactor?: number
}

/**
 * Fold one input event into the state. A press asks for a redraw; a release
 * only clears the button.
 */
export function applyInputEvent(
  state: ApplicationState,
  event: InputEvent,
): ApplicationState {
  switch (event.type) {
    case explorerKeywords.inputEvents.closed:
      return { ...state, shouldExit: true }

    case explorerKeywords.inputEvents.buttonPressed:
      return event.button === explorerKeywords.buttons.left
        ? { ...state, leftPressed: true, needsRecompute: true }
        : { ...state, rightPressed: true, needsRecompute: true }

    case explorerKeywords.inputEvents.buttonReleased:
      return event.button === explorerKeywords.buttons.left
        ? { ...state, leftPressed: false }
        : { ...state, rightPressed: false }

    case explorerKeywords.inputEvents.other:
      return state
  }
}

export const handleEvents = ({
  input,
  state,
  settings,
  zoomStopwatch,
  zoomIntervalMs = DEFAULT_ZOOM_INTERVAL_MS,
  zoomFactor = DEFAULT_ZOOM_FACTOR,
}: HandleEventsOptions): Task<void> =>
  createTask<void>((receiver) => {
    for (let event = input.pollEvent(); event; event = input.pollEvent()) {
      const next = event
      state.update((s) => applyInputEvent(s, next))
    }

    const current = state.get()
    if (current.shouldExit) {
      receiver.setStopped()
      return
    }

    const held = current.leftPressed || current.rightPressed
    if (held && zoomStopwatch.elapsedMs() >= zoomIntervalMs) {
      const pointer = input.pointerPosition()
      if (isInsideRaster(pointer, settings.width, settings.height)) {
        // Left wins when both are held
        const scale = current.leftPressed ? zoomFactor : 1 / zoomFactor
        state.update((s) => ({
          ...s,
          viewport: zoomToPoint(s.viewport, pointer, settings, scale),
          needsRecompute: true,
        }))
        zoomStopwatch.restart()
      }
    }

    receiver.setValue()
  })
