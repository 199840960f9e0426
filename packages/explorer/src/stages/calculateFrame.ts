/**
 * Render-Decision Stage
 *
 * Unchanged view: an empty result at once, nothing placed on the pool.
 * Changed view: start the fan-out/fan-in render and wait for the whole frame.
 * This wait is the only point where the orchestrator suspends; the workers
 * keep running meanwhile.
 *
 * The recompute flag is cleared only when the frame arrives. A failed frame
 * leaves it set and passes the error on; a stopped render stops the stage.
 */

import { createTask, outcomeKeywords, settle } from '@fractalflow/system'
import type { Task } from '@fractalflow/system'
import { emptyRenderResult } from '../render/renderer'
import type { FractalRenderer } from '../render/renderer'
import type { AppStateAtom } from '../state/appState'
import type { RenderResult, RenderSettings } from '../vocabulary'

export type CalculateFrameOptions = {
  state: AppStateAtom
  settings: RenderSettings
  renderer: FractalRenderer
}

export const calculateFrame = ({
  state,
  settings,
  renderer,
}: CalculateFrameOptions): Task<RenderResult> =>
  createTask<RenderResult>(async (receiver) => {
    const { needsRecompute, viewport } = state.get()
    if (!needsRecompute) {
      receiver.setValue(emptyRenderResult(viewport, settings))
      return
    }

    const outcome = await settle(renderer.render(viewport, settings))

    switch (outcome.type) {
      case outcomeKeywords.value:
        state.update((s) => ({ ...s, needsRecompute: false }))
        receiver.setValue(outcome.value)
        return
      case outcomeKeywords.error:
        receiver.setError(outcome.error)
        return
      case outcomeKeywords.stopped:
        receiver.setStopped()
        return
    }
  })
