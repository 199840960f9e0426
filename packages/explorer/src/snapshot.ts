/**
 * Snapshot
 *
 * Renders the current view once, whatever the recompute flag says, and
 * encodes it as a binary PPM.
 */

import { waitForTask } from '@fractalflow/system'
import type { FractalRenderer } from './render/renderer'
import { encodePpm } from './render/ppm'
import type { AppStateAtom } from './state/appState'
import { calculateFrame } from './stages/calculateFrame'
import type { RenderSettings } from './vocabulary'

export async function renderSnapshot({
  state,
  renderer,
  settings,
}: {
  state: AppStateAtom
  renderer: FractalRenderer
  settings: RenderSettings
}): Promise<Buffer> {
  state.update((s) => ({ ...s, needsRecompute: true }))

  const result = await waitForTask(calculateFrame({ state, settings, renderer }))
  if (!result) {
    throw new Error('Snapshot render was stopped')
  }

  return encodePpm(result.colors)
}
