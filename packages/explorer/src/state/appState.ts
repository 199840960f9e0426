/**
 * Application State
 *
 * One atom, written only by the stages of the frame pipeline on the
 * orchestrating thread. The first frame is drawn because `needsRecompute`
 * starts out set.
 */

import { createAtom } from '@fractalflow/system'
import type { Atom } from '@fractalflow/system'
import { DEFAULT_VIEWPORT, assertViewport } from '../math/viewport'
import type { ApplicationState, Viewport } from '../vocabulary'

export type AppStateAtom = Atom<ApplicationState>

export const createInitialState = (
  viewport: Viewport = DEFAULT_VIEWPORT,
): ApplicationState => ({
  shouldExit: false,
  leftPressed: false,
  rightPressed: false,
  needsRecompute: true,
  viewport: assertViewport(viewport),
})

export const createAppState = (viewport?: Viewport): AppStateAtom =>
  createAtom(createInitialState(viewport))
