/**
 * Backend Contracts
 *
 * The frame pipeline only talks to these two interfaces; the terminal and
 * headless displays implement both.
 */

import type { InputEvent, PointerPosition, RgbColor } from '../vocabulary'

export type InputBackend = {
  /** Next pending event, or `null` when none is waiting. Never blocks. */
  pollEvent: () => InputEvent | null
  /** Raster pixel under the pointer; may lie outside the raster */
  pointerPosition: () => PointerPosition
}

export type PresentationBackend = {
  setPixel: (x: number, y: number, color: RgbColor) => void
  /** Make the pixels written since the last commit the next frame */
  commit: () => void
  /** Show the committed frame */
  present: () => void
}

export type Display = InputBackend &
  PresentationBackend & {
    close: () => void
  }
