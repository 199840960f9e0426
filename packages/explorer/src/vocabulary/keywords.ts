/**
 * Explorer Keywords
 *
 * Single source of truth for the explorer's constants.
 *
 * Philosophy:
 * - No magic strings anywhere in the codebase
 * - Backends translate native input into this vocabulary
 */

export const explorerKeywords = {
  /**
   * Input events, as reported by an input backend
   */
  inputEvents: {
    closed: 'input/closed',
    buttonPressed: 'input/button-pressed',
    buttonReleased: 'input/button-released',
    other: 'input/other',
  },

  /**
   * Pointer buttons that drive the zoom
   * left zooms in, right zooms out
   */
  buttons: {
    left: 'left',
    right: 'right',
  },

  /**
   * Worker task names
   */
  tasks: {
    computeRegion: 'computeRegion',
  },

  /**
   * Where frames go
   */
  backends: {
    terminal: 'terminal',
    headless: 'headless',
  },
} as const

export type InputEventType =
  (typeof explorerKeywords.inputEvents)[keyof typeof explorerKeywords.inputEvents]

export type PointerButton =
  (typeof explorerKeywords.buttons)[keyof typeof explorerKeywords.buttons]
