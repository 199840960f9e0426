/**
 * Headless Display
 *
 * In-memory input and presentation backend. Events are scripted with
 * `pushEvents`, the pointer with `movePointer`; committed frames are kept in
 * a colour matrix that can be read back.
 */

import type { ColorMatrix, InputEvent, PointerPosition, RgbColor } from '../vocabulary'
import type { Display } from './types'

export type HeadlessDisplay = Display & {
  pushEvents: (...events: Array<InputEvent>) => void
  movePointer: (position: PointerPosition) => void
  /** Colour at (x, y) in the last committed frame */
  pixelAt: (x: number, y: number) => RgbColor
  /** Last committed frame */
  frame: () => ColorMatrix
  presentedFrames: () => number
  isClosed: () => boolean
}

export function createHeadlessDisplay({
  width,
  height,
}: {
  width: number
  height: number
}): HeadlessDisplay {
  const events: Array<InputEvent> = []
  let pointer: PointerPosition = { x: -1, y: -1 }
  let drawing = new Uint8ClampedArray(width * height * 3)
  let committed = new Uint8ClampedArray(width * height * 3)
  let presented = 0
  let closed = false

  const inside = (x: number, y: number) =>
    Number.isInteger(x) && Number.isInteger(y) && x >= 0 && x < width && y >= 0 && y < height

  return {
    pollEvent: () => events.shift() ?? null,
    pointerPosition: () => pointer,

    setPixel: (x, y, color) => {
      if (!inside(x, y)) {
        throw new RangeError(`Pixel (${x}, ${y}) is outside the ${width}x${height} raster`)
      }
      drawing.set([color.r, color.g, color.b], (y * width + x) * 3)
    },
    commit: () => {
      committed = drawing
      drawing = new Uint8ClampedArray(committed)
    },
    present: () => {
      presented += 1
    },
    close: () => {
      closed = true
    },

    pushEvents: (...next) => {
      events.push(...next)
    },
    movePointer: (position) => {
      pointer = position
    },
    pixelAt: (x, y) => {
      const offset = (y * width + x) * 3
      return { r: committed[offset], g: committed[offset + 1], b: committed[offset + 2] }
    },
    frame: () => ({ rows: height, cols: width, data: committed }),
    presentedFrames: () => presented,
    isClosed: () => closed,
  }
}
