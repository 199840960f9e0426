/**
 * Terminal Display
 *
 * Interactive input and presentation backend on an ANSI terminal.
 *
 * - Input: raw stdin with SGR mouse reporting (press, release and drag
 *   motion). `q` or Ctrl-C closes.
 * - Output: the alternate screen; each character cell shows two raster rows
 *   with the upper-half block, the top pixel as foreground colour and the
 *   bottom pixel as background colour (24-bit).
 *
 * Dependencies:
 * - node:stream (types only)
 */

import type { Readable } from 'node:stream'
import type { ColorMatrix, InputEvent, PointerPosition } from '../vocabulary'
import { explorerKeywords } from '../vocabulary'
import type { Display } from './types'

const CSI = '\x1b['

export const terminalSequences = {
  enterAltScreen: `${CSI}?1049h`,
  leaveAltScreen: `${CSI}?1049l`,
  hideCursor: `${CSI}?25l`,
  showCursor: `${CSI}?25h`,
  // Button events, drag motion, SGR encoding
  mouseOn: `${CSI}?1000h${CSI}?1002h${CSI}?1006h`,
  mouseOff: `${CSI}?1006l${CSI}?1002l${CSI}?1000l`,
  resetStyle: `${CSI}0m`,
} as const

const UPPER_HALF_BLOCK = '▀'

// ============================================================================
// Input
// ============================================================================

const MOUSE_MOTION = 32
const MOUSE_WHEEL = 64

const INPUT_TOKEN =
  /\x1b\[<(\d+);(\d+);(\d+)([Mm])|\x1b\[[0-9;?]*[A-Za-z~]|[\s\S]/g

const CLOSE_KEYS = new Set(['q', 'Q', '\x03'])

export type ParsedTerminalInput = {
  events: Array<InputEvent>
  /** Last pointer position reported in the chunk */
  pointer: PointerPosition | null
}

const decodeMouse = (
  code: number,
  released: boolean,
): InputEvent | null => {
  if (code & MOUSE_WHEEL) return { type: explorerKeywords.inputEvents.other }
  if (code & MOUSE_MOTION) return null

  const button =
    (code & 3) === 0
      ? explorerKeywords.buttons.left
      : (code & 3) === 2
        ? explorerKeywords.buttons.right
        : null
  if (!button) return { type: explorerKeywords.inputEvents.other }

  return released
    ? { type: explorerKeywords.inputEvents.buttonReleased, button }
    : { type: explorerKeywords.inputEvents.buttonPressed, button }
}

/**
 * Translate a chunk of raw terminal input into input events, in order.
 * Mouse cells map to raster pixels: column c is x = c - 1, row r covers
 * raster rows 2(r - 1) and 2(r - 1) + 1 and reports the upper one.
 */
export function parseTerminalInput(data: string): ParsedTerminalInput {
  const events: Array<InputEvent> = []
  let pointer: PointerPosition | null = null

  for (const match of data.matchAll(INPUT_TOKEN)) {
    const [token, code, col, row, kind] = match

    if (code !== undefined && col !== undefined && row !== undefined) {
      pointer = { x: Number(col) - 1, y: (Number(row) - 1) * 2 }
      const event = decodeMouse(Number(code), kind === 'm')
      if (event) events.push(event)
      continue
    }

    events.push(
      CLOSE_KEYS.has(token)
        ? { type: explorerKeywords.inputEvents.closed }
        : { type: explorerKeywords.inputEvents.other },
    )
  }

  return { events, pointer }
}

// ============================================================================
// Output
// ============================================================================

const rgbAt = (data: Uint8ClampedArray, offset: number) =>
  `${data[offset]};${data[offset + 1]};${data[offset + 2]}`

/**
 * Escape sequences drawing the whole matrix from the top-left cell.
 * An odd last row is drawn over black.
 */
export function encodeFrame(colors: ColorMatrix): string {
  const { rows, cols, data } = colors
  const lines: Array<string> = []

  for (let row = 0; row < rows; row += 2) {
    let line = `${CSI}${row / 2 + 1};1H`
    for (let col = 0; col < cols; col++) {
      const top = rgbAt(data, (row * cols + col) * 3)
      const bottom = row + 1 < rows ? rgbAt(data, ((row + 1) * cols + col) * 3) : '0;0;0'
      line += `${CSI}38;2;${top}m${CSI}48;2;${bottom}m${UPPER_HALF_BLOCK}`
    }
    lines.push(line + terminalSequences.resetStyle)
  }

  return lines.join('')
}

// ============================================================================
// Display
// ============================================================================

export type TerminalInput = Readable & {
  isTTY?: boolean
  setRawMode?: (mode: boolean) => unknown
}

export type TerminalOutput = {
  write: (chunk: string) => unknown
}

export type TerminalDisplayOptions = {
  width: number
  height: number
  input?: TerminalInput
  output?: TerminalOutput
}

export function createTerminalDisplay({
  width,
  height,
  input = process.stdin,
  output = process.stdout,
}: TerminalDisplayOptions): Display {
  const events: Array<InputEvent> = []
  const pixels = new Uint8ClampedArray(width * height * 3)
  let pointer: PointerPosition = { x: -1, y: -1 }
  let pendingFrame: string | null = null
  let closed = false

  const onData = (chunk: Buffer | string) => {
    const parsed = parseTerminalInput(chunk.toString())
    events.push(...parsed.events)
    if (parsed.pointer) pointer = parsed.pointer
  }

  if (input.isTTY) input.setRawMode?.(true)
  input.on('data', onData)
  input.resume()
  output.write(
    terminalSequences.enterAltScreen +
      terminalSequences.hideCursor +
      terminalSequences.mouseOn,
  )

  return {
    pollEvent: () => events.shift() ?? null,
    pointerPosition: () => pointer,

    setPixel: (x, y, color) => {
      if (x < 0 || x >= width || y < 0 || y >= height) return
      pixels.set([color.r, color.g, color.b], (y * width + x) * 3)
    },
    commit: () => {
      pendingFrame = encodeFrame({ rows: height, cols: width, data: pixels })
    },
    present: () => {
      if (pendingFrame === null) return
      output.write(pendingFrame)
      pendingFrame = null
    },

    close: () => {
      if (closed) return
      closed = true
      input.off('data', onData)
      if (input.isTTY) input.setRawMode?.(false)
      input.pause()
      output.write(
        terminalSequences.mouseOff +
          terminalSequences.showCursor +
          terminalSequences.leaveAltScreen,
      )
    },
  }
}
