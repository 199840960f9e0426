/**
 * Palette
 *
 * Deterministic iteration-count to colour mapping using chroma-js.
 * Escaping points are spread over a lab-interpolated gradient by
 * `iterations / maxIterations`; points that reach the bound take the
 * interior colour.
 *
 * Lookup tables are built once per iteration bound.
 */

import chroma from 'chroma-js'
import type { RgbColor } from '../vocabulary'

export const INTERIOR_COLOR: RgbColor = Object.freeze({ r: 0, g: 0, b: 0 })

const GRADIENT_STOPS = ['#000764', '#206bcb', '#edffff', '#ffaa00', '#000200']

const gradient = chroma.scale(GRADIENT_STOPS).mode('lab').domain([0, 1])

const tables = new Map<number, Uint8ClampedArray>()

/**
 * RGB triplets indexed by iteration count, `maxIterations + 1` entries
 */
export function paletteFor(maxIterations: number): Uint8ClampedArray {
  const cached = tables.get(maxIterations)
  if (cached) return cached

  const table = new Uint8ClampedArray((maxIterations + 1) * 3)
  for (let i = 0; i < maxIterations; i++) {
    const [r, g, b] = gradient(i / maxIterations).rgb()
    table.set([r, g, b], i * 3)
  }
  table.set(
    [INTERIOR_COLOR.r, INTERIOR_COLOR.g, INTERIOR_COLOR.b],
    maxIterations * 3,
  )

  tables.set(maxIterations, table)
  return table
}

export function iterationsToColor(iterations: number, maxIterations: number): RgbColor {
  const table = paletteFor(maxIterations)
  const offset = Math.min(iterations, maxIterations) * 3
  return { r: table[offset], g: table[offset + 1], b: table[offset + 2] }
}
