/**
 * Escape-Time Math
 *
 * Pure functions, safe to run on any thread.
 */

import type { ComplexPoint, Viewport } from '../vocabulary'

/**
 * Number of iterations of z -> z^2 + c, starting from z = 0, before |z|
 * exceeds `escapeRadius`. Points that never escape return `maxIterations`.
 */
export function iterationsAt(
  point: ComplexPoint,
  maxIterations: number,
  escapeRadius: number,
): number {
  const limit = escapeRadius * escapeRadius
  let re = 0
  let im = 0

  for (let n = 0; n < maxIterations; n++) {
    const re2 = re * re
    const im2 = im * im
    if (re2 + im2 > limit) return n

    im = 2 * re * im + point.im
    re = re2 - im2 + point.re
  }

  return maxIterations
}

/**
 * Map a raster cell to the complex plane by linear interpolation:
 * column 0 lands on `xMin`, row 0 on `yMin`.
 */
export function pixelToComplex(
  col: number,
  row: number,
  viewport: Viewport,
  width: number,
  height: number,
): ComplexPoint {
  return {
    re: viewport.xMin + (col / width) * (viewport.xMax - viewport.xMin),
    im: viewport.yMin + (row / height) * (viewport.yMax - viewport.yMin),
  }
}
