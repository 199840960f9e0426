/**
 * Viewport Transforms
 *
 * The viewport is replaced, never mutated: every transform returns a new
 * rectangle and checks that both spans stay positive.
 */

import type { ComplexPoint, PointerPosition, Viewport } from '../vocabulary'
import { pixelToComplex } from './escapeTime'

/**
 * The whole Mandelbrot set with some margin
 */
export const DEFAULT_VIEWPORT: Viewport = Object.freeze({
  xMin: -2,
  xMax: 1,
  yMin: -1.5,
  yMax: 1.5,
})

export const viewportWidth = (viewport: Viewport): number =>
  viewport.xMax - viewport.xMin

export const viewportHeight = (viewport: Viewport): number =>
  viewport.yMax - viewport.yMin

/**
 * @throws RangeError when a span is not positive (or not finite)
 */
export function assertViewport(viewport: Viewport): Viewport {
  const width = viewportWidth(viewport)
  const height = viewportHeight(viewport)
  if (!(width > 0 && height > 0 && Number.isFinite(width) && Number.isFinite(height))) {
    throw new RangeError(
      `Viewport spans must be positive, got ${width} x ${height}`,
    )
  }
  return viewport
}

/**
 * Inverse of `pixelToComplex`: fractional raster coordinates of a point
 */
export function complexToPixel(
  point: ComplexPoint,
  viewport: Viewport,
  width: number,
  height: number,
): PointerPosition {
  return {
    x: ((point.re - viewport.xMin) / viewportWidth(viewport)) * width,
    y: ((point.im - viewport.yMin) / viewportHeight(viewport)) * height,
  }
}

export const isInsideRaster = (
  pointer: PointerPosition,
  width: number,
  height: number,
): boolean =>
  pointer.x >= 0 && pointer.x < width && pointer.y >= 0 && pointer.y < height

/**
 * Recentre the viewport on the point under `pointer` and scale both spans.
 * `scale` < 1 zooms in, > 1 zooms out.
 */
export function zoomToPoint(
  viewport: Viewport,
  pointer: PointerPosition,
  raster: { width: number; height: number },
  scale: number,
): Viewport {
  if (!(scale > 0)) {
    throw new RangeError(`Zoom scale must be positive, got ${scale}`)
  }

  const target = pixelToComplex(
    pointer.x,
    pointer.y,
    viewport,
    raster.width,
    raster.height,
  )
  const halfWidth = (viewportWidth(viewport) * scale) / 2
  const halfHeight = (viewportHeight(viewport) * scale) / 2

  return assertViewport({
    xMin: target.re - halfWidth,
    xMax: target.re + halfWidth,
    yMin: target.im - halfHeight,
    yMax: target.im + halfHeight,
  })
}
