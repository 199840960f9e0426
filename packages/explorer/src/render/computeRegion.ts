/**
 * Region Compute
 *
 * Iteration counts for one rectangle of the raster. Pure and deterministic,
 * so any number of regions may run at once on any worker.
 */

import { iterationsAt, pixelToComplex } from '../math/escapeTime'
import type { PixelMatrix, PixelRegion, RenderSettings, Viewport } from '../vocabulary'

/**
 * `data[r * cols + c]` holds the count at raster cell
 * (startRow + r, startCol + c). The region is clamped to the raster.
 */
export function computeRegion(
  viewport: Viewport,
  settings: RenderSettings,
  region: PixelRegion,
): PixelMatrix {
  const { width, height, maxIterations, escapeRadius } = settings

  const startRow = Math.min(region.startRow, height)
  const endRow = Math.max(startRow, Math.min(region.endRow, height))
  const startCol = Math.min(region.startCol, width)
  const endCol = Math.max(startCol, Math.min(region.endCol, width))

  const rows = endRow - startRow
  const cols = endCol - startCol
  const data = new Uint32Array(rows * cols)

  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      const point = pixelToComplex(startCol + c, startRow + r, viewport, width, height)
      data[r * cols + c] = iterationsAt(point, maxIterations, escapeRadius)
    }
  }

  return { rows, cols, data }
}
