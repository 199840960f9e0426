/**
 * Fractal Renderer
 *
 * Fan-out/fan-in over row bands: one `computeRegion` task per band placed on
 * the pool, combined with `whenAll`, then reassembled into one frame.
 *
 * Reassembly is driven by the region list used for the split. Matrix i is
 * always written at region i's offsets, so the order in which bands finish
 * never changes the frame.
 */

import { then, whenAll } from '@fractalflow/system'
import type { Task } from '@fractalflow/system'
import type {
  PixelMatrix,
  PixelRegion,
  RenderResult,
  RenderSettings,
  Viewport,
} from '../vocabulary'
import { explorerKeywords } from '../vocabulary'
import { paletteFor } from './palette'
import type { RegionPool } from './regionTasks'
import { splitIntoBands } from './regions'

export type FractalRenderer = {
  bandCount: number
  /** Cold: nothing is placed on the pool until the task starts */
  render: (viewport: Viewport, settings: RenderSettings) => Task<RenderResult>
}

export type FractalRendererOptions = {
  pool: RegionPool
  /** Defaults to one band per pool worker */
  bandCount?: number
}

export function createFractalRenderer({
  pool,
  bandCount = pool.size,
}: FractalRendererOptions): FractalRenderer {
  if (!Number.isInteger(bandCount) || bandCount < 1) {
    throw new RangeError(`Band count must be a positive integer, got ${bandCount}`)
  }

  const render = (viewport: Viewport, settings: RenderSettings): Task<RenderResult> => {
    const regions = splitIntoBands(settings, bandCount)
    const bands = regions.map((region) =>
      pool.dispatch(explorerKeywords.tasks.computeRegion, {
        viewport,
        settings,
        region,
      }),
    )

    return then(whenAll(bands), (matrices) =>
      assembleFrame(viewport, settings, regions, matrices),
    )
  }

  return { bandCount, render }
}

/**
 * Write every band back at its region's offsets and colour each cell
 */
export function assembleFrame(
  viewport: Viewport,
  settings: RenderSettings,
  regions: ReadonlyArray<PixelRegion>,
  matrices: ReadonlyArray<PixelMatrix>,
): RenderResult {
  if (regions.length !== matrices.length) {
    throw new Error(
      `Expected ${regions.length} region matrices, got ${matrices.length}`,
    )
  }

  const { width, height, maxIterations } = settings
  const palette = paletteFor(maxIterations)
  const iterations = new Uint32Array(width * height)
  const colors = new Uint8ClampedArray(width * height * 3)

  regions.forEach((region, index) => {
    const matrix = matrices[index]
    for (let r = 0; r < matrix.rows; r++) {
      const y = region.startRow + r
      if (y >= height) break

      for (let c = 0; c < matrix.cols; c++) {
        const x = region.startCol + c
        if (x >= width) break

        const count = Math.min(matrix.data[r * matrix.cols + c], maxIterations)
        const cell = y * width + x
        iterations[cell] = count
        colors.set(palette.subarray(count * 3, count * 3 + 3), cell * 3)
      }
    }
  })

  return {
    viewport,
    settings,
    iterations: { rows: height, cols: width, data: iterations },
    colors: { rows: height, cols: width, data: colors },
  }
}

/**
 * Frame that carries no pixels: nothing to draw
 */
export const emptyRenderResult = (
  viewport: Viewport,
  settings: RenderSettings,
): RenderResult => ({
  viewport,
  settings,
  iterations: { rows: 0, cols: 0, data: new Uint32Array(0) },
  colors: { rows: 0, cols: 0, data: new Uint8ClampedArray(0) },
})

export const isEmptyResult = (result: RenderResult): boolean =>
  result.colors.rows === 0 || result.colors.cols === 0
