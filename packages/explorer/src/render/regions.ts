/**
 * Band Splitter
 *
 * Partitions the raster rows into contiguous full-width bands. Heights differ
 * by at most one: the first `height % bandCount` bands take the extra rows.
 * With more bands than rows the trailing bands are empty.
 */

import type { PixelRegion, RenderSettings } from '../vocabulary'

export function splitIntoBands(
  settings: Pick<RenderSettings, 'width' | 'height'>,
  bandCount: number,
): Array<PixelRegion> {
  if (!Number.isInteger(bandCount) || bandCount < 1) {
    throw new RangeError(`Band count must be a positive integer, got ${bandCount}`)
  }

  const baseHeight = Math.floor(settings.height / bandCount)
  const remainder = settings.height % bandCount
  const regions: Array<PixelRegion> = []
  let startRow = 0

  for (let i = 0; i < bandCount; i++) {
    const rows = baseHeight + (i < remainder ? 1 : 0)
    regions.push({
      startRow,
      endRow: startRow + rows,
      startCol: 0,
      endCol: settings.width,
    })
    startRow += rows
  }

  return regions
}

export const regionRows = (region: PixelRegion): number =>
  Math.max(0, region.endRow - region.startRow)

export const regionCols = (region: PixelRegion): number =>
  Math.max(0, region.endCol - region.startCol)
