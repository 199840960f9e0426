/**
 * Binary PPM (P6) encoding of a colour matrix, for snapshots
 */

import type { ColorMatrix } from '../vocabulary'

export function encodePpm(colors: ColorMatrix): Buffer {
  const header = Buffer.from(`P6\n${colors.cols} ${colors.rows}\n255\n`, 'ascii')
  const pixels = Buffer.from(
    colors.data.buffer,
    colors.data.byteOffset,
    colors.data.byteLength,
  )
  return Buffer.concat([header, pixels])
}
