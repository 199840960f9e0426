/**
 * Presentation Stage
 *
 * Copies a frame into the presentation backend, commits and shows it.
 * Empty results draw nothing.
 */

import { createTask } from '@fractalflow/system'
import type { Task } from '@fractalflow/system'
import type { PresentationBackend } from '../backends/types'
import { isEmptyResult } from '../render/renderer'
import type { RenderResult } from '../vocabulary'

export const presentFrame = (
  output: PresentationBackend,
  result: RenderResult,
): Task<void> =>
  createTask<void>((receiver) => {
    if (isEmptyResult(result)) {
      receiver.setValue()
      return
    }

    const { rows, cols, data } = result.colors
    for (let y = 0; y < rows; y++) {
      for (let x = 0; x < cols; x++) {
        const offset = (y * cols + x) * 3
        output.setPixel(x, y, {
          r: data[offset],
          g: data[offset + 1],
          b: data[offset + 2],
        })
      }
    }

    output.commit()
    output.present()
    receiver.setValue()
  })
