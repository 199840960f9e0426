/**
 * Region Worker Tasks
 *
 * The task registry shared by the main thread (pool) and the worker entry.
 * The matrix buffer is transferred back rather than copied.
 */

import { defineTask } from '@fractalflow/system'
import type { WorkerPool } from '@fractalflow/system'
import { computeRegionInputSchema, pixelMatrixSchema } from '../vocabulary'
import { computeRegion } from './computeRegion'

export const regionTasks = {
  computeRegion: defineTask({
    input: computeRegionInputSchema,
    output: pixelMatrixSchema,
    parseIO: true,
    execute: ({ viewport, settings, region }) =>
      computeRegion(viewport, settings, region),
    transfer: (matrix) =>
      matrix.data.buffer instanceof ArrayBuffer ? [matrix.data.buffer] : [],
  }),
}

export type RegionTasks = typeof regionTasks

export type RegionPool = WorkerPool<RegionTasks>
