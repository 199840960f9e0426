/**
 * Frame Pipeline
 *
 * One frame is a cold task:
 *
 *   handleEvents → calculateFrame → presentFrame → waitForFps → shouldExit?
 *
 * and the explorer loop repeats it until it yields `true`. An exit request
 * surfaces as a stop from `handleEvents`, which skips the rest of the frame
 * and ends the repetition. A render that is already in flight when the exit
 * is requested still completes and is presented first: region tasks are
 * never interrupted.
 */

import {
  createStopwatch,
  letValue,
  repeatEffectUntil,
  then,
  waitForFps,
  waitForTask,
} from '@fractalflow/system'
import type { Clock, Stopwatch, Task } from '@fractalflow/system'
import type { Display } from '../backends/types'
import type { FractalRenderer } from '../render/renderer'
import type { AppStateAtom } from '../state/appState'
import type { RenderSettings } from '../vocabulary'
import { calculateFrame } from './calculateFrame'
import { handleEvents } from './handleEvents'
import { presentFrame } from './presentFrame'

export type FramePipelineOptions = {
  display: Display
  state: AppStateAtom
  settings: RenderSettings
  renderer: FractalRenderer
  zoomStopwatch: Stopwatch
  frameStopwatch: Stopwatch
  targetFPS: number
  zoomIntervalMs?: number
  zoomFactor?: number
}

/**
 * One iteration of the loop; yields whether the explorer should exit
 */
export const createFramePipeline = ({
  display,
  state,
  settings,
  renderer,
  zoomStopwatch,
  frameStopwatch,
  targetFPS,
  zoomIntervalMs,
  zoomFactor,
}: FramePipelineOptions): Task<boolean> => {
  const events = handleEvents({
    input: display,
    state,
    settings,
    zoomStopwatch,
    zoomIntervalMs,
    zoomFactor,
  })
  const frame = letValue(events, () => calculateFrame({ state, settings, renderer }))
  const presented = letValue(frame, (result) => presentFrame(display, result))
  const throttled = letValue(presented, () => waitForFps(frameStopwatch, targetFPS))

  return then(throttled, () => state.get().shouldExit)
}

export type ExplorerLoopOptions = Omit<
  FramePipelineOptions,
  'zoomStopwatch' | 'frameStopwatch'
> & {
  clock?: Clock
  verbose?: boolean
}

export type ExplorerLoop = {
  /** The repeated pipeline, as a task */
  task: Task<void>
  /**
   * Run until exit. Resolves on exit; rejects with the error that ended the
   * loop, such as a ComputeFailure from a region task.
   */
  run: () => Promise<void>
}

export function createExplorerLoop({
  clock,
  verbose = false,
  ...options
}: ExplorerLoopOptions): ExplorerLoop {
  const task = repeatEffectUntil(
    createFramePipeline({
      ...options,
      zoomStopwatch: createStopwatch(clock),
      frameStopwatch: createStopwatch(clock),
    }),
  )

  const run = async (): Promise<void> => {
    if (verbose) {
      console.log(
        `[Explorer] Running ${options.settings.width}x${options.settings.height} in ${options.renderer.bandCount} band(s) at ${options.targetFPS} fps`,
      )
    }
    await waitForTask(task)
    if (verbose) console.log('[Explorer] Exit requested')
  }

  return { task, run }
}
