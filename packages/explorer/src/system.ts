/**
 * Explorer System Configuration
 *
 * Resources are started in dependency order and halted in reverse order.
 *
 * Dependency Graph:
 *
 *   state (no deps)
 *   pool (no deps) ← worker threads, or inline with --inline
 *       ↓
 *   renderer ← pool
 *   display (no deps) ← terminal, or headless for snapshots and tests
 *       ↓
 *   loop ← state, renderer, display
 *
 * Halting terminates the pool (queued region tasks stop) and closes the
 * display, which gives the terminal back.
 */

import { Worker } from 'node:worker_threads'
import type { StartedResource, StartedSystem } from 'braided'
import { defineResource, haltSystem, startSystem } from 'braided'
import { createInlinePool, createThreadPool } from '@fractalflow/system'
import type { Display } from './backends/types'
import type { ExplorerConfig } from './config'
import { createFractalRenderer } from './render/renderer'
import type { FractalRenderer } from './render/renderer'
import { regionTasks } from './render/regionTasks'
import type { RegionPool } from './render/regionTasks'
import { createAppState } from './state/appState'
import type { AppStateAtom } from './state/appState'
import { createExplorerLoop } from './stages/pipeline'
import type { RenderSettings } from './vocabulary'

/**
 * The worker entry is TypeScript. Workers inherit the parent's `execArgv`,
 * so the loader the CLI runs under (tsx) loads it too.
 */
const REGION_WORKER_URL = new URL('./worker/regionWorker.ts', import.meta.url)

export const createRegionWorker = (): Worker => new Worker(REGION_WORKER_URL)

export const settingsFromConfig = (config: ExplorerConfig): RenderSettings => ({
  width: config.width,
  height: config.height,
  maxIterations: config.maxIterations,
  escapeRadius: config.escapeRadius,
})

export type ExplorerSystemOptions = {
  config: ExplorerConfig
  createDisplay: (raster: { width: number; height: number }) => Display
  createWorker?: () => Worker
}

export function createExplorerSystemConfig({
  config,
  createDisplay,
  createWorker = createRegionWorker,
}: ExplorerSystemOptions) {
  const settings = settingsFromConfig(config)

  const stateResource = defineResource({
    dependencies: [],
    start: () => createAppState(),
    halt: () => {},
  })

  const poolResource = defineResource({
    dependencies: [],
    start: (): RegionPool => {
      if (config.verbose) {
        console.log(
          `[Explorer] Starting ${config.inline ? 'inline' : 'thread'} pool of ${config.threads}`,
        )
      }
      return config.inline
        ? createInlinePool({ tasks: regionTasks, size: config.threads })
        : createThreadPool({
            tasks: regionTasks,
            size: config.threads,
            createWorker,
            verbose: config.verbose,
          })
    },
    halt: async (pool) => {
      await pool.terminate()
    },
  })

  const rendererResource = defineResource({
    dependencies: ['pool'],
    start: ({ pool }: { pool: RegionPool }) =>
      createFractalRenderer({ pool, bandCount: config.bands }),
    halt: () => {},
  })

  const displayResource = defineResource({
    dependencies: [],
    start: () => createDisplay(settings),
    halt: (display) => {
      display.close()
    },
  })

  const loopResource = defineResource({
    dependencies: ['state', 'renderer', 'display'],
    start: ({
      state,
      renderer,
      display,
    }: {
      state: AppStateAtom
      renderer: FractalRenderer
      display: Display
    }) =>
      createExplorerLoop({
        display,
        state,
        settings,
        renderer,
        targetFPS: config.fps,
        zoomIntervalMs: config.zoomIntervalMs,
        zoomFactor: config.zoomFactor,
        verbose: config.verbose,
      }),
    halt: () => {},
  })

  return {
    state: stateResource,
    pool: poolResource,
    renderer: rendererResource,
    display: displayResource,
    loop: loopResource,
  }
}

export type ExplorerSystemConfig = ReturnType<typeof createExplorerSystemConfig>
export type ExplorerSystem = StartedSystem<ExplorerSystemConfig>
export type ExplorerLoopResource = StartedResource<ExplorerSystemConfig['loop']>

/**
 * Start every resource. A resource that fails to start halts what already
 * started and fails the whole start.
 */
export async function startExplorer(
  systemConfig: ExplorerSystemConfig,
): Promise<ExplorerSystem> {
  const { system, errors } = await startSystem(systemConfig)

  if (errors.size > 0) {
    await haltSystem(systemConfig, system)
    throw new Error(
      `Explorer failed to start: ${Array.from(errors.entries())
        .map(([name, error]) => `${name}: ${error.message}`)
        .join(', ')}`,
    )
  }

  return system
}

export async function stopExplorer(
  systemConfig: ExplorerSystemConfig,
  system: ExplorerSystem,
): Promise<void> {
  await haltSystem(systemConfig, system)
}
