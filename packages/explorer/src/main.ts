/**
 * Explorer CLI
 *
 * Interactive terminal explorer, or a one-frame PPM snapshot with
 * `--snapshot <file>`.
 *
 * Exit codes: 0 on a requested exit, 1 when a frame fails (ComputeFailure)
 * or the system cannot start, 2 for invalid options.
 */

import { writeFile } from 'node:fs/promises'
import { z } from 'zod'
import { ComputeFailure, describeError } from '@fractalflow/system'
import { createHeadlessDisplay } from './backends/headless'
import { createTerminalDisplay } from './backends/terminal'
import { loadExplorerConfig, usage } from './config'
import type { ExplorerConfig, LoadedConfig } from './config'
import { renderSnapshot } from './snapshot'
import {
  createExplorerSystemConfig,
  settingsFromConfig,
  startExplorer,
  stopExplorer,
} from './system'

const readConfig = (): LoadedConfig | number => {
  try {
    return loadExplorerConfig({
      terminal: process.stdout.isTTY
        ? { columns: process.stdout.columns, rows: process.stdout.rows }
        : undefined,
    })
  } catch (error) {
    if (error instanceof z.ZodError) {
      console.error(`[Explorer] Invalid configuration:\n${z.prettifyError(error)}`)
      return 2
    }
    if (error instanceof TypeError) {
      console.error(`[Explorer] ${error.message}\n\n${usage}`)
      return 2
    }
    throw error
  }
}

const runSnapshot = async (config: ExplorerConfig, file: string): Promise<number> => {
  const systemConfig = createExplorerSystemConfig({
    config,
    createDisplay: createHeadlessDisplay,
  })
  const system = await startExplorer(systemConfig)

  try {
    const image = await renderSnapshot({
      state: system.state,
      renderer: system.renderer,
      settings: settingsFromConfig(config),
    })
    await writeFile(file, image)
    console.log(`[Explorer] Wrote ${config.width}x${config.height} snapshot to ${file}`)
    return 0
  } finally {
    await stopExplorer(systemConfig, system)
  }
}

const runInteractive = async (config: ExplorerConfig): Promise<number> => {
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    console.error('[Explorer] Interactive mode needs a terminal; use --snapshot <file>')
    return 2
  }

  const systemConfig = createExplorerSystemConfig({
    config,
    createDisplay: (raster) => createTerminalDisplay(raster),
  })
  const system = await startExplorer(systemConfig)

  let failure: unknown = null
  try {
    await system.loop.run()
  } catch (error) {
    failure = error
  } finally {
    // Gives the terminal back before anything is printed
    await stopExplorer(systemConfig, system)
  }

  if (failure === null) return 0
  if (failure instanceof ComputeFailure) {
    console.error(
      `[Explorer] Frame failed in ${failure.taskName} (${failure.taskId}): ${failure.message}`,
    )
    return 1
  }
  throw failure
}

async function main(): Promise<number> {
  const loaded = readConfig()
  if (typeof loaded === 'number') return loaded

  if (loaded.type === 'help') {
    console.log(usage)
    return 0
  }

  const { config } = loaded
  return config.snapshot
    ? runSnapshot(config, config.snapshot)
    : runInteractive(config)
}

main().then(
  (code) => {
    process.exitCode = code
  },
  (error: unknown) => {
    console.error('[Explorer] Fatal:', describeError(error))
    process.exitCode = 1
  },
)
