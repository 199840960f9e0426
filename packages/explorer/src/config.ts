/**
 * Explorer Configuration
 *
 * CLI flags, then `FRACTAL_*` environment variables, then defaults. The
 * merged raw values are validated and coerced by one zod schema, so a bad
 * value from either source fails the same way.
 *
 * Dependencies:
 * - node:util parseArgs for flags
 * - zod: validation and coercion
 */

import { availableParallelism } from 'node:os'
import { parseArgs } from 'node:util'
import { z } from 'zod'

export const DEFAULT_RASTER = { width: 80, height: 48 } as const

const positiveInt = z.coerce.number().int().positive()
const envFlag = z.stringbool()

export const explorerConfigSchema = z
  .object({
    width: positiveInt,
    height: positiveInt,
    maxIterations: positiveInt.default(256),
    escapeRadius: z.coerce.number().positive().default(2),
    threads: positiveInt,
    bands: positiveInt.optional(),
    fps: z.coerce.number().positive().default(60),
    zoomIntervalMs: z.coerce.number().nonnegative().default(100),
    zoomFactor: z.coerce.number().gt(0).lt(1).default(0.8),
    inline: z.union([z.boolean(), envFlag]).default(false),
    snapshot: z.string().min(1).optional(),
    verbose: z.union([z.boolean(), envFlag]).default(false),
  })
  .transform((config) => ({ ...config, bands: config.bands ?? config.threads }))

export type ExplorerConfig = z.output<typeof explorerConfigSchema>

export const configEnvKeys = {
  width: 'FRACTAL_WIDTH',
  height: 'FRACTAL_HEIGHT',
  maxIterations: 'FRACTAL_MAX_ITERATIONS',
  escapeRadius: 'FRACTAL_ESCAPE_RADIUS',
  threads: 'FRACTAL_THREADS',
  bands: 'FRACTAL_BANDS',
  fps: 'FRACTAL_FPS',
  zoomIntervalMs: 'FRACTAL_ZOOM_INTERVAL_MS',
  zoomFactor: 'FRACTAL_ZOOM_FACTOR',
  inline: 'FRACTAL_INLINE',
  verbose: 'FRACTAL_VERBOSE',
} as const

const cliOptions = {
  width: { type: 'string' },
  height: { type: 'string' },
  'max-iterations': { type: 'string' },
  'escape-radius': { type: 'string' },
  threads: { type: 'string' },
  bands: { type: 'string' },
  fps: { type: 'string' },
  'zoom-interval': { type: 'string' },
  'zoom-factor': { type: 'string' },
  inline: { type: 'boolean' },
  snapshot: { type: 'string' },
  verbose: { type: 'boolean', short: 'v' },
  help: { type: 'boolean', short: 'h' },
} as const

export const usage = `Usage: fractalflow [options]

Explore the Mandelbrot set in the terminal. Hold the left mouse button to
zoom in at the pointer, the right one to zoom out; press q to quit.

Options:
  --width <px>            raster width (terminal columns)
  --height <px>           raster height (two per terminal row)
  --max-iterations <n>    iteration bound (256)
  --escape-radius <r>     escape radius (2)
  --threads <n>           worker threads (available parallelism)
  --bands <n>             row bands per frame (threads)
  --fps <n>               frame rate cap (60)
  --zoom-interval <ms>    time between zoom steps while held (100)
  --zoom-factor <f>       span scale per zoom-in step (0.8)
  --inline                compute on the main thread
  --snapshot <file.ppm>   render one frame to a PPM file and exit
  -v, --verbose           log lifecycle messages
  -h, --help              show this help

Every numeric option and --inline/--verbose can also be set with the
matching FRACTAL_* environment variable, e.g. FRACTAL_MAX_ITERATIONS.`

export type LoadConfigOptions = {
  argv?: Array<string>
  env?: Record<string, string | undefined>
  /** Terminal size in character cells, when attached to one */
  terminal?: { columns?: number; rows?: number }
  cpuCount?: number
}

export type LoadedConfig =
  | { type: 'help' }
  | { type: 'config'; config: ExplorerConfig }

/**
 * Raster that fills the terminal, one status row spare.
 * Each cell holds two raster rows.
 */
export const rasterForTerminal = (terminal?: {
  columns?: number
  rows?: number
}): { width: number; height: number } => ({
  width: terminal?.columns && terminal.columns > 0 ? terminal.columns : DEFAULT_RASTER.width,
  height:
    terminal?.rows && terminal.rows > 1 ? (terminal.rows - 1) * 2 : DEFAULT_RASTER.height,
})

/**
 * @throws ZodError for values that fail validation, TypeError for unknown flags
 */
export function loadExplorerConfig({
  argv = process.argv.slice(2),
  env = process.env,
  terminal,
  cpuCount = availableParallelism(),
}: LoadConfigOptions = {}): LoadedConfig {
  const { values: flags } = parseArgs({
    args: argv,
    options: cliOptions,
    strict: true,
    allowPositionals: false,
  })

  if (flags.help) return { type: 'help' }

  const raster = rasterForTerminal(terminal)

  const config = explorerConfigSchema.parse({
    width: flags.width ?? env[configEnvKeys.width] ?? raster.width,
    height: flags.height ?? env[configEnvKeys.height] ?? raster.height,
    maxIterations: flags['max-iterations'] ?? env[configEnvKeys.maxIterations],
    escapeRadius: flags['escape-radius'] ?? env[configEnvKeys.escapeRadius],
    threads: flags.threads ?? env[configEnvKeys.threads] ?? cpuCount,
    bands: flags.bands ?? env[configEnvKeys.bands],
    fps: flags.fps ?? env[configEnvKeys.fps],
    zoomIntervalMs: flags['zoom-interval'] ?? env[configEnvKeys.zoomIntervalMs],
    zoomFactor: flags['zoom-factor'] ?? env[configEnvKeys.zoomFactor],
    inline: flags.inline ?? env[configEnvKeys.inline],
    snapshot: flags.snapshot,
    verbose: flags.verbose ?? env[configEnvKeys.verbose],
  })

  return { type: 'config', config }
}
