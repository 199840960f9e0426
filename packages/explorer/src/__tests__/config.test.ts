/**
 * Configuration Tests
 */

import { describe, expect, it } from 'vitest'
import { ZodError } from 'zod'
import { loadExplorerConfig, rasterForTerminal } from '@fractalflow/explorer'
import type { ExplorerConfig, LoadConfigOptions } from '@fractalflow/explorer'

const load = (options: LoadConfigOptions): ExplorerConfig => {
  const loaded = loadExplorerConfig({ argv: [], env: {}, cpuCount: 6, ...options })
  if (loaded.type !== 'config') throw new Error('expected a configuration')
  return loaded.config
}

describe('rasterForTerminal', () => {
  it('should fill the terminal with two raster rows per text row', () => {
    expect(rasterForTerminal({ columns: 120, rows: 41 })).toEqual({ width: 120, height: 80 })
  })

  it('should fall back to 80x48 without a terminal', () => {
    expect(rasterForTerminal(undefined)).toEqual({ width: 80, height: 48 })
  })
})

describe('loadExplorerConfig', () => {
  it('should apply the defaults', () => {
    expect(load({})).toEqual({
      width: 80,
      height: 48,
      maxIterations: 256,
      escapeRadius: 2,
      threads: 6,
      bands: 6,
      fps: 60,
      zoomIntervalMs: 100,
      zoomFactor: 0.8,
      inline: false,
      snapshot: undefined,
      verbose: false,
    })
  })

  it('should size the raster from the terminal', () => {
    expect(load({ terminal: { columns: 100, rows: 31 } })).toMatchObject({
      width: 100,
      height: 60,
    })
  })

  it('should read FRACTAL_* environment variables', () => {
    const config = load({
      env: {
        FRACTAL_MAX_ITERATIONS: '500',
        FRACTAL_THREADS: '3',
        FRACTAL_INLINE: 'true',
        FRACTAL_ZOOM_FACTOR: '0.5',
      },
    })

    expect(config).toMatchObject({
      maxIterations: 500,
      threads: 3,
      bands: 3,
      inline: true,
      zoomFactor: 0.5,
    })
  })

  it('should prefer flags over the environment', () => {
    const config = load({
      argv: ['--width', '64', '--bands=8', '--inline', '--snapshot', 'out.ppm'],
      env: { FRACTAL_WIDTH: '32', FRACTAL_BANDS: '2', FRACTAL_INLINE: 'false' },
    })

    expect(config).toMatchObject({
      width: 64,
      bands: 8,
      inline: true,
      snapshot: 'out.ppm',
    })
  })

  it('should report help', () => {
    expect(loadExplorerConfig({ argv: ['--help'], env: {} })).toEqual({ type: 'help' })
  })

  it('should reject invalid values with a ZodError', () => {
    expect(() => load({ argv: ['--fps=0'] })).toThrow(ZodError)
    expect(() => load({ argv: ['--zoom-factor=1.5'] })).toThrow(ZodError)
    expect(() => load({ env: { FRACTAL_HEIGHT: 'tall' } })).toThrow(ZodError)
  })

  it('should reject unknown flags', () => {
    expect(() => load({ argv: ['--colour'] })).toThrow(TypeError)
  })
})
