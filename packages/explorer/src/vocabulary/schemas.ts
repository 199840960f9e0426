/**
 * Explorer Schemas
 *
 * Canonical data structures for the renderer and the frame pipeline.
 * Everything that crosses a thread boundary has a zod schema; the rest are
 * plain types.
 *
 * Matrices are dense, row-major typed arrays so a band computed on a worker
 * can be transferred back instead of copied.
 */

import { z } from 'zod'
import { explorerKeywords } from './keywords'

// ============================================================================
// Complex plane
// ============================================================================

export const complexPointSchema = z.object({
  re: z.number(),
  im: z.number(),
})

export type ComplexPoint = z.infer<typeof complexPointSchema>

/**
 * Rectangle of the complex plane mapped onto the raster.
 * y grows downwards with the raster rows.
 */
export const viewportSchema = z
  .object({
    xMin: z.number(),
    xMax: z.number(),
    yMin: z.number(),
    yMax: z.number(),
  })
  .refine((v) => v.xMax > v.xMin && v.yMax > v.yMin, {
    message: 'Viewport spans must be positive',
  })

export type Viewport = z.infer<typeof viewportSchema>

// ============================================================================
// Raster
// ============================================================================

export const renderSettingsSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
  maxIterations: z.number().int().positive(),
  escapeRadius: z.number().positive(),
})

export type RenderSettings = z.infer<typeof renderSettingsSchema>

/**
 * Half-open rectangle of raster cells: rows [startRow, endRow),
 * columns [startCol, endCol)
 */
export const pixelRegionSchema = z.object({
  startRow: z.number().int().nonnegative(),
  endRow: z.number().int().nonnegative(),
  startCol: z.number().int().nonnegative(),
  endCol: z.number().int().nonnegative(),
})

export type PixelRegion = z.infer<typeof pixelRegionSchema>

/**
 * Iteration counts, `data[r * cols + c]`
 */
export const pixelMatrixSchema = z.object({
  rows: z.number().int().nonnegative(),
  cols: z.number().int().nonnegative(),
  data: z.instanceof(Uint32Array),
})

export type PixelMatrix = z.infer<typeof pixelMatrixSchema>

export type RgbColor = {
  r: number
  g: number
  b: number
}

/**
 * RGB triplets, `data[(r * cols + c) * 3 + channel]`
 */
export type ColorMatrix = {
  rows: number
  cols: number
  data: Uint8ClampedArray
}

export type RenderResult = {
  viewport: Viewport
  settings: RenderSettings
  iterations: PixelMatrix
  colors: ColorMatrix
}

export const computeRegionInputSchema = z.object({
  viewport: viewportSchema,
  settings: renderSettingsSchema,
  region: pixelRegionSchema,
})

export type ComputeRegionInput = z.infer<typeof computeRegionInputSchema>

// ============================================================================
// Application state
// ============================================================================

export type ApplicationState = {
  shouldExit: boolean
  leftPressed: boolean
  rightPressed: boolean
  needsRecompute: boolean
  viewport: Viewport
}

// ============================================================================
// Input
// ============================================================================

export const pointerButtonSchema = z.enum([
  explorerKeywords.buttons.left,
  explorerKeywords.buttons.right,
])

export const inputEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal(explorerKeywords.inputEvents.closed) }),
  z.object({
    type: z.literal(explorerKeywords.inputEvents.buttonPressed),
    button: pointerButtonSchema,
  }),
  z.object({
    type: z.literal(explorerKeywords.inputEvents.buttonReleased),
    button: pointerButtonSchema,
  }),
  z.object({ type: z.literal(explorerKeywords.inputEvents.other) }),
])

export type InputEvent = z.infer<typeof inputEventSchema>

/**
 * Pointer location in raster pixels; may lie outside the raster
 */
export type PointerPosition = {
  x: number
  y: number
}
