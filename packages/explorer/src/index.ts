/**
 * @fractalflow/explorer
 *
 * Escape-time fractal explorer on top of @fractalflow/system: a
 * fan-out/fan-in renderer over worker threads, the frame pipeline stages,
 * terminal and headless displays, and the braided system that wires them.
 */

// ============================================================================
// Vocabulary
// ============================================================================

export * from './vocabulary'

// ============================================================================
// Math
// ============================================================================

export * from './math/escapeTime'
export * from './math/viewport'

// ============================================================================
// Rendering
// ============================================================================

export * from './render/regions'
export * from './render/computeRegion'
export * from './render/palette'
export * from './render/regionTasks'
export * from './render/renderer'
export * from './render/ppm'

// ============================================================================
// State and Stages
// ============================================================================

export * from './state/appState'
export * from './stages/handleEvents'
export * from './stages/calculateFrame'
export * from './stages/presentFrame'
export * from './stages/pipeline'

// ============================================================================
// Backends
// ============================================================================

export * from './backends/types'
export * from './backends/headless'
export * from './backends/terminal'

// ============================================================================
// Configuration and System
// ============================================================================

export * from './config'
export * from './snapshot'
export * from './system'
