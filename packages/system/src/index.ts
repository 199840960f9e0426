/**
 * @fractalflow/system
 *
 * Generic concurrency utilities: a cold single-completion Task, combinators
 * to compose Tasks into pipelines, schedulers and frame timing, and worker
 * pools that run Tasks on Node.js worker threads.
 *
 * Philosophy:
 * - Every unit of async work ends in exactly one of value, error, stopped
 * - Composition never decodes errors; only the final consumer does
 * - Pools own placement, never computation
 */

// ============================================================================
// Task Primitive and Combinators
// ============================================================================

export * from './task'

// ============================================================================
// Scheduling and Frame Timing
// ============================================================================

export * from './scheduling/scheduler'
export * from './scheduling/clock'

// ============================================================================
// Worker Tasks
// ============================================================================

export * from './workerTasks'

// ============================================================================
// State and Errors
// ============================================================================

export * from './state'
export * from './errors'
