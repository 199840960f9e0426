/**
 * Worker Tasks Abstraction
 *
 * Type-safe task placement onto worker pools with minimal boilerplate.
 *
 * @example
 * ```ts
 * // Define tasks (shared by the pool and the worker entry)
 * const tasks = {
 *   square: defineTask({
 *     input: z.object({ value: z.number() }),
 *     output: z.number(),
 *     execute: ({ value }) => value * value,
 *   }),
 * }
 *
 * // worker.ts
 * startWorkerHost({ tasks })
 *
 * // main thread
 * const pool = createThreadPool({
 *   tasks,
 *   createWorker: () => new Worker(new URL('./worker.ts', import.meta.url)),
 * })
 * const squared = await waitForTask(pool.dispatch('square', { value: 7 }))
 * ```
 */

export * from './core'
export * from './dispatch'
export * from './threadPool'
export * from './inlinePool'
export * from './host'
