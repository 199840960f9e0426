/**
 * Worker Tasks - Core
 *
 * Tasks placed on a worker pool are data: a name, a zod schema for the input,
 * a zod schema for the output, and an `execute` function. The same registry
 * is handed to the pool (main thread) and to the worker host (worker thread),
 * so both sides agree on names and shapes without a separate protocol file.
 *
 * Philosophy: "Define tasks as data. Generate systems from data. Types flow naturally."
 *
 * Dependencies:
 * - zod: schema validation and type inference
 */

import type { TransferListItem } from 'node:worker_threads'
import { z } from 'zod'
import type { ZodType } from 'zod'

/**
 * Unified task definition
 *
 * `execute` and `transfer` are declared as methods so that a registry of
 * concrete definitions stays assignable to `TaskRegistry`.
 */
export type WorkerTaskDefinition<
  TInput extends ZodType,
  TOutput extends ZodType,
> = {
  input: TInput
  output: TOutput
  /** Validate requests against `input` on the worker side */
  parseIO?: boolean
  execute(input: z.output<TInput>): Promise<z.output<TOutput>> | z.output<TOutput>
  /** Buffers in the output to move to the main thread instead of copying */
  transfer?(output: z.output<TOutput>): Array<TransferListItem>
}

export type TaskRegistry = Record<string, WorkerTaskDefinition<ZodType, ZodType>>

export type TaskName<TTasks extends TaskRegistry> = keyof TTasks & string

export type InferInput<T extends WorkerTaskDefinition<ZodType, ZodType>> =
  z.input<T['input']>

export type InferOutput<T extends WorkerTaskDefinition<ZodType, ZodType>> =
  z.output<T['output']>

/**
 * Define a task with type inference
 */
export function defineTask<TInput extends ZodType, TOutput extends ZodType>(
  definition: WorkerTaskDefinition<TInput, TOutput>,
): WorkerTaskDefinition<TInput, TOutput> {
  return definition
}

// ============================================================================
// Wire protocol
// ============================================================================

/**
 * Event type keywords
 * Use these instead of raw strings for better type safety
 */
export const eventKeywords = {
  taskRequest: 'task/request',
  workerReady: 'worker/ready',
  taskComplete: 'task/complete',
  taskError: 'task/error',
} as const

export const poolStatusKeywords = {
  starting: 'starting',
  ready: 'ready',
  terminated: 'terminated',
} as const

export const taskRequestSchema = z.object({
  type: z.literal(eventKeywords.taskRequest),
  taskId: z.string(),
  taskName: z.string(),
  input: z.unknown(), // Validated against the task's own schema
})

export const workerReadySchema = z.object({
  type: z.literal(eventKeywords.workerReady),
  timestamp: z.number(),
})

export const taskCompleteSchema = z.object({
  type: z.literal(eventKeywords.taskComplete),
  taskId: z.string(),
  taskName: z.string(),
  output: z.unknown(), // Validated against the task's own schema
})

export const taskErrorSchema = z.object({
  type: z.literal(eventKeywords.taskError),
  taskId: z.string(),
  taskName: z.string(),
  error: z.string(),
})

export const workerEventSchema = z.discriminatedUnion('type', [
  workerReadySchema,
  taskCompleteSchema,
  taskErrorSchema,
])

export type TaskRequest = z.infer<typeof taskRequestSchema>
export type WorkerReady = z.infer<typeof workerReadySchema>
export type TaskComplete = z.infer<typeof taskCompleteSchema>
export type TaskError = z.infer<typeof taskErrorSchema>

/**
 * All worker events (responses)
 */
export type WorkerEvent = z.infer<typeof workerEventSchema>

export const poolStatusSchema = z.enum([
  poolStatusKeywords.starting,
  poolStatusKeywords.ready,
  poolStatusKeywords.terminated,
])
export type PoolStatus = z.infer<typeof poolStatusSchema>

/**
 * Generate lightweight task ID: timestamp-counter-randomHex
 * Example: "1704234567890-12-a3f5"
 */
let taskCounter = 0
export function generateTaskId(): string {
  taskCounter += 1
  const randomHex = Math.floor(Math.random() * 0xffff)
    .toString(16)
    .padStart(4, '0')
  return `${Date.now()}-${taskCounter}-${randomHex}`
}
