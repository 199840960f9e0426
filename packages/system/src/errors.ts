/**
 * Failure of a task dispatched to a worker pool: an error reported by the
 * task, an exception thrown by it, a crashed worker, or output that failed
 * validation. The original failure is kept as `cause`.
 */
export class ComputeFailure extends Error {
  readonly taskName: string
  readonly taskId: string

  constructor(
    message: string,
    details: { taskName: string; taskId: string; cause?: unknown },
  ) {
    super(message, { cause: details.cause })
    this.name = 'ComputeFailure'
    this.taskName = details.taskName
    this.taskId = details.taskId
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error)
