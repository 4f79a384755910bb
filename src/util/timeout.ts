/**
 * Adapted from OpenCode (https://github.com/sst/opencode)
 * Original file: packages/opencode/src/util/timeout.ts
 * License: MIT
 */

export class TimeoutError extends Error {
  constructor(readonly ms: number) {
    super(`Operation timed out after ${ms}ms`)
    this.name = "TimeoutError"
  }
}

/**
 * Run an abortable operation with an optional deadline.
 *
 * When `ms` is undefined the operation runs unbounded. Otherwise the signal
 * handed to `run` is aborted and the returned promise rejects with a
 * TimeoutError once the deadline passes.
 */
export function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  ms: number | undefined,
): Promise<T> {
  const controller = new AbortController()
  if (ms === undefined) {
    return run(controller.signal)
  }

  let timeout: ReturnType<typeof setTimeout> | undefined
  return Promise.race([
    run(controller.signal),
    new Promise<never>((_, reject) => {
      timeout = setTimeout(() => {
        const error = new TimeoutError(ms)
        controller.abort(error)
        reject(error)
      }, ms)
    }),
  ]).finally(() => {
    clearTimeout(timeout)
  })
}
