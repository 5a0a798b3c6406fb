// src/utils/deadline.ts
import { PipelineTimeoutError } from '../errors'

/**
 * Run a task under a hard wall-clock deadline.
 * The task receives an AbortSignal that fires on expiry (or when the parent signal aborts),
 * so in-flight requests are released; the returned promise rejects with PipelineTimeoutError.
 */
export function withDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal
): Promise<T> {
  const controller = new AbortController()
  const onParentAbort = () => controller.abort(parent?.reason)
  if (parent) {
    if (parent.aborted) controller.abort(parent.reason)
    else parent.addEventListener('abort', onParentAbort, { once: true })
  }

  return new Promise<T>((resolve, reject) => {
    let done = false
    const timer = setTimeout(() => {
      if (done) return
      done = true
      const err = new PipelineTimeoutError(timeoutMs)
      controller.abort(err)
      reject(err)
    }, timeoutMs)

    const finish = () => {
      done = true
      clearTimeout(timer)
      parent?.removeEventListener('abort', onParentAbort)
    }

    task(controller.signal).then(
      (v) => {
        if (done) return
        finish()
        resolve(v)
      },
      (e: unknown) => {
        if (done) return
        finish()
        reject(e)
      }
    )
  })
}
