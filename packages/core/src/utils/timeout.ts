import { CollaboratorTimeoutError } from '../errors.js'

export interface TimeoutOptions {
  /** Outer cancellation; aborting it also aborts the work's signal */
  signal?: AbortSignal
}

/** Child controller that follows `parent` until released */
function linkedController(parent: AbortSignal | undefined): {
  controller: AbortController
  release: () => void
} {
  const controller = new AbortController()
  if (!parent) return { controller, release: () => {} }
  if (parent.aborted) {
    controller.abort(parent.reason)
    return { controller, release: () => {} }
  }
  const onAbort = () => controller.abort(parent.reason)
  parent.addEventListener('abort', onAbort, { once: true })
  return { controller, release: () => parent.removeEventListener('abort', onAbort) }
}

/**
 * Settle with `work`'s result, or reject with CollaboratorTimeoutError after
 * `timeoutMs`. The work receives a signal that is aborted on timeout (and
 * when `options.signal` aborts) so it can stop instead of running on
 * unobserved. A non-positive timeout disables the bound.
 */
export async function withTimeout<T>(
  operation: string,
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>,
  options: TimeoutOptions = {},
): Promise<T> {
  const { controller, release } = linkedController(options.signal)
  if (timeoutMs <= 0) {
    try {
      return await work(controller.signal)
    } finally {
      release()
    }
  }

  let timer: ReturnType<typeof setTimeout> | undefined
  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new CollaboratorTimeoutError(operation, timeoutMs)
      // The timeout error must settle the race before work sees the abort
      reject(err)
      controller.abort(err)
    }, timeoutMs)
  })

  try {
    return await Promise.race([work(controller.signal), expired])
  } finally {
    clearTimeout(timer)
    release()
  }
}

/**
 * Timeout for writes. On expiry the work's signal is aborted and the call
 * then waits for the work to settle, so the caller learns whether the write
 * landed: a late success resolves normally, anything else rejects with the
 * CollaboratorTimeoutError. Stores must settle once their signal aborts.
 */
export async function withWriteTimeout<T>(
  operation: string,
  timeoutMs: number,
  work: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController()
  const pending = work(controller.signal)

  try {
    return await withTimeout(operation, timeoutMs, () => pending)
  } catch (err) {
    if (!(err instanceof CollaboratorTimeoutError)) throw err
    controller.abort(err)
    try {
      const value = await pending
      console.warn(`[withWriteTimeout] ${operation} completed after its ${timeoutMs}ms deadline`)
      return value
    } catch {
      throw err
    }
  }
}
