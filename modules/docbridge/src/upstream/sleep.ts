import { DeadlineError } from '@docbridge/gateway-core'

/**
 * Resolve after `ms`, or reject with DeadlineError as soon as `signal`
 * aborts.  The timer is cleared on abort so nothing outlives the caller.
 */
export function sleep(ms: number, signal?: AbortSignal, what = 'waiting'): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DeadlineError(`deadline exceeded while ${what}`, { cause: signal.reason }))
      return
    }
    if (ms <= 0) {
      resolve()
      return
    }

    const onAbort = () => {
      clearTimeout(timer)
      reject(new DeadlineError(`deadline exceeded while ${what}`, { cause: signal?.reason }))
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}
