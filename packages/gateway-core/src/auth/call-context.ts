/**
 * CallContext — carries the resolved identity and the caller's
 * cancellation signal into one logical upstream call.
 *
 * Passed explicitly as the first argument of every client operation; there
 * is no ambient lookup to forget.
 */

import type { Identity } from './identity.js'

export interface CallContext {
  identity?: Identity
  /** Aborts every suspension point of the call (rate limit, backoff, fetch). */
  signal?: AbortSignal
}

export interface CallContextOptions {
  signal?: AbortSignal
  /** Relative deadline; combined with `signal` when both are given. */
  timeoutMs?: number
}

export function createCallContext(identity: Identity | undefined, options: CallContextOptions = {}): CallContext {
  const signals: AbortSignal[] = []
  if (options.signal) signals.push(options.signal)
  if (options.timeoutMs !== undefined && options.timeoutMs > 0) {
    signals.push(AbortSignal.timeout(options.timeoutMs))
  }

  const signal =
    signals.length === 0 ? undefined
    : signals.length === 1 ? signals[0]
    : AbortSignal.any(signals)

  return { identity, signal }
}
