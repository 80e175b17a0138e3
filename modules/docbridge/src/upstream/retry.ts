/**
 * Retry policy — linear backoff capped at `maxDelayMs`.
 *
 *   attempt 0 → no delay
 *   attempt n → min(n × initialDelayMs, maxDelayMs)
 *
 * A structured `Retry-After` from the upstream replaces the computed delay
 * (still capped).  Nothing is derived from error message text.
 */

import { UpstreamError } from '@docbridge/gateway-core'

export interface RetryPolicy {
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 10_000,
}

export function retryDelay(policy: RetryPolicy, attempt: number): number {
  if (attempt <= 0) return 0
  return Math.min(attempt * policy.initialDelayMs, policy.maxDelayMs)
}

/** Delay before `attempt`, preferring the upstream's own hint when the last failure carried one. */
export function backoffFor(policy: RetryPolicy, attempt: number, lastError: unknown): number {
  if (attempt <= 0) return 0
  if (lastError instanceof UpstreamError && lastError.retryAfterMs !== undefined) {
    return Math.min(lastError.retryAfterMs, policy.maxDelayMs)
  }
  return retryDelay(policy, attempt)
}

/**
 * Parse a `Retry-After` header: delta-seconds or an HTTP-date.
 * Returns undefined when absent or unparseable.
 */
export function parseRetryAfter(header: string | null | undefined, now: number = Date.now()): number | undefined {
  if (!header) return undefined
  const trimmed = header.trim()
  if (/^\d+$/.test(trimmed)) return Number(trimmed) * 1000

  const at = Date.parse(trimmed)
  if (Number.isNaN(at)) return undefined
  return Math.max(0, at - now)
}
