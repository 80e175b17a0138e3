/**
 * Token bucket rate limiter — bounds the outbound call rate to the upstream.
 *
 * Tokens are refilled continuously using a timestamp-based approach and
 * never exceed the bucket capacity (`burst`).
 *
 * `acquire` reserves a token up front, letting the balance go negative,
 * and sleeps for exactly the deficit.  Waiters are therefore served in
 * arrival order.  A waiter whose signal aborts gives its reservation back.
 */

import { sleep } from './sleep.js'

// ── Types ──────────────────────────────────────────────────────────────

export interface RateLimitConfig {
  /** Tokens added per second. */
  rate: number
  /** Maximum burst size (bucket capacity). */
  burst: number
}

// ── Token Bucket ───────────────────────────────────────────────────────

export class RateLimiter {
  private tokens: number
  private lastRefill: number
  private readonly config: RateLimitConfig
  private readonly now: () => number

  constructor(config: RateLimitConfig = { rate: 10, burst: 20 }, now: () => number = Date.now) {
    if (!(config.rate > 0)) throw new RangeError('rate must be positive')
    if (!(config.burst >= 1)) throw new RangeError('burst must be at least 1')
    this.config = config
    this.now = now
    this.tokens = config.burst
    this.lastRefill = now()
  }

  // ── acquire ───────────────────────────────────────────────────────

  /**
   * Take one token, suspending until it is available.  Rejects with
   * DeadlineError if `signal` aborts first.
   */
  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      // Let sleep produce the DeadlineError without touching the bucket.
      return sleep(0, signal, 'waiting for a rate-limit token')
    }

    this.refill()
    this.tokens -= 1
    if (this.tokens >= 0) return

    const waitMs = Math.ceil((-this.tokens / this.config.rate) * 1000)
    try {
      await sleep(waitMs, signal, 'waiting for a rate-limit token')
    } catch (err) {
      this.refill()
      this.tokens = Math.min(this.config.burst, this.tokens + 1)
      throw err
    }
  }

  /** Tokens currently available (may be negative while waiters are queued). */
  available(): number {
    this.refill()
    return this.tokens
  }

  private refill(): void {
    const now = this.now()
    const elapsed = (now - this.lastRefill) / 1000
    this.tokens = Math.min(this.config.burst, this.tokens + elapsed * this.config.rate)
    this.lastRefill = now
  }
}
