/**
 * TtlCache — a typed, time-expiring key/value store.
 *
 * One instance per value kind (identities, documents), so reads never need
 * a runtime downcast.  Expiry is checked on read: an expired entry is
 * deleted and reported as a miss.  Writes also sweep every expired entry
 * once per sweep interval, so keys that are never read again do not
 * accumulate.  Prefix invalidation lives here rather than at call sites.
 *
 * All operations are single-key and synchronous, so concurrent async
 * callers cannot observe a half-applied update.
 */

// ── Types ──────────────────────────────────────────────────────────────

export interface TtlCacheOptions {
  /** Entry lifetime in ms. 0 or undefined = never expires. */
  ttlMs?: number
  /** Maximum number of live entries; the oldest insert is evicted first. */
  maxSize?: number
  /** How often `set` sweeps expired entries. Defaults to `ttlMs`; 0 = never. */
  sweepIntervalMs?: number
  /** Clock override for tests. */
  now?: () => number
}

export interface TtlCacheStats {
  size: number
  hits: number
  misses: number
}

interface Entry<V> {
  value: V
  expiresAt: number
}

// ── Cache ──────────────────────────────────────────────────────────────

export class TtlCache<V> {
  private entries = new Map<string, Entry<V>>()
  private readonly ttlMs: number
  private readonly maxSize: number
  private readonly sweepIntervalMs: number
  private readonly now: () => number
  private nextSweepAt: number
  private hits = 0
  private misses = 0

  constructor(options: TtlCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? 0
    this.maxSize = options.maxSize ?? 0
    this.sweepIntervalMs = options.sweepIntervalMs ?? this.ttlMs
    this.now = options.now ?? Date.now
    this.nextSweepAt = this.now() + this.sweepIntervalMs
  }

  // ── get ───────────────────────────────────────────────────────────

  get(key: string): V | undefined {
    const entry = this.entries.get(key)
    if (!entry) {
      this.misses += 1
      return undefined
    }
    if (this.isExpired(entry)) {
      this.entries.delete(key)
      this.misses += 1
      return undefined
    }
    this.hits += 1
    return entry.value
  }

  // ── set ───────────────────────────────────────────────────────────

  /** Store a value. `ttlMs` overrides the cache default for this entry. */
  set(key: string, value: V, ttlMs?: number): void {
    const ttl = ttlMs ?? this.ttlMs
    this.sweepIfDue()
    // Re-inserting moves the key to the back of the eviction order.
    this.entries.delete(key)
    this.entries.set(key, {
      value,
      expiresAt: ttl > 0 ? this.now() + ttl : Number.POSITIVE_INFINITY,
    })
    this.evictOverflow()
  }

  // ── invalidate ────────────────────────────────────────────────────

  invalidate(key: string): boolean {
    return this.entries.delete(key)
  }

  /** Remove every entry whose key starts with `prefix`. Returns the count. */
  invalidatePrefix(prefix: string): number {
    let removed = 0
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key)
        removed += 1
      }
    }
    return removed
  }

  clear(): void {
    this.entries.clear()
  }

  /** Drop expired entries eagerly. Returns the count removed. */
  purgeExpired(): number {
    let removed = 0
    for (const [key, entry] of [...this.entries]) {
      if (this.isExpired(entry)) {
        this.entries.delete(key)
        removed += 1
      }
    }
    return removed
  }

  // ── stats ─────────────────────────────────────────────────────────

  stats(): TtlCacheStats {
    return { size: this.entries.size, hits: this.hits, misses: this.misses }
  }

  // ── internals ─────────────────────────────────────────────────────

  private isExpired(entry: Entry<V>): boolean {
    return this.now() >= entry.expiresAt
  }

  private sweepIfDue(): void {
    if (this.sweepIntervalMs <= 0) return
    const now = this.now()
    if (now < this.nextSweepAt) return
    this.nextSweepAt = now + this.sweepIntervalMs
    this.purgeExpired()
  }

  private evictOverflow(): void {
    if (this.maxSize <= 0) return
    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next()
      if (oldest.done) return
      this.entries.delete(oldest.value)
    }
  }
}
