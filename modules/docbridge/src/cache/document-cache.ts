/**
 * DocumentCache — read-through cache of single documents.
 *
 * Keys are `doc:{doctype}:{name}` with both parts URI-encoded, so a
 * doctype prefix can never match a longer doctype.  Reads return a
 * structured clone; callers may mutate what they get.
 *
 * Every invalidation bumps a per-doctype generation.  A read-through fetch
 * captures the generation before going upstream and passes it to `set`;
 * if a write to that doctype landed in between, the fetched copy is
 * dropped instead of cached.
 */

import { TtlCache } from '@docbridge/gateway-core'
import type { TtlCacheStats } from '@docbridge/gateway-core'
import type { Document } from '../schemas/document-response.js'

export interface DocumentCacheOptions {
  ttlMs?: number
  maxSize?: number
  now?: () => number
}

export const DEFAULT_DOCUMENT_TTL_MS = 5 * 60 * 1000

export function documentKey(doctype: string, name: string): string {
  return `${doctypePrefix(doctype)}${encodeURIComponent(name)}`
}

export function doctypePrefix(doctype: string): string {
  return `doc:${encodeURIComponent(doctype)}:`
}

export class DocumentCache {
  private readonly cache: TtlCache<Document>
  private readonly generations = new Map<string, number>()
  private epoch = 0

  constructor(options: DocumentCacheOptions = {}) {
    this.cache = new TtlCache<Document>({
      ttlMs: options.ttlMs ?? DEFAULT_DOCUMENT_TTL_MS,
      maxSize: options.maxSize,
      now: options.now,
    })
  }

  get(doctype: string, name: string): Document | undefined {
    const doc = this.cache.get(documentKey(doctype, name))
    return doc === undefined ? undefined : structuredClone(doc)
  }

  /** Changes whenever a document of `doctype` is invalidated or the cache is cleared. */
  generation(doctype: string): number {
    return this.epoch + (this.generations.get(doctype) ?? 0)
  }

  /**
   * Store `doc`.  With `generation`, the store only happens if no
   * invalidation touched the doctype since it was read; returns whether
   * the document was cached.
   */
  set(doctype: string, name: string, doc: Document, generation?: number): boolean {
    if (generation !== undefined && generation !== this.generation(doctype)) return false
    this.cache.set(documentKey(doctype, name), structuredClone(doc))
    return true
  }

  invalidate(doctype: string, name: string): boolean {
    this.bump(doctype)
    return this.cache.invalidate(documentKey(doctype, name))
  }

  /** Drop every cached document of `doctype`. */
  invalidateDoctype(doctype: string): number {
    this.bump(doctype)
    return this.cache.invalidatePrefix(doctypePrefix(doctype))
  }

  clear(): void {
    this.epoch += 1
    this.cache.clear()
  }

  stats(): TtlCacheStats {
    return this.cache.stats()
  }

  private bump(doctype: string): void {
    this.generations.set(doctype, (this.generations.get(doctype) ?? 0) + 1)
  }
}
