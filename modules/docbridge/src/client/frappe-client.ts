/**
 * FrappeClient — the single call path for every document operation.
 *
 *   validate params → (document cache) → select credential →
 *   rate-limit token → dispatch with retry → cache update
 *
 * The caller's identity arrives in a CallContext on every call and is
 * never stored.  The client owns its rate limiter, document cache and
 * dispatcher; all three are shared by concurrent calls.
 */

import { createLogger, SERVICE_NAMES, SPAN_NAMES, withSpan } from '@docbridge/observability'
import type { Logger } from '@docbridge/observability'
import { ConfigurationError, UpstreamError } from '@docbridge/gateway-core'
import type { CallContext, ErrorContext, TtlCacheStats } from '@docbridge/gateway-core'
import { DocumentCache } from '../cache/document-cache.js'
import { RateLimiter } from '../upstream/rate-limiter.js'
import { RetryingDispatcher } from '../upstream/dispatcher.js'
import type { HttpMethod } from '../upstream/dispatcher.js'
import { DEFAULT_RETRY_POLICY } from '../upstream/retry.js'
import type { RetryPolicy } from '../upstream/retry.js'
import { selectCredential } from '../upstream/credentials.js'
import type { ServiceKey } from '../upstream/credentials.js'
import {
  aggregationSchema,
  createDocumentSchema,
  deleteDocumentSchema,
  documentListSchema,
  getDocumentSchema,
  parseParams,
  reportSchema,
  searchSchema,
  updateDocumentSchema,
} from '../schemas/document-request.js'
import type {
  AggregationParams,
  CreateDocumentParams,
  DeleteDocumentParams,
  DocumentListParams,
  Filters,
  GetDocumentParams,
  ReportParams,
  SearchParams,
  UpdateDocumentParams,
} from '../schemas/document-request.js'
import { reportEnvelope, singleDocumentEnvelope } from '../schemas/document-response.js'
import type { Document, DocumentList, ReportColumn, ReportResult } from '../schemas/document-response.js'
import { normalizeDocuments } from './normalize.js'

// ── Types ──────────────────────────────────────────────────────────────

export interface FrappeClientConfig {
  /** Site root, e.g. `https://erp.example.com`. Paths are sent under `/api`. */
  baseUrl: string
  apiKey?: string
  apiSecret?: string
  /** Per-attempt HTTP timeout. Default 30s. */
  timeoutMs?: number
  rateLimit?: { requestsPerSecond: number; burst: number }
  retry?: Partial<RetryPolicy> & { retryMutations?: boolean }
  documentCache?: { ttlMs?: number; maxSize?: number }
  fetch?: typeof fetch
  logger?: Logger
  /** Clock override for the document cache. */
  now?: () => number
}

interface UpstreamCall {
  method: HttpMethod
  path: string
  query?: URLSearchParams
  body?: unknown
  mutating?: boolean
  context: ErrorContext
}

const DEFAULT_TIMEOUT_MS = 30_000
const DEFAULT_RATE_LIMIT = { requestsPerSecond: 10, burst: 20 }

const SEARCH_METHOD = '/method/frappe.desk.search.search_link'
const AGGREGATION_METHOD = '/method/frappe.client.get_list'
const REPORT_METHOD = '/method/frappe.desk.query_report.run'

// ── Client ─────────────────────────────────────────────────────────────

export class FrappeClient {
  private readonly apiRoot: string
  private readonly serviceKey?: ServiceKey
  private readonly limiter: RateLimiter
  private readonly cache: DocumentCache
  private readonly dispatcher: RetryingDispatcher
  private readonly logger: Logger

  constructor(config: FrappeClientConfig) {
    const baseUrl = config.baseUrl.trim().replace(/\/+$/, '')
    if (!baseUrl) {
      throw new ConfigurationError('Frappe base URL is required')
    }
    if (!!config.apiKey !== !!config.apiSecret) {
      throw new ConfigurationError('API key and API secret must be provided together')
    }

    this.apiRoot = `${baseUrl}/api`
    if (config.apiKey && config.apiSecret) {
      this.serviceKey = { apiKey: config.apiKey, apiSecret: config.apiSecret }
    }

    this.logger = config.logger ?? createLogger({ service: SERVICE_NAMES.UPSTREAM })
    const rateLimit = config.rateLimit ?? DEFAULT_RATE_LIMIT
    this.limiter = new RateLimiter({ rate: rateLimit.requestsPerSecond, burst: rateLimit.burst })
    this.cache = new DocumentCache({ ...config.documentCache, now: config.now })
    this.dispatcher = new RetryingDispatcher({
      retry: { ...DEFAULT_RETRY_POLICY, ...config.retry },
      timeoutMs: config.timeoutMs || DEFAULT_TIMEOUT_MS,
      fetch: config.fetch,
      logger: this.logger,
    })
  }

  // ── single documents ──────────────────────────────────────────────

  async getDocument(ctx: CallContext, params: GetDocumentParams): Promise<Document> {
    const context: ErrorContext = { operation: 'get_document', doctype: params.doctype, name: params.name }
    const { doctype, name } = parseParams(getDocumentSchema, params, context)

    // A caller with no usable credential gets nothing, cached or not.
    selectCredential(ctx.identity, this.serviceKey, false, context)

    const cached = this.cache.get(doctype, name)
    if (cached) {
      this.logger.debug({ doctype, name }, 'document served from cache')
      return cached
    }

    const generation = this.cache.generation(doctype)
    const payload = await this.call(ctx, {
      method: 'GET',
      path: `/resource/${encodeURIComponent(doctype)}/${encodeURIComponent(name)}`,
      context,
    })
    const doc = expectDocument(payload, context)

    if (!this.cache.set(doctype, name, doc, generation)) {
      this.logger.debug({ doctype, name }, 'document changed while being read, not cached')
    }
    this.logger.info({ doctype, name }, 'document retrieved')
    return doc
  }

  async createDocument(ctx: CallContext, params: CreateDocumentParams): Promise<Document> {
    const context: ErrorContext = { operation: 'create_document', doctype: params.doctype }
    const { doctype, data } = parseParams(createDocumentSchema, params, context)

    const payload = await this.call(ctx, {
      method: 'POST',
      path: `/resource/${encodeURIComponent(doctype)}`,
      body: data,
      mutating: true,
      context,
    })
    const doc = expectDocument(payload, context)

    this.cache.invalidateDoctype(doctype)
    this.logger.info({ doctype }, 'document created')
    return doc
  }

  async updateDocument(ctx: CallContext, params: UpdateDocumentParams): Promise<Document> {
    const context: ErrorContext = { operation: 'update_document', doctype: params.doctype, name: params.name }
    const { doctype, name, data } = parseParams(updateDocumentSchema, params, context)

    const payload = await this.call(ctx, {
      method: 'PUT',
      path: `/resource/${encodeURIComponent(doctype)}/${encodeURIComponent(name)}`,
      body: data,
      mutating: true,
      context,
    })
    const doc = expectDocument(payload, context)

    this.cache.invalidate(doctype, name)
    this.logger.info({ doctype, name }, 'document updated')
    return doc
  }

  async deleteDocument(ctx: CallContext, params: DeleteDocumentParams): Promise<void> {
    const context: ErrorContext = { operation: 'delete_document', doctype: params.doctype, name: params.name }
    const { doctype, name } = parseParams(deleteDocumentSchema, params, context)

    await this.call(ctx, {
      method: 'DELETE',
      path: `/resource/${encodeURIComponent(doctype)}/${encodeURIComponent(name)}`,
      mutating: true,
      context,
    })

    this.cache.invalidate(doctype, name)
    this.logger.info({ doctype, name }, 'document deleted')
  }

  // ── lists & queries ───────────────────────────────────────────────

  async getDocumentList(ctx: CallContext, params: DocumentListParams): Promise<DocumentList> {
    const context: ErrorContext = { operation: 'get_document_list', doctype: params.doctype }
    const req = parseParams(documentListSchema, params, context)

    const query = listQuery(req)
    const payload = await this.call(ctx, {
      method: 'GET',
      path: `/resource/${encodeURIComponent(req.doctype)}`,
      query,
      context,
    })
    const list = toDocumentList(normalizeDocuments(payload), req.limit, req.start)

    this.logger.info({ doctype: req.doctype, count: list.total, start: req.start }, 'document list retrieved')
    return list
  }

  /**
   * Text search when `search` is non-empty, otherwise a filtered list
   * read.  Both shapes normalize to a DocumentList.
   */
  async searchDocuments(ctx: CallContext, params: SearchParams): Promise<DocumentList> {
    const context: ErrorContext = { operation: 'search_documents', doctype: params.doctype }
    const req = parseParams(searchSchema, params, context)

    const query = listQuery(req)
    const text = req.search?.trim()
    let payload: unknown
    if (text) {
      query.set('txt', text)
      query.set('doctype', req.doctype)
      payload = await this.call(ctx, { method: 'POST', path: SEARCH_METHOD, query, context })
    } else {
      payload = await this.call(ctx, {
        method: 'GET',
        path: `/resource/${encodeURIComponent(req.doctype)}`,
        query,
        context,
      })
    }
    const list = toDocumentList(normalizeDocuments(payload), req.limit, req.start)

    this.logger.info({ doctype: req.doctype, results: list.total, text: !!text }, 'search completed')
    return list
  }

  async runAggregationQuery(ctx: CallContext, params: AggregationParams): Promise<Document[]> {
    const context: ErrorContext = { operation: 'run_aggregation_query', doctype: params.doctype }
    const req = parseParams(aggregationSchema, params, context)

    const body: Record<string, unknown> = { doctype: req.doctype }
    if (req.fields && req.fields.length > 0) body.fields = req.fields
    if (req.filters && hasFilters(req.filters)) body.filters = req.filters
    if (req.groupBy) body.group_by = req.groupBy
    if (req.orderBy) body.order_by = req.orderBy
    if (req.limit > 0) body.limit_page_length = req.limit

    const payload = await this.call(ctx, { method: 'POST', path: AGGREGATION_METHOD, body, context })
    const rows = normalizeDocuments(payload)

    this.logger.info({ doctype: req.doctype, groupBy: req.groupBy, rows: rows.length }, 'aggregation query executed')
    return rows
  }

  async runReport(ctx: CallContext, params: ReportParams): Promise<ReportResult> {
    const context: ErrorContext = { operation: 'run_report', report: params.reportName }
    const req = parseParams(reportSchema, params, context)

    const query = new URLSearchParams({ report_name: req.reportName })
    if (req.filters && Object.keys(req.filters).length > 0) query.set('filters', JSON.stringify(req.filters))
    if (req.user) query.set('user', req.user)

    const payload = await this.call(ctx, { method: 'GET', path: REPORT_METHOD, query, context })
    const parsed = reportEnvelope.safeParse(payload)
    if (!parsed.success) {
      throw unexpectedShape(context)
    }
    const result: ReportResult = {
      columns: parsed.data.message.columns.map(toReportColumn),
      rows: parsed.data.message.result,
    }

    this.logger.info(
      { report: req.reportName, columns: result.columns.length, rows: result.rows.length },
      'report executed',
    )
    return result
  }

  // ── cache ─────────────────────────────────────────────────────────

  clearCache(): void {
    this.cache.clear()
    this.logger.info('document cache cleared')
  }

  cacheStats(): TtlCacheStats {
    return this.cache.stats()
  }

  /** Whole tokens left in the outbound bucket; negative while calls are queued. */
  rateLimitTokens(): number {
    return Math.floor(this.limiter.available())
  }

  // ── call path ─────────────────────────────────────────────────────

  private async call(ctx: CallContext, call: UpstreamCall): Promise<unknown> {
    const mutating = call.mutating ?? false
    const credential = selectCredential(ctx.identity, this.serviceKey, mutating, call.context)

    await withSpan(SPAN_NAMES.RATE_LIMIT_WAIT, {}, () => this.limiter.acquire(ctx.signal))

    const qs = call.query?.toString()
    return this.dispatcher.dispatch(
      {
        method: call.method,
        url: `${this.apiRoot}${call.path}${qs ? `?${qs}` : ''}`,
        headers: credential.headers,
        body: call.body,
      },
      { signal: ctx.signal, mutating, credentialKind: credential.kind, context: call.context },
    )
  }
}

// ── helpers ────────────────────────────────────────────────────────────

function listQuery(req: {
  fields?: string[]
  filters?: Filters
  orderBy?: string
  limit: number
  start: number
}): URLSearchParams {
  const query = new URLSearchParams()
  if (req.fields && req.fields.length > 0) query.set('fields', JSON.stringify(req.fields))
  if (req.filters && hasFilters(req.filters)) query.set('filters', JSON.stringify(req.filters))
  if (req.orderBy) query.set('order_by', req.orderBy)
  if (req.limit > 0) query.set('limit_page_length', String(req.limit))
  if (req.start > 0) query.set('limit_start', String(req.start))
  return query
}

function hasFilters(filters: Filters): boolean {
  return Array.isArray(filters) ? filters.length > 0 : Object.keys(filters).length > 0
}

function toDocumentList(data: Document[], limit: number, start: number): DocumentList {
  return {
    data,
    total: data.length,
    limit,
    start,
    hasMore: limit > 0 && data.length === limit,
  }
}

function expectDocument(payload: unknown, context: ErrorContext): Document {
  const parsed = singleDocumentEnvelope.safeParse(payload)
  if (!parsed.success) {
    throw unexpectedShape(context)
  }
  return parsed.data.data
}

function toReportColumn(column: ReportColumn | string): ReportColumn {
  return typeof column === 'string' ? { label: column } : column
}

function unexpectedShape(context: ErrorContext): UpstreamError {
  return new UpstreamError({ status: 502, message: 'unexpected response shape from upstream', context })
}
