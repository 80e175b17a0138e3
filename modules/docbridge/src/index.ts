// Client
export { FrappeClient } from './client/frappe-client'
export type { FrappeClientConfig } from './client/frappe-client'
export { normalizeDocuments } from './client/normalize'

// Upstream plumbing
export { RateLimiter } from './upstream/rate-limiter'
export type { RateLimitConfig } from './upstream/rate-limiter'
export { RetryingDispatcher } from './upstream/dispatcher'
export type { DispatcherConfig, DispatchOptions, HttpMethod, UpstreamRequest } from './upstream/dispatcher'
export { DEFAULT_RETRY_POLICY, retryDelay, backoffFor, parseRetryAfter } from './upstream/retry'
export type { RetryPolicy } from './upstream/retry'
export { sleep } from './upstream/sleep'
export { selectCredential, SESSION_COOKIE, CSRF_HEADER } from './upstream/credentials'
export type { CredentialKind, SelectedCredential, ServiceKey } from './upstream/credentials'

// Cache
export { DocumentCache, documentKey, doctypePrefix, DEFAULT_DOCUMENT_TTL_MS } from './cache/document-cache'
export type { DocumentCacheOptions } from './cache/document-cache'

// Schemas
export {
  filtersSchema,
  getDocumentSchema,
  documentListSchema,
  searchSchema,
  createDocumentSchema,
  updateDocumentSchema,
  deleteDocumentSchema,
  aggregationSchema,
  reportSchema,
  parseParams,
} from './schemas/document-request'
export type {
  GetDocumentParams,
  DocumentListParams,
  SearchParams,
  CreateDocumentParams,
  UpdateDocumentParams,
  DeleteDocumentParams,
  AggregationParams,
  ReportParams,
  Filters,
} from './schemas/document-request'
export type { Document, DocumentList, ReportColumn, ReportResult } from './schemas/document-response'
