import type { Document } from '../schemas/document-response.js'

function isDocument(value: unknown): value is Document {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isEmpty(value: unknown): boolean {
  if (value === undefined || value === null) return true
  if (Array.isArray(value)) return value.length === 0
  if (isDocument(value)) return Object.keys(value).length === 0
  return false
}

/**
 * List-shaped responses carry their rows under `data` or `message`.  The
 * first non-empty one wins; a single object becomes a one-element list and
 * non-object rows are dropped.
 */
export function normalizeDocuments(payload: unknown): Document[] {
  if (!isDocument(payload)) return []
  const source = [payload.data, payload.message].find((candidate) => !isEmpty(candidate))

  if (Array.isArray(source)) return source.filter(isDocument)
  if (isDocument(source)) return [source]
  return []
}
