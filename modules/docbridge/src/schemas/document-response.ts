import { z } from 'zod'

/** A Frappe document: an open field map keyed by fieldname. */
export type Document = Record<string, unknown>

export type DocumentList = {
  data: Document[]
  /** Rows in this page, not the upstream's full count. */
  total: number
  limit: number
  start: number
  hasMore: boolean
}

export const reportColumnSchema = z
  .object({
    fieldname: z.string().optional(),
    label: z.string().optional(),
    fieldtype: z.string().optional(),
    options: z.string().nullish(),
    width: z.number().nullish(),
  })
  .passthrough()

export type ReportColumn = z.infer<typeof reportColumnSchema>

export type ReportResult = {
  columns: ReportColumn[]
  /** Either positional rows or fieldname-keyed rows, as the report emits them. */
  rows: unknown[]
}

// ── Upstream envelopes ──────────────────────────────────────────────────

export const singleDocumentEnvelope = z.object({
  data: z.record(z.unknown()),
})

export const reportEnvelope = z.object({
  message: z.object({
    columns: z.array(z.union([reportColumnSchema, z.string()])).default([]),
    result: z.array(z.unknown()).default([]),
  }),
})
