import { z } from 'zod'
import { ValidationError } from '@docbridge/gateway-core'
import type { ErrorContext } from '@docbridge/gateway-core'

const doctype = z.string().trim().min(1, 'doctype is required')
const docName = z.string().trim().min(1, 'name is required')
const documentBody = z.record(z.unknown())

/** `{field: value}` or Frappe's `[[field, op, value], ...]` form. */
export const filtersSchema = z.union([z.record(z.unknown()), z.array(z.array(z.unknown()))])

export const getDocumentSchema = z.object({
  doctype,
  name: docName,
})

export const documentListSchema = z.object({
  doctype,
  fields: z.array(z.string().min(1)).optional(),
  filters: filtersSchema.optional(),
  orderBy: z.string().optional(),
  /** Page size (`limit_page_length`). 0 leaves the upstream default. */
  limit: z.number().int().nonnegative().default(0),
  /** Row offset (`limit_start`). */
  start: z.number().int().nonnegative().default(0),
})

export const searchSchema = documentListSchema.extend({
  search: z.string().optional(),
})

export const createDocumentSchema = z.object({
  doctype,
  data: documentBody,
})

export const updateDocumentSchema = z.object({
  doctype,
  name: docName,
  data: documentBody,
})

export const deleteDocumentSchema = getDocumentSchema

export const aggregationSchema = z.object({
  doctype,
  /** May hold aggregate expressions, e.g. `sum(grand_total) as total`. */
  fields: z.array(z.string().min(1)).optional(),
  filters: filtersSchema.optional(),
  groupBy: z.string().optional(),
  orderBy: z.string().optional(),
  limit: z.number().int().nonnegative().default(0),
})

export const reportSchema = z.object({
  reportName: z.string().trim().min(1, 'reportName is required'),
  filters: z.record(z.unknown()).optional(),
  user: z.string().optional(),
})

export type GetDocumentParams = z.input<typeof getDocumentSchema>
export type DocumentListParams = z.input<typeof documentListSchema>
export type SearchParams = z.input<typeof searchSchema>
export type CreateDocumentParams = z.input<typeof createDocumentSchema>
export type UpdateDocumentParams = z.input<typeof updateDocumentSchema>
export type DeleteDocumentParams = z.input<typeof deleteDocumentSchema>
export type AggregationParams = z.input<typeof aggregationSchema>
export type ReportParams = z.input<typeof reportSchema>
export type Filters = z.infer<typeof filtersSchema>

/** Validate operation parameters; failures become a 400-class ValidationError. */
export function parseParams<S extends z.ZodTypeAny>(schema: S, input: unknown, context: ErrorContext = {}): z.output<S> {
  const result = schema.safeParse(input)
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ')
    throw new ValidationError(`invalid parameters: ${detail}`, { code: 'invalid_request', context })
  }
  return result.data
}
