import { z } from 'zod'
import { filtersSchema } from '@docbridge/docbridge'

/** A JSON-encoded query-string value, validated against `schema` once decoded. */
export function jsonQuery<S extends z.ZodTypeAny>(schema: S) {
  return z
    .string()
    .transform((raw, ctx) => {
      try {
        const decoded: unknown = JSON.parse(raw)
        return decoded
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be valid JSON' })
        return z.NEVER
      }
    })
    .pipe(schema)
}

/** `name,status` or `["name","status"]`. */
export const fieldsQuery = z.string().transform((raw, ctx) => {
  const trimmed = raw.trim()
  if (!trimmed.startsWith('[')) {
    return trimmed
      .split(',')
      .map((f) => f.trim())
      .filter((f) => f.length > 0)
  }
  const parsed = z.array(z.string()).safeParse(safeJson(trimmed))
  if (!parsed.success) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a JSON array of strings' })
    return z.NEVER
  }
  return parsed.data
})

export const listQuerySchema = z.object({
  fields: fieldsQuery.optional(),
  filters: jsonQuery(filtersSchema).optional(),
  order_by: z.string().optional(),
  limit: z.coerce.number().int().nonnegative().optional(),
  start: z.coerce.number().int().nonnegative().optional(),
  search: z.string().optional(),
})

export const documentPathSchema = z.object({
  doctype: z.string(),
  name: z.string(),
})

export const doctypePathSchema = z.object({
  doctype: z.string(),
})

export const documentBodySchema = z.record(z.unknown())

export const aggregationBodySchema = z.object({
  doctype: z.string(),
  fields: z.array(z.string()).optional(),
  filters: filtersSchema.optional(),
  group_by: z.string().optional(),
  order_by: z.string().optional(),
  limit: z.number().int().nonnegative().optional(),
})

export const reportBodySchema = z
  .object({
    filters: z.record(z.unknown()).optional(),
    user: z.string().optional(),
  })
  .default({})

function safeJson(raw: string): unknown {
  try {
    return JSON.parse(raw)
  } catch {
    return undefined
  }
}
