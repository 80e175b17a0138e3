/**
 * Inbound request surface read by the authentication strategy.
 *
 * Fastify requests satisfy `RequestMetadata` directly (`request.cookies`
 * is filled by @fastify/cookie).  Other callers may pass raw headers only;
 * the `Cookie` header is parsed on demand.
 */

import { parse as parseCookieHeader } from 'cookie'

export type HeaderValue = string | string[] | undefined

export interface RequestMetadata {
  headers: Record<string, HeaderValue>
  cookies?: Record<string, string | undefined>
}

/** Case-insensitive header read; multi-valued headers yield their first value. */
export function readHeader(headers: Record<string, HeaderValue>, name: string): string | undefined {
  const lower = name.toLowerCase()
  let value = headers[lower]
  if (value === undefined) {
    for (const [key, candidate] of Object.entries(headers)) {
      if (key.toLowerCase() === lower) {
        value = candidate
        break
      }
    }
  }
  if (Array.isArray(value)) return value[0]
  return value
}

export function readCookie(request: RequestMetadata, name: string): string | undefined {
  if (request.cookies) {
    const value = request.cookies[name]
    if (value) return value
  }
  const header = readHeader(request.headers, 'cookie')
  if (!header) return undefined
  return parseCookieHeader(header)[name] || undefined
}

/** `Authorization: Bearer <token>`; an empty token counts as absent. */
export function extractBearerToken(headers: Record<string, HeaderValue>): string | undefined {
  const auth = readHeader(headers, 'authorization')
  if (!auth?.startsWith('Bearer ')) return undefined
  const token = auth.slice('Bearer '.length).trim()
  return token || undefined
}
