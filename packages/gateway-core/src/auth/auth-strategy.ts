/**
 * AuthStrategy — resolves an inbound request to an Identity.
 *
 * Two credential forms are tried in sequence, not exclusively:
 *
 *   1. session cookie → validated against the identity provider's
 *      "logged user" endpoint; any failure falls through to step 2
 *   2. bearer token   → cache, then token introspection; a rejection here
 *      is final
 *
 * A bearer token minted for a trusted backend client may additionally
 * carry delegated-identity headers, in which case the caller becomes the
 * forwarded user (id/email/name only, no roles, no credential).  The cache
 * always holds the token's own identity, so delegation is re-evaluated on
 * every request.
 *
 * Only successful resolutions are cached.  One remote call per credential
 * form per invocation; nothing is retried.
 */

import { z } from 'zod'
import { ATTR_KEYS, createLogger, hashForTelemetry, SERVICE_NAMES, SPAN_NAMES, withSpan } from '@docbridge/observability'
import type { Logger } from '@docbridge/observability'
import { TtlCache } from '../cache/ttl-cache.js'
import type { TtlCacheStats } from '../cache/ttl-cache.js'
import {
  AuthenticationError,
  DeadlineError,
  NetworkError,
  ValidationError,
} from '../errors.js'
import { anonymousIdentity, createIdentity, withCsrfToken } from './identity.js'
import type { Identity } from './identity.js'
import { extractBearerToken, readCookie, readHeader } from './request-metadata.js'
import type { HeaderValue, RequestMetadata } from './request-metadata.js'

// ── Types ──────────────────────────────────────────────────────────────

export interface AuthStrategyConfig {
  /** Token introspection endpoint (`GET`, bearer auth). */
  tokenInfoUrl: string
  /** Identity provider root; the session check is made against it. */
  issuerUrl: string
  /** Client ids allowed to assert delegated identities. */
  trustedClients?: readonly string[]
  /** Timeout for each remote validation call. Default 30s. */
  timeoutMs?: number
  /** Credential cache TTL. Default 5 minutes. */
  cacheTtlMs?: number
  /** Credential cache capacity. Default 10 000 identities. */
  cacheMaxSize?: number
  /** Set false only for local development: skips every remote call. */
  validateRemote?: boolean
  sessionCookieName?: string
  csrfHeader?: string
  /** Delegation headers are `X-<prefix>-User-ID/-Email/-Name`. */
  delegationHeaderPrefix?: string
  fetch?: typeof fetch
  logger?: Logger
  /** Clock override for the credential cache. */
  now?: () => number
}

const DEFAULT_TIMEOUT_MS = 30_000
const DEFAULT_CACHE_TTL_MS = 5 * 60 * 1000
const DEFAULT_CACHE_MAX_SIZE = 10_000
const SESSION_CHECK_PATH = '/api/method/frappe.auth.get_logged_user'

const SESSION_PREFIX = 'sid:'
const BEARER_PREFIX = 'bearer:'

const tokenInfoSchema = z.object({
  sub: z.string().min(1),
  email: z.string().nullish(),
  name: z.string().nullish(),
  client_id: z.string().nullish(),
  roles: z.array(z.string()).nullish(),
})

const loggedUserSchema = z.object({
  message: z.string().min(1),
})

// ── Strategy ───────────────────────────────────────────────────────────

export class AuthStrategy {
  private readonly cache: TtlCache<Identity>
  private readonly trustedClients: Set<string>
  private readonly tokenInfoUrl: string
  private readonly sessionCheckUrl: string
  private readonly timeoutMs: number
  private readonly validateRemote: boolean
  private readonly sessionCookieName: string
  private readonly csrfHeader: string
  private readonly delegationHeaders: { id: string; email: string; name: string }
  private readonly fetchFn: typeof fetch
  private readonly logger: Logger

  constructor(config: AuthStrategyConfig) {
    this.tokenInfoUrl = config.tokenInfoUrl
    this.sessionCheckUrl = `${config.issuerUrl.replace(/\/+$/, '')}${SESSION_CHECK_PATH}`
    this.trustedClients = new Set(config.trustedClients ?? [])
    this.timeoutMs = config.timeoutMs || DEFAULT_TIMEOUT_MS
    this.validateRemote = config.validateRemote ?? true
    this.sessionCookieName = config.sessionCookieName ?? 'sid'
    this.csrfHeader = config.csrfHeader ?? 'x-frappe-csrf-token'
    const prefix = `x-${(config.delegationHeaderPrefix ?? 'mcp').toLowerCase()}-user`
    this.delegationHeaders = { id: `${prefix}-id`, email: `${prefix}-email`, name: `${prefix}-name` }
    this.fetchFn = config.fetch ?? fetch
    this.logger = config.logger ?? createLogger({ service: SERVICE_NAMES.AUTH })
    const ttlMs = config.cacheTtlMs || DEFAULT_CACHE_TTL_MS
    this.cache = new TtlCache<Identity>({
      ttlMs,
      maxSize: config.cacheMaxSize || DEFAULT_CACHE_MAX_SIZE,
      sweepIntervalMs: ttlMs * 2,
      now: config.now,
    })
  }

  // ── authenticate ──────────────────────────────────────────────────

  async authenticate(request: RequestMetadata, signal?: AbortSignal): Promise<Identity> {
    const sessionId = readCookie(request, this.sessionCookieName)
    if (sessionId) {
      try {
        const identity = await this.resolveSession(sessionId, signal)
        return withCsrfToken(identity, readHeader(request.headers, this.csrfHeader))
      } catch (err) {
        if (err instanceof DeadlineError) throw err
        this.logger.debug({ reason: err instanceof Error ? err.message : String(err) }, 'session validation failed, trying bearer token')
      }
    }

    const token = extractBearerToken(request.headers)
    if (!token) {
      throw new AuthenticationError('missing authentication: no session cookie or bearer token found')
    }

    const identity = await this.resolveBearer(token, signal)
    return this.applyDelegation(identity, request.headers)
  }

  // ── trusted clients ───────────────────────────────────────────────

  isTrustedClient(clientId: string | undefined): boolean {
    return !!clientId && this.trustedClients.has(clientId)
  }

  addTrustedClient(clientId: string): void {
    this.trustedClients.add(clientId)
  }

  removeTrustedClient(clientId: string): void {
    this.trustedClients.delete(clientId)
  }

  clearCache(): void {
    this.cache.clear()
  }

  cacheStats(): TtlCacheStats {
    return this.cache.stats()
  }

  // ── session path ──────────────────────────────────────────────────

  private async resolveSession(sessionId: string, signal?: AbortSignal): Promise<Identity> {
    const cacheKey = SESSION_PREFIX + sessionId
    const cached = this.cache.get(cacheKey)
    if (cached) {
      this.logger.debug({ user: hashForTelemetry(cached.email) }, 'session identity served from cache')
      return cached
    }

    let identity: Identity
    if (!this.validateRemote) {
      identity = anonymousIdentity({ kind: 'session', sessionId })
    } else {
      const res = await this.remoteGet(
        this.sessionCheckUrl,
        { Cookie: `${this.sessionCookieName}=${sessionId}` },
        'session validation',
        signal,
      )
      if (res.status !== 200) {
        throw new ValidationError(`invalid session: status ${res.status}`)
      }
      const parsed = loggedUserSchema.safeParse(await readJson(res))
      if (!parsed.success) {
        throw new ValidationError('failed to decode session info')
      }
      identity = createIdentity({
        id: parsed.data.message,
        email: parsed.data.message,
        credential: { kind: 'session', sessionId },
      })
    }

    this.cache.set(cacheKey, identity)
    this.logger.debug({ user: hashForTelemetry(identity.email) }, 'session validated')
    return identity
  }

  // ── bearer path ───────────────────────────────────────────────────

  private async resolveBearer(token: string, signal?: AbortSignal): Promise<Identity> {
    const cacheKey = BEARER_PREFIX + token
    const cached = this.cache.get(cacheKey)
    if (cached) {
      this.logger.debug({ user: hashForTelemetry(cached.email) }, 'bearer identity served from cache')
      return cached
    }

    let identity: Identity
    if (!this.validateRemote) {
      identity = anonymousIdentity()
    } else {
      const res = await this.remoteGet(
        this.tokenInfoUrl,
        { Authorization: `Bearer ${token}` },
        'token introspection',
        signal,
      )
      if (res.status !== 200) {
        throw new ValidationError(`invalid token: status ${res.status}`)
      }
      const parsed = tokenInfoSchema.safeParse(await readJson(res))
      if (!parsed.success) {
        throw new ValidationError('failed to decode token info')
      }
      const info = parsed.data
      identity = createIdentity({
        id: info.sub,
        email: info.email ?? '',
        fullName: info.name ?? undefined,
        clientId: info.client_id ?? undefined,
        roles: info.roles ?? [],
        credential: { kind: 'bearer', token },
      })
    }

    this.cache.set(cacheKey, identity)
    this.logger.debug({ user: hashForTelemetry(identity.email) }, 'bearer token validated')
    return identity
  }

  private applyDelegation(identity: Identity, headers: Record<string, HeaderValue>): Identity {
    if (!this.isTrustedClient(identity.clientId)) return identity

    const delegatedId = readHeader(headers, this.delegationHeaders.id)
    if (!delegatedId) return identity

    this.logger.debug(
      { client: hashForTelemetry(identity.clientId ?? ''), user: hashForTelemetry(delegatedId) },
      'trusted client asserted delegated identity',
    )
    return createIdentity({
      id: delegatedId,
      email: readHeader(headers, this.delegationHeaders.email) ?? '',
      fullName: readHeader(headers, this.delegationHeaders.name),
    })
  }

  // ── transport ─────────────────────────────────────────────────────

  private async remoteGet(
    url: string,
    headers: Record<string, string>,
    purpose: string,
    signal?: AbortSignal,
  ): Promise<Response> {
    return withSpan(SPAN_NAMES.AUTH_VERIFY, { [ATTR_KEYS.OPERATION]: purpose }, async (span) => {
      const timeout = AbortSignal.timeout(this.timeoutMs)
      const combined = signal ? AbortSignal.any([signal, timeout]) : timeout
      try {
        const res = await this.fetchFn(url, { method: 'GET', headers, signal: combined })
        span.setAttribute(ATTR_KEYS.HTTP_STATUS_CODE, res.status)
        return res
      } catch (err) {
        if (signal?.aborted) {
          throw new DeadlineError(`${purpose} aborted by caller`, { cause: err })
        }
        if (timeout.aborted) {
          throw new NetworkError(`${purpose} timed out after ${this.timeoutMs}ms`, { cause: err })
        }
        throw new NetworkError(`${purpose} failed: ${err instanceof Error ? err.message : String(err)}`, { cause: err })
      }
    })
  }
}

async function readJson(res: Response): Promise<unknown> {
  try {
    return await res.json()
  } catch {
    return undefined
  }
}
