import { describe, it, expect, vi } from 'vitest'
import { AuthStrategy } from '../auth/auth-strategy'
import type { AuthStrategyConfig } from '../auth/auth-strategy'
import { AuthenticationError, DeadlineError, NetworkError, ValidationError } from '../errors'

const TOKEN_INFO_URL = 'https://idp.test/api/method/frappe.integrations.oauth2.openid_profile'
const ISSUER_URL = 'https://idp.test/'
const SESSION_URL = 'https://idp.test/api/method/frappe.auth.get_logged_user'

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } })
}

function mockFetch(handler: (url: string, init?: RequestInit) => Response | Promise<Response>) {
  return vi.fn(async (input: string | URL | Request, init?: RequestInit) => handler(String(input), init))
}

function headerOf(init: RequestInit | undefined, name: string): string | undefined {
  return new Headers(init?.headers).get(name) ?? undefined
}

function strategy(fetchFn: ReturnType<typeof mockFetch>, overrides: Partial<AuthStrategyConfig> = {}) {
  return new AuthStrategy({
    tokenInfoUrl: TOKEN_INFO_URL,
    issuerUrl: ISSUER_URL,
    fetch: fetchFn,
    ...overrides,
  })
}

describe('AuthStrategy', () => {
  describe('bearer path', () => {
    it('resolves a valid token and serves the repeat from cache', async () => {
      const fetchFn = mockFetch(() => json({ sub: 'user123', email: 'test@example.com' }))
      const auth = strategy(fetchFn)
      const request = { headers: { authorization: 'Bearer valid-token' } }

      const first = await auth.authenticate(request)
      const second = await auth.authenticate(request)

      expect(first.id).toBe('user123')
      expect(first.email).toBe('test@example.com')
      expect(second.id).toBe(first.id)
      expect(second.email).toBe(first.email)
      expect(fetchFn).toHaveBeenCalledTimes(1)
    })

    it('presents the token to the introspection endpoint', async () => {
      const fetchFn = mockFetch(() => json({ sub: 'user123', email: 'test@example.com' }))
      await strategy(fetchFn).authenticate({ headers: { authorization: 'Bearer valid-token' } })

      const [url, init] = fetchFn.mock.calls[0]
      expect(url).toBe(TOKEN_INFO_URL)
      expect(init?.method).toBe('GET')
      expect(headerOf(init, 'authorization')).toBe('Bearer valid-token')
    })

    it('maps the full introspection payload onto the identity', async () => {
      const fetchFn = mockFetch(() =>
        json({ sub: 'u-9', email: 'nine@example.com', name: 'Nine', client_id: 'webapp', roles: ['Projects User'] }),
      )
      const identity = await strategy(fetchFn).authenticate({ headers: { authorization: 'Bearer t9' } })

      expect(identity).toEqual({
        id: 'u-9',
        email: 'nine@example.com',
        fullName: 'Nine',
        clientId: 'webapp',
        roles: ['Projects User'],
        credential: { kind: 'bearer', token: 't9' },
      })
    })

    it('fails with an authentication error and no network call when nothing is presented', async () => {
      const fetchFn = mockFetch(() => json({}))
      const auth = strategy(fetchFn)

      await expect(auth.authenticate({ headers: {} })).rejects.toBeInstanceOf(AuthenticationError)
      await expect(auth.authenticate({ headers: { authorization: 'Bearer   ' } })).rejects.toBeInstanceOf(AuthenticationError)
      await expect(auth.authenticate({ headers: { authorization: 'Basic abc' } })).rejects.toBeInstanceOf(AuthenticationError)
      expect(fetchFn).not.toHaveBeenCalled()
    })

    it('rejects a token the provider refuses, without caching the failure', async () => {
      const fetchFn = mockFetch(() => json({ error: 'invalid_token' }, 401))
      const auth = strategy(fetchFn)
      const request = { headers: { authorization: 'Bearer revoked' } }

      await expect(auth.authenticate(request)).rejects.toThrow('invalid token: status 401')
      await expect(auth.authenticate(request)).rejects.toBeInstanceOf(ValidationError)
      expect(fetchFn).toHaveBeenCalledTimes(2)
    })

    it('rejects an introspection payload without a subject', async () => {
      const fetchFn = mockFetch(() => json({ email: 'nobody@example.com' }))
      await expect(
        strategy(fetchFn).authenticate({ headers: { authorization: 'Bearer t' } }),
      ).rejects.toThrow('failed to decode token info')
    })

    it('reports transport failures as network errors', async () => {
      const fetchFn = mockFetch(() => { throw new TypeError('fetch failed') })
      await expect(
        strategy(fetchFn).authenticate({ headers: { authorization: 'Bearer t' } }),
      ).rejects.toBeInstanceOf(NetworkError)
    })

    it('reports a caller abort as a deadline error', async () => {
      const fetchFn = mockFetch((_url, init) => {
        if (init?.signal?.aborted) throw new DOMException('This operation was aborted', 'AbortError')
        return json({ sub: 'x' })
      })
      const controller = new AbortController()
      controller.abort()

      await expect(
        strategy(fetchFn).authenticate({ headers: { authorization: 'Bearer t' } }, controller.signal),
      ).rejects.toBeInstanceOf(DeadlineError)
    })

    it('revalidates once the cache entry has expired', async () => {
      let now = 0
      const fetchFn = mockFetch(() => json({ sub: 'user123', email: 'test@example.com' }))
      const auth = strategy(fetchFn, { cacheTtlMs: 1000, now: () => now })
      const request = { headers: { authorization: 'Bearer valid-token' } }

      await auth.authenticate(request)
      now = 999
      await auth.authenticate(request)
      expect(fetchFn).toHaveBeenCalledTimes(1)

      now = 1000
      await auth.authenticate(request)
      expect(fetchFn).toHaveBeenCalledTimes(2)
    })

    it('drops expired tokens that are never presented again', async () => {
      let now = 0
      const fetchFn = mockFetch(() => json({ sub: 'user123', email: 'test@example.com' }))
      const auth = strategy(fetchFn, { cacheTtlMs: 1000, now: () => now })

      for (let i = 0; i < 500; i++) {
        await auth.authenticate({ headers: { authorization: `Bearer token-${i}` } })
      }
      expect(auth.cacheStats().size).toBe(500)

      now = 2000
      await auth.authenticate({ headers: { authorization: 'Bearer fresh-token' } })
      expect(auth.cacheStats().size).toBe(1)
    })

    it('caps the number of cached identities', async () => {
      const fetchFn = mockFetch(() => json({ sub: 'user123', email: 'test@example.com' }))
      const auth = strategy(fetchFn, { cacheMaxSize: 10 })

      for (let i = 0; i < 20; i++) {
        await auth.authenticate({ headers: { authorization: `Bearer token-${i}` } })
      }
      expect(auth.cacheStats().size).toBe(10)
    })

    it('revalidates after clearCache', async () => {
      const fetchFn = mockFetch(() => json({ sub: 'user123', email: 'test@example.com' }))
      const auth = strategy(fetchFn)
      const request = { headers: { authorization: 'Bearer valid-token' } }

      await auth.authenticate(request)
      auth.clearCache()
      await auth.authenticate(request)
      expect(fetchFn).toHaveBeenCalledTimes(2)
    })
  })

  describe('session path', () => {
    it('validates the session cookie against the logged-user endpoint', async () => {
      const fetchFn = mockFetch(() => json({ message: 'jane@example.com' }))
      const identity = await strategy(fetchFn).authenticate({
        headers: { cookie: 'sid=session-abc; theme=dark', 'x-frappe-csrf-token': 'csrf-1' },
      })

      const [url, init] = fetchFn.mock.calls[0]
      expect(url).toBe(SESSION_URL)
      expect(headerOf(init, 'cookie')).toBe('sid=session-abc')
      expect(identity).toEqual({
        id: 'jane@example.com',
        email: 'jane@example.com',
        roles: [],
        credential: { kind: 'session', sessionId: 'session-abc', csrfToken: 'csrf-1' },
      })
    })

    it('reads parsed cookies when the framework provides them', async () => {
      const fetchFn = mockFetch(() => json({ message: 'jane@example.com' }))
      const identity = await strategy(fetchFn).authenticate({ headers: {}, cookies: { sid: 'from-plugin' } })
      expect(identity.credential).toEqual({ kind: 'session', sessionId: 'from-plugin' })
    })

    it('caches the session identity but applies each request csrf token', async () => {
      const fetchFn = mockFetch(() => json({ message: 'jane@example.com' }))
      const auth = strategy(fetchFn)

      await auth.authenticate({ headers: { cookie: 'sid=s1', 'x-frappe-csrf-token': 'first' } })
      const second = await auth.authenticate({ headers: { cookie: 'sid=s1', 'x-frappe-csrf-token': 'second' } })

      expect(fetchFn).toHaveBeenCalledTimes(1)
      expect(second.credential).toEqual({ kind: 'session', sessionId: 's1', csrfToken: 'second' })
    })

    it('falls through to the bearer token when the session is rejected', async () => {
      const fetchFn = mockFetch((url) =>
        url === SESSION_URL ? json({ message: 'Not permitted' }, 403) : json({ sub: 'user123', email: 'test@example.com' }),
      )
      const identity = await strategy(fetchFn).authenticate({
        headers: { cookie: 'sid=stale', authorization: 'Bearer valid-token' },
      })

      expect(identity.id).toBe('user123')
      expect(identity.credential).toEqual({ kind: 'bearer', token: 'valid-token' })
      expect(fetchFn).toHaveBeenCalledTimes(2)
    })

    it('fails as missing authentication when a rejected session has no bearer fallback', async () => {
      const fetchFn = mockFetch(() => json({}, 403))
      await expect(strategy(fetchFn).authenticate({ headers: { cookie: 'sid=stale' } })).rejects.toThrow(
        'missing authentication: no session cookie or bearer token found',
      )
    })
  })

  describe('trusted-client delegation', () => {
    const delegationHeaders = {
      authorization: 'Bearer backend-token',
      'x-mcp-user-id': 'end-user-7',
      'x-mcp-user-email': 'seven@example.com',
      'x-mcp-user-name': 'Seven',
    }

    it('replaces the identity with the forwarded user for a trusted client', async () => {
      const fetchFn = mockFetch(() =>
        json({ sub: 'svc-account', email: 'svc@example.com', client_id: 'backend-svc', roles: ['System Manager'] }),
      )
      const identity = await strategy(fetchFn, { trustedClients: ['backend-svc'] }).authenticate({
        headers: delegationHeaders,
      })

      expect(identity).toEqual({ id: 'end-user-7', email: 'seven@example.com', fullName: 'Seven', roles: [] })
      expect(identity.credential).toBeUndefined()
    })

    it('keeps the token identity in the cache, not the delegated one', async () => {
      const fetchFn = mockFetch(() => json({ sub: 'svc-account', email: 'svc@example.com', client_id: 'backend-svc' }))
      const auth = strategy(fetchFn, { trustedClients: ['backend-svc'] })

      await auth.authenticate({ headers: delegationHeaders })
      const own = await auth.authenticate({ headers: { authorization: 'Bearer backend-token' } })

      expect(own.id).toBe('svc-account')
      expect(fetchFn).toHaveBeenCalledTimes(1)
    })

    it('ignores delegation headers from an untrusted client', async () => {
      const fetchFn = mockFetch(() => json({ sub: 'user123', email: 'test@example.com', client_id: 'webapp' }))
      const identity = await strategy(fetchFn, { trustedClients: ['backend-svc'] }).authenticate({
        headers: delegationHeaders,
      })
      expect(identity.id).toBe('user123')
    })

    it('honours trusted clients added at runtime and a custom header prefix', async () => {
      const fetchFn = mockFetch(() => json({ sub: 'svc', email: 'svc@example.com', client_id: 'late-client' }))
      const auth = strategy(fetchFn, { delegationHeaderPrefix: 'Gateway' })
      auth.addTrustedClient('late-client')
      expect(auth.isTrustedClient('late-client')).toBe(true)

      const identity = await auth.authenticate({
        headers: { authorization: 'Bearer t', 'X-Gateway-User-ID': 'u-42' },
      })
      expect(identity.id).toBe('u-42')

      auth.removeTrustedClient('late-client')
      expect(auth.isTrustedClient('late-client')).toBe(false)
    })
  })

  describe('remote validation bypass', () => {
    it('short-circuits both paths to the anonymous identity', async () => {
      const fetchFn = mockFetch(() => json({}))
      const auth = strategy(fetchFn, { validateRemote: false })

      const bearer = await auth.authenticate({ headers: { authorization: 'Bearer anything' } })
      const session = await auth.authenticate({ headers: { cookie: 'sid=dev-session' } })

      expect(bearer).toEqual({ id: 'anonymous', email: 'anonymous@example.com', roles: [] })
      expect(session.id).toBe('anonymous')
      expect(session.credential).toEqual({ kind: 'session', sessionId: 'dev-session' })
      expect(fetchFn).not.toHaveBeenCalled()
    })
  })
})
