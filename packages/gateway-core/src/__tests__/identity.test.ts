import { describe, it, expect } from 'vitest'
import { createIdentity, anonymousIdentity, withCsrfToken } from '../auth/identity'
import { createCallContext } from '../auth/call-context'

describe('identity', () => {
  it('freezes identities and their credential', () => {
    const identity = createIdentity({
      id: 'u1',
      email: 'u1@example.com',
      roles: ['Projects User'],
      credential: { kind: 'bearer', token: 'test-token' },
    })
    expect(Object.isFrozen(identity)).toBe(true)
    expect(Object.isFrozen(identity.credential)).toBe(true)
    expect(Object.isFrozen(identity.roles)).toBe(true)
  })

  it('omits optional fields that were not provided', () => {
    const identity = createIdentity({ id: 'u1', email: 'u1@example.com' })
    expect(identity).toEqual({ id: 'u1', email: 'u1@example.com', roles: [] })
  })

  it('builds the fixed anonymous identity', () => {
    expect(anonymousIdentity()).toEqual({ id: 'anonymous', email: 'anonymous@example.com', roles: [] })
  })

  it('attaches a csrf token to session identities only', () => {
    const session = createIdentity({ id: 'a', email: 'a@example.com', credential: { kind: 'session', sessionId: 's1' } })
    const withToken = withCsrfToken(session, 'csrf-1')
    expect(withToken.credential).toEqual({ kind: 'session', sessionId: 's1', csrfToken: 'csrf-1' })
    expect(session.credential).toEqual({ kind: 'session', sessionId: 's1' })

    const bearer = createIdentity({ id: 'b', email: 'b@example.com', credential: { kind: 'bearer', token: 't' } })
    expect(withCsrfToken(bearer, 'csrf-1')).toBe(bearer)
    expect(withCsrfToken(session, undefined)).toBe(session)
  })
})

describe('createCallContext', () => {
  it('leaves the signal undefined without a deadline', () => {
    expect(createCallContext(undefined).signal).toBeUndefined()
  })

  it('passes a lone caller signal through', () => {
    const controller = new AbortController()
    expect(createCallContext(undefined, { signal: controller.signal }).signal).toBe(controller.signal)
  })

  it('combines the caller signal with a timeout', () => {
    const controller = new AbortController()
    const ctx = createCallContext(undefined, { signal: controller.signal, timeoutMs: 60_000 })
    expect(ctx.signal?.aborted).toBe(false)
    controller.abort()
    expect(ctx.signal?.aborted).toBe(true)
  })
})
