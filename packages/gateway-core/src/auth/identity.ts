/**
 * Identity — the resolved caller of a request.
 *
 * An identity holds at most one upstream credential.  The union makes a
 * session-plus-bearer identity unrepresentable, and `createIdentity`
 * freezes the result so nothing downstream can swap the credential.
 */

// ── Types ──────────────────────────────────────────────────────────────

export interface SessionCredential {
  kind: 'session'
  /** Value of the upstream session cookie. */
  sessionId: string
  /** Anti-forgery token; required for mutating calls on a session. */
  csrfToken?: string
}

export interface BearerCredential {
  kind: 'bearer'
  token: string
}

export type UpstreamCredential = SessionCredential | BearerCredential

export interface Identity {
  readonly id: string
  readonly email: string
  readonly fullName?: string
  readonly roles: readonly string[]
  /** OAuth client that minted the bearer token, when known. */
  readonly clientId?: string
  readonly credential?: Readonly<UpstreamCredential>
}

export interface IdentityInput {
  id: string
  email: string
  fullName?: string
  roles?: readonly string[]
  clientId?: string
  credential?: UpstreamCredential
}

// ── Constructors ───────────────────────────────────────────────────────

export const ANONYMOUS_ID = 'anonymous'
export const ANONYMOUS_EMAIL = 'anonymous@example.com'

export function createIdentity(input: IdentityInput): Identity {
  const identity: Identity = {
    id: input.id,
    email: input.email,
    roles: Object.freeze([...(input.roles ?? [])]),
    ...(input.fullName ? { fullName: input.fullName } : {}),
    ...(input.clientId ? { clientId: input.clientId } : {}),
    ...(input.credential ? { credential: Object.freeze({ ...input.credential }) } : {}),
  }
  return Object.freeze(identity)
}

/** The fixed identity used when remote validation is switched off. */
export function anonymousIdentity(credential?: UpstreamCredential): Identity {
  return createIdentity({ id: ANONYMOUS_ID, email: ANONYMOUS_EMAIL, credential })
}

/**
 * Copy of a session identity carrying this request's CSRF token.  Bearer
 * and credential-less identities come back unchanged.
 */
export function withCsrfToken(identity: Identity, csrfToken: string | undefined): Identity {
  const credential = identity.credential
  if (!csrfToken || credential?.kind !== 'session') return identity
  if (credential.csrfToken === csrfToken) return identity
  return createIdentity({
    ...identity,
    credential: { kind: 'session', sessionId: credential.sessionId, csrfToken },
  })
}
