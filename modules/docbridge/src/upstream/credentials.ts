/**
 * Credential selection — which upstream credential an outbound call
 * presents.  Re-evaluated for every call; nothing here is cached.
 *
 *   1. session on the identity → sid cookie (+ CSRF header)
 *   2. bearer on the identity  → Authorization: Bearer
 *   3. service key pair        → Authorization: token key:secret
 *   4. none                    → AuthenticationError
 */

import { AuthenticationError, ConfigurationError } from '@docbridge/gateway-core'
import type { ErrorContext, Identity } from '@docbridge/gateway-core'

export interface ServiceKey {
  apiKey: string
  apiSecret: string
}

export type CredentialKind = 'session' | 'bearer' | 'service_key'

export interface SelectedCredential {
  kind: CredentialKind
  headers: Record<string, string>
}

export const SESSION_COOKIE = 'sid'
export const CSRF_HEADER = 'X-Frappe-CSRF-Token'

export function selectCredential(
  identity: Identity | undefined,
  serviceKey: ServiceKey | undefined,
  mutating: boolean,
  context: ErrorContext = {},
): SelectedCredential {
  const credential = identity?.credential

  if (credential?.kind === 'session') {
    if (mutating && !credential.csrfToken) {
      throw new ConfigurationError('CSRF token required for session-based write operations', { context })
    }
    const headers: Record<string, string> = { Cookie: `${SESSION_COOKIE}=${credential.sessionId}` }
    if (credential.csrfToken) headers[CSRF_HEADER] = credential.csrfToken
    return { kind: 'session', headers }
  }

  if (credential?.kind === 'bearer') {
    return { kind: 'bearer', headers: { Authorization: `Bearer ${credential.token}` } }
  }

  if (serviceKey) {
    return {
      kind: 'service_key',
      headers: { Authorization: `token ${serviceKey.apiKey}:${serviceKey.apiSecret}` },
    }
  }

  throw new AuthenticationError('no authentication credentials available (no session, token, or API key)', {
    context,
  })
}
