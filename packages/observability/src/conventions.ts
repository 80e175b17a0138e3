/**
 * Canonical observability conventions for docbridge services.
 * Single source of truth - import from here, never hardcode strings.
 */

export const SERVICE_NAMES = {
  API: 'docbridge-api',
  AUTH: 'docbridge-auth',
  UPSTREAM: 'docbridge-upstream',
} as const

export const SPAN_NAMES = {
  AUTH_VERIFY: 'auth.verify',
  UPSTREAM_CALL: 'docbridge.upstream_call',
  RATE_LIMIT_WAIT: 'rate_limit.wait',
} as const

export const ATTR_KEYS = {
  // Upstream call
  OPERATION: 'docbridge.operation',
  DOCTYPE: 'docbridge.doctype',
  CREDENTIAL_KIND: 'docbridge.credential_kind',
  ATTEMPTS: 'docbridge.attempts',
  ERROR_TYPE: 'docbridge.error_type',
  // HTTP
  HTTP_METHOD: 'http.method',
  HTTP_STATUS_CODE: 'http.status_code',
} as const

export const SAMPLING_DEFAULTS: Record<string, number> = {
  production: 0.1,
  staging: 1.0,
  development: 1.0,
  test: 0.0,
}

export type DocbridgeEnvironment = 'production' | 'staging' | 'development' | 'test'

export function getDocbridgeEnv(): DocbridgeEnvironment {
  const env = process.env.DOCBRIDGE_ENV || process.env.NODE_ENV || 'development'
  if (env === 'prod' || env === 'production') return 'production'
  if (env === 'stage' || env === 'staging' || env === 'preview') return 'staging'
  if (env === 'test') return 'test'
  return 'development'
}
