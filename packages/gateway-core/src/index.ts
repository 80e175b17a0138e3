// Errors
export {
  GatewayError,
  AuthenticationError,
  ValidationError,
  ConfigurationError,
  UpstreamError,
  NetworkError,
  DeadlineError,
  RetryExhaustedError,
  isGatewayError,
  isRetryable,
} from './errors'
export type { GatewayErrorCode, ErrorContext } from './errors'

// Identity
export { createIdentity, anonymousIdentity, withCsrfToken, ANONYMOUS_ID, ANONYMOUS_EMAIL } from './auth/identity'
export type { Identity, IdentityInput, UpstreamCredential, SessionCredential, BearerCredential } from './auth/identity'
export { createCallContext } from './auth/call-context'
export type { CallContext, CallContextOptions } from './auth/call-context'

// Auth
export { AuthStrategy } from './auth/auth-strategy'
export type { AuthStrategyConfig } from './auth/auth-strategy'
export { readHeader, readCookie, extractBearerToken } from './auth/request-metadata'
export type { RequestMetadata, HeaderValue } from './auth/request-metadata'

// Cache
export { TtlCache } from './cache/ttl-cache'
export type { TtlCacheOptions, TtlCacheStats } from './cache/ttl-cache'

// Config
export { loadConfig } from './config/config'
export type { GatewayConfig, UpstreamSettings, AuthSettings, RateLimitSettings, RetrySettings, EnvLike } from './config/config'

// Fastify helpers
export { registerAuthHook, replySignal, UNAUTHORIZED_BODY } from './fastify/auth-hook'
export type { AuthHookOptions } from './fastify/auth-hook'
export { registerHealthRoute } from './fastify/health-route'
