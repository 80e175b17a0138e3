/**
 * Gateway configuration, read from process.env-style variables and
 * validated with zod.  Every problem is collected and reported at once in
 * a single ConfigurationError.
 */

import { z } from 'zod'
import { ConfigurationError } from '../errors.js'

export interface EnvLike {
  [key: string]: string | undefined
}

// ── Schema ─────────────────────────────────────────────────────────────

const boolFromEnv = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform((raw) => (raw === undefined || raw === '' ? fallback : raw === 'true'))

const intFromEnv = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((raw) => (raw === undefined || raw === '' ? fallback : Number(raw)))
    .pipe(z.number().int().nonnegative())

const listFromEnv = z
  .string()
  .optional()
  .transform((raw) =>
    (raw ?? '')
      .split(',')
      .map((s) => s.trim())
      .filter((s) => s.length > 0),
  )

const envSchema = z.object({
  FRAPPE_BASE_URL: z.string().optional(),
  FRAPPE_API_KEY: z.string().optional(),
  FRAPPE_API_SECRET: z.string().optional(),
  FRAPPE_TIMEOUT_MS: intFromEnv(30_000),
  RATE_LIMIT_RPS: z
    .string()
    .optional()
    .transform((raw) => (raw === undefined || raw === '' ? 10 : Number(raw)))
    .pipe(z.number().positive()),
  RATE_LIMIT_BURST: intFromEnv(20),
  RETRY_MAX_ATTEMPTS: intFromEnv(3),
  RETRY_INITIAL_DELAY_MS: intFromEnv(1000),
  RETRY_MAX_DELAY_MS: intFromEnv(10_000),
  RETRY_MUTATIONS: boolFromEnv(true),
  DOC_CACHE_TTL_MS: intFromEnv(5 * 60 * 1000),
  DOC_CACHE_MAX_SIZE: intFromEnv(1000),
  AUTH_ENABLED: boolFromEnv(false),
  AUTH_REQUIRE_AUTH: boolFromEnv(false),
  OAUTH_TOKEN_INFO_URL: z.string().optional(),
  OAUTH_ISSUER_URL: z.string().optional(),
  OAUTH_TIMEOUT_MS: intFromEnv(30_000),
  OAUTH_TRUSTED_CLIENTS: listFromEnv,
  OAUTH_VALIDATE_REMOTE: boolFromEnv(true),
  CACHE_TTL_MS: intFromEnv(5 * 60 * 1000),
  CACHE_MAX_SIZE: intFromEnv(10_000),
  SERVER_HOST: z.string().optional().default('0.0.0.0'),
  SERVER_PORT: intFromEnv(8080),
  LOG_LEVEL: z.string().optional().default('info'),
  NODE_ENV: z.string().optional(),
})

// ── Types ──────────────────────────────────────────────────────────────

export interface RateLimitSettings {
  requestsPerSecond: number
  burst: number
}

export interface RetrySettings {
  maxAttempts: number
  initialDelayMs: number
  maxDelayMs: number
  retryMutations: boolean
}

export interface UpstreamSettings {
  baseUrl: string
  apiKey?: string
  apiSecret?: string
  timeoutMs: number
  rateLimit: RateLimitSettings
  retry: RetrySettings
  documentCache: { ttlMs: number; maxSize: number }
}

export interface AuthSettings {
  enabled: boolean
  requireAuth: boolean
  tokenInfoUrl: string
  issuerUrl: string
  timeoutMs: number
  trustedClients: string[]
  validateRemote: boolean
  cacheTtlMs: number
  cacheMaxSize: number
}

export interface GatewayConfig {
  upstream: UpstreamSettings
  auth: AuthSettings
  server: { host: string; port: number }
  logLevel: string
}

// ── Loader ─────────────────────────────────────────────────────────────

export function loadConfig(env: EnvLike = process.env): GatewayConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(`invalid configuration: ${problems.join('; ')}`)
  }
  const e = parsed.data

  const problems: string[] = []
  const baseUrl = (e.FRAPPE_BASE_URL ?? '').replace(/\/+$/, '')
  if (!baseUrl) problems.push('FRAPPE_BASE_URL is required')
  else if (!/^https?:\/\//.test(baseUrl)) problems.push('FRAPPE_BASE_URL must be an http(s) URL')

  const apiKey = e.FRAPPE_API_KEY || undefined
  const apiSecret = e.FRAPPE_API_SECRET || undefined
  if (apiKey && !apiSecret) problems.push('FRAPPE_API_KEY provided without FRAPPE_API_SECRET')
  if (apiSecret && !apiKey) problems.push('FRAPPE_API_SECRET provided without FRAPPE_API_KEY')

  // Without required user auth, the service key pair is the only credential.
  if (!(e.AUTH_ENABLED && e.AUTH_REQUIRE_AUTH) && (!apiKey || !apiSecret)) {
    problems.push('FRAPPE_API_KEY and FRAPPE_API_SECRET are required when auth is not enabled and required')
  }

  if (e.AUTH_ENABLED) {
    if (!e.OAUTH_TOKEN_INFO_URL) problems.push('OAUTH_TOKEN_INFO_URL is required when auth is enabled')
    if (!e.OAUTH_ISSUER_URL) problems.push('OAUTH_ISSUER_URL is required when auth is enabled')
    if (!e.OAUTH_VALIDATE_REMOTE && e.NODE_ENV === 'production') {
      problems.push('OAUTH_VALIDATE_REMOTE=false is not allowed in production')
    }
  }

  if (e.SERVER_PORT < 1 || e.SERVER_PORT > 65535) problems.push(`invalid SERVER_PORT: ${e.SERVER_PORT}`)
  if (e.RETRY_MAX_ATTEMPTS < 1) problems.push('RETRY_MAX_ATTEMPTS must be at least 1')
  if (e.RATE_LIMIT_BURST < 1) problems.push('RATE_LIMIT_BURST must be at least 1')

  if (problems.length > 0) {
    throw new ConfigurationError(`invalid configuration: ${problems.join('; ')}`)
  }

  return {
    upstream: {
      baseUrl,
      apiKey,
      apiSecret,
      timeoutMs: e.FRAPPE_TIMEOUT_MS,
      rateLimit: { requestsPerSecond: e.RATE_LIMIT_RPS, burst: e.RATE_LIMIT_BURST },
      retry: {
        maxAttempts: e.RETRY_MAX_ATTEMPTS,
        initialDelayMs: e.RETRY_INITIAL_DELAY_MS,
        maxDelayMs: e.RETRY_MAX_DELAY_MS,
        retryMutations: e.RETRY_MUTATIONS,
      },
      documentCache: { ttlMs: e.DOC_CACHE_TTL_MS, maxSize: e.DOC_CACHE_MAX_SIZE },
    },
    auth: {
      enabled: e.AUTH_ENABLED,
      requireAuth: e.AUTH_REQUIRE_AUTH,
      tokenInfoUrl: e.OAUTH_TOKEN_INFO_URL ?? '',
      issuerUrl: e.OAUTH_ISSUER_URL ?? '',
      timeoutMs: e.OAUTH_TIMEOUT_MS,
      trustedClients: e.OAUTH_TRUSTED_CLIENTS,
      validateRemote: e.OAUTH_VALIDATE_REMOTE,
      cacheTtlMs: e.CACHE_TTL_MS,
      cacheMaxSize: e.CACHE_MAX_SIZE,
    },
    server: { host: e.SERVER_HOST, port: e.SERVER_PORT },
    logLevel: e.LOG_LEVEL,
  }
}
