/**
 * Gateway error taxonomy.
 *
 * Every failure the gateway surfaces is one of these classes.  Each carries
 * a stable `code` (for telemetry and JSON bodies) and the HTTP status the
 * Fastify layer answers with.  Upstream failures also carry a `context`
 * naming the operation and document so callers can diagnose without a
 * second round trip.
 */

export type GatewayErrorCode =
  | 'missing_authentication'
  | 'invalid_credentials'
  | 'invalid_request'
  | 'configuration_error'
  | 'upstream_error'
  | 'network_error'
  | 'deadline_exceeded'
  | 'retry_exhausted'

export interface ErrorContext {
  operation?: string
  doctype?: string
  name?: string
  status?: number
  [key: string]: unknown
}

export class GatewayError extends Error {
  readonly code: GatewayErrorCode
  readonly statusCode: number
  readonly context?: ErrorContext

  constructor(
    code: GatewayErrorCode,
    message: string,
    statusCode: number,
    options: { context?: ErrorContext; cause?: unknown } = {},
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined)
    this.name = 'GatewayError'
    this.code = code
    this.statusCode = statusCode
    this.context = options.context
  }
}

/** No credential was presented at all. */
export class AuthenticationError extends GatewayError {
  constructor(message = 'missing authentication', options: { context?: ErrorContext; cause?: unknown } = {}) {
    super('missing_authentication', message, 401, options)
    this.name = 'AuthenticationError'
  }
}

/**
 * A credential was presented but rejected, or call parameters failed
 * validation (`code: 'invalid_request'`, 400).
 */
export class ValidationError extends GatewayError {
  constructor(
    message: string,
    options: { context?: ErrorContext; cause?: unknown; code?: 'invalid_credentials' | 'invalid_request' } = {},
  ) {
    const code = options.code ?? 'invalid_credentials'
    super(code, message, code === 'invalid_request' ? 400 : 401, options)
    this.name = 'ValidationError'
  }
}

export class ConfigurationError extends GatewayError {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super('configuration_error', message, 500, options)
    this.name = 'ConfigurationError'
  }
}

/** The upstream answered with a status >= 400. */
export class UpstreamError extends GatewayError {
  readonly status: number
  /** Raw exception text from the upstream, if it sent one. */
  readonly exc?: string
  /** Structured backoff hint parsed from a `Retry-After` header. */
  readonly retryAfterMs?: number

  constructor(detail: {
    status: number
    message: string
    exc?: string
    retryAfterMs?: number
    context?: ErrorContext
  }) {
    super('upstream_error', detail.message, detail.status, {
      context: { ...detail.context, status: detail.status },
    })
    this.name = 'UpstreamError'
    this.status = detail.status
    this.exc = detail.exc
    this.retryAfterMs = detail.retryAfterMs
  }

  /** 5xx is retryable, everything else is not. */
  get retryable(): boolean {
    return this.status >= 500
  }
}

/** Transport failure before any response arrived. */
export class NetworkError extends GatewayError {
  constructor(message: string, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super('network_error', message, 502, options)
    this.name = 'NetworkError'
  }
}

/** The caller's signal fired while the call was suspended. */
export class DeadlineError extends GatewayError {
  constructor(message = 'deadline exceeded', options: { context?: ErrorContext; cause?: unknown } = {}) {
    super('deadline_exceeded', message, 504, options)
    this.name = 'DeadlineError'
  }
}

export class RetryExhaustedError extends GatewayError {
  readonly attempts: number

  constructor(attempts: number, options: { context?: ErrorContext; cause?: unknown } = {}) {
    super('retry_exhausted', `request failed after ${attempts} attempts`, 502, options)
    this.name = 'RetryExhaustedError'
    this.attempts = attempts
  }
}

export function isGatewayError(err: unknown): err is GatewayError {
  return err instanceof GatewayError
}

/** Transport failures and 5xx responses are worth another attempt. */
export function isRetryable(err: unknown): boolean {
  if (err instanceof UpstreamError) return err.retryable
  return err instanceof NetworkError
}
