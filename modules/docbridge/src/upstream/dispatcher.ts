/**
 * RetryingDispatcher — one logical upstream HTTP call with bounded retry.
 *
 * Classification happens exactly once per attempt:
 *
 *   transport failure / undecodable body → NetworkError   (retryable)
 *   status >= 500                        → UpstreamError  (retryable)
 *   400..499                             → UpstreamError  (thrown at once)
 *   < 400                                → decoded JSON
 *
 * Every attempt gets its own timeout, combined with the caller's signal.
 * A caller abort at any suspension point surfaces as DeadlineError.
 */

import { z } from 'zod'
import {
  ATTR_KEYS,
  SPAN_NAMES,
  classifyError,
  createLogger,
  SERVICE_NAMES,
  withSpan,
} from '@docbridge/observability'
import type { Logger } from '@docbridge/observability'
import {
  DeadlineError,
  NetworkError,
  RetryExhaustedError,
  UpstreamError,
  isRetryable,
} from '@docbridge/gateway-core'
import type { ErrorContext } from '@docbridge/gateway-core'
import { backoffFor, parseRetryAfter } from './retry.js'
import type { RetryPolicy } from './retry.js'
import { sleep } from './sleep.js'

// ── Types ──────────────────────────────────────────────────────────────

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE'

export interface UpstreamRequest {
  method: HttpMethod
  url: string
  headers: Record<string, string>
  /** Serialized as JSON when present. */
  body?: unknown
}

export interface DispatchOptions {
  signal?: AbortSignal
  /** Create, update and delete. Retried only when the policy allows it. */
  mutating?: boolean
  /** Recorded on the span; never the credential itself. */
  credentialKind?: string
  context?: ErrorContext
}

export interface DispatcherConfig {
  retry: RetryPolicy & { retryMutations?: boolean }
  timeoutMs: number
  fetch?: typeof fetch
  logger?: Logger
}

const MAX_ERROR_TEXT = 500

const frappeErrorSchema = z.object({
  message: z.unknown().optional(),
  exception: z.string().optional(),
  exc_type: z.string().optional(),
  exc: z.string().optional(),
})

// ── Dispatcher ─────────────────────────────────────────────────────────

export class RetryingDispatcher {
  private readonly policy: RetryPolicy
  private readonly retryMutations: boolean
  private readonly timeoutMs: number
  private readonly fetchFn: typeof fetch
  private readonly logger: Logger

  constructor(config: DispatcherConfig) {
    this.policy = {
      maxAttempts: Math.max(1, config.retry.maxAttempts),
      initialDelayMs: config.retry.initialDelayMs,
      maxDelayMs: config.retry.maxDelayMs,
    }
    this.retryMutations = config.retry.retryMutations ?? true
    this.timeoutMs = config.timeoutMs
    this.fetchFn = config.fetch ?? fetch
    this.logger = config.logger ?? createLogger({ service: SERVICE_NAMES.UPSTREAM })
  }

  async dispatch(request: UpstreamRequest, options: DispatchOptions = {}): Promise<unknown> {
    const { signal, context = {} } = options
    const allowRetry = !options.mutating || this.retryMutations
    const maxAttempts = allowRetry ? this.policy.maxAttempts : 1

    return withSpan(
      SPAN_NAMES.UPSTREAM_CALL,
      {
        [ATTR_KEYS.HTTP_METHOD]: request.method,
        [ATTR_KEYS.OPERATION]: context.operation ?? 'unknown',
        ...(context.doctype ? { [ATTR_KEYS.DOCTYPE]: context.doctype } : {}),
        ...(options.credentialKind ? { [ATTR_KEYS.CREDENTIAL_KIND]: options.credentialKind } : {}),
      },
      async (span) => {
        let lastError: unknown
        for (let attempt = 0; attempt < maxAttempts; attempt++) {
          if (attempt > 0) {
            await sleep(backoffFor(this.policy, attempt, lastError), signal, 'backing off before retry')
          }

          span.setAttribute(ATTR_KEYS.ATTEMPTS, attempt + 1)
          try {
            const result = await this.attempt(request, signal, context)
            span.setAttribute(ATTR_KEYS.HTTP_STATUS_CODE, result.status)
            return result.body
          } catch (err) {
            if (err instanceof UpstreamError) span.setAttribute(ATTR_KEYS.HTTP_STATUS_CODE, err.status)
            if (!isRetryable(err)) throw err
            lastError = err

            if (attempt + 1 < maxAttempts) {
              this.logger.warn(
                {
                  operation: context.operation,
                  attempt: attempt + 1,
                  maxAttempts,
                  errorType: classifyError(err),
                  ...(options.mutating ? { mutating: true } : {}),
                },
                options.mutating ? 'retrying mutating upstream call' : 'retrying upstream call',
              )
            }
          }
        }

        if (!allowRetry) throw lastError
        span.setAttribute(ATTR_KEYS.ERROR_TYPE, 'retry_exhausted')
        throw new RetryExhaustedError(maxAttempts, { cause: lastError, context })
      },
    )
  }

  // ── single attempt ────────────────────────────────────────────────

  private async attempt(
    request: UpstreamRequest,
    signal: AbortSignal | undefined,
    context: ErrorContext,
  ): Promise<{ status: number; body: unknown }> {
    const timeout = AbortSignal.timeout(this.timeoutMs)
    const combined = signal ? AbortSignal.any([signal, timeout]) : timeout

    const headers: Record<string, string> = { Accept: 'application/json', ...request.headers }
    let body: string | undefined
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json'
      body = JSON.stringify(request.body)
    }

    let res: Response
    let text: string
    try {
      res = await this.fetchFn(request.url, { method: request.method, headers, body, signal: combined })
      text = await res.text()
    } catch (err) {
      throw this.transportError(err, signal, timeout, context)
    }

    if (res.status >= 400) {
      throw toUpstreamError(res, text, context)
    }

    if (text.trim() === '') return { status: res.status, body: null }
    try {
      return { status: res.status, body: JSON.parse(text) }
    } catch (err) {
      throw new NetworkError('failed to decode upstream response', { cause: err, context })
    }
  }

  private transportError(
    err: unknown,
    signal: AbortSignal | undefined,
    timeout: AbortSignal,
    context: ErrorContext,
  ): Error {
    if (signal?.aborted) {
      return new DeadlineError('upstream call aborted by caller', { cause: err, context })
    }
    if (timeout.aborted) {
      return new NetworkError(`upstream call timed out after ${this.timeoutMs}ms`, { cause: err, context })
    }
    const reason = err instanceof Error ? err.message : String(err)
    return new NetworkError(`upstream request failed: ${reason}`, { cause: err, context })
  }
}

// ── error decoding ─────────────────────────────────────────────────────

/**
 * Frappe reports failures as JSON with `message`, `exception` or
 * `exc_type`; proxies in front of it answer with plain text.
 */
function toUpstreamError(res: Response, text: string, context: ErrorContext): UpstreamError {
  let message: string | undefined
  let exc: string | undefined

  const parsed = frappeErrorSchema.safeParse(safeJson(text))
  if (parsed.success) {
    const body = parsed.data
    if (typeof body.message === 'string' && body.message) message = body.message
    else if (body.exception) message = body.exception
    else if (body.exc_type) message = body.exc_type
    exc = body.exc || undefined
  }

  if (!message) {
    const trimmed = text.trim()
    message = trimmed ? trimmed.slice(0, MAX_ERROR_TEXT) : `upstream responded with status ${res.status}`
  }

  return new UpstreamError({
    status: res.status,
    message,
    exc,
    retryAfterMs: parseRetryAfter(res.headers.get('retry-after')),
    context,
  })
}

function safeJson(text: string): unknown {
  try {
    return JSON.parse(text)
  } catch {
    return undefined
  }
}
