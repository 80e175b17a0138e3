/**
 * Sentry integration for docbridge services.
 * Captures unexpected errors; gateway errors with a known status are not sent.
 */
import * as Sentry from '@sentry/node'
import { getDocbridgeEnv, SAMPLING_DEFAULTS } from './conventions'
import type { Logger } from './logger'
import { sanitizeErrorForTelemetry } from './sanitize'

let _initialized = false
let _fallbackLogger: Logger | undefined

export interface SentryInitOptions {
  dsn?: string
  serviceName: string
  release?: string
  environment?: string
  tracesSampleRate?: number
  /** Receives captured errors when no DSN is configured. */
  logger?: Logger
}

const SENSITIVE_HEADERS = ['authorization', 'cookie', 'x-frappe-csrf-token']

export function initSentry(options: SentryInitOptions): void {
  if (_initialized) return
  _fallbackLogger = options.logger

  const dsn = options.dsn || process.env.SENTRY_DSN
  if (!dsn) {
    options.logger?.warn({ service: options.serviceName }, 'No SENTRY_DSN - error tracking disabled')
    return
  }

  const environment = options.environment || getDocbridgeEnv()
  const tracesSampleRate = options.tracesSampleRate ?? SAMPLING_DEFAULTS[environment] ?? 0.1

  Sentry.init({
    dsn,
    environment,
    release: options.release || process.env.npm_package_version || 'dev',
    serverName: options.serviceName,
    tracesSampleRate,
    sendDefaultPii: false,

    beforeSend(event) {
      const headers = event.request?.headers
      if (headers) {
        for (const header of SENSITIVE_HEADERS) delete headers[header]
      }
      if (event.breadcrumbs) {
        for (const bc of event.breadcrumbs) {
          if (bc.data) {
            for (const key of Object.keys(bc.data)) {
              const lower = key.toLowerCase()
              if (lower.includes('token') || lower.includes('secret') || lower.includes('sid')) {
                bc.data[key] = '[REDACTED]'
              }
            }
          }
        }
      }
      return event
    },
  })

  _initialized = true
  options.logger?.info({ service: options.serviceName, environment, tracesSampleRate }, 'Sentry initialized')
}

export function captureError(
  error: Error | unknown,
  context?: { service?: string; operation?: string; [key: string]: unknown },
): void {
  if (!_initialized) {
    _fallbackLogger?.error({ err: error, ...context }, 'unhandled error')
    return
  }

  Sentry.withScope((scope) => {
    if (context) {
      if (context.service) scope.setTag('service', context.service)
      if (context.operation) scope.setTag('operation', context.operation)
      scope.setContext('custom', context)
    }
    Sentry.captureException(sanitizeErrorForTelemetry(error))
  })
}

export async function flushSentry(timeoutMs = 2000): Promise<void> {
  if (!_initialized) return
  await Sentry.flush(timeoutMs)
}
