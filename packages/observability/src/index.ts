export { createLogger } from './logger'
export type { Logger } from './logger'
export { sanitizeErrorForTelemetry, classifyError } from './sanitize'
export { configureHashSalt, hashForTelemetry } from './hash'
export {
  SERVICE_NAMES,
  SPAN_NAMES,
  ATTR_KEYS,
  SAMPLING_DEFAULTS,
  getDocbridgeEnv,
} from './conventions'
export type { DocbridgeEnvironment } from './conventions'
export { getTracer, withSpan, SpanStatusCode } from './tracing'
export type { Span } from './tracing'
export { initSentry, captureError, flushSentry } from './sentry'
export type { SentryInitOptions } from './sentry'
