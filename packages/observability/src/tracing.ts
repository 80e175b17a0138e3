/**
 * OpenTelemetry spans for docbridge.
 *
 * Only the API package is used here: spans are no-ops until the host
 * process registers an SDK, so libraries can trace unconditionally.
 */
import { trace, context, SpanStatusCode } from '@opentelemetry/api'
import type { Tracer, Span } from '@opentelemetry/api'
import { SERVICE_NAMES } from './conventions'
import { classifyError } from './sanitize'

type AttrValue = string | number | boolean

export function getTracer(name?: string): Tracer {
  return trace.getTracer(name || SERVICE_NAMES.UPSTREAM)
}

export async function withSpan<T>(
  name: string,
  attrs: Record<string, AttrValue>,
  fn: (span: Span) => Promise<T>,
): Promise<T> {
  const span = getTracer().startSpan(name, { attributes: attrs })
  try {
    const result = await context.with(trace.setSpan(context.active(), span), () => fn(span))
    span.setStatus({ code: SpanStatusCode.OK })
    return result
  } catch (err) {
    span.setStatus({ code: SpanStatusCode.ERROR, message: classifyError(err) })
    span.recordException(err instanceof Error ? err : new Error(String(err)))
    throw err
  } finally {
    span.end()
  }
}

export { SpanStatusCode }
export type { Span }
