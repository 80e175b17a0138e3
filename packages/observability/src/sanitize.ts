/**
 * Error sanitization for telemetry - strips response bodies and classifies errors safely.
 */

/**
 * Copy of `err` carrying only name, message and stack.  Upstream bodies,
 * tracebacks (`exc`) and causes stay behind.
 */
export function sanitizeErrorForTelemetry(err: unknown): Error {
  if (!(err instanceof Error)) return new Error(String(err))

  const safe = new Error(err.message)
  safe.name = err.name
  safe.stack = err.stack
  return safe
}

/**
 * Telemetry label for an error.  Gateway errors carry a stable `code` (and
 * upstream errors a `status`); anything else falls back to message sniffing.
 */
export function classifyError(err: unknown): string {
  if (!(err instanceof Error)) return 'unknown_error'

  if ('status' in err && typeof err.status === 'number') return `status_${err.status}`
  if ('code' in err && typeof err.code === 'string' && /^[a-z_]+$/.test(err.code)) return err.code

  const msg = err.message.toLowerCase()
  if (err.name === 'AbortError' || err.name === 'TimeoutError' || msg.includes('timeout')) return 'timeout'
  if (msg.includes('econnrefused') || msg.includes('enotfound') || msg.includes('fetch failed')) return 'network_error'
  if (msg.includes('unauthorized')) return 'auth_error'
  return 'provider_error'
}
