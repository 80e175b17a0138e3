/**
 * Structured logging via pino for docbridge services.
 */
import pino from 'pino'

export type Logger = pino.Logger

export function createLogger(options: {
  service: string
  level?: string
  pretty?: boolean
}): Logger {
  const level = options.level || process.env.LOG_LEVEL || (process.env.NODE_ENV === 'test' ? 'silent' : 'info')
  const pretty = options.pretty ?? (process.env.NODE_ENV === 'development')

  return pino({
    name: options.service,
    level,
    ...(pretty ? { transport: { target: 'pino-pretty', options: { colorize: true } } } : {}),
    base: {
      service: options.service,
      env: process.env.DOCBRIDGE_ENV || process.env.NODE_ENV || 'development',
    },
    redact: {
      paths: [
        'req.headers.authorization',
        'req.headers.cookie',
        'req.headers["x-frappe-csrf-token"]',
        'headers.authorization',
        'headers.cookie',
      ],
      censor: '[REDACTED]',
    },
    serializers: {
      err: pino.stdSerializers.err,
      req: pino.stdSerializers.req,
      res: pino.stdSerializers.res,
    },
  })
}
