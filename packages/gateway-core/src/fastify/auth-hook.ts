import type { FastifyInstance, FastifyReply } from 'fastify'
import type { Logger } from '@docbridge/observability'
import type { AuthStrategy } from '../auth/auth-strategy.js'
import type { Identity } from '../auth/identity.js'
import { NetworkError } from '../errors.js'

declare module 'fastify' {
  interface FastifyRequest {
    /** Resolved caller; undefined when auth is optional and failed. */
    identity?: Identity
  }
}

export interface AuthHookOptions {
  /** Required mode answers 401; optional mode proceeds without an identity. */
  requireAuth: boolean
  logger?: Logger
}

export const UNAUTHORIZED_BODY = {
  error: 'Unauthorized',
  message: 'Valid authentication required',
} as const

/** Aborts when the connection closes before the reply is written. */
export function replySignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController()
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) controller.abort()
  })
  return controller.signal
}

export function registerAuthHook(app: FastifyInstance, strategy: AuthStrategy, options: AuthHookOptions): void {
  app.decorateRequest('identity', undefined)

  app.addHook('preHandler', async (request, reply) => {
    try {
      request.identity = await strategy.authenticate(request)
    } catch (err) {
      const level = err instanceof NetworkError ? 'warn' : 'debug'
      options.logger?.[level]({ reason: err instanceof Error ? err.message : String(err), url: request.url }, 'authentication failed')
      if (!options.requireAuth) return
      return reply.code(401).send(UNAUTHORIZED_BODY)
    }
  })
}
