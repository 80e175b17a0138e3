import type { IncomingMessage, Server, ServerResponse } from 'node:http'
import Fastify from 'fastify'
import type { FastifyBaseLogger, FastifyError, FastifyInstance } from 'fastify'
import cookie from '@fastify/cookie'
import {
  AuthStrategy,
  isGatewayError,
  registerAuthHook,
  registerHealthRoute,
} from '@docbridge/gateway-core'
import type { GatewayConfig } from '@docbridge/gateway-core'
import { FrappeClient } from '@docbridge/docbridge'
import { captureError, createLogger, SERVICE_NAMES } from '@docbridge/observability'
import type { Logger } from '@docbridge/observability'
import { registerDocumentRoutes } from './routes/documents'
import { registerQueryRoutes } from './routes/queries'

export interface BuildServerOptions {
  config: GatewayConfig
  /** Upstream transport; tests pass a stand-in. */
  fetch?: typeof fetch
  logger?: Logger
}

export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const { config } = options
  const logger = options.logger ?? createLogger({ service: SERVICE_NAMES.API, level: config.logLevel })

  // One pino instance for the app and the request logs; redaction lives in createLogger.
  const app = Fastify<Server, IncomingMessage, ServerResponse, FastifyBaseLogger>({ loggerInstance: logger })

  // Gateway errors carry their own status; anything else is a bug.
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (isGatewayError(error)) {
      const level = error.statusCode >= 500 ? 'warn' : 'debug'
      request.log[level]({ code: error.code, context: error.context }, error.message)
      return reply.status(error.statusCode).send({ error: error.code, message: error.message })
    }

    const statusCode = error.statusCode !== undefined && error.statusCode < 500 ? error.statusCode : 500
    if (statusCode < 500) {
      return reply.status(statusCode).send({ error: 'bad_request', message: error.message })
    }

    captureError(error, {
      service: SERVICE_NAMES.API,
      operation: `${request.method} ${request.routeOptions.url ?? request.url}`,
    })
    request.log.error(error)
    return reply.status(500).send({ error: 'internal_error', message: 'Internal Server Error' })
  })

  await app.register(cookie)

  const client = new FrappeClient({
    ...config.upstream,
    fetch: options.fetch,
    logger: logger.child({ component: 'upstream' }),
  })

  let strategy: AuthStrategy | undefined
  if (config.auth.enabled) {
    if (!config.auth.validateRemote) {
      logger.warn('remote token validation is disabled; every credential resolves to the anonymous identity')
    }
    strategy = new AuthStrategy({
      tokenInfoUrl: config.auth.tokenInfoUrl,
      issuerUrl: config.auth.issuerUrl,
      trustedClients: config.auth.trustedClients,
      timeoutMs: config.auth.timeoutMs,
      cacheTtlMs: config.auth.cacheTtlMs,
      cacheMaxSize: config.auth.cacheMaxSize,
      validateRemote: config.auth.validateRemote,
      fetch: options.fetch,
      logger: logger.child({ component: 'auth' }),
    })
    registerAuthHook(app, strategy, { requireAuth: config.auth.requireAuth, logger })
  }

  const auth = strategy
  registerHealthRoute(app, SERVICE_NAMES.API, () => ({
    documentCache: client.cacheStats(),
    rateLimitTokens: client.rateLimitTokens(),
    ...(auth ? { credentialCache: auth.cacheStats() } : {}),
  }))
  registerDocumentRoutes(app, client)
  registerQueryRoutes(app, client)

  return app
}
