import { loadConfig } from '@docbridge/gateway-core'
import {
  captureError,
  configureHashSalt,
  createLogger,
  flushSentry,
  getDocbridgeEnv,
  initSentry,
  SERVICE_NAMES,
} from '@docbridge/observability'
import { buildServer } from './app'

async function main() {
  const config = loadConfig()
  const logger = createLogger({ service: SERVICE_NAMES.API, level: config.logLevel })

  // Initialize observability before anything else
  configureHashSalt(process.env.TELEMETRY_HASH_SALT, getDocbridgeEnv())
  initSentry({ serviceName: SERVICE_NAMES.API, logger })

  const app = await buildServer({ config, logger })

  const shutdown = async (signal: string) => {
    logger.info({ signal }, 'shutting down')
    await app.close()
    await flushSentry()
    process.exit(0)
  }
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((err: unknown) => {
        logger.error({ err }, 'shutdown failed')
        process.exit(1)
      })
    })
  }

  await app.listen({ port: config.server.port, host: config.server.host })
}

main().catch(async (err: unknown) => {
  captureError(err, { service: SERVICE_NAMES.API, operation: 'startup' })
  console.error(err)
  await flushSentry()
  process.exit(1)
})
