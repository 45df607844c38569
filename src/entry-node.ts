import { serve } from '@hono/node-server'
import { createApp, createDefaultLogger } from './app.js'
import { loadAppEnv } from './config/env.js'
import { createTransferConfig } from './config/transfer.config.js'
import { createRuntimeAdapters } from './adapters/adapters.factory.js'
import { createServices } from './services/services.factory.js'
import { toError } from './common/utils/error.util.js'
import { APP_CLOSE_TIMEOUT_MS } from './common/constants/app.constants.js'

const env = loadAppEnv(process.env)
const logger = createDefaultLogger(env)
const config = createTransferConfig(env)

const { blobs, metadata, close } = createRuntimeAdapters(env, logger)

// One set of services per process: the sweeper's running flag must be shared.
const services = createServices({ env, config, blobs, metadata, logger })

const app = createApp({ env, config, blobs, metadata, logger, services })

const server = serve(
  {
    fetch: app.fetch,
    port: env.LISTEN_PORT,
    hostname: env.LISTEN_HOST,
  },
  (info: { port: number }) => {
    logger.info('Server started', {
      url: `http://${env.LISTEN_HOST}:${info.port}${env.BASE_PATH ? `/${env.BASE_PATH}` : ''}`,
      storageDriver: env.STORAGE_DRIVER,
      metadataDriver: env.METADATA_DRIVER,
    })
  }
)

let interval: NodeJS.Timeout | undefined
if (env.SWEEP_INTERVAL_MINS > 0) {
  interval = setInterval(() => {
    void services.retention.runSweep()
  }, env.SWEEP_INTERVAL_MINS * 60_000)
}

let shuttingDown = false

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return
  shuttingDown = true
  logger.warn('Shutdown signal received', { signal })

  services.retention.markAsShuttingDown()
  if (interval) clearInterval(interval)

  const forceExit = setTimeout(() => {
    logger.error('Graceful shutdown timed out, exiting')
    process.exit(1)
  }, APP_CLOSE_TIMEOUT_MS)
  forceExit.unref()

  await new Promise<void>((resolve) => {
    server.close(() => {
      logger.info('HTTP server closed')
      resolve()
    })
  })

  try {
    await close()
  } catch (e: unknown) {
    logger.warn('Failed to close metadata connection', { error: toError(e).message })
  }

  process.exit(0)
}

process.on('SIGTERM', () => void shutdown('SIGTERM'))
process.on('SIGINT', () => void shutdown('SIGINT'))

process.on('unhandledRejection', (reason: unknown) => {
  const err = toError(reason)
  logger.error('Unhandled promise rejection', { error: err.message, stack: err.stack })
})
