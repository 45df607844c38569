import { randomUUID } from 'node:crypto'
import { Hono } from 'hono'
import { cors } from 'hono/cors'
import type { AppEnv } from './config/env.js'
import { ConsoleLoggerAdapter, type LoggerAdapter } from './adapters/logger.adapter.js'
import { createHealthRoutes } from './routes/health.route.js'
import { createUploadRoutes } from './routes/upload.route.js'
import { createTransferRoutes } from './routes/transfer.route.js'
import { createDownloadRoutes } from './routes/download.route.js'
import { createErrorHandler } from './middleware/error-handler.js'
import type { AppBindings, HonoEnv } from './types/hono.types.js'

export function createApp(bindings: AppBindings): Hono<HonoEnv> {
  const app = new Hono<HonoEnv>()

  app.use('*', async (c, next) => {
    const url = new URL(c.req.url)

    const headerRequestId = c.req.header('x-request-id')?.trim()
    const requestId = headerRequestId ? headerRequestId : randomUUID()

    c.set('requestId', requestId)
    c.set('env', bindings.env)
    c.set('config', bindings.config)
    c.set('blobs', bindings.blobs)
    c.set('metadata', bindings.metadata)
    c.set('logger', bindings.logger)
    c.set('services', bindings.services)

    const start = Date.now()
    await next()

    c.header('x-request-id', requestId)
    bindings.logger.info('Request completed', {
      requestId,
      method: c.req.method,
      path: url.pathname,
      statusCode: c.res.status,
      durationMs: Date.now() - start,
    })
  })

  app.use(
    '*',
    cors({
      origin: bindings.env.CORS_ORIGIN,
      allowMethods: ['GET', 'POST', 'OPTIONS'],
      exposeHeaders: ['Content-Disposition', 'Content-Length', 'ETag', 'x-request-id'],
    })
  )

  app.onError(createErrorHandler())

  const basePath = bindings.env.BASE_PATH ? `/${bindings.env.BASE_PATH}` : '/'

  app.route(basePath, createHealthRoutes())
  app.route(basePath, createUploadRoutes())
  app.route(basePath, createTransferRoutes())
  app.route(basePath, createDownloadRoutes())

  app.notFound((c) => c.json({ error: 'Not found' }, 404))

  return app
}

export function createDefaultLogger(env: AppEnv): LoggerAdapter {
  return new ConsoleLoggerAdapter(env.LOG_LEVEL)
}
