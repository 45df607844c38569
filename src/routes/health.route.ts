import { Hono } from 'hono'
import type { HonoEnv } from '../types/hono.types.js'

export function createHealthRoutes(): Hono<HonoEnv> {
  const app = new Hono<HonoEnv>()

  app.get('/api/health', async (c) => {
    const [metadata, storage] = await Promise.all([
      c.get('metadata').isHealthy(),
      c.get('blobs').isHealthy(),
    ])

    if (metadata && storage) {
      return c.json({ status: 'ok' })
    }
    return c.json({ status: 'degraded', metadata, storage }, 503)
  })

  return app
}
