import { Hono, type Context } from 'hono'
import type { HonoEnv } from '../types/hono.types.js'
import { FilenameUtil } from '../common/utils/filename.util.js'

export function createDownloadRoutes(): Hono<HonoEnv> {
  const app = new Hono<HonoEnv>()

  app.get('/download/:transferId', async (c: Context<HonoEnv, '/download/:transferId'>) => {
    const services = c.get('services')
    const { stream, file } = await services.transfers.downloadTransfer(c.req.param('transferId'))

    c.header('Content-Type', file.mimeType)
    c.header('Content-Length', String(file.size))
    c.header('Content-Disposition', FilenameUtil.contentDisposition(file.name))
    c.header('ETag', `"${file.sha256}"`)
    c.header('Cache-Control', 'no-cache, no-store, must-revalidate')
    c.header('Pragma', 'no-cache')
    c.header('Expires', '0')

    return new Response(stream, { status: 200, headers: c.res.headers })
  })

  return app
}
