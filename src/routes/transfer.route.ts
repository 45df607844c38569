import { Hono, type Context } from 'hono'
import type { HonoEnv } from '../types/hono.types.js'
import type { TransferView } from '../common/interfaces/transfer.interface.js'

export interface TransferInfoResponse {
  transfer_id: string
  plan_type: string
  total_size: number
  file_count: number
  created_at: string
  expires_at: string
  download_count: number
  files: Array<{ id: string; name: string; size: number }>
}

function toTransferInfoResponse(view: TransferView): TransferInfoResponse {
  return {
    transfer_id: view.transferId,
    plan_type: view.planTier,
    total_size: view.totalSize,
    file_count: view.fileCount,
    created_at: view.createdAt.toISOString(),
    expires_at: view.expiresAt.toISOString(),
    download_count: view.downloadCount,
    files: view.files.map((f) => ({ id: f.id, name: f.name, size: f.size })),
  }
}

export function createTransferRoutes(): Hono<HonoEnv> {
  const app = new Hono<HonoEnv>()

  app.get('/api/transfer/:transferId', async (c: Context<HonoEnv, '/api/transfer/:transferId'>) => {
    const services = c.get('services')
    const view = await services.transfers.getTransferInfo(c.req.param('transferId'))
    return c.json(toTransferInfoResponse(view))
  })

  return app
}
