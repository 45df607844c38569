import os from 'node:os'
import { Hono, type Context } from 'hono'
import type { HonoEnv } from '../types/hono.types.js'
import type { TransferConfig } from '../config/transfer.config.js'
import type {
  CreateTransferResult,
  TransferFileInput,
} from '../common/interfaces/transfer.interface.js'
import { isPlanTier } from '../common/interfaces/transfer.interface.js'
import { HttpError } from '../common/errors/http.error.js'
import { InvalidPlanError, QuotaExceededError } from '../common/errors/transfer.errors.js'
import { ValidationUtil } from '../common/utils/validation.util.js'
import { toError } from '../common/utils/error.util.js'
import {
  StagingLimitExceededError,
  stageMultipartUpload,
} from '../adapters/node/upload-staging.js'

const FILES_FIELD = 'files'

interface UploadFields {
  planType: string
  senderEmail?: string
  recipientEmails: string[]
}

export interface UploadResponse {
  success: true
  transfer_id: string
  files: Array<{ id: string; name: string; size: number }>
  expires_at: string
  download_url: string
}

function readUploadFields(
  get: (name: string) => string | undefined,
  config: TransferConfig
): UploadFields {
  const planType = get('plan_type')?.trim()
  return {
    planType: planType === undefined || planType === '' ? config.defaultPlan : planType,
    senderEmail: ValidationUtil.normalizeContact(get('sender_email')),
    recipientEmails: ValidationUtil.parseRecipientList(get('recipient_emails')),
  }
}

export function buildDownloadPath(config: TransferConfig, transferId: string): string {
  const prefix = config.basePath ? `/${config.basePath}` : ''
  return `${prefix}/download/${encodeURIComponent(transferId)}`
}

function toUploadResponse(result: CreateTransferResult, config: TransferConfig): UploadResponse {
  return {
    success: true,
    transfer_id: result.transferId,
    files: result.files.map((f) => ({ id: f.id, name: f.name, size: f.size })),
    expires_at: result.expiresAt.toISOString(),
    download_url: `${config.downloadBaseUrl}${buildDownloadPath(config, result.transferId)}`,
  }
}

/**
 * Largest batch that can still be admitted: the requested plan's limit when the plan field
 * arrived before the files, otherwise the most generous plan.
 */
function stagingLimit(config: TransferConfig, fields: Readonly<Record<string, string>>): number {
  const requested = fields.plan_type?.trim()
  if (isPlanTier(requested)) return config.planLimits[requested]
  return Math.max(...Object.values(config.planLimits))
}

async function handleNodeUpload(c: Context<HonoEnv>, contentType: string): Promise<Response> {
  const incoming = c.env?.incoming
  if (!incoming) {
    throw new HttpError('Node request bindings are not available', 500)
  }

  const services = c.get('services')
  const config = c.get('config')
  const env = c.get('env')
  const logger = c.get('logger')

  let seenFields: Readonly<Record<string, string>> = {}
  const staged = await stageMultipartUpload({
    headers: { ...incoming.headers, 'content-type': contentType },
    body: incoming,
    stagingRoot: env.STAGING_DIR || os.tmpdir(),
    fileField: FILES_FIELD,
    sizeLimit: (fields) => {
      seenFields = fields
      return stagingLimit(config, fields)
    },
  }).catch((e: unknown) => {
    if (e instanceof StagingLimitExceededError) {
      const { planType } = readUploadFields((name) => seenFields[name], config)
      if (!isPlanTier(planType)) throw new InvalidPlanError(planType)
      throw new QuotaExceededError(planType, e.stagedBytes, e.limitBytes)
    }
    throw e
  })

  try {
    const fields = readUploadFields((name) => staged.fields[name], config)
    const result = await services.transfers.createTransfer({
      planTier: fields.planType,
      files: staged.files,
      senderEmail: fields.senderEmail,
      recipientEmails: fields.recipientEmails,
    })
    return c.json(toUploadResponse(result, config))
  } finally {
    await staged.cleanup().catch((e: unknown) => {
      const err = toError(e)
      logger.warn('Failed to remove upload staging directory', { error: err.message })
    })
  }
}

async function handleFormDataUpload(c: Context<HonoEnv>): Promise<Response> {
  const services = c.get('services')
  const config = c.get('config')

  const form = await c.req.formData().catch(() => {
    throw new HttpError('Malformed multipart body', 400)
  })

  const readField = (name: string): string | undefined => {
    const v = form.get(name)
    return typeof v === 'string' ? v : undefined
  }
  const fields = readUploadFields(readField, config)

  const files: TransferFileInput[] = []
  for (const entry of form.getAll(FILES_FIELD)) {
    if (!(entry instanceof File) || entry.name === '') continue
    files.push({
      name: entry.name,
      size: entry.size,
      mimeType: entry.type,
      open: () => entry.stream(),
    })
  }

  const result = await services.transfers.createTransfer({
    planTier: fields.planType,
    files,
    senderEmail: fields.senderEmail,
    recipientEmails: fields.recipientEmails,
  })
  return c.json(toUploadResponse(result, config))
}

export function createUploadRoutes(): Hono<HonoEnv> {
  const app = new Hono<HonoEnv>()

  app.post('/api/upload', async (c: Context<HonoEnv>) => {
    const contentType = c.req.header('content-type') ?? ''
    if (!contentType.toLowerCase().includes('multipart/form-data')) {
      throw new HttpError('Multipart request expected', 400)
    }

    // Node.js: stream the body to disk instead of buffering it in memory.
    if (c.env?.incoming) {
      return handleNodeUpload(c, contentType)
    }
    return handleFormDataUpload(c)
  })

  return app
}
