import type { Redis } from 'ioredis'
import type { MetadataAdapter } from '../metadata.adapter.js'
import {
  isPlanTier,
  type StoredTransfer,
  type TransferFileRecord,
  type TransferRecord,
} from '../../common/interfaces/transfer.interface.js'
import type { ExpiredTransferScan } from '../../common/interfaces/storage.interface.js'
import { DateUtil } from '../../common/utils/date.util.js'

export interface RedisMetadataAdapterDeps {
  client: Redis
  keyPrefix: string
}

type MultiResult = Array<[Error | null, unknown]> | null

// Increments only an existing hash so a transfer deleted by the sweeper is not resurrected.
const INCREMENT_IF_EXISTS = `
if redis.call('EXISTS', KEYS[1]) == 1 then
  return redis.call('HINCRBY', KEYS[1], 'downloadCount', 1)
end
return false
`

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every((v) => typeof v === 'string')
}

function unwrapExec(results: MultiResult, op: string): unknown[] {
  if (!results) {
    throw new Error(`Redis transaction aborted during ${op}`)
  }
  return results.map(([err, value]) => {
    if (err) throw err
    return value
  })
}

function parseFileRecord(raw: unknown): TransferFileRecord {
  if (typeof raw !== 'string') {
    throw new Error('Stored file record is not a string')
  }
  const parsed: unknown = JSON.parse(raw)
  if (
    !isRecord(parsed) ||
    typeof parsed.id !== 'string' ||
    typeof parsed.transferId !== 'string' ||
    typeof parsed.name !== 'string' ||
    typeof parsed.storageKey !== 'string' ||
    typeof parsed.size !== 'number' ||
    typeof parsed.uploadedAt !== 'string' ||
    typeof parsed.position !== 'number'
  ) {
    throw new Error('Stored file record is malformed')
  }

  return {
    id: parsed.id,
    transferId: parsed.transferId,
    name: parsed.name,
    storageKey: parsed.storageKey,
    size: parsed.size,
    mimeType: typeof parsed.mimeType === 'string' ? parsed.mimeType : 'application/octet-stream',
    sha256: typeof parsed.sha256 === 'string' ? parsed.sha256 : '',
    uploadedAt: DateUtil.parse(parsed.uploadedAt),
    position: parsed.position,
  }
}

function parseTransferHash(hash: Record<string, string>): TransferRecord {
  const planTier = hash.planTier
  if (!isPlanTier(planTier)) {
    throw new Error(`Stored transfer has unknown plan tier "${String(planTier)}"`)
  }

  const recipients: unknown = JSON.parse(hash.recipientEmails || '[]')

  return {
    id: hash.id,
    planTier,
    totalSize: Number.parseInt(hash.totalSize || '0', 10),
    fileCount: Number.parseInt(hash.fileCount || '0', 10),
    createdAt: DateUtil.fromTimestamp(Number.parseInt(hash.createdAt || '0', 10)),
    expiresAt: DateUtil.fromTimestamp(Number.parseInt(hash.expiresAt || '0', 10)),
    downloadCount: Number.parseInt(hash.downloadCount || '0', 10),
    senderEmail: hash.senderEmail || undefined,
    recipientEmails: Array.isArray(recipients)
      ? recipients.filter((r): r is string => typeof r === 'string')
      : [],
  }
}

/**
 * Transfer metadata in Redis.
 *
 * Layout (all keys carry `keyPrefix`):
 * - `transfer:<id>`        hash of transfer fields; `downloadCount` is incremented in place
 * - `transfer:<id>:files`  list of file records as JSON, in upload order
 * - `transfers:expiry`     sorted set of transfer ids scored by expiry timestamp (ms)
 * - `transfers:pending`    sorted set of uncommitted upload ids scored by last refresh (ms)
 */
export class RedisMetadataAdapter implements MetadataAdapter {
  private readonly EXPIRY_KEY: string
  private readonly PENDING_KEY: string

  constructor(private readonly deps: RedisMetadataAdapterDeps) {
    this.EXPIRY_KEY = `${deps.keyPrefix}transfers:expiry`
    this.PENDING_KEY = `${deps.keyPrefix}transfers:pending`
  }

  private transferKey(id: string): string {
    return `${this.deps.keyPrefix}transfer:${id}`
  }

  private filesKey(id: string): string {
    return `${this.deps.keyPrefix}transfer:${id}:files`
  }

  async initialize(): Promise<void> {
    // No-op
  }

  async createTransfer(transfer: TransferRecord, files: TransferFileRecord[]): Promise<void> {
    const fields: Record<string, string> = {
      id: transfer.id,
      planTier: transfer.planTier,
      totalSize: String(transfer.totalSize),
      fileCount: String(transfer.fileCount),
      createdAt: String(DateUtil.toTimestamp(transfer.createdAt)),
      expiresAt: String(DateUtil.toTimestamp(transfer.expiresAt)),
      downloadCount: String(transfer.downloadCount),
      recipientEmails: JSON.stringify(transfer.recipientEmails),
    }
    if (transfer.senderEmail) fields.senderEmail = transfer.senderEmail

    const serializedFiles = [...files]
      .sort((a, b) => a.position - b.position)
      .map((f) =>
        JSON.stringify({
          ...f,
          uploadedAt: DateUtil.toISOString(f.uploadedAt),
        })
      )

    const multi = this.deps.client.multi().hset(this.transferKey(transfer.id), fields)
    if (serializedFiles.length > 0) {
      multi.rpush(this.filesKey(transfer.id), ...serializedFiles)
    }
    multi.zadd(this.EXPIRY_KEY, DateUtil.toTimestamp(transfer.expiresAt), transfer.id)
    multi.zrem(this.PENDING_KEY, transfer.id)

    unwrapExec(await multi.exec(), 'createTransfer')
  }

  async getTransfer(transferId: string): Promise<StoredTransfer | null> {
    const [hash, rawFiles] = unwrapExec(
      await this.deps.client
        .multi()
        .hgetall(this.transferKey(transferId))
        .lrange(this.filesKey(transferId), 0, -1)
        .exec(),
      'getTransfer'
    )

    if (!isStringRecord(hash) || Object.keys(hash).length === 0) return null

    const files = Array.isArray(rawFiles) ? rawFiles.map(parseFileRecord) : []
    files.sort((a, b) => a.position - b.position)

    return { transfer: parseTransferHash(hash), files }
  }

  async incrementDownloadCount(transferId: string): Promise<number | null> {
    const result = await this.deps.client.eval(
      INCREMENT_IF_EXISTS,
      1,
      this.transferKey(transferId)
    )
    return typeof result === 'number' ? result : null
  }

  async findExpired(now: Date, limit: number): Promise<ExpiredTransferScan> {
    const ids = await this.deps.client.zrangebyscore(
      this.EXPIRY_KEY,
      '-inf',
      `(${DateUtil.toTimestamp(now)}`,
      'LIMIT',
      0,
      limit + 1
    )
    return { ids: ids.slice(0, limit), hasMore: ids.length > limit }
  }

  async deleteTransfer(transferId: string): Promise<boolean> {
    const [, deletedTransfer] = unwrapExec(
      await this.deps.client
        .multi()
        .del(this.filesKey(transferId))
        .del(this.transferKey(transferId))
        .zrem(this.EXPIRY_KEY, transferId)
        .exec(),
      'deleteTransfer'
    )
    return deletedTransfer === 1
  }

  async hasTransfer(transferId: string): Promise<boolean> {
    return (await this.deps.client.exists(this.transferKey(transferId))) === 1
  }

  async markUploadPending(transferId: string, since: Date): Promise<void> {
    await this.deps.client.zadd(this.PENDING_KEY, DateUtil.toTimestamp(since), transferId)
  }

  async clearUploadPending(transferId: string): Promise<void> {
    await this.deps.client.zrem(this.PENDING_KEY, transferId)
  }

  async isUploadPending(transferId: string): Promise<boolean> {
    return (await this.deps.client.zscore(this.PENDING_KEY, transferId)) !== null
  }

  async prunePendingUploads(olderThan: Date): Promise<number> {
    return this.deps.client.zremrangebyscore(
      this.PENDING_KEY,
      '-inf',
      `(${DateUtil.toTimestamp(olderThan)}`
    )
  }

  async isHealthy(): Promise<boolean> {
    try {
      await this.deps.client.ping()
      return true
    } catch {
      return false
    }
  }
}
