import { randomUUID } from 'node:crypto'
import type { LoggerAdapter } from '../adapters/logger.adapter.js'
import type { BlobStorageAdapter } from '../adapters/blob-storage.adapter.js'
import type { MetadataAdapter } from '../adapters/metadata.adapter.js'
import type { TransferConfig } from '../config/transfer.config.js'
import type {
  CreateTransferParams,
  CreateTransferResult,
  DeleteTransferResult,
  StoredTransfer,
  TransferDownload,
  TransferFileRecord,
  TransferRecord,
  TransferView,
} from '../common/interfaces/transfer.interface.js'
import {
  EmptyBatchError,
  InternalFailureError,
  InvalidPlanError,
  NoFilesInTransferError,
  StorageWriteFailedError,
  TransferError,
  TransferExpiredError,
  TransferNotFoundError,
} from '../common/errors/transfer.errors.js'
import { isPlanTier } from '../common/interfaces/transfer.interface.js'
import { DateUtil } from '../common/utils/date.util.js'
import { FilenameUtil } from '../common/utils/filename.util.js'
import { HashUtil } from '../common/utils/hash.util.js'
import { ValidationUtil } from '../common/utils/validation.util.js'
import { toError } from '../common/utils/error.util.js'
import type { QuotaPolicy } from './quota.policy.js'

export interface TransfersServiceDeps {
  config: TransferConfig
  quota: QuotaPolicy
  blobs: BlobStorageAdapter
  metadata: MetadataAdapter
  logger: LoggerAdapter
  now?: () => Date
  generateId?: () => string
}

const BLOB_DELETE_ATTEMPTS = 3

/**
 * Transfer lifecycle: batch intake, gated reads, download counting and explicit deletion.
 *
 * The metadata commit is the only point at which a transfer becomes visible. Blob writes
 * happen before it and are rolled back if anything in the batch fails.
 */
export class TransfersService {
  private readonly now: () => Date
  private readonly generateId: () => string
  private initialized = false

  constructor(private readonly deps: TransfersServiceDeps) {
    this.now = deps.now ?? (() => DateUtil.now().toDate())
    this.generateId = deps.generateId ?? (() => randomUUID())
  }

  private async ensureInitialized(): Promise<void> {
    if (this.initialized) return
    await this.deps.metadata.initialize()
    this.initialized = true
  }

  public async createTransfer(params: CreateTransferParams): Promise<CreateTransferResult> {
    if (!isPlanTier(params.planTier)) {
      throw new InvalidPlanError(params.planTier)
    }
    if (params.files.length === 0) {
      throw new EmptyBatchError()
    }

    const declaredTotal = params.files.reduce((sum, f) => sum + f.size, 0)
    const planTier = this.deps.quota.assertAdmitted(params.planTier, declaredTotal)

    await this.ensureInitialized()

    const transferId = this.generateId()
    const createdAt = this.now()
    const written: string[] = []
    const fileRecords: TransferFileRecord[] = []

    try {
      for (const [position, input] of params.files.entries()) {
        // Refreshed per file; the orphan sweep leaves pending uploads alone.
        await this.deps.metadata.markUploadPending(transferId, this.now())

        const fileId = this.generateId()
        const storageKey = FilenameUtil.storageKey(transferId, fileId)
        const mimeType = input.mimeType?.trim() || 'application/octet-stream'

        const hashing = HashUtil.createHashingStream(input.open())
        const saveRes = await this.deps.blobs.saveBlob(hashing.stream, storageKey, mimeType)
        if (!saveRes.success) {
          throw new StorageWriteFailedError(storageKey, saveRes.error ?? 'Unknown error')
        }
        written.push(storageKey)

        const sizeRes = await this.deps.blobs.getSize(storageKey)
        if (!sizeRes.success || sizeRes.data === undefined) {
          throw new StorageWriteFailedError(storageKey, sizeRes.error ?? 'Size unavailable')
        }

        fileRecords.push({
          id: fileId,
          transferId,
          name: FilenameUtil.toDisplayName(input.name),
          storageKey,
          size: sizeRes.data,
          mimeType,
          sha256: hashing.getResult().hashHex,
          uploadedAt: this.now(),
          position,
        })
      }

      const totalSize = fileRecords.reduce((sum, f) => sum + f.size, 0)
      // Staged sizes should match what landed in the store; the persisted figure is authoritative.
      this.deps.quota.assertAdmitted(planTier, totalSize)

      const transfer: TransferRecord = {
        id: transferId,
        planTier,
        totalSize,
        fileCount: fileRecords.length,
        createdAt,
        expiresAt: DateUtil.addMilliseconds(createdAt, this.deps.config.retentionMs),
        downloadCount: 0,
        senderEmail: ValidationUtil.normalizeContact(params.senderEmail),
        recipientEmails: params.recipientEmails ?? [],
      }

      await this.assertBlobsPresent(fileRecords)

      try {
        await this.deps.metadata.createTransfer(transfer, fileRecords)
      } catch (e: unknown) {
        throw new InternalFailureError('Failed to persist transfer metadata', e)
      }

      this.deps.logger.info('Transfer created', {
        transferId,
        planTier,
        fileCount: transfer.fileCount,
        totalSize,
      })

      return {
        transferId,
        expiresAt: transfer.expiresAt,
        files: fileRecords.map((f) => ({ id: f.id, name: f.name, size: f.size })),
      }
    } catch (e: unknown) {
      const err = toError(e)
      this.deps.logger.error('Transfer creation failed, rolling back', {
        transferId,
        blobsWritten: written.length,
        error: err.message,
        stack: err.stack,
      })
      await this.discardBlobs(transferId, written)

      if (e instanceof TransferError) throw e
      throw new InternalFailureError(`Failed to create transfer: ${err.message}`, e)
    } finally {
      await this.deps.metadata.clearUploadPending(transferId).catch((e: unknown) => {
        this.deps.logger.warn('Failed to clear pending upload marker', {
          transferId,
          error: toError(e).message,
        })
      })
    }
  }

  public async getTransferInfo(transferId: string): Promise<TransferView> {
    const { transfer, files } = await this.loadLive(transferId)

    return Object.freeze({
      transferId: transfer.id,
      planTier: transfer.planTier,
      totalSize: transfer.totalSize,
      fileCount: transfer.fileCount,
      createdAt: transfer.createdAt,
      expiresAt: transfer.expiresAt,
      downloadCount: transfer.downloadCount,
      files: Object.freeze(files.map((f) => ({ id: f.id, name: f.name, size: f.size }))),
    })
  }

  /**
   * Counts the download and opens the first file of the transfer.
   * Multi-file transfers are served one file at a time: only the first one is returned here.
   */
  public async downloadTransfer(transferId: string): Promise<TransferDownload> {
    const { transfer, files } = await this.loadLive(transferId)

    const file = files[0]
    if (!file) {
      throw new NoFilesInTransferError(transfer.id)
    }

    const downloadCount = await this.deps.metadata.incrementDownloadCount(transfer.id)
    if (downloadCount === null) {
      throw new TransferNotFoundError(transfer.id)
    }

    const streamRes = await this.deps.blobs.createReadStream(file.storageKey)
    if (!streamRes.success || !streamRes.data) {
      if (streamRes.error === 'NotFound') {
        throw new TransferNotFoundError(transfer.id)
      }
      throw new InternalFailureError(`Failed to open stored file: ${streamRes.error ?? 'unknown'}`)
    }

    this.deps.logger.debug('Transfer download started', {
      transferId: transfer.id,
      fileId: file.id,
      downloadCount,
    })

    return { stream: streamRes.data, file, downloadCount }
  }

  /**
   * Deletes the blobs of every file, then the file rows and the transfer row.
   * Metadata is kept if any blob could not be removed, so the next sweep retries.
   */
  public async deleteTransfer(transferId: string): Promise<DeleteTransferResult> {
    await this.ensureInitialized()

    const stored = await this.deps.metadata.getTransfer(transferId)
    if (!stored) return { deleted: false, blobsFailed: 0 }

    let blobsFailed = 0
    for (const file of stored.files) {
      const ok = await this.deleteBlobWithRetry(file.storageKey)
      if (!ok) blobsFailed += 1
    }

    if (blobsFailed > 0) {
      this.deps.logger.warn('Keeping transfer metadata, blob deletion incomplete', {
        transferId,
        blobsFailed,
      })
      return { deleted: false, blobsFailed }
    }

    const deleted = await this.deps.metadata.deleteTransfer(transferId)
    this.deps.logger.info('Transfer deleted', { transferId, fileCount: stored.files.length })
    return { deleted, blobsFailed: 0 }
  }

  private async loadLive(transferId: string): Promise<StoredTransfer> {
    if (!ValidationUtil.validateTransferId(transferId).isValid) {
      throw new TransferNotFoundError(transferId)
    }

    await this.ensureInitialized()

    let stored: StoredTransfer | null
    try {
      stored = await this.deps.metadata.getTransfer(transferId)
    } catch (e: unknown) {
      throw new InternalFailureError('Failed to load transfer metadata', e)
    }
    if (!stored) {
      throw new TransferNotFoundError(transferId)
    }
    if (DateUtil.isExpired(stored.transfer.expiresAt, this.now())) {
      throw new TransferExpiredError(transferId, stored.transfer.expiresAt)
    }
    return stored
  }

  /** Every blob of the batch must still be in the store, at its recorded size, when metadata is committed. */
  private async assertBlobsPresent(files: TransferFileRecord[]): Promise<void> {
    for (const file of files) {
      const res = await this.deps.blobs.getSize(file.storageKey)
      if (!res.success) {
        throw new StorageWriteFailedError(
          file.storageKey,
          res.error === 'NotFound' ? 'Blob missing before commit' : res.error ?? 'Size unavailable'
        )
      }
      if (res.data !== file.size) {
        throw new StorageWriteFailedError(file.storageKey, 'Blob changed before commit')
      }
    }
  }

  private async deleteBlobWithRetry(key: string): Promise<boolean> {
    let lastError: string | undefined
    for (let attempt = 1; attempt <= BLOB_DELETE_ATTEMPTS; attempt++) {
      const res = await this.deps.blobs.deleteBlob(key)
      if (res.success) return true
      lastError = res.error
    }
    this.deps.logger.warn('Failed to delete blob', {
      key,
      attempts: BLOB_DELETE_ATTEMPTS,
      error: lastError,
    })
    return false
  }

  private async discardBlobs(transferId: string, keys: string[]): Promise<void> {
    for (const key of keys) {
      const res = await this.deps.blobs.deleteBlob(key)
      if (!res.success) {
        this.deps.logger.error('Failed to cleanup blob after failed transfer. POTENTIAL ORPHAN FILE!', {
          transferId,
          key,
          error: res.error,
        })
      }
    }
  }
}
