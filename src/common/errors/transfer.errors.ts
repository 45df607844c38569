import { HttpError } from './http.error.js'

export type TransferErrorCode =
  | 'INVALID_PLAN'
  | 'QUOTA_EXCEEDED'
  | 'EMPTY_BATCH'
  | 'STORAGE_WRITE_FAILED'
  | 'NOT_FOUND'
  | 'EXPIRED'
  | 'NO_FILES_IN_TRANSFER'
  | 'INTERNAL_FAILURE'

/**
 * Base class for every outcome of the transfer lifecycle that is reported to a caller.
 * The HTTP status is part of the error so the route layer stays a thin adapter.
 */
export abstract class TransferError extends HttpError {
  public abstract readonly code: TransferErrorCode

  constructor(message: string, status: number, options?: { cause?: unknown }) {
    super(message, status)
    this.name = new.target.name
    if (options?.cause !== undefined) this.cause = options.cause
  }
}

export class InvalidPlanError extends TransferError {
  public readonly code = 'INVALID_PLAN'

  constructor(public readonly planTier: string) {
    super('Invalid plan type', 400)
  }
}

export class QuotaExceededError extends TransferError {
  public readonly code = 'QUOTA_EXCEEDED'

  constructor(
    public readonly planTier: string,
    public readonly totalBytes: number,
    public readonly limitBytes: number
  ) {
    super(`File size exceeds ${planTier} plan limit`, 400)
  }
}

export class EmptyBatchError extends TransferError {
  public readonly code = 'EMPTY_BATCH'

  constructor() {
    super('No files provided', 400)
  }
}

export class StorageWriteFailedError extends TransferError {
  public readonly code = 'STORAGE_WRITE_FAILED'

  constructor(
    public readonly storageKey: string,
    reason: string
  ) {
    super(`Failed to store file: ${reason}`, 500)
  }
}

export class TransferNotFoundError extends TransferError {
  public readonly code = 'NOT_FOUND'

  constructor(public readonly transferId: string) {
    super('Transfer not found', 404)
  }
}

export class TransferExpiredError extends TransferError {
  public readonly code = 'EXPIRED'

  constructor(
    public readonly transferId: string,
    public readonly expiresAt: Date
  ) {
    super('Transfer has expired', 410)
  }
}

export class NoFilesInTransferError extends TransferError {
  public readonly code = 'NO_FILES_IN_TRANSFER'

  constructor(public readonly transferId: string) {
    super('No files found', 404)
  }
}

export class InternalFailureError extends TransferError {
  public readonly code = 'INTERNAL_FAILURE'

  constructor(message: string, cause?: unknown) {
    super(message, 500, { cause })
  }
}

export function isTransferError(err: unknown): err is TransferError {
  return err instanceof TransferError
}
