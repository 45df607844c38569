export const PLAN_TIERS = ['free', 'standard', 'premium'] as const

export type PlanTier = (typeof PLAN_TIERS)[number]

export function isPlanTier(value: unknown): value is PlanTier {
  return typeof value === 'string' && PLAN_TIERS.some((tier) => tier === value)
}

export interface TransferRecord {
  id: string
  planTier: PlanTier
  totalSize: number
  fileCount: number
  createdAt: Date
  expiresAt: Date
  downloadCount: number
  senderEmail?: string
  recipientEmails: string[]
}

export interface TransferFileRecord {
  id: string
  transferId: string
  name: string
  storageKey: string
  size: number
  mimeType: string
  sha256: string
  uploadedAt: Date
  position: number
}

/** A transfer together with its files, in upload order. */
export interface StoredTransfer {
  transfer: TransferRecord
  files: TransferFileRecord[]
}

/**
 * One file of an upload batch. `size` is the byte length of content the caller has
 * already staged; `open()` must return a fresh stream over that content on every call.
 */
export interface TransferFileInput {
  name: string
  size: number
  mimeType?: string
  open(): ReadableStream<Uint8Array>
}

export interface CreateTransferParams {
  planTier: string
  files: TransferFileInput[]
  senderEmail?: string
  recipientEmails?: string[]
}

export interface TransferFileSummary {
  id: string
  name: string
  size: number
}

export interface CreateTransferResult {
  transferId: string
  expiresAt: Date
  files: TransferFileSummary[]
}

export interface TransferView {
  readonly transferId: string
  readonly planTier: PlanTier
  readonly totalSize: number
  readonly fileCount: number
  readonly createdAt: Date
  readonly expiresAt: Date
  readonly downloadCount: number
  readonly files: readonly TransferFileSummary[]
}

export interface TransferDownload {
  stream: ReadableStream<Uint8Array>
  file: TransferFileRecord
  downloadCount: number
}

export interface DeleteTransferResult {
  deleted: boolean
  blobsFailed: number
}
