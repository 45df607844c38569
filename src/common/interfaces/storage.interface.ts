/** Storage interfaces */

export interface StorageOperationResult<T = unknown> {
  success: boolean
  error?: string
  data?: T
}

export interface BlobListEntry {
  key: string
  size: number
  lastModified: Date
}

export interface ExpiredTransferScan {
  ids: string[]
  hasMore: boolean
}
