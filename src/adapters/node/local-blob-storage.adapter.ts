import fs from 'fs-extra'
import path from 'node:path'
import { randomUUID } from 'node:crypto'
import { Readable } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import type { BlobStorageAdapter } from '../blob-storage.adapter.js'
import type {
  BlobListEntry,
  StorageOperationResult,
} from '../../common/interfaces/storage.interface.js'
import { toError } from '../../common/utils/error.util.js'

export interface LocalBlobStorageAdapterDeps {
  rootDir: string
}

function isNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT'
}

/**
 * Blobs as plain files below `rootDir`, one file per storage key.
 * Writes land in a sibling temp file and are renamed into place once complete.
 */
export class LocalBlobStorageAdapter implements BlobStorageAdapter {
  private readonly root: string

  constructor(deps: LocalBlobStorageAdapterDeps) {
    this.root = path.resolve(deps.rootDir)
  }

  private resolveKey(key: string): string {
    const resolved = path.resolve(this.root, key)
    if (!resolved.startsWith(this.root + path.sep)) {
      throw new Error(`Storage key "${key}" resolves outside of the storage root`)
    }
    return resolved
  }

  public async saveBlob(
    input: ReadableStream<Uint8Array>,
    key: string,
    _mimeType: string
  ): Promise<StorageOperationResult<string>> {
    let tempPath: string | undefined
    try {
      const target = this.resolveKey(key)
      await fs.ensureDir(path.dirname(target))

      tempPath = `${target}.partial-${randomUUID()}`
      await pipeline(Readable.fromWeb(input), fs.createWriteStream(tempPath))
      await fs.move(tempPath, target, { overwrite: true })

      return { success: true, data: key }
    } catch (e: unknown) {
      const err = toError(e)
      if (tempPath) {
        await fs.remove(tempPath).catch(() => undefined)
      }
      return { success: false, error: `Local write failed: ${err.message}` }
    }
  }

  public async createReadStream(
    key: string
  ): Promise<StorageOperationResult<ReadableStream<Uint8Array>>> {
    try {
      const filePath = this.resolveKey(key)
      await fs.access(filePath, fs.constants.R_OK)
      return { success: true, data: Readable.toWeb(fs.createReadStream(filePath)) }
    } catch (e: unknown) {
      if (isNotFound(e)) return { success: false, error: 'NotFound' }
      return { success: false, error: `Local read failed: ${toError(e).message}` }
    }
  }

  public async getSize(key: string): Promise<StorageOperationResult<number>> {
    try {
      const stat = await fs.stat(this.resolveKey(key))
      return { success: true, data: stat.size }
    } catch (e: unknown) {
      if (isNotFound(e)) return { success: false, error: 'NotFound' }
      return { success: false, error: `Local stat failed: ${toError(e).message}` }
    }
  }

  public async deleteBlob(key: string): Promise<StorageOperationResult<void>> {
    try {
      const filePath = this.resolveKey(key)
      await fs.remove(filePath)

      const dir = path.dirname(filePath)
      if (dir !== this.root) {
        const remaining = await fs.readdir(dir).catch(() => null)
        if (remaining !== null && remaining.length === 0) {
          await fs.remove(dir)
        }
      }
      return { success: true }
    } catch (e: unknown) {
      return { success: false, error: `Local deletion failed: ${toError(e).message}` }
    }
  }

  public async listBlobs(prefix = ''): Promise<BlobListEntry[]> {
    const entries: BlobListEntry[] = []
    if (!(await fs.pathExists(this.root))) return entries

    const walk = async (dir: string): Promise<void> => {
      for (const dirent of await fs.readdir(dir, { withFileTypes: true })) {
        const full = path.join(dir, dirent.name)
        if (dirent.isDirectory()) {
          await walk(full)
          continue
        }
        if (!dirent.isFile()) continue

        const key = path.relative(this.root, full).split(path.sep).join('/')
        if (!key.startsWith(prefix)) continue

        const stat = await fs.stat(full)
        entries.push({ key, size: stat.size, lastModified: stat.mtime })
      }
    }

    await walk(this.root)
    return entries
  }

  public async isHealthy(): Promise<boolean> {
    try {
      await fs.ensureDir(this.root)
      await fs.access(this.root, fs.constants.W_OK)
      return true
    } catch {
      return false
    }
  }
}
