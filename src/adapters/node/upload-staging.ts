import busboy from 'busboy'
import fs from 'fs-extra'
import path from 'node:path'
import { randomUUID } from 'node:crypto'
import type { IncomingHttpHeaders } from 'node:http'
import { Readable, Transform } from 'node:stream'
import { pipeline } from 'node:stream/promises'
import type { TransferFileInput } from '../../common/interfaces/transfer.interface.js'
import { HttpError } from '../../common/errors/http.error.js'

export interface StageMultipartOptions {
  headers: IncomingHttpHeaders & { 'content-type': string }
  body: Readable
  stagingRoot: string
  fileField: string
  /** Byte cap for all staged files together, given the fields received so far. */
  sizeLimit: (fields: Readonly<Record<string, string>>) => number
}

export interface StagedUpload {
  fields: Record<string, string>
  files: TransferFileInput[]
  cleanup(): Promise<void>
}

export class StagingLimitExceededError extends Error {
  constructor(
    public readonly limitBytes: number,
    public readonly stagedBytes: number
  ) {
    super(`Upload exceeds ${limitBytes} bytes`)
    this.name = 'StagingLimitExceededError'
  }
}

/**
 * Streams a multipart body to a private temp directory, one file per part.
 * Each staged file has a measured size and can be reopened any number of times,
 * which lets quota be checked before anything reaches the blob store.
 */
export async function stageMultipartUpload(opts: StageMultipartOptions): Promise<StagedUpload> {
  const dir = path.join(opts.stagingRoot, `upload-${randomUUID()}`)
  await fs.ensureDir(dir)
  const cleanup = (): Promise<void> => fs.remove(dir)

  const fields: Record<string, string> = {}
  const pending: Array<Promise<TransferFileInput>> = []
  let stagedBytes = 0
  let partIndex = 0

  const stageFile = async (
    source: Readable,
    filename: string,
    mimeType: string
  ): Promise<TransferFileInput> => {
    const stagedPath = path.join(dir, `${partIndex++}.part`)

    const counter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        stagedBytes += chunk.byteLength
        const limit = opts.sizeLimit(fields)
        if (stagedBytes > limit) {
          callback(new StagingLimitExceededError(limit, stagedBytes))
          return
        }
        callback(null, chunk)
      },
    })

    await pipeline(source, counter, fs.createWriteStream(stagedPath))
    const { size } = await fs.stat(stagedPath)

    return {
      name: filename,
      size,
      mimeType,
      open: () => Readable.toWeb(fs.createReadStream(stagedPath)),
    }
  }

  try {
    await new Promise<void>((resolve, reject) => {
      let bb: busboy.Busboy
      try {
        bb = busboy({ headers: opts.headers })
      } catch {
        // Missing boundary or unsupported content type
        opts.body.resume()
        reject(new HttpError('Malformed multipart body', 400))
        return
      }

      const fail = (err: unknown): void => {
        opts.body.unpipe(bb)
        opts.body.resume()
        reject(err)
      }

      bb.on('field', (name, value) => {
        if (!(name in fields)) fields[name] = value
      })

      bb.on('file', (name, stream, info) => {
        if (name !== opts.fileField || !info.filename) {
          stream.resume()
          return
        }
        const staged = stageFile(stream, info.filename, info.mimeType)
        void staged.catch(fail)
        pending.push(staged)
      })

      bb.on('error', () => fail(new HttpError('Malformed multipart body', 400)))
      bb.on('close', () => resolve())
      opts.body.on('error', fail)

      opts.body.pipe(bb)
    })

    const files = await Promise.all(pending)
    return { fields, files, cleanup }
  } catch (e: unknown) {
    await cleanup()
    throw e
  }
}
