import { sha256 } from '@noble/hashes/sha2.js'
import { bytesToHex } from '@noble/hashes/utils.js'

export interface HashingStream {
  stream: ReadableStream<Uint8Array>
  /** Available once the returned stream has been fully consumed. */
  getResult: () => { hashHex: string; size: number }
}

export class HashUtil {
  static createHashingStream(input: ReadableStream<Uint8Array>): HashingStream {
    const hasher = sha256.create()
    let size = 0
    let finalized: { hashHex: string; size: number } | undefined

    const transformer = new TransformStream<Uint8Array, Uint8Array>({
      transform: (chunk, controller) => {
        size += chunk.byteLength
        hasher.update(chunk)
        controller.enqueue(chunk)
      },
      flush: () => {
        finalized = { hashHex: bytesToHex(hasher.digest()), size }
      },
    })

    return {
      stream: input.pipeThrough(transformer),
      getResult: () => {
        if (!finalized) {
          throw new Error('Stream processing result is not available')
        }
        return finalized
      },
    }
  }

  static isValidHash(hash: string): boolean {
    return /^[a-f0-9]{64}$/i.test(hash)
  }
}
