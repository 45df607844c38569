import { HashUtil } from '@/common/utils/hash.util'
import { readStreamText } from '@test/helpers/mocks'

function streamOf(...parts: string[]): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder()
  return new ReadableStream<Uint8Array>({
    start(controller) {
      for (const p of parts) controller.enqueue(encoder.encode(p))
      controller.close()
    },
  })
}

describe('HashUtil', () => {
  it('hashes content while passing it through unchanged', async () => {
    const hashing = HashUtil.createHashingStream(streamOf('hello', ' ', 'world'))

    expect(await readStreamText(hashing.stream)).toBe('hello world')
    expect(hashing.getResult()).toEqual({
      hashHex: 'b94d27b9934d3e08a52e52d7da7dabfac484efe37a5380ee9088f7ace2efcde9',
      size: 11,
    })
  })

  it('has no result before the stream is consumed', () => {
    const hashing = HashUtil.createHashingStream(streamOf('x'))
    expect(() => hashing.getResult()).toThrow('Stream processing result is not available')
  })

  it('isValidHash checks for 64 hex characters', () => {
    expect(HashUtil.isValidHash('a'.repeat(64))).toBe(true)
    expect(HashUtil.isValidHash('g'.repeat(64))).toBe(false)
  })
})
