import { Readable } from 'stream'
import type { ReadableStream } from 'stream/web'

function isWebReadableStream(value: unknown): value is ReadableStream<Uint8Array> {
  return typeof value === 'object' && value !== null && 'getReader' in value
}

function isAsyncIterable(value: unknown): value is AsyncIterable<Uint8Array> {
  return typeof value === 'object' && value !== null && Symbol.asyncIterator in value
}

function hasArrayBuffer(value: unknown): value is { arrayBuffer(): Promise<ArrayBuffer> } {
  return typeof value === 'object' && value !== null && 'arrayBuffer' in value && typeof value.arrayBuffer === 'function'
}

async function webStreamToBuffer(stream: ReadableStream<Uint8Array>): Promise<Buffer> {
  const reader = stream.getReader()
  const chunks: Buffer[] = []
  while (true) {
    const { done, value } = await reader.read()
    if (done) break
    if (value) chunks.push(Buffer.from(value))
  }
  return Buffer.concat(chunks)
}

async function asyncIterableToBuffer(stream: AsyncIterable<Uint8Array | string>): Promise<Buffer> {
  const chunks: Buffer[] = []
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk))
  }
  return Buffer.concat(chunks)
}

/** Collect whatever audio shape an SDK hands back into one Buffer. */
export async function audioLikeToBuffer(audio: unknown): Promise<Buffer> {
  if (Buffer.isBuffer(audio)) return audio
  if (audio instanceof Uint8Array) return Buffer.from(audio)
  if (audio instanceof ArrayBuffer) return Buffer.from(audio)
  if (hasArrayBuffer(audio)) return Buffer.from(await audio.arrayBuffer())
  if (audio instanceof Readable) return asyncIterableToBuffer(audio)
  if (isWebReadableStream(audio)) return webStreamToBuffer(audio)
  if (isAsyncIterable(audio)) return asyncIterableToBuffer(audio)

  throw new Error('Unsupported audio response type from TTS provider')
}
