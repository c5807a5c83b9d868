import { createHash } from 'crypto'
import { readFileChunks } from '../fileSystem/fileSystem.js'

/** sha256 hex digest of in-memory content. */
export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex')
}

/** sha256 hex digest of a file, streamed. */
export async function sha256File(filePath: string): Promise<string> {
  const hash = createHash('sha256')
  await readFileChunks(filePath, (chunk) => hash.update(chunk))
  return hash.digest('hex')
}
