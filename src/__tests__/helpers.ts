import { afterEach, vi } from 'vitest'
import type { MockInstance } from 'vitest'
import { promises as fsp } from 'fs'
import { dirname } from 'path'
import tmp from 'tmp'
import { ArtifactStore } from '../L3-services/artifactStore/artifactStore.js'
import { ArtifactCache } from '../L3-services/cache/artifactCache.js'
import { MemoryCacheIndex } from '../L3-services/cache/cacheIndex.js'
import type { StorageContext } from '../L3-services/artifactStore/storageContext.js'
import type { TtsProvider } from '../L2-clients/tts/types.js'

/** Create an owner-only temp directory. */
export async function makeTempDir(prefix: string): Promise<string> {
  return new Promise((resolve, reject) => {
    tmp.dir({ prefix, mode: 0o700 }, (err, path) => {
      if (err) reject(err)
      else resolve(path)
    })
  })
}

/** Write a fixture file, creating parent directories. */
export async function writeTextFile(filePath: string, content: string): Promise<void> {
  await fsp.mkdir(dirname(filePath), { recursive: true })
  await fsp.writeFile(filePath, content, 'utf-8')
}

/** Backdate (or postdate) a file's access and modification times. */
export async function setFileTimes(filePath: string, time: Date): Promise<void> {
  await fsp.utimes(filePath, time, time)
}

/**
 * Make the next file opened through `fs.promises` reject its first write.
 * Restore the returned spy when done.
 */
export function failNextWrite(message = 'disk full'): MockInstance<typeof fsp.open> {
  const realOpen = fsp.open
  return vi.spyOn(fsp, 'open').mockImplementationOnce(async (path, flags, mode) => {
    const handle = await realOpen(path, flags, mode)
    vi.spyOn(handle, 'writeFile').mockRejectedValueOnce(new Error(message))
    return handle
  })
}

/**
 * Temp directories for the current test file, removed after each test.
 * Call at module level; use the returned function inside tests.
 */
export function useTempDirs(prefix = 'augments-test-'): () => Promise<string> {
  let dirs: string[] = []

  afterEach(async () => {
    for (const dir of dirs) {
      await fsp.rm(dir, { recursive: true, force: true })
    }
    dirs = []
  })

  return async () => {
    const dir = await makeTempDir(prefix)
    dirs.push(dir)
    return dir
  }
}

/** Store rooted at `root` with an in-memory cache index. */
export function createTestContext(root: string, now?: () => Date): StorageContext {
  const store = new ArtifactStore({ root })
  return { store, cache: new ArtifactCache(new MemoryCacheIndex(), store, now) }
}

export interface FakeTtsOptions {
  available?: boolean
  /** Reject every request with this message. */
  fail?: string
  maxInputChars?: number
}

/** A speech provider that returns `<name>:<text>` as its audio bytes and records each request. */
export function fakeTtsProvider(name: string, options: FakeTtsOptions = {}): TtsProvider & { requests: string[] } {
  const requests: string[] = []
  return {
    name,
    maxInputChars: options.maxInputChars ?? 4096,
    requests,
    isAvailable: () => options.available ?? true,
    synthesize: async (text: string) => {
      requests.push(text)
      if (options.fail) throw new Error(options.fail)
      return Buffer.from(`${name}:${text}`)
    },
  }
}
