import { z } from 'zod'
import { readJsonFile, writeJsonFile, fileExists } from '../../L1-infra/fileSystem/fileSystem.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { ARTIFACT_CATEGORIES } from '../../L0-pure/types/index.js'
import type { ArtifactCategory, CacheEntry } from '../../L0-pure/types/index.js'

/** Storage behind the cache: source key → entry. */
export interface CacheIndex {
  get(key: string): Promise<CacheEntry | undefined>
  set(entry: CacheEntry): Promise<void>
  delete(key: string): Promise<boolean>
  all(): Promise<CacheEntry[]>
  clear(): Promise<void>
}

const CategorySchema = z.custom<ArtifactCategory>(
  (value) => typeof value === 'string' && ARTIFACT_CATEGORIES.some((c) => c === value),
)

const CacheEntrySchema = z.object({
  key: z.string(),
  category: CategorySchema,
  name: z.string(),
  path: z.string(),
  cachedAt: z.string(),
  meta: z.record(z.string(), z.string()).optional(),
})

const CacheIndexFileSchema = z.object({
  version: z.literal(1),
  entries: z.record(z.string(), CacheEntrySchema),
})
type CacheIndexFile = z.infer<typeof CacheIndexFileSchema>

/**
 * Cache index persisted as one JSON document. Every operation re-reads the
 * file, so concurrent processes see each other's writes (last write wins).
 */
export class JsonFileCacheIndex implements CacheIndex {
  constructor(readonly filePath: string) {}

  private async read(): Promise<CacheIndexFile> {
    if (!(await fileExists(this.filePath))) return { version: 1, entries: {} }
    let raw: unknown
    try {
      raw = await readJsonFile(this.filePath)
    } catch (err: unknown) {
      logger.warn(`[Cache] Ignoring unreadable cache index ${this.filePath}: ${err instanceof Error ? err.message : String(err)}`)
      return { version: 1, entries: {} }
    }
    const parsed = CacheIndexFileSchema.safeParse(raw)
    if (!parsed.success) {
      logger.warn(`[Cache] Ignoring malformed cache index ${this.filePath}`)
      return { version: 1, entries: {} }
    }
    return parsed.data
  }

  private async write(data: CacheIndexFile): Promise<void> {
    await writeJsonFile(this.filePath, data)
  }

  async get(key: string): Promise<CacheEntry | undefined> {
    const data = await this.read()
    return data.entries[key]
  }

  async set(entry: CacheEntry): Promise<void> {
    const data = await this.read()
    data.entries[entry.key] = entry
    await this.write(data)
  }

  async delete(key: string): Promise<boolean> {
    const data = await this.read()
    if (!(key in data.entries)) return false
    delete data.entries[key]
    await this.write(data)
    return true
  }

  async all(): Promise<CacheEntry[]> {
    const data = await this.read()
    return Object.values(data.entries)
  }

  async clear(): Promise<void> {
    await this.write({ version: 1, entries: {} })
  }
}

/** In-process index; nothing survives the process. */
export class MemoryCacheIndex implements CacheIndex {
  private readonly entries = new Map<string, CacheEntry>()

  async get(key: string): Promise<CacheEntry | undefined> {
    return this.entries.get(key)
  }

  async set(entry: CacheEntry): Promise<void> {
    this.entries.set(entry.key, entry)
  }

  async delete(key: string): Promise<boolean> {
    return this.entries.delete(key)
  }

  async all(): Promise<CacheEntry[]> {
    return [...this.entries.values()]
  }

  async clear(): Promise<void> {
    this.entries.clear()
  }
}
