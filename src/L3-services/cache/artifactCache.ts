import logger from '../../L1-infra/logger/configLogger.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import { join } from '../../L1-infra/paths/paths.js'
import type { Artifact, CacheEntry, PatternName, TranscriptFormat } from '../../L0-pure/types/index.js'
import type { ArtifactStore } from '../artifactStore/artifactStore.js'
import { JsonFileCacheIndex } from './cacheIndex.js'
import type { CacheIndex } from './cacheIndex.js'

/** Source keys, one family per kind of cached artifact. */
export const cacheKeys = {
  transcript: (videoId: string, format: TranscriptFormat) => `transcript:${videoId}:${format}`,
  metadata: (videoId: string) => `metadata:${videoId}`,
  audio: (textSha256: string) => `audio:${textSha256}`,
  report: (videoId: string, patterns: readonly PatternName[], audio: boolean, extras: readonly string[] = []) =>
    `report:${videoId}:${patterns.join('+')}:${audio ? 'audio' : 'text'}${extras.length > 0 ? `:${extras.join('+')}` : ''}`,
}

export interface LookupOptions {
  /** Entries older than this (by put time) are stale. Undefined means no bound. */
  maxAgeMs?: number
}

export interface CacheHit {
  entry: CacheEntry
  artifact: Artifact
}

/**
 * Source key → artifact cache over an injectable index.
 *
 * Entries are weak references: a hit is only reported after the store
 * confirms the artifact still exists and the entry is within its age bound.
 */
export class ArtifactCache {
  constructor(
    private readonly index: CacheIndex,
    private readonly store: ArtifactStore,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async lookup(key: string, options: LookupOptions = {}): Promise<Artifact | undefined> {
    return (await this.lookupEntry(key, options))?.artifact
  }

  /** Like lookup, also returning the index entry (for its meta). */
  async lookupEntry(key: string, options: LookupOptions = {}): Promise<CacheHit | undefined> {
    const entry = await this.index.get(key)
    if (!entry) return undefined

    const artifact = await this.store.stat(entry.category, entry.name)
    if (!artifact) {
      logger.debug(`[Cache] ${key}: artifact ${entry.category}/${entry.name} is gone, dropping entry`)
      await this.index.delete(key)
      return undefined
    }

    if (options.maxAgeMs !== undefined) {
      const age = this.now().getTime() - Date.parse(entry.cachedAt)
      if (!(age <= options.maxAgeMs)) {
        logger.debug(`[Cache] ${key}: stale (${age}ms old), dropping entry`)
        await this.index.delete(key)
        return undefined
      }
    }

    logger.debug(`[Cache] hit ${key}`)
    return { entry, artifact }
  }

  /** Record `artifact` under `key`, replacing any previous entry. */
  async put(key: string, artifact: Artifact, meta?: Record<string, string>): Promise<CacheEntry> {
    const entry: CacheEntry = {
      key,
      category: artifact.category,
      name: artifact.name,
      path: artifact.path,
      cachedAt: this.now().toISOString(),
    }
    if (meta && Object.keys(meta).length > 0) entry.meta = meta
    await this.index.set(entry)
    return entry
  }

  async invalidate(key: string): Promise<boolean> {
    return this.index.delete(key)
  }

  async entries(): Promise<CacheEntry[]> {
    return this.index.all()
  }

  /** Drop every entry. Returns how many there were. */
  async clear(): Promise<number> {
    const count = (await this.index.all()).length
    await this.index.clear()
    return count
  }

  /** Drop entries whose artifacts no longer exist. Returns how many were dropped. */
  async prune(): Promise<number> {
    let removed = 0
    for (const entry of await this.index.all()) {
      if (!(await this.store.stat(entry.category, entry.name))) {
        await this.index.delete(entry.key)
        removed++
      }
    }
    if (removed > 0) logger.info(`[Cache] Pruned ${removed} dangling entr${removed === 1 ? 'y' : 'ies'}`)
    return removed
  }
}

/** Cache backed by `<config-dir>/cache-index.json`. */
export function createArtifactCache(store: ArtifactStore, config = getConfig()): ArtifactCache {
  return new ArtifactCache(new JsonFileCacheIndex(join(config.CONFIG_DIR, 'cache-index.json')), store)
}
