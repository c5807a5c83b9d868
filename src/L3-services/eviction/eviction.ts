import logger from '../../L1-infra/logger/configLogger.js'
import { ARTIFACT_CATEGORIES } from '../../L0-pure/types/index.js'
import type { ArtifactCategory } from '../../L0-pure/types/index.js'
import { toMilliseconds } from '../../L0-pure/duration/duration.js'
import { ValidationError, errorMessage } from '../../L0-pure/errors/errors.js'
import type { ArtifactStore } from '../artifactStore/artifactStore.js'

export interface EvictionOptions {
  /** Limit the sweep to one category; every category when omitted. */
  category?: ArtifactCategory
  /** Milliseconds, or a duration string such as "7d". */
  maxAge: number | string
  now?: Date
}

export interface EvictionResult {
  removed: number
  failed: number
  scanned: number
}

/**
 * Delete every committed artifact older than `maxAge`. A failure on one
 * artifact is logged and counted; the sweep carries on. Without a category,
 * directories the store shares with other files (a custom OUTPUT_DIR) are
 * left out; name the category to sweep them.
 */
export async function evictArtifacts(store: ArtifactStore, options: EvictionOptions): Promise<EvictionResult> {
  const maxAgeMs = toMilliseconds(options.maxAge)
  if (maxAgeMs <= 0) {
    throw new ValidationError(`Max age must be greater than zero (got ${String(options.maxAge)})`)
  }
  const now = (options.now ?? new Date()).getTime()
  const categories = options.category
    ? [options.category]
    : ARTIFACT_CATEGORIES.filter((category) => {
      if (!store.isShared(category)) return true
      logger.info(`[Eviction] Skipping ${category} in ${store.categoryDir(category)}; sweep it by name`)
      return false
    })
  const result: EvictionResult = { removed: 0, failed: 0, scanned: 0 }

  for (const category of categories) {
    for await (const artifact of store.list(category)) {
      result.scanned++
      if (now - artifact.createdAt.getTime() <= maxAgeMs) continue
      try {
        if (await store.delete(category, artifact.name)) {
          result.removed++
          logger.debug(`[Eviction] Removed ${category}/${artifact.name}`)
        } else {
          result.failed++
          logger.warn(`[Eviction] ${category}/${artifact.name} was listed but could not be found to remove`)
        }
      } catch (err: unknown) {
        result.failed++
        logger.warn(`[Eviction] Could not remove ${category}/${artifact.name}: ${errorMessage(err)}`)
      }
    }
  }

  logger.info(`[Eviction] Scanned ${result.scanned}, removed ${result.removed}, failed ${result.failed}`)
  return result
}
