import { createStorageContext } from '../../L3-services/artifactStore/storageContext.js'
import type { StorageContext } from '../../L3-services/artifactStore/storageContext.js'
import { evictArtifacts } from '../../L3-services/eviction/eviction.js'
import type { ArtifactCategory } from '../../L0-pure/types/index.js'

/**
 * `augments cleanup`: delete artifacts older than `maxAge`, then drop cache
 * entries that pointed at them. Exits non-zero when some deletions failed.
 */
export async function runCleanup(
  category: ArtifactCategory | undefined,
  opts: { maxAge: string },
  ctx: StorageContext = createStorageContext(),
): Promise<number> {
  const result = await evictArtifacts(ctx.store, { category, maxAge: opts.maxAge })
  const pruned = await ctx.cache.prune()
  console.log(`Removed ${result.removed} of ${result.scanned} artifacts (${result.failed} failed); pruned ${pruned} cache entries`)
  return result.failed > 0 ? 1 : 0
}
