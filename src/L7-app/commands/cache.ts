import { createStorageContext } from '../../L3-services/artifactStore/storageContext.js'
import type { StorageContext } from '../../L3-services/artifactStore/storageContext.js'
import { ValidationError } from '../../L0-pure/errors/errors.js'
import type { CacheEntry } from '../../L0-pure/types/index.js'

export const CACHE_ACTIONS = ['list', 'clear', 'prune'] as const
export type CacheAction = (typeof CACHE_ACTIONS)[number]

function isCacheAction(value: string): value is CacheAction {
  return CACHE_ACTIONS.some((a) => a === value)
}

export function formatCacheEntry(entry: CacheEntry): string {
  const meta = entry.meta
    ? ` ${Object.entries(entry.meta).map(([k, v]) => `${k}=${v}`).join(' ')}`
    : ''
  return `${entry.cachedAt}  ${entry.key} -> ${entry.category}/${entry.name}${meta}`
}

/** `augments cache <list|clear|prune>`. */
export async function runCache(action: string, ctx: StorageContext = createStorageContext()): Promise<number> {
  if (!isCacheAction(action)) {
    throw new ValidationError(`Unknown cache action "${action}". Expected one of: ${CACHE_ACTIONS.join(', ')}`)
  }
  switch (action) {
    case 'list': {
      const entries = await ctx.cache.entries()
      for (const entry of entries) console.log(formatCacheEntry(entry))
      console.log(entries.length === 0 ? 'Cache is empty.' : `${entries.length} entr${entries.length === 1 ? 'y' : 'ies'}`)
      return 0
    }
    case 'clear':
      console.log(`Cleared ${await ctx.cache.clear()} cache entries`)
      return 0
    case 'prune':
      console.log(`Pruned ${await ctx.cache.prune()} cache entries`)
      return 0
  }
}
