import { getConfig } from '../../L1-infra/config/environment.js'
import type { AppEnvironment } from '../../L1-infra/config/environment.js'
import { createArtifactStore } from './artifactStore.js'
import type { ArtifactStore } from './artifactStore.js'
import { createArtifactCache } from '../cache/artifactCache.js'
import type { ArtifactCache } from '../cache/artifactCache.js'

/** The store and the cache over it, shared by every stage of a run. */
export interface StorageContext {
  store: ArtifactStore
  cache: ArtifactCache
}

export function createStorageContext(config: AppEnvironment = getConfig()): StorageContext {
  const store = createArtifactStore(config)
  return { store, cache: createArtifactCache(store, config) }
}
