import { createStorageContext } from '../../L3-services/artifactStore/storageContext.js'
import type { StorageContext } from '../../L3-services/artifactStore/storageContext.js'
import { ARTIFACT_CATEGORIES } from '../../L0-pure/types/index.js'
import type { Artifact, ArtifactCategory } from '../../L0-pure/types/index.js'
import { formatBytes } from '../../L0-pure/text/text.js'

export function formatArtifactLine(artifact: Artifact): string {
  return `${artifact.createdAt.toISOString()}  ${formatBytes(artifact.size).padStart(9)}  ${artifact.category}/${artifact.name}`
}

/** `augments list`: every committed artifact of one category (or all), oldest first. */
export async function runList(
  category: ArtifactCategory | undefined,
  ctx: StorageContext = createStorageContext(),
): Promise<number> {
  let count = 0
  for (const cat of category ? [category] : ARTIFACT_CATEGORIES) {
    for await (const artifact of ctx.store.list(cat)) {
      console.log(formatArtifactLine(artifact))
      count++
    }
  }
  console.log(count === 0 ? 'No artifacts.' : `${count} artifact${count === 1 ? '' : 's'}`)
  return 0
}
