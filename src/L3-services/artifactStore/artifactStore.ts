import {
  ensureDirectory,
  getFileStats,
  isErrnoCode,
  linkExclusive,
  listDirectoryWithTypes,
  readFileBuffer,
  removeFile,
  renameFile,
  tryFileStats,
  writeScratchFile,
} from '../../L1-infra/fileSystem/fileSystem.js'
import type { Stats } from '../../L1-infra/fileSystem/fileSystem.js'
import { join, resolve } from '../../L1-infra/paths/paths.js'
import { sha256, sha256File } from '../../L1-infra/hash/hash.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import type { AppEnvironment } from '../../L1-infra/config/environment.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { CATEGORY_DIRECTORIES, CATEGORY_EXTENSIONS } from '../../L0-pure/types/index.js'
import type { Artifact, ArtifactCategory } from '../../L0-pure/types/index.js'
import { sanitizeFilename, splitExtension } from '../../L0-pure/text/text.js'
import { AugmentsError, NotFoundError, StorageError, ValidationError, errorMessage } from '../../L0-pure/errors/errors.js'
import { candidateNames, resolveName, MAX_CANDIDATES } from './pathResolver.js'
import type { ResolvedName } from './pathResolver.js'

export interface ArtifactStoreOptions {
  /** Artifacts root; each category lives in its own subdirectory. */
  root: string
  /**
   * Absolute directories that replace a category's default location. Such a
   * directory may hold the user's own files, so the store only lists the
   * category's own file types there and a sweep over every category skips it.
   */
  directories?: Partial<Record<ArtifactCategory, string>>
}

export interface SaveOptions {
  /** Replace whatever the name currently holds instead of disambiguating. */
  overwrite?: boolean
}

function toArtifact(category: ArtifactCategory, name: string, path: string, stats: Stats, checksum?: string): Artifact {
  const artifact: Artifact = { category, name, path, createdAt: stats.mtime, size: stats.size }
  if (checksum) artifact.checksum = checksum
  return artifact
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

function wrap(action: string, path: string, err: unknown): AugmentsError {
  if (err instanceof AugmentsError) return err
  return new StorageError(`${action} ${path}: ${errorMessage(err)}`, path, { cause: err })
}

/**
 * Owns the on-disk artifact tree.
 *
 * Writes go to a hidden `.partial` file first and are published with an
 * exclusive create, so readers and eviction only ever see complete files and
 * two writers racing for the same name end up on different names.
 */
export class ArtifactStore {
  readonly root: string
  private readonly directories: Partial<Record<ArtifactCategory, string>>

  constructor(options: ArtifactStoreOptions) {
    this.root = options.root
    this.directories = options.directories ?? {}
  }

  categoryDir(category: ArtifactCategory): string {
    return this.directories[category] ?? join(this.root, CATEGORY_DIRECTORIES[category])
  }

  /** True when the category lives in a directory the store does not own outright. */
  isShared(category: ArtifactCategory): boolean {
    return this.directories[category] !== undefined
  }

  /**
   * Path of the artifact called exactly `name`. Names come from `save` or
   * `list` and are used as they are on disk.
   */
  pathFor(category: ArtifactCategory, name: string): string {
    if (name === '' || name === '.' || name === '..' || /[\/\\\0]/.test(name)) {
      throw new ValidationError(`Not an artifact name: ${JSON.stringify(name)}`)
    }
    return join(this.categoryDir(category), name)
  }

  private ownsFile(category: ArtifactCategory, name: string): boolean {
    if (name.startsWith('.')) return false
    const extensions = CATEGORY_EXTENSIONS[category]
    if (!this.isShared(category) || !extensions) return true
    return extensions.includes(splitExtension(name)[1].toLowerCase())
  }

  private async ensureCategoryDir(category: ArtifactCategory): Promise<string> {
    const dir = this.categoryDir(category)
    try {
      await ensureDirectory(dir)
    } catch (err: unknown) {
      throw wrap('Cannot create', dir, err)
    }
    return dir
  }

  private async holdsChecksum(path: string, checksum: string, size: number): Promise<boolean> {
    const stats = await tryFileStats(path)
    if (!stats || stats.size !== size) return false
    return (await sha256File(path)) === checksum
  }

  /**
   * Preview where `content` would be saved under `desiredName`, without writing.
   */
  async resolve(category: ArtifactCategory, desiredName: string, content?: string | Buffer): Promise<ResolvedName & { path: string }> {
    const existing = new Set<string>()
    for await (const artifact of this.list(category)) existing.add(artifact.name)

    const data = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content
    const checksum = data ? sha256(data) : undefined
    const resolved = await resolveName(desiredName, existing, async (name) =>
      data !== undefined && checksum !== undefined
        ? this.holdsChecksum(join(this.categoryDir(category), name), checksum, data.length)
        : false,
    )
    return { ...resolved, path: join(this.categoryDir(category), resolved.name) }
  }

  /**
   * Persist `content` as a new artifact. A name holding different content is
   * left alone and the next free candidate (`name_1`, `name_2`, …) is used;
   * a name already holding identical content is returned as is.
   */
  async save(category: ArtifactCategory, name: string, content: string | Buffer, options: SaveOptions = {}): Promise<Artifact> {
    const dir = await this.ensureCategoryDir(category)
    const desired = sanitizeFilename(name)
    const data = typeof content === 'string' ? Buffer.from(content, 'utf-8') : content
    const checksum = sha256(data)

    let scratch: string
    try {
      scratch = await writeScratchFile(dir, data)
    } catch (err: unknown) {
      throw wrap('Cannot write to', dir, err)
    }

    try {
      if (options.overwrite) {
        const target = join(dir, desired)
        await renameFile(scratch, target)
        logger.debug(`[ArtifactStore] Wrote ${category}/${desired} (${data.length} bytes)`)
        return toArtifact(category, desired, target, await getFileStats(target), checksum)
      }
      return await this.commit(category, dir, desired, scratch, checksum, data.length)
    } catch (err: unknown) {
      throw wrap('Cannot save', join(dir, desired), err)
    } finally {
      await removeFile(scratch)
    }
  }

  /**
   * Commit an existing file (e.g. a finished download) under `name`, then
   * remove the source.
   */
  async saveFile(category: ArtifactCategory, name: string, sourcePath: string): Promise<Artifact> {
    const dir = await this.ensureCategoryDir(category)
    const desired = sanitizeFilename(name)
    try {
      const stats = await getFileStats(sourcePath)
      const checksum = await sha256File(sourcePath)
      const artifact = await this.commit(category, dir, desired, sourcePath, checksum, stats.size)
      await removeFile(sourcePath)
      return artifact
    } catch (err: unknown) {
      throw wrap('Cannot save', sourcePath, err)
    }
  }

  private async commit(
    category: ArtifactCategory,
    dir: string,
    desired: string,
    sourcePath: string,
    checksum: string,
    size: number,
  ): Promise<Artifact> {
    for (const candidate of candidateNames(desired)) {
      const target = join(dir, candidate)
      try {
        await linkExclusive(sourcePath, target)
      } catch (err: unknown) {
        if (!isErrnoCode(err, 'EEXIST')) throw err
        if (await this.holdsChecksum(target, checksum, size)) {
          logger.debug(`[ArtifactStore] ${category}/${candidate} already holds this content`)
          return toArtifact(category, candidate, target, await getFileStats(target), checksum)
        }
        continue
      }
      logger.debug(`[ArtifactStore] Wrote ${category}/${candidate} (${size} bytes)`)
      return toArtifact(category, candidate, target, await getFileStats(target), checksum)
    }
    throw new StorageError(`No free name for ${desired} after ${MAX_CANDIDATES} candidates`, join(dir, desired))
  }

  /** Read an artifact's bytes. Throws NotFoundError when absent. */
  async load(category: ArtifactCategory, name: string): Promise<Buffer> {
    const path = this.pathFor(category, name)
    try {
      return await readFileBuffer(path)
    } catch (err: unknown) {
      if (isErrnoCode(err, 'ENOENT')) throw new NotFoundError(`Artifact not found: ${category}/${name}`)
      throw wrap('Cannot read', path, err)
    }
  }

  async loadText(category: ArtifactCategory, name: string): Promise<string> {
    return (await this.load(category, name)).toString('utf-8')
  }

  async stat(category: ArtifactCategory, name: string): Promise<Artifact | undefined> {
    const path = this.pathFor(category, name)
    try {
      const stats = await tryFileStats(path)
      return stats?.isFile() ? toArtifact(category, name, path, stats) : undefined
    } catch (err: unknown) {
      throw wrap('Cannot stat', path, err)
    }
  }

  /** sha256 of a committed artifact, computed from disk when not already known. */
  async checksum(artifact: Artifact): Promise<string> {
    if (artifact.checksum) return artifact.checksum
    try {
      return await sha256File(artifact.path)
    } catch (err: unknown) {
      if (isErrnoCode(err, 'ENOENT')) throw new NotFoundError(`Artifact not found: ${artifact.category}/${artifact.name}`)
      throw wrap('Cannot read', artifact.path, err)
    }
  }

  /**
   * Committed artifacts of a category, oldest first (ties broken by name).
   * Hidden files, and in a shared directory files of other types, are skipped.
   * Nothing is read until iteration starts, and every iteration re-reads the
   * directory.
   */
  list(category: ArtifactCategory): AsyncIterable<Artifact> {
    return {
      [Symbol.asyncIterator]: () => this.scan(category),
    }
  }

  private async *scan(category: ArtifactCategory): AsyncGenerator<Artifact> {
    const dir = this.categoryDir(category)
    const artifacts: Artifact[] = []
    try {
      if (!(await tryFileStats(dir))) return
      for (const entry of await listDirectoryWithTypes(dir)) {
        if (!entry.isFile() || !this.ownsFile(category, entry.name)) continue
        const path = join(dir, entry.name)
        const stats = await tryFileStats(path)
        // deleted between readdir and stat
        if (!stats) continue
        artifacts.push(toArtifact(category, entry.name, path, stats))
      }
    } catch (err: unknown) {
      throw wrap('Cannot list', dir, err)
    }
    artifacts.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime() || compareNames(a.name, b.name))
    yield* artifacts
  }

  /** Remove an artifact. Returns false when it was already gone. */
  async delete(category: ArtifactCategory, name: string): Promise<boolean> {
    const path = this.pathFor(category, name)
    try {
      const removed = await removeFile(path)
      if (removed) logger.debug(`[ArtifactStore] Deleted ${category}/${name}`)
      return removed
    } catch (err: unknown) {
      throw wrap('Cannot delete', path, err)
    }
  }
}

/**
 * Store rooted at the configured artifacts directory, with reports in
 * OUTPUT_DIR. Only an OUTPUT_DIR outside the artifacts tree counts as shared.
 */
export function createArtifactStore(
  config: Pick<AppEnvironment, 'ARTIFACTS_DIR' | 'OUTPUT_DIR'> = getConfig(),
): ArtifactStore {
  const store = new ArtifactStore({ root: config.ARTIFACTS_DIR })
  if (resolve(config.OUTPUT_DIR) === resolve(store.categoryDir('markdown-report'))) return store
  return new ArtifactStore({
    root: config.ARTIFACTS_DIR,
    directories: { 'markdown-report': config.OUTPUT_DIR },
  })
}
