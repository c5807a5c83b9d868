import { promises as fsp, constants as fsConstants, existsSync, readFileSync, createReadStream } from 'fs'
import type { Stats, Dirent } from 'fs'
import tmp from 'tmp'
import { dirname } from '../paths/paths.js'

// Enable graceful cleanup of all tmp resources on process exit
tmp.setGracefulCleanup()

export type { Stats, Dirent }

/** Narrow an unknown error to a Node errno error with the given code. */
export function isErrnoCode(err: unknown, ...codes: string[]): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' && codes.includes(err.code)
}

// ── Reads ──────────────────────────────────────────────────────

/** Read and parse a JSON file. Throws descriptive error on ENOENT or parse failure. */
export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await readTextFile(filePath)
  try {
    return JSON.parse(raw)
  } catch (err: unknown) {
    throw new Error(`Failed to parse JSON at ${filePath}: ${err instanceof Error ? err.message : String(err)}`)
  }
}

/** Read a text file as UTF-8 string. Throws "File not found: <path>" on ENOENT. */
export async function readTextFile(filePath: string): Promise<string> {
  try {
    return await fsp.readFile(filePath, 'utf-8')
  } catch (err: unknown) {
    if (isErrnoCode(err, 'ENOENT')) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** Sync variant of readTextFile. */
export function readTextFileSync(filePath: string): string {
  try {
    return readFileSync(filePath, 'utf-8')
  } catch (err: unknown) {
    if (isErrnoCode(err, 'ENOENT')) {
      throw new Error(`File not found: ${filePath}`)
    }
    throw err
  }
}

/** Read a file as a raw Buffer (no encoding). */
export async function readFileBuffer(filePath: string): Promise<Buffer> {
  return fsp.readFile(filePath)
}

/** List directory with Dirent objects. Throws "Directory not found: <path>" on ENOENT. */
export async function listDirectoryWithTypes(dirPath: string): Promise<Dirent[]> {
  try {
    return await fsp.readdir(dirPath, { withFileTypes: true })
  } catch (err: unknown) {
    if (isErrnoCode(err, 'ENOENT')) {
      throw new Error(`Directory not found: ${dirPath}`)
    }
    throw err
  }
}

/** Check if file/dir exists (async, using stat). */
export async function fileExists(filePath: string): Promise<boolean> {
  return (await tryFileStats(filePath)) !== undefined
}

/** Check if file/dir exists (sync). */
export function fileExistsSync(filePath: string): boolean {
  return existsSync(filePath)
}

/** Get file stats. Throws "File not found: <path>" on ENOENT. */
export async function getFileStats(filePath: string): Promise<Stats> {
  const stats = await tryFileStats(filePath)
  if (!stats) throw new Error(`File not found: ${filePath}`)
  return stats
}

/** File stats, or undefined when the path does not exist. */
export async function tryFileStats(filePath: string): Promise<Stats | undefined> {
  try {
    return await fsp.stat(filePath)
  } catch (err: unknown) {
    if (isErrnoCode(err, 'ENOENT', 'ENOTDIR')) return undefined
    throw err
  }
}

// ── Writes ─────────────────────────────────────────────────────

/** Write data as JSON via a scratch file and rename. */
export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  const dir = dirname(filePath)
  await fsp.mkdir(dir, { recursive: true })
  const scratch = await writeScratchFile(dir, JSON.stringify(data, null, 2) + '\n')
  try {
    await fsp.rename(scratch, filePath)
  } catch (err: unknown) {
    await removeFile(scratch)
    throw err
  }
}

/** Ensure directory exists (recursive). */
export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsp.mkdir(dirPath, { recursive: true })
}

/**
 * Write `data` to a fresh hidden `*.partial` file inside `dir` and return its path.
 * The handle is closed on every path; on failure the partial file is removed.
 */
export async function writeScratchFile(dir: string, data: string | Buffer): Promise<string> {
  const scratchPath = await tempFileName(dir, '.partial')
  const handle = await fsp.open(scratchPath, 'wx', 0o600)
  try {
    try {
      await handle.writeFile(data)
      await handle.sync()
    } finally {
      await handle.close()
    }
  } catch (err: unknown) {
    await removeFile(scratchPath)
    throw err
  }
  return scratchPath
}

/**
 * Publish `src` at `dest` only if `dest` does not exist yet.
 * Uses a hard link; where the file system refuses links, an exclusive copy.
 * Throws an `EEXIST` errno error when `dest` is taken.
 */
export async function linkExclusive(src: string, dest: string): Promise<void> {
  try {
    await fsp.link(src, dest)
  } catch (err: unknown) {
    if (isErrnoCode(err, 'EPERM', 'ENOTSUP', 'EOPNOTSUPP', 'EXDEV', 'ENOSYS')) {
      await fsp.copyFile(src, dest, fsConstants.COPYFILE_EXCL)
      return
    }
    throw err
  }
}

/** Rename a file, replacing the destination. Falls back to copy+delete on EXDEV. */
export async function renameFile(oldPath: string, newPath: string): Promise<void> {
  try {
    await fsp.rename(oldPath, newPath)
  } catch (err: unknown) {
    if (isErrnoCode(err, 'EXDEV')) {
      await fsp.copyFile(oldPath, newPath)
      await removeFile(oldPath)
    } else {
      throw err
    }
  }
}

/** Remove file. Returns false when it was already gone. */
export async function removeFile(filePath: string): Promise<boolean> {
  try {
    await fsp.unlink(filePath)
    return true
  } catch (err: unknown) {
    if (isErrnoCode(err, 'ENOENT')) return false
    throw err
  }
}

/** Check that the current process can write into `dirPath`. */
export async function isWritableDirectory(dirPath: string): Promise<boolean> {
  try {
    await fsp.access(dirPath, fsConstants.W_OK)
    return true
  } catch {
    return false
  }
}

/** Stream a file through `onChunk` without loading it whole. */
export async function readFileChunks(filePath: string, onChunk: (chunk: Buffer) => void): Promise<void> {
  for await (const chunk of createReadStream(filePath)) {
    onChunk(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk))
  }
}

// ── Temp ───────────────────────────────────────────────────────

/** A unique, not-yet-created hidden file name inside `dir`. */
async function tempFileName(dir: string, postfix: string): Promise<string> {
  return new Promise((resolve, reject) => {
    tmp.tmpName({ tmpdir: dir, prefix: '.', postfix }, (err, name) => {
      if (err) reject(err)
      else resolve(name)
    })
  })
}
