import { execFile as nodeExecFile, spawn as nodeSpawn, spawnSync as nodeSpawnSync } from 'child_process'
import type { SpawnSyncReturns } from 'child_process'

export interface ExecResult {
  stdout: string
  stderr: string
}

export interface ExecOptions {
  cwd?: string
  timeout?: number
  maxBuffer?: number
  signal?: AbortSignal
  env?: NodeJS.ProcessEnv
}

/** A child process that could not be started or exited non-zero. */
export class ProcessError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stdout: string,
    public readonly stderr: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'ProcessError'
    Object.setPrototypeOf(this, ProcessError.prototype)
  }

  /** The binary was not found on PATH. */
  get notFound(): boolean {
    const cause = this.cause
    return cause instanceof Error && 'code' in cause && cause.code === 'ENOENT'
  }
}

function exitCodeOf(error: Error): number | null {
  return 'code' in error && typeof error.code === 'number' ? error.code : null
}

/**
 * Execute a command asynchronously via execFile.
 * Returns promise of { stdout, stderr }; rejects with ProcessError.
 */
export function execCommand(cmd: string, args: string[], opts: ExecOptions = {}): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    nodeExecFile(
      cmd,
      args,
      { ...opts, maxBuffer: opts.maxBuffer ?? 64 * 1024 * 1024, encoding: 'utf8' },
      (error, stdout, stderr) => {
        if (error) {
          const detail = stderr.trim() || error.message
          reject(new ProcessError(`${cmd} failed: ${detail}`, cmd, exitCodeOf(error), stdout, stderr, { cause: error }))
        } else {
          resolve({ stdout, stderr })
        }
      },
    )
  })
}

/**
 * Run a command with `input` written to its stdin and collect its output.
 * Rejects with ProcessError on a spawn failure or a non-zero exit.
 */
export function execWithInput(cmd: string, args: string[], input: string, opts: ExecOptions = {}): Promise<ExecResult> {
  return new Promise((resolve, reject) => {
    const child = nodeSpawn(cmd, args, {
      cwd: opts.cwd,
      env: opts.env,
      signal: opts.signal,
      timeout: opts.timeout,
      stdio: ['pipe', 'pipe', 'pipe'],
    })
    const stdout: Buffer[] = []
    const stderr: Buffer[] = []
    let settled = false
    const fail = (err: ProcessError) => {
      if (!settled) {
        settled = true
        reject(err)
      }
    }

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk))
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk))
    child.on('error', (err) => {
      fail(new ProcessError(`${cmd} failed: ${err.message}`, cmd, null, '', '', { cause: err }))
    })
    // EPIPE when the child exits before reading everything; the exit code reports the failure
    child.stdin.on('error', () => undefined)
    child.on('close', (code) => {
      if (settled) return
      const out = Buffer.concat(stdout).toString('utf8')
      const err = Buffer.concat(stderr).toString('utf8')
      if (code === 0) {
        settled = true
        resolve({ stdout: out, stderr: err })
      } else {
        fail(new ProcessError(`${cmd} exited with code ${code}: ${err.trim()}`, cmd, code, out, err))
      }
    })

    child.stdin.end(input)
  })
}

/**
 * Spawn a command synchronously. Returns full result including status.
 */
export function spawnCommand(cmd: string, args: string[], opts: { timeout?: number } = {}): SpawnSyncReturns<string> {
  return nodeSpawnSync(cmd, args, { encoding: 'utf-8', timeout: opts.timeout })
}
