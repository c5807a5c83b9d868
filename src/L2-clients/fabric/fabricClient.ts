import { execWithInput, spawnCommand, ProcessError } from '../../L1-infra/process/process.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { AnalysisProviderError, RateLimitedError, errorMessage } from '../../L0-pure/errors/errors.js'

const RATE_LIMIT_PATTERN = /\b429\b|rate.?limit|too many requests/i

/**
 * Run a fabric pattern with `input` on stdin and return its stdout.
 * Throttling reported on stderr becomes RateLimitedError.
 */
export async function runFabricPattern(pattern: string, input: string, model?: string): Promise<string> {
  const args = ['-p', pattern, ...(model ? ['-m', model] : [])]
  logger.debug(`fabric ${args.join(' ')}`)
  try {
    const { stdout } = await execWithInput(getConfig().FABRIC_PATH, args, input)
    return stdout
  } catch (err: unknown) {
    if (err instanceof ProcessError && err.notFound) {
      throw new AnalysisProviderError(
        `fabric not found at "${err.command}". Install it or set FABRIC_PATH.`,
        'fabric',
        { cause: err },
      )
    }
    if (err instanceof ProcessError && RATE_LIMIT_PATTERN.test(err.stderr)) {
      throw new RateLimitedError(`fabric rate limit: ${err.stderr.trim()}`, 'fabric', undefined, { cause: err })
    }
    throw new AnalysisProviderError(`fabric pattern ${pattern} failed: ${errorMessage(err)}`, 'fabric', { cause: err })
  }
}

/** Installed fabric version, or undefined when it cannot be run. */
export function fabricVersion(): string | undefined {
  const result = spawnCommand(getConfig().FABRIC_PATH, ['--version'], { timeout: 10_000 })
  if (result.error || result.status !== 0) return undefined
  return result.stdout.trim() || 'installed'
}
