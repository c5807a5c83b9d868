import { AnalysisProviderError, RateLimitedError, errorMessage } from '../../L0-pure/errors/errors.js'
import type { AugmentsError } from '../../L0-pure/errors/errors.js'

/** HTTP status carried by SDK errors (openai and @anthropic-ai/sdk both expose `status`). */
export function statusOf(err: unknown): number | undefined {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status
  }
  return undefined
}

function headerValue(headers: unknown, name: string): string | undefined {
  if (headers instanceof Headers) return headers.get(name) ?? undefined
  if (typeof headers === 'object' && headers !== null && name in headers) {
    const value: unknown = Reflect.get(headers, name)
    return typeof value === 'string' ? value : undefined
  }
  return undefined
}

/** `Retry-After` of a throttled SDK response, in milliseconds. */
export function retryAfterMs(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('headers' in err)) return undefined
  const raw = headerValue(err.headers, 'retry-after')
  if (raw === undefined) return undefined
  const seconds = Number(raw)
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined
}

/** Map anything an SDK throws onto the analysis error taxonomy. */
export function toProviderError(err: unknown, provider: string): AugmentsError {
  if (err instanceof RateLimitedError || err instanceof AnalysisProviderError) return err
  if (statusOf(err) === 429) {
    return new RateLimitedError(`${provider} rate limit: ${errorMessage(err)}`, provider, retryAfterMs(err), { cause: err })
  }
  return new AnalysisProviderError(`${provider} request failed: ${errorMessage(err)}`, provider, { cause: err })
}
