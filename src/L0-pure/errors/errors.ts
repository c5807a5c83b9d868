/**
 * Error taxonomy for the artifact store and pipeline.
 *
 * Every error carries a stable `code` so callers can branch without
 * `instanceof` across module boundaries (e.g. after vi.mock).
 */

export type ErrorCode =
  | 'INVALID_REFERENCE'
  | 'SOURCE_UNAVAILABLE'
  | 'ANALYSIS_PROVIDER_ERROR'
  | 'RATE_LIMITED'
  | 'SYNTHESIS_UNAVAILABLE'
  | 'STORAGE_ERROR'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'CANCELLED'

export class AugmentsError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'AugmentsError'
    Object.setPrototypeOf(this, AugmentsError.prototype)
  }
}

export class InvalidReferenceError extends AugmentsError {
  constructor(public readonly reference: string, message = `Cannot parse source reference: ${reference}`) {
    super(message, 'INVALID_REFERENCE')
    this.name = 'InvalidReferenceError'
    Object.setPrototypeOf(this, InvalidReferenceError.prototype)
  }
}

export class SourceUnavailableError extends AugmentsError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'SOURCE_UNAVAILABLE', options)
    this.name = 'SourceUnavailableError'
    Object.setPrototypeOf(this, SourceUnavailableError.prototype)
  }
}

export class AnalysisProviderError extends AugmentsError {
  constructor(
    message: string,
    public readonly provider: string,
    options?: { cause?: unknown },
  ) {
    super(message, 'ANALYSIS_PROVIDER_ERROR', options)
    this.name = 'AnalysisProviderError'
    Object.setPrototypeOf(this, AnalysisProviderError.prototype)
  }
}

export class RateLimitedError extends AugmentsError {
  constructor(
    message: string,
    public readonly provider: string,
    public readonly retryAfterMs?: number,
    options?: { cause?: unknown },
  ) {
    super(message, 'RATE_LIMITED', options)
    this.name = 'RateLimitedError'
    Object.setPrototypeOf(this, RateLimitedError.prototype)
  }
}

export class SynthesisUnavailableError extends AugmentsError {
  constructor(public readonly attempts: { provider: string; error?: string }[]) {
    const detail = attempts.length > 0
      ? attempts.map((a) => `${a.provider}: ${a.error ?? 'failed'}`).join('; ')
      : 'no providers configured'
    super(`All speech providers failed (${detail})`, 'SYNTHESIS_UNAVAILABLE')
    this.name = 'SynthesisUnavailableError'
    Object.setPrototypeOf(this, SynthesisUnavailableError.prototype)
  }
}

export class StorageError extends AugmentsError {
  constructor(message: string, public readonly path?: string, options?: { cause?: unknown }) {
    super(message, 'STORAGE_ERROR', options)
    this.name = 'StorageError'
    Object.setPrototypeOf(this, StorageError.prototype)
  }
}

export class NotFoundError extends AugmentsError {
  constructor(message: string) {
    super(message, 'NOT_FOUND')
    this.name = 'NotFoundError'
    Object.setPrototypeOf(this, NotFoundError.prototype)
  }
}

export class ValidationError extends AugmentsError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR')
    this.name = 'ValidationError'
    Object.setPrototypeOf(this, ValidationError.prototype)
  }
}

export class PipelineCancelledError extends AugmentsError {
  constructor(message = 'Pipeline run was cancelled') {
    super(message, 'CANCELLED')
    this.name = 'PipelineCancelledError'
    Object.setPrototypeOf(this, PipelineCancelledError.prototype)
  }
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
