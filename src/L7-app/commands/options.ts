import { InvalidArgumentError } from '../../L1-infra/cli/cli.js'
import { ARTIFACT_CATEGORIES, PATTERN_NAMES, TRANSCRIPT_FORMATS } from '../../L0-pure/types/index.js'
import type { ArtifactCategory, PatternName, TranscriptFormat } from '../../L0-pure/types/index.js'
import { MEDIA_FORMATS } from '../../L3-services/acquisition/acquisition.js'
import type { MediaFormat } from '../../L3-services/acquisition/acquisition.js'

/*
 * Commander argument parsers. Each one narrows a raw string to the domain type
 * or throws InvalidArgumentError, which commander reports as a usage error.
 */

function pick<T extends string>(value: string, allowed: readonly T[], what: string): T {
  const normalized = value.trim().toLowerCase()
  const match = allowed.find((a) => a === normalized)
  if (!match) {
    throw new InvalidArgumentError(`Unknown ${what} "${value}". Expected one of: ${allowed.join(', ')}`)
  }
  return match
}

export function parseFormat(value: string): TranscriptFormat {
  return pick(value, TRANSCRIPT_FORMATS, 'format')
}

export type TranscriptOutputFormat = TranscriptFormat | 'json'

export function parseTranscriptOutputFormat(value: string): TranscriptOutputFormat {
  return pick<TranscriptOutputFormat>(value, [...TRANSCRIPT_FORMATS, 'json'], 'format')
}

export function parseMediaFormat(value: string): MediaFormat {
  return pick(value, MEDIA_FORMATS, 'format')
}

/** Comma-separated pattern list, duplicates dropped, order kept. */
export function parsePatterns(value: string): PatternName[] {
  const patterns: PatternName[] = []
  for (const raw of value.split(',')) {
    if (raw.trim() === '') continue
    const pattern = pick(raw, PATTERN_NAMES, 'pattern')
    if (!patterns.includes(pattern)) patterns.push(pattern)
  }
  if (patterns.length === 0) throw new InvalidArgumentError('At least one pattern is required')
  return patterns
}

/** A category name, or `all` (undefined) for every category. */
export function parseCategoryScope(value: string | undefined): ArtifactCategory | undefined {
  if (value === undefined || value.trim().toLowerCase() === 'all') return undefined
  return pick(value, ARTIFACT_CATEGORIES, 'category')
}
