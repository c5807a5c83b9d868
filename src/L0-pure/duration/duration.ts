import { ValidationError } from '../errors/errors.js'

const UNIT_MS: Record<string, number> = {
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
  w: 604_800_000,
}

/**
 * Parse a human-readable duration such as `"7d"`, `"24h"`, `"30m"` into milliseconds.
 * Accepts one non-negative integer followed by one unit (s, m, h, d, w).
 */
export function parseDuration(spec: string): number {
  const match = /^(\d+)\s*([smhdw])$/i.exec(spec.trim())
  if (!match) {
    throw new ValidationError(
      `Invalid duration "${spec}". Use a whole number followed by s, m, h, d or w (e.g. 7d, 24h, 30m).`,
    )
  }
  return Number(match[1]) * UNIT_MS[match[2].toLowerCase()]
}

/** Accept either milliseconds or a duration string. */
export function toMilliseconds(value: number | string): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value) || value < 0) {
      throw new ValidationError(`Invalid duration ${value}: must be a non-negative number of milliseconds`)
    }
    return value
  }
  return parseDuration(value)
}

/** Parse an optional duration setting; empty means "no bound". */
export function parseOptionalDuration(spec: string | undefined): number | undefined {
  if (spec === undefined || spec.trim() === '') return undefined
  return parseDuration(spec)
}
