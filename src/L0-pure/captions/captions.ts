import { collapseWhitespace } from '../text/text.js'
import type { TranscriptFormat } from '../types/index.js'

/** One timed caption cue. Times are in seconds. */
export interface Cue {
  start: number
  end: number
  text: string
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
  '#39': "'",
}

/** Decode the handful of HTML entities caption tracks actually contain, plus numeric ones. */
export function decodeHtmlEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, entity: string) => {
    const named = NAMED_ENTITIES[entity.toLowerCase()]
    if (named !== undefined) return named
    if (entity.startsWith('#x') || entity.startsWith('#X')) {
      return String.fromCodePoint(parseInt(entity.slice(2), 16))
    }
    if (entity.startsWith('#')) {
      return String.fromCodePoint(parseInt(entity.slice(1), 10))
    }
    return whole
  })
}

/** Parse `HH:MM:SS.mmm`, `MM:SS.mmm` or the SRT comma form into seconds. */
export function parseTimestamp(value: string): number {
  const match = /^(?:(\d+):)?(\d{1,2}):(\d{2})[.,](\d{1,3})$/.exec(value.trim())
  if (!match) return 0
  const hours = match[1] ? Number(match[1]) : 0
  return hours * 3600 + Number(match[2]) * 60 + Number(match[3]) + Number(match[4].padEnd(3, '0')) / 1000
}

/** Format seconds as `HH:MM:SS,mmm` (SRT) or `HH:MM:SS.mmm` (VTT). */
export function formatTimestamp(seconds: number, separator: ',' | '.' = ','): string {
  const totalMs = Math.max(0, Math.round(seconds * 1000))
  const h = Math.floor(totalMs / 3_600_000)
  const m = Math.floor((totalMs % 3_600_000) / 60_000)
  const s = Math.floor((totalMs % 60_000) / 1000)
  const ms = totalMs % 1000
  const pad = (n: number, width = 2) => String(n).padStart(width, '0')
  return `${pad(h)}:${pad(m)}:${pad(s)}${separator}${pad(ms, 3)}`
}

/** Remove inline timing and styling tags (`<00:00:01.000>`, `<c>`, `<i>` …) and decode entities. */
export function cleanCueText(text: string): string {
  return decodeHtmlEntities(text.replace(/<[^>]*>/g, ''))
}

/**
 * Parse a WebVTT or SRT document into cues.
 * Header, NOTE, STYLE and REGION blocks have no timing line and are skipped.
 */
export function parseCues(raw: string): Cue[] {
  const blocks = raw.replace(/\r\n?/g, '\n').split(/\n{2,}/)
  const cues: Cue[] = []

  for (const block of blocks) {
    const lines = block.split('\n')
    const timingIndex = lines.findIndex((line) => line.includes('-->'))
    if (timingIndex === -1) continue

    const [startRaw, rest] = lines[timingIndex].split('-->')
    // VTT cue settings ("align:start position:0%") follow the end time
    const endRaw = rest.trim().split(/\s+/)[0] ?? ''
    const text = lines
      .slice(timingIndex + 1)
      .map((line) => cleanCueText(line).trim())
      .filter((line) => line.length > 0)
      .join('\n')
    if (text.length === 0) continue

    cues.push({ start: parseTimestamp(startRaw), end: parseTimestamp(endRaw), text })
  }

  return cues
}

/**
 * Reduce cues to plain prose.
 *
 * Automatic captions repeat the previous line at the top of every cue while
 * the next line scrolls in, so a line equal to the one just emitted is dropped.
 */
export function cuesToText(cues: Cue[]): string {
  const lines: string[] = []
  for (const cue of cues) {
    for (const line of cue.text.split('\n')) {
      const flat = collapseWhitespace(line)
      if (flat.length === 0 || flat === lines[lines.length - 1]) continue
      lines.push(flat)
    }
  }
  return collapseWhitespace(lines.join(' '))
}

/** Render cues as an SRT document. */
export function cuesToSrt(cues: Cue[]): string {
  return cues
    .map((cue, i) => `${i + 1}\n${formatTimestamp(cue.start)} --> ${formatTimestamp(cue.end)}\n${cue.text}\n`)
    .join('\n')
}

/** Render cues as a WebVTT document. */
export function cuesToVtt(cues: Cue[]): string {
  const body = cues
    .map((cue) => `${formatTimestamp(cue.start, '.')} --> ${formatTimestamp(cue.end, '.')}\n${cue.text}\n`)
    .join('\n')
  return `WEBVTT\n\n${body}`
}

/** Convert a downloaded caption document to the requested transcript format. */
export function convertCaptions(raw: string, source: 'vtt' | 'srt', target: TranscriptFormat): string {
  if (target === source) return raw
  const cues = parseCues(raw)
  switch (target) {
    case 'vtt': return cuesToVtt(cues)
    case 'srt': return cuesToSrt(cues)
    case 'txt': return cuesToText(cues)
  }
}

/** Plain text of a stored transcript in any format. */
export function transcriptToText(content: string, format: TranscriptFormat): string {
  return format === 'txt' ? collapseWhitespace(content) : cuesToText(parseCues(content))
}
