const RESERVED_CHARS = /[<>:"/\\|?*]/g
// eslint-disable-next-line no-control-regex
const CONTROL_CHARS = /[\u0000-\u001f\u007f]/g
const MAX_FILENAME_LENGTH = 255
const MAX_EXTENSION_LENGTH = 16

/**
 * Split a file name into stem and extension (extension keeps its dot).
 * Names without a dot, or whose only dot is the first character, have no extension.
 */
export function splitExtension(name: string): [stem: string, ext: string] {
  const dot = name.lastIndexOf('.')
  if (dot <= 0) return [name, '']
  return [name.slice(0, dot), name.slice(dot)]
}

/**
 * Turn an arbitrary title into a file name that is safe on every platform.
 *
 * Reserved and control characters are dropped, whitespace runs become a single
 * underscore, leading and trailing dots are stripped and the result is capped at
 * 255 characters with the extension preserved. Everything else (case, unicode,
 * punctuation) is kept so the name stays recognisable.
 */
export function sanitizeFilename(input: string): string {
  let name = input
    .replace(CONTROL_CHARS, '')
    .trim()
    .replace(RESERVED_CHARS, '')
    .replace(/\s+/g, '_')
    .replace(/^[.]+/, '')
    .replace(/[.]+$/, '')

  if (name.length > MAX_FILENAME_LENGTH) {
    const [stem, ext] = splitExtension(name)
    name = ext.length > 0 && ext.length <= MAX_EXTENSION_LENGTH
      ? stem.slice(0, MAX_FILENAME_LENGTH - ext.length) + ext
      : name.slice(0, MAX_FILENAME_LENGTH)
    name = name.replace(/[.]+$/, '')
  }

  return name.length > 0 ? name : 'untitled'
}

/** Extract http(s) URLs from free text, de-duplicated in order of appearance. */
export function extractUrls(text: string): string[] {
  const matches = text.match(/https?:\/\/[^\s<>"'()[\]{}]+/g) ?? []
  const seen = new Set<string>()
  const urls: string[] = []
  for (const raw of matches) {
    const url = raw.replace(/[.,;:!?]+$/, '')
    if (!seen.has(url)) {
      seen.add(url)
      urls.push(url)
    }
  }
  return urls
}

/** Format seconds as HH:MM:SS. Negative input is treated as zero. */
export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds))
  const h = Math.floor(total / 3600)
  const m = Math.floor((total % 3600) / 60)
  const s = total % 60
  return [h, m, s].map((n) => String(n).padStart(2, '0')).join(':')
}

/** Convert yt-dlp's YYYYMMDD to YYYY-MM-DD. Anything else is returned unchanged. */
export function formatDate(yyyymmdd: string): string {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(yyyymmdd)
  if (!match) return yyyymmdd
  return `${match[1]}-${match[2]}-${match[3]}`
}

/** Format an integer with thousands separators (1234567 → "1,234,567"). */
export function formatCount(n: number): string {
  return String(Math.trunc(n)).replace(/\B(?=(\d{3})+(?!\d))/g, ',')
}

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB']

/** Human-readable size: 512 → "512 B", 1536 → "1.5 KB". */
export function formatBytes(bytes: number): string {
  let value = Math.max(0, bytes)
  let unit = 0
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024
    unit++
  }
  return unit === 0 ? `${value} ${BYTE_UNITS[unit]}` : `${value.toFixed(1)} ${BYTE_UNITS[unit]}`
}

/** Collapse all whitespace runs to single spaces. */
export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim()
}

/**
 * First `maxChars` of the text on a word boundary, with an ellipsis when cut.
 */
export function excerpt(text: string, maxChars = 600): string {
  const flat = collapseWhitespace(text)
  if (flat.length <= maxChars) return flat
  const cut = flat.slice(0, maxChars)
  const lastSpace = cut.lastIndexOf(' ')
  return (lastSpace > 0 ? cut.slice(0, lastSpace) : cut) + '…'
}

/** Title derived from the first non-empty line, capped at `maxChars`. */
export function firstLineTitle(text: string, maxChars = 50): string {
  const line = text.split(/\r?\n/).map((l) => l.trim()).find((l) => l.length > 0)
  return line ? line.slice(0, maxChars).trim() : 'ClipboardContent'
}

/**
 * Split text into chunks no longer than `maxChars`, preferring sentence
 * boundaries, then word boundaries, then a hard cut.
 */
export function splitForSpeech(text: string, maxChars: number): string[] {
  const flat = collapseWhitespace(text)
  if (flat.length === 0) return []
  if (flat.length <= maxChars) return [flat]

  const pieces: string[] = []
  for (const sentence of flat.split(/(?<=[.!?])\s+/)) {
    if (sentence.length <= maxChars) {
      pieces.push(sentence)
      continue
    }
    for (const word of sentence.split(' ')) {
      if (word.length <= maxChars) {
        pieces.push(word)
      } else {
        for (let i = 0; i < word.length; i += maxChars) pieces.push(word.slice(i, i + maxChars))
      }
    }
  }

  const chunks: string[] = []
  let current = ''
  for (const piece of pieces) {
    if (current.length === 0) {
      current = piece
    } else if (current.length + 1 + piece.length <= maxChars) {
      current += ' ' + piece
    } else {
      chunks.push(current)
      current = piece
    }
  }
  if (current.length > 0) chunks.push(current)
  return chunks
}
