import { InvalidReferenceError } from '../errors/errors.js'
import type { SourceRef } from '../types/index.js'

const VIDEO_ID = /^[A-Za-z0-9_-]{11}$/
const YOUTUBE_HOSTS = new Set([
  'youtube.com',
  'www.youtube.com',
  'm.youtube.com',
  'music.youtube.com',
  'youtube-nocookie.com',
  'www.youtube-nocookie.com',
])
const PATH_PREFIXES = ['embed', 'shorts', 'live', 'v']

export function isVideoId(value: string): boolean {
  return VIDEO_ID.test(value)
}

/** Canonical watch URL for a video id. */
export function videoUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`
}

function parseUrl(input: string): URL | undefined {
  const withScheme = /^[a-z][a-z0-9+.-]*:\/\//i.test(input) ? input : `https://${input}`
  try {
    return new URL(withScheme)
  } catch {
    return undefined
  }
}

/**
 * Extract the 11-character video id from a YouTube URL or a bare id.
 * Returns undefined for anything that is not recognisably a YouTube video.
 */
export function extractVideoId(input: string): string | undefined {
  const trimmed = input.trim()
  if (isVideoId(trimmed)) return trimmed

  const url = parseUrl(trimmed)
  if (!url) return undefined
  const host = url.hostname.toLowerCase()

  let candidate: string | null | undefined
  if (host === 'youtu.be' || host === 'www.youtu.be') {
    candidate = url.pathname.split('/')[1]
  } else if (YOUTUBE_HOSTS.has(host)) {
    const segments = url.pathname.split('/').filter(Boolean)
    if (segments[0] === 'watch') {
      candidate = url.searchParams.get('v')
    } else if (segments.length >= 2 && PATH_PREFIXES.includes(segments[0])) {
      candidate = segments[1]
    } else {
      candidate = url.searchParams.get('v')
    }
  }

  return candidate && isVideoId(candidate) ? candidate : undefined
}

/**
 * Parse user input into a source reference.
 * `clipboard` and `-` select the clipboard; YouTube URLs and bare ids select a video.
 */
export function parseSourceRef(input: string, options: { title?: string } = {}): SourceRef {
  const trimmed = input.trim()
  if (trimmed === 'clipboard' || trimmed === '-') {
    return options.title ? { kind: 'clipboard', title: options.title } : { kind: 'clipboard' }
  }
  const videoId = extractVideoId(trimmed)
  if (!videoId) {
    throw new InvalidReferenceError(trimmed, `Not a YouTube URL or video id: ${trimmed}`)
  }
  return { kind: 'video', videoId, url: videoUrl(videoId) }
}
