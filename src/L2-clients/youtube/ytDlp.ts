import { z } from 'zod'
import { execCommand, spawnCommand, ProcessError } from '../../L1-infra/process/process.js'
import { fetchText } from '../../L1-infra/http/httpClient.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'
import { SourceUnavailableError, errorMessage } from '../../L0-pure/errors/errors.js'
import type { VideoMetadata } from '../../L0-pure/types/index.js'

// ─── yt-dlp info JSON (only the fields we read) ─────────────

const CaptionTrackSchema = z.object({
  ext: z.string(),
  url: z.string().optional(),
  name: z.string().optional(),
})
export type CaptionTrack = z.infer<typeof CaptionTrackSchema>

const TrackMapSchema = z.record(z.string(), z.array(CaptionTrackSchema)).nullish()

export const YtDlpInfoSchema = z.object({
  id: z.string(),
  title: z.string().nullish(),
  uploader: z.string().nullish(),
  channel: z.string().nullish(),
  duration: z.number().nullish(),
  view_count: z.number().nullish(),
  upload_date: z.string().nullish(),
  description: z.string().nullish(),
  webpage_url: z.string().nullish(),
  subtitles: TrackMapSchema,
  automatic_captions: TrackMapSchema,
})
export type YtDlpInfo = z.infer<typeof YtDlpInfoSchema>

export interface SelectedCaption {
  language: string
  ext: 'vtt' | 'srt'
  url: string
  /** True when the track is YouTube's automatic speech recognition. */
  automatic: boolean
}

export type MediaFormat = 'mp4' | 'webm' | 'audio'

export const MEDIA_FORMATS: readonly MediaFormat[] = ['mp4', 'webm', 'audio'] as const

const FORMAT_ARGS: Record<MediaFormat, string[]> = {
  mp4: ['-f', 'bv*[ext=mp4]+ba[ext=m4a]/b[ext=mp4]/b', '--merge-output-format', 'mp4'],
  webm: ['-f', 'bv*[ext=webm]+ba[ext=webm]/b[ext=webm]/b'],
  audio: ['-x', '--audio-format', 'mp3'],
}

function ytDlpPath(): string {
  return getConfig().YT_DLP_PATH
}

function unavailable(action: string, err: unknown): SourceUnavailableError {
  if (err instanceof ProcessError && err.notFound) {
    return new SourceUnavailableError(
      `yt-dlp not found at "${err.command}". Install it or set YT_DLP_PATH.`,
      { cause: err },
    )
  }
  return new SourceUnavailableError(`${action}: ${errorMessage(err)}`, { cause: err })
}

/** Convert yt-dlp info into the metadata shape the pipeline uses. */
export function toVideoMetadata(info: YtDlpInfo): VideoMetadata {
  return {
    id: info.id,
    title: info.title ?? info.id,
    author: info.uploader ?? info.channel ?? 'Unknown',
    duration: info.duration ?? 0,
    viewCount: info.view_count ?? 0,
    uploadDate: info.upload_date ?? '',
    description: info.description ?? '',
    url: info.webpage_url ?? `https://www.youtube.com/watch?v=${info.id}`,
  }
}

/** Run `yt-dlp --dump-json --skip-download` and validate the result. */
export async function fetchVideoInfo(url: string): Promise<YtDlpInfo> {
  logger.debug(`yt-dlp info: ${sanitizeForLog(url)}`)
  let stdout: string
  try {
    ({ stdout } = await execCommand(ytDlpPath(), ['--dump-json', '--skip-download', '--no-warnings', '--no-playlist', url]))
  } catch (err: unknown) {
    throw unavailable(`Could not fetch video info for ${url}`, err)
  }

  let json: unknown
  try {
    json = JSON.parse(stdout)
  } catch (err: unknown) {
    throw new SourceUnavailableError(`yt-dlp returned invalid JSON for ${url}`, { cause: err })
  }

  const parsed = YtDlpInfoSchema.safeParse(json)
  if (!parsed.success) {
    throw new SourceUnavailableError(`Unexpected yt-dlp output for ${url}: ${parsed.error.message}`)
  }
  return parsed.data
}

function pickTrack(
  tracks: Record<string, CaptionTrack[]> | null | undefined,
  language: string,
  automatic: boolean,
): SelectedCaption | undefined {
  if (!tracks) return undefined
  const wanted = language.toLowerCase()
  const languages = Object.keys(tracks)
  // exact match first, then regional variants ("en" → "en-US", "en-GB")
  const candidates = [
    ...languages.filter((l) => l.toLowerCase() === wanted),
    ...languages.filter((l) => l.toLowerCase().startsWith(`${wanted}-`)),
  ]
  for (const lang of candidates) {
    for (const ext of ['vtt', 'srt'] as const) {
      const track = tracks[lang].find((t) => t.ext === ext && t.url)
      if (track?.url) return { language: lang, ext, url: track.url, automatic }
    }
  }
  return undefined
}

/**
 * Choose the caption track to download: manual subtitles before automatic
 * captions, WebVTT before SRT.
 */
export function selectCaptionTrack(info: YtDlpInfo, language: string): SelectedCaption | undefined {
  return pickTrack(info.subtitles, language, false) ?? pickTrack(info.automatic_captions, language, true)
}

/** Download a caption track's raw text. */
export async function downloadCaption(track: SelectedCaption): Promise<string> {
  try {
    return await fetchText(track.url)
  } catch (err: unknown) {
    throw new SourceUnavailableError(`Caption download failed: ${errorMessage(err)}`, { cause: err })
  }
}

/**
 * Download media into `outputDir`. Returns the path of the final file
 * (after merging or audio extraction).
 */
export async function downloadMedia(url: string, format: MediaFormat, outputDir: string): Promise<string> {
  const args = [
    ...FORMAT_ARGS[format],
    '--no-playlist',
    '--no-warnings',
    '--restrict-filenames',
    '-o', `${outputDir}/%(title)s [%(id)s].%(ext)s`,
    '--print', 'after_move:filepath',
    url,
  ]
  logger.info(`Downloading ${format}: ${sanitizeForLog(url)}`)
  let stdout: string
  try {
    ({ stdout } = await execCommand(ytDlpPath(), args))
  } catch (err: unknown) {
    throw unavailable(`Download failed for ${url}`, err)
  }
  const lines = stdout.split(/\r?\n/).map((l) => l.trim()).filter((l) => l.length > 0)
  const filePath = lines[lines.length - 1]
  if (!filePath) {
    throw new SourceUnavailableError(`yt-dlp did not report a downloaded file for ${url}`)
  }
  return filePath
}

/** Installed yt-dlp version, or undefined when it cannot be run. */
export function ytDlpVersion(): string | undefined {
  const result = spawnCommand(ytDlpPath(), ['--version'], { timeout: 10_000 })
  if (result.error || result.status !== 0) return undefined
  return result.stdout.trim()
}
