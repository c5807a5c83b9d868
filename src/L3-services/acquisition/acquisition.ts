import { z } from 'zod'
import {
  fetchVideoInfo,
  selectCaptionTrack,
  downloadCaption,
  downloadMedia,
  toVideoMetadata,
} from '../../L2-clients/youtube/ytDlp.js'
import type { MediaFormat } from '../../L2-clients/youtube/ytDlp.js'
import { readClipboard } from '../../L2-clients/clipboard/clipboard.js'
import { basename } from '../../L1-infra/paths/paths.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'
import { convertCaptions, transcriptToText } from '../../L0-pure/captions/captions.js'
import { parseOptionalDuration } from '../../L0-pure/duration/duration.js'
import { firstLineTitle } from '../../L0-pure/text/text.js'
import { SourceUnavailableError, errorMessage } from '../../L0-pure/errors/errors.js'
import type {
  AcquiredSource,
  Artifact,
  SourceRef,
  TranscriptFormat,
  VideoMetadata,
} from '../../L0-pure/types/index.js'
import { cacheKeys } from '../cache/artifactCache.js'
import type { StorageContext } from '../artifactStore/storageContext.js'

export { MEDIA_FORMATS } from '../../L2-clients/youtube/ytDlp.js'
export type { MediaFormat } from '../../L2-clients/youtube/ytDlp.js'

type VideoRef = Extract<SourceRef, { kind: 'video' }>
type ClipboardRef = Extract<SourceRef, { kind: 'clipboard' }>

export interface AcquireOptions {
  format: TranscriptFormat
  /** Persist the transcript and metadata (and record them in the cache). */
  save: boolean
  /** Consult the cache before fetching. */
  useCache: boolean
  /** Called for each artifact as soon as it is written. */
  onArtifact?: (artifact: Artifact) => void
}

/** A transcript in the requested format plus its plain text. */
export interface VideoTranscript {
  content: string
  text: string
  metadata: VideoMetadata
  artifact?: Artifact
  fromCache: boolean
}

const VideoMetadataSchema = z.object({
  id: z.string(),
  title: z.string(),
  author: z.string(),
  duration: z.number(),
  viewCount: z.number(),
  uploadDate: z.string(),
  description: z.string(),
  url: z.string(),
})

function transcriptTtl(): number | undefined {
  return parseOptionalDuration(getConfig().TRANSCRIPT_CACHE_TTL)
}

async function cachedMetadata(ctx: StorageContext, videoId: string): Promise<VideoMetadata | undefined> {
  const key = cacheKeys.metadata(videoId)
  const artifact = await ctx.cache.lookup(key, { maxAgeMs: transcriptTtl() })
  if (!artifact) return undefined
  let problem: string
  try {
    const parsed = VideoMetadataSchema.safeParse(JSON.parse(await ctx.store.loadText(artifact.category, artifact.name)))
    if (parsed.success) return parsed.data
    problem = parsed.error.message
  } catch (err: unknown) {
    problem = errorMessage(err)
  }
  logger.warn(`[Acquisition] Cached metadata for ${videoId} is unreadable (${problem}), refetching`)
  await ctx.cache.invalidate(key)
  return undefined
}

/**
 * Video metadata, from the cache when allowed, otherwise from yt-dlp
 * (persisted as `<id>.info.json` when `save` is set).
 */
export async function getVideoMetadata(
  ctx: StorageContext,
  ref: VideoRef,
  options: Pick<AcquireOptions, 'save' | 'useCache' | 'onArtifact'>,
): Promise<VideoMetadata> {
  if (options.useCache) {
    const cached = await cachedMetadata(ctx, ref.videoId)
    if (cached) return cached
  }
  const metadata = toVideoMetadata(await fetchVideoInfo(ref.url))
  if (options.save) {
    const artifact = await ctx.store.save('transcript', `${ref.videoId}.info.json`, JSON.stringify(metadata, null, 2), { overwrite: true })
    options.onArtifact?.(artifact)
    await ctx.cache.put(cacheKeys.metadata(ref.videoId), artifact)
  }
  return metadata
}

/**
 * Fetch a video's transcript in `format`.
 *
 * Cache hits need both the transcript and the metadata entries. On a miss,
 * yt-dlp supplies metadata and the caption track list, the chosen track is
 * downloaded and converted, and, when saving, both are stored under
 * `transcripts/` and cached.
 */
export async function getTranscript(ctx: StorageContext, ref: VideoRef, options: AcquireOptions): Promise<VideoTranscript> {
  const { videoId } = ref
  const transcriptKey = cacheKeys.transcript(videoId, options.format)

  if (options.useCache) {
    const artifact = await ctx.cache.lookup(transcriptKey, { maxAgeMs: transcriptTtl() })
    const metadata = artifact ? await cachedMetadata(ctx, videoId) : undefined
    if (artifact && metadata) {
      logger.info(`[Acquisition] Using cached transcript for ${videoId}`)
      const content = await ctx.store.loadText(artifact.category, artifact.name)
      return { content, text: transcriptToText(content, options.format), metadata, artifact, fromCache: true }
    }
  }

  logger.info(`[Acquisition] Fetching transcript for ${videoId}`)
  const info = await fetchVideoInfo(ref.url)
  const metadata = toVideoMetadata(info)
  const language = getConfig().CAPTION_LANGUAGE
  const track = selectCaptionTrack(info, language)
  if (!track) {
    throw new SourceUnavailableError(`No ${language} captions available for ${videoId}`)
  }
  logger.debug(`[Acquisition] Using ${track.automatic ? 'automatic' : 'manual'} ${track.language} ${track.ext} captions`)

  const raw = await downloadCaption(track)
  const content = convertCaptions(raw, track.ext, options.format)
  const text = transcriptToText(content, options.format)

  let artifact: Artifact | undefined
  if (options.save) {
    artifact = await ctx.store.save('transcript', `${videoId}.${options.format}`, content, { overwrite: true })
    options.onArtifact?.(artifact)
    const metaArtifact = await ctx.store.save('transcript', `${videoId}.info.json`, JSON.stringify(metadata, null, 2), { overwrite: true })
    options.onArtifact?.(metaArtifact)
    await ctx.cache.put(transcriptKey, artifact, { language: track.language, automatic: String(track.automatic) })
    await ctx.cache.put(cacheKeys.metadata(videoId), metaArtifact)
  }

  return { content, text, metadata, artifact, fromCache: false }
}

async function acquireClipboard(ref: ClipboardRef): Promise<AcquiredSource> {
  const text = (await readClipboard()).trim()
  if (text.length === 0) {
    throw new SourceUnavailableError('Clipboard is empty')
  }
  const title = ref.title?.trim() || firstLineTitle(text)
  logger.info(`[Acquisition] Read ${text.length} characters from the clipboard`)
  return { ref, text, title, fromCache: false }
}

/** Acquisition stage: turn a source reference into normalised text. */
export async function acquire(ctx: StorageContext, ref: SourceRef, options: AcquireOptions): Promise<AcquiredSource> {
  if (ref.kind === 'clipboard') return acquireClipboard(ref)

  const transcript = await getTranscript(ctx, ref, options)
  return {
    ref,
    text: transcript.text,
    title: transcript.metadata.title,
    metadata: transcript.metadata,
    artifact: transcript.artifact,
    fromCache: transcript.fromCache,
  }
}

/**
 * Download a video into `temp/` with yt-dlp, then commit the file to
 * `downloads/`.
 */
export async function downloadVideo(ctx: StorageContext, ref: VideoRef, format: MediaFormat): Promise<Artifact> {
  const tempDir = ctx.store.categoryDir('temp')
  const filePath = await downloadMedia(ref.url, format, tempDir)
  logger.info(`[Acquisition] Downloaded ${sanitizeForLog(basename(filePath))}`)
  return ctx.store.saveFile('download', basename(filePath), filePath)
}
