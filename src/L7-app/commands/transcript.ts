import { createStorageContext } from '../../L3-services/artifactStore/storageContext.js'
import type { StorageContext } from '../../L3-services/artifactStore/storageContext.js'
import { getTranscript, getVideoMetadata, downloadVideo } from '../../L3-services/acquisition/acquisition.js'
import type { MediaFormat } from '../../L3-services/acquisition/acquisition.js'
import { parseSourceRef } from '../../L0-pure/youtube/youtube.js'
import { InvalidReferenceError } from '../../L0-pure/errors/errors.js'
import type { SourceRef } from '../../L0-pure/types/index.js'
import type { TranscriptOutputFormat } from './options.js'

type VideoRef = Extract<SourceRef, { kind: 'video' }>

function videoRef(input: string): VideoRef {
  const ref = parseSourceRef(input)
  if (ref.kind !== 'video') {
    throw new InvalidReferenceError(input, `Expected a YouTube URL or video id, got: ${input}`)
  }
  return ref
}

export interface TranscriptCommandOptions {
  format: TranscriptOutputFormat
  save: boolean
  cache: boolean
}

/** `augments transcript`: print a video's transcript; `json` wraps the plain text. */
export async function runTranscript(
  input: string,
  opts: TranscriptCommandOptions,
  ctx: StorageContext = createStorageContext(),
): Promise<number> {
  const ref = videoRef(input)
  const format = opts.format === 'json' ? 'txt' : opts.format
  const transcript = await getTranscript(ctx, ref, { format, save: opts.save, useCache: opts.cache })

  if (opts.format === 'json') {
    console.log(JSON.stringify({ id: ref.videoId, title: transcript.metadata.title, transcript: transcript.text }, null, 2))
  } else {
    console.log(transcript.content)
  }
  return 0
}

/** `augments info`: print video metadata as JSON. */
export async function runInfo(
  input: string,
  opts: { cache: boolean },
  ctx: StorageContext = createStorageContext(),
): Promise<number> {
  const metadata = await getVideoMetadata(ctx, videoRef(input), { save: false, useCache: opts.cache })
  console.log(JSON.stringify(metadata, null, 2))
  return 0
}

/** `augments download`: fetch the media file into `downloads/` and print its path. */
export async function runDownload(
  input: string,
  opts: { format: MediaFormat },
  ctx: StorageContext = createStorageContext(),
): Promise<number> {
  const artifact = await downloadVideo(ctx, videoRef(input), opts.format)
  console.log(artifact.path)
  return 0
}
