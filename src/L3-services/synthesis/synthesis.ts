import { createTtsChain } from '../../L2-clients/tts/index.js'
import type { TtsProvider } from '../../L2-clients/tts/index.js'
import { sha256 } from '../../L1-infra/hash/hash.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { parseOptionalDuration } from '../../L0-pure/duration/duration.js'
import { splitForSpeech } from '../../L0-pure/text/text.js'
import { SynthesisUnavailableError, ValidationError, errorMessage } from '../../L0-pure/errors/errors.js'
import type { Artifact, SynthesisAttempt, SynthesisResult } from '../../L0-pure/types/index.js'
import { cacheKeys } from '../cache/artifactCache.js'
import type { StorageContext } from '../artifactStore/storageContext.js'

export interface SynthesizeOptions {
  /** `audio` for kept summaries, `temp` for runs that do not save. */
  category?: 'audio' | 'temp'
  useCache?: boolean
  /** Provider chain override; defaults to TTS_PROVIDERS. */
  providers?: TtsProvider[]
  /** Called with the audio artifact as soon as it is written. */
  onArtifact?: (artifact: Artifact) => void
}

/** Speak `text` with one provider, splitting it to fit the provider's input limit. */
async function speakWith(provider: TtsProvider, text: string): Promise<Buffer> {
  const chunks = splitForSpeech(text, provider.maxInputChars)
  const parts: Buffer[] = []
  for (const chunk of chunks) {
    parts.push(await provider.synthesize(chunk))
  }
  const audio = Buffer.concat(parts)
  if (audio.length === 0) throw new Error('empty audio response')
  return audio
}

/**
 * Turn `text` into an MP3 artifact named `<name>.mp3`.
 *
 * Providers are tried in order; one without credentials or one that fails is
 * logged and the next is tried. When every provider fails the error lists
 * each attempt.
 */
export async function synthesize(
  ctx: StorageContext,
  text: string,
  name: string,
  options: SynthesizeOptions = {},
): Promise<SynthesisResult> {
  if (text.trim().length === 0) {
    throw new ValidationError('Nothing to synthesize: text is empty')
  }
  const config = getConfig()
  const category = options.category ?? 'audio'
  const key = cacheKeys.audio(sha256(text))

  if (options.useCache && category === 'audio') {
    const hit = await ctx.cache.lookupEntry(key, { maxAgeMs: parseOptionalDuration(config.AUDIO_CACHE_TTL) })
    if (hit) {
      logger.info(`[Synthesis] Using cached audio ${hit.artifact.name}`)
      return { artifact: hit.artifact, provider: hit.entry.meta?.provider ?? 'cache', attempts: [], fromCache: true }
    }
  }

  const chain = options.providers ?? createTtsChain(config.TTS_PROVIDERS)
  const attempts: SynthesisAttempt[] = []

  for (const provider of chain) {
    if (!provider.isAvailable()) {
      logger.warn(`[Synthesis] ${provider.name} is not configured, skipping`)
      attempts.push({ provider: provider.name, ok: false, error: 'not configured' })
      continue
    }
    let audio: Buffer
    try {
      audio = await speakWith(provider, text)
    } catch (err: unknown) {
      logger.warn(`[Synthesis] ${provider.name} failed: ${errorMessage(err)}`)
      attempts.push({ provider: provider.name, ok: false, error: errorMessage(err) })
      continue
    }
    attempts.push({ provider: provider.name, ok: true })

    const artifact = await ctx.store.save(category, `${name}.mp3`, audio)
    options.onArtifact?.(artifact)
    if (category === 'audio') {
      await ctx.cache.put(key, artifact, { provider: provider.name })
    }
    logger.info(`[Synthesis] Wrote ${artifact.name} with ${provider.name}`)
    return { artifact, provider: provider.name, attempts, fromCache: false }
  }

  throw new SynthesisUnavailableError(attempts)
}
