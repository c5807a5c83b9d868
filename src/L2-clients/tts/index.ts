import type { TtsProvider } from './types.js'
import { OpenAITtsProvider } from './OpenAITtsProvider.js'
import { ElevenLabsTtsProvider } from './ElevenLabsTtsProvider.js'
import logger, { sanitizeForLog } from '../../L1-infra/logger/configLogger.js'

const registry: Record<string, () => TtsProvider> = {
  openai: () => new OpenAITtsProvider(),
  elevenlabs: () => new ElevenLabsTtsProvider(),
}

export const TTS_PROVIDER_NAMES = Object.keys(registry)

/** Build the ordered fallback chain from provider names. Unknown names are skipped. */
export function createTtsChain(names: string[]): TtsProvider[] {
  const chain: TtsProvider[] = []
  for (const name of names) {
    const factory = registry[name]
    if (!factory) {
      logger.warn(`Unknown TTS provider "${sanitizeForLog(name)}" (known: ${TTS_PROVIDER_NAMES.join(', ')})`)
      continue
    }
    chain.push(factory())
  }
  return chain
}

export type { TtsProvider } from './types.js'
export { OpenAITtsProvider } from './OpenAITtsProvider.js'
export { ElevenLabsTtsProvider } from './ElevenLabsTtsProvider.js'
