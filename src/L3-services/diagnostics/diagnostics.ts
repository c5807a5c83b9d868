/**
 * L3 service wrapper for external tool probes.
 *
 * Wraps L2 version checks so that L7 (and higher layers) can report on
 * yt-dlp and fabric without importing L2 directly.
 */
import { ytDlpVersion as _ytDlpVersion } from '../../L2-clients/youtube/ytDlp.js'
import { fabricVersion as _fabricVersion } from '../../L2-clients/fabric/fabricClient.js'
import { createTtsChain as _createTtsChain } from '../../L2-clients/tts/index.js'

export function ytDlpVersion(...args: Parameters<typeof _ytDlpVersion>): ReturnType<typeof _ytDlpVersion> {
  return _ytDlpVersion(...args)
}

export function fabricVersion(...args: Parameters<typeof _fabricVersion>): ReturnType<typeof _fabricVersion> {
  return _fabricVersion(...args)
}

/** Names of the configured speech providers that have credentials. */
export function availableSpeechProviders(names: string[]): string[] {
  return _createTtsChain(names).filter((p) => p.isAvailable()).map((p) => p.name)
}
