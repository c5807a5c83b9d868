import { createElevenLabs } from '../llm/ai.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import { audioLikeToBuffer } from './audioBuffer.js'
import type { TtsProvider } from './types.js'

/** ElevenLabs text-to-speech, 44.1 kHz / 128 kbps MP3. */
export class ElevenLabsTtsProvider implements TtsProvider {
  readonly name = 'elevenlabs'
  readonly maxInputChars = 5000

  isAvailable(): boolean {
    return !!getConfig().ELEVENLABS_API_KEY
  }

  async synthesize(text: string): Promise<Buffer> {
    const config = getConfig()
    const client = createElevenLabs({ apiKey: config.ELEVENLABS_API_KEY })
    const audio: unknown = await client.textToSpeech.convert(config.ELEVENLABS_VOICE_ID, {
      text,
      modelId: config.ELEVENLABS_MODEL_ID,
      outputFormat: 'mp3_44100_128',
    })
    return audioLikeToBuffer(audio)
  }
}
