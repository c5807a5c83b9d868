import { createOpenAI } from '../llm/ai.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import type { TtsProvider } from './types.js'

/** OpenAI speech endpoint (`audio.speech.create`), MP3 output. */
export class OpenAITtsProvider implements TtsProvider {
  readonly name = 'openai'
  readonly maxInputChars = 4096

  isAvailable(): boolean {
    return !!getConfig().OPENAI_API_KEY
  }

  async synthesize(text: string): Promise<Buffer> {
    const config = getConfig()
    const client = createOpenAI({ apiKey: config.OPENAI_API_KEY })
    const response = await client.audio.speech.create({
      model: config.OPENAI_TTS_MODEL,
      voice: config.OPENAI_TTS_VOICE,
      input: text,
      response_format: 'mp3',
    })
    return Buffer.from(await response.arrayBuffer())
  }
}
