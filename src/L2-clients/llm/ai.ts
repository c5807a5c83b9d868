import { OpenAI as _OpenAI } from '../../L1-infra/ai/openai.js'
import { Anthropic as _Anthropic } from '../../L1-infra/ai/anthropic.js'
import { ElevenLabsClient as _ElevenLabsClient } from '../../L1-infra/ai/elevenlabs.js'

export type { OpenAI } from '../../L1-infra/ai/openai.js'
export type { ChatCompletion, ChatCompletionMessageParam } from '../../L1-infra/ai/openai.js'
export type { Anthropic, MessageParam, TextBlock } from '../../L1-infra/ai/anthropic.js'
export type { ElevenLabsClient } from '../../L1-infra/ai/elevenlabs.js'

export function createOpenAI(...args: ConstructorParameters<typeof _OpenAI>): InstanceType<typeof _OpenAI> {
  return new _OpenAI(...args)
}

export function createAnthropic(...args: ConstructorParameters<typeof _Anthropic>): InstanceType<typeof _Anthropic> {
  return new _Anthropic(...args)
}

export function createElevenLabs(
  ...args: ConstructorParameters<typeof _ElevenLabsClient>
): InstanceType<typeof _ElevenLabsClient> {
  return new _ElevenLabsClient(...args)
}
