/**
 * OpenAI Provider: wraps the OpenAI SDK behind the LLMProvider interface.
 *
 * One chat completion per message; the conversation is kept so follow-ups
 * see earlier turns.
 */

import { createOpenAI } from './ai.js'
import type { OpenAI, ChatCompletion, ChatCompletionMessageParam } from './ai.js'
import type { LLMProvider, LLMSession, LLMResponse, SessionConfig, TokenUsage } from './types.js'
import { toProviderError } from './providerErrors.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { getConfig } from '../../L1-infra/config/environment.js'

const DEFAULT_MODEL = 'gpt-4o'

class OpenAISession implements LLMSession {
  private messages: ChatCompletionMessageParam[]

  constructor(
    private readonly client: OpenAI,
    private readonly model: string,
    private readonly config: SessionConfig,
  ) {
    this.messages = [{ role: 'system', content: config.systemPrompt }]
  }

  async sendAndWait(message: string): Promise<LLMResponse> {
    this.messages.push({ role: 'user', content: message })
    const start = Date.now()

    let response: ChatCompletion
    try {
      response = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: this.messages,
          stream: false,
          ...(this.config.maxTokens ? { max_tokens: this.config.maxTokens } : {}),
        },
        this.config.timeoutMs ? { timeout: this.config.timeoutMs } : undefined,
      )
    } catch (err: unknown) {
      throw toProviderError(err, 'openai')
    }

    const content = response.choices[0]?.message.content ?? ''
    this.messages.push({ role: 'assistant', content })

    const usage: TokenUsage = {
      inputTokens: response.usage?.prompt_tokens ?? 0,
      outputTokens: response.usage?.completion_tokens ?? 0,
      totalTokens: response.usage?.total_tokens ?? 0,
    }
    logger.debug(`OpenAI usage: ${usage.inputTokens} in / ${usage.outputTokens} out`)

    return { content, usage, durationMs: Date.now() - start }
  }

  async close(): Promise<void> {
    this.messages = []
  }
}

export class OpenAIProvider implements LLMProvider {
  readonly name = 'openai' as const

  isAvailable(): boolean {
    return !!getConfig().OPENAI_API_KEY
  }

  getDefaultModel(): string {
    return DEFAULT_MODEL
  }

  async createSession(config: SessionConfig): Promise<LLMSession> {
    // Throttling is retried by the pipeline, not inside the SDK
    const client = createOpenAI({ apiKey: getConfig().OPENAI_API_KEY, maxRetries: 0 })
    const model = config.model ?? this.getDefaultModel()
    logger.debug(`OpenAI session created (model=${model})`)
    return new OpenAISession(client, model, config)
  }
}
