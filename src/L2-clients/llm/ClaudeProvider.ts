/**
 * Claude (Anthropic) LLM Provider
 *
 * Wraps the Anthropic Messages API behind the LLMProvider interface.
 */

import { createAnthropic } from './ai.js'
import type { Anthropic, MessageParam, TextBlock } from './ai.js'
import type { LLMProvider, LLMSession, LLMResponse, SessionConfig, TokenUsage } from './types.js'
import { toProviderError } from './providerErrors.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { getConfig } from '../../L1-infra/config/environment.js'

const DEFAULT_MODEL = 'claude-sonnet-4-20250514'
const DEFAULT_MAX_TOKENS = 8192

class ClaudeSession implements LLMSession {
  private messages: MessageParam[] = []

  constructor(
    private readonly client: Anthropic,
    private readonly model: string,
    private readonly config: SessionConfig,
  ) {}

  async sendAndWait(message: string): Promise<LLMResponse> {
    this.messages.push({ role: 'user', content: message })
    const start = Date.now()

    let response: Anthropic.Messages.Message
    try {
      response = await this.client.messages.create(
        {
          model: this.model,
          max_tokens: this.config.maxTokens ?? DEFAULT_MAX_TOKENS,
          system: this.config.systemPrompt,
          messages: this.messages,
        },
        this.config.timeoutMs ? { timeout: this.config.timeoutMs } : undefined,
      )
    } catch (err: unknown) {
      throw toProviderError(err, 'claude')
    }

    this.messages.push({ role: 'assistant', content: response.content })

    const content = response.content
      .filter((b): b is TextBlock => b.type === 'text')
      .map((b) => b.text)
      .join('')
    const usage: TokenUsage = {
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens,
      totalTokens: response.usage.input_tokens + response.usage.output_tokens,
    }
    logger.debug(`Claude usage: ${usage.inputTokens} in / ${usage.outputTokens} out`)

    return { content, usage, durationMs: Date.now() - start }
  }

  async close(): Promise<void> {
    this.messages = []
  }
}

export class ClaudeProvider implements LLMProvider {
  readonly name = 'claude' as const

  isAvailable(): boolean {
    return !!getConfig().ANTHROPIC_API_KEY
  }

  getDefaultModel(): string {
    return DEFAULT_MODEL
  }

  async createSession(config: SessionConfig): Promise<LLMSession> {
    const client = createAnthropic({ apiKey: getConfig().ANTHROPIC_API_KEY, maxRetries: 0 })
    const model = config.model ?? this.getDefaultModel()
    logger.debug(`Claude session created (model=${model})`)
    return new ClaudeSession(client, model, config)
  }
}
