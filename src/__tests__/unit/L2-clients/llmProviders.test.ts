import { describe, it, expect, vi, beforeEach } from 'vitest'

const config = vi.hoisted(() => ({ OPENAI_API_KEY: '', ANTHROPIC_API_KEY: '' }))
vi.mock('../../../L1-infra/config/environment.js', () => ({
  getConfig: () => config,
}))

const mockChatCreate = vi.hoisted(() => vi.fn())
const mockMessagesCreate = vi.hoisted(() => vi.fn())
const mockCreateOpenAI = vi.hoisted(() => vi.fn())
vi.mock('../../../L2-clients/llm/ai.js', () => ({
  createOpenAI: mockCreateOpenAI,
  createAnthropic: () => ({ messages: { create: mockMessagesCreate } }),
}))

import { getProvider, resetProvider, OpenAIProvider, ClaudeProvider } from '../../../L2-clients/llm/index.js'
import { AnalysisProviderError, RateLimitedError } from '../../../L0-pure/errors/errors.js'

beforeEach(() => {
  config.OPENAI_API_KEY = 'test-secret'
  config.ANTHROPIC_API_KEY = 'test-secret'
  resetProvider()
  mockChatCreate.mockReset()
  mockMessagesCreate.mockReset()
  mockCreateOpenAI.mockReset()
  mockCreateOpenAI.mockReturnValue({ chat: { completions: { create: mockChatCreate } } })
})

describe('getProvider', () => {
  it('caches the provider per name', () => {
    const first = getProvider('openai')
    expect(getProvider('openai')).toBe(first)
    expect(getProvider('claude').name).toBe('claude')
  })

  it('refuses a provider without credentials', () => {
    config.ANTHROPIC_API_KEY = ''
    expect(() => getProvider('claude')).toThrow(AnalysisProviderError)
    expect(() => getProvider('claude')).toThrow('Provider "claude" is not available (missing API key or config).')
  })
})

describe('OpenAIProvider', () => {
  it('sends the system prompt and returns the completion', async () => {
    mockChatCreate.mockResolvedValue({
      choices: [{ message: { content: '# Summary' } }],
      usage: { prompt_tokens: 10, completion_tokens: 5, total_tokens: 15 },
    })
    const session = await new OpenAIProvider().createSession({ systemPrompt: 'You summarize.' })
    const response = await session.sendAndWait('Hello world.')

    expect(response.content).toBe('# Summary')
    expect(response.usage).toEqual({ inputTokens: 10, outputTokens: 5, totalTokens: 15 })
    expect(mockCreateOpenAI).toHaveBeenCalledWith({ apiKey: 'test-secret', maxRetries: 0 })
    const [params] = mockChatCreate.mock.calls[0]
    expect(params.model).toBe('gpt-4o')
    expect(params.messages).toEqual([
      { role: 'system', content: 'You summarize.' },
      { role: 'user', content: 'Hello world.' },
      { role: 'assistant', content: '# Summary' },
    ])
  })

  it('maps throttling to RateLimitedError', async () => {
    mockChatCreate.mockRejectedValue(Object.assign(new Error('slow down'), { status: 429 }))
    const session = await new OpenAIProvider().createSession({ systemPrompt: 's', model: 'gpt-4o-mini' })
    await expect(session.sendAndWait('x')).rejects.toBeInstanceOf(RateLimitedError)
  })
})

describe('ClaudeProvider', () => {
  it('joins text blocks and sums usage', async () => {
    mockMessagesCreate.mockResolvedValue({
      content: [
        { type: 'text', text: 'a' },
        { type: 'tool_use', id: 't', name: 'n', input: {} },
        { type: 'text', text: 'b' },
      ],
      usage: { input_tokens: 3, output_tokens: 4 },
    })
    const session = await new ClaudeProvider().createSession({ systemPrompt: 'sys' })
    const response = await session.sendAndWait('hi')

    expect(response.content).toBe('ab')
    expect(response.usage.totalTokens).toBe(7)
    const [params] = mockMessagesCreate.mock.calls[0]
    expect(params.model).toBe('claude-sonnet-4-20250514')
    expect(params.max_tokens).toBe(8192)
    expect(params.system).toBe('sys')
  })

  it('maps other failures to AnalysisProviderError', async () => {
    mockMessagesCreate.mockRejectedValue(new Error('overloaded'))
    const session = await new ClaudeProvider().createSession({ systemPrompt: 'sys' })
    await expect(session.sendAndWait('hi')).rejects.toThrow('claude request failed: overloaded')
  })
})
