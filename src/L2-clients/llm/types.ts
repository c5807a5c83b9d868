/**
 * LLM Provider Abstraction Layer
 *
 * Defines the contract for the chat providers the analysis stage can use.
 * Providers normalize different SDK patterns into a unified interface.
 */

/** Supported LLM provider names */
export type ProviderName = 'openai' | 'claude'

/** Token usage for a single LLM call */
export interface TokenUsage {
  inputTokens: number
  outputTokens: number
  totalTokens: number
}

/** Response from an LLM provider call */
export interface LLMResponse {
  /** Text content of the response */
  content: string
  /** Token usage metrics */
  usage: TokenUsage
  /** Duration of the call in milliseconds */
  durationMs?: number
}

/** Configuration for creating a provider session */
export interface SessionConfig {
  /** System prompt for the LLM */
  systemPrompt: string
  /** Model to use (provider-specific, e.g., 'claude-sonnet-4-20250514', 'gpt-4o') */
  model?: string
  /** Timeout in milliseconds */
  timeoutMs?: number
  /** Upper bound on generated tokens */
  maxTokens?: number
}

/** An active session with an LLM provider */
export interface LLMSession {
  /** Send a message and wait for the complete response */
  sendAndWait(message: string): Promise<LLMResponse>
  /** Close and clean up the session */
  close(): Promise<void>
}

/** LLM Provider interface - the main contract */
export interface LLMProvider {
  /** Provider name identifier */
  readonly name: ProviderName
  /** Create a new session with the given configuration */
  createSession(config: SessionConfig): Promise<LLMSession>
  /** Check if the provider is available (API key set, etc.) */
  isAvailable(): boolean
  /** Get the default model for this provider */
  getDefaultModel(): string
}
