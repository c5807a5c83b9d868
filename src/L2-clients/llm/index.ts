import type { LLMProvider } from './types.js'
import type { ProviderName } from './types.js'
import { OpenAIProvider } from './OpenAIProvider.js'
import { ClaudeProvider } from './ClaudeProvider.js'
import { AnalysisProviderError } from '../../L0-pure/errors/errors.js'
import logger from '../../L1-infra/logger/configLogger.js'

const providers: Record<ProviderName, () => LLMProvider> = {
  openai: () => new OpenAIProvider(),
  claude: () => new ClaudeProvider(),
}

/** Cached singleton provider instance */
let currentProvider: LLMProvider | null = null

/**
 * Get an LLM provider by name. Caches the instance for reuse.
 * Throws AnalysisProviderError when its credentials are missing.
 */
export function getProvider(name: ProviderName): LLMProvider {
  if (currentProvider && currentProvider.name === name) {
    return currentProvider
  }

  const provider = providers[name]()
  if (!provider.isAvailable()) {
    throw new AnalysisProviderError(
      `Provider "${name}" is not available (missing API key or config).`,
      name,
    )
  }

  logger.info(`Using LLM provider: ${name} (model: ${provider.getDefaultModel()})`)
  currentProvider = provider
  return currentProvider
}

/** Reset the cached provider (for testing) */
export function resetProvider(): void {
  currentProvider = null
}

// Re-export types and providers
export type { LLMProvider, LLMSession, LLMResponse, SessionConfig, TokenUsage } from './types.js'
export type { ProviderName } from './types.js'
export { OpenAIProvider } from './OpenAIProvider.js'
export { ClaudeProvider } from './ClaudeProvider.js'
