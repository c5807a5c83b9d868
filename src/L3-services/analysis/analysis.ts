import { getProvider } from '../../L2-clients/llm/index.js'
import { toProviderError } from '../../L2-clients/llm/providerErrors.js'
import { runFabricPattern } from '../../L2-clients/fabric/fabricClient.js'
import { readTextFile } from '../../L1-infra/fileSystem/fileSystem.js'
import { assetsDir, join } from '../../L1-infra/paths/paths.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import type { AnalysisProviderName } from '../../L1-infra/config/environment.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { AnalysisProviderError, ValidationError, errorMessage } from '../../L0-pure/errors/errors.js'
import { parseFrontmatterFields } from '../../L0-pure/markdown/frontmatter.js'
import { excerpt, formatCount, formatDate, formatDuration } from '../../L0-pure/text/text.js'
import type {
  AnalysisContext,
  FrontmatterField,
  PatternName,
  SourceRef,
  VideoMetadata,
} from '../../L0-pure/types/index.js'

/** fabric's own names for our patterns. */
export const FABRIC_PATTERNS: Record<PatternName, string> = {
  summarize: 'summarize',
  'extract-insights': 'extract_wisdom',
  'extract-links': 'extract_references',
}

export interface AnalyzeOptions {
  provider?: AnalysisProviderName
  model?: string
}

function patternsDir(): string {
  return getConfig().PATTERNS_DIR || assetsDir('patterns')
}

async function readPrompt(label: string, path: string): Promise<string> {
  try {
    return (await readTextFile(path)).trim()
  } catch (err: unknown) {
    throw new ValidationError(`Prompt for "${label}" could not be read from ${path}: ${errorMessage(err)}`)
  }
}

/** System prompt for a pattern, read from `<patterns dir>/<pattern>.md`. */
export async function loadPatternPrompt(pattern: PatternName): Promise<string> {
  return readPrompt(pattern, join(patternsDir(), `${pattern}.md`))
}

/**
 * The text handed to the model. Link extraction also sees where the text came
 * from, so it can resolve references the speaker only names.
 */
export function buildPatternInput(text: string, pattern: PatternName, context: AnalysisContext = {}): string {
  if (pattern !== 'extract-links') return text
  const header: string[] = []
  if (context.title) header.push(`Title: ${context.title}`)
  if (context.sourceUrl) header.push(`Source: ${context.sourceUrl}`)
  if (context.description) header.push(`Description:\n${context.description}`)
  return header.length > 0 ? `${header.join('\n')}\n\nContent:\n${text}` : text
}

async function analyzeWithLlm(
  providerName: 'openai' | 'claude',
  label: string,
  systemPrompt: string,
  input: string,
  model: string | undefined,
): Promise<string> {
  const provider = getProvider(providerName)
  const session = await provider.createSession({ systemPrompt, model })
  try {
    const response = await session.sendAndWait(input)
    logger.debug(`[Analysis] ${label} via ${providerName}: ${response.usage.totalTokens} tokens in ${response.durationMs ?? 0}ms`)
    return response.content
  } catch (err: unknown) {
    throw toProviderError(err, providerName)
  } finally {
    await session.close()
  }
}

/**
 * Run one pattern over `text` with the configured provider.
 * Throttling surfaces as RateLimitedError; any other failure, or an empty
 * answer, as AnalysisProviderError. Nothing is retried or cached here.
 */
export async function analyze(
  text: string,
  pattern: PatternName,
  context: AnalysisContext = {},
  options: AnalyzeOptions = {},
): Promise<string> {
  const config = getConfig()
  const providerName = options.provider ?? config.ANALYSIS_PROVIDER
  const model = options.model ?? (config.LLM_MODEL || undefined)
  const input = buildPatternInput(text, pattern, context)

  logger.info(`[Analysis] Running ${pattern} (${providerName})`)
  const output = providerName === 'fabric'
    ? await runFabricPattern(FABRIC_PATTERNS[pattern], input, model)
    : await analyzeWithLlm(providerName, pattern, await loadPatternPrompt(pattern), input, model)

  const trimmed = output.trim()
  if (trimmed.length === 0) {
    throw new AnalysisProviderError(`${providerName} returned an empty response for ${pattern}`, providerName)
  }
  return trimmed
}

// ── Optional steps ─────────────────────────────────────────────

export interface FrontmatterContext {
  title: string
  source: SourceRef
  metadata?: VideoMetadata
  /** Normalised source text; an excerpt goes into the prompt. */
  text: string
}

/** Chat model for free-form steps. fabric only runs named patterns, so it defers to OpenAI. */
function chatProvider(options: AnalyzeOptions): { name: 'openai' | 'claude'; model: string | undefined } {
  const config = getConfig()
  const name = options.provider ?? config.ANALYSIS_PROVIDER
  if (name === 'fabric') return { name: 'openai', model: options.model }
  return { name, model: options.model ?? (config.LLM_MODEL || undefined) }
}

function bundledPrompt(name: string): Promise<string> {
  return readPrompt(name, assetsDir('prompts', `${name}.md`))
}

/** What the frontmatter prompt is told about the source. */
export function buildFrontmatterInput(context: FrontmatterContext): string {
  const lines = [`Title: ${context.title}`]
  const meta = context.metadata
  if (context.source.kind === 'video') {
    lines.push(`Video URL: ${context.source.url}`)
  } else {
    lines.push('Source: clipboard text')
  }
  if (meta) {
    lines.push(`Author: ${meta.author}`)
    lines.push(`Duration: ${formatDuration(meta.duration)}`)
    lines.push(`Views: ${formatCount(meta.viewCount)}`)
    lines.push(`Upload Date: ${formatDate(meta.uploadDate)}`)
    lines.push(`Description: ${meta.description}`)
  }
  lines.push(`Word count: ${context.text.split(/\s+/).filter(Boolean).length}`)
  lines.push('', 'Content excerpt:', excerpt(context.text, 2000))
  return lines.join('\n')
}

/**
 * Ask the chat model for frontmatter describing the content (type, skill
 * level, topics, technologies, reading time). Fails with
 * AnalysisProviderError when the answer holds no usable YAML block.
 */
export async function generateFrontmatter(
  context: FrontmatterContext,
  options: AnalyzeOptions = {},
): Promise<FrontmatterField[]> {
  const { name, model } = chatProvider(options)
  logger.info(`[Analysis] Generating frontmatter (${name})`)
  const answer = await analyzeWithLlm(name, 'frontmatter', await bundledPrompt('frontmatter'), buildFrontmatterInput(context), model)
  const fields = parseFrontmatterFields(answer)
  if (fields.length === 0) {
    throw new AnalysisProviderError(`${name} returned no usable frontmatter`, name)
  }
  return fields
}

/** Second editing pass over extracted insights. */
export async function refineInsights(insights: string, options: AnalyzeOptions = {}): Promise<string> {
  const { name, model } = chatProvider(options)
  logger.info(`[Analysis] Refining insights (${name})`)
  const refined = (await analyzeWithLlm(name, 'refine-insights', await bundledPrompt('refine-insights'), insights, model)).trim()
  if (refined.length === 0) {
    throw new AnalysisProviderError(`${name} returned an empty refinement`, name)
  }
  return refined
}
