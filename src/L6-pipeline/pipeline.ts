import logger from '../L1-infra/logger/configLogger.js'
import { getConfig } from '../L1-infra/config/environment.js'
import { relative } from '../L1-infra/paths/paths.js'
import { acquire as acquireSource } from '../L3-services/acquisition/acquisition.js'
import {
  analyze as analyzeText,
  generateFrontmatter as generateFrontmatterFields,
  refineInsights as refineInsightText,
} from '../L3-services/analysis/analysis.js'
import { synthesize as synthesizeSpeech } from '../L3-services/synthesis/synthesis.js'
import { createStorageContext } from '../L3-services/artifactStore/storageContext.js'
import type { StorageContext } from '../L3-services/artifactStore/storageContext.js'
import { cacheKeys } from '../L3-services/cache/artifactCache.js'
import { renderReport, reportBaseName } from '../L0-pure/markdown/report.js'
import { markdownToSpeech } from '../L0-pure/markdown/speech.js'
import { parseOptionalDuration } from '../L0-pure/duration/duration.js'
import { parseSourceRef } from '../L0-pure/youtube/youtube.js'
import {
  PipelineCancelledError,
  RateLimitedError,
  SourceUnavailableError,
  errorMessage,
} from '../L0-pure/errors/errors.js'
import { PipelineStage } from '../L0-pure/types/index.js'
import type {
  AcquiredSource,
  Artifact,
  FrontmatterField,
  PipelineEvent,
  PipelineReport,
  PipelineRequest,
  PipelineResult,
  PipelineSource,
  PipelineState,
  PatternOutput,
  SourceRef,
  StageResult,
  SynthesisResult,
} from '../L0-pure/types/index.js'

/** Legal moves of the orchestrator. `done` and `errored` are terminal. */
export const PIPELINE_TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
  idle: ['acquiring', 'errored'],
  // a cached report ends the run straight after acquisition
  acquiring: ['analyzing', 'done', 'errored'],
  // synthesis is bypassed when no audio was requested
  analyzing: ['synthesizing', 'assembling', 'errored'],
  synthesizing: ['assembling', 'errored'],
  assembling: ['done', 'errored'],
  done: [],
  errored: [],
}

const STAGE_STATES: Record<PipelineStage, PipelineState> = {
  [PipelineStage.Acquisition]: 'acquiring',
  [PipelineStage.Analysis]: 'analyzing',
  [PipelineStage.Synthesis]: 'synthesizing',
  [PipelineStage.Assembly]: 'assembling',
}

export class IllegalTransitionError extends Error {
  constructor(public readonly from: PipelineState, public readonly to: PipelineState) {
    super(`Illegal pipeline transition: ${from} → ${to}`)
    this.name = 'IllegalTransitionError'
  }
}

export function canTransition(from: PipelineState, to: PipelineState): boolean {
  return PIPELINE_TRANSITIONS[from].includes(to)
}

export interface RetryPolicy {
  maxRetries: number
  baseDelayMs: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = { maxRetries: 3, baseDelayMs: 2000 }

/** Collaborators of a run. Tests swap any of them. */
export interface PipelineDeps {
  ctx: StorageContext
  acquire: typeof acquireSource
  analyze: typeof analyzeText
  generateFrontmatter: typeof generateFrontmatterFields
  refineInsights: typeof refineInsightText
  synthesize: typeof synthesizeSpeech
  sleep: (ms: number) => Promise<void>
  now: () => Date
}

export interface RunOptions {
  signal?: AbortSignal
  onEvent?: (event: PipelineEvent) => void
  retry?: Partial<RetryPolicy>
  deps?: Partial<PipelineDeps>
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/** Thrown by runStage so the orchestrator knows which stage broke. */
class StageFailure extends Error {
  constructor(public readonly stage: PipelineStage, public readonly error: Error) {
    super(error.message, { cause: error })
    this.name = 'StageFailure'
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err))
}

/**
 * Backoff before retry `attempt` (0-based): the provider's Retry-After when it
 * sent one, otherwise `base * 2^attempt`.
 */
export function retryDelay(err: RateLimitedError, attempt: number, policy: RetryPolicy): number {
  return err.retryAfterMs ?? policy.baseDelayMs * 2 ** attempt
}

/**
 * One run of the pipeline.
 *
 * ### Stage contract
 * Every stage goes through {@link PipelineRun.runStage}, which moves the state
 * machine, emits started/succeeded/failed events and appends a
 * {@link StageResult}. Unlike a best-effort batch, a failed stage halts the
 * run: the state becomes `errored` and the result keeps the artifacts
 * written so far.
 */
class PipelineRun {
  state: PipelineState = 'idle'
  readonly stageResults: StageResult[] = []
  readonly artifacts: Artifact[] = []

  constructor(
    private readonly deps: PipelineDeps,
    private readonly options: RunOptions,
  ) {}

  transition(to: PipelineState): void {
    if (!canTransition(this.state, to)) throw new IllegalTransitionError(this.state, to)
    logger.debug(`[Pipeline] ${this.state} → ${to}`)
    this.state = to
  }

  emit(event: PipelineEvent): void {
    this.options.onEvent?.(event)
  }

  record(artifact: Artifact | undefined): void {
    if (artifact && !this.artifacts.some((a) => a.path === artifact.path)) this.artifacts.push(artifact)
  }

  checkCancelled(): void {
    if (this.options.signal?.aborted) throw new PipelineCancelledError()
  }

  async runStage<T>(stage: PipelineStage, fn: () => Promise<T>, describe: (result: T) => string): Promise<T> {
    const start = Date.now()
    try {
      this.checkCancelled()
      this.transition(STAGE_STATES[stage])
      this.emit({ stage, status: 'started', message: `${stage} started` })
      const result = await fn()
      const duration = Date.now() - start
      this.stageResults.push({ stage, success: true, duration })
      logger.info(`Stage ${stage} completed in ${duration}ms`)
      this.emit({ stage, status: 'succeeded', message: describe(result) })
      return result
    } catch (err: unknown) {
      if (err instanceof IllegalTransitionError) throw err
      const duration = Date.now() - start
      const error = toError(err)
      this.stageResults.push({ stage, success: false, error: error.message, duration })
      logger.error(`Stage ${stage} failed after ${duration}ms: ${error.message}`)
      this.emit({ stage, status: 'failed', message: error.message })
      throw new StageFailure(stage, error)
    }
  }

  skipStage(stage: PipelineStage, reason: string): void {
    this.stageResults.push({ stage, success: true, skipped: true, duration: 0 })
    this.emit({ stage, status: 'skipped', message: reason })
  }

  /** A step whose failure only costs its own output: logged, then `undefined`. */
  async optionalStep<T>(label: string, fn: () => Promise<T>): Promise<T | undefined> {
    this.checkCancelled()
    try {
      return await this.withRetry(label, fn)
    } catch (err: unknown) {
      if (err instanceof PipelineCancelledError) throw err
      logger.warn(`[Pipeline] ${label} failed, continuing without it: ${errorMessage(err)}`)
      return undefined
    }
  }

  /** Retry rate-limited calls with exponential backoff; everything else propagates. */
  async withRetry<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const policy: RetryPolicy = { ...DEFAULT_RETRY_POLICY, ...this.options.retry }
    for (let attempt = 0; ; attempt++) {
      try {
        return await fn()
      } catch (err: unknown) {
        if (!(err instanceof RateLimitedError) || attempt >= policy.maxRetries) throw err
        const wait = retryDelay(err, attempt, policy)
        logger.warn(`[Pipeline] ${label} rate limited, retry ${attempt + 1}/${policy.maxRetries} in ${wait}ms`)
        await this.deps.sleep(wait)
        this.checkCancelled()
      }
    }
  }
}

/** Parse raw input here so a bad reference fails the acquisition stage. */
function toSourceRef(source: PipelineSource): SourceRef {
  if (source.kind !== 'input') return source
  return parseSourceRef(source.input, { title: source.title })
}

/** Report cache key; runs with different optional steps get different reports. */
function reportKey(request: PipelineRequest, videoId: string): string {
  const extras: string[] = []
  if (request.enrichFrontmatter) extras.push('frontmatter')
  if (request.refineInsights) extras.push('refined')
  return cacheKeys.report(videoId, request.patterns, request.audio, extras)
}

async function cachedReport(
  ctx: StorageContext,
  request: PipelineRequest,
  source: AcquiredSource,
): Promise<PipelineReport | undefined> {
  if (!request.useCache || source.ref.kind !== 'video') return undefined
  const key = reportKey(request, source.ref.videoId)
  try {
    const hit = await ctx.cache.lookupEntry(key, { maxAgeMs: parseOptionalDuration(getConfig().REPORT_CACHE_TTL) })
    if (!hit) return undefined
    const audioName = hit.entry.meta?.audio
    if (audioName && !(await ctx.store.stat('audio', audioName))) {
      logger.info(`[Pipeline] Cached report ${hit.artifact.name} links to missing audio ${audioName}, rebuilding`)
      await ctx.cache.invalidate(key)
      return undefined
    }
    const markdown = await ctx.store.loadText(hit.artifact.category, hit.artifact.name)
    return { markdown, artifact: hit.artifact, fromCache: true }
  } catch (err: unknown) {
    logger.warn(`[Pipeline] Ignoring cached report for ${key}: ${errorMessage(err)}`)
    return undefined
  }
}

/** Pattern output read aloud: the summary when there is one, else the first output. */
export function speechSource(outputs: PatternOutput[]): string {
  const chosen = outputs.find((o) => o.pattern === 'summarize') ?? outputs[0]
  return chosen ? markdownToSpeech(chosen.content) : ''
}

/**
 * Run the pipeline once: acquire → analyze → synthesize → assemble.
 *
 * Never throws for stage failures; those come back as an `errored` result
 * naming the failed stage. Only a broken state machine throws.
 */
export async function runPipeline(request: PipelineRequest, options: RunOptions = {}): Promise<PipelineResult> {
  const pipelineStart = Date.now()
  const deps: PipelineDeps = {
    ctx: options.deps?.ctx ?? createStorageContext(),
    acquire: options.deps?.acquire ?? acquireSource,
    analyze: options.deps?.analyze ?? analyzeText,
    generateFrontmatter: options.deps?.generateFrontmatter ?? generateFrontmatterFields,
    refineInsights: options.deps?.refineInsights ?? refineInsightText,
    synthesize: options.deps?.synthesize ?? synthesizeSpeech,
    sleep: options.deps?.sleep ?? delay,
    now: options.deps?.now ?? (() => new Date()),
  }
  const { ctx } = deps
  const run = new PipelineRun(deps, options)
  const outputs: PatternOutput[] = []
  let source: AcquiredSource | undefined
  let synthesis: SynthesisResult | undefined
  let report: PipelineReport | undefined
  let extraFrontmatter: FrontmatterField[] | undefined
  const record = (artifact: Artifact): void => run.record(artifact)

  const finish = (state: 'done' | 'errored', failure?: StageFailure): PipelineResult => {
    const result: PipelineResult = {
      state,
      source,
      outputs,
      synthesis,
      report,
      artifacts: run.artifacts,
      stageResults: run.stageResults,
      totalDuration: Date.now() - pipelineStart,
    }
    if (failure) {
      result.failedStage = failure.stage
      result.error = failure.error
    }
    return result
  }

  try {
    // 1. Acquisition
    const acquired = await run.runStage(
      PipelineStage.Acquisition,
      async () => {
        const result = await deps.acquire(ctx, toSourceRef(request.source), {
          format: request.format,
          save: request.save,
          useCache: request.useCache,
          onArtifact: record,
        })
        if (result.text.trim().length === 0) {
          throw new SourceUnavailableError(`No text could be extracted from ${result.title}`)
        }
        return result
      },
      (result) => `acquired "${result.title}" (${result.text.length} chars${result.fromCache ? ', cached' : ''})`,
    )
    source = acquired
    run.record(acquired.artifact)

    const cached = await cachedReport(ctx, request, acquired)
    if (cached) {
      logger.info(`[Pipeline] Using cached report ${cached.artifact?.name ?? ''}`)
      report = cached
      run.record(cached.artifact)
      run.transition('done')
      return finish('done')
    }

    // 2. Analysis
    await run.runStage(
      PipelineStage.Analysis,
      async () => {
        const context = {
          title: acquired.title,
          sourceUrl: acquired.ref.kind === 'video' ? acquired.ref.url : undefined,
          description: acquired.metadata?.description,
        }
        for (const pattern of request.patterns) {
          run.checkCancelled()
          const content = await run.withRetry(pattern, () => deps.analyze(acquired.text, pattern, context))
          outputs.push({ pattern, content })
        }

        const insights = outputs.find((o) => o.pattern === 'extract-insights')
        if (request.refineInsights && insights) {
          insights.content = (await run.optionalStep('insight refinement', () => deps.refineInsights(insights.content))) ?? insights.content
        }
        if (request.enrichFrontmatter) {
          extraFrontmatter = await run.optionalStep('frontmatter generation', () => deps.generateFrontmatter({
            title: acquired.title,
            source: acquired.ref,
            metadata: acquired.metadata,
            text: acquired.text,
          }))
        }
        return outputs
      },
      (result) => `ran ${result.map((o) => o.pattern).join(', ')}${extraFrontmatter ? ' with generated frontmatter' : ''}`,
    )

    const baseName = reportBaseName(acquired.ref, acquired.title)

    // 3. Synthesis
    if (request.audio) {
      synthesis = await run.runStage(
        PipelineStage.Synthesis,
        () => deps.synthesize(ctx, speechSource(outputs), baseName, {
          category: request.save ? 'audio' : 'temp',
          useCache: request.useCache,
          onArtifact: record,
        }),
        (result) => `audio ${result.artifact.name} via ${result.provider}`,
      )
      run.record(synthesis.artifact)
    } else {
      run.skipStage(PipelineStage.Synthesis, 'audio not requested')
    }

    // 4. Assembly
    report = await run.runStage(
      PipelineStage.Assembly,
      async (): Promise<PipelineReport> => {
        const markdown = renderReport({
          title: acquired.title,
          source: acquired.ref,
          metadata: acquired.metadata,
          outputs,
          text: acquired.text,
          audioPath: synthesis ? relative(ctx.store.categoryDir('markdown-report'), synthesis.artifact.path) : undefined,
          audioProvider: synthesis?.provider,
          extraFrontmatter,
          createdAt: deps.now(),
        })
        if (!request.save) return { markdown, fromCache: false }

        const artifact = await ctx.store.save('markdown-report', `${baseName}.md`, markdown)
        record(artifact)
        if (acquired.ref.kind === 'video') {
          await ctx.cache.put(reportKey(request, acquired.ref.videoId), artifact, synthesis ? { audio: synthesis.artifact.name } : undefined)
        }
        return { markdown, artifact, fromCache: false }
      },
      (result) => (result.artifact ? `wrote ${result.artifact.name}` : 'report not saved'),
    )
    run.record(report.artifact)

    run.transition('done')
    return finish('done')
  } catch (err: unknown) {
    if (!(err instanceof StageFailure)) throw err
    run.transition('errored')
    return finish('errored', err)
  }
}

/** CLI-facing description of a failed run. */
export function describeFailure(result: PipelineResult): string {
  if (result.state !== 'errored') return ''
  return `Stage ${result.failedStage ?? 'unknown'} failed: ${result.error?.message ?? 'unknown error'}`
}
