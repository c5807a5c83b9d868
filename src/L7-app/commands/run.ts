import logger from '../../L1-infra/logger/configLogger.js'
import { runPipeline, describeFailure } from '../../L6-pipeline/pipeline.js'
import type { RunOptions } from '../../L6-pipeline/pipeline.js'
import { ValidationError } from '../../L0-pure/errors/errors.js'
import type { PatternName, PipelineEvent, PipelineRequest, PipelineSource, TranscriptFormat } from '../../L0-pure/types/index.js'

export interface RunCommandOptions {
  clipboard?: boolean
  title?: string
  format: TranscriptFormat
  patterns: PatternName[]
  audio: boolean
  save: boolean
  cache: boolean
  llmFrontmatter?: boolean
  refineInsights?: boolean
}

/**
 * The pipeline's source. A reference is passed on unparsed so that a bad URL
 * is reported as a failed acquisition.
 */
export function resolveSource(source: string | undefined, opts: Pick<RunCommandOptions, 'clipboard' | 'title'>): PipelineSource {
  if (opts.clipboard) return { kind: 'clipboard', title: opts.title }
  if (!source) {
    throw new ValidationError('A YouTube URL or video id is required (or pass --clipboard)')
  }
  return opts.title ? { kind: 'input', input: source, title: opts.title } : { kind: 'input', input: source }
}

export function logEvent(event: PipelineEvent): void {
  const line = `[${event.stage}] ${event.status}: ${event.message}`
  if (event.status === 'failed') logger.warn(line)
  else logger.info(line)
}

/**
 * `augments run`: one pipeline run. Prints the report path, or the markdown
 * itself when the run does not save. Returns the process exit code.
 */
export async function runProcess(
  source: string | undefined,
  opts: RunCommandOptions,
  runOptions: RunOptions = {},
): Promise<number> {
  const request: PipelineRequest = {
    source: resolveSource(source, opts),
    patterns: opts.patterns,
    format: opts.format,
    audio: opts.audio,
    save: opts.save,
    useCache: opts.cache,
    enrichFrontmatter: opts.llmFrontmatter ?? false,
    refineInsights: opts.refineInsights ?? false,
  }

  const result = await runPipeline(request, { onEvent: logEvent, ...runOptions })

  if (result.state === 'errored') {
    console.error(describeFailure(result))
    for (const artifact of result.artifacts) {
      console.error(`  kept ${artifact.category}/${artifact.name}`)
    }
    return 1
  }

  const report = result.report
  if (report?.artifact) {
    console.log(report.artifact.path)
  } else if (report) {
    console.log(report.markdown)
  }
  if (result.synthesis) {
    logger.info(`Audio: ${result.synthesis.artifact.path} (${result.synthesis.provider})`)
  }
  logger.info(`Done in ${result.totalDuration}ms`)
  return 0
}
