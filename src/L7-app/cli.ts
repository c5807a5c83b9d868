#!/usr/bin/env node
import { z } from 'zod'
import { Command, Option } from '../L1-infra/cli/cli.js'
import { initConfig, validateRequiredKeys, ANALYSIS_PROVIDERS } from '../L1-infra/config/environment.js'
import type { CLIOptions } from '../L1-infra/config/environment.js'
import logger, { setVerbose } from '../L1-infra/logger/configLogger.js'
import { readTextFileSync } from '../L1-infra/fileSystem/fileSystem.js'
import { projectRoot, join } from '../L1-infra/paths/paths.js'
import { AugmentsError, errorMessage } from '../L0-pure/errors/errors.js'
import { PATTERN_NAMES } from '../L0-pure/types/index.js'
import type { PatternName, TranscriptFormat } from '../L0-pure/types/index.js'
import { runProcess } from './commands/run.js'
import { runTranscript, runInfo, runDownload } from './commands/transcript.js'
import { runList } from './commands/list.js'
import { runCleanup } from './commands/cleanup.js'
import { runCache, CACHE_ACTIONS } from './commands/cache.js'
import { runDoctor } from './commands/doctor.js'
import {
  parseFormat,
  parseTranscriptOutputFormat,
  parseMediaFormat,
  parsePatterns,
  parseCategoryScope,
} from './commands/options.js'
import type { TranscriptOutputFormat } from './commands/options.js'
import type { MediaFormat } from '../L3-services/acquisition/acquisition.js'

const pkg = z.object({ version: z.string() }).parse(JSON.parse(readTextFileSync(join(projectRoot(), 'package.json'))))

const BANNER = `
╔══════════════════════════════════════╗
║   augments  v${pkg.version.padEnd(23)}║
╚══════════════════════════════════════╝
`

interface RunCliOptions {
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

/** Run a command body, turning thrown errors into a message and exit code 1. */
function action<A extends unknown[]>(fn: (...args: A) => Promise<number>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      process.exitCode = await fn(...args)
    } catch (err: unknown) {
      if (err instanceof AugmentsError) {
        console.error(`Error [${err.code}]: ${err.message}`)
      } else {
        console.error(`Error: ${errorMessage(err)}`)
        logger.debug(err instanceof Error && err.stack ? err.stack : String(err))
      }
      process.exitCode = 1
    }
  }
}

const program = new Command()

program
  .name('augments')
  .description('Fetch transcripts or clipboard text, analyze them with patterns, and keep the results as artifacts')
  .version(pkg.version, '-V, --version')
  .option('--config-dir <path>', 'Config directory (default: env AUGMENTS_CONFIG_DIR or ~/.config/augments)')
  .option('--output-dir <path>', 'Where markdown reports are written (default: env OUTPUT_DIR or <artifacts>/reports)')
  .option('--openai-key <key>', 'OpenAI API key (default: env OPENAI_API_KEY)')
  .addOption(new Option('--provider <name>', 'Analysis provider (default: env ANALYSIS_PROVIDER or openai)').choices(ANALYSIS_PROVIDERS))
  .option('--model <name>', 'Model override for the analysis provider')
  .option('--tts <list>', 'Speech provider chain, comma-separated (default: openai,elevenlabs)')
  .option('-v, --verbose', 'Verbose logging')
  .hook('preAction', () => {
    const cliOptions = program.opts<CLIOptions>()
    initConfig(cliOptions)
    if (cliOptions.verbose) setVerbose()
  })

// --- Subcommands ---

program
  .command('transcript')
  .description('Print the transcript of a YouTube video')
  .argument('<url>', 'YouTube URL or video id')
  .option('--format <format>', 'vtt, srt, txt or json', parseTranscriptOutputFormat, 'txt')
  .option('--no-save', 'Do not keep the transcript under transcripts/')
  .option('--no-cache', 'Ignore cached transcripts')
  .action(action((url: string, opts: { format: TranscriptOutputFormat; save: boolean; cache: boolean }) =>
    runTranscript(url, opts)))

program
  .command('info')
  .description('Print video metadata as JSON')
  .argument('<url>', 'YouTube URL or video id')
  .option('--no-cache', 'Ignore cached metadata')
  .action(action((url: string, opts: { cache: boolean }) => runInfo(url, opts)))

program
  .command('download')
  .description('Download a video (or its audio) into downloads/')
  .argument('<url>', 'YouTube URL or video id')
  .option('--format <format>', 'mp4, webm or audio', parseMediaFormat, 'mp4')
  .action(action((url: string, opts: { format: MediaFormat }) => runDownload(url, opts)))

program
  .command('list')
  .description('List stored artifacts with size and creation time')
  .argument('[category]', 'transcript, audio, download, temp, markdown-report or all', 'all')
  .action(action((category: string) => runList(parseCategoryScope(category))))

program
  .command('cleanup')
  .description('Delete artifacts older than --max-age, then prune the cache')
  .argument('[category]', 'transcript, audio, download, temp, markdown-report or all', 'all')
  .requiredOption('--max-age <duration>', 'Age threshold such as 30m, 24h, 7d or 2w')
  .action(action((category: string, opts: { maxAge: string }) => runCleanup(parseCategoryScope(category), opts)))

program
  .command('cache')
  .description('Inspect or reset the artifact cache')
  .argument('<action>', CACHE_ACTIONS.join(', '))
  .action(action((cacheAction: string) => runCache(cacheAction)))

program
  .command('doctor')
  .description('Check prerequisites: Node, yt-dlp, provider credentials, artifact directory')
  .action(action(() => runDoctor()))

// --- Default command (run the pipeline) ---
// This must come after subcommands so they take priority

program
  .command('run', { isDefault: true })
  .description('Analyze a YouTube video or the clipboard and write a markdown report')
  .argument('[source]', 'YouTube URL, video id, or "clipboard"')
  .option('--clipboard', 'Read the source text from the clipboard')
  .option('--title <title>', 'Title for clipboard content')
  .option('--format <format>', 'Transcript format to keep: vtt, srt or txt', parseFormat, 'txt')
  .option('--patterns <list>', `Comma-separated patterns (${PATTERN_NAMES.join(', ')})`, parsePatterns, [...PATTERN_NAMES])
  .option('--no-audio', 'Skip the spoken summary')
  .option('--no-save', 'Print the report instead of writing artifacts')
  .option('--no-cache', 'Ignore cached transcripts, audio and reports')
  .option('--llm-frontmatter', 'Let the analysis model add content type, skill level, topics and reading time')
  .option('--refine-insights', 'Give extracted insights a second editing pass')
  .action(action(async (source: string | undefined, opts: RunCliOptions) => {
    logger.info(BANNER)
    validateRequiredKeys()

    const controller = new AbortController()
    const onSignal = () => {
      logger.warn('Cancelling after the current stage...')
      controller.abort()
    }
    process.once('SIGINT', onSignal)
    try {
      return await runProcess(source, opts, { signal: controller.signal })
    } finally {
      process.off('SIGINT', onSignal)
    }
  }))

await program.parseAsync()
