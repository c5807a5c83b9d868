import dotenv from 'dotenv'
import { join, defaultConfigDir } from '../paths/paths.js'
import { fileExistsSync } from '../fileSystem/fileSystem.js'
import { ValidationError } from '../../L0-pure/errors/errors.js'

/** Load environment variables from a .env file. Existing variables win. */
export function loadEnvFile(envPath: string): void {
  if (fileExistsSync(envPath)) {
    dotenv.config({ path: envPath })
  }
}

// ./.env first, then the per-user one; dotenv never overrides a value already set
loadEnvFile(join(process.cwd(), '.env'))
loadEnvFile(join(process.env.AUGMENTS_CONFIG_DIR || defaultConfigDir(), '.env'))

export type AnalysisProviderName = 'openai' | 'claude' | 'fabric'

export const ANALYSIS_PROVIDERS: readonly AnalysisProviderName[] = ['openai', 'claude', 'fabric'] as const

export interface AppEnvironment {
  CONFIG_DIR: string
  ARTIFACTS_DIR: string
  /** Reports directory; defaults to `<artifacts>/reports`. */
  OUTPUT_DIR: string
  OPENAI_API_KEY: string
  ANTHROPIC_API_KEY: string
  ELEVENLABS_API_KEY: string
  ANALYSIS_PROVIDER: AnalysisProviderName
  LLM_MODEL: string
  TTS_PROVIDERS: string[]
  OPENAI_TTS_MODEL: string
  OPENAI_TTS_VOICE: string
  ELEVENLABS_VOICE_ID: string
  ELEVENLABS_MODEL_ID: string
  YT_DLP_PATH: string
  FABRIC_PATH: string
  CAPTION_LANGUAGE: string
  PATTERNS_DIR: string
  /** Staleness bounds as duration strings ("7d"); empty means unbounded. */
  TRANSCRIPT_CACHE_TTL: string
  AUDIO_CACHE_TTL: string
  REPORT_CACHE_TTL: string
  VERBOSE: boolean
}

export interface CLIOptions {
  configDir?: string
  outputDir?: string
  openaiKey?: string
  provider?: string
  model?: string
  tts?: string
  verbose?: boolean
}

let config: AppEnvironment | null = null

/** True when an environment flag is set to something other than empty, `0` or `false`. */
export function envFlag(name: string): boolean {
  const value = (process.env[name] ?? '').trim().toLowerCase()
  return value !== '' && value !== '0' && value !== 'false'
}

function parseAnalysisProvider(value: string): AnalysisProviderName {
  const normalized = value.trim().toLowerCase()
  const match = ANALYSIS_PROVIDERS.find((p) => p === normalized)
  if (!match) {
    throw new ValidationError(
      `Unknown ANALYSIS_PROVIDER "${value}". Expected one of: ${ANALYSIS_PROVIDERS.join(', ')}`,
    )
  }
  return match
}

function parseList(value: string): string[] {
  return value.split(',').map((s) => s.trim().toLowerCase()).filter((s) => s.length > 0)
}

/** Check the credentials the selected analysis provider needs. */
export function validateRequiredKeys(): void {
  const cfg = getConfig()
  if (cfg.ANALYSIS_PROVIDER === 'openai' && !cfg.OPENAI_API_KEY) {
    throw new ValidationError('Missing required: OPENAI_API_KEY (set via --openai-key or env var)')
  }
  if (cfg.ANALYSIS_PROVIDER === 'claude' && !cfg.ANTHROPIC_API_KEY) {
    throw new ValidationError('Missing required: ANTHROPIC_API_KEY for ANALYSIS_PROVIDER=claude')
  }
}

/** Merge CLI options → env vars → defaults. Call before getConfig(). */
export function initConfig(cli: CLIOptions = {}): AppEnvironment {
  const configDir = cli.configDir || process.env.AUGMENTS_CONFIG_DIR || defaultConfigDir()
  const artifactsDir = join(configDir, 'artifacts')

  config = {
    CONFIG_DIR: configDir,
    ARTIFACTS_DIR: artifactsDir,
    OUTPUT_DIR: cli.outputDir || process.env.OUTPUT_DIR || join(artifactsDir, 'reports'),
    OPENAI_API_KEY: cli.openaiKey || process.env.OPENAI_API_KEY || '',
    ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY || '',
    ELEVENLABS_API_KEY: process.env.ELEVENLABS_API_KEY || '',
    ANALYSIS_PROVIDER: parseAnalysisProvider(cli.provider || process.env.ANALYSIS_PROVIDER || 'openai'),
    LLM_MODEL: cli.model || process.env.LLM_MODEL || '',
    TTS_PROVIDERS: parseList(cli.tts || process.env.TTS_PROVIDERS || 'openai,elevenlabs'),
    OPENAI_TTS_MODEL: process.env.OPENAI_TTS_MODEL || 'gpt-4o-mini-tts',
    OPENAI_TTS_VOICE: process.env.OPENAI_TTS_VOICE || 'alloy',
    ELEVENLABS_VOICE_ID: process.env.ELEVENLABS_VOICE_ID || 'JBFqnCBsd6RMkjVDRZzb',
    ELEVENLABS_MODEL_ID: process.env.ELEVENLABS_MODEL_ID || 'eleven_multilingual_v2',
    YT_DLP_PATH: process.env.YT_DLP_PATH || 'yt-dlp',
    FABRIC_PATH: process.env.FABRIC_PATH || 'fabric',
    CAPTION_LANGUAGE: process.env.CAPTION_LANGUAGE || 'en',
    PATTERNS_DIR: process.env.PATTERNS_DIR || '',
    TRANSCRIPT_CACHE_TTL: process.env.TRANSCRIPT_CACHE_TTL || '',
    AUDIO_CACHE_TTL: process.env.AUDIO_CACHE_TTL || '',
    REPORT_CACHE_TTL: process.env.REPORT_CACHE_TTL || '',
    VERBOSE: cli.verbose ?? envFlag('AUGMENTS_DEBUG'),
  }

  return config
}

export function getConfig(): AppEnvironment {
  if (config) {
    return config
  }

  // Fallback: init with no CLI options (pure env-var mode)
  return initConfig()
}
