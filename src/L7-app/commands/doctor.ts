import { ensureDirectory, isWritableDirectory } from '../../L1-infra/fileSystem/fileSystem.js'
import { getConfig } from '../../L1-infra/config/environment.js'
import type { AppEnvironment } from '../../L1-infra/config/environment.js'
import { errorMessage } from '../../L0-pure/errors/errors.js'
import { ytDlpVersion, fabricVersion, availableSpeechProviders } from '../../L3-services/diagnostics/diagnostics.js'

export interface CheckResult {
  label: string
  ok: boolean
  required: boolean
  message: string
}

export function checkNode(raw: string = process.version): CheckResult {
  const major = parseInt(raw.slice(1), 10) // "v20.11.1" → 20
  const ok = major >= 20
  return {
    label: 'Node.js',
    ok,
    required: true,
    message: ok
      ? `Node.js ${raw} (required: ≥20)`
      : `Node.js ${raw}, version ≥20 required`,
  }
}

function getYtDlpInstallHint(): string {
  const platform = process.platform
  if (platform === 'win32') return 'winget install yt-dlp.yt-dlp'
  if (platform === 'darwin') return 'brew install yt-dlp'
  return 'pipx install yt-dlp (or your package manager)'
}

export function checkYtDlp(probe: () => string | undefined = ytDlpVersion): CheckResult {
  const version = probe()
  return version
    ? { label: 'yt-dlp', ok: true, required: true, message: `yt-dlp ${version}` }
    : { label: 'yt-dlp', ok: false, required: true, message: `yt-dlp not found. Install: ${getYtDlpInstallHint()}, or set YT_DLP_PATH` }
}

export function checkAnalysisProvider(config: AppEnvironment, fabric: () => string | undefined = fabricVersion): CheckResult {
  const label = `Analysis (${config.ANALYSIS_PROVIDER})`
  switch (config.ANALYSIS_PROVIDER) {
    case 'openai':
      return config.OPENAI_API_KEY
        ? { label, ok: true, required: true, message: 'OPENAI_API_KEY is set' }
        : { label, ok: false, required: true, message: 'OPENAI_API_KEY not set. Get one at https://platform.openai.com/api-keys' }
    case 'claude':
      return config.ANTHROPIC_API_KEY
        ? { label, ok: true, required: true, message: 'ANTHROPIC_API_KEY is set' }
        : { label, ok: false, required: true, message: 'ANTHROPIC_API_KEY not set (required for claude provider)' }
    case 'fabric': {
      const version = fabric()
      return version
        ? { label, ok: true, required: true, message: `fabric ${version}` }
        : { label, ok: false, required: true, message: 'fabric not found. Install it or set FABRIC_PATH' }
    }
  }
}

/** Audio is optional, so an empty chain only warns. */
export function checkSpeech(config: AppEnvironment, available: (names: string[]) => string[] = availableSpeechProviders): CheckResult {
  const ready = available(config.TTS_PROVIDERS)
  return ready.length > 0
    ? { label: 'Speech', ok: true, required: false, message: `providers ready: ${ready.join(', ')} (chain: ${config.TTS_PROVIDERS.join(' → ')})` }
    : { label: 'Speech', ok: false, required: false, message: `no speech provider configured (chain: ${config.TTS_PROVIDERS.join(', ') || 'empty'}); use --no-audio or set OPENAI_API_KEY / ELEVENLABS_API_KEY` }
}

export async function checkArtifactsDir(dir: string): Promise<CheckResult> {
  try {
    await ensureDirectory(dir)
  } catch (err: unknown) {
    return { label: 'Artifacts', ok: false, required: true, message: `cannot create ${dir}: ${errorMessage(err)}` }
  }
  const writable = await isWritableDirectory(dir)
  return writable
    ? { label: 'Artifacts', ok: true, required: true, message: `${dir} is writable` }
    : { label: 'Artifacts', ok: false, required: true, message: `${dir} is not writable` }
}

function printResult(result: CheckResult): void {
  const icon = result.ok ? '✅' : result.required ? '❌' : '⚠️ '
  console.log(`  ${icon} ${result.label}: ${result.message}`)
}

/** `augments doctor`. Returns 1 when a required check failed. */
export async function runDoctor(): Promise<number> {
  const config = getConfig()
  console.log('\naugments doctor\n')

  const results: CheckResult[] = [
    checkNode(),
    checkYtDlp(),
    checkAnalysisProvider(config),
    checkSpeech(config),
    await checkArtifactsDir(config.ARTIFACTS_DIR),
  ]
  results.forEach(printResult)

  if (config.LLM_MODEL) {
    console.log(`  ℹ️  Model override: ${config.LLM_MODEL}`)
  }

  const failedRequired = results.filter((r) => r.required && !r.ok)
  console.log()
  if (failedRequired.length === 0) {
    console.log('  All required checks passed! ✅\n')
    return 0
  }
  console.log(`  ${failedRequired.length} required check${failedRequired.length > 1 ? 's' : ''} failed ❌\n`)
  return 1
}
