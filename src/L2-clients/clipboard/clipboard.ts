import { execCommand, ProcessError } from '../../L1-infra/process/process.js'
import logger from '../../L1-infra/logger/configLogger.js'
import { SourceUnavailableError, errorMessage } from '../../L0-pure/errors/errors.js'

interface ClipboardCommand {
  cmd: string
  args: string[]
}

/** Clipboard readers to try, in order, for a platform. */
export function clipboardCommands(platform: NodeJS.Platform = process.platform): ClipboardCommand[] {
  switch (platform) {
    case 'darwin':
      return [{ cmd: 'pbpaste', args: [] }]
    case 'win32':
      return [{ cmd: 'powershell', args: ['-NoProfile', '-Command', 'Get-Clipboard -Raw'] }]
    default:
      return [
        { cmd: 'wl-paste', args: ['--no-newline'] },
        { cmd: 'xclip', args: ['-selection', 'clipboard', '-o'] },
        { cmd: 'xsel', args: ['--clipboard', '--output'] },
      ]
  }
}

/**
 * Read the system clipboard as text. Tries each platform reader until one
 * runs; throws SourceUnavailableError when none is installed.
 */
export async function readClipboard(platform: NodeJS.Platform = process.platform): Promise<string> {
  const failures: string[] = []
  for (const { cmd, args } of clipboardCommands(platform)) {
    try {
      const { stdout } = await execCommand(cmd, args, { timeout: 10_000 })
      return stdout
    } catch (err: unknown) {
      const reason = err instanceof ProcessError && err.notFound ? 'not installed' : errorMessage(err)
      logger.debug(`Clipboard reader ${cmd} failed: ${reason}`)
      failures.push(`${cmd}: ${reason}`)
    }
  }
  throw new SourceUnavailableError(`Could not read the clipboard (${failures.join('; ')})`)
}
