import { describe, it, expect, vi, beforeEach } from 'vitest'

const mockExecCommand = vi.hoisted(() => vi.fn())
vi.mock('../../../L1-infra/process/process.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../L1-infra/process/process.js')>()),
  execCommand: mockExecCommand,
}))

import { readClipboard, clipboardCommands } from '../../../L2-clients/clipboard/clipboard.js'
import { ProcessError } from '../../../L1-infra/process/process.js'
import { SourceUnavailableError } from '../../../L0-pure/errors/errors.js'

function notInstalled(cmd: string): ProcessError {
  const cause = Object.assign(new Error(`spawn ${cmd} ENOENT`), { code: 'ENOENT' })
  return new ProcessError(`${cmd} failed`, cmd, null, '', '', { cause })
}

beforeEach(() => {
  mockExecCommand.mockReset()
})

describe('clipboardCommands', () => {
  it('uses the native reader per platform', () => {
    expect(clipboardCommands('darwin').map((c) => c.cmd)).toEqual(['pbpaste'])
    expect(clipboardCommands('win32').map((c) => c.cmd)).toEqual(['powershell'])
    expect(clipboardCommands('linux').map((c) => c.cmd)).toEqual(['wl-paste', 'xclip', 'xsel'])
  })
})

describe('readClipboard', () => {
  it('returns what the reader prints', async () => {
    mockExecCommand.mockResolvedValue({ stdout: 'copied text', stderr: '' })
    expect(await readClipboard('darwin')).toBe('copied text')
    expect(mockExecCommand).toHaveBeenCalledWith('pbpaste', [], { timeout: 10_000 })
  })

  it('tries the next reader when one is missing', async () => {
    mockExecCommand.mockImplementation(async (cmd: string) => {
      if (cmd === 'xclip') return { stdout: 'from xclip', stderr: '' }
      throw notInstalled(cmd)
    })
    expect(await readClipboard('linux')).toBe('from xclip')
  })

  it('throws SourceUnavailableError when no reader works', async () => {
    mockExecCommand.mockImplementation(async (cmd: string) => {
      throw notInstalled(cmd)
    })
    const err: unknown = await readClipboard('linux').catch((e: unknown) => e)
    expect(err).toBeInstanceOf(SourceUnavailableError)
    expect(err instanceof Error && err.message).toBe(
      'Could not read the clipboard (wl-paste: not installed; xclip: not installed; xsel: not installed)',
    )
  })
})
