import { describe, it, expect, vi, beforeEach } from 'vitest'

const mockExecWithInput = vi.hoisted(() => vi.fn())
vi.mock('../../../L1-infra/process/process.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../L1-infra/process/process.js')>()),
  execWithInput: mockExecWithInput,
}))

vi.mock('../../../L1-infra/config/environment.js', () => ({
  getConfig: () => ({ FABRIC_PATH: 'fabric' }),
}))

import { runFabricPattern } from '../../../L2-clients/fabric/fabricClient.js'
import { ProcessError } from '../../../L1-infra/process/process.js'
import { AnalysisProviderError, RateLimitedError } from '../../../L0-pure/errors/errors.js'

beforeEach(() => {
  mockExecWithInput.mockReset()
})

describe('runFabricPattern', () => {
  it('pipes the input to fabric -p', async () => {
    mockExecWithInput.mockResolvedValue({ stdout: '# Summary', stderr: '' })
    expect(await runFabricPattern('summarize', 'some text')).toBe('# Summary')
    expect(mockExecWithInput).toHaveBeenCalledWith('fabric', ['-p', 'summarize'], 'some text')
  })

  it('passes a model override', async () => {
    mockExecWithInput.mockResolvedValue({ stdout: 'ok', stderr: '' })
    await runFabricPattern('extract_wisdom', 'x', 'gpt-4o')
    expect(mockExecWithInput).toHaveBeenCalledWith('fabric', ['-p', 'extract_wisdom', '-m', 'gpt-4o'], 'x')
  })

  it('reports a missing binary', async () => {
    const cause = Object.assign(new Error('spawn fabric ENOENT'), { code: 'ENOENT' })
    mockExecWithInput.mockRejectedValue(new ProcessError('fabric failed', 'fabric', null, '', '', { cause }))
    await expect(runFabricPattern('summarize', 'x')).rejects.toThrow('fabric not found at "fabric". Install it or set FABRIC_PATH.')
  })

  it('maps throttling on stderr to RateLimitedError', async () => {
    mockExecWithInput.mockRejectedValue(new ProcessError('fabric exited with code 1', 'fabric', 1, '', '429 Too Many Requests'))
    await expect(runFabricPattern('summarize', 'x')).rejects.toBeInstanceOf(RateLimitedError)
  })

  it('maps other failures to AnalysisProviderError', async () => {
    mockExecWithInput.mockRejectedValue(new ProcessError('fabric exited with code 1: boom', 'fabric', 1, '', 'boom'))
    const err: unknown = await runFabricPattern('summarize', 'x').catch((e: unknown) => e)
    expect(err).toBeInstanceOf(AnalysisProviderError)
    expect(err instanceof Error && err.message).toBe('fabric pattern summarize failed: fabric exited with code 1: boom')
  })
})
