import { describe, it, expect, vi, beforeEach } from 'vitest'

const config = vi.hoisted(() => ({ ANALYSIS_PROVIDER: 'openai', LLM_MODEL: '', PATTERNS_DIR: '' }))
vi.mock('../../../L1-infra/config/environment.js', () => ({
  getConfig: () => config,
}))

const mockSendAndWait = vi.hoisted(() => vi.fn())
const mockClose = vi.hoisted(() => vi.fn())
const mockCreateSession = vi.hoisted(() => vi.fn())
const mockGetProvider = vi.hoisted(() => vi.fn())
vi.mock('../../../L2-clients/llm/index.js', () => ({
  getProvider: mockGetProvider,
}))

const mockRunFabricPattern = vi.hoisted(() => vi.fn())
vi.mock('../../../L2-clients/fabric/fabricClient.js', () => ({
  runFabricPattern: mockRunFabricPattern,
}))

import {
  analyze,
  buildFrontmatterInput,
  buildPatternInput,
  generateFrontmatter,
  loadPatternPrompt,
  refineInsights,
} from '../../../L3-services/analysis/analysis.js'
import type { FrontmatterContext } from '../../../L3-services/analysis/analysis.js'
import { join } from '../../../L1-infra/paths/paths.js'
import { AnalysisProviderError, RateLimitedError, ValidationError } from '../../../L0-pure/errors/errors.js'
import { useTempDirs, writeTextFile } from '../../helpers.js'

const tempDir = useTempDirs('augments-patterns-')

beforeEach(() => {
  config.ANALYSIS_PROVIDER = 'openai'
  config.LLM_MODEL = ''
  config.PATTERNS_DIR = ''
  mockSendAndWait.mockReset()
  mockClose.mockReset()
  mockCreateSession.mockReset()
  mockGetProvider.mockReset()
  mockRunFabricPattern.mockReset()
  mockCreateSession.mockResolvedValue({ sendAndWait: mockSendAndWait, close: mockClose })
  mockGetProvider.mockReturnValue({ name: 'openai', createSession: mockCreateSession })
})

describe('loadPatternPrompt', () => {
  it('reads the bundled prompt', async () => {
    expect(await loadPatternPrompt('summarize')).toMatch(/^# IDENTITY and PURPOSE/)
  })

  it('reads from PATTERNS_DIR when set', async () => {
    const dir = await tempDir()
    await writeTextFile(join(dir, 'summarize.md'), '  Custom prompt\n')
    config.PATTERNS_DIR = dir
    expect(await loadPatternPrompt('summarize')).toBe('Custom prompt')
  })

  it('fails with ValidationError when the prompt is missing', async () => {
    config.PATTERNS_DIR = await tempDir()
    await expect(loadPatternPrompt('extract-links')).rejects.toBeInstanceOf(ValidationError)
  })
})

describe('buildPatternInput', () => {
  const context = { title: 'Talk', sourceUrl: 'https://www.youtube.com/watch?v=abcDEF12345', description: 'About things' }

  it('passes text through for most patterns', () => {
    expect(buildPatternInput('body', 'summarize', context)).toBe('body')
  })

  it('prefixes link extraction with the source context', () => {
    expect(buildPatternInput('body', 'extract-links', context)).toBe(
      'Title: Talk\nSource: https://www.youtube.com/watch?v=abcDEF12345\nDescription:\nAbout things\n\nContent:\nbody',
    )
  })

  it('leaves the text alone without context', () => {
    expect(buildPatternInput('body', 'extract-links')).toBe('body')
  })
})

describe('analyze', () => {
  it('sends the text with the pattern prompt and trims the answer', async () => {
    mockSendAndWait.mockResolvedValue({ content: '\n# Summary\n\nShort.\n', usage: { inputTokens: 1, outputTokens: 1, totalTokens: 2 } })
    expect(await analyze('Hello world.', 'summarize')).toBe('# Summary\n\nShort.')
    expect(mockGetProvider).toHaveBeenCalledWith('openai')
    const [sessionConfig] = mockCreateSession.mock.calls[0]
    expect(sessionConfig.systemPrompt).toMatch(/^# IDENTITY and PURPOSE/)
    expect(sessionConfig.model).toBeUndefined()
    expect(mockSendAndWait).toHaveBeenCalledWith('Hello world.')
    expect(mockClose).toHaveBeenCalledTimes(1)
  })

  it('honours provider and model overrides', async () => {
    mockSendAndWait.mockResolvedValue({ content: 'ok', usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 } })
    await analyze('x', 'extract-insights', {}, { provider: 'claude', model: 'claude-test' })
    expect(mockGetProvider).toHaveBeenCalledWith('claude')
    expect(mockCreateSession.mock.calls[0][0].model).toBe('claude-test')
  })

  it('routes fabric through its own pattern names', async () => {
    config.ANALYSIS_PROVIDER = 'fabric'
    config.LLM_MODEL = 'gpt-4o'
    mockRunFabricPattern.mockResolvedValue('wisdom')
    expect(await analyze('x', 'extract-insights')).toBe('wisdom')
    expect(mockRunFabricPattern).toHaveBeenCalledWith('extract_wisdom', 'x', 'gpt-4o')
    expect(mockGetProvider).not.toHaveBeenCalled()
  })

  it('rejects an empty answer', async () => {
    mockSendAndWait.mockResolvedValue({ content: '   ', usage: { inputTokens: 0, outputTokens: 0, totalTokens: 0 } })
    const err: unknown = await analyze('x', 'summarize').catch((e: unknown) => e)
    expect(err).toBeInstanceOf(AnalysisProviderError)
    expect(err instanceof Error && err.message).toBe('openai returned an empty response for summarize')
  })

  it('surfaces throttling as RateLimitedError and still closes the session', async () => {
    mockSendAndWait.mockRejectedValue(Object.assign(new Error('slow down'), { status: 429 }))
    await expect(analyze('x', 'summarize')).rejects.toBeInstanceOf(RateLimitedError)
    expect(mockClose).toHaveBeenCalledTimes(1)
  })
})

function answer(content: string) {
  return { content, usage: { inputTokens: 1, outputTokens: 1, totalTokens: 2 } }
}

const VIDEO_CONTEXT: FrontmatterContext = {
  title: 'Talk',
  source: { kind: 'video', videoId: 'abcDEF12345', url: 'https://www.youtube.com/watch?v=abcDEF12345' },
  metadata: {
    id: 'abcDEF12345',
    title: 'Talk',
    author: 'Tester',
    duration: 3725,
    viewCount: 1234567,
    uploadDate: '20240105',
    description: 'About things',
    url: 'https://www.youtube.com/watch?v=abcDEF12345',
  },
  text: 'one two  three',
}

describe('buildFrontmatterInput', () => {
  it('describes a video with its metadata', () => {
    expect(buildFrontmatterInput(VIDEO_CONTEXT)).toBe([
      'Title: Talk',
      'Video URL: https://www.youtube.com/watch?v=abcDEF12345',
      'Author: Tester',
      'Duration: 01:02:05',
      'Views: 1,234,567',
      'Upload Date: 2024-01-05',
      'Description: About things',
      'Word count: 3',
      '',
      'Content excerpt:',
      'one two three',
    ].join('\n'))
  })

  it('names clipboard text as the source', () => {
    expect(buildFrontmatterInput({ title: 'Notes', source: { kind: 'clipboard' }, text: 'hi' }).split('\n').slice(0, 3))
      .toEqual(['Title: Notes', 'Source: clipboard text', 'Word count: 1'])
  })
})

describe('generateFrontmatter', () => {
  it('parses the fields out of the answer', async () => {
    mockSendAndWait.mockResolvedValue(answer('```yaml\n---\ncontent_type: "tutorial"\ntopics:\n  - testing\n---\n```'))
    expect(await generateFrontmatter(VIDEO_CONTEXT)).toEqual([
      { key: 'content_type', lines: ['content_type: "tutorial"'] },
      { key: 'topics', lines: ['topics:', '  - testing'] },
    ])
    expect(mockCreateSession.mock.calls[0][0].systemPrompt).toMatch(/^# IDENTITY and PURPOSE/)
    expect(mockSendAndWait).toHaveBeenCalledWith(buildFrontmatterInput(VIDEO_CONTEXT))
    expect(mockClose).toHaveBeenCalledTimes(1)
  })

  it('rejects an answer without a frontmatter block', async () => {
    mockSendAndWait.mockResolvedValue(answer('I could not tell.'))
    await expect(generateFrontmatter(VIDEO_CONTEXT)).rejects.toThrow('openai returned no usable frontmatter')
  })

  it('uses OpenAI when fabric is the analysis provider', async () => {
    config.ANALYSIS_PROVIDER = 'fabric'
    config.LLM_MODEL = 'fabric-model'
    mockSendAndWait.mockResolvedValue(answer('---\nskill_level: "beginner"\n---'))
    await generateFrontmatter(VIDEO_CONTEXT)
    expect(mockGetProvider).toHaveBeenCalledWith('openai')
    expect(mockCreateSession.mock.calls[0][0].model).toBeUndefined()
    expect(mockRunFabricPattern).not.toHaveBeenCalled()
  })
})

describe('refineInsights', () => {
  it('returns the trimmed rewrite', async () => {
    mockSendAndWait.mockResolvedValue(answer('\n- Sharper insight.\n'))
    expect(await refineInsights('- insight', { provider: 'claude', model: 'claude-test' })).toBe('- Sharper insight.')
    expect(mockGetProvider).toHaveBeenCalledWith('claude')
    expect(mockSendAndWait).toHaveBeenCalledWith('- insight')
  })

  it('rejects an empty rewrite', async () => {
    mockSendAndWait.mockResolvedValue(answer('  '))
    const err: unknown = await refineInsights('- insight').catch((e: unknown) => e)
    expect(err).toBeInstanceOf(AnalysisProviderError)
    expect(err instanceof Error && err.message).toBe('openai returned an empty refinement')
  })
})
