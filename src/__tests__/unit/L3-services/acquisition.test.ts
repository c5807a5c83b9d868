import { describe, it, expect, vi, beforeEach } from 'vitest'

const mockFetchVideoInfo = vi.hoisted(() => vi.fn())
const mockDownloadCaption = vi.hoisted(() => vi.fn())
const mockDownloadMedia = vi.hoisted(() => vi.fn())
vi.mock('../../../L2-clients/youtube/ytDlp.js', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../../L2-clients/youtube/ytDlp.js')>()),
  fetchVideoInfo: mockFetchVideoInfo,
  downloadCaption: mockDownloadCaption,
  downloadMedia: mockDownloadMedia,
}))

const mockReadClipboard = vi.hoisted(() => vi.fn())
vi.mock('../../../L2-clients/clipboard/clipboard.js', () => ({
  readClipboard: mockReadClipboard,
}))

vi.mock('../../../L1-infra/config/environment.js', () => ({
  getConfig: () => ({ TRANSCRIPT_CACHE_TTL: '', CAPTION_LANGUAGE: 'en' }),
}))

import { acquire, getTranscript, getVideoMetadata, downloadVideo } from '../../../L3-services/acquisition/acquisition.js'
import { join } from '../../../L1-infra/paths/paths.js'
import { SourceUnavailableError } from '../../../L0-pure/errors/errors.js'
import type { Artifact, SourceRef } from '../../../L0-pure/types/index.js'
import type { StorageContext } from '../../../L3-services/artifactStore/storageContext.js'
import { useTempDirs, createTestContext, writeTextFile } from '../../helpers.js'

const tempDir = useTempDirs('augments-acquire-')

const ID = 'abcDEF12345'
const VIDEO: Extract<SourceRef, { kind: 'video' }> = { kind: 'video', videoId: ID, url: `https://www.youtube.com/watch?v=${ID}` }
const VTT = 'WEBVTT\n\n00:00:00.000 --> 00:00:02.000\nHello world.\n\n00:00:02.000 --> 00:00:04.000\nThis is a test.\n'

const INFO = {
  id: ID,
  title: 'Test Video',
  uploader: 'Tester',
  duration: 4,
  subtitles: { en: [{ ext: 'vtt', url: 'https://example.com/en.vtt' }] },
}

async function names(ctx: StorageContext): Promise<string[]> {
  const out: Artifact[] = []
  for await (const artifact of ctx.store.list('transcript')) out.push(artifact)
  return out.map((a) => a.name).sort()
}

beforeEach(() => {
  mockFetchVideoInfo.mockReset()
  mockDownloadCaption.mockReset()
  mockDownloadMedia.mockReset()
  mockReadClipboard.mockReset()
  mockFetchVideoInfo.mockResolvedValue(INFO)
  mockDownloadCaption.mockResolvedValue(VTT)
})

describe('getTranscript', () => {
  it('converts captions, stores them and serves the next call from cache', async () => {
    const ctx = createTestContext(await tempDir())
    const first = await getTranscript(ctx, VIDEO, { format: 'txt', save: true, useCache: true })

    expect(first.text).toBe('Hello world. This is a test.')
    expect(first.content).toBe('Hello world. This is a test.')
    expect(first.metadata.title).toBe('Test Video')
    expect(first.fromCache).toBe(false)
    expect(await names(ctx)).toEqual([`${ID}.info.json`, `${ID}.txt`])

    const second = await getTranscript(ctx, VIDEO, { format: 'txt', save: true, useCache: true })
    expect(second.fromCache).toBe(true)
    expect(second.text).toBe('Hello world. This is a test.')
    expect(second.metadata.author).toBe('Tester')
    expect(mockFetchVideoInfo).toHaveBeenCalledTimes(1)
  })

  it('reports each artifact as it is written', async () => {
    const ctx = createTestContext(await tempDir())
    const written: string[] = []
    await getTranscript(ctx, VIDEO, { format: 'txt', save: true, useCache: true, onArtifact: (a) => written.push(a.name) })
    expect(written).toEqual([`${ID}.txt`, `${ID}.info.json`])

    written.length = 0
    await getTranscript(ctx, VIDEO, { format: 'txt', save: true, useCache: true, onArtifact: (a) => written.push(a.name) })
    expect(written).toEqual([])
  })

  it('refetches when the cache is bypassed', async () => {
    const ctx = createTestContext(await tempDir())
    await getTranscript(ctx, VIDEO, { format: 'vtt', save: true, useCache: false })
    await getTranscript(ctx, VIDEO, { format: 'vtt', save: true, useCache: false })
    expect(mockFetchVideoInfo).toHaveBeenCalledTimes(2)
    expect(await names(ctx)).toEqual([`${ID}.info.json`, `${ID}.vtt`])
  })

  it('stores nothing when save is off', async () => {
    const ctx = createTestContext(await tempDir())
    const result = await getTranscript(ctx, VIDEO, { format: 'srt', save: false, useCache: true })
    expect(result.content).toBe('1\n00:00:00,000 --> 00:00:02,000\nHello world.\n\n2\n00:00:02,000 --> 00:00:04,000\nThis is a test.\n')
    expect(result.artifact).toBeUndefined()
    expect(await names(ctx)).toEqual([])
  })

  it('fails when no caption track matches', async () => {
    mockFetchVideoInfo.mockResolvedValue({ id: ID, subtitles: { de: [{ ext: 'vtt', url: 'u' }] } })
    const ctx = createTestContext(await tempDir())
    const err: unknown = await getTranscript(ctx, VIDEO, { format: 'txt', save: true, useCache: false }).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(SourceUnavailableError)
    expect(err instanceof Error && err.message).toBe(`No en captions available for ${ID}`)
  })
})

describe('getVideoMetadata', () => {
  it('refetches when the cached metadata is unreadable', async () => {
    const ctx = createTestContext(await tempDir())
    await getVideoMetadata(ctx, VIDEO, { save: true, useCache: false })
    await ctx.store.save('transcript', `${ID}.info.json`, '{broken', { overwrite: true })

    const metadata = await getVideoMetadata(ctx, VIDEO, { save: false, useCache: true })
    expect(metadata.title).toBe('Test Video')
    expect(mockFetchVideoInfo).toHaveBeenCalledTimes(2)
  })
})

describe('acquire', () => {
  it('reads the clipboard and derives a title from the first line', async () => {
    mockReadClipboard.mockResolvedValue('\n  First line of notes  \nsecond line\n')
    const ctx = createTestContext(await tempDir())
    const source = await acquire(ctx, { kind: 'clipboard' }, { format: 'txt', save: true, useCache: true })
    expect(source.title).toBe('First line of notes')
    expect(source.text).toBe('First line of notes  \nsecond line')
  })

  it('prefers an explicit clipboard title', async () => {
    mockReadClipboard.mockResolvedValue('body')
    const ctx = createTestContext(await tempDir())
    const source = await acquire(ctx, { kind: 'clipboard', title: 'Notes' }, { format: 'txt', save: true, useCache: true })
    expect(source.title).toBe('Notes')
  })

  it('rejects an empty clipboard', async () => {
    mockReadClipboard.mockResolvedValue('   \n')
    const ctx = createTestContext(await tempDir())
    await expect(acquire(ctx, { kind: 'clipboard' }, { format: 'txt', save: true, useCache: true }))
      .rejects.toThrow('Clipboard is empty')
  })

  it('returns video text with its metadata', async () => {
    const ctx = createTestContext(await tempDir())
    const source = await acquire(ctx, VIDEO, { format: 'txt', save: true, useCache: false })
    expect(source.title).toBe('Test Video')
    expect(source.text).toBe('Hello world. This is a test.')
    expect(source.artifact?.name).toBe(`${ID}.txt`)
  })
})

describe('downloadVideo', () => {
  it('moves the finished download into downloads/', async () => {
    const ctx = createTestContext(await tempDir())
    mockDownloadMedia.mockImplementation(async (_url: string, _format: string, dir: string) => {
      const path = join(dir, 'Test Video [abcDEF12345].mp4')
      await writeTextFile(path, 'video')
      return path
    })

    const artifact = await downloadVideo(ctx, VIDEO, 'mp4')
    expect(artifact.category).toBe('download')
    expect(artifact.name).toBe('Test_Video_[abcDEF12345].mp4')
    expect(await ctx.store.loadText('download', artifact.name)).toBe('video')
  })
})
