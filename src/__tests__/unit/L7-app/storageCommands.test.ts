import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import type { MockInstance } from 'vitest'
import { runList, formatArtifactLine } from '../../../L7-app/commands/list.js'
import { runCleanup } from '../../../L7-app/commands/cleanup.js'
import { runCache, formatCacheEntry } from '../../../L7-app/commands/cache.js'
import { ValidationError } from '../../../L0-pure/errors/errors.js'
import { useTempDirs, createTestContext, setFileTimes } from '../../helpers.js'

const tempDir = useTempDirs('augments-cli-')

let logSpy: MockInstance<typeof console.log>

function printed(): string[] {
  return logSpy.mock.calls.map((call) => String(call[0]))
}

beforeEach(() => {
  logSpy = vi.spyOn(console, 'log').mockImplementation(() => {})
})

afterEach(() => {
  logSpy.mockRestore()
})

describe('formatArtifactLine', () => {
  it('shows time, size and location', () => {
    expect(formatArtifactLine({
      category: 'audio',
      name: 'a.mp3',
      path: '/x/audio/a.mp3',
      createdAt: new Date('2024-01-01T00:00:00Z'),
      size: 1536,
    })).toBe('2024-01-01T00:00:00.000Z     1.5 KB  audio/a.mp3')
  })
})

describe('runList', () => {
  it('lists artifacts across categories', async () => {
    const ctx = createTestContext(await tempDir())
    const transcript = await ctx.store.save('transcript', 'abc.txt', 'hello')
    const audio = await ctx.store.save('audio', 'abc.mp3', 'mp3')
    await setFileTimes(transcript.path, new Date('2024-01-01T00:00:00Z'))
    await setFileTimes(audio.path, new Date('2024-01-02T00:00:00Z'))

    expect(await runList(undefined, ctx)).toBe(0)
    expect(printed()).toEqual([
      '2024-01-01T00:00:00.000Z        5 B  transcript/abc.txt',
      '2024-01-02T00:00:00.000Z        3 B  audio/abc.mp3',
      '2 artifacts',
    ])
  })

  it('says so when there is nothing', async () => {
    const ctx = createTestContext(await tempDir())
    await runList('download', ctx)
    expect(printed()).toEqual(['No artifacts.'])
  })
})

describe('runCleanup', () => {
  it('evicts old artifacts and prunes their cache entries', async () => {
    const ctx = createTestContext(await tempDir())
    const old = await ctx.store.save('transcript', 'old.txt', 'old')
    await ctx.store.save('transcript', 'new.txt', 'new')
    await ctx.cache.put('transcript:old:txt', old)
    await setFileTimes(old.path, new Date(Date.now() - 10 * 86_400_000))

    expect(await runCleanup(undefined, { maxAge: '7d' }, ctx)).toBe(0)
    expect(printed()).toEqual(['Removed 1 of 2 artifacts (0 failed); pruned 1 cache entries'])
    expect(await ctx.store.stat('transcript', 'new.txt')).toBeDefined()
  })

  it('rejects a malformed max age', async () => {
    const ctx = createTestContext(await tempDir())
    await expect(runCleanup(undefined, { maxAge: 'a week' }, ctx)).rejects.toBeInstanceOf(ValidationError)
  })
})

describe('runCache', () => {
  it('lists entries with their meta', async () => {
    const ctx = createTestContext(await tempDir(), () => new Date('2024-02-03T04:05:06Z'))
    await ctx.cache.put('transcript:abc:txt', await ctx.store.save('transcript', 'abc.txt', 'x'), { language: 'en' })

    await runCache('list', ctx)
    expect(formatCacheEntry({ key: 'k', category: 'temp', name: 'n', path: '/p', cachedAt: 't' })).toBe('t  k -> temp/n')
    expect(printed()).toEqual([
      '2024-02-03T04:05:06.000Z  transcript:abc:txt -> transcript/abc.txt language=en',
      '1 entry',
    ])
  })

  it('clears and prunes', async () => {
    const ctx = createTestContext(await tempDir())
    await ctx.cache.put('a', await ctx.store.save('temp', 'a.txt', 'a'))
    await ctx.cache.put('b', await ctx.store.save('temp', 'b.txt', 'b'))
    await ctx.store.delete('temp', 'a.txt')

    await runCache('prune', ctx)
    await runCache('clear', ctx)
    await runCache('list', ctx)
    expect(printed()).toEqual(['Pruned 1 cache entries', 'Cleared 1 cache entries', 'Cache is empty.'])
  })

  it('rejects an unknown action', async () => {
    const ctx = createTestContext(await tempDir())
    await expect(runCache('purge', ctx)).rejects.toThrow('Unknown cache action "purge". Expected one of: list, clear, prune')
  })
})
