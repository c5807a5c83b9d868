import { describe, it, expect } from 'vitest'
import { parseFrontmatterFields } from '../../../L0-pure/markdown/frontmatter.js'

describe('parseFrontmatterFields', () => {
  it('reads scalar and list fields', () => {
    expect(parseFrontmatterFields([
      '---',
      'content_type: "tutorial"',
      'skill_level: beginner',
      'topics:',
      '  - caching',
      '  - "retries"',
      '',
      'reading_time: "4 min"',
      '---',
    ].join('\n'))).toEqual([
      { key: 'content_type', lines: ['content_type: "tutorial"'] },
      { key: 'skill_level', lines: ['skill_level: beginner'] },
      { key: 'topics', lines: ['topics:', '  - caching', '  - "retries"'] },
      { key: 'reading_time', lines: ['reading_time: "4 min"'] },
    ])
  })

  it('ignores a preamble and code fence around the block', () => {
    const answer = 'Here you go:\r\n```yaml\r\n---\r\ntopics:\r\n- testing\r\n---\r\n```\r\n'
    expect(parseFrontmatterFields(answer)).toEqual([{ key: 'topics', lines: ['topics:', '- testing'] }])
  })

  it('returns nothing without a closed block', () => {
    expect(parseFrontmatterFields('content_type: "talk"')).toEqual([])
    expect(parseFrontmatterFields('---\ncontent_type: "talk"\n')).toEqual([])
  })

  it('returns nothing when a line is not YAML it can place', () => {
    expect(parseFrontmatterFields('---\ncontent_type: "talk"\nThis is a sentence.\n---')).toEqual([])
    expect(parseFrontmatterFields('---\n  - orphan\n---')).toEqual([])
  })

  it('does not take a URL-like value for a key', () => {
    expect(parseFrontmatterFields('---\nhttps://example.com\n---')).toEqual([])
  })
})
