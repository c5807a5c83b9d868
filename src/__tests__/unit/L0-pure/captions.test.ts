import { describe, it, expect } from 'vitest'
import {
  parseCues,
  cuesToText,
  cuesToSrt,
  convertCaptions,
  transcriptToText,
  parseTimestamp,
  formatTimestamp,
  decodeHtmlEntities,
} from '../../../L0-pure/captions/captions.js'

const VTT = [
  'WEBVTT',
  'Kind: captions',
  'Language: en',
  '',
  '00:00:01.000 --> 00:00:03.500 align:start position:0%',
  'Hello <c>world</c>',
  '',
  '00:00:03.500 --> 00:00:05.000',
  'Hello world',
  'Tom &amp; Jerry',
  '',
  '00:00:05.000 --> 00:00:06.000',
  ' ',
  '',
].join('\n')

const SRT = [
  '1',
  '00:00:01,000 --> 00:00:02,000',
  'Hi there',
  '',
  '2',
  '00:00:02,000 --> 00:00:03,000',
  '<i>Bye</i>',
  '',
].join('\n')

describe('parseCues', () => {
  it('skips header blocks and empty cues, strips tags and decodes entities', () => {
    expect(parseCues(VTT)).toEqual([
      { start: 1, end: 3.5, text: 'Hello world' },
      { start: 3.5, end: 5, text: 'Hello world\nTom & Jerry' },
    ])
  })

  it('reads SRT documents and CRLF line endings', () => {
    expect(parseCues(SRT.replace(/\n/g, '\r\n'))).toEqual([
      { start: 1, end: 2, text: 'Hi there' },
      { start: 2, end: 3, text: 'Bye' },
    ])
  })
})

describe('cuesToText', () => {
  it('drops the rolling repeat of the previous line', () => {
    expect(cuesToText(parseCues(VTT))).toBe('Hello world Tom & Jerry')
  })
})

describe('cuesToSrt', () => {
  it('numbers cues and uses comma timestamps', () => {
    expect(cuesToSrt(parseCues(VTT))).toBe(
      '1\n00:00:01,000 --> 00:00:03,500\nHello world\n' +
      '\n' +
      '2\n00:00:03,500 --> 00:00:05,000\nHello world\nTom & Jerry\n',
    )
  })
})

describe('convertCaptions', () => {
  it('returns the document untouched when formats match', () => {
    expect(convertCaptions(VTT, 'vtt', 'vtt')).toBe(VTT)
  })

  it('converts SRT to WebVTT', () => {
    expect(convertCaptions(SRT, 'srt', 'vtt')).toBe(
      'WEBVTT\n\n00:00:01.000 --> 00:00:02.000\nHi there\n\n00:00:02.000 --> 00:00:03.000\nBye\n',
    )
  })

  it('reduces captions to text', () => {
    expect(convertCaptions(SRT, 'srt', 'txt')).toBe('Hi there Bye')
  })
})

describe('transcriptToText', () => {
  it('collapses whitespace of plain text transcripts', () => {
    expect(transcriptToText('  a\n b  ', 'txt')).toBe('a b')
  })

  it('parses timed transcripts', () => {
    expect(transcriptToText(VTT, 'vtt')).toBe('Hello world Tom & Jerry')
  })
})

describe('timestamps', () => {
  it('parses hour, minute and SRT forms', () => {
    expect(parseTimestamp('01:02:03.5')).toBe(3723.5)
    expect(parseTimestamp('02:03,250')).toBe(123.25)
    expect(parseTimestamp('bogus')).toBe(0)
  })

  it('formats with either separator', () => {
    expect(formatTimestamp(3723.5)).toBe('01:02:03,500')
    expect(formatTimestamp(3723.5, '.')).toBe('01:02:03.500')
  })
})

describe('decodeHtmlEntities', () => {
  it('decodes named and numeric entities and leaves unknown ones', () => {
    expect(decodeHtmlEntities('&lt;b&gt; &#39;hi&#39; &#x41; &unknown;')).toBe("<b> 'hi' A &unknown;")
  })
})
