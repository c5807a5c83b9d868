import type { FrontmatterField, PatternName, PatternOutput, SourceRef, VideoMetadata } from '../types/index.js'
import { excerpt, extractUrls, formatCount, formatDate, formatDuration, sanitizeFilename } from '../text/text.js'

export const PATTERN_HEADINGS: Record<PatternName, string> = {
  summarize: 'Summary',
  'extract-insights': 'Key Insights',
  'extract-links': 'Referenced Links and Resources',
}

export interface ReportInput {
  title: string
  source: SourceRef
  metadata?: VideoMetadata
  outputs: PatternOutput[]
  /** Normalised source text; used for the excerpt and URL detection. */
  text: string
  audioPath?: string
  audioProvider?: string
  /** Model-written fields; a key the report already sets is dropped. */
  extraFrontmatter?: FrontmatterField[]
  createdAt: Date
}

/**
 * Base file name (no extension) shared by a run's report and audio.
 * Video reports lead with the id so re-runs of the same video sort together.
 */
export function reportBaseName(source: SourceRef, title: string): string {
  const base = source.kind === 'video' ? `${source.videoId}-${title}` : `${title}-analysis`
  return sanitizeFilename(base)
}

function yamlString(value: string): string {
  return JSON.stringify(value)
}

function frontmatter(input: ReportInput): string {
  const lines = ['---', `title: ${yamlString(input.title)}`]
  if (input.source.kind === 'video') {
    lines.push(`source: ${yamlString(input.source.url)}`)
    lines.push(`video_id: ${yamlString(input.source.videoId)}`)
  } else {
    lines.push('source: "clipboard"')
  }
  if (input.metadata) {
    lines.push(`author: ${yamlString(input.metadata.author)}`)
    lines.push(`duration: ${yamlString(formatDuration(input.metadata.duration))}`)
    lines.push(`upload_date: ${yamlString(formatDate(input.metadata.uploadDate))}`)
  }
  lines.push(`patterns: [${input.outputs.map((o) => yamlString(o.pattern)).join(', ')}]`)
  if (input.audioPath) {
    lines.push(`audio: ${yamlString(input.audioPath)}`)
    if (input.audioProvider) lines.push(`audio_provider: ${yamlString(input.audioProvider)}`)
  }
  lines.push(`created: ${yamlString(input.createdAt.toISOString())}`)

  const taken = new Set(lines.slice(1).map((line) => line.slice(0, line.indexOf(':'))))
  for (const field of input.extraFrontmatter ?? []) {
    if (taken.has(field.key)) continue
    taken.add(field.key)
    lines.push(...field.lines)
  }
  lines.push('---')
  return lines.join('\n')
}

function sourceSection(input: ReportInput): string {
  if (input.source.kind === 'clipboard') {
    return '## Source Information\n\n- **Source:** clipboard'
  }
  const lines = ['## Video Information', '']
  const meta = input.metadata
  if (meta) {
    lines.push(`- **Title:** ${meta.title}`)
    lines.push(`- **Channel:** ${meta.author}`)
    lines.push(`- **Duration:** ${formatDuration(meta.duration)}`)
    lines.push(`- **Views:** ${formatCount(meta.viewCount)}`)
    lines.push(`- **Upload Date:** ${formatDate(meta.uploadDate)}`)
  }
  lines.push(`- **URL:** ${input.source.url}`)
  return lines.join('\n')
}

/** Render the final markdown report. Sections with nothing to show are omitted. */
export function renderReport(input: ReportInput): string {
  const sections: string[] = [frontmatter(input), `# ${input.title}`, sourceSection(input)]

  for (const output of input.outputs) {
    sections.push(`## ${PATTERN_HEADINGS[output.pattern]}\n\n${output.content.trim()}`)
  }

  const urls = extractUrls([input.text, input.metadata?.description ?? ''].join('\n'))
  if (urls.length > 0) {
    sections.push(`## URLs Mentioned\n\n${urls.map((u) => `- ${u}`).join('\n')}`)
  }

  const heading = input.source.kind === 'video' ? 'Transcript Excerpt' : 'Source Excerpt'
  const snippet = excerpt(input.text)
  if (snippet.length > 0) {
    sections.push(`## ${heading}\n\n> ${snippet}`)
  }

  if (input.audioPath) {
    sections.push(`## Audio Summary\n\n🔊 [Listen to summary](<${input.audioPath}>)`)
  }

  const description = input.metadata?.description.trim()
  if (description) {
    sections.push(`## Original Description\n\n\`\`\`\n${description}\n\`\`\``)
  }

  return sections.join('\n\n') + '\n'
}
