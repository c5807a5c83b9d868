import type { FrontmatterField } from '../types/index.js'

const FIELD_LINE = /^([A-Za-z_][\w-]*):(?:\s|$)/
const CONTINUATION_LINE = /^(?:\s+\S|-\s)/

function blockBody(text: string): string[] | undefined {
  const lines = text.replace(/\r\n/g, '\n').split('\n')
  const start = lines.findIndex((line) => line.trim() === '---')
  if (start === -1) return undefined
  const end = lines.findIndex((line, i) => i > start && line.trim() === '---')
  if (end === -1) return undefined
  return lines.slice(start + 1, end)
}

/**
 * Top-level fields of the first `---` delimited block in a model answer.
 * Anything before the block (a code fence, a preamble) is ignored. Returns an
 * empty list when there is no block, or when a line is neither a `key:` line
 * nor an indented or list continuation of one.
 */
export function parseFrontmatterFields(text: string): FrontmatterField[] {
  const body = blockBody(text)
  if (!body) return []

  const fields: FrontmatterField[] = []
  for (const raw of body) {
    const line = raw.trimEnd()
    if (line.trim() === '') continue
    const match = FIELD_LINE.exec(line)
    if (match) {
      fields.push({ key: match[1], lines: [line] })
      continue
    }
    const current = fields[fields.length - 1]
    if (!current || !CONTINUATION_LINE.test(line)) return []
    current.lines.push(line)
  }
  return fields
}
