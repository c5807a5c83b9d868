import { sanitizeFilename, splitExtension } from '../../L0-pure/text/text.js'

/** Stop looking for a free name after this many candidates. */
export const MAX_CANDIDATES = 10_000

export interface ResolvedName {
  name: string
  /** The name already holds identical content; nothing needs writing. */
  existing: boolean
}

/** The `attempt`-th candidate for a name: `a.txt`, `a_1.txt`, `a_2.txt`, … */
export function candidateName(name: string, attempt: number): string {
  if (attempt === 0) return name
  const [stem, ext] = splitExtension(name)
  return `${stem}_${attempt}${ext}`
}

/** Candidate names in order, capped at MAX_CANDIDATES. */
export function* candidateNames(name: string): Generator<string> {
  for (let attempt = 0; attempt < MAX_CANDIDATES; attempt++) {
    yield candidateName(name, attempt)
  }
}

/**
 * Pick the name a save should land on, given the names already present in
 * the category. The first candidate that is free, or that holds identical
 * content, wins.
 */
export async function resolveName(
  desiredName: string,
  existingNames: ReadonlySet<string>,
  isIdentical: (name: string) => Promise<boolean>,
): Promise<ResolvedName> {
  for (const name of candidateNames(sanitizeFilename(desiredName))) {
    if (!existingNames.has(name)) return { name, existing: false }
    if (await isIdentical(name)) return { name, existing: true }
  }
  throw new Error(`No free name for ${desiredName} after ${MAX_CANDIDATES} candidates`)
}
