/**
 * Text normalization for the signal extractor.
 *
 * Output is a list of clauses, each a list of lower-case word tokens. Clause
 * boundaries matter: a negation only scopes over the clause it appears in, so
 * "not going to hurt myself" is negated but "no, but I want to die" is not.
 * Within a clause, scope breakers from the lexicon end a negation's reach.
 */

export interface NormalizedText {
  clauses: string[][]
  tokenCount: number
}

const CLAUSE_BREAK = /[.!?;,:\n\r]+|\bbut\b/
const APOSTROPHES = /[‘’ʼ`´]/g

export function normalizeText(text: unknown): NormalizedText {
  if (typeof text !== 'string') return { clauses: [], tokenCount: 0 }

  const folded = text
    .normalize('NFKC')
    .toLowerCase()
    .replace(APOSTROPHES, "'")
    // don't -> dont, i'm -> im
    .replace(/(\w)'(\w)/g, '$1$2')

  const clauses: string[][] = []
  let tokenCount = 0

  for (const part of folded.split(CLAUSE_BREAK)) {
    const tokens = part
      .replace(/[^a-z0-9\s]/g, ' ')
      .split(/\s+/)
      .filter(Boolean)
    if (tokens.length === 0) continue
    clauses.push(tokens)
    tokenCount += tokens.length
  }

  return { clauses, tokenCount }
}

/** Start indexes of every occurrence of `phrase` inside `clause`. */
export function findPhrase(clause: readonly string[], phrase: readonly string[]): number[] {
  const hits: number[] = []
  if (phrase.length === 0 || phrase.length > clause.length) return hits

  for (let start = 0; start <= clause.length - phrase.length; start++) {
    let matched = true
    for (let offset = 0; offset < phrase.length; offset++) {
      if (clause[start + offset] !== phrase[offset]) {
        matched = false
        break
      }
    }
    if (matched) hits.push(start)
  }
  return hits
}

/**
 * Scan back from `start` at most `window` tokens for one of `words`. The scan
 * stops at a scope breaker, so a cue in an earlier clause does not reach the
 * phrase even when nothing punctuates the two.
 */
function anyBefore(
  clause: readonly string[],
  start: number,
  words: ReadonlySet<string>,
  window: number,
  breakers: ReadonlySet<string>,
): boolean {
  const from = Math.max(0, start - window)
  for (let i = start - 1; i >= from; i--) {
    if (words.has(clause[i])) return true
    if (breakers.has(clause[i])) return false
  }
  return false
}

export function isNegated(
  clause: readonly string[],
  start: number,
  cues: ReadonlySet<string>,
  window: number,
  breakers: ReadonlySet<string> = new Set(),
): boolean {
  return anyBefore(clause, start, cues, window, breakers)
}

export function hasIntensifier(
  clause: readonly string[],
  start: number,
  intensifiers: ReadonlySet<string>,
  window: number,
  breakers: ReadonlySet<string> = new Set(),
): boolean {
  return anyBefore(clause, start, intensifiers, window, breakers)
}

/** Tokenize a lexicon phrase with the same rules as message text. */
export function tokenizePhrase(phrase: string): string[] {
  return normalizeText(phrase).clauses.flat()
}
