import type { Lexicon } from '../config/schema.js'
import { ClassificationInputError } from '../errors.js'
import {
  findPhrase,
  hasIntensifier,
  isNegated,
  normalizeText,
  tokenizePhrase,
  type NormalizedText,
} from './normalizer.js'
import { SIGNAL_CATEGORIES, type Signal, type SignalCategory, type SignalSet } from './types.js'

interface CompiledEntry {
  category: SignalCategory
  phrase: string
  tokens: string[]
  weight: number
}

export interface CompiledLexicon {
  version: string
  entries: CompiledEntry[]
  negationCues: ReadonlySet<string>
  negationWindow: number
  negatedWeightFactor: number
  scopeBreakers: ReadonlySet<string>
  intensifiers: ReadonlySet<string>
  intensifierWindow: number
  intensifierBoost: number
}

const EMPTY_SIGNAL_SET: SignalSet = Object.freeze({ signals: Object.freeze([]), tokenCount: 0 })

function roundWeight(value: number): number {
  return Math.round(Math.min(1, Math.max(0, value)) * 100) / 100
}

/** Pre-tokenize lexicon phrases once so extraction is a plain token scan. */
export function compileLexicon(lexicon: Lexicon): CompiledLexicon {
  const entries: CompiledEntry[] = []
  for (const category of SIGNAL_CATEGORIES) {
    for (const entry of lexicon.families[category]) {
      const tokens = tokenizePhrase(entry.phrase)
      if (tokens.length === 0) continue
      entries.push({ category, phrase: tokens.join(' '), tokens, weight: entry.weight })
    }
  }

  return {
    version: lexicon.version,
    entries,
    negationCues: new Set(lexicon.negation.cues.flatMap(tokenizePhrase)),
    negationWindow: lexicon.negation.window,
    negatedWeightFactor: lexicon.negation.weightFactor,
    scopeBreakers: new Set(lexicon.negation.scopeBreakers.flatMap(tokenizePhrase)),
    intensifiers: new Set(lexicon.intensifiers.words.flatMap(tokenizePhrase)),
    intensifierWindow: lexicon.intensifiers.window,
    intensifierBoost: lexicon.intensifiers.boost,
  }
}

function prepare(text: unknown): NormalizedText {
  if (typeof text !== 'string') {
    throw new ClassificationInputError('Message text is not a string', {
      context: { receivedType: text === null ? 'null' : typeof text },
    })
  }
  return normalizeText(text)
}

function better(current: Signal | undefined, candidate: Signal): boolean {
  if (!current) return true
  if (candidate.weight !== current.weight) return candidate.weight > current.weight
  // Equal weight: prefer the non-negated reading, then the longer phrase
  if (candidate.negated !== current.negated) return !candidate.negated
  return candidate.evidence.length > current.evidence.length
}

/**
 * Scan text for crisis indicators.
 *
 * Deterministic and side-effect free. Non-string input is recovered as an
 * empty signal set. Within a category only the strongest match is kept.
 */
export function extract(text: unknown, lexicon: CompiledLexicon): SignalSet {
  let normalized: NormalizedText
  try {
    normalized = prepare(text)
  } catch (err) {
    if (err instanceof ClassificationInputError) {
      console.warn('[safety] unclassifiable input treated as empty', err.toJSON())
      return EMPTY_SIGNAL_SET
    }
    throw err
  }

  if (normalized.tokenCount === 0) return EMPTY_SIGNAL_SET

  const strongest = new Map<SignalCategory, Signal>()

  for (const clause of normalized.clauses) {
    for (const entry of lexicon.entries) {
      for (const start of findPhrase(clause, entry.tokens)) {
        const negated = isNegated(clause, start, lexicon.negationCues, lexicon.negationWindow, lexicon.scopeBreakers)
        let weight = entry.weight
        if (negated) {
          weight *= lexicon.negatedWeightFactor
        } else if (hasIntensifier(clause, start, lexicon.intensifiers, lexicon.intensifierWindow, lexicon.scopeBreakers)) {
          weight += lexicon.intensifierBoost
        }

        const candidate: Signal = {
          category: entry.category,
          weight: roundWeight(weight),
          evidence: entry.phrase,
          negated,
        }
        if (better(strongest.get(entry.category), candidate)) {
          strongest.set(entry.category, candidate)
        }
      }
    }
  }

  // Stable category order keeps the output comparable across calls
  const signals = SIGNAL_CATEGORIES
    .map(category => strongest.get(category))
    .filter((signal): signal is Signal => signal !== undefined)
    .map(signal => Object.freeze(signal))

  return Object.freeze({ signals: Object.freeze(signals), tokenCount: normalized.tokenCount })
}
