import { describe, expect, it, vi } from 'vitest'
import { loadSafetyConfig } from '../config/loader.js'
import { normalizeText } from './normalizer.js'
import { compileLexicon, extract } from './signal-extractor.js'

const lexicon = compileLexicon(loadSafetyConfig().lexicon)

function weights(text: unknown): Record<string, number> {
  return Object.fromEntries(extract(text, lexicon).signals.map(s => [s.category, s.weight]))
}

describe('normalizeText', () => {
  it('folds case, joins contractions and splits clauses', () => {
    expect(normalizeText("I DON’T know, but I'm fine!").clauses).toEqual([
      ['i', 'dont', 'know'],
      ['im', 'fine'],
    ])
  })

  it('yields nothing for non-strings and blank text', () => {
    expect(normalizeText(42)).toEqual({ clauses: [], tokenCount: 0 })
    expect(normalizeText('   \n ')).toEqual({ clauses: [], tokenCount: 0 })
  })
})

describe('extract', () => {
  it('flags hopelessness and a plan in the pills scenario', () => {
    const set = extract("I don't see the point anymore, I have pills ready", lexicon)

    expect(set.signals).toEqual([
      { category: 'hopelessness', weight: 0.6, evidence: 'dont see the point', negated: false },
      { category: 'immediacy_plan', weight: 0.9, evidence: 'have pills ready', negated: false },
    ])
    expect(set.tokenCount).toBe(10)
  })

  it('scales down a negated match', () => {
    const set = extract('I am not going to hurt myself', lexicon)
    expect(set.signals).toEqual([
      { category: 'self_harm_intent', weight: 0.19, evidence: 'going to hurt myself', negated: true },
    ])
  })

  it('keeps the full weight without negation', () => {
    expect(weights('I want to hurt myself')).toEqual({ self_harm_intent: 0.9 })
  })

  it('does not carry negation across a clause break', () => {
    const [signal] = extract('no, but I want to die', lexicon).signals
    expect(signal).toMatchObject({ category: 'passive_ideation', weight: 0.85, negated: false })
  })

  it('ends negation scope at a new unpunctuated clause', () => {
    for (const text of ['i dont care i want to die', 'im not okay i want to die', 'no i want to die']) {
      expect(extract(text, lexicon).signals).toEqual([
        { category: 'passive_ideation', weight: 0.85, evidence: 'want to die', negated: false },
      ])
    }
  })

  it('still negates within the same clause', () => {
    expect(extract('i dont want to die', lexicon).signals).toEqual([
      { category: 'passive_ideation', weight: 0.17, evidence: 'want to die', negated: true },
    ])
  })

  it('boosts an intensified match and caps at 1', () => {
    expect(weights('I really want to die')).toEqual({ passive_ideation: 0.95 })
    expect(weights('I am seriously going to kill myself')).toEqual({ self_harm_intent: 1 })
  })

  it('keeps only the strongest match per category', () => {
    const set = extract('i want to kill myself. i am going to kill myself', lexicon)
    expect(set.signals).toHaveLength(1)
    expect(set.signals[0]).toMatchObject({ evidence: 'going to kill myself', weight: 1 })
  })

  it('returns an empty set for empty text', () => {
    expect(extract('', lexicon).signals).toEqual([])
    expect(extract('just had lunch with friends', lexicon).signals).toEqual([])
  })

  it('recovers non-string input as an empty set', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined)
    expect(extract(undefined, lexicon)).toEqual({ signals: [], tokenCount: 0 })
    expect(extract({ text: 'kill myself' }, lexicon).signals).toEqual([])
    expect(warn).toHaveBeenCalledTimes(2)
    warn.mockRestore()
  })

  it('is deterministic and returns frozen output', () => {
    const text = 'nobody cares and my dad hits me'
    const first = extract(text, lexicon)
    expect(extract(text, lexicon)).toEqual(first)
    expect(Object.isFrozen(first)).toBe(true)
    expect(Object.isFrozen(first.signals)).toBe(true)
  })
})
