import { describe, expect, it } from 'vitest'
import { loadSafetyConfig } from '../config/loader.js'
import { classifierPolicyFrom, classify, effectiveThresholds } from './risk-classifier.js'
import { compileLexicon, extract } from './signal-extractor.js'
import { ESCALATION_STATES, type EscalationState, type Signal, type SignalSet } from './types.js'

const config = loadSafetyConfig()
const lexicon = compileLexicon(config.lexicon)
const policy = classifierPolicyFrom(config.settings)
const now = new Date('2026-10-01T12:00:00.000Z')

function set(...signals: Array<Pick<Signal, 'category' | 'weight'>>): SignalSet {
  return { signals: signals.map(s => ({ ...s, evidence: 'test', negated: false })), tokenCount: 5 }
}

function tierOf(text: string, state: EscalationState = 'normal', moodDeclining = false) {
  return classify(extract(text, lexicon), { state, moodDeclining }, policy, now)
}

describe('classify', () => {
  it('returns none without signals', () => {
    expect(classify(set(), { state: 'normal', moodDeclining: false }, policy, now)).toMatchObject({
      tier: 'none',
      reason: 'no_signal',
      aggregateScore: 0,
    })
  })

  it('classifies the pills scenario as a hard-trigger crisis', () => {
    const assessment = tierOf("I don't see the point anymore, I have pills ready")
    expect(assessment).toMatchObject({ tier: 'crisis', reason: 'hard_trigger', aggregateScore: 1.5 })
  })

  it('applies the hard trigger in every state', () => {
    for (const state of ESCALATION_STATES) {
      expect(tierOf('I want to kill myself', state).tier).toBe('crisis')
    }
  })

  it('fires a compound trigger below the hard threshold', () => {
    const assessment = classify(
      set({ category: 'self_harm_intent', weight: 0.6 }, { category: 'immediacy_plan', weight: 0.55 }),
      { state: 'normal', moodDeclining: false },
      policy,
      now,
    )
    expect(assessment).toMatchObject({ tier: 'crisis', reason: 'compound_trigger' })
  })

  it('raises elevated on aggregate score', () => {
    expect(tierOf('I feel hopeless and my dad hits me')).toMatchObject({
      tier: 'elevated',
      reason: 'aggregate_score',
      aggregateScore: 1.15,
    })
  })

  it('raises elevated when two categories co-occur below the aggregate', () => {
    const assessment = classify(
      set({ category: 'hopelessness', weight: 0.3 }, { category: 'substance_crisis', weight: 0.35 }),
      { state: 'normal', moodDeclining: false },
      policy,
      now,
    )
    expect(assessment).toMatchObject({ tier: 'elevated', reason: 'co_occurrence', aggregateScore: 0.65 })
  })

  it('keeps a single weak match low', () => {
    expect(tierOf('everything feels hopeless')).toMatchObject({ tier: 'low', reason: 'weak_signal' })
  })

  it('does not escalate a clearly negated statement', () => {
    expect(tierOf('I am not going to hurt myself').tier).toBe('low')
    expect(['crisis', 'elevated']).toContain(tierOf('I want to hurt myself').tier)
  })

  it('escalates ideation that follows an unrelated negation', () => {
    for (const text of ['i dont care i want to die', 'im not okay i want to die', 'no i want to die']) {
      expect(tierOf(text)).toMatchObject({ tier: 'crisis', reason: 'hard_trigger' })
    }
  })

  it('lowers thresholds once in watchful, cooldown or a declining mood', () => {
    expect(tierOf('I keep thinking about suicide', 'normal')).toMatchObject({
      tier: 'elevated',
      heightenedSensitivity: false,
    })
    for (const [state, declining] of [['watchful', false], ['cooldown', false], ['normal', true]] as const) {
      expect(tierOf('I keep thinking about suicide', state, declining)).toMatchObject({
        tier: 'crisis',
        reason: 'hard_trigger',
        heightenedSensitivity: true,
      })
    }
    expect(effectiveThresholds(config.settings.thresholds, true)).toMatchObject({
      hardTrigger: 0.68,
      elevatedAggregate: 0.56,
    })
  })

  it('is deterministic for identical inputs', () => {
    const signals = extract('nobody cares, I blacked out', lexicon)
    const context = { state: 'watchful' as const, moodDeclining: false }
    const first = classify(signals, context, policy, now)
    for (let i = 0; i < 5; i++) {
      expect(classify(signals, context, policy, now)).toEqual(first)
    }
  })
})
