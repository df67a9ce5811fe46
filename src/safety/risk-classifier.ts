import type { SafetySettings, Thresholds } from '../config/schema.js'
import type {
  AssessmentReason,
  ClassificationContext,
  RiskAssessment,
  RiskTier,
  SignalCategory,
  SignalSet,
} from './types.js'
import { RISK_TIERS } from './types.js'

export interface ClassifierPolicy {
  thresholds: Thresholds
  compoundTriggers: ReadonlyArray<readonly [SignalCategory, SignalCategory]>
}

export function classifierPolicyFrom(settings: SafetySettings): ClassifierPolicy {
  return { thresholds: settings.thresholds, compoundTriggers: settings.compoundTriggers }
}

export function tierRank(tier: RiskTier): number {
  return RISK_TIERS.indexOf(tier)
}

export function atLeast(tier: RiskTier, floor: RiskTier): boolean {
  return tierRank(tier) >= tierRank(floor)
}

function round(value: number): number {
  return Math.round(value * 10000) / 10000
}

/** Watchful and cooldown conversations, or a declining mood run, lower the thresholds once. */
export function isHeightened(context: ClassificationContext): boolean {
  return context.state === 'watchful' || context.state === 'cooldown' || context.moodDeclining
}

export function effectiveThresholds(thresholds: Thresholds, heightened: boolean): Thresholds {
  if (!heightened) return thresholds
  return {
    ...thresholds,
    hardTrigger: round(thresholds.hardTrigger * thresholds.sensitivityFactor),
    elevatedAggregate: round(thresholds.elevatedAggregate * thresholds.sensitivityFactor),
  }
}

/**
 * Map a signal set to a risk tier.
 *
 * Pure: the same signals and context always give the same assessment. `now`
 * only stamps the result. Explicit intent never depends on averaging: a single
 * strong category is enough for crisis.
 */
export function classify(
  signals: SignalSet,
  context: ClassificationContext,
  policy: ClassifierPolicy,
  now: Date,
): RiskAssessment {
  const heightened = isHeightened(context)
  const t = effectiveThresholds(policy.thresholds, heightened)
  const weights = new Map<SignalCategory, number>(signals.signals.map(s => [s.category, s.weight]))
  const aggregateScore = round(signals.signals.reduce((sum, s) => sum + s.weight, 0))

  let tier: RiskTier
  let reason: AssessmentReason

  if (signals.signals.length === 0) {
    tier = 'none'
    reason = 'no_signal'
  } else if (signals.signals.some(s => s.weight >= t.hardTrigger)) {
    tier = 'crisis'
    reason = 'hard_trigger'
  } else if (policy.compoundTriggers.some(([a, b]) =>
    (weights.get(a) ?? 0) >= t.compoundMinWeight && (weights.get(b) ?? 0) >= t.compoundMinWeight
  )) {
    tier = 'crisis'
    reason = 'compound_trigger'
  } else if (aggregateScore >= t.elevatedAggregate) {
    tier = 'elevated'
    reason = 'aggregate_score'
  } else if (signals.signals.filter(s => s.weight >= t.coOccurrenceMinWeight).length >= 2) {
    tier = 'elevated'
    reason = 'co_occurrence'
  } else {
    tier = 'low'
    reason = 'weak_signal'
  }

  return Object.freeze({
    tier,
    reason,
    signals: signals.signals,
    aggregateScore,
    heightenedSensitivity: heightened,
    assessedAt: now.toISOString(),
  })
}
