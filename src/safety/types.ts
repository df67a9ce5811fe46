export const SIGNAL_CATEGORIES = [
  'self_harm_intent',
  'passive_ideation',
  'hopelessness',
  'immediacy_plan',
  'abuse_disclosure',
  'substance_crisis',
] as const

export type SignalCategory = typeof SIGNAL_CATEGORIES[number]

export const RISK_TIERS = ['none', 'low', 'elevated', 'crisis'] as const

export type RiskTier = typeof RISK_TIERS[number]

export const ESCALATION_STATES = ['normal', 'watchful', 'crisis', 'cooldown'] as const

export type EscalationState = typeof ESCALATION_STATES[number]

export interface Signal {
  category: SignalCategory
  weight: number
  /** Lexicon phrase that produced the winning weight */
  evidence: string
  negated: boolean
}

/** Immutable per-message extraction result. At most one signal per category. */
export interface SignalSet {
  signals: readonly Signal[]
  tokenCount: number
}

export type AssessmentReason =
  | 'hard_trigger'
  | 'compound_trigger'
  | 'aggregate_score'
  | 'co_occurrence'
  | 'weak_signal'
  | 'no_signal'

export interface RiskAssessment {
  tier: RiskTier
  reason: AssessmentReason
  signals: readonly Signal[]
  aggregateScore: number
  heightenedSensitivity: boolean
  assessedAt: string
}

export interface ClassificationContext {
  state: EscalationState
  moodDeclining: boolean
}

export interface Conversation {
  userId: string
  createdAt: string
  lastActivityAt: string
  state: EscalationState
  /** Consecutive calm messages counted toward leaving crisis or watchful */
  calmStreak: number
  cooldownExpiresAt: string | null
  archived: boolean
}

export type TransitionEffect = 'safety_payload' | 'check_in' | 'none'

export interface TransitionRecord {
  userId: string
  previousState: EscalationState
  nextState: EscalationState
  tier: RiskTier
  reason: AssessmentReason
  categories: SignalCategory[]
  aggregateScore: number
  effect: TransitionEffect
  at: string
}

export interface StepResult {
  conversation: Conversation
  transition: TransitionRecord
}

export type PayloadId = 'crisis' | 'cooldown_check_in' | 'watchful_footer' | 'check_in'

export type StyleDirectiveId = 'normal' | 'watchful'

export interface StyleDirective {
  id: StyleDirectiveId
  instructions: string[]
}

export type ResponseDecision =
  | {
    strategy: 'fixed_safety'
    mustUseFixedPayload: true
    allowGenerative: false
    payloadId: 'crisis'
    payload: string
    region: string
  }
  | {
    strategy: 'supportive_blended'
    mustUseFixedPayload: false
    allowGenerative: boolean
    payloadId: PayloadId
    payload: string
    region: string
    styleDirective: StyleDirective
  }
  | {
    strategy: 'generative_passthrough'
    mustUseFixedPayload: false
    allowGenerative: true
    payloadId: null
    region: string
    styleDirective: StyleDirective
  }

export interface SafetyOutcome {
  userId: string
  assessment: RiskAssessment
  state: EscalationState
  transition: TransitionRecord | null
  decision: ResponseDecision
  /** True when the store failed and the outcome was forced to the safety payload */
  degraded: boolean
}
