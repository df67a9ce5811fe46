/**
 * Safety audit log lines.
 * Structured console output for every processing step. Message text is never
 * logged, only its length, word count and the matched categories.
 */

import { safeError, type TextShape } from '../utils/safe-log.js'
import type { ResponseDecision, RiskAssessment, TransitionRecord } from './types.js'

export function logAssessment(userId: string, assessment: RiskAssessment, text: TextShape): void {
  console.log('[safety] assessment', {
    userId,
    tier: assessment.tier,
    reason: assessment.reason,
    categories: assessment.signals.map(s => `${s.category}:${s.weight}${s.negated ? ':neg' : ''}`),
    aggregateScore: assessment.aggregateScore,
    heightened: assessment.heightenedSensitivity,
    text,
  })
}

export function logTransition(record: TransitionRecord): void {
  if (record.previousState === record.nextState) {
    console.log('[safety] state_unchanged', {
      userId: record.userId,
      state: record.nextState,
      tier: record.tier,
    })
    return
  }
  console.log('[safety] state_transition', {
    userId: record.userId,
    from: record.previousState,
    to: record.nextState,
    tier: record.tier,
    reason: record.reason,
    effect: record.effect,
    at: record.at,
  })
}

export function logDecision(userId: string, decision: ResponseDecision): void {
  console.log('[safety] decision', {
    userId,
    strategy: decision.strategy,
    payloadId: decision.payloadId,
    allowGenerative: decision.allowGenerative,
    region: decision.region,
  })
}

export function logFailClosed(userId: string, err: unknown): void {
  console.error('[safety] fail_closed', { userId, error: safeError(err) })
}
