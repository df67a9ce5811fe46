/**
 * Escalation state machine.
 *
 *   normal -> watchful -> crisis -> cooldown -> normal   (plus self-loops)
 *
 * Any crisis-tier assessment moves to crisis in the same step, from every
 * state. Leaving crisis needs a run of calm (tier none) messages; leaving
 * cooldown needs the cooldown window to elapse. Every step returns an
 * append-only TransitionRecord, self-loops included.
 */

import type { EscalationPolicy } from '../config/schema.js'
import { atLeast } from './risk-classifier.js'
import type {
  Conversation,
  EscalationState,
  RiskAssessment,
  StepResult,
  TransitionEffect,
} from './types.js'

const MINUTE_MS = 60 * 1000

export function newConversation(userId: string, now: Date): Conversation {
  const iso = now.toISOString()
  return {
    userId,
    createdAt: iso,
    lastActivityAt: iso,
    state: 'normal',
    calmStreak: 0,
    cooldownExpiresAt: null,
    archived: false,
  }
}

interface NextState {
  state: EscalationState
  calmStreak: number
  cooldownExpiresAt: string | null
}

function nextState(
  current: Conversation,
  assessment: RiskAssessment,
  policy: EscalationPolicy,
  now: Date,
): NextState {
  const { tier } = assessment

  if (tier === 'crisis') {
    return { state: 'crisis', calmStreak: 0, cooldownExpiresAt: null }
  }

  switch (current.state) {
    case 'normal':
      if (tier === 'elevated') return { state: 'watchful', calmStreak: 0, cooldownExpiresAt: null }
      return { state: 'normal', calmStreak: 0, cooldownExpiresAt: null }

    case 'watchful': {
      if (tier === 'elevated') return { state: 'watchful', calmStreak: 0, cooldownExpiresAt: null }
      const calmStreak = current.calmStreak + 1
      if (calmStreak >= policy.watchfulCalmMessages) {
        return { state: 'normal', calmStreak: 0, cooldownExpiresAt: null }
      }
      return { state: 'watchful', calmStreak, cooldownExpiresAt: null }
    }

    case 'crisis': {
      // Only a fully calm message counts toward leaving crisis
      if (tier !== 'none') return { state: 'crisis', calmStreak: 0, cooldownExpiresAt: null }
      const calmStreak = current.calmStreak + 1
      if (calmStreak >= policy.calmMessagesToCooldown) {
        const expires = new Date(now.getTime() + policy.cooldownWindowMinutes * MINUTE_MS)
        return { state: 'cooldown', calmStreak: 0, cooldownExpiresAt: expires.toISOString() }
      }
      return { state: 'crisis', calmStreak, cooldownExpiresAt: null }
    }

    case 'cooldown': {
      if (atLeast(tier, 'elevated')) return { state: 'crisis', calmStreak: 0, cooldownExpiresAt: null }
      const expiresAt = current.cooldownExpiresAt ? new Date(current.cooldownExpiresAt) : null
      if (!expiresAt || Number.isNaN(expiresAt.getTime()) || now.getTime() >= expiresAt.getTime()) {
        return { state: 'normal', calmStreak: 0, cooldownExpiresAt: null }
      }
      return { state: 'cooldown', calmStreak: current.calmStreak + 1, cooldownExpiresAt: current.cooldownExpiresAt }
    }

    default:
      // Unknown persisted state: treat as crisis rather than guess
      return { state: 'crisis', calmStreak: 0, cooldownExpiresAt: null }
  }
}

function effectFor(previous: EscalationState, next: EscalationState): TransitionEffect {
  if (next === 'crisis') return previous === 'crisis' ? 'none' : 'safety_payload'
  if (next === previous) return 'none'
  if (next === 'cooldown') return 'check_in'
  if (next === 'normal' && (previous === 'cooldown' || previous === 'watchful')) return 'check_in'
  return 'none'
}

export function transition(
  conversation: Conversation,
  assessment: RiskAssessment,
  policy: EscalationPolicy,
  now: Date,
): StepResult {
  const next = nextState(conversation, assessment, policy, now)
  const at = now.toISOString()

  return {
    conversation: {
      ...conversation,
      lastActivityAt: at,
      state: next.state,
      calmStreak: next.calmStreak,
      cooldownExpiresAt: next.cooldownExpiresAt,
      archived: false,
    },
    transition: {
      userId: conversation.userId,
      previousState: conversation.state,
      nextState: next.state,
      tier: assessment.tier,
      reason: assessment.reason,
      categories: assessment.signals.map(s => s.category),
      aggregateScore: assessment.aggregateScore,
      effect: effectFor(conversation.state, next.state),
      at,
    },
  }
}
