/**
 * Mood/session tracker.
 *
 * Append-only mood samples per conversation. The classifier reads the recent
 * run as soft context: a declining run lowers its thresholds.
 */

import { z } from 'zod'
import type { MoodPolicy } from '../config/schema.js'
import { MoodValidationError } from '../errors.js'
import type { MoodStore } from '../store/types.js'
import { MOOD_LABELS, type MoodContext, type MoodEntry, type MoodLabel } from './types.js'

export const MOOD_EMOJI: Record<MoodLabel, string> = {
  awful: '😞',
  low: '😔',
  okay: '😐',
  good: '🙂',
  great: '😄',
}

const MoodInputSchema = z.object({
  conversationId: z.string().min(1),
  score: z.number().int().min(1).max(5),
  label: z.enum(MOOD_LABELS).optional(),
  note: z.string().max(500).nullish(),
  source: z.enum(['self_report', 'inferred']).default('self_report'),
  recordedAt: z.string().datetime().optional(),
})

export type MoodInput = z.input<typeof MoodInputSchema>

export function labelForScore(score: number): MoodLabel {
  return MOOD_LABELS[Math.min(5, Math.max(1, Math.round(score))) - 1]
}

/**
 * True when the last `run` scores strictly decrease, or all of them are at or
 * below `lowScore`. Fewer than `run` entries never count as declining.
 */
export function isDeclining(entries: readonly MoodEntry[], policy: MoodPolicy): boolean {
  if (entries.length < policy.decliningRun) return false
  const tail = entries.slice(-policy.decliningRun).map(e => e.score)
  const strictlyDecreasing = tail.every((score, i) => i === 0 || score < tail[i - 1])
  const allLow = tail.every(score => score <= policy.lowScore)
  return strictlyDecreasing || allLow
}

/** One-line summary for the generative prompt, e.g. "Recent mood: okay → low → awful (declining)". */
export function summarizeMood(entries: readonly MoodEntry[], declining = false): string {
  if (entries.length === 0) return 'No mood check-ins yet.'
  const trail = entries.map(e => e.label).join(' → ')
  return `Recent mood: ${trail}${declining ? ' (declining)' : ''}`
}

export class MoodTracker {
  constructor(
    private readonly store: MoodStore,
    private readonly policy: MoodPolicy,
  ) {}

  async record(input: MoodInput, now: Date = new Date()): Promise<MoodEntry> {
    const parsed = MoodInputSchema.safeParse(input)
    if (!parsed.success) {
      throw new MoodValidationError('Invalid mood entry', {
        context: { issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`) },
      })
    }
    const { conversationId, score, label, note, source, recordedAt } = parsed.data
    const entry: MoodEntry = Object.freeze({
      conversationId,
      recordedAt: recordedAt ?? now.toISOString(),
      score,
      label: label ?? labelForScore(score),
      note: note?.trim() ? note.trim() : null,
      source,
    })
    await this.store.append(entry)
    console.log('[mood] entry recorded', { conversationId, score, source })
    return entry
  }

  history(conversationId: string, limit: number = this.policy.historyLimit): Promise<MoodEntry[]> {
    return this.store.history(conversationId, Math.max(1, limit))
  }

  async context(conversationId: string): Promise<MoodContext> {
    const recent = await this.history(conversationId)
    return { recent, declining: isDeclining(recent, this.policy) }
  }
}
