import type { PoolClient } from 'pg'
import { StateStoreUnavailable } from '../errors.js'
import { MOOD_LABELS, type MoodEntry, type MoodLabel, type MoodSource } from '../mood/types.js'
import {
  ESCALATION_STATES,
  RISK_TIERS,
  SIGNAL_CATEGORIES,
  type AssessmentReason,
  type Conversation,
  type EscalationState,
  type RiskTier,
  type SignalCategory,
  type StepResult,
  type TransitionEffect,
  type TransitionRecord,
} from '../safety/types.js'
import type { Instrument, ScreeningResult } from '../screening/types.js'
import { safeError } from '../utils/safe-log.js'
import { getPool } from './db.js'
import type { MoodStore, SafetyStore, ScreeningStore } from './types.js'

interface ConversationRow {
  user_id: string
  created_at: Date | string
  last_activity_at: Date | string
  state: string
  calm_streak: number
  cooldown_expires_at: Date | string | null
  archived: boolean
}

interface TransitionRow {
  user_id: string
  previous_state: string
  next_state: string
  tier: string
  reason: string
  categories: unknown
  aggregate_score: number | string
  effect: string
  at: Date | string
}

interface MoodRow {
  user_id: string
  score: number
  label: string
  note: string | null
  source: string
  recorded_at: Date | string
}

interface ScreeningRow {
  user_id: string
  instrument: string
  score: number
  max_score: number
  severity: string
  responses: unknown
  completed_at: Date | string
}

function toIso(value: Date | string | null | undefined): string {
  if (!value) return new Date(0).toISOString()
  const parsed = value instanceof Date ? value : new Date(value)
  return Number.isNaN(parsed.getTime()) ? new Date(0).toISOString() : parsed.toISOString()
}

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some(v => v === value)
}

// A state we cannot read back is treated as crisis, never as normal
function parseState(value: string): EscalationState {
  return isOneOf(ESCALATION_STATES, value) ? value : 'crisis'
}

function parseTier(value: string): RiskTier {
  return isOneOf(RISK_TIERS, value) ? value : 'none'
}

const REASONS: readonly AssessmentReason[] = [
  'hard_trigger', 'compound_trigger', 'aggregate_score', 'co_occurrence', 'weak_signal', 'no_signal',
]
const EFFECTS: readonly TransitionEffect[] = ['safety_payload', 'check_in', 'none']

function parseCategories(value: unknown): SignalCategory[] {
  if (!Array.isArray(value)) return []
  return value.filter((item): item is SignalCategory =>
    typeof item === 'string' && isOneOf(SIGNAL_CATEGORIES, item))
}

function rowToConversation(row: ConversationRow): Conversation {
  return {
    userId: row.user_id,
    createdAt: toIso(row.created_at),
    lastActivityAt: toIso(row.last_activity_at),
    state: parseState(row.state),
    calmStreak: Number(row.calm_streak) || 0,
    cooldownExpiresAt: row.cooldown_expires_at ? toIso(row.cooldown_expires_at) : null,
    archived: Boolean(row.archived),
  }
}

function rowToTransition(row: TransitionRow): TransitionRecord {
  return {
    userId: row.user_id,
    previousState: parseState(row.previous_state),
    nextState: parseState(row.next_state),
    tier: parseTier(row.tier),
    reason: isOneOf(REASONS, row.reason) ? row.reason : 'no_signal',
    categories: parseCategories(row.categories),
    aggregateScore: Number(row.aggregate_score) || 0,
    effect: isOneOf(EFFECTS, row.effect) ? row.effect : 'none',
    at: toIso(row.at),
  }
}

const CONVERSATION_COLUMNS = `user_id, created_at, last_activity_at, state, calm_streak,
  cooldown_expires_at, archived`

export class PgSafetyStore implements SafetyStore {
  async loadConversation(userId: string): Promise<Conversation | null> {
    try {
      const { rows } = await getPool().query<ConversationRow>(
        `SELECT ${CONVERSATION_COLUMNS} FROM conversations WHERE user_id = $1`,
        [userId],
      )
      return rows.length > 0 ? rowToConversation(rows[0]) : null
    } catch (err) {
      throw new StateStoreUnavailable('Failed to load conversation', { cause: err, context: { userId } })
    }
  }

  async commitStep(step: StepResult): Promise<void> {
    const { conversation: c, transition: t } = step
    let client: PoolClient
    try {
      client = await getPool().connect()
    } catch (err) {
      throw new StateStoreUnavailable('Failed to acquire a connection', { cause: err, context: { userId: c.userId } })
    }

    try {
      await client.query('BEGIN')
      await client.query(
        `INSERT INTO conversations (
           user_id, created_at, last_activity_at, state, calm_streak, cooldown_expires_at, archived
         )
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         ON CONFLICT (user_id) DO UPDATE SET
           last_activity_at = EXCLUDED.last_activity_at,
           state = EXCLUDED.state,
           calm_streak = EXCLUDED.calm_streak,
           cooldown_expires_at = EXCLUDED.cooldown_expires_at,
           archived = EXCLUDED.archived,
           check_in_sent_at = CASE
             WHEN EXCLUDED.state = 'cooldown' AND conversations.state <> 'cooldown' THEN NULL
             ELSE conversations.check_in_sent_at
           END`,
        [c.userId, c.createdAt, c.lastActivityAt, c.state, c.calmStreak, c.cooldownExpiresAt, c.archived],
      )
      await client.query(
        `INSERT INTO escalation_transitions (
           user_id, previous_state, next_state, tier, reason, categories, aggregate_score, effect, at
         )
         VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7, $8, $9)`,
        [
          t.userId,
          t.previousState,
          t.nextState,
          t.tier,
          t.reason,
          JSON.stringify(t.categories),
          t.aggregateScore,
          t.effect,
          t.at,
        ],
      )
      await client.query('COMMIT')
    } catch (err) {
      await client.query('ROLLBACK').catch(rollbackErr => {
        console.error('[DB] Rollback failed:', safeError(rollbackErr))
      })
      throw new StateStoreUnavailable('Failed to commit escalation step', { cause: err, context: { userId: c.userId } })
    } finally {
      client.release()
    }
  }

  async listTransitions(userId: string, limit: number): Promise<TransitionRecord[]> {
    try {
      const { rows } = await getPool().query<TransitionRow>(
        `SELECT user_id, previous_state, next_state, tier, reason, categories, aggregate_score, effect, at
         FROM (
           SELECT * FROM escalation_transitions
           WHERE user_id = $1
           ORDER BY at DESC, id DESC
           LIMIT $2
         ) recent
         ORDER BY at ASC, id ASC`,
        [userId, limit],
      )
      return rows.map(rowToTransition)
    } catch (err) {
      throw new StateStoreUnavailable('Failed to list transitions', { cause: err, context: { userId } })
    }
  }

  async archiveIdle(inactiveSince: Date): Promise<number> {
    const result = await getPool().query(
      `UPDATE conversations SET archived = TRUE
       WHERE archived = FALSE AND state = 'normal' AND last_activity_at < $1`,
      [inactiveSince.toISOString()],
    )
    return result.rowCount ?? 0
  }

  async findDueCheckIns(now: Date, limit: number): Promise<Conversation[]> {
    const { rows } = await getPool().query<ConversationRow>(
      `SELECT ${CONVERSATION_COLUMNS} FROM conversations
       WHERE state = 'cooldown'
         AND cooldown_expires_at <= $1
         AND check_in_sent_at IS NULL
       ORDER BY cooldown_expires_at ASC
       LIMIT $2`,
      [now.toISOString(), limit],
    )
    return rows.map(rowToConversation)
  }

  async markCheckedIn(userId: string, at: Date): Promise<void> {
    await getPool().query(
      `UPDATE conversations SET check_in_sent_at = $2 WHERE user_id = $1`,
      [userId, at.toISOString()],
    )
  }
}

function parseMoodLabel(value: string, score: number): MoodLabel {
  if (isOneOf(MOOD_LABELS, value)) return value
  return MOOD_LABELS[Math.min(5, Math.max(1, score)) - 1]
}

function parseMoodSource(value: string): MoodSource {
  return value === 'inferred' ? 'inferred' : 'self_report'
}

export class PgMoodStore implements MoodStore {
  async append(entry: MoodEntry): Promise<void> {
    await getPool().query(
      `INSERT INTO mood_entries (user_id, score, label, note, source, recorded_at)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [entry.conversationId, entry.score, entry.label, entry.note, entry.source, entry.recordedAt],
    )
  }

  async history(conversationId: string, limit: number): Promise<MoodEntry[]> {
    const { rows } = await getPool().query<MoodRow>(
      `SELECT user_id, score, label, note, source, recorded_at
       FROM (
         SELECT * FROM mood_entries
         WHERE user_id = $1
         ORDER BY recorded_at DESC, id DESC
         LIMIT $2
       ) recent
       ORDER BY recorded_at ASC, id ASC`,
      [conversationId, limit],
    )
    return rows.map(row => ({
      conversationId: row.user_id,
      recordedAt: toIso(row.recorded_at),
      score: Number(row.score),
      label: parseMoodLabel(row.label, Number(row.score)),
      note: row.note ?? null,
      source: parseMoodSource(row.source),
    }))
  }
}

function parseResponses(value: unknown): number[] {
  if (!Array.isArray(value)) return []
  return value.filter((item): item is number => typeof item === 'number')
}

export class PgScreeningStore implements ScreeningStore {
  async saveResult(result: ScreeningResult): Promise<void> {
    await getPool().query(
      `INSERT INTO screening_results (user_id, instrument, score, max_score, severity, responses, completed_at)
       VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7)`,
      [
        result.userId,
        result.instrument,
        result.score,
        result.maxScore,
        result.severity,
        JSON.stringify(result.responses),
        result.completedAt,
      ],
    )
  }

  async listResults(userId: string, limit: number): Promise<ScreeningResult[]> {
    const { rows } = await getPool().query<ScreeningRow>(
      `SELECT user_id, instrument, score, max_score, severity, responses, completed_at
       FROM screening_results
       WHERE user_id = $1
       ORDER BY completed_at DESC
       LIMIT $2`,
      [userId, limit],
    )
    return rows.map(row => ({
      userId: row.user_id,
      instrument: (row.instrument === 'GAD-7' ? 'GAD-7' : 'PHQ-9') satisfies Instrument,
      score: Number(row.score),
      maxScore: Number(row.max_score),
      severity: row.severity,
      responses: parseResponses(row.responses),
      completedAt: toIso(row.completed_at),
    }))
  }
}
