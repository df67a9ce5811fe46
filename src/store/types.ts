import type { MoodEntry } from '../mood/types.js'
import type { Conversation, StepResult, TransitionRecord } from '../safety/types.js'
import type { ScreeningResult } from '../screening/types.js'

/**
 * Escalation state persistence. Conversations are archived, never deleted;
 * transitions are append-only.
 */
export interface SafetyStore {
  loadConversation(userId: string): Promise<Conversation | null>
  /** Conversation upsert and transition insert as one atomic write. */
  commitStep(step: StepResult): Promise<void>
  /** Most recent `limit` transitions, oldest first. */
  listTransitions(userId: string, limit: number): Promise<TransitionRecord[]>
  archiveIdle(inactiveSince: Date): Promise<number>
  /** Cooldown conversations whose window has passed and that have not had a check-in yet. */
  findDueCheckIns(now: Date, limit: number): Promise<Conversation[]>
  markCheckedIn(userId: string, at: Date): Promise<void>
}

export interface MoodStore {
  append(entry: MoodEntry): Promise<void>
  /** Most recent `limit` entries, oldest first. */
  history(conversationId: string, limit: number): Promise<MoodEntry[]>
}

export interface ScreeningStore {
  saveResult(result: ScreeningResult): Promise<void>
  listResults(userId: string, limit: number): Promise<ScreeningResult[]>
}
