import { StateStoreUnavailable } from '../errors.js'
import type { MoodEntry } from '../mood/types.js'
import type { Conversation, StepResult, TransitionRecord } from '../safety/types.js'
import type { ScreeningResult } from '../screening/types.js'
import type { MoodStore, SafetyStore, ScreeningStore } from './types.js'

export interface MemoryStoreOptions {
  /** Simulated outage: every load and commit throws StateStoreUnavailable. */
  failing?: boolean
}

/**
 * Process-local SafetyStore for tests and local runs without DATABASE_URL.
 * A commit replaces the conversation and appends the transition together.
 */
export class MemorySafetyStore implements SafetyStore {
  private readonly conversations = new Map<string, Conversation>()
  private readonly transitions = new Map<string, TransitionRecord[]>()
  private readonly checkedIn = new Map<string, string>()
  failing: boolean

  constructor(options: MemoryStoreOptions = {}) {
    this.failing = options.failing ?? false
  }

  private guard(operation: string, userId?: string): void {
    if (this.failing) {
      throw new StateStoreUnavailable(`Memory store ${operation} failed`, { context: { userId } })
    }
  }

  async loadConversation(userId: string): Promise<Conversation | null> {
    this.guard('load', userId)
    const found = this.conversations.get(userId)
    return found ? { ...found } : null
  }

  async commitStep(step: StepResult): Promise<void> {
    this.guard('commit', step.conversation.userId)
    const { conversation, transition } = step
    const previous = this.conversations.get(conversation.userId)
    if (conversation.state === 'cooldown' && previous?.state !== 'cooldown') {
      this.checkedIn.delete(conversation.userId)
    }
    this.conversations.set(conversation.userId, { ...conversation })
    const log = this.transitions.get(conversation.userId) ?? []
    log.push({ ...transition, categories: [...transition.categories] })
    this.transitions.set(conversation.userId, log)
  }

  async listTransitions(userId: string, limit: number): Promise<TransitionRecord[]> {
    this.guard('list', userId)
    const log = this.transitions.get(userId) ?? []
    return log.slice(-limit).map(record => ({ ...record }))
  }

  async archiveIdle(inactiveSince: Date): Promise<number> {
    let archived = 0
    for (const [userId, conversation] of this.conversations) {
      if (conversation.archived || conversation.state !== 'normal') continue
      if (Date.parse(conversation.lastActivityAt) < inactiveSince.getTime()) {
        this.conversations.set(userId, { ...conversation, archived: true })
        archived++
      }
    }
    return archived
  }

  async findDueCheckIns(now: Date, limit: number): Promise<Conversation[]> {
    const due: Conversation[] = []
    for (const conversation of this.conversations.values()) {
      if (conversation.state !== 'cooldown' || !conversation.cooldownExpiresAt) continue
      if (this.checkedIn.has(conversation.userId)) continue
      if (Date.parse(conversation.cooldownExpiresAt) <= now.getTime()) due.push({ ...conversation })
    }
    return due
      .sort((a, b) => String(a.cooldownExpiresAt).localeCompare(String(b.cooldownExpiresAt)))
      .slice(0, limit)
  }

  async markCheckedIn(userId: string, at: Date): Promise<void> {
    this.checkedIn.set(userId, at.toISOString())
  }
}

export class MemoryMoodStore implements MoodStore {
  private readonly entries = new Map<string, MoodEntry[]>()

  async append(entry: MoodEntry): Promise<void> {
    const list = this.entries.get(entry.conversationId) ?? []
    list.push({ ...entry })
    this.entries.set(entry.conversationId, list)
  }

  async history(conversationId: string, limit: number): Promise<MoodEntry[]> {
    const list = this.entries.get(conversationId) ?? []
    return list.slice(-limit).map(entry => ({ ...entry }))
  }
}

export class MemoryScreeningStore implements ScreeningStore {
  private readonly results: ScreeningResult[] = []

  async saveResult(result: ScreeningResult): Promise<void> {
    this.results.push({ ...result, responses: [...result.responses] })
  }

  async listResults(userId: string, limit: number): Promise<ScreeningResult[]> {
    return this.results
      .filter(result => result.userId === userId)
      .slice(-limit)
      .reverse()
  }
}
