/**
 * Conversation handler: one inbound message in, one directive out.
 *
 * Free text always passes the safety core first. Only when the arbiter
 * allows it does the text, sanitized and with its style directive, reach
 * the generative backend. Any unexpected failure answers with the fixed
 * crisis payload, never a raw error.
 */

import { GenerativeBackendError, MoodValidationError } from '../errors.js'
import { maybeGenerate, type ChatMessage, type Generate } from '../llm/tierManager.js'
import type { MoodTracker } from '../mood/mood-tracker.js'
import { summarizeMood } from '../mood/mood-tracker.js'
import type { MoodEntry } from '../mood/types.js'
import type { SafetyService } from '../safety/safety-service.js'
import type { SafetyOutcome, StyleDirective } from '../safety/types.js'
import { ANSWER_CALLBACK_PREFIX, ASSESS_CALLBACK_PREFIX, type ScreeningFlow, type ScreeningStep } from '../screening/flow.js'
import { INSTRUMENTS, type Instrument } from '../screening/types.js'
import { safeError } from '../utils/safe-log.js'
import {
  BREATHING_TEXT,
  formatMoodLog,
  helpText,
  MOOD_CALLBACK_PREFIX,
  MOOD_PROMPT,
  moodKeyboard,
  moodRecordedText,
  parseCommand,
  parseMoodArgs,
  welcomeText,
  type ParsedCommand,
} from './commands.js'
import { pickFallback } from './fallbacks.js'
import { filterOutput, needsHumanReview } from './output-filter.js'
import { logSuspiciousInput, sanitizeInput } from './sanitize.js'
import type { OutgoingDirective } from './types.js'

export interface CompanionDeps {
  safety: SafetyService
  mood: MoodTracker
  screening: ScreeningFlow
  generate?: Generate
}

export interface HandleOptions {
  /** Cancels generation only; the safety commit always completes */
  signal?: AbortSignal
  firstName?: string
  region?: string
}

const HISTORY_TURNS = 6

function isInstrument(value: string): value is Instrument {
  return INSTRUMENTS.some(instrument => instrument === value)
}

const KNOWN_COMMANDS = ['start', 'help', 'crisis', 'cancel', 'mood', 'moodlog', 'breathe', 'assess']

function isKnownCommand(name: string): boolean {
  return KNOWN_COMMANDS.includes(name)
}

export class Companion {
  private readonly generate: Generate
  // Recent generative turns only, per user; dropped whenever crisis mode is entered
  private readonly history = new Map<string, ChatMessage[]>()

  constructor(private readonly deps: CompanionDeps) {
    this.generate = deps.generate ?? maybeGenerate
  }

  async handleMessage(
    userId: string,
    text: string,
    timestamp: Date = new Date(),
    options: HandleOptions = {},
  ): Promise<OutgoingDirective> {
    try {
      const command = parseCommand(text)
      if (command) return await this.runCommand(userId, text, command, timestamp, options)
      return await this.handleFreeText(userId, text, timestamp, options)
    } catch (err) {
      return this.failClosed(userId, err, options)
    }
  }

  /** Inline keyboard presses. Null for data this handler does not own. */
  async handleCallback(
    userId: string,
    data: string,
    timestamp: Date = new Date(),
    options: HandleOptions = {},
  ): Promise<OutgoingDirective | null> {
    try {
      if (data.startsWith(MOOD_CALLBACK_PREFIX)) {
        return await this.recordMood(userId, data.slice(MOOD_CALLBACK_PREFIX.length), timestamp, options)
      }
      if (data.startsWith(ASSESS_CALLBACK_PREFIX)) {
        const instrument = data.slice(ASSESS_CALLBACK_PREFIX.length)
        if (!isInstrument(instrument)) return null
        return this.plain(this.deps.screening.start(userId, instrument, timestamp))
      }
      if (data.startsWith(ANSWER_CALLBACK_PREFIX)) {
        const step = await this.deps.screening.answer(userId, data.slice(ANSWER_CALLBACK_PREFIX.length), {
          now: timestamp,
          region: options.region,
        })
        return step ? this.renderScreening(userId, step) : null
      }
      return null
    } catch (err) {
      return this.failClosed(userId, err, options)
    }
  }

  private async handleFreeText(
    userId: string,
    text: string,
    timestamp: Date,
    options: HandleOptions,
  ): Promise<OutgoingDirective> {
    const outcome = await this.deps.safety.assess(userId, text, { now: timestamp, region: options.region })

    if (outcome.decision.strategy === 'fixed_safety') {
      return this.fixed(userId, outcome)
    }

    if (this.deps.screening.isActive(userId)) {
      const step = await this.deps.screening.answer(userId, text, { now: timestamp, region: options.region })
      if (step) return this.renderScreening(userId, step, outcome)
    }

    return this.render(userId, text, outcome, options)
  }

  private fixed(userId: string, outcome: SafetyOutcome): OutgoingDirective {
    this.deps.screening.cancel(userId)
    this.history.delete(userId)
    const { decision } = outcome
    return {
      text: decision.strategy === 'fixed_safety' ? decision.payload : this.deps.safety.crisisPayload(decision.region),
      decision,
      state: outcome.state,
      tier: outcome.assessment.tier,
      degraded: outcome.degraded,
    }
  }

  private async render(
    userId: string,
    text: string,
    outcome: SafetyOutcome,
    options: HandleOptions,
  ): Promise<OutgoingDirective> {
    const { decision } = outcome
    const base = { decision, state: outcome.state, tier: outcome.assessment.tier, degraded: outcome.degraded }

    switch (decision.strategy) {
      case 'fixed_safety':
        return this.fixed(userId, outcome)

      case 'supportive_blended': {
        if (!decision.allowGenerative) return { ...base, text: decision.payload }
        const reply = await this.reply(userId, text, decision.styleDirective, options)
        return { ...base, text: `${reply}\n\n${decision.payload}` }
      }

      case 'generative_passthrough': {
        const reply = await this.reply(userId, text, decision.styleDirective, options)
        if (outcome.transition?.effect === 'check_in') {
          return { ...base, text: `${reply}\n\n${this.deps.safety.payload('check_in', decision.region)}` }
        }
        return { ...base, text: reply }
      }
    }
  }

  /** Generated text, or a static supportive reply when generation fails or is filtered. */
  private async reply(
    userId: string,
    text: string,
    directive: StyleDirective,
    options: HandleOptions,
  ): Promise<string> {
    const name = options.firstName ?? 'friend'
    logSuspiciousInput(userId, sanitizeInput(text))

    let moodSummary: string | undefined
    try {
      const context = await this.deps.mood.context(userId)
      moodSummary = summarizeMood(context.recent, context.declining)
    } catch (err) {
      console.warn('[companion] mood summary unavailable', { userId, error: safeError(err) })
    }

    try {
      const result = await this.generate(
        { userText: text, firstName: options.firstName, moodSummary, history: this.history.get(userId) },
        directive,
        { signal: options.signal },
      )
      const filtered = filterOutput(result.text)
      if (filtered.blocked) {
        const log = needsHumanReview(filtered) ? console.error : console.warn
        log('[companion] generated reply blocked', { userId, provider: result.provider, reason: filtered.reason })
        return pickFallback(text, name)
      }
      this.remember(userId, text, filtered.filtered)
      return filtered.filtered
    } catch (err) {
      if (err instanceof GenerativeBackendError) {
        console.warn('[companion] using fallback reply', { userId, error: err.toJSON() })
        return pickFallback(text, name)
      }
      throw err
    }
  }

  private remember(userId: string, userText: string, reply: string): void {
    const turns = this.history.get(userId) ?? []
    turns.push({ role: 'user', content: userText }, { role: 'assistant', content: reply })
    this.history.set(userId, turns.slice(-HISTORY_TURNS))
  }

  private renderScreening(userId: string, step: ScreeningStep, outcome?: SafetyOutcome): OutgoingDirective {
    if (step.kind === 'complete' && step.safety?.decision.strategy === 'fixed_safety') {
      return this.fixed(userId, step.safety)
    }
    const source = step.kind === 'complete' ? step.safety ?? outcome : outcome
    return {
      text: step.text,
      decision: source?.decision ?? null,
      state: source?.state ?? null,
      tier: source?.assessment.tier ?? null,
      ...(step.kind === 'complete' ? {} : { keyboard: step.keyboard }),
    }
  }

  private async runCommand(
    userId: string,
    text: string,
    command: ParsedCommand,
    timestamp: Date,
    options: HandleOptions,
  ): Promise<OutgoingDirective> {
    const { safety, mood, screening } = this.deps
    console.log('[companion] command', { userId, command: command.name })

    // Text riding on a command is still a message to screen. /mood screens its own note.
    if (command.name !== 'mood') {
      const carried = isKnownCommand(command.name) ? command.args : text
      if (carried) {
        const outcome = await safety.assess(userId, carried, { now: timestamp, region: options.region })
        if (outcome.decision.strategy === 'fixed_safety') return this.fixed(userId, outcome)
      }
    }

    switch (command.name) {
      case 'start':
        return this.plain({ text: welcomeText(options.firstName ?? 'there') })
      case 'crisis':
        return this.plain({ text: safety.crisisPayload(options.region) })
      case 'cancel':
        return this.plain({
          text: screening.cancel(userId)
            ? '✅ Cancelled. You can start again any time with /assess.'
            : 'Nothing to cancel right now. Use /help to see what I can do.',
        })
      case 'mood':
        if (!command.args) return this.plain({ text: MOOD_PROMPT, keyboard: moodKeyboard() })
        return this.recordMood(userId, command.args, timestamp, options)
      case 'moodlog': {
        const context = await mood.context(userId)
        return this.plain({ text: formatMoodLog(context.recent, context.declining) })
      }
      case 'breathe':
        return this.plain({ text: BREATHING_TEXT })
      case 'assess':
        return this.plain(screening.menu())
      default:
        return this.plain({ text: helpText(safety.regionResources(options.region)) })
    }
  }

  /** "/mood 2 rough day" or a mood keyboard press. A note goes through the safety core. */
  private async recordMood(
    userId: string,
    args: string,
    timestamp: Date,
    options: HandleOptions,
  ): Promise<OutgoingDirective> {
    const parsed = parseMoodArgs(args)
    if (!parsed) {
      return this.plain({ text: `Please pick a number from 1 to 5.\n\n${MOOD_PROMPT}`, keyboard: moodKeyboard() })
    }

    let entry: MoodEntry
    try {
      entry = await this.deps.mood.record(
        { conversationId: userId, score: parsed.score, note: parsed.note, source: 'self_report' },
        timestamp,
      )
    } catch (err) {
      if (err instanceof MoodValidationError) {
        return this.plain({ text: 'That note is a bit long. Please keep it under 500 characters.' })
      }
      throw err
    }

    if (parsed.note) {
      const outcome = await this.deps.safety.assess(userId, parsed.note, { now: timestamp, region: options.region })
      if (outcome.decision.strategy === 'fixed_safety') return this.fixed(userId, outcome)
      if (outcome.decision.strategy === 'supportive_blended') {
        return {
          text: `${moodRecordedText(entry)}\n\n${outcome.decision.payload}`,
          decision: outcome.decision,
          state: outcome.state,
          tier: outcome.assessment.tier,
          degraded: outcome.degraded,
        }
      }
    }
    return this.plain({ text: moodRecordedText(entry) })
  }

  private plain(reply: { text: string; keyboard?: OutgoingDirective['keyboard'] }): OutgoingDirective {
    return { text: reply.text, decision: null, state: null, tier: null, ...(reply.keyboard ? { keyboard: reply.keyboard } : {}) }
  }

  private failClosed(userId: string, err: unknown, options: HandleOptions): OutgoingDirective {
    console.error('[companion] unexpected failure, sending crisis resources', { userId, error: safeError(err) })
    const region = this.deps.safety.region(options.region)
    return {
      text: this.deps.safety.crisisPayload(region),
      decision: null,
      state: null,
      tier: null,
      degraded: true,
    }
  }
}
