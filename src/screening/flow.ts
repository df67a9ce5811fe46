/**
 * PHQ-9 / GAD-7 self-screening.
 *
 * One questionnaire in progress per user, kept in process memory. PHQ-9
 * item 9 is about self-harm: a non-zero answer is turned into a
 * passive_ideation signal and goes through the same safety step as text.
 */

import type { Keyboard } from '../companion/types.js'
import type { SafetyService } from '../safety/safety-service.js'
import type { SafetyOutcome, SignalSet } from '../safety/types.js'
import type { ScreeningStore } from '../store/types.js'
import { safeError } from '../utils/safe-log.js'
import { maxScore, severityFor } from './questionnaires.js'
import type { Instrument, Questionnaire, QuestionnaireSet, ScreeningProgress, ScreeningResult } from './types.js'

const SELF_HARM_ITEM = 8
const ITEM_NINE_WEIGHTS = [0, 0.5, 0.7, 0.9]
export const PHQ_SUPPORT_THRESHOLD = 15

export const ASSESS_CALLBACK_PREFIX = 'assess:'
export const ANSWER_CALLBACK_PREFIX = 'answer:'

export type ScreeningStep =
  | { kind: 'invalid'; text: string; keyboard: Keyboard }
  | { kind: 'question'; text: string; keyboard: Keyboard }
  | { kind: 'complete'; text: string; result: ScreeningResult; safety: SafetyOutcome | null }

export interface AnswerOptions {
  now?: Date
  region?: string
}

/** Signal for a PHQ-9 item 9 answer, or null for 0. */
export function itemNineSignal(answer: number): SignalSet | null {
  const weight = ITEM_NINE_WEIGHTS[answer] ?? 0
  if (weight === 0) return null
  return {
    signals: [{ category: 'passive_ideation', weight, evidence: 'phq9 item 9', negated: false }],
    tokenCount: 0,
  }
}

export function parseAnswer(text: string): number | null {
  const trimmed = text.trim()
  return /^[0-3]$/.test(trimmed) ? Number(trimmed) : null
}

export class ScreeningFlow {
  private readonly progress = new Map<string, ScreeningProgress>()

  constructor(
    private readonly set: QuestionnaireSet,
    private readonly store: ScreeningStore,
    private readonly safety: SafetyService,
  ) {}

  menu(): { text: string; keyboard: Keyboard } {
    return {
      text: [
        '📊 Self-check',
        '',
        'These short questionnaires can help you notice how you have been feeling over the last two weeks.',
        '',
        '• Mood check (PHQ-9): 9 questions, about 3 minutes',
        '• Worry check (GAD-7): 7 questions, about 2 minutes',
        '',
        'They are screening tools, not a diagnosis. You can stop any time with /cancel.',
      ].join('\n'),
      keyboard: [
        [{ text: this.set.questionnaires['PHQ-9'].title, data: `${ASSESS_CALLBACK_PREFIX}PHQ-9` }],
        [{ text: this.set.questionnaires['GAD-7'].title, data: `${ASSESS_CALLBACK_PREFIX}GAD-7` }],
      ],
    }
  }

  isActive(userId: string): boolean {
    return this.progress.has(userId)
  }

  cancel(userId: string): boolean {
    return this.progress.delete(userId)
  }

  start(userId: string, instrument: Instrument, now: Date = new Date()): { text: string; keyboard: Keyboard } {
    this.progress.set(userId, { instrument, responses: [], startedAt: now.toISOString() })
    const questionnaire = this.set.questionnaires[instrument]
    console.log('[screening] started', { userId, instrument })
    return {
      text: `${questionnaire.title}\n\nOver the last 2 weeks, how often have you been bothered by the following?\n\n${this.question(questionnaire, 0)}`,
      keyboard: this.answerKeyboard(),
    }
  }

  /** Null when the user has no screening in progress. */
  async answer(userId: string, text: string, options: AnswerOptions = {}): Promise<ScreeningStep | null> {
    const current = this.progress.get(userId)
    if (!current) return null
    const questionnaire = this.set.questionnaires[current.instrument]

    const value = parseAnswer(text)
    if (value === null) {
      return {
        kind: 'invalid',
        text: `Please answer with 0, 1, 2 or 3:\n${this.scale()}`,
        keyboard: this.answerKeyboard(),
      }
    }

    const responses = [...current.responses, value]
    if (responses.length < questionnaire.questions.length) {
      this.progress.set(userId, { ...current, responses })
      return { kind: 'question', text: this.question(questionnaire, responses.length), keyboard: this.answerKeyboard() }
    }

    this.progress.delete(userId)
    return this.complete(userId, questionnaire, responses, options)
  }

  private async complete(
    userId: string,
    questionnaire: Questionnaire,
    responses: number[],
    options: AnswerOptions,
  ): Promise<ScreeningStep> {
    const now = options.now ?? new Date()
    const score = responses.reduce((sum, r) => sum + r, 0)
    const band = severityFor(questionnaire, score)
    const result: ScreeningResult = {
      userId,
      instrument: questionnaire.instrument,
      score,
      maxScore: maxScore(questionnaire),
      severity: band.severity,
      responses,
      completedAt: now.toISOString(),
    }

    try {
      await this.store.saveResult(result)
    } catch (err) {
      console.error('[screening] failed to save result', { userId, error: safeError(err) })
    }

    let safety: SafetyOutcome | null = null
    if (questionnaire.instrument === 'PHQ-9') {
      const signals = itemNineSignal(responses[SELF_HARM_ITEM] ?? 0)
      if (signals) safety = await this.safety.assessSignals(userId, signals, { now, region: options.region })
    }

    console.log('[screening] completed', { userId, instrument: result.instrument, score, severity: band.severity })

    const lines = [
      `${questionnaire.title} results`,
      '',
      `Score: ${score}/${result.maxScore}`,
      `Level: ${band.severity}`,
      '',
      band.recommendation,
      '',
      'This is a screening tool, not a diagnosis.',
    ]
    if (questionnaire.instrument === 'PHQ-9' && score >= PHQ_SUPPORT_THRESHOLD) {
      lines.push(
        '',
        'Given your score, please think about talking to a GP, a counsellor or an adult you trust. If you have thoughts of hurting yourself, use /crisis for support numbers straight away.',
      )
    }
    return { kind: 'complete', text: lines.join('\n'), result, safety }
  }

  private scale(): string {
    return this.set.answerScale.map((label, i) => `${i} = ${label}`).join('\n')
  }

  private question(questionnaire: Questionnaire, index: number): string {
    const total = questionnaire.questions.length
    return `Question ${index + 1} of ${total}:\n"${questionnaire.questions[index]}"\n\n${this.scale()}`
  }

  private answerKeyboard(): Keyboard {
    return [this.set.answerScale.map((_, i) => ({ text: String(i), data: `${ANSWER_CALLBACK_PREFIX}${i}` }))]
  }
}
