/**
 * Safety processing step.
 *
 * For one message: load the conversation, read mood context, extract,
 * classify, transition, commit, then arbitrate. Steps for the same user run
 * one at a time; any storage failure fails closed to the fixed crisis payload.
 */

import type { RegionResources, Resources, SafetySettings } from '../config/schema.js'
import type { MoodTracker } from '../mood/mood-tracker.js'
import type { MoodEntry } from '../mood/types.js'
import type { SafetyStore } from '../store/types.js'
import { describeText, safeError, type TextShape } from '../utils/safe-log.js'
import { logAssessment, logDecision, logFailClosed, logTransition } from './audit-logger.js'
import { KeyedSerializer } from './keyed-serializer.js'
import { decide, fixedSafety, resolvePayload, resolveRegion, type ArbiterConfig } from './response-arbiter.js'
import { classifierPolicyFrom, classify, type ClassifierPolicy } from './risk-classifier.js'
import { extract, type CompiledLexicon } from './signal-extractor.js'
import { newConversation, transition } from './state-machine.js'
import type {
  Conversation,
  PayloadId,
  SafetyOutcome,
  SignalSet,
  TransitionRecord,
} from './types.js'

const NO_TEXT: TextShape = { length: 0, words: 0 }

export interface SafetyServiceDeps {
  store: SafetyStore
  mood: MoodTracker
  lexicon: CompiledLexicon
  settings: SafetySettings
  resources: Resources
  /** Region used when a request names none; falls back to the resources default. */
  defaultRegion?: string
}

export interface AssessOptions {
  now?: Date
  region?: string
}

export interface AuditExport {
  conversation: Conversation | null
  transitions: TransitionRecord[]
  mood: MoodEntry[]
}

const AUDIT_TRANSITION_LIMIT = 500

export class SafetyService {
  private readonly serializer = new KeyedSerializer()
  private readonly policy: ClassifierPolicy
  private readonly arbiter: ArbiterConfig

  constructor(private readonly deps: SafetyServiceDeps) {
    this.policy = classifierPolicyFrom(deps.settings)
    this.arbiter = { resources: deps.resources, styleDirectives: deps.settings.styleDirectives }
  }

  region(requested?: string): string {
    return resolveRegion(this.deps.resources, requested ?? this.deps.defaultRegion)
  }

  /** Verbatim payload for a region; unknown regions resolve to the default region. */
  payload(payloadId: PayloadId, region?: string): string {
    return resolvePayload(this.deps.resources, this.region(region), payloadId) ?? this.crisisPayload(region)
  }

  regionResources(region?: string): RegionResources {
    const { resources } = this.deps
    return resources.regions[this.region(region)] ?? resources.regions[resources.defaultRegion]
  }

  crisisPayload(region?: string): string {
    const decision = fixedSafety(this.deps.resources, this.region(region))
    return decision.strategy === 'fixed_safety' ? decision.payload : ''
  }

  /**
   * Classify free text and commit the resulting transition. The text never
   * leaves this method: only its signals and length are passed on.
   */
  assess(userId: string, text: unknown, options: AssessOptions = {}): Promise<SafetyOutcome> {
    const signals = extract(text, this.deps.lexicon)
    return this.step(userId, signals, typeof text === 'string' ? describeText(text) : NO_TEXT, options)
  }

  /** Same step for signals that did not come from free text (screening answers). */
  assessSignals(userId: string, signals: SignalSet, options: AssessOptions = {}): Promise<SafetyOutcome> {
    return this.step(userId, signals, NO_TEXT, options)
  }

  private step(userId: string, signals: SignalSet, shape: TextShape, options: AssessOptions): Promise<SafetyOutcome> {
    const now = options.now ?? new Date()
    const region = this.region(options.region)

    return this.serializer.run(userId, async () => {
      try {
        const current = (await this.deps.store.loadConversation(userId)) ?? newConversation(userId, now)
        const moodDeclining = await this.moodDeclining(userId)
        const assessment = classify(signals, { state: current.state, moodDeclining }, this.policy, now)
        logAssessment(userId, assessment, shape)

        const result = transition(current, assessment, this.deps.settings.policy, now)
        await this.deps.store.commitStep(result)
        logTransition(result.transition)

        const decision = decide(result.conversation.state, assessment, this.arbiter, region)
        logDecision(userId, decision)

        return {
          userId,
          assessment,
          state: result.conversation.state,
          transition: result.transition,
          decision,
          degraded: false,
        }
      } catch (err) {
        logFailClosed(userId, err)
        const assessment = classify(signals, { state: 'crisis', moodDeclining: true }, this.policy, now)
        return {
          userId,
          assessment,
          state: 'crisis',
          transition: null,
          decision: fixedSafety(this.deps.resources, region),
          degraded: true,
        }
      }
    })
  }

  // A mood history we cannot read counts as declining
  private async moodDeclining(userId: string): Promise<boolean> {
    try {
      return (await this.deps.mood.context(userId)).declining
    } catch (err) {
      console.warn('[safety] mood context unavailable, using heightened sensitivity', {
        userId,
        error: safeError(err),
      })
      return true
    }
  }

  async exportAudit(userId: string): Promise<AuditExport> {
    const [conversation, transitions, mood] = await Promise.all([
      this.deps.store.loadConversation(userId),
      this.deps.store.listTransitions(userId, AUDIT_TRANSITION_LIMIT),
      this.deps.mood.history(userId, AUDIT_TRANSITION_LIMIT),
    ])
    return { conversation, transitions, mood }
  }
}
