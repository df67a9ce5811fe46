/**
 * Zod schemas for the externally editable safety configuration.
 *
 * The three files under config/ are the whole configuration surface of the
 * crisis core: indicator lexicon, thresholds and escalation policy, and the
 * region-keyed resource payloads served verbatim in crisis mode.
 */

import { z } from 'zod'
import { SIGNAL_CATEGORIES } from '../safety/types.js'

const Weight = z.number().min(0).max(1)

const LexiconEntrySchema = z.object({
  phrase: z.string().trim().min(1),
  weight: Weight,
})

export type LexiconEntry = z.infer<typeof LexiconEntrySchema>

const FamilyListSchema = z.array(LexiconEntrySchema).min(1)

export const SignalCategorySchema = z.enum(SIGNAL_CATEGORIES)

export const LexiconSchema = z.object({
  version: z.string().min(1),
  negation: z.object({
    cues: z.array(z.string().min(1)).min(1),
    window: z.number().int().min(1).max(6),
    weightFactor: Weight,
    // Tokens that open a new unpunctuated clause: "i dont care i want to die"
    scopeBreakers: z.array(z.string().min(1)).default([]),
  }),
  intensifiers: z.object({
    words: z.array(z.string().min(1)),
    window: z.number().int().min(1).max(3),
    boost: z.number().min(0).max(0.5),
  }),
  families: z.object({
    self_harm_intent: FamilyListSchema,
    passive_ideation: FamilyListSchema,
    hopelessness: FamilyListSchema,
    immediacy_plan: FamilyListSchema,
    abuse_disclosure: FamilyListSchema,
    substance_crisis: FamilyListSchema,
  }),
})

export type Lexicon = z.infer<typeof LexiconSchema>

export const ThresholdsSchema = z.object({
  hardTrigger: Weight,
  elevatedAggregate: z.number().positive(),
  coOccurrenceMinWeight: Weight,
  compoundMinWeight: Weight,
  sensitivityFactor: z.number().gt(0).max(1),
})

export type Thresholds = z.infer<typeof ThresholdsSchema>

export const EscalationPolicySchema = z.object({
  calmMessagesToCooldown: z.number().int().min(1),
  watchfulCalmMessages: z.number().int().min(1),
  cooldownWindowMinutes: z.number().positive(),
})

export type EscalationPolicy = z.infer<typeof EscalationPolicySchema>

export const MoodPolicySchema = z.object({
  decliningRun: z.number().int().min(2),
  lowScore: z.number().int().min(1).max(5),
  historyLimit: z.number().int().min(1).max(100),
})

export type MoodPolicy = z.infer<typeof MoodPolicySchema>

export const SafetySettingsSchema = z.object({
  version: z.string().min(1),
  thresholds: ThresholdsSchema,
  compoundTriggers: z.array(z.tuple([SignalCategorySchema, SignalCategorySchema])),
  policy: EscalationPolicySchema,
  mood: MoodPolicySchema,
  styleDirectives: z.object({
    normal: z.array(z.string().min(1)).min(1),
    watchful: z.array(z.string().min(1)).min(1),
  }),
})

export type SafetySettings = z.infer<typeof SafetySettingsSchema>

const HelplineSchema = z.object({
  name: z.string().min(1),
  phone: z.string().optional(),
  text: z.string().optional(),
  url: z.string().optional(),
  hours: z.string().optional(),
})

export type Helpline = z.infer<typeof HelplineSchema>

// Every region carries every payload: a region's helpline numbers never mix
// with another region's
const PayloadsSchema = z.object({
  crisis: z.string().min(1),
  cooldown_check_in: z.string().min(1),
  watchful_footer: z.string().min(1),
  check_in: z.string().min(1),
})

const RegionSchema = z.object({
  name: z.string().min(1),
  emergency: z.string().min(1),
  helplines: z.array(HelplineSchema).min(1),
  payloads: PayloadsSchema,
})

export type RegionResources = z.infer<typeof RegionSchema>

export const ResourcesSchema = z
  .object({
    version: z.string().min(1),
    defaultRegion: z.string().min(1),
    regions: z.record(z.string(), RegionSchema),
  })
  .superRefine((value, ctx) => {
    if (!value.regions[value.defaultRegion]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `defaultRegion "${value.defaultRegion}" has no entry in regions`,
        path: ['defaultRegion'],
      })
    }
  })

export type Resources = z.infer<typeof ResourcesSchema>

export interface SafetyConfig {
  lexicon: Lexicon
  settings: SafetySettings
  resources: Resources
}
