export const MOOD_LABELS = ['awful', 'low', 'okay', 'good', 'great'] as const

export type MoodLabel = typeof MOOD_LABELS[number]

export type MoodSource = 'self_report' | 'inferred'

/** Append-only mood sample. Never mutated once recorded. */
export interface MoodEntry {
  conversationId: string
  recordedAt: string
  /** 1 (awful) to 5 (great) */
  score: number
  label: MoodLabel
  note: string | null
  source: MoodSource
}

export interface MoodContext {
  recent: MoodEntry[]
  declining: boolean
}
