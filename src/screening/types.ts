export const INSTRUMENTS = ['PHQ-9', 'GAD-7'] as const

export type Instrument = typeof INSTRUMENTS[number]

export interface SeverityBand {
  /** Inclusive upper bound of the band */
  max: number
  severity: string
  recommendation: string
}

export interface Questionnaire {
  instrument: Instrument
  title: string
  questions: string[]
  bands: SeverityBand[]
}

export interface QuestionnaireSet {
  version: string
  answerScale: string[]
  questionnaires: Record<Instrument, Questionnaire>
}

export interface ScreeningProgress {
  instrument: Instrument
  responses: number[]
  startedAt: string
}

export interface ScreeningResult {
  userId: string
  instrument: Instrument
  score: number
  maxScore: number
  severity: string
  responses: number[]
  completedAt: string
}
