import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import { z } from 'zod'
import { DEFAULT_CONFIG_DIR } from '../config/loader.js'
import { ConfigurationError } from '../errors.js'
import { type Instrument, type Questionnaire, type QuestionnaireSet, type SeverityBand } from './types.js'

const BandSchema = z.object({
  max: z.number().int().min(0),
  severity: z.string().min(1),
  recommendation: z.string().min(1),
})

const QuestionnaireSchema = z.object({
  title: z.string().min(1),
  questions: z.array(z.string().min(1)).min(1),
  bands: z.array(BandSchema).min(1),
})

const ScreeningConfigSchema = z.object({
  version: z.string().min(1),
  answerScale: z.array(z.string().min(1)).length(4),
  questionnaires: z.object({
    'PHQ-9': QuestionnaireSchema,
    'GAD-7': QuestionnaireSchema,
  }),
})

/** Highest possible total: every question answered 3. */
export function maxScore(questionnaire: Questionnaire): number {
  return questionnaire.questions.length * 3
}

export function severityFor(questionnaire: Questionnaire, score: number): SeverityBand {
  const band = questionnaire.bands.find(b => score <= b.max)
  return band ?? questionnaire.bands[questionnaire.bands.length - 1]
}

export function loadQuestionnaires(dir: string = DEFAULT_CONFIG_DIR): QuestionnaireSet {
  const path = join(dir, 'screening.json')
  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'))
  } catch (err) {
    throw new ConfigurationError('Cannot read screening.json', { cause: err, context: { path } })
  }

  const result = ScreeningConfigSchema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new ConfigurationError('screening.json failed validation', { context: { path, issues } })
  }

  const data = result.data
  const build = (instrument: Instrument): Questionnaire => {
    const q = data.questionnaires[instrument]
    const bands = [...q.bands].sort((a, b) => a.max - b.max)
    if (bands[bands.length - 1].max < q.questions.length * 3) {
      throw new ConfigurationError(`${instrument} bands do not cover the maximum score`, { context: { path } })
    }
    return { instrument, title: q.title, questions: q.questions, bands }
  }

  return {
    version: data.version,
    answerScale: data.answerScale,
    questionnaires: { 'PHQ-9': build('PHQ-9'), 'GAD-7': build('GAD-7') },
  }
}
