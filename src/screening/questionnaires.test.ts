import { copyFileSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { DEFAULT_CONFIG_DIR } from '../config/loader.js'
import { loadQuestionnaires, maxScore, severityFor } from './questionnaires.js'

describe('questionnaires', () => {
  const set = loadQuestionnaires()

  it('loads both instruments from the shipped file', () => {
    expect(set.questionnaires['PHQ-9'].questions).toHaveLength(9)
    expect(set.questionnaires['GAD-7'].questions).toHaveLength(7)
    expect(set.answerScale).toHaveLength(4)
  })

  it('computes maximum scores', () => {
    expect(maxScore(set.questionnaires['PHQ-9'])).toBe(27)
    expect(maxScore(set.questionnaires['GAD-7'])).toBe(21)
  })

  it.each([
    [0, 'Minimal'],
    [4, 'Minimal'],
    [5, 'Mild'],
    [14, 'Moderate'],
    [15, 'Moderately severe'],
    [27, 'Severe'],
  ])('PHQ-9 score %i is %s', (score, severity) => {
    expect(severityFor(set.questionnaires['PHQ-9'], score).severity).toBe(severity)
  })

  describe('validation', () => {
    let dir: string

    beforeEach(() => {
      dir = mkdtempSync(join(tmpdir(), 'screening-config-'))
      copyFileSync(join(DEFAULT_CONFIG_DIR, 'screening.json'), join(dir, 'screening.json'))
    })

    afterEach(() => {
      rmSync(dir, { recursive: true, force: true })
    })

    it('rejects bands that stop short of the maximum score', () => {
      const raw = JSON.parse(readFileSync(join(dir, 'screening.json'), 'utf8'))
      raw.questionnaires['GAD-7'].bands = raw.questionnaires['GAD-7'].bands.slice(0, 3)
      writeFileSync(join(dir, 'screening.json'), JSON.stringify(raw))
      expect(() => loadQuestionnaires(dir)).toThrow('GAD-7 bands do not cover the maximum score')
    })

    it('rejects a missing file', () => {
      expect(() => loadQuestionnaires(join(dir, 'absent'))).toThrow('Cannot read screening.json')
    })
  })
})
