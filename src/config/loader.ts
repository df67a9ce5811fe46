/**
 * Safety configuration loader.
 *
 * Reads config/lexicon.json, config/safety.json and config/resources.json and
 * validates them. Correctness of the crisis core depends on every one of them,
 * so any problem is a ConfigurationError and the process must not start.
 */

import { readFileSync } from 'node:fs'
import { join } from 'node:path'
import { fileURLToPath } from 'node:url'
import type { z } from 'zod'
import { ConfigurationError } from '../errors.js'
import {
  LexiconSchema,
  ResourcesSchema,
  SafetySettingsSchema,
  type SafetyConfig,
} from './schema.js'

/** config/ at the repository root, both from src/ and from dist/ */
export const DEFAULT_CONFIG_DIR = fileURLToPath(new URL('../../config/', import.meta.url))

function readJsonFile<T extends z.ZodTypeAny>(dir: string, file: string, schema: T): z.infer<T> {
  const path = join(dir, file)
  let raw: string
  try {
    raw = readFileSync(path, 'utf8')
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${file}`, { cause: err, context: { path } })
  }

  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch (err) {
    throw new ConfigurationError(`${file} is not valid JSON`, { cause: err, context: { path } })
  }

  const result = schema.safeParse(parsed)
  if (!result.success) {
    const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    throw new ConfigurationError(`${file} failed validation`, { context: { path, issues } })
  }
  return result.data
}

export function loadSafetyConfig(dir: string = DEFAULT_CONFIG_DIR): SafetyConfig {
  const config: SafetyConfig = {
    lexicon: readJsonFile(dir, 'lexicon.json', LexiconSchema),
    settings: readJsonFile(dir, 'safety.json', SafetySettingsSchema),
    resources: readJsonFile(dir, 'resources.json', ResourcesSchema),
  }

  console.log('[config] Safety configuration loaded', {
    lexicon: config.lexicon.version,
    settings: config.settings.version,
    resources: config.resources.version,
    regions: Object.keys(config.resources.regions),
  })
  return config
}
