/**
 * Teen support companion - main server
 * Telegram webhook, deterministic safety core, cooldown check-ins
 */

import { createTelegramClient } from './channels.js'
import { Companion } from './companion/handler.js'
import { loadEnv, type Env } from './config/env.js'
import { loadSafetyConfig } from './config/loader.js'
import type { SafetyConfig } from './config/schema.js'
import { ConfigurationError } from './errors.js'
import { MoodTracker } from './mood/mood-tracker.js'
import { compileLexicon, SafetyService } from './safety/index.js'
import { initScheduler } from './scheduler.js'
import { ScreeningFlow } from './screening/flow.js'
import { loadQuestionnaires } from './screening/questionnaires.js'
import type { QuestionnaireSet } from './screening/types.js'
import { buildServer } from './server.js'
import { closeDatabase, initDatabase, runMigrations } from './store/db.js'
import { PgMoodStore, PgSafetyStore, PgScreeningStore } from './store/pg-store.js'
import { safeError } from './utils/safe-log.js'

interface Startup {
  env: Env
  config: SafetyConfig
  questionnaires: QuestionnaireSet
}

function loadStartup(): Startup {
  try {
    const env = loadEnv()
    return {
      env,
      config: loadSafetyConfig(env.SAFETY_CONFIG_DIR),
      questionnaires: loadQuestionnaires(env.SAFETY_CONFIG_DIR),
    }
  } catch (err) {
    if (err instanceof ConfigurationError) {
      console.error('[startup] configuration invalid', err.toJSON())
      process.exit(1)
    }
    throw err
  }
}

const { env, config, questionnaires } = loadStartup()

initDatabase(env.DATABASE_URL)
await runMigrations()

const store = new PgSafetyStore()
const mood = new MoodTracker(new PgMoodStore(), config.settings.mood)
const safety = new SafetyService({
  store,
  mood,
  lexicon: compileLexicon(config.lexicon),
  settings: config.settings,
  resources: config.resources,
  defaultRegion: env.DEFAULT_REGION,
})
const screening = new ScreeningFlow(questionnaires, new PgScreeningStore(), safety)
const companion = new Companion({ safety, mood, screening })
const telegram = createTelegramClient(env.TELEGRAM_BOT_TOKEN)

if (!env.GROQ_API_KEY && !env.GEMINI_API_KEY) {
  console.warn('[startup] no generative provider configured, static replies only')
}

const server = await buildServer({
  companion,
  safety,
  telegram,
  webhookSecret: env.TELEGRAM_WEBHOOK_SECRET,
  adminToken: env.ADMIN_TOKEN,
})

const tasks = initScheduler({ store, safety, send: (chatId, text) => telegram.sendMessage(chatId, text) })

async function shutdown(signal: string): Promise<void> {
  server.log.info(`${signal} received, shutting down`)
  for (const task of tasks) task.stop()
  try {
    await server.close()
    await closeDatabase()
  } catch (err) {
    console.error('[shutdown] error during close', safeError(err))
  }
  process.exit(0)
}

process.on('SIGTERM', () => void shutdown('SIGTERM'))
process.on('SIGINT', () => void shutdown('SIGINT'))

try {
  await server.listen({ port: env.PORT, host: '0.0.0.0' })
  console.log(`🌟 Companion listening on port ${env.PORT}`)
} catch (err) {
  server.log.error(err)
  process.exit(1)
}
