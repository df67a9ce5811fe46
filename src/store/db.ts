/**
 * PostgreSQL pool and schema for the companion.
 */

import { Pool } from 'pg'

let pool: Pool | null = null

export function initDatabase(databaseUrl: string): void {
  // sslmode in the URL confuses pg; SSL is configured explicitly below
  const cleanUrl = databaseUrl.replace(/[?&]sslmode=[^&]*/g, '').replace(/\?$/, '')

  pool = new Pool({
    connectionString: cleanUrl,
    max: 10,
    idleTimeoutMillis: 30000,
    ssl: process.env.NODE_ENV === 'production'
      ? {
        ca: process.env.DATABASE_CA_CERT
          ? Buffer.from(process.env.DATABASE_CA_CERT, 'base64').toString()
          : undefined,
        rejectUnauthorized: !!process.env.DATABASE_CA_CERT,
      }
      : false,
  })

  pool.on('error', err => {
    console.error('[DB] Idle client error:', err.message)
  })
}

export function getPool(): Pool {
  if (!pool) {
    throw new Error('Database not initialized. Call initDatabase() first.')
  }
  return pool
}

/**
 * Create missing tables. Every statement is IF NOT EXISTS, so this is run on
 * every startup.
 */
export async function runMigrations(): Promise<void> {
  const p = getPool()
  await p.query(`
    CREATE TABLE IF NOT EXISTS conversations (
      user_id             TEXT PRIMARY KEY,
      created_at          TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      last_activity_at    TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      state               TEXT NOT NULL DEFAULT 'normal',
      calm_streak         INTEGER NOT NULL DEFAULT 0,
      cooldown_expires_at TIMESTAMPTZ,
      check_in_sent_at    TIMESTAMPTZ,
      archived            BOOLEAN NOT NULL DEFAULT FALSE
    )
  `)
  await p.query(`
    CREATE TABLE IF NOT EXISTS escalation_transitions (
      id              BIGSERIAL PRIMARY KEY,
      user_id         TEXT NOT NULL REFERENCES conversations(user_id),
      previous_state  TEXT NOT NULL,
      next_state      TEXT NOT NULL,
      tier            TEXT NOT NULL,
      reason          TEXT NOT NULL,
      categories      JSONB NOT NULL DEFAULT '[]'::jsonb,
      aggregate_score REAL NOT NULL DEFAULT 0,
      effect          TEXT NOT NULL,
      at              TIMESTAMPTZ NOT NULL
    )
  `)
  await p.query(`
    CREATE TABLE IF NOT EXISTS mood_entries (
      id           BIGSERIAL PRIMARY KEY,
      user_id      TEXT NOT NULL,
      score        SMALLINT NOT NULL CHECK (score BETWEEN 1 AND 5),
      label        TEXT NOT NULL,
      note         TEXT,
      source       TEXT NOT NULL,
      recorded_at  TIMESTAMPTZ NOT NULL
    )
  `)
  await p.query(`
    CREATE TABLE IF NOT EXISTS screening_results (
      id           BIGSERIAL PRIMARY KEY,
      user_id      TEXT NOT NULL,
      instrument   TEXT NOT NULL,
      score        SMALLINT NOT NULL,
      max_score    SMALLINT NOT NULL,
      severity     TEXT NOT NULL,
      responses    JSONB NOT NULL,
      completed_at TIMESTAMPTZ NOT NULL
    )
  `)
  await p.query(`CREATE INDEX IF NOT EXISTS idx_transitions_user_at ON escalation_transitions(user_id, at)`)
  await p.query(`CREATE INDEX IF NOT EXISTS idx_mood_user_at ON mood_entries(user_id, recorded_at)`)
  await p.query(`CREATE INDEX IF NOT EXISTS idx_conversations_state ON conversations(state, cooldown_expires_at)`)
  console.log('[DB] Migrations complete')
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end()
    pool = null
  }
}
