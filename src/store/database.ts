/**
 * PostgreSQL pool and schema for the relay.
 *
 * One pool per process. Every table is created with IF NOT EXISTS so the
 * migrations are safe to run on every startup.
 */

import { Pool } from 'pg'

let pool: Pool | null = null

export function initDatabase(databaseUrl: string): Pool {
  // Strip sslmode from URL; SSL is configured explicitly below.
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

  return pool
}

export function getPool(): Pool {
  if (!pool) {
    throw new Error('Database not initialized. Call initDatabase() first.')
  }
  return pool
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end()
    pool = null
  }
}

const SCHEMA: string[] = [
  `CREATE TABLE IF NOT EXISTS conversations (
    conversation_id   TEXT PRIMARY KEY,
    display_name      TEXT,
    subscription_tag  TEXT NOT NULL DEFAULT 'free'
                      CHECK (subscription_tag IN ('free', 'basic', 'premium')),
    recent_window     JSONB NOT NULL DEFAULT '[]'::jsonb,
    last_message_id   TEXT,
    last_received_at  TIMESTAMPTZ,
    created_at        TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    updated_at        TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE IF NOT EXISTS blacklist (
    conversation_id   TEXT PRIMARY KEY,
    blocked_at        TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    reason            TEXT
  )`,
  `CREATE TABLE IF NOT EXISTS processed_messages (
    message_id        TEXT PRIMARY KEY,
    conversation_id   TEXT NOT NULL,
    outcome           TEXT NOT NULL,
    received_at       TIMESTAMPTZ NOT NULL,
    processed_at      TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE IF NOT EXISTS poll_cursor (
    id                SMALLINT PRIMARY KEY DEFAULT 1 CHECK (id = 1),
    cursor_timestamp  TEXT NOT NULL,
    cursor_message_id TEXT NOT NULL,
    updated_at        TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE IF NOT EXISTS approval_records (
    id                BIGSERIAL PRIMARY KEY,
    conversation_id   TEXT NOT NULL,
    source_message_id TEXT NOT NULL,
    sender_name       TEXT NOT NULL DEFAULT '',
    incoming_text     TEXT NOT NULL,
    draft_text        TEXT NOT NULL DEFAULT '',
    final_text        TEXT,
    state             TEXT NOT NULL DEFAULT 'Pending',
    card_ref          TEXT,
    created_at        TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    decided_at        TIMESTAMPTZ,
    expires_at        TIMESTAMPTZ NOT NULL
  )`,
  // Single-flight: at most one unresolved record per conversation.
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_approval_one_open
     ON approval_records(conversation_id)
     WHERE state IN ('Pending', 'Approved', 'Edited')`,
  `CREATE INDEX IF NOT EXISTS idx_approval_state_expiry ON approval_records(state, expires_at)`,
  `CREATE TABLE IF NOT EXISTS delivery_attempts (
    id                BIGSERIAL PRIMARY KEY,
    approval_id       BIGINT NOT NULL REFERENCES approval_records(id),
    attempt_number    INTEGER NOT NULL,
    attempted_at      TIMESTAMPTZ NOT NULL DEFAULT NOW(),
    success           BOOLEAN NOT NULL,
    error             TEXT,
    UNIQUE (approval_id, attempt_number)
  )`,
  `CREATE TABLE IF NOT EXISTS draft_sessions (
    conversation_id   TEXT PRIMARY KEY,
    session_handle    TEXT NOT NULL,
    created_at        TIMESTAMPTZ NOT NULL DEFAULT NOW()
  )`,
]

/**
 * Run any missing schema migrations. Safe to call on every startup.
 */
export async function runMigrations(): Promise<void> {
  const p = getPool()
  for (const statement of SCHEMA) {
    await p.query(statement)
  }
  console.log('[DB] Migrations complete')
}
