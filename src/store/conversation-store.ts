/**
 * Conversation Store
 *
 * Single source of truth for conversation context, blacklist, the inbound
 * dedupe ledger, approval records, delivery attempts and draft sessions.
 * Callers that mutate one conversation hold that conversation's lock; the
 * store itself only guarantees that each call is atomic.
 */

import type { Pool } from 'pg'
import { getPool } from './database.js'
import { parseWindow, SubscriptionTagSchema } from '../types/schemas.js'
import type {
  ApprovalRecord,
  ApprovalState,
  BlacklistEntry,
  ConversationContext,
  DeliveryAttempt,
  InboundMessage,
  PollCursor,
  SubscriptionTag,
  WindowEntry,
} from '../types/relay.js'
import { APPROVAL_STATES, OPEN_APPROVAL_STATES } from '../types/relay.js'

// ─── Contract ───────────────────────────────────────────────────────────────

export type ProcessingOutcome = 'drafted' | 'draft_failed' | 'merged' | 'filtered' | 'skipped' | 'failed'

export interface NewApproval {
  conversationId: string
  sourceMessageId: string
  senderName: string
  incomingText: string
  draftText: string
  /** Records re-opened by the operator start out Edited with a final text. */
  state?: 'Pending' | 'Edited'
  finalText?: string | null
  expiresAt: Date
}

export interface ApprovalChange {
  state: ApprovalState
  finalText?: string | null
  decidedAt?: Date
}

export interface ConversationStore {
  getContext(conversationId: string): Promise<ConversationContext>
  appendToWindow(
    conversationId: string,
    entry: WindowEntry,
    opts: { maxEntries: number; displayName?: string }
  ): Promise<ConversationContext>
  setSubscriptionTag(conversationId: string, tag: SubscriptionTag): Promise<void>

  isBlacklisted(conversationId: string): Promise<boolean>
  addToBlacklist(conversationId: string, reason?: string): Promise<BlacklistEntry>
  removeFromBlacklist(conversationId: string): Promise<boolean>
  listBlacklist(limit?: number): Promise<BlacklistEntry[]>

  isMessageProcessed(messageId: string): Promise<boolean>
  markMessageProcessed(message: InboundMessage, outcome: ProcessingOutcome): Promise<void>
  getPollCursor(): Promise<PollCursor | null>
  setPollCursor(cursor: PollCursor): Promise<void>

  findOpenApproval(conversationId: string): Promise<ApprovalRecord | null>
  createApproval(input: NewApproval): Promise<ApprovalRecord>
  getApproval(id: string): Promise<ApprovalRecord | null>
  setApprovalCard(id: string, cardRef: string): Promise<void>
  /** Compare-and-set on state; null when the record was no longer in `from`. */
  transitionApproval(id: string, from: ApprovalState, change: ApprovalChange): Promise<ApprovalRecord | null>
  /** Moves the record to Blocked and blacklists its conversation atomically. */
  blockFromApproval(id: string, from: ApprovalState, reason: string | null, decidedAt: Date): Promise<ApprovalRecord | null>
  listApprovals(states: readonly ApprovalState[], limit?: number): Promise<ApprovalRecord[]>
  listExpiredPending(now: Date): Promise<ApprovalRecord[]>

  recordDeliveryAttempt(attempt: DeliveryAttempt): Promise<void>
  countDeliveryAttempts(approvalId: string): Promise<number>

  getDraftSession(conversationId: string): Promise<string | null>
  /** Insert-if-absent; returns whichever handle ended up stored. */
  saveDraftSession(conversationId: string, handle: string): Promise<string>
  /** Removes the mapping only while it still points at `handle`. */
  deleteDraftSession(conversationId: string, handle: string): Promise<void>
}

// ─── Pure helpers ───────────────────────────────────────────────────────────

export function emptyContext(conversationId: string): ConversationContext {
  return {
    conversationId,
    displayName: null,
    subscriptionTag: 'free',
    recentWindow: [],
    lastMessageId: null,
    lastReceivedAt: null,
  }
}

/** Appends an entry (once per message id) and keeps the trailing `max`. */
export function appendWindow(window: WindowEntry[], entry: WindowEntry, max: number): WindowEntry[] {
  if (entry.messageId && window.some(e => e.messageId === entry.messageId)) return window
  const next = [...window, entry]
  return next.length > max ? next.slice(next.length - max) : next
}

// ─── Row mapping ────────────────────────────────────────────────────────────

type ConversationRow = {
  conversation_id: string
  display_name: string | null
  subscription_tag: string
  recent_window: unknown
  last_message_id: string | null
  last_received_at: Date | null
}

type ApprovalRow = {
  id: string
  conversation_id: string
  source_message_id: string
  sender_name: string
  incoming_text: string
  draft_text: string
  final_text: string | null
  state: string
  card_ref: string | null
  created_at: Date
  decided_at: Date | null
  expires_at: Date
}

type BlacklistRow = {
  conversation_id: string
  blocked_at: Date
  reason: string | null
}

function isApprovalState(value: string): value is ApprovalState {
  return APPROVAL_STATES.some(s => s === value)
}

function toContext(row: ConversationRow): ConversationContext {
  const tag = SubscriptionTagSchema.safeParse(row.subscription_tag)
  return {
    conversationId: row.conversation_id,
    displayName: row.display_name,
    subscriptionTag: tag.success ? tag.data : 'free',
    recentWindow: parseWindow(row.recent_window),
    lastMessageId: row.last_message_id,
    lastReceivedAt: row.last_received_at,
  }
}

export function toApprovalRecord(row: ApprovalRow): ApprovalRecord {
  if (!isApprovalState(row.state)) {
    throw new Error(`approval ${row.id} has unknown state "${row.state}"`)
  }
  return {
    id: String(row.id),
    conversationId: row.conversation_id,
    sourceMessageId: row.source_message_id,
    senderName: row.sender_name,
    incomingText: row.incoming_text,
    draftText: row.draft_text,
    finalText: row.final_text,
    state: row.state,
    cardRef: row.card_ref,
    createdAt: row.created_at,
    decidedAt: row.decided_at,
    expiresAt: row.expires_at,
  }
}

function toBlacklistEntry(row: BlacklistRow): BlacklistEntry {
  return { conversationId: row.conversation_id, blockedAt: row.blocked_at, reason: row.reason }
}

const CONVERSATION_COLUMNS = `conversation_id, display_name, subscription_tag, recent_window,
  last_message_id, last_received_at`

const APPROVAL_COLUMNS = `id, conversation_id, source_message_id, sender_name, incoming_text,
  draft_text, final_text, state, card_ref, created_at, decided_at, expires_at`

// ─── PostgreSQL implementation ──────────────────────────────────────────────

export class PgConversationStore implements ConversationStore {
  constructor(private readonly pool: () => Pool = getPool) {}

  async getContext(conversationId: string): Promise<ConversationContext> {
    const { rows } = await this.pool().query<ConversationRow>(
      `SELECT ${CONVERSATION_COLUMNS} FROM conversations WHERE conversation_id = $1`,
      [conversationId]
    )
    return rows[0] ? toContext(rows[0]) : emptyContext(conversationId)
  }

  async appendToWindow(
    conversationId: string,
    entry: WindowEntry,
    opts: { maxEntries: number; displayName?: string }
  ): Promise<ConversationContext> {
    const current = await this.getContext(conversationId)
    const window = appendWindow(current.recentWindow, entry, opts.maxEntries)
    const { rows } = await this.pool().query<ConversationRow>(
      `INSERT INTO conversations (conversation_id, display_name, recent_window)
       VALUES ($1, $2, $3::jsonb)
       ON CONFLICT (conversation_id) DO UPDATE SET
         display_name  = COALESCE(EXCLUDED.display_name, conversations.display_name),
         recent_window = EXCLUDED.recent_window,
         updated_at    = NOW()
       RETURNING ${CONVERSATION_COLUMNS}`,
      [conversationId, opts.displayName ?? null, JSON.stringify(window)]
    )
    return toContext(rows[0])
  }

  async setSubscriptionTag(conversationId: string, tag: SubscriptionTag): Promise<void> {
    await this.pool().query(
      `INSERT INTO conversations (conversation_id, subscription_tag)
       VALUES ($1, $2)
       ON CONFLICT (conversation_id) DO UPDATE SET subscription_tag = EXCLUDED.subscription_tag, updated_at = NOW()`,
      [conversationId, tag]
    )
  }

  // ─── Blacklist ──────────────────────────────────────────────────────────

  async isBlacklisted(conversationId: string): Promise<boolean> {
    const { rows } = await this.pool().query(
      `SELECT 1 FROM blacklist WHERE conversation_id = $1`,
      [conversationId]
    )
    return rows.length > 0
  }

  async addToBlacklist(conversationId: string, reason?: string): Promise<BlacklistEntry> {
    const { rows } = await this.pool().query<BlacklistRow>(
      `INSERT INTO blacklist (conversation_id, reason)
       VALUES ($1, $2)
       ON CONFLICT (conversation_id) DO UPDATE SET reason = COALESCE(EXCLUDED.reason, blacklist.reason)
       RETURNING conversation_id, blocked_at, reason`,
      [conversationId, reason ?? null]
    )
    return toBlacklistEntry(rows[0])
  }

  async removeFromBlacklist(conversationId: string): Promise<boolean> {
    const result = await this.pool().query(
      `DELETE FROM blacklist WHERE conversation_id = $1`,
      [conversationId]
    )
    return (result.rowCount ?? 0) > 0
  }

  async listBlacklist(limit = 50): Promise<BlacklistEntry[]> {
    const { rows } = await this.pool().query<BlacklistRow>(
      `SELECT conversation_id, blocked_at, reason FROM blacklist ORDER BY blocked_at DESC LIMIT $1`,
      [limit]
    )
    return rows.map(toBlacklistEntry)
  }

  // ─── Ingestion ledger ───────────────────────────────────────────────────

  async isMessageProcessed(messageId: string): Promise<boolean> {
    const { rows } = await this.pool().query(
      `SELECT 1 FROM processed_messages WHERE message_id = $1`,
      [messageId]
    )
    return rows.length > 0
  }

  async markMessageProcessed(message: InboundMessage, outcome: ProcessingOutcome): Promise<void> {
    const client = await this.pool().connect()
    try {
      await client.query('BEGIN')
      await client.query(
        `INSERT INTO processed_messages (message_id, conversation_id, outcome, received_at)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (message_id) DO NOTHING`,
        [message.messageId, message.conversationId, outcome, message.receivedAt]
      )
      await client.query(
        `INSERT INTO conversations (conversation_id, display_name, last_message_id, last_received_at)
         VALUES ($1, $2, $3, $4)
         ON CONFLICT (conversation_id) DO UPDATE SET
           last_message_id  = EXCLUDED.last_message_id,
           last_received_at = EXCLUDED.last_received_at,
           updated_at       = NOW()
         WHERE conversations.last_received_at IS NULL
            OR conversations.last_received_at <= EXCLUDED.last_received_at`,
        [message.conversationId, message.senderName || null, message.messageId, message.receivedAt]
      )
      await client.query('COMMIT')
    } catch (err) {
      await client.query('ROLLBACK')
      throw err
    } finally {
      client.release()
    }
  }

  async getPollCursor(): Promise<PollCursor | null> {
    const { rows } = await this.pool().query<{ cursor_timestamp: string; cursor_message_id: string }>(
      `SELECT cursor_timestamp, cursor_message_id FROM poll_cursor WHERE id = 1`
    )
    return rows[0] ? { timestamp: rows[0].cursor_timestamp, messageId: rows[0].cursor_message_id } : null
  }

  async setPollCursor(cursor: PollCursor): Promise<void> {
    await this.pool().query(
      `INSERT INTO poll_cursor (id, cursor_timestamp, cursor_message_id)
       VALUES (1, $1, $2)
       ON CONFLICT (id) DO UPDATE SET
         cursor_timestamp  = EXCLUDED.cursor_timestamp,
         cursor_message_id = EXCLUDED.cursor_message_id,
         updated_at        = NOW()`,
      [cursor.timestamp, cursor.messageId]
    )
  }

  // ─── Approvals ──────────────────────────────────────────────────────────

  async findOpenApproval(conversationId: string): Promise<ApprovalRecord | null> {
    const { rows } = await this.pool().query<ApprovalRow>(
      `SELECT ${APPROVAL_COLUMNS} FROM approval_records
       WHERE conversation_id = $1 AND state = ANY($2::text[])
       LIMIT 1`,
      [conversationId, OPEN_APPROVAL_STATES]
    )
    return rows[0] ? toApprovalRecord(rows[0]) : null
  }

  async createApproval(input: NewApproval): Promise<ApprovalRecord> {
    const { rows } = await this.pool().query<ApprovalRow>(
      `INSERT INTO approval_records
         (conversation_id, source_message_id, sender_name, incoming_text, draft_text, state, final_text, expires_at)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
       RETURNING ${APPROVAL_COLUMNS}`,
      [
        input.conversationId,
        input.sourceMessageId,
        input.senderName,
        input.incomingText,
        input.draftText,
        input.state ?? 'Pending',
        input.finalText ?? null,
        input.expiresAt,
      ]
    )
    return toApprovalRecord(rows[0])
  }

  async getApproval(id: string): Promise<ApprovalRecord | null> {
    const { rows } = await this.pool().query<ApprovalRow>(
      `SELECT ${APPROVAL_COLUMNS} FROM approval_records WHERE id = $1`,
      [id]
    )
    return rows[0] ? toApprovalRecord(rows[0]) : null
  }

  async setApprovalCard(id: string, cardRef: string): Promise<void> {
    await this.pool().query(`UPDATE approval_records SET card_ref = $2 WHERE id = $1`, [id, cardRef])
  }

  async transitionApproval(id: string, from: ApprovalState, change: ApprovalChange): Promise<ApprovalRecord | null> {
    const { rows } = await this.pool().query<ApprovalRow>(
      `UPDATE approval_records
       SET state = $3,
           final_text = CASE WHEN $4::boolean THEN $5 ELSE final_text END,
           decided_at = COALESCE($6, decided_at)
       WHERE id = $1 AND state = $2
       RETURNING ${APPROVAL_COLUMNS}`,
      [id, from, change.state, change.finalText !== undefined, change.finalText ?? null, change.decidedAt ?? null]
    )
    return rows[0] ? toApprovalRecord(rows[0]) : null
  }

  async blockFromApproval(
    id: string,
    from: ApprovalState,
    reason: string | null,
    decidedAt: Date
  ): Promise<ApprovalRecord | null> {
    const client = await this.pool().connect()
    try {
      await client.query('BEGIN')
      const { rows } = await client.query<ApprovalRow>(
        `UPDATE approval_records SET state = 'Blocked', decided_at = $3
         WHERE id = $1 AND state = $2
         RETURNING ${APPROVAL_COLUMNS}`,
        [id, from, decidedAt]
      )
      if (!rows[0]) {
        await client.query('ROLLBACK')
        return null
      }
      await client.query(
        `INSERT INTO blacklist (conversation_id, reason) VALUES ($1, $2)
         ON CONFLICT (conversation_id) DO NOTHING`,
        [rows[0].conversation_id, reason]
      )
      await client.query('COMMIT')
      return toApprovalRecord(rows[0])
    } catch (err) {
      await client.query('ROLLBACK')
      throw err
    } finally {
      client.release()
    }
  }

  async listApprovals(states: readonly ApprovalState[], limit = 20): Promise<ApprovalRecord[]> {
    const { rows } = await this.pool().query<ApprovalRow>(
      `SELECT ${APPROVAL_COLUMNS} FROM approval_records
       WHERE state = ANY($1::text[])
       ORDER BY created_at ASC
       LIMIT $2`,
      [states, limit]
    )
    return rows.map(toApprovalRecord)
  }

  async listExpiredPending(now: Date): Promise<ApprovalRecord[]> {
    const { rows } = await this.pool().query<ApprovalRow>(
      `SELECT ${APPROVAL_COLUMNS} FROM approval_records
       WHERE state = 'Pending' AND expires_at <= $1
       ORDER BY expires_at ASC`,
      [now]
    )
    return rows.map(toApprovalRecord)
  }

  // ─── Delivery ───────────────────────────────────────────────────────────

  async recordDeliveryAttempt(attempt: DeliveryAttempt): Promise<void> {
    await this.pool().query(
      `INSERT INTO delivery_attempts (approval_id, attempt_number, attempted_at, success, error)
       VALUES ($1, $2, $3, $4, $5)
       ON CONFLICT (approval_id, attempt_number) DO NOTHING`,
      [attempt.approvalId, attempt.attemptNumber, attempt.attemptedAt, attempt.success, attempt.error]
    )
  }

  async countDeliveryAttempts(approvalId: string): Promise<number> {
    const { rows } = await this.pool().query<{ count: string }>(
      `SELECT COUNT(*) AS count FROM delivery_attempts WHERE approval_id = $1`,
      [approvalId]
    )
    return rows[0] ? Number(rows[0].count) : 0
  }

  // ─── Draft sessions ─────────────────────────────────────────────────────

  async getDraftSession(conversationId: string): Promise<string | null> {
    const { rows } = await this.pool().query<{ session_handle: string }>(
      `SELECT session_handle FROM draft_sessions WHERE conversation_id = $1`,
      [conversationId]
    )
    return rows[0]?.session_handle ?? null
  }

  async saveDraftSession(conversationId: string, handle: string): Promise<string> {
    const inserted = await this.pool().query<{ session_handle: string }>(
      `INSERT INTO draft_sessions (conversation_id, session_handle) VALUES ($1, $2)
       ON CONFLICT (conversation_id) DO NOTHING
       RETURNING session_handle`,
      [conversationId, handle]
    )
    if (inserted.rows[0]) return inserted.rows[0].session_handle
    return (await this.getDraftSession(conversationId)) ?? handle
  }

  async deleteDraftSession(conversationId: string, handle: string): Promise<void> {
    await this.pool().query(
      `DELETE FROM draft_sessions WHERE conversation_id = $1 AND session_handle = $2`,
      [conversationId, handle]
    )
  }
}
