/**
 * Bridge message log reader.
 *
 * The WhatsApp bridge persists every message it sees into its own SQLite
 * database. The relay opens that file read-only and tails it by
 * (timestamp, id); it never writes to it.
 */

import Database from 'better-sqlite3'
import type { InboundMessage, PollCursor } from '../types/relay.js'
import type { TransportReader } from './types.js'

type BridgeRow = {
  id: string
  chat_jid: string
  sender: string | null
  content: string | null
  timestamp: string
  chat_name: string | null
  media_type: string | null
}

const MEDIA_PLACEHOLDERS: Record<string, string> = {
  image: '[Image]',
  video: '[Video]',
  document: '[Document]',
  sticker: '[Sticker]',
  audio: '[Voice message]',
}

const INBOUND_SQL = `
  SELECT m.id, m.chat_jid, m.sender, m.content, m.timestamp, c.name AS chat_name, m.media_type
  FROM messages m
  LEFT JOIN chats c ON m.chat_jid = c.jid
  WHERE m.is_from_me = 0
    AND (COALESCE(m.content, '') != '' OR COALESCE(m.media_type, '') != '')
    AND (m.timestamp > ? OR (m.timestamp = ? AND m.id > ?))
  ORDER BY m.timestamp ASC, m.id ASC
  LIMIT ?`

const LATEST_SQL = `SELECT id, timestamp FROM messages ORDER BY timestamp DESC, id DESC LIMIT 1`

export function parseBridgeTimestamp(raw: string): Date {
  const parsed = new Date(raw.includes('T') ? raw : raw.replace(' ', 'T'))
  return Number.isNaN(parsed.getTime()) ? new Date() : parsed
}

export class BridgeLogReader implements TransportReader {
  private db: Database.Database | null

  constructor(private readonly source: string | Database.Database) {
    this.db = typeof source === 'string' ? null : source
  }

  private open(): Database.Database {
    if (!this.db) {
      if (typeof this.source !== 'string') return this.source
      this.db = new Database(this.source, { readonly: true, fileMustExist: true })
    }
    return this.db
  }

  async readSince(cursor: PollCursor | null, limit: number): Promise<InboundMessage[]> {
    const rows = this.open()
      .prepare<[string, string, string, number], BridgeRow>(INBOUND_SQL)
      .all(cursor?.timestamp ?? '', cursor?.timestamp ?? '', cursor?.messageId ?? '', limit)

    const messages: InboundMessage[] = []
    for (const row of rows) {
      messages.push({
        messageId: row.id,
        conversationId: row.chat_jid,
        senderName: stripNul(row.chat_name || row.sender || row.chat_jid.split('@')[0]),
        body: bodyOf(row),
        receivedAt: parseBridgeTimestamp(row.timestamp),
        cursorTimestamp: row.timestamp,
        mediaType: row.media_type || undefined,
      })
    }
    return messages
  }

  async latestCursor(): Promise<PollCursor | null> {
    const row = this.open().prepare<[], { id: string; timestamp: string }>(LATEST_SQL).get()
    return row ? { timestamp: row.timestamp, messageId: row.id } : null
  }

  close(): void {
    if (this.db && typeof this.source === 'string') {
      this.db.close()
      this.db = null
    }
  }

}

/** Text content, or a placeholder naming the attachment. Voice notes are transcribed later, by the poller. */
function bodyOf(row: BridgeRow): string {
  const content = stripNul(row.content ?? '').trim()
  if (content) return content
  const mediaType = row.media_type ?? ''
  return MEDIA_PLACEHOLDERS[mediaType] ?? `[${mediaType || 'Unsupported message'}]`
}

/** PostgreSQL text and jsonb reject U+0000. */
function stripNul(text: string): string {
  return text.replace(/\u0000/g, '')
}
