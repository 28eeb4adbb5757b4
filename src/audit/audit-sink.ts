/**
 * Audit trail.
 *
 * Append-only record of every resolved approval. Writes are fire-and-forget:
 * an unreachable sink is logged and never blocks or fails a delivery.
 */

import { safeError } from '../utils/safe-log.js'
import type { ApprovalRecord, ApprovalState } from '../types/relay.js'

export interface AuditRow {
  timestamp: Date
  conversationId: string
  senderName: string
  incomingText: string
  draftText: string
  status: ApprovalState
  finalText: string
}

export interface AuditSink {
  append(row: AuditRow): Promise<void>
}

export const AUDIT_HEADERS = [
  'Timestamp',
  'Sender ID',
  'Sender Name',
  'Incoming Message',
  'AI Reply',
  'Status',
  'Final Reply Sent',
]

export function auditRowFor(record: ApprovalRecord, timestamp: Date): AuditRow {
  return {
    timestamp,
    conversationId: record.conversationId,
    senderName: record.senderName,
    incomingText: record.incomingText,
    draftText: record.draftText,
    status: record.state,
    finalText: record.state === 'Sent' ? record.finalText ?? '' : '',
  }
}

/** `YYYY-MM-DD HH:mm:ss` in UTC. */
export function formatAuditTimestamp(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ')
}

export function toSheetRow(row: AuditRow): string[] {
  return [
    formatAuditTimestamp(row.timestamp),
    row.conversationId,
    row.senderName,
    row.incomingText,
    row.draftText,
    row.status,
    row.finalText,
  ]
}

export class ConsoleAuditSink implements AuditSink {
  async append(row: AuditRow): Promise<void> {
    console.log(`[Audit] ${toSheetRow(row).map(cell => JSON.stringify(cell)).join(' | ')}`)
  }
}

export function recordAudit(sink: AuditSink, row: AuditRow): void {
  sink.append(row).catch(err => {
    console.warn(`[Audit] Failed to append ${row.status} row for ${row.conversationId}:`, safeError(err))
  })
}
