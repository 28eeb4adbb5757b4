/**
 * Approval card rendering for Telegram (HTML parse mode).
 */

import { TAG_BADGES } from '../policy/policy-filter.js'
import type { ApprovalRecord, ApprovalState, SubscriptionTag } from '../types/relay.js'
import type { CardAction } from '../types/schemas.js'

export interface InlineButton {
  text: string
  callback_data: string
}

export interface ApprovalCard {
  recordId: string
  text: string
  keyboard: InlineButton[][]
}

// Telegram rejects messages over 4096 characters.
const MAX_SECTION = 1500

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;')
}

function clip(text: string): string {
  return text.length > MAX_SECTION ? `${text.slice(0, MAX_SECTION)}…` : text
}

export function callbackData(action: CardAction, recordId: string): string {
  return `${action}:${recordId}`
}

export function formatAge(receivedAt: Date, now: Date): string {
  const minutes = Math.max(0, Math.floor((now.getTime() - receivedAt.getTime()) / 60_000))
  if (minutes < 1) return 'just now'
  if (minutes < 60) return `${minutes} min ago`
  const hours = Math.floor(minutes / 60)
  if (hours < 24) return `${hours} h ago`
  return `${Math.floor(hours / 24)} d ago`
}

export function renderApprovalCard(
  record: ApprovalRecord,
  opts: { tag: SubscriptionTag; receivedAt: Date; now: Date; failureNote?: string }
): ApprovalCard {
  const draft = record.draftText.trim()
  const lines = [
    '🔔 <b>New message</b>',
    `👤 <b>From:</b> ${escapeHtml(record.senderName || record.conversationId)}`,
    `📱 <b>Chat:</b> <code>${escapeHtml(record.conversationId)}</code>`,
    `🏷️ <b>Tier:</b> ${TAG_BADGES[opts.tag]}`,
    `🕒 <b>Received:</b> ${formatAge(opts.receivedAt, opts.now)}`,
    '',
    '💬 <b>Message:</b>',
    escapeHtml(clip(record.incomingText)),
    '',
    '🤖 <b>Suggested reply:</b>',
    draft
      ? escapeHtml(clip(draft))
      : `<i>No draft available${opts.failureNote ? ` (${escapeHtml(opts.failureNote)})` : ''}. Edit or record a reply.</i>`,
  ]

  const decide: InlineButton[] = draft
    ? [{ text: '✅ Approve & Send', callback_data: callbackData('approve', record.id) }]
    : []
  decide.push({ text: '❌ Reject', callback_data: callbackData('reject', record.id) })

  return {
    recordId: record.id,
    text: lines.join('\n'),
    keyboard: [
      decide,
      [
        { text: '✍️ Edit', callback_data: callbackData('edit', record.id) },
        { text: '🎤 Record own', callback_data: callbackData('voice', record.id) },
        { text: '🚫 Block', callback_data: callbackData('block', record.id) },
      ],
    ],
  }
}

const OUTCOME_LABELS: Partial<Record<ApprovalState, string>> = {
  Sent: '✅ Sent',
  Rejected: '❌ Rejected, nothing sent',
  Blocked: '🚫 Blocked, conversation blacklisted',
  Expired: '⌛ Expired without a decision',
  DeliveryFailed: '⚠️ Delivery failed',
}

/** Text that replaces the card once the record is resolved. */
export function renderResolvedCard(record: ApprovalRecord): string {
  const label = OUTCOME_LABELS[record.state] ?? record.state
  const lines = [
    `${label}`,
    `👤 ${escapeHtml(record.senderName || record.conversationId)}`,
    '',
    `💬 ${escapeHtml(clip(record.incomingText))}`,
  ]
  if (record.finalText) lines.push('', `📤 ${escapeHtml(clip(record.finalText))}`)
  return lines.join('\n')
}
