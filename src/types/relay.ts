/**
 * Relay domain types.
 *
 * Conversation ids are the transport's chat identifiers (WhatsApp JIDs);
 * approval record ids are database ids carried as strings so they survive
 * a round-trip through Telegram callback data unchanged.
 */

// ─── Conversation ───────────────────────────────────────────────────────────

export const SUBSCRIPTION_TAGS = ['free', 'basic', 'premium'] as const
export type SubscriptionTag = typeof SUBSCRIPTION_TAGS[number]

export interface InboundMessage {
  messageId: string
  conversationId: string
  senderName: string
  body: string
  receivedAt: Date
  /** Raw transport timestamp, used as the read cursor. */
  cursorTimestamp: string
  mediaType?: string
}

export interface WindowEntry {
  role: 'user' | 'assistant'
  text: string
  messageId?: string
  at: string
}

export interface ConversationContext {
  conversationId: string
  displayName: string | null
  subscriptionTag: SubscriptionTag
  recentWindow: WindowEntry[]
  lastMessageId: string | null
  lastReceivedAt: Date | null
}

export interface BlacklistEntry {
  conversationId: string
  blockedAt: Date
  reason: string | null
}

// ─── Drafts ─────────────────────────────────────────────────────────────────

export interface DraftReply {
  conversationId: string
  sourceMessageId: string
  text: string
  generatedAt: Date
}

// ─── Approval ───────────────────────────────────────────────────────────────

export const APPROVAL_STATES = [
  'Pending',
  'Approved',
  'Edited',
  'Blocked',
  'Expired',
  'Rejected',
  'Sent',
  'DeliveryFailed',
] as const
export type ApprovalState = typeof APPROVAL_STATES[number]

export const OPEN_APPROVAL_STATES: readonly ApprovalState[] = ['Pending', 'Approved', 'Edited']

export interface ApprovalRecord {
  id: string
  conversationId: string
  sourceMessageId: string
  senderName: string
  incomingText: string
  draftText: string
  finalText: string | null
  state: ApprovalState
  cardRef: string | null
  createdAt: Date
  decidedAt: Date | null
  expiresAt: Date
}

export type Decision =
  | { type: 'approve' }
  | { type: 'edit'; text: string }
  | { type: 'record_own'; audioRef: string }
  | { type: 'block'; reason?: string }
  | { type: 'reject' }

export interface DecisionEvent {
  recordId: string
  decision: Decision
}

// ─── Delivery ───────────────────────────────────────────────────────────────

export interface DeliveryAttempt {
  approvalId: string
  attemptNumber: number
  attemptedAt: Date
  success: boolean
  error: string | null
}

export interface PollCursor {
  timestamp: string
  messageId: string
}
