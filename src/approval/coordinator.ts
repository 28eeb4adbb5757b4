/**
 * Approval Coordinator
 *
 * Owns the lifecycle of approval records: opening a card for a drafted
 * message, applying operator decisions, expiring stale cards and handing
 * approved text to the delivery executor.
 *
 * Every mutation for a conversation runs under that conversation's lock.
 * Methods marked "lock held" are called by the ingestion poller from inside
 * its own critical section; the public entry points take the lock.
 */

import { auditRowFor, recordAudit, type AuditSink } from '../audit/audit-sink.js'
import type { DeliveryExecutor, DeliveryOutcome } from '../delivery/delivery-executor.js'
import type { DraftGenerator, DraftResult } from '../drafts/draft-generator.js'
import { DuplicateCallback, MalformedCallback } from '../errors.js'
import type { PolicyFilter } from '../policy/policy-filter.js'
import type { ConversationStore } from '../store/conversation-store.js'
import type { ApprovalRecord, ApprovalState, Decision, DecisionEvent, InboundMessage } from '../types/relay.js'
import type { KeyedMutex } from '../utils/keyed-mutex.js'
import { preview, safeError } from '../utils/safe-log.js'
import { escapeHtml, renderApprovalCard, renderResolvedCard } from './card.js'
import { awaitsDelivery, nextApprovalState, type ApprovalEvent } from './state-machine.js'
import type { ApprovalChannel, MediaKind } from './telegram-channel.js'

// ─── Types ──────────────────────────────────────────────────────────────────

export type DecisionStatus = 'applied' | 'duplicate' | 'invalid' | 'unknown_record' | 'failed'

export interface DecisionAck {
  status: DecisionStatus
  message: string
  state?: ApprovalState
}

export interface CoordinatorDeps {
  store: ConversationStore
  channel: ApprovalChannel
  delivery: DeliveryExecutor
  policy: PolicyFilter
  audit: AuditSink
  locks: KeyedMutex
  ttlMs: number
  /** Turns an operator voice reference into text. */
  resolveVoice?: (audioRef: string) => Promise<string>
  /** Fetches an inbound attachment to a local path so it can be shown next to the card. */
  fetchMedia?: (messageId: string, conversationId: string) => Promise<string>
  /** Keeps a stateful draft session in line with what was actually sent. */
  drafts?: Pick<DraftGenerator, 'noteOutcome'>
  now?: () => Date
}

const FORWARDED_MEDIA: Record<string, MediaKind> = {
  image: 'photo',
  video: 'video',
  document: 'document',
}

type OperatorDecision = Exclude<Decision, { type: 'record_own' }>

function describeDraftFailure(result: DraftResult): string | undefined {
  if (result.ok) return undefined
  return result.error.kind === 'timeout' ? 'draft timed out' : 'draft backend unavailable'
}

// ─── Coordinator ────────────────────────────────────────────────────────────

export class ApprovalCoordinator {
  private readonly now: () => Date

  constructor(private readonly deps: CoordinatorDeps) {
    this.now = deps.now ?? (() => new Date())
  }

  // ─── Ingestion side (lock held) ─────────────────────────────────────────

  /**
   * The conversation's unresolved record, if any. A Pending record past its
   * TTL is expired on the spot so the new message can open a fresh card.
   * Lock held.
   */
  async openRecordFor(conversationId: string): Promise<ApprovalRecord | null> {
    const record = await this.deps.store.findOpenApproval(conversationId)
    if (record && record.state === 'Pending' && record.expiresAt <= this.now()) {
      await this.expireLocked(record)
      return null
    }
    return record
  }

  /** Creates the Pending record and shows its card. Lock held. */
  async openApproval(message: InboundMessage, draft: DraftResult): Promise<ApprovalRecord> {
    const { store, channel, policy } = this.deps
    const now = this.now()
    const record = await store.createApproval({
      conversationId: message.conversationId,
      sourceMessageId: message.messageId,
      senderName: message.senderName,
      incomingText: message.body,
      draftText: draft.ok ? draft.draft.text : '',
      expiresAt: new Date(now.getTime() + this.deps.ttlMs),
    })

    const card = renderApprovalCard(record, {
      tag: await policy.tag(message.conversationId),
      receivedAt: message.receivedAt,
      now,
      failureNote: describeDraftFailure(draft),
    })

    try {
      const cardRef = await channel.present(card)
      await store.setApprovalCard(record.id, cardRef)
      console.log(`[Approval] Card ${cardRef} presented for approval ${record.id} (${message.conversationId})`)
      await this.forwardMedia(message, record.id)
      return { ...record, cardRef }
    } catch (err) {
      // The record stays Pending; it expires on TTL and the next message re-notifies.
      console.error(`[Approval] Could not present approval ${record.id}:`, safeError(err))
      return record
    }
  }

  /** Tells the operator that more text arrived while a card is open. Lock held. */
  async noteFollowUp(record: ApprovalRecord, message: InboundMessage): Promise<void> {
    await this.deps.channel
      .notify(`➕ <b>${escapeHtml(message.senderName)}</b> added while approval #${record.id} is open:\n${escapeHtml(preview(message.body, 300))}`)
      .catch(err => console.warn('[Approval] Follow-up notice failed:', safeError(err)))
  }

  /** Tells the operator an inbound message was given up on. */
  async noteUnprocessable(message: InboundMessage): Promise<void> {
    await this.notifyQuietly(
      `⚠️ Could not process message ${escapeHtml(message.messageId)} from <b>${escapeHtml(message.senderName || message.conversationId)}</b>. It was skipped.`
    )
  }

  // ─── Operator decisions ─────────────────────────────────────────────────

  async handleDecision(event: DecisionEvent): Promise<DecisionAck> {
    const decision = await this.materialize(event)
    if ('status' in decision) return decision

    try {
      const peek = await this.deps.store.getApproval(event.recordId)
      if (!peek) {
        const err = new MalformedCallback(`no approval with id ${event.recordId}`)
        console.warn(`[Approval] ${err.message}`)
        return { status: 'unknown_record', message: err.message }
      }
      return await this.deps.locks.run(peek.conversationId, () => this.applyLocked(event.recordId, decision))
    } catch (err) {
      console.error(`[Approval] Decision ${event.decision.type} on ${event.recordId} failed:`, safeError(err))
      return { status: 'failed', message: 'could not apply decision, try again' }
    }
  }

  /** Blacklists a conversation from an operator command and blocks its open card. */
  async blockConversation(conversationId: string, reason?: string): Promise<DecisionAck> {
    return this.deps.locks.run(conversationId, async () => {
      const open = await this.deps.store.findOpenApproval(conversationId)
      if (open && open.state === 'Pending') {
        return this.applyLocked(open.id, { type: 'block', reason })
      }
      await this.deps.store.addToBlacklist(conversationId, reason)
      console.log(`[Approval] ${conversationId} blacklisted by operator command`)
      return { status: 'applied', message: `${conversationId} blocked` }
    })
  }

  /** Re-sends the final text of a DeliveryFailed record through a fresh record. */
  async resend(recordId: string): Promise<DecisionAck> {
    try {
      return await this.resendUnguarded(recordId)
    } catch (err) {
      console.error(`[Approval] Resend of ${recordId} failed:`, safeError(err))
      return { status: 'failed', message: 'could not resend, try again' }
    }
  }

  private async resendUnguarded(recordId: string): Promise<DecisionAck> {
    const peek = await this.deps.store.getApproval(recordId)
    if (!peek) return { status: 'unknown_record', message: `no approval with id ${recordId}` }

    return this.deps.locks.run(peek.conversationId, async () => {
      const { store } = this.deps
      const record = await store.getApproval(recordId)
      if (!record || record.state !== 'DeliveryFailed') {
        return { status: 'invalid', message: `approval ${recordId} is ${record?.state ?? 'gone'}, only DeliveryFailed can be resent` }
      }
      if (await store.isBlacklisted(record.conversationId)) {
        return { status: 'invalid', message: `${record.conversationId} is blacklisted` }
      }
      if (await store.findOpenApproval(record.conversationId)) {
        return { status: 'invalid', message: `${record.conversationId} already has an open approval` }
      }

      const retry = await store.createApproval({
        conversationId: record.conversationId,
        sourceMessageId: record.sourceMessageId,
        senderName: record.senderName,
        incomingText: record.incomingText,
        draftText: record.draftText,
        state: 'Edited',
        finalText: record.finalText ?? record.draftText,
        expiresAt: new Date(this.now().getTime() + this.deps.ttlMs),
      })
      console.log(`[Approval] Resending approval ${recordId} as ${retry.id}`)
      return this.deliverLocked({ ...retry, cardRef: record.cardRef })
    })
  }

  // ─── Sweeps ─────────────────────────────────────────────────────────────

  /** Expires every Pending record past its TTL. Returns how many moved. */
  async expireStale(): Promise<number> {
    const stale = await this.deps.store.listExpiredPending(this.now())
    let expired = 0
    for (const candidate of stale) {
      const moved = await this.deps.locks.run(candidate.conversationId, async () => {
        const current = await this.deps.store.getApproval(candidate.id)
        if (!current || current.state !== 'Pending' || current.expiresAt > this.now()) return false
        return this.expireLocked(current)
      })
      if (moved) expired += 1
    }
    if (expired) console.log(`[Approval] Expired ${expired} stale approval(s)`)
    return expired
  }

  /** Finishes deliveries interrupted by a restart (records left Approved/Edited). */
  async recoverInFlight(): Promise<number> {
    const stuck = await this.deps.store.listApprovals(['Approved', 'Edited'], 100)
    for (const candidate of stuck) {
      await this.deps.locks.run(candidate.conversationId, async () => {
        const current = await this.deps.store.getApproval(candidate.id)
        if (current && awaitsDelivery(current.state)) {
          console.log(`[Approval] Resuming delivery of approval ${current.id}`)
          await this.deliverLocked(current)
        }
      })
    }
    return stuck.length
  }

  // ─── Internals ──────────────────────────────────────────────────────────

  private async materialize(event: DecisionEvent): Promise<OperatorDecision | DecisionAck> {
    const decision = event.decision
    if (decision.type !== 'record_own') return decision

    if (!this.deps.resolveVoice) {
      return { status: 'invalid', message: 'voice replies are not configured' }
    }
    try {
      const text = await this.deps.resolveVoice(decision.audioRef)
      return { type: 'edit', text }
    } catch (err) {
      console.error(`[Approval] Voice reply for ${event.recordId} could not be transcribed:`, safeError(err))
      await this.notifyQuietly(`⚠️ Could not transcribe your voice reply for approval #${event.recordId}. The card is still open.`)
      return { status: 'failed', message: 'voice transcription failed' }
    }
  }

  private async applyLocked(recordId: string, decision: OperatorDecision): Promise<DecisionAck> {
    const { store } = this.deps
    const record = await store.getApproval(recordId)
    if (!record) return { status: 'unknown_record', message: `no approval with id ${recordId}` }

    const sends = decision.type === 'approve' || decision.type === 'edit'
    if (sends && record.state === 'Pending' && record.expiresAt <= this.now()) {
      await this.expireLocked(record)
      console.log(`[Approval] ${decision.type} on ${record.id} arrived after it expired`)
      return { status: 'invalid', message: `approval ${record.id} expired`, state: 'Expired' }
    }

    const event: ApprovalEvent = decision.type === 'block' ? { type: 'block' } : decision
    const outcome = nextApprovalState(record, event)

    if (outcome.type === 'ignore') {
      const dup = new DuplicateCallback(record.id, record.state)
      console.log(`[Approval] ${dup.message}, ignoring ${decision.type}`)
      return { status: 'duplicate', message: dup.message, state: record.state }
    }
    if (outcome.type === 'invalid') {
      await this.notifyQuietly(`⚠️ Approval #${record.id}: ${escapeHtml(outcome.reason)}`)
      return { status: 'invalid', message: outcome.reason, state: record.state }
    }

    const decidedAt = this.now()
    const updated = outcome.to === 'Blocked'
      ? await store.blockFromApproval(record.id, record.state, decision.type === 'block' ? decision.reason ?? null : null, decidedAt)
      : await store.transitionApproval(record.id, record.state, { state: outcome.to, finalText: outcome.finalText, decidedAt })

    if (!updated) {
      return { status: 'duplicate', message: `approval ${record.id} changed concurrently`, state: record.state }
    }
    console.log(`[Approval] Approval ${record.id} ${record.state} -> ${updated.state} (${decision.type})`)

    if (awaitsDelivery(updated.state)) return this.deliverLocked(updated)

    await this.closeCard(updated)
    recordAudit(this.deps.audit, auditRowFor(updated, decidedAt))
    await this.deps.drafts?.noteOutcome(updated)
    return { status: 'applied', message: `approval ${updated.id} ${updated.state}`, state: updated.state }
  }

  private async expireLocked(record: ApprovalRecord): Promise<boolean> {
    const outcome = nextApprovalState(record, { type: 'expire' })
    if (outcome.type !== 'transition') return false
    const updated = await this.deps.store.transitionApproval(record.id, record.state, {
      state: outcome.to,
      decidedAt: this.now(),
    })
    if (!updated) return false
    console.log(`[Approval] Approval ${record.id} for ${record.conversationId} expired`)
    await this.closeCard(updated)
    recordAudit(this.deps.audit, auditRowFor(updated, this.now()))
    await this.deps.drafts?.noteOutcome(updated)
    return true
  }

  private async deliverLocked(record: ApprovalRecord): Promise<DecisionAck> {
    const result: DeliveryOutcome = await this.deps.delivery.deliver(record)
    if (result.status === 'skipped') {
      return { status: 'invalid', message: result.reason, state: record.state }
    }

    await this.closeCard({ ...result.record, cardRef: record.cardRef })
    if (result.status === 'failed') {
      await this.notifyQuietly(
        `⚠️ Could not deliver the reply to <b>${escapeHtml(record.senderName || record.conversationId)}</b> ` +
        `after ${result.attempts} attempt(s): ${escapeHtml(result.lastError)}\n` +
        (result.permanent ? 'The recipient cannot be reached.' : `Send <code>/resend ${record.id}</code> to try again.`)
      )
      return { status: 'applied', message: `delivery failed: ${result.lastError}`, state: result.record.state }
    }
    await this.deps.drafts?.noteOutcome(result.record)
    return { status: 'applied', message: `sent to ${record.conversationId}`, state: result.record.state }
  }

  /** Best effort: the card is already up, an attachment that cannot be fetched is only logged. */
  private async forwardMedia(message: InboundMessage, recordId: string): Promise<void> {
    const kind = message.mediaType ? FORWARDED_MEDIA[message.mediaType] : undefined
    if (!kind || !this.deps.fetchMedia) return
    try {
      const filePath = await this.deps.fetchMedia(message.messageId, message.conversationId)
      await this.deps.channel.presentMedia({ kind, filePath, caption: `📎 Attachment for approval #${recordId}` })
    } catch (err) {
      console.warn(`[Approval] Could not forward ${message.mediaType} ${message.messageId}:`, safeError(err))
    }
  }

  private async closeCard(record: ApprovalRecord): Promise<void> {
    if (!record.cardRef) return
    await this.deps.channel
      .resolveCard(record.cardRef, renderResolvedCard(record))
      .catch(err => console.warn(`[Approval] Could not update card ${record.cardRef}:`, safeError(err)))
  }

  private async notifyQuietly(text: string): Promise<void> {
    await this.deps.channel
      .notify(text)
      .catch(err => console.warn('[Approval] Operator notice failed:', safeError(err)))
  }
}
