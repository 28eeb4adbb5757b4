/**
 * Delivery Executor
 *
 * Sends the final text of an Approved/Edited record through the transport.
 * Attempts run one after another with exponential backoff; each attempt is
 * recorded before the next one starts. Permanent recipient errors stop the
 * loop early. The record ends in Sent or DeliveryFailed, and only a
 * successful send is appended to the conversation window.
 *
 * Callers hold the conversation lock for the whole call.
 */

import { toRelayError } from '../errors.js'
import { auditRowFor, recordAudit, type AuditSink } from '../audit/audit-sink.js'
import { nextApprovalState } from '../approval/state-machine.js'
import type { ConversationStore } from '../store/conversation-store.js'
import type { TransportSender } from '../transport/types.js'
import type { ApprovalRecord } from '../types/relay.js'
import { backoffDelay, delay } from '../utils/retry.js'
import { safeError } from '../utils/safe-log.js'
import { withTimeout } from '../utils/timeout.js'

export interface DeliveryPolicy {
    maxAttempts: number
    baseDelayMs: number
    maxDelayMs: number
    sendTimeoutMs: number
    windowSize: number
}

export type DeliveryOutcome =
    | { status: 'sent'; record: ApprovalRecord; attempts: number }
    | { status: 'failed'; record: ApprovalRecord; attempts: number; lastError: string; permanent: boolean }
    | { status: 'skipped'; reason: string }

export interface DeliveryExecutorDeps {
    store: ConversationStore
    transport: TransportSender
    audit: AuditSink
    policy: DeliveryPolicy
    sleep?: (ms: number) => Promise<void>
    now?: () => Date
}

export class DeliveryExecutor {
    private readonly sleep: (ms: number) => Promise<void>
    private readonly now: () => Date

    constructor(private readonly deps: DeliveryExecutorDeps) {
        this.sleep = deps.sleep ?? delay
        this.now = deps.now ?? (() => new Date())
    }

    async deliver(record: ApprovalRecord): Promise<DeliveryOutcome> {
        const text = record.finalText?.trim()
        if ((record.state !== 'Approved' && record.state !== 'Edited') || !text) {
            return { status: 'skipped', reason: `record ${record.id} is ${record.state} without a final text` }
        }

        const { store, transport, policy } = this.deps
        // Resumed deliveries continue numbering after attempts made before a restart.
        const previous = await store.countDeliveryAttempts(record.id)
        let lastError = ''
        let permanent = false
        let attempts = 0

        for (let i = 0; i < policy.maxAttempts; i++) {
            const attemptNumber = previous + i + 1
            attempts += 1
            let sent = false
            try {
                await withTimeout(
                    signal => transport.send(record.conversationId, text, signal),
                    policy.sendTimeoutMs,
                    `send to ${record.conversationId}`
                )
                sent = true
            } catch (err) {
                const relayErr = toRelayError(err)
                lastError = relayErr.message
                permanent = relayErr.kind === 'permanent_recipient'
                await this.recordAttempt(record.id, attemptNumber, false, lastError)
                console.warn(`[Delivery] Attempt ${attemptNumber} for approval ${record.id} failed: ${lastError}`)
                if (permanent) break
                if (i < policy.maxAttempts - 1) {
                    await this.sleep(backoffDelay(i, policy.baseDelayMs, policy.maxDelayMs))
                }
            }

            if (sent) {
                await this.recordAttempt(record.id, attemptNumber, true, null)
                console.log(`[Delivery] Sent approval ${record.id} to ${record.conversationId} (attempt ${attemptNumber})`)
                return { status: 'sent', record: await this.finish(record, 'delivered', text), attempts }
            }
        }

        const failed = await this.finish(record, 'delivery_failed', text)
        return { status: 'failed', record: failed, attempts, lastError, permanent }
    }

    private async recordAttempt(approvalId: string, attemptNumber: number, success: boolean, error: string | null) {
        try {
            await this.deps.store.recordDeliveryAttempt({
                approvalId,
                attemptNumber,
                attemptedAt: this.now(),
                success,
                error,
            })
        } catch (err) {
            console.error(`[Delivery] Could not record attempt ${attemptNumber} for ${approvalId}:`, safeError(err))
        }
    }

    private async finish(
        record: ApprovalRecord,
        event: 'delivered' | 'delivery_failed',
        text: string
    ): Promise<ApprovalRecord> {
        const decision = nextApprovalState(record, { type: event })
        if (decision.type !== 'transition') {
            throw new Error(`approval ${record.id} cannot take ${event} from ${record.state}`)
        }

        const updated = await this.deps.store.transitionApproval(record.id, record.state, { state: decision.to })
        const resolved = updated ?? { ...record, state: decision.to }
        if (!updated) {
            console.warn(`[Delivery] Approval ${record.id} changed underneath delivery; reporting ${decision.to}`)
        }

        if (resolved.state === 'Sent') {
            await this.deps.store
                .appendToWindow(
                    record.conversationId,
                    { role: 'assistant', text, at: this.now().toISOString() },
                    { maxEntries: this.deps.policy.windowSize }
                )
                .catch(err => console.warn(`[Delivery] Window update failed for ${record.conversationId}:`, safeError(err)))
        }
        recordAudit(this.deps.audit, auditRowFor(resolved, this.now()))
        return resolved
    }
}
