/**
 * Approval State Machine
 *
 * Pure, total transition function over ApprovalState. Every (state, event)
 * pair yields a decision; nothing here touches storage or the network.
 *
 *   Pending ──approve──▶ Approved ──delivered──▶ Sent
 *      │    ──edit─────▶ Edited   ──failed─────▶ DeliveryFailed
 *      │    ──block────▶ Blocked
 *      │    ──reject───▶ Rejected
 *      └────expire─────▶ Expired
 */

import type { ApprovalRecord, ApprovalState } from '../types/relay.js'

// ─── Events & Decisions ─────────────────────────────────────────────────────

export type ApprovalEvent =
    | { type: 'approve' }
    | { type: 'edit'; text: string }
    | { type: 'block' }
    | { type: 'reject' }
    | { type: 'expire' }
    | { type: 'delivered' }
    | { type: 'delivery_failed' }

export type ApprovalDecision =
    | { type: 'transition'; to: ApprovalState; finalText?: string }
    | { type: 'ignore'; reason: 'already_resolved' }
    | { type: 'invalid'; reason: string }

const TERMINAL: ReadonlySet<ApprovalState> = new Set<ApprovalState>([
    'Blocked',
    'Expired',
    'Rejected',
    'Sent',
    'DeliveryFailed',
])

export function isTerminal(state: ApprovalState): boolean {
    return TERMINAL.has(state)
}

/** States that carry a final text waiting for the delivery executor. */
export function awaitsDelivery(state: ApprovalState): boolean {
    return state === 'Approved' || state === 'Edited'
}

// ─── Transition ─────────────────────────────────────────────────────────────

export function nextApprovalState(
    record: Pick<ApprovalRecord, 'state' | 'draftText'>,
    event: ApprovalEvent
): ApprovalDecision {
    if (isTerminal(record.state)) return { type: 'ignore', reason: 'already_resolved' }

    if (record.state === 'Pending') {
        switch (event.type) {
            case 'approve':
                if (!record.draftText.trim()) return { type: 'invalid', reason: 'draft is empty, edit or record a reply instead' }
                return { type: 'transition', to: 'Approved', finalText: record.draftText }
            case 'edit':
                if (!event.text.trim()) return { type: 'invalid', reason: 'edited reply is empty' }
                return { type: 'transition', to: 'Edited', finalText: event.text.trim() }
            case 'block':
                return { type: 'transition', to: 'Blocked' }
            case 'reject':
                return { type: 'transition', to: 'Rejected' }
            case 'expire':
                return { type: 'transition', to: 'Expired' }
            case 'delivered':
            case 'delivery_failed':
                return { type: 'invalid', reason: 'nothing was approved for delivery' }
        }
    }

    // Approved or Edited: the operator already decided, only delivery moves it on.
    switch (event.type) {
        case 'delivered':
            return { type: 'transition', to: 'Sent' }
        case 'delivery_failed':
            return { type: 'transition', to: 'DeliveryFailed' }
        case 'expire':
            return { type: 'invalid', reason: 'decided records do not expire' }
        default:
            return { type: 'ignore', reason: 'already_resolved' }
    }
}
