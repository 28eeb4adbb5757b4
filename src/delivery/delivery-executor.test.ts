/**
 * Tests: Delivery executor: retries, attempt ledger, terminal states
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { DeliveryExecutor, type DeliveryPolicy } from './delivery-executor.js'
import { FakeTransport, MemoryAuditSink, MemoryStore } from '../tests/fakes.js'
import { PermanentRecipientError, TransientIOError } from '../errors.js'
import type { ApprovalRecord } from '../types/relay.js'

const POLICY: DeliveryPolicy = { maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 8000, sendTimeoutMs: 5000, windowSize: 10 }
const NOW = new Date('2026-04-01T08:00:00Z')

let store: MemoryStore
let transport: FakeTransport
let audit: MemoryAuditSink
let waits: number[]

function executor(policy: DeliveryPolicy = POLICY) {
    return new DeliveryExecutor({
        store,
        transport,
        audit,
        policy,
        sleep: async ms => { waits.push(ms) },
        now: () => NOW,
    })
}

async function approved(finalText = 'On my way'): Promise<ApprovalRecord> {
    const record = await store.createApproval({
        conversationId: 'c1',
        sourceMessageId: 'm1',
        senderName: 'Lena',
        incomingText: 'where are you?',
        draftText: 'On my way',
        expiresAt: NOW,
    })
    const result = await store.transitionApproval(record.id, 'Pending', { state: 'Approved', finalText })
    if (!result) throw new Error('setup failed')
    return result
}

beforeEach(() => {
    store = new MemoryStore()
    transport = new FakeTransport()
    audit = new MemoryAuditSink()
    waits = []
})

describe('DeliveryExecutor', () => {
    it('sends once, marks the record Sent and writes one audit row', async () => {
        const record = await approved()

        const outcome = await executor().deliver(record)

        expect(outcome.status).toBe('sent')
        expect(transport.sent).toEqual([{ conversationId: 'c1', text: 'On my way' }])
        expect(store.approvals.get(record.id)?.state).toBe('Sent')
        expect(store.attempts).toEqual([
            { approvalId: record.id, attemptNumber: 1, attemptedAt: NOW, success: true, error: null },
        ])
        expect(audit.rows).toHaveLength(1)
        expect(audit.rows[0]).toMatchObject({ status: 'Sent', finalText: 'On my way', conversationId: 'c1' })
        expect((await store.getContext('c1')).recentWindow).toEqual([
            { role: 'assistant', text: 'On my way', at: NOW.toISOString() },
        ])
    })

    it('retries transient failures with backoff and succeeds', async () => {
        transport.failures = [new TransientIOError('bridge send failed: not connected')]
        const record = await approved()

        const outcome = await executor().deliver(record)

        expect(outcome).toMatchObject({ status: 'sent', attempts: 2 })
        expect(waits).toEqual([1000])
        expect(store.attempts.map(a => [a.attemptNumber, a.success])).toEqual([[1, false], [2, true]])
    })

    it('makes exactly maxAttempts tries then lands in DeliveryFailed', async () => {
        transport.failures = [new Error('fetch failed'), new Error('fetch failed'), new Error('fetch failed')]
        const record = await approved()

        const outcome = await executor().deliver(record)

        expect(outcome).toMatchObject({ status: 'failed', attempts: 3, permanent: false, lastError: 'fetch failed' })
        expect(transport.send).toHaveBeenCalledTimes(3)
        expect(store.attempts).toHaveLength(3)
        expect(waits).toEqual([1000, 2000])
        expect(store.approvals.get(record.id)?.state).toBe('DeliveryFailed')
        expect(audit.rows.map(r => [r.status, r.finalText])).toEqual([['DeliveryFailed', '']])
        expect((await store.getContext('c1')).recentWindow).toEqual([])
    })

    it('stops at the first permanent recipient error', async () => {
        transport.failures = [new PermanentRecipientError('c1', 'Invalid JID')]
        const record = await approved()

        const outcome = await executor().deliver(record)

        expect(outcome).toMatchObject({ status: 'failed', attempts: 1, permanent: true })
        expect(waits).toEqual([])
        expect(store.approvals.get(record.id)?.state).toBe('DeliveryFailed')
    })

    it('continues attempt numbering when resuming after a restart', async () => {
        const record = await approved()
        await store.recordDeliveryAttempt({ approvalId: record.id, attemptNumber: 1, attemptedAt: NOW, success: false, error: 'crash' })

        await executor().deliver(record)

        expect(store.attempts.map(a => a.attemptNumber)).toEqual([1, 2])
    })

    it('skips records that are not waiting for delivery', async () => {
        const record = await approved()
        const outcome = await executor().deliver({ ...record, state: 'Pending' })

        expect(outcome.status).toBe('skipped')
        expect(transport.send).not.toHaveBeenCalled()
    })
})
