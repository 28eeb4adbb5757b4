/**
 * Tests: end-to-end relay flows
 *
 * Poller, policy filter, draft generator, coordinator and delivery executor
 * run for real; the LLM, the bridge and Telegram are in-process fakes.
 */

import { describe, it, expect, vi, afterEach } from 'vitest'
import { TelegramUpdateRouter } from '../approval/telegram-updates.js'
import { PermanentRecipientError, TransientIOError } from '../errors.js'
import { OperatorCommands } from '../operator/commands.js'
import { OPEN_APPROVAL_STATES } from '../types/relay.js'
import { inbound } from './fakes.js'
import { START, createHarness, type Harness } from './harness.js'

afterEach(() => {
    vi.restoreAllMocks()
})

function openFor(h: Harness, conversationId: string) {
    return h.store.recordsFor(conversationId).filter(r => OPEN_APPROVAL_STATES.includes(r.state))
}

describe('approve and send', () => {
    it('drafts, waits for approval, sends once and audits once', async () => {
        const h = createHarness()
        const msg = inbound('alice', 'are we still on for tonight?')
        h.transport.log.push(msg)

        const summary = await h.poller.tick()

        expect(summary).toEqual({ read: 1, handled: 1, failed: 0, outcomes: { drafted: 1 } })
        expect(h.transport.sent).toEqual([])
        expect(h.channel.cards).toHaveLength(1)
        expect(h.channel.cards[0].keyboard[0]).toEqual([
            { text: '✅ Approve & Send', callback_data: 'approve:1' },
            { text: '❌ Reject', callback_data: 'reject:1' },
        ])
        expect(h.store.cursor).toEqual({ timestamp: msg.cursorTimestamp, messageId: msg.messageId })

        const ack = await h.coordinator.handleDecision({ recordId: '1', decision: { type: 'approve' } })

        expect(ack).toEqual({ status: 'applied', message: 'sent to alice', state: 'Sent' })
        expect(h.transport.sent).toEqual([{ conversationId: 'alice', text: 'Sure, see you at 6' }])
        expect(h.audit.rows).toHaveLength(1)
        expect(h.audit.rows[0]).toMatchObject({
            conversationId: 'alice',
            incomingText: 'are we still on for tonight?',
            draftText: 'Sure, see you at 6',
            status: 'Sent',
            finalText: 'Sure, see you at 6',
        })
        expect(h.channel.resolved).toHaveLength(1)
        expect(h.channel.resolved[0].cardRef).toBe('100')
        expect(h.channel.resolved[0].text.split('\n')[0]).toBe('✅ Sent')

        const context = await h.store.getContext('alice')
        expect(context.recentWindow.map(e => `${e.role}:${e.text}`)).toEqual([
            'user:are we still on for tonight?',
            'assistant:Sure, see you at 6',
        ])
    })

    it('starts at the end of an existing log on first run', async () => {
        const h = createHarness()
        h.store.cursor = null
        const old = inbound('alice', 'message from last week')
        h.transport.log.push(old)

        const first = await h.poller.tick()
        expect(first.read).toBe(0)
        expect(h.store.cursor).toEqual({ timestamp: old.cursorTimestamp, messageId: old.messageId })

        h.transport.log.push(inbound('alice', 'hello again'))
        const second = await h.poller.tick()
        expect(second.outcomes).toEqual({ drafted: 1 })
        expect(h.backend.complete).toHaveBeenCalledTimes(1)
    })
})

describe('single-flight per conversation', () => {
    it('merges a follow-up into the open approval instead of drafting again', async () => {
        const h = createHarness()
        h.transport.log.push(inbound('alice', 'can you pick me up?'), inbound('alice', 'also bring the charger'))

        const summary = await h.poller.tick()

        expect(summary.outcomes).toEqual({ drafted: 1, merged: 1 })
        expect(h.backend.complete).toHaveBeenCalledTimes(1)
        expect(h.channel.cards).toHaveLength(1)
        expect(h.channel.notices).toEqual([
            '➕ <b>ALICE</b> added while approval #1 is open:\nalso bring the charger',
        ])
        const context = await h.store.getContext('alice')
        expect(context.recentWindow.map(e => e.text)).toEqual(['can you pick me up?', 'also bring the charger'])
    })

    it('opens a new approval once the previous one is sent', async () => {
        const h = createHarness()
        h.transport.log.push(inbound('alice', 'first'))
        await h.poller.tick()
        await h.coordinator.handleDecision({ recordId: '1', decision: { type: 'approve' } })

        h.transport.log.push(inbound('alice', 'second'))
        const summary = await h.poller.tick()

        expect(summary.outcomes).toEqual({ drafted: 1 })
        expect(h.channel.cards.map(c => c.recordId)).toEqual(['1', '2'])
    })

    it('drafts independent conversations in the same tick', async () => {
        const h = createHarness()
        h.transport.log.push(inbound('alice', 'hi'), inbound('bob', 'hey'))

        const summary = await h.poller.tick()

        expect(summary.outcomes).toEqual({ drafted: 2 })
        expect(h.channel.cards).toHaveLength(2)
    })
})

describe('blocking', () => {
    it('blacklists the conversation and filters everything after it', async () => {
        const h = createHarness()
        h.transport.log.push(inbound('alice', 'buy crypto now'))
        await h.poller.tick()

        const ack = await h.coordinator.handleDecision({ recordId: '1', decision: { type: 'block' } })
        expect(ack).toEqual({ status: 'applied', message: 'approval 1 Blocked', state: 'Blocked' })
        expect(await h.store.isBlacklisted('alice')).toBe(true)

        const later = inbound('alice', 'still there?')
        h.transport.log.push(later)
        const summary = await h.poller.tick()

        expect(summary.outcomes).toEqual({ filtered: 1 })
        expect(h.store.processed.get(later.messageId)).toBe('filtered')
        expect(h.backend.complete).toHaveBeenCalledTimes(1)
        expect(h.channel.cards).toHaveLength(1)
        expect(h.transport.sent).toEqual([])
        expect(h.audit.rows.map(r => r.status)).toEqual(['Blocked'])
    })

    it('drops a whole batch for a conversation blocked by command', async () => {
        const h = createHarness()
        await h.coordinator.blockConversation('spam', 'bulk sender')
        h.transport.log.push(inbound('spam', 'one'), inbound('spam', 'two'))

        const summary = await h.poller.tick()

        expect(summary.outcomes).toEqual({ filtered: 2 })
        expect(h.channel.cards).toEqual([])
    })
})

describe('duplicate decisions', () => {
    it('sends once when approve is tapped twice', async () => {
        const h = createHarness()
        h.transport.log.push(inbound('alice', 'ok?'))
        await h.poller.tick()

        await h.coordinator.handleDecision({ recordId: '1', decision: { type: 'approve' } })
        const again = await h.coordinator.handleDecision({ recordId: '1', decision: { type: 'approve' } })

        expect(again).toEqual({ status: 'duplicate', message: 'approval 1 already resolved (Sent)', state: 'Sent' })
        expect(h.transport.sent).toHaveLength(1)
        expect(h.audit.rows).toHaveLength(1)
    })

    it('serialises concurrent taps on the same card', async () => {
        const h = createHarness()
        h.transport.log.push(inbound('alice', 'ok?'))
        await h.poller.tick()

        const acks = await Promise.all([
            h.coordinator.handleDecision({ recordId: '1', decision: { type: 'approve' } }),
            h.coordinator.handleDecision({ recordId: '1', decision: { type: 'reject' } }),
        ])

        expect(acks.map(a => a.status)).toEqual(['applied', 'duplicate'])
        expect(h.transport.sent).toHaveLength(1)
    })

    it('reports an unknown record', async () => {
        const h = createHarness()
        const ack = await h.coordinator.handleDecision({ recordId: '404', decision: { type: 'approve' } })
        expect(ack).toEqual({ status: 'unknown_record', message: 'no approval with id 404' })
    })
})

describe('delivery failure', () => {
    it('ends in DeliveryFailed after the retry budget and can be resent', async () => {
        const h = createHarness({ maxAttempts: 3 })
        h.transport.log.push(inbound('alice', 'call me'))
        await h.poller.tick()
        h.transport.failures = [1, 2, 3].map(() => new TransientIOError('bridge /send unreachable: ECONNREFUSED'))

        const ack = await h.coordinator.handleDecision({ recordId: '1', decision: { type: 'approve' } })

        expect(ack).toEqual({
            status: 'applied',
            message: 'delivery failed: bridge /send unreachable: ECONNREFUSED',
            state: 'DeliveryFailed',
        })
        expect(h.store.attempts.map(a => a.attemptNumber)).toEqual([1, 2, 3])
        expect(h.audit.rows).toMatchObject([{ status: 'DeliveryFailed', finalText: '' }])
        expect(h.channel.notices).toHaveLength(1)
        expect(h.channel.notices[0]).toContain('after 3 attempt(s)')
        expect(h.channel.notices[0]).toContain('Send <code>/resend 1</code> to try again.')

        const resent = await h.coordinator.resend('1')

        expect(resent).toEqual({ status: 'applied', message: 'sent to alice', state: 'Sent' })
        expect(h.transport.sent).toEqual([{ conversationId: 'alice', text: 'Sure, see you at 6' }])
        expect(h.store.approvals.get('1')?.state).toBe('DeliveryFailed')
        expect(h.store.approvals.get('2')).toMatchObject({ state: 'Sent', finalText: 'Sure, see you at 6' })
        expect(h.audit.rows.map(r => r.status)).toEqual(['DeliveryFailed', 'Sent'])
    })

    it('stops after one attempt when the recipient is permanently unreachable', async () => {
        const h = createHarness({ maxAttempts: 3 })
        h.transport.log.push(inbound('alice', 'call me'))
        await h.poller.tick()
        h.transport.failures = [new PermanentRecipientError('alice', 'not on WhatsApp')]

        const ack = await h.coordinator.handleDecision({ recordId: '1', decision: { type: 'approve' } })

        expect(ack.state).toBe('DeliveryFailed')
        expect(h.transport.send).toHaveBeenCalledTimes(1)
        expect(h.channel.notices[0]).toContain('The recipient cannot be reached.')
        expect(h.channel.notices[0]).not.toContain('/resend')
    })

    it('refuses to resend a record that did not fail', async () => {
        const h = createHarness()
        h.transport.log.push(inbound('alice', 'hi'))
        await h.poller.tick()

        const ack = await h.coordinator.resend('1')

        expect(ack).toEqual({ status: 'invalid', message: 'approval 1 is Pending, only DeliveryFailed can be resent' })
    })
})

describe('restart recovery', () => {
    it('finishes a delivery interrupted after approval, exactly once', async () => {
        const h = createHarness()
        const record = await h.store.createApproval({
            conversationId: 'alice',
            sourceMessageId: 'm-crash',
            senderName: 'Alice',
            incomingText: 'ping',
            draftText: 'pong',
            expiresAt: START,
        })
        await h.store.transitionApproval(record.id, 'Pending', { state: 'Approved', finalText: 'pong' })
        await h.store.recordDeliveryAttempt({
            approvalId: record.id,
            attemptNumber: 1,
            attemptedAt: START,
            success: false,
            error: 'process exited',
        })

        expect(await h.coordinator.recoverInFlight()).toBe(1)
        expect(await h.coordinator.recoverInFlight()).toBe(0)

        expect(h.transport.sent).toEqual([{ conversationId: 'alice', text: 'pong' }])
        expect(h.store.attempts.map(a => a.attemptNumber)).toEqual([1, 2])
        expect(h.store.approvals.get(record.id)?.state).toBe('Sent')
    })

    it('leaves Pending approvals untouched', async () => {
        const h = createHarness()
        h.transport.log.push(inbound('alice', 'hi'))
        await h.poller.tick()

        expect(await h.coordinator.recoverInFlight()).toBe(0)
        expect(h.store.approvals.get('1')?.state).toBe('Pending')
    })
})

describe('expiry', () => {
    it('expires a Pending approval past its TTL and ignores later taps', async () => {
        const h = createHarness({ ttlMs: 60_000 })
        h.transport.log.push(inbound('alice', 'anyone?'))
        await h.poller.tick()

        h.advance(30_000)
        expect(await h.coordinator.expireStale()).toBe(0)

        h.advance(60_000)
        expect(await h.coordinator.expireStale()).toBe(1)
        expect(h.store.approvals.get('1')?.state).toBe('Expired')
        expect(h.audit.rows.map(r => r.status)).toEqual(['Expired'])
        expect(h.channel.resolved[0].text.split('\n')[0]).toBe('⌛ Expired without a decision')

        const late = await h.coordinator.handleDecision({ recordId: '1', decision: { type: 'approve' } })
        expect(late.status).toBe('duplicate')
        expect(h.transport.sent).toEqual([])
    })

    it('expires on demand when the next message arrives', async () => {
        const h = createHarness({ ttlMs: 60_000 })
        h.transport.log.push(inbound('alice', 'anyone?'))
        await h.poller.tick()

        h.advance(120_000)
        h.transport.log.push(inbound('alice', 'hello??'))
        const summary = await h.poller.tick()

        expect(summary.outcomes).toEqual({ drafted: 1 })
        expect(h.store.approvals.get('1')?.state).toBe('Expired')
        expect(h.store.approvals.get('2')?.state).toBe('Pending')
        expect(h.channel.cards.map(c => c.recordId)).toEqual(['1', '2'])
    })
})

describe('draft failures', () => {
    it('opens a card without a draft when the backend times out', async () => {
        const h = createHarness({ draftTimeoutMs: 20 })
        h.backend.complete.mockImplementationOnce(() => new Promise<string>(() => {}))
        h.transport.log.push(inbound('alice', 'what time?'))

        const summary = await h.poller.tick()

        expect(summary.outcomes).toEqual({ draft_failed: 1 })
        const card = h.channel.cards[0]
        expect(card.keyboard[0]).toEqual([{ text: '❌ Reject', callback_data: 'reject:1' }])
        expect(card.text).toContain('<i>No draft available (draft timed out). Edit or record a reply.</i>')

        const approve = await h.coordinator.handleDecision({ recordId: '1', decision: { type: 'approve' } })
        expect(approve).toEqual({
            status: 'invalid',
            message: 'draft is empty, edit or record a reply instead',
            state: 'Pending',
        })

        const edit = await h.coordinator.handleDecision({ recordId: '1', decision: { type: 'edit', text: ' 7pm works ' } })
        expect(edit.state).toBe('Sent')
        expect(h.transport.sent).toEqual([{ conversationId: 'alice', text: '7pm works' }])
    })

    it('labels a backend error on the card', async () => {
        const h = createHarness()
        h.backend.complete.mockRejectedValueOnce(new Error('503 Service Unavailable'))
        h.transport.log.push(inbound('alice', 'what time?'))

        await h.poller.tick()

        expect(h.channel.cards[0].text).toContain('(draft backend unavailable)')
    })
})

describe('cursor advance', () => {
    it('stops at the first unhandled message and retries it on the next tick', async () => {
        const h = createHarness()
        const a1 = inbound('alice', 'one')
        const b1 = inbound('bob', 'two')
        const a2 = inbound('alice', 'three')
        h.transport.log.push(a1, b1, a2)

        const realCreate = h.store.createApproval.bind(h.store)
        let failBob = true
        vi.spyOn(h.store, 'createApproval').mockImplementation(async input => {
            if (failBob && input.conversationId === 'bob') {
                failBob = false
                throw new Error('connection reset')
            }
            return realCreate(input)
        })

        const first = await h.poller.tick()
        expect(first).toEqual({ read: 3, handled: 2, failed: 1, outcomes: { drafted: 1, merged: 1 } })
        expect(h.store.cursor).toEqual({ timestamp: a1.cursorTimestamp, messageId: a1.messageId })

        const second = await h.poller.tick()
        expect(second).toEqual({ read: 2, handled: 2, failed: 0, outcomes: { drafted: 1, skipped: 1 } })
        expect(h.store.cursor).toEqual({ timestamp: a2.cursorTimestamp, messageId: a2.messageId })
        expect(h.channel.notices).toHaveLength(1)
        expect((await h.store.getContext('bob')).recentWindow).toHaveLength(1)
    })
})

describe('messages that keep failing', () => {
    it('writes off a message after its attempts run out so the log keeps moving', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => {})
        const h = createHarness({ batchSize: 3 })
        const bad = inbound('alice', 'menu\u0000attached')
        const b1 = inbound('bob', 'hi')
        const c1 = inbound('carol', 'hey')
        const d1 = inbound('dave', 'yo')
        const z1 = inbound('zed', 'late one')
        const a2 = inbound('alice', 'still there?')
        h.transport.log.push(bad, b1, c1, d1, z1, a2)

        const realAppend = h.store.appendToWindow.bind(h.store)
        vi.spyOn(h.store, 'appendToWindow').mockImplementation(async (conversationId, entry, opts) => {
            if (entry.text.includes('\u0000')) throw new Error('invalid byte sequence for encoding "UTF8": 0x00')
            return realAppend(conversationId, entry, opts)
        })

        const ticks = []
        for (let i = 0; i < 4; i++) ticks.push(await h.poller.tick())

        expect(ticks[0]).toEqual({ read: 3, handled: 2, failed: 1, outcomes: { drafted: 2 } })
        expect(ticks[1]).toEqual({ read: 3, handled: 2, failed: 1, outcomes: { skipped: 2 } })
        expect(ticks[2]).toEqual({ read: 3, handled: 3, failed: 0, outcomes: { failed: 1, skipped: 2 } })
        expect(ticks[3]).toEqual({ read: 3, handled: 3, failed: 0, outcomes: { drafted: 3 } })

        expect(h.store.processed.get(bad.messageId)).toBe('failed')
        expect(h.store.processed.get(z1.messageId)).toBe('drafted')
        expect(h.store.cursor).toEqual({ timestamp: a2.cursorTimestamp, messageId: a2.messageId })
        expect(h.store.recordsFor('alice').map(r => r.sourceMessageId)).toEqual([a2.messageId])
        expect(h.channel.notices).toEqual([`⚠️ Could not process message ${bad.messageId} from <b>ALICE</b>. It was skipped.`])
    })

    it('gives up at once on a data error the database will never accept', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => {})
        const h = createHarness()
        const bad = inbound('alice', 'nul\u0000byte')
        const b1 = inbound('bob', 'hi')
        h.transport.log.push(bad, b1)

        const realAppend = h.store.appendToWindow.bind(h.store)
        vi.spyOn(h.store, 'appendToWindow').mockImplementation(async (conversationId, entry, opts) => {
            if (entry.text.includes('\u0000')) {
                throw Object.assign(new Error('unsupported Unicode escape sequence'), { code: '22P05' })
            }
            return realAppend(conversationId, entry, opts)
        })

        const summary = await h.poller.tick()

        expect(summary).toEqual({ read: 2, handled: 2, failed: 0, outcomes: { failed: 1, drafted: 1 } })
        expect(h.store.cursor).toEqual({ timestamp: b1.cursorTimestamp, messageId: b1.messageId })
    })
})

describe('inbound voice notes', () => {
    it('transcribes a voice note before drafting', async () => {
        const voiceNotes = vi.fn(async (_messageId: string, _conversationId: string, _signal?: AbortSignal) => 'running ten minutes late')
        const h = createHarness({ voiceNotes })
        const msg = inbound('alice', '[Voice message]', { mediaType: 'audio' })
        h.transport.log.push(msg)

        await h.poller.tick()

        expect(voiceNotes).toHaveBeenCalledWith(msg.messageId, 'alice', expect.any(AbortSignal))
        expect(h.store.approvals.get('1')?.incomingText).toBe('🎤 running ten minutes late')
        expect((await h.store.getContext('alice')).recentWindow.map(e => e.text)).toEqual(['🎤 running ten minutes late'])
    })

    it('never transcribes a voice note from a blacklisted conversation', async () => {
        const voiceNotes = vi.fn(async (_messageId: string, _conversationId: string, _signal?: AbortSignal) => 'buy now')
        const h = createHarness({ voiceNotes })
        await h.store.addToBlacklist('spam')
        h.transport.log.push(inbound('spam', '[Voice message]', { mediaType: 'audio' }))

        const summary = await h.poller.tick()

        expect(summary.outcomes).toEqual({ filtered: 1 })
        expect(voiceNotes).not.toHaveBeenCalled()
    })

    it('does not transcribe a voice note that was already handled', async () => {
        const voiceNotes = vi.fn(async (_messageId: string, _conversationId: string, _signal?: AbortSignal) => 'again')
        const h = createHarness({ voiceNotes })
        const msg = inbound('alice', '[Voice message]', { mediaType: 'audio' })
        await h.store.markMessageProcessed(msg, 'drafted')
        h.transport.log.push(msg)

        await h.poller.tick()

        expect(voiceNotes).not.toHaveBeenCalled()
    })

    it('does not hold up other conversations while a transcription is slow', async () => {
        let release: (text: string) => void = () => {}
        const transcript = new Promise<string>(resolve => { release = resolve })
        const voiceNotes = vi.fn((_messageId: string, _conversationId: string, _signal?: AbortSignal) => transcript)
        const h = createHarness({ voiceNotes })
        h.transport.log.push(inbound('alice', '[Voice message]', { mediaType: 'audio' }), inbound('bob', 'quick question'))

        const pending = h.poller.tick()
        await vi.waitFor(() => expect(h.store.recordsFor('bob')).toHaveLength(1))
        expect(h.store.recordsFor('alice')).toHaveLength(0)

        release('on the train')
        await pending
        expect(h.store.recordsFor('alice').map(r => r.incomingText)).toEqual(['🎤 on the train'])
    })

    it('keeps the placeholder when transcription overruns its deadline', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => {})
        const voiceNotes = vi.fn((_messageId: string, _conversationId: string, _signal?: AbortSignal) => new Promise<string>(() => {}))
        const h = createHarness({ voiceNotes, voiceTimeoutMs: 20 })
        h.transport.log.push(inbound('alice', '[Voice message]', { mediaType: 'audio' }))

        const summary = await h.poller.tick()

        expect(summary.outcomes).toEqual({ drafted: 1 })
        expect(h.store.approvals.get('1')?.incomingText).toBe('[Voice message]')
    })
})

describe('inbound attachments', () => {
    it('forwards a photo to the operator next to its card', async () => {
        const fetchMedia = vi.fn(async (_messageId: string, _conversationId: string) => '/tmp/bridge/photo.jpg')
        const h = createHarness({ fetchMedia })
        const msg = inbound('alice', '[Image]', { mediaType: 'image' })
        h.transport.log.push(msg, inbound('bob', '[Sticker]', { mediaType: 'sticker' }))

        await h.poller.tick()

        expect(fetchMedia).toHaveBeenCalledTimes(1)
        expect(fetchMedia).toHaveBeenCalledWith(msg.messageId, 'alice')
        const [record] = h.store.recordsFor('alice')
        expect(h.channel.media).toEqual([
            { kind: 'photo', filePath: '/tmp/bridge/photo.jpg', caption: `📎 Attachment for approval #${record.id}` },
        ])
    })

    it('still opens the card when the attachment cannot be fetched', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => {})
        const fetchMedia = vi.fn(async (_messageId: string, _conversationId: string): Promise<string> => {
            throw new TransientIOError('bridge download failed')
        })
        const h = createHarness({ fetchMedia })
        h.transport.log.push(inbound('alice', '[Document]', { mediaType: 'document' }))

        const summary = await h.poller.tick()

        expect(summary.outcomes).toEqual({ drafted: 1 })
        expect(h.channel.cards).toHaveLength(1)
        expect(h.channel.media).toEqual([])
    })
})

describe('stateful drafting', () => {
    function assistant() {
        return {
            name: 'fake-assistant',
            createSession: vi.fn(async (_signal?: AbortSignal) => 'thread-1'),
            continueSession: vi.fn(async (_handle: string, _text: string, _signal?: AbortSignal) => 'See you at 6'),
            appendMessage: vi.fn(async (_handle: string, _text: string, _signal?: AbortSignal) => {}),
        }
    }

    it('posts merged follow-ups and the reply actually sent to the session', async () => {
        const stateful = assistant()
        const h = createHarness({ stateful })

        h.transport.log.push(inbound('alice', 'are we on?'))
        await h.poller.tick()
        h.transport.log.push(inbound('alice', 'bring snacks'))
        await h.poller.tick()
        await h.coordinator.handleDecision({ recordId: '1', decision: { type: 'edit', text: 'Yes, 7 instead' } })

        h.transport.log.push(inbound('alice', 'ok?'))
        await h.poller.tick()
        await h.coordinator.handleDecision({ recordId: '2', decision: { type: 'reject' } })

        expect(stateful.continueSession.mock.calls.map(call => call[1])).toEqual(['are we on?', 'ok?'])
        expect(stateful.appendMessage.mock.calls.map(call => [call[0], call[1]])).toEqual([
            ['thread-1', 'bring snacks'],
            ['thread-1', '[Note: your suggested reply was not sent. This was sent instead: "Yes, 7 instead"]'],
            ['thread-1', '[Note: your suggested reply was not sent.]'],
        ])
        expect(h.transport.sent).toEqual([{ conversationId: 'alice', text: 'Yes, 7 instead' }])
        expect(h.backend.complete).not.toHaveBeenCalled()
    })

    it('leaves the session alone when the draft went out unchanged', async () => {
        const stateful = assistant()
        const h = createHarness({ stateful })

        h.transport.log.push(inbound('alice', 'are we on?'))
        await h.poller.tick()
        await h.coordinator.handleDecision({ recordId: '1', decision: { type: 'approve' } })

        expect(h.transport.sent).toEqual([{ conversationId: 'alice', text: 'See you at 6' }])
        expect(stateful.appendMessage).not.toHaveBeenCalled()
    })
})

describe('concurrent ingestion and decisions', () => {
    it('keeps at most one open approval when a tick races an operator decision', async () => {
        const h = createHarness()
        h.transport.log.push(inbound('alice', 'dinner?'))
        await h.poller.tick()

        const realCreate = h.store.createApproval.bind(h.store)
        const openAfterCreate: number[] = []
        vi.spyOn(h.store, 'createApproval').mockImplementation(async input => {
            const created = await realCreate(input)
            openAfterCreate.push(openFor(h, input.conversationId).length)
            return created
        })
        h.transport.log.push(inbound('alice', 'or lunch?'), inbound('alice', 'either works'))

        const [summary, ack] = await Promise.all([
            h.poller.tick(),
            h.coordinator.handleDecision({ recordId: '1', decision: { type: 'approve' } }),
        ])

        expect(ack).toEqual({ status: 'applied', message: 'sent to alice', state: 'Sent' })
        expect(summary.failed).toBe(0)
        expect(summary.handled).toBe(2)
        expect(openAfterCreate.every(n => n === 1)).toBe(true)
        expect(openFor(h, 'alice').length).toBeLessThanOrEqual(1)
        expect(h.transport.sent).toEqual([{ conversationId: 'alice', text: 'Sure, see you at 6' }])
    })

    it('handles each message once when two ticks overlap', async () => {
        const h = createHarness()
        const a1 = inbound('alice', 'one')
        const a2 = inbound('alice', 'two')
        h.transport.log.push(a1, a2)

        const [first, second] = await Promise.all([h.poller.tick(), h.poller.tick()])

        expect(first.handled + second.handled).toBe(4)
        expect((first.outcomes.skipped ?? 0) + (second.outcomes.skipped ?? 0)).toBe(2)
        expect(h.backend.complete).toHaveBeenCalledTimes(1)
        expect(h.store.recordsFor('alice')).toHaveLength(1)
        expect(h.store.processed.get(a1.messageId)).toBe('drafted')
        expect(h.store.processed.get(a2.messageId)).toBe('merged')
    })
})

describe('late and failing decisions', () => {
    it('expires an approval tapped after its TTL even before the sweep runs', async () => {
        const h = createHarness({ ttlMs: 60_000 })
        h.transport.log.push(inbound('alice', 'anyone?'))
        await h.poller.tick()

        h.advance(120_000)
        const ack = await h.coordinator.handleDecision({ recordId: '1', decision: { type: 'edit', text: 'sorry, just saw this' } })

        expect(ack).toEqual({ status: 'invalid', message: 'approval 1 expired', state: 'Expired' })
        expect(h.store.approvals.get('1')?.state).toBe('Expired')
        expect(h.transport.sent).toEqual([])
        expect(h.audit.rows.map(r => r.status)).toEqual(['Expired'])
    })

    it('answers a store failure during lookup instead of throwing', async () => {
        vi.spyOn(console, 'error').mockImplementation(() => {})
        const h = createHarness()
        vi.spyOn(h.store, 'getApproval').mockRejectedValue(new Error('Connection terminated unexpectedly'))

        await expect(h.coordinator.handleDecision({ recordId: '1', decision: { type: 'approve' } })).resolves.toEqual({
            status: 'failed',
            message: 'could not apply decision, try again',
        })
        await expect(h.coordinator.resend('1')).resolves.toEqual({ status: 'failed', message: 'could not resend, try again' })
    })
})

describe('operator flows over Telegram', () => {
    function wire(h: ReturnType<typeof createHarness>) {
        const updates = {
            operatorChatId: '42',
            answerCallback: vi.fn(async (_id: string, _text?: string) => {}),
            notify: vi.fn(async (_text: string) => {}),
        }
        const commands = new OperatorCommands({ store: h.store, coordinator: h.coordinator, now: () => h.clock.current })
        const router = new TelegramUpdateRouter({ channel: updates, coordinator: h.coordinator, commands })
        return { updates, router }
    }

    it('sends the operator-edited text', async () => {
        const h = createHarness()
        const { updates, router } = wire(h)
        h.transport.log.push(inbound('alice', 'when do you land?'))
        await h.poller.tick()

        await router.handleUpdate({
            update_id: 1,
            callback_query: { id: 'cb-1', data: 'edit:1', message: { message_id: 100, chat: { id: 42 } } },
        })
        expect(router.pendingInput).toEqual({ kind: 'edit', recordId: '1' })

        await router.handleUpdate({ update_id: 2, message: { message_id: 7, chat: { id: 42 }, text: 'Landing at 9, call you after' } })

        expect(router.pendingInput).toBeNull()
        expect(h.transport.sent).toEqual([{ conversationId: 'alice', text: 'Landing at 9, call you after' }])
        expect(h.audit.rows[0]).toMatchObject({
            status: 'Sent',
            draftText: 'Sure, see you at 6',
            finalText: 'Landing at 9, call you after',
        })
        expect(updates.notify).toHaveBeenLastCalledWith('#1: ✅ Sent')
    })

    it('records a voice reply through transcription', async () => {
        const resolveVoice = vi.fn(async (_ref: string) => 'be there in five')
        const h = createHarness({ resolveVoice })
        const { router } = wire(h)
        h.transport.log.push(inbound('alice', 'where are you?'))
        await h.poller.tick()

        await router.handleUpdate({
            update_id: 1,
            callback_query: { id: 'cb-1', data: 'voice:1', message: { message_id: 100, chat: { id: 42 } } },
        })
        await router.handleUpdate({ update_id: 2, message: { message_id: 8, chat: { id: 42 }, voice: { file_id: 'voice-file-1' } } })

        expect(resolveVoice).toHaveBeenCalledWith('voice-file-1')
        expect(h.transport.sent).toEqual([{ conversationId: 'alice', text: 'be there in five' }])
        expect(h.store.approvals.get('1')?.state).toBe('Sent')
    })

    it('ignores updates from other chats', async () => {
        const h = createHarness()
        const { updates, router } = wire(h)
        h.transport.log.push(inbound('alice', 'hi'))
        await h.poller.tick()

        await router.handleUpdate({
            update_id: 1,
            callback_query: { id: 'cb-9', data: 'approve:1', message: { message_id: 100, chat: { id: 99 } } },
        })
        await router.handleUpdate({ update_id: 2, message: { message_id: 3, chat: { id: 99 }, text: '/pending' } })

        expect(h.store.approvals.get('1')?.state).toBe('Pending')
        expect(updates.notify).not.toHaveBeenCalled()
        expect(h.transport.sent).toEqual([])
    })
})
