/**
 * Draft Generator
 *
 * Produces a DraftReply for one inbound message under a hard deadline.
 * In stateful mode the conversation's backend session is used first and a
 * failure falls back to the stateless backend within the same deadline.
 * Failures are returned, never thrown: the caller still opens an approval
 * with an empty draft so the operator can answer by hand.
 *
 * A stateful session only sees what is posted to it, so merged follow-ups
 * and the fate of each draft are posted as notes once they are known.
 */

import { toRelayError, TransientIOError, type RelayError } from '../errors.js'
import { errorStatus } from '../utils/retry.js'
import { safeError } from '../utils/safe-log.js'
import { withTimeout } from '../utils/timeout.js'
import type { ApprovalRecord, ConversationContext, DraftReply, InboundMessage } from '../types/relay.js'
import { buildPrompt } from './prompt.js'
import type { DraftSessionRegistry } from './session-registry.js'
import type { StatefulDraftBackend, StatelessDraftBackend } from './types.js'

export type DraftResult =
    | { ok: true; draft: DraftReply; backend: string }
    | { ok: false; error: RelayError }

type StatefulSetup = { backend: StatefulDraftBackend; sessions: DraftSessionRegistry }

/** What a stateful session should be told once an approval settles, if anything. */
export function outcomeNote(record: ApprovalRecord): string | null {
    const hadDraft = record.draftText.trim() !== ''
    switch (record.state) {
        case 'Sent':
            if (!record.finalText || record.finalText === record.draftText) return null
            return hadDraft
                ? `[Note: your suggested reply was not sent. This was sent instead: "${record.finalText}"]`
                : `[Note: this reply was sent: "${record.finalText}"]`
        case 'Rejected':
        case 'Expired':
            return hadDraft ? '[Note: your suggested reply was not sent.]' : null
        default:
            return null
    }
}

export interface DraftGeneratorOptions {
    stateless: StatelessDraftBackend
    stateful?: StatefulSetup
    systemPrompt: string
    maxHistory: number
    timeoutMs: number
    now?: () => Date
}

export class DraftGenerator {
    private readonly now: () => Date

    constructor(private readonly opts: DraftGeneratorOptions) {
        this.now = opts.now ?? (() => new Date())
    }

    get mode(): 'stateless' | 'stateful' {
        return this.opts.stateful ? 'stateful' : 'stateless'
    }

    async generate(context: ConversationContext, message: InboundMessage): Promise<DraftResult> {
        try {
            const { text, backend } = await withTimeout(
                signal => this.produce(context, message, signal),
                this.opts.timeoutMs,
                `draft for ${message.conversationId}`
            )
            if (!text) {
                return { ok: false, error: new TransientIOError(`${backend} returned an empty draft`) }
            }
            return {
                ok: true,
                backend,
                draft: {
                    conversationId: message.conversationId,
                    sourceMessageId: message.messageId,
                    text,
                    generatedAt: this.now(),
                },
            }
        } catch (err) {
            return { ok: false, error: toRelayError(err) }
        }
    }

    private async produce(
        context: ConversationContext,
        message: InboundMessage,
        signal: AbortSignal
    ): Promise<{ text: string; backend: string }> {
        const stateful = this.opts.stateful
        if (stateful) {
            let handle: string | undefined
            try {
                handle = await stateful.sessions.resolve(message.conversationId, signal)
                const text = await stateful.backend.continueSession(handle, message.body, signal)
                if (text) return { text, backend: stateful.backend.name }
                console.warn(`[Drafts] ${stateful.backend.name} returned nothing, falling back`)
            } catch (err) {
                if (signal.aborted) throw err
                console.warn(`[Drafts] ${stateful.backend.name} failed, falling back:`, safeError(err))
                if (handle) await this.forgetIfMissing(stateful, message.conversationId, handle, err)
            }
        }

        const prompt = buildPrompt(this.opts.systemPrompt, context, message, this.opts.maxHistory)
        const text = await this.opts.stateless.complete(prompt, signal)
        return { text, backend: this.opts.stateless.name }
    }

    /** Posts a follow-up that was merged into an open approval. No-op when stateless. */
    async noteInbound(message: InboundMessage): Promise<void> {
        await this.appendToSession(message.conversationId, message.body)
    }

    /** Posts what became of the session's last draft. No-op when stateless. */
    async noteOutcome(record: ApprovalRecord): Promise<void> {
        const note = outcomeNote(record)
        if (note) await this.appendToSession(record.conversationId, note)
    }

    private async appendToSession(conversationId: string, text: string): Promise<void> {
        const stateful = this.opts.stateful
        if (!stateful) return
        try {
            await withTimeout(
                signal => this.postNote(stateful, conversationId, text, signal),
                this.opts.timeoutMs,
                `session note for ${conversationId}`
            )
        } catch (err) {
            console.warn(`[Drafts] Could not update ${stateful.backend.name} session for ${conversationId}:`, safeError(err))
        }
    }

    private async postNote(stateful: StatefulSetup, conversationId: string, text: string, signal: AbortSignal): Promise<void> {
        const handle = await stateful.sessions.resolve(conversationId, signal)
        try {
            await stateful.backend.appendMessage(handle, text, signal)
        } catch (err) {
            await this.forgetIfMissing(stateful, conversationId, handle, err)
            throw err
        }
    }

    private async forgetIfMissing(stateful: StatefulSetup, conversationId: string, handle: string, err: unknown): Promise<void> {
        if (errorStatus(err) !== 404) return
        try {
            await stateful.sessions.forget(conversationId, handle)
        } catch (forgetErr) {
            console.warn(`[Drafts] Could not forget session ${handle}:`, safeError(forgetErr))
        }
    }
}
