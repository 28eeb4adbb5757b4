/**
 * Draft session registry.
 *
 * Maps a conversation to its stateful-backend session handle with
 * create-if-absent semantics: concurrent first messages for the same
 * conversation share one in-flight creation, and the persisted mapping
 * keeps a single handle across restarts. A handle the backend no longer
 * knows is forgotten so the next call starts a fresh session.
 */

import type { ConversationStore } from '../store/conversation-store.js'
import type { StatefulDraftBackend } from './types.js'

export class DraftSessionRegistry {
    private readonly inFlight = new Map<string, Promise<string>>()
    private readonly cache = new Map<string, string>()

    constructor(
        private readonly backend: StatefulDraftBackend,
        private readonly store: Pick<ConversationStore, 'getDraftSession' | 'saveDraftSession' | 'deleteDraftSession'>
    ) {}

    resolve(conversationId: string, signal?: AbortSignal): Promise<string> {
        const cached = this.cache.get(conversationId)
        if (cached) return Promise.resolve(cached)

        const pending = this.inFlight.get(conversationId)
        if (pending) return pending

        const creation = this.lookupOrCreate(conversationId, signal).finally(() => {
            this.inFlight.delete(conversationId)
        })
        this.inFlight.set(conversationId, creation)
        return creation
    }

    /** Drops a handle the backend no longer recognises. */
    async forget(conversationId: string, handle: string): Promise<void> {
        if (this.cache.get(conversationId) === handle) this.cache.delete(conversationId)
        await this.store.deleteDraftSession(conversationId, handle)
        console.log(`[Drafts] Forgot session ${handle} for ${conversationId}`)
    }

    private async lookupOrCreate(conversationId: string, signal?: AbortSignal): Promise<string> {
        const stored = await this.store.getDraftSession(conversationId)
        if (stored) {
            this.cache.set(conversationId, stored)
            return stored
        }

        const created = await this.backend.createSession(signal)
        const winner = await this.store.saveDraftSession(conversationId, created)
        if (winner !== created) {
            console.log(`[Drafts] Session for ${conversationId} already existed, using ${winner}`)
        }
        this.cache.set(conversationId, winner)
        return winner
    }
}
