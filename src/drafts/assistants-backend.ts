/**
 * OpenAI Assistants backend (stateful).
 *
 * One thread per conversation; the thread is the backend's memory, so each
 * call only appends the newest inbound text and runs the assistant on it.
 */

import OpenAI from 'openai'
import { TransientIOError } from '../errors.js'
import type { StatefulDraftBackend } from './types.js'

export interface AssistantsBackendOptions {
    apiKey: string
    assistantId: string
    pollIntervalMs?: number
}

export class AssistantsDraftBackend implements StatefulDraftBackend {
    readonly name = 'openai:assistants'
    private readonly client: OpenAI

    constructor(private readonly opts: AssistantsBackendOptions, client?: OpenAI) {
        this.client = client ?? new OpenAI({ apiKey: opts.apiKey })
    }

    async createSession(signal?: AbortSignal): Promise<string> {
        const thread = await this.client.beta.threads.create({}, { signal })
        return thread.id
    }

    async appendMessage(handle: string, text: string, signal?: AbortSignal): Promise<void> {
        await this.client.beta.threads.messages.create(handle, { role: 'user', content: text }, { signal })
    }

    async continueSession(handle: string, text: string, signal?: AbortSignal): Promise<string> {
        await this.appendMessage(handle, text, signal)

        const run = await this.client.beta.threads.runs.createAndPoll(
            handle,
            { assistant_id: this.opts.assistantId },
            { signal, pollIntervalMs: this.opts.pollIntervalMs ?? 1000 }
        )
        if (run.status !== 'completed') {
            throw new TransientIOError(`assistant run ${run.id} ended as ${run.status}`)
        }

        const page = await this.client.beta.threads.messages.list(
            handle,
            { run_id: run.id, order: 'desc', limit: 5 },
            { signal }
        )
        for (const message of page.data) {
            if (message.role !== 'assistant') continue
            for (const block of message.content) {
                if (block.type === 'text' && block.text.value.trim()) return block.text.value.trim()
            }
        }
        return ''
    }
}
