/**
 * Groq chat-completion backend (stateless).
 *
 * Every call carries the full bounded prompt. Transient failures are
 * retried with exponential backoff; the caller owns the overall deadline
 * and cancels through the abort signal.
 */

import Groq from 'groq-sdk'
import { withRetry } from '../utils/retry.js'
import type { ChatMessage, StatelessDraftBackend } from './types.js'

export interface GroqBackendOptions {
    apiKey: string
    model: string
    maxTokens?: number
    temperature?: number
}

export class GroqDraftBackend implements StatelessDraftBackend {
    readonly name: string
    private readonly client: Groq

    constructor(private readonly opts: GroqBackendOptions, client?: Groq) {
        this.name = `groq:${opts.model}`
        // Retries live in withRetry so the SDK must not add its own.
        this.client = client ?? new Groq({ apiKey: opts.apiKey, maxRetries: 0 })
    }

    async complete(messages: ChatMessage[], signal?: AbortSignal): Promise<string> {
        const completion = await withRetry(
            () => this.client.chat.completions.create(
                {
                    model: this.opts.model,
                    messages,
                    max_tokens: this.opts.maxTokens ?? 400,
                    temperature: this.opts.temperature ?? 0.7,
                },
                { signal }
            ),
            'groq-draft'
        )
        return completion.choices[0]?.message?.content?.trim() ?? ''
    }
}
