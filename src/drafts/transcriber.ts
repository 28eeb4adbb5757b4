/**
 * Voice transcription through Groq Whisper.
 *
 * Used for inbound voice notes (file downloaded by the bridge) and for the
 * operator's own recorded replies (bytes fetched from Telegram).
 */

import { createReadStream } from 'node:fs'
import Groq, { toFile } from 'groq-sdk'
import { withRetry } from '../utils/retry.js'
import type { SpeechTranscriber } from './types.js'

export interface TranscriberOptions {
    apiKey: string
    model: string
    language?: string
}

export class GroqTranscriber implements SpeechTranscriber {
    private readonly client: Groq

    constructor(private readonly opts: TranscriberOptions, client?: Groq) {
        this.client = client ?? new Groq({ apiKey: opts.apiKey, maxRetries: 0 })
    }

    async transcribeFile(path: string): Promise<string> {
        const result = await withRetry(
            () => this.client.audio.transcriptions.create({
                file: createReadStream(path),
                model: this.opts.model,
                language: this.opts.language,
            }),
            'whisper-file'
        )
        return result.text.trim()
    }

    async transcribeBuffer(audio: Buffer, filename: string): Promise<string> {
        const result = await withRetry(
            async () => this.client.audio.transcriptions.create({
                file: await toFile(audio, filename),
                model: this.opts.model,
                language: this.opts.language,
            }),
            'whisper-buffer'
        )
        return result.text.trim()
    }
}
