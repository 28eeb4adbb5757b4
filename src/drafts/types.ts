/**
 * Draft backend contracts.
 *
 * Stateless backends see the whole bounded prompt on every call. Stateful
 * backends keep their own per-conversation memory behind an opaque session
 * handle and only ever receive the newest text.
 */

export interface ChatMessage {
    role: 'system' | 'user' | 'assistant'
    content: string
}

export interface StatelessDraftBackend {
    readonly name: string
    complete(messages: ChatMessage[], signal?: AbortSignal): Promise<string>
}

export interface StatefulDraftBackend {
    readonly name: string
    createSession(signal?: AbortSignal): Promise<string>
    continueSession(handle: string, text: string, signal?: AbortSignal): Promise<string>
    /** Adds user-side text to the session without asking for a reply. */
    appendMessage(handle: string, text: string, signal?: AbortSignal): Promise<void>
}

export interface SpeechTranscriber {
    transcribeFile(path: string): Promise<string>
    transcribeBuffer(audio: Buffer, filename: string): Promise<string>
}
