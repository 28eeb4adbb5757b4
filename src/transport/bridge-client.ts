/**
 * WhatsApp bridge REST client.
 *
 * POST {baseUrl}/send      { recipient, message }      -> { success, message }
 * POST {baseUrl}/download  { message_id, chat_jid }    -> { success, path }
 */

import { PermanentRecipientError, TransientIOError } from '../errors.js'
import { BridgeDownloadResponseSchema, BridgeSendResponseSchema } from '../types/schemas.js'
import type { TransportSender } from './types.js'

const PERMANENT_PATTERN = /invalid (jid|recipient)|not (found|registered|on whatsapp)|unknown recipient/i

export interface BridgeClientOptions {
  baseUrl: string
  timeoutMs: number
  fetchImpl?: typeof fetch
}

export class BridgeClient implements TransportSender {
  private readonly fetchImpl: typeof fetch

  constructor(private readonly opts: BridgeClientOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch
  }

  async send(conversationId: string, text: string, signal?: AbortSignal): Promise<void> {
    const res = await this.post('/send', { recipient: conversationId, message: text }, signal)
    const body = BridgeSendResponseSchema.safeParse(await res.json().catch(() => null))
    const detail = body.success ? body.data.message ?? '' : `HTTP ${res.status}`

    if (res.ok && body.success && body.data.success) return

    if (res.status === 400 || res.status === 404 || PERMANENT_PATTERN.test(detail)) {
      throw new PermanentRecipientError(conversationId, detail || `HTTP ${res.status}`)
    }
    throw new TransientIOError(`bridge send failed: ${detail || `HTTP ${res.status}`}`)
  }

  /** Asks the bridge to download a media message; returns its local path. */
  async download(messageId: string, conversationId: string): Promise<string> {
    const res = await this.post('/download', { message_id: messageId, chat_jid: conversationId })
    const body = BridgeDownloadResponseSchema.safeParse(await res.json().catch(() => null))
    if (!res.ok || !body.success || !body.data.success || !body.data.path) {
      const detail = body.success ? body.data.message : undefined
      throw new TransientIOError(`bridge download failed for ${messageId}: ${detail ?? `HTTP ${res.status}`}`)
    }
    return body.data.path
  }

  private async post(path: string, payload: object, signal?: AbortSignal): Promise<Response> {
    const timeout = AbortSignal.timeout(this.opts.timeoutMs)
    try {
      return await this.fetchImpl(`${this.opts.baseUrl}${path}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal: signal ? anySignal([signal, timeout]) : timeout,
      })
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err)
      throw new TransientIOError(`bridge ${path} unreachable: ${reason}`, { cause: err })
    }
  }
}

function anySignal(signals: AbortSignal[]): AbortSignal {
  const controller = new AbortController()
  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort(signal.reason)
      break
    }
    signal.addEventListener('abort', () => controller.abort(signal.reason), { once: true })
  }
  return controller.signal
}
