/**
 * Telegram approval channel.
 *
 * Presents approval cards to the operator chat, edits them once resolved,
 * sends free-form notices, uploads inbound attachments and fetches voice
 * files. Talks to the Bot API over fetch; every response envelope is
 * validated.
 */

import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import { TransientIOError } from '../errors.js'
import {
  TelegramFileSchema,
  TelegramResponseSchema,
  TelegramSentMessageSchema,
  TelegramUpdateSchema,
  type TelegramUpdate,
} from '../types/schemas.js'
import { withRetry } from '../utils/retry.js'
import type { ApprovalCard, InlineButton } from './card.js'

export type MediaKind = 'photo' | 'video' | 'document'

export interface MediaAttachment {
  kind: MediaKind
  filePath: string
  caption: string
}

export interface ApprovalChannel {
  /** Shows the card and returns a reference for later edits. */
  present(card: ApprovalCard): Promise<string>
  notify(text: string, keyboard?: InlineButton[][]): Promise<void>
  resolveCard(cardRef: string, text: string): Promise<void>
  presentMedia(media: MediaAttachment): Promise<void>
}

const MEDIA_METHODS: Record<MediaKind, string> = {
  photo: 'sendPhoto',
  video: 'sendVideo',
  document: 'sendDocument',
}

const MAX_CAPTION_LENGTH = 1024

export class TelegramApiError extends Error {
  constructor(readonly method: string, readonly status: number, description: string) {
    super(`Telegram ${method} failed (${status}): ${description}`)
    this.name = 'TelegramApiError'
  }
}

export interface TelegramChannelOptions {
  token: string
  operatorChatId: string
  apiBase?: string
  fetchImpl?: typeof fetch
}

export class TelegramChannel implements ApprovalChannel {
  private readonly apiBase: string
  private readonly fetchImpl: typeof fetch

  constructor(private readonly opts: TelegramChannelOptions) {
    this.apiBase = opts.apiBase ?? 'https://api.telegram.org'
    this.fetchImpl = opts.fetchImpl ?? fetch
  }

  get operatorChatId(): string {
    return this.opts.operatorChatId
  }

  async present(card: ApprovalCard): Promise<string> {
    const result = await withRetry(
      () => this.call('sendMessage', {
        chat_id: this.opts.operatorChatId,
        text: card.text,
        parse_mode: 'HTML',
        reply_markup: { inline_keyboard: card.keyboard },
      }),
      'telegram-present'
    )
    const sent = TelegramSentMessageSchema.safeParse(result)
    if (!sent.success) throw new TransientIOError('Telegram sendMessage returned no message_id')
    return String(sent.data.message_id)
  }

  async notify(text: string, keyboard?: InlineButton[][]): Promise<void> {
    await withRetry(
      () => this.call('sendMessage', {
        chat_id: this.opts.operatorChatId,
        text,
        parse_mode: 'HTML',
        ...(keyboard ? { reply_markup: { inline_keyboard: keyboard } } : {}),
      }),
      'telegram-notify'
    )
  }

  async resolveCard(cardRef: string, text: string): Promise<void> {
    await this.call('editMessageText', {
      chat_id: this.opts.operatorChatId,
      message_id: Number(cardRef),
      text,
      parse_mode: 'HTML',
    })
  }

  /** Uploads a local file to the operator chat via multipart FormData. */
  async presentMedia(media: MediaAttachment): Promise<void> {
    const data = await readFile(media.filePath)
    const form = new FormData()
    form.append('chat_id', this.opts.operatorChatId)
    form.append(media.kind, new Blob([new Uint8Array(data)]), basename(media.filePath))
    form.append('caption', media.caption.slice(0, MAX_CAPTION_LENGTH))
    form.append('parse_mode', 'HTML')
    await this.call(MEDIA_METHODS[media.kind], form)
  }

  async answerCallback(callbackQueryId: string, text?: string): Promise<void> {
    await this.call('answerCallbackQuery', { callback_query_id: callbackQueryId, ...(text ? { text } : {}) })
  }

  async downloadFile(fileId: string): Promise<Buffer> {
    const file = TelegramFileSchema.safeParse(await this.call('getFile', { file_id: fileId }))
    if (!file.success) throw new TransientIOError(`Telegram getFile returned no path for ${fileId}`)

    const res = await this.fetchImpl(`${this.apiBase}/file/bot${this.opts.token}/${file.data.file_path}`)
    if (!res.ok) throw new TelegramApiError('file', res.status, res.statusText)
    return Buffer.from(await res.arrayBuffer())
  }

  /** Long-polls for updates; used when no public webhook is available. */
  async getUpdates(offset: number, timeoutSec: number, signal?: AbortSignal): Promise<TelegramUpdate[]> {
    const result = await this.call(
      'getUpdates',
      { offset, timeout: timeoutSec, allowed_updates: ['message', 'callback_query'] },
      signal
    )
    if (!Array.isArray(result)) return []
    return result.flatMap(item => {
      const parsed = TelegramUpdateSchema.safeParse(item)
      return parsed.success ? [parsed.data] : []
    })
  }

  private async call(method: string, body: object | FormData, signal?: AbortSignal): Promise<unknown> {
    const res = await this.fetchImpl(`${this.apiBase}/bot${this.opts.token}/${method}`, body instanceof FormData
      ? { method: 'POST', body, signal }
      : { method: 'POST', headers: { 'Content-Type': 'application/json' }, body: JSON.stringify(body), signal })
    const envelope = TelegramResponseSchema.safeParse(await res.json().catch(() => null))
    if (!envelope.success) {
      throw new TelegramApiError(method, res.status, 'unparseable response')
    }
    if (!envelope.data.ok) {
      throw new TelegramApiError(method, envelope.data.error_code ?? res.status, envelope.data.description ?? 'unknown error')
    }
    return envelope.data.result
  }
}
