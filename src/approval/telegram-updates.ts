/**
 * Telegram update router.
 *
 * Turns operator activity in the Telegram chat into relay actions:
 * button taps become decisions, typed commands go to OperatorCommands, and
 * the two-step Edit / Record-own flows wait for the operator's next text or
 * voice message. Updates from any chat other than the operator's are
 * ignored.
 */

import { MalformedCallback } from '../errors.js'
import type { OperatorCommands } from '../operator/commands.js'
import {
  CallbackDataSchema,
  TelegramUpdateSchema,
  type TelegramCallbackQuery,
  type TelegramMessage,
} from '../types/schemas.js'
import type { Decision } from '../types/relay.js'
import { safeError } from '../utils/safe-log.js'
import type { ApprovalCoordinator, DecisionAck } from './coordinator.js'

export interface UpdateChannel {
  readonly operatorChatId: string
  answerCallback(callbackQueryId: string, text?: string): Promise<void>
  notify(text: string): Promise<void>
}

type AwaitedInput = { kind: 'edit' | 'voice'; recordId: string }

export interface UpdateRouterDeps {
  channel: UpdateChannel
  coordinator: Pick<ApprovalCoordinator, 'handleDecision'>
  commands: Pick<OperatorCommands, 'execute'>
}

function ackText(ack: DecisionAck): string {
  switch (ack.status) {
    case 'applied':
      return ack.state === 'Sent' ? '✅ Sent' : `Done: ${ack.state ?? 'ok'}`
    case 'duplicate':
      return `Already ${ack.state ?? 'resolved'}`
    case 'unknown_record':
      return 'This card is no longer known'
    default:
      return ack.message
  }
}

export class TelegramUpdateRouter {
  private awaiting: AwaitedInput | null = null

  constructor(private readonly deps: UpdateRouterDeps) {}

  /** What the next operator message will complete, if anything. */
  get pendingInput(): AwaitedInput | null {
    return this.awaiting
  }

  async handleUpdate(body: unknown): Promise<void> {
    const parsed = TelegramUpdateSchema.safeParse(body)
    if (!parsed.success) {
      const err = new MalformedCallback('unparseable Telegram update')
      console.warn(`[Telegram] ${err.message}:`, parsed.error.issues.map(i => i.path.join('.')).join(', '))
      return
    }

    const update = parsed.data
    if (update.callback_query) {
      await this.handleCallback(update.callback_query)
    } else if (update.message) {
      await this.handleMessage(update.message)
    }
  }

  private isOperatorChat(chatId: string | undefined): boolean {
    return chatId === this.deps.channel.operatorChatId
  }

  private async handleCallback(query: TelegramCallbackQuery): Promise<void> {
    const { channel } = this.deps
    if (!this.isOperatorChat(query.message?.chat.id)) {
      console.warn(`[Telegram] Ignoring callback from chat ${query.message?.chat.id ?? '?'}`)
      await channel.answerCallback(query.id).catch(err => console.warn('[Telegram] answerCallbackQuery failed:', safeError(err)))
      return
    }

    const data = CallbackDataSchema.safeParse(query.data ?? '')
    if (!data.success) {
      const err = new MalformedCallback(`malformed callback data "${query.data ?? ''}"`)
      console.warn(`[Telegram] ${err.message}`)
      await channel.answerCallback(query.id, 'Unknown button').catch(e => console.warn('[Telegram] answerCallbackQuery failed:', safeError(e)))
      return
    }

    const { action, recordId } = data.data
    if (action === 'edit' || action === 'voice') {
      this.awaiting = { kind: action, recordId }
      await channel.answerCallback(query.id)
      await channel.notify(
        action === 'edit'
          ? `✍️ Send the reply text for approval #${recordId}. /cancel to abort.`
          : `🎤 Record a voice note with your reply for approval #${recordId}. /cancel to abort.`
      )
      return
    }

    // Acknowledge first; delivery retries can outlast Telegram's callback window.
    await channel.answerCallback(query.id).catch(err => console.warn('[Telegram] answerCallbackQuery failed:', safeError(err)))
    const decision: Decision = action === 'approve'
      ? { type: 'approve' }
      : action === 'reject'
        ? { type: 'reject' }
        : { type: 'block', reason: 'blocked from approval card' }
    await this.decide(recordId, decision)
  }

  private async handleMessage(message: TelegramMessage): Promise<void> {
    if (!this.isOperatorChat(message.chat.id)) return
    const { commands, channel } = this.deps
    const text = message.text?.trim() ?? ''

    if (text === '/cancel') {
      const had = this.awaiting
      this.awaiting = null
      await channel.notify(had ? `Cancelled the pending reply for approval #${had.recordId}.` : 'Nothing to cancel.')
      return
    }

    const awaiting = this.awaiting
    if (awaiting?.kind === 'edit' && text && !text.startsWith('/')) {
      this.awaiting = null
      await this.decide(awaiting.recordId, { type: 'edit', text })
      return
    }

    const voice = message.voice ?? message.audio
    if (awaiting?.kind === 'voice' && voice) {
      this.awaiting = null
      await this.decide(awaiting.recordId, { type: 'record_own', audioRef: voice.file_id })
      return
    }

    if (text.startsWith('/')) {
      await channel.notify(await commands.execute(text))
      return
    }

    if (text || voice) {
      await channel.notify('Tap ✍️ Edit or 🎤 Record own on a card first, or send /start for help.')
    }
  }

  private async decide(recordId: string, decision: Decision): Promise<void> {
    const ack = await this.deps.coordinator.handleDecision({ recordId, decision })
    console.log(`[Telegram] ${decision.type} on #${recordId}: ${ack.status} (${ack.message})`)
    if (decision.type === 'edit' || decision.type === 'record_own' || ack.status === 'duplicate' || ack.status === 'unknown_record') {
      await this.deps.channel.notify(`#${recordId}: ${ackText(ack)}`)
    }
  }
}
