/**
 * Ingestion Poller
 *
 * Tails the transport log on a fixed interval. Each tick reads one batch
 * after the global cursor, fans out by conversation (conversations run in
 * parallel, messages within one conversation strictly in arrival order),
 * and advances the cursor over the longest prefix of the batch that was
 * fully handled. Anything after a failure is re-read on the next tick; the
 * dedupe ledger keeps already-handled messages from being processed twice.
 * A message that keeps failing is written off as 'failed' after a bounded
 * number of ticks (at once for a data error) so it cannot hold the cursor.
 */

import type { ApprovalCoordinator } from '../approval/coordinator.js'
import type { DraftGenerator } from '../drafts/draft-generator.js'
import type { PolicyFilter } from '../policy/policy-filter.js'
import type { ConversationStore, ProcessingOutcome } from '../store/conversation-store.js'
import type { TransportReader } from '../transport/types.js'
import type { InboundMessage } from '../types/relay.js'
import type { KeyedMutex } from '../utils/keyed-mutex.js'
import { preview, safeError } from '../utils/safe-log.js'
import { withTimeout } from '../utils/timeout.js'

/** Resolves the text of a voice note, or null when it has none. */
export type VoiceResolver = (messageId: string, conversationId: string, signal?: AbortSignal) => Promise<string | null>

const DEFAULT_MAX_ATTEMPTS = 3
const DEFAULT_VOICE_TIMEOUT_MS = 45_000

export interface PollerDeps {
  reader: TransportReader
  store: ConversationStore
  policy: PolicyFilter
  drafts: DraftGenerator
  coordinator: ApprovalCoordinator
  locks: KeyedMutex
  intervalMs: number
  batchSize: number
  windowSize: number
  /** Ticks a message may fail before it is marked 'failed'. */
  maxAttempts?: number
  resolveVoice?: VoiceResolver
  voiceTimeoutMs?: number
}

export interface TickSummary {
  read: number
  handled: number
  failed: number
  outcomes: Partial<Record<ProcessingOutcome, number>>
}

export class IngestionPoller {
  private timer: NodeJS.Timeout | null = null
  private running: Promise<void> | null = null
  private stopped = true
  private readonly failures = new Map<string, number>()

  constructor(private readonly deps: PollerDeps) {}

  start(): void {
    if (!this.stopped) return
    this.stopped = false
    console.log(`[Poller] Started, polling every ${this.deps.intervalMs}ms`)
    this.schedule(0)
  }

  async stop(): Promise<void> {
    this.stopped = true
    if (this.timer) clearTimeout(this.timer)
    this.timer = null
    await this.running
    console.log('[Poller] Stopped')
  }

  private schedule(delayMs: number): void {
    if (this.stopped) return
    this.timer = setTimeout(() => {
      this.running = this.tick()
        .then(summary => {
          if (summary.read) {
            console.log(`[Poller] Tick: read=${summary.read} handled=${summary.handled} failed=${summary.failed}`)
          }
        })
        .catch(err => console.error('[Poller] Tick failed:', safeError(err)))
        .finally(() => {
          this.running = null
          this.schedule(this.deps.intervalMs)
        })
    }, delayMs)
  }

  /** One read-process-advance cycle. */
  async tick(): Promise<TickSummary> {
    const { reader, store, batchSize } = this.deps
    const summary: TickSummary = { read: 0, handled: 0, failed: 0, outcomes: {} }

    let cursor = await store.getPollCursor()
    if (!cursor) {
      // First run: start at the end of the log instead of replaying history.
      // An empty log starts from the beginning so its first message is not skipped.
      cursor = (await reader.latestCursor()) ?? { timestamp: '', messageId: '' }
      await store.setPollCursor(cursor)
      console.log(`[Poller] Cursor initialised at ${cursor.timestamp || 'start of log'}`)
    }

    let batch: InboundMessage[]
    try {
      batch = await reader.readSince(cursor, batchSize)
    } catch (err) {
      console.warn('[Poller] Transport read failed, retrying next tick:', safeError(err))
      return summary
    }
    summary.read = batch.length
    if (!batch.length) return summary

    const byConversation = new Map<string, InboundMessage[]>()
    for (const message of batch) {
      const queue = byConversation.get(message.conversationId) ?? []
      queue.push(message)
      byConversation.set(message.conversationId, queue)
    }

    const done = new Set<string>()
    await Promise.all(
      [...byConversation.values()].map(async messages => {
        for (const message of messages) {
          let outcome: ProcessingOutcome
          try {
            outcome = await this.deps.locks.run(message.conversationId, () => this.ingest(message))
            this.failures.delete(message.messageId)
          } catch (err) {
            const attempts = (this.failures.get(message.messageId) ?? 0) + 1
            console.error(
              `[Poller] Failed to ingest ${message.messageId} from ${message.conversationId} (attempt ${attempts}):`,
              safeError(err)
            )
            const permanent = isDataError(err) || attempts >= (this.deps.maxAttempts ?? DEFAULT_MAX_ATTEMPTS)
            if (!permanent || !(await this.giveUp(message, attempts))) {
              this.failures.set(message.messageId, attempts)
              summary.failed += 1
              // Keep per-conversation order: later messages wait for the retry.
              return
            }
            this.failures.delete(message.messageId)
            outcome = 'failed'
          }
          summary.outcomes[outcome] = (summary.outcomes[outcome] ?? 0) + 1
          summary.handled += 1
          done.add(message.messageId)
        }
      })
    )

    let advanceTo: InboundMessage | null = null
    for (const message of batch) {
      if (!done.has(message.messageId)) break
      advanceTo = message
    }
    if (advanceTo) {
      await store.setPollCursor({ timestamp: advanceTo.cursorTimestamp, messageId: advanceTo.messageId })
    }
    return summary
  }

  /** Handles one message. Runs under the conversation lock. */
  private async ingest(raw: InboundMessage): Promise<ProcessingOutcome> {
    const { store, policy, drafts, coordinator, windowSize } = this.deps

    if (await store.isMessageProcessed(raw.messageId)) return 'skipped'

    const rejection = await policy.screen(raw.conversationId)
    if (rejection) {
      console.log(`[Poller] ${rejection.message}, dropping ${raw.messageId}`)
      await store.markMessageProcessed(raw, 'filtered')
      return 'filtered'
    }

    const message = await this.withVoiceText(raw)

    const context = await store.appendToWindow(
      message.conversationId,
      { role: 'user', text: message.body, messageId: message.messageId, at: message.receivedAt.toISOString() },
      { maxEntries: windowSize, displayName: message.senderName }
    )

    const open = await coordinator.openRecordFor(message.conversationId)
    if (open) {
      console.log(`[Poller] ${message.conversationId} has open approval ${open.id}, merged ${message.messageId} into context`)
      if (open.sourceMessageId !== message.messageId) {
        await coordinator.noteFollowUp(open, message)
        await drafts.noteInbound(message)
      }
      await store.markMessageProcessed(message, 'merged')
      return 'merged'
    }

    const draft = await drafts.generate(context, message)
    if (!draft.ok) {
      console.warn(`[Poller] Draft failed for ${message.messageId} (${draft.error.kind}): ${draft.error.message}`)
    } else {
      console.log(`[Poller] Drafted reply for "${preview(message.body)}" via ${draft.backend}`)
    }

    await coordinator.openApproval(message, draft)
    const outcome: ProcessingOutcome = draft.ok ? 'drafted' : 'draft_failed'
    await store.markMessageProcessed(message, outcome)
    return outcome
  }

  /** Swaps a voice note's placeholder body for its transcript; the placeholder stays on failure. */
  private async withVoiceText(message: InboundMessage): Promise<InboundMessage> {
    const { resolveVoice, voiceTimeoutMs } = this.deps
    if (message.mediaType !== 'audio' || !resolveVoice) return message
    try {
      const text = await withTimeout(
        signal => resolveVoice(message.messageId, message.conversationId, signal),
        voiceTimeoutMs ?? DEFAULT_VOICE_TIMEOUT_MS,
        `voice note ${message.messageId}`
      )
      return text?.trim() ? { ...message, body: `🎤 ${text.trim()}` } : message
    } catch (err) {
      console.warn(`[Poller] Voice transcription failed for ${message.messageId}:`, safeError(err))
      return message
    }
  }

  /** Writes a message off so the cursor and its conversation can move on. */
  private async giveUp(message: InboundMessage, attempts: number): Promise<boolean> {
    try {
      await this.deps.locks.run(message.conversationId, () => this.deps.store.markMessageProcessed(message, 'failed'))
    } catch (err) {
      console.error(`[Poller] Could not mark ${message.messageId} failed:`, safeError(err))
      return false
    }
    console.error(`[Poller] Gave up on ${message.messageId} from ${message.conversationId} after ${attempts} attempt(s)`)
    await this.deps.coordinator.noteUnprocessable(message)
    return true
  }
}

/** Postgres data exceptions (SQLSTATE class 22) fail the same way on every retry. */
function isDataError(err: unknown): boolean {
  if (!(err instanceof Error)) return false
  const code = Reflect.get(err, 'code')
  return typeof code === 'string' && code.startsWith('22')
}
