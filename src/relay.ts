/**
 * Relay wiring: builds every component from the validated configuration.
 * Nothing here starts timers or opens sockets; index.ts does that.
 */

import type { RelayConfig } from './config.js'
import { ApprovalCoordinator } from './approval/coordinator.js'
import { TelegramChannel } from './approval/telegram-channel.js'
import { TelegramLongPoll } from './approval/telegram-long-poll.js'
import { TelegramUpdateRouter } from './approval/telegram-updates.js'
import { ConsoleAuditSink, type AuditSink } from './audit/audit-sink.js'
import { SheetsAuditSink } from './audit/sheets-sink.js'
import { DeliveryExecutor } from './delivery/delivery-executor.js'
import { AssistantsDraftBackend } from './drafts/assistants-backend.js'
import { DraftGenerator, type DraftGeneratorOptions } from './drafts/draft-generator.js'
import { GroqDraftBackend } from './drafts/groq-backend.js'
import { DraftSessionRegistry } from './drafts/session-registry.js'
import { GroqTranscriber } from './drafts/transcriber.js'
import { IngestionPoller } from './ingestion/poller.js'
import { OperatorCommands } from './operator/commands.js'
import { PolicyFilter } from './policy/policy-filter.js'
import { PgConversationStore } from './store/conversation-store.js'
import { BridgeClient } from './transport/bridge-client.js'
import { BridgeLogReader } from './transport/bridge-log.js'
import { KeyedMutex } from './utils/keyed-mutex.js'

export interface Relay {
  store: PgConversationStore
  coordinator: ApprovalCoordinator
  poller: IngestionPoller
  router: TelegramUpdateRouter
  channel: TelegramChannel
  reader: BridgeLogReader
  longPoll: TelegramLongPoll | null
  sheets: SheetsAuditSink | null
  locks: KeyedMutex
}

export function createRelay(config: RelayConfig): Relay {
  const store = new PgConversationStore()
  const locks = new KeyedMutex()
  const policy = new PolicyFilter(store)

  const channel = new TelegramChannel({
    token: config.TELEGRAM_BOT_TOKEN,
    operatorChatId: config.TELEGRAM_OPERATOR_CHAT_ID,
  })
  const bridge = new BridgeClient({ baseUrl: config.BRIDGE_API_URL, timeoutMs: config.SEND_TIMEOUT_MS })
  const transcriber = new GroqTranscriber({
    apiKey: config.GROQ_API_KEY,
    model: config.WHISPER_MODEL,
    language: config.WHISPER_LANGUAGE,
  })

  const reader = new BridgeLogReader(config.BRIDGE_DB_PATH)

  const sheets = config.GOOGLE_SHEETS_CREDENTIALS_FILE && config.GOOGLE_SHEET_ID
    ? new SheetsAuditSink({
      credentialsFile: config.GOOGLE_SHEETS_CREDENTIALS_FILE,
      spreadsheetId: config.GOOGLE_SHEET_ID,
      sheetName: config.SHEET_NAME,
    })
    : null
  const audit: AuditSink = sheets ?? new ConsoleAuditSink()

  const stateless = new GroqDraftBackend({ apiKey: config.GROQ_API_KEY, model: config.GROQ_MODEL })
  let stateful: DraftGeneratorOptions['stateful']
  if (config.DRAFT_MODE === 'stateful' && config.OPENAI_API_KEY && config.OPENAI_ASSISTANT_ID) {
    const backend = new AssistantsDraftBackend({ apiKey: config.OPENAI_API_KEY, assistantId: config.OPENAI_ASSISTANT_ID })
    stateful = { backend, sessions: new DraftSessionRegistry(backend, store) }
  }
  const drafts = new DraftGenerator({
    stateless,
    stateful,
    systemPrompt: config.AI_SYSTEM_PROMPT,
    maxHistory: config.MAX_CONVERSATION_HISTORY,
    timeoutMs: config.DRAFT_TIMEOUT_MS,
  })

  // The window keeps a little more than the prompt uses so follow-ups are not lost.
  const windowSize = config.MAX_CONVERSATION_HISTORY * 2

  const delivery = new DeliveryExecutor({
    store,
    transport: bridge,
    audit,
    policy: {
      maxAttempts: config.DELIVERY_MAX_ATTEMPTS,
      baseDelayMs: config.DELIVERY_BASE_DELAY_MS,
      maxDelayMs: config.DELIVERY_MAX_DELAY_MS,
      sendTimeoutMs: config.SEND_TIMEOUT_MS,
      windowSize,
    },
  })

  const coordinator = new ApprovalCoordinator({
    store,
    channel,
    delivery,
    policy,
    audit,
    locks,
    ttlMs: config.APPROVAL_TTL_MINUTES * 60_000,
    resolveVoice: async fileId => transcriber.transcribeBuffer(await channel.downloadFile(fileId), 'reply.ogg'),
    fetchMedia: (messageId, conversationId) => bridge.download(messageId, conversationId),
    drafts,
  })

  const poller = new IngestionPoller({
    reader,
    store,
    policy,
    drafts,
    coordinator,
    locks,
    intervalMs: config.POLL_INTERVAL_MS,
    batchSize: config.POLL_BATCH_SIZE,
    windowSize,
    maxAttempts: config.INGEST_MAX_ATTEMPTS,
    resolveVoice: async (messageId, conversationId) =>
      transcriber.transcribeFile(await bridge.download(messageId, conversationId)),
    voiceTimeoutMs: config.VOICE_TIMEOUT_MS,
  })

  const commands = new OperatorCommands({ store, coordinator })
  const router = new TelegramUpdateRouter({ channel, coordinator, commands })
  const longPoll = config.TELEGRAM_UPDATE_MODE === 'polling' ? new TelegramLongPoll(channel, router) : null

  return { store, coordinator, poller, router, channel, reader, longPoll, sheets, locks }
}
