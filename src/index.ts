/**
 * Relay Desk - Main Server
 * Tails the WhatsApp bridge, drafts replies and waits for operator approval on Telegram
 */

import 'dotenv/config'
import Fastify from 'fastify'
import { createHash, timingSafeEqual } from 'node:crypto'
import { loadConfig } from './config.js'
import { createRelay } from './relay.js'
import { initScheduler, stopScheduler } from './scheduler.js'
import { closeDatabase, initDatabase, runMigrations } from './store/database.js'
import { safeError } from './utils/safe-log.js'

const config = loadConfig()
const server = Fastify({ logger: true })

initDatabase(config.DATABASE_URL)
const relay = createRelay(config)

server.get('/health', async () => ({
  status: 'ok',
  service: 'relay-desk',
  draftMode: config.DRAFT_MODE,
  updates: config.TELEGRAM_UPDATE_MODE,
  pendingInput: relay.router.pendingInput?.kind ?? null,
  busyConversations: relay.locks.size,
}))

// ============================================
// Telegram Webhook
// ============================================

function secretMatches(expected: string, header: string | string[] | undefined): boolean {
  const incomingToken = Array.isArray(header) ? header[0] : (header || '')
  const expectedDigest = createHash('sha256').update(expected).digest()
  const actualDigest = createHash('sha256').update(incomingToken).digest()
  return timingSafeEqual(expectedDigest, actualDigest)
}

server.post('/webhook/telegram', async (request, reply) => {
  // Verify webhook secret token (set via Telegram setWebhook API)
  const webhookSecret = config.TELEGRAM_WEBHOOK_SECRET
  if (webhookSecret && !secretMatches(webhookSecret, request.headers['x-telegram-bot-api-secret-token'])) {
    server.log.warn('Telegram webhook: invalid secret token')
    return reply.code(403).send({ ok: false, error: 'Forbidden' })
  }

  // Answer Telegram right away; delivery can take longer than its webhook timeout
  relay.router.handleUpdate(request.body).catch(err => {
    server.log.error(safeError(err), 'Failed to handle Telegram update')
  })
  return { ok: true }
})

// ============================================
// Startup
// ============================================

let schedulerTasks: ReturnType<typeof initScheduler> = []

const start = async () => {
  try {
    await runMigrations()

    if (relay.sheets) {
      await relay.sheets.ensureHeaders().catch(err => {
        server.log.warn(safeError(err), 'Google Sheets audit headers could not be written')
      })
    }

    const resumed = await relay.coordinator.recoverInFlight()
    if (resumed > 0) server.log.info(`Resumed ${resumed} interrupted deliveries`)

    relay.poller.start()
    relay.longPoll?.start()
    schedulerTasks = initScheduler({ coordinator: relay.coordinator })

    await server.listen({ port: config.PORT, host: '0.0.0.0' })
    server.log.info(`Relay ready on port ${config.PORT} | drafts: ${config.DRAFT_MODE} | updates: ${config.TELEGRAM_UPDATE_MODE}`)
  } catch (err) {
    server.log.error(err)
    process.exit(1)
  }
}

const shutdown = async () => {
  stopScheduler(schedulerTasks)
  await relay.longPoll?.stop()
  await relay.poller.stop()
  await server.close()
  relay.reader.close()
  await closeDatabase()
  process.exit(0)
}

process.on('SIGTERM', shutdown)
process.on('SIGINT', shutdown)

start()
