/**
 * getUpdates long-poll loop for deployments without a public webhook URL.
 */

import type { TelegramUpdate } from '../types/schemas.js'
import { delay } from '../utils/retry.js'
import { safeError } from '../utils/safe-log.js'
import type { TelegramUpdateRouter } from './telegram-updates.js'

export interface UpdateSource {
  getUpdates(offset: number, timeoutSec: number, signal?: AbortSignal): Promise<TelegramUpdate[]>
}

export class TelegramLongPoll {
  private controller: AbortController | null = null
  private loop: Promise<void> | null = null
  private offset = 0

  constructor(
    private readonly source: UpdateSource,
    private readonly router: Pick<TelegramUpdateRouter, 'handleUpdate'>,
    private readonly timeoutSec = 25,
    private readonly backoffMs = 5000
  ) {}

  start(): void {
    if (this.loop) return
    this.controller = new AbortController()
    this.loop = this.run(this.controller.signal)
    console.log('[Telegram] Long-polling for updates')
  }

  async stop(): Promise<void> {
    this.controller?.abort()
    await this.loop
    this.loop = null
  }

  /** One getUpdates round; returns how many updates were routed. */
  async pollOnce(signal?: AbortSignal): Promise<number> {
    const updates = await this.source.getUpdates(this.offset, this.timeoutSec, signal)
    for (const update of updates) {
      this.offset = Math.max(this.offset, update.update_id + 1)
      try {
        await this.router.handleUpdate(update)
      } catch (err) {
        console.error(`[Telegram] Update ${update.update_id} failed:`, safeError(err))
      }
    }
    return updates.length
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.pollOnce(signal)
      } catch (err) {
        if (signal.aborted) break
        console.warn('[Telegram] getUpdates failed, backing off:', safeError(err))
        await delay(this.backoffMs, signal)
      }
    }
  }
}
