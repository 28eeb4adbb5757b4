/**
 * Scheduler - periodic housekeeping for the relay
 * Handles: approval TTL sweeps, delivery recovery after a bridge outage
 */

import cron, { type ScheduledTask } from 'node-cron'
import type { ApprovalCoordinator } from './approval/coordinator.js'
import { safeError } from './utils/safe-log.js'

export interface SchedulerDeps {
  coordinator: Pick<ApprovalCoordinator, 'expireStale' | 'recoverInFlight'>
  /** Cron expression for the expiry sweep. Defaults to every minute. */
  expirySchedule?: string
}

// ─── Init ───────────────────────────────────────────────────────────────────

export function initScheduler(deps: SchedulerDeps): ScheduledTask[] {
  const tasks: ScheduledTask[] = []

  // Expire Pending approvals past their TTL
  tasks.push(cron.schedule(deps.expirySchedule ?? '* * * * *', () => runExpirySweep(deps)))

  // Pick up Approved/Edited records a crashed delivery left behind
  tasks.push(cron.schedule('*/15 * * * *', () => runRecovery(deps)))

  console.log('[SCHEDULER] Relay housekeeping initialized')
  return tasks
}

export function stopScheduler(tasks: ScheduledTask[]): void {
  for (const task of tasks) task.stop()
}

// ─── Jobs ───────────────────────────────────────────────────────────────────

export async function runExpirySweep(deps: SchedulerDeps): Promise<number> {
  try {
    return await deps.coordinator.expireStale()
  } catch (err) {
    console.error('[SCHEDULER] Expiry sweep failed:', safeError(err))
    return 0
  }
}

export async function runRecovery(deps: SchedulerDeps): Promise<number> {
  try {
    const resumed = await deps.coordinator.recoverInFlight()
    if (resumed > 0) console.log(`[SCHEDULER] Resumed ${resumed} in-flight deliveries`)
    return resumed
  } catch (err) {
    console.error('[SCHEDULER] Delivery recovery failed:', safeError(err))
    return 0
  }
}
