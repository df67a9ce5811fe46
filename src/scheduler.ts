/**
 * Scheduler - housekeeping and cooldown check-ins
 */

import cron, { type ScheduledTask } from 'node-cron'
import type { SafetyService } from './safety/safety-service.js'
import type { Conversation } from './safety/types.js'
import type { SafetyStore } from './store/types.js'
import { safeError } from './utils/safe-log.js'

export const ARCHIVE_AFTER_DAYS = 30
const CHECK_IN_BATCH = 50
const DAY_MS = 24 * 60 * 60 * 1000

export type SendFn = (chatId: string, text: string) => Promise<boolean>

export interface SchedulerDeps {
    store: SafetyStore
    safety: SafetyService
    send: SendFn
}

// ─── Jobs ───────────────────────────────────────────────────────────────────

/** Archive normal-state conversations with no activity for ARCHIVE_AFTER_DAYS. */
export async function archiveIdleConversations(store: SafetyStore, now: Date = new Date()): Promise<number> {
    try {
        const archived = await store.archiveIdle(new Date(now.getTime() - ARCHIVE_AFTER_DAYS * DAY_MS))
        if (archived > 0) console.log('[SCHEDULER] Archived idle conversations', { archived })
        return archived
    } catch (error) {
        console.error('[SCHEDULER] Error archiving idle conversations:', safeError(error))
        return 0
    }
}

/**
 * One fixed check-in per expired cooldown window. A conversation is marked
 * only after Telegram accepted the message, so a failed send is retried on
 * the next run.
 */
export async function sendDueCheckIns(deps: SchedulerDeps, now: Date = new Date()): Promise<number> {
    const { store, safety, send } = deps
    let due: Conversation[]
    try {
        due = await store.findDueCheckIns(now, CHECK_IN_BATCH)
    } catch (error) {
        console.error('[SCHEDULER] Error finding due check-ins:', safeError(error))
        return 0
    }

    let sent = 0
    for (const conversation of due) {
        // Telegram private chats share the user's id
        const delivered = await send(conversation.userId, safety.payload('check_in'))
        if (!delivered) continue
        try {
            await store.markCheckedIn(conversation.userId, now)
            sent++
        } catch (error) {
            console.error('[SCHEDULER] Failed to mark check-in:', { userId: conversation.userId, error: safeError(error) })
        }
    }
    if (due.length > 0) console.log('[SCHEDULER] Cooldown check-ins', { due: due.length, sent })
    return sent
}

// ─── Init ───────────────────────────────────────────────────────────────────

export function initScheduler(deps: SchedulerDeps): ScheduledTask[] {
    const tasks = [
        // Idle archival every hour
        cron.schedule('0 * * * *', () => {
            void archiveIdleConversations(deps.store)
        }),

        // Cooldown check-ins every 10 minutes
        cron.schedule('*/10 * * * *', () => {
            void sendDueCheckIns(deps)
        }),
    ]

    console.log('[SCHEDULER] Housekeeping tasks initialized')
    return tasks
}
