/**
 * Zod Validation Schemas
 *
 * Runtime validation for everything the relay reads from outside its own
 * process: JSONB columns, Telegram updates, bridge responses, callback data.
 * Callers use `.safeParse()` and treat failure as a malformed input instead
 * of trusting the shape.
 *
 * Usage:
 *   const result = TelegramUpdateSchema.safeParse(request.body)
 *   if (!result.success) return  // malformed, log and drop
 *   handle(result.data)          // type-safe
 */

import { z } from 'zod'
import { SUBSCRIPTION_TAGS } from './relay.js'

// ═══════════════════════════════════════════════════════════════════════════
// 1. CONVERSATION WINDOW: conversations.recent_window JSONB
// ═══════════════════════════════════════════════════════════════════════════

export const WindowEntrySchema = z.object({
    role: z.enum(['user', 'assistant']),
    text: z.string(),
    messageId: z.string().optional(),
    at: z.string(),
})

/** Unknown or corrupt entries are dropped rather than failing the whole window. */
export function parseWindow(raw: unknown): z.infer<typeof WindowEntrySchema>[] {
    if (!Array.isArray(raw)) return []
    return raw.flatMap(item => {
        const result = WindowEntrySchema.safeParse(item)
        return result.success ? [result.data] : []
    })
}

export const SubscriptionTagSchema = z.enum(SUBSCRIPTION_TAGS)

// ═══════════════════════════════════════════════════════════════════════════
// 2. TELEGRAM UPDATES: webhook body / getUpdates result items
// ═══════════════════════════════════════════════════════════════════════════

const TelegramChatSchema = z.object({
    id: z.union([z.number(), z.string()]).transform(String),
})

export const TelegramMessageSchema = z.object({
    message_id: z.number(),
    chat: TelegramChatSchema,
    text: z.string().optional(),
    voice: z.object({ file_id: z.string() }).optional(),
    audio: z.object({ file_id: z.string() }).optional(),
})

export const TelegramCallbackQuerySchema = z.object({
    id: z.string(),
    data: z.string().optional(),
    message: TelegramMessageSchema.optional(),
})

export const TelegramUpdateSchema = z.object({
    update_id: z.number(),
    message: TelegramMessageSchema.optional(),
    callback_query: TelegramCallbackQuerySchema.optional(),
})

export type TelegramMessage = z.infer<typeof TelegramMessageSchema>
export type TelegramCallbackQuery = z.infer<typeof TelegramCallbackQuerySchema>
export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>

/** Envelope of every Bot API response. */
export const TelegramResponseSchema = z.object({
    ok: z.boolean(),
    result: z.unknown().optional(),
    description: z.string().optional(),
    error_code: z.number().optional(),
})

export const TelegramSentMessageSchema = z.object({ message_id: z.number() })
export const TelegramFileSchema = z.object({ file_path: z.string() })

// ═══════════════════════════════════════════════════════════════════════════
// 3. CALLBACK DATA: `<action>:<recordId>` on inline keyboard buttons
// ═══════════════════════════════════════════════════════════════════════════

export const CARD_ACTIONS = ['approve', 'reject', 'edit', 'voice', 'block'] as const
export type CardAction = typeof CARD_ACTIONS[number]

export const CallbackDataSchema = z
    .string()
    .regex(/^[a-z]+:\d{1,18}$/)
    .transform(raw => {
        const [action, recordId] = raw.split(':')
        return { action, recordId }
    })
    .pipe(z.object({ action: z.enum(CARD_ACTIONS), recordId: z.string() }))

// ═══════════════════════════════════════════════════════════════════════════
// 4. BRIDGE: WhatsApp bridge REST responses
// ═══════════════════════════════════════════════════════════════════════════

export const BridgeSendResponseSchema = z.object({
    success: z.boolean(),
    message: z.string().optional(),
})

export const BridgeDownloadResponseSchema = z
    .object({
        success: z.boolean(),
        message: z.string().optional(),
        path: z.string().optional(),
        Path: z.string().optional(),
    })
    .transform(r => ({ success: r.success, message: r.message, path: r.path ?? r.Path }))
