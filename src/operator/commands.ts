/**
 * Operator commands, typed into the operator's Telegram chat.
 *
 *   /start                      status and help
 *   /pending                    open approvals
 *   /blocked                    blacklist
 *   /block <chat> [reason]      blacklist a conversation
 *   /unblock <chat>             lift a blacklist entry
 *   /tag <chat> <tier>          set free | basic | premium
 *   /resend <approvalId>        retry a failed delivery
 *
 * Replies are Telegram HTML.
 */

import type { ApprovalCoordinator } from '../approval/coordinator.js'
import { escapeHtml, formatAge } from '../approval/card.js'
import { TAG_BADGES } from '../policy/policy-filter.js'
import type { ConversationStore } from '../store/conversation-store.js'
import { SubscriptionTagSchema } from '../types/schemas.js'
import { OPEN_APPROVAL_STATES } from '../types/relay.js'
import { preview } from '../utils/safe-log.js'

export interface CommandDeps {
    store: ConversationStore
    coordinator: Pick<ApprovalCoordinator, 'blockConversation' | 'resend'>
    now?: () => Date
}

export interface ParsedCommand {
    name: string
    args: string[]
}

export function parseCommand(text: string): ParsedCommand | null {
    const trimmed = text.trim()
    if (!trimmed.startsWith('/')) return null
    const [head, ...args] = trimmed.split(/\s+/)
    const name = head.slice(1).split('@')[0].toLowerCase()
    return name ? { name, args } : null
}

/** Accepts a bare phone number as shorthand for a personal chat id. */
export function normalizeConversationId(raw: string): string {
    if (raw.includes('@')) return raw
    const digits = raw.replace(/[^\d]/g, '')
    return digits ? `${digits}@s.whatsapp.net` : raw
}

const HELP = [
    '🤖 <b>Reply relay is running.</b>',
    '',
    'New WhatsApp messages arrive here as cards. Approve, edit, record, reject or block each one.',
    '',
    '/pending  open approvals',
    '/blocked  blacklisted chats',
    '/block &lt;chat&gt; [reason]',
    '/unblock &lt;chat&gt;',
    '/tag &lt;chat&gt; &lt;free|basic|premium&gt;',
    '/resend &lt;approval id&gt;',
    '/cancel  abandon a pending edit or voice reply',
].join('\n')

export class OperatorCommands {
    private readonly now: () => Date

    constructor(private readonly deps: CommandDeps) {
        this.now = deps.now ?? (() => new Date())
    }

    async execute(text: string): Promise<string> {
        const command = parseCommand(text)
        if (!command) return 'Commands start with "/". Send /start for help.'

        switch (command.name) {
            case 'start':
            case 'help':
                return HELP
            case 'pending':
                return this.pending()
            case 'blocked':
                return this.blocked()
            case 'block':
                return this.block(command.args)
            case 'unblock':
                return this.unblock(command.args)
            case 'tag':
                return this.tag(command.args)
            case 'resend':
                return this.resend(command.args)
            default:
                return `Unknown command /${escapeHtml(command.name)}. Send /start for help.`
        }
    }

    private async pending(): Promise<string> {
        const open = await this.deps.store.listApprovals(OPEN_APPROVAL_STATES, 20)
        if (!open.length) return '📭 No open approvals.'
        const now = this.now()
        const lines = open.map(r =>
            `#${r.id} · ${escapeHtml(r.senderName || r.conversationId)} · ${r.state} · ${formatAge(r.createdAt, now)}\n` +
            `   ${escapeHtml(preview(r.incomingText))}`
        )
        return [`📋 <b>${open.length} open approval(s)</b>`, ...lines].join('\n')
    }

    private async blocked(): Promise<string> {
        const entries = await this.deps.store.listBlacklist(50)
        if (!entries.length) return '✅ Nobody is blacklisted.'
        const lines = entries.map(e =>
            `🚫 <code>${escapeHtml(e.conversationId)}</code>${e.reason ? ` · ${escapeHtml(e.reason)}` : ''}`
        )
        return [`<b>${entries.length} blacklisted</b>`, ...lines].join('\n')
    }

    private async block(args: string[]): Promise<string> {
        const [target, ...reasonWords] = args
        if (!target) return 'Usage: /block &lt;chat&gt; [reason]'
        const conversationId = normalizeConversationId(target)
        const ack = await this.deps.coordinator.blockConversation(conversationId, reasonWords.join(' ') || undefined)
        return ack.status === 'applied'
            ? `🚫 Blocked <code>${escapeHtml(conversationId)}</code>`
            : `⚠️ ${escapeHtml(ack.message)}`
    }

    private async unblock(args: string[]): Promise<string> {
        if (!args[0]) return 'Usage: /unblock &lt;chat&gt;'
        const conversationId = normalizeConversationId(args[0])
        const removed = await this.deps.store.removeFromBlacklist(conversationId)
        return removed
            ? `✅ Unblocked <code>${escapeHtml(conversationId)}</code>`
            : `<code>${escapeHtml(conversationId)}</code> was not blacklisted.`
    }

    private async tag(args: string[]): Promise<string> {
        const [target, rawTag] = args
        const tag = SubscriptionTagSchema.safeParse(rawTag?.toLowerCase())
        if (!target || !tag.success) return 'Usage: /tag &lt;chat&gt; &lt;free|basic|premium&gt;'
        const conversationId = normalizeConversationId(target)
        await this.deps.store.setSubscriptionTag(conversationId, tag.data)
        return `🏷️ <code>${escapeHtml(conversationId)}</code> is now ${TAG_BADGES[tag.data]}`
    }

    private async resend(args: string[]): Promise<string> {
        const id = args[0]
        if (!id || !/^\d{1,18}$/.test(id)) return 'Usage: /resend &lt;approval id&gt;'
        const ack = await this.deps.coordinator.resend(id)
        return ack.state === 'Sent'
            ? `✅ Approval #${id} resent.`
            : `⚠️ ${escapeHtml(ack.message)}`
    }
}
