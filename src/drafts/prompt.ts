import type { ConversationContext, InboundMessage } from '../types/relay.js'
import type { ChatMessage } from './types.js'

/**
 * Bounded prompt: system prompt, the trailing `maxHistory` window entries
 * that precede the new message, then the new message itself. Context size
 * never grows with conversation length.
 */
export function buildPrompt(
  systemPrompt: string,
  context: ConversationContext,
  message: InboundMessage,
  maxHistory: number
): ChatMessage[] {
  const history = context.recentWindow
    .filter(entry => entry.messageId !== message.messageId && entry.text.trim())
    .slice(-maxHistory)

  return [
    { role: 'system', content: systemPrompt },
    ...history.map((entry): ChatMessage => ({ role: entry.role, content: entry.text })),
    { role: 'user', content: message.body },
  ]
}
