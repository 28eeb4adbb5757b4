import type { InboundMessage, PollCursor } from '../types/relay.js'

/**
 * Transport collaborator contracts. The relay only reads an ordered log of
 * inbound messages and sends text; it never establishes the session.
 */
export interface TransportReader {
  /** Inbound messages strictly after the cursor, oldest first. */
  readSince(cursor: PollCursor | null, limit: number): Promise<InboundMessage[]>
  /** Cursor positioned at the newest message already in the log. */
  latestCursor(): Promise<PollCursor | null>
}

export interface TransportSender {
  send(conversationId: string, text: string, signal?: AbortSignal): Promise<void>
}
