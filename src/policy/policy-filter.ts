/**
 * Policy Filter
 *
 * Decides whether an inbound message may reach draft generation. The
 * blacklist is the only gate; subscription tags are looked up for display
 * on approval cards and never change eligibility.
 */

import { PolicyRejection } from '../errors.js'
import type { ConversationStore } from '../store/conversation-store.js'
import type { SubscriptionTag } from '../types/relay.js'

export const TAG_BADGES: Record<SubscriptionTag, string> = {
  free: '🆓 Free',
  basic: '⭐ Basic',
  premium: '💎 Premium',
}

export class PolicyFilter {
  constructor(private readonly store: Pick<ConversationStore, 'isBlacklisted' | 'getContext'>) {}

  /** Null when eligible, otherwise the rejection to log. */
  async screen(conversationId: string): Promise<PolicyRejection | null> {
    if (await this.store.isBlacklisted(conversationId)) {
      return new PolicyRejection(conversationId, 'blacklisted')
    }
    return null
  }

  async isEligible(conversationId: string): Promise<boolean> {
    return (await this.screen(conversationId)) === null
  }

  async tag(conversationId: string): Promise<SubscriptionTag> {
    const ctx = await this.store.getContext(conversationId)
    return ctx.subscriptionTag
  }
}
