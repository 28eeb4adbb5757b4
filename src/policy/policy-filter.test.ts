import { describe, it, expect, vi } from 'vitest'
import { PolicyFilter, TAG_BADGES } from './policy-filter.js'
import { emptyContext } from '../store/conversation-store.js'
import { PolicyRejection } from '../errors.js'

function filterWith(blacklisted: string[], tags: Record<string, 'free' | 'basic' | 'premium'> = {}) {
  const store = {
    isBlacklisted: vi.fn(async (id: string) => blacklisted.includes(id)),
    getContext: vi.fn(async (id: string) => ({ ...emptyContext(id), subscriptionTag: tags[id] ?? 'free' })),
  }
  return { filter: new PolicyFilter(store), store }
}

describe('PolicyFilter', () => {
  it('rejects blacklisted conversations', async () => {
    const { filter } = filterWith(['c3'])
    const rejection = await filter.screen('c3')

    expect(rejection).toBeInstanceOf(PolicyRejection)
    expect(rejection?.message).toBe('conversation c3 filtered: blacklisted')
    expect(await filter.isEligible('c3')).toBe(false)
  })

  it('lets every tag through, premium or free', async () => {
    const { filter } = filterWith([], { c1: 'premium' })
    expect(await filter.isEligible('c1')).toBe(true)
    expect(await filter.isEligible('c2')).toBe(true)
  })

  it('reports the tag without consulting the blacklist', async () => {
    const { filter, store } = filterWith(['c1'], { c1: 'basic' })
    expect(await filter.tag('c1')).toBe('basic')
    expect(store.isBlacklisted).not.toHaveBeenCalled()
    expect(TAG_BADGES.basic).toBe('⭐ Basic')
  })
})
