import { describe, it, expect } from 'vitest'
import { InMemoryContextStore } from '../src/events/context-store.js'

describe('InMemoryContextStore', () => {
  it('starts empty', async () => {
    const store = new InMemoryContextStore()
    expect(await store.get('group-1')).toBeNull()
  })

  it('overwrites the anchor', async () => {
    const store = new InMemoryContextStore()
    await store.anchor('group-1', 'evt-1')
    await store.anchor('group-1', 'evt-2')
    expect(await store.get('group-1')).toBe('evt-2')
    expect(store.size).toBe(1)
  })

  it('keeps conversations apart', async () => {
    const store = new InMemoryContextStore()
    await store.anchor('group-1', 'evt-1')
    await store.anchor('group-2', 'evt-2')
    await store.clear('group-1')
    expect(await store.get('group-1')).toBeNull()
    expect(await store.get('group-2')).toBe('evt-2')
  })

  it('never expires without a ttl', async () => {
    let now = 0
    const store = new InMemoryContextStore({ now: () => now })
    await store.anchor('group-1', 'evt-1')
    now = 365 * 24 * 60 * 60_000
    expect(await store.get('group-1')).toBe('evt-1')
  })

  it('forgets anchors older than the ttl', async () => {
    let now = 0
    const store = new InMemoryContextStore({ ttlMinutes: 30, now: () => now })
    await store.anchor('group-1', 'evt-1')

    now = 29 * 60_000
    expect(await store.get('group-1')).toBe('evt-1')

    now = 30 * 60_000
    expect(await store.get('group-1')).toBeNull()
    expect(store.size).toBe(0)
  })
})
