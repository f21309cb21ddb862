/**
 * Conversation Context Store
 *
 * Volatile map of conversation → last anchored event id. Nothing survives a
 * restart: every conversation then starts empty and messages take the
 * creation path until something is anchored again.
 */

import type { ContextStore } from './types.js'

export interface InMemoryContextStoreOptions {
  /** Anchors older than this are forgotten on read (default: never) */
  ttlMinutes?: number | null
  /** Clock override for tests */
  now?: () => number
}

/** Anchored entry as held in memory */
export interface AnchoredContext {
  eventId: string
  anchoredAt: number
}

export class InMemoryContextStore implements ContextStore {
  private entries = new Map<string, AnchoredContext>()
  private ttlMs: number | null
  private now: () => number

  constructor(options: InMemoryContextStoreOptions = {}) {
    this.ttlMs = options.ttlMinutes ? options.ttlMinutes * 60_000 : null
    this.now = options.now ?? Date.now
  }

  async get(conversationId: string): Promise<string | null> {
    const entry = this.entries.get(conversationId)
    if (!entry) return null

    if (this.ttlMs !== null && this.now() - entry.anchoredAt >= this.ttlMs) {
      this.entries.delete(conversationId)
      return null
    }
    return entry.eventId
  }

  async anchor(conversationId: string, eventId: string): Promise<void> {
    this.entries.set(conversationId, { eventId, anchoredAt: this.now() })
  }

  async clear(conversationId: string): Promise<void> {
    this.entries.delete(conversationId)
  }

  /** Number of conversations currently holding an anchor */
  get size(): number {
    return this.entries.size
  }
}
