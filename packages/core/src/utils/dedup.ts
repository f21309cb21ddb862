/**
 * Delivery Dedup Cache
 *
 * Remembers recently seen delivery keys (e.g. Telegram update ids) so a
 * redelivered message is dropped instead of being routed twice.
 * Map insertion order doubles as age order; expired entries are pruned
 * lazily when the cache is full.
 */

export interface DedupOptions {
  /** Maximum number of remembered keys (default: 5000) */
  maxEntries?: number
  /** How long a key counts as seen, in ms (default: 20 minutes) */
  ttlMs?: number
  /** Clock override for tests */
  now?: () => number
}

const DEFAULT_MAX_ENTRIES = 5000
const DEFAULT_TTL_MS = 20 * 60 * 1000

export class DedupCache {
  private seenAt = new Map<string, number>()
  private maxEntries: number
  private ttlMs: number
  private now: () => number

  constructor(options: DedupOptions = {}) {
    this.maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES
    this.ttlMs = options.ttlMs ?? DEFAULT_TTL_MS
    this.now = options.now ?? Date.now
  }

  /**
   * True when `key` was seen within the TTL. Otherwise records it and
   * returns false, so the first delivery always passes.
   */
  isDuplicate(key: string | number): boolean {
    const id = String(key)
    const now = this.now()

    const previous = this.seenAt.get(id)
    if (previous !== undefined) {
      if (now - previous < this.ttlMs) return true
      this.seenAt.delete(id)
    }

    if (this.seenAt.size >= this.maxEntries) {
      this.prune(now)
    }
    if (this.seenAt.size >= this.maxEntries) {
      const oldest = this.seenAt.keys().next().value
      if (oldest !== undefined) this.seenAt.delete(oldest)
    }

    this.seenAt.set(id, now)
    return false
  }

  private prune(now: number): void {
    for (const [id, at] of this.seenAt) {
      if (now - at >= this.ttlMs) this.seenAt.delete(id)
    }
  }

  get size(): number {
    return this.seenAt.size
  }

  clear(): void {
    this.seenAt.clear()
  }
}
