/**
 * Schedule Queries
 *
 * Read and bulk-delete operations that sit beside the router: agenda
 * listings, "clear my day", and the owner scan used by the nightly briefing.
 */

import { ValidationError } from '../errors.js'
import { KeyedLock } from '../utils/keyed-lock.js'
import { withTimeout } from '../utils/timeout.js'
import { isCalendarDay, relativeDay } from './model.js'
import { lockKeys } from './router.js'
import type { EventStore, ScheduledEvent } from './types.js'

export interface ScheduleQueriesDeps {
  store: EventStore
  /** Must be the router's lock so clears never interleave with a conflict check */
  locks?: KeyedLock
}

export interface ScheduleQueriesOptions {
  timezone: string
  storeTimeoutMs?: number
  now?: () => Date
}

export class ScheduleQueries {
  private store: EventStore
  private locks: KeyedLock
  private timezone: string
  private storeTimeoutMs: number
  private now: () => Date

  constructor(deps: ScheduleQueriesDeps, options: ScheduleQueriesOptions) {
    this.store = deps.store
    this.locks = deps.locks ?? new KeyedLock()
    this.timezone = options.timezone
    this.storeTimeoutMs = options.storeTimeoutMs ?? 5_000
    this.now = options.now ?? (() => new Date())
  }

  today(): string {
    return relativeDay(this.now(), 0, this.timezone)
  }

  tomorrow(): string {
    return relativeDay(this.now(), 1, this.timezone)
  }

  /** Owner's events on a day (default today), ordered by start */
  async listDay(ownerId: string, day: string = this.today()): Promise<ScheduledEvent[]> {
    assertDay(day)
    return withTimeout('getByOwnerAndDate', this.storeTimeoutMs, () =>
      this.store.getByOwnerAndDate(ownerId, day),
    )
  }

  /** Delete the owner's events on a day; returns how many were removed */
  async clearDay(ownerId: string, day: string = this.today()): Promise<number> {
    assertDay(day)
    return this.locks.run(lockKeys.owner(ownerId), async () => {
      const deleted = await withTimeout('deleteByOwnerAndDate', this.storeTimeoutMs, () =>
        this.store.deleteByOwnerAndDate(ownerId, day),
      )
      console.log(`[ScheduleQueries] Cleared ${deleted} event(s) for ${ownerId} on ${day}`)
      return deleted
    })
  }

  async ownersWithEventsOn(day: string): Promise<string[]> {
    assertDay(day)
    return withTimeout('listOwnersOn', this.storeTimeoutMs, () => this.store.listOwnersOn(day))
  }
}

function assertDay(day: string): void {
  if (!isCalendarDay(day)) {
    throw new ValidationError(`Invalid calendar day "${day}" (expected yyyy-MM-dd)`)
  }
}
