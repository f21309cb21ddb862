/**
 * In-memory EventStore, used by tests and as a throwaway store in dev.
 */

import { StoreError } from '../errors.js'
import { calendarDay } from './model.js'
import type {
  CallOptions,
  EventFieldPatch,
  EventFields,
  EventStore,
  ScheduledEvent,
} from './types.js'

function throwIfAborted(operation: string, signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new StoreError(`${operation} aborted`)
  }
}

export interface InMemoryEventStoreOptions {
  timezone: string
  now?: () => Date
}

export class InMemoryEventStore implements EventStore {
  private events = new Map<string, ScheduledEvent>()
  private nextId = 1
  private timezone: string
  private now: () => Date

  constructor(options: InMemoryEventStoreOptions) {
    this.timezone = options.timezone
    this.now = options.now ?? (() => new Date())
  }

  async save(event: EventFields, options: CallOptions = {}): Promise<ScheduledEvent> {
    throwIfAborted('save', options.signal)
    const saved: ScheduledEvent = {
      ownerId: event.ownerId,
      title: event.title,
      start: event.start,
      end: event.end,
      location: event.location,
      notes: event.notes,
      source: event.source,
      enrichment: event.enrichment,
      id: `evt-${this.nextId++}`,
      createdAt: this.now(),
    }
    this.events.set(saved.id, saved)
    return { ...saved }
  }

  async getById(id: string): Promise<ScheduledEvent | null> {
    const event = this.events.get(id)
    return event ? { ...event } : null
  }

  async getByOwnerAndDate(ownerId: string, day: string): Promise<ScheduledEvent[]> {
    return this.onDay(day)
      .filter((event) => event.ownerId === ownerId)
      .map((event) => ({ ...event }))
  }

  async updateFields(
    id: string,
    patch: EventFieldPatch,
    options: CallOptions = {},
  ): Promise<ScheduledEvent> {
    throwIfAborted('updateFields', options.signal)
    const event = this.events.get(id)
    if (!event) {
      throw new StoreError(`Event ${id} not found`)
    }

    const updated: ScheduledEvent = { ...event }
    if (patch.title !== undefined) updated.title = patch.title
    if (patch.start !== undefined) updated.start = patch.start
    if (patch.end !== undefined) updated.end = patch.end ?? undefined
    if (patch.location !== undefined) updated.location = patch.location ?? undefined

    this.events.set(id, updated)
    return { ...updated }
  }

  async attachEnrichment(id: string, text: string): Promise<ScheduledEvent> {
    const event = this.events.get(id)
    if (!event) {
      throw new StoreError(`Event ${id} not found`)
    }
    const enriched: ScheduledEvent = { ...event, enrichment: text }
    this.events.set(id, enriched)
    return { ...enriched }
  }

  async deleteByOwnerAndDate(ownerId: string, day: string): Promise<number> {
    const doomed = this.onDay(day).filter((event) => event.ownerId === ownerId)
    for (const event of doomed) {
      this.events.delete(event.id)
    }
    return doomed.length
  }

  async listOwnersOn(day: string): Promise<string[]> {
    return [...new Set(this.onDay(day).map((event) => event.ownerId))]
  }

  /** Every stored event, in insertion order */
  all(): ScheduledEvent[] {
    return [...this.events.values()].map((event) => ({ ...event }))
  }

  private onDay(day: string): ScheduledEvent[] {
    return [...this.events.values()]
      .filter((event) => calendarDay(event.start, this.timezone) === day)
      .sort((a, b) => a.start.getTime() - b.start.getTime())
  }
}
