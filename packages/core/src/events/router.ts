/**
 * Event Router
 *
 * Turns one inbound chat message into exactly one RoutingOutcome:
 *
 *   gate → context lookup → (update classification) → create | update
 *
 * Each step may end processing. Conflicts are checked before any write,
 * and a conversation's anchor only moves after the store confirms a write.
 * Collaborator failures become outcomes; only cancellation escapes as an error.
 */

import { errorMessage, RoutingCancelledError, ValidationError } from '../errors.js'
import { KeyedLock } from '../utils/keyed-lock.js'
import { withTimeout, withWriteTimeout } from '../utils/timeout.js'
import { DEFAULT_EVENT_DURATION_MINUTES, findConflicts } from './conflicts.js'
import { applyEventUpdate, buildEventCandidate, calendarDay } from './model.js'
import type {
  ContextStore,
  EventCandidate,
  EventExtractor,
  EventStore,
  ExtractionContext,
  InboundMessage,
  RoutingOutcome,
  ScheduledEvent,
  UpdateClassification,
} from './types.js'

const DEFAULT_EXTRACTOR_TIMEOUT_MS = 20_000
const DEFAULT_STORE_TIMEOUT_MS = 5_000

/** Lock keys shared by everything that reads-then-writes the schedule */
export const lockKeys = {
  conversation: (conversationId: string) => `conversation:${conversationId}`,
  owner: (ownerId: string) => `owner:${ownerId}`,
}

export interface EventRouterDeps {
  extractor: EventExtractor
  store: EventStore
  context: ContextStore
  /** Share one lock with ScheduleQueries so bulk clears serialise with writes */
  locks?: KeyedLock
}

export interface EventRouterOptions {
  timezone: string
  defaultDurationMinutes?: number
  extractorTimeoutMs?: number
  storeTimeoutMs?: number
  now?: () => Date
}

export interface RouteOptions {
  /** Aborts in-flight extractor calls and stops between steps; no write starts after it fires */
  signal?: AbortSignal
}

export class EventRouter {
  private extractor: EventExtractor
  private store: EventStore
  private context: ContextStore
  private locks: KeyedLock
  private timezone: string
  private defaultDurationMinutes: number
  private extractorTimeoutMs: number
  private storeTimeoutMs: number
  private now: () => Date

  constructor(deps: EventRouterDeps, options: EventRouterOptions) {
    this.extractor = deps.extractor
    this.store = deps.store
    this.context = deps.context
    this.locks = deps.locks ?? new KeyedLock()
    this.timezone = options.timezone
    this.defaultDurationMinutes = options.defaultDurationMinutes ?? DEFAULT_EVENT_DURATION_MINUTES
    this.extractorTimeoutMs = options.extractorTimeoutMs ?? DEFAULT_EXTRACTOR_TIMEOUT_MS
    this.storeTimeoutMs = options.storeTimeoutMs ?? DEFAULT_STORE_TIMEOUT_MS
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Route one message. Resolves with an outcome for every collaborator
   * failure; rejects only with RoutingCancelledError.
   */
  async route(message: InboundMessage, options: RouteOptions = {}): Promise<RoutingOutcome> {
    const { signal } = options
    this.checkpoint(signal, 'gate')

    let plausible: boolean
    try {
      plausible = await withTimeout(
        'classifyIntent',
        this.extractorTimeoutMs,
        (callSignal) => this.extractor.classifyIntent(message.text, { signal: callSignal }),
        { signal },
      )
    } catch (err) {
      this.checkpoint(signal, 'context lookup')
      console.warn(`[EventRouter] Gate failed for ${message.conversationId}: ${errorMessage(err)}`)
      return { kind: 'extraction_failed', reason: errorMessage(err) }
    }
    if (!plausible) {
      return { kind: 'ignored' }
    }

    return this.locks.run(lockKeys.conversation(message.conversationId), () =>
      this.routeInConversation(message, signal),
    )
  }

  /** Drop a conversation's anchor (explicit reset) */
  async forget(conversationId: string): Promise<void> {
    await this.locks.run(lockKeys.conversation(conversationId), () =>
      this.context.clear(conversationId),
    )
  }

  private async routeInConversation(
    message: InboundMessage,
    signal: AbortSignal | undefined,
  ): Promise<RoutingOutcome> {
    const extraction: ExtractionContext = { now: this.now(), timezone: this.timezone }

    this.checkpoint(signal, 'context lookup')
    const reference = await this.lookupReference(message.conversationId)

    if (reference) {
      this.checkpoint(signal, 'update classification')
      const classification = await this.classifyUpdate(message.text, reference, extraction, signal)

      if (classification.kind === 'update') {
        const outcome = await this.updatePath(message, reference, classification, signal)
        if (outcome) return outcome
      }
    }

    return this.createPath(message, extraction, signal)
  }

  /** The anchored event, fetched fresh; null when absent, deleted or unreadable */
  private async lookupReference(conversationId: string): Promise<ScheduledEvent | null> {
    let anchoredId: string | null
    try {
      anchoredId = await this.context.get(conversationId)
    } catch (err) {
      console.warn(`[EventRouter] Context lookup failed for ${conversationId}: ${errorMessage(err)}`)
      return null
    }
    if (!anchoredId) return null

    try {
      const event = await this.storeCall('getById', () => this.store.getById(anchoredId))
      if (!event) {
        console.log(`[EventRouter] Anchored event ${anchoredId} no longer exists; treating as new`)
      }
      return event
    } catch (err) {
      console.warn(`[EventRouter] Could not fetch anchored event ${anchoredId}: ${errorMessage(err)}`)
      return null
    }
  }

  private async classifyUpdate(
    text: string,
    reference: ScheduledEvent,
    extraction: ExtractionContext,
    signal: AbortSignal | undefined,
  ): Promise<UpdateClassification> {
    try {
      return await withTimeout(
        'classifyUpdate',
        this.extractorTimeoutMs,
        (callSignal) =>
          this.extractor.classifyUpdate(text, reference, extraction, { signal: callSignal }),
        { signal },
      )
    } catch (err) {
      this.checkpoint(signal, 'update')
      console.warn(`[EventRouter] Update classification failed, treating as new: ${errorMessage(err)}`)
      return { kind: 'ambiguous' }
    }
  }

  private async createPath(
    message: InboundMessage,
    extraction: ExtractionContext,
    signal: AbortSignal | undefined,
  ): Promise<RoutingOutcome> {
    this.checkpoint(signal, 'extraction')

    let candidate: EventCandidate
    try {
      const extracted = await withTimeout(
        'extractEvent',
        this.extractorTimeoutMs,
        (callSignal) => this.extractor.extractEvent(message.text, extraction, { signal: callSignal }),
        { signal },
      )
      candidate = buildEventCandidate(
        {
          ownerId: message.senderId,
          title: extracted.title,
          start: extracted.start,
          end: extracted.end,
          location: extracted.location,
          notes: extracted.notes ?? message.text,
          source: 'conversational',
        },
        { timezone: this.timezone },
      )
    } catch (err) {
      this.checkpoint(signal, 'save')
      console.warn(`[EventRouter] Extraction failed for ${message.conversationId}: ${errorMessage(err)}`)
      return { kind: 'extraction_failed', reason: errorMessage(err) }
    }

    return this.locks.run(lockKeys.owner(candidate.ownerId), async () => {
      const blocked = await this.checkConflicts(candidate)
      if (blocked) return blocked

      this.checkpoint(signal, 'save')
      let saved: ScheduledEvent
      try {
        saved = await this.writeCall('save', (callSignal) =>
          this.store.save(candidate, { signal: callSignal }),
        )
      } catch (err) {
        console.error(`[EventRouter] Save failed: ${errorMessage(err)}`)
        return { kind: 'store_failed', reason: errorMessage(err) }
      }

      await this.anchor(message.conversationId, saved.id)
      console.log(`[EventRouter] Created ${saved.id} "${saved.title}" for owner ${saved.ownerId}`)
      return { kind: 'created', event: saved }
    })
  }

  /**
   * Apply an update to the reference event. Returns null when the update
   * carries no value for any listed field, so the caller falls through to
   * creation. An update whose values all match the event is confirmed
   * without a write.
   */
  private async updatePath(
    message: InboundMessage,
    reference: ScheduledEvent,
    classification: Extract<UpdateClassification, { kind: 'update' }>,
    signal: AbortSignal | undefined,
  ): Promise<RoutingOutcome | null> {
    let applied: ReturnType<typeof applyEventUpdate>
    try {
      applied = applyEventUpdate(reference, classification.fields, classification.values, {
        timezone: this.timezone,
      })
    } catch (err) {
      if (!(err instanceof ValidationError)) throw err
      console.warn(`[EventRouter] Rejected update to ${reference.id}: ${err.message}`)
      return { kind: 'extraction_failed', reason: err.message }
    }

    if (!applied.applicable) {
      console.log(`[EventRouter] Update to ${reference.id} carries no values; treating as new`)
      return null
    }

    if (applied.changes.length === 0) {
      await this.anchor(message.conversationId, reference.id)
      console.log(`[EventRouter] Update to ${reference.id} matches the current values`)
      return { kind: 'updated', event: reference, changes: [] }
    }

    const timeChanged = applied.changes.some(
      (change) => change.field === 'startTime' || change.field === 'endTime',
    )

    return this.locks.run(lockKeys.owner(reference.ownerId), async () => {
      if (timeChanged) {
        const blocked = await this.checkConflicts(applied.event)
        if (blocked) return blocked
      }

      this.checkpoint(signal, 'update')
      let updated: ScheduledEvent
      try {
        updated = await this.writeCall('updateFields', (callSignal) =>
          this.store.updateFields(reference.id, applied.patch, { signal: callSignal }),
        )
      } catch (err) {
        console.error(`[EventRouter] Update of ${reference.id} failed: ${errorMessage(err)}`)
        return { kind: 'store_failed', reason: errorMessage(err) }
      }

      await this.anchor(message.conversationId, updated.id)
      console.log(
        `[EventRouter] Updated ${updated.id}: ${applied.changes.map((c) => c.field).join(', ')}`,
      )
      return { kind: 'updated', event: updated, changes: applied.changes }
    })
  }

  /**
   * Conflict check against the owner's events on the candidate's day.
   * Returns the blocking outcome, or null when the slot is free.
   */
  private async checkConflicts(candidate: EventCandidate): Promise<RoutingOutcome | null> {
    const day = calendarDay(candidate.start, this.timezone)

    let existing: ScheduledEvent[]
    try {
      existing = await this.storeCall('getByOwnerAndDate', () =>
        this.store.getByOwnerAndDate(candidate.ownerId, day),
      )
    } catch (err) {
      console.error(`[EventRouter] Conflict lookup failed: ${errorMessage(err)}`)
      return { kind: 'store_failed', reason: errorMessage(err) }
    }

    const conflicts = findConflicts(candidate, existing, {
      defaultDurationMinutes: this.defaultDurationMinutes,
    })
    if (conflicts.length === 0) return null

    console.log(
      `[EventRouter] "${candidate.title}" blocked by ${conflicts.length} conflict(s) on ${day}`,
    )
    return { kind: 'conflict_blocked', candidate, conflicts }
  }

  private async anchor(conversationId: string, eventId: string): Promise<void> {
    try {
      await this.context.anchor(conversationId, eventId)
    } catch (err) {
      console.warn(`[EventRouter] Could not anchor ${eventId} to ${conversationId}: ${errorMessage(err)}`)
    }
  }

  private storeCall<T>(operation: string, work: () => Promise<T>): Promise<T> {
    return withTimeout(operation, this.storeTimeoutMs, work)
  }

  /** A late write is waited for, so the outcome matches what the store holds */
  private writeCall<T>(operation: string, work: (signal: AbortSignal) => Promise<T>): Promise<T> {
    return withWriteTimeout(operation, this.storeTimeoutMs, work)
  }

  private checkpoint(signal: AbortSignal | undefined, stage: string): void {
    if (signal?.aborted) {
      throw new RoutingCancelledError(stage)
    }
  }
}
