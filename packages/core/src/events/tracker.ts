/**
 * Topic Tracker
 *
 * Research mode: looks a topic up through an EventResearcher and saves the
 * dated events it finds to the requester's calendar. Every candidate gets
 * the same validation and conflict check as a conversational event, under
 * the owner's lock. Also attaches enrichment text to existing events.
 */

import { errorMessage, RoutingCancelledError, ValidationError } from '../errors.js'
import { KeyedLock } from '../utils/keyed-lock.js'
import { withTimeout, withWriteTimeout } from '../utils/timeout.js'
import { DEFAULT_EVENT_DURATION_MINUTES, findConflicts } from './conflicts.js'
import { buildEventCandidate, calendarDay } from './model.js'
import { lockKeys } from './router.js'
import type {
  CallOptions,
  EventCandidate,
  EventResearcher,
  EventStore,
  ExtractedEvent,
  ScheduledEvent,
} from './types.js'

const DEFAULT_RESEARCH_TIMEOUT_MS = 60_000
const DEFAULT_STORE_TIMEOUT_MS = 5_000
const DEFAULT_MAX_EVENTS = 20

export interface TopicTrackerDeps {
  researcher: EventResearcher
  store: EventStore
  /** Must be the router's lock so researched saves serialise with chat ones */
  locks?: KeyedLock
}

export interface TopicTrackerOptions {
  timezone: string
  defaultDurationMinutes?: number
  researchTimeoutMs?: number
  storeTimeoutMs?: number
  /** Cap on candidates taken from one lookup */
  maxEvents?: number
  now?: () => Date
}

export interface BlockedCandidate {
  candidate: EventCandidate
  conflicts: ScheduledEvent[]
}

export interface RejectedCandidate {
  title: string
  reason: string
}

export type TrackOutcome =
  | { kind: 'research_failed'; topic: string; reason: string }
  | {
      kind: 'tracked'
      topic: string
      saved: ScheduledEvent[]
      blocked: BlockedCandidate[]
      rejected: RejectedCandidate[]
    }

export class TopicTracker {
  private researcher: EventResearcher
  private store: EventStore
  private locks: KeyedLock
  private timezone: string
  private defaultDurationMinutes: number
  private researchTimeoutMs: number
  private storeTimeoutMs: number
  private maxEvents: number
  private now: () => Date

  constructor(deps: TopicTrackerDeps, options: TopicTrackerOptions) {
    this.researcher = deps.researcher
    this.store = deps.store
    this.locks = deps.locks ?? new KeyedLock()
    this.timezone = options.timezone
    this.defaultDurationMinutes = options.defaultDurationMinutes ?? DEFAULT_EVENT_DURATION_MINUTES
    this.researchTimeoutMs = options.researchTimeoutMs ?? DEFAULT_RESEARCH_TIMEOUT_MS
    this.storeTimeoutMs = options.storeTimeoutMs ?? DEFAULT_STORE_TIMEOUT_MS
    this.maxEvents = options.maxEvents ?? DEFAULT_MAX_EVENTS
    this.now = options.now ?? (() => new Date())
  }

  /**
   * Research `topic` and save what is found for `ownerId`.
   * Throws ValidationError for a blank topic and RoutingCancelledError when
   * `signal` aborts; every other failure is reported in the outcome.
   */
  async track(ownerId: string, topic: string, options: CallOptions = {}): Promise<TrackOutcome> {
    const { signal } = options
    const trimmed = topic.trim()
    if (!trimmed) {
      throw new ValidationError('topic: must not be empty')
    }
    checkpoint(signal, 'research')

    let found: ExtractedEvent[]
    try {
      found = await withTimeout(
        'research',
        this.researchTimeoutMs,
        (callSignal) =>
          this.researcher.research(
            trimmed,
            { now: this.now(), timezone: this.timezone },
            { signal: callSignal },
          ),
        { signal },
      )
    } catch (err) {
      checkpoint(signal, 'save')
      console.warn(`[TopicTracker] Research failed for "${trimmed}": ${errorMessage(err)}`)
      return { kind: 'research_failed', topic: trimmed, reason: errorMessage(err) }
    }

    if (found.length > this.maxEvents) {
      console.log(`[TopicTracker] Keeping the first ${this.maxEvents} of ${found.length} results`)
    }

    const rejected: RejectedCandidate[] = []
    const candidates: EventCandidate[] = []
    for (const raw of found.slice(0, this.maxEvents)) {
      try {
        candidates.push(
          buildEventCandidate(
            {
              ownerId,
              title: raw.title,
              start: raw.start,
              end: raw.end,
              location: raw.location,
              notes: raw.notes ?? `Tracked from "${trimmed}"`,
              source: 'researched',
            },
            { timezone: this.timezone },
          ),
        )
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err
        rejected.push({ title: raw.title, reason: err.message })
      }
    }

    return this.locks.run(lockKeys.owner(ownerId), async () => {
      const saved: ScheduledEvent[] = []
      const blocked: BlockedCandidate[] = []

      for (const candidate of candidates) {
        checkpoint(signal, 'save')
        const day = calendarDay(candidate.start, this.timezone)
        try {
          const existing = await withTimeout('getByOwnerAndDate', this.storeTimeoutMs, () =>
            this.store.getByOwnerAndDate(ownerId, day),
          )
          const conflicts = findConflicts(candidate, existing, {
            defaultDurationMinutes: this.defaultDurationMinutes,
          })
          if (conflicts.length > 0) {
            blocked.push({ candidate, conflicts })
            continue
          }
          saved.push(
            await withWriteTimeout('save', this.storeTimeoutMs, (callSignal) =>
              this.store.save(candidate, { signal: callSignal }),
            ),
          )
        } catch (err) {
          console.error(`[TopicTracker] Could not save "${candidate.title}": ${errorMessage(err)}`)
          rejected.push({ title: candidate.title, reason: errorMessage(err) })
        }
      }

      console.log(
        `[TopicTracker] "${trimmed}" for ${ownerId}: ${saved.length} saved, ${blocked.length} blocked, ${rejected.length} rejected`,
      )
      return { kind: 'tracked', topic: trimmed, saved, blocked, rejected }
    })
  }

  /**
   * Look up background for a stored event and attach it.
   * Returns the enriched event, or null when the event is gone or nothing was found.
   */
  async enrich(eventId: string, options: CallOptions = {}): Promise<ScheduledEvent | null> {
    const event = await withTimeout('getById', this.storeTimeoutMs, () => this.store.getById(eventId))
    if (!event) return null

    const text = await withTimeout(
      'enrich',
      this.researchTimeoutMs,
      (callSignal) => this.researcher.enrich(event, { signal: callSignal }),
      { signal: options.signal },
    )
    if (!text) return null

    return withTimeout('attachEnrichment', this.storeTimeoutMs, () =>
      this.store.attachEnrichment(eventId, text),
    )
  }
}

function checkpoint(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new RoutingCancelledError(stage)
  }
}
