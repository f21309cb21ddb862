/**
 * Event Routing Types
 *
 * The event model, the collaborator contracts the router depends on,
 * and the outcome union it produces.
 */

// ─────────────────────────────────────────────────────────────────
// Event model
// ─────────────────────────────────────────────────────────────────

/** How an event came to exist */
export type EventSource = 'conversational' | 'researched' | 'manual'

/** Fields shared by persisted and not-yet-persisted events */
export interface EventFields {
  /** User whose calendar the event belongs to (not the chat it was mentioned in) */
  ownerId: string

  /** Non-empty headline */
  title: string

  /** Absolute start instant */
  start: Date

  /** Optional end instant, never before start */
  end?: Date

  location?: string

  /** Free-form description; conversational events keep the original message here */
  notes?: string

  source: EventSource

  /** Extra context attached after creation */
  enrichment?: string
}

/** An event that has been written to a store */
export interface ScheduledEvent extends EventFields {
  /** Assigned by the store */
  id: string
  createdAt: Date
}

/**
 * An event on its way to the store (creation path) or a modified copy
 * of a stored one (update path, where id is set).
 */
export type EventCandidate = EventFields & { id?: string }

/**
 * Loosely-typed event input as produced by an extractor or an API caller.
 * Instants may be ISO strings (offset optional) or Dates.
 */
export interface EventInput {
  ownerId: string
  title: string
  start: string | Date
  end?: string | Date | null
  location?: string | null
  notes?: string | null
  source?: EventSource
  enrichment?: string | null
}

/** Fields an update may touch */
export type UpdatableField = 'startTime' | 'endTime' | 'location' | 'title'

/** New values for an update, keyed by field; null clears an optional field */
export interface UpdateValues {
  startTime?: string
  endTime?: string | null
  location?: string | null
  title?: string
}

/** Before/after pair for one changed field */
export interface FieldChange {
  field: UpdatableField
  before: string | null
  after: string | null
}

/** Column-level patch handed to EventStore.updateFields */
export interface EventFieldPatch {
  title?: string
  start?: Date
  end?: Date | null
  location?: string | null
}

// ─────────────────────────────────────────────────────────────────
// Collaborators
// ─────────────────────────────────────────────────────────────────

/** Per-call options for collaborators that can stop early */
export interface CallOptions {
  /** Aborted when the caller stops waiting (timeout or cancellation) */
  signal?: AbortSignal
}

/** Clock and zone an extractor resolves relative dates against */
export interface ExtractionContext {
  now: Date
  timezone: string
}

/** Raw structured event as returned by an extractor (not yet validated) */
export interface ExtractedEvent {
  title: string
  start: string
  end?: string | null
  location?: string | null
  notes?: string | null
}

export type UpdateClassification =
  | { kind: 'update'; fields: UpdatableField[]; values: UpdateValues }
  | { kind: 'new_event' }
  | { kind: 'ambiguous' }

/**
 * Natural-language extractor.
 * The router issues at most one call per method per message and never retries.
 */
export interface EventExtractor {
  /** Cheap gate: could this text be about a scheduling event at all? */
  classifyIntent(text: string, options?: CallOptions): Promise<boolean>

  /** Full structured extraction. Throws ExtractionError when nothing usable is found. */
  extractEvent(text: string, context: ExtractionContext, options?: CallOptions): Promise<ExtractedEvent>

  /** Decide whether text modifies `reference` or describes something new */
  classifyUpdate(
    text: string,
    reference: ScheduledEvent,
    context: ExtractionContext,
    options?: CallOptions,
  ): Promise<UpdateClassification>
}

/**
 * Looks events up outside the conversation (web search).
 * Results are raw and go through the same validation as extracted events.
 */
export interface EventResearcher {
  /** Upcoming events about `topic`; an empty list when nothing is found */
  research(topic: string, context: ExtractionContext, options?: CallOptions): Promise<ExtractedEvent[]>

  /** Short background text for an event, or null when nothing useful turns up */
  enrich(event: ScheduledEvent, options?: CallOptions): Promise<string | null>
}

/**
 * Persistence store for events.
 * Assigns identifiers and enforces per-owner scoping; days are yyyy-MM-dd
 * in the store's configured timezone.
 */
export interface EventStore {
  /**
   * Once `options.signal` aborts the store must either finish the write or
   * settle without one, never commit after rejecting.
   */
  save(event: EventFields, options?: CallOptions): Promise<ScheduledEvent>
  getById(id: string): Promise<ScheduledEvent | null>
  /** Ordered by start time */
  getByOwnerAndDate(ownerId: string, day: string): Promise<ScheduledEvent[]>
  /** Throws StoreError when the id is unknown */
  updateFields(id: string, patch: EventFieldPatch, options?: CallOptions): Promise<ScheduledEvent>
  /** Replaces the enrichment text. Throws StoreError when the id is unknown */
  attachEnrichment(id: string, text: string): Promise<ScheduledEvent>
  /** Returns the number of rows removed */
  deleteByOwnerAndDate(ownerId: string, day: string): Promise<number>
  /** Distinct owners with at least one event on the day */
  listOwnersOn(day: string): Promise<string[]>
}

/** Short-term memory of the last confirmed event per conversation */
export interface ContextStore {
  get(conversationId: string): Promise<string | null>
  /** Unconditional overwrite */
  anchor(conversationId: string, eventId: string): Promise<void>
  clear(conversationId: string): Promise<void>
}

/** Delivers an outcome; turning it into text is the notifier's job */
export interface OutcomeNotifier {
  deliver(destination: string, outcome: RoutingOutcome): Promise<void>
}

/** Plain text delivery (briefings, command replies) */
export interface MessageSender {
  sendText(destination: string, text: string): Promise<void>
}

// ─────────────────────────────────────────────────────────────────
// Routing
// ─────────────────────────────────────────────────────────────────

/** One inbound chat message */
export interface InboundMessage {
  conversationId: string
  senderId: string
  text: string
}

export type RoutingOutcome =
  | { kind: 'ignored' }
  | { kind: 'created'; event: ScheduledEvent }
  | { kind: 'updated'; event: ScheduledEvent; changes: FieldChange[] }
  | { kind: 'conflict_blocked'; candidate: EventCandidate; conflicts: ScheduledEvent[] }
  | { kind: 'extraction_failed'; reason: string }
  | { kind: 'store_failed'; reason: string }

export type RoutingOutcomeKind = RoutingOutcome['kind']
