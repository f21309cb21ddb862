/**
 * Conflict Detection
 *
 * Pure overlap test between a candidate and a set of existing events.
 * Callers pass events already scoped to the same owner and day.
 */

import type { EventCandidate, ScheduledEvent } from './types.js'

/** Duration assumed for events without an end instant */
export const DEFAULT_EVENT_DURATION_MINUTES = 60

export interface ConflictOptions {
  defaultDurationMinutes?: number
}

export interface Interval {
  start: number
  end: number
}

/**
 * Effective [start, end) interval of an event in epoch milliseconds.
 * An event without an end occupies [start, start + defaultDurationMinutes).
 */
export function eventInterval(
  event: Pick<EventCandidate, 'start' | 'end'>,
  defaultDurationMinutes: number = DEFAULT_EVENT_DURATION_MINUTES,
): Interval {
  const start = event.start.getTime()
  const end = event.end ? event.end.getTime() : start + defaultDurationMinutes * 60_000
  return { start, end }
}

export function intervalsOverlap(a: Interval, b: Interval): boolean {
  return a.start < b.end && b.start < a.end
}

/**
 * Existing events whose interval overlaps the candidate's, in input order.
 * An existing event sharing the candidate's id is skipped so an event being
 * moved never conflicts with itself.
 */
export function findConflicts(
  candidate: EventCandidate,
  existing: readonly ScheduledEvent[],
  options: ConflictOptions = {},
): ScheduledEvent[] {
  const duration = options.defaultDurationMinutes ?? DEFAULT_EVENT_DURATION_MINUTES
  const target = eventInterval(candidate, duration)

  return existing.filter((event) => {
    if (candidate.id !== undefined && event.id === candidate.id) return false
    return intervalsOverlap(target, eventInterval(event, duration))
  })
}
