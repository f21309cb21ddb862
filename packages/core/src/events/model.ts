/**
 * Event Model
 *
 * Validation and construction of events, whitelisted field updates,
 * and calendar-day arithmetic in a configured timezone.
 */

import { DateTime } from 'luxon'
import { z } from 'zod'
import { ValidationError } from '../errors.js'
import type {
  EventCandidate,
  EventFieldPatch,
  EventInput,
  FieldChange,
  ScheduledEvent,
  UpdatableField,
  UpdateValues,
} from './types.js'

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/

export interface ModelOptions {
  /** IANA zone used for offset-less timestamps and day boundaries */
  timezone: string
}

const instantSchema = z.union([z.string(), z.date()])

const eventInputSchema = z.object({
  ownerId: z.string().trim().min(1, 'must not be empty'),
  title: z.string().trim().min(1, 'must not be empty'),
  start: instantSchema,
  end: instantSchema.nullish(),
  location: z.string().nullish(),
  notes: z.string().nullish(),
  source: z.enum(['conversational', 'researched', 'manual']).default('conversational'),
  enrichment: z.string().nullish(),
})

/**
 * Parse an instant. Strings without an offset are read in `timezone`.
 * Returns null when the value cannot be parsed.
 */
export function parseInstant(value: string | Date, timezone: string): Date | null {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value
  }
  const trimmed = value.trim()
  if (!trimmed) return null
  const parsed = DateTime.fromISO(trimmed, { zone: timezone })
  return parsed.isValid ? parsed.toJSDate() : null
}

/** Blank strings and nulls become undefined */
function optionalText(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

/**
 * Validate raw input into an event candidate.
 * Throws ValidationError for an empty title, a missing or unparseable start,
 * an unparseable end, or an end before the start.
 */
export function buildEventCandidate(input: EventInput, options: ModelOptions): EventCandidate {
  const result = eventInputSchema.safeParse(input)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new ValidationError(`${issue.path.join('.') || 'event'}: ${issue.message}`)
  }
  const data = result.data

  const start = parseInstant(data.start, options.timezone)
  if (!start) {
    throw new ValidationError(`start: cannot parse "${String(data.start)}"`)
  }

  let end: Date | undefined
  if (data.end !== null && data.end !== undefined) {
    const parsedEnd = parseInstant(data.end, options.timezone)
    if (!parsedEnd) {
      throw new ValidationError(`end: cannot parse "${String(data.end)}"`)
    }
    end = parsedEnd
  }

  if (end && end.getTime() < start.getTime()) {
    throw new ValidationError('end: must not be before start')
  }

  return {
    ownerId: data.ownerId,
    title: data.title,
    start,
    end,
    location: optionalText(data.location),
    notes: optionalText(data.notes),
    source: data.source,
    enrichment: optionalText(data.enrichment),
  }
}

/** Render an instant for diffs and logs, e.g. 2026-01-17T14:00:00+08:00 */
export function formatInstant(instant: Date, timezone: string): string {
  const iso = DateTime.fromJSDate(instant, { zone: timezone }).toISO({
    suppressMilliseconds: true,
  })
  return iso ?? instant.toISOString()
}

/** yyyy-MM-dd of an instant in a timezone */
export function calendarDay(instant: Date, timezone: string): string {
  const day = DateTime.fromJSDate(instant, { zone: timezone }).toISODate()
  if (!day) {
    throw new ValidationError(`Cannot derive a calendar day in zone "${timezone}"`)
  }
  return day
}

export function isCalendarDay(value: string): boolean {
  return DAY_PATTERN.test(value) && DateTime.fromISO(value).isValid
}

/** Half-open [start, end) bounds of a calendar day */
export function dayBounds(day: string, timezone: string): { start: Date; end: Date } {
  if (!isCalendarDay(day)) {
    throw new ValidationError(`Invalid calendar day "${day}" (expected yyyy-MM-dd)`)
  }
  const start = DateTime.fromISO(day, { zone: timezone }).startOf('day')
  return { start: start.toJSDate(), end: start.plus({ days: 1 }).toJSDate() }
}

/** Day string `offsetDays` after the day containing `now` */
export function relativeDay(now: Date, offsetDays: number, timezone: string): string {
  const shifted = DateTime.fromJSDate(now, { zone: timezone }).plus({ days: offsetDays })
  return calendarDay(shifted.toJSDate(), timezone)
}

export interface AppliedUpdate {
  /** The event with the update applied (same id) */
  event: ScheduledEvent
  /** Fields whose value actually changed */
  changes: FieldChange[]
  /** Column patch for EventStore.updateFields */
  patch: EventFieldPatch
  /** At least one listed field carried a value, even if it matched the current one */
  applicable: boolean
}

/**
 * Apply the listed fields of an update to a copy of `event`.
 * Fields that are listed but carry no value, or whose value equals the
 * current one, are skipped; `applicable` tells the two apart. Throws
 * ValidationError for unparseable times,
 * an empty title, or a result that ends before it starts.
 */
export function applyEventUpdate(
  event: ScheduledEvent,
  fields: UpdatableField[],
  values: UpdateValues,
  options: ModelOptions,
): AppliedUpdate {
  const { timezone } = options
  const next: ScheduledEvent = { ...event }
  const changes: FieldChange[] = []
  const patch: EventFieldPatch = {}
  const render = (d: Date | undefined) => (d ? formatInstant(d, timezone) : null)
  let applicable = false

  for (const field of new Set(fields)) {
    if (values[field] !== undefined) applicable = true

    switch (field) {
      case 'startTime': {
        if (values.startTime === undefined) break
        const start = parseInstant(values.startTime, timezone)
        if (!start) {
          throw new ValidationError(`start: cannot parse "${values.startTime}"`)
        }
        if (start.getTime() === event.start.getTime()) break
        next.start = start
        patch.start = start
        changes.push({ field, before: render(event.start), after: render(start) })
        break
      }
      case 'endTime': {
        if (values.endTime === undefined) break
        let end: Date | undefined
        if (values.endTime !== null && values.endTime.trim() !== '') {
          const parsed = parseInstant(values.endTime, timezone)
          if (!parsed) {
            throw new ValidationError(`end: cannot parse "${values.endTime}"`)
          }
          end = parsed
        }
        if (end?.getTime() === event.end?.getTime()) break
        next.end = end
        patch.end = end ?? null
        changes.push({ field, before: render(event.end), after: render(end) })
        break
      }
      case 'location': {
        if (values.location === undefined) break
        const location = optionalText(values.location)
        if (location === event.location) break
        next.location = location
        patch.location = location ?? null
        changes.push({ field, before: event.location ?? null, after: location ?? null })
        break
      }
      case 'title': {
        if (values.title === undefined) break
        const title = values.title.trim()
        if (!title) {
          throw new ValidationError('title: must not be empty')
        }
        if (title === event.title) break
        next.title = title
        patch.title = title
        changes.push({ field, before: event.title, after: title })
        break
      }
    }
  }

  if (next.end && next.end.getTime() < next.start.getTime()) {
    throw new ValidationError('end: must not be before start')
  }

  return { event: next, changes, patch, applicable }
}
