/**
 * Unit Tests — Event Model
 *
 * - buildEventCandidate() validation and timezone handling
 * - applyEventUpdate() whitelisted field updates and diffs
 * - calendar day helpers
 */

import { describe, it, expect } from 'vitest'
import {
  applyEventUpdate,
  buildEventCandidate,
  calendarDay,
  dayBounds,
  formatInstant,
  relativeDay,
} from '../src/events/model.js'
import { ValidationError } from '../src/errors.js'
import type { ScheduledEvent } from '../src/events/types.js'

const TZ = 'Asia/Singapore'

function storedEvent(overrides: Partial<ScheduledEvent> = {}): ScheduledEvent {
  return {
    id: 'evt-1',
    ownerId: 'alice',
    title: 'Design review',
    start: new Date('2026-01-17T06:00:00Z'),
    location: 'Room A',
    source: 'conversational',
    createdAt: new Date('2026-01-16T00:00:00Z'),
    ...overrides,
  }
}

// -------------------------------------------------------------------
// buildEventCandidate
// -------------------------------------------------------------------

describe('buildEventCandidate', () => {
  it('reads offset-less timestamps in the configured timezone', () => {
    const candidate = buildEventCandidate(
      { ownerId: 'alice', title: 'Lunch', start: '2026-01-17T14:00:00' },
      { timezone: TZ },
    )
    expect(candidate.start.toISOString()).toBe('2026-01-17T06:00:00.000Z')
    expect(candidate.source).toBe('conversational')
    expect(candidate.end).toBeUndefined()
  })

  it('keeps an explicit offset', () => {
    const candidate = buildEventCandidate(
      { ownerId: 'alice', title: 'Call', start: '2026-01-17T14:00:00+02:00' },
      { timezone: TZ },
    )
    expect(candidate.start.toISOString()).toBe('2026-01-17T12:00:00.000Z')
  })

  it('trims the title and drops blank optional text', () => {
    const candidate = buildEventCandidate(
      {
        ownerId: 'alice',
        title: '  Lunch  ',
        start: '2026-01-17T12:00:00',
        location: '   ',
        notes: null,
      },
      { timezone: TZ },
    )
    expect(candidate.title).toBe('Lunch')
    expect(candidate.location).toBeUndefined()
    expect(candidate.notes).toBeUndefined()
  })

  it('accepts an end equal to the start', () => {
    const candidate = buildEventCandidate(
      { ownerId: 'alice', title: 'Ping', start: '2026-01-17T12:00:00', end: '2026-01-17T12:00:00' },
      { timezone: TZ },
    )
    expect(candidate.end?.getTime()).toBe(candidate.start.getTime())
  })

  it('rejects an empty title', () => {
    expect(() =>
      buildEventCandidate({ ownerId: 'alice', title: '   ', start: '2026-01-17T12:00:00' }, { timezone: TZ }),
    ).toThrow(new ValidationError('title: must not be empty'))
  })

  it('rejects an unparseable start', () => {
    expect(() =>
      buildEventCandidate({ ownerId: 'alice', title: 'Lunch', start: 'next tuesday' }, { timezone: TZ }),
    ).toThrow('start: cannot parse "next tuesday"')
  })

  it('rejects an end before the start', () => {
    expect(() =>
      buildEventCandidate(
        { ownerId: 'alice', title: 'Lunch', start: '2026-01-17T12:00:00', end: '2026-01-17T11:00:00' },
        { timezone: TZ },
      ),
    ).toThrow(ValidationError)
  })
})

// -------------------------------------------------------------------
// Calendar days
// -------------------------------------------------------------------

describe('calendar days', () => {
  it('derives the day in the configured timezone', () => {
    expect(calendarDay(new Date('2026-01-17T17:30:00Z'), TZ)).toBe('2026-01-18')
    expect(calendarDay(new Date('2026-01-17T17:30:00Z'), 'UTC')).toBe('2026-01-17')
  })

  it('returns half-open day bounds', () => {
    const bounds = dayBounds('2026-01-18', TZ)
    expect(bounds.start.toISOString()).toBe('2026-01-17T16:00:00.000Z')
    expect(bounds.end.toISOString()).toBe('2026-01-18T16:00:00.000Z')
  })

  it('rejects malformed days', () => {
    expect(() => dayBounds('2026-13-01', TZ)).toThrow(ValidationError)
    expect(() => dayBounds('tomorrow', TZ)).toThrow(ValidationError)
  })

  it('offsets from the local day', () => {
    expect(relativeDay(new Date('2026-01-17T20:00:00Z'), 1, TZ)).toBe('2026-01-19')
    expect(relativeDay(new Date('2026-01-17T20:00:00Z'), 0, TZ)).toBe('2026-01-18')
  })

  it('formats instants with the zone offset', () => {
    expect(formatInstant(new Date('2026-01-17T06:00:00Z'), TZ)).toBe('2026-01-17T14:00:00+08:00')
  })
})

// -------------------------------------------------------------------
// applyEventUpdate
// -------------------------------------------------------------------

describe('applyEventUpdate', () => {
  it('moves the start and reports the diff', () => {
    const event = storedEvent()
    const result = applyEventUpdate(event, ['startTime'], { startTime: '2026-01-17T16:00:00' }, { timezone: TZ })

    expect(result.event.id).toBe('evt-1')
    expect(result.event.start.toISOString()).toBe('2026-01-17T08:00:00.000Z')
    expect(result.changes).toEqual([
      { field: 'startTime', before: '2026-01-17T14:00:00+08:00', after: '2026-01-17T16:00:00+08:00' },
    ])
    expect(result.patch).toEqual({ start: new Date('2026-01-17T08:00:00Z') })
    // Original untouched
    expect(event.start.toISOString()).toBe('2026-01-17T06:00:00.000Z')
  })

  it('skips listed fields without a value', () => {
    const result = applyEventUpdate(storedEvent(), ['location'], {}, { timezone: TZ })
    expect(result.changes).toEqual([])
    expect(result.patch).toEqual({})
    expect(result.applicable).toBe(false)
  })

  it('skips values equal to the current ones', () => {
    const result = applyEventUpdate(
      storedEvent(),
      ['startTime', 'title'],
      { startTime: '2026-01-17T14:00:00', title: 'Design review' },
      { timezone: TZ },
    )
    expect(result.changes).toEqual([])
    expect(result.patch).toEqual({})
    expect(result.applicable).toBe(true)
  })

  it('ignores values for fields that are not listed', () => {
    const result = applyEventUpdate(
      storedEvent(),
      ['title'],
      { title: 'Final review', location: 'Room B' },
      { timezone: TZ },
    )
    expect(result.event.location).toBe('Room A')
    expect(result.changes).toEqual([{ field: 'title', before: 'Design review', after: 'Final review' }])
  })

  it('clears the location with null', () => {
    const result = applyEventUpdate(storedEvent(), ['location'], { location: null }, { timezone: TZ })
    expect(result.event.location).toBeUndefined()
    expect(result.changes).toEqual([{ field: 'location', before: 'Room A', after: null }])
    expect(result.patch).toEqual({ location: null })
  })

  it('rejects a start moved past the end', () => {
    const event = storedEvent({ end: new Date('2026-01-17T07:00:00Z') })
    expect(() =>
      applyEventUpdate(event, ['startTime'], { startTime: '2026-01-17T16:00:00' }, { timezone: TZ }),
    ).toThrow('end: must not be before start')
  })

  it('rejects an empty title', () => {
    expect(() => applyEventUpdate(storedEvent(), ['title'], { title: '  ' }, { timezone: TZ })).toThrow(
      'title: must not be empty',
    )
  })
})
