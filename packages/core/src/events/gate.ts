/**
 * Event Gate
 *
 * Local keyword check deciding whether a message is worth the expensive
 * extraction and classification calls. Errs on the side of letting text
 * through; the extractor rejects false positives later.
 */

const SCHEDULING_WORDS = new Set([
  'meet',
  'meeting',
  'meetup',
  'event',
  'class',
  'lecture',
  'tutorial',
  'lab',
  'exam',
  'deadline',
  'dinner',
  'lunch',
  'breakfast',
  'brunch',
  'appointment',
  'call',
  'today',
  'tonight',
  'tomorrow',
  'tmr',
  'next',
  'monday',
  'tuesday',
  'wednesday',
  'thursday',
  'friday',
  'saturday',
  'sunday',
  'reschedule',
  'postpone',
  'cancel',
])

/** 2pm, 2 pm, 3.30pm, 10:15am, 14:00 */
const CLOCK_TIME = /\b(\d{1,2}([:.]\d{2})?\s?(am|pm)|([01]?\d|2[0-3]):[0-5]\d)\b/i

export function looksLikeEvent(text: string): boolean {
  const normalized = text.toLowerCase()
  if (CLOCK_TIME.test(normalized)) return true

  const words = normalized.split(/[^a-z]+/)
  return words.some((word) => SCHEDULING_WORDS.has(word))
}
