/**
 * System prompts for event extraction and update classification.
 * Both inject the current date in the configured timezone so relative
 * phrases ("tomorrow", "next Friday") resolve against the same clock.
 */

import { DateTime } from 'luxon'
import { formatInstant } from '../events/model.js'
import type { ExtractionContext, ScheduledEvent } from '../events/types.js'

function currentDateLine(context: ExtractionContext): string {
  const now = DateTime.fromJSDate(context.now, { zone: context.timezone })
  return `Today is ${now.toFormat('cccc, LLLL d, yyyy')} and the time is ${now.toFormat('HH:mm')} (${context.timezone}).`
}

export function buildExtractionPrompt(context: ExtractionContext): string {
  const year = DateTime.fromJSDate(context.now, { zone: context.timezone }).year

  return `You are a JSON-only scheduling extraction API. You output raw JSON with no other text.

${currentDateLine(context)}

RULES:
- Output ONLY a single JSON object. No explanation, no markdown, no code fences.
- "tomorrow" means the day after today; "next Monday" means the next Monday after today.
- Timestamps are ISO 8601 local times without an offset (YYYY-MM-DDTHH:MM:SS).
- If no year is given, assume ${year}.
- If no time is given, use 09:00:00.
- If the end time or location is not mentioned, use null.

If the message describes a plan, meeting, class or other event, extract:
{"isEvent": true, "title": "...", "start": "YYYY-MM-DDTHH:MM:SS", "end": null, "location": null}

Otherwise:
{"isEvent": false}`
}

export function buildUpdatePrompt(reference: ScheduledEvent, context: ExtractionContext): string {
  const end = reference.end ? formatInstant(reference.end, context.timezone) : 'none'

  return `You are a JSON-only scheduling assistant. You output raw JSON with no other text.

${currentDateLine(context)}

The conversation's most recent event is:
- title: ${reference.title}
- start: ${formatInstant(reference.start, context.timezone)}
- end: ${end}
- location: ${reference.location ?? 'none'}

Decide whether the new message changes THIS event or describes a different one.

If it changes this event, list the changed fields (any of "startTime", "endTime", "location", "title")
and give their new values. Timestamps are ISO 8601 local times without an offset.
{"kind": "update", "fields": ["startTime"], "values": {"startTime": "YYYY-MM-DDTHH:MM:SS"}}

If it is a different event:
{"kind": "new_event"}

If you cannot tell:
{"kind": "ambiguous"}`
}

export function buildResearchPrompt(topic: string, context: ExtractionContext): string {
  const year = DateTime.fromJSDate(context.now, { zone: context.timezone }).year

  return `You are a research assistant that finds dated events and deadlines on the web.

${currentDateLine(context)}

Search the web for upcoming events, deadlines and key dates related to: ${topic}

RULES:
- Only include items with a specific date. Skip anything that has already happened.
- Timestamps are ISO 8601 local times in ${context.timezone} without an offset (YYYY-MM-DDTHH:MM:SS).
- If no year is given, assume ${year}.
- If no time is given, use 09:00:00.
- If the end time or location is unknown, use null.
- Put the page the date came from in "notes".

Finish with ONLY a single JSON object, no markdown or code fences:
{"events": [{"title": "...", "start": "YYYY-MM-DDTHH:MM:SS", "end": null, "location": null, "notes": "https://..."}]}

If nothing dated turns up:
{"events": []}`
}

export function buildEnrichmentPrompt(event: ScheduledEvent, timezone: string): string {
  return `You are a research assistant. Search the web once for the official page or venue of this event.

- title: ${event.title}
- start: ${formatInstant(event.start, timezone)}
- location: ${event.location ?? 'none'}

Finish with ONLY a single JSON object, no markdown or code fences:
{"found": true, "title": "page title", "url": "https://..."}

If nothing relevant turns up:
{"found": false}`
}
