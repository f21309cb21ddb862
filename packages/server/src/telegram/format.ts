/**
 * Telegram message formatting (HTML parse mode).
 *
 * Every user-facing string the bot sends is built here.
 */

import { DateTime } from "luxon";
import type { FieldChange, RoutingOutcome, ScheduledEvent, TrackOutcome, UpdatableField } from "@chatcal/core";

const MAX_TRACKED_LINES = 10;

export function escapeHtml(text: string): string {
  return text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");
}

function local(instant: Date, timezone: string): DateTime {
  return DateTime.fromJSDate(instant, { zone: timezone });
}

/** 19:00 */
export function formatTime(instant: Date, timezone: string): string {
  return local(instant, timezone).toFormat("HH:mm");
}

/** Sat 17 Jan, 19:00 (–20:00) */
export function formatWhen(event: Pick<ScheduledEvent, "start" | "end">, timezone: string): string {
  const start = local(event.start, timezone).toFormat("ccc d LLL, HH:mm");
  return event.end ? `${start}–${formatTime(event.end, timezone)}` : start;
}

/** Saturday, January 17, 2026 */
export function formatDay(day: string, timezone: string): string {
  return DateTime.fromISO(day, { zone: timezone }).toFormat("cccc, LLLL d, yyyy");
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

// ─── Outcomes ───

const FIELD_LABELS: Record<UpdatableField, string> = {
  startTime: "Start",
  endTime: "End",
  location: "Location",
  title: "Title",
};

function formatChangeValue(change: FieldChange, value: string | null, timezone: string): string {
  if (value === null) return "<i>none</i>";
  if (change.field === "startTime" || change.field === "endTime") {
    const instant = DateTime.fromISO(value, { zone: timezone });
    if (instant.isValid) return instant.toFormat("ccc d LLL, HH:mm");
  }
  return escapeHtml(value);
}

function eventBlock(
  event: Pick<ScheduledEvent, "title" | "start" | "end" | "location" | "enrichment">,
  timezone: string,
): string {
  let block = `📌 <b>${escapeHtml(event.title)}</b>\n🕐 ${formatWhen(event, timezone)}`;
  if (event.location) {
    block += `\n📍 ${escapeHtml(event.location)}`;
  }
  if (event.enrichment) {
    block += `\n🔗 ${escapeHtml(event.enrichment)}`;
  }
  return block;
}

/** Chat text for a routing outcome; null when nothing should be sent */
export function formatOutcome(outcome: RoutingOutcome, timezone: string): string | null {
  switch (outcome.kind) {
    case "ignored":
      return null;

    case "created":
      return `✅ <b>Event added</b>\n\n${eventBlock(outcome.event, timezone)}`;

    case "updated": {
      if (outcome.changes.length === 0) {
        return `✏️ <b>Event updated</b>\n\n${eventBlock(outcome.event, timezone)}\n\nAlready up to date, nothing changed.`;
      }
      const lines = outcome.changes.map(
        (change) =>
          `• ${FIELD_LABELS[change.field]}: ${formatChangeValue(change, change.before, timezone)} → ${formatChangeValue(change, change.after, timezone)}`,
      );
      return `✏️ <b>Event updated</b>\n\n${eventBlock(outcome.event, timezone)}\n\n${lines.join("\n")}`;
    }

    case "conflict_blocked": {
      const clashes = outcome.conflicts.map(
        (event) => `• <b>${formatTime(event.start, timezone)}</b> ${escapeHtml(event.title)}`,
      );
      return (
        `⚠️ <b>Schedule conflict</b>\n\n` +
        `<b>${escapeHtml(outcome.candidate.title)}</b> (${formatWhen(outcome.candidate, timezone)}) overlaps with:\n` +
        `${clashes.join("\n")}\n\n` +
        `Nothing was saved.`
      );
    }

    case "extraction_failed":
      return `🤔 I couldn't turn that into an event: ${escapeHtml(outcome.reason)}`;

    case "store_failed":
      return "❌ I couldn't save that event right now. Please try again.";
  }
}

/** Follow-up sent once background lookup finds something for a new event */
export function formatEnrichment(event: ScheduledEvent): string | null {
  if (!event.enrichment) return null;
  return `🔗 <b>${escapeHtml(event.title)}</b>\n${escapeHtml(event.enrichment)}`;
}

// ─── Research ───

export function formatTrackResult(outcome: TrackOutcome, timezone: string): string {
  if (outcome.kind === "research_failed") {
    return `❌ Couldn't research <b>${escapeHtml(outcome.topic)}</b> right now. Please try again later.`;
  }

  const sections = [`🔎 <b>Research Complete</b>\n📋 Topic: <i>${escapeHtml(outcome.topic)}</i>`];
  const { saved, blocked, rejected } = outcome;

  if (saved.length > 0) {
    const lines = saved
      .slice(0, MAX_TRACKED_LINES)
      .map((event) => `• <b>${formatWhen(event, timezone)}</b> - ${escapeHtml(event.title)}`);
    if (saved.length > MAX_TRACKED_LINES) {
      lines.push(`...and ${saved.length - MAX_TRACKED_LINES} more`);
    }
    sections.push(`✅ Added <b>${plural(saved.length, "event")}</b> to your calendar:\n${lines.join("\n")}`);
  } else if (blocked.length === 0 && rejected.length === 0) {
    sections.push("No upcoming dated events found.");
  } else {
    sections.push("Nothing new was added.");
  }

  const skipped: string[] = [];
  if (blocked.length > 0) {
    skipped.push(`⚠️ ${plural(blocked.length, "event")} skipped for clashing with your schedule.`);
  }
  if (rejected.length > 0) {
    skipped.push(`🚫 ${plural(rejected.length, "result")} could not be saved.`);
  }
  if (skipped.length > 0) {
    sections.push(skipped.join("\n"));
  }

  return sections.join("\n\n");
}

// ─── Agenda & briefing ───

function eventLines(events: ScheduledEvent[], timezone: string): string {
  return events
    .map((event) => {
      let line = `<b>${formatTime(event.start, timezone)}</b> - ${escapeHtml(event.title)}`;
      if (event.location) {
        line += `\n   📍 <i>${escapeHtml(event.location)}</i>`;
      }
      return line;
    })
    .join("\n");
}

export function formatAgenda(events: ScheduledEvent[], day: string, timezone: string): string {
  const date = formatDay(day, timezone);
  if (events.length === 0) {
    return `📭 Nothing scheduled for ${date}.`;
  }
  return `📋 <b>Schedule for ${date}</b>\n\n${eventLines(events, timezone)}`;
}

export function formatBriefing(events: ScheduledEvent[], day: string, timezone: string): string {
  const header = `🌙 <b>Tomorrow's Schedule</b>\n📅 ${formatDay(day, timezone)}`;
  if (events.length === 0) {
    return `${header}\n\nNo events tomorrow. Enjoy the free day!`;
  }

  let closing: string;
  if (events.length >= 5) {
    closing = "💪 <i>Busy day ahead! You've got this!</i>";
  } else if (events.length >= 3) {
    closing = "✨ <i>Have a productive day tomorrow!</i>";
  } else {
    closing = "🌟 <i>Have a great day tomorrow!</i>";
  }

  return (
    `${header}\n\n` +
    `You have <b>${plural(events.length, "event")}</b> tomorrow:\n\n` +
    `${eventLines(events, timezone)}\n\n` +
    closing
  );
}

export function formatCleared(count: number, day: string, timezone: string): string {
  if (count === 0) {
    return `Nothing to clear for ${formatDay(day, timezone)}.`;
  }
  return `🗑️ Cleared <b>${plural(count, "event")}</b> from ${formatDay(day, timezone)}.`;
}

export const HELP_TEXT = [
  "👋 <b>Hi! I keep track of plans mentioned in your group chats.</b>",
  "",
  "Add me to a group and I'll pick up messages like \"dinner tomorrow at 7pm\".",
  "Follow-ups such as \"make it 8pm\" update the last event.",
  "",
  "<b>Commands</b>",
  "/agenda - today's events",
  "/tomorrow - tomorrow's events",
  "/clear - delete today's events",
  "/briefing - send tomorrow's briefing now",
  "/forget - stop treating the next message as a follow-up",
  "/track &lt;topic&gt; - find dated events online and add them",
  "/help - this message",
].join("\n");
