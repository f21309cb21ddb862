/**
 * Nightly Briefing
 *
 * Once a day at the configured local time, sends every owner with events
 * tomorrow a summary in their private chat (chat id = owner id).
 * Scheduling is a setTimeout chain; each run computes the next one.
 */

import { DateTime } from "luxon";
import { errorMessage, type MessageSender, type ScheduleQueries } from "@chatcal/core";
import { formatBriefing } from "../telegram/format.js";

export interface NightlyBriefingOptions {
  timezone: string;
  hour: number;
  minute: number;
  enabled?: boolean;
  now?: () => Date;
}

export interface BriefingResult {
  status: "sent" | "failed";
  eventCount: number;
  error?: string;
}

export interface BriefingRunSummary {
  day: string;
  sent: number;
  failed: number;
}

export interface BriefingStatus {
  enabled: boolean;
  running: boolean;
  nextRunAt: string | null;
  lastRunAt: string | null;
  lastRunDay: string | null;
  sent: number;
  failed: number;
}

/**
 * Next instant strictly after `now` that falls on hour:minute in the zone.
 */
export function nextRunAt(now: Date, hour: number, minute: number, timezone: string): Date {
  const current = DateTime.fromJSDate(now, { zone: timezone });
  let run = current.set({ hour, minute, second: 0, millisecond: 0 });
  if (run <= current) {
    run = run.plus({ days: 1 });
  }
  return run.toJSDate();
}

export class NightlyBriefing {
  private queries: ScheduleQueries;
  private sender: MessageSender;
  private timezone: string;
  private hour: number;
  private minute: number;
  private enabled: boolean;
  private now: () => Date;

  private timer: ReturnType<typeof setTimeout> | null = null;
  private nextRun: Date | null = null;
  private lastRunAt: Date | null = null;
  private lastRunDay: string | null = null;
  private sentCount = 0;
  private failedCount = 0;

  constructor(
    deps: { queries: ScheduleQueries; sender: MessageSender },
    options: NightlyBriefingOptions,
  ) {
    this.queries = deps.queries;
    this.sender = deps.sender;
    this.timezone = options.timezone;
    this.hour = options.hour;
    this.minute = options.minute;
    this.enabled = options.enabled ?? true;
    this.now = options.now ?? (() => new Date());
  }

  start(): void {
    if (!this.enabled) {
      console.log("[Briefing] Disabled in config");
      return;
    }
    if (this.timer) return;
    this.scheduleNext();
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.nextRun = null;
    console.log("[Briefing] Stopped");
  }

  getStatus(): BriefingStatus {
    return {
      enabled: this.enabled,
      running: this.timer !== null,
      nextRunAt: this.nextRun?.toISOString() ?? null,
      lastRunAt: this.lastRunAt?.toISOString() ?? null,
      lastRunDay: this.lastRunDay,
      sent: this.sentCount,
      failed: this.failedCount,
    };
  }

  /**
   * Brief every owner with events tomorrow. A failure for one owner is
   * counted and does not stop the others.
   */
  async runOnce(): Promise<BriefingRunSummary> {
    const day = this.queries.tomorrow();
    const summary: BriefingRunSummary = { day, sent: 0, failed: 0 };
    this.lastRunAt = this.now();
    this.lastRunDay = day;

    let owners: string[];
    try {
      owners = await this.queries.ownersWithEventsOn(day);
    } catch (err) {
      console.error(`[Briefing] Could not list owners for ${day}: ${errorMessage(err)}`);
      return summary;
    }

    if (owners.length === 0) {
      console.log(`[Briefing] No events on ${day}; nothing to send`);
      return summary;
    }

    for (const ownerId of owners) {
      const result = await this.sendTo(ownerId, day);
      if (result.status === "sent") {
        summary.sent++;
      } else {
        summary.failed++;
      }
    }

    console.log(`[Briefing] ${day}: ${summary.sent} sent, ${summary.failed} failed`);
    return summary;
  }

  /** Send one owner their briefing for `day` (default tomorrow), even when empty */
  async sendTo(ownerId: string, day: string = this.queries.tomorrow()): Promise<BriefingResult> {
    let eventCount = 0;
    try {
      const events = await this.queries.listDay(ownerId, day);
      eventCount = events.length;
      await this.sender.sendText(ownerId, formatBriefing(events, day, this.timezone));
      this.sentCount++;
      return { status: "sent", eventCount };
    } catch (err) {
      this.failedCount++;
      console.error(`[Briefing] Failed to brief ${ownerId}: ${errorMessage(err)}`);
      return { status: "failed", eventCount, error: errorMessage(err) };
    }
  }

  private scheduleNext(): void {
    const now = this.now();
    const next = nextRunAt(now, this.hour, this.minute, this.timezone);
    this.nextRun = next;
    this.timer = setTimeout(() => {
      this.tick().catch((err) => {
        console.error(`[Briefing] Run failed: ${errorMessage(err)}`);
      });
    }, next.getTime() - now.getTime());
    console.log(`[Briefing] Next run at ${next.toISOString()}`);
  }

  private async tick(): Promise<void> {
    try {
      await this.runOnce();
    } finally {
      // stop() during a run clears the timer; only reschedule while running
      if (this.timer) {
        this.scheduleNext();
      }
    }
  }
}
