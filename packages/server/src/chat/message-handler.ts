/**
 * Chat Message Handler
 *
 * Routes incoming Telegram updates by chat type:
 * - Group chats → listener: every message goes through the event router and
 *   the outcome is posted back to the group
 * - Private chats → command hub (/agenda, /clear, /track, ...); any other
 *   text is routed like a group message
 *
 * With enrichment on, newly created events get a background lookup and a
 * follow-up message when it finds something.
 *
 * Duplicate deliveries are dropped by update id before anything runs.
 */

import {
  DedupCache,
  RoutingCancelledError,
  errorMessage,
  type EventRouter,
  type MessageSender,
  type OutcomeNotifier,
  type RoutingOutcome,
  type ScheduleQueries,
  type ScheduledEvent,
  type TopicTracker,
} from "@chatcal/core";
import { parseTelegramUpdate, type ChatUpdate } from "../telegram/parse.js";
import {
  HELP_TEXT,
  escapeHtml,
  formatAgenda,
  formatCleared,
  formatEnrichment,
  formatTrackResult,
} from "../telegram/format.js";
import type { BriefingResult } from "../briefing/nightly-briefing.js";

export interface BriefingSender {
  sendTo(ownerId: string): Promise<BriefingResult>;
}

export type EventTracker = Pick<TopicTracker, "track" | "enrich">;

export interface ChatMessageHandlerDeps {
  router: EventRouter;
  queries: ScheduleQueries;
  notifier: OutcomeNotifier;
  sender: MessageSender;
  briefing: BriefingSender;
  /** Enables /track */
  tracker?: EventTracker;
  /** Look up background for each created event (needs a tracker) */
  enrichEvents?: boolean;
  timezone: string;
  dedup?: DedupCache;
}

export type HandleResult =
  | { action: "skipped" }
  | { action: "duplicate" }
  | { action: "cancelled" }
  | { action: "routed"; outcome: RoutingOutcome }
  | { action: "command"; command: string };

export class ChatMessageHandler {
  private deps: ChatMessageHandlerDeps;
  private dedup: DedupCache;
  private inFlight = new Set<Promise<void>>();
  private shutdown = new AbortController();

  constructor(deps: ChatMessageHandlerDeps) {
    this.deps = deps;
    this.dedup = deps.dedup ?? new DedupCache();
  }

  /**
   * Start handling an update without waiting for it. Errors are logged;
   * use drain() to wait for everything dispatched so far.
   */
  dispatch(payload: unknown): void {
    const task = this.handleUpdate(payload, this.shutdown.signal)
      .then(() => undefined)
      .catch((err) => {
        console.error(`[ChatHandler] Update failed: ${errorMessage(err)}`);
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  /** Wait for every dispatched update to settle */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  /** Cancel in-flight routing at its next step boundary, then wait for it */
  async close(): Promise<void> {
    this.shutdown.abort();
    await this.drain();
  }

  get pending(): number {
    return this.inFlight.size;
  }

  async handleUpdate(payload: unknown, signal?: AbortSignal): Promise<HandleResult> {
    const update = parseTelegramUpdate(payload);
    if (!update) {
      return { action: "skipped" };
    }
    if (this.dedup.isDuplicate(update.updateId)) {
      console.log(`[ChatHandler] Dropping duplicate update ${update.updateId}`);
      return { action: "duplicate" };
    }

    switch (update.chatType) {
      case "group":
      case "supergroup":
        return this.route(update, signal);
      case "private":
        if (update.text.startsWith("/")) {
          return this.handleCommand(update, signal);
        }
        return this.route(update, signal);
      case "channel":
        return { action: "skipped" };
    }
  }

  // ── Listener ─────────────────────────────────────────────────────

  private async route(update: ChatUpdate, signal?: AbortSignal): Promise<HandleResult> {
    let outcome: RoutingOutcome;
    try {
      outcome = await this.deps.router.route(
        { conversationId: update.chatId, senderId: update.userId, text: update.text },
        { signal },
      );
    } catch (err) {
      if (err instanceof RoutingCancelledError) {
        console.log(`[ChatHandler] ${err.message} (update ${update.updateId})`);
        return { action: "cancelled" };
      }
      throw err;
    }

    if (outcome.kind !== "ignored") {
      console.log(`[ChatHandler] ${update.chatType} ${update.chatId}: ${outcome.kind}`);
    }

    try {
      await this.deps.notifier.deliver(update.chatId, outcome);
    } catch (err) {
      console.error(`[ChatHandler] Could not deliver ${outcome.kind} to ${update.chatId}: ${errorMessage(err)}`);
    }

    if (outcome.kind === "created" && this.deps.enrichEvents) {
      await this.enrich(update, outcome.event, signal);
    }
    return { action: "routed", outcome };
  }

  private async enrich(update: ChatUpdate, event: ScheduledEvent, signal?: AbortSignal): Promise<void> {
    const { tracker } = this.deps;
    if (!tracker) return;

    let enriched: ScheduledEvent | null;
    try {
      enriched = await tracker.enrich(event.id, { signal });
    } catch (err) {
      console.warn(`[ChatHandler] Enrichment of ${event.id} failed: ${errorMessage(err)}`);
      return;
    }

    const text = enriched ? formatEnrichment(enriched) : null;
    if (text) {
      await this.reply(update, text);
    }
  }

  // ── Command hub ──────────────────────────────────────────────────

  private async handleCommand(update: ChatUpdate, signal?: AbortSignal): Promise<HandleResult> {
    // "/agenda@SomeBot extra" → "/agenda"
    const command = update.text.split(/\s+/)[0].split("@")[0].toLowerCase();
    const { queries, timezone } = this.deps;

    try {
      switch (command) {
        case "/start":
        case "/help":
          await this.reply(update, HELP_TEXT);
          break;

        case "/agenda": {
          const day = queries.today();
          const events = await queries.listDay(update.userId, day);
          await this.reply(update, formatAgenda(events, day, timezone));
          break;
        }

        case "/tomorrow": {
          const day = queries.tomorrow();
          const events = await queries.listDay(update.userId, day);
          await this.reply(update, formatAgenda(events, day, timezone));
          break;
        }

        case "/clear": {
          const day = queries.today();
          const deleted = await queries.clearDay(update.userId, day);
          await this.reply(update, formatCleared(deleted, day, timezone));
          break;
        }

        case "/briefing": {
          const result = await this.deps.briefing.sendTo(update.userId);
          if (result.status === "failed") {
            await this.reply(update, "❌ Couldn't send your briefing right now.");
          }
          break;
        }

        case "/track": {
          const { tracker } = this.deps;
          const topic = update.text.slice(update.text.split(/\s+/)[0].length).trim();
          if (!tracker) {
            await this.reply(update, "Research mode is not available.");
          } else if (!topic) {
            await this.reply(update, "Usage: /track &lt;topic&gt;\nExample: /track CS2103 deadlines");
          } else {
            await this.reply(update, `🔎 Researching <b>${escapeHtml(topic)}</b>... this can take a minute.`);
            const outcome = await tracker.track(update.userId, topic, { signal });
            await this.reply(update, formatTrackResult(outcome, timezone));
          }
          break;
        }

        case "/forget":
          await this.deps.router.forget(update.chatId);
          await this.reply(update, "🧹 Done. Your next message starts a new event.");
          break;

        default:
          await this.reply(update, "Unknown command. Send /help for the list.");
      }
    } catch (err) {
      if (err instanceof RoutingCancelledError) {
        console.log(`[ChatHandler] ${command} ${err.message} (update ${update.updateId})`);
        return { action: "cancelled" };
      }
      console.error(`[ChatHandler] ${command} failed for ${update.userId}: ${errorMessage(err)}`);
      await this.reply(update, `❌ ${command} failed. Please try again later.`);
    }

    return { action: "command", command };
  }

  /** Send a reply; delivery failures are logged, not thrown */
  private async reply(update: ChatUpdate, text: string): Promise<void> {
    try {
      await this.deps.sender.sendText(update.chatId, text);
    } catch (err) {
      console.error(`[ChatHandler] Reply to ${update.chatId} failed: ${errorMessage(err)}`);
    }
  }
}
