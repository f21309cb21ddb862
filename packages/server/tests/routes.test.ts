/**
 * Integration Tests — HTTP Routes
 *
 * Builds the Fastify app over in-memory stores and drives it with inject().
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import {
  EventRouter,
  InMemoryContextStore,
  InMemoryEventStore,
  KeyedLock,
  ScheduleQueries,
  StoreError,
  type EventExtractor,
  type MessageSender,
} from "@chatcal/core";
import { createServer } from "../src/server.js";
import { ChatMessageHandler } from "../src/chat/message-handler.js";
import { TelegramNotifier } from "../src/telegram/notifier.js";
import { NightlyBriefing } from "../src/briefing/nightly-briefing.js";

const TZ = "Asia/Singapore";
// Saturday 2026-01-17, 10:00 in Singapore
const NOW = new Date("2026-01-17T02:00:00Z");

function sgt(local: string): Date {
  return new Date(`${local}+08:00`);
}

class RecordingSender implements MessageSender {
  sent: Array<{ destination: string; text: string }> = [];

  async sendText(destination: string, text: string): Promise<void> {
    this.sent.push({ destination, text });
  }
}

const extractor: EventExtractor = {
  classifyIntent: async (text) => text.includes("pm"),
  extractEvent: async () => ({ title: "Dinner", start: "2026-01-17T19:00:00" }),
  classifyUpdate: async () => ({ kind: "ambiguous" }),
};

describe("HTTP routes", () => {
  let store: InMemoryEventStore;
  let sender: RecordingSender;
  let chatHandler: ChatMessageHandler;
  let server: FastifyInstance;

  beforeEach(async () => {
    store = new InMemoryEventStore({ timezone: TZ, now: () => NOW });
    sender = new RecordingSender();
    const locks = new KeyedLock();
    const router = new EventRouter(
      { extractor, store, context: new InMemoryContextStore(), locks },
      { timezone: TZ, now: () => NOW },
    );
    const queries = new ScheduleQueries({ store, locks }, { timezone: TZ, now: () => NOW });
    const briefing = new NightlyBriefing({ queries, sender }, { timezone: TZ, hour: 21, minute: 0, now: () => NOW });
    chatHandler = new ChatMessageHandler({
      router,
      queries,
      notifier: new TelegramNotifier(sender, TZ),
      sender,
      briefing,
      timezone: TZ,
    });

    server = await createServer({ queries, chatHandler, briefing }, { logger: false });

    await store.save({ ownerId: "42", title: "Gym", start: sgt("2026-01-17T07:00:00"), source: "manual" });
    await store.save({
      ownerId: "42",
      title: "Brunch",
      start: sgt("2026-01-18T11:00:00"),
      end: sgt("2026-01-18T12:30:00"),
      location: "Tiong Bahru",
      notes: "brunch sunday 11-12.30",
      source: "conversational",
    });
  });

  afterEach(async () => {
    await server.close();
  });

  // --- Health ---

  it("reports health with the briefing status", async () => {
    const res = await server.inject({ method: "GET", url: "/api/health" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      status: "ok",
      briefing: {
        enabled: true,
        running: false,
        nextRunAt: null,
        lastRunAt: null,
        lastRunDay: null,
        sent: 0,
        failed: 0,
      },
    });
  });

  it("exposes the briefing status on its own", async () => {
    const res = await server.inject({ method: "GET", url: "/api/briefing/status" });
    expect(res.json()).toMatchObject({ enabled: true, running: false });
  });

  it("allows cross-origin requests", async () => {
    const res = await server.inject({
      method: "GET",
      url: "/api/health",
      headers: { origin: "http://localhost:5173" },
    });
    expect(res.headers["access-control-allow-origin"]).toBe("http://localhost:5173");
  });

  // --- Events ---

  it("lists today's events for an owner", async () => {
    const res = await server.inject({ method: "GET", url: "/api/events/today?owner=42" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({
      ownerId: "42",
      date: "2026-01-17",
      events: [
        {
          id: "evt-1",
          ownerId: "42",
          title: "Gym",
          start: "2026-01-16T23:00:00.000Z",
          end: null,
          location: null,
          notes: null,
          source: "manual",
          enrichment: null,
          createdAt: "2026-01-17T02:00:00.000Z",
        },
      ],
    });
  });

  it("lists another day when a date is given", async () => {
    const res = await server.inject({ method: "GET", url: "/api/events/today?owner=42&date=2026-01-18" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({
      date: "2026-01-18",
      events: [
        {
          id: "evt-2",
          title: "Brunch",
          start: "2026-01-18T03:00:00.000Z",
          end: "2026-01-18T04:30:00.000Z",
          location: "Tiong Bahru",
          notes: "brunch sunday 11-12.30",
          source: "conversational",
        },
      ],
    });
  });

  it("requires an owner", async () => {
    const missing = await server.inject({ method: "GET", url: "/api/events/today" });
    expect(missing.statusCode).toBe(400);
    expect(missing.json()).toEqual({ error: "owner is required" });

    const blank = await server.inject({ method: "DELETE", url: "/api/events/today?owner=%20%20" });
    expect(blank.statusCode).toBe(400);
    expect(blank.json()).toEqual({ error: "owner is required" });
  });

  it("rejects malformed dates", async () => {
    const res = await server.inject({ method: "GET", url: "/api/events/today?owner=42&date=18-01-2026" });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: 'Invalid calendar day "18-01-2026" (expected yyyy-MM-dd)' });
  });

  it("clears today's events for an owner", async () => {
    const res = await server.inject({ method: "DELETE", url: "/api/events/today?owner=42" });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ownerId: "42", date: "2026-01-17", deleted: 1 });
    expect(await store.getByOwnerAndDate("42", "2026-01-17")).toEqual([]);
    expect(await store.getByOwnerAndDate("42", "2026-01-18")).toHaveLength(1);
  });

  it("returns 500 when the store fails", async () => {
    store.getByOwnerAndDate = async () => {
      throw new StoreError("database is locked");
    };

    const res = await server.inject({ method: "GET", url: "/api/events/today?owner=42" });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ error: "Failed to list events" });
  });

  // --- Webhook ---

  it("acknowledges webhook updates and processes them in the background", async () => {
    const res = await server.inject({
      method: "POST",
      url: "/api/webhook",
      payload: {
        update_id: 100,
        message: {
          message_id: 1,
          from: { id: 7 },
          chat: { id: -1001, type: "group" },
          text: "dinner at 7pm",
        },
      },
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ status: "ok" });

    await chatHandler.drain();

    expect((await store.getByOwnerAndDate("7", "2026-01-17")).map((e) => e.title)).toEqual(["Dinner"]);
    expect(sender.sent).toEqual([
      { destination: "-1001", text: "✅ <b>Event added</b>\n\n📌 <b>Dinner</b>\n🕐 Sat 17 Jan, 19:00" },
    ]);
  });

  it("acknowledges updates it does not handle", async () => {
    const res = await server.inject({
      method: "POST",
      url: "/api/webhook",
      payload: { update_id: 101, my_chat_member: { chat: { id: -1001, type: "group" } } },
    });

    expect(res.statusCode).toBe(200);
    await chatHandler.drain();
    expect(sender.sent).toEqual([]);
  });
});
