/**
 * Integration Tests — SQLite Event Store
 *
 * Runs against a real database file in a temp directory.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { EventRouter, InMemoryContextStore, StoreError, type EventExtractor } from "@chatcal/core";
import { SqliteEventStore } from "../src/store/event-store.js";

const TZ = "Asia/Singapore";
const NOW = new Date("2026-01-17T02:00:00Z");

function sgt(local: string): Date {
  return new Date(`${local}+08:00`);
}

describe("SqliteEventStore", () => {
  let tempDir: string;
  let dbPath: string;
  let store: SqliteEventStore;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "chatcal-store-"));
    dbPath = path.join(tempDir, "data", "events.db");
    store = new SqliteEventStore({ dbPath, timezone: TZ, now: () => NOW });
  });

  afterEach(() => {
    store.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("creates the database directory", () => {
    expect(fs.existsSync(dbPath)).toBe(true);
  });

  it("assigns ulid-based ids and round-trips every field", async () => {
    const saved = await store.save({
      ownerId: "alice",
      title: "Dinner",
      start: sgt("2026-01-17T19:00:00"),
      end: sgt("2026-01-17T21:00:00"),
      location: "Jewel",
      notes: "dinner 7-9pm at jewel",
      source: "conversational",
    });

    expect(saved.id).toMatch(/^evt-[0-9A-HJKMNP-TV-Z]{26}$/);
    expect(await store.getById(saved.id)).toEqual({
      id: saved.id,
      ownerId: "alice",
      title: "Dinner",
      start: sgt("2026-01-17T19:00:00"),
      end: sgt("2026-01-17T21:00:00"),
      location: "Jewel",
      notes: "dinner 7-9pm at jewel",
      source: "conversational",
      enrichment: undefined,
      createdAt: NOW,
    });
  });

  it("returns null for unknown ids", async () => {
    expect(await store.getById("evt-missing")).toBeNull();
  });

  it("buckets events by day in the configured timezone", async () => {
    // 01:00 on the 18th in Singapore, still the 17th in UTC
    await store.save({ ownerId: "alice", title: "Late call", start: new Date("2026-01-17T17:00:00Z"), source: "manual" });

    expect(await store.getByOwnerAndDate("alice", "2026-01-17")).toEqual([]);
    expect((await store.getByOwnerAndDate("alice", "2026-01-18")).map((e) => e.title)).toEqual(["Late call"]);
  });

  it("lists an owner's day ordered by start", async () => {
    await store.save({ ownerId: "alice", title: "Dinner", start: sgt("2026-01-17T19:00:00"), source: "manual" });
    await store.save({ ownerId: "alice", title: "Gym", start: sgt("2026-01-17T07:00:00"), source: "manual" });
    await store.save({ ownerId: "bob", title: "Lecture", start: sgt("2026-01-17T10:00:00"), source: "manual" });

    const events = await store.getByOwnerAndDate("alice", "2026-01-17");
    expect(events.map((e) => e.title)).toEqual(["Gym", "Dinner"]);
  });

  it("updates only the patched fields and re-buckets a moved event", async () => {
    const saved = await store.save({
      ownerId: "alice",
      title: "Dinner",
      start: sgt("2026-01-17T19:00:00"),
      end: sgt("2026-01-17T20:00:00"),
      location: "Jewel",
      source: "conversational",
    });

    const updated = await store.updateFields(saved.id, {
      start: sgt("2026-01-18T19:00:00"),
      end: null,
      location: null,
    });

    expect(updated.title).toBe("Dinner");
    expect(updated.start).toEqual(sgt("2026-01-18T19:00:00"));
    expect(updated.end).toBeUndefined();
    expect(updated.location).toBeUndefined();
    expect(await store.getByOwnerAndDate("alice", "2026-01-17")).toEqual([]);
    expect((await store.getByOwnerAndDate("alice", "2026-01-18")).map((e) => e.id)).toEqual([saved.id]);
  });

  it("rejects updates to unknown ids", async () => {
    await expect(store.updateFields("evt-missing", { title: "x" })).rejects.toBeInstanceOf(StoreError);
  });

  it("attaches enrichment text to an event", async () => {
    const saved = await store.save({ ownerId: "alice", title: "Design fair", start: sgt("2026-01-24T10:00:00"), source: "researched" });

    const enriched = await store.attachEnrichment(saved.id, "Found: Design Fair 2026 (https://example.com/fair)");

    expect(enriched.enrichment).toBe("Found: Design Fair 2026 (https://example.com/fair)");
    expect(enriched.source).toBe("researched");
    expect((await store.getById(saved.id))?.enrichment).toBe("Found: Design Fair 2026 (https://example.com/fair)");
  });

  it("rejects enrichment for unknown ids", async () => {
    await expect(store.attachEnrichment("evt-missing", "Found: x")).rejects.toThrow(
      new StoreError("Event evt-missing not found"),
    );
  });

  it("writes nothing once the caller's signal has aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const saved = await store.save({ ownerId: "alice", title: "Gym", start: sgt("2026-01-17T07:00:00"), source: "manual" });

    await expect(
      store.save({ ownerId: "alice", title: "Dinner", start: sgt("2026-01-17T19:00:00"), source: "manual" }, { signal: controller.signal }),
    ).rejects.toThrow("save aborted");
    await expect(store.updateFields(saved.id, { title: "Swim" }, { signal: controller.signal })).rejects.toThrow(
      "updateFields aborted",
    );
    expect((await store.getByOwnerAndDate("alice", "2026-01-17")).map((e) => e.title)).toEqual(["Gym"]);
  });

  it("deletes an owner's day and reports the count", async () => {
    await store.save({ ownerId: "alice", title: "Gym", start: sgt("2026-01-17T07:00:00"), source: "manual" });
    await store.save({ ownerId: "alice", title: "Dinner", start: sgt("2026-01-17T19:00:00"), source: "manual" });
    await store.save({ ownerId: "bob", title: "Lecture", start: sgt("2026-01-17T10:00:00"), source: "manual" });

    expect(await store.deleteByOwnerAndDate("alice", "2026-01-17")).toBe(2);
    expect(await store.deleteByOwnerAndDate("alice", "2026-01-17")).toBe(0);
    expect(await store.getByOwnerAndDate("bob", "2026-01-17")).toHaveLength(1);
  });

  it("lists distinct owners with events on a day", async () => {
    await store.save({ ownerId: "carol", title: "A", start: sgt("2026-01-18T07:00:00"), source: "manual" });
    await store.save({ ownerId: "alice", title: "B", start: sgt("2026-01-18T08:00:00"), source: "manual" });
    await store.save({ ownerId: "alice", title: "C", start: sgt("2026-01-18T09:00:00"), source: "manual" });
    await store.save({ ownerId: "bob", title: "D", start: sgt("2026-01-19T09:00:00"), source: "manual" });

    expect(await store.listOwnersOn("2026-01-18")).toEqual(["alice", "carol"]);
  });

  it("keeps events across reopen", async () => {
    const saved = await store.save({ ownerId: "alice", title: "Dinner", start: sgt("2026-01-17T19:00:00"), source: "manual" });
    store.close();

    store = new SqliteEventStore({ dbPath, timezone: TZ });
    expect((await store.getById(saved.id))?.title).toBe("Dinner");
  });

  it("backs the router's conflict check", async () => {
    await store.save({
      ownerId: "alice",
      title: "Standup",
      start: sgt("2026-01-17T14:00:00"),
      end: sgt("2026-01-17T15:00:00"),
      source: "manual",
    });

    const extractor: EventExtractor = {
      classifyIntent: async () => true,
      extractEvent: async () => ({ title: "Review", start: "2026-01-17T14:30:00" }),
      classifyUpdate: async () => ({ kind: "ambiguous" }),
    };
    const router = new EventRouter(
      { extractor, store, context: new InMemoryContextStore() },
      { timezone: TZ, now: () => NOW },
    );

    const outcome = await router.route({ conversationId: "group-1", senderId: "alice", text: "review at 2.30pm" });
    expect(outcome.kind).toBe("conflict_blocked");
    expect(await store.getByOwnerAndDate("alice", "2026-01-17")).toHaveLength(1);
  });
});
