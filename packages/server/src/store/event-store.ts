/**
 * Event Store — SQLite
 *
 * Persists events with better-sqlite3 in WAL mode. Days are derived from the
 * start instant in the configured timezone at write time and indexed with the
 * owner, so per-owner-per-day scans never touch other owners' rows.
 */

import Database from "better-sqlite3";
import path from "node:path";
import fs from "node:fs";
import { ulid } from "ulid";
import {
  StoreError,
  calendarDay,
  errorMessage,
  type CallOptions,
  type EventFieldPatch,
  type EventFields,
  type EventSource,
  type EventStore,
  type ScheduledEvent,
} from "@chatcal/core";

interface EventRow {
  id: string;
  owner_id: string;
  title: string;
  start_ms: number;
  end_ms: number | null;
  day: string;
  location: string | null;
  notes: string | null;
  source: string;
  enrichment: string | null;
  created_at: string;
}

const SOURCES: readonly EventSource[] = ["conversational", "researched", "manual"];

function toSource(value: string): EventSource {
  return SOURCES.find((source) => source === value) ?? "conversational";
}

export interface SqliteEventStoreOptions {
  /** Database file; ":memory:" for a throwaway store */
  dbPath: string;
  timezone: string;
  now?: () => Date;
}

export class SqliteEventStore implements EventStore {
  private db: Database.Database;
  private timezone: string;
  private now: () => Date;

  constructor(options: SqliteEventStoreOptions) {
    if (options.dbPath !== ":memory:") {
      const dir = path.dirname(options.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(options.dbPath);
    this.timezone = options.timezone;
    this.now = options.now ?? (() => new Date());

    this.initialize();
  }

  /**
   * Initialize database with pragmas and schema
   */
  private initialize(): void {
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS events (
        id TEXT PRIMARY KEY,
        owner_id TEXT NOT NULL,
        title TEXT NOT NULL,
        start_ms INTEGER NOT NULL,
        end_ms INTEGER,
        day TEXT NOT NULL,
        location TEXT,
        notes TEXT,
        source TEXT NOT NULL,
        enrichment TEXT,
        created_at TEXT NOT NULL
      );
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_events_owner_day
      ON events(owner_id, day, start_ms);
    `);

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_events_day
      ON events(day);
    `);
  }

  async save(event: EventFields, options: CallOptions = {}): Promise<ScheduledEvent> {
    this.throwIfAborted("save", options.signal);
    const saved: ScheduledEvent = {
      ...event,
      id: `evt-${ulid()}`,
      createdAt: this.now(),
    };

    this.guard("save", () => {
      this.db
        .prepare(
          `INSERT INTO events (
            id, owner_id, title, start_ms, end_ms, day,
            location, notes, source, enrichment, created_at
          ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          saved.id,
          saved.ownerId,
          saved.title,
          saved.start.getTime(),
          saved.end ? saved.end.getTime() : null,
          calendarDay(saved.start, this.timezone),
          saved.location ?? null,
          saved.notes ?? null,
          saved.source,
          saved.enrichment ?? null,
          saved.createdAt.toISOString(),
        );
    });

    return saved;
  }

  async getById(id: string): Promise<ScheduledEvent | null> {
    const row = this.guard("getById", () =>
      this.db.prepare<[string], EventRow>("SELECT * FROM events WHERE id = ?").get(id),
    );
    return row ? this.rowToEvent(row) : null;
  }

  async getByOwnerAndDate(ownerId: string, day: string): Promise<ScheduledEvent[]> {
    const rows = this.guard("getByOwnerAndDate", () =>
      this.db
        .prepare<[string, string], EventRow>(
          "SELECT * FROM events WHERE owner_id = ? AND day = ? ORDER BY start_ms ASC",
        )
        .all(ownerId, day),
    );
    return rows.map((row) => this.rowToEvent(row));
  }

  async updateFields(id: string, patch: EventFieldPatch, options: CallOptions = {}): Promise<ScheduledEvent> {
    this.throwIfAborted("updateFields", options.signal);
    const current = await this.getById(id);
    if (!current) {
      throw new StoreError(`Event ${id} not found`);
    }

    const sets: string[] = [];
    const params: Array<string | number | null> = [];

    if (patch.title !== undefined) {
      sets.push("title = ?");
      params.push(patch.title);
    }
    if (patch.start !== undefined) {
      sets.push("start_ms = ?", "day = ?");
      params.push(patch.start.getTime(), calendarDay(patch.start, this.timezone));
    }
    if (patch.end !== undefined) {
      sets.push("end_ms = ?");
      params.push(patch.end ? patch.end.getTime() : null);
    }
    if (patch.location !== undefined) {
      sets.push("location = ?");
      params.push(patch.location);
    }

    if (sets.length > 0) {
      this.guard("updateFields", () => {
        this.db.prepare(`UPDATE events SET ${sets.join(", ")} WHERE id = ?`).run(...params, id);
      });
    }

    const updated = await this.getById(id);
    if (!updated) {
      throw new StoreError(`Event ${id} disappeared during update`);
    }
    return updated;
  }

  async attachEnrichment(id: string, text: string): Promise<ScheduledEvent> {
    const changes = this.guard(
      "attachEnrichment",
      () => this.db.prepare("UPDATE events SET enrichment = ? WHERE id = ?").run(text, id).changes,
    );
    if (changes === 0) {
      throw new StoreError(`Event ${id} not found`);
    }

    const enriched = await this.getById(id);
    if (!enriched) {
      throw new StoreError(`Event ${id} disappeared during update`);
    }
    return enriched;
  }

  async deleteByOwnerAndDate(ownerId: string, day: string): Promise<number> {
    return this.guard(
      "deleteByOwnerAndDate",
      () => this.db.prepare("DELETE FROM events WHERE owner_id = ? AND day = ?").run(ownerId, day).changes,
    );
  }

  async listOwnersOn(day: string): Promise<string[]> {
    const rows = this.guard("listOwnersOn", () =>
      this.db
        .prepare<[string], { owner_id: string }>(
          "SELECT DISTINCT owner_id FROM events WHERE day = ? ORDER BY owner_id",
        )
        .all(day),
    );
    return rows.map((row) => row.owner_id);
  }

  close(): void {
    this.db.close();
  }

  /** Statements run synchronously, so a write either starts before the abort or not at all */
  private throwIfAborted(operation: string, signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new StoreError(`${operation} aborted`);
    }
  }

  /** Run a statement, surfacing driver errors as StoreError */
  private guard<T>(operation: string, statement: () => T): T {
    try {
      return statement();
    } catch (err) {
      throw new StoreError(`${operation} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private rowToEvent(row: EventRow): ScheduledEvent {
    return {
      id: row.id,
      ownerId: row.owner_id,
      title: row.title,
      start: new Date(row.start_ms),
      end: row.end_ms === null ? undefined : new Date(row.end_ms),
      location: row.location ?? undefined,
      notes: row.notes ?? undefined,
      source: toSource(row.source),
      enrichment: row.enrichment ?? undefined,
      createdAt: new Date(row.created_at),
    };
  }
}
