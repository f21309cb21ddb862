/**
 * Schedule API Routes
 *
 * Read and clear an owner's day, plus health and briefing status.
 */

import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { ValidationError, errorMessage, type ScheduledEvent } from "@chatcal/core";
import type { BriefingStatus } from "../briefing/nightly-briefing.js";

// ─── Response shapes ───

export interface EventJson {
  id: string;
  ownerId: string;
  title: string;
  start: string;
  end: string | null;
  location: string | null;
  notes: string | null;
  source: string;
  enrichment: string | null;
  createdAt: string;
}

interface DayResponse {
  ownerId: string;
  date: string;
  events: EventJson[];
}

interface ClearResponse {
  ownerId: string;
  date: string;
  deleted: number;
}

interface ErrorResponse {
  error: string;
}

interface HealthResponse {
  status: "ok";
  briefing: BriefingStatus;
}

const dayQuerySchema = z.object({
  owner: z.string({ required_error: "owner is required" }).trim().min(1, "owner is required"),
  date: z.string().optional(),
});

type DayQuery = z.input<typeof dayQuerySchema>;

export function toEventJson(event: ScheduledEvent): EventJson {
  return {
    id: event.id,
    ownerId: event.ownerId,
    title: event.title,
    start: event.start.toISOString(),
    end: event.end?.toISOString() ?? null,
    location: event.location ?? null,
    notes: event.notes ?? null,
    source: event.source,
    enrichment: event.enrichment ?? null,
    createdAt: event.createdAt.toISOString(),
  };
}

function parseDayQuery(query: unknown): { owner: string; date?: string } | { error: string } {
  const result = dayQuerySchema.safeParse(query ?? {});
  if (!result.success) {
    return { error: result.error.issues[0]?.message ?? "Invalid query" };
  }
  return result.data;
}

export async function registerEventRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get<{ Reply: HealthResponse }>("/api/health", async () => {
    return { status: "ok", briefing: fastify.briefing.getStatus() };
  });

  fastify.get<{ Reply: BriefingStatus }>("/api/briefing/status", async () => {
    return fastify.briefing.getStatus();
  });

  /**
   * GET /api/events/today?owner=<id>[&date=yyyy-MM-dd]
   */
  fastify.get<{ Querystring: DayQuery; Reply: DayResponse | ErrorResponse }>(
    "/api/events/today",
    async (request, reply) => {
      const query = parseDayQuery(request.query);
      if ("error" in query) {
        return reply.code(400).send({ error: query.error });
      }

      const date = query.date ?? fastify.queries.today();
      try {
        const events = await fastify.queries.listDay(query.owner, date);
        return { ownerId: query.owner, date, events: events.map(toEventJson) };
      } catch (err) {
        if (err instanceof ValidationError) {
          return reply.code(400).send({ error: err.message });
        }
        fastify.log.error(`Failed to list events for ${query.owner}: ${errorMessage(err)}`);
        return reply.code(500).send({ error: "Failed to list events" });
      }
    },
  );

  /**
   * DELETE /api/events/today?owner=<id>[&date=yyyy-MM-dd]
   */
  fastify.delete<{ Querystring: DayQuery; Reply: ClearResponse | ErrorResponse }>(
    "/api/events/today",
    async (request, reply) => {
      const query = parseDayQuery(request.query);
      if ("error" in query) {
        return reply.code(400).send({ error: query.error });
      }

      const date = query.date ?? fastify.queries.today();
      try {
        const deleted = await fastify.queries.clearDay(query.owner, date);
        return { ownerId: query.owner, date, deleted };
      } catch (err) {
        if (err instanceof ValidationError) {
          return reply.code(400).send({ error: err.message });
        }
        fastify.log.error(`Failed to clear events for ${query.owner}: ${errorMessage(err)}`);
        return reply.code(500).send({ error: "Failed to clear events" });
      }
    },
  );
}
