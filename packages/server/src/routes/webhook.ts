/**
 * Telegram Webhook Route
 *
 * Telegram retries any update that is not acknowledged quickly, so the
 * handler acknowledges first and processes in the background.
 */

import type { FastifyInstance } from "fastify";

export async function registerWebhookRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.post<{ Body: unknown; Reply: { status: "ok" } }>("/api/webhook", async (request) => {
    fastify.chatHandler.dispatch(request.body);
    return { status: "ok" };
  });
}
