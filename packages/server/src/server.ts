import Fastify, { type FastifyInstance } from "fastify";
import fastifyCors from "@fastify/cors";
import type { ScheduleQueries } from "@chatcal/core";
import { registerWebhookRoutes } from "./routes/webhook.js";
import { registerEventRoutes } from "./routes/events.js";
import type { ChatMessageHandler } from "./chat/message-handler.js";
import type { NightlyBriefing } from "./briefing/nightly-briefing.js";

export interface ServerDeps {
  queries: ScheduleQueries;
  chatHandler: ChatMessageHandler;
  briefing: NightlyBriefing;
}

export interface ServerOptions {
  /** Pretty console logging (default true); tests pass false */
  logger?: boolean;
}

// Augment Fastify types to include our custom decorators
declare module "fastify" {
  interface FastifyInstance {
    queries: ScheduleQueries;
    chatHandler: ChatMessageHandler;
    briefing: NightlyBriefing;
  }
}

export async function createServer(
  deps: ServerDeps,
  options: ServerOptions = {},
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger:
      options.logger === false
        ? false
        : {
            level: "info",
            transport: {
              target: "pino-pretty",
              options: {
                translateTime: "HH:MM:ss Z",
                ignore: "pid,hostname",
              },
            },
          },
  });

  // Dashboard clients may run on another origin
  await fastify.register(fastifyCors, {
    origin: true,
  });

  fastify.decorate("queries", deps.queries);
  fastify.decorate("chatHandler", deps.chatHandler);
  fastify.decorate("briefing", deps.briefing);

  await registerWebhookRoutes(fastify);
  await registerEventRoutes(fastify);

  return fastify;
}
