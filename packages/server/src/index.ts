import {
  EventRouter,
  InMemoryContextStore,
  KeyedLock,
  LlmEventExtractor,
  LlmEventResearcher,
  ScheduleQueries,
  TopicTracker,
  errorMessage,
  loadConfig,
} from "@chatcal/core";
import { createServer } from "./server.js";
import { SqliteEventStore } from "./store/event-store.js";
import { TelegramClient } from "./telegram/client.js";
import { TelegramNotifier } from "./telegram/notifier.js";
import { ChatMessageHandler } from "./chat/message-handler.js";
import { NightlyBriefing } from "./briefing/nightly-briefing.js";

async function main() {
  const config = loadConfig();
  console.log(`Using app directory ${config.appDir} (timezone ${config.timezone})`);

  if (!process.env.ANTHROPIC_API_KEY && !process.env.CLAUDE_CODE_OAUTH_TOKEN) {
    console.warn("Warning: No Anthropic credentials set. Event extraction will fail.");
  }
  if (!config.telegram.botToken) {
    console.warn("Warning: TELEGRAM_BOT_TOKEN is not set. Replies and briefings will not be delivered.");
  }

  const store = new SqliteEventStore({
    dbPath: config.store.dbPath,
    timezone: config.timezone,
  });
  console.log(`Event store opened at ${config.store.dbPath}`);

  // One lock shared by the router, the tracker and bulk clears
  const locks = new KeyedLock();

  const router = new EventRouter(
    {
      extractor: new LlmEventExtractor({ model: config.extractor.model }),
      store,
      context: new InMemoryContextStore({ ttlMinutes: config.context.ttlMinutes }),
      locks,
    },
    {
      timezone: config.timezone,
      defaultDurationMinutes: config.conflicts.defaultDurationMinutes,
      extractorTimeoutMs: config.extractor.timeoutMs,
      storeTimeoutMs: config.store.timeoutMs,
    },
  );

  const queries = new ScheduleQueries(
    { store, locks },
    { timezone: config.timezone, storeTimeoutMs: config.store.timeoutMs },
  );

  const tracker = new TopicTracker(
    {
      researcher: new LlmEventResearcher({ model: config.research.model, timezone: config.timezone }),
      store,
      locks,
    },
    {
      timezone: config.timezone,
      defaultDurationMinutes: config.conflicts.defaultDurationMinutes,
      researchTimeoutMs: config.research.timeoutMs,
      storeTimeoutMs: config.store.timeoutMs,
      maxEvents: config.research.maxEvents,
    },
  );

  const telegram = new TelegramClient({
    botToken: config.telegram.botToken,
    apiBaseUrl: config.telegram.apiBaseUrl,
  });

  const briefing = new NightlyBriefing(
    { queries, sender: telegram },
    {
      timezone: config.timezone,
      hour: config.briefing.hour,
      minute: config.briefing.minute,
      enabled: config.briefing.enabled,
    },
  );

  const chatHandler = new ChatMessageHandler({
    router,
    queries,
    notifier: new TelegramNotifier(telegram, config.timezone),
    sender: telegram,
    briefing,
    tracker,
    enrichEvents: config.research.enrichEvents,
    timezone: config.timezone,
  });

  const server = await createServer({ queries, chatHandler, briefing });

  try {
    await server.listen({ port: config.server.port, host: config.server.host });
  } catch (err) {
    server.log.error(err);
    store.close();
    process.exit(1);
  }

  briefing.start();

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    console.log(`\n${signal} received, shutting down gracefully...`);
    try {
      briefing.stop();

      // Stop accepting webhooks, then let in-flight messages finish or cancel
      await server.close();
      console.log("Server closed.");
      await chatHandler.close();

      store.close();
      console.log("Event store closed.");
      process.exit(0);
    } catch (err) {
      console.error("Error during shutdown:", errorMessage(err));
      process.exit(1);
    }
  };

  process.on("SIGINT", () => {
    void shutdown("SIGINT");
  });
  process.on("SIGTERM", () => {
    void shutdown("SIGTERM");
  });
}

main().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
