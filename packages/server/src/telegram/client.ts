/**
 * Telegram Bot API client
 *
 * Thin wrapper over the HTTP Bot API using the global fetch.
 */

import { z } from "zod";
import { DeliveryError, errorMessage, type MessageSender } from "@chatcal/core";

const DEFAULT_API_BASE_URL = "https://api.telegram.org";
const DEFAULT_TIMEOUT_MS = 10_000;

const apiResponseSchema = z.object({
  ok: z.boolean(),
  description: z.string().optional(),
});

export interface TelegramClientOptions {
  /** Null leaves the client unconfigured: every send fails with DeliveryError */
  botToken: string | null;
  apiBaseUrl?: string;
  timeoutMs?: number;
  /** Override for tests */
  fetch?: typeof fetch;
}

export class TelegramClient implements MessageSender {
  private botToken: string | null;
  private apiBaseUrl: string;
  private timeoutMs: number;
  private fetchImpl: typeof fetch;

  constructor(options: TelegramClientOptions) {
    this.botToken = options.botToken;
    this.apiBaseUrl = (options.apiBaseUrl ?? DEFAULT_API_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = options.fetch ?? fetch;
  }

  get configured(): boolean {
    return this.botToken !== null;
  }

  async sendText(chatId: string, text: string): Promise<void> {
    await this.call("sendMessage", {
      chat_id: chatId,
      text,
      parse_mode: "HTML",
      disable_web_page_preview: true,
    });
  }

  private async call(method: string, body: Record<string, unknown>): Promise<void> {
    if (!this.botToken) {
      throw new DeliveryError(`Cannot call ${method}: TELEGRAM_BOT_TOKEN is not set`);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(`${this.apiBaseUrl}/bot${this.botToken}/${method}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new DeliveryError(`${method} request failed: ${errorMessage(err)}`, { cause: err });
    }

    let payload: unknown = null;
    try {
      payload = await response.json();
    } catch (err) {
      throw new DeliveryError(`${method} returned a non-JSON response (HTTP ${response.status})`, {
        cause: err,
      });
    }

    const parsed = apiResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new DeliveryError(`${method} returned an unexpected response (HTTP ${response.status})`);
    }
    if (!response.ok || !parsed.data.ok) {
      throw new DeliveryError(
        `${method} failed (HTTP ${response.status}): ${parsed.data.description ?? "unknown error"}`,
      );
    }
  }
}
