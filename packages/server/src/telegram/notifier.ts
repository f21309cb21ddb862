import type { MessageSender, OutcomeNotifier, RoutingOutcome } from "@chatcal/core";
import { formatOutcome } from "./format.js";

/**
 * Sends routing outcomes back to the chat they came from.
 * Ignored messages produce no reply.
 */
export class TelegramNotifier implements OutcomeNotifier {
  constructor(
    private sender: MessageSender,
    private timezone: string,
  ) {}

  async deliver(destination: string, outcome: RoutingOutcome): Promise<void> {
    const text = formatOutcome(outcome, this.timezone);
    if (text === null) return;
    await this.sender.sendText(destination, text);
  }
}
