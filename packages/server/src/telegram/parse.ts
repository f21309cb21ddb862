/**
 * Telegram update parsing
 *
 * Webhook payloads carry many update kinds (edits, membership changes,
 * channel posts). Only plain text messages from a user are routed.
 */

import { z } from "zod";

export type ChatType = "private" | "group" | "supergroup" | "channel";

export interface ChatUpdate {
  updateId: number;
  /** Where replies go; equals userId in private chats */
  chatId: string;
  userId: string;
  chatType: ChatType;
  text: string;
}

const updateSchema = z.object({
  update_id: z.number().int(),
  message: z
    .object({
      from: z.object({ id: z.number().int() }).optional(),
      chat: z.object({
        id: z.number().int(),
        type: z.enum(["private", "group", "supergroup", "channel"]),
      }),
      text: z.string().optional(),
    })
    .optional(),
});

/** Clean view of a text message update, or null when it should be ignored */
export function parseTelegramUpdate(payload: unknown): ChatUpdate | null {
  const result = updateSchema.safeParse(payload);
  if (!result.success) return null;

  const { update_id: updateId, message } = result.data;
  if (!message?.from || message.text === undefined) return null;

  const text = message.text.trim();
  if (!text) return null;

  return {
    updateId,
    chatId: String(message.chat.id),
    userId: String(message.from.id),
    chatType: message.chat.type,
    text,
  };
}
