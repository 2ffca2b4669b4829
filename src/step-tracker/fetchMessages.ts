// Fetches messages from a Discord channel since a given date, handling pagination.

import { z } from "zod";
import { MESSAGE_FETCH_LIMIT } from "../constants";
import { discordRequest } from "./discordApi";

/**
 * A chat message as the step tracker sees it.
 */
export interface ChatMessage {
  id: string;                 // Message ID
  channelId: string;
  authorId: string | null;    // Discord user ID
  authorName: string | null;
  isBot: boolean;
  content: string;            // Message text content
  timestamp: string;          // ISO timestamp
}

const discordMessageSchema = z.object({
  id: z.string(),
  content: z.string(),
  timestamp: z.string(),
  author: z
    .object({
      id: z.string(),
      username: z.string(),
      bot: z.boolean().optional(),
    })
    .optional(),
});

const discordMessagePageSchema = z.array(discordMessageSchema);

/**
 * Fetch all messages from a Discord channel since a given date, newest first.
 * @param channelId Discord channel ID
 * @param token Discord bot token
 * @param since Only fetch messages after this date
 * @returns Array of chat messages
 */
export async function fetchMessages(channelId: string, token: string, since: Date): Promise<ChatMessage[]> {
  const path = `/channels/${channelId}/messages?limit=${MESSAGE_FETCH_LIMIT}`;
  let lastMessageId: string | undefined = undefined;
  const allMessages: ChatMessage[] = [];
  for (;;) {
    const pagePath: string = lastMessageId ? `${path}&before=${lastMessageId}` : path;
    try {
      const response = await discordRequest(pagePath, token);
      if (!response.ok) {
        console.error(`[Steps] fetchMessages: Non-2xx response (${response.status}) for ${pagePath}`);
        break;
      }
      const page = discordMessagePageSchema.safeParse(await response.json());
      if (!page.success) {
        console.error(`[Steps] fetchMessages: Unexpected payload for ${pagePath}:`, page.error.message);
        break;
      }
      const messages = page.data;
      if (messages.length === 0) {
        break;
      }
      let reachedSince = false;
      for (const msg of messages) {
        if (new Date(msg.timestamp) < since) {
          reachedSince = true;
          break;
        }
        allMessages.push({
          id: msg.id,
          channelId,
          authorId: msg.author?.id ?? null,
          authorName: msg.author?.username ?? null,
          isBot: msg.author?.bot ?? false,
          content: msg.content,
          timestamp: msg.timestamp,
        });
      }
      if (reachedSince || messages.length < MESSAGE_FETCH_LIMIT) {
        break;
      }
      lastMessageId = messages[messages.length - 1].id;
    } catch (err) {
      console.error(`[Steps] fetchMessages: Error fetching messages:`, err);
      break;
    }
  }
  return allMessages;
}
