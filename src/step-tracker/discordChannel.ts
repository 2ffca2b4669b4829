// Reads reports from and posts replies and summaries to a Discord channel.

import { RESTPatchAPIInteractionOriginalResponseJSONBody, RESTPostAPIChannelMessageJSONBody } from "discord-api-types/v10";
import { discordRequest } from "./discordApi";
import { ChatMessage, fetchMessages } from "./fetchMessages";

/**
 * The chat surface the bot reads reports from and writes replies and summaries to.
 */
export interface ChatChannel {
  fetchMessages(since: Date): Promise<ChatMessage[]>;
  reply(messageId: string, text: string): Promise<void>;
  post(text: string): Promise<void>;
}

/**
 * A Discord text channel accessed through the REST API with a bot token.
 */
export class DiscordChannel implements ChatChannel {
  constructor(
    private readonly channelId: string,
    private readonly token: string
  ) {}

  fetchMessages(since: Date): Promise<ChatMessage[]> {
    return fetchMessages(this.channelId, this.token, since);
  }

  reply(messageId: string, text: string): Promise<void> {
    return postMessage(this.channelId, this.token, {
      content: text,
      message_reference: { message_id: messageId },
      allowed_mentions: { parse: [] },
    });
  }

  post(text: string): Promise<void> {
    return postMessage(this.channelId, this.token, {
      content: text,
      allowed_mentions: { parse: [] },
    });
  }
}

/**
 * Edits the response of a deferred interaction.
 */
export interface InteractionWebhook {
  editOriginal(interactionToken: string, content: string): Promise<void>;
}

export class DiscordInteractionWebhook implements InteractionWebhook {
  constructor(
    private readonly applicationId: string,
    private readonly token: string
  ) {}

  async editOriginal(interactionToken: string, content: string): Promise<void> {
    const body: RESTPatchAPIInteractionOriginalResponseJSONBody = { content, allowed_mentions: { parse: [] } };
    const resp = await discordRequest(`/webhooks/${this.applicationId}/${interactionToken}/messages/@original`, this.token, {
      method: "PATCH",
      body,
    });
    if (!resp.ok) {
      const errorText = await resp.text();
      throw new Error(`Failed to edit interaction response: ${resp.status} ${resp.statusText} - ${errorText}`);
    }
  }
}

/**
 * Posts a message to a Discord channel.
 * @param channelId Discord channel ID
 * @param token Bot token
 * @param payload Message body
 */
export async function postMessage(
  channelId: string,
  token: string,
  payload: RESTPostAPIChannelMessageJSONBody
): Promise<void> {
  const resp = await discordRequest(`/channels/${channelId}/messages`, token, {
    method: "POST",
    body: payload,
  });

  if (!resp.ok) {
    const errorText = await resp.text();
    console.error(`[Steps] postMessage: Non-2xx response (${resp.status}) posting to channel ${channelId}`);
    console.error(`[Steps] Response body: ${errorText}`);
    console.error(`[Steps] Request payload: ${JSON.stringify(payload, null, 2)}`);
    throw new Error(`Failed to post message: ${resp.status} ${resp.statusText} - ${errorText}`);
  }
  console.log(`[Steps] Successfully posted message to channel ${channelId}`);
}
