// Thin Discord REST client: authorization header plus rate limit handling.

import { z } from "zod";
import { DISCORD_API_BASE, INITIAL_BACKOFF_MS, MAX_BACKOFF_MS } from "../constants";

const rateLimitSchema = z.object({
  retry_after: z.number().optional(),
});

/**
 * Sends a request to the Discord API, waiting and retrying while rate limited (HTTP 429).
 * @param path API path, e.g. /channels/123/messages
 * @param token Discord bot token
 * @param init Method and JSON body, if any
 * @returns The first response that is not a 429
 */
export async function discordRequest(
  path: string,
  token: string,
  init: { method?: string; body?: unknown } = {}
): Promise<Response> {
  const url = `${DISCORD_API_BASE}${path}`;
  const headers: Record<string, string> = { Authorization: `Bot ${token}` };
  if (init.body !== undefined) headers["Content-Type"] = "application/json";

  let backoff = INITIAL_BACKOFF_MS;
  for (;;) {
    const response = await fetch(url, {
      method: init.method ?? "GET",
      headers,
      body: init.body !== undefined ? JSON.stringify(init.body) : undefined,
    });
    if (response.status !== 429) {
      return response;
    }
    // Rate limited, wait and retry
    const data = rateLimitSchema.safeParse(await response.json());
    const retryAfter = data.success && data.data.retry_after !== undefined
      ? Math.ceil(data.data.retry_after * 1000)
      : backoff;
    console.warn(`[Steps] discordRequest: Rate limited on ${path}. Retrying after ${retryAfter}ms.`);
    await new Promise((res) => setTimeout(res, retryAfter));
    backoff = Math.min(backoff * 2, MAX_BACKOFF_MS); // Exponential backoff, max 30s
  }
}
