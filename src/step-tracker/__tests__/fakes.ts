// In-process stand-ins for the Discord channel and the Google Sheet.

import type { IsoDate } from "../dates";
import type { ChatChannel } from "../discordChannel";
import type { ChatMessage } from "../fetchMessages";
import { appendMedalSymbol, stripMedalSymbols } from "../formatUtils";
import type { CellSink } from "../sheetsService";

export class FakeChannel implements ChatChannel {
  /** Newest first, as Discord returns them. */
  messages: ChatMessage[] = [];
  replies: { messageId: string; text: string }[] = [];
  posts: string[] = [];

  async fetchMessages(since: Date): Promise<ChatMessage[]> {
    return this.messages.filter((m) => new Date(m.timestamp) >= since);
  }

  async reply(messageId: string, text: string): Promise<void> {
    this.replies.push({ messageId, text });
  }

  async post(text: string): Promise<void> {
    this.posts.push(text);
  }
}

export class FakeSheet implements CellSink {
  cells = new Map<string, string>();

  async writeSteps(nickname: string, date: IsoDate, steps: number): Promise<void> {
    this.cells.set(`${nickname}|${date}`, String(steps));
  }

  async writeMedal(nickname: string, date: IsoDate, symbol: string): Promise<void> {
    const key = `${nickname}|${date}`;
    this.cells.set(key, appendMedalSymbol(this.cells.get(key) ?? "", symbol));
  }

  async clearMedal(nickname: string, date: IsoDate): Promise<void> {
    const key = `${nickname}|${date}`;
    const current = this.cells.get(key);
    if (current !== undefined) this.cells.set(key, stripMedalSymbols(current));
  }
}

export function makeMessage(overrides: Partial<ChatMessage> = {}): ChatMessage {
  return {
    id: "m1",
    channelId: "reports",
    authorId: "1",
    authorName: "alice_discord",
    isBot: false,
    content: "#отчет #alice 1.5.2024 8000",
    timestamp: "2024-05-01T10:00:00.000Z",
    ...overrides,
  };
}
