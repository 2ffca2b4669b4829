// Orchestrates fetching, parsing, validating and storing step reports from the chat channel.

import { MESSAGE_RETENTION_MS, REPLIES } from "../constants";
import { isoDateIn, yearIn } from "./dates";
import { ChatChannel } from "./discordChannel";
import { ChatMessage } from "./fetchMessages";
import { isStepReport, parseStepReport } from "./parseStepReport";
import { resolveNickname } from "./resolveNickname";
import { CellSink } from "./sheetsService";
import { MessageLog, ProfileStore, ReportStore, StepRecord } from "./stores";

export interface IngestDependencies {
  channel: ChatChannel;
  messages: MessageLog;
  profiles: ProfileStore;
  reports: ReportStore;
  sheet: CellSink | null;
  timeZone: string;         // Used for the default report date and year
}

export type ReportOutcome =
  | { status: "accepted"; record: StepRecord }
  | { status: "rejected"; reason: "missing-nickname" | "missing-steps" }
  | { status: "failed"; error: unknown };

export interface IngestSummary {
  fetched: number;      // Messages returned by the channel
  duplicates: number;   // Already processed by an earlier run
  reports: number;      // New messages that were step reports
  accepted: number;
  rejected: number;
  failed: number;
}

/**
 * Processes every new report message posted since a given time and replies to each.
 * Messages seen by an earlier run are skipped, so windows may overlap.
 * @param since Only consider messages after this time
 */
export async function ingestReports(since: Date, deps: IngestDependencies): Promise<IngestSummary> {
  const summary: IngestSummary = { fetched: 0, duplicates: 0, reports: 0, accepted: 0, rejected: 0, failed: 0 };
  const messages = await deps.channel.fetchMessages(since);
  summary.fetched = messages.length;

  // Discord returns newest first; process in posting order so later reports win
  for (const msg of [...messages].reverse()) {
    if (msg.isBot) continue;
    const isNew = await deps.messages.recordIfNew({
      messageId: msg.id,
      channelId: msg.channelId,
      userId: msg.authorId,
      username: msg.authorName,
      text: msg.content,
      timestamp: msg.timestamp,
      expireAt: new Date(new Date(msg.timestamp).getTime() + MESSAGE_RETENTION_MS).toISOString(),
    });
    if (!isNew) {
      summary.duplicates++;
      continue;
    }
    if (!isStepReport(msg.content)) continue;

    summary.reports++;
    const outcome = await handleReport(msg, deps);
    summary[outcome.status]++;
    try {
      await deps.channel.reply(msg.id, replyFor(outcome));
    } catch (err) {
      console.error(`[Steps] ingestReports: Failed to reply to message ${msg.id}:`, err);
    }
  }

  console.log(`[Steps] ingestReports: ${JSON.stringify(summary)}`);
  return summary;
}

/**
 * Turns one report message into a stored step record.
 */
export async function handleReport(
  msg: ChatMessage,
  deps: Omit<IngestDependencies, "channel" | "messages">
): Promise<ReportOutcome> {
  const postedAt = new Date(msg.timestamp);
  const parsed = parseStepReport(msg.content, yearIn(postedAt, deps.timeZone));

  let nickname: string | null;
  try {
    nickname = await resolveNickname(deps.profiles, msg.authorId, parsed.nickname);
  } catch (err) {
    console.error(`[Steps] handleReport: Failed to resolve nickname for ${msg.authorId}:`, err);
    nickname = parsed.nickname;
  }

  if (!nickname) {
    return { status: "rejected", reason: "missing-nickname" };
  }
  if (parsed.steps === null) {
    return { status: "rejected", reason: "missing-steps" };
  }

  const record: StepRecord = {
    userId: msg.authorId,
    nickname,
    date: parsed.date ?? isoDateIn(postedAt, deps.timeZone),
    steps: parsed.steps,
  };

  try {
    await deps.reports.upsertByKey(record);
  } catch (err) {
    console.error(`[Steps] handleReport: Failed to store report for ${nickname}:`, err);
    return { status: "failed", error: err };
  }

  if (deps.sheet) {
    try {
      await deps.sheet.writeSteps(record.nickname, record.date, record.steps);
    } catch (err) {
      console.error(`[Steps] handleReport: Failed to write steps to sheet for ${nickname}:`, err);
    }
  }

  return { status: "accepted", record };
}

export function replyFor(outcome: ReportOutcome): string {
  switch (outcome.status) {
    case "accepted":
      return REPLIES.accepted(outcome.record.nickname);
    case "rejected":
      return outcome.reason === "missing-nickname" ? REPLIES.missingNickname : REPLIES.missingSteps;
    case "failed":
      return REPLIES.storeFailed;
  }
}
