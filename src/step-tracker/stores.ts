// Record types and the storage interfaces the step tracker reads and writes through.

import { IsoDate } from "./dates";

/**
 * Chat platform user id (Discord snowflake, kept as a decimal string).
 */
export type UserId = string;

export type Medal = "gold" | "silver" | "bronze";

/**
 * Display order of medals, best first. Index + 1 is the dense rank.
 */
export const MEDAL_ORDER: readonly Medal[] = ["gold", "silver", "bronze"];

export const MEDAL_SYMBOLS: Record<Medal, string> = {
  gold: "🥇",
  silver: "🥈",
  bronze: "🥉",
};

/**
 * Stored nickname for a chat user, so later reports can omit the #nick tag.
 */
export interface UserProfile {
  userId: UserId;
  nickname: string;
}

/**
 * One step count per (nickname, date).
 */
export interface StepRecord {
  userId: UserId | null;
  nickname: string;
  date: IsoDate;
  steps: number;
}

/**
 * One medal per (date, nickname).
 */
export interface AwardRecord {
  userId: UserId | null;
  nickname: string;
  date: IsoDate;
  medal: Medal;
}

/**
 * A chat message seen by the ingestion job.
 */
export interface LoggedMessage {
  messageId: string;
  channelId: string;
  userId: UserId | null;
  username: string | null;
  text: string;
  timestamp: string;   // ISO timestamp
  expireAt: string;    // ISO timestamp after which the store may drop it
}

export interface ProfileStore {
  findByUserId(userId: UserId): Promise<UserProfile | null>;
  upsert(profile: UserProfile): Promise<void>;
}

export interface ReportStore {
  /** Inserts or overwrites the record for (nickname, date). */
  upsertByKey(record: StepRecord): Promise<void>;
  /** Records with from <= date <= to, ordered by date. */
  queryRange(from: IsoDate, to: IsoDate): Promise<StepRecord[]>;
  queryDay(date: IsoDate): Promise<StepRecord[]>;
}

export interface AwardStore {
  findByKey(date: IsoDate, nickname: string): Promise<AwardRecord | null>;
  /** Inserts or overwrites the award for (date, nickname). */
  upsert(award: AwardRecord): Promise<void>;
  queryDay(date: IsoDate): Promise<AwardRecord[]>;
  remove(date: IsoDate, nickname: string): Promise<void>;
}

export interface MessageLog {
  /**
   * Marks the message id as processed unless it was processed before, and keeps
   * a copy of the message until its expireAt. Returns true when it was new.
   * The processed marker outlives the copy.
   */
  recordIfNew(message: LoggedMessage): Promise<boolean>;
}

export interface Stores {
  profiles: ProfileStore;
  reports: ReportStore;
  awards: AwardStore;
  messages: MessageLog;
}

export function reportKey(nickname: string, date: IsoDate): string {
  return `${nickname}_${date}`;
}

export function awardKey(date: IsoDate, nickname: string): string {
  return `${date}_${nickname}`;
}
