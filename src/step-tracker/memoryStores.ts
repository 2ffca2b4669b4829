// In-process stores keyed the same way as the Firestore collections.
// Used with STORE_BACKEND=memory and by the tests.

import { IsoDate } from "./dates";
import {
  AwardRecord,
  AwardStore,
  awardKey,
  LoggedMessage,
  MessageLog,
  ProfileStore,
  reportKey,
  ReportStore,
  StepRecord,
  Stores,
  UserProfile,
} from "./stores";

export class MemoryProfileStore implements ProfileStore {
  readonly profiles = new Map<string, UserProfile>();
  writes = 0;

  async findByUserId(userId: string): Promise<UserProfile | null> {
    const profile = this.profiles.get(userId);
    return profile ? { ...profile } : null;
  }

  async upsert(profile: UserProfile): Promise<void> {
    this.writes++;
    this.profiles.set(profile.userId, { ...profile });
  }
}

export class MemoryReportStore implements ReportStore {
  readonly records = new Map<string, StepRecord>();

  async upsertByKey(record: StepRecord): Promise<void> {
    this.records.set(reportKey(record.nickname, record.date), { ...record });
  }

  async queryRange(from: IsoDate, to: IsoDate): Promise<StepRecord[]> {
    return [...this.records.values()]
      .filter((r) => r.date >= from && r.date <= to)
      .sort((a, b) => a.date.localeCompare(b.date))
      .map((r) => ({ ...r }));
  }

  async queryDay(date: IsoDate): Promise<StepRecord[]> {
    return this.queryRange(date, date);
  }
}

export class MemoryAwardStore implements AwardStore {
  readonly awards = new Map<string, AwardRecord>();

  async findByKey(date: IsoDate, nickname: string): Promise<AwardRecord | null> {
    const award = this.awards.get(awardKey(date, nickname));
    return award ? { ...award } : null;
  }

  async upsert(award: AwardRecord): Promise<void> {
    this.awards.set(awardKey(award.date, award.nickname), { ...award });
  }

  async queryDay(date: IsoDate): Promise<AwardRecord[]> {
    return [...this.awards.values()].filter((a) => a.date === date).map((a) => ({ ...a }));
  }

  async remove(date: IsoDate, nickname: string): Promise<void> {
    this.awards.delete(awardKey(date, nickname));
  }
}

export class MemoryMessageLog implements MessageLog {
  readonly processed = new Set<string>();
  readonly messages = new Map<string, LoggedMessage>();

  async recordIfNew(message: LoggedMessage): Promise<boolean> {
    if (this.processed.has(message.messageId)) return false;
    this.processed.add(message.messageId);
    this.messages.set(message.messageId, { ...message });
    return true;
  }

  /**
   * Drops message copies whose expireAt has passed, as a Firestore TTL policy would.
   */
  purgeExpired(now: Date): void {
    for (const [id, message] of this.messages) {
      if (new Date(message.expireAt) <= now) this.messages.delete(id);
    }
  }
}

export function createMemoryStores(): Stores {
  return {
    profiles: new MemoryProfileStore(),
    reports: new MemoryReportStore(),
    awards: new MemoryAwardStore(),
    messages: new MemoryMessageLog(),
  };
}
