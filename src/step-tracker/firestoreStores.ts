// Firestore-backed stores. Every record lives under a document id derived from
// its unique key, so a single set() is an atomic insert-or-overwrite.

import { Firestore } from "firebase-admin/firestore";
import { z } from "zod";
import { COLLECTIONS } from "../constants";
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

const userProfileSchema: z.ZodType<UserProfile> = z.object({
  userId: z.string(),
  nickname: z.string(),
});

const stepRecordSchema: z.ZodType<StepRecord> = z.object({
  userId: z.string().nullable(),
  nickname: z.string(),
  date: z.string(),
  steps: z.number().int().nonnegative(),
});

const awardRecordSchema: z.ZodType<AwardRecord> = z.object({
  userId: z.string().nullable(),
  nickname: z.string(),
  date: z.string(),
  medal: z.enum(["gold", "silver", "bronze"]),
});

// gRPC status returned by create() when the document id is taken
const ALREADY_EXISTS = 6;

export class FirestoreProfileStore implements ProfileStore {
  constructor(private readonly firestore: Firestore) {}

  async findByUserId(userId: string): Promise<UserProfile | null> {
    const doc = await this.firestore.collection(COLLECTIONS.users).doc(userId).get();
    return doc.exists ? userProfileSchema.parse(doc.data()) : null;
  }

  async upsert(profile: UserProfile): Promise<void> {
    await this.firestore.collection(COLLECTIONS.users).doc(profile.userId).set(profile);
  }
}

export class FirestoreReportStore implements ReportStore {
  constructor(private readonly firestore: Firestore) {}

  async upsertByKey(record: StepRecord): Promise<void> {
    await this.firestore
      .collection(COLLECTIONS.reports)
      .doc(reportKey(record.nickname, record.date))
      .set(record);
  }

  async queryRange(from: IsoDate, to: IsoDate): Promise<StepRecord[]> {
    const snapshot = await this.firestore
      .collection(COLLECTIONS.reports)
      .where("date", ">=", from)
      .where("date", "<=", to)
      .orderBy("date")
      .get();
    return snapshot.docs.map((doc) => stepRecordSchema.parse(doc.data()));
  }

  async queryDay(date: IsoDate): Promise<StepRecord[]> {
    const snapshot = await this.firestore
      .collection(COLLECTIONS.reports)
      .where("date", "==", date)
      .get();
    return snapshot.docs.map((doc) => stepRecordSchema.parse(doc.data()));
  }
}

export class FirestoreAwardStore implements AwardStore {
  constructor(private readonly firestore: Firestore) {}

  async findByKey(date: IsoDate, nickname: string): Promise<AwardRecord | null> {
    const doc = await this.firestore.collection(COLLECTIONS.medals).doc(awardKey(date, nickname)).get();
    return doc.exists ? awardRecordSchema.parse(doc.data()) : null;
  }

  async upsert(award: AwardRecord): Promise<void> {
    await this.firestore
      .collection(COLLECTIONS.medals)
      .doc(awardKey(award.date, award.nickname))
      .set(award);
  }

  async queryDay(date: IsoDate): Promise<AwardRecord[]> {
    const snapshot = await this.firestore
      .collection(COLLECTIONS.medals)
      .where("date", "==", date)
      .get();
    return snapshot.docs.map((doc) => awardRecordSchema.parse(doc.data()));
  }

  async remove(date: IsoDate, nickname: string): Promise<void> {
    await this.firestore.collection(COLLECTIONS.medals).doc(awardKey(date, nickname)).delete();
  }
}

export class FirestoreMessageLog implements MessageLog {
  constructor(private readonly firestore: Firestore) {}

  /**
   * Claims the id in `processedMessages` with create(), which fails for an
   * existing id, so two overlapping ingestion runs cannot both claim the same
   * message. The marker is permanent; the copy in `messages` is not.
   * Configure a Firestore TTL policy on `messages.expireAt` to expire old copies.
   */
  async recordIfNew(message: LoggedMessage): Promise<boolean> {
    try {
      await this.firestore
        .collection(COLLECTIONS.processedMessages)
        .doc(message.messageId)
        .create({ channelId: message.channelId, timestamp: message.timestamp });
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === ALREADY_EXISTS) {
        return false;
      }
      throw err;
    }
    await this.firestore
      .collection(COLLECTIONS.messages)
      .doc(message.messageId)
      .set({ ...message, expireAt: new Date(message.expireAt) });
    return true;
  }
}

export function createFirestoreStores(firestore: Firestore): Stores {
  return {
    profiles: new FirestoreProfileStore(firestore),
    reports: new FirestoreReportStore(firestore),
    awards: new FirestoreAwardStore(firestore),
    messages: new FirestoreMessageLog(firestore),
  };
}
