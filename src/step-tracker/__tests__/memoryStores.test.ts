import { describe, it, expect } from "vitest";
import { MemoryAwardStore, MemoryMessageLog, MemoryReportStore } from "../memoryStores";
import type { LoggedMessage } from "../stores";

describe("MemoryReportStore", () => {
  it("keeps one record per (nickname, date) with the latest steps", async () => {
    const reports = new MemoryReportStore();
    await reports.upsertByKey({ userId: "1", nickname: "alice", date: "2024-05-01", steps: 8000 });
    await reports.upsertByKey({ userId: "1", nickname: "alice", date: "2024-05-01", steps: 8000 });
    await reports.upsertByKey({ userId: "1", nickname: "alice", date: "2024-05-01", steps: 9100 });

    expect(await reports.queryDay("2024-05-01")).toEqual([
      { userId: "1", nickname: "alice", date: "2024-05-01", steps: 9100 },
    ]);
  });

  it("queries an inclusive date range in date order", async () => {
    const reports = new MemoryReportStore();
    await reports.upsertByKey({ userId: null, nickname: "a", date: "2024-05-03", steps: 3 });
    await reports.upsertByKey({ userId: null, nickname: "a", date: "2024-05-01", steps: 1 });
    await reports.upsertByKey({ userId: null, nickname: "a", date: "2024-04-30", steps: 0 });
    await reports.upsertByKey({ userId: null, nickname: "a", date: "2024-05-04", steps: 4 });

    const range = await reports.queryRange("2024-05-01", "2024-05-03");
    expect(range.map((r) => r.date)).toEqual(["2024-05-01", "2024-05-03"]);
  });
});

describe("MemoryAwardStore", () => {
  it("overwrites the award for the same (date, nickname)", async () => {
    const awards = new MemoryAwardStore();
    await awards.upsert({ userId: null, nickname: "alice", date: "2024-05-01", medal: "silver" });
    await awards.upsert({ userId: null, nickname: "alice", date: "2024-05-01", medal: "gold" });

    expect(awards.awards.size).toBe(1);
    expect(await awards.findByKey("2024-05-01", "alice")).toEqual({
      userId: null,
      nickname: "alice",
      date: "2024-05-01",
      medal: "gold",
    });
    expect(await awards.findByKey("2024-05-02", "alice")).toBeNull();
  });

  it("lists and removes the awards of a day", async () => {
    const awards = new MemoryAwardStore();
    await awards.upsert({ userId: null, nickname: "alice", date: "2024-05-01", medal: "gold" });
    await awards.upsert({ userId: null, nickname: "bob", date: "2024-05-01", medal: "silver" });
    await awards.upsert({ userId: null, nickname: "alice", date: "2024-05-02", medal: "bronze" });

    await awards.remove("2024-05-01", "alice");

    expect(await awards.queryDay("2024-05-01")).toEqual([
      { userId: null, nickname: "bob", date: "2024-05-01", medal: "silver" },
    ]);
  });
});

describe("MemoryMessageLog", () => {
  it("records a message id only once", async () => {
    const log = new MemoryMessageLog();
    const message: LoggedMessage = {
      messageId: "m1",
      channelId: "c1",
      userId: "1",
      username: "alice",
      text: "#отчет #alice 8000",
      timestamp: "2024-05-01T10:00:00.000Z",
      expireAt: "2024-05-02T10:00:00.000Z",
    };
    expect(await log.recordIfNew(message)).toBe(true);
    expect(await log.recordIfNew(message)).toBe(false);
  });

  it("remembers processed ids after the message copy expires", async () => {
    const log = new MemoryMessageLog();
    const message: LoggedMessage = {
      messageId: "m1",
      channelId: "c1",
      userId: "1",
      username: "alice",
      text: "#отчет #alice 8000",
      timestamp: "2024-05-01T10:00:00.000Z",
      expireAt: "2024-05-02T10:00:00.000Z",
    };
    await log.recordIfNew(message);

    log.purgeExpired(new Date("2024-05-02T09:59:59.000Z"));
    expect(log.messages.has("m1")).toBe(true);
    log.purgeExpired(new Date("2024-05-02T10:00:00.000Z"));
    expect(log.messages.has("m1")).toBe(false);

    expect(await log.recordIfNew(message)).toBe(false);
  });
});
