import { describe, it, expect, beforeEach } from "vitest";
import { handleReport, ingestReports, IngestDependencies, replyFor } from "../ingestReports";
import { MemoryMessageLog, MemoryProfileStore, MemoryReportStore } from "../memoryStores";
import type { ProfileStore, ReportStore } from "../stores";
import { FakeChannel, FakeSheet, makeMessage } from "./fakes";

const SINCE = new Date("2024-05-01T00:00:00.000Z");

describe("ingestReports", () => {
  let channel: FakeChannel;
  let reports: MemoryReportStore;
  let profiles: MemoryProfileStore;
  let sheet: FakeSheet;
  let messages: MemoryMessageLog;
  let deps: IngestDependencies;

  beforeEach(() => {
    channel = new FakeChannel();
    reports = new MemoryReportStore();
    profiles = new MemoryProfileStore();
    sheet = new FakeSheet();
    messages = new MemoryMessageLog();
    deps = {
      channel,
      messages,
      profiles,
      reports,
      sheet,
      timeZone: "Europe/Moscow",
    };
  });

  it("stores a report, mirrors it to the sheet and confirms it", async () => {
    channel.messages = [makeMessage()];

    const summary = await ingestReports(SINCE, deps);

    expect(summary).toEqual({ fetched: 1, duplicates: 0, reports: 1, accepted: 1, rejected: 0, failed: 0 });
    expect(await reports.queryDay("2024-05-01")).toEqual([
      { userId: "1", nickname: "alice", date: "2024-05-01", steps: 8000 },
    ]);
    expect(sheet.cells.get("alice|2024-05-01")).toBe("8000");
    expect(channel.replies).toEqual([{ messageId: "m1", text: "#alice - принято" }]);
  });

  it("rejects a report without a nickname from an unknown user", async () => {
    channel.messages = [makeMessage({ content: "#отчет 1.5.2024 8000" })];

    const summary = await ingestReports(SINCE, deps);

    expect(summary.rejected).toBe(1);
    expect(reports.records.size).toBe(0);
    expect(channel.replies).toEqual([{ messageId: "m1", text: "Отсутствует #ник" }]);
  });

  it("rejects a report without a step count", async () => {
    channel.messages = [makeMessage({ content: "#отчет #alice 1.5.2024" })];

    await ingestReports(SINCE, deps);

    expect(reports.records.size).toBe(0);
    expect(channel.replies).toEqual([{ messageId: "m1", text: "Отсутствует количество шагов" }]);
  });

  it("remembers the nickname for later reports from the same user", async () => {
    channel.messages = [
      makeMessage({ id: "m2", content: "#отчет 2.5.2024 9000", timestamp: "2024-05-02T10:00:00.000Z" }),
      makeMessage({ id: "m1" }),
    ];

    await ingestReports(SINCE, deps);

    expect(await reports.queryDay("2024-05-02")).toEqual([
      { userId: "1", nickname: "alice", date: "2024-05-02", steps: 9000 },
    ]);
    expect(channel.replies.map((r) => r.text)).toEqual(["#alice - принято", "#alice - принято"]);
  });

  it("lets a later report for the same day overwrite the earlier one", async () => {
    channel.messages = [
      makeMessage({ id: "m2", content: "#отчет #alice 1.5.2024 9500", timestamp: "2024-05-01T12:00:00.000Z" }),
      makeMessage({ id: "m1" }),
    ];

    await ingestReports(SINCE, deps);

    expect(reports.records.size).toBe(1);
    expect((await reports.queryDay("2024-05-01"))[0].steps).toBe(9500);
  });

  it("processes each message once across overlapping runs", async () => {
    channel.messages = [makeMessage()];

    await ingestReports(SINCE, deps);
    const second = await ingestReports(SINCE, deps);

    expect(second).toEqual({ fetched: 1, duplicates: 1, reports: 0, accepted: 0, rejected: 0, failed: 0 });
    expect(channel.replies).toHaveLength(1);
    expect(reports.records.size).toBe(1);
  });

  it("does not reprocess a message once its logged copy has expired", async () => {
    channel.messages = [makeMessage()];
    await ingestReports(SINCE, deps);

    messages.purgeExpired(new Date("2024-06-01T00:00:00.000Z"));
    expect(messages.messages.size).toBe(0);
    const second = await ingestReports(SINCE, deps);

    expect(second.duplicates).toBe(1);
    expect(second.accepted).toBe(0);
    expect(channel.replies).toHaveLength(1);
  });

  it("ignores chat that is not a report and messages from bots", async () => {
    channel.messages = [
      makeMessage({ id: "m3", content: "#отчет #bot 5000", isBot: true }),
      makeMessage({ id: "m2", content: "good morning, 8000 steps already" }),
    ];

    const summary = await ingestReports(SINCE, deps);

    expect(summary.reports).toBe(0);
    expect(reports.records.size).toBe(0);
    expect(channel.replies).toEqual([]);
  });

  it("files a report without a date under the posting day in the configured zone", async () => {
    // 22:30 UTC is already the next day in Moscow
    channel.messages = [makeMessage({ content: "#отчет #alice 7000", timestamp: "2024-05-01T22:30:00.000Z" })];

    await ingestReports(SINCE, deps);

    expect(await reports.queryDay("2024-05-02")).toEqual([
      { userId: "1", nickname: "alice", date: "2024-05-02", steps: 7000 },
    ]);
  });

  it("replies with an error when the report store fails", async () => {
    const failingReports: ReportStore = {
      upsertByKey: async () => {
        throw new Error("store unavailable");
      },
      queryRange: async () => [],
      queryDay: async () => [],
    };
    channel.messages = [makeMessage()];

    const summary = await ingestReports(SINCE, { ...deps, reports: failingReports });

    expect(summary.failed).toBe(1);
    expect(channel.replies).toEqual([{ messageId: "m1", text: "Ошибка сохранения данных" }]);
    expect(sheet.cells.size).toBe(0);
  });

  it("falls back to the parsed nickname when the profile lookup fails", async () => {
    const brokenProfiles: ProfileStore = {
      findByUserId: async () => {
        throw new Error("profiles unavailable");
      },
      upsert: async () => undefined,
    };
    channel.messages = [makeMessage()];

    const summary = await ingestReports(SINCE, { ...deps, profiles: brokenProfiles });

    expect(summary.accepted).toBe(1);
    expect(await reports.queryDay("2024-05-01")).toEqual([
      { userId: "1", nickname: "alice", date: "2024-05-01", steps: 8000 },
    ]);
    expect(channel.replies).toEqual([{ messageId: "m1", text: "#alice - принято" }]);
  });

  it("rejects a report without a nickname when the profile lookup fails", async () => {
    const brokenProfiles: ProfileStore = {
      findByUserId: async () => {
        throw new Error("profiles unavailable");
      },
      upsert: async () => undefined,
    };
    channel.messages = [makeMessage({ content: "#отчет 1.5.2024 8000" })];

    const summary = await ingestReports(SINCE, { ...deps, profiles: brokenProfiles });

    expect(summary.rejected).toBe(1);
    expect(reports.records.size).toBe(0);
    expect(channel.replies).toEqual([{ messageId: "m1", text: "Отсутствует #ник" }]);
  });

  it("accepts the report when only the sheet write fails", async () => {
    const outcome = await handleReport(makeMessage(), {
      profiles,
      reports,
      timeZone: "Europe/Moscow",
      sheet: {
        writeSteps: async () => {
          throw new Error("sheet offline");
        },
        writeMedal: async () => undefined,
        clearMedal: async () => undefined,
      },
    });

    expect(outcome.status).toBe("accepted");
    expect(reports.records.size).toBe(1);
  });
});

describe("replyFor", () => {
  it("maps outcomes to reply texts", () => {
    expect(replyFor({ status: "rejected", reason: "missing-steps" })).toBe("Отсутствует количество шагов");
    expect(replyFor({ status: "failed", error: new Error("x") })).toBe("Ошибка сохранения данных");
  });
});
