// Daily medal job: ranks a day's reports, stores the awards, annotates the
// sheet and posts the summary.

import { IsoDate } from "./dates";
import { ChatChannel } from "./discordChannel";
import { renderMedalSummary } from "./formatUtils";
import { RankedEntry, rankMedals } from "./rankMedals";
import { CellSink } from "./sheetsService";
import { AwardRecord, AwardStore, MEDAL_SYMBOLS, ReportStore } from "./stores";

export interface MedalDependencies {
  reports: ReportStore;
  awards: AwardStore;
  sheet: CellSink | null;
  summaryChannel: ChatChannel | null;
}

/**
 * Awards gold, silver and bronze for one calendar day.
 * Safe to re-run: awards are keyed by (date, nickname), sheet symbols replace each other,
 * and nicknames that fell off the podium lose their earlier award.
 * @param date The day to award
 * @returns The medal winners, best first
 */
export async function assignMedalsForDay(date: IsoDate, deps: MedalDependencies): Promise<RankedEntry[]> {
  console.log(`[Steps] assignMedalsForDay: Running medal assignment for ${date}`);
  const records = await deps.reports.queryDay(date);
  if (records.length === 0) {
    console.log(`[Steps] assignMedalsForDay: No step reports for ${date}, skipping medals.`);
    return [];
  }

  const ranked = rankMedals(records);
  await clearStaleAwards(date, ranked, deps);
  for (const { record, medal } of ranked) {
    try {
      const existing = await deps.awards.findByKey(date, record.nickname);
      if (existing === null || existing.medal !== medal || existing.userId !== record.userId) {
        await deps.awards.upsert({ userId: record.userId, nickname: record.nickname, date, medal });
      }
    } catch (err) {
      console.error(`[Steps] assignMedalsForDay: Failed to save medal for ${record.nickname}:`, err);
    }

    if (deps.sheet) {
      try {
        await deps.sheet.writeMedal(record.nickname, date, MEDAL_SYMBOLS[medal]);
      } catch (err) {
        console.error(`[Steps] assignMedalsForDay: Failed to write medal to sheet for ${record.nickname}:`, err);
      }
    }
  }

  console.log(
    `[Steps] assignMedalsForDay: Awarded ${ranked.map((r) => `${r.record.nickname}=${r.medal}`).join(", ")} for ${date}`
  );

  if (deps.summaryChannel) {
    try {
      await deps.summaryChannel.post(renderMedalSummary(date, ranked));
    } catch (err) {
      console.error(`[Steps] assignMedalsForDay: Failed to post medal summary:`, err);
    }
  }
  return ranked;
}

// Awards from an earlier run whose nickname is no longer on the podium
async function clearStaleAwards(date: IsoDate, ranked: readonly RankedEntry[], deps: MedalDependencies): Promise<void> {
  const winners = new Set(ranked.map((r) => r.record.nickname));
  let stale: AwardRecord[];
  try {
    stale = (await deps.awards.queryDay(date)).filter((award) => !winners.has(award.nickname));
  } catch (err) {
    console.error(`[Steps] assignMedalsForDay: Failed to load existing medals for ${date}:`, err);
    return;
  }
  for (const award of stale) {
    try {
      await deps.awards.remove(date, award.nickname);
      console.log(`[Steps] assignMedalsForDay: Removed stale ${award.medal} medal of ${award.nickname} for ${date}`);
    } catch (err) {
      console.error(`[Steps] assignMedalsForDay: Failed to remove stale medal for ${award.nickname}:`, err);
    }

    if (deps.sheet) {
      try {
        await deps.sheet.clearMedal(award.nickname, date);
      } catch (err) {
        console.error(`[Steps] assignMedalsForDay: Failed to clear sheet medal for ${award.nickname}:`, err);
      }
    }
  }
}
