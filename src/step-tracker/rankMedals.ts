// Dense ranking of one day's step records into gold, silver and bronze.

import { Medal, MEDAL_ORDER, StepRecord } from "./stores";

/**
 * A step record that earned a medal.
 */
export interface RankedEntry {
  record: StepRecord;
  medal: Medal;
}

/**
 * Awards medals for a single calendar day using dense ranking: records with
 * the same step count share a medal, and only the top three distinct step
 * values are awarded.
 * @param records All step records for one day
 * @returns Medal winners, best first (ties ordered by nickname)
 */
export function rankMedals(records: readonly StepRecord[]): RankedEntry[] {
  const sorted = [...records].sort(
    (a, b) => b.steps - a.steps || compareNicknames(a.nickname, b.nickname)
  );

  const ranked: RankedEntry[] = [];
  let rank = 0;
  let previousSteps: number | null = null;
  for (const record of sorted) {
    if (record.steps !== previousSteps) {
      rank++;
      previousSteps = record.steps;
    }
    if (rank > MEDAL_ORDER.length) break;
    ranked.push({ record, medal: MEDAL_ORDER[rank - 1] });
  }
  return ranked;
}

function compareNicknames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
