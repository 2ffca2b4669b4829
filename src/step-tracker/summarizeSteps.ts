// Summarizes a user's step reports for the /mysteps command.

import { IsoDate } from "./dates";
import { StepRecord } from "./stores";

/**
 * Step statistics for one nickname over a date window.
 */
export interface PersonalStepStats {
  nickname: string;
  from: IsoDate;
  to: IsoDate;
  daysReported: number;
  totalSteps: number;
  averageSteps: number | null;                     // Per reported day
  bestDay: { date: IsoDate; steps: number } | null;
  history: StepRecord[];                           // Chronological
}

/**
 * Aggregates the records of a single nickname out of a window of reports.
 * Nicknames match exactly, as in the report keys, so each date counts once.
 * @param records Reports returned by ReportStore.queryRange(from, to)
 * @param nickname Nickname to summarize
 */
export function summarizeSteps(
  records: readonly StepRecord[],
  nickname: string,
  from: IsoDate,
  to: IsoDate
): PersonalStepStats {
  const history = records
    .filter((r) => r.nickname === nickname)
    .sort((a, b) => a.date.localeCompare(b.date));

  let totalSteps = 0;
  let bestDay: PersonalStepStats["bestDay"] = null;
  for (const record of history) {
    totalSteps += record.steps;
    if (bestDay === null || record.steps > bestDay.steps) {
      bestDay = { date: record.date, steps: record.steps };
    }
  }

  return {
    nickname,
    from,
    to,
    daysReported: history.length,
    totalSteps,
    averageSteps: history.length > 0 ? Math.round(totalSteps / history.length) : null,
    bestDay,
    history,
  };
}
