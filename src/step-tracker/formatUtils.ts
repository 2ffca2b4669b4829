// Shared formatting utilities for step reports and medals

import { formatDisplayDate, IsoDate } from "./dates";
import { RankedEntry } from "./rankMedals";
import { Medal, MEDAL_ORDER, MEDAL_SYMBOLS } from "./stores";

const KNOWN_SYMBOLS = Object.values(MEDAL_SYMBOLS);

/**
 * Formats a step count with space-separated thousands (12000 -> "12 000").
 */
export function formatSteps(steps: number): string {
  return steps.toString().replace(/\B(?=(\d{3})+(?!\d))/g, " ");
}

/**
 * Prefixes a nickname with # unless it already has one.
 */
export function formatNickname(nickname: string): string {
  return nickname.startsWith("#") ? nickname : `#${nickname}`;
}

/**
 * Renders the medal summary for a day. Tied winners share one line.
 * @param date The day the medals are for
 * @param ranked Output of rankMedals
 */
export function renderMedalSummary(date: IsoDate, ranked: readonly RankedEntry[]): string {
  const byMedal = new Map<Medal, RankedEntry[]>();
  for (const entry of ranked) {
    const group = byMedal.get(entry.medal) ?? [];
    group.push(entry);
    byMedal.set(entry.medal, group);
  }

  const lines = [`Медали за ${formatDisplayDate(date)}:`];
  for (const medal of MEDAL_ORDER) {
    const winners = byMedal.get(medal);
    if (!winners || winners.length === 0) continue;
    const nicknames = winners.map((w) => formatNickname(w.record.nickname)).join(", ");
    lines.push(`${MEDAL_SYMBOLS[medal]} ${nicknames} — ${formatSteps(winners[0].record.steps)} шагов`);
  }
  return lines.join("\n");
}

/**
 * Puts a medal symbol after the existing cell text, replacing any medal
 * symbol already there. Applying it twice gives the same text as once.
 * @param cellText Current cell content (e.g. "8500")
 * @param symbol Medal symbol to append
 */
export function appendMedalSymbol(cellText: string, symbol: string): string {
  const stripped = stripMedalSymbols(cellText);
  return stripped ? `${stripped} ${symbol}` : symbol;
}

/**
 * Removes every medal symbol from a cell ("1000 🥉" -> "1000").
 */
export function stripMedalSymbols(cellText: string): string {
  let stripped = cellText;
  for (const known of KNOWN_SYMBOLS) {
    stripped = stripped.split(known).join("");
  }
  return stripped.trimEnd();
}
