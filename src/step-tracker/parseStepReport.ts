// Parses free-form step report messages into nickname, date and step count.

import { REPORT_TAG } from "../constants";
import { buildIsoDate, IsoDate } from "./dates";

/**
 * Fields pulled out of a report message. Any of them may be missing.
 */
export interface CandidateRecord {
  nickname: string | null;  // First hash tag other than the report marker
  date: IsoDate | null;     // Report day, if the message names a valid one
  steps: number | null;     // Step count
}

// #word, where word is Unicode letters, marks, digits or underscore
const HASH_TAG = /#([\p{L}\p{M}\p{N}_]+)/gu;

// D.M[.Y] or D/M[/Y]; the separator must repeat consistently
const DATE_PATTERN = /(?<!\d)(\d{1,2})([./])(\d{1,2})(?:\2(\d{4}|\d{2}))?(?!\d)/;

const INTEGER_TOKEN = /(?<!\d)\d+(?!\d)/;

/**
 * Checks if a message content is a step report (contains the #отчет tag).
 * @param content The message content
 */
export function isStepReport(content: string): boolean {
  return content.toLowerCase().includes(`#${REPORT_TAG}`);
}

/**
 * Parses a step report. Components may appear in any order:
 *   #отчет #nickname dd.mm.yyyy number_of_steps
 * Never throws; fields that cannot be found are null.
 * @param content The message content
 * @param referenceYear Year used when the date has none (defaults to the current year)
 */
export function parseStepReport(content: string, referenceYear: number = new Date().getFullYear()): CandidateRecord {
  return {
    nickname: parseNickname(content),
    date: parseReportDate(content, referenceYear),
    steps: parseSteps(content),
  };
}

/**
 * Finds the first date in the text and resolves it to a calendar day.
 * An invalid first match yields null; later matches are not considered.
 */
export function parseReportDate(content: string, referenceYear: number): IsoDate | null {
  const match = content.match(DATE_PATTERN);
  if (!match) return null;
  const day = parseInt(match[1], 10);
  const month = parseInt(match[3], 10);
  const year = resolveYear(match[4], referenceYear);
  return buildIsoDate(year, month, day);
}

// --- Private helpers ---

function parseNickname(content: string): string | null {
  for (const match of content.matchAll(HASH_TAG)) {
    const tag = match[1];
    if (tag.toLowerCase() !== REPORT_TAG) {
      return tag;
    }
  }
  return null;
}

function resolveYear(yearText: string | undefined, referenceYear: number): number {
  if (yearText === undefined) return referenceYear;
  const value = parseInt(yearText, 10);
  return yearText.length === 2 ? 2000 + value : value;
}

/**
 * Strips dates and hash tags so their digits are never read as the step count,
 * then takes the first standalone integer.
 */
function parseSteps(content: string): number | null {
  const cleaned = content
    .replace(new RegExp(DATE_PATTERN.source, "g"), " ")
    .replace(HASH_TAG, " ");
  const match = cleaned.match(INTEGER_TOKEN);
  if (!match) return null;
  const steps = Number(match[0]);
  return Number.isSafeInteger(steps) ? steps : null;
}
