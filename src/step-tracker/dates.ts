// Calendar date helpers. Dates travel through the bot as ISO strings (YYYY-MM-DD).

import { DateTime } from "luxon";

/**
 * A calendar day, formatted YYYY-MM-DD.
 */
export type IsoDate = string;

/**
 * Builds a calendar date, or null when the day/month combination does not exist.
 */
export function buildIsoDate(year: number, month: number, day: number): IsoDate | null {
  const date = DateTime.fromObject({ year, month, day }, { zone: "utc" });
  return date.isValid ? date.toISODate() : null;
}

/**
 * Reads a YYYY-MM-DD string, or null if it is not a real calendar day.
 */
export function parseIsoDate(value: string): IsoDate | null {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return null;
  const date = DateTime.fromISO(value, { zone: "utc" });
  return date.isValid ? date.toISODate() : null;
}

/**
 * The calendar day an instant falls on in the given time zone.
 */
export function isoDateIn(instant: Date, timeZone: string): IsoDate {
  return requireIsoDate(DateTime.fromJSDate(instant).setZone(timeZone));
}

export function todayIn(timeZone: string, now: Date = new Date()): IsoDate {
  return isoDateIn(now, timeZone);
}

export function yesterdayIn(timeZone: string, now: Date = new Date()): IsoDate {
  return addDays(todayIn(timeZone, now), -1);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return requireIsoDate(DateTime.fromISO(date, { zone: "utc" }).plus({ days }));
}

/**
 * Formats a calendar day as DD.MM.YYYY, the way sheet headers and summaries show it.
 */
export function formatDisplayDate(date: IsoDate): string {
  return DateTime.fromISO(date, { zone: "utc" }).toFormat("dd.MM.yyyy");
}

export function yearIn(instant: Date, timeZone: string): number {
  return DateTime.fromJSDate(instant).setZone(timeZone).year;
}

function requireIsoDate(date: DateTime): IsoDate {
  const iso = date.toISODate();
  if (iso === null) {
    throw new Error(`Invalid date: ${date.invalidExplanation ?? date.invalidReason}`);
  }
  return iso;
}
