import type { TimeWindow } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * A parsed range endpoint. `instant` is set only when the caller gave an
 * explicit time of day, and always falls on `date`.
 */
export type DateInput = {
  date: string; // YYYY-MM-DD
  instant?: Date;
};

export function ymd(date: Date): string {
  const y = date.getUTCFullYear();
  const m = String(date.getUTCMonth() + 1).padStart(2, '0');
  const d = String(date.getUTCDate()).padStart(2, '0');
  return `${y}-${m}-${d}`;
}

function dayStartMs(date: string): number {
  const [y, m, d] = date.split('-').map(Number);
  return Date.UTC(y, m - 1, d);
}

function epochSeconds(instant: Date): number {
  return Math.floor(instant.getTime() / 1000);
}

/** Inclusive list of calendar dates from `start` to `end`. */
export function generateDateRange(start: string, end: string): string[] {
  const dates: string[] = [];
  const last = dayStartMs(end);
  for (let t = dayStartMs(start); t <= last; t += DAY_MS) {
    dates.push(ymd(new Date(t)));
  }
  return dates;
}

/**
 * Full UTC day `[00:00:00, 23:59:59]`, or a single instant when
 * `timeOverride` is given.
 */
export function dateToTimestamps(date: string, timeOverride?: Date): TimeWindow {
  if (timeOverride) {
    const t = epochSeconds(timeOverride);
    return { begin: t, end: t };
  }
  const begin = dayStartMs(date) / 1000;
  return { begin, end: begin + 86399 };
}

/**
 * Window for one date of a requested range. The first day starts at an
 * explicit start time, the last day ends at an explicit end time.
 */
export function windowForDate(date: string, start: DateInput, end: DateInput): TimeWindow {
  const day = dateToTimestamps(date);
  const begin = date === start.date && start.instant ? dateToTimestamps(date, start.instant).begin : day.begin;
  const finish = date === end.date && end.instant ? dateToTimestamps(date, end.instant).end : day.end;
  return { begin, end: finish };
}
