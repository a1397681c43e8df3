/**
 * Calendar date helpers. All arithmetic is done in UTC on `YYYY-MM-DD` strings.
 */

import type { IsoDate } from '../../types/core';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function toUtcMillis(date: IsoDate): number {
  const millis = Date.parse(`${date}T00:00:00Z`);
  if (Number.isNaN(millis)) {
    throw new RangeError(`Invalid calendar date: ${date}`);
  }
  return millis;
}

export function toIsoDate(date: Date): IsoDate {
  return date.toISOString().slice(0, 10);
}

export function todayIsoDate(now: Date = new Date()): IsoDate {
  return toIsoDate(now);
}

export function addDays(date: IsoDate, days: number): IsoDate {
  return toIsoDate(new Date(toUtcMillis(date) + days * MS_PER_DAY));
}

/**
 * Whole days from `from` to `to`; negative when `to` is earlier
 */
export function daysBetween(from: IsoDate, to: IsoDate): number {
  return Math.round((toUtcMillis(to) - toUtcMillis(from)) / MS_PER_DAY);
}

export function compareIsoDates(a: IsoDate, b: IsoDate): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function fromUnixSeconds(seconds: number): IsoDate {
  return toIsoDate(new Date(seconds * 1000));
}

export function dateRange(start: IsoDate, end: IsoDate): IsoDate[] {
  const dates: IsoDate[] = [];
  for (let current = start; compareIsoDates(current, end) <= 0; current = addDays(current, 1)) {
    dates.push(current);
  }
  return dates;
}
