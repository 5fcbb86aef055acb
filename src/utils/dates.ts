import type { IsoDate } from '../types/journal';

// All arithmetic runs on UTC midnights so local time zones and DST never
// shift a journal date.

const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 86400000;

export function isIsoDate(value: string): boolean {
  const match = value.match(ISO_DATE_RE);
  if (!match) return false;
  const d = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  return formatIsoDate(d) === value;
}

export function toUtcDate(value: IsoDate): Date {
  if (!isIsoDate(value)) {
    throw new RangeError(`Invalid date "${value}", expected YYYY-MM-DD`);
  }
  return new Date(`${value}T00:00:00Z`);
}

export function formatIsoDate(date: Date): IsoDate {
  return date.toISOString().slice(0, 10);
}

export function addDays(value: IsoDate, days: number): IsoDate {
  return formatIsoDate(new Date(toUtcDate(value).getTime() + days * DAY_MS));
}

/** Every date from start to end, both included. */
export function enumerateDates(start: IsoDate, end: IsoDate): IsoDate[] {
  const dates: IsoDate[] = [];
  for (let current = start; current <= end; current = addDays(current, 1)) {
    dates.push(current);
  }
  return dates;
}

/** 0 = Monday ... 6 = Sunday */
export function weekdayIndex(value: IsoDate): number {
  return (toUtcDate(value).getUTCDay() + 6) % 7;
}

export function isoWeekNumber(value: IsoDate): number {
  const d = toUtcDate(value);
  const dayNum = d.getUTCDay() || 7; // Make Sunday = 7
  d.setUTCDate(d.getUTCDate() + 4 - dayNum); // Thursday of this week
  const yearStart = new Date(Date.UTC(d.getUTCFullYear(), 0, 1));
  return Math.ceil(((d.getTime() - yearStart.getTime()) / DAY_MS + 1) / 7);
}

export function yearOf(value: IsoDate): number {
  return Number(value.slice(0, 4));
}

export function monthOf(value: IsoDate): number {
  return Number(value.slice(5, 7));
}

export function pad2(value: number): string {
  return String(value).padStart(2, '0');
}
