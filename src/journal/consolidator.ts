import { NoDataError, PartialDataWarning } from '../errors';
import type { MonthUnit, WeekDocument, YearUnit } from '../types/journal';
import { pad2 } from '../utils/dates';

export interface KeyedWeek {
  year: number;
  month: number;
  week: number;
  doc: WeekDocument;
}

function weekStart(entry: KeyedWeek): string {
  return entry.doc.period?.startDate ?? '';
}

/**
 * Gathers the weeks filed under (year, month) into one month unit, weeks
 * ascending by start date (the renderer reverses them). The month's topics
 * document, when given, is carried over whole: its task section and any
 * text around it.
 * @throws NoDataError when no week matches.
 */
export function consolidateMonth(
  weeks: readonly KeyedWeek[],
  target: { year: number; month: number },
  topicsDocument: MonthUnit | null = null,
): MonthUnit {
  const matching = weeks
    .filter(entry => entry.year === target.year && entry.month === target.month)
    .sort((a, b) => weekStart(a).localeCompare(weekStart(b)) || a.week - b.week);

  if (matching.length === 0) {
    throw new NoDataError(`No weekly documents found for ${target.year}-${pad2(target.month)}`);
  }

  return {
    year: target.year,
    month: target.month,
    topics: topicsDocument?.topics ?? null,
    preface: topicsDocument?.preface ?? '',
    weeks: matching.map(entry => entry.doc),
    source: null,
  };
}

export interface YearConsolidation {
  unit: YearUnit;
  warning: PartialDataWarning | null;
}

/**
 * Gathers the month rollups of one year. A month without a rollup is a gap
 * when it falls before the latest month present or within `expectedThrough`;
 * gaps come back as a warning, not a failure.
 * @throws NoDataError when no month matches.
 */
export function consolidateYear(
  months: readonly MonthUnit[],
  year: number,
  expectedThrough: number,
  topics: string | null = null,
): YearConsolidation {
  const matching = months.filter(unit => unit.year === year).sort((a, b) => a.month - b.month);
  if (matching.length === 0) {
    throw new NoDataError(`No monthly rollups found for ${year}`);
  }

  const present = new Set(matching.map(unit => unit.month));
  const through = Math.max(expectedThrough, matching[matching.length - 1].month);
  const missing: number[] = [];
  for (let month = 1; month <= through; month++) {
    if (!present.has(month)) missing.push(month);
  }

  return {
    unit: { year, topics, months: matching },
    warning: missing.length > 0 ? new PartialDataWarning(year, missing) : null,
  };
}

/** Last month a year's rollup should contain, given today's date. */
export function expectedMonthsThrough(year: number, today: Date): number {
  const currentYear = today.getUTCFullYear();
  if (year < currentYear) return 12;
  if (year > currentYear) return 0;
  return today.getUTCMonth() + 1;
}
