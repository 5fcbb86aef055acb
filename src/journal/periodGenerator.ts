import type { CalendarProvider } from '../calendar/CalendarProvider';
import type { CarryoverSet, DaySection, IsoDate, MonthUnit, TaskForest, WeekDocument } from '../types/journal';
import { EMPTY_FOREST } from '../types/journal';
import { addDays, enumerateDates, isoWeekNumber, monthOf, toUtcDate, weekdayIndex, yearOf } from '../utils/dates';
import { copyForest } from './taskForest';

export interface WeekRange {
  startDate: IsoDate;
  endDate: IsoDate;
}

export interface WeekGenerationInput extends WeekRange {
  carryover: CarryoverSet;
  calendar: CalendarProvider;
  weekdayNames: readonly string[]; // Monday first
  weight?: number | null;
}

/** Range that follows a finished week: starts the next day and spans `length` days. */
export function nextWeekRange(lastEndDate: IsoDate, length: number): WeekRange {
  const startDate = addDays(lastEndDate, 1);
  return { startDate, endDate: addDays(startDate, length - 1) };
}

export function validateRange(range: WeekRange): void {
  toUtcDate(range.startDate);
  toUtcDate(range.endDate);
  if (range.startDate > range.endDate) {
    throw new RangeError(`Start date ${range.startDate} is after end date ${range.endDate}`);
  }
}

/**
 * Builds the week that covers the given range. Every carried day task lands
 * on the first day; the rest of the days start empty.
 */
export function generateWeekDocument(input: WeekGenerationInput): WeekDocument {
  validateRange(input);

  const days: DaySection[] = enumerateDates(input.startDate, input.endDate).map((date, i) => ({
    date,
    weekdayName: input.weekdayNames[weekdayIndex(date)] ?? '',
    location: input.calendar.locationFor(date),
    tasks: i === 0 ? copyForest(input.carryover.dayTasks) : EMPTY_FOREST,
    completed: EMPTY_FOREST,
    notes: '',
  }));

  return {
    period: {
      weekNumber: isoWeekNumber(input.startDate),
      startDate: input.startDate,
      endDate: input.endDate,
    },
    weight: input.weight ?? null,
    objectives: copyForest(input.carryover.objectives),
    notes: '',
    days,
    source: null,
  };
}

/** (year, month) key a generated week is filed under. */
export function weekKeyOf(doc: WeekDocument): { year: number; month: number; week: number } | null {
  if (!doc.period) return null;
  return {
    year: yearOf(doc.period.startDate),
    month: monthOf(doc.period.startDate),
    week: doc.period.weekNumber,
  };
}

export function nextMonth(year: number, month: number): { year: number; month: number } {
  return month === 12 ? { year: year + 1, month: 1 } : { year, month: month + 1 };
}

/** MonthTopics skeleton holding the carried topics and no weeks. */
export function generateMonthTopics(year: number, month: number, topics: TaskForest): MonthUnit {
  return { year, month, topics: copyForest(topics), preface: '', weeks: [], source: null };
}
