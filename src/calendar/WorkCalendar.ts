import type { LocationKind, WeekdayPattern, WorkCalendarConfig } from '../configLoader';
import { WEEKDAY_KEYS } from '../configLoader';
import type { IsoDate, LocationInfo } from '../types/journal';
import { isoWeekNumber, weekdayIndex } from '../utils/dates';
import type { CalendarProvider } from './CalendarProvider';

/**
 * Calendar backed by the `workCalendar` config section.
 *
 * Lookup order for a date: holiday, then vacation range (both mark the day
 * off and carry their name as note), then the weekday pattern. Alternating
 * weekdays pick `evenWeek` or `oddWeek` by the parity of the ISO week number.
 */
export class WorkCalendar implements CalendarProvider {
  private readonly holidays: Map<IsoDate, string>;

  constructor(private readonly config: WorkCalendarConfig) {
    this.holidays = new Map(config.holidays.map(h => [h.date, h.name] as const));
  }

  locationFor(date: IsoDate): LocationInfo {
    const holiday = this.holidays.get(date);
    if (holiday !== undefined) {
      return this.location('off', holiday);
    }

    const vacation = this.config.vacations.find(v => v.start <= date && date <= v.end);
    if (vacation) {
      return this.location('off', vacation.name);
    }

    const weekday = WEEKDAY_KEYS[weekdayIndex(date)];
    return this.location(this.resolvePattern(this.config.weekdays[weekday], date), null);
  }

  private resolvePattern(pattern: WeekdayPattern, date: IsoDate): LocationKind {
    if (typeof pattern === 'string') {
      return pattern;
    }
    return isoWeekNumber(date) % 2 === 0 ? pattern.evenWeek : pattern.oddWeek;
  }

  private location(kind: LocationKind, note: string | null): LocationInfo {
    return { kind, emoji: this.config.locations[kind], note };
  }
}
