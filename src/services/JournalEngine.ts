import type { CalendarProvider } from '../calendar/CalendarProvider';
import { WorkCalendar } from '../calendar/WorkCalendar';
import type { AppConfig } from '../configLoader';
import {
  AlreadyExistsError,
  BracketsError,
  InvalidInputError,
  NoBaselineError,
  ParseError,
  SourceRemovalWarning,
  type OperationWarning,
} from '../errors';
import { consolidateMonth, consolidateYear, expectedMonthsThrough, type KeyedWeek } from '../journal/consolidator';
import { documentBody, parseMonthUnit, parseWeekDocument, type ParseOptions } from '../journal/contentParser';
import { renderMonthUnit, renderWeek, renderYearUnit } from '../journal/markdownRenderer';
import { generateMonthTopics, generateWeekDocument, nextMonth, nextWeekRange, validateRange, weekKeyOf, type WeekRange } from '../journal/periodGenerator';
import { resolveCarryover, resolveMonthCarryover } from '../journal/taskCarryover';
import { log, LogLevel } from '../logger';
import type { CarryoverSet, DaySection, MonthUnit, WeekDocument } from '../types/journal';
import { EMPTY_FOREST } from '../types/journal';
import { pad2 } from '../utils/dates';
import { compareWeekKeys, type VaultDocumentKey, type WeekKey } from '../vault/fileNaming';
import type { StoredDocument, VaultStore } from '../vault/VaultStore';

export type EngineConfig = Pick<AppConfig, 'locale' | 'week' | 'workCalendar'>;

export interface JournalEngineOptions {
  config: EngineConfig;
  store: VaultStore;
  calendar?: CalendarProvider;
  /** Clock used to decide which months a yearly rollup should contain. */
  today?: () => Date;
}

export interface ConsolidationOptions {
  overwrite?: boolean;
  removeSources?: boolean;
}

export interface WeeklyOptions {
  /** Body weight written into the new week's title. */
  weight?: number;
}

export type Outcome<T> = ({ success: true } & T) | { success: false; error: BracketsError };

export type OperationResult = Outcome<{
  path: string;
  warnings: OperationWarning[];
  summary: string[];
}>;

export type ListResult = Outcome<{ weeks: StoredDocument<WeekKey>[] }>;

interface Written {
  path: string;
  warnings?: OperationWarning[];
  summary?: string[];
}

/**
 * Entry point for every journal operation: generating the next week or
 * month topics document, and consolidating weeks into month rollups and
 * month rollups into a year.
 *
 * Failures the user can act on come back as `{ success: false, error }`;
 * anything else is a bug and propagates.
 */
export class JournalEngine {
  private readonly logMsg = '[JournalEngine]';
  private readonly config: EngineConfig;
  private readonly store: VaultStore;
  private readonly calendar: CalendarProvider;
  private readonly today: () => Date;
  private readonly parseOptions: ParseOptions;

  constructor(options: JournalEngineOptions) {
    this.config = options.config;
    this.store = options.store;
    this.calendar = options.calendar ?? new WorkCalendar(options.config.workCalendar);
    this.today = options.today ?? (() => new Date());
    this.parseOptions = { locations: options.config.workCalendar.locations };
  }

  /**
   * Writes the next week document. With an explicit range the dates are used
   * as given and nothing is carried; otherwise the week following the latest
   * week file is generated with its pending tasks.
   */
  generateWeekly(range?: WeekRange, options: WeeklyOptions = {}): OperationResult {
    return this.run('generate-weekly', () => {
      const weight = options.weight ?? null;
      if (weight !== null && !(Number.isFinite(weight) && weight > 0)) {
        throw new InvalidInputError(`Weight must be a positive number, got ${weight}`);
      }

      let target: WeekRange;
      let carryover: CarryoverSet;
      let source: string | null = null;

      if (range) {
        this.checkRange(range);
        target = range;
        carryover = { objectives: EMPTY_FOREST, dayTasks: EMPTY_FOREST };
      } else {
        const latest = this.latestWeek();
        const doc = this.readWeek(latest.path);
        if (!doc.period) {
          throw new ParseError('Week document has no header and no day sections', latest.path);
        }
        target = nextWeekRange(doc.period.endDate, this.config.week.length);
        carryover = resolveCarryover(doc);
        source = latest.path;
      }

      const week = generateWeekDocument({
        ...target,
        carryover,
        calendar: this.calendar,
        weekdayNames: this.config.locale.weekdayNames,
        weight,
      });
      const key = weekKeyOf(week);
      if (!key) {
        throw new InvalidInputError(`Cannot name a week for ${target.startDate} → ${target.endDate}`);
      }

      const path = this.store.write({ type: 'week', ...key }, renderWeek(week));
      const summary = [
        source ? `Carried from ${source}` : 'Manual range, nothing carried',
        `Objectives carried: ${carryover.objectives.nodes.length}`,
        `Tasks carried: ${carryover.dayTasks.nodes.length}`,
        ...(weight !== null ? [`⚖️ Weight recorded: ${weight}`] : []),
        ...week.days.map(describeDay),
      ];
      return { path, summary };
    });
  }

  /**
   * Writes a MonthTopics document holding the pending topics of the month
   * before it. Without a target, the month after the latest topics document.
   */
  generateMonthlyTopics(target?: { year: number; month: number }): OperationResult {
    return this.run('generate-monthly', () => {
      const existing = this.store.list('monthTopics');
      let key: { year: number; month: number };

      if (target) {
        this.checkMonth(target.month);
        key = target;
      } else {
        const latest = [...existing].sort((a, b) => a.key.year - b.key.year || a.key.month - b.key.month).pop();
        if (!latest) {
          throw new NoBaselineError(`No MonthTopics document found in ${this.store.root}`);
        }
        key = nextMonth(latest.key.year, latest.key.month);
      }

      const previousKey = key.month === 1 ? { year: key.year - 1, month: 12 } : { year: key.year, month: key.month - 1 };
      const previous = existing.find(doc => doc.key.year === previousKey.year && doc.key.month === previousKey.month);
      const topics = previous ? resolveMonthCarryover(this.readMonth(previous.path, previousKey)) : EMPTY_FOREST;

      const unit = generateMonthTopics(key.year, key.month, topics);
      const path = this.store.write({ type: 'monthTopics', ...key }, renderMonthUnit(unit, this.config.locale.monthNames));
      return {
        path,
        summary: [
          previous ? `Carried from ${previous.path}` : 'No previous month topics, nothing carried',
          `Topics carried: ${topics.nodes.length}`,
        ],
      };
    });
  }

  consolidateMonth(year: number, month: number, options: ConsolidationOptions = {}): OperationResult {
    return this.run('consolidate-month', () => {
      this.checkMonth(month);
      const rollupKey: VaultDocumentKey = { type: 'monthRollup', year, month };
      this.refuseExisting(rollupKey, options);

      const sources = this.store.list('week').filter(doc => doc.key.year === year && doc.key.month === month);
      const weeks: KeyedWeek[] = sources.map(doc => ({ ...doc.key, doc: this.readWeek(doc.path) }));

      const topicsDoc = this.store.list('monthTopics').find(doc => doc.key.year === year && doc.key.month === month);
      const topics = topicsDoc ? this.readMonth(topicsDoc.path, { year, month }) : null;

      const unit = consolidateMonth(weeks, { year, month }, topics);
      const path = this.store.write(rollupKey, renderMonthUnit(unit, this.config.locale.monthNames), {
        overwrite: options.overwrite,
      });

      const consumed = sources.map(doc => doc.path);
      if (topicsDoc) consumed.push(topicsDoc.path);
      const warnings = options.removeSources ? this.removeSources(consumed) : [];

      return {
        path,
        warnings,
        summary: [
          `Weeks (most recent first): ${[...unit.weeks].reverse().map(weekLabel).join(', ')}`,
          topicsDoc ? `MonthTopics included from ${topicsDoc.path}` : 'No MonthTopics document',
        ],
      };
    });
  }

  /**
   * Builds the year rollup from the month rollups already written, with the
   * year's YearTopics document on top when there is one. Months without a
   * rollup leave a gap and a PartialDataWarning. The YearTopics document is
   * never removed.
   */
  consolidateYear(year: number, options: ConsolidationOptions = {}): OperationResult {
    return this.run('consolidate-year', () => {
      const rollupKey: VaultDocumentKey = { type: 'yearRollup', year };
      this.refuseExisting(rollupKey, options);

      const sources = this.store.list('monthRollup').filter(doc => doc.key.year === year);
      const months = sources.map(doc => this.readMonth(doc.path, doc.key));
      const topicsKey: VaultDocumentKey = { type: 'yearTopics', year };
      const topics = this.store.exists(topicsKey) ? documentBody(this.store.read(this.store.pathFor(topicsKey))) : null;

      const { unit, warning } = consolidateYear(months, year, expectedMonthsThrough(year, this.today()), topics);
      const path = this.store.write(rollupKey, renderYearUnit(unit, this.config.locale.monthNames), {
        overwrite: options.overwrite,
      });

      const warnings: OperationWarning[] = warning ? [warning] : [];
      if (options.removeSources) {
        warnings.push(...this.removeSources(sources.map(doc => doc.path)));
      }

      return {
        path,
        warnings,
        summary: [
          `Months (most recent first): ${unit.months.map(m => pad2(m.month)).reverse().join(', ')}`,
          topics !== null ? `YearTopics included from ${this.store.pathFor(topicsKey)}` : 'No YearTopics document',
        ],
      };
    });
  }

  /** The most recent `count` week files, oldest first. */
  listWeeks(count = 5): ListResult {
    try {
      const weeks = this.store.list('week').sort((a, b) => compareWeekKeys(a.key, b.key));
      return { success: true, weeks: count > 0 ? weeks.slice(-count) : [] };
    } catch (error) {
      return this.fail('list', error);
    }
  }

  private run(operation: string, body: () => Written): OperationResult {
    log(LogLevel.DEBUG, `${this.logMsg} ${operation} started`);
    try {
      const written = body();
      const warnings = written.warnings ?? [];
      for (const warning of warnings) {
        log(LogLevel.WARN, `${this.logMsg} ${operation}: ${warning.message}`);
      }
      log(LogLevel.INFO, `${this.logMsg} ${operation} wrote ${written.path}`);
      return { success: true, path: written.path, warnings, summary: written.summary ?? [] };
    } catch (error) {
      return this.fail(operation, error);
    }
  }

  private fail(operation: string, error: unknown): { success: false; error: BracketsError } {
    if (!(error instanceof BracketsError)) {
      throw error;
    }
    log(LogLevel.ERROR, `${this.logMsg} ${operation} failed (${error.kind})${error.path ? ` at ${error.path}` : ''}: ${error.message}`);
    return { success: false, error };
  }

  private latestWeek(): StoredDocument<WeekKey> {
    const weeks = this.store.list('week').sort((a, b) => compareWeekKeys(a.key, b.key));
    const latest = weeks[weeks.length - 1];
    if (!latest) {
      throw new NoBaselineError(`No weekly document found in ${this.store.root}; pass --start and --end to create the first one`);
    }
    return latest;
  }

  private readWeek(path: string): WeekDocument {
    const text = this.store.read(path);
    try {
      return parseWeekDocument(text, this.parseOptions);
    } catch (error) {
      throw error instanceof ParseError ? error.withPath(path) : error;
    }
  }

  private readMonth(path: string, key: { year: number; month: number }): MonthUnit {
    const text = this.store.read(path);
    try {
      return parseMonthUnit(text, key, this.parseOptions);
    } catch (error) {
      throw error instanceof ParseError ? error.withPath(path) : error;
    }
  }

  private refuseExisting(key: VaultDocumentKey, options: ConsolidationOptions): void {
    // Checked before any source is read so a rejected run touches nothing.
    if (!options.overwrite && this.store.exists(key)) {
      throw new AlreadyExistsError(this.store.pathFor(key));
    }
  }

  private removeSources(paths: readonly string[]): SourceRemovalWarning[] {
    const warnings: SourceRemovalWarning[] = [];
    for (const path of paths) {
      try {
        this.store.remove(path);
      } catch (error) {
        warnings.push(new SourceRemovalWarning(path, error));
      }
    }
    return warnings;
  }

  private checkMonth(month: number): void {
    if (!Number.isInteger(month) || month < 1 || month > 12) {
      throw new InvalidInputError(`Month must be between 1 and 12, got ${month}`);
    }
  }

  private checkRange(range: WeekRange): void {
    try {
      validateRange(range);
    } catch (error) {
      if (error instanceof RangeError) {
        throw new InvalidInputError(error.message);
      }
      throw error;
    }
  }
}

function describeDay(day: DaySection): string {
  const note = day.location.note ? ` (${day.location.note})` : '';
  return `${day.location.emoji} ${day.weekdayName} ${day.date}${note}`;
}

function weekLabel(week: WeekDocument): string {
  return week.period ? `Week ${pad2(week.period.weekNumber)}` : 'Week ??';
}
