import { LOCATION_KINDS, type LocationKind } from '../configLoader';
import { ParseError } from '../errors';
import type { DaySection, LocationInfo, MonthUnit, TaskForest, WeekDocument, WeekPeriod } from '../types/journal';
import { isIsoDate, isoWeekNumber } from '../utils/dates';
import {
  DAY_COMPLETED_HEADING,
  DAY_NOTES_HEADING,
  DAY_TASKS_HEADING,
  MONTH_TOPICS_HEADING,
  NOTES_HEADING,
  TOPICS_HEADING,
  WEEK_TITLE_PREFIX,
  WEIGHT_MARKER,
  parseHeading,
  trimBlankLines,
  unshiftHeadings,
} from './markdownFormat';
import { buildTaskForest } from './taskForest';

export interface ParseOptions {
  /** Location key → emoji, used to recognise the location of each day. */
  locations?: Partial<Record<LocationKind, string>>;
}

// 1: week number, 2: start, 3: end, 4: weight
const WEEK_RANGE_RE = new RegExp(
  `^(\\d+)\\s+·\\s+(\\d{4}-\\d{2}-\\d{2})\\s+→\\s+(\\d{4}-\\d{2}-\\d{2})(?:\\s+·\\s+${WEIGHT_MARKER}\\s+(\\d+(?:\\.\\d+)?))?$`,
  'u',
);
// 1: location emoji, 2: weekday name, 3: date, 4: holiday/vacation note
const DAY_HEADING_RE = /^(\S+)\s+(\S+)\s+(\d{4}-\d{2}-\d{2})(?:\s+\((.*)\))?$/;

type DayZone = 'none' | 'tasks' | 'completed' | 'notes';

interface DayDraft {
  date: string;
  weekdayName: string;
  location: LocationInfo;
  tasks: string[];
  completed: string[];
  notes: string[];
}

function splitLines(text: string): string[] {
  return text.replace(/\r\n?/g, '\n').split('\n');
}

function joinNotes(lines: readonly string[], offset: number): string {
  let end = lines.length;
  while (end > 0 && lines[end - 1].trim() === '') end--;
  return unshiftHeadings(lines.slice(0, end).join('\n'), offset);
}

interface WeekTitle {
  period: WeekPeriod;
  weight: number | null;
}

function parseWeekTitle(text: string): WeekTitle | null {
  if (!text.startsWith(WEEK_TITLE_PREFIX)) return null;
  const match = text.slice(WEEK_TITLE_PREFIX.length).trim().match(WEEK_RANGE_RE);
  if (!match || !isIsoDate(match[2]) || !isIsoDate(match[3])) return null;
  return {
    period: { weekNumber: Number(match[1]), startDate: match[2], endDate: match[3] },
    weight: match[4] !== undefined ? Number(match[4]) : null,
  };
}

function parseDayHeading(text: string, options: ParseOptions): Omit<DayDraft, 'tasks' | 'completed' | 'notes'> | null {
  const match = text.match(DAY_HEADING_RE);
  if (!match || !isIsoDate(match[3])) return null;
  const emoji = match[1];
  return {
    date: match[3],
    weekdayName: match[2],
    location: { kind: locationKindFor(emoji, options), emoji, note: match[4] ?? null },
  };
}

function locationKindFor(emoji: string, options: ParseOptions): LocationKind | null {
  const table: Partial<Record<LocationKind, string>> = options.locations ?? {};
  return LOCATION_KINDS.find(kind => table[kind] === emoji) ?? null;
}

// Membership of the completed zone is authoritative: a stray "[ ]" there is
// read as done so it can never be carried forward.
function markCompleted(forest: TaskForest): TaskForest {
  if (forest.nodes.every(node => node.completed)) return forest;
  return { nodes: forest.nodes.map(node => ({ ...node, completed: true })), roots: forest.roots };
}

/**
 * Parses the lines of one week document whose title sits at heading level
 * `offset + 1` (0 for a week file, 1 inside a month rollup, 2 inside a year).
 */
function parseWeekLines(lines: readonly string[], offset: number, options: ParseOptions): WeekDocument {
  const blank = lines.every(line => line.trim() === '');
  const titleLevel = offset + 1;
  const sectionLevel = offset + 2;
  const zoneLevel = offset + 3;

  let title: WeekTitle | null = null;
  let section: 'preamble' | 'topics' | 'notes' | 'day' | 'other' = 'preamble';
  let zone: DayZone = 'none';
  let sawZoneHeading = false;

  const objectiveLines: string[] = [];
  const noteLines: string[] = [];
  const days: DayDraft[] = [];
  let day: DayDraft | null = null;

  for (const line of lines) {
    const h = parseHeading(line);

    if (h && h.level <= titleLevel) {
      title = title ?? parseWeekTitle(h.text);
      section = 'other';
      day = null;
      continue;
    }

    if (h && h.level === sectionLevel) {
      day = null;
      if (h.text === TOPICS_HEADING) {
        section = 'topics';
      } else if (h.text === NOTES_HEADING) {
        section = 'notes';
      } else {
        const header = parseDayHeading(h.text, options);
        if (header) {
          day = { ...header, tasks: [], completed: [], notes: [] };
          days.push(day);
          section = 'day';
          zone = 'none';
        } else {
          section = 'other';
        }
      }
      continue;
    }

    if (day && h && h.level === zoneLevel) {
      if (h.text === DAY_TASKS_HEADING) {
        zone = 'tasks';
        sawZoneHeading = true;
        continue;
      }
      if (h.text === DAY_COMPLETED_HEADING) {
        zone = 'completed';
        sawZoneHeading = true;
        continue;
      }
      if (h.text === DAY_NOTES_HEADING) {
        zone = 'notes';
        continue;
      }
      // Unknown sub-heading: kept as part of the day's free text.
      zone = 'notes';
    }

    switch (section) {
      case 'topics':
        objectiveLines.push(line);
        break;
      case 'notes':
        noteLines.push(line);
        break;
      case 'day':
        if (!day) break;
        if (zone === 'tasks') day.tasks.push(line);
        else if (zone === 'completed') day.completed.push(line);
        else day.notes.push(line);
        break;
      default:
        break;
    }
  }

  if (!blank) {
    if (days.length === 0) {
      throw new ParseError('No day section heading found (expected e.g. "## 🏠 Monday 2026-02-16")');
    }
    if (!sawZoneHeading) {
      throw new ParseError(`No task zone heading found (expected "${DAY_TASKS_HEADING}" or "${DAY_COMPLETED_HEADING}")`);
    }
  }

  const sections: DaySection[] = days.map(draft => ({
    date: draft.date,
    weekdayName: draft.weekdayName,
    location: draft.location,
    tasks: buildTaskForest(draft.tasks),
    completed: markCompleted(buildTaskForest(draft.completed)),
    notes: joinNotes(draft.notes, offset),
  }));

  let period = title?.period ?? null;
  if (!period && sections.length > 0) {
    const first = sections[0].date;
    period = { weekNumber: isoWeekNumber(first), startDate: first, endDate: sections[sections.length - 1].date };
  }

  return {
    period,
    weight: title?.weight ?? null,
    objectives: buildTaskForest(objectiveLines),
    notes: joinNotes(noteLines, offset),
    days: sections,
    source: blank ? null : unshiftHeadings(lines.join('\n'), offset),
  };
}

/**
 * Parses the text of a week document into its structured model.
 * @throws ParseError when non-empty input has no day heading or no task zone heading.
 */
export function parseWeekDocument(text: string, options: ParseOptions = {}): WeekDocument {
  return parseWeekLines(splitLines(text), 0, options);
}

/**
 * Parses a month topics document or a month rollup. The (year, month) key
 * comes from the file name; the title is only checked for presence.
 */
export function parseMonthUnit(text: string, key: { year: number; month: number }, options: ParseOptions = {}): MonthUnit {
  return parseMonthLines(splitLines(text), key, 0, options);
}

function parseMonthLines(
  lines: readonly string[],
  key: { year: number; month: number },
  offset: number,
  options: ParseOptions,
): MonthUnit {
  const titleLevel = offset + 1;
  const sectionLevel = offset + 2;

  let sawTitle = false;
  let topicLines: string[] | null = null;
  const prefaceLines: string[] = [];
  const weekChunks: string[][] = [];
  let current: string[] | null = null;
  let inTopics = false;

  for (const line of lines) {
    const h = parseHeading(line);

    if (h && h.level <= titleLevel) {
      current = null;
      inTopics = false;
      if (!sawTitle) {
        sawTitle = true;
        continue;
      }
      prefaceLines.push(line);
      continue;
    }

    if (h && h.level === sectionLevel) {
      current = null;
      inTopics = false;
      if (h.text.startsWith(WEEK_TITLE_PREFIX)) {
        current = [line];
        weekChunks.push(current);
        continue;
      }
      if (h.text === MONTH_TOPICS_HEADING) {
        topicLines = topicLines ?? [];
        inTopics = true;
      }
      prefaceLines.push(line);
      continue;
    }

    if (current) {
      current.push(line);
      continue;
    }
    if (inTopics && topicLines) topicLines.push(line);
    prefaceLines.push(line);
  }

  if (!sawTitle && lines.some(line => line.trim() !== '')) {
    throw new ParseError('Missing month title (expected e.g. "# July Topics ☀️")');
  }

  const topics: TaskForest | null = topicLines ? buildTaskForest(topicLines) : null;
  const weeks = weekChunks.map(chunk => parseWeekLines(chunk, offset + 1, options));

  const blank = lines.every(line => line.trim() === '');
  return {
    year: key.year,
    month: key.month,
    topics,
    preface: unshiftHeadings(trimBlankLines(prefaceLines.join('\n')), offset),
    weeks: sortWeeksAscending(weeks),
    source: blank ? null : unshiftHeadings(lines.join('\n'), offset),
  };
}

function sortWeeksAscending(weeks: WeekDocument[]): WeekDocument[] {
  return [...weeks].sort((a, b) => (a.period?.startDate ?? '').localeCompare(b.period?.startDate ?? ''));
}

/**
 * Free-form document text without its `#` title, blank lines trimmed. Used
 * for documents such as YearTopics whose body has no fixed structure.
 */
export function documentBody(text: string): string {
  const lines = splitLines(text);
  const titleIndex = lines.findIndex(line => parseHeading(line)?.level === 1);
  const body = titleIndex === -1 ? lines : [...lines.slice(0, titleIndex), ...lines.slice(titleIndex + 1)];
  return trimBlankLines(body.join('\n'));
}
