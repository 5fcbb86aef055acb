import type { DaySection, MonthUnit, WeekDocument, YearUnit } from '../types/journal';
import { pad2 } from '../utils/dates';
import {
  DAY_COMPLETED_HEADING,
  DAY_NOTES_HEADING,
  DAY_TASKS_HEADING,
  MONTH_TOPICS_HEADING,
  NOTES_HEADING,
  TOPICS_HEADING,
  WEEK_TITLE_PREFIX,
  WEIGHT_MARKER,
  YEAR_TOPICS_HEADING,
  heading,
  monthTitle,
  shiftHeadings,
  trimBlankLines,
  yearTitle,
} from './markdownFormat';
import { renderForest } from './taskForest';

function weekTitle(doc: WeekDocument): string | null {
  if (!doc.period) return null;
  const { weekNumber, startDate, endDate } = doc.period;
  const weight = doc.weight !== null ? ` · ${WEIGHT_MARKER} ${doc.weight}` : '';
  return `${WEEK_TITLE_PREFIX} ${pad2(weekNumber)} · ${startDate} → ${endDate}${weight}`;
}

function dayTitle(day: DaySection): string {
  const note = day.location.note ? ` (${day.location.note})` : '';
  return `${day.location.emoji} ${day.weekdayName} ${day.date}${note}`;
}

function notesLines(notes: string, offset: number): string[] {
  return notes === '' ? [] : shiftHeadings(notes, offset).split('\n');
}

// Text as written, pushed down `offset` heading levels and closed by one blank line.
function embeddedLines(text: string, offset: number): string[] {
  const trimmed = trimBlankLines(text);
  return trimmed === '' ? [] : [...shiftHeadings(trimmed, offset).split('\n'), ''];
}

/**
 * Week document lines with its title at level `offset + 1`; the last line is
 * blank. A document read from disk is embedded as written.
 */
export function renderWeekLines(doc: WeekDocument, offset: number): string[] {
  if (doc.source !== null) {
    return embeddedLines(doc.source, offset);
  }

  const lines: string[] = [];
  const title = weekTitle(doc);
  if (title) {
    lines.push(heading(offset + 1, title), '');
  }

  lines.push(heading(offset + 2, TOPICS_HEADING), ...renderForest(doc.objectives), '');
  lines.push(heading(offset + 2, NOTES_HEADING), ...notesLines(doc.notes, offset), '');

  for (const day of doc.days) {
    lines.push(
      heading(offset + 2, dayTitle(day)),
      heading(offset + 3, DAY_TASKS_HEADING),
      ...renderForest(day.tasks),
      heading(offset + 3, DAY_COMPLETED_HEADING),
      ...renderForest(day.completed),
      heading(offset + 3, DAY_NOTES_HEADING),
      ...notesLines(day.notes, offset),
      '',
    );
  }
  return lines;
}

export function renderWeek(doc: WeekDocument): string {
  return renderWeekLines(doc, 0).join('\n');
}

/**
 * Month lines; weeks are written most recent first. The preface, when there
 * is one, stands in for the topics section.
 */
export function renderMonthLines(unit: MonthUnit, offset: number, monthNames: readonly string[]): string[] {
  if (unit.source !== null) {
    return embeddedLines(unit.source, offset);
  }

  const lines: string[] = [heading(offset + 1, monthTitle(unit.month, monthNames)), ''];
  if (unit.preface !== '') {
    lines.push(...embeddedLines(unit.preface, offset));
  } else if (unit.topics) {
    lines.push(heading(offset + 2, MONTH_TOPICS_HEADING), ...renderForest(unit.topics), '');
  }
  for (const week of [...unit.weeks].reverse()) {
    lines.push(...renderWeekLines(week, offset + 1));
  }
  return lines;
}

export function renderMonthUnit(unit: MonthUnit, monthNames: readonly string[]): string {
  return renderMonthLines(unit, 0, monthNames).join('\n');
}

export function renderYearUnit(unit: YearUnit, monthNames: readonly string[]): string {
  const lines: string[] = [heading(1, yearTitle(unit.year)), ''];
  if (unit.topics !== null && trimBlankLines(unit.topics) !== '') {
    lines.push(heading(2, YEAR_TOPICS_HEADING), ...embeddedLines(unit.topics, 1));
  }
  for (const month of [...unit.months].reverse()) {
    lines.push(...renderMonthLines(month, 1, monthNames));
  }
  return lines.join('\n');
}
