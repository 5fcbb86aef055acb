import { pad2 } from '../utils/dates';

export type VaultDocumentKey =
  | { type: 'week'; year: number; month: number; week: number }
  | { type: 'monthTopics'; year: number; month: number }
  | { type: 'monthRollup'; year: number; month: number }
  | { type: 'yearTopics'; year: number }
  | { type: 'yearRollup'; year: number };

export type WeekKey = Extract<VaultDocumentKey, { type: 'week' }>;

const WEEK_NAME_RE = /^\[(\d{4})\]\[(\d{2})\]Week(\d{2})\.md$/;
const MONTH_TOPICS_NAME_RE = /^\[(\d{4})\]\[(\d{2})\]MonthTopics\.md$/;
const MONTH_ROLLUP_NAME_RE = /^\[(\d{4})\]\[(\d{2})\]\.md$/;
// Month 00 holds the documents that belong to the whole year.
const YEAR_TOPICS_NAME_RE = /^\[(\d{4})\]\[00\]YearTopics\.md$/;
const YEAR_ROLLUP_NAME_RE = /^\[(\d{4})\]\.md$/;

function validMonth(month: number): boolean {
  return month >= 1 && month <= 12;
}

/** Recognises the file names the engine writes; anything else yields null. */
export function parseDocumentName(fileName: string): VaultDocumentKey | null {
  let match = fileName.match(WEEK_NAME_RE);
  if (match) {
    const month = Number(match[2]);
    return validMonth(month) ? { type: 'week', year: Number(match[1]), month, week: Number(match[3]) } : null;
  }
  match = fileName.match(MONTH_TOPICS_NAME_RE);
  if (match) {
    const month = Number(match[2]);
    return validMonth(month) ? { type: 'monthTopics', year: Number(match[1]), month } : null;
  }
  match = fileName.match(MONTH_ROLLUP_NAME_RE);
  if (match) {
    const month = Number(match[2]);
    return validMonth(month) ? { type: 'monthRollup', year: Number(match[1]), month } : null;
  }
  match = fileName.match(YEAR_TOPICS_NAME_RE);
  if (match) {
    return { type: 'yearTopics', year: Number(match[1]) };
  }
  match = fileName.match(YEAR_ROLLUP_NAME_RE);
  if (match) {
    return { type: 'yearRollup', year: Number(match[1]) };
  }
  return null;
}

export function documentName(key: VaultDocumentKey): string {
  switch (key.type) {
    case 'week':
      return `[${key.year}][${pad2(key.month)}]Week${pad2(key.week)}.md`;
    case 'monthTopics':
      return `[${key.year}][${pad2(key.month)}]MonthTopics.md`;
    case 'monthRollup':
      return `[${key.year}][${pad2(key.month)}].md`;
    case 'yearTopics':
      return `[${key.year}][00]YearTopics.md`;
    case 'yearRollup':
      return `[${key.year}].md`;
  }
}

// ISO week 1 can start in late December and weeks 52/53 can start in early
// January, so the raw week number does not order weeks inside those months.
function weekOrdinal(key: WeekKey): number {
  if (key.month === 12 && key.week < 10) return key.week + 53;
  if (key.month === 1 && key.week > 50) return key.week - 53;
  return key.week;
}

/** Chronological order of week files by their (year, month, week) key. */
export function compareWeekKeys(a: WeekKey, b: WeekKey): number {
  return a.year - b.year || a.month - b.month || weekOrdinal(a) - weekOrdinal(b);
}
