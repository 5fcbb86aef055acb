// Literal strings and line shapes of the documents the engine writes.
// Parser and renderer both go through this module so they cannot drift apart.

export const WEEK_TITLE_PREFIX = '🗓️ Week';
export const TOPICS_HEADING = '✅ Topics';
export const NOTES_HEADING = '📝 Notes';
export const DAY_TASKS_HEADING = 'Tareas del Día';
export const DAY_COMPLETED_HEADING = 'Tareas Completadas';
export const DAY_NOTES_HEADING = '📝 Notas';
export const MONTH_TOPICS_HEADING = '📋 MonthTopics';
export const YEAR_TOPICS_HEADING = '📌 YearTopics';
export const WEIGHT_MARKER = '⚖️';
export const YEAR_TITLE_PREFIX = '📅';

export const INDENT_UNIT = '  ';

const SEASON_EMOJIS = ['❄️', '❄️', '🌱', '🌱', '🌱', '☀️', '☀️', '☀️', '🍂', '🍂', '🍂', '❄️'];

export function seasonEmoji(month: number): string {
  const emoji = SEASON_EMOJIS[month - 1];
  if (emoji === undefined) {
    throw new RangeError(`Month out of range: ${month}`);
  }
  return emoji;
}

/** Month rollup title text, e.g. "July Topics ☀️". */
export function monthTitle(month: number, monthNames: readonly string[]): string {
  const name = monthNames[month - 1];
  if (name === undefined) {
    throw new RangeError(`Month out of range: ${month}`);
  }
  return `${name} Topics ${seasonEmoji(month)}`;
}

export function yearTitle(year: number): string {
  return `${YEAR_TITLE_PREFIX} ${year}`;
}

export function heading(level: number, text: string): string {
  return `${'#'.repeat(level)} ${text}`;
}

export interface HeadingLine {
  level: number;
  text: string;
}

const HEADING_RE = /^(#{1,6})\s+(.*?)\s*$/;

export function parseHeading(line: string): HeadingLine | null {
  const match = line.match(HEADING_RE);
  if (!match) return null;
  return { level: match[1].length, text: match[2] };
}

// 1: leading whitespace, 2: checkbox state, 3: text after the checkbox
const TASK_LINE_RE = /^(\s*)[-*+]\s+\[( |x|X)\](?: (.*))?$/;

export interface TaskLine {
  level: number;      // Indentation measured in INDENT_UNITs
  completed: boolean;
  text: string;
}

export function parseTaskLine(line: string): TaskLine | null {
  const match = line.match(TASK_LINE_RE);
  if (!match) return null;
  return {
    level: indentLevel(match[1]),
    completed: match[2].toLowerCase() === 'x',
    text: match[3] ?? '',
  };
}

export function formatTaskLine(depth: number, completed: boolean, text: string): string {
  return `${INDENT_UNIT.repeat(depth)}- [${completed ? 'x' : ' '}] ${text}`;
}

/** Tabs count as one unit each, spaces in pairs; an odd trailing space is dropped. */
function indentLevel(whitespace: string): number {
  let tabs = 0;
  let spaces = 0;
  for (const ch of whitespace) {
    if (ch === '\t') tabs++;
    else spaces++;
  }
  return tabs + Math.floor(spaces / INDENT_UNIT.length);
}

// Free text and source documents are stored as if they stood on their own;
// embedding them deeper in a rollup shifts every heading line with them.

export function shiftHeadings(text: string, offset: number): string {
  if (offset === 0 || text === '') return text;
  return text
    .split('\n')
    .map(line => (/^#+\s/.test(line) ? '#'.repeat(offset) + line : line))
    .join('\n');
}

export function unshiftHeadings(text: string, offset: number): string {
  if (offset === 0 || text === '') return text;
  const prefix = '#'.repeat(offset + 1);
  return text
    .split('\n')
    .map(line => (line.startsWith(prefix) && /^#+\s/.test(line) ? line.slice(offset) : line))
    .join('\n');
}

/** Text with blank lines dropped from both ends. */
export function trimBlankLines(text: string): string {
  const lines = text.split('\n');
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === '') start++;
  while (end > start && lines[end - 1].trim() === '') end--;
  return lines.slice(start, end).join('\n');
}
