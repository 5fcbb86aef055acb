import type { LocationKind } from '../configLoader';

/** Calendar date as `YYYY-MM-DD`. */
export type IsoDate = string;

/**
 * One checklist line. Nodes live in a TaskForest arena and point at each
 * other through indices, so a forest can be copied or serialised as plain data.
 * A parent always sits at a lower index than its children.
 */
export interface TaskNode {
  readonly text: string;        // Text after the checkbox marker, e.g. "Call the bank"
  readonly completed: boolean;  // true for "- [x]"
  readonly depth: number;       // 0 for top-level nodes; children are depth + 1
  readonly parent: number | null;
  readonly children: readonly number[]; // Source order
}

export interface TaskForest {
  readonly nodes: readonly TaskNode[];
  readonly roots: readonly number[];
}

export interface LocationInfo {
  kind: LocationKind | null; // null when the emoji is not in the configured table
  emoji: string;
  note: string | null;       // Holiday or vacation name
}

export interface DaySection {
  date: IsoDate;
  weekdayName: string;
  location: LocationInfo;
  tasks: TaskForest;        // "Tareas del Día"
  completed: TaskForest;    // "Tareas Completadas"
  notes: string;            // Opaque, preserved verbatim
}

export interface WeekPeriod {
  weekNumber: number;
  startDate: IsoDate;
  endDate: IsoDate;
}

/**
 * Documents read from disk keep their text in `source`, with headings at
 * offset 0. Rollups embed that text as written, so lines the model has no
 * slot for (free text under Topics, stray lines in a task zone, extra
 * sections) survive consolidation. Documents built in memory have no source
 * and are rendered from the model.
 */
export interface WeekDocument {
  period: WeekPeriod | null; // null only for an empty document
  weight: number | null;     // Body weight recorded in the title
  objectives: TaskForest;    // "✅ Topics"
  notes: string;
  days: DaySection[];
  source: string | null;
}

export interface MonthUnit {
  year: number;
  month: number;             // 1-12
  topics: TaskForest | null; // "📋 MonthTopics", absent when the section is missing
  preface: string;           // Lines outside the title and the weeks, as written; '' when none
  weeks: WeekDocument[];     // Ascending by start date
  source: string | null;
}

export interface YearUnit {
  year: number;
  topics: string | null;     // Body of the YearTopics document, as written
  months: MonthUnit[];       // Ascending by month
}

/**
 * Tasks selected for the next period. Objectives go to the new week's
 * Topics, day tasks to the first day of the new period.
 */
export interface CarryoverSet {
  objectives: TaskForest;
  dayTasks: TaskForest;
}

export const EMPTY_FOREST: TaskForest = Object.freeze({ nodes: [], roots: [] });
