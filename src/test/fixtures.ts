import fs from 'fs';
import os from 'os';
import path from 'path';
import type { AppConfig } from '../configLoader';
import { LogLevel } from '../logger';
import type { CalendarProvider } from '../calendar/CalendarProvider';

export const MONTH_NAMES = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December',
];

export const WEEKDAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

export function testConfig(vaultPath = '.'): AppConfig {
  return {
    env: 'test',
    appName: 'brackets',
    version: '0.0.0',
    logging: {
      consoleLogLevel: LogLevel.WARN,
      fileLogLevel: LogLevel.DEBUG,
      logFile: null,
      consoleQuietMode: true,
    },
    vault: { path: vaultPath },
    locale: { monthNames: [...MONTH_NAMES], weekdayNames: [...WEEKDAY_NAMES] },
    week: { length: 7 },
    workCalendar: {
      locations: { home: '🏠', office: '🚗', remote: '💻', off: '🏖️' },
      weekdays: {
        monday: 'home',
        tuesday: 'office',
        wednesday: 'office',
        thursday: 'home',
        friday: { evenWeek: 'home', oddWeek: 'office' },
        saturday: 'off',
        sunday: 'off',
      },
      holidays: [{ date: '2026-02-17', name: 'Carnival' }],
      vacations: [],
    },
  };
}

/** Every day at home, no notes. */
export const homeCalendar: CalendarProvider = {
  locationFor: () => ({ kind: 'home', emoji: '🏠', note: null }),
};

export function makeTempVault(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'brackets-test-'));
}

export function removeTempVault(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

/** Week file used across the parser, carryover and engine tests. */
export const SAMPLE_WEEK = [
  '# 🗓️ Week 08 · 2026-02-16 → 2026-02-22',
  '',
  '## ✅ Topics',
  '- [ ] Objective',
  '  - [x] Sub objective',
  '',
  '## 📝 Notes',
  'free text',
  '### Heading in notes',
  '',
  '## 🏠 Monday 2026-02-16',
  '### Tareas del Día',
  '- [x] A',
  '  - [ ] A.1',
  '- [ ] B',
  '### Tareas Completadas',
  '- [x] Done task',
  '### 📝 Notas',
  'went well',
  '',
  '## 🏖️ Tuesday 2026-02-17 (Carnival)',
  '### Tareas del Día',
  '### Tareas Completadas',
  '### 📝 Notas',
  '',
].join('\n');

/** Week file with text a user typed outside the checklists. */
export const HAND_EDITED_WEEK = [
  '# 🗓️ Week 08 · 2026-02-16 → 2026-02-22 · ⚖️ 72.5',
  'Written on the train',
  '',
  '## ✅ Topics',
  'Plan: focus on health',
  '- [ ] Objective',
  '',
  '## 💡 Ideas',
  '- learn the cello',
  '',
  '## 🏠 Monday 2026-02-16',
  '### Tareas del Día',
  '- [ ] B',
  'Meeting with Ana at 10',
  '### Tareas Completadas',
  '### 📝 Notas',
  '',
].join('\n');
