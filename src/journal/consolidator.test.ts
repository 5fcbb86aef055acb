import { NoDataError, PartialDataWarning } from '../errors';
import { EMPTY_FOREST, type MonthUnit } from '../types/journal';
import { HAND_EDITED_WEEK, MONTH_NAMES, WEEKDAY_NAMES, homeCalendar } from '../test/fixtures';
import { consolidateMonth, consolidateYear, expectedMonthsThrough, type KeyedWeek } from './consolidator';
import { parseMonthUnit, parseWeekDocument } from './contentParser';
import { renderMonthUnit, renderYearUnit } from './markdownRenderer';
import { generateMonthTopics, generateWeekDocument, weekKeyOf } from './periodGenerator';
import { buildTaskForest, renderForest } from './taskForest';

function keyedWeek(startDate: string): KeyedWeek {
  const doc = generateWeekDocument({
    startDate,
    endDate: startDate,
    carryover: { objectives: EMPTY_FOREST, dayTasks: EMPTY_FOREST },
    calendar: homeCalendar,
    weekdayNames: WEEKDAY_NAMES,
  });
  const key = weekKeyOf(doc);
  if (!key) throw new Error(`no key for ${startDate}`);
  return { ...key, doc };
}

function month(monthNumber: number): MonthUnit {
  return { year: 2026, month: monthNumber, topics: null, preface: '', weeks: [], source: null };
}

describe('consolidateMonth', () => {
  const weeks = [keyedWeek('2026-02-09'), keyedWeek('2026-02-16'), keyedWeek('2026-01-26'), keyedWeek('2026-02-02')];

  it('should keep only the target month, ascending internally', () => {
    const unit = consolidateMonth(weeks, { year: 2026, month: 2 });

    expect(unit.weeks.map(week => week.period?.weekNumber)).toEqual([6, 7, 8]);
    expect(unit.topics).toBeNull();
  });

  it('should render the most recent week first', () => {
    const text = renderMonthUnit(consolidateMonth(weeks, { year: 2026, month: 2 }), MONTH_NAMES);
    const titles = text.split('\n').filter(line => line.startsWith('## 🗓️'));

    expect(text.startsWith('# February Topics ❄️\n')).toBe(true);
    expect(titles).toEqual([
      '## 🗓️ Week 08 · 2026-02-16 → 2026-02-16',
      '## 🗓️ Week 07 · 2026-02-09 → 2026-02-09',
      '## 🗓️ Week 06 · 2026-02-02 → 2026-02-02',
    ]);
  });

  it('should render topics and embedded weeks one level down', () => {
    const topics = generateMonthTopics(2026, 7, buildTaskForest(['- [ ] T']));
    const unit = consolidateMonth([keyedWeek('2026-07-06')], { year: 2026, month: 7 }, topics);

    expect(renderMonthUnit(unit, MONTH_NAMES)).toBe([
      '# July Topics ☀️',
      '',
      '## 📋 MonthTopics',
      '- [ ] T',
      '',
      '## 🗓️ Week 28 · 2026-07-06 → 2026-07-06',
      '',
      '### ✅ Topics',
      '',
      '### 📝 Notes',
      '',
      '### 🏠 Monday 2026-07-06',
      '#### Tareas del Día',
      '#### Tareas Completadas',
      '#### 📝 Notas',
      '',
    ].join('\n'));
  });

  it('should embed a week read from disk as written, one level down', () => {
    const doc = parseWeekDocument(HAND_EDITED_WEEK);
    const unit = consolidateMonth([{ year: 2026, month: 2, week: 8, doc }], { year: 2026, month: 2 });
    const shifted = HAND_EDITED_WEEK.split('\n').map(line => (line.startsWith('#') ? `#${line}` : line));

    expect(renderMonthUnit(unit, MONTH_NAMES)).toBe(['# February Topics ❄️', '', ...shifted].join('\n'));
  });

  it('should carry the whole topics document, free text included', () => {
    const topics = parseMonthUnit('# February Topics ❄️\n\nBudget first\n## 📋 MonthTopics\n- [ ] Taxes\nask about receipts\n', {
      year: 2026,
      month: 2,
    });
    const unit = consolidateMonth(weeks, { year: 2026, month: 2 }, topics);

    expect(renderForest(unit.topics ?? EMPTY_FOREST)).toEqual(['- [ ] Taxes']);
    expect(renderMonthUnit(unit, MONTH_NAMES).split('\n').slice(0, 7)).toEqual([
      '# February Topics ❄️',
      '',
      'Budget first',
      '## 📋 MonthTopics',
      '- [ ] Taxes',
      'ask about receipts',
      '',
    ]);
  });

  it('should fail when no week matches', () => {
    expect(() => consolidateMonth(weeks, { year: 2026, month: 3 })).toThrow(NoDataError);
    expect(() => consolidateMonth([], { year: 2026, month: 2 })).toThrow('No weekly documents found for 2026-02');
  });
});

describe('consolidateYear', () => {
  it('should order months and warn about the missing one', () => {
    const { unit, warning } = consolidateYear([month(2), month(1), { ...month(4), year: 2025 }], 2026, 3);

    expect(unit.months.map(m => m.month)).toEqual([1, 2]);
    expect(warning).toBeInstanceOf(PartialDataWarning);
    expect(warning?.missingMonths).toEqual([3]);
    expect(warning?.message).toBe('Year 2026 is missing monthly rollups for month(s) 03');
  });

  it('should render the most recent month first', () => {
    const { unit } = consolidateYear([month(1), month(2)], 2026, 2);

    expect(renderYearUnit(unit, MONTH_NAMES)).toBe('# 📅 2026\n\n## February Topics ❄️\n\n## January Topics ❄️\n');
  });

  it('should report a gap before the latest month even past the expected range', () => {
    const { warning } = consolidateYear([month(1), month(2), month(4)], 2026, 0);

    expect(warning?.missingMonths).toEqual([3]);
  });

  it('should put the year topics above the months', () => {
    const { unit } = consolidateYear([month(1)], 2026, 1, '- Run\n## Reading');

    expect(renderYearUnit(unit, MONTH_NAMES)).toBe('# 📅 2026\n\n## 📌 YearTopics\n- Run\n### Reading\n\n## January Topics ❄️\n');
  });

  it('should not warn when every expected month is present', () => {
    expect(consolidateYear([month(1), month(2)], 2026, 2).warning).toBeNull();
  });

  it('should fail when the year has no month rollups', () => {
    expect(() => consolidateYear([month(1)], 2027, 12)).toThrow(NoDataError);
  });
});

describe('expectedMonthsThrough', () => {
  const today = new Date(Date.UTC(2026, 2, 10));

  it('should expect every month of a past year', () => {
    expect(expectedMonthsThrough(2025, today)).toBe(12);
  });

  it('should expect months up to the current one this year', () => {
    expect(expectedMonthsThrough(2026, today)).toBe(3);
  });

  it('should expect nothing of a future year', () => {
    expect(expectedMonthsThrough(2027, today)).toBe(0);
  });
});
