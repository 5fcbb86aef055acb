import { ParseError } from '../errors';
import { HAND_EDITED_WEEK, SAMPLE_WEEK, homeCalendar, MONTH_NAMES, WEEKDAY_NAMES } from '../test/fixtures';
import { documentBody, parseMonthUnit, parseWeekDocument } from './contentParser';
import { consolidateMonth } from './consolidator';
import { renderMonthUnit, renderWeek } from './markdownRenderer';
import { generateMonthTopics, generateWeekDocument } from './periodGenerator';
import { buildTaskForest, renderForest } from './taskForest';

const locations = { home: '🏠', office: '🚗', remote: '💻', off: '🏖️' };

describe('parseWeekDocument', () => {
  const doc = parseWeekDocument(SAMPLE_WEEK, { locations });

  it('should read the week header', () => {
    expect(doc.period).toEqual({ weekNumber: 8, startDate: '2026-02-16', endDate: '2026-02-22' });
  });

  it('should read objectives and week notes', () => {
    expect(renderForest(doc.objectives)).toEqual(['- [ ] Objective', '  - [x] Sub objective']);
    expect(doc.notes).toBe('free text\n### Heading in notes');
  });

  it('should split each day into its task zones and notes', () => {
    expect(doc.days).toHaveLength(2);
    const [monday, tuesday] = doc.days;

    expect(monday.date).toBe('2026-02-16');
    expect(monday.weekdayName).toBe('Monday');
    expect(monday.location).toEqual({ kind: 'home', emoji: '🏠', note: null });
    expect(renderForest(monday.tasks)).toEqual(['- [x] A', '  - [ ] A.1', '- [ ] B']);
    expect(renderForest(monday.completed)).toEqual(['- [x] Done task']);
    expect(monday.notes).toBe('went well');

    expect(tuesday.location).toEqual({ kind: 'off', emoji: '🏖️', note: 'Carnival' });
    expect(tuesday.tasks.nodes).toHaveLength(0);
    expect(tuesday.notes).toBe('');
  });

  it('should render back to the same text', () => {
    expect(renderWeek(doc)).toBe(SAMPLE_WEEK);
    expect(renderWeek({ ...doc, source: null })).toBe(SAMPLE_WEEK);
  });

  it('should keep lines outside the model in the source text', () => {
    const edited = parseWeekDocument(HAND_EDITED_WEEK);

    expect(renderForest(edited.objectives)).toEqual(['- [ ] Objective']);
    expect(renderForest(edited.days[0].tasks)).toEqual(['- [ ] B']);
    expect(edited.source).toBe(HAND_EDITED_WEEK);
    expect(renderWeek(edited)).toBe(HAND_EDITED_WEEK);
  });

  it('should read the weight from the title', () => {
    const edited = parseWeekDocument(HAND_EDITED_WEEK);

    expect(edited.weight).toBe(72.5);
    expect(edited.period).toEqual({ weekNumber: 8, startDate: '2026-02-16', endDate: '2026-02-22' });
    expect(doc.weight).toBeNull();
  });

  it('should leave the location kind empty for an unknown emoji', () => {
    const text = SAMPLE_WEEK.replace('## 🏠 Monday', '## 🚀 Monday');
    expect(parseWeekDocument(text, { locations }).days[0].location).toEqual({ kind: null, emoji: '🚀', note: null });
  });

  it('should mark everything under Tareas Completadas as done', () => {
    const text = SAMPLE_WEEK.replace('- [x] Done task', '- [ ] Reopened');
    const completed = parseWeekDocument(text).days[0].completed;

    expect(completed.nodes[0]).toMatchObject({ text: 'Reopened', completed: true });
  });

  it('should derive the period from the days when the title is missing', () => {
    const text = SAMPLE_WEEK.split('\n').slice(2).join('\n');
    expect(parseWeekDocument(text).period).toEqual({ weekNumber: 8, startDate: '2026-02-16', endDate: '2026-02-17' });
  });

  it('should keep unknown day sub-headings in the day notes', () => {
    const text = SAMPLE_WEEK.replace('### 📝 Notas\nwent well', '### Meetings\n- standup');
    expect(parseWeekDocument(text).days[0].notes).toBe('### Meetings\n- standup');
  });

  it('should return an empty document for empty input', () => {
    expect(parseWeekDocument('\n\n')).toEqual({
      period: null,
      weight: null,
      objectives: { nodes: [], roots: [] },
      notes: '',
      days: [],
      source: null,
    });
  });

  it('should fail when no day heading is present', () => {
    expect(() => parseWeekDocument('# Shopping\n- [ ] milk\n')).toThrow(ParseError);
  });

  it('should fail when days have no task zone heading', () => {
    const text = '# 🗓️ Week 08 · 2026-02-16 → 2026-02-22\n\n## 🏠 Monday 2026-02-16\n- [ ] Task\n';
    expect(() => parseWeekDocument(text)).toThrow(/No task zone heading/);
  });

  it('should never fail on malformed indentation', () => {
    const text = SAMPLE_WEEK.replace('  - [ ] A.1', '         - [ ] A.1');
    const monday = parseWeekDocument(text).days[0];

    expect(monday.tasks.roots).toHaveLength(3);
  });
});

describe('parseMonthUnit', () => {
  function sampleMonth(): string {
    const weeks = ['2026-07-06', '2026-07-13'].map((startDate, i) => ({
      year: 2026,
      month: 7,
      week: 28 + i,
      doc: generateWeekDocument({
        startDate,
        endDate: startDate,
        carryover: { objectives: buildTaskForest(['- [ ] Goal']), dayTasks: buildTaskForest([`- [ ] Task ${i}`]) },
        calendar: homeCalendar,
        weekdayNames: WEEKDAY_NAMES,
      }),
    }));
    const unit = consolidateMonth(weeks, { year: 2026, month: 7 }, generateMonthTopics(2026, 7, buildTaskForest(['- [ ] Topic'])));
    return renderMonthUnit(unit, MONTH_NAMES);
  }

  it('should read topics and embedded weeks in ascending order', () => {
    const unit = parseMonthUnit(sampleMonth(), { year: 2026, month: 7 });

    expect(unit.year).toBe(2026);
    expect(unit.month).toBe(7);
    expect(unit.topics && renderForest(unit.topics)).toEqual(['- [ ] Topic']);
    expect(unit.weeks.map(week => week.period?.startDate)).toEqual(['2026-07-06', '2026-07-13']);
    expect(renderForest(unit.weeks[1].days[0].tasks)).toEqual(['- [ ] Task 1']);
  });

  it('should render a parsed rollup back to the same text', () => {
    const text = sampleMonth();
    const unit = parseMonthUnit(text, { year: 2026, month: 7 });

    expect(renderMonthUnit(unit, MONTH_NAMES)).toBe(text);
    expect(renderMonthUnit({ ...unit, source: null }, MONTH_NAMES)).toBe(text);
  });

  it('should give each embedded week its own text at top level', () => {
    const unit = parseMonthUnit(sampleMonth(), { year: 2026, month: 7 });

    expect(unit.weeks[0].source?.split('\n')[0]).toBe('# 🗓️ Week 28 · 2026-07-06 → 2026-07-06');
    expect(unit.preface).toBe('## 📋 MonthTopics\n- [ ] Topic');
  });

  it('should report topics as absent when the section is missing', () => {
    expect(parseMonthUnit('# July Topics ☀️\n', { year: 2026, month: 7 }).topics).toBeNull();
  });

  it('should keep free text around the topics in the preface', () => {
    const unit = parseMonthUnit('# July Topics ☀️\nsummer plans\n## 📋 MonthTopics\n- [ ] Swim\nno rush\n', { year: 2026, month: 7 });

    expect(unit.topics && renderForest(unit.topics)).toEqual(['- [ ] Swim']);
    expect(unit.preface).toBe('summer plans\n## 📋 MonthTopics\n- [ ] Swim\nno rush');
  });

  it('should fail without a month title', () => {
    expect(() => parseMonthUnit('- [ ] Topic\n', { year: 2026, month: 7 })).toThrow(ParseError);
  });
});

describe('documentBody', () => {
  it('should drop the title and surrounding blank lines', () => {
    expect(documentBody('# 2026 Goals\r\n\r\n- Run\r\n## Reading\r\n\r\n')).toBe('- Run\n## Reading');
  });

  it('should keep text without a title', () => {
    expect(documentBody('- Run\n')).toBe('- Run');
  });
});
