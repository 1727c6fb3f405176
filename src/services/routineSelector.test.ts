import { WEEKDAY_CATEGORY, WEEKEND_CATEGORY } from '../domain/context';
import { createRoutineTemplate } from '../domain/routineTemplates';
import type { RoutineContext, RoutineContextRule } from '../domain/types';
import { buildSelectionReason, ruleMatches, scoreRule, scoreTemplate, selectBestTemplate } from './routineSelector';

const morningAtOffice: RoutineContext = {
  timeSlot: 'morning',
  dayCategory: WEEKDAY_CATEGORY,
  location: { kind: 'builtin', type: 'office' },
  timestamp: '2026-03-02T08:00:00.000Z',
};

function rule(overrides: Partial<RoutineContextRule> = {}): RoutineContextRule {
  return { timeSlots: [], dayCategoryIds: [], locationIds: [], priority: 0, ...overrides };
}

describe('scoreRule', () => {
  test('adds up slot, day, location and priority', () => {
    expect(
      scoreRule(rule({ timeSlots: ['morning'], dayCategoryIds: ['weekday'], locationIds: ['office'], priority: 2 }), morningAtOffice),
    ).toBe(22);
    expect(scoreRule(rule({ timeSlots: ['morning'], priority: 1 }), morningAtOffice)).toBe(12);
    expect(scoreRule(rule({ locationIds: ['home'] }), morningAtOffice)).toBe(0);
  });

  test('scores rule-less templates as 1', () => {
    expect(scoreTemplate(createRoutineTemplate({ name: 'Any' }), morningAtOffice)).toBe(1);
  });

  test('matches only when every condition holds', () => {
    expect(ruleMatches(rule({ timeSlots: ['morning'], dayCategoryIds: ['weekday'] }), morningAtOffice)).toBe(true);
    expect(
      ruleMatches(rule({ timeSlots: ['morning'], dayCategoryIds: ['weekday'], locationIds: ['home'] }), morningAtOffice),
    ).toBe(false);
    expect(ruleMatches(rule({ timeSlots: ['evening'], dayCategoryIds: ['weekday'] }), morningAtOffice)).toBe(false);
  });
});

describe('buildSelectionReason', () => {
  const template = createRoutineTemplate({ name: 'Office Day' });

  test('describes slot, day and location', () => {
    expect(buildSelectionReason(template, morningAtOffice)).toBe(
      "Selected 'Office Day' because It's morning and it's a weekday and you're at office",
    );
  });

  test('leaves out an unknown location and names custom days', () => {
    const context: RoutineContext = {
      ...morningAtOffice,
      timeSlot: 'early_morning',
      dayCategory: { id: 'gym', name: 'Gym', icon: 'dumbbell', color: '#FF3B30', isBuiltIn: false },
      location: { kind: 'builtin', type: 'unknown' },
    };
    expect(buildSelectionReason(template, context)).toBe(
      "Selected 'Office Day' because It's early morning and it's a gym day",
    );
    expect(buildSelectionReason(template, { ...context, dayCategory: WEEKEND_CATEGORY })).toBe(
      "Selected 'Office Day' because It's early morning and it's the weekend",
    );
  });
});

describe('selectBestTemplate', () => {
  test('picks the highest score and keeps list order on ties', () => {
    const first = createRoutineTemplate({ id: 'a', name: 'A', contextRule: rule({ timeSlots: ['morning'] }) });
    const tie = createRoutineTemplate({ id: 'b', name: 'B', contextRule: rule({ timeSlots: ['morning'] }) });
    const weaker = createRoutineTemplate({ id: 'c', name: 'C', contextRule: rule({ dayCategoryIds: ['weekday'] }) });

    const selection = selectBestTemplate([weaker, first, tie], morningAtOffice);
    expect(selection.template?.id).toBe('a');
    expect(selection.score).toBe(11);
  });

  test('falls back to the default, then the most recent, then the first routine', () => {
    const never = rule({ locationIds: ['home'] });
    const plain = createRoutineTemplate({ id: 'plain', name: 'Plain', contextRule: never });
    const recent = createRoutineTemplate({
      id: 'recent',
      name: 'Recent',
      contextRule: never,
      lastUsedAt: '2026-03-01T07:00:00.000Z',
    });
    const older = createRoutineTemplate({
      id: 'older',
      name: 'Older',
      contextRule: never,
      lastUsedAt: '2026-02-01T07:00:00.000Z',
    });
    const preferred = createRoutineTemplate({ id: 'default', name: 'Default', contextRule: never, isDefault: true });

    expect(selectBestTemplate([plain, recent, preferred], morningAtOffice)).toEqual({
      template: preferred,
      reason: 'Using default routine',
      score: null,
    });
    expect(selectBestTemplate([plain, older, recent], morningAtOffice)).toEqual({
      template: recent,
      reason: 'Using most recently used routine',
      score: null,
    });
    expect(selectBestTemplate([plain], morningAtOffice)).toEqual({
      template: plain,
      reason: 'No matching routine found',
      score: null,
    });
    expect(selectBestTemplate([], morningAtOffice).template).toBeNull();
  });
});
