import {
  computeAnalytics,
  createOptionResponse,
  createSkipResponse,
  isUsableResponse,
  optionStatistics,
  validateConditionalHabit,
} from './conditionalHabits';
import { createConditionalOption, createHabit } from './habits';
import type { ConditionalResponse } from './types';

function response(overrides: Partial<ConditionalResponse> = {}): ConditionalResponse {
  return {
    id: 'r-1',
    habitId: 'habit-q',
    question: 'How are you feeling?',
    selectedOptionId: 'opt-good',
    selectedOptionText: 'Good',
    timestamp: '2026-03-01T07:00:00.000Z',
    routineId: 'session-1',
    wasSkipped: false,
    ...overrides,
  };
}

describe('validateConditionalHabit', () => {
  test('accepts a simple question', () => {
    const result = validateConditionalHabit({
      question: 'Sore?',
      options: [createConditionalOption('Yes'), createConditionalOption('No')],
    });
    expect(result).toEqual({ isValid: true, issues: [], optionCount: 2, totalHabitsInPaths: 0, warningCount: 0 });
  });

  test('reports every problem it finds', () => {
    const result = validateConditionalHabit({
      question: 'q'.repeat(201),
      options: [createConditionalOption(''), createConditionalOption('x'.repeat(51)), createConditionalOption('X'.repeat(51))],
    });
    expect(result.isValid).toBe(false);
    expect(result.issues).toEqual([
      'Question should be under 200 characters',
      'Option 1 text cannot be empty',
      'Option 2 text should be under 50 characters',
      'Option 3 text should be under 50 characters',
      'Option texts must be unique',
    ]);
  });

  test('flags an empty question and no options', () => {
    expect(validateConditionalHabit({ question: '  ', options: [] }).issues).toEqual([
      'Question cannot be empty',
      'At least one option is required',
    ]);
  });

  test('warns about many options and long paths', () => {
    const path = Array.from({ length: 11 }, (_, index) =>
      createHabit({ name: `Step ${index}`, type: { kind: 'checkbox' } }),
    );
    const result = validateConditionalHabit({
      question: 'Which?',
      options: ['A', 'B', 'C', 'D'].map((text, index) => createConditionalOption(text, index === 0 ? path : [])),
    });
    expect(result.isValid).toBe(true);
    expect(result.totalHabitsInPaths).toBe(11);
    expect(result.warningCount).toBe(2);
  });
});

describe('responses', () => {
  test('builds option and skip responses', () => {
    const option = createConditionalOption('Tired');
    const picked = createOptionResponse({
      habitId: 'h',
      question: 'Energy?',
      routineId: 's',
      option,
      timestamp: '2026-03-01T07:00:00.000Z',
    });
    expect(picked).toMatchObject({ selectedOptionId: option.id, selectedOptionText: 'Tired', wasSkipped: false });

    const skipped = createSkipResponse({ habitId: 'h', question: 'Energy?', routineId: 's' });
    expect(skipped.selectedOptionText).toBe('Skipped');
    expect(skipped.selectedOptionId).toMatch(/^skip-/);
    expect(skipped.wasSkipped).toBe(true);
  });

  test('drops responses without question or option text', () => {
    expect(isUsableResponse(response())).toBe(true);
    expect(isUsableResponse(response({ question: ' ' }))).toBe(false);
    expect(isUsableResponse(response({ selectedOptionText: '' }))).toBe(false);
  });
});

describe('statistics', () => {
  const responses = [
    response({ id: '1', timestamp: '2026-03-01T07:00:00.000Z' }),
    response({ id: '2', selectedOptionId: 'opt-tired', selectedOptionText: 'Tired', timestamp: '2026-03-02T07:00:00.000Z' }),
    response({ id: '3', timestamp: '2026-03-03T07:00:00.000Z', routineId: 'session-2' }),
    response({ id: '4', wasSkipped: true, selectedOptionId: 'skip-1', selectedOptionText: 'Skipped', timestamp: '2026-03-04T07:00:00.000Z' }),
    response({ id: '5', habitId: 'habit-other', routineId: 'session-3', timestamp: '2026-03-05T07:00:00.000Z' }),
  ];

  test('groups answered options, most picked first', () => {
    expect(optionStatistics(responses, 'habit-q')).toEqual([
      {
        optionId: 'opt-good',
        optionText: 'Good',
        selectionCount: 2,
        selectionPercentage: (2 / 3) * 100,
        lastSelected: '2026-03-03T07:00:00.000Z',
      },
      {
        optionId: 'opt-tired',
        optionText: 'Tired',
        selectionCount: 1,
        selectionPercentage: (1 / 3) * 100,
        lastSelected: '2026-03-02T07:00:00.000Z',
      },
    ]);
    expect(optionStatistics(responses, 'habit-none')).toEqual([]);
  });

  test('summarises all responses', () => {
    expect(computeAnalytics(responses)).toEqual({
      totalResponses: 5,
      completedResponses: 4,
      skippedResponses: 1,
      uniqueHabitsAnswered: 2,
      uniqueRoutinesWithResponses: 3,
      averageResponsesPerHabit: 2.5,
      skipRate: 0.2,
      lastResponseDate: '2026-03-05T07:00:00.000Z',
    });
    expect(computeAnalytics([]).lastResponseDate).toBeNull();
  });
});
