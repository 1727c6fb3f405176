import { createId } from '../utils/ids';
import { MAX_CONDITIONAL_OPTIONS } from './habits';
import type { ConditionalHabitInfo, ConditionalOption, ConditionalResponse } from './types';

export const CONDITIONAL_EXPORT_VERSION = 2;
export const SKIPPED_OPTION_TEXT = 'Skipped';

const MAX_QUESTION_LENGTH = 200;
const MAX_OPTION_TEXT_LENGTH = 50;

export type ConditionalHabitValidation = {
  isValid: boolean;
  issues: string[];
  optionCount: number;
  totalHabitsInPaths: number;
  /** Soft limits: more than 3 options, more than 10 habits across paths. */
  warningCount: number;
};

export function validateConditionalHabit(info: ConditionalHabitInfo): ConditionalHabitValidation {
  const issues: string[] = [];

  if (info.question.trim().length === 0) {
    issues.push('Question cannot be empty');
  } else if (info.question.length > MAX_QUESTION_LENGTH) {
    issues.push(`Question should be under ${MAX_QUESTION_LENGTH} characters`);
  }

  if (info.options.length === 0) {
    issues.push('At least one option is required');
  } else if (info.options.length > MAX_CONDITIONAL_OPTIONS) {
    issues.push(`Maximum ${MAX_CONDITIONAL_OPTIONS} options allowed`);
  }

  info.options.forEach((option, index) => {
    if (option.text.trim().length === 0) {
      issues.push(`Option ${index + 1} text cannot be empty`);
    } else if (option.text.length > MAX_OPTION_TEXT_LENGTH) {
      issues.push(`Option ${index + 1} text should be under ${MAX_OPTION_TEXT_LENGTH} characters`);
    }
  });

  const texts = info.options.map((option) => option.text.trim().toLowerCase());
  if (new Set(texts).size !== texts.length) {
    issues.push('Option texts must be unique');
  }

  const optionCount = info.options.length;
  const totalHabitsInPaths = info.options.reduce((sum, option) => sum + option.habits.length, 0);
  let warningCount = 0;
  if (optionCount > 3) warningCount += 1;
  if (totalHabitsInPaths > 10) warningCount += 1;

  return { isValid: issues.length === 0, issues, optionCount, totalHabitsInPaths, warningCount };
}

export type CreateResponseParams = {
  habitId: string;
  question: string;
  routineId: string;
  timestamp?: string;
};

export function createOptionResponse(
  params: CreateResponseParams & { option: ConditionalOption },
): ConditionalResponse {
  return {
    id: createId('response'),
    habitId: params.habitId,
    question: params.question,
    selectedOptionId: params.option.id,
    selectedOptionText: params.option.text,
    timestamp: params.timestamp ?? new Date().toISOString(),
    routineId: params.routineId,
    wasSkipped: false,
  };
}

/** A skip carries a fresh option id so it never collides with a real option in statistics. */
export function createSkipResponse(params: CreateResponseParams): ConditionalResponse {
  return {
    id: createId('response'),
    habitId: params.habitId,
    question: params.question,
    selectedOptionId: createId('skip'),
    selectedOptionText: SKIPPED_OPTION_TEXT,
    timestamp: params.timestamp ?? new Date().toISOString(),
    routineId: params.routineId,
    wasSkipped: true,
  };
}

export const compareResponsesNewestFirst = (a: ConditionalResponse, b: ConditionalResponse) =>
  Date.parse(b.timestamp) - Date.parse(a.timestamp);

export type ConditionalOptionStatistics = {
  optionId: string;
  optionText: string;
  selectionCount: number;
  /** 0..100 */
  selectionPercentage: number;
  lastSelected: string | null;
};

/** Non-skipped answers for one habit, grouped by option, most picked first. */
export function optionStatistics(
  responses: ConditionalResponse[],
  habitId: string,
): ConditionalOptionStatistics[] {
  const answered = responses.filter((r) => r.habitId === habitId && !r.wasSkipped);
  if (answered.length === 0) return [];

  const groups = new Map<string, ConditionalResponse[]>();
  for (const response of answered) {
    const group = groups.get(response.selectedOptionId) ?? [];
    group.push(response);
    groups.set(response.selectedOptionId, group);
  }

  return Array.from(groups.entries())
    .map(([optionId, group]) => {
      const latest = [...group].sort(compareResponsesNewestFirst)[0];
      return {
        optionId,
        optionText: group[0]?.selectedOptionText ?? 'Unknown',
        selectionCount: group.length,
        selectionPercentage: (group.length / answered.length) * 100,
        lastSelected: latest ? latest.timestamp : null,
      };
    })
    .sort((a, b) => b.selectionCount - a.selectionCount);
}

export type ConditionalHabitAnalytics = {
  totalResponses: number;
  completedResponses: number;
  skippedResponses: number;
  uniqueHabitsAnswered: number;
  uniqueRoutinesWithResponses: number;
  averageResponsesPerHabit: number;
  /** 0..1 */
  skipRate: number;
  lastResponseDate: string | null;
};

export function computeAnalytics(responses: ConditionalResponse[]): ConditionalHabitAnalytics {
  const totalResponses = responses.length;
  const skippedResponses = responses.filter((r) => r.wasSkipped).length;
  const uniqueHabitsAnswered = new Set(responses.map((r) => r.habitId)).size;
  const uniqueRoutinesWithResponses = new Set(responses.map((r) => r.routineId)).size;
  const latest = [...responses].sort(compareResponsesNewestFirst)[0];

  return {
    totalResponses,
    completedResponses: totalResponses - skippedResponses,
    skippedResponses,
    uniqueHabitsAnswered,
    uniqueRoutinesWithResponses,
    averageResponsesPerHabit: uniqueHabitsAnswered > 0 ? totalResponses / uniqueHabitsAnswered : 0,
    skipRate: totalResponses > 0 ? skippedResponses / totalResponses : 0,
    lastResponseDate: latest ? latest.timestamp : null,
  };
}

/** Stored answers with an empty question or option text are dropped on load. */
export function isUsableResponse(response: ConditionalResponse): boolean {
  return response.question.trim().length > 0 && response.selectedOptionText.trim().length > 0;
}
