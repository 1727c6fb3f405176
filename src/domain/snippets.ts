import { createId } from '../utils/ids';
import {
  DEFAULT_HABIT_COLOR,
  cloneHabitWithNewId,
  estimatedHabitDuration,
  habitTypeIconName,
} from './habits';
import type { Duration, Habit, HabitSnippet } from './types';

const DEFAULT_SNIPPET_ICON = 'square.stack';

export function createSnippet(name: string, habits: Habit[], createdAt?: string): HabitSnippet {
  return {
    id: createId('snippet'),
    name: name.trim(),
    habits: habits.map((habit, index) => ({ ...habit, order: index })),
    createdAt: createdAt ?? new Date().toISOString(),
  };
}

export function snippetEstimatedDuration(snippet: HabitSnippet): Duration {
  const total = snippet.habits.reduce((acc, habit) => {
    const duration = estimatedHabitDuration(habit);
    if (!Number.isFinite(duration)) return acc;
    return acc + duration;
  }, 0);
  return Math.max(0, total);
}

export function snippetIconName(snippet: HabitSnippet): string {
  const first = snippet.habits[0];
  return first ? habitTypeIconName(first.type) : DEFAULT_SNIPPET_ICON;
}

export function snippetColor(snippet: HabitSnippet): string {
  return snippet.habits[0]?.color ?? DEFAULT_HABIT_COLOR;
}

/** Fresh copies of the snippet's habits, ordered from `startOrder`, ready to drop into a template. */
export function instantiateSnippetHabits(snippet: HabitSnippet, startOrder: number): Habit[] {
  return snippet.habits.map((habit, index) => cloneHabitWithNewId(habit, { order: startOrder + index }));
}
