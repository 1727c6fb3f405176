import { createId } from '../utils/ids';
import { estimatedHabitDuration } from './habits';
import type { Duration, Habit, RoutineContextRule, RoutineTemplate } from './types';

export const DEFAULT_TEMPLATE_COLOR = '#34C759';

export type CreateRoutineTemplateParams = {
  name: string;
  id?: string;
  description?: string;
  habits?: Habit[];
  color?: string;
  isDefault?: boolean;
  createdAt?: string;
  lastUsedAt?: string;
  contextRule?: RoutineContextRule;
};

const byOrder = (a: Habit, b: Habit) => a.order - b.order;

export function createRoutineTemplate(params: CreateRoutineTemplateParams): RoutineTemplate {
  const template: RoutineTemplate = {
    id: params.id ?? createId('template'),
    name: params.name,
    habits: [...(params.habits ?? [])].sort(byOrder),
    color: params.color ?? DEFAULT_TEMPLATE_COLOR,
    isDefault: params.isDefault ?? false,
    createdAt: params.createdAt ?? new Date().toISOString(),
  };
  if (params.description !== undefined) template.description = params.description;
  if (params.lastUsedAt !== undefined) template.lastUsedAt = params.lastUsedAt;
  if (params.contextRule !== undefined) template.contextRule = params.contextRule;
  return template;
}

export function templateEstimatedDuration(template: RoutineTemplate): Duration {
  return template.habits.reduce((total, habit) => total + estimatedHabitDuration(habit), 0);
}

export function activeHabitsCount(template: RoutineTemplate): number {
  return template.habits.filter((habit) => habit.isActive).length;
}

export function formattedTemplateDuration(template: RoutineTemplate): string {
  return `${Math.floor(templateEstimatedDuration(template) / 60)} min`;
}

export function addHabitToTemplate(template: RoutineTemplate, habit: Habit): RoutineTemplate {
  const next = { ...habit, order: template.habits.length };
  return { ...template, habits: [...template.habits, next].sort(byOrder) };
}

export function removeHabitFromTemplate(template: RoutineTemplate, habitId: string): RoutineTemplate {
  const habits = template.habits
    .filter((habit) => habit.id !== habitId)
    .map((habit, index) => ({ ...habit, order: index }));
  return { ...template, habits };
}

/**
 * Apply a new ordering. Habits missing from `newOrder` keep their current
 * order value, so a partial list only moves the habits it names.
 */
export function reorderTemplateHabits(template: RoutineTemplate, newOrder: Habit[]): RoutineTemplate {
  const indexById = new Map(newOrder.map((habit, index) => [habit.id, index]));
  const habits = template.habits
    .map((habit) => {
      const index = indexById.get(habit.id);
      return index === undefined ? habit : { ...habit, order: index };
    })
    .sort(byOrder);
  return { ...template, habits };
}

export function replaceTemplateHabit(template: RoutineTemplate, habit: Habit): RoutineTemplate {
  return {
    ...template,
    habits: template.habits.map((existing) => (existing.id === habit.id ? habit : existing)).sort(byOrder),
  };
}
