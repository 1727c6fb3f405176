import { createId } from '../utils/ids';
import type {
  ConditionalHabitInfo,
  ConditionalOption,
  Duration,
  Habit,
  HabitType,
  Subtask,
} from './types';

export const DEFAULT_HABIT_COLOR = '#007AFF';
export const MAX_CONDITIONAL_OPTIONS = 4;

const DEFAULT_REST_TARGET: Duration = 180;

export type CreateHabitParams = {
  name: string;
  type: HabitType;
  id?: string;
  isOptional?: boolean;
  notes?: string;
  color?: string;
  order?: number;
  isActive?: boolean;
  createdAt?: string;
};

export function createHabit(params: CreateHabitParams): Habit {
  const habit: Habit = {
    id: params.id ?? createId('habit'),
    name: params.name,
    type: normalizeHabitType(params.type),
    isOptional: params.isOptional ?? false,
    color: params.color ?? DEFAULT_HABIT_COLOR,
    order: params.order ?? 0,
    isActive: params.isActive ?? true,
    createdAt: params.createdAt ?? new Date().toISOString(),
  };
  if (params.notes !== undefined) habit.notes = params.notes;
  return habit;
}

export function createSubtask(name: string, isOptional = false): Subtask {
  return { id: createId('subtask'), name, isOptional };
}

export function createConditionalOption(text: string, habits: Habit[] = []): ConditionalOption {
  return { id: createId('option'), text, habits };
}

export function createConditionalInfo(
  question: string,
  options: ConditionalOption[],
): ConditionalHabitInfo {
  return { question, options: options.slice(0, MAX_CONDITIONAL_OPTIONS) };
}

function normalizeHabitType(type: HabitType): HabitType {
  if (type.kind === 'conditional') {
    return { kind: 'conditional', info: createConditionalInfo(type.info.question, type.info.options) };
  }
  if (type.kind === 'timer') {
    return { kind: 'timer', defaultDuration: Math.max(0, type.defaultDuration) };
  }
  return type;
}

/**
 * Rough time a habit takes, in seconds. Used for template durations and progress.
 */
export function estimatedHabitDuration(habit: Habit): Duration {
  const type = habit.type;
  switch (type.kind) {
    case 'checkbox':
      return 60;
    case 'checkboxWithSubtasks':
      return type.subtasks.length * 45;
    case 'timer':
      return type.defaultDuration;
    case 'restTimer':
      return type.targetDuration ?? DEFAULT_REST_TARGET;
    case 'appLaunch':
      return 300;
    case 'website':
      return 180;
    case 'counter':
      return type.items.length * 30;
    case 'conditional':
      return 30;
    default: {
      const _exhaustive: never = type;
      return _exhaustive;
    }
  }
}

export function describeHabitType(type: HabitType): string {
  switch (type.kind) {
    case 'checkbox':
      return 'Simple task';
    case 'checkboxWithSubtasks':
      return `${type.subtasks.length} subtasks`;
    case 'timer':
      return `Timer (${Math.floor(type.defaultDuration / 60)}min)`;
    case 'restTimer':
      return type.targetDuration == null
        ? 'Rest timer'
        : `Rest (${Math.floor(type.targetDuration / 60)}min)`;
    case 'appLaunch':
      return `Launch ${type.appName}`;
    case 'website':
      return `Open ${type.title}`;
    case 'counter':
      return `${type.items.length} items`;
    case 'conditional':
      return `${type.info.options.length} options`;
    default: {
      const _exhaustive: never = type;
      return _exhaustive;
    }
  }
}

const iconByKind: Record<HabitType['kind'], string> = {
  checkbox: 'checkmark.square',
  checkboxWithSubtasks: 'checklist',
  timer: 'timer',
  restTimer: 'stopwatch',
  appLaunch: 'app.badge',
  website: 'safari',
  counter: 'list.bullet',
  conditional: 'questionmark.circle',
};

export function habitTypeIconName(type: HabitType): string {
  return iconByKind[type.kind];
}

export function isConditionalHabit(
  habit: Habit,
): habit is Habit & { type: { kind: 'conditional'; info: ConditionalHabitInfo } } {
  return habit.type.kind === 'conditional';
}

/**
 * Copy a habit under a fresh id. Conditional option paths are copied too so
 * two routines never share nested habit ids.
 */
export function cloneHabitWithNewId(habit: Habit, overrides: Partial<Omit<Habit, 'id'>> = {}): Habit {
  const type: HabitType =
    habit.type.kind === 'conditional'
      ? {
          kind: 'conditional',
          info: {
            question: habit.type.info.question,
            options: habit.type.info.options.map((option) => ({
              ...option,
              id: createId('option'),
              habits: option.habits.map((nested) => cloneHabitWithNewId(nested)),
            })),
          },
        }
      : habit.type;
  return { ...habit, type, ...overrides, id: createId('habit') };
}
