import { SKIPPED_OPTION_TEXT } from '../domain/conditionalHabits';
import type { ConditionalHabitInfo, Duration, Habit, HabitType } from '../domain/types';
import { formatMinutesSeconds } from '../utils/formatMinutes';

/**
 * Per-type models for the habit interaction panel. Each builder is a pure
 * function of the habit plus the panel's local state (checked items, timer
 * status); the host view renders the result and feeds taps back in.
 */

export type InteractionKind =
  | 'checkbox'
  | 'subtasks'
  | 'timer'
  | 'restTimer'
  | 'appLaunch'
  | 'website'
  | 'counter'
  | 'conditional';

export function interactionKindFor(habit: Habit): InteractionKind {
  const { kind } = habit.type;
  return kind === 'checkboxWithSubtasks' ? 'subtasks' : kind;
}

type TypeOf<K extends HabitType['kind']> = Extract<HabitType, { kind: K }>;

// Checklists (counter, subtasks)

export type ChecklistItem = {
  id: string;
  label: string;
  isChecked: boolean;
  isOptional: boolean;
};

export type ChecklistModel = {
  items: ChecklistItem[];
  checkedCount: number;
  totalCount: number;
  header: string;
  canComplete: boolean;
  /** Notes stored on the completion. */
  completionNotes: string;
};

/** Counter items have no ids of their own; their position is the key. */
export function counterItemKey(index: number): string {
  return `item-${index}`;
}

export function buildCounterModel(type: TypeOf<'counter'>, checked: ReadonlySet<string>): ChecklistModel {
  const items = type.items.map((label, index) => ({
    id: counterItemKey(index),
    label,
    isChecked: checked.has(counterItemKey(index)),
    isOptional: false,
  }));
  const done = items.filter((item) => item.isChecked);
  return {
    items,
    checkedCount: done.length,
    totalCount: items.length,
    header: `${done.length} of ${items.length} completed`,
    canComplete: done.length === items.length,
    completionNotes:
      done.length === 0 ? 'No items completed' : `Completed: ${done.map((item) => item.label).join(', ')}`,
  };
}

/** Optional subtasks never block completion. */
export function buildSubtasksModel(
  type: TypeOf<'checkboxWithSubtasks'>,
  checked: ReadonlySet<string>,
): ChecklistModel {
  const items = type.subtasks.map((subtask) => ({
    id: subtask.id,
    label: subtask.name,
    isChecked: checked.has(subtask.id),
    isOptional: subtask.isOptional,
  }));
  const checkedCount = items.filter((item) => item.isChecked).length;
  return {
    items,
    checkedCount,
    totalCount: items.length,
    header: `${checkedCount} of ${items.length} completed`,
    canComplete: items.every((item) => item.isChecked || item.isOptional),
    completionNotes: `Completed ${checkedCount} of ${items.length} subtasks`,
  };
}

/** Returns a new set; the input is left alone. */
export function toggleChecklistItem(checked: ReadonlySet<string>, id: string): Set<string> {
  const next = new Set(checked);
  if (next.has(id)) {
    next.delete(id);
  } else {
    next.add(id);
  }
  return next;
}

// Checkbox

export type CheckboxModel = {
  title: string;
  icon: string;
  isCompleted: boolean;
};

export function buildCheckboxModel(isCompleted: boolean): CheckboxModel {
  return {
    title: isCompleted ? 'Completed!' : 'Tap to complete',
    icon: isCompleted ? 'checkmark.circle.fill' : 'circle',
    isCompleted,
  };
}

// App launch / website

export type LaunchModel = {
  url: string;
  buttonLabel: string;
  isShortcut: boolean;
};

export function isShortcutName(bundleId: string): boolean {
  return !bundleId.includes('://');
}

export function buildAppLaunchModel(type: TypeOf<'appLaunch'>): LaunchModel {
  if (isShortcutName(type.bundleId)) {
    return {
      url: `shortcuts://run-shortcut?name=${encodeURIComponent(type.bundleId)}`,
      buttonLabel: 'Run Shortcut',
      isShortcut: true,
    };
  }
  return { url: type.bundleId, buttonLabel: `Launch ${type.appName}`, isShortcut: false };
}

export function buildWebsiteModel(type: TypeOf<'website'>): LaunchModel {
  return { url: type.url, buttonLabel: `Open ${type.title}`, isShortcut: false };
}

// Conditional

export type ConditionalOptionButton = {
  id: string;
  text: string;
  /** How many habits picking this option adds to the session. */
  pathLength: number;
};

export type ConditionalModel = {
  question: string;
  options: ConditionalOptionButton[];
};

export function buildConditionalModel(info: ConditionalHabitInfo): ConditionalModel {
  return {
    question: info.question,
    options: info.options.map((option) => ({
      id: option.id,
      text: option.text,
      pathLength: option.habits.length,
    })),
  };
}

export function conditionalCompletionNotes(optionText: string | null): string {
  return optionText == null ? SKIPPED_OPTION_TEXT : `Selected: ${optionText}`;
}

// Timers

export type QuickCompletion = {
  label: string;
  duration: Duration;
};

/** Shortcuts for logging a timed habit without running the countdown. */
export const QUICK_COMPLETIONS: readonly QuickCompletion[] = [
  { label: '30s', duration: 30 },
  { label: '1m', duration: 60 },
  { label: '2m', duration: 120 },
];

export type TimerModel = {
  display: string;
  buttonLabel: string;
  quickCompletions: readonly QuickCompletion[];
};

export function buildTimerModel(params: { remaining: Duration; isRunning: boolean }): TimerModel {
  return {
    display: formatMinutesSeconds(params.remaining),
    buttonLabel: params.isRunning ? 'Stop' : 'Start',
    quickCompletions: QUICK_COMPLETIONS,
  };
}
