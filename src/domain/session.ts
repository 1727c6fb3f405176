import { createId } from '../utils/ids';
import { cloneHabitWithNewId } from './habits';
import type {
  ConditionalOption,
  Duration,
  Habit,
  HabitCompletion,
  RoutineSession,
  RoutineTemplate,
  SessionChange,
} from './types';

/**
 * Routine session reducer.
 *
 * Every function takes a session value and returns the next one; nothing here
 * mutates. The routine store holds the current value and swaps it on each step.
 */

const byOrder = (a: Habit, b: Habit) => a.order - b.order;

export function createSession(template: RoutineTemplate, now: Date = new Date()): RoutineSession {
  return {
    id: createId('session'),
    templateId: template.id,
    templateName: template.name,
    templateColor: template.color,
    templateHabits: template.habits,
    startedAt: now.toISOString(),
    completedAt: null,
    currentHabitIndex: 0,
    completions: [],
    modifications: [],
  };
}

/** Template habits that are active, with the session's modifications replayed on top. */
export function activeHabits(session: RoutineSession): Habit[] {
  let habits = session.templateHabits.filter((habit) => habit.isActive);

  for (const modification of session.modifications) {
    const change = modification.change;
    switch (change.type) {
      case 'added':
        habits = [...habits, change.habit];
        break;
      case 'removed':
        habits = habits.filter((habit) => habit.id !== change.habitId);
        break;
      case 'modified':
        habits = habits.map((habit) => (habit.id === change.habitId ? change.habit : habit));
        break;
      case 'reordered':
        habits = change.habits;
        break;
      default: {
        const _exhaustive: never = change;
        return _exhaustive;
      }
    }
  }

  return [...habits].sort(byOrder);
}

export function currentHabit(session: RoutineSession): Habit | null {
  return activeHabits(session)[session.currentHabitIndex] ?? null;
}

/** 0..1. A session with nothing to do counts as fully done. */
export function sessionProgress(session: RoutineSession): number {
  const total = activeHabits(session).length;
  if (total === 0) return 1;
  return Math.min(1, session.completions.length / total);
}

export function isSessionCompleted(session: RoutineSession): boolean {
  return session.completedAt !== null;
}

export function sessionDuration(session: RoutineSession, now: Date = new Date()): Duration {
  const end = session.completedAt ? Date.parse(session.completedAt) : now.getTime();
  return Math.max(0, (end - Date.parse(session.startedAt)) / 1000);
}

function advance(session: RoutineSession, completion: HabitCompletion, now: Date): RoutineSession {
  const total = activeHabits(session).length;
  const completions = [...session.completions, completion];
  if (session.currentHabitIndex < total - 1) {
    return { ...session, completions, currentHabitIndex: session.currentHabitIndex + 1 };
  }
  return { ...session, completions, completedAt: now.toISOString() };
}

export type CompleteHabitParams = {
  duration?: Duration;
  notes?: string;
  now?: Date;
};

export function completeCurrentHabit(
  session: RoutineSession,
  params: CompleteHabitParams = {},
): RoutineSession {
  if (isSessionCompleted(session)) return session;
  const habit = currentHabit(session);
  if (!habit) return session;
  const now = params.now ?? new Date();

  const completion: HabitCompletion = {
    id: createId('completion'),
    habitId: habit.id,
    completedAt: now.toISOString(),
    isSkipped: false,
  };
  if (params.duration !== undefined) completion.duration = params.duration;
  if (params.notes !== undefined) completion.notes = params.notes;

  return advance(session, completion, now);
}

export function skipCurrentHabit(
  session: RoutineSession,
  params: { reason?: string; now?: Date } = {},
): RoutineSession {
  if (isSessionCompleted(session)) return session;
  const habit = currentHabit(session);
  if (!habit) return session;
  const now = params.now ?? new Date();

  const completion: HabitCompletion = {
    id: createId('completion'),
    habitId: habit.id,
    completedAt: now.toISOString(),
    duration: 0,
    isSkipped: true,
  };
  if (params.reason !== undefined) completion.notes = params.reason;

  return advance(session, completion, now);
}

/**
 * Step back one habit and drop its completion so it can be redone.
 * On a finished session this reopens it on its last habit instead.
 */
export function goToPreviousHabit(session: RoutineSession): RoutineSession {
  const index = isSessionCompleted(session) ? session.currentHabitIndex : session.currentHabitIndex - 1;
  const target = activeHabits(session)[index];
  if (index < 0 || !target) return session;
  return {
    ...session,
    currentHabitIndex: index,
    completedAt: null,
    completions: session.completions.filter((completion) => completion.habitId !== target.id),
  };
}

export function goToHabit(session: RoutineSession, index: number): RoutineSession {
  if (!Number.isInteger(index) || index < 0 || index >= activeHabits(session).length) return session;
  return { ...session, currentHabitIndex: index };
}

function withChange(session: RoutineSession, change: SessionChange, now: Date): RoutineSession {
  return {
    ...session,
    modifications: [
      ...session.modifications,
      { id: createId('modification'), timestamp: now.toISOString(), change },
    ],
  };
}

export function addSessionHabit(session: RoutineSession, habit: Habit, now: Date = new Date()): RoutineSession {
  return withChange(session, { type: 'added', habit }, now);
}

export function removeSessionHabit(
  session: RoutineSession,
  habitId: string,
  now: Date = new Date(),
): RoutineSession {
  return withChange(session, { type: 'removed', habitId }, now);
}

export function modifySessionHabit(session: RoutineSession, habit: Habit, now: Date = new Date()): RoutineSession {
  return withChange(session, { type: 'modified', habitId: habit.id, habit }, now);
}

export function reorderSessionHabits(
  session: RoutineSession,
  habits: Habit[],
  now: Date = new Date(),
): RoutineSession {
  return withChange(session, { type: 'reordered', habits }, now);
}

export function forceCompleteSession(session: RoutineSession, now: Date = new Date()): RoutineSession {
  if (isSessionCompleted(session)) return session;
  return { ...session, completedAt: now.toISOString() };
}

/**
 * Answer a conditional habit: splice the option's habits in right after the
 * question, renumber everything sequentially, complete the question and move
 * on to the first injected habit (or the next original habit for an empty path).
 */
export function injectConditionalPath(
  session: RoutineSession,
  conditionalHabitId: string,
  option: ConditionalOption,
  now: Date = new Date(),
): RoutineSession {
  if (isSessionCompleted(session)) return session;
  const habits = activeHabits(session);
  const anchorIndex = habits.findIndex((habit) => habit.id === conditionalHabitId);
  if (anchorIndex < 0) return session;

  let next: RoutineSession = { ...session, currentHabitIndex: anchorIndex };

  if (option.habits.length > 0) {
    const head = habits.slice(0, anchorIndex + 1);
    const path = option.habits.map((habit) => cloneHabitWithNewId(habit, { isActive: true }));
    const tail = habits.slice(anchorIndex + 1);
    const newOrder = [...head, ...path, ...tail].map((habit, index) => ({ ...habit, order: index }));
    next = reorderSessionHabits(next, newOrder, now);
  }

  return completeCurrentHabit(next, { notes: `Selected: ${option.text}`, now });
}

export function completionCounts(session: RoutineSession): { completed: number; skipped: number } {
  const skipped = session.completions.filter((completion) => completion.isSkipped).length;
  return { completed: session.completions.length - skipped, skipped };
}
