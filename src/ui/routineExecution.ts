import { habitTypeIconName } from '../domain/habits';
import { MOOD_SCALE, type MoodOption } from '../domain/mood';
import {
  activeHabits,
  completionCounts,
  currentHabit,
  isSessionCompleted,
  sessionDuration,
  sessionProgress,
} from '../domain/session';
import type { HabitCompletion, RoutineSession } from '../domain/types';
import { resolveHabitColor } from '../theme/colorUtils';
import { formatMinutesSeconds } from '../utils/formatMinutes';
import { habitCardLabel, progressBarLabel } from './accessibility';

export type ProgressHeaderModel = {
  title: string;
  /** "Habit 2 of 5" */
  position: string;
  /** 0..1 */
  progress: number;
  percentLabel: string;
  elapsedLabel: string;
  color: string;
  accessibilityLabel: string;
};

export function buildProgressHeader(session: RoutineSession, now: Date = new Date()): ProgressHeaderModel {
  const total = activeHabits(session).length;
  const progress = sessionProgress(session);
  const position = total === 0 ? 0 : Math.min(session.currentHabitIndex + 1, total);
  return {
    title: session.templateName,
    position: `Habit ${position} of ${total}`,
    progress,
    percentLabel: `${Math.round(progress * 100)}%`,
    elapsedLabel: formatMinutesSeconds(sessionDuration(session, now)),
    color: resolveHabitColor(session.templateColor),
    accessibilityLabel: progressBarLabel(session.completions.length, total),
  };
}

export type NavigationControlsModel = {
  canGoBack: boolean;
  canSkip: boolean;
  skipLabel: string;
  /** Shown beside the current habit's name. */
  badge: 'Optional' | null;
};

export function buildNavigationControls(session: RoutineSession): NavigationControlsModel {
  const habit = currentHabit(session);
  const isOpen = !isSessionCompleted(session) && habit !== null;
  return {
    canGoBack: isOpen && session.currentHabitIndex > 0,
    canSkip: isOpen,
    skipLabel: 'Skip',
    badge: habit?.isOptional ? 'Optional' : null,
  };
}

export type CompletionSummaryModel = {
  headline: string;
  completedCount: number;
  skippedCount: number;
  totalCount: number;
  durationLabel: string;
  moodPrompt: string;
  moodOptions: readonly MoodOption[];
};

export function buildCompletionSummary(session: RoutineSession, now: Date = new Date()): CompletionSummaryModel {
  const { completed, skipped } = completionCounts(session);
  const total = activeHabits(session).length;
  const durationLabel = formatMinutesSeconds(sessionDuration(session, now));
  return {
    headline: `You completed ${completed} of ${total} habits in ${durationLabel}`,
    completedCount: completed,
    skippedCount: skipped,
    totalCount: total,
    durationLabel,
    moodPrompt: 'How do you feel?',
    moodOptions: MOOD_SCALE,
  };
}

export type HabitRowStatus = 'done' | 'skipped' | 'current' | 'upcoming';

export type HabitOverviewRow = {
  id: string;
  name: string;
  icon: string;
  color: string;
  status: HabitRowStatus;
  /** Time logged on completion, when there was any. */
  durationLabel: string | null;
  accessibilityLabel: string;
};

export function buildHabitOverview(session: RoutineSession): HabitOverviewRow[] {
  const latestByHabit = new Map<string, HabitCompletion>();
  for (const completion of session.completions) {
    latestByHabit.set(completion.habitId, completion);
  }
  const completed = isSessionCompleted(session);

  return activeHabits(session).map((habit, index) => {
    const completion = latestByHabit.get(habit.id);
    let status: HabitRowStatus = 'upcoming';
    if (completion) {
      status = completion.isSkipped ? 'skipped' : 'done';
    } else if (!completed && index === session.currentHabitIndex) {
      status = 'current';
    }
    return {
      id: habit.id,
      name: habit.name,
      icon: habitTypeIconName(habit.type),
      color: resolveHabitColor(habit.color),
      status,
      durationLabel:
        completion?.duration !== undefined && !completion.isSkipped ? formatMinutesSeconds(completion.duration) : null,
      accessibilityLabel: habitCardLabel(habit),
    };
  });
}
