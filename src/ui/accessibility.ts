import { describeHabitType } from '../domain/habits';
import type { Habit } from '../domain/types';

/** Stable element identifiers for UI automation. */
export const a11yIds = {
  routineExecutionView: 'routine_execution_view',
  routineBuilderView: 'routine_builder_view',
  settingsView: 'settings_view',
  progressBar: 'progress_bar',
  progressText: 'progress_text',
  durationText: 'duration_text',
  previousHabitButton: 'previous_habit_button',
  nextHabitButton: 'next_habit_button',
  addHabitButton: 'add_habit_button',
  habitInteractionView: (habitId: string) => `habit_interaction_${habitId}`,
  completeHabitButton: (habitId: string) => `complete_habit_button_${habitId}`,
  skipHabitButton: (habitId: string) => `skip_habit_button_${habitId}`,
  habitCheckbox: (habitId: string) => `habit_checkbox_${habitId}`,
  timerStartButton: (habitId: string) => `timer_start_button_${habitId}`,
  timerStopButton: (habitId: string) => `timer_stop_button_${habitId}`,
  templateCard: (templateId: string) => `template_card_${templateId}`,
  conditionalOption: (optionId: string) => `conditional_option_${optionId}`,
  counterItem: (index: number) => `counter_item_${index}`,
} as const;

export function progressBarLabel(completed: number, total: number): string {
  return `Progress: ${completed} of ${total} habits completed`;
}

export function habitCardLabel(habit: Habit): string {
  return `${habit.name}, ${describeHabitType(habit.type)}`;
}

export function completeHabitLabel(habitName: string): string {
  return `Complete ${habitName}`;
}

export function skipHabitLabel(habitName: string): string {
  return `Skip ${habitName}`;
}

export function timerButtonLabel(habitName: string, isRunning: boolean): string {
  return isRunning ? `Stop timer for ${habitName}` : `Start timer for ${habitName}`;
}

export function checkboxHabitLabel(habitName: string, isCompleted: boolean): string {
  return `${habitName}, ${isCompleted ? 'completed' : 'not completed'}`;
}

export function counterItemLabel(itemName: string, isChecked: boolean): string {
  return `${itemName}, ${isChecked ? 'checked' : 'not checked'}`;
}

export function routineTemplateLabel(templateName: string, habitsCount: number, duration: string): string {
  return `${templateName}, ${habitsCount} ${habitsCount === 1 ? 'habit' : 'habits'}, ${duration}`;
}

export function conditionalOptionLabel(optionText: string, pathLength: number): string {
  if (pathLength === 0) return optionText;
  return `${optionText}, adds ${pathLength} ${pathLength === 1 ? 'habit' : 'habits'}`;
}
