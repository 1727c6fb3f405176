import rawSampleTemplates from './sampleTemplates.json';
import { createHabit } from './habits';
import { createRoutineTemplate } from './routineTemplates';
import { sampleTemplatesSchema } from './schemas';
import type { RoutineTemplate } from './types';

/** The starter routines loaded on first launch. Templates and habits get fresh ids on every call. */
export function createSampleTemplates(now: Date = new Date()): RoutineTemplate[] {
  const createdAt = now.toISOString();
  const definitions = sampleTemplatesSchema.parse(rawSampleTemplates);

  return definitions.map((definition) =>
    createRoutineTemplate({
      name: definition.name,
      description: definition.description,
      color: definition.color,
      isDefault: definition.isDefault ?? false,
      contextRule: definition.contextRule,
      createdAt,
      habits: definition.habits.map((habit, order) =>
        createHabit({
          name: habit.name,
          type: habit.type,
          color: habit.color,
          isOptional: habit.isOptional ?? false,
          order,
          createdAt,
        }),
      ),
    }),
  );
}
