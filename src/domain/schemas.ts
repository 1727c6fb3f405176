import { z } from 'zod';
import type { ConditionalOption, Habit, HabitType } from './types';

/**
 * Runtime shapes for data that crosses the process boundary: export files,
 * conditional response backups and the bundled sample templates.
 */

export const habitSchema: z.ZodType<Habit> = z.lazy(() =>
  z.object({
    id: z.string().min(1),
    name: z.string(),
    type: habitTypeSchema,
    isOptional: z.boolean(),
    notes: z.string().optional(),
    color: z.string(),
    order: z.number().int(),
    isActive: z.boolean(),
    createdAt: z.string(),
  }),
);

export const subtaskSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  isOptional: z.boolean(),
});

export const conditionalOptionSchema: z.ZodType<ConditionalOption> = z.object({
  id: z.string().min(1),
  text: z.string(),
  habits: z.array(habitSchema),
});

export const habitTypeSchema: z.ZodType<HabitType> = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('checkbox') }),
  z.object({ kind: z.literal('checkboxWithSubtasks'), subtasks: z.array(subtaskSchema) }),
  z.object({ kind: z.literal('timer'), defaultDuration: z.number().nonnegative() }),
  z.object({ kind: z.literal('restTimer'), targetDuration: z.number().nonnegative().nullable() }),
  z.object({ kind: z.literal('appLaunch'), bundleId: z.string(), appName: z.string() }),
  z.object({ kind: z.literal('website'), url: z.string(), title: z.string() }),
  z.object({ kind: z.literal('counter'), items: z.array(z.string()) }),
  z.object({
    kind: z.literal('conditional'),
    info: z.object({ question: z.string(), options: z.array(conditionalOptionSchema) }),
  }),
]);

export const timeSlotSchema = z.enum([
  'early_morning',
  'morning',
  'late_morning',
  'afternoon',
  'evening',
  'night',
]);

export const contextRuleSchema = z.object({
  timeSlots: z.array(timeSlotSchema),
  dayCategoryIds: z.array(z.string()),
  locationIds: z.array(z.string()),
  priority: z.number().int(),
});

export const routineTemplateSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  description: z.string().optional(),
  habits: z.array(habitSchema),
  color: z.string(),
  isDefault: z.boolean(),
  createdAt: z.string(),
  lastUsedAt: z.string().optional(),
  contextRule: contextRuleSchema.optional(),
});

export const savedLocationSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  name: z.string().optional(),
  radius: z.number().positive(),
  savedAt: z.string(),
});

export const customLocationSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  icon: z.string(),
  location: savedLocationSchema.optional(),
  createdAt: z.string(),
});

export const dayCategorySchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  icon: z.string(),
  color: z.string(),
  isBuiltIn: z.boolean(),
});

export const exportDataSchema = z.object({
  routines: z.array(routineTemplateSchema),
  customLocations: z.array(customLocationSchema),
  /** Unrecognised location types are dropped on import. */
  savedLocations: z.array(z.object({ locationType: z.string(), location: savedLocationSchema })),
  dayCategories: z.array(dayCategorySchema),
  exportDate: z.string(),
  appVersion: z.string(),
});

export type ExportData = z.infer<typeof exportDataSchema>;

export const conditionalResponseSchema = z.object({
  id: z.string().min(1),
  habitId: z.string().min(1),
  question: z.string(),
  selectedOptionId: z.string(),
  selectedOptionText: z.string(),
  timestamp: z.string(),
  routineId: z.string(),
  wasSkipped: z.boolean(),
});

export const conditionalExportSchema = z.object({
  responses: z.array(conditionalResponseSchema),
  analytics: z.unknown().optional(),
  exportDate: z.string(),
  version: z.number().int(),
});

export const sampleTemplateSchema = z.object({
  name: z.string(),
  description: z.string(),
  color: z.string(),
  isDefault: z.boolean().optional(),
  contextRule: contextRuleSchema,
  habits: z.array(
    z.object({
      name: z.string(),
      color: z.string(),
      isOptional: z.boolean().optional(),
      type: habitTypeSchema,
    }),
  ),
});

export const sampleTemplatesSchema = z.array(sampleTemplateSchema);

export function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
