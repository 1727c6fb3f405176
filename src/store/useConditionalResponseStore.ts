import { create } from 'zustand';
import { createJSONStorage, persist } from 'zustand/middleware';
import { z } from 'zod';
import {
  CONDITIONAL_EXPORT_VERSION,
  compareResponsesNewestFirst,
  computeAnalytics,
  isUsableResponse,
  optionStatistics,
  type ConditionalHabitAnalytics,
  type ConditionalOptionStatistics,
} from '../domain/conditionalHabits';
import { ConditionalHabitError, describeErrorMessage } from '../domain/errors';
import { conditionalExportSchema, conditionalResponseSchema } from '../domain/schemas';
import type { ConditionalResponse } from '../domain/types';
import { isDevEnvironment } from '../utils/getEnv';
import { persistKey, stateStorage } from './storage';

/**
 * Answers given to conditional habits, across sessions.
 *
 * One answer is kept per (habit, session): answering the same question again
 * in a session replaces the earlier answer.
 */

const DEFAULT_HISTORY_LIMIT = 20;

const persistedResponsesSchema = z.object({ responses: z.array(conditionalResponseSchema) });

type PersistedResponses = z.infer<typeof persistedResponsesSchema>;

type ConditionalResponseState = {
  responses: ConditionalResponse[];

  recordResponse: (response: ConditionalResponse) => void;
  latestResponse: (habitId: string) => ConditionalResponse | null;
  /** Oldest first. */
  responsesForRoutine: (routineId: string) => ConditionalResponse[];
  /** Newest first. */
  responseHistory: (habitId: string, limit?: number) => ConditionalResponse[];
  optionStatistics: (habitId: string) => ConditionalOptionStatistics[];
  analytics: () => ConditionalHabitAnalytics;
  skipRate: (habitId: string) => number;
  /** Non-skipped answers per option text. */
  responseCounts: (habitId: string) => Record<string, number>;
  clearAllResponses: () => void;
  exportResponses: (params?: { now?: Date }) => string;
  /** Returns how many responses were added. */
  importResponses: (json: string) => number;
};

const byTimestampAsc = (a: ConditionalResponse, b: ConditionalResponse) => compareResponsesNewestFirst(b, a);

export const useConditionalResponseStore = create<ConditionalResponseState>()(
  persist(
    (set, get) => ({
      responses: [],

      recordResponse: (response) => {
        set((state) => ({
          responses: [
            ...state.responses.filter(
              (r) => !(r.habitId === response.habitId && r.routineId === response.routineId),
            ),
            response,
          ],
        }));
        if (isDevEnvironment()) {
          console.log('[conditional] recorded response', {
            habitId: response.habitId,
            option: response.selectedOptionText,
            wasSkipped: response.wasSkipped,
          });
        }
      },

      latestResponse: (habitId) =>
        get()
          .responses.filter((r) => r.habitId === habitId)
          .sort(compareResponsesNewestFirst)[0] ?? null,

      responsesForRoutine: (routineId) =>
        get()
          .responses.filter((r) => r.routineId === routineId)
          .sort(byTimestampAsc),

      responseHistory: (habitId, limit = DEFAULT_HISTORY_LIMIT) =>
        get()
          .responses.filter((r) => r.habitId === habitId)
          .sort(compareResponsesNewestFirst)
          .slice(0, Math.max(0, limit)),

      optionStatistics: (habitId) => optionStatistics(get().responses, habitId),

      analytics: () => computeAnalytics(get().responses),

      skipRate: (habitId) => {
        const forHabit = get().responses.filter((r) => r.habitId === habitId);
        if (forHabit.length === 0) return 0;
        return forHabit.filter((r) => r.wasSkipped).length / forHabit.length;
      },

      responseCounts: (habitId) => {
        const counts: Record<string, number> = {};
        for (const response of get().responses) {
          if (response.habitId !== habitId || response.wasSkipped) continue;
          counts[response.selectedOptionText] = (counts[response.selectedOptionText] ?? 0) + 1;
        }
        return counts;
      },

      clearAllResponses: () => set({ responses: [] }),

      exportResponses: (params) => {
        const responses = get().responses;
        return JSON.stringify(
          {
            responses,
            analytics: computeAnalytics(responses),
            exportDate: (params?.now ?? new Date()).toISOString(),
            version: CONDITIONAL_EXPORT_VERSION,
          },
          null,
          2,
        );
      },

      importResponses: (json) => {
        let raw: unknown;
        try {
          raw = JSON.parse(json);
        } catch (error) {
          throw new ConditionalHabitError('invalid_data', `Invalid conditional habit data: ${describeErrorMessage(error)}`);
        }

        const parsed = conditionalExportSchema.safeParse(raw);
        if (!parsed.success) {
          throw new ConditionalHabitError('invalid_data', 'Invalid conditional habit data');
        }
        if (parsed.data.version > CONDITIONAL_EXPORT_VERSION) {
          throw new ConditionalHabitError('unsupported_version', `Unsupported data version: ${parsed.data.version}`);
        }

        const merged = [...get().responses];
        let added = 0;
        for (const incoming of parsed.data.responses) {
          const exists = merged.some(
            (existing) =>
              existing.id === incoming.id ||
              (existing.habitId === incoming.habitId &&
                existing.routineId === incoming.routineId &&
                existing.timestamp === incoming.timestamp),
          );
          if (!exists) {
            merged.push(incoming);
            added += 1;
          }
        }
        set({ responses: merged });
        console.log('[conditional] imported responses', { received: parsed.data.responses.length, added });
        return added;
      },
    }),
    {
      name: persistKey('conditional-responses'),
      version: CONDITIONAL_EXPORT_VERSION,
      storage: createJSONStorage(() => stateStorage),
      partialize: (state): PersistedResponses => ({ responses: state.responses }),
      migrate: (persistedState) => {
        const parsed = persistedResponsesSchema.safeParse(persistedState);
        if (!parsed.success) {
          console.warn('[conditional] dropping unreadable stored responses');
          return { responses: [] };
        }
        return { responses: parsed.data.responses.filter(isUsableResponse) };
      },
    },
  ),
);
