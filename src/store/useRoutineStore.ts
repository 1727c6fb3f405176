import { create } from 'zustand';
import { createJSONStorage, persist } from 'zustand/middleware';
import { createOptionResponse, createSkipResponse } from '../domain/conditionalHabits';
import { RoutineError } from '../domain/errors';
import { createSampleTemplates } from '../domain/sampleTemplates';
import {
  activeHabits,
  addSessionHabit,
  completeCurrentHabit,
  completionCounts,
  createSession,
  forceCompleteSession,
  goToHabit,
  goToPreviousHabit,
  injectConditionalPath,
  removeSessionHabit,
  reorderSessionHabits,
  sessionProgress,
  skipCurrentHabit,
  type CompleteHabitParams,
} from '../domain/session';
import type { Habit, Mood, MoodRating, RoutineSession, RoutineTemplate } from '../domain/types';
import { HapticsService } from '../services/HapticsService';
import { selectBestTemplate, type TemplateSelection } from '../services/routineSelector';
import { createId } from '../utils/ids';
import { useConditionalResponseStore } from './useConditionalResponseStore';
import { useContextSettingsStore } from './useContextSettingsStore';
import { persistKey, stateStorage } from './storage';

/**
 * The routine service the screens bind to: templates, the running session and
 * mood ratings. Session steps go through the pure reducer in `domain/session`.
 */

type RoutineState = {
  templates: RoutineTemplate[];
  currentSession: RoutineSession | null;
  moodRatings: MoodRating[];
  hasSeededTemplates: boolean;

  /** Loads the starter routines once. Returns true when it did. */
  seedSampleTemplatesIfEmpty: (params?: { now?: Date }) => boolean;

  getTemplate: (templateId: string) => RoutineTemplate | null;
  addTemplate: (template: RoutineTemplate) => void;
  updateTemplate: (template: RoutineTemplate) => void;
  deleteTemplate: (templateId: string) => void;
  lastUsedTemplate: () => RoutineTemplate | null;
  defaultTemplate: () => RoutineTemplate | null;
  getSmartTemplate: (params?: { now?: Date }) => TemplateSelection;

  startSession: (templateId: string, params?: { now?: Date }) => RoutineSession;
  completeCurrentHabit: (params?: CompleteHabitParams) => void;
  skipCurrentHabit: (params?: { reason?: string; now?: Date }) => void;
  goToPreviousHabit: () => void;
  goToHabit: (index: number) => void;
  addHabitToSession: (habit: Habit) => void;
  removeHabitFromSession: (habitId: string) => void;
  reorderSessionHabits: (habits: Habit[]) => void;
  /** Finishes the session, clears it and hands it back for the summary screen. */
  completeCurrentSession: (params?: { now?: Date }) => RoutineSession;
  cancelCurrentSession: () => void;

  selectConditionalOption: (habitId: string, optionId: string, params?: { now?: Date }) => void;
  skipConditionalHabit: (habitId: string, params?: { now?: Date }) => void;

  addMoodRating: (mood: Mood, sessionId: string, notes?: string) => MoodRating;

  resetStore: () => void;
};

function withExclusiveDefault(templates: RoutineTemplate[], defaultId: string): RoutineTemplate[] {
  return templates.map((template) =>
    template.id === defaultId || !template.isDefault ? template : { ...template, isDefault: false },
  );
}

export const useRoutineStore = create<RoutineState>()(
  persist(
    (set, get) => {
      /** Returns true when the session changed. */
      const updateSession = (reduce: (session: RoutineSession) => RoutineSession): boolean => {
        const session = get().currentSession;
        if (!session) return false;
        const next = reduce(session);
        if (next === session) return false;
        set({ currentSession: next });
        return true;
      };

      const requireSession = (): RoutineSession => {
        const session = get().currentSession;
        if (!session) throw new RoutineError('no_active_session', 'No active routine session');
        return session;
      };

      return {
        templates: [],
        currentSession: null,
        moodRatings: [],
        hasSeededTemplates: false,

        seedSampleTemplatesIfEmpty: (params) => {
          const { hasSeededTemplates, templates } = get();
          if (hasSeededTemplates || templates.length > 0) return false;
          console.log('[routine] creating sample templates for first launch');
          set({ templates: createSampleTemplates(params?.now), hasSeededTemplates: true });
          return true;
        },

        getTemplate: (templateId) => get().templates.find((template) => template.id === templateId) ?? null,

        addTemplate: (template) =>
          set((state) => {
            // The first routine becomes the default.
            if (state.templates.length === 0) return { templates: [{ ...template, isDefault: true }] };
            const templates = [...state.templates, template];
            return { templates: template.isDefault ? withExclusiveDefault(templates, template.id) : templates };
          }),

        updateTemplate: (template) =>
          set((state) => {
            if (!state.templates.some((existing) => existing.id === template.id)) return state;
            const templates = state.templates.map((existing) => (existing.id === template.id ? template : existing));
            return { templates: template.isDefault ? withExclusiveDefault(templates, template.id) : templates };
          }),

        deleteTemplate: (templateId) =>
          set((state) => ({ templates: state.templates.filter((template) => template.id !== templateId) })),

        lastUsedTemplate: () => {
          let best: RoutineTemplate | null = null;
          for (const template of get().templates) {
            if (!template.lastUsedAt) continue;
            if (!best?.lastUsedAt || Date.parse(template.lastUsedAt) > Date.parse(best.lastUsedAt)) {
              best = template;
            }
          }
          return best;
        },

        defaultTemplate: () => get().templates.find((template) => template.isDefault) ?? null,

        getSmartTemplate: (params) => {
          const context = useContextSettingsStore.getState().currentContext(params);
          return selectBestTemplate(get().templates, context);
        },

        startSession: (templateId, params) => {
          const state = get();
          if (state.currentSession) {
            throw new RoutineError('session_already_active', 'A routine session is already active', templateId);
          }
          const template = state.templates.find((candidate) => candidate.id === templateId);
          if (!template) {
            throw new RoutineError('template_not_found', `Routine template not found: ${templateId}`, templateId);
          }
          if (template.habits.length === 0) {
            throw new RoutineError('template_validation_failed', 'Template has no habits', templateId);
          }

          const now = params?.now ?? new Date();
          const session = createSession(template, now);
          set({
            currentSession: session,
            templates: state.templates.map((candidate) =>
              candidate.id === templateId ? { ...candidate, lastUsedAt: now.toISOString() } : candidate,
            ),
          });
          return session;
        },

        completeCurrentHabit: (params) => {
          if (updateSession((session) => completeCurrentHabit(session, params))) {
            void HapticsService.trigger('habit.complete');
          }
        },
        skipCurrentHabit: (params) => {
          if (updateSession((session) => skipCurrentHabit(session, params))) {
            void HapticsService.trigger('habit.skip');
          }
        },
        goToPreviousHabit: () => {
          updateSession(goToPreviousHabit);
        },
        goToHabit: (index) => {
          updateSession((session) => goToHabit(session, index));
        },
        addHabitToSession: (habit) => {
          updateSession((session) => addSessionHabit(session, habit));
        },
        removeHabitFromSession: (habitId) => {
          updateSession((session) => removeSessionHabit(session, habitId));
        },
        reorderSessionHabits: (habits) => {
          updateSession((session) => reorderSessionHabits(session, habits));
        },

        completeCurrentSession: (params) => {
          const finished = forceCompleteSession(requireSession(), params?.now);
          set({ currentSession: null });
          return finished;
        },

        cancelCurrentSession: () => {
          const session = requireSession();
          const { completed } = completionCounts(session);
          console.log('[routine] session cancelled', {
            sessionId: session.id,
            templateName: session.templateName,
            progress: sessionProgress(session),
            completedHabits: completed,
            totalHabits: activeHabits(session).length,
          });
          set({ currentSession: null });
        },

        selectConditionalOption: (habitId, optionId, params) => {
          const session = get().currentSession;
          if (!session) return;
          const habit = activeHabits(session).find((candidate) => candidate.id === habitId);
          if (!habit || habit.type.kind !== 'conditional') {
            console.warn('[conditional] habit is not a conditional habit in this session', { habitId });
            return;
          }
          const option = habit.type.info.options.find((candidate) => candidate.id === optionId);
          if (!option) {
            console.warn('[conditional] unknown option', { habitId, optionId });
            return;
          }

          const now = params?.now ?? new Date();
          useConditionalResponseStore.getState().recordResponse(
            createOptionResponse({
              habitId,
              question: habit.type.info.question,
              routineId: session.id,
              option,
              timestamp: now.toISOString(),
            }),
          );
          set({ currentSession: injectConditionalPath(session, habitId, option, now) });
        },

        skipConditionalHabit: (habitId, params) => {
          const session = get().currentSession;
          if (!session) return;
          const habit = activeHabits(session).find((candidate) => candidate.id === habitId);
          if (!habit || habit.type.kind !== 'conditional') {
            console.warn('[conditional] habit is not a conditional habit in this session', { habitId });
            return;
          }
          useConditionalResponseStore.getState().recordResponse(
            createSkipResponse({
              habitId,
              question: habit.type.info.question,
              routineId: session.id,
              timestamp: (params?.now ?? new Date()).toISOString(),
            }),
          );
        },

        addMoodRating: (mood, sessionId, notes) => {
          const rating: MoodRating = {
            id: createId('mood'),
            sessionId,
            rating: mood,
            recordedAt: new Date().toISOString(),
          };
          if (notes !== undefined && notes.trim().length > 0) rating.notes = notes.trim();
          set((state) => ({ moodRatings: [...state.moodRatings, rating] }));
          return rating;
        },

        resetStore: () => set({ templates: [], currentSession: null, moodRatings: [], hasSeededTemplates: false }),
      };
    },
    {
      name: persistKey('routines'),
      storage: createJSONStorage(() => stateStorage),
      partialize: (state) => ({
        templates: state.templates,
        currentSession: state.currentSession,
        moodRatings: state.moodRatings,
        hasSeededTemplates: state.hasSeededTemplates,
      }),
    },
  ),
);
