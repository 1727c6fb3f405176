import { create } from 'zustand';
import { createJSONStorage, persist } from 'zustand/middleware';
import {
  DEFAULT_LOCATION_RADIUS,
  addDayCategory,
  buildRoutineContext,
  deleteDayCategory,
  getDefaultDayCategorySettings,
  getDefaultTimeSlotDefinitions,
  resolveLocation,
  setWeekdayCategory,
  updateDayCategory,
  type SavedLocations,
} from '../domain/context';
import type {
  CustomLocation,
  DayCategory,
  DayCategorySettings,
  GeoPoint,
  ResolvedLocation,
  RoutineContext,
  SavedLocation,
  TimeSlotDefinition,
  Weekday,
} from '../domain/types';
import { createId } from '../utils/ids';
import { persistKey, stateStorage } from './storage';

export type SavedLocationType = keyof SavedLocations;

type ContextSettingsState = {
  dayCategorySettings: DayCategorySettings;
  timeSlots: TimeSlotDefinition[];
  customLocations: CustomLocation[];
  savedLocations: SavedLocations;
  /** Last location fix reported by the host. Not persisted. */
  currentFix: GeoPoint | null;

  setWeekdayCategory: (weekday: Weekday, categoryId: string) => void;
  addDayCategory: (category: DayCategory) => void;
  updateDayCategory: (category: DayCategory) => void;
  deleteDayCategory: (categoryId: string) => void;
  resetDayCategories: () => void;

  addTimeSlot: (definition: TimeSlotDefinition) => void;
  updateTimeSlot: (definition: TimeSlotDefinition) => void;
  deleteTimeSlot: (definitionId: string) => void;
  resetTimeSlots: () => void;

  addCustomLocation: (params: { name: string; icon: string; location?: GeoPoint; radius?: number }) => CustomLocation;
  updateCustomLocation: (location: CustomLocation) => void;
  deleteCustomLocation: (locationId: string) => void;

  saveLocation: (type: SavedLocationType, point: GeoPoint, options?: { name?: string; radius?: number }) => void;
  clearSavedLocation: (type: SavedLocationType) => void;

  setCurrentFix: (fix: GeoPoint | null) => void;
  resolvedLocation: () => ResolvedLocation;
  currentContext: (params?: { now?: Date }) => RoutineContext;

  resetStore: () => void;
};

function toSavedLocation(point: GeoPoint, options: { name?: string; radius?: number } = {}): SavedLocation {
  return {
    latitude: point.latitude,
    longitude: point.longitude,
    ...(options.name !== undefined ? { name: options.name } : {}),
    radius: options.radius ?? DEFAULT_LOCATION_RADIUS,
    savedAt: new Date().toISOString(),
  };
}

export const useContextSettingsStore = create<ContextSettingsState>()(
  persist(
    (set, get) => ({
      dayCategorySettings: getDefaultDayCategorySettings(),
      timeSlots: getDefaultTimeSlotDefinitions(),
      customLocations: [],
      savedLocations: {},
      currentFix: null,

      setWeekdayCategory: (weekday, categoryId) =>
        set((state) => ({ dayCategorySettings: setWeekdayCategory(state.dayCategorySettings, weekday, categoryId) })),
      addDayCategory: (category) =>
        set((state) => ({ dayCategorySettings: addDayCategory(state.dayCategorySettings, category) })),
      updateDayCategory: (category) =>
        set((state) => ({ dayCategorySettings: updateDayCategory(state.dayCategorySettings, category) })),
      deleteDayCategory: (categoryId) =>
        set((state) => ({ dayCategorySettings: deleteDayCategory(state.dayCategorySettings, categoryId) })),
      resetDayCategories: () => set({ dayCategorySettings: getDefaultDayCategorySettings() }),

      addTimeSlot: (definition) =>
        set((state) => {
          if (state.timeSlots.some((slot) => slot.id === definition.id)) return state;
          return { timeSlots: [...state.timeSlots, definition] };
        }),
      updateTimeSlot: (definition) =>
        set((state) => ({
          timeSlots: state.timeSlots.map((slot) => (slot.id === definition.id ? definition : slot)),
        })),
      deleteTimeSlot: (definitionId) =>
        set((state) => ({
          timeSlots: state.timeSlots.filter((slot) => slot.id !== definitionId || slot.isBuiltIn),
        })),
      resetTimeSlots: () => set({ timeSlots: getDefaultTimeSlotDefinitions() }),

      addCustomLocation: ({ name, icon, location, radius }) => {
        const custom: CustomLocation = {
          id: createId('location'),
          name: name.trim(),
          icon,
          createdAt: new Date().toISOString(),
        };
        if (location) custom.location = toSavedLocation(location, { name: custom.name, radius });
        set((state) => ({ customLocations: [...state.customLocations, custom] }));
        return custom;
      },
      updateCustomLocation: (location) =>
        set((state) => ({
          customLocations: state.customLocations.map((existing) => (existing.id === location.id ? location : existing)),
        })),
      deleteCustomLocation: (locationId) =>
        set((state) => ({ customLocations: state.customLocations.filter((location) => location.id !== locationId) })),

      saveLocation: (type, point, options) =>
        set((state) => ({ savedLocations: { ...state.savedLocations, [type]: toSavedLocation(point, options) } })),
      clearSavedLocation: (type) =>
        set((state) => {
          const { [type]: _removed, ...rest } = state.savedLocations;
          return { savedLocations: rest };
        }),

      setCurrentFix: (fix) => set({ currentFix: fix }),

      resolvedLocation: () => {
        const { currentFix, savedLocations, customLocations } = get();
        return resolveLocation(currentFix, savedLocations, customLocations);
      },

      currentContext: (params) => {
        const state = get();
        return buildRoutineContext({
          now: params?.now,
          settings: state.dayCategorySettings,
          timeSlots: state.timeSlots,
          location: state.resolvedLocation(),
        });
      },

      resetStore: () =>
        set({
          dayCategorySettings: getDefaultDayCategorySettings(),
          timeSlots: getDefaultTimeSlotDefinitions(),
          customLocations: [],
          savedLocations: {},
          currentFix: null,
        }),
    }),
    {
      name: persistKey('context-settings'),
      storage: createJSONStorage(() => stateStorage),
      partialize: (state) => ({
        dayCategorySettings: state.dayCategorySettings,
        timeSlots: state.timeSlots,
        customLocations: state.customLocations,
        savedLocations: state.savedLocations,
      }),
    },
  ),
);
