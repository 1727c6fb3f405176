/** Seconds. */
export type Duration = number;

export interface Subtask {
  id: string;
  name: string;
  isOptional: boolean;
}

export type HabitType =
  | { kind: 'checkbox' }
  | { kind: 'checkboxWithSubtasks'; subtasks: Subtask[] }
  | { kind: 'timer'; defaultDuration: Duration }
  | { kind: 'restTimer'; targetDuration: Duration | null }
  | {
      kind: 'appLaunch';
      /**
       * Either a URL scheme (`things:///today`) or the name of a Shortcuts
       * shortcut. Anything without `://` is treated as a shortcut name.
       */
      bundleId: string;
      appName: string;
    }
  | { kind: 'website'; url: string; title: string }
  | { kind: 'counter'; items: string[] }
  | { kind: 'conditional'; info: ConditionalHabitInfo };

export type HabitKind = HabitType['kind'];

export interface Habit {
  id: string;
  name: string;
  type: HabitType;
  isOptional: boolean;
  notes?: string;
  /** Hex color string, e.g. `#007AFF`. */
  color: string;
  order: number;
  isActive: boolean;
  createdAt: string;
}

export interface ConditionalOption {
  id: string;
  text: string;
  /** Habits injected into the session when this option is picked. */
  habits: Habit[];
}

export interface ConditionalHabitInfo {
  question: string;
  /** At most four; extra options are dropped on construction. */
  options: ConditionalOption[];
}

export interface ConditionalResponse {
  id: string;
  habitId: string;
  question: string;
  selectedOptionId: string;
  selectedOptionText: string;
  timestamp: string;
  /** Session id the answer was given in. */
  routineId: string;
  wasSkipped: boolean;
}

export interface HabitCompletion {
  id: string;
  habitId: string;
  completedAt: string;
  duration?: Duration;
  isSkipped: boolean;
  notes?: string;
}

export type SessionChange =
  | { type: 'added'; habit: Habit }
  | { type: 'removed'; habitId: string }
  | { type: 'modified'; habitId: string; habit: Habit }
  | { type: 'reordered'; habits: Habit[] };

export interface SessionModification {
  id: string;
  timestamp: string;
  change: SessionChange;
}

export interface RoutineSession {
  id: string;
  templateId: string;
  templateName: string;
  templateColor: string;
  /** Snapshot of the template's habits when the session started. */
  templateHabits: Habit[];
  startedAt: string;
  completedAt: string | null;
  currentHabitIndex: number;
  completions: HabitCompletion[];
  modifications: SessionModification[];
}

export type TimeSlot =
  | 'early_morning'
  | 'morning'
  | 'late_morning'
  | 'afternoon'
  | 'evening'
  | 'night';

export interface TimeOfDay {
  hour: number;
  minute: number;
}

export interface TimeSlotDefinition {
  id: string;
  name: string;
  icon: string;
  startTime: TimeOfDay;
  endTime: TimeOfDay;
  isBuiltIn: boolean;
}

/** 1 = Sunday ... 7 = Saturday, matching the calendar weekday numbering used in exports. */
export type Weekday = 1 | 2 | 3 | 4 | 5 | 6 | 7;

export interface DayCategory {
  id: string;
  name: string;
  icon: string;
  color: string;
  isBuiltIn: boolean;
}

export interface DayCategorySettings {
  /** Weekday -> category id overrides. Missing weekdays use the Mon-Fri / Sat-Sun default. */
  weekdayCategories: Partial<Record<Weekday, string>>;
  categories: DayCategory[];
}

export type LocationType = 'home' | 'office' | 'unknown';

export interface GeoPoint {
  latitude: number;
  longitude: number;
}

export interface SavedLocation extends GeoPoint {
  name?: string;
  /** Meters. */
  radius: number;
  savedAt: string;
}

export interface CustomLocation {
  id: string;
  name: string;
  icon: string;
  location?: SavedLocation;
  createdAt: string;
}

/** Where the user currently is, after matching a fix against known places. */
export type ResolvedLocation =
  | { kind: 'builtin'; type: LocationType }
  | { kind: 'custom'; customLocationId: string; name: string };

export interface RoutineContext {
  timeSlot: TimeSlot;
  dayCategory: DayCategory;
  location: ResolvedLocation;
  timestamp: string;
}

export interface RoutineContextRule {
  timeSlots: TimeSlot[];
  dayCategoryIds: string[];
  /** Built-in location types or custom location ids. Empty means any location. */
  locationIds: string[];
  /** Higher priority wins in conflicts. */
  priority: number;
}

export interface RoutineTemplate {
  id: string;
  name: string;
  description?: string;
  habits: Habit[];
  color: string;
  isDefault: boolean;
  createdAt: string;
  lastUsedAt?: string;
  contextRule?: RoutineContextRule;
}

export interface HabitSnippet {
  id: string;
  name: string;
  habits: Habit[];
  createdAt: string;
}

export type Mood = 'terrible' | 'bad' | 'neutral' | 'good' | 'excellent';

export interface MoodRating {
  id: string;
  sessionId: string;
  rating: Mood;
  recordedAt: string;
  notes?: string;
}
