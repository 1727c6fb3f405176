import type {
  CustomLocation,
  DayCategory,
  DayCategorySettings,
  GeoPoint,
  LocationType,
  ResolvedLocation,
  RoutineContext,
  SavedLocation,
  TimeOfDay,
  TimeSlot,
  TimeSlotDefinition,
  Weekday,
} from './types';

export const TIME_SLOTS: readonly TimeSlot[] = [
  'early_morning',
  'morning',
  'late_morning',
  'afternoon',
  'evening',
  'night',
];

export const TIME_SLOT_LABELS: Record<TimeSlot, string> = {
  early_morning: 'Early Morning',
  morning: 'Morning',
  late_morning: 'Late Morning',
  afternoon: 'Afternoon',
  evening: 'Evening',
  night: 'Night',
};

export const TIME_SLOT_ICONS: Record<TimeSlot, string> = {
  early_morning: 'sunrise',
  morning: 'sun.min',
  late_morning: 'sun.max',
  afternoon: 'sun.max.fill',
  evening: 'sunset',
  night: 'moon.stars',
};

export const LOCATION_TYPE_LABELS: Record<LocationType, string> = {
  home: 'Home',
  office: 'Office',
  unknown: 'Unknown',
};

/** Meters. */
export const DEFAULT_LOCATION_RADIUS = 150;

// ---------------------------------------------------------------------------
// Time slots
// ---------------------------------------------------------------------------

export function isTimeSlot(value: string): value is TimeSlot {
  return TIME_SLOTS.some((slot) => slot === value);
}

export function timeSlotFromDate(date: Date): TimeSlot {
  const hour = date.getHours();
  if (hour >= 5 && hour < 7) return 'early_morning';
  if (hour >= 7 && hour < 9) return 'morning';
  if (hour >= 9 && hour < 11) return 'late_morning';
  if (hour >= 11 && hour < 17) return 'afternoon';
  if (hour >= 17 && hour < 21) return 'evening';
  return 'night';
}

export function timeOfDayFromDate(date: Date): TimeOfDay {
  return { hour: date.getHours(), minute: date.getMinutes() };
}

function totalMinutes(time: TimeOfDay): number {
  return time.hour * 60 + time.minute;
}

/** `[start, end)`; a start later than the end wraps past midnight. */
export function timeSlotContains(definition: TimeSlotDefinition, time: TimeOfDay): boolean {
  const t = totalMinutes(time);
  const start = totalMinutes(definition.startTime);
  const end = totalMinutes(definition.endTime);
  if (start <= end) return t >= start && t < end;
  return t >= start || t < end;
}

function builtInSlot(slot: TimeSlot, start: number, end: number): TimeSlotDefinition {
  return {
    id: slot,
    name: TIME_SLOT_LABELS[slot],
    icon: TIME_SLOT_ICONS[slot],
    startTime: { hour: start, minute: 0 },
    endTime: { hour: end, minute: 0 },
    isBuiltIn: true,
  };
}

export function getDefaultTimeSlotDefinitions(): TimeSlotDefinition[] {
  return [
    builtInSlot('early_morning', 5, 7),
    builtInSlot('morning', 7, 9),
    builtInSlot('late_morning', 9, 11),
    builtInSlot('afternoon', 11, 17),
    builtInSlot('evening', 17, 21),
    builtInSlot('night', 21, 5),
  ];
}

/**
 * First definition containing `date` whose id names a built-in slot. Custom
 * definitions without a slot id are skipped; no match falls back to the fixed ranges.
 */
export function resolveTimeSlot(date: Date, definitions: TimeSlotDefinition[]): TimeSlot {
  const time = timeOfDayFromDate(date);
  for (const definition of definitions) {
    if (!timeSlotContains(definition, time)) continue;
    if (isTimeSlot(definition.id)) return definition.id;
  }
  return timeSlotFromDate(date);
}

// ---------------------------------------------------------------------------
// Day categories
// ---------------------------------------------------------------------------

export const WEEKDAY_CATEGORY: DayCategory = {
  id: 'weekday',
  name: 'Weekday',
  icon: 'briefcase',
  color: '#007AFF',
  isBuiltIn: true,
};

export const WEEKEND_CATEGORY: DayCategory = {
  id: 'weekend',
  name: 'Weekend',
  icon: 'house',
  color: '#34C759',
  isBuiltIn: true,
};

/** Sunday first, matching calendar numbering. */
export const WEEKDAYS: readonly Weekday[] = [1, 2, 3, 4, 5, 6, 7];

export const WEEKDAY_SHORT_NAMES: Record<Weekday, string> = {
  1: 'Sun',
  2: 'Mon',
  3: 'Tue',
  4: 'Wed',
  5: 'Thu',
  6: 'Fri',
  7: 'Sat',
};

export function weekdayFromDate(date: Date): Weekday {
  return WEEKDAYS[date.getDay()] ?? 1;
}

export function getDefaultDayCategorySettings(): DayCategorySettings {
  return { weekdayCategories: {}, categories: [WEEKDAY_CATEGORY, WEEKEND_CATEGORY] };
}

export function defaultCategoryForWeekday(weekday: Weekday): DayCategory {
  return weekday === 1 || weekday === 7 ? WEEKEND_CATEGORY : WEEKDAY_CATEGORY;
}

export function categoryForWeekday(settings: DayCategorySettings, weekday: Weekday): DayCategory {
  const categoryId = settings.weekdayCategories[weekday];
  const category = categoryId ? settings.categories.find((c) => c.id === categoryId) : undefined;
  return category ?? defaultCategoryForWeekday(weekday);
}

export function categoryForDate(settings: DayCategorySettings, date: Date): DayCategory {
  return categoryForWeekday(settings, weekdayFromDate(date));
}

export function setWeekdayCategory(
  settings: DayCategorySettings,
  weekday: Weekday,
  categoryId: string,
): DayCategorySettings {
  return { ...settings, weekdayCategories: { ...settings.weekdayCategories, [weekday]: categoryId } };
}

export function addDayCategory(settings: DayCategorySettings, category: DayCategory): DayCategorySettings {
  if (settings.categories.some((c) => c.id === category.id)) return settings;
  return { ...settings, categories: [...settings.categories, category] };
}

export function updateDayCategory(settings: DayCategorySettings, category: DayCategory): DayCategorySettings {
  return {
    ...settings,
    categories: settings.categories.map((c) => (c.id === category.id ? category : c)),
  };
}

/** Built-ins stay. Weekdays that pointed at the removed category go back to their default. */
export function deleteDayCategory(settings: DayCategorySettings, categoryId: string): DayCategorySettings {
  const target = settings.categories.find((c) => c.id === categoryId);
  if (!target || target.isBuiltIn) return settings;

  const weekdayCategories: Partial<Record<Weekday, string>> = { ...settings.weekdayCategories };
  for (const weekday of WEEKDAYS) {
    if (weekdayCategories[weekday] === categoryId) {
      weekdayCategories[weekday] = defaultCategoryForWeekday(weekday).id;
    }
  }
  return {
    categories: settings.categories.filter((c) => c.id !== categoryId),
    weekdayCategories,
  };
}

/** "All days: Weekday", or groups in first-seen weekday order: "Weekend: Sun, Sat • Weekday: Mon, ...". */
export function dayCategorySummary(settings: DayCategorySettings): string {
  const groups = new Map<string, string[]>();
  for (const weekday of WEEKDAYS) {
    const name = categoryForWeekday(settings, weekday).name;
    const days = groups.get(name) ?? [];
    days.push(WEEKDAY_SHORT_NAMES[weekday]);
    groups.set(name, days);
  }

  if (groups.size === 1) {
    const [only] = groups.keys();
    return `All days: ${only}`;
  }

  return Array.from(groups.entries())
    .map(([name, days]) => `${name}: ${days.join(', ')}`)
    .join(' • ');
}

// ---------------------------------------------------------------------------
// Location
// ---------------------------------------------------------------------------

const EARTH_RADIUS_METERS = 6_371_000;

const toRadians = (degrees: number) => (degrees * Math.PI) / 180;

export function distanceMeters(a: GeoPoint, b: GeoPoint): number {
  const dLat = toRadians(b.latitude - a.latitude);
  const dLon = toRadians(b.longitude - a.longitude);
  const lat1 = toRadians(a.latitude);
  const lat2 = toRadians(b.latitude);
  const h = Math.sin(dLat / 2) ** 2 + Math.cos(lat1) * Math.cos(lat2) * Math.sin(dLon / 2) ** 2;
  return 2 * EARTH_RADIUS_METERS * Math.asin(Math.min(1, Math.sqrt(h)));
}

export type SavedLocations = Partial<Record<Exclude<LocationType, 'unknown'>, SavedLocation>>;

/**
 * Match a fix against saved home/office and custom places. Every place whose
 * radius covers the fix is a candidate; the nearest one wins.
 */
export function resolveLocation(
  fix: GeoPoint | null,
  savedLocations: SavedLocations,
  customLocations: CustomLocation[],
): ResolvedLocation {
  const unknown: ResolvedLocation = { kind: 'builtin', type: 'unknown' };
  if (!fix) return unknown;

  const candidates: Array<{ place: SavedLocation; location: ResolvedLocation }> = [];
  if (savedLocations.home) candidates.push({ place: savedLocations.home, location: { kind: 'builtin', type: 'home' } });
  if (savedLocations.office) {
    candidates.push({ place: savedLocations.office, location: { kind: 'builtin', type: 'office' } });
  }
  for (const custom of customLocations) {
    if (custom.location) {
      candidates.push({
        place: custom.location,
        location: { kind: 'custom', customLocationId: custom.id, name: custom.name },
      });
    }
  }

  let best: ResolvedLocation = unknown;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const { place, location } of candidates) {
    const distance = distanceMeters(fix, place);
    const radius = place.radius > 0 ? place.radius : DEFAULT_LOCATION_RADIUS;
    if (distance <= radius && distance < bestDistance) {
      best = location;
      bestDistance = distance;
    }
  }
  return best;
}

/** Id used by context rules: the built-in type, or the custom location's id. */
export function locationRuleId(location: ResolvedLocation): string {
  return location.kind === 'builtin' ? location.type : location.customLocationId;
}

export function locationDisplayName(location: ResolvedLocation): string {
  return location.kind === 'builtin' ? LOCATION_TYPE_LABELS[location.type] : location.name;
}

export function isUnknownLocation(location: ResolvedLocation): boolean {
  return location.kind === 'builtin' && location.type === 'unknown';
}

// ---------------------------------------------------------------------------
// Context
// ---------------------------------------------------------------------------

export type BuildRoutineContextParams = {
  now?: Date;
  settings?: DayCategorySettings;
  timeSlots?: TimeSlotDefinition[];
  location?: ResolvedLocation;
};

export function buildRoutineContext(params: BuildRoutineContextParams = {}): RoutineContext {
  const now = params.now ?? new Date();
  const settings = params.settings ?? getDefaultDayCategorySettings();
  return {
    timeSlot: params.timeSlots ? resolveTimeSlot(now, params.timeSlots) : timeSlotFromDate(now),
    dayCategory: categoryForDate(settings, now),
    location: params.location ?? { kind: 'builtin', type: 'unknown' },
    timestamp: now.toISOString(),
  };
}
