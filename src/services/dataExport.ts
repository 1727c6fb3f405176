import { promises as fs } from 'fs';
import path from 'path';
import { DataImportError, describeErrorMessage } from '../domain/errors';
import { cloneHabitWithNewId } from '../domain/habits';
import { exportDataSchema, formatZodIssues, type ExportData } from '../domain/schemas';
import type { RoutineTemplate } from '../domain/types';
import { useContextSettingsStore, type SavedLocationType } from '../store/useContextSettingsStore';
import { useRoutineStore } from '../store/useRoutineStore';
import { getAppVersion } from '../utils/getEnv';
import { createId } from '../utils/ids';

/**
 * Backup and restore of routines and context settings as a single JSON file.
 * Imports merge into what is already there; nothing existing is overwritten.
 */

export type ImportResult = {
  routinesImported: number;
  routinesSkipped: number;
  customLocationsImported: number;
  customLocationsSkipped: number;
  savedLocationsImported: number;
  dayCategoriesImported: number;
  exportDate: string | null;
  sourceAppVersion: string | null;
  totalItemsImported: number;
  totalItemsSkipped: number;
  hasImportedItems: boolean;
};

const SAVED_LOCATION_TYPES: readonly SavedLocationType[] = ['home', 'office'];

function isSavedLocationType(value: string): value is SavedLocationType {
  return SAVED_LOCATION_TYPES.some((type) => type === value);
}

export function exportData(now: Date = new Date()): ExportData {
  const { templates } = useRoutineStore.getState();
  const { customLocations, savedLocations, dayCategorySettings } = useContextSettingsStore.getState();

  const saved: ExportData['savedLocations'] = [];
  for (const locationType of SAVED_LOCATION_TYPES) {
    const location = savedLocations[locationType];
    if (location) saved.push({ locationType, location });
  }

  return {
    routines: templates,
    customLocations,
    savedLocations: saved,
    dayCategories: dayCategorySettings.categories,
    exportDate: now.toISOString(),
    appVersion: getAppVersion(),
  };
}

function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeysDeep);
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => compareKeys(a, b))
        .map(([key, nested]) => [key, sortKeysDeep(nested)]),
    );
  }
  return value;
}

/** Pretty-printed, keys sorted at every level so two exports of the same data diff cleanly. */
export function exportToJSON(now: Date = new Date()): string {
  return JSON.stringify(sortKeysDeep(exportData(now)), null, 2);
}

const pad2 = (value: number) => String(value).padStart(2, '0');

/** `HabitTracker_Export_yyyy-MM-dd_HH-mm-ss.json`, local time. */
export function generateExportFilename(now: Date = new Date()): string {
  const date = `${now.getFullYear()}-${pad2(now.getMonth() + 1)}-${pad2(now.getDate())}`;
  const time = `${pad2(now.getHours())}-${pad2(now.getMinutes())}-${pad2(now.getSeconds())}`;
  return `HabitTracker_Export_${date}_${time}.json`;
}

function majorVersion(version: string): number | null {
  const major = Number.parseInt(version.split('.')[0] ?? '', 10);
  return Number.isFinite(major) ? major : null;
}

function parseExport(json: string): ExportData {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new DataImportError('invalid_json', `Invalid JSON format: ${describeErrorMessage(error)}`);
  }

  const parsed = exportDataSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    console.warn('[export] import file failed validation', { issues: issues.slice(0, 5) });
    throw new DataImportError('invalid_file_format', 'File format not recognized', issues);
  }

  const sourceMajor = majorVersion(parsed.data.appVersion);
  const currentMajor = majorVersion(getAppVersion());
  if (sourceMajor !== null && currentMajor !== null && sourceMajor > currentMajor) {
    throw new DataImportError(
      'incompatible_version',
      `Import file from incompatible app version ${parsed.data.appVersion}`,
    );
  }
  return parsed.data;
}

/** Fresh ids all the way down, so conditional responses never mix with a local copy. */
function importRoutine(routine: RoutineTemplate): RoutineTemplate {
  return { ...routine, id: createId('template'), habits: routine.habits.map((habit) => cloneHabitWithNewId(habit)) };
}

export function importFromJSON(json: string): ImportResult {
  const data = parseExport(json);
  const routineStore = useRoutineStore.getState();
  const contextStore = useContextSettingsStore.getState();

  let routinesImported = 0;
  let routinesSkipped = 0;
  for (const routine of data.routines) {
    if (useRoutineStore.getState().templates.some((existing) => existing.name === routine.name)) {
      routinesSkipped += 1;
      continue;
    }
    routineStore.addTemplate(importRoutine(routine));
    routinesImported += 1;
  }

  let customLocationsImported = 0;
  let customLocationsSkipped = 0;
  for (const custom of data.customLocations) {
    if (useContextSettingsStore.getState().customLocations.some((existing) => existing.name === custom.name)) {
      customLocationsSkipped += 1;
      continue;
    }
    contextStore.addCustomLocation({
      name: custom.name,
      icon: custom.icon,
      location: custom.location,
      radius: custom.location?.radius,
    });
    customLocationsImported += 1;
  }

  let savedLocationsImported = 0;
  for (const { locationType, location } of data.savedLocations) {
    if (!isSavedLocationType(locationType)) continue;
    if (useContextSettingsStore.getState().savedLocations[locationType]) continue;
    contextStore.saveLocation(locationType, location, { name: location.name, radius: location.radius });
    savedLocationsImported += 1;
  }

  let dayCategoriesImported = 0;
  for (const category of data.dayCategories) {
    const existing = useContextSettingsStore.getState().dayCategorySettings.categories;
    if (existing.some((c) => c.name === category.name || c.id === category.id)) continue;
    contextStore.addDayCategory({ ...category, isBuiltIn: false });
    dayCategoriesImported += 1;
  }

  const totalItemsImported = routinesImported + customLocationsImported + savedLocationsImported + dayCategoriesImported;
  const totalItemsSkipped = routinesSkipped + customLocationsSkipped;

  console.log('[export] import finished', { totalItemsImported, totalItemsSkipped });

  return {
    routinesImported,
    routinesSkipped,
    customLocationsImported,
    customLocationsSkipped,
    savedLocationsImported,
    dayCategoriesImported,
    exportDate: data.exportDate,
    sourceAppVersion: data.appVersion,
    totalItemsImported,
    totalItemsSkipped,
    hasImportedItems: totalItemsImported > 0,
  };
}

export async function importFromFile(filePath: string): Promise<ImportResult> {
  let json: string;
  try {
    json = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new DataImportError('file_unreadable', `Could not read ${filePath}: ${describeErrorMessage(error)}`);
  }
  return importFromJSON(json);
}

/** Writes a fresh export into `dir` and returns the file path. */
export async function exportToFile(dir: string, now: Date = new Date()): Promise<string> {
  const target = path.join(dir, generateExportFilename(now));
  await fs.mkdir(dir, { recursive: true });
  await fs.writeFile(target, exportToJSON(now), 'utf-8');
  return target;
}
