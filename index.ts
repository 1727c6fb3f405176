import { HapticsService, type HapticsDriver } from './src/services/HapticsService';
import { AccessibilityAnnouncer, type AnnouncementDriver } from './src/services/AccessibilityAnnouncer';
import { configureStateStorage, createDefaultStateStorage } from './src/store/storage';
import { useConditionalResponseStore } from './src/store/useConditionalResponseStore';
import { useContextSettingsStore } from './src/store/useContextSettingsStore';
import { useRoutineStore } from './src/store/useRoutineStore';
import { useSnippetStore } from './src/store/useSnippetStore';
import { getHapticsEnabledDefault, loadEnvFiles } from './src/utils/getEnv';
import type { StateStorage } from 'zustand/middleware';

export * from './src/domain/types';
export * from './src/domain/errors';
export * from './src/domain/habits';
export * from './src/domain/routineTemplates';
export * from './src/domain/snippets';
export * from './src/domain/mood';
export * from './src/domain/session';
export * from './src/domain/context';
export * from './src/domain/conditionalHabits';
export { createSampleTemplates } from './src/domain/sampleTemplates';
export { exportDataSchema, conditionalExportSchema, type ExportData } from './src/domain/schemas';

export * from './src/store/storage';
export { useRoutineStore } from './src/store/useRoutineStore';
export { useSnippetStore } from './src/store/useSnippetStore';
export { useContextSettingsStore, type SavedLocationType } from './src/store/useContextSettingsStore';
export { useConditionalResponseStore } from './src/store/useConditionalResponseStore';
export { useToastStore, type ToastPayload, type ToastVariant } from './src/store/useToastStore';

export * from './src/services/routineSelector';
export * from './src/services/dataExport';
export * from './src/services/countdownTimer';
export * from './src/services/HapticsService';
export * from './src/services/AccessibilityAnnouncer';

export * from './src/ui/accessibility';
export * from './src/ui/habitInteraction';
export * from './src/ui/routineExecution';
export * from './src/ui/templateSelection';
export * from './src/ui/toastPresentation';

export * from './src/theme/colorUtils';
export * from './src/utils/formatMinutes';

export type BootstrapOptions = {
  /** Defaults to a file store under ROUTINES_DATA_DIR, or memory when unset. */
  storage?: StateStorage;
  haptics?: HapticsDriver | null;
  announcer?: AnnouncementDriver | null;
  /** Install the sample routines when there are none. Default true. */
  seedSamples?: boolean;
  now?: Date;
};

/**
 * Host start-up: environment, storage, rehydration, sample data and drivers.
 * Resolves once every persisted store has been read back.
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<void> {
  loadEnvFiles();
  configureStateStorage(options.storage ?? createDefaultStateStorage());

  await Promise.all([
    useRoutineStore.persist.rehydrate(),
    useSnippetStore.persist.rehydrate(),
    useContextSettingsStore.persist.rehydrate(),
    useConditionalResponseStore.persist.rehydrate(),
  ]);

  if (options.seedSamples ?? true) {
    useRoutineStore.getState().seedSampleTemplatesIfEmpty({ now: options.now });
  }

  if (options.announcer !== undefined) {
    AccessibilityAnnouncer.setDriver(options.announcer);
  }
  await HapticsService.init({ driver: options.haptics, enabled: getHapticsEnabledDefault() });
}
