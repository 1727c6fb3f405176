import {
  ConditionalHabitError,
  DataImportError,
  RoutineError,
  type ConditionalHabitErrorCode,
  type DataImportErrorCode,
  type RoutineErrorCode,
} from '../domain/errors';
import type { ImportResult } from '../services/dataExport';
import { useToastStore } from '../store/useToastStore';

const routineMessages: Record<RoutineErrorCode, string> = {
  session_already_active: 'Finish or cancel the current routine first',
  no_active_session: 'No routine is running',
  template_not_found: 'That routine no longer exists',
  template_validation_failed: 'This routine has no habits yet',
};

const importMessages: Record<DataImportErrorCode, string> = {
  invalid_json: "That file isn't valid JSON",
  invalid_file_format: "That file isn't a routine backup",
  incompatible_version: 'That backup was made by a newer version of the app',
  file_unreadable: "Couldn't read that file",
};

const conditionalMessages: Record<ConditionalHabitErrorCode, string> = {
  unsupported_version: 'Those responses come from a newer version of the app',
  invalid_data: "Those responses couldn't be read",
};

const FALLBACK_MESSAGE = 'Something went wrong';

export function userMessageForError(error: unknown): string {
  if (error instanceof RoutineError) return routineMessages[error.code];
  if (error instanceof DataImportError) return importMessages[error.code];
  if (error instanceof ConditionalHabitError) return conditionalMessages[error.code];
  return FALLBACK_MESSAGE;
}

/** Shows the error as a toast and returns the message shown. */
export function presentError(error: unknown): string {
  const message = userMessageForError(error);
  if (message === FALLBACK_MESSAGE) {
    console.warn('[toast] unexpected error', error);
  }
  useToastStore.getState().showToast({ message, variant: 'danger' });
  return message;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

export function importResultMessage(result: ImportResult): string {
  const skipped = result.totalItemsSkipped > 0 ? `, skipped ${plural(result.totalItemsSkipped, 'duplicate')}` : '';
  if (!result.hasImportedItems) return `Nothing new to import${skipped}`;
  return `Imported ${plural(result.totalItemsImported, 'item')}${skipped}`;
}

export function presentImportResult(result: ImportResult): string {
  const message = importResultMessage(result);
  useToastStore.getState().showToast({ message, variant: result.hasImportedItems ? 'success' : 'warning' });
  return message;
}
