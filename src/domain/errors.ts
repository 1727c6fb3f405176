export type RoutineErrorCode =
  | 'session_already_active'
  | 'no_active_session'
  | 'template_not_found'
  | 'template_validation_failed';

export class RoutineError extends Error {
  code: RoutineErrorCode;
  templateId?: string;

  constructor(code: RoutineErrorCode, message: string, templateId?: string) {
    super(message);
    this.name = 'RoutineError';
    this.code = code;
    this.templateId = templateId;
  }
}

export type DataImportErrorCode =
  | 'invalid_json'
  | 'invalid_file_format'
  | 'incompatible_version'
  | 'file_unreadable';

export class DataImportError extends Error {
  code: DataImportErrorCode;
  /** Validation issues (path: message) when the file parsed but did not match the export shape. */
  issues: string[];

  constructor(code: DataImportErrorCode, message: string, issues: string[] = []) {
    super(message);
    this.name = 'DataImportError';
    this.code = code;
    this.issues = issues;
  }
}

export type ConditionalHabitErrorCode = 'unsupported_version' | 'invalid_data';

export class ConditionalHabitError extends Error {
  code: ConditionalHabitErrorCode;

  constructor(code: ConditionalHabitErrorCode, message: string) {
    super(message);
    this.name = 'ConditionalHabitError';
    this.code = code;
  }
}

export function describeErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
