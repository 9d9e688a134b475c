export type ErrorCode =
  | 'CONFIG'
  | 'VALIDATION'
  | 'PLANNING'
  | 'EXECUTION'
  | 'SUMMARY'
  | 'TIMEOUT'
  | 'INTERNAL';

export class AssistantError extends Error {
  readonly code: ErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AssistantError';
    this.code = code;
    this.details = details;
  }
}

export function isAssistantError(e: unknown): e is AssistantError {
  return e instanceof AssistantError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export const Errors = {
  CONFIG: (msg: string, details?: Record<string, unknown>) => new AssistantError('CONFIG', msg, details),
  CATALOG_NOT_FOUND: (path: string) =>
    new AssistantError('CONFIG', `catalog.json not found (looked for ${path})`, { path }),
  CATALOG_INVALID: (path: string, issues: string[]) =>
    new AssistantError('CONFIG', `Invalid catalog ${path}: ${issues.join('; ')}`, { path, issues }),
  DATASET_MISSING: (dataset: string, path: string) =>
    new AssistantError('CONFIG', `Missing file for dataset '${dataset}': ${path}`, { dataset, path }),
  EMBEDDING_FAILED: (cause: unknown) =>
    new AssistantError('CONFIG', `Embedding failed: ${errorMessage(cause)}`, undefined, { cause }),
  PLAN_INVALID: (issues: string[]) =>
    new AssistantError('VALIDATION', `Invalid query plan: ${issues.join('; ')}`, { issues }),
  TIMEOUT: (label: string, ms: number) =>
    new AssistantError('TIMEOUT', `${label} timed out after ${ms}ms`, { label, ms })
} as const;
