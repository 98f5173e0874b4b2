/**
 * hoststate — Error types
 *
 * Every failure the engine reports is a StateError carrying a stable code.
 * Callers branch on `code`; `message` is for display.
 */

import type { ScanCategory } from './state.js';

export type ErrorDetails = Record<string, unknown>;

export class StateError extends Error {
  readonly code: string;
  readonly details: ErrorDetails;
  /** Action the error surfaced from, filled in by the orchestrator. */
  action?: string;

  constructor(code: string, message: string, details: ErrorDetails = {}, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'StateError';
    this.code = code;
    this.details = details;
  }
}

/** No stored document (or no value at a path). A valid state, not a fault. */
export class NotFoundError extends StateError {
  constructor(message: string, details: ErrorDetails = {}) {
    super('NOT_FOUND', message, details);
    this.name = 'NotFoundError';
  }
}

export class SchemaError extends StateError {
  constructor(message: string, details: ErrorDetails = {}, code = 'SCHEMA_ERROR') {
    super(code, message, details);
    this.name = 'SchemaError';
  }
}

export class CorruptionError extends StateError {
  readonly filePath: string;

  constructor(filePath: string, message: string, cause?: unknown) {
    super('CORRUPT_STATE', message, { filePath }, cause);
    this.name = 'CorruptionError';
    this.filePath = filePath;
  }
}

export type ValidationCode =
  | 'INVALID_PATH'
  | 'INCOMPATIBLE_VALUE'
  | 'INVALID_DOCUMENT'
  | 'MISSING_PARAMETER'
  | 'UNKNOWN_ACTION';

export class ValidationError extends StateError {
  constructor(code: ValidationCode, message: string, details: ErrorDetails = {}) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

export class IoError extends StateError {
  /** True when the caller may retry the same operation unchanged. */
  readonly retryable: boolean;

  constructor(
    code: 'WRITE_FAILED' | 'READ_FAILED' | 'LOCK_TIMEOUT',
    message: string,
    details: ErrorDetails = {},
    cause?: unknown,
    retryable = false,
  ) {
    super(code, message, details, cause);
    this.name = 'IoError';
    this.retryable = retryable;
  }
}

export class LockTimeoutError extends IoError {
  constructor(lockPath: string, timeoutMs: number) {
    super(
      'LOCK_TIMEOUT',
      `Timed out after ${timeoutMs}ms waiting for state lock ${lockPath}`,
      { lockPath, timeoutMs },
      undefined,
      true,
    );
    this.name = 'LockTimeoutError';
  }
}

export class ObserverError extends StateError {
  readonly category: ScanCategory;

  constructor(
    category: ScanCategory,
    message: string,
    code: 'SCAN_FAILED' | 'SCAN_TIMEOUT' | 'SCAN_ABORTED' = 'SCAN_FAILED',
    cause?: unknown,
  ) {
    super(code, message, { category }, cause);
    this.name = 'ObserverError';
    this.category = category;
  }
}

// ============================================================
// Helpers
// ============================================================

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return err !== null && typeof err === 'object' && 'code' in err && err.code === code;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Tag a StateError with the action it surfaced from. Anything that is not a
 * StateError is wrapped so callers always see a code.
 */
export function withAction(err: unknown, action: string): StateError {
  const stateError =
    err instanceof StateError
      ? err
      : new StateError('INTERNAL_ERROR', `${action} failed: ${errorMessage(err)}`, {}, err);
  stateError.action ??= action;
  return stateError;
}

export interface ErrorPayload {
  code: string;
  message: string;
  action?: string;
  details?: ErrorDetails;
}

export function toErrorPayload(err: unknown): ErrorPayload {
  if (err instanceof StateError) {
    return {
      code: err.code,
      message: err.message,
      ...(err.action !== undefined ? { action: err.action } : {}),
      ...(Object.keys(err.details).length > 0 ? { details: err.details } : {}),
    };
  }
  return { code: 'INTERNAL_ERROR', message: errorMessage(err) };
}
