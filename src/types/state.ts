/**
 * hoststate — State document types
 *
 * 状態ドキュメント・キャッシュエントリ・差分結果の型定義。
 */

import type { StateMap, StateValue } from './value.js';

// ============================================================
// Categories
// ============================================================

/** Sections the System Observer can scan. */
export const SCAN_CATEGORIES = [
  'system',
  'hardware',
  'network',
  'software',
  'services',
  'gaming',
] as const;
export type ScanCategory = (typeof SCAN_CATEGORIES)[number];

/** Every section a current document is guaranteed to carry. */
export const DOCUMENT_SECTIONS = [...SCAN_CATEGORIES, 'notes'] as const;

/** Top-level keys owned by the engine, never addressable by update. */
export const RESERVED_KEYS = ['schema_version', 'last_updated'] as const;

export function isScanCategory(value: string): value is ScanCategory {
  return SCAN_CATEGORIES.some((category) => category === value);
}

// ============================================================
// Document
// ============================================================

/**
 * In-memory state snapshot. `sections` holds every top-level section of the
 * on-disk document except the two metadata fields, including sections
 * carried over from older schema versions.
 */
export interface StateDocument {
  readonly schemaVersion: string;
  readonly lastUpdated: string;
  readonly sections: StateMap;
}

/** On-disk (and export) shape. */
export interface SerializedDocument {
  schema_version: string;
  last_updated: string;
  [section: string]: StateValue;
}

// ============================================================
// Cache
// ============================================================

export interface CacheEntry {
  readonly category: ScanCategory;
  readonly payload: StateMap;
  /** Epoch milliseconds. */
  readonly capturedAt: number;
  readonly ttlMs: number;
}

export type CategoryTtls = Readonly<Record<ScanCategory, number>>;

// ============================================================
// Diff
// ============================================================

export interface ValueChange {
  readonly old: StateValue;
  readonly new: StateValue;
}

export interface DiffResult {
  readonly added: Record<string, StateValue>;
  readonly changed: Record<string, ValueChange>;
  readonly removed: Record<string, StateValue>;
}

export interface DiffSummary {
  added: number;
  changed: number;
  removed: number;
  total: number;
}

// ============================================================
// Orchestrator results
// ============================================================

export type LoadResult =
  | { status: 'loaded'; document: StateDocument }
  | { status: 'not_found' };

export interface ScanOptions {
  /** Overrides the configured scan timeout. */
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface SaveOptions extends ScanOptions {
  forceScan?: boolean;
}

export interface SaveResult {
  document: StateDocument;
  scanned: ScanCategory[];
  fromCache: ScanCategory[];
}

export interface WatchResult {
  path: string;
  value: StateValue;
  /** ISO-8601 time the value was observed. */
  capturedAt: string;
  source: 'cache' | 'document';
}

export interface ExportSink {
  write(chunk: string): void | Promise<void>;
}

export interface CompareResult {
  diff: DiffResult;
  summary: DiffSummary;
  /** Categories that were rescanned (compare) or present in the supplied document (diff). */
  categories: string[];
  storedAt: string;
}

// ============================================================
// Operation surface
// ============================================================

export const STATE_ACTIONS = [
  'load',
  'save',
  'update',
  'compare',
  'export',
  'import',
  'diff',
  'watch',
] as const;
export type StateAction = (typeof STATE_ACTIONS)[number];
