/**
 * hoststate — State Management Orchestrator
 *
 * load / save / update / compare / export / import / diff / watch を提供する。
 * 各アクションは呼び出し側から見てアトミック: 完全に成功するか、
 * 失敗して永続化済みの状態を一切変更しないかのどちらか。
 *
 * 依存（store, cache, observer, clock）はすべてコンストラクタで注入する。
 */

import type {
  CompareResult,
  LoadResult,
  SaveOptions,
  SaveResult,
  ScanCategory,
  ScanOptions,
  StateAction,
  StateDocument,
  ExportSink,
  WatchResult,
} from '../types/state.js';
import { SCAN_CATEGORIES, isScanCategory } from '../types/state.js';
import type { StateMap, StateValue } from '../types/value.js';
import { StateMapSchema } from '../types/value.js';
import { NotFoundError, ObserverError, StateError, ValidationError, withAction } from '../types/errors.js';
import type { StateStore } from '../db/state-store.js';
import {
  emptyDocument,
  loadDocument,
  serializeDocument,
  setDocumentField,
  withSections,
} from '../db/document.js';
import type { SystemObserver } from '../observer/types.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import type { CacheEntryStatus, CacheStats, Clock, ScanCache } from './scan-cache.js';
import { systemClock } from './scan-cache.js';
import { ScanScope } from './scan-scope.js';
import { compareDocuments, summarizeDiff } from './diff.js';
import { getPath, parsePath } from './field-path.js';
import type { GetResult } from './field-path.js';

export interface StateManagerOptions {
  store: StateStore;
  cache: ScanCache;
  observer: SystemObserver;
  /** Categories `save` and `compare` observe. Defaults to all. */
  categories?: readonly ScanCategory[];
  scanTimeoutMs?: number;
  clock?: Clock;
  logger?: Logger;
}

export interface CacheReport {
  entries: CacheEntryStatus[];
  stats: CacheStats;
}

export class StateManager {
  private readonly store: StateStore;
  private readonly cache: ScanCache;
  private readonly observer: SystemObserver;
  private readonly categories: readonly ScanCategory[];
  private readonly scanTimeoutMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: StateManagerOptions) {
    this.store = options.store;
    this.cache = options.cache;
    this.observer = options.observer;
    this.categories = options.categories ?? SCAN_CATEGORIES;
    this.scanTimeoutMs = options.scanTimeoutMs ?? 30_000;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? silentLogger;
  }

  get stateFile(): string {
    return this.store.filePath;
  }

  get scannedCategories(): readonly ScanCategory[] {
    return this.categories;
  }

  // ================================================================
  // load
  // ================================================================

  /** Read the stored document. "Never saved" is a result, not an error. */
  load(): Promise<LoadResult> {
    return this.run<LoadResult>('load', async () => {
      const document = await this.store.read();
      return document === undefined ? { status: 'not_found' } : { status: 'loaded', document };
    });
  }

  // ================================================================
  // save
  // ================================================================

  /**
   * Observe every configured category (from cache where fresh, unless
   * `forceScan`) and persist the result. All scans finish before the file
   * is touched; a failed or cancelled scan writes nothing.
   */
  save(options: SaveOptions = {}): Promise<SaveResult> {
    return this.run('save', async () => {
      const scanned: ScanCategory[] = [];
      const fromCache: ScanCategory[] = [];
      const payloads: Record<string, StateValue> = {};

      const scope = new ScanScope(options, this.scanTimeoutMs);
      try {
        for (const category of this.categories) {
          if (options.forceScan) {
            this.cache.invalidate(category);
          }
          const cached = this.cache.isFresh(category);
          payloads[category] = await this.observe(category, scope);
          (cached ? fromCache : scanned).push(category);
        }
      } finally {
        scope.dispose();
      }
      this.throwIfCancelled(options.signal);

      const document = await this.store.withLock(async () => {
        const current = (await this.store.read()) ?? emptyDocument(this.now());
        const next = withSections(current, payloads, this.now());
        await this.store.write(next);
        return next;
      });

      this.logger.info('State saved', { stateFile: this.stateFile, scanned, fromCache });
      return { document, scanned, fromCache };
    });
  }

  // ================================================================
  // update
  // ================================================================

  /**
   * Set one field and persist. Starts from an empty document when nothing
   * has been saved yet.
   *
   * @throws ValidationError for malformed paths or incompatible values
   */
  update(path: string, value: StateValue): Promise<StateDocument> {
    return this.run('update', async () => {
      parsePath(path);
      const document = await this.store.withLock(async () => {
        const current = (await this.store.read()) ?? emptyDocument(this.now());
        const next = setDocumentField(current, path, value, this.now());
        await this.store.write(next);
        return next;
      });
      this.logger.info('State field updated', { path });
      return document;
    });
  }

  // ================================================================
  // compare / diff
  // ================================================================

  /**
   * Rescan the configured categories and diff them against the stored
   * document. Read-only: nothing is persisted.
   */
  compare(options: ScanOptions = {}): Promise<CompareResult> {
    return this.run('compare', async () => {
      const stored = await this.requireStored('No stored state to compare against - run save first');

      const payloads: Record<string, StateValue> = {};
      const scope = new ScanScope(options, this.scanTimeoutMs);
      try {
        for (const category of this.categories) {
          this.cache.invalidate(category);
          payloads[category] = await this.observe(category, scope);
        }
      } finally {
        scope.dispose();
      }
      this.throwIfCancelled(options.signal);

      const observed = withSections(stored, payloads, this.now());
      const diff = compareDocuments(stored, observed);
      return {
        diff,
        summary: summarizeDiff(diff),
        categories: [...this.categories],
        storedAt: stored.lastUpdated,
      };
    });
  }

  /** Diff the stored document against a caller-supplied one. */
  diff(other: unknown): Promise<CompareResult> {
    return this.run('diff', async () => {
      const supplied = parseSuppliedDocument(other);
      const stored = await this.requireStored('No stored state to diff against - run save first');
      const diff = compareDocuments(stored, supplied);
      return {
        diff,
        summary: summarizeDiff(diff),
        categories: Object.keys(supplied.sections),
        storedAt: stored.lastUpdated,
      };
    });
  }

  // ================================================================
  // export / import
  // ================================================================

  /**
   * Serialize the stored document as-is (no rescan) into `sink`.
   *
   * @returns the serialized text
   */
  exportDocument(sink: ExportSink): Promise<string> {
    return this.run('export', async () => {
      const stored = await this.requireStored('No stored state to export - run save first');
      const text = serializeDocument(stored);
      await sink.write(text);
      return text;
    });
  }

  /**
   * Validate (and migrate) a document, then replace the stored one with it.
   *
   * @param input - JSON text or an already-parsed object
   */
  importDocument(input: unknown): Promise<StateDocument> {
    return this.run('import', async () => {
      const document = parseSuppliedDocument(input);
      await this.store.withLock(() => this.store.write(document));
      this.logger.info('State imported', { schemaVersion: document.schemaVersion });
      return document;
    });
  }

  // ================================================================
  // watch
  // ================================================================

  /**
   * Current value at `path` and when it was observed. Prefers a fresh cache
   * entry for the path's category; otherwise reads the stored document.
   * Never triggers a scan.
   */
  watch(path: string): Promise<WatchResult> {
    return this.run<WatchResult>('watch', async () => {
      const [head, ...rest] = parsePath(path);

      if (isScanCategory(head)) {
        const entry = this.cache.peek(head);
        if (entry !== undefined) {
          const hit: GetResult =
            rest.length === 0 ? { found: true, value: entry.payload } : getPath(entry.payload, rest.join('.'));
          if (hit.found) {
            return {
              path,
              value: hit.value,
              capturedAt: new Date(entry.capturedAt).toISOString(),
              source: 'cache',
            };
          }
        }
      }

      const stored = await this.requireStored('No stored state - run save first');
      const hit = getPath(stored.sections, path);
      if (!hit.found) {
        throw new NotFoundError(`No value at "${path}"`, { path });
      }
      return { path, value: hit.value, capturedAt: stored.lastUpdated, source: 'document' };
    });
  }

  // ================================================================
  // cache
  // ================================================================

  cacheStatus(): CacheReport {
    return { entries: this.cache.status(), stats: this.cache.stats() };
  }

  invalidateCache(category?: ScanCategory): void {
    this.cache.invalidate(category);
    this.logger.debug('Scan cache invalidated', { category: category ?? 'all' });
  }

  // ================================================================
  // internal
  // ================================================================

  private now(): Date {
    return new Date(this.clock.now());
  }

  private async observe(category: ScanCategory, scope: ScanScope): Promise<StateMap> {
    try {
      return await scope.race(
        this.cache.getOrScan(category, async () =>
          checkedPayload(category, await this.observer.scan(category, scope.context)),
        ),
      );
    } catch (err) {
      throw scope.toObserverError(category, err);
    }
  }

  private throwIfCancelled(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
      throw new StateError('SCAN_ABORTED', 'Operation was cancelled before anything was persisted');
    }
  }

  private async requireStored(message: string): Promise<StateDocument> {
    const stored = await this.store.read();
    if (stored === undefined) {
      throw new NotFoundError(message, { stateFile: this.stateFile });
    }
    return stored;
  }

  private async run<T>(action: StateAction, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      const wrapped = withAction(err, action);
      this.logger.warn(`${action} failed`, { code: wrapped.code, message: wrapped.message });
      throw wrapped;
    }
  }
}

// ============================================================
// helpers
// ============================================================

/** Observer output must be storable before it is cached or persisted. */
function checkedPayload(category: ScanCategory, payload: StateMap): StateMap {
  const result = StateMapSchema.safeParse(payload);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ObserverError(category, `Scan of ${category} returned an invalid payload: ${issues.join('; ')}`);
  }
  return result.data;
}

/**
 * Validate a document supplied by a caller (import / diff). Shape problems
 * are ValidationError, version problems SchemaError.
 */
export function parseSuppliedDocument(input: unknown): StateDocument {
  let data: unknown = input;
  if (typeof input === 'string') {
    try {
      data = JSON.parse(input);
    } catch {
      throw new ValidationError('INVALID_DOCUMENT', 'Supplied document is not valid JSON');
    }
  }
  return loadDocument(data);
}
