/**
 * hoststate — Diff/Compare Engine
 *
 * 2 つのドキュメントを同時に再帰走査し、added / changed / removed を求める。
 * リストは位置ごとに比較する（並べ替えは複数の changed として報告される）。
 * schema_version / last_updated は sections に含まれないため比較対象外。
 */

import type { DiffResult, DiffSummary, StateDocument, ValueChange } from '../types/state.js';
import type { StateValue } from '../types/value.js';
import { isStateList, isStateMap, valuesEqual } from '../types/value.js';
import { joinPath } from './field-path.js';

interface DiffAccumulator {
  added: Record<string, StateValue>;
  changed: Record<string, ValueChange>;
  removed: Record<string, StateValue>;
}

function walk(oldValue: StateValue, newValue: StateValue, path: string, acc: DiffAccumulator): void {
  if (isStateMap(oldValue) && isStateMap(newValue)) {
    for (const [key, next] of Object.entries(newValue)) {
      const childPath = joinPath(path, key);
      if (Object.hasOwn(oldValue, key)) {
        walk(oldValue[key], next, childPath, acc);
      } else {
        acc.added[childPath] = next;
      }
    }
    for (const [key, previous] of Object.entries(oldValue)) {
      if (!Object.hasOwn(newValue, key)) {
        acc.removed[joinPath(path, key)] = previous;
      }
    }
    return;
  }

  if (isStateList(oldValue) && isStateList(newValue)) {
    const shared = Math.min(oldValue.length, newValue.length);
    for (let i = 0; i < shared; i++) {
      walk(oldValue[i], newValue[i], joinPath(path, i), acc);
    }
    for (let i = shared; i < newValue.length; i++) {
      acc.added[joinPath(path, i)] = newValue[i];
    }
    for (let i = shared; i < oldValue.length; i++) {
      acc.removed[joinPath(path, i)] = oldValue[i];
    }
    return;
  }

  if (!valuesEqual(oldValue, newValue)) {
    acc.changed[path] = { old: oldValue, new: newValue };
  }
}

/**
 * Structural diff of two values. Paths are relative to `basePath`.
 */
export function compareValues(oldValue: StateValue, newValue: StateValue, basePath = ''): DiffResult {
  const acc: DiffAccumulator = { added: {}, changed: {}, removed: {} };
  walk(oldValue, newValue, basePath, acc);
  return acc;
}

/** Diff the category sections of two documents. */
export function compareDocuments(oldDoc: StateDocument, newDoc: StateDocument): DiffResult {
  return compareValues(oldDoc.sections, newDoc.sections);
}

export function isEmptyDiff(diff: DiffResult): boolean {
  return (
    Object.keys(diff.added).length === 0 &&
    Object.keys(diff.changed).length === 0 &&
    Object.keys(diff.removed).length === 0
  );
}

export function summarizeDiff(diff: DiffResult): DiffSummary {
  const added = Object.keys(diff.added).length;
  const changed = Object.keys(diff.changed).length;
  const removed = Object.keys(diff.removed).length;
  return { added, changed, removed, total: added + changed + removed };
}
