/**
 * hoststate — Field Path Resolver
 *
 * Dotted-path addressing (`system.hostname`, `software.packages.2`) over
 * nested state values. Map segments index by key, list segments by
 * position. setPath() never mutates its input.
 */

import type { StateList, StateMap, StateValue } from '../types/value.js';
import { isMapKey, isStateList, isStateMap, kindOf } from '../types/value.js';
import { ValidationError } from '../types/errors.js';

const INDEX_PATTERN = /^(0|[1-9][0-9]*)$/;

export type GetResult = { found: true; value: StateValue } | { found: false };

/**
 * Split a dotted path into segments.
 *
 * @throws ValidationError (INVALID_PATH) on empty paths, empty segments, or
 *   characters outside `[A-Za-z0-9_-]`.
 */
export function parsePath(path: string): string[] {
  if (path.length === 0) {
    throw new ValidationError('INVALID_PATH', 'Path must be a non-empty string', { path });
  }
  const segments = path.split('.');
  for (const segment of segments) {
    if (!isMapKey(segment)) {
      throw new ValidationError(
        'INVALID_PATH',
        segment.length === 0
          ? `Invalid path "${path}": empty segment`
          : `Invalid path "${path}": segment "${segment}" may only contain letters, digits, "_" and "-"`,
        { path, segment },
      );
    }
  }
  return segments;
}

export function joinPath(base: string, segment: string | number): string {
  return base.length === 0 ? String(segment) : `${base}.${segment}`;
}

function parseIndex(segment: string): number | undefined {
  return INDEX_PATTERN.test(segment) ? Number(segment) : undefined;
}

function childOf(container: StateValue, segment: string): StateValue | undefined {
  if (isStateMap(container)) {
    return Object.hasOwn(container, segment) ? container[segment] : undefined;
  }
  if (isStateList(container)) {
    const index = parseIndex(segment);
    return index !== undefined && index < container.length ? container[index] : undefined;
  }
  return undefined;
}

/** Resolve `path` against `root`. Missing keys and out-of-range indexes are not errors. */
export function getPath(root: StateValue, path: string): GetResult {
  let current: StateValue = root;
  for (const segment of parsePath(path)) {
    const next = childOf(current, segment);
    if (next === undefined) {
      return { found: false };
    }
    current = next;
  }
  return { found: true, value: current };
}

// ============================================================
// set
// ============================================================

interface SetContext {
  path: string;
  segments: string[];
  value: StateValue;
}

function cannotDescend(ctx: SetContext, depth: number, leaf: StateValue): ValidationError {
  const at = ctx.segments.slice(0, depth).join('.');
  return new ValidationError(
    'INVALID_PATH',
    `Cannot set "${ctx.path}": "${at}" holds a ${kindOf(leaf)} value`,
    { path: ctx.path, at, kind: kindOf(leaf) },
  );
}

function setChild(existing: StateValue | undefined, ctx: SetContext, depth: number): StateValue {
  if (depth === ctx.segments.length) {
    return ctx.value;
  }
  // Missing intermediates become maps
  if (existing === undefined) {
    return setInMap({}, ctx, depth);
  }
  if (isStateMap(existing)) {
    return setInMap(existing, ctx, depth);
  }
  if (isStateList(existing)) {
    return setInList(existing, ctx, depth);
  }
  throw cannotDescend(ctx, depth, existing);
}

function setInMap(map: StateMap, ctx: SetContext, depth: number): StateMap {
  const segment = ctx.segments[depth];
  const existing = Object.hasOwn(map, segment) ? map[segment] : undefined;
  return { ...map, [segment]: setChild(existing, ctx, depth + 1) };
}

function setInList(list: StateList, ctx: SetContext, depth: number): StateList {
  const segment = ctx.segments[depth];
  const index = parseIndex(segment);
  if (index === undefined || index > list.length) {
    const at = ctx.segments.slice(0, depth).join('.');
    throw new ValidationError(
      'INVALID_PATH',
      `Cannot set "${ctx.path}": "${segment}" is not a valid position in list "${at}" (length ${list.length})`,
      { path: ctx.path, at, segment, length: list.length },
    );
  }
  const copy = [...list];
  copy[index] = setChild(index < list.length ? list[index] : undefined, ctx, depth + 1);
  return copy;
}

/**
 * Return a copy of `root` with `value` stored at `path`.
 *
 * Missing intermediate maps are created. Descending through a scalar or
 * null fails instead of overwriting it.
 *
 * @throws ValidationError (INVALID_PATH)
 */
export function setPath(root: StateMap, path: string, value: StateValue): StateMap {
  const segments = parsePath(path);
  return setInMap(root, { path, segments, value }, 0);
}
