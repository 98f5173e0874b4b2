/**
 * hoststate — State value type system
 *
 * State documents hold a closed set of JSON-like values. Every check the
 * engine performs on a value goes through kindOf(), so adding a kind is a
 * compile error everywhere it is not handled.
 */

import { z } from 'zod';

export type StateScalar = string | number | boolean | null;
export type StateList = readonly StateValue[];
export interface StateMap {
  readonly [key: string]: StateValue;
}
export type StateValue = StateScalar | StateList | StateMap;

export const VALUE_KINDS = ['string', 'number', 'boolean', 'null', 'list', 'map'] as const;
export type ValueKind = (typeof VALUE_KINDS)[number];

// ============================================================
// Map keys
// ============================================================

/** Map keys double as dotted-path segments, so they share one alphabet. */
export const MAP_KEY_PATTERN = /^[A-Za-z0-9_-]+$/;

export function isMapKey(key: string): boolean {
  return MAP_KEY_PATTERN.test(key);
}

/** Turn a host-supplied name (`eth0.100`, `lr-snes9x.sh`) into a valid map key. */
export function toMapKey(name: string): string {
  const key = name.replace(/[^A-Za-z0-9_-]/g, '_');
  return key.length > 0 ? key : '_';
}

// ============================================================
// Zod schema
// ============================================================

const MapKeySchema = z
  .string()
  .regex(MAP_KEY_PATTERN, 'map keys may only contain letters, digits, "_" and "-"');

export const StateValueSchema: z.ZodType<StateValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(StateValueSchema),
    z.record(MapKeySchema, StateValueSchema),
  ]),
);

export const StateMapSchema: z.ZodType<StateMap> = z.record(MapKeySchema, StateValueSchema);

// ============================================================
// Kind helpers
// ============================================================

export function kindOf(value: StateValue): ValueKind {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  switch (typeof value) {
    case 'string':
      return 'string';
    case 'number':
      return 'number';
    case 'boolean':
      return 'boolean';
    default:
      return 'map';
  }
}

export function isStateMap(value: StateValue | undefined): value is StateMap {
  return value !== undefined && kindOf(value) === 'map';
}

export function isStateList(value: StateValue | undefined): value is StateList {
  return Array.isArray(value);
}

/**
 * Deep structural equality. Map key order is ignored; list order is not.
 */
export function valuesEqual(a: StateValue, b: StateValue): boolean {
  const kind = kindOf(a);
  if (kind !== kindOf(b)) return false;

  if (isStateList(a) && isStateList(b)) {
    if (a.length !== b.length) return false;
    return a.every((item, i) => valuesEqual(item, b[i]));
  }

  if (isStateMap(a) && isStateMap(b)) {
    const aKeys = Object.keys(a);
    if (aKeys.length !== Object.keys(b).length) return false;
    return aKeys.every((key) => Object.hasOwn(b, key) && valuesEqual(a[key], b[key]));
  }

  return a === b;
}

/**
 * Parse an arbitrary value into a StateValue, or describe why it is not one.
 */
export function toStateValue(
  input: unknown,
): { ok: true; value: StateValue } | { ok: false; error: string } {
  const result = StateValueSchema.safeParse(input);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, error: result.error.issues.map((i) => i.message).join('; ') };
}
