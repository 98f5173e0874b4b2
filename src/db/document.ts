/**
 * hoststate — Versioned Document Model
 *
 * 生の JSON とメモリ上の StateDocument の相互変換。
 * 読み込み時にスキーマバージョンを確認し、必要なら段階的にマイグレーションする。
 */

import { z } from 'zod';
import type { SerializedDocument, StateDocument } from '../types/state.js';
import { DOCUMENT_SECTIONS, RESERVED_KEYS, SCAN_CATEGORIES } from '../types/state.js';
import type { StateMap, StateValue } from '../types/value.js';
import { StateMapSchema, StateValueSchema, isMapKey, kindOf, toStateValue } from '../types/value.js';
import { CorruptionError, SchemaError, ValidationError } from '../types/errors.js';
import { parsePath, setPath } from '../engine/field-path.js';
import type { RawDocument } from './migrations/index.js';
import { CURRENT_SCHEMA_VERSION, LEGACY_VERSION, runMigrations } from './migrations/index.js';

// ============================================================
// Zod スキーマ（マイグレーション後の形）
// ============================================================

export const CurrentDocumentSchema = z
  .object({
    schema_version: z.literal(CURRENT_SCHEMA_VERSION),
    last_updated: z
      .string()
      .refine((value) => !Number.isNaN(Date.parse(value)), 'must be an ISO-8601 timestamp'),
    system: StateMapSchema,
    hardware: StateMapSchema,
    network: StateMapSchema,
    software: StateMapSchema,
    services: StateMapSchema,
    gaming: StateMapSchema,
    notes: z.array(StateValueSchema),
  })
  .catchall(StateValueSchema)
  .superRefine((doc, ctx) => {
    // Section names are the first segment of every field path
    for (const key of Object.keys(doc)) {
      if (!isMapKey(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: 'section names may only contain letters, digits, "_" and "-"',
        });
      }
    }
  });

// ============================================================
// Loading
// ============================================================

function isRawDocument(value: unknown): value is RawDocument {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate (and migrate) an already-parsed document.
 *
 * @throws SchemaError for malformed, unknown or newer schema versions
 * @throws ValidationError (INVALID_DOCUMENT) when the migrated shape is wrong
 */
export function loadDocument(data: unknown): StateDocument {
  if (!isRawDocument(data)) {
    throw new ValidationError('INVALID_DOCUMENT', 'State document must be a JSON object');
  }

  const declared = data['schema_version'];
  if (declared !== undefined && typeof declared !== 'string') {
    throw new SchemaError('schema_version must be a string', { version: declared });
  }
  const version = typeof declared === 'string' ? declared : LEGACY_VERSION;
  const migrated = version === CURRENT_SCHEMA_VERSION ? data : runMigrations(data, version);

  const result = CurrentDocumentSchema.safeParse(migrated);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
    throw new ValidationError('INVALID_DOCUMENT', `Invalid state document: ${issues.join('; ')}`, {
      issues,
    });
  }

  const { schema_version, last_updated, ...sections } = result.data;
  return { schemaVersion: schema_version, lastUpdated: last_updated, sections };
}

/**
 * Parse raw JSON text into a StateDocument.
 *
 * @param source - Where the text came from; reported in CorruptionError
 * @throws CorruptionError when the text is not JSON
 */
export function parseDocument(raw: string, source: string): StateDocument {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new CorruptionError(source, `State file ${source} is not valid JSON`, err);
  }
  return loadDocument(data);
}

// ============================================================
// Serialization
// ============================================================

export function toSerialized(doc: StateDocument): SerializedDocument {
  return {
    schema_version: doc.schemaVersion,
    last_updated: doc.lastUpdated,
    ...doc.sections,
  };
}

export function serializeDocument(doc: StateDocument): string {
  return `${JSON.stringify(toSerialized(doc), null, 2)}\n`;
}

// ============================================================
// Construction / mutation
// ============================================================

export function emptyDocument(now: Date): StateDocument {
  const sections: Record<string, StateValue> = {};
  for (const category of SCAN_CATEGORIES) {
    sections[category] = {};
  }
  sections['notes'] = [];
  return {
    schemaVersion: CURRENT_SCHEMA_VERSION,
    lastUpdated: now.toISOString(),
    sections,
  };
}

export function withSections(doc: StateDocument, patch: StateMap, now: Date): StateDocument {
  return {
    schemaVersion: doc.schemaVersion,
    lastUpdated: now.toISOString(),
    sections: { ...doc.sections, ...patch },
  };
}

/**
 * Set one field of a document, returning a new document.
 *
 * Beyond the path rules of setPath(): the metadata keys cannot be written,
 * and a built-in section keeps its kind (map, or list for `notes`).
 *
 * @throws ValidationError (INVALID_PATH | INCOMPATIBLE_VALUE)
 */
export function setDocumentField(
  doc: StateDocument,
  path: string,
  value: StateValue,
  now: Date,
): StateDocument {
  const [head, ...rest] = parsePath(path);

  const checked = toStateValue(value);
  if (!checked.ok) {
    throw new ValidationError('INCOMPATIBLE_VALUE', `Value is not storable: ${checked.error}`, { path });
  }

  if (RESERVED_KEYS.some((key) => key === head)) {
    throw new ValidationError('INVALID_PATH', `"${head}" is managed by the engine and cannot be updated`, {
      path,
    });
  }

  if (rest.length === 0 && DOCUMENT_SECTIONS.some((section) => section === head)) {
    const expected = head === 'notes' ? 'list' : 'map';
    if (kindOf(value) !== expected) {
      throw new ValidationError(
        'INCOMPATIBLE_VALUE',
        `Section "${head}" must be a ${expected}, got ${kindOf(value)}`,
        { path, expected, actual: kindOf(value) },
      );
    }
  }

  return {
    schemaVersion: doc.schemaVersion,
    lastUpdated: now.toISOString(),
    sections: setPath(doc.sections, path, value),
  };
}
