/**
 * hoststate — Document migration registry
 *
 * Manages versioned migrations of the on-disk state document.
 * Each migration is a pure step from one schema version to the next and
 * never touches fields it does not own.
 */

import { SchemaError } from '../../types/errors.js';
import v2 from './v2.js';

/** Parsed but not yet validated document body. */
export type RawDocument = Record<string, unknown>;

export interface Migration {
  from: string;
  to: string;
  description: string;
  up(doc: RawDocument): RawDocument;
}

/** All migrations in order. Each `from` must equal the previous `to`. */
const migrations: Migration[] = [v2];

/** Version assumed for documents written before versioning existed. */
export const LEGACY_VERSION = '1.0';

/** The latest schema version (after all migrations applied). */
export const CURRENT_SCHEMA_VERSION: string =
  migrations.length > 0 ? migrations[migrations.length - 1].to : LEGACY_VERSION;

/** Every version the engine can read, oldest first. */
export const KNOWN_VERSIONS: readonly string[] = [
  ...migrations.map((m) => m.from),
  CURRENT_SCHEMA_VERSION,
];

const VERSION_PATTERN = /^(\d+)\.(\d+)$/;

/**
 * Order two `major.minor` version strings.
 *
 * @throws SchemaError when either side is not `major.minor`
 */
export function compareVersions(a: string, b: string): number {
  const pa = VERSION_PATTERN.exec(a);
  const pb = VERSION_PATTERN.exec(b);
  if (pa === null || pb === null) {
    throw new SchemaError(`Malformed schema version: "${pa === null ? a : b}"`, {
      version: pa === null ? a : b,
    });
  }
  return Number(pa[1]) - Number(pb[1]) || Number(pa[2]) - Number(pb[2]);
}

/**
 * Apply migrations stepwise from `fromVersion` to CURRENT_SCHEMA_VERSION.
 * The input object is never modified.
 *
 * @throws SchemaError when the version is newer than the engine or falls
 *   between known versions
 */
export function runMigrations(doc: RawDocument, fromVersion: string): RawDocument {
  if (compareVersions(fromVersion, CURRENT_SCHEMA_VERSION) > 0) {
    throw new SchemaError(
      `Schema version ${fromVersion} is newer than supported version ${CURRENT_SCHEMA_VERSION}`,
      { version: fromVersion, supported: CURRENT_SCHEMA_VERSION },
      'UNSUPPORTED_SCHEMA_VERSION',
    );
  }
  if (!KNOWN_VERSIONS.includes(fromVersion)) {
    throw new SchemaError(
      `Unknown schema version ${fromVersion}; known versions: ${KNOWN_VERSIONS.join(', ')}`,
      { version: fromVersion, known: KNOWN_VERSIONS },
      'UNSUPPORTED_SCHEMA_VERSION',
    );
  }

  let current = doc;
  let version = fromVersion;
  for (const migration of migrations) {
    if (migration.from === version) {
      current = { ...migration.up(current), schema_version: migration.to };
      version = migration.to;
    }
  }
  return current;
}
