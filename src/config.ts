/**
 * hoststate — Configuration
 *
 * All settings come from HOSTSTATE_* environment variables, validated with
 * zod at start-up. TTL variables are in seconds.
 */

import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import type { CategoryTtls, ScanCategory } from './types/state.js';
import { SCAN_CATEGORIES } from './types/state.js';
import { DEFAULT_TTLS } from './engine/scan-cache.js';
import { LOG_LEVELS } from './logger.js';
import type { LogLevel } from './logger.js';
import { StateError } from './types/errors.js';

export interface HostStateConfig {
  /** Absolute path of the state file. */
  stateFile: string;
  /** Host identity the state file belongs to. */
  host: string;
  /** `user@host` passed to ssh; local execution when unset. */
  sshTarget?: string;
  romRoot: string;
  categories: ScanCategory[];
  ttls: CategoryTtls;
  scanTimeoutMs: number;
  lockTimeoutMs: number;
  staleLockMs: number;
  logLevel: LogLevel;
}

const ttlSeconds = z.coerce.number().int().nonnegative().optional();

const EnvSchema = z.object({
  HOSTSTATE_STATE_FILE: z.string().min(1).optional(),
  HOSTSTATE_HOST: z.string().min(1).optional(),
  HOSTSTATE_SSH_TARGET: z
    .string()
    .regex(/^[A-Za-z0-9_.@-]+$/, 'must look like user@host')
    .optional(),
  HOSTSTATE_ROM_ROOT: z.string().min(1).default('$HOME/RetroPie/roms'),
  HOSTSTATE_CATEGORIES: z.string().optional(),
  HOSTSTATE_TTL_SYSTEM: ttlSeconds,
  HOSTSTATE_TTL_HARDWARE: ttlSeconds,
  HOSTSTATE_TTL_NETWORK: ttlSeconds,
  HOSTSTATE_TTL_SOFTWARE: ttlSeconds,
  HOSTSTATE_TTL_SERVICES: ttlSeconds,
  HOSTSTATE_TTL_GAMING: ttlSeconds,
  HOSTSTATE_SCAN_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  HOSTSTATE_LOCK_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  HOSTSTATE_STALE_LOCK_MS: z.coerce.number().int().positive().default(60_000),
  HOSTSTATE_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

type Env = z.infer<typeof EnvSchema>;

/** Turn a host identity into something safe to embed in a file name. */
export function hostLabel(host: string): string {
  const label = host.replace(/[^A-Za-z0-9_.-]+/g, '-').replace(/^[.-]+/, '');
  return label.length > 0 ? label : 'localhost';
}

export function defaultStateFile(host: string, homeDir: string): string {
  return path.join(homeDir, `.${hostLabel(host)}-state.json`);
}

function parseCategories(raw: string | undefined): ScanCategory[] {
  if (raw === undefined || raw.trim() === '') {
    return [...SCAN_CATEGORIES];
  }
  const selected: ScanCategory[] = [];
  for (const name of raw.split(',').map((s) => s.trim()).filter((s) => s.length > 0)) {
    const category = SCAN_CATEGORIES.find((c) => c === name);
    if (category === undefined) {
      throw new StateError(
        'INVALID_CONFIG',
        `HOSTSTATE_CATEGORIES: unknown category "${name}" (valid: ${SCAN_CATEGORIES.join(', ')})`,
      );
    }
    if (!selected.includes(category)) selected.push(category);
  }
  return selected;
}

function ttlsFrom(env: Env): CategoryTtls {
  const seconds = (value: number | undefined, fallback: number): number =>
    value === undefined ? fallback : value * 1000;
  return {
    system: seconds(env.HOSTSTATE_TTL_SYSTEM, DEFAULT_TTLS.system),
    hardware: seconds(env.HOSTSTATE_TTL_HARDWARE, DEFAULT_TTLS.hardware),
    network: seconds(env.HOSTSTATE_TTL_NETWORK, DEFAULT_TTLS.network),
    software: seconds(env.HOSTSTATE_TTL_SOFTWARE, DEFAULT_TTLS.software),
    services: seconds(env.HOSTSTATE_TTL_SERVICES, DEFAULT_TTLS.services),
    gaming: seconds(env.HOSTSTATE_TTL_GAMING, DEFAULT_TTLS.gaming),
  };
}

/**
 * Build the runtime configuration from environment variables.
 *
 * @throws StateError (INVALID_CONFIG) listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  homeDir: string = os.homedir(),
): HostStateConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new StateError('INVALID_CONFIG', `Invalid configuration: ${problems.join('; ')}`, {
      problems,
    });
  }
  const parsed = result.data;

  const sshHost = parsed.HOSTSTATE_SSH_TARGET?.split('@').pop();
  const host = parsed.HOSTSTATE_HOST ?? sshHost ?? 'localhost';

  return {
    stateFile: path.resolve(parsed.HOSTSTATE_STATE_FILE ?? defaultStateFile(host, homeDir)),
    host,
    ...(parsed.HOSTSTATE_SSH_TARGET !== undefined ? { sshTarget: parsed.HOSTSTATE_SSH_TARGET } : {}),
    romRoot: parsed.HOSTSTATE_ROM_ROOT,
    categories: parseCategories(parsed.HOSTSTATE_CATEGORIES),
    ttls: ttlsFrom(parsed),
    scanTimeoutMs: parsed.HOSTSTATE_SCAN_TIMEOUT_MS,
    lockTimeoutMs: parsed.HOSTSTATE_LOCK_TIMEOUT_MS,
    staleLockMs: parsed.HOSTSTATE_STALE_LOCK_MS,
    logLevel: parsed.HOSTSTATE_LOG_LEVEL,
  };
}
