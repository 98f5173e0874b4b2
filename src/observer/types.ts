/**
 * hoststate — System Observer interfaces
 *
 * The observer gathers raw facts from the managed host. The engine only
 * ever calls it through the scan cache.
 */

import type { ScanCategory } from '../types/state.js';
import type { StateMap } from '../types/value.js';

export interface ScanContext {
  signal: AbortSignal;
  timeoutMs: number;
}

export interface SystemObserver {
  /**
   * Observe one category. Resolves with an empty map when the host has no
   * data for it; rejects (preferably with ObserverError) when observing failed.
   * Must be safe to call repeatedly.
   */
  scan(category: ScanCategory, context: ScanContext): Promise<StateMap>;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface CommandExecutor {
  run(command: string, context: ScanContext): Promise<CommandResult>;
}
