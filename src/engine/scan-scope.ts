/**
 * hoststate — Scan scope
 *
 * One scope per save/compare call: a single AbortSignal that fires on the
 * caller's signal or on the scan timeout, whichever comes first. Errors
 * from inside the scope are mapped to ObserverError with the right code.
 */

import type { ScanCategory, ScanOptions } from '../types/state.js';
import { ObserverError, errorMessage } from '../types/errors.js';
import type { ScanContext } from '../observer/types.js';

export class ScanScope {
  readonly context: ScanContext;
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  private readonly callerSignal: AbortSignal | undefined;
  private readonly onCallerAbort = (): void => this.controller.abort();
  private timedOut = false;

  constructor(options: ScanOptions, defaultTimeoutMs: number) {
    const timeoutMs = options.timeoutMs ?? defaultTimeoutMs;
    this.context = { signal: this.controller.signal, timeoutMs };
    this.timer = setTimeout(() => {
      this.timedOut = true;
      this.controller.abort();
    }, timeoutMs);

    this.callerSignal = options.signal;
    if (this.callerSignal?.aborted) {
      this.controller.abort();
    } else {
      this.callerSignal?.addEventListener('abort', this.onCallerAbort, { once: true });
    }
  }

  /** Resolve with `promise`, or reject as soon as the scope is aborted. */
  race<T>(promise: Promise<T>): Promise<T> {
    const signal = this.controller.signal;
    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => reject(signal.reason);
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
      promise.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (err: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(err);
        },
      );
    });
  }

  /** Map anything thrown while scanning `category` to an ObserverError. */
  toObserverError(category: ScanCategory, err: unknown): ObserverError {
    if (this.timedOut) {
      return new ObserverError(
        category,
        `Scan of ${category} timed out after ${this.context.timeoutMs}ms`,
        'SCAN_TIMEOUT',
        err,
      );
    }
    if (this.controller.signal.aborted) {
      return new ObserverError(category, `Scan of ${category} was cancelled`, 'SCAN_ABORTED', err);
    }
    if (err instanceof ObserverError) {
      return err;
    }
    return new ObserverError(category, `Scan of ${category} failed: ${errorMessage(err)}`, 'SCAN_FAILED', err);
  }

  dispose(): void {
    clearTimeout(this.timer);
    this.callerSignal?.removeEventListener('abort', this.onCallerAbort);
  }
}
