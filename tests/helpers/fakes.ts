/**
 * Test doubles shared across suites.
 */

import type { ScanCategory } from '../../src/types/state.js';
import type { StateMap } from '../../src/types/value.js';
import type { Clock } from '../../src/engine/scan-cache.js';
import type { ScanContext, SystemObserver } from '../../src/observer/types.js';

export class FakeClock implements Clock {
  constructor(private current = Date.parse('2026-03-01T12:00:00.000Z')) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

type Handler = (context: ScanContext) => Promise<StateMap>;

/**
 * Observer whose per-category payloads are set by the test. Counts calls.
 */
export class StubObserver implements SystemObserver {
  readonly calls: ScanCategory[] = [];
  private readonly payloads = new Map<ScanCategory, StateMap>();
  private readonly handlers = new Map<ScanCategory, Handler>();

  set(category: ScanCategory, payload: StateMap): this {
    this.payloads.set(category, payload);
    return this;
  }

  /** Replace the behaviour of one category (failure, hang, ...). */
  on(category: ScanCategory, handler: Handler): this {
    this.handlers.set(category, handler);
    return this;
  }

  count(category: ScanCategory): number {
    return this.calls.filter((c) => c === category).length;
  }

  async scan(category: ScanCategory, context: ScanContext): Promise<StateMap> {
    this.calls.push(category);
    const handler = this.handlers.get(category);
    if (handler !== undefined) {
      return handler(context);
    }
    return this.payloads.get(category) ?? {};
  }
}

/** Resolves only when `signal` aborts, then rejects with its reason. */
export function hangUntilAborted(context: ScanContext): Promise<StateMap> {
  return new Promise((_resolve, reject) => {
    if (context.signal.aborted) {
      reject(context.signal.reason);
      return;
    }
    context.signal.addEventListener('abort', () => reject(context.signal.reason), { once: true });
  });
}
