/**
 * hoststate — Advisory file lock
 *
 * Serialises read-modify-write cycles on the state file. Within a process
 * callers queue in FIFO order; across processes an exclusive `<file>.lock`
 * (created with O_EXCL) provides mutual exclusion.
 */

import { open, stat, unlink } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { setTimeout as sleep } from 'node:timers/promises';
import { IoError, LockTimeoutError, errorMessage, isNodeError } from '../types/errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';

export interface FileLockOptions {
  timeoutMs: number;
  /** Locks whose file is older than this are considered abandoned. */
  staleMs: number;
  retryMs?: number;
  logger?: Logger;
}

export class FileLock {
  readonly lockPath: string;
  private readonly timeoutMs: number;
  private readonly staleMs: number;
  private readonly retryMs: number;
  private readonly logger: Logger;
  private queue: Promise<void> = Promise.resolve();

  constructor(lockPath: string, options: FileLockOptions) {
    this.lockPath = lockPath;
    this.timeoutMs = options.timeoutMs;
    this.staleMs = options.staleMs;
    this.retryMs = options.retryMs ?? 25;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Run `fn` while holding the lock.
   *
   * @throws LockTimeoutError when the lock is not acquired within timeoutMs
   *   of this call (retryable)
   */
  withLock<T>(fn: () => Promise<T>): Promise<T> {
    const deadline = Date.now() + this.timeoutMs;
    const run = this.queue.then(() => this.runExclusive(fn, deadline));
    // The queue only orders callers; each caller observes its own outcome via `run`.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runExclusive<T>(fn: () => Promise<T>, deadline: number): Promise<T> {
    await this.acquire(deadline);
    try {
      return await fn();
    } finally {
      await this.release();
    }
  }

  private async acquire(deadline: number): Promise<void> {
    for (;;) {
      if (await this.tryCreate()) {
        return;
      }
      if (await this.breakIfStale()) {
        continue;
      }
      if (Date.now() >= deadline) {
        throw new LockTimeoutError(this.lockPath, this.timeoutMs);
      }
      await sleep(this.retryMs);
    }
  }

  private async tryCreate(): Promise<boolean> {
    let handle: FileHandle;
    try {
      handle = await open(this.lockPath, 'wx', 0o600);
    } catch (err) {
      if (isNodeError(err, 'EEXIST')) {
        return false;
      }
      throw new IoError(
        'WRITE_FAILED',
        `Cannot create lock file ${this.lockPath}: ${errorMessage(err)}`,
        { lockPath: this.lockPath },
        err,
      );
    }
    try {
      await handle.writeFile(
        JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() }),
        'utf-8',
      );
    } finally {
      await handle.close();
    }
    return true;
  }

  /** Returns true when the lock vanished or was broken, i.e. retry immediately. */
  private async breakIfStale(): Promise<boolean> {
    let mtimeMs: number;
    try {
      mtimeMs = (await stat(this.lockPath)).mtimeMs;
    } catch (err) {
      if (isNodeError(err, 'ENOENT')) return true;
      throw new IoError('READ_FAILED', `Cannot inspect lock file ${this.lockPath}`, {}, err);
    }

    const age = Date.now() - mtimeMs;
    if (age < this.staleMs) {
      return false;
    }

    this.logger.warn('Breaking stale state lock', { lockPath: this.lockPath, ageMs: age });
    try {
      await unlink(this.lockPath);
    } catch (err) {
      if (!isNodeError(err, 'ENOENT')) {
        throw new IoError('WRITE_FAILED', `Cannot remove stale lock ${this.lockPath}`, {}, err);
      }
    }
    return true;
  }

  private async release(): Promise<void> {
    try {
      await unlink(this.lockPath);
    } catch (err) {
      // The protected operation already completed; a failed release only
      // delays the next writer until the lock is considered stale.
      this.logger.error('Failed to release state lock', {
        lockPath: this.lockPath,
        error: errorMessage(err),
      });
    }
  }
}
