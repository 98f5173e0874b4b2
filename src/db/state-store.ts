/**
 * hoststate — Atomic state store
 *
 * The only code that reads or writes the state file.
 *
 * - write(): temp file in the same directory (mode 0600 from creation),
 *   fsync, rename over the target, fsync the directory.
 * - read(): absent file → undefined; unparseable file → CorruptionError.
 *   A corrupt file is never deleted or rewritten here.
 * - withLock(): advisory lock around read-modify-write cycles.
 */

import { randomUUID } from 'node:crypto';
import { chmod, mkdir, open, readFile, rename, rm, stat } from 'node:fs/promises';
import path from 'node:path';
import type { StateDocument } from '../types/state.js';
import {
  CorruptionError,
  IoError,
  ValidationError,
  errorMessage,
  isNodeError,
} from '../types/errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { parseDocument, serializeDocument } from './document.js';
import { FileLock } from './file-lock.js';

const FILE_MODE = 0o600;
const DIR_MODE = 0o700;

export interface StateStoreOptions {
  lockTimeoutMs?: number;
  staleLockMs?: number;
  logger?: Logger;
}

export class StateStore {
  readonly filePath: string;
  private readonly lock: FileLock;
  private readonly logger: Logger;

  constructor(filePath: string, options: StateStoreOptions = {}) {
    this.filePath = path.resolve(filePath);
    this.logger = options.logger ?? silentLogger;
    this.lock = new FileLock(`${this.filePath}.lock`, {
      timeoutMs: options.lockTimeoutMs ?? 5_000,
      staleMs: options.staleLockMs ?? 60_000,
      logger: this.logger,
    });
  }

  get lockPath(): string {
    return this.lock.lockPath;
  }

  async exists(): Promise<boolean> {
    try {
      await stat(this.filePath);
      return true;
    } catch (err) {
      if (isNodeError(err, 'ENOENT')) return false;
      throw new IoError('READ_FAILED', `Cannot stat ${this.filePath}`, { filePath: this.filePath }, err);
    }
  }

  /**
   * Read the committed document.
   *
   * @returns undefined when no state file exists
   * @throws CorruptionError when the file is not a valid state document
   * @throws SchemaError when its schema version cannot be migrated
   */
  async read(): Promise<StateDocument | undefined> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      if (isNodeError(err, 'ENOENT')) {
        return undefined;
      }
      throw new IoError(
        'READ_FAILED',
        `Cannot read state file ${this.filePath}: ${errorMessage(err)}`,
        { filePath: this.filePath },
        err,
      );
    }

    await this.enforcePermissions();

    try {
      return parseDocument(raw, this.filePath);
    } catch (err) {
      if (err instanceof ValidationError) {
        throw new CorruptionError(
          this.filePath,
          `State file ${this.filePath} is not a valid state document: ${err.message}`,
          err,
        );
      }
      throw err;
    }
  }

  /**
   * Atomically replace the state file with `doc`.
   *
   * @throws IoError (WRITE_FAILED); the previous file is left untouched
   */
  async write(doc: StateDocument): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tmpPath = path.join(
      dir,
      `.${path.basename(this.filePath)}.${process.pid}.${randomUUID()}.tmp`,
    );

    try {
      await mkdir(dir, { recursive: true, mode: DIR_MODE });
      const handle = await open(tmpPath, 'wx', FILE_MODE);
      try {
        // umask may have narrowed the creation mode; make it exact before any content lands
        await handle.chmod(FILE_MODE);
        await handle.writeFile(serializeDocument(doc), 'utf-8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tmpPath, this.filePath);
    } catch (err) {
      await rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
        this.logger.warn('Failed to remove temporary state file', {
          tmpPath,
          error: errorMessage(cleanupErr),
        });
      });
      throw new IoError(
        'WRITE_FAILED',
        `Failed to write state file ${this.filePath}: ${errorMessage(err)}`,
        { filePath: this.filePath },
        err,
      );
    }

    await this.syncDirectory(dir);
    this.logger.debug('State file written', { filePath: this.filePath });
  }

  /**
   * Run a read-modify-write cycle under the advisory lock.
   *
   * @throws LockTimeoutError when the lock cannot be acquired in time
   */
  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    try {
      await mkdir(path.dirname(this.filePath), { recursive: true, mode: DIR_MODE });
    } catch (err) {
      throw new IoError(
        'WRITE_FAILED',
        `Cannot create state directory for ${this.filePath}: ${errorMessage(err)}`,
        { filePath: this.filePath },
        err,
      );
    }
    return this.lock.withLock(fn);
  }

  // ------------------------------------------------------------------
  // internal
  // ------------------------------------------------------------------

  private async enforcePermissions(): Promise<void> {
    if (process.platform === 'win32') return;
    try {
      const { mode } = await stat(this.filePath);
      if ((mode & 0o077) !== 0) {
        await chmod(this.filePath, FILE_MODE);
        this.logger.warn('Tightened state file permissions to 0600', {
          filePath: this.filePath,
          previousMode: (mode & 0o777).toString(8),
        });
      }
    } catch (err) {
      this.logger.warn('Could not enforce state file permissions', {
        filePath: this.filePath,
        error: errorMessage(err),
      });
    }
  }

  private async syncDirectory(dir: string): Promise<void> {
    if (process.platform === 'win32') return;
    try {
      const handle = await open(dir, 'r');
      try {
        await handle.sync();
      } finally {
        await handle.close();
      }
    } catch (err) {
      // The rename is already visible; only durability across power loss is affected.
      this.logger.warn('Failed to fsync state directory', { dir, error: errorMessage(err) });
    }
  }
}
