/**
 * File-backed persistence for the alert ledger.
 *
 * - Reads are permissive: a missing file is an empty ledger; unreadable JSON
 *   or a non-object is logged and treated as empty.
 * - Writes replace the whole file via a temporary file and `rename`.
 * - `withLock` serializes runs through an exclusive lock file beside the
 *   ledger. A lock older than `lockStaleMs` is taken over.
 */

import { link, open, readFile, rename, stat, unlink, writeFile } from 'node:fs/promises';
import { LedgerLockError, errorMessage, systemClock, type Clock } from '@yieldwatch/contracts';
import type { Logger } from '@yieldwatch/logger';
import { AlertLedger } from './ledger.js';

export interface LedgerStore {
  load(): Promise<AlertLedger>;
  save(ledger: AlertLedger): Promise<void>;
  withLock<T>(fn: () => Promise<T>): Promise<T>;
}

export interface FileLedgerStoreOptions {
  path: string;
  logger: Logger;

  /** @default 10 minutes */
  lockStaleMs?: number;

  clock?: Clock;
}

const DEFAULT_LOCK_STALE_MS = 10 * 60 * 1000;

let staleLockSequence = 0;

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Serialized ledger: sorted keys, two-space indent, trailing newline.
 */
export function serializeLedger(ledger: AlertLedger): string {
  return `${JSON.stringify(ledger.toJSON(), null, 2)}\n`;
}

export class FileLedgerStore implements LedgerStore {
  readonly path: string;
  readonly lockPath: string;
  private readonly logger: Logger;
  private readonly lockStaleMs: number;
  private readonly clock: Clock;

  constructor(options: FileLedgerStoreOptions) {
    this.path = options.path;
    this.lockPath = `${options.path}.lock`;
    this.logger = options.logger;
    this.lockStaleMs = options.lockStaleMs ?? DEFAULT_LOCK_STALE_MS;
    this.clock = options.clock ?? systemClock;
  }

  async load(): Promise<AlertLedger> {
    let content: string;
    try {
      content = await readFile(this.path, 'utf-8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        this.logger.debug('Alert ledger not found, starting empty', { path: this.path });
        return new AlertLedger();
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      this.logger.warn('Alert ledger is not valid JSON, treating every code as never alerted', {
        path: this.path,
        error: errorMessage(error),
      });
      return new AlertLedger();
    }

    if (!isPlainObject(parsed)) {
      this.logger.warn('Alert ledger is not a JSON object, treating every code as never alerted', {
        path: this.path,
      });
      return new AlertLedger();
    }

    return new AlertLedger(parsed);
  }

  async save(ledger: AlertLedger): Promise<void> {
    const tmpPath = `${this.path}.${process.pid}.${this.clock.now().getTime()}.tmp`;
    await writeFile(tmpPath, serializeLedger(ledger), 'utf-8');
    try {
      await rename(tmpPath, this.path);
    } catch (error) {
      await unlink(tmpPath).catch((cleanupError: unknown) => {
        this.logger.warn('Failed to remove temporary ledger file', {
          path: tmpPath,
          error: errorMessage(cleanupError),
        });
      });
      throw error;
    }
    this.logger.debug('Alert ledger saved', { path: this.path, entries: ledger.size });
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquireLock();
    try {
      return await fn();
    } finally {
      await this.releaseLock();
    }
  }

  private async acquireLock(retryAfterStale = true): Promise<void> {
    try {
      const handle = await open(this.lockPath, 'wx');
      try {
        await handle.writeFile(`${process.pid} ${this.clock.now().toISOString()}\n`, 'utf-8');
      } finally {
        await handle.close();
      }
      return;
    } catch (error) {
      if (!hasErrorCode(error, 'EEXIST')) {
        throw error;
      }
    }

    const heldSinceMs = await this.lockAgeMs();
    if (retryAfterStale && heldSinceMs !== null && heldSinceMs >= this.lockStaleMs) {
      this.logger.warn('Taking over stale alert ledger lock', { lockPath: this.lockPath, heldSinceMs });
      await this.clearStaleLock();
      return this.acquireLock(false);
    }

    throw new LedgerLockError('Alert ledger is locked by another run', {
      lockPath: this.lockPath,
      heldSinceMs: heldSinceMs ?? undefined,
    });
  }

  /**
   * Moves the lock to a name only this run uses, then removes it. When
   * several runs saw the same stale lock only one rename finds it; the rest
   * get ENOENT and go back to `wx`. A lock that is fresh once moved was
   * taken by another run in the meantime: it is put back and this run fails.
   */
  private async clearStaleLock(): Promise<void> {
    staleLockSequence += 1;
    const asidePath = `${this.lockPath}.${process.pid}.${staleLockSequence}.stale`;
    try {
      await rename(this.lockPath, asidePath);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return;
      }
      throw error;
    }

    const ageMs = this.clock.now().getTime() - (await stat(asidePath)).mtimeMs;
    if (ageMs < this.lockStaleMs) {
      try {
        await link(asidePath, this.lockPath);
      } catch (error) {
        // EEXIST: a newer run already holds the lock
        if (!hasErrorCode(error, 'EEXIST')) {
          throw error;
        }
      } finally {
        await unlink(asidePath);
      }
      throw new LedgerLockError('Alert ledger is locked by another run', {
        lockPath: this.lockPath,
        heldSinceMs: ageMs,
      });
    }
    await unlink(asidePath);
  }

  private async lockAgeMs(): Promise<number | null> {
    try {
      const info = await stat(this.lockPath);
      return this.clock.now().getTime() - info.mtimeMs;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }
  }

  private async releaseLock(): Promise<void> {
    try {
      await unlink(this.lockPath);
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        this.logger.warn('Failed to remove alert ledger lock', {
          lockPath: this.lockPath,
          error: errorMessage(error),
        });
      }
    }
  }
}
