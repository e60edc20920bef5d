/**
 * Cadence Gate
 *
 * Admits at most one decision cycle at a time, only on trading days, and only
 * after enough trading days have passed since the last recorded run. `force`
 * skips the day checks but never the in-flight check.
 *
 * The API server and the CLI scripts share one marker file, so every acquire
 * takes the store's run lock and re-reads the marker before checking spacing.
 * The run marker is committed by the cycle once it reaches execution.
 */

import fs from 'fs/promises';
import path from 'path';
import { logger, logCycle } from '../utils/logger';
import { CadenceViolationError, PersistenceCorruptError, getErrorMessage } from '../utils/errors';
import { isIsoDate, isTradingDay, tradingDaysBetween } from '../utils/dates';
import { hasErrorCode, readJsonFile, writeJsonAtomic } from '../utils/json-file';
import type { IsoDate } from '../types';

export interface RunMarker {
  lastRunDate: IsoDate;
  committedAt: string;
}

export interface RunMarkerStore {
  readonly location: string;
  load(): Promise<unknown>;
  save(marker: RunMarker): Promise<void>;
  /** Take the run lock shared by every process on this store. False if held. */
  lock(): Promise<boolean>;
  unlock(): Promise<void>;
}

export class MemoryRunMarkerStore implements RunMarkerStore {
  readonly location = 'memory';
  private locked = false;

  constructor(private data: unknown = null) {}

  async load(): Promise<unknown> {
    return this.data;
  }

  async save(marker: RunMarker): Promise<void> {
    this.data = { ...marker };
  }

  async lock(): Promise<boolean> {
    if (this.locked) return false;
    this.locked = true;
    return true;
  }

  async unlock(): Promise<void> {
    this.locked = false;
  }
}

/**
 * Marker in `<file>`, lock in `<file>.lock`. A lock older than `staleAfterMs`
 * belongs to a process that died mid-cycle and is taken over.
 */
export class FileRunMarkerStore implements RunMarkerStore {
  readonly location: string;
  readonly lockPath: string;

  constructor(
    filePath: string,
    private staleAfterMs: number = 2 * 60 * 60 * 1000
  ) {
    this.location = path.resolve(process.cwd(), filePath);
    this.lockPath = `${this.location}.lock`;
  }

  async load(): Promise<unknown> {
    return readJsonFile(this.location);
  }

  async save(marker: RunMarker): Promise<void> {
    await writeJsonAtomic(this.location, marker);
  }

  async lock(): Promise<boolean> {
    await fs.mkdir(path.dirname(this.lockPath), { recursive: true });
    if (await this.createLockFile()) return true;

    if (await this.lockIsStale()) {
      logger.warn('⚠️ Taking over a stale run lock', { lockPath: this.lockPath });
      await fs.rm(this.lockPath, { force: true });
      return this.createLockFile();
    }
    return false;
  }

  async unlock(): Promise<void> {
    await fs.rm(this.lockPath, { force: true });
  }

  private async createLockFile(): Promise<boolean> {
    try {
      const owner = { pid: process.pid, lockedAt: new Date().toISOString() };
      await fs.writeFile(this.lockPath, JSON.stringify(owner) + '\n', { encoding: 'utf-8', flag: 'wx' });
      return true;
    } catch (error: unknown) {
      if (hasErrorCode(error, 'EEXIST')) return false;
      throw error;
    }
  }

  private async lockIsStale(): Promise<boolean> {
    try {
      const stat = await fs.stat(this.lockPath);
      return Date.now() - stat.mtimeMs > this.staleAfterMs;
    } catch (error: unknown) {
      // released between our attempt and the stat
      if (hasErrorCode(error, 'ENOENT')) return true;
      throw error;
    }
  }
}

export interface GateLease {
  readonly date: IsoDate;
  /** Record today as the last run. Idempotent. */
  commit(): Promise<void>;
  /** Free the in-flight slot and the run lock. Idempotent. */
  release(): Promise<void>;
}

export interface GateState {
  inFlight: boolean;
  lastRunDate: IsoDate | null;
  minTradingDaysBetweenRuns: number;
}

export class CadenceGate {
  private inFlight = false;
  private lastRunDate: IsoDate | null = null;

  constructor(
    private store: RunMarkerStore,
    private minTradingDaysBetweenRuns: number = 1
  ) {}

  async initialize(): Promise<void> {
    this.lastRunDate = await this.readMarker();
    logger.info('✅ Cadence gate initialized', {
      lastRunDate: this.lastRunDate,
      minTradingDaysBetweenRuns: this.minTradingDaysBetweenRuns,
    });
  }

  /**
   * Take the in-flight slot or throw CadenceViolationError.
   */
  async tryAcquire(today: IsoDate, options: { force?: boolean } = {}): Promise<GateLease> {
    if (this.inFlight) {
      throw new CadenceViolationError('A decision cycle is already running');
    }
    this.inFlight = true;

    let locked = false;
    try {
      locked = await this.store.lock();
      if (!locked) {
        throw new CadenceViolationError('A decision cycle is already running in another process');
      }

      // another process may have run since we last looked
      const stored = await this.readMarker();
      if (stored !== null && (this.lastRunDate === null || stored > this.lastRunDate)) {
        this.lastRunDate = stored;
      }

      if (!options.force) {
        this.checkCadence(today);
      }
    } catch (error: unknown) {
      this.inFlight = false;
      if (locked) {
        await this.unlockQuietly();
      }
      throw error;
    }

    let committed = false;
    let released = false;

    return {
      date: today,
      commit: async () => {
        if (committed) return;
        committed = true;
        this.lastRunDate = today;
        logCycle('run marker committed', { date: today });
        try {
          await this.store.save({ lastRunDate: today, committedAt: new Date().toISOString() });
        } catch (error: unknown) {
          logger.error('Failed to persist run marker', {
            location: this.store.location,
            error: getErrorMessage(error),
          });
        }
      },
      release: async () => {
        if (released) return;
        released = true;
        this.inFlight = false;
        await this.unlockQuietly();
      },
    };
  }

  getState(): GateState {
    return {
      inFlight: this.inFlight,
      lastRunDate: this.lastRunDate,
      minTradingDaysBetweenRuns: this.minTradingDaysBetweenRuns,
    };
  }

  private checkCadence(today: IsoDate): void {
    if (!isTradingDay(today)) {
      throw new CadenceViolationError(`${today} is not a trading day`);
    }
    if (this.lastRunDate !== null) {
      const elapsed = tradingDaysBetween(this.lastRunDate, today);
      if (elapsed < this.minTradingDaysBetweenRuns) {
        throw new CadenceViolationError(
          `Only ${elapsed} trading days since last run on ${this.lastRunDate} (minimum ${this.minTradingDaysBetweenRuns})`
        );
      }
    }
  }

  private async readMarker(): Promise<IsoDate | null> {
    try {
      return parseMarker(await this.store.load());
    } catch (error: unknown) {
      const corrupt =
        error instanceof PersistenceCorruptError
          ? error
          : new PersistenceCorruptError(this.store.location, getErrorMessage(error));
      logger.warn('⚠️ Run marker unreadable, treating as never run', { reason: corrupt.message });
      return null;
    }
  }

  private async unlockQuietly(): Promise<void> {
    try {
      await this.store.unlock();
    } catch (error: unknown) {
      logger.error('Failed to release run lock', {
        location: this.store.location,
        error: getErrorMessage(error),
      });
    }
  }
}

function parseMarker(raw: unknown): IsoDate | null {
  if (raw === null || raw === undefined) return null;
  if (typeof raw === 'object' && 'lastRunDate' in raw && typeof raw.lastRunDate === 'string' && isIsoDate(raw.lastRunDate)) {
    return raw.lastRunDate;
  }
  logger.warn('⚠️ Run marker has no valid lastRunDate, treating as never run');
  return null;
}
