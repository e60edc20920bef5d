/**
 * Cooldown Tracker
 *
 * Remembers the last successful buy date per ticker and blocks the ticker from
 * re-selection for `cooldownDays` calendar days:
 *
 *   blocked  <=>  (today - lastBuy) < cooldownDays
 *
 * Entries are only ever overwritten, never removed automatically; an expired
 * entry simply stops blocking. A missing or unreadable store starts empty.
 *
 * Several processes may share one store, so `refresh` pulls in their entries
 * and every save re-reads the store first. Merging keeps the later date.
 */

import { logger, logCooldown } from '../utils/logger';
import { PersistenceCorruptError, getErrorMessage } from '../utils/errors';
import { daysBetween, isIsoDate } from '../utils/dates';
import type { CooldownEntries, CooldownStore } from './cooldown-store';
import type { IsoDate } from '../types';

export interface CooldownStats {
  total: number;
  blocked: number;
  cooldownDays: number;
  location: string;
}

export interface CooldownEntryView {
  ticker: string;
  lastBuyDate: IsoDate;
  blocked: boolean;
  daysRemaining: number; // 0 once the ticker is free
}

export class CooldownTracker {
  private cache: Map<string, IsoDate> = new Map();

  constructor(
    private store: CooldownStore,
    private cooldownDays: number = 3
  ) {}

  /**
   * Load entries from the store into the cache. Never throws on bad content.
   */
  async initialize(): Promise<void> {
    this.cache = await this.readStore();

    logger.info('✅ Cooldown tracker initialized', {
      entriesLoaded: this.cache.size,
      cooldownDays: this.cooldownDays,
      location: this.store.location,
    });
  }

  /**
   * Merge in entries other processes have written since the last read.
   */
  async refresh(): Promise<void> {
    const before = this.cache.size;
    this.mergeIntoCache(await this.readStore());
    if (this.cache.size !== before) {
      logCooldown('refreshed', { added: this.cache.size - before, location: this.store.location });
    }
  }

  isBlocked(ticker: string, today: IsoDate): boolean {
    const last = this.cache.get(normalize(ticker));
    if (last === undefined) return false;
    return daysBetween(last, today) < this.cooldownDays;
  }

  /**
   * Record a successful buy. Idempotent for the same (ticker, date).
   * Persistence failures are logged; the in-memory entry still applies.
   */
  async record(ticker: string, today: IsoDate): Promise<void> {
    await this.recordMany([ticker], today);
  }

  async recordMany(tickers: string[], today: IsoDate): Promise<void> {
    for (const ticker of tickers) {
      this.cache.set(normalize(ticker), today);
    }
    logCooldown('recorded', { tickers: tickers.map(normalize), date: today });
    await this.persist();
  }

  getBlocked(today: IsoDate): string[] {
    return [...this.cache.keys()].filter(t => this.isBlocked(t, today)).sort();
  }

  getEntries(today: IsoDate): CooldownEntryView[] {
    return [...this.cache.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([ticker, lastBuyDate]) => {
        const elapsed = daysBetween(lastBuyDate, today);
        return {
          ticker,
          lastBuyDate,
          blocked: elapsed < this.cooldownDays,
          daysRemaining: Math.max(0, this.cooldownDays - elapsed),
        };
      });
  }

  getStats(today: IsoDate): CooldownStats {
    return {
      total: this.cache.size,
      blocked: this.getBlocked(today).length,
      cooldownDays: this.cooldownDays,
      location: this.store.location,
    };
  }

  getCooldownDays(): number {
    return this.cooldownDays;
  }

  private async persist(): Promise<void> {
    try {
      this.mergeIntoCache(await this.readStore());
      const entries: CooldownEntries = Object.fromEntries(this.cache);
      await this.store.save(entries);
    } catch (error: unknown) {
      logger.error('Failed to persist cooldown store', {
        location: this.store.location,
        error: getErrorMessage(error),
      });
    }
  }

  private async readStore(): Promise<Map<string, IsoDate>> {
    let raw: unknown;
    try {
      raw = await this.store.load();
    } catch (error: unknown) {
      const corrupt =
        error instanceof PersistenceCorruptError
          ? error
          : new PersistenceCorruptError(this.store.location, getErrorMessage(error));
      logger.warn('⚠️ Cooldown store unreadable, ignoring its contents', { reason: corrupt.message });
      raw = null;
    }
    return this.parseEntries(raw);
  }

  private mergeIntoCache(stored: Map<string, IsoDate>): void {
    for (const [ticker, date] of stored) {
      const current = this.cache.get(ticker);
      // ISO dates order lexically
      if (current === undefined || date > current) {
        this.cache.set(ticker, date);
      }
    }
  }

  private parseEntries(raw: unknown): Map<string, IsoDate> {
    const entries = new Map<string, IsoDate>();
    if (raw === null || raw === undefined) return entries;

    if (typeof raw !== 'object' || Array.isArray(raw)) {
      logger.warn('⚠️ Cooldown store is not a ticker map, starting empty', {
        location: this.store.location,
      });
      return entries;
    }

    let dropped = 0;
    for (const [key, value] of Object.entries(raw)) {
      const ticker = normalize(key);
      if (ticker && typeof value === 'string' && isIsoDate(value)) {
        entries.set(ticker, value);
      } else {
        dropped++;
      }
    }

    if (dropped > 0) {
      logger.warn(`Dropped ${dropped} malformed cooldown entries`, { location: this.store.location });
    }
    return entries;
  }
}

function normalize(ticker: string): string {
  return ticker.trim().toUpperCase();
}
