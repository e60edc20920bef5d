import path from 'path';
import { readJsonFile, writeJsonAtomic } from '../utils/json-file';
import type { IsoDate } from '../types';

export type CooldownEntries = Record<string, IsoDate>;

/**
 * Where cooldown entries live between runs. `load` may return anything the
 * backing medium holds; the tracker validates it.
 */
export interface CooldownStore {
  readonly location: string;
  load(): Promise<unknown>;
  save(entries: CooldownEntries): Promise<void>;
}

export class MemoryCooldownStore implements CooldownStore {
  readonly location = 'memory';
  private data: unknown;

  constructor(initial: unknown = {}) {
    this.data = initial;
  }

  async load(): Promise<unknown> {
    return this.data;
  }

  async save(entries: CooldownEntries): Promise<void> {
    this.data = { ...entries };
  }

  snapshot(): unknown {
    return this.data;
  }
}

/**
 * Human-readable `{ "TICKER": "YYYY-MM-DD" }` file.
 */
export class FileCooldownStore implements CooldownStore {
  readonly location: string;

  constructor(filePath: string) {
    this.location = path.resolve(process.cwd(), filePath);
  }

  async load(): Promise<unknown> {
    return readJsonFile(this.location);
  }

  async save(entries: CooldownEntries): Promise<void> {
    const sorted: CooldownEntries = {};
    for (const ticker of Object.keys(entries).sort()) {
      sorted[ticker] = entries[ticker];
    }
    await writeJsonAtomic(this.location, sorted);
  }
}
