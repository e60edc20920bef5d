/**
 * Safety Module
 *
 * Exports:
 * - CooldownTracker: blocks recently bought tickers from re-selection
 * - MemoryCooldownStore / FileCooldownStore: where the entries live
 */

export { CooldownTracker } from './cooldown-tracker';
export type { CooldownStats, CooldownEntryView } from './cooldown-tracker';

export { MemoryCooldownStore, FileCooldownStore } from './cooldown-store';
export type { CooldownStore, CooldownEntries } from './cooldown-store';
