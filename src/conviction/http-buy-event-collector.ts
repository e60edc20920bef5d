import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { isIsoDate } from '../utils/dates';
import type { BuyEventCollector } from './conviction-feed';
import type { BuyEvent } from '../types';

const eventSchema = z.object({
  ticker: z.string().min(1),
  insiderId: z.string().min(1),
  insiderTitle: z.string(),
  deltaOwnPct: z.union([z.number(), z.literal('new')]),
  tradeDate: z.string().refine(isIsoDate, 'expected YYYY-MM-DD'),
  valueUsd: z.number().min(0),
});

const responseSchema = z.object({
  events: z.array(z.unknown()),
});

export interface HttpBuyEventCollectorOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  adapter?: AxiosRequestConfig['adapter'];
}

/**
 * Pulls parsed open-market insider purchases from a filings service:
 *   GET /insider-buys?days=N -> { events: BuyEvent[] }
 *
 * Malformed rows are dropped with a warning; a malformed envelope throws.
 */
export class HttpBuyEventCollector implements BuyEventCollector {
  private client: AxiosInstance;

  constructor(options: HttpBuyEventCollectorOptions) {
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? 30000,
      headers: options.apiKey ? { 'X-API-Key': options.apiKey } : {},
      adapter: options.adapter,
    });
  }

  async collect(lookbackDays: number): Promise<BuyEvent[]> {
    const response = await this.client.get<unknown>('/insider-buys', { params: { days: lookbackDays } });
    const envelope = responseSchema.safeParse(response.data);
    if (!envelope.success) {
      throw new Error('Malformed insider-buys response');
    }

    const events: BuyEvent[] = [];
    let dropped = 0;
    for (const row of envelope.data.events) {
      const parsed = eventSchema.safeParse(row);
      if (parsed.success) {
        events.push(parsed.data);
      } else {
        dropped++;
      }
    }

    if (dropped > 0) {
      logger.warn(`Dropped ${dropped} malformed insider buy rows`);
    }
    logger.info(`📥 Collected ${events.length} insider buys over ${lookbackDays} days`);
    return events;
  }
}
