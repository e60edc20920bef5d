import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import { logger } from '../utils/logger';
import type { SourceFeed, SourceHit, SourceTag } from '../types';

// A list endpoint may answer with bare tickers or with scored entries.
const listSchema = z.object({
  tickers: z.array(
    z.union([
      z.string(),
      z.object({
        ticker: z.string(),
        score: z.number().optional(),
      }).passthrough(),
    ])
  ),
});

export interface HttpSourceFeedOptions {
  name: SourceTag;
  url: string;
  apiKey?: string;
  filterNoise?: boolean;
  adapter?: AxiosRequestConfig['adapter'];
}

/**
 * A ranked ticker list served over HTTP (screeners, earnings calendars,
 * social trackers). Order in the response is the source's rank order.
 */
export class HttpSourceFeed implements SourceFeed {
  readonly name: SourceTag;
  readonly filterNoise: boolean;
  private client: AxiosInstance;
  private url: string;

  constructor(options: HttpSourceFeedOptions) {
    this.name = options.name;
    this.url = options.url;
    this.filterNoise = options.filterNoise ?? true;
    this.client = axios.create({
      headers: options.apiKey ? { 'X-API-Key': options.apiKey } : {},
      adapter: options.adapter,
    });
  }

  async fetch(): Promise<SourceHit[]> {
    const response = await this.client.get<unknown>(this.url);
    const parsed = listSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(`Malformed ticker list from ${this.name}`);
    }

    const hits = parsed.data.tickers.map((entry): SourceHit => {
      if (typeof entry === 'string') {
        return { ticker: entry, evidence: {} };
      }
      const { ticker, score, ...evidence } = entry;
      return { ticker, score, evidence };
    });

    logger.debug(`Source ${this.name} returned ${hits.length} tickers`);
    return hits;
  }
}

/**
 * `screener=https://a/list,earnings=https://b/list` -> feed options.
 */
export function parseSourceFeeds(value: string): Array<{ name: SourceTag; url: string }> {
  return value
    .split(',')
    .map(part => part.trim())
    .filter(part => part.length > 0)
    .map(part => {
      const separator = part.indexOf('=');
      const name = separator > 0 ? part.slice(0, separator).trim() : '';
      const url = separator > 0 ? part.slice(separator + 1).trim() : '';
      if (!name || !url) {
        throw new Error(`Invalid configuration: SOURCE_FEEDS entry "${part}" must look like name=url`);
      }
      return { name, url };
    });
}
