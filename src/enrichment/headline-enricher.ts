/**
 * Headline Enricher
 *
 * Fetches recent news headlines for a candidate from a REST news provider:
 *   GET /headlines?ticker=XYZ&limit=5 -> { headlines: [{ title, url?, publishedAt?, source? }] }
 *
 * Errors propagate; the merger turns them into empty enrichment.
 */

import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import { logger } from '../utils/logger';
import type { Enricher } from '../signals/signal-merger';
import type { Enrichment } from '../types';

const headlinesSchema = z.object({
  headlines: z.array(
    z.object({
      title: z.string().min(1),
      url: z.string().optional(),
      publishedAt: z.string().optional(),
      source: z.string().optional(),
    })
  ),
});

export interface HeadlineEnricherOptions {
  baseUrl: string;
  apiKey?: string;
  maxHeadlines?: number;
  adapter?: AxiosRequestConfig['adapter'];
}

export class HeadlineEnricher implements Enricher {
  private client: AxiosInstance;
  private maxHeadlines: number;

  constructor(options: HeadlineEnricherOptions) {
    this.maxHeadlines = options.maxHeadlines ?? 5;
    this.client = axios.create({
      baseURL: options.baseUrl,
      headers: options.apiKey ? { 'X-API-Key': options.apiKey } : {},
      adapter: options.adapter,
    });
  }

  async enrich(ticker: string, signal: AbortSignal): Promise<Enrichment> {
    const response = await this.client.get<unknown>('/headlines', {
      params: { ticker, limit: this.maxHeadlines },
      signal,
    });

    const parsed = headlinesSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(`Malformed headlines for ${ticker}`);
    }

    const headlines = parsed.data.headlines.slice(0, this.maxHeadlines);
    logger.debug(`📰 ${headlines.length} headlines for ${ticker}`);
    return { headlines };
  }
}
