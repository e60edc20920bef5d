import { describe, it, expect } from 'vitest';
import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { HttpSourceFeed, parseSourceFeeds } from './http-source-feed';

const respond = (data: unknown, calls: InternalAxiosRequestConfig[] = []) =>
  async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    calls.push(config);
    return { status: 200, statusText: 'OK', data, headers: {}, config };
  };

describe('HttpSourceFeed', () => {
  it('accepts bare and scored tickers in list order', async () => {
    const calls: InternalAxiosRequestConfig[] = [];
    const feed = new HttpSourceFeed({
      name: 'screener',
      url: 'http://lists.test/screener',
      adapter: respond({ tickers: ['ACME', { ticker: 'BOLT', score: 4.5, sector: 'energy' }] }, calls),
    });

    expect(await feed.fetch()).toEqual([
      { ticker: 'ACME', evidence: {} },
      { ticker: 'BOLT', score: 4.5, evidence: { sector: 'energy' } },
    ]);
    expect(calls[0].url).toBe('http://lists.test/screener');
    expect(feed.filterNoise).toBe(true);
  });

  it('rejects a payload without a ticker list', async () => {
    const feed = new HttpSourceFeed({
      name: 'earnings',
      url: 'http://lists.test/earnings',
      adapter: respond({ rows: [] }),
    });

    await expect(feed.fetch()).rejects.toThrow('Malformed ticker list from earnings');
  });
});

describe('parseSourceFeeds', () => {
  it('splits name=url pairs', () => {
    expect(parseSourceFeeds('screener=http://a.test/list?x=1, earnings=http://b.test/list')).toEqual([
      { name: 'screener', url: 'http://a.test/list?x=1' },
      { name: 'earnings', url: 'http://b.test/list' },
    ]);
  });

  it('rejects entries without a name or url', () => {
    expect(() => parseSourceFeeds('http://a.test/list')).toThrow(
      'SOURCE_FEEDS entry "http://a.test/list" must look like name=url'
    );
  });
});
