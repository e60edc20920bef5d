import { describe, it, expect } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { HeadlineEnricher } from './headline-enricher';

function provider(status: number, data: unknown, calls: InternalAxiosRequestConfig[] = []) {
  return async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    calls.push(config);
    const response: AxiosResponse = { status, statusText: String(status), data, headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, response);
    }
    return response;
  };
}

const signal = () => new AbortController().signal;

describe('HeadlineEnricher', () => {
  it('returns at most the configured number of headlines', async () => {
    const calls: InternalAxiosRequestConfig[] = [];
    const enricher = new HeadlineEnricher({
      baseUrl: 'http://news.test',
      apiKey: 'test-secret',
      maxHeadlines: 2,
      adapter: provider(
        200,
        {
          headlines: [
            { title: 'ACME beats estimates', source: 'wire' },
            { title: 'ACME director buys shares', url: 'http://news.test/2' },
            { title: 'ACME to present at conference' },
          ],
        },
        calls
      ),
    });

    const result = await enricher.enrich('ACME', signal());

    expect(result.headlines).toEqual([
      { title: 'ACME beats estimates', source: 'wire' },
      { title: 'ACME director buys shares', url: 'http://news.test/2' },
    ]);
    expect(calls[0].url).toBe('/headlines');
    expect(calls[0].params).toEqual({ ticker: 'ACME', limit: 2 });
    expect(AxiosHeaders.from(calls[0].headers).get('X-API-Key')).toBe('test-secret');
  });

  it('rejects malformed payloads', async () => {
    const enricher = new HeadlineEnricher({
      baseUrl: 'http://news.test',
      adapter: provider(200, { items: [] }),
    });

    await expect(enricher.enrich('ACME', signal())).rejects.toThrow('Malformed headlines for ACME');
  });

  it('propagates provider errors', async () => {
    const enricher = new HeadlineEnricher({
      baseUrl: 'http://news.test',
      adapter: provider(429, { message: 'slow down' }),
    });

    await expect(enricher.enrich('ACME', signal())).rejects.toThrow('Request failed with status code 429');
  });
});
