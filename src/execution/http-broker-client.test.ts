import { describe, it, expect } from 'vitest';
import { AxiosError, AxiosHeaders } from 'axios';
import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { HttpBrokerClient } from './http-broker-client';
import { BrokerError, OrderRejectedError } from '../utils/errors';

type Route = (config: InternalAxiosRequestConfig) => { status: number; data: unknown };

/** In-process venue: routes keyed by "METHOD url". */
function venue(routes: Record<string, Route>, calls: InternalAxiosRequestConfig[] = []) {
  return async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    calls.push(config);
    const key = `${(config.method ?? 'get').toUpperCase()} ${config.url ?? ''}`;
    const route = routes[key];
    const { status, data } = route ? route(config) : { status: 404, data: { message: `no route ${key}` } };
    const response: AxiosResponse = { status, statusText: String(status), data, headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, response);
    }
    return response;
  };
}

const ok = (data: unknown): Route => () => ({ status: 200, data });

describe('HttpBrokerClient', () => {
  it('resolves tradable instruments and caches the answer', async () => {
    const calls: InternalAxiosRequestConfig[] = [];
    const client = new HttpBrokerClient({
      baseUrl: 'http://venue.test',
      apiKey: 'test-secret',
      adapter: venue(
        {
          'GET /instruments': ok({
            instruments: [
              { ticker: 'ACME', symbol: 'ACME.OLD', tradable: false },
              { ticker: 'ACME', symbol: 'ACME.US', tradable: true },
            ],
          }),
        },
        calls
      ),
    });

    expect(await client.resolveTradable('ACME')).toEqual({ ticker: 'ACME', venueSymbol: 'ACME.US' });
    expect(await client.resolveTradable('ACME')).toEqual({ ticker: 'ACME', venueSymbol: 'ACME.US' });
    expect(calls).toHaveLength(1);
    expect(calls[0].params).toEqual({ ticker: 'ACME' });
    expect(AxiosHeaders.from(calls[0].headers).get('Authorization')).toBe('Bearer test-secret');
  });

  it('returns null for tickers without a tradable listing', async () => {
    const client = new HttpBrokerClient({
      baseUrl: 'http://venue.test',
      adapter: venue({ 'GET /instruments': ok({ instruments: [] }) }),
    });

    expect(await client.resolveTradable('NOPE')).toBeNull();
  });

  it('submits market buys and reports the filled amount', async () => {
    const calls: InternalAxiosRequestConfig[] = [];
    const client = new HttpBrokerClient({
      baseUrl: 'http://venue.test',
      adapter: venue(
        {
          'POST /accounts/acct-1/orders': ok({ id: 'ord-1', status: 'filled', filledQuantity: 2, averagePrice: 12.5 }),
        },
        calls
      ),
    });

    const fill = await client.submitBuyOrder({ accountId: 'acct-1', venueSymbol: 'ACME.US', quantity: 2 });

    expect(fill).toEqual({ orderId: 'ord-1', filledQuantity: 2, averagePrice: 12.5, filledAmount: 25 });
    expect(JSON.parse(String(calls[0].data))).toEqual({ symbol: 'ACME.US', side: 'buy', type: 'market', quantity: 2 });
  });

  it('raises OrderRejectedError for rejected orders', async () => {
    const client = new HttpBrokerClient({
      baseUrl: 'http://venue.test',
      adapter: venue({
        'POST /accounts/acct-1/orders': ok({
          id: 'ord-2',
          status: 'rejected',
          filledQuantity: 0,
          averagePrice: 0,
          rejectReason: 'insufficient funds',
        }),
      }),
    });

    await expect(
      client.submitSellOrder({ accountId: 'acct-1', venueSymbol: 'ACME.US', quantity: 1 })
    ).rejects.toBeInstanceOf(OrderRejectedError);
  });

  it('turns HTTP errors into BrokerError with the venue message', async () => {
    const client = new HttpBrokerClient({
      baseUrl: 'http://venue.test',
      adapter: venue({ 'GET /prices/ACME.US': () => ({ status: 503, data: { message: 'maintenance' } }) }),
    });

    const error = await client.getPrice('ACME.US').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BrokerError);
    expect(error).toMatchObject({ statusCode: 503, venueMessage: 'maintenance' });
  });

  it('rejects malformed payloads', async () => {
    const client = new HttpBrokerClient({
      baseUrl: 'http://venue.test',
      adapter: venue({ 'GET /accounts/acct-1/cash': ok({ balance: 'lots' }) }),
    });

    await expect(client.getAvailableCash('acct-1')).rejects.toMatchObject({ statusCode: 502 });
  });

  it('maps positions and trims timestamps to dates', async () => {
    const client = new HttpBrokerClient({
      baseUrl: 'http://venue.test',
      adapter: venue({
        'GET /accounts/acct-1/positions': ok({
          positions: [{ ticker: 'acme', quantity: 3, averagePrice: 10, openedAt: '2024-03-11T14:30:00Z' }],
        }),
      }),
    });

    expect(await client.getPositions('acct-1')).toEqual([
      { ticker: 'ACME', quantity: 3, averagePrice: 10, openDate: '2024-03-11', accountId: 'acct-1' },
    ]);
  });
});
