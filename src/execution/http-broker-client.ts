/**
 * HTTP Broker Client
 *
 * Talks to a REST execution venue:
 * - GET  /instruments?ticker=    resolve a ticker to a venue symbol
 * - GET  /prices/:symbol         latest tradable price
 * - POST /accounts/:id/orders    market orders (buy or sell)
 * - GET  /accounts/:id/positions open positions
 * - GET  /accounts/:id/cash      available cash
 *
 * Responses are validated; non-2xx answers become BrokerError.
 */

import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { BrokerError, OrderRejectedError, getErrorMessage } from '../utils/errors';
import type { BrokerClient, OrderFill, OrderRequest, TradableInstrument } from './broker-client';
import type { Position } from '../types';

const instrumentsSchema = z.object({
  instruments: z.array(
    z.object({
      ticker: z.string(),
      symbol: z.string(),
      tradable: z.boolean(),
    })
  ),
});

const priceSchema = z.object({
  symbol: z.string(),
  price: z.number().nullable(),
});

const orderSchema = z.object({
  id: z.string(),
  status: z.enum(['filled', 'partially_filled', 'rejected']),
  filledQuantity: z.number().min(0),
  averagePrice: z.number().min(0),
  rejectReason: z.string().optional(),
});

const positionsSchema = z.object({
  positions: z.array(
    z.object({
      ticker: z.string(),
      quantity: z.number(),
      averagePrice: z.number(),
      openedAt: z.string(),
    })
  ),
});

const cashSchema = z.object({
  available: z.number(),
});

export interface HttpBrokerClientOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  /** Overrides the HTTP transport; tests pass an in-process adapter. */
  adapter?: AxiosRequestConfig['adapter'];
}

export class HttpBrokerClient implements BrokerClient {
  private client: AxiosInstance;
  private instrumentCache: Map<string, { instrument: TradableInstrument | null; timestamp: number }> = new Map();
  private readonly CACHE_TTL = 60 * 60 * 1000; // 1 hour

  constructor(options: HttpBrokerClientOptions) {
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? 15000,
      headers: {
        'Content-Type': 'application/json',
        ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
      },
      adapter: options.adapter,
    });

    logger.info('Broker client initialized', { baseUrl: options.baseUrl });
  }

  async resolveTradable(ticker: string, signal?: AbortSignal): Promise<TradableInstrument | null> {
    const cached = this.instrumentCache.get(ticker);
    if (cached && Date.now() - cached.timestamp < this.CACHE_TTL) {
      return cached.instrument;
    }

    const data = await this.request('GET', '/instruments', instrumentsSchema, { params: { ticker }, signal });
    const match = data.instruments.find(i => i.tradable && i.ticker.toUpperCase() === ticker.toUpperCase());
    const instrument = match ? { ticker, venueSymbol: match.symbol } : null;

    this.instrumentCache.set(ticker, { instrument, timestamp: Date.now() });
    return instrument;
  }

  async getPrice(venueSymbol: string, signal?: AbortSignal): Promise<number | null> {
    const data = await this.request('GET', `/prices/${encodeURIComponent(venueSymbol)}`, priceSchema, { signal });
    return data.price;
  }

  async submitBuyOrder(order: OrderRequest, signal?: AbortSignal): Promise<OrderFill> {
    return this.submitOrder('buy', order, signal);
  }

  async submitSellOrder(order: OrderRequest, signal?: AbortSignal): Promise<OrderFill> {
    return this.submitOrder('sell', order, signal);
  }

  async getPositions(accountId: string): Promise<Position[]> {
    const data = await this.request(
      'GET',
      `/accounts/${encodeURIComponent(accountId)}/positions`,
      positionsSchema,
      {}
    );
    return data.positions.map(p => ({
      ticker: p.ticker.toUpperCase(),
      quantity: p.quantity,
      averagePrice: p.averagePrice,
      openDate: p.openedAt.slice(0, 10),
      accountId,
    }));
  }

  async getAvailableCash(accountId: string): Promise<number> {
    const data = await this.request('GET', `/accounts/${encodeURIComponent(accountId)}/cash`, cashSchema, {});
    return data.available;
  }

  clearCache(): void {
    this.instrumentCache.clear();
  }

  private async submitOrder(side: 'buy' | 'sell', order: OrderRequest, signal?: AbortSignal): Promise<OrderFill> {
    logger.debug(`Submitting ${side} order`, { ...order });

    const data = await this.request('POST', `/accounts/${encodeURIComponent(order.accountId)}/orders`, orderSchema, {
      data: { symbol: order.venueSymbol, side, type: 'market', quantity: order.quantity },
      signal,
    });

    if (data.status === 'rejected' || data.filledQuantity === 0) {
      throw new OrderRejectedError(order.venueSymbol, data.rejectReason ?? 'nothing filled');
    }

    return {
      orderId: data.id,
      filledQuantity: data.filledQuantity,
      averagePrice: data.averagePrice,
      filledAmount: data.filledQuantity * data.averagePrice,
    };
  }

  private async request<T>(
    method: 'GET' | 'POST',
    url: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    config: Pick<AxiosRequestConfig, 'params' | 'data' | 'signal'>
  ): Promise<T> {
    let body: unknown;
    try {
      const response = await this.client.request<unknown>({ method, url, ...config });
      body = response.data;
    } catch (error: unknown) {
      if (axios.isAxiosError(error) && error.response) {
        throw new BrokerError(error.response.status, extractVenueMessage(error.response.data) ?? error.message);
      }
      throw error;
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new BrokerError(502, `Unexpected response from ${method} ${url}: ${getErrorMessage(parsed.error)}`);
    }
    return parsed.data;
  }
}

function extractVenueMessage(data: unknown): string | null {
  if (typeof data === 'string' && data.length > 0) return data;
  if (data && typeof data === 'object') {
    if ('message' in data && typeof data.message === 'string') return data.message;
    if ('error' in data && typeof data.error === 'string') return data.error;
  }
  return null;
}
