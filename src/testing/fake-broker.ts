import { OrderRejectedError } from '../utils/errors';
import type { BrokerClient, OrderFill, OrderRequest, TradableInstrument } from '../execution/broker-client';
import type { Position } from '../types';

/**
 * In-process venue for tests. Every ticker trades as `<TICKER>.X` at 10
 * unless configured otherwise.
 */
export class FakeBroker implements BrokerClient {
  untradable = new Set<string>();
  unresolvable = new Set<string>();
  rejected = new Set<string>();
  prices = new Map<string, number | null>();
  positions = new Map<string, Position[]>();
  fillRatio = 1;
  cash: number | null = null;
  hangOnSubmit = false;
  hangOnResolve = false;
  orders: OrderRequest[] = [];
  buyFills: OrderFill[] = [];
  sells: OrderRequest[] = [];

  async resolveTradable(ticker: string): Promise<TradableInstrument | null> {
    if (this.hangOnResolve) return new Promise<TradableInstrument | null>(() => undefined);
    if (this.unresolvable.has(ticker)) throw new Error('venue lookup timed out');
    return this.untradable.has(ticker) ? null : { ticker, venueSymbol: `${ticker}.X` };
  }

  async getPrice(venueSymbol: string): Promise<number | null> {
    const price = this.prices.get(venueSymbol);
    return price === undefined ? 10 : price;
  }

  async submitBuyOrder(order: OrderRequest): Promise<OrderFill> {
    this.orders.push(order);
    if (this.hangOnSubmit) return new Promise<OrderFill>(() => undefined);
    if (this.rejected.has(order.venueSymbol)) throw new OrderRejectedError(order.venueSymbol, 'market closed');
    const fill = await this.fill(order, this.fillRatio);
    this.buyFills.push(fill);
    return fill;
  }

  async submitSellOrder(order: OrderRequest): Promise<OrderFill> {
    this.sells.push(order);
    if (this.rejected.has(order.venueSymbol)) throw new OrderRejectedError(order.venueSymbol, 'market closed');
    return this.fill(order, 1);
  }

  async getPositions(accountId: string): Promise<Position[]> {
    return this.positions.get(accountId) ?? [];
  }

  async getAvailableCash(): Promise<number> {
    if (this.cash === null) throw new Error('cash endpoint down');
    return this.cash;
  }

  private async fill(order: OrderRequest, ratio: number): Promise<OrderFill> {
    const price = (await this.getPrice(order.venueSymbol)) ?? 10;
    const filledQuantity = order.quantity * ratio;
    return {
      orderId: `o-${this.orders.length + this.sells.length}`,
      filledQuantity,
      averagePrice: price,
      filledAmount: filledQuantity * price,
    };
  }
}
