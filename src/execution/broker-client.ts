import type { Position } from '../types';

export interface TradableInstrument {
  ticker: string;
  venueSymbol: string;
}

export interface OrderRequest {
  accountId: string;
  venueSymbol: string;
  quantity: number;
}

export interface OrderFill {
  orderId: string;
  filledQuantity: number;
  averagePrice: number;
  filledAmount: number; // quantity × price, in account currency
}

/**
 * Execution venue boundary. Implementations throw on venue errors
 * (BrokerError, OrderRejectedError); callers decide whether to fall back.
 */
export interface BrokerClient {
  /** null when the venue has no tradable instrument for the ticker. */
  resolveTradable(ticker: string, signal?: AbortSignal): Promise<TradableInstrument | null>;
  /** null when the venue has no usable quote. */
  getPrice(venueSymbol: string, signal?: AbortSignal): Promise<number | null>;
  submitBuyOrder(order: OrderRequest, signal?: AbortSignal): Promise<OrderFill>;
  submitSellOrder(order: OrderRequest, signal?: AbortSignal): Promise<OrderFill>;
  getPositions(accountId: string): Promise<Position[]>;
  getAvailableCash?(accountId: string): Promise<number>;
}
