/**
 * Execution - Barrel Exports
 */

export { TradeExecutor, normalizeAllocations } from './trade-executor';
export type { ExecuteOptions } from './trade-executor';

export { HttpBrokerClient } from './http-broker-client';
export type { HttpBrokerClientOptions } from './http-broker-client';

export type { BrokerClient, OrderFill, OrderRequest, TradableInstrument } from './broker-client';
