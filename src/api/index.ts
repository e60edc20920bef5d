export { APIServer } from './server';
export { traderContextManager } from './services/trader-context';
export type { TraderContext } from './services/trader-context';
