/**
 * Trader Context - Shared State Manager
 *
 * Holds the running services so route handlers can reach them. Initialized
 * by src/index.ts once every component is ready.
 */

import type { TraderServices } from '../../bootstrap';

export interface TraderContext extends TraderServices {
  startTime: Date;
}

class TraderContextManager {
  private static instance: TraderContextManager;
  private context: TraderContext | null = null;

  private constructor() {}

  static getInstance(): TraderContextManager {
    if (!TraderContextManager.instance) {
      TraderContextManager.instance = new TraderContextManager();
    }
    return TraderContextManager.instance;
  }

  initialize(context: TraderContext): void {
    this.context = context;
  }

  /**
   * Throws if called before initialize()
   */
  getContext(): TraderContext {
    if (!this.context) {
      throw new Error('Trader context not initialized. Call initialize() first.');
    }
    return this.context;
  }

  isInitialized(): boolean {
    return this.context !== null;
  }
}

export const traderContextManager = TraderContextManager.getInstance();
