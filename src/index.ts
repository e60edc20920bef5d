import dotenv from 'dotenv';
import { logger } from './utils/logger';
import { getErrorMessage } from './utils/errors';
import { todayIso } from './utils/dates';
import { loadSettings } from './config/settings';
import { buildServices } from './bootstrap';
import { APIServer, traderContextManager } from './api';

// Load environment variables
dotenv.config();

/**
 * Main entry point: wires the trader and serves the control API.
 * Cycles and sell checks run when the API (or a scheduler calling it) asks.
 */
async function main() {
  logger.info('🤖 Starting Insider Signal Trader');
  logger.info('================================================');

  let apiServer: APIServer | undefined;

  try {
    // ============================================================
    // PHASE 1: CONFIGURATION
    // ============================================================

    logger.info('⚙️  PHASE 1: CONFIGURATION');
    const settings = loadSettings();
    logger.info('✅ Configuration validated', {
      strategies: settings.strategies.map(s => s.name),
      sourcePriority: settings.merger.sourcePriority,
      cooldownDays: settings.cooldown.days,
    });

    // ============================================================
    // PHASE 2: STATE, SOURCES AND EXECUTION
    // ============================================================

    logger.info('🧩 PHASE 2: SERVICES');
    const services = await buildServices(settings);
    const gateState = services.gate.getState();
    logger.info('✅ PHASE 2 COMPLETE', {
      lastRunDate: gateState.lastRunDate,
      cooldownEntries: services.cooldown.getStats(todayIso()).total,
    });

    // ============================================================
    // PHASE 3: API SERVER
    // ============================================================

    logger.info('🌐 PHASE 3: REST API SERVER');
    traderContextManager.initialize({ ...services, startTime: new Date() });

    apiServer = new APIServer(settings.api.port);
    await apiServer.start();

    logger.info('================================================');
    logger.info('🚀 ALL SYSTEMS OPERATIONAL');
    logger.info('================================================');
    logger.info('Trader is running. Press Ctrl+C to stop.');

    const server = apiServer;
    const shutdownHandler = async () => {
      try {
        logger.info('Shutting down...');
        await server.stop();
        logger.info('✅ Shutdown complete');
        process.exit(0);
      } catch (error: unknown) {
        logger.error('Error during shutdown', { error: getErrorMessage(error) });
        process.exit(1);
      }
    };

    process.on('SIGINT', shutdownHandler);
    process.on('SIGTERM', shutdownHandler);
  } catch (error: unknown) {
    logger.error('Failed to start trader', {
      error: getErrorMessage(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    if (apiServer) {
      await apiServer.stop();
    }
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  logger.error('Unhandled error in main', { error: getErrorMessage(error) });
  process.exit(1);
});
