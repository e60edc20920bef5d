import express, { Express } from 'express';
import { Server } from 'http';
import { corsMiddleware, apiLimiter, errorHandler, notFoundHandler, isAuthConfigured } from './middleware';
import apiRoutes from './routes';
import { logger } from '../utils/logger';
import { traderContextManager } from './services/trader-context';

/**
 * API Server
 *
 * REST API for monitoring the trader and triggering cycles and sell checks
 */
export class APIServer {
  private app: Express;
  private server: Server | null = null;
  private port: number;

  constructor(port: number = 3001) {
    this.port = port;
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandlers();
  }

  private setupMiddleware(): void {
    // Rate limiting keys on the client IP behind one proxy hop
    this.app.set('trust proxy', 1);

    this.app.use(express.json({ limit: '100kb' }));
    this.app.use(corsMiddleware);
    this.app.use('/api/', apiLimiter);

    if (process.env.NODE_ENV === 'development') {
      this.app.use((req, res, next) => {
        logger.debug(`${req.method} ${req.path}`, { query: req.query });
        next();
      });
    }
  }

  private setupRoutes(): void {
    // Health check (no /api prefix for monitoring services)
    this.app.get('/health', (req, res) => {
      res.json({
        success: true,
        status: 'healthy',
        timestamp: new Date().toISOString(),
      });
    });

    this.app.use('/api', apiRoutes);

    this.app.get('/', (req, res) => {
      res.json({
        success: true,
        message: 'Insider Signal Trader API',
        version: '1.0.0',
        endpoints: {
          health: '/health',
          status: '/api/status',
          cycle: '/api/cycle/run',
          sellChecks: '/api/sell-checks/run',
          cooldown: '/api/cooldown',
        },
      });
    });
  }

  /**
   * Must be registered last
   */
  private setupErrorHandlers(): void {
    this.app.use(notFoundHandler);
    this.app.use(errorHandler);
  }

  async start(): Promise<void> {
    if (!traderContextManager.isInitialized()) {
      throw new Error('Trader context not initialized. Call traderContextManager.initialize() first.');
    }

    if (!isAuthConfigured()) {
      logger.warn('⚠️ API_KEY not set - cycle, sell-check and cooldown endpoints will reject every call');
    }

    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, () => {
        logger.info(`🌐 API Server listening on port ${this.getPort()}`);
        logger.info(`   • Health Check: http://localhost:${this.getPort()}/health`);
        resolve();
      });

      server.on('error', (error) => {
        logger.error('API Server error', { error: error.message });
        reject(error);
      });

      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) {
          logger.error('Error stopping API server', { error: error.message });
          reject(error);
        } else {
          this.server = null;
          logger.info('API server stopped');
          resolve();
        }
      });
    });
  }

  /**
   * Bound port; differs from the configured one when started on port 0
   */
  getPort(): number {
    const address = this.server?.address();
    if (address && typeof address === 'object') {
      return address.port;
    }
    return this.port;
  }

  getApp(): Express {
    return this.app;
  }
}
