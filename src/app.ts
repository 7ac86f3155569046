import express from 'express';
import cors from 'cors';
import { createServer, Server as HttpServer } from 'http';
import { ConfigManager, validateConfig } from './config/ConfigManager.js';
import { AppConfig } from './config/types.js';
import { DatabaseManager } from './database/DatabaseManager.js';
import { createJobRecordStore } from './services/jobStore/index.js';
import { JobRecordStore } from './services/jobStore/types.js';
import { createServices } from './services/createServices.js';
import { BatchRunService } from './services/BatchRunService.js';
import { securityMiddleware, rateLimitByIp } from './middleware/security.js';
import { requestLoggingMiddleware, errorLoggingMiddleware, initializeLogger, logger } from './middleware/logging.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createApiRouter, ApiRouterDeps } from './routes/api.js';

export interface ExpressAppOptions {
  /** Allow cross-origin requests from any origin */
  allowAnyOrigin?: boolean;
  /** Requests per minute per IP on /api; 0 disables the limit */
  rateLimitPerMinute?: number;
}

/**
 * Build the HTTP application around already-wired services
 */
export function createExpressApp(deps: ApiRouterDeps, options: ExpressAppOptions = {}): express.Application {
  const app = express();

  // Trust proxy for rate limiting and IP detection
  app.set('trust proxy', 1);

  app.use(securityMiddleware);
  app.use(cors({ origin: options.allowAnyOrigin ?? false }));
  app.use(express.json({ limit: '2mb' }));
  app.use(requestLoggingMiddleware);

  const rateLimit = options.rateLimitPerMinute ?? 0;
  if (rateLimit > 0) {
    app.use('/api', rateLimitByIp(60000, rateLimit));
  }

  app.use('/api', createApiRouter(deps));

  // Error handling (MUST be after all routes)
  app.use(errorLoggingMiddleware);
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

export class App {
  private readonly config: AppConfig;
  private readonly dbManager: DatabaseManager;
  private httpServer?: HttpServer;
  private store?: JobRecordStore;
  private batches?: BatchRunService;

  constructor(config: AppConfig = ConfigManager.getInstance().getConfig()) {
    this.config = config;
    this.dbManager = new DatabaseManager(this.config.database);
    initializeLogger(this.config.logging);
  }

  public async start(): Promise<void> {
    // Batches need the remote services; job browsing does not
    for (const problem of validateConfig(this.config)) {
      logger.warn(`[App] Configuration: ${problem}`);
    }

    if (this.config.jobStore.backend === 'sqlite') {
      await this.dbManager.connect();
    }

    const store = createJobRecordStore(this.config.jobStore, () => this.dbManager.getConnection());
    await store.initialize();
    this.store = store;
    logger.info('Job record store initialized', { backend: this.config.jobStore.backend });

    const services = createServices(this.config, store);
    this.batches = new BatchRunService(services.orchestrator, services.stages, this.config.pipeline);

    const app = createExpressApp(
      {
        store,
        poller: services.poller,
        batches: this.batches,
        isDatabaseConnected: () => this.dbManager.isConnected(),
      },
      {
        allowAnyOrigin: this.config.server.env === 'development',
        rateLimitPerMinute: 600,
      }
    );

    const { port, host } = this.config.server;
    const server = createServer(app);
    this.httpServer = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });

    logger.info(`anchorcast server started on ${host}:${port}`);
    logger.info(`Environment: ${this.config.server.env}`);
  }

  public async stop(): Promise<void> {
    try {
      if (this.batches) {
        await this.batches.shutdown();
        logger.info('Batch runs stopped');
      }

      const server = this.httpServer;
      if (server) {
        await new Promise<void>((resolve, reject) => {
          server.close(error => (error ? reject(error) : resolve()));
        });
        logger.info('HTTP server closed');
      }

      if (this.store) {
        await this.store.close();
      }
      await this.dbManager.disconnect();
      logger.info('Server stopped gracefully');
    } catch (error) {
      logger.error('Error during server shutdown:', error);
    }
  }
}
