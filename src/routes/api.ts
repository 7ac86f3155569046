import { Router } from 'express';
import { JobController } from '../controllers/jobController.js';
import { BatchController } from '../controllers/batchController.js';
import { JobRecordStore } from '../services/jobStore/types.js';
import { JobPoller } from '../services/polling/JobPoller.js';
import { BatchRunService } from '../services/BatchRunService.js';
import { logger } from '../middleware/logging.js';

export interface ApiRouterDeps {
  store: JobRecordStore;
  poller: JobPoller;
  batches: BatchRunService;
  /** Reported by the health endpoint */
  isDatabaseConnected?: () => boolean;
}

// Initialize router factory function
export const createApiRouter = (deps: ApiRouterDeps): Router => {
  const router = Router();

  const jobController = new JobController(deps.store, deps.poller);
  const batchController = new BatchController(deps.batches);

  router.get('/health', (_req, res) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '0.1.0',
      ...(deps.isDatabaseConnected && {
        database: deps.isDatabaseConnected() ? 'connected' : 'disconnected',
      }),
    });
  });

  // Job Routes
  logger.debug('[API Router] Registering job routes');
  router.get('/jobs', jobController.list);
  router.get('/jobs/:id', jobController.getById);
  router.post('/jobs/:id/refresh', jobController.refresh);

  // Batch Routes
  logger.debug('[API Router] Registering batch routes');
  router.get('/batches', batchController.list);
  router.post('/batches', batchController.create);
  router.get('/batches/:runId', batchController.getById);
  router.post('/batches/:runId/cancel', batchController.cancel);

  return router;
};
