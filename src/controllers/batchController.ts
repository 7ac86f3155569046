import { Request, Response, NextFunction } from 'express';
import { BatchRunService } from '../services/BatchRunService.js';
import { parseRequest } from '../middleware/validation.js';
import { createBatchSchema, runIdParamSchema } from '../validation/pipelineSchemas.js';
import { ResourceNotFoundError } from '../errors/index.js';

/**
 * Batch Controller
 *
 * Starts pipeline runs in the background and reports on them by run id
 */
export class BatchController {
  constructor(private readonly runs: BatchRunService) {}

  /**
   * POST /api/batches
   */
  create = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body = parseRequest(createBatchSchema, req.body, 'body');
      const run = this.runs.start(body.items, {
        interItemDelayMs: body.interItemDelayMs,
        concurrency: body.concurrency,
      });
      res.status(202).json({ runId: run.runId, state: run.state, itemCount: run.itemCount });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/batches
   */
  list = async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const runs = this.runs.list().map(run => ({
        runId: run.runId,
        state: run.state,
        startedAt: run.startedAt,
        itemCount: run.itemCount,
        cancelRequested: run.cancelRequested,
        ...(run.result && {
          succeeded: run.result.succeeded,
          failed: run.result.failed,
          canceled: run.result.canceled,
        }),
      }));
      res.json({ runs });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/batches/:runId
   */
  getById = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { runId } = parseRequest(runIdParamSchema, req.params, 'params');
      const run = this.runs.get(runId);
      if (!run) {
        throw new ResourceNotFoundError('batch', runId);
      }
      res.json(run);
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/batches/:runId/cancel
   */
  cancel = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { runId } = parseRequest(runIdParamSchema, req.params, 'params');
      const run = this.runs.cancel(runId);
      if (!run) {
        throw new ResourceNotFoundError('batch', runId);
      }
      res.status(202).json(run);
    } catch (error) {
      next(error);
    }
  };
}
