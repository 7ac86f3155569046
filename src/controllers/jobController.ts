import { Request, Response, NextFunction } from 'express';
import { JobRecordStore } from '../services/jobStore/types.js';
import { JobPoller } from '../services/polling/JobPoller.js';
import { parseRequest } from '../middleware/validation.js';
import { jobIdParamSchema, listJobsQuerySchema } from '../validation/jobSchemas.js';
import { JobFilters } from '../types/jobs.js';

/**
 * Job Controller
 *
 * Out-of-band access to render job records:
 * - List and fetch stored jobs
 * - Refresh one job's status from the rendering service
 */
export class JobController {
  constructor(
    private readonly store: JobRecordStore,
    private readonly poller: JobPoller
  ) {}

  /**
   * GET /api/jobs
   */
  list = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const query = parseRequest(listJobsQuerySchema, req.query, 'query');
      const filters: JobFilters = {
        ...(query.status && { status: query.status }),
        ...(query.kind && { kind: query.kind }),
        ...(query.itemId && { itemId: query.itemId }),
        limit: query.limit ?? 100,
      };

      const jobs = await this.store.list(filters);
      res.json({ jobs, count: jobs.length });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/jobs/:id
   */
  getById = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = parseRequest(jobIdParamSchema, req.params, 'params');
      const job = await this.store.load(id);
      res.json(job);
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/jobs/:id/refresh
   * One status check against the rendering service, persisted to the store
   */
  refresh = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { id } = parseRequest(jobIdParamSchema, req.params, 'params');
      const job = await this.poller.refresh(id);
      res.json(job);
    } catch (error) {
      next(error);
    }
  };
}
