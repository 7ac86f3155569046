import { randomUUID } from 'crypto';
import { logger } from '../middleware/logging.js';
import { PipelineConfig } from '../config/types.js';
import { SerializedError, serializeError } from '../utils/errorHandling.js';
import { PipelineOrchestrator } from './pipeline/PipelineOrchestrator.js';
import { BatchResult, PipelineStage, WorkItem } from './pipeline/types.js';

export type BatchRunState = 'running' | 'finished' | 'failed';

export interface BatchRunSnapshot {
  runId: string;
  state: BatchRunState;
  startedAt: string;
  itemCount: number;
  cancelRequested: boolean;
  result?: BatchResult;
  /** Infrastructure failure; item failures live in `result` */
  error?: SerializedError;
}

export interface StartBatchOptions {
  interItemDelayMs?: number | undefined;
  concurrency?: number | undefined;
}

export interface BatchRunServiceOptions {
  newRunId?: () => string;
  /** Finished and failed runs kept for lookup; older ones are dropped first */
  maxFinishedRuns?: number;
}

const DEFAULT_MAX_FINISHED_RUNS = 100;

interface BatchRun {
  runId: string;
  state: BatchRunState;
  startedAt: string;
  itemCount: number;
  controller: AbortController;
  done: Promise<void>;
  result?: BatchResult;
  error?: SerializedError;
}

/**
 * Background batch runs started over the API. Each run owns an
 * AbortController so it can be canceled by id.
 */
export class BatchRunService {
  private readonly runs = new Map<string, BatchRun>();
  private readonly newRunId: () => string;
  private readonly maxFinishedRuns: number;

  constructor(
    private readonly orchestrator: PipelineOrchestrator,
    private readonly stages: readonly PipelineStage[],
    private readonly defaults: PipelineConfig,
    options: BatchRunServiceOptions = {}
  ) {
    this.newRunId = options.newRunId ?? randomUUID;
    this.maxFinishedRuns = options.maxFinishedRuns ?? DEFAULT_MAX_FINISHED_RUNS;
  }

  start(items: readonly WorkItem[], options: StartBatchOptions = {}): BatchRunSnapshot {
    const runId = this.newRunId();
    const controller = new AbortController();
    const run: BatchRun = {
      runId,
      state: 'running',
      startedAt: new Date().toISOString(),
      itemCount: items.length,
      controller,
      done: Promise.resolve(),
    };

    run.done = this.orchestrator
      .processBatch(items, this.stages, {
        runId,
        signal: controller.signal,
        interItemDelayMs: options.interItemDelayMs ?? this.defaults.interItemDelayMs,
        concurrency: options.concurrency ?? this.defaults.concurrency,
        haltOnAuthError: this.defaults.haltOnAuthError,
      })
      .then(
        result => {
          run.state = 'finished';
          run.result = result;
          this.pruneFinished();
        },
        (error: unknown) => {
          run.state = 'failed';
          run.error = serializeError(error);
          logger.error('[BatchRunService] Batch run failed', {
            service: 'BatchRunService',
            operation: 'start',
            runId,
            error: run.error.message,
          });
          this.pruneFinished();
        }
      );

    this.runs.set(runId, run);

    logger.info('[BatchRunService] Batch run started', {
      service: 'BatchRunService',
      operation: 'start',
      runId,
      items: items.length,
    });

    return this.snapshot(run);
  }

  get(runId: string): BatchRunSnapshot | undefined {
    const run = this.runs.get(runId);
    return run ? this.snapshot(run) : undefined;
  }

  list(): BatchRunSnapshot[] {
    return Array.from(this.runs.values(), run => this.snapshot(run));
  }

  /**
   * Request cancellation. The run keeps state 'running' until the item in
   * flight has stopped.
   */
  cancel(runId: string): BatchRunSnapshot | undefined {
    const run = this.runs.get(runId);
    if (!run) {
      return undefined;
    }

    if (run.state === 'running' && !run.controller.signal.aborted) {
      run.controller.abort();
      logger.info('[BatchRunService] Batch run cancel requested', {
        service: 'BatchRunService',
        operation: 'cancel',
        runId,
      });
    }

    return this.snapshot(run);
  }

  async waitFor(runId: string): Promise<BatchRunSnapshot | undefined> {
    const run = this.runs.get(runId);
    if (!run) {
      return undefined;
    }
    await run.done;
    return this.snapshot(run);
  }

  /**
   * Cancel every running batch and wait for them to stop
   */
  async shutdown(): Promise<void> {
    const running = Array.from(this.runs.values()).filter(run => run.state === 'running');
    for (const run of running) {
      run.controller.abort();
    }
    await Promise.all(running.map(run => run.done));
  }

  /**
   * Drop the oldest settled runs beyond the cap. Running batches are always kept.
   */
  private pruneFinished(): void {
    const settled = Array.from(this.runs.values()).filter(run => run.state !== 'running');
    for (const run of settled.slice(0, Math.max(0, settled.length - this.maxFinishedRuns))) {
      this.runs.delete(run.runId);
    }
  }

  private snapshot(run: BatchRun): BatchRunSnapshot {
    return {
      runId: run.runId,
      state: run.state,
      startedAt: run.startedAt,
      itemCount: run.itemCount,
      cancelRequested: run.controller.signal.aborted,
      ...(run.result && { result: run.result }),
      ...(run.error && { error: run.error }),
    };
  }
}
