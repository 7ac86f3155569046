import pMap from 'p-map';
import { randomUUID } from 'crypto';
import { logger } from '../../middleware/logging.js';
import {
  ApplicationError,
  ConfigurationError,
  ErrorCode,
  JobCanceledError,
  toApplicationError,
} from '../../errors/index.js';
import { delay, SleepFn } from '../../utils/delay.js';
import { serializeError } from '../../utils/errorHandling.js';
import {
  BatchResult,
  ItemResult,
  PipelineStage,
  ProcessBatchOptions,
  StageArtifact,
  StageResult,
  WorkItem,
} from './types.js';

export interface PipelineOrchestratorOptions {
  sleep?: SleepFn;
  now?: () => Date;
}

function validateOptions(stages: readonly PipelineStage[], concurrency: number, interItemDelayMs: number): void {
  if (stages.length === 0) {
    throw new ConfigurationError('pipeline.stages', 'A pipeline needs at least one stage');
  }
  const names = new Set(stages.map(stage => stage.name));
  if (names.size !== stages.length) {
    throw new ConfigurationError('pipeline.stages', 'Stage names must be unique');
  }
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new ConfigurationError('pipeline.concurrency', `Concurrency must be a positive integer, got ${concurrency}`);
  }
  if (!Number.isFinite(interItemDelayMs) || interItemDelayMs < 0) {
    throw new ConfigurationError('pipeline.interItemDelayMs', `Inter-item delay must be >= 0, got ${interItemDelayMs}`);
  }
}

/**
 * Runs a batch of work items through an ordered chain of stages. Items are
 * isolated from each other: a failure ends only that item's chain, and the
 * stages it completed stay in its result.
 */
export class PipelineOrchestrator {
  private readonly sleep: SleepFn;
  private readonly now: () => Date;

  constructor(options: PipelineOrchestratorOptions = {}) {
    this.sleep = options.sleep ?? delay;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Never throws because items failed. Throws ConfigurationError for an
   * empty or invalid stage chain or options.
   */
  async processBatch(
    items: readonly WorkItem[],
    stages: readonly PipelineStage[],
    options: ProcessBatchOptions = {}
  ): Promise<BatchResult> {
    const concurrency = options.concurrency ?? 1;
    const interItemDelayMs = options.interItemDelayMs ?? 0;
    validateOptions(stages, concurrency, interItemDelayMs);

    const runId = options.runId ?? randomUUID();
    const signal = options.signal;
    const startedAt = this.now().toISOString();
    const lastIndex = items.length - 1;
    let haltReason: ApplicationError | undefined;

    logger.info('[PipelineOrchestrator] Batch started', {
      service: 'PipelineOrchestrator',
      operation: 'processBatch',
      runId,
      items: items.length,
      stages: stages.map(stage => stage.name),
      concurrency,
      interItemDelayMs,
    });

    const results = await pMap(
      items.map((item, index) => ({ item, index })),
      async ({ item, index }): Promise<ItemResult> => {
        if (signal?.aborted) {
          return this.skipped(item, index, new JobCanceledError(undefined, 'Batch was canceled before this item started'));
        }
        if (haltReason) {
          return this.skipped(item, index, haltReason);
        }

        const result = await this.processItem(runId, item, index, stages, signal);

        if (options.haltOnAuthError && result.error?.code === ErrorCode.AUTH_AUTHENTICATION_FAILED) {
          haltReason = new JobCanceledError(undefined, 'Batch halted after an authentication failure', {
            itemId: item.id,
          });
        }

        if (index < lastIndex && interItemDelayMs > 0 && !signal?.aborted && !haltReason) {
          try {
            await this.sleep(interItemDelayMs, signal);
          } catch (error) {
            if (!(error instanceof JobCanceledError)) {
              throw error;
            }
          }
        }

        return result;
      },
      { concurrency }
    );

    const batch: BatchResult = {
      runId,
      startedAt,
      finishedAt: this.now().toISOString(),
      total: results.length,
      succeeded: results.filter(result => result.status === 'succeeded').length,
      failed: results.filter(result => result.status === 'failed').length,
      canceled: results.filter(result => result.status === 'canceled').length,
      items: results,
    };

    logger.info('[PipelineOrchestrator] Batch finished', {
      service: 'PipelineOrchestrator',
      operation: 'processBatch',
      runId,
      total: batch.total,
      succeeded: batch.succeeded,
      failed: batch.failed,
      canceled: batch.canceled,
    });

    return batch;
  }

  private async processItem(
    runId: string,
    item: WorkItem,
    index: number,
    stages: readonly PipelineStage[],
    signal: AbortSignal | undefined
  ): Promise<ItemResult> {
    const stageResults: StageResult[] = [];
    const artifacts: StageArtifact[] = [];

    logger.info('[PipelineOrchestrator] Processing item', {
      service: 'PipelineOrchestrator',
      operation: 'processItem',
      runId,
      itemId: item.id,
      index,
    });

    for (const stage of stages) {
      if (signal?.aborted) {
        const error = new JobCanceledError(undefined, 'Batch was canceled', { itemId: item.id, stage: stage.name });
        return this.itemResult(item, index, 'canceled', stageResults, error);
      }

      const started = Date.now();
      try {
        const artifact = await stage.execute({ runId, item, index, artifacts, signal });
        artifacts.push(artifact);
        stageResults.push({ stage: stage.name, status: 'succeeded', artifact, durationMs: Date.now() - started });
      } catch (caught) {
        const error = toApplicationError(caught, stage.name, { itemId: item.id });
        stageResults.push({
          stage: stage.name,
          status: 'failed',
          error: serializeError(error),
          durationMs: Date.now() - started,
        });

        if (error.code === ErrorCode.AUTH_AUTHENTICATION_FAILED) {
          logger.error('[PipelineOrchestrator] AUTHENTICATION FAILED: check the service credentials', {
            service: 'PipelineOrchestrator',
            operation: 'processItem',
            runId,
            itemId: item.id,
            stage: stage.name,
            error: error.message,
          });
        } else {
          logger.warn('[PipelineOrchestrator] Stage failed', {
            service: 'PipelineOrchestrator',
            operation: 'processItem',
            runId,
            itemId: item.id,
            stage: stage.name,
            code: error.code,
            jobId: error.context.jobId,
            error: error.message,
          });
        }

        const status = error instanceof JobCanceledError ? 'canceled' : 'failed';
        return this.itemResult(item, index, status, stageResults, error);
      }
    }

    return this.itemResult(item, index, 'succeeded', stageResults);
  }

  private skipped(item: WorkItem, index: number, reason: ApplicationError): ItemResult {
    const error = new JobCanceledError(undefined, reason.message, { itemId: item.id });
    return this.itemResult(item, index, 'canceled', [], error);
  }

  private itemResult(
    item: WorkItem,
    index: number,
    status: ItemResult['status'],
    stages: StageResult[],
    error?: ApplicationError
  ): ItemResult {
    return {
      itemId: item.id,
      index,
      title: item.title,
      status,
      stages,
      ...(error && { error: serializeError(error) }),
    };
  }
}
