import { BatchRunService } from '../../src/services/BatchRunService.js';
import { PipelineOrchestrator } from '../../src/services/pipeline/PipelineOrchestrator.js';
import { PipelineStage, ScriptArtifact, WorkItem } from '../../src/services/pipeline/types.js';
import { PipelineConfig } from '../../src/config/types.js';
import { JobCanceledError } from '../../src/errors/index.js';
import { FnStage, recordingSleep } from '../utils/fakes.js';

const defaults: PipelineConfig = { interItemDelayMs: 0, concurrency: 1, haltOnAuthError: false, resultsDir: '.' };

const items: WorkItem[] = [
  { id: 'item-1', title: 'Rates rise', text: 'The central bank lifted rates.' },
  { id: 'item-2', title: 'Storm warning', text: 'Heavy rain expected.' },
];

const scriptStage = new FnStage<ScriptArtifact>('script', async ({ item }) => ({ kind: 'script', text: item.text }));

/** Never finishes on its own; rejects once the batch is canceled */
const blockingStage = new FnStage<ScriptArtifact>(
  'script',
  ({ signal }) =>
    new Promise<ScriptArtifact>((_resolve, reject) => {
      const abort = (): void => reject(new JobCanceledError(undefined, 'Stage canceled'));
      if (signal?.aborted) {
        abort();
        return;
      }
      signal?.addEventListener('abort', abort, { once: true });
    })
);

describe('BatchRunService', () => {
  let waits: number[];

  function createService(
    stages: PipelineStage[],
    pipelineDefaults: PipelineConfig = defaults,
    maxFinishedRuns?: number
  ): BatchRunService {
    const recorder = recordingSleep();
    waits = recorder.waits;
    let runs = 0;
    return new BatchRunService(
      new PipelineOrchestrator({ sleep: recorder.sleep }),
      stages,
      pipelineDefaults,
      { newRunId: () => `run-${++runs}`, ...(maxFinishedRuns !== undefined && { maxFinishedRuns }) }
    );
  }

  it('should run a batch in the background and keep its result', async () => {
    const service = createService([scriptStage]);

    const started = service.start(items);

    expect(started).toMatchObject({ runId: 'run-1', state: 'running', itemCount: 2, cancelRequested: false });
    expect(started.result).toBeUndefined();

    const finished = await service.waitFor('run-1');

    expect(finished?.state).toBe('finished');
    expect(finished?.result).toMatchObject({ runId: 'run-1', total: 2, succeeded: 2 });
    expect(service.get('run-1')?.state).toBe('finished');
  });

  it('should apply per-run options over the configured defaults', async () => {
    const service = createService([scriptStage], { ...defaults, interItemDelayMs: 10000 });

    service.start(items, { interItemDelayMs: 500 });
    await service.waitFor('run-1');

    expect(waits).toEqual([500]);
  });

  it('should use the configured inter-item delay by default', async () => {
    const service = createService([scriptStage], { ...defaults, interItemDelayMs: 10000 });

    service.start(items);
    await service.waitFor('run-1');

    expect(waits).toEqual([10000]);
  });

  it('should cancel a running batch', async () => {
    const service = createService([blockingStage]);
    service.start(items);

    const canceled = service.cancel('run-1');

    expect(canceled).toMatchObject({ state: 'running', cancelRequested: true });

    const finished = await service.waitFor('run-1');
    expect(finished?.state).toBe('finished');
    expect(finished?.result).toMatchObject({ succeeded: 0, canceled: 2 });
  });

  it('should record infrastructure failures as a failed run', async () => {
    const service = createService([]);

    service.start(items);
    const finished = await service.waitFor('run-1');

    expect(finished?.state).toBe('failed');
    expect(finished?.error).toMatchObject({ name: 'ConfigurationError', code: 'CONFIG_INVALID' });
    expect(finished?.result).toBeUndefined();
  });

  it('should list runs and answer undefined for unknown ids', async () => {
    const service = createService([scriptStage]);
    service.start(items);
    service.start(items.slice(0, 1));

    expect(service.list().map(run => [run.runId, run.itemCount])).toEqual([
      ['run-1', 2],
      ['run-2', 1],
    ]);
    expect(service.get('missing')).toBeUndefined();
    expect(service.cancel('missing')).toBeUndefined();
    await expect(service.waitFor('missing')).resolves.toBeUndefined();

    await service.shutdown();
  });

  it('should cancel every running batch on shutdown', async () => {
    const service = createService([blockingStage]);
    service.start(items);
    service.start(items);

    await service.shutdown();

    expect(service.list().map(run => [run.state, run.cancelRequested])).toEqual([
      ['finished', true],
      ['finished', true],
    ]);
  });

  it('should keep only the newest finished runs', async () => {
    const holdStage = new FnStage<ScriptArtifact>('script', context =>
      context.item.id === 'hold' ? blockingStage.execute(context) : scriptStage.execute(context)
    );
    const service = createService([holdStage], defaults, 2);

    service.start([{ id: 'hold', title: 'Held', text: 'Waits for cancellation.' }]);
    for (let n = 0; n < 3; n++) {
      const { runId } = service.start(items.slice(0, 1));
      await service.waitFor(runId);
    }

    expect(service.list().map(run => [run.runId, run.state])).toEqual([
      ['run-1', 'running'],
      ['run-3', 'finished'],
      ['run-4', 'finished'],
    ]);
    expect(service.get('run-2')).toBeUndefined();

    await service.shutdown();
  });
});
