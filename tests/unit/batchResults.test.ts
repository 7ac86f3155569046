import fs from 'fs/promises';
import path from 'path';
import {
  batchResultsFileName,
  summarizeBatch,
  writeBatchResults,
} from '../../src/services/pipeline/batchResults.js';
import { BatchResult } from '../../src/services/pipeline/types.js';
import { createTempDir } from '../utils/testDatabase.js';
import { makeJob } from '../utils/fakes.js';

const result: BatchResult = {
  runId: 'run-1',
  startedAt: '2026-10-18T09:00:00.000Z',
  finishedAt: '2026-10-18T09:05:00.000Z',
  total: 3,
  succeeded: 1,
  failed: 1,
  canceled: 1,
  items: [
    {
      itemId: 'item-1',
      index: 0,
      title: 'Rates rise',
      status: 'succeeded',
      stages: [
        { stage: 'script', status: 'succeeded', artifact: { kind: 'script', text: 'Rates rise.' }, durationMs: 1 },
        {
          stage: 'video',
          status: 'succeeded',
          artifact: {
            kind: 'video',
            url: 'https://cdn.test/video/1.mp4',
            remoteUrl: 'https://render.test/out/1.mp4',
            rehosted: true,
            job: makeJob({ id: 'render-1', status: 'COMPLETED' }),
          },
          durationMs: 5,
        },
      ],
    },
    {
      itemId: 'item-2',
      index: 1,
      title: 'Storm warning',
      status: 'failed',
      stages: [],
      error: {
        name: 'RemoteJobFailure',
        code: 'JOB_REMOTE_FAILED',
        message: 'Remote job render-2 ended with status FAILED',
        retryable: false,
        stage: 'video',
      },
    },
    {
      itemId: 'item-3',
      index: 2,
      title: 'Election night',
      status: 'canceled',
      stages: [],
    },
  ],
};

describe('batchResultsFileName', () => {
  it('should stamp the local date and time', () => {
    expect(batchResultsFileName(new Date(2026, 9, 18, 7, 5, 9))).toBe('batch_results_20261018_070509.json');
  });
});

describe('summarizeBatch', () => {
  it('should print one line per item', () => {
    expect(summarizeBatch(result)).toEqual([
      'Batch run-1: 1/3 succeeded, 1 failed, 1 canceled',
      '  [SUCCEEDED] Rates rise - https://cdn.test/video/1.mp4',
      '  [FAILED] Storm warning - video: Remote job render-2 ended with status FAILED',
      '  [CANCELED] Election night - pipeline: canceled',
    ]);
  });
});

describe('writeBatchResults', () => {
  let directory: string;

  beforeEach(async () => {
    directory = await createTempDir();
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('should write the result as JSON, creating directories', async () => {
    const target = path.join(directory, 'nested', 'results.json');

    const written = await writeBatchResults(result, target);

    expect(written).toBe(path.resolve(target));
    expect(JSON.parse(await fs.readFile(target, 'utf8'))).toEqual(result);
  });
});
