import fs from 'fs/promises';
import path from 'path';
import { FileSystemError, JobNotFoundError } from '../../src/errors/index.js';
import { JobRecordStore } from '../../src/services/jobStore/types.js';
import { Job } from '../../src/types/jobs.js';
import { jobToRecord } from '../../src/services/jobStore/jobRecord.js';
import { TestJobStore, createFileJobStore, createSqliteJobStore } from '../utils/testDatabase.js';
import { makeJob } from '../utils/fakes.js';

const backends: Array<[string, () => Promise<TestJobStore>]> = [
  ['SQLiteJobRecordStore', createSqliteJobStore],
  ['FileJobRecordStore', createFileJobStore],
];

describe.each(backends)('%s', (_name, createStore) => {
  let testStore: TestJobStore;
  let store: JobRecordStore;

  const fullJob: Job = makeJob({
    id: 'abc123',
    status: 'FAILED',
    inputs: [
      { type: 'video', url: 'https://cdn.test/avatar.mp4' },
      { type: 'audio', url: 'https://cdn.test/audio/1.mp3', contentType: 'audio/mpeg' },
    ],
    remoteOutputUrl: 'https://render.test/out/abc123.mp4',
    error: { kind: 'FAILED', message: 'lip sync failed' },
    attempts: 4,
    itemId: 'item-1',
    stage: 'video',
    data: { status: 'FAILED', error: 'lip sync failed' },
    lastCheckedAt: '2026-10-18T09:02:00.000Z',
  });

  beforeEach(async () => {
    testStore = await createStore();
    store = testStore.store;
  });

  afterEach(async () => {
    await testStore.destroy();
  });

  it('should save and load a job with every field', async () => {
    await store.save(fullJob);
    await expect(store.load('abc123')).resolves.toEqual(fullJob);
  });

  it('should throw JobNotFoundError for unknown ids', async () => {
    await expect(store.load('missing')).rejects.toThrow(JobNotFoundError);
    await expect(store.find('missing')).resolves.toBeUndefined();
    await expect(store.update('missing', job => job)).rejects.toThrow(JobNotFoundError);
  });

  it('should apply updates through the mutator', async () => {
    await store.save(makeJob({ id: 'abc123' }));

    const updated = await store.update('abc123', job => ({ ...job, status: 'PROCESSING', attempts: job.attempts + 1 }));

    expect(updated.status).toBe('PROCESSING');
    expect(updated.attempts).toBe(1);
    await expect(store.load('abc123')).resolves.toEqual(updated);
  });

  it('should serialize concurrent updates of one job', async () => {
    await store.save(makeJob({ id: 'abc123' }));

    await Promise.all(
      Array.from({ length: 10 }, () => store.update('abc123', job => ({ ...job, attempts: job.attempts + 1 })))
    );

    expect((await store.load('abc123')).attempts).toBe(10);
  });

  it('should keep a terminal status once stored', async () => {
    await store.save(makeJob({ id: 'abc123', status: 'COMPLETED', remoteOutputUrl: 'https://render.test/out.mp4' }));

    const after = await store.update('abc123', job => ({ ...job, status: 'PROCESSING' }));

    expect(after.status).toBe('COMPLETED');
    expect((await store.load('abc123')).status).toBe('COMPLETED');
  });

  it('should never store POLLING_TIMEOUT', async () => {
    await store.save(makeJob({ id: 'abc123', status: 'PROCESSING' }));

    await store.update('abc123', job => ({ ...job, status: 'POLLING_TIMEOUT' }));

    expect((await store.load('abc123')).status).toBe('PROCESSING');
  });

  it('should list newest first and filter', async () => {
    await store.save(makeJob({ id: 'old', status: 'COMPLETED', itemId: 'item-1', createdAt: '2026-10-18T08:00:00.000Z' }));
    await store.save(makeJob({ id: 'mid', status: 'PROCESSING', itemId: 'item-2', createdAt: '2026-10-18T09:00:00.000Z' }));
    await store.save(
      makeJob({ id: 'new', kind: 'AudioRender', status: 'COMPLETED', itemId: 'item-2', createdAt: '2026-10-18T10:00:00.000Z' })
    );

    const ids = (jobs: Job[]): string[] => jobs.map(job => job.id);

    expect(ids(await store.list())).toEqual(['new', 'mid', 'old']);
    expect(ids(await store.list({ status: 'COMPLETED' }))).toEqual(['new', 'old']);
    expect(ids(await store.list({ itemId: 'item-2' }))).toEqual(['new', 'mid']);
    expect(ids(await store.list({ kind: 'VideoRender' }))).toEqual(['mid', 'old']);
    expect(ids(await store.list({ limit: 1 }))).toEqual(['new']);
    expect(ids(await store.list({ limit: 0 }))).toEqual([]);
  });

  it('should insert a missing job once and keep the stored record afterwards', async () => {
    const first = makeJob({ id: 'abc123', itemId: 'item-1' });
    const second = makeJob({ id: 'abc123', itemId: 'item-2' });

    const [a, b] = await Promise.all([store.saveIfAbsent(first), store.saveIfAbsent(second)]);

    expect(a).toEqual({ job: first, created: true });
    expect(b).toEqual({ job: first, created: false });
    await expect(store.load('abc123')).resolves.toEqual(first);
  });

  it('should not reset a job that was checked in the meantime', async () => {
    await store.save(makeJob({ id: 'abc123' }));
    await store.update('abc123', job => ({ ...job, status: 'PROCESSING', attempts: 3 }));

    const { job, created } = await store.saveIfAbsent(makeJob({ id: 'abc123' }));

    expect(created).toBe(false);
    expect(job).toMatchObject({ status: 'PROCESSING', attempts: 3 });
    expect((await store.load('abc123')).attempts).toBe(3);
  });

  it('should be readable from a new store instance', async () => {
    await store.save(fullJob);

    const reopened = await testStore.reopen();

    await expect(reopened.load('abc123')).resolves.toEqual(fullJob);
    await reopened.close();
  });
});

describe('FileJobRecordStore files', () => {
  it('should skip unreadable files when listing', async () => {
    const testStore = await createFileJobStore();
    try {
      await testStore.store.save(makeJob({ id: 'abc123' }));
      await fs.writeFile(path.join(testStore.directory, 'broken.json'), '{ not json', 'utf8');

      const jobs = await testStore.store.list();

      expect(jobs.map(job => job.id)).toEqual(['abc123']);
    } finally {
      await testStore.destroy();
    }
  });

  it('should keep ids from escaping the directory', async () => {
    const testStore = await createFileJobStore();
    try {
      await testStore.store.save(makeJob({ id: '../escape' }));

      expect(await fs.readdir(testStore.directory)).toEqual(['%2E%2E%2Fescape.json']);
      await expect(testStore.store.load('../escape')).resolves.toMatchObject({ id: '../escape' });
    } finally {
      await testStore.destroy();
    }
  });

  it('should give ids that differ only in punctuation their own files', async () => {
    const testStore = await createFileJobStore();
    try {
      await testStore.store.save(
        makeJob({ id: 'job.1', status: 'COMPLETED', remoteOutputUrl: 'https://render.test/a.mp4' })
      );
      const saved = await testStore.store.save(makeJob({ id: 'job_1', status: 'SUBMITTED' }));

      expect(saved).toMatchObject({ id: 'job_1', status: 'SUBMITTED' });
      await expect(testStore.store.load('job_1')).resolves.toMatchObject({ id: 'job_1', status: 'SUBMITTED' });
      await expect(testStore.store.load('job.1')).resolves.toMatchObject({
        id: 'job.1',
        status: 'COMPLETED',
        remoteOutputUrl: 'https://render.test/a.mp4',
      });
      expect((await fs.readdir(testStore.directory)).sort()).toEqual(['job%2E1.json', 'job_1.json']);
    } finally {
      await testStore.destroy();
    }
  });

  it('should refuse a file that holds another job', async () => {
    const testStore = await createFileJobStore();
    try {
      const other = makeJob({ id: 'other', status: 'COMPLETED' });
      const filePath = path.join(testStore.directory, 'abc123.json');
      await fs.writeFile(filePath, JSON.stringify(jobToRecord(other)), 'utf8');

      await expect(testStore.store.load('abc123')).rejects.toThrow(FileSystemError);
      await expect(testStore.store.save(makeJob({ id: 'abc123' }))).rejects.toThrow(
        `Job file ${filePath} holds job other, not abc123`
      );
      expect(JSON.parse(await fs.readFile(filePath, 'utf8'))).toMatchObject({ id: 'other' });
    } finally {
      await testStore.destroy();
    }
  });
});
