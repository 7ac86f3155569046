import express from 'express';
import request from 'supertest';
import { createExpressApp } from '../../src/app.js';
import { JobPoller } from '../../src/services/polling/JobPoller.js';
import { BatchRunService } from '../../src/services/BatchRunService.js';
import { PipelineOrchestrator } from '../../src/services/pipeline/PipelineOrchestrator.js';
import { ScriptArtifact } from '../../src/services/pipeline/types.js';
import { defaultConfig } from '../../src/config/defaults.js';
import { AuthenticationError } from '../../src/errors/index.js';
import { TestJobStore, createSqliteJobStore } from '../utils/testDatabase.js';
import { FakeRenderApi, FnStage, makeJob, recordingSleep, statusStep } from '../utils/fakes.js';

describe('Job API', () => {
  let testStore: TestJobStore;
  let api: FakeRenderApi;
  let app: express.Application;

  beforeEach(async () => {
    testStore = await createSqliteJobStore();
    api = new FakeRenderApi();
    const { sleep } = recordingSleep();
    const poller = new JobPoller(api, testStore.store, { sleep, now: () => new Date('2026-10-18T09:01:00.000Z') });
    const batches = new BatchRunService(
      new PipelineOrchestrator({ sleep }),
      [new FnStage<ScriptArtifact>('script', async ({ item }) => ({ kind: 'script', text: item.text }))],
      defaultConfig.pipeline
    );
    app = createExpressApp({ store: testStore.store, poller, batches, isDatabaseConnected: () => true });
  });

  afterEach(async () => {
    await testStore.destroy();
  });

  describe('GET /api/health', () => {
    it('should report the service as healthy', async () => {
      const response = await request(app).get('/api/health');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ status: 'healthy', database: 'connected' });
    });
  });

  describe('GET /api/jobs', () => {
    beforeEach(async () => {
      await testStore.store.save(makeJob({ id: 'old', status: 'COMPLETED', createdAt: '2026-10-18T08:00:00.000Z' }));
      await testStore.store.save(makeJob({ id: 'new', status: 'PROCESSING', createdAt: '2026-10-18T10:00:00.000Z' }));
    });

    it('should list jobs newest first', async () => {
      const response = await request(app).get('/api/jobs');

      expect(response.status).toBe(200);
      expect(response.body.count).toBe(2);
      expect(response.body.jobs.map((job: { id: string }) => job.id)).toEqual(['new', 'old']);
    });

    it('should filter by status and limit', async () => {
      const byStatus = await request(app).get('/api/jobs?status=COMPLETED');
      const limited = await request(app).get('/api/jobs?limit=1');

      expect(byStatus.body.jobs.map((job: { id: string }) => job.id)).toEqual(['old']);
      expect(limited.body.count).toBe(1);
    });

    it('should reject a zero limit', async () => {
      const response = await request(app).get('/api/jobs?limit=0');

      expect(response.status).toBe(400);
      expect(response.body.error.details).toEqual([{ field: 'query.limit', message: 'limit must be a positive integer' }]);
    });

    it('should reject unknown statuses', async () => {
      const response = await request(app).get('/api/jobs?status=DONE');

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe('VALIDATION_INPUT_INVALID');
      expect(response.body.error.details.map((detail: { field: string }) => detail.field)).toEqual(['query.status']);
    });
  });

  describe('GET /api/jobs/:id', () => {
    it('should return the stored job', async () => {
      const job = await testStore.store.save(
        makeJob({ id: 'abc123', status: 'COMPLETED', remoteOutputUrl: 'https://render.test/out/abc123.mp4' })
      );

      const response = await request(app).get('/api/jobs/abc123');

      expect(response.status).toBe(200);
      expect(response.body).toEqual(job);
    });

    it('should answer 404 for unknown jobs', async () => {
      const response = await request(app).get('/api/jobs/missing');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        error: { message: 'Job not found: missing', status: 404, code: 'RESOURCE_NOT_FOUND' },
      });
    });

    it('should reject malformed ids', async () => {
      const response = await request(app).get('/api/jobs/bad.id');

      expect(response.status).toBe(400);
      expect(response.body.error.details).toEqual([{ field: 'params.id', message: 'Invalid job id' }]);
    });
  });

  describe('POST /api/jobs/:id/refresh', () => {
    it('should check the job once and return the stored result', async () => {
      await testStore.store.save(makeJob({ id: 'abc123', status: 'PROCESSING', attempts: 4 }));
      api.script('abc123', [statusStep('abc123', 'COMPLETED', { outputUrl: 'https://render.test/out/abc123.mp4' })]);

      const response = await request(app).post('/api/jobs/abc123/refresh');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        id: 'abc123',
        status: 'COMPLETED',
        attempts: 5,
        remoteOutputUrl: 'https://render.test/out/abc123.mp4',
        lastCheckedAt: '2026-10-18T09:01:00.000Z',
      });
      expect((await testStore.store.load('abc123')).status).toBe('COMPLETED');
    });

    it('should return local audio jobs as stored', async () => {
      const audio = await testStore.store.save(
        makeJob({ id: 'audio-1', kind: 'AudioRender', status: 'COMPLETED', rehostedUrl: 'https://cdn.test/audio/1.mp3' })
      );

      const response = await request(app).post('/api/jobs/audio-1/refresh');

      expect(response.status).toBe(200);
      expect(response.body).toEqual(audio);
      expect(api.statusCalls).toEqual([]);
    });

    it('should surface rendering service errors', async () => {
      await testStore.store.save(makeJob({ id: 'abc123' }));
      api.script('abc123', [new AuthenticationError('Render service authentication failed (401): invalid key')]);

      const response = await request(app).post('/api/jobs/abc123/refresh');

      expect(response.status).toBe(401);
      expect(response.body.error).toMatchObject({
        code: 'AUTH_AUTHENTICATION_FAILED',
        message: 'Render service authentication failed (401): invalid key',
      });
    });
  });

  it('should answer 404 for unknown routes', async () => {
    const response = await request(app).get('/api/nowhere');

    expect(response.status).toBe(404);
    expect(response.body.error.message).toBe('Route GET /api/nowhere not found');
  });
});
