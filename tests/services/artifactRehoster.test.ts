import { Readable } from 'stream';
import {
  ArtifactRehoster,
  buildArtifactKey,
  resolveContentType,
} from '../../src/services/storage/ArtifactRehoster.js';
import { extensionOf, normalizeContentType } from '../../src/services/storage/contentTypes.js';
import { ErrorCode, FileSystemError, RehostFailure } from '../../src/errors/index.js';
import { TestJobStore, createSqliteJobStore } from '../utils/testDatabase.js';
import { MemoryBlobStore, StubHandler, createStubHttp, makeJob } from '../utils/fakes.js';

const NOW = new Date('2026-10-18T23:30:00.000Z');

function createRehoster(blobStore: MemoryBlobStore, handler: StubHandler) {
  const stub = createStubHttp(handler);
  const rehoster = new ArtifactRehoster(blobStore, {
    keyPrefix: 'anchorcast',
    downloadTimeoutMs: 4000,
    http: stub.http,
    now: () => NOW,
    newId: () => 'abc',
  });
  return { rehoster, requests: stub.requests };
}

describe('content types', () => {
  it('should normalize headers and ignore generic binary types', () => {
    expect(normalizeContentType('Video/MP4; charset=binary')).toBe('video/mp4');
    expect(normalizeContentType('application/octet-stream')).toBeUndefined();
    expect(normalizeContentType(undefined)).toBeUndefined();
  });

  it('should read extensions from URL paths, ignoring the query', () => {
    expect(extensionOf('https://render.test/out/clip.MP4?sig=x.y')).toBe('.mp4');
    expect(extensionOf('https://render.test/out/clip')).toBeUndefined();
    expect(extensionOf('speech.wav')).toBe('.wav');
  });

  it('should resolve the content type from header, URL, then file name', () => {
    expect(resolveContentType('video/webm', 'https://render.test/clip.mp4')).toBe('video/webm');
    expect(resolveContentType('application/octet-stream', 'https://render.test/clip.mp4')).toBe('video/mp4');
    expect(resolveContentType(undefined, 'https://render.test/clip', 'speech.mp3')).toBe('audio/mpeg');
    expect(resolveContentType(undefined, 'https://render.test/clip')).toBe('application/octet-stream');
  });
});

describe('buildArtifactKey', () => {
  it('should lay keys out by stage and UTC date', () => {
    expect(buildArtifactKey('/anchorcast/', 'video', NOW, 'abc', '.mp4')).toBe('anchorcast/video/2026/10/18/abc.mp4');
  });

  it('should drop an empty prefix', () => {
    expect(buildArtifactKey('', 'audio', new Date('2026-01-05T00:00:00.000Z'), 'abc', '')).toBe('audio/2026/01/05/abc');
  });
});

describe('ArtifactRehoster', () => {
  describe('rehost', () => {
    it('should stream the download into the blob store', async () => {
      const blobStore = new MemoryBlobStore();
      const { rehoster, requests } = createRehoster(blobStore, () => ({
        data: Buffer.from('video-bytes'),
        headers: { 'content-type': 'video/mp4' },
      }));

      const stored = await rehoster.rehost('https://render.test/out/abc123', { stage: 'video', jobId: 'abc123' });

      expect(stored).toEqual({
        key: 'anchorcast/video/2026/10/18/abc.mp4',
        url: 'https://cdn.test/anchorcast/video/2026/10/18/abc.mp4',
        contentType: 'video/mp4',
      });
      expect(blobStore.objects).toEqual([
        { key: 'anchorcast/video/2026/10/18/abc.mp4', contentType: 'video/mp4', bytes: Buffer.from('video-bytes') },
      ]);
      expect(requests[0]?.responseType).toBe('stream');
      expect(requests[0]?.timeout).toBe(4000);
    });

    it('should accept streamed bodies and keep the URL extension', async () => {
      const blobStore = new MemoryBlobStore();
      const { rehoster } = createRehoster(blobStore, () => ({ data: Readable.from([Buffer.from('part-1'), Buffer.from('part-2')]) }));

      const stored = await rehoster.rehost('https://render.test/out/abc123.mov', { stage: 'video' });

      expect(stored.key).toBe('anchorcast/video/2026/10/18/abc.mov');
      expect(stored.contentType).toBe('video/quicktime');
      expect(blobStore.objects[0]?.bytes.toString()).toBe('part-1part-2');
    });

    it('should raise RehostFailure when the download fails', async () => {
      const { rehoster } = createRehoster(new MemoryBlobStore(), () => ({ status: 404, data: 'gone' }));

      const error = await rehoster.rehost('https://render.test/out/abc123.mp4', { stage: 'video' }).catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RehostFailure);
      expect(error).toMatchObject({
        message: 'Failed to download artifact: Request failed with status code 404',
        remoteUrl: 'https://render.test/out/abc123.mp4',
      });
    });

    it('should raise RehostFailure when the upload fails', async () => {
      const blobStore = new MemoryBlobStore(new Error('bucket is read-only'));
      const { rehoster } = createRehoster(blobStore, () => ({ data: Buffer.from('video-bytes') }));

      await expect(rehoster.rehost('https://render.test/out/abc123.mp4', { stage: 'video' })).rejects.toThrow(
        new RehostFailure('https://render.test/out/abc123.mp4', 'Failed to upload artifact to memory: bucket is read-only')
      );
    });
  });

  describe('store', () => {
    it('should name local bytes after their content type', async () => {
      const blobStore = new MemoryBlobStore();
      const { rehoster } = createRehoster(blobStore, () => ({}));

      const stored = await rehoster.store(Buffer.from('mp3-bytes'), { stage: 'audio' }, 'audio/mpeg');

      expect(stored.key).toBe('anchorcast/audio/2026/10/18/abc.mp3');
      expect(blobStore.objects[0]?.bytes.toString()).toBe('mp3-bytes');
    });
  });

  describe('rehostJob', () => {
    let testStore: TestJobStore;

    beforeEach(async () => {
      testStore = await createSqliteJobStore();
    });

    afterEach(async () => {
      await testStore.destroy();
    });

    it('should record the rehosted URL on the job', async () => {
      const job = await testStore.store.save(
        makeJob({ id: 'abc123', status: 'COMPLETED', remoteOutputUrl: 'https://render.test/out/abc123.mp4' })
      );
      const { rehoster } = createRehoster(new MemoryBlobStore(), () => ({ data: Buffer.from('video-bytes') }));

      const outcome = await rehoster.rehostJob(job, testStore.store, { stage: 'video', itemId: 'item-1' });

      expect(outcome.rehosted).toBe(true);
      expect(outcome.url).toBe('https://cdn.test/anchorcast/video/2026/10/18/abc.mp4');
      expect(outcome.job.rehostedUrl).toBe(outcome.url);
      expect((await testStore.store.load('abc123')).rehostedUrl).toBe(outcome.url);
    });

    it('should fall back to the remote URL when rehosting fails', async () => {
      const job = await testStore.store.save(
        makeJob({ id: 'abc123', status: 'COMPLETED', remoteOutputUrl: 'https://render.test/out/abc123.mp4' })
      );
      const blobStore = new MemoryBlobStore(
        new FileSystemError('disk full', ErrorCode.FS_WRITE_FAILED, '/tmp/anchorcast')
      );
      const { rehoster } = createRehoster(blobStore, () => ({ data: Buffer.from('video-bytes') }));

      const outcome = await rehoster.rehostJob(job, testStore.store, { stage: 'video' });

      expect(outcome).toMatchObject({ url: 'https://render.test/out/abc123.mp4', rehosted: false });
      expect(outcome.error).toBeInstanceOf(RehostFailure);
      expect((await testStore.store.load('abc123')).rehostedUrl).toBeUndefined();
    });

    it('should skip jobs that are already rehosted', async () => {
      const { rehoster, requests } = createRehoster(new MemoryBlobStore(), () => ({ data: Buffer.from('x') }));
      const job = makeJob({ id: 'abc123', status: 'COMPLETED', rehostedUrl: 'https://cdn.test/done.mp4' });

      const outcome = await rehoster.rehostJob(job, testStore.store, { stage: 'video' });

      expect(outcome).toEqual({ job, url: 'https://cdn.test/done.mp4', rehosted: true });
      expect(requests).toHaveLength(0);
    });

    it('should report jobs without output', async () => {
      const { rehoster } = createRehoster(new MemoryBlobStore(), () => ({ data: Buffer.from('x') }));
      const job = makeJob({ id: 'abc123', status: 'COMPLETED' });

      const outcome = await rehoster.rehostJob(job, testStore.store, { stage: 'video' });

      expect(outcome.rehosted).toBe(false);
      expect(outcome.url).toBe('');
      expect(outcome.error?.message).toBe('Job abc123 has no output to rehost');
    });
  });
});
