import { loadConfig, validateConfig } from '../../src/config/ConfigManager.js';
import { ConfigurationError } from '../../src/errors/index.js';

const renderReady = {
  RENDER_API_KEY: 'test-secret',
  RENDER_AVATAR_VIDEO_URL: 'https://cdn.test/avatar.mp4',
  SPEECH_BASE_URL: 'https://speech.test/tts',
};

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.server.port).toBe(3000);
    expect(config.jobStore.backend).toBe('sqlite');
    expect(config.polling.intervalMs).toBe(10000);
    expect(config.polling.maxAttempts).toBe(30);
    expect(config.pipeline.interItemDelayMs).toBe(10000);
    expect(config.render.apiKey).toBeUndefined();
    expect(config.render.options.outputResolution).toEqual([480, 854]);
  });

  it('should read overrides from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      JOB_STORE: 'file',
      JOB_STORE_DIR: '/tmp/jobs',
      RENDER_API_KEY: 'test-secret',
      RENDER_RESOLUTION: '720x1280',
      RENDER_SYNC_MODE: 'loop',
      POLL_INTERVAL_MS: '2500',
      POLL_MAX_ATTEMPTS: '12',
      PIPELINE_CONCURRENCY: '2',
      PIPELINE_HALT_ON_AUTH_ERROR: 'true',
      STORAGE_BACKEND: 's3',
      S3_BUCKET: 'anchorcast-media',
      AWS_REGION: 'eu-west-1',
      LOG_LEVEL: 'debug',
    });

    expect(config.server.port).toBe(8080);
    expect(config.jobStore).toEqual({ backend: 'file', directory: '/tmp/jobs' });
    expect(config.render.apiKey).toBe('test-secret');
    expect(config.render.options.outputResolution).toEqual([720, 1280]);
    expect(config.render.options.syncMode).toBe('loop');
    expect(config.polling.intervalMs).toBe(2500);
    expect(config.polling.maxAttempts).toBe(12);
    expect(config.pipeline.concurrency).toBe(2);
    expect(config.pipeline.haltOnAuthError).toBe(true);
    expect(config.storage.backend).toBe('s3');
    expect(config.storage.s3).toEqual({ bucket: 'anchorcast-media', region: 'eu-west-1', publicBaseUrl: undefined });
    expect(config.logging.level).toBe('debug');
  });

  it('should prefer S3_REGION over AWS_REGION', () => {
    expect(loadConfig({ S3_REGION: 'ap-southeast-2', AWS_REGION: 'eu-west-1' }).storage.s3.region).toBe('ap-southeast-2');
  });

  it('should not leak overrides into later loads', () => {
    loadConfig({ PORT: '1234', RENDER_RESOLUTION: '100x100' });
    const config = loadConfig({});

    expect(config.server.port).toBe(3000);
    expect(config.render.options.outputResolution).toEqual([480, 854]);
  });

  it.each([
    ['PORT', 'abc'],
    ['POLL_MAX_ATTEMPTS', '0'],
    ['PIPELINE_CONCURRENCY', '1.5'],
    ['JOB_STORE', 'redis'],
    ['RENDER_RESOLUTION', '720'],
    ['LOG_LEVEL', 'verbose'],
  ])('should reject %s=%s', (key, value) => {
    expect(() => loadConfig({ [key]: value })).toThrow(ConfigurationError);
  });
});

describe('validateConfig', () => {
  it('should list what the pipeline still needs', () => {
    expect(validateConfig(loadConfig({}))).toEqual([
      'RENDER_API_KEY is required to submit render jobs',
      'RENDER_AVATAR_VIDEO_URL is required for the video stage',
      'SPEECH_BASE_URL is required for the audio stage',
    ]);
  });

  it('should pass a complete configuration', () => {
    expect(validateConfig(loadConfig(renderReady))).toEqual([]);
  });

  it('should require a bucket for S3 storage', () => {
    expect(validateConfig(loadConfig({ ...renderReady, STORAGE_BACKEND: 's3' }))).toEqual([
      'S3_BUCKET is required when STORAGE_BACKEND=s3',
    ]);
  });
});
