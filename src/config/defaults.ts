import { AppConfig } from './types.js';

export const defaultConfig: AppConfig = {
  server: {
    port: 3000,
    host: '0.0.0.0',
    env: 'development',
  },
  database: {
    type: 'sqlite3',
    filename: './data/anchorcast.sqlite',
  },
  jobStore: {
    backend: 'sqlite',
    directory: './data/jobs',
  },
  render: {
    baseUrl: 'https://api.sync.so/v2',
    model: 'lipsync-1.9.0-beta',
    timeoutMs: 30000,
    options: {
      outputFormat: 'mp4',
      syncMode: 'bounce',
      fps: 25,
      outputResolution: [480, 854], // portrait
      activeSpeaker: true,
    },
  },
  polling: {
    intervalMs: 10000,
    maxAttempts: 30, // 5 minutes at the default interval
    perCallTimeoutMs: 15000,
    transientRetries: 3,
    transientBackoffMs: 1000,
  },
  pipeline: {
    interItemDelayMs: 10000,
    concurrency: 1,
    haltOnAuthError: false,
    resultsDir: '.',
  },
  speech: {
    timeoutMs: 60000,
  },
  script: {
    maxExcerptChars: 500,
  },
  storage: {
    backend: 'local',
    keyPrefix: 'anchorcast',
    local: {
      directory: './data/artifacts',
    },
    s3: {
      region: 'us-east-1',
    },
  },
  logging: {
    level: 'info',
    file: {
      enabled: false,
      path: './logs',
      maxSize: 10,
      maxFiles: 5,
    },
    console: {
      enabled: true,
      colorize: true,
    },
  },
};
