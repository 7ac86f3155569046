import dotenv from 'dotenv';
import { AppConfig, DatabaseConfig, ServerConfig } from './types.js';
import { defaultConfig } from './defaults.js';
import { ConfigurationError } from '../errors/ApplicationError.js';

type Env = Record<string, string | undefined>;

/**
 * Typed accessors over an environment map
 */
class EnvReader {
  constructor(private readonly env: Env) {}

  getString(key: string, defaultValue: string): string {
    const value = this.env[key];
    return value ? value : defaultValue;
  }

  getOptionalString(key: string, defaultValue?: string): string | undefined {
    const value = this.env[key];
    return value ? value : defaultValue;
  }

  getNumber(key: string, defaultValue: number, min = 0): number {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be an integer >= ${min}, got '${value}'`
      );
    }
    return parsed;
  }

  getBoolean(key: string, defaultValue: boolean): boolean {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    return value.toLowerCase() === 'true' || value === '1';
  }

  getEnum<T extends string>(key: string, defaultValue: T, validValues: readonly T[]): T {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = validValues.find(valid => valid === value);
    if (match === undefined) {
      throw new ConfigurationError(
        key,
        `Environment variable ${key} must be one of: ${validValues.join(', ')}`
      );
    }
    return match;
  }

  getResolution(key: string, defaultValue: [number, number]): [number, number] {
    const value = this.env[key];
    if (!value) {
      return defaultValue;
    }
    const match = /^(\d+)x(\d+)$/.exec(value.trim());
    if (!match) {
      throw new ConfigurationError(key, `Environment variable ${key} must look like WIDTHxHEIGHT`);
    }
    return [Number(match[1]), Number(match[2])];
  }
}

/**
 * Build the application config from defaults overlaid with environment variables
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const config: AppConfig = structuredClone(defaultConfig);
  const read = new EnvReader(env);

  // Server configuration
  config.server.port = read.getNumber('PORT', config.server.port);
  config.server.host = read.getString('HOST', config.server.host);
  config.server.env = read.getEnum('NODE_ENV', config.server.env, [
    'development',
    'production',
    'test',
  ]);

  // Database and job record store
  config.database.filename = read.getString('DB_FILE', config.database.filename);
  config.jobStore.backend = read.getEnum('JOB_STORE', config.jobStore.backend, ['sqlite', 'file']);
  config.jobStore.directory = read.getString('JOB_STORE_DIR', config.jobStore.directory);

  // Rendering service
  config.render.baseUrl = read.getString('RENDER_BASE_URL', config.render.baseUrl);
  config.render.apiKey = read.getOptionalString('RENDER_API_KEY');
  config.render.model = read.getString('RENDER_MODEL', config.render.model);
  config.render.avatarVideoUrl = read.getOptionalString('RENDER_AVATAR_VIDEO_URL');
  config.render.timeoutMs = read.getNumber('RENDER_TIMEOUT_MS', config.render.timeoutMs, 1);
  config.render.options.outputResolution = read.getResolution(
    'RENDER_RESOLUTION',
    config.render.options.outputResolution
  );
  config.render.options.syncMode = read.getEnum('RENDER_SYNC_MODE', config.render.options.syncMode, [
    'bounce',
    'loop',
    'cut_off',
    'silence',
    'remap',
  ]);

  // Polling
  config.polling.intervalMs = read.getNumber('POLL_INTERVAL_MS', config.polling.intervalMs);
  config.polling.maxAttempts = read.getNumber('POLL_MAX_ATTEMPTS', config.polling.maxAttempts, 1);
  config.polling.perCallTimeoutMs = read.getNumber(
    'POLL_PER_CALL_TIMEOUT_MS',
    config.polling.perCallTimeoutMs,
    1
  );
  config.polling.transientRetries = read.getNumber('POLL_TRANSIENT_RETRIES', config.polling.transientRetries);

  // Pipeline
  config.pipeline.interItemDelayMs = read.getNumber(
    'PIPELINE_INTER_ITEM_DELAY_MS',
    config.pipeline.interItemDelayMs
  );
  config.pipeline.concurrency = read.getNumber('PIPELINE_CONCURRENCY', config.pipeline.concurrency, 1);
  config.pipeline.haltOnAuthError = read.getBoolean(
    'PIPELINE_HALT_ON_AUTH_ERROR',
    config.pipeline.haltOnAuthError
  );
  config.pipeline.resultsDir = read.getString('PIPELINE_RESULTS_DIR', config.pipeline.resultsDir);

  // Speech and script
  config.speech.baseUrl = read.getOptionalString('SPEECH_BASE_URL');
  config.speech.apiKey = read.getOptionalString('SPEECH_API_KEY');
  config.speech.voice = read.getOptionalString('SPEECH_VOICE');
  config.speech.timeoutMs = read.getNumber('SPEECH_TIMEOUT_MS', config.speech.timeoutMs, 1);
  config.script.maxExcerptChars = read.getNumber('SCRIPT_MAX_EXCERPT_CHARS', config.script.maxExcerptChars, 1);

  // Artifact storage
  config.storage.backend = read.getEnum('STORAGE_BACKEND', config.storage.backend, ['s3', 'local']);
  config.storage.keyPrefix = read.getString('STORAGE_KEY_PREFIX', config.storage.keyPrefix);
  config.storage.local.directory = read.getString('STORAGE_LOCAL_DIR', config.storage.local.directory);
  config.storage.local.publicBaseUrl = read.getOptionalString('STORAGE_PUBLIC_BASE_URL');
  config.storage.s3.bucket = read.getOptionalString('S3_BUCKET');
  config.storage.s3.region = read.getString('S3_REGION', read.getString('AWS_REGION', config.storage.s3.region));
  config.storage.s3.publicBaseUrl = read.getOptionalString('S3_PUBLIC_BASE_URL');

  // Logging configuration
  config.logging.level = read.getEnum('LOG_LEVEL', config.logging.level, [
    'error',
    'warn',
    'info',
    'debug',
  ]);
  config.logging.file.enabled = read.getBoolean('LOG_FILE_ENABLED', config.logging.file.enabled);
  config.logging.file.path = read.getString('LOG_FILE_PATH', config.logging.file.path);
  config.logging.console.enabled = read.getBoolean('LOG_CONSOLE_ENABLED', config.logging.console.enabled);

  return config;
}

/**
 * Checks that only matter once the pipeline actually talks to remote services
 */
export function validateConfig(config: AppConfig): string[] {
  const errors: string[] = [];

  if (!config.render.apiKey) {
    errors.push('RENDER_API_KEY is required to submit render jobs');
  }
  if (!config.render.avatarVideoUrl) {
    errors.push('RENDER_AVATAR_VIDEO_URL is required for the video stage');
  }
  if (!config.speech.baseUrl) {
    errors.push('SPEECH_BASE_URL is required for the audio stage');
  }
  if (config.storage.backend === 's3' && !config.storage.s3.bucket) {
    errors.push('S3_BUCKET is required when STORAGE_BACKEND=s3');
  }

  return errors;
}

export class ConfigManager {
  private static instance: ConfigManager | undefined;
  private config: AppConfig;

  private constructor() {
    dotenv.config();
    this.config = loadConfig(process.env);
  }

  static getInstance(): ConfigManager {
    if (!ConfigManager.instance) {
      ConfigManager.instance = new ConfigManager();
    }
    return ConfigManager.instance;
  }

  getConfig(): AppConfig {
    return this.config;
  }

  getServerConfig(): ServerConfig {
    return this.config.server;
  }

  getDatabaseConfig(): DatabaseConfig {
    return this.config.database;
  }

  reload(): void {
    dotenv.config();
    this.config = loadConfig(process.env);
  }

  /**
   * Throws when settings required for rendering are missing
   */
  validate(): void {
    const errors = validateConfig(this.config);
    if (errors.length > 0) {
      throw new ConfigurationError(
        'render',
        `Configuration validation failed:\n${errors.join('\n')}`
      );
    }
  }
}
