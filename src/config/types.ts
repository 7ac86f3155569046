import type { DatabaseConfig } from '../types/database.js';

export type { DatabaseConfig };

export interface ServerConfig {
  port: number;
  host: string;
  env: 'development' | 'production' | 'test';
}

export interface JobStoreConfig {
  backend: 'sqlite' | 'file';
  /** Directory holding one JSON file per job (file backend) */
  directory: string;
}

export interface RenderOptions {
  outputFormat: 'mp4' | 'mov' | 'webm';
  syncMode: 'bounce' | 'loop' | 'cut_off' | 'silence' | 'remap';
  fps: number;
  outputResolution: [number, number];
  activeSpeaker: boolean;
}

export interface RenderConfig {
  baseUrl: string;
  apiKey?: string | undefined;
  model: string;
  /** Template video of the presenter that the audio is lip-synced onto */
  avatarVideoUrl?: string | undefined;
  timeoutMs: number;
  options: RenderOptions;
}

export interface PollingConfig {
  intervalMs: number;
  maxAttempts: number;
  perCallTimeoutMs: number;
  transientRetries: number;
  transientBackoffMs: number;
}

export interface PipelineConfig {
  interItemDelayMs: number;
  concurrency: number;
  haltOnAuthError: boolean;
  resultsDir: string;
}

export interface SpeechConfig {
  baseUrl?: string | undefined;
  apiKey?: string | undefined;
  voice?: string | undefined;
  timeoutMs: number;
}

export interface ScriptConfig {
  maxExcerptChars: number;
}

export interface StorageConfig {
  backend: 's3' | 'local';
  keyPrefix: string;
  local: {
    directory: string;
    publicBaseUrl?: string | undefined;
  };
  s3: {
    bucket?: string | undefined;
    region: string;
    publicBaseUrl?: string | undefined;
  };
}

export interface LoggingConfig {
  level: 'error' | 'warn' | 'info' | 'debug';
  file: {
    enabled: boolean;
    path: string;
    maxSize: number;
    maxFiles: number;
  };
  console: {
    enabled: boolean;
    colorize: boolean;
  };
}

export interface AppConfig {
  server: ServerConfig;
  database: DatabaseConfig;
  jobStore: JobStoreConfig;
  render: RenderConfig;
  polling: PollingConfig;
  pipeline: PipelineConfig;
  speech: SpeechConfig;
  script: ScriptConfig;
  storage: StorageConfig;
  logging: LoggingConfig;
}
