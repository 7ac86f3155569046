import axios, { AxiosInstance } from 'axios';
import { randomUUID } from 'crypto';
import { Readable } from 'stream';
import { logger } from '../../middleware/logging.js';
import { ApplicationError, ErrorContext, JobCanceledError, RehostFailure } from '../../errors/index.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { Job } from '../../types/jobs.js';
import { JobRecordStore } from '../jobStore/types.js';
import { BlobBody, BlobStore, StoredBlob } from './types.js';
import {
  GENERIC_CONTENT_TYPE,
  contentTypeForExtension,
  extensionForContentType,
  extensionOf,
  normalizeContentType,
} from './contentTypes.js';

export interface RehostHint {
  /** Stage that produced the artifact; becomes part of the key */
  stage: string;
  jobId?: string | undefined;
  itemId?: string | undefined;
  /** File name or extension to fall back on when the URL has none */
  fileName?: string | undefined;
}

export interface RehostOutcome {
  job: Job;
  /** Rehosted URL, or the remote URL when rehosting failed */
  url: string;
  rehosted: boolean;
  error?: RehostFailure;
}

export interface ArtifactRehosterOptions {
  keyPrefix: string;
  downloadTimeoutMs?: number;
  http?: AxiosInstance;
  now?: () => Date;
  newId?: () => string;
}

/**
 * Content type from the response header, then from the URL's extension,
 * then from the hint's file name.
 */
export function resolveContentType(
  header: string | undefined,
  remoteUrl: string,
  fileName?: string
): string {
  return (
    normalizeContentType(header) ??
    contentTypeForExtension(extensionOf(remoteUrl)) ??
    contentTypeForExtension(extensionOf(fileName)) ??
    GENERIC_CONTENT_TYPE
  );
}

/**
 * `<prefix>/<stage>/<yyyy>/<mm>/<dd>/<uuid><ext>`
 */
export function buildArtifactKey(prefix: string, stage: string, date: Date, id: string, ext: string): string {
  const yyyy = String(date.getUTCFullYear());
  const mm = String(date.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(date.getUTCDate()).padStart(2, '0');
  const segments = [prefix.replace(/^\/+|\/+$/g, ''), stage, yyyy, mm, dd, `${id}${ext}`];
  return segments.filter(Boolean).join('/');
}

/**
 * Copies finished artifacts from the rendering service's short-lived URLs
 * into durable storage.
 */
export class ArtifactRehoster {
  private readonly http: AxiosInstance;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(private readonly blobStore: BlobStore, private readonly options: ArtifactRehosterOptions) {
    this.http = options.http ?? axios.create();
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  /**
   * Stream a remote artifact into the blob store.
   * @throws RehostFailure when the download or upload fails, JobCanceledError when aborted
   */
  async rehost(remoteUrl: string, hint: RehostHint, signal?: AbortSignal): Promise<StoredBlob> {
    const context: ErrorContext = {
      service: 'ArtifactRehoster',
      operation: 'rehost',
      stage: hint.stage,
      ...(hint.jobId !== undefined && { jobId: hint.jobId }),
      ...(hint.itemId !== undefined && { itemId: hint.itemId }),
    };
    const started = Date.now();

    let body: Readable;
    let header: string | undefined;
    try {
      const response = await this.http.get<unknown>(remoteUrl, {
        responseType: 'stream',
        ...(this.options.downloadTimeoutMs !== undefined && { timeout: this.options.downloadTimeoutMs }),
        ...(signal && { signal }),
      });
      body = toReadable(response.data);
      const contentType: unknown = response.headers['content-type'];
      header = typeof contentType === 'string' ? contentType : undefined;
    } catch (error) {
      if (signal?.aborted) {
        throw new JobCanceledError(hint.jobId, 'Rehost was canceled', context);
      }
      throw new RehostFailure(
        remoteUrl,
        `Failed to download artifact: ${getErrorMessage(error)}`,
        context,
        error instanceof Error ? error : undefined
      );
    }

    const contentType = resolveContentType(header, remoteUrl, hint.fileName);
    const ext =
      extensionOf(remoteUrl) ?? extensionForContentType(contentType) ?? extensionOf(hint.fileName) ?? '';
    const key = buildArtifactKey(this.options.keyPrefix, hint.stage, this.now(), this.newId(), ext);

    let stored: StoredBlob;
    try {
      stored = await this.blobStore.upload(body, key, contentType);
    } catch (error) {
      body.destroy();
      throw new RehostFailure(
        remoteUrl,
        `Failed to upload artifact to ${this.blobStore.name}: ${getErrorMessage(error)}`,
        context,
        error instanceof Error ? error : undefined
      );
    }

    logger.info('[ArtifactRehoster] Artifact rehosted', {
      ...context,
      remoteUrl,
      key: stored.key,
      url: stored.url,
      contentType,
      durationMs: Date.now() - started,
    });

    return stored;
  }

  /**
   * Store bytes produced locally (e.g. synthesized audio) under a fresh key
   */
  async store(body: BlobBody, hint: RehostHint, contentType: string): Promise<StoredBlob> {
    const ext = extensionForContentType(normalizeContentType(contentType)) ?? extensionOf(hint.fileName) ?? '';
    const key = buildArtifactKey(this.options.keyPrefix, hint.stage, this.now(), this.newId(), ext);
    return this.blobStore.upload(body, key, contentType);
  }

  /**
   * Rehost a completed job's output and record the new URL. A failed rehost is
   * not an error for the job: the outcome falls back to the remote URL.
   * Store failures propagate.
   */
  async rehostJob(
    job: Job,
    jobStore: JobRecordStore,
    hint: Omit<RehostHint, 'jobId'>,
    signal?: AbortSignal
  ): Promise<RehostOutcome> {
    if (job.rehostedUrl) {
      return { job, url: job.rehostedUrl, rehosted: true };
    }

    const remoteUrl = job.remoteOutputUrl;
    if (!remoteUrl) {
      const error = new RehostFailure('', `Job ${job.id} has no output to rehost`, {
        service: 'ArtifactRehoster',
        operation: 'rehostJob',
        jobId: job.id,
        stage: hint.stage,
      });
      return { job, url: '', rehosted: false, error };
    }

    try {
      const stored = await this.rehost(remoteUrl, { ...hint, jobId: job.id }, signal);
      const updated = await jobStore.update(job.id, current => ({ ...current, rehostedUrl: stored.url }));
      return { job: updated, url: stored.url, rehosted: true };
    } catch (error) {
      if (error instanceof RehostFailure) {
        logger.warn('[ArtifactRehoster] Rehost failed, keeping remote URL', {
          service: 'ArtifactRehoster',
          operation: 'rehostJob',
          jobId: job.id,
          remoteUrl,
          error: error.message,
        });
        return { job, url: remoteUrl, rehosted: false, error };
      }
      if (error instanceof ApplicationError) {
        error.context.jobId ??= job.id;
      }
      throw error;
    }
  }
}

function toReadable(data: unknown): Readable {
  if (data instanceof Readable) {
    return data;
  }
  if (Buffer.isBuffer(data) || typeof data === 'string') {
    return Readable.from([data]);
  }
  if (data instanceof ArrayBuffer) {
    return Readable.from([Buffer.from(data)]);
  }
  throw new Error('Download returned no body');
}
