import { S3Client } from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { logger } from '../../middleware/logging.js';
import { ConfigurationError, ErrorCode, FileSystemError } from '../../errors/index.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { BlobBody, BlobStore, StoredBlob } from './types.js';

export interface S3BlobStoreOptions {
  bucket: string;
  region: string;
  /** CDN or custom domain in front of the bucket */
  publicBaseUrl?: string | undefined;
}

/**
 * Extract a region code from values like "Asia Pacific (Sydney) ap-southeast-2"
 */
export function sanitizeRegion(input: string | undefined): string {
  const raw = (input ?? '').trim();
  if (!raw) {
    return 'us-east-1';
  }
  const match = raw.match(/([a-z]{2}-[a-z0-9-]+-\d)/i);
  return (match?.[1] ?? raw).toLowerCase();
}

export function publicObjectUrl(options: S3BlobStoreOptions, key: string): string {
  const base = (options.publicBaseUrl ?? '').replace(/\/+$/, '');
  return base
    ? `${base}/${key}`
    : `https://${options.bucket}.s3.${sanitizeRegion(options.region)}.amazonaws.com/${key}`;
}

/**
 * Uploads artifacts to S3. Bodies are streamed through a multipart upload so
 * large videos never sit in memory.
 */
export class S3BlobStore implements BlobStore {
  readonly name = 's3';
  private readonly client: S3Client;

  constructor(private readonly options: S3BlobStoreOptions, client?: S3Client) {
    if (!options.bucket) {
      throw new ConfigurationError('S3_BUCKET', 'S3 storage requires a bucket name');
    }
    this.client = client ?? new S3Client({ region: sanitizeRegion(options.region) });
  }

  async upload(body: BlobBody, key: string, contentType: string): Promise<StoredBlob> {
    const started = Date.now();

    try {
      const upload = new Upload({
        client: this.client,
        params: {
          Bucket: this.options.bucket,
          Key: key,
          Body: body,
          ContentType: contentType,
        },
      });
      await upload.done();
    } catch (error) {
      throw new FileSystemError(
        `S3 upload to s3://${this.options.bucket}/${key} failed: ${getErrorMessage(error)}`,
        ErrorCode.FS_WRITE_FAILED,
        key,
        true,
        { service: 'S3BlobStore', operation: 'upload' },
        error instanceof Error ? error : undefined
      );
    }

    const url = publicObjectUrl(this.options, key);

    logger.info('[S3BlobStore] Object uploaded', {
      service: 'S3BlobStore',
      operation: 'upload',
      bucket: this.options.bucket,
      key,
      contentType,
      durationMs: Date.now() - started,
    });

    return { key, url, contentType };
  }
}
