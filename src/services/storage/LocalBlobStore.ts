import fs from 'fs/promises';
import { createWriteStream } from 'fs';
import path from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { pathToFileURL } from 'url';
import { logger } from '../../middleware/logging.js';
import { ErrorCode, FileSystemError, ValidationError } from '../../errors/index.js';
import { getErrorMessage } from '../../utils/errorHandling.js';
import { BlobBody, BlobStore, StoredBlob } from './types.js';

export interface LocalBlobStoreOptions {
  directory: string;
  /** Base URL the directory is served under; without it URLs are file:// */
  publicBaseUrl?: string | undefined;
}

/**
 * Stores artifacts under a local directory, mirroring the object key as a path
 */
export class LocalBlobStore implements BlobStore {
  readonly name = 'local';
  private readonly root: string;

  constructor(private readonly options: LocalBlobStoreOptions) {
    this.root = path.resolve(options.directory);
  }

  async upload(body: BlobBody, key: string, contentType: string): Promise<StoredBlob> {
    const target = this.resolveKey(key);
    const context = { service: 'LocalBlobStore', operation: 'upload' };

    try {
      await fs.mkdir(path.dirname(target), { recursive: true });
      const source = Buffer.isBuffer(body) ? Readable.from([body]) : body;
      await pipeline(source, createWriteStream(target));
    } catch (error) {
      await fs.rm(target, { force: true });
      throw new FileSystemError(
        `Failed to write ${target}: ${getErrorMessage(error)}`,
        ErrorCode.FS_WRITE_FAILED,
        target,
        false,
        context,
        error instanceof Error ? error : undefined
      );
    }

    const base = (this.options.publicBaseUrl ?? '').replace(/\/+$/, '');
    const url = base ? `${base}/${key}` : pathToFileURL(target).href;

    logger.debug('[LocalBlobStore] Artifact stored', { ...context, key, path: target, contentType });

    return { key, url, contentType };
  }

  private resolveKey(key: string): string {
    const target = path.resolve(this.root, key);
    if (!target.startsWith(this.root + path.sep)) {
      throw new ValidationError(`Object key escapes the storage directory: ${key}`, {
        service: 'LocalBlobStore',
        operation: 'upload',
      });
    }
    return target;
  }
}
