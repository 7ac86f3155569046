import { StorageConfig } from '../../config/types.js';
import { ConfigurationError } from '../../errors/index.js';
import { LocalBlobStore } from './LocalBlobStore.js';
import { S3BlobStore } from './S3BlobStore.js';
import { BlobStore } from './types.js';

export * from './types.js';
export * from './contentTypes.js';
export { ArtifactRehoster, buildArtifactKey, resolveContentType } from './ArtifactRehoster.js';
export type { ArtifactRehosterOptions, RehostHint, RehostOutcome } from './ArtifactRehoster.js';
export { LocalBlobStore } from './LocalBlobStore.js';
export { S3BlobStore, publicObjectUrl, sanitizeRegion } from './S3BlobStore.js';

export function createBlobStore(config: StorageConfig): BlobStore {
  if (config.backend === 's3') {
    if (!config.s3.bucket) {
      throw new ConfigurationError('S3_BUCKET', 'STORAGE_BACKEND=s3 requires S3_BUCKET');
    }
    return new S3BlobStore({
      bucket: config.s3.bucket,
      region: config.s3.region,
      publicBaseUrl: config.s3.publicBaseUrl,
    });
  }
  return new LocalBlobStore(config.local);
}
