import { Readable } from 'stream';

export type BlobBody = Readable | Buffer;

export interface StoredBlob {
  key: string;
  /** Publicly reachable URL of the stored object */
  url: string;
  contentType: string;
}

/**
 * Durable storage for finished artifacts
 */
export interface BlobStore {
  readonly name: string;
  upload(body: BlobBody, key: string, contentType: string): Promise<StoredBlob>;
}
