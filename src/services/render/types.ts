import { JobInput, JobStatus } from '../../types/jobs.js';
import { RenderOptions } from '../../config/types.js';

export interface RenderRequest {
  /** Defaults to the configured model */
  model?: string;
  inputs: JobInput[];
  /** Merged over the configured defaults */
  options?: Partial<RenderOptions>;
}

export interface SubmitResult {
  id: string;
  status: JobStatus;
  raw: unknown;
}

export interface StatusPayload {
  id: string;
  status: JobStatus;
  /** Status string exactly as the service sent it */
  rawStatus: string;
  outputUrl?: string;
  error?: string;
  raw: unknown;
}

export interface CallOptions {
  /** Per-call timeout; falls back to the client's default */
  timeoutMs?: number;
  signal?: AbortSignal;
}

/**
 * Remote rendering service as seen by the poller and the video stage.
 * Implementations never retry; failures surface as ApplicationErrors.
 */
export interface RenderJobApi {
  submit(request: RenderRequest, options?: CallOptions): Promise<SubmitResult>;
  fetchStatus(jobId: string, options?: CallOptions): Promise<StatusPayload>;
}
