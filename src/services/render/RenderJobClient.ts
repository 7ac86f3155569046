/**
 * Rendering service API client
 *
 * Submits lip-sync render jobs (`POST /generate`) and fetches their status
 * (`GET /generate/{id}`). One HTTP call per method call: retries belong to the poller.
 */

import axios, { AxiosError, AxiosInstance } from 'axios';
import { z } from 'zod';
import { logger } from '../../middleware/logging.js';
import {
  AuthenticationError,
  ErrorContext,
  JobCanceledError,
  JobNotFoundError,
  RateLimitError,
  SchemaValidationError,
  TransientNetworkError,
  UnexpectedResponseError,
  ValidationError,
} from '../../errors/index.js';
import { RenderConfig, RenderOptions } from '../../config/types.js';
import { jobInputSchema } from '../../validation/jobSchemas.js';
import { mapRemoteStatus } from './statusMapping.js';
import { CallOptions, RenderJobApi, RenderRequest, StatusPayload, SubmitResult } from './types.js';

const PROVIDER_NAME = 'RenderService';

const renderRequestSchema = z.object({
  model: z.string().min(1),
  inputs: z
    .array(jobInputSchema.extend({ url: z.string().url('Input url must be an absolute URL') }))
    .min(1, 'At least one input is required'),
});

const submitResponseSchema = z
  .object({
    id: z.string().min(1).optional(),
    job_id: z.string().min(1).optional(),
    status: z.string().optional(),
  })
  .passthrough();

const statusResponseSchema = z
  .object({
    id: z.string().optional(),
    status: z.string(),
    outputUrl: z.string().nullish(),
    output_url: z.string().nullish(),
    error: z.union([z.string(), z.object({ message: z.string() }).passthrough()]).nullish(),
  })
  .passthrough();

interface WireOptions {
  output_format: string;
  sync_mode: string;
  fps: number;
  output_resolution: [number, number];
  active_speaker: boolean;
}

function toWireOptions(options: RenderOptions): WireOptions {
  return {
    output_format: options.outputFormat,
    sync_mode: options.syncMode,
    fps: options.fps,
    output_resolution: options.outputResolution,
    active_speaker: options.activeSpeaker,
  };
}

function parseRetryAfter(header: unknown): number | undefined {
  if (typeof header !== 'string' && typeof header !== 'number') {
    return undefined;
  }
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

export class RenderJobClient implements RenderJobApi {
  private readonly client: AxiosInstance;
  private readonly config: RenderConfig;

  /**
   * @param http - pre-built axios instance (tests pass one with a custom adapter)
   */
  constructor(config: RenderConfig, http?: AxiosInstance) {
    this.config = config;
    this.client = http ?? axios.create({
      baseURL: config.baseUrl,
      timeout: config.timeoutMs,
    });
  }

  async submit(request: RenderRequest, options: CallOptions = {}): Promise<SubmitResult> {
    const context: ErrorContext = { service: 'RenderJobClient', operation: 'submit' };
    const model = request.model ?? this.config.model;

    const parsed = renderRequestSchema.safeParse({ model, inputs: request.inputs });
    if (!parsed.success) {
      throw new SchemaValidationError(
        parsed.error.issues.map(issue => ({ path: issue.path.join('.'), message: issue.message })),
        'Render request is invalid',
        context
      );
    }

    const body = {
      model,
      input: request.inputs.map(input => ({
        type: input.type,
        url: input.url,
        ...(input.contentType && { content_type: input.contentType }),
      })),
      options: toWireOptions({ ...this.config.options, ...request.options }),
    };

    const started = Date.now();
    const data = await this.send<unknown>('post', '/generate', context, options, body);

    const response = submitResponseSchema.safeParse(data);
    const id = response.success ? response.data.id ?? response.data.job_id : undefined;
    if (!response.success || id === undefined) {
      throw new UnexpectedResponseError(
        PROVIDER_NAME,
        'Render service accepted the request but returned no job id',
        undefined,
        { ...context, metadata: { body: data } }
      );
    }

    const status = response.data.status ? mapRemoteStatus(response.data.status) : 'SUBMITTED';

    logger.info('[RenderJobClient] Render job submitted', {
      service: 'RenderJobClient',
      operation: 'submit',
      jobId: id,
      model,
      inputs: request.inputs.length,
      durationMs: Date.now() - started,
    });

    return { id, status, raw: data };
  }

  async fetchStatus(jobId: string, options: CallOptions = {}): Promise<StatusPayload> {
    const context: ErrorContext = { service: 'RenderJobClient', operation: 'fetchStatus', jobId };

    if (!jobId.trim()) {
      throw new ValidationError('Job id must not be empty', context);
    }

    const data = await this.send<unknown>(
      'get',
      `/generate/${encodeURIComponent(jobId)}`,
      context,
      options
    );

    const response = statusResponseSchema.safeParse(data);
    if (!response.success) {
      throw new UnexpectedResponseError(
        PROVIDER_NAME,
        `Status response for job ${jobId} has no status field`,
        undefined,
        { ...context, metadata: { body: data } }
      );
    }

    const { status: rawStatus, outputUrl, output_url: outputUrlSnake, error } = response.data;
    const resolvedOutput = outputUrl ?? outputUrlSnake ?? undefined;
    const errorMessage = typeof error === 'string' ? error : error?.message;

    const payload: StatusPayload = {
      id: jobId,
      status: mapRemoteStatus(rawStatus),
      rawStatus,
      raw: data,
      ...(resolvedOutput && { outputUrl: resolvedOutput }),
      ...(errorMessage && { error: errorMessage }),
    };

    logger.debug('[RenderJobClient] Status fetched', {
      service: 'RenderJobClient',
      operation: 'fetchStatus',
      jobId,
      rawStatus,
      status: payload.status,
    });

    return payload;
  }

  private async send<T>(
    method: 'get' | 'post',
    url: string,
    context: ErrorContext,
    options: CallOptions,
    body?: unknown
  ): Promise<T> {
    if (!this.config.apiKey) {
      throw new AuthenticationError('No API key configured for the render service', context);
    }

    try {
      const response = await this.client.request<T>({
        method,
        url,
        data: body,
        headers: {
          'x-api-key': this.config.apiKey,
          'Content-Type': 'application/json',
        },
        timeout: options.timeoutMs ?? this.config.timeoutMs,
        ...(options.signal && { signal: options.signal }),
      });
      return response.data;
    } catch (error) {
      throw this.convertToApplicationError(error, url, context);
    }
  }

  /**
   * Convert Axios errors to ApplicationError types
   */
  private convertToApplicationError(error: unknown, url: string, context: ErrorContext): Error {
    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new Error(String(error));
    }

    const axiosError: AxiosError = error;

    if (axiosError.code === AxiosError.ERR_CANCELED) {
      return new JobCanceledError(context.jobId, `Request to ${url} was canceled`, context);
    }

    if (axiosError.response) {
      const status = axiosError.response.status;
      const detail = this.describeBody(axiosError.response.data) ?? axiosError.message;
      const withStatus: ErrorContext = { ...context, metadata: { ...context.metadata, status, url } };

      if (status === 400 || status === 422) {
        return new ValidationError(`Render service rejected the request (${status}): ${detail}`, withStatus, axiosError);
      }
      if (status === 401 || status === 403) {
        return new AuthenticationError(`Render service authentication failed (${status}): ${detail}`, withStatus, axiosError);
      }
      if (status === 404) {
        return new JobNotFoundError(context.jobId ?? url, withStatus, axiosError);
      }
      if (status === 429) {
        return new RateLimitError(
          PROVIDER_NAME,
          parseRetryAfter(axiosError.response.headers['retry-after']),
          `Render service rate limit exceeded: ${detail}`,
          withStatus
        );
      }
      if (status >= 500) {
        return new TransientNetworkError(
          `Render service server error (${status}): ${detail}`,
          status,
          url,
          withStatus,
          axiosError
        );
      }
      return new UnexpectedResponseError(
        PROVIDER_NAME,
        `Unexpected response from render service (${status}): ${detail}`,
        status,
        withStatus,
        axiosError
      );
    }

    // No response: timeout, refused or reset connection, DNS failure
    return new TransientNetworkError(
      `Render service request failed: ${axiosError.code ?? axiosError.message}`,
      undefined,
      url,
      { ...context, metadata: { ...context.metadata, code: axiosError.code } },
      axiosError
    );
  }

  private describeBody(data: unknown): string | undefined {
    if (typeof data === 'string') {
      return data.slice(0, 500);
    }
    if (typeof data === 'object' && data !== null) {
      if ('message' in data && typeof data.message === 'string') {
        return data.message;
      }
      if ('error' in data && typeof data.error === 'string') {
        return data.error;
      }
      return JSON.stringify(data).slice(0, 500);
    }
    return undefined;
  }
}
