/**
 * Text-to-speech over a plain HTTP endpoint
 *
 * POSTs `{ text, voice }` and accepts either audio bytes (any `audio/*`
 * response) or JSON carrying a URL (`url` or `audio_url`).
 */

import axios, { AxiosError, AxiosInstance } from 'axios';
import { Readable } from 'stream';
import { z } from 'zod';
import { logger } from '../../middleware/logging.js';
import {
  AuthenticationError,
  ConfigurationError,
  ErrorContext,
  JobCanceledError,
  RateLimitError,
  TransientNetworkError,
  UnexpectedResponseError,
  ValidationError,
} from '../../errors/index.js';
import { SpeechConfig } from '../../config/types.js';
import { normalizeContentType } from '../storage/contentTypes.js';

const PROVIDER_NAME = 'SpeechService';

export type SynthesizedSpeech =
  | { kind: 'url'; url: string; contentType?: string | undefined }
  | { kind: 'stream'; body: Readable | Buffer; contentType: string };

export interface SpeechSynthesizer {
  readonly name: string;
  synthesize(text: string, options?: { signal?: AbortSignal | undefined }): Promise<SynthesizedSpeech>;
}

const urlResponseSchema = z
  .object({
    url: z.string().url().optional(),
    audio_url: z.string().url().optional(),
    content_type: z.string().optional(),
  })
  .passthrough();

export class HttpSpeechSynthesizer implements SpeechSynthesizer {
  readonly name = 'http';
  private readonly client: AxiosInstance;

  constructor(private readonly config: SpeechConfig, http?: AxiosInstance) {
    this.client = http ?? axios.create({ timeout: config.timeoutMs });
  }

  async synthesize(text: string, options: { signal?: AbortSignal | undefined } = {}): Promise<SynthesizedSpeech> {
    const context: ErrorContext = { service: 'HttpSpeechSynthesizer', operation: 'synthesize' };

    if (!this.config.baseUrl) {
      throw new ConfigurationError('SPEECH_BASE_URL', 'No speech service URL configured', context);
    }
    if (!text.trim()) {
      throw new ValidationError('Cannot synthesize empty text', context);
    }

    const started = Date.now();
    let data: unknown;
    let header: unknown;
    try {
      const response = await this.client.post<ArrayBuffer>(
        this.config.baseUrl,
        { text, ...(this.config.voice && { voice: this.config.voice }) },
        {
          responseType: 'arraybuffer',
          timeout: this.config.timeoutMs,
          headers: {
            'Content-Type': 'application/json',
            ...(this.config.apiKey && { Authorization: `Bearer ${this.config.apiKey}` }),
          },
          ...(options.signal && { signal: options.signal }),
        }
      );
      data = response.data;
      header = response.headers['content-type'];
    } catch (error) {
      throw this.convertToApplicationError(error, context);
    }

    const body = toBuffer(data);
    const contentType = normalizeContentType(typeof header === 'string' ? header : undefined);

    if (contentType?.startsWith('audio/')) {
      logger.info('[HttpSpeechSynthesizer] Speech synthesized', {
        ...context,
        characters: text.length,
        bytes: body.length,
        durationMs: Date.now() - started,
      });
      return { kind: 'stream', body, contentType };
    }

    const parsed = urlResponseSchema.safeParse(parseJson(body));
    const url = parsed.success ? parsed.data.url ?? parsed.data.audio_url : undefined;
    if (!parsed.success || url === undefined) {
      throw new UnexpectedResponseError(
        PROVIDER_NAME,
        `Speech service returned neither audio nor an audio URL (content type ${contentType ?? 'unknown'})`,
        undefined,
        context
      );
    }

    logger.info('[HttpSpeechSynthesizer] Speech synthesized', {
      ...context,
      characters: text.length,
      url,
      durationMs: Date.now() - started,
    });

    return { kind: 'url', url, contentType: parsed.data.content_type };
  }

  /**
   * Convert Axios errors to ApplicationError types
   */
  private convertToApplicationError(error: unknown, context: ErrorContext): Error {
    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new Error(String(error));
    }

    const axiosError: AxiosError = error;

    if (axiosError.code === AxiosError.ERR_CANCELED) {
      return new JobCanceledError(undefined, 'Speech synthesis was canceled', context);
    }

    const status = axiosError.response?.status;
    if (status === undefined) {
      return new TransientNetworkError(
        `Speech service request failed: ${axiosError.code ?? axiosError.message}`,
        undefined,
        this.config.baseUrl,
        context,
        axiosError
      );
    }

    const withStatus: ErrorContext = { ...context, metadata: { status } };
    switch (status) {
      case 400:
      case 422:
        return new ValidationError(`Speech service rejected the request (${status})`, withStatus, axiosError);
      case 401:
      case 403:
        return new AuthenticationError(`Speech service authentication failed (${status})`, withStatus, axiosError);
      case 429:
        return new RateLimitError(PROVIDER_NAME, undefined, 'Speech service rate limit exceeded', withStatus);
      default:
        if (status >= 500) {
          return new TransientNetworkError(
            `Speech service server error (${status})`,
            status,
            this.config.baseUrl,
            withStatus,
            axiosError
          );
        }
        return new UnexpectedResponseError(
          PROVIDER_NAME,
          `Unexpected response from speech service (${status})`,
          status,
          withStatus,
          axiosError
        );
    }
  }
}

function toBuffer(data: unknown): Buffer {
  if (Buffer.isBuffer(data)) {
    return data;
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(data);
  }
  if (typeof data === 'string') {
    return Buffer.from(data);
  }
  return Buffer.alloc(0);
}

function parseJson(body: Buffer): unknown {
  try {
    return JSON.parse(body.toString('utf8'));
  } catch {
    return undefined;
  }
}
