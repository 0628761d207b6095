/**
 * Music Generation API Client
 *
 * Low-level client for a JSON REST music generation service: submit a job,
 * poll its status, download the finished audio. Handles authentication,
 * request timeouts and HTTP error classification.
 *
 * @module workers/music/client
 */

import { z } from 'zod';
import { CapabilityError } from '../../pipeline/errors.js';
import type { MusicGenerationParams, MusicJobStatus, MusicService } from '../types.js';
import { writeArtifact } from '../artifacts.js';
import { classifyTransportError, httpStatusError, isAbortError } from '../errors.js';
import type { RequestLimiter } from './limiter.js';

// ============================================================================
// API Response Types (Internal)
// ============================================================================

const SubmitResponseSchema = z.object({
  task_id: z.string().min(1),
});

const StatusResponseSchema = z.object({
  task_id: z.string(),
  status: z.enum(['pending', 'queued', 'processing', 'completed', 'failed']),
  progress: z.number().optional(),
  audio_url: z.string().url().nullish(),
  error: z.string().nullish(),
});

const ErrorBodySchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string() })]),
});

// ============================================================================
// Client Implementation
// ============================================================================

export interface HttpMusicClientOptions {
  apiKey: string | undefined;
  baseUrl: string;
  /** Per-request timeout in milliseconds */
  timeoutMs: number;
  /** Quota applied to generation requests */
  limiter?: RequestLimiter;
  /** Injectable for tests */
  fetchImpl?: typeof fetch;
}

/**
 * HttpMusicClient talks to the music generation service.
 *
 * Endpoints:
 * - `POST /v1/generate` → `{ task_id }`
 * - `GET /v1/status/:id` → `{ task_id, status, progress, audio_url, error }`
 * - `GET <audio_url>` → audio bytes
 *
 * @example
 * ```typescript
 * const client = new HttpMusicClient({ apiKey, baseUrl, timeoutMs: 30000 });
 * const jobId = await client.submit('slow lofi piano, rain', params);
 * const status = await client.poll(jobId);
 * ```
 */
export class HttpMusicClient implements MusicService {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: HttpMusicClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async submit(prompt: string, params: MusicGenerationParams): Promise<string> {
    const body: Record<string, unknown> = {
      prompt,
      model: params.model,
      duration: params.durationSeconds,
      make_instrumental: params.instrumental,
    };
    if (params.style !== undefined) body.style = params.style;
    if (params.title !== undefined) body.title = params.title;

    await this.options.limiter?.acquire();
    const data = await this.requestJson('Music job submission', '/v1/generate', {
      method: 'POST',
      body: JSON.stringify(body),
    });
    return this.parse(SubmitResponseSchema, data, 'submit').task_id;
  }

  async poll(jobId: string): Promise<MusicJobStatus> {
    const data = await this.requestJson(
      'Music job status',
      `/v1/status/${encodeURIComponent(jobId)}`,
      { method: 'GET' }
    );
    const parsed = this.parse(StatusResponseSchema, data, 'status');

    const status: MusicJobStatus = {
      state: parsed.status === 'queued' ? 'pending' : parsed.status,
    };
    if (parsed.audio_url) status.artifactUrl = parsed.audio_url;
    if (parsed.error) status.error = parsed.error;
    if (parsed.progress !== undefined) status.progress = parsed.progress;
    return status;
  }

  async fetch(artifactUrl: string, destination: string): Promise<string> {
    const bytes = await this.request('Audio download', artifactUrl, { method: 'GET' }, false, (response) =>
      response.arrayBuffer()
    );
    if (bytes.byteLength === 0) {
      throw new CapabilityError('server_error', `Audio download returned no data: ${artifactUrl}`);
    }
    return writeArtifact(destination, new Uint8Array(bytes));
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  private async requestJson(action: string, endpoint: string, init: RequestInit): Promise<unknown> {
    return this.request(action, `${this.options.baseUrl}${endpoint}`, init, true, async (response) => {
      try {
        const data: unknown = await response.json();
        return data;
      } catch (error) {
        if (isAbortError(error)) {
          throw error;
        }
        throw new CapabilityError('server_error', `${action}: response is not valid JSON`, { cause: error });
      }
    });
  }

  /**
   * Send a request and read its body under one timeout. The deadline covers
   * the body as well as the headers, so a stalled download still times out.
   *
   * @throws CapabilityError classified by status or transport failure
   */
  private async request<T>(
    action: string,
    url: string,
    init: RequestInit,
    authenticated: boolean,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (authenticated) {
      if (!this.options.apiKey) {
        throw new CapabilityError('authentication', 'Missing required API key: SUNO_API_KEY');
      }
      headers.Authorization = `Bearer ${this.options.apiKey}`;
      headers['Content-Type'] = 'application/json';
    }

    const signal = AbortSignal.timeout(this.options.timeoutMs);
    try {
      return await untilAborted(this.exchange(url, { ...init, headers, signal }, read), signal);
    } catch (error) {
      if (signal.aborted || isAbortError(error)) {
        throw new CapabilityError('timeout', `${action} timed out after ${this.options.timeoutMs}ms`, {
          cause: error,
        });
      }
      throw classifyTransportError(error, action);
    }
  }

  private async exchange<T>(url: string, init: RequestInit, read: (response: Response) => Promise<T>): Promise<T> {
    const response = await this.fetchImpl(url, init);
    if (!response.ok) {
      throw httpStatusError(
        response.status,
        await errorDetail(response),
        response.headers.get('retry-after')
      );
    }
    return read(response);
  }

  private parse<S extends z.ZodTypeAny>(schema: S, data: unknown, what: string): z.infer<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw new CapabilityError('server_error', `Unexpected ${what} response from music service`, {
        cause: result.error,
      });
    }
    return result.data;
  }
}

/**
 * Settle with `work`, or reject with the abort reason once `signal` fires.
 */
function untilAborted<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    if (signal.aborted) {
      onAbort();
    }
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Pull a readable message out of an error response body.
 */
async function errorDetail(response: Response): Promise<string> {
  const text = await response.text().catch(() => '');
  if (text === '') {
    return response.statusText || 'Unknown error';
  }
  try {
    const parsed = ErrorBodySchema.safeParse(JSON.parse(text));
    if (parsed.success) {
      return typeof parsed.data.error === 'string' ? parsed.data.error : parsed.data.error.message;
    }
  } catch {
    // Not JSON: the raw text is the message
  }
  return text;
}
