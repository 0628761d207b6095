/**
 * OpenAI Image Client
 *
 * Image generation through the OpenAI SDK, returning decoded bytes.
 * SDK errors are classified into pipeline error kinds.
 *
 * @module workers/image/client
 */

import OpenAI from 'openai';
import { CapabilityError } from '../../pipeline/errors.js';
import type { ImageGenerationParams, ImageService } from '../types.js';
import { classifyTransportError, httpStatusError } from '../errors.js';

/**
 * The slice of the SDK this client uses.
 */
export interface ImagesApi {
  generate(body: OpenAI.ImageGenerateParams): Promise<OpenAI.ImagesResponse>;
}

export interface OpenAiImageClientOptions {
  apiKey: string | undefined;
  timeoutMs: number;
  /** Injectable for tests; built from apiKey when omitted */
  images?: ImagesApi;
}

export class OpenAiImageClient implements ImageService {
  private images: ImagesApi | null;

  constructor(private readonly options: OpenAiImageClientOptions) {
    this.images = options.images ?? null;
  }

  async generate(prompt: string, params: ImageGenerationParams): Promise<Buffer> {
    let response: OpenAI.ImagesResponse;
    try {
      response = await this.api().generate({
        model: params.model,
        prompt,
        size: params.size,
        quality: params.quality,
        n: 1,
        response_format: 'b64_json',
      });
    } catch (error) {
      throw classifyOpenAiError(error);
    }

    const encoded = response.data?.[0]?.b64_json;
    if (!encoded) {
      throw new CapabilityError('server_error', 'Image response contained no image data');
    }
    return Buffer.from(encoded, 'base64');
  }

  private api(): ImagesApi {
    if (this.images === null) {
      if (!this.options.apiKey) {
        throw new CapabilityError('authentication', 'Missing required API key: OPENAI_API_KEY');
      }
      // Retries are the pipeline's job
      this.images = new OpenAI({
        apiKey: this.options.apiKey,
        timeout: this.options.timeoutMs,
        maxRetries: 0,
      }).images;
    }
    return this.images;
  }
}

/**
 * Map SDK errors onto error kinds. Connection failures carry no status.
 */
export function classifyOpenAiError(error: unknown): CapabilityError {
  if (error instanceof CapabilityError) {
    return error;
  }
  if (error instanceof OpenAI.APIConnectionTimeoutError) {
    return new CapabilityError('timeout', `Image generation timed out: ${error.message}`, { cause: error });
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new CapabilityError('network', `Image generation failed: ${error.message}`, { cause: error });
  }
  if (error instanceof OpenAI.APIError && error.status !== undefined) {
    const classified = httpStatusError(error.status, error.message, error.headers?.['retry-after']);
    return new CapabilityError(classified.kind, classified.message, {
      cause: error,
      retryAfterMs: classified.retryAfterMs,
    });
  }
  return classifyTransportError(error, 'Image generation');
}
