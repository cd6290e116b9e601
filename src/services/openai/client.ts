/**
 * Inference Client
 *
 * Narrow capability the extraction service depends on: one image, one
 * instruction message, one directive, one output-format contract in; the
 * response text out. OpenAIInferenceClient implements it on the Responses
 * API. Calls are made once; the SDK's own retries are switched off.
 *
 * @module services/openai/client
 */

import OpenAI from 'openai';
import { DEFAULT_MODEL } from '../../config.js';
import { PipelineError } from '../../utils/errors.js';
import { toTextFormat } from './format.js';

/**
 * Token usage from a response
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

/**
 * A single schema-constrained image request
 */
export interface InferenceRequest {
  /** System message: the output contract */
  instructions: string;
  /** User-message text placed before the image */
  directive: string;
  /** `data:image/png;base64,...` */
  imageDataUrl: string;
  /** Opaque output-format contract */
  format: Record<string, unknown>;
}

/**
 * Response text and metadata
 */
export interface InferenceResponse {
  text: string;
  model: string;
  usage: TokenUsage;
  processingTimeMs: number;
}

export interface InferenceClient {
  complete(request: InferenceRequest): Promise<InferenceResponse>;
}

export interface OpenAIClientOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
}

/**
 * InferenceClient backed by the OpenAI Responses API
 */
export class OpenAIInferenceClient implements InferenceClient {
  private readonly client: OpenAI;
  readonly model: string;

  constructor(options: OpenAIClientOptions, client?: OpenAI) {
    this.model = options.model ?? DEFAULT_MODEL;
    this.client =
      client ??
      new OpenAI({
        apiKey: options.apiKey,
        baseURL: options.baseUrl,
        maxRetries: 0,
      });
  }

  async complete(request: InferenceRequest): Promise<InferenceResponse> {
    const format = toTextFormat(request.format);
    const startTime = Date.now();

    const response = await this.client.responses
      .create({
        model: this.model,
        input: [
          {
            role: 'system',
            content: [{ type: 'input_text', text: request.instructions }],
          },
          {
            role: 'user',
            content: [
              { type: 'input_text', text: request.directive },
              { type: 'input_image', image_url: request.imageDataUrl, detail: 'high' },
            ],
          },
        ],
        text: { format },
      })
      .catch((error: unknown) => {
        const status = error instanceof OpenAI.APIError ? error.status : undefined;
        throw new PipelineError(
          'INFERENCE_FAILED',
          `Inference call failed${status ? ` (HTTP ${status})` : ''}: ${error instanceof Error ? error.message : String(error)}`,
          { model: this.model, status }
        );
      });

    const inputTokens = response.usage?.input_tokens ?? 0;
    const outputTokens = response.usage?.output_tokens ?? 0;

    return {
      text: response.output_text,
      model: response.model,
      usage: {
        inputTokens,
        outputTokens,
        totalTokens: response.usage?.total_tokens ?? inputTokens + outputTokens,
      },
      processingTimeMs: Date.now() - startTime,
    };
  }
}
