/**
 * OpenAI Inference Service
 * Exports the inference capability and its Responses API implementation
 */

export {
  OpenAIInferenceClient,
  type InferenceClient,
  type InferenceRequest,
  type InferenceResponse,
  type OpenAIClientOptions,
  type TokenUsage,
} from './client.js';

export { TextFormatSchema, toTextFormat, type TextFormat } from './format.js';
