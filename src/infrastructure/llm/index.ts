export type { LLMProvider, LLMResponse, ChatRequest, LLMProviderConfig } from './types.js';
export { GroqProvider, createGroqClient, DEFAULT_MODEL } from './groq.js';
export type { GroqClient, GroqProviderOptions } from './groq.js';
export { GroqVisionRecognizer, createGroqVisionClient, DEFAULT_VISION_MODEL } from './groq-vision.js';
export type { GroqVisionClient, GroqVisionOptions } from './groq-vision.js';

import { GroqProvider, createGroqClient } from './groq.js';
import type { GenerationTracer } from '../langfuse.js';
import type { LLMProvider, LLMProviderConfig } from './types.js';

export function createLLMProvider(config: LLMProviderConfig, tracer?: GenerationTracer): LLMProvider {
  switch (config.provider) {
    case 'groq':
      return new GroqProvider(createGroqClient(config.apiKey), { model: config.model, tracer });
    default:
      throw new Error(`Unsupported LLM provider: ${String(config.provider)}`);
  }
}
