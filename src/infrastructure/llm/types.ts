import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';

export interface LLMResponse {
  content: string;
  model: string;
  usage: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  latencyMs: number;
}

export interface ChatRequest {
  systemPrompt: string;
  userMessage: string;
  temperature?: number;
  maxTokens?: number;
  responseFormat?: 'json' | 'text';
  /** Groups the generation in the tracer; `id` is usually the document or session being worked on. */
  trace?: {
    id: string;
    name: string;
    metadata?: Record<string, unknown>;
  };
}

export interface LLMProvider {
  chat(request: ChatRequest): Promise<Result<LLMResponse, AppError>>;
}

export interface LLMProviderConfig {
  provider: 'groq';
  apiKey: string;
  model?: string;
}
