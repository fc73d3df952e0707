import { randomUUID } from 'node:crypto';
import Groq from 'groq-sdk';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import { disabledTracer, type GenerationTracer } from '../langfuse.js';
import type { ChatRequest, LLMProvider, LLMResponse } from './types.js';

export const DEFAULT_MODEL = 'llama-3.3-70b-versatile';
const DEFAULT_MAX_TOKENS = 4096;
const DEFAULT_TEMPERATURE = 0.1;

const log = logger.child({ module: 'llm-groq' });

type CompletionParams = {
  model: string;
  messages: Array<{ role: 'system' | 'user' | 'assistant'; content: string }>;
  temperature?: number;
  max_tokens?: number;
  response_format?: { type: 'json_object' | 'text' };
};

export type GroqCompletion = {
  choices: Array<{ message?: { content?: string | null } }>;
  model: string;
  usage?: { prompt_tokens?: number; completion_tokens?: number; total_tokens?: number };
};

/** The slice of the Groq SDK this provider calls. */
export interface GroqClient {
  chat: { completions: { create(params: CompletionParams): Promise<GroqCompletion> } };
}

export interface GroqProviderOptions {
  model?: string;
  tracer?: GenerationTracer;
}

interface FailureClass {
  code: ErrorCode;
  message: string;
  retryable: boolean;
}

export function classifyGroqFailure(status: number | undefined): FailureClass {
  if (status === 401) {
    return { code: ErrorCode.LLM_AUTH_ERROR, message: 'Groq API authentication failed', retryable: false };
  }
  if (status === 429) {
    return { code: ErrorCode.LLM_RATE_LIMITED, message: 'Groq API rate limited', retryable: true };
  }
  if (status !== undefined && status >= 500) {
    return { code: ErrorCode.LLM_API_ERROR, message: `Groq API returned ${status}`, retryable: true };
  }
  return { code: ErrorCode.LLM_API_ERROR, message: 'Groq API call failed', retryable: true };
}

export function httpStatusOf(cause: unknown): number | undefined {
  if (cause !== null && typeof cause === 'object' && 'status' in cause && typeof cause.status === 'number') {
    return cause.status;
  }
  return undefined;
}

function toCompletionParams(model: string, request: ChatRequest): CompletionParams {
  const params: CompletionParams = {
    model,
    messages: [
      { role: 'system', content: request.systemPrompt },
      { role: 'user', content: request.userMessage },
    ],
    temperature: request.temperature ?? DEFAULT_TEMPERATURE,
    max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
  };
  if (request.responseFormat === 'json') {
    params.response_format = { type: 'json_object' };
  }
  return params;
}

export class GroqProvider implements LLMProvider {
  private readonly client: GroqClient;
  private readonly model: string;
  private readonly tracer: GenerationTracer;

  constructor(client: GroqClient, options: GroqProviderOptions = {}) {
    this.client = client;
    this.model = options.model ?? DEFAULT_MODEL;
    this.tracer = options.tracer ?? disabledTracer;
  }

  async chat(request: ChatRequest): Promise<Result<LLMResponse, AppError>> {
    const startedAt = new Date();
    const traceName = request.trace?.name ?? 'chat';
    log.debug({ model: this.model, traceName }, 'Requesting chat completion');

    let completion: GroqCompletion;
    try {
      completion = await this.client.chat.completions.create(toCompletionParams(this.model, request));
    } catch (cause) {
      const status = httpStatusOf(cause);
      const failure = classifyGroqFailure(status);
      const details = describeCause(cause);
      const fields = { model: this.model, traceName, status, details, errorCode: failure.code, retryable: failure.retryable };
      if (failure.code === ErrorCode.LLM_RATE_LIMITED) log.warn(fields, failure.message);
      else log.error(fields, failure.message);
      return err(createAppError(failure.code, failure.message, failure.retryable, details));
    }

    const latencyMs = Date.now() - startedAt.getTime();
    const content = completion.choices[0]?.message?.content;
    if (!content) {
      log.error({ model: this.model, traceName, latencyMs, errorCode: ErrorCode.LLM_MALFORMED_RESPONSE, retryable: false }, 'Empty completion');
      return err(createAppError(ErrorCode.LLM_MALFORMED_RESPONSE, 'Groq returned empty response content', false));
    }

    const response: LLMResponse = {
      content,
      model: completion.model,
      usage: {
        promptTokens: completion.usage?.prompt_tokens ?? 0,
        completionTokens: completion.usage?.completion_tokens ?? 0,
        totalTokens: completion.usage?.total_tokens ?? 0,
      },
      latencyMs,
    };

    this.tracer.traceGeneration({
      traceId: request.trace?.id ?? randomUUID(),
      name: traceName,
      model: completion.model,
      input: `${request.systemPrompt}\n\n${request.userMessage}`,
      output: content,
      startTime: startedAt,
      endTime: new Date(),
      metadata: request.trace?.metadata,
    });

    log.info({ model: completion.model, traceName, latencyMs, totalTokens: response.usage.totalTokens }, 'Chat completion received');
    return ok(response);
  }
}

export function createGroqClient(apiKey: string): GroqClient {
  return new Groq({ apiKey });
}
