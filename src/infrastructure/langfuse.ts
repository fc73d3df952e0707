import { Langfuse } from 'langfuse';
import { describeCause } from '../domain/errors.js';
import { logger } from './logger.js';

export interface TraceGenerationParams {
  traceId: string;
  name: string;
  model: string;
  input: string;
  output: string;
  startTime: Date;
  endTime: Date;
  metadata?: Record<string, unknown>;
}

interface TraceObject {
  generation(params: {
    name: string;
    model: string;
    input: string;
    output: string;
    startTime: Date;
    endTime: Date;
    metadata?: Record<string, unknown>;
  }): void;
}

export interface LangfuseClient {
  trace(params: { id: string; name: string; metadata?: Record<string, unknown> }): TraceObject;
  shutdownAsync(): Promise<void>;
}

/** Receives every model generation; implementations must never throw into the caller. */
export interface GenerationTracer {
  traceGeneration(params: TraceGenerationParams): void;
  shutdown(): Promise<void>;
}

const log = logger.child({ module: 'langfuse' });

export class LangfuseService implements GenerationTracer {
  private readonly client: LangfuseClient;

  constructor(client: LangfuseClient) {
    this.client = client;
  }

  /** Fire-and-forget: tracing failures are logged but never block the pipeline */
  traceGeneration(params: TraceGenerationParams): void {
    try {
      const trace = this.client.trace({
        id: params.traceId,
        name: params.name,
        metadata: params.metadata,
      });

      trace.generation({
        name: params.name,
        model: params.model,
        input: params.input,
        output: params.output,
        startTime: params.startTime,
        endTime: params.endTime,
        metadata: params.metadata,
      });

      log.debug({ traceId: params.traceId, model: params.model }, 'Traced LLM generation');
    } catch (cause) {
      log.warn({ traceId: params.traceId, details: describeCause(cause) }, 'Failed to trace generation (non-blocking)');
    }
  }

  async shutdown(): Promise<void> {
    try {
      await this.client.shutdownAsync();
    } catch (cause) {
      log.warn({ details: describeCause(cause) }, 'Failed to flush Langfuse events');
    }
  }
}

export const disabledTracer: GenerationTracer = {
  traceGeneration: () => undefined,
  shutdown: async () => undefined,
};

export interface LangfuseSettings {
  publicKey?: string;
  secretKey?: string;
  baseUrl: string;
}

export function createTracer(settings: LangfuseSettings): GenerationTracer {
  if (!settings.publicKey || !settings.secretKey) {
    log.info('Langfuse keys not set, generation tracing disabled');
    return disabledTracer;
  }
  return new LangfuseService(
    new Langfuse({
      publicKey: settings.publicKey,
      secretKey: settings.secretKey,
      baseUrl: settings.baseUrl,
    }),
  );
}
