import { randomUUID } from 'node:crypto';
import Groq from 'groq-sdk';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import { disabledTracer, type GenerationTracer } from '../langfuse.js';
import type { PageImage, PageRecognizer } from '../ocr/types.js';
import { classifyGroqFailure, httpStatusOf, type GroqCompletion } from './groq.js';

export const DEFAULT_VISION_MODEL = 'meta-llama/llama-4-scout-17b-16e-instruct';

export const PAGE_TRANSCRIPTION_PROMPT =
  'Transcribe all text on this scanned consent form page exactly as written, including handwritten ' +
  'entries, names, dates and the state of every checkbox (write [x] for ticked and [ ] for empty). ' +
  'Return only the transcription, without commentary. Return nothing if the page holds no text.';

const log = logger.child({ module: 'ocr-vision' });

type ContentPart = { type: 'text'; text: string } | { type: 'image_url'; image_url: { url: string } };

type VisionParams = {
  model: string;
  messages: Array<{ role: 'user'; content: ContentPart[] }>;
  temperature?: number;
  max_tokens?: number;
};

/** The slice of the Groq SDK the recognizer calls. */
export interface GroqVisionClient {
  chat: {
    completions: { create(params: VisionParams, options?: { signal?: AbortSignal }): Promise<GroqCompletion> };
  };
}

export interface GroqVisionOptions {
  model?: string;
  tracer?: GenerationTracer;
}

/** Sends each page image to a Groq vision model and returns its transcription. */
export class GroqVisionRecognizer implements PageRecognizer {
  private readonly client: GroqVisionClient;
  private readonly model: string;
  private readonly tracer: GenerationTracer;

  constructor(client: GroqVisionClient, options: GroqVisionOptions = {}) {
    this.client = client;
    this.model = options.model ?? DEFAULT_VISION_MODEL;
    this.tracer = options.tracer ?? disabledTracer;
  }

  async recognize(image: PageImage, signal?: AbortSignal): Promise<Result<string, AppError>> {
    const startedAt = new Date();
    const ctx = { model: this.model, sourceName: image.sourceName, page: image.pageNumber };

    let completion: GroqCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.model,
          messages: [
            {
              role: 'user',
              content: [
                { type: 'text', text: PAGE_TRANSCRIPTION_PROMPT },
                { type: 'image_url', image_url: { url: `data:image/png;base64,${image.png.toString('base64')}` } },
              ],
            },
          ],
          temperature: 0,
          max_tokens: 4096,
        },
        { signal },
      );
    } catch (cause) {
      const failure = classifyGroqFailure(httpStatusOf(cause));
      const details = describeCause(cause);
      log.error({ ...ctx, errorCode: failure.code, retryable: failure.retryable, details }, 'Page transcription failed');
      return err(createAppError(failure.code, failure.message, failure.retryable, details));
    }

    const message = completion.choices[0]?.message;
    if (!message) {
      log.error({ ...ctx, errorCode: ErrorCode.LLM_MALFORMED_RESPONSE, retryable: false }, 'Transcription response had no message');
      return err(createAppError(ErrorCode.LLM_MALFORMED_RESPONSE, 'Groq returned no transcription message', false));
    }
    // An empty transcription is a blank page, not a failure.
    const text = (message.content ?? '').trim();

    this.tracer.traceGeneration({
      traceId: randomUUID(),
      name: 'page-transcription',
      model: completion.model,
      input: PAGE_TRANSCRIPTION_PROMPT,
      output: text,
      startTime: startedAt,
      endTime: new Date(),
      metadata: { sourceName: image.sourceName, page: image.pageNumber, width: image.width, height: image.height },
    });

    log.info({ ...ctx, textLength: text.length, latencyMs: Date.now() - startedAt.getTime() }, 'Page transcribed');
    return ok(text);
  }
}

export function createGroqVisionClient(apiKey: string): GroqVisionClient {
  return new Groq({ apiKey });
}
