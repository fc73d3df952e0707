import { type ZodSchema, ZodError } from 'zod';
import { createDatabase } from '../../infrastructure/db/client.js';
import { FsBlobStore, type BlobStore } from '../../infrastructure/blob-store.js';
import { PdfTextOcrEngine } from '../../infrastructure/ocr/pdf-text-engine.js';
import { GroqVisionRecognizer, createGroqVisionClient, createLLMProvider } from '../../infrastructure/llm/index.js';
import { createTracer } from '../../infrastructure/langfuse.js';
import type { AppConfig } from '../../infrastructure/config.js';
import { createConsentRepository } from '../../services/consent/index.js';
import { createEntityIndexRepository } from '../../services/entity-index/index.js';
import { createBcryptHasher, createPatientRepository } from '../../services/patient/index.js';
import type { IngestDeps } from '../../services/ingest/index.js';

export interface IngestRuntime {
  deps: IngestDeps;
  /** Flushes pending traces. */
  close(): Promise<void>;
}

export function createIngestRuntime(config: AppConfig, blobs: BlobStore = new FsBlobStore(config.STORAGE_DIR)): IngestRuntime {
  const db = createDatabase(config.DATABASE_URL);
  const tracer = createTracer({
    publicKey: config.LANGFUSE_PUBLIC_KEY,
    secretKey: config.LANGFUSE_SECRET_KEY,
    baseUrl: config.LANGFUSE_BASE_URL,
  });

  const recognizer = config.OCR_VISION_ENABLED
    ? new GroqVisionRecognizer(createGroqVisionClient(config.GROQ_API_KEY), { model: config.OCR_VISION_MODEL, tracer })
    : undefined;

  return {
    deps: {
      blobs,
      ocr: new PdfTextOcrEngine(blobs, { batchSize: config.OCR_BATCH_SIZE, recognizer }),
      llm: createLLMProvider({ provider: 'groq', apiKey: config.GROQ_API_KEY, model: config.LLM_MODEL }, tracer),
      consents: createConsentRepository(db),
      entityIndex: createEntityIndexRepository(db),
      patients: createPatientRepository(db),
      hasher: createBcryptHasher(config.BCRYPT_ROUNDS),
      ocrTimeoutMs: config.OCR_TIMEOUT_MS,
    },
    close: () => tracer.shutdown(),
  };
}

export function parseInput<T>(schema: ZodSchema<T>, raw: unknown): T {
  try {
    return schema.parse(raw);
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
      throw new Error(`Invalid script input: ${details}`);
    }
    throw error;
  }
}
