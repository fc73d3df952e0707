import { z } from 'zod';

const flag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const positiveInt = z.coerce.number().int().positive();

const configSchema = z.object({
  PORT: positiveInt.default(3000),
  LOG_LEVEL: z.string().default('info'),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL must be set'),
  GROQ_API_KEY: z.string().min(1, 'GROQ_API_KEY must be set'),
  LLM_MODEL: z.string().optional(),
  LANGFUSE_PUBLIC_KEY: z.string().optional(),
  LANGFUSE_SECRET_KEY: z.string().optional(),
  LANGFUSE_BASE_URL: z.string().url().default('https://cloud.langfuse.com'),
  STORAGE_DIR: z.string().default('./storage'),
  CONSENT_BUCKET: z.string().min(1).default('consent-management-summarizer-bucket'),
  OCR_TIMEOUT_MS: positiveInt.default(420_000),
  OCR_BATCH_SIZE: positiveInt.default(2),
  OCR_VISION_ENABLED: flag.default('true'),
  OCR_VISION_MODEL: z.string().optional(),
  SESSION_TTL_MS: positiveInt.default(8 * 60 * 60 * 1000),
  BCRYPT_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),
  UPLOAD_MAX_BYTES: positiveInt.default(10 * 1024 * 1024),
  CORS_ORIGINS: z
    .string()
    .default('*')
    .transform((value) => value.split(',').map((origin) => origin.trim()).filter((origin) => origin !== '')),
  INGEST_ON_UPLOAD: flag.default('false'),
  ASK_ENDPOINT_ENABLED: flag.default('true'),
});

export type AppConfig = z.output<typeof configSchema>;

/** @throws {Error} If a required variable is missing or a value does not parse */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${details}`);
  }
  return parsed.data;
}
