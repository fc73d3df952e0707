import { storageEventSchema } from '../../domain/schemas.js';
import { loadConfig } from '../../infrastructure/config.js';
import { logger } from '../../infrastructure/logger.js';
import { processConsentPdf, type IngestOutcome } from '../../services/ingest/index.js';
import { createIngestRuntime, parseInput, type IngestRuntime } from '../scripts/shared.js';

const log = logger.child({ module: 'trigger:process-consent' });

/**
 * Entry point for one object-created event. Throws `[CODE] message` when the
 * document could not be processed, so the event source can redeliver it.
 */
export async function main(raw: unknown, runtime?: IngestRuntime): Promise<IngestOutcome> {
  const event = parseInput(storageEventSchema, raw);
  const active = runtime ?? createIngestRuntime(loadConfig());

  try {
    log.info({ bucket: event.bucket, name: event.name }, 'Processing storage event');

    const result = await processConsentPdf(event, active.deps);
    if (!result.ok) {
      throw new Error(`[${result.error.code}] ${result.error.message}`);
    }

    return result.value;
  } finally {
    // Injected runtimes belong to the caller.
    if (!runtime) await active.close();
  }
}
