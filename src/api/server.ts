import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig, type AppConfig } from '../infrastructure/config.js';
import { logger } from '../infrastructure/logger.js';
import { describeCause } from '../domain/errors.js';
import { InMemorySessionStore } from '../services/session/index.js';
import { processConsentPdf } from '../services/ingest/index.js';
import { createIngestRuntime, type IngestRuntime } from '../workflows/scripts/shared.js';
import type { AppDeps } from './deps.js';

const log = logger.child({ module: 'server' });

function buildDeps(config: AppConfig, runtime: IngestRuntime): AppDeps {
  const { deps } = runtime;
  return {
    settings: {
      consentBucket: config.CONSENT_BUCKET,
      uploadMaxBytes: config.UPLOAD_MAX_BYTES,
      corsOrigins: config.CORS_ORIGINS,
      askEndpointEnabled: config.ASK_ENDPOINT_ENABLED,
    },
    sessions: new InMemorySessionStore({ ttlMs: config.SESSION_TTL_MS }),
    patients: deps.patients,
    hasher: deps.hasher,
    entityIndex: deps.entityIndex,
    llm: deps.llm,
    blobs: deps.blobs,
  };
}

async function main(): Promise<void> {
  const config = loadConfig();
  const runtime = createIngestRuntime(config);

  if (config.INGEST_ON_UPLOAD) {
    runtime.deps.blobs.onObjectCreated((event) => {
      processConsentPdf(event, runtime.deps)
        .then((result) => {
          if (!result.ok) {
            log.error({ ...event, errorCode: result.error.code, retryable: result.error.retryable }, 'Background ingestion failed');
          }
        })
        .catch((cause: unknown) => {
          log.error({ ...event, details: describeCause(cause) }, 'Background ingestion crashed');
        });
    });
    log.info('Uploads are ingested in the background');
  }

  if (config.ASK_ENDPOINT_ENABLED) {
    log.warn('POST /ask is enabled and answers without an identity check');
  }

  const app = createApp(buildDeps(config, runtime));

  const server = app.listen(config.PORT, () => {
    log.info({ port: config.PORT }, 'Consent query API started');
  });

  const shutdown = (signal: string) => {
    log.info({ signal }, 'Shutting down');
    server.close(() => {
      runtime
        .close()
        .catch((cause: unknown) => log.warn({ details: describeCause(cause) }, 'Failed to flush traces'))
        .finally(() => process.exit(0));
    });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
  process.exit(1);
});
