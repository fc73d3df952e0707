import 'dotenv/config';
import { main } from '../src/workflows/triggers/process-consent.js';
import { logger } from '../src/infrastructure/logger.js';

const [bucket, name] = process.argv.slice(2);

main({ bucket, name })
  .then((outcome) => {
    logger.info({ outcome: outcome.status }, 'Ingestion finished');
  })
  .catch((error: unknown) => {
    logger.error({ error: error instanceof Error ? error.message : String(error) }, 'Ingestion failed');
    process.exit(1);
  });
