import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import type { ConsentRecord, NewConsentRecord } from '../../domain/types.js';
import type { ConsentRepository } from './repository.js';

export { createConsentRepository, type ConsentRepository } from './repository.js';

const log = logger.child({ module: 'consent' });

export async function saveConsentRecord(
  repo: ConsentRepository,
  record: NewConsentRecord,
): Promise<Result<ConsentRecord, AppError>> {
  try {
    const saved = await repo.upsert(record);
    log.info({ documentId: record.documentId, step: 'saving_consent' }, 'Consent record saved');
    return ok(saved);
  } catch (cause) {
    const details = describeCause(cause);
    log.error(
      { documentId: record.documentId, step: 'saving_consent', errorCode: ErrorCode.DB_CONNECTION_ERROR, retryable: true, details },
      'Failed to save consent record',
    );
    return err(createAppError(ErrorCode.DB_CONNECTION_ERROR, 'Failed to save consent record', true, details));
  }
}
