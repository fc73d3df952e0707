import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import { ENTITY_FIELDS, NOT_AVAILABLE } from '../../domain/types.js';
import type { EntityIndexEntry, ExtractedEntities, NewEntityIndexEntry } from '../../domain/types.js';
import type { ConsentAnalysis } from '../../domain/schemas.js';
import type { EntityIndexRepository } from './repository.js';

export { createEntityIndexRepository, PREFIX_RANGE_END, type EntityIndexRepository } from './repository.js';

const log = logger.child({ module: 'entity-index' });

function isPresent(value: string): boolean {
  return value !== '' && value !== NOT_AVAILABLE;
}

export function buildEntityIndexEntry(documentId: string, analysis: ConsentAnalysis): NewEntityIndexEntry {
  const entities: ExtractedEntities = {};
  const searchTerms: string[] = [];

  for (const field of ENTITY_FIELDS) {
    const value = analysis.entities[field];
    if (!isPresent(value)) continue;
    entities[field] = value;
    searchTerms.push(`${field}:${value}`, value.toLowerCase());
  }

  const email = analysis.entities.patient_email;

  return {
    documentId,
    entities,
    searchTerms,
    patientName: analysis.entities.patient_name,
    patientId: analysis.patient_id,
    patientEmail: email === NOT_AVAILABLE ? NOT_AVAILABLE : email.toLowerCase(),
    consentedItems: analysis.consented_items,
    declinedItems: analysis.declined_items,
    summary: analysis.summary,
  };
}

function dbError(message: string, cause: unknown, ctx: Record<string, unknown>): Result<never, AppError> {
  const details = describeCause(cause);
  log.error({ ...ctx, errorCode: ErrorCode.DB_CONNECTION_ERROR, retryable: true, details }, message);
  return err(createAppError(ErrorCode.DB_CONNECTION_ERROR, message, true, details));
}

export async function saveEntityIndexEntry(
  repo: EntityIndexRepository,
  entry: NewEntityIndexEntry,
): Promise<Result<EntityIndexEntry, AppError>> {
  try {
    const saved = await repo.upsert(entry);
    log.info({ documentId: entry.documentId, patientId: entry.patientId, step: 'indexing' }, 'Entity index entry saved');
    return ok(saved);
  } catch (cause) {
    return dbError('Failed to save entity index entry', cause, { documentId: entry.documentId, step: 'indexing' });
  }
}

/** Entries whose patient email equals `email` exactly, newest first. */
export async function findPatientDocuments(
  repo: EntityIndexRepository,
  email: string,
): Promise<Result<EntityIndexEntry[], AppError>> {
  try {
    return ok(await repo.findByPatientEmail(email));
  } catch (cause) {
    return dbError('Failed to search patient documents', cause, {});
  }
}

/**
 * Exact patient name, then search-term membership of the lowercased entity,
 * then patient name prefix; the first strategy with a hit wins.
 */
export async function resolveDocumentForEntity(
  repo: EntityIndexRepository,
  entity: string,
): Promise<Result<EntityIndexEntry | null, AppError>> {
  try {
    const entry =
      (await repo.findByPatientName(entity)) ??
      (await repo.findBySearchTerm(entity.toLowerCase())) ??
      (await repo.findByPatientNamePrefix(entity));

    log.debug({ entity, documentId: entry?.documentId }, 'Entity resolution finished');
    return ok(entry);
  } catch (cause) {
    return dbError('Failed to resolve entity', cause, { entity });
  }
}

export async function findMostRecentDocument(
  repo: EntityIndexRepository,
): Promise<Result<EntityIndexEntry | null, AppError>> {
  try {
    return ok(await repo.findMostRecent());
  } catch (cause) {
    return dbError('Failed to fetch most recent document', cause, {});
  }
}
