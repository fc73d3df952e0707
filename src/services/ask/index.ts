import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import type { EntityIndexEntry } from '../../domain/types.js';
import {
  findMostRecentDocument,
  resolveDocumentForEntity,
  type EntityIndexRepository,
} from '../entity-index/index.js';
import { extractKeyEntity } from './entity-extraction.js';

export { extractKeyEntity, ENTITY_PATTERNS } from './entity-extraction.js';

export interface AskAnswer {
  answer: string;
  documentId: string;
  entity: string | null;
}

const log = logger.child({ module: 'ask' });

export function contextualAnswer(question: string, entry: EntityIndexEntry): string {
  const lowered = question.toLowerCase();
  const { documentId } = entry;

  if (lowered.includes('decline')) {
    return entry.declinedItems.length > 0
      ? `Based on ${documentId}, the following items were declined: ${entry.declinedItems.join(', ')}`
      : `Based on ${documentId}, no items were declined.`;
  }

  if (lowered.includes('consent') || lowered.includes('agree')) {
    return entry.consentedItems.length > 0
      ? `Based on ${documentId}, the following items were consented to: ${entry.consentedItems.join(', ')}`
      : `Based on ${documentId}, no specific consent items were found.`;
  }

  return `Based on ${documentId}: ${entry.summary || 'No summary available.'}`;
}

/**
 * Resolves a free-text question to one indexed form and answers by keywords.
 * Performs no identity check: any indexed form can be returned.
 */
export async function askQuestion(
  entityIndex: EntityIndexRepository,
  question: string,
): Promise<Result<AskAnswer, AppError>> {
  const entity = extractKeyEntity(question);

  const resolved = entity
    ? await resolveDocumentForEntity(entityIndex, entity)
    : await findMostRecentDocument(entityIndex);
  if (!resolved.ok) return resolved;

  const entry = resolved.value;
  if (!entry) {
    log.info({ entity, errorCode: ErrorCode.DOCUMENT_NOT_FOUND }, 'No consent form matched question');
    return err(createAppError(ErrorCode.DOCUMENT_NOT_FOUND, 'No consent form found', false));
  }

  log.info({ entity, documentId: entry.documentId }, 'Question resolved to consent form');
  return ok({ answer: contextualAnswer(question, entry), documentId: entry.documentId, entity });
}
