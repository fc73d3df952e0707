import { randomUUID } from 'node:crypto';
import { ok, type Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { LLMProvider } from '../../infrastructure/llm/types.js';
import { logger } from '../../infrastructure/logger.js';
import { findPatientDocuments, type EntityIndexRepository } from '../entity-index/index.js';
import {
  MAX_CONTEXT_DOCUMENTS,
  PATIENT_QUERY_PROMPT,
  buildConsentContext,
  buildPatientQueryMessage,
} from './context.js';
import { keywordFallbackAnswer } from './fallback.js';

export { buildConsentContext, keywordFallbackAnswer, MAX_CONTEXT_DOCUMENTS };

export const NO_FORMS_ANSWER =
  "I don't have any consent forms on file for you. Please contact your healthcare provider.";

export interface QueryServiceDeps {
  entityIndex: EntityIndexRepository;
  llm: LLMProvider;
}

export interface PatientQueryAnswer {
  query: string;
  answer: string;
  /** Document ids of every matching form. */
  sources: string[];
  answeredBy: 'model' | 'fallback' | 'none';
}

const log = logger.child({ module: 'query' });

/** Answers from the forms indexed under `email` only. */
export async function answerPatientQuery(
  deps: QueryServiceDeps,
  email: string,
  query: string,
): Promise<Result<PatientQueryAnswer, AppError>> {
  const documents = await findPatientDocuments(deps.entityIndex, email);
  if (!documents.ok) return documents;

  const entries = documents.value;
  if (entries.length === 0) {
    log.info('No consent forms on file for patient');
    return ok({ query, answer: NO_FORMS_ANSWER, sources: [], answeredBy: 'none' });
  }

  const sources = entries.map((entry) => entry.documentId);
  const context = buildConsentContext(entries);

  const response = await deps.llm.chat({
    systemPrompt: PATIENT_QUERY_PROMPT,
    userMessage: buildPatientQueryMessage(query, context),
    responseFormat: 'text',
    temperature: 0.2,
    trace: {
      id: randomUUID(),
      name: 'patient-query',
      metadata: { documentIds: sources.slice(0, MAX_CONTEXT_DOCUMENTS) },
    },
  });

  if (!response.ok) {
    log.warn({ errorCode: response.error.code, retryable: response.error.retryable }, 'Model unavailable, answering by keywords');
    return ok({ query, answer: keywordFallbackAnswer(query, entries), sources, answeredBy: 'fallback' });
  }

  log.info({ documentCount: entries.length }, 'Patient query answered');
  return ok({ query, answer: response.value.content.trim(), sources, answeredBy: 'model' });
}
