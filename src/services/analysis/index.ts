import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { NOT_AVAILABLE } from '../../domain/types.js';
import { consentAnalysisSchema, type ConsentAnalysis } from '../../domain/schemas.js';
import type { LLMProvider } from '../../infrastructure/llm/types.js';
import { createIngestionLogger } from '../../infrastructure/logger.js';
import { CONSENT_ANALYSIS_PROMPT, buildConsentTextMessage } from './prompt.js';

export const FALLBACK_ANALYSIS: ConsentAnalysis = {
  summary: 'Consent form processed - AI analysis failed',
  entities: {
    patient_name: NOT_AVAILABLE,
    patient_email: NOT_AVAILABLE,
    date_of_birth: NOT_AVAILABLE,
    doctor_name: NOT_AVAILABLE,
    procedure: NOT_AVAILABLE,
    date: NOT_AVAILABLE,
  },
  consented_items: ['Analysis pending'],
  declined_items: [],
  patient_id: 'unknown',
};

export interface ConsentSummary {
  analysis: ConsentAnalysis;
  /** Text persisted as the record's analysis JSON. */
  analysisJson: string;
  usedFallback: boolean;
  /** Why the fallback was taken, when it was. */
  failure?: AppError;
}

export function stripCodeFences(content: string): string {
  return content.replaceAll('```json', '').replaceAll('```', '').trim();
}

export function parseConsentAnalysis(content: string): Result<ConsentAnalysis, AppError> {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (cause) {
    return err(
      createAppError(ErrorCode.LLM_MALFORMED_RESPONSE, 'Model response is not valid JSON', false, describeCause(cause)),
    );
  }

  const parsed = consentAnalysisSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return err(
      createAppError(ErrorCode.LLM_MALFORMED_RESPONSE, 'Model response does not match the consent analysis shape', false, details),
    );
  }
  return ok(parsed.data);
}

export function fallbackSummary(failure: AppError): ConsentSummary {
  return {
    analysis: FALLBACK_ANALYSIS,
    analysisJson: JSON.stringify(FALLBACK_ANALYSIS),
    usedFallback: true,
    failure,
  };
}

/**
 * Asks the model for the structured analysis of one consent form. Never fails:
 * a model error or an unusable answer yields {@link FALLBACK_ANALYSIS}.
 */
export async function summarizeConsent(
  llm: LLMProvider,
  fullText: string,
  documentId: string,
): Promise<ConsentSummary> {
  const log = createIngestionLogger(documentId).child({ step: 'analyzing' });

  const response = await llm.chat({
    systemPrompt: CONSENT_ANALYSIS_PROMPT,
    userMessage: buildConsentTextMessage(fullText),
    responseFormat: 'json',
    trace: { id: documentId, name: 'consent-analysis', metadata: { textLength: fullText.length } },
  });

  if (!response.ok) {
    log.warn({ errorCode: response.error.code, retryable: response.error.retryable }, 'Model call failed, using fallback analysis');
    return fallbackSummary(response.error);
  }

  const cleaned = stripCodeFences(response.value.content);
  const parsed = parseConsentAnalysis(cleaned);
  if (!parsed.ok) {
    log.warn({ errorCode: parsed.error.code, details: parsed.error.details }, 'Unusable model analysis, using fallback analysis');
    return fallbackSummary(parsed.error);
  }

  log.info(
    { consentedCount: parsed.value.consented_items.length, declinedCount: parsed.value.declined_items.length },
    'Consent analysis complete',
  );
  return { analysis: parsed.value, analysisJson: cleaned, usedFallback: false };
}
