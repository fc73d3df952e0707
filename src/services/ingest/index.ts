import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { documentIdFromFilename, hasPdfExtension, NOT_AVAILABLE, type StorageEvent } from '../../domain/types.js';
import { ocrResultDocumentSchema } from '../../domain/schemas.js';
import { createIngestionLogger, logger } from '../../infrastructure/logger.js';
import type { BlobStore } from '../../infrastructure/blob-store.js';
import type { OcrAnnotateRequest, OcrAnnotation, OcrEngine } from '../../infrastructure/ocr/types.js';
import { fallbackSummary, summarizeConsent, type ConsentSummary } from '../analysis/index.js';
import { saveConsentRecord } from '../consent/index.js';
import { buildEntityIndexEntry, saveEntityIndexEntry } from '../entity-index/index.js';
import { provisionPatientAccount, type ProvisionedAccount } from '../patient/index.js';
import type { CleanupReport, IngestDeps, IngestOutcome } from './types.js';

export type { IngestDeps, IngestOutcome, ProcessedIngest, SkippedIngest, CleanupReport } from './types.js';

export const DEFAULT_OCR_TIMEOUT_MS = 420_000;

export function ocrOutputPrefix(objectName: string): string {
  return `${objectName}-ocr-output/`;
}

export async function annotateWithTimeout(
  ocr: OcrEngine,
  request: Omit<OcrAnnotateRequest, 'signal'>,
  timeoutMs: number,
): Promise<Result<OcrAnnotation, AppError>> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timedOut = new Promise<Result<never, AppError>>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(err(createAppError(ErrorCode.OCR_TIMEOUT, `OCR did not finish within ${timeoutMs} ms`, true)));
    }, timeoutMs);
  });

  try {
    return await Promise.race([ocr.annotate({ ...request, signal: controller.signal }), timedOut]);
  } catch (cause) {
    return err(createAppError(ErrorCode.OCR_FAILED, 'OCR operation failed', true, describeCause(cause)));
  } finally {
    clearTimeout(timer);
  }
}

/** Reads every `.json` result blob under `prefix` and joins the page texts in listing order. */
export async function collectOcrText(
  blobs: BlobStore,
  bucket: string,
  prefix: string,
): Promise<Result<{ text: string; blobNames: string[] }, AppError>> {
  const listed = await blobs.list(bucket, prefix);
  if (!listed.ok) return listed;

  const blobNames = listed.value.filter((name) => name.includes('.json'));
  let text = '';

  for (const name of blobNames) {
    const data = await blobs.read(bucket, name);
    if (!data.ok) return data;

    let raw: unknown;
    try {
      raw = JSON.parse(data.value.toString('utf8'));
    } catch (cause) {
      return err(createAppError(ErrorCode.OCR_OUTPUT_INVALID, `OCR output ${name} is not valid JSON`, false, describeCause(cause)));
    }

    const parsed = ocrResultDocumentSchema.safeParse(raw);
    if (!parsed.success) {
      return err(createAppError(ErrorCode.OCR_OUTPUT_INVALID, `OCR output ${name} has an unexpected shape`, false, parsed.error.message));
    }

    for (const response of parsed.data.responses) {
      text += response.fullTextAnnotation?.text ?? '';
    }
  }

  return ok({ text, blobNames });
}

async function deleteOcrOutputs(blobs: BlobStore, bucket: string, names: string[]): Promise<CleanupReport> {
  const report: CleanupReport = { deleted: 0, failed: 0 };
  for (const name of names) {
    const deleted = await blobs.delete(bucket, name);
    if (deleted.ok) report.deleted++;
    else report.failed++;
  }
  return report;
}

/**
 * Runs one storage event through OCR, analysis and persistence. Errors up to
 * and including the consent record write are returned; the entity index and
 * account writes are reported in the outcome instead.
 */
export async function processConsentPdf(
  event: StorageEvent,
  deps: IngestDeps,
): Promise<Result<IngestOutcome, AppError>> {
  const { bucket, name } = event;

  if (!hasPdfExtension(name)) {
    logger.info({ bucket, name, step: 'filtering' }, 'Ignoring object that is not a PDF');
    return ok({ status: 'skipped', reason: 'not_pdf', name });
  }

  const documentId = documentIdFromFilename(name);
  const log = createIngestionLogger(documentId, bucket);
  const prefix = ocrOutputPrefix(name);

  log.info({ step: 'ocr', timeoutMs: deps.ocrTimeoutMs }, 'Waiting for OCR to complete');
  const annotation = await annotateWithTimeout(
    deps.ocr,
    { source: { bucket, name }, destination: { bucket, prefix } },
    deps.ocrTimeoutMs,
  );
  if (!annotation.ok) {
    log.error({ step: 'ocr', errorCode: annotation.error.code, retryable: annotation.error.retryable, details: annotation.error.details }, 'OCR failed');
    return annotation;
  }

  const collected = await collectOcrText(deps.blobs, bucket, prefix);
  if (!collected.ok) {
    log.error({ step: 'reading_ocr', errorCode: collected.error.code, retryable: collected.error.retryable }, 'Failed to read OCR output');
    return collected;
  }
  const { text: fullText, blobNames } = collected.value;
  log.info({ step: 'reading_ocr', blobCount: blobNames.length, textLength: fullText.length }, 'Extracted text from OCR output');

  const textFound = fullText.trim() !== '';
  let summary: ConsentSummary;
  if (textFound) {
    summary = await summarizeConsent(deps.llm, fullText, documentId);
  } else {
    const failure = createAppError(ErrorCode.OCR_NO_TEXT, 'No text was recognized in the document', false);
    log.warn({ step: 'analyzing', errorCode: failure.code, retryable: false, pageCount: annotation.value.pageCount }, 'No text recognized, storing fallback analysis');
    summary = fallbackSummary(failure);
  }

  const saved = await saveConsentRecord(deps.consents, {
    documentId,
    filename: name,
    aiAnalysisJson: summary.analysisJson,
    fullText,
  });
  if (!saved.ok) return saved;

  const entityIndex = await saveEntityIndexEntry(deps.entityIndex, buildEntityIndexEntry(documentId, summary.analysis));
  if (!entityIndex.ok) {
    log.warn({ step: 'indexing', errorCode: entityIndex.error.code }, 'Entity index not updated, continuing');
  }

  const email = summary.analysis.entities.patient_email.toLowerCase();
  let account: Result<ProvisionedAccount | null, AppError> = ok(null);
  if (email !== '' && email !== NOT_AVAILABLE.toLowerCase()) {
    account = await provisionPatientAccount(deps, email, summary.analysis.entities.patient_name);
    if (!account.ok) {
      log.warn({ step: 'provisioning_account', errorCode: account.error.code }, 'Patient account not provisioned, continuing');
    }
  } else {
    log.info({ step: 'provisioning_account' }, 'No patient email on form, skipping account provisioning');
  }

  const cleanup = await deleteOcrOutputs(deps.blobs, bucket, blobNames);
  log.info({ step: 'cleanup', ...cleanup }, 'Cleaned up OCR output');

  return ok({
    status: 'processed',
    documentId,
    pageCount: annotation.value.pageCount,
    textLength: fullText.length,
    textFound,
    usedFallbackAnalysis: summary.usedFallback,
    entityIndex,
    account,
    cleanup,
  });
}
