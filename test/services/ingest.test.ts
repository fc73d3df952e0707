import { describe, it, expect } from 'vitest';
import { ok, err } from '../../src/domain/result.js';
import { createAppError } from '../../src/domain/errors.js';
import type { OcrEngine } from '../../src/infrastructure/ocr/types.js';
import { FALLBACK_ANALYSIS } from '../../src/services/analysis/index.js';
import { collectOcrText, processConsentPdf, type IngestDeps } from '../../src/services/ingest/index.js';
import {
  InMemoryBlobStore,
  InMemoryConsentRepository,
  InMemoryEntityIndexRepository,
  InMemoryPatientRepository,
  StubOcrEngine,
  createScriptedLlm,
  llmResponse,
  plainHasher,
} from '../helpers/in-memory.js';

const BUCKET = 'consents';
const event = { bucket: BUCKET, name: 'consent-42.pdf' };

const analysis = {
  summary: 'Consent for knee arthroscopy.',
  entities: {
    patient_name: 'Jane Roe',
    patient_email: 'Jane@Example.com',
    date_of_birth: '1990-02-03',
    doctor_name: 'Dr. Lee',
    procedure: 'Knee arthroscopy',
    date: '2024-05-01',
  },
  consented_items: ['anesthesia'],
  declined_items: ['blood transfusion'],
  patient_id: 'jane@example.com',
};

const modelAnswer = ok(llmResponse('```json\n' + JSON.stringify(analysis) + '\n```'));

function setup(options: { pages?: Array<string | null>; replies?: Parameters<typeof createScriptedLlm> } = {}) {
  const blobs = new InMemoryBlobStore();
  const ocr = new StubOcrEngine(blobs, options.pages ?? ['CONSENT FORM\n', 'I decline a blood transfusion.\n']);
  const llm = createScriptedLlm(...(options.replies ?? [modelAnswer]));
  const consents = new InMemoryConsentRepository();
  const entityIndex = new InMemoryEntityIndexRepository();
  const patients = new InMemoryPatientRepository();
  const deps: IngestDeps = {
    blobs,
    ocr,
    llm,
    consents,
    entityIndex,
    patients,
    hasher: plainHasher,
    ocrTimeoutMs: 1000,
  };
  return { deps, blobs, ocr, llm, consents, entityIndex, patients };
}

describe('processConsentPdf', () => {
  it('ignores objects that are not PDFs', async () => {
    const { deps, ocr, llm, consents } = setup();

    const result = await processConsentPdf({ bucket: BUCKET, name: 'notes.txt' }, deps);

    expect(result).toEqual({ ok: true, value: { status: 'skipped', reason: 'not_pdf', name: 'notes.txt' } });
    expect(ocr.requests).toHaveLength(0);
    expect(llm.chat).not.toHaveBeenCalled();
    expect(consents.records.size).toBe(0);
  });

  it('stores the analysis, indexes it, provisions the account and cleans up', async () => {
    const { deps, blobs, ocr, consents, entityIndex, patients } = setup();
    await blobs.put(BUCKET, 'consent-42.pdf', '%PDF-1.4');

    const result = await processConsentPdf(event, deps);

    expect(result.ok).toBe(true);
    if (!result.ok || result.value.status !== 'processed') throw new Error('expected a processed outcome');
    const outcome = result.value;

    expect(ocr.requests[0]?.destination).toEqual({ bucket: BUCKET, prefix: 'consent-42.pdf-ocr-output/' });
    expect(outcome.documentId).toBe('consent-42');
    expect(outcome.pageCount).toBe(2);
    expect(outcome.textFound).toBe(true);
    expect(outcome.usedFallbackAnalysis).toBe(false);
    expect(outcome.cleanup).toEqual({ deleted: 2, failed: 0 });

    const record = consents.records.get('consent-42');
    expect(record?.filename).toBe('consent-42.pdf');
    expect(record?.fullText).toBe('CONSENT FORM\nI decline a blood transfusion.\n');
    expect(record?.aiAnalysisJson).toBe(JSON.stringify(analysis));

    const indexed = entityIndex.entries.get('consent-42');
    expect(indexed?.patientEmail).toBe('jane@example.com');
    expect(indexed?.declinedItems).toEqual(['blood transfusion']);
    expect(outcome.entityIndex.ok).toBe(true);

    expect(outcome.account).toEqual({ ok: true, value: expect.objectContaining({ action: 'created' }) });
    expect((await patients.findByEmail('jane@example.com'))?.passwordHash).toBe('hashed:jane123!');

    expect(blobs.names(BUCKET)).toEqual(['consent-42.pdf']);
  });

  it('stores the fallback analysis when the model fails and still cleans up', async () => {
    const { deps, blobs, consents, entityIndex, patients } = setup({
      replies: [err(createAppError('LLM_API_ERROR', 'Groq API call failed', true))],
    });

    const result = await processConsentPdf(event, deps);

    expect(result.ok && result.value.status === 'processed' && result.value.usedFallbackAnalysis).toBe(true);
    expect(consents.records.get('consent-42')?.aiAnalysisJson).toBe(JSON.stringify(FALLBACK_ANALYSIS));
    expect(entityIndex.entries.get('consent-42')?.consentedItems).toEqual(['Analysis pending']);
    expect(entityIndex.entries.get('consent-42')?.searchTerms).toEqual([]);
    expect(patients.accounts.size).toBe(0);
    expect(blobs.names(BUCKET)).toEqual([]);
  });

  it('treats pages without a text annotation as empty', async () => {
    const { deps, consents } = setup({ pages: ['first\n', null, 'third\n'] });

    await processConsentPdf(event, deps);

    expect(consents.records.get('consent-42')?.fullText).toBe('first\nthird\n');
  });

  it('skips the model and reports OCR_NO_TEXT when no page has text', async () => {
    const { deps, blobs, llm, consents, patients } = setup({ pages: [null, '  \n'] });

    const result = await processConsentPdf(event, deps);

    expect(llm.chat).not.toHaveBeenCalled();
    if (!result.ok || result.value.status !== 'processed') throw new Error('expected a processed outcome');
    expect(result.value.textFound).toBe(false);
    expect(result.value.usedFallbackAnalysis).toBe(true);
    expect(result.value.textLength).toBe(3);
    expect(consents.records.get('consent-42')?.aiAnalysisJson).toBe(JSON.stringify(FALLBACK_ANALYSIS));
    expect(patients.accounts.size).toBe(0);
    expect(blobs.names(BUCKET)).toEqual([]);
  });

  it('stops before indexing when the consent record cannot be saved', async () => {
    const { deps, blobs, consents, entityIndex, patients } = setup();
    consents.upsert = async () => {
      throw new Error('connection reset');
    };

    const result = await processConsentPdf(event, deps);

    expect(!result.ok && result.error.code).toBe('DB_CONNECTION_ERROR');
    expect(entityIndex.entries.size).toBe(0);
    expect(patients.accounts.size).toBe(0);
    expect(blobs.names(BUCKET)).toHaveLength(2);
  });

  it('reports an entity index failure without aborting', async () => {
    const { deps, blobs, entityIndex, patients } = setup();
    entityIndex.upsert = async () => {
      throw new Error('connection reset');
    };

    const result = await processConsentPdf(event, deps);

    expect(result.ok).toBe(true);
    if (!result.ok || result.value.status !== 'processed') throw new Error('expected a processed outcome');
    expect(!result.value.entityIndex.ok && result.value.entityIndex.error.code).toBe('DB_CONNECTION_ERROR');
    expect(patients.accounts.size).toBe(1);
    expect(blobs.names(BUCKET)).toEqual([]);
  });

  it('reports an account failure without aborting', async () => {
    const { deps, blobs, patients } = setup();
    patients.insert = async () => {
      throw new Error('connection reset');
    };

    const result = await processConsentPdf(event, deps);

    expect(result.ok && result.value.status === 'processed' && result.value.account.ok).toBe(false);
    expect(blobs.names(BUCKET)).toEqual([]);
  });

  it('overwrites the same document on re-ingestion', async () => {
    const { deps, consents, entityIndex, patients } = setup({ replies: [modelAnswer, modelAnswer] });

    await processConsentPdf(event, deps);
    await processConsentPdf(event, deps);

    expect(consents.records.size).toBe(1);
    expect(entityIndex.entries.size).toBe(1);
    expect(patients.accounts.size).toBe(1);
  });

  it('keeps a password the patient already set', async () => {
    const { deps, patients } = setup();
    await patients.insert({
      id: 'acc-1',
      email: 'jane@example.com',
      passwordHash: 'hashed:test-secret',
      patientName: 'Jane',
      dateOfBirth: null,
    });

    const result = await processConsentPdf(event, deps);

    expect(result.ok && result.value.status === 'processed' && result.value.account).toEqual({
      ok: true,
      value: { action: 'updated', accountId: 'acc-1', passwordSet: false },
    });
    const account = await patients.findByEmail('jane@example.com');
    expect(account?.passwordHash).toBe('hashed:test-secret');
    expect(account?.patientName).toBe('Jane Roe');
  });

  it('fails with OCR_TIMEOUT when OCR does not finish in time', async () => {
    const { deps, llm } = setup();
    const stalled: OcrEngine = { annotate: () => new Promise(() => undefined) };

    const result = await processConsentPdf(event, { ...deps, ocr: stalled, ocrTimeoutMs: 10 });

    expect(!result.ok && result.error.code).toBe('OCR_TIMEOUT');
    expect(llm.chat).not.toHaveBeenCalled();
  });

  it('fails when the OCR engine fails', async () => {
    const { deps, consents } = setup();
    const broken: OcrEngine = {
      annotate: async () => err(createAppError('PDF_PARSE_FAILED', 'Failed to parse PDF document', false)),
    };

    const result = await processConsentPdf(event, { ...deps, ocr: broken });

    expect(!result.ok && result.error.code).toBe('PDF_PARSE_FAILED');
    expect(consents.records.size).toBe(0);
  });
});

describe('collectOcrText', () => {
  it('reads only .json blobs under the prefix, in listing order', async () => {
    const blobs = new InMemoryBlobStore();
    const page = (text: string) => JSON.stringify({ responses: [{ fullTextAnnotation: { text } }] });
    await blobs.put(BUCKET, 'a.pdf-ocr-output/output-0003-to-0003.json', page('three'));
    await blobs.put(BUCKET, 'a.pdf-ocr-output/output-0001-to-0002.json', page('one'));
    await blobs.put(BUCKET, 'a.pdf-ocr-output/manifest.txt', 'ignored');

    const result = await collectOcrText(blobs, BUCKET, 'a.pdf-ocr-output/');

    expect(result).toEqual({
      ok: true,
      value: {
        text: 'onethree',
        blobNames: ['a.pdf-ocr-output/output-0001-to-0002.json', 'a.pdf-ocr-output/output-0003-to-0003.json'],
      },
    });
  });

  it('rejects a result blob that is not JSON', async () => {
    const blobs = new InMemoryBlobStore();
    await blobs.put(BUCKET, 'a.pdf-ocr-output/output-0001-to-0001.json', 'garbage');

    const result = await collectOcrText(blobs, BUCKET, 'a.pdf-ocr-output/');

    expect(!result.ok && result.error.code).toBe('OCR_OUTPUT_INVALID');
  });
});
