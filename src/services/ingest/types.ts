import type { Result } from '../../domain/result.js';
import type { AppError } from '../../domain/errors.js';
import type { EntityIndexEntry } from '../../domain/types.js';
import type { BlobStore } from '../../infrastructure/blob-store.js';
import type { OcrEngine } from '../../infrastructure/ocr/types.js';
import type { LLMProvider } from '../../infrastructure/llm/types.js';
import type { ConsentRepository } from '../consent/index.js';
import type { EntityIndexRepository } from '../entity-index/index.js';
import type { PasswordHasher, PatientRepository, ProvisionedAccount } from '../patient/index.js';

export interface IngestDeps {
  blobs: BlobStore;
  ocr: OcrEngine;
  llm: LLMProvider;
  consents: ConsentRepository;
  entityIndex: EntityIndexRepository;
  patients: PatientRepository;
  hasher: PasswordHasher;
  ocrTimeoutMs: number;
}

export interface CleanupReport {
  deleted: number;
  failed: number;
}

export interface SkippedIngest {
  status: 'skipped';
  reason: 'not_pdf';
  name: string;
}

export interface ProcessedIngest {
  status: 'processed';
  documentId: string;
  pageCount: number;
  textLength: number;
  /** False when OCR recognized nothing and the model was not asked. */
  textFound: boolean;
  usedFallbackAnalysis: boolean;
  entityIndex: Result<EntityIndexEntry, AppError>;
  /** `null` value when the form names no patient email. */
  account: Result<ProvisionedAccount | null, AppError>;
  cleanup: CleanupReport;
}

export type IngestOutcome = SkippedIngest | ProcessedIngest;
