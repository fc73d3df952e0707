import type { BlobStore } from '../infrastructure/blob-store.js';
import type { LLMProvider } from '../infrastructure/llm/types.js';
import type { EntityIndexRepository } from '../services/entity-index/index.js';
import type { PasswordHasher, PatientRepository } from '../services/patient/index.js';
import type { SessionStore } from '../services/session/index.js';

export interface ApiSettings {
  consentBucket: string;
  uploadMaxBytes: number;
  corsOrigins: string[];
  askEndpointEnabled: boolean;
}

export interface AppDeps {
  settings: ApiSettings;
  sessions: SessionStore;
  patients: PatientRepository;
  hasher: PasswordHasher;
  entityIndex: EntityIndexRepository;
  llm: LLMProvider;
  blobs: BlobStore;
}
