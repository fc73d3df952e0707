export const ENTITY_FIELDS = [
  'patient_name',
  'patient_email',
  'date_of_birth',
  'doctor_name',
  'procedure',
  'date',
] as const;

export type EntityField = (typeof ENTITY_FIELDS)[number];

export const NOT_AVAILABLE = 'N/A';

export const PDF_EXTENSION = '.pdf';

export type ConsentEntities = Record<EntityField, string>;

/** Entity values that were actually found in the form; "N/A" fields are left out. */
export type ExtractedEntities = Partial<Record<EntityField, string>>;

export interface StorageEvent {
  bucket: string;
  name: string;
}

export interface ConsentRecord {
  documentId: string;
  filename: string;
  aiAnalysisJson: string;
  fullText: string;
  processedAt: Date;
}

export type NewConsentRecord = Omit<ConsentRecord, 'processedAt'>;

export interface EntityIndexEntry {
  documentId: string;
  entities: ExtractedEntities;
  searchTerms: string[];
  patientName: string;
  patientId: string;
  patientEmail: string;
  consentedItems: string[];
  declinedItems: string[];
  summary: string;
  processedAt: Date;
}

export type NewEntityIndexEntry = Omit<EntityIndexEntry, 'processedAt'>;

export interface PatientAccount {
  id: string;
  email: string;
  passwordHash: string | null;
  patientName: string | null;
  dateOfBirth: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewPatientAccount = Omit<PatientAccount, 'createdAt' | 'updatedAt'>;

export interface Session {
  token: string;
  email: string;
  patientName: string;
  createdAt: Date;
  expiresAt: Date;
}

export function hasPdfExtension(objectName: string): boolean {
  return objectName.toLowerCase().endsWith(PDF_EXTENSION);
}

export function documentIdFromFilename(filename: string): string {
  return filename.replace(/\.pdf$/i, '');
}
