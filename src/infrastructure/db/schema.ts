import { pgTable, text, timestamp, jsonb, uniqueIndex, index } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import type { ExtractedEntities } from '../../domain/types.js';

export const consents = pgTable('consents', {
  documentId: text('document_id').primaryKey(),
  filename: text('filename').notNull(),
  aiAnalysisJson: text('ai_analysis_json').notNull(),
  fullText: text('full_text').notNull(),
  processedAt: timestamp('processed_timestamp', { withTimezone: true }).notNull().defaultNow(),
});

export const entityIndex = pgTable(
  'entity_index',
  {
    documentId: text('document_id').primaryKey(),
    entities: jsonb('entities').$type<ExtractedEntities>().notNull().default({}),
    searchTerms: text('search_terms').array().notNull().default(sql`'{}'::text[]`),
    patientName: text('patient_name').notNull().default('N/A'),
    patientId: text('patient_id').notNull().default('unknown'),
    patientEmail: text('patient_email').notNull().default('N/A'),
    consentedItems: text('consented_items').array().notNull().default(sql`'{}'::text[]`),
    declinedItems: text('declined_items').array().notNull().default(sql`'{}'::text[]`),
    summary: text('summary').notNull().default(''),
    processedAt: timestamp('processed_timestamp', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_entity_index_patient_email').on(table.patientEmail),
    index('idx_entity_index_patient_name').on(table.patientName),
    index('idx_entity_index_search_terms').using('gin', table.searchTerms),
    index('idx_entity_index_processed').on(table.processedAt),
  ],
);

export const patients = pgTable(
  'patients',
  {
    id: text('id').primaryKey(),
    email: text('email').notNull(),
    passwordHash: text('password_hash'),
    patientName: text('patient_name'),
    dateOfBirth: text('date_of_birth'),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [uniqueIndex('idx_patients_email').on(table.email)],
);
