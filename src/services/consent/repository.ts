import { sql } from 'drizzle-orm';
import type { Database } from '../../infrastructure/db/client.js';
import { consents } from '../../infrastructure/db/schema.js';
import type { ConsentRecord, NewConsentRecord } from '../../domain/types.js';

export interface ConsentRepository {
  /** Insert or overwrite the record for `documentId`. */
  upsert(record: NewConsentRecord): Promise<ConsentRecord>;
}

function toConsentRecord(row: typeof consents.$inferSelect): ConsentRecord {
  return {
    documentId: row.documentId,
    filename: row.filename,
    aiAnalysisJson: row.aiAnalysisJson,
    fullText: row.fullText,
    processedAt: row.processedAt,
  };
}

export function createConsentRepository(db: Database): ConsentRepository {
  return {
    async upsert(record) {
      const rows = await db
        .insert(consents)
        .values(record)
        .onConflictDoUpdate({
          target: consents.documentId,
          set: {
            filename: record.filename,
            aiAnalysisJson: record.aiAnalysisJson,
            fullText: record.fullText,
            processedAt: sql`now()`,
          },
        })
        .returning();

      return toConsentRecord(rows[0]);
    },
  };
}
