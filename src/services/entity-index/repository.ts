import { and, arrayContains, desc, eq, sql } from 'drizzle-orm';
import type { Database } from '../../infrastructure/db/client.js';
import { entityIndex } from '../../infrastructure/db/schema.js';
import type { EntityIndexEntry, NewEntityIndexEntry } from '../../domain/types.js';

/** Upper bound of a prefix range: a private-use code point sorting after ordinary text. */
export const PREFIX_RANGE_END = '\uf8ff';

export interface EntityIndexRepository {
  upsert(entry: NewEntityIndexEntry): Promise<EntityIndexEntry>;
  /** Newest first. */
  findByPatientEmail(email: string): Promise<EntityIndexEntry[]>;
  findByPatientName(name: string): Promise<EntityIndexEntry | null>;
  findBySearchTerm(term: string): Promise<EntityIndexEntry | null>;
  /** First entry, by patient name, within `[prefix, prefix + PREFIX_RANGE_END]`. */
  findByPatientNamePrefix(prefix: string): Promise<EntityIndexEntry | null>;
  findMostRecent(): Promise<EntityIndexEntry | null>;
}

function toEntityIndexEntry(row: typeof entityIndex.$inferSelect): EntityIndexEntry {
  return {
    documentId: row.documentId,
    entities: row.entities,
    searchTerms: row.searchTerms,
    patientName: row.patientName,
    patientId: row.patientId,
    patientEmail: row.patientEmail,
    consentedItems: row.consentedItems,
    declinedItems: row.declinedItems,
    summary: row.summary,
    processedAt: row.processedAt,
  };
}

function first(rows: Array<typeof entityIndex.$inferSelect>): EntityIndexEntry | null {
  return rows.length > 0 ? toEntityIndexEntry(rows[0]) : null;
}

// Code-point ordering, independent of the database's default collation.
const patientNameBytes = sql`${entityIndex.patientName} COLLATE "C"`;

export function createEntityIndexRepository(db: Database): EntityIndexRepository {
  return {
    async upsert(entry) {
      const { documentId, ...fields } = entry;
      const rows = await db
        .insert(entityIndex)
        .values(entry)
        .onConflictDoUpdate({
          target: entityIndex.documentId,
          set: { ...fields, processedAt: sql`now()` },
        })
        .returning();

      return toEntityIndexEntry(rows[0]);
    },

    async findByPatientEmail(email) {
      const rows = await db
        .select()
        .from(entityIndex)
        .where(eq(entityIndex.patientEmail, email))
        .orderBy(desc(entityIndex.processedAt));

      return rows.map(toEntityIndexEntry);
    },

    async findByPatientName(name) {
      const rows = await db
        .select()
        .from(entityIndex)
        .where(eq(entityIndex.patientName, name))
        .orderBy(desc(entityIndex.processedAt))
        .limit(1);

      return first(rows);
    },

    async findBySearchTerm(term) {
      const rows = await db
        .select()
        .from(entityIndex)
        .where(arrayContains(entityIndex.searchTerms, [term]))
        .orderBy(desc(entityIndex.processedAt))
        .limit(1);

      return first(rows);
    },

    async findByPatientNamePrefix(prefix) {
      const rows = await db
        .select()
        .from(entityIndex)
        .where(
          and(
            sql`${patientNameBytes} >= ${prefix}`,
            sql`${patientNameBytes} <= ${prefix + PREFIX_RANGE_END}`,
          ),
        )
        .orderBy(patientNameBytes)
        .limit(1);

      return first(rows);
    },

    async findMostRecent() {
      const rows = await db
        .select()
        .from(entityIndex)
        .orderBy(desc(entityIndex.processedAt))
        .limit(1);

      return first(rows);
    },
  };
}
