import { eq } from 'drizzle-orm';
import type { Database } from '../../infrastructure/db/client.js';
import { patients } from '../../infrastructure/db/schema.js';
import type { NewPatientAccount, PatientAccount } from '../../domain/types.js';

export type PatientAccountChanges = Partial<Pick<PatientAccount, 'email' | 'patientName' | 'passwordHash'>>;

export interface PatientRepository {
  findByEmail(email: string): Promise<PatientAccount | null>;
  insert(account: NewPatientAccount): Promise<PatientAccount>;
  /** Applies `changes` and bumps `updatedAt`. */
  update(id: string, changes: PatientAccountChanges): Promise<PatientAccount | null>;
}

const UNIQUE_VIOLATION = '23505';

/** Postgres unique-constraint failure, raised directly or wrapped as the `cause` of a driver error. */
export function isUniqueViolation(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  if ('code' in error && error.code === UNIQUE_VIOLATION) return true;
  return 'cause' in error && error.cause !== error && isUniqueViolation(error.cause);
}

function toPatientAccount(row: typeof patients.$inferSelect): PatientAccount {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.passwordHash,
    patientName: row.patientName,
    dateOfBirth: row.dateOfBirth,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function createPatientRepository(db: Database): PatientRepository {
  return {
    async findByEmail(email) {
      const rows = await db.select().from(patients).where(eq(patients.email, email)).limit(1);
      return rows.length > 0 ? toPatientAccount(rows[0]) : null;
    },

    async insert(account) {
      const rows = await db.insert(patients).values(account).returning();
      return toPatientAccount(rows[0]);
    },

    async update(id, changes) {
      const rows = await db
        .update(patients)
        .set({ ...changes, updatedAt: new Date() })
        .where(eq(patients.id, id))
        .returning();

      return rows.length > 0 ? toPatientAccount(rows[0]) : null;
    },
  };
}
