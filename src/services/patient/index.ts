import { randomBytes, randomUUID } from 'node:crypto';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';
import type { PatientAccount } from '../../domain/types.js';
import type { LoginInput, RegisterInput } from '../../domain/schemas.js';
import { isUniqueViolation, type PatientRepository } from './repository.js';
import { defaultPasswordFor, type PasswordHasher } from './credentials.js';

export { createPatientRepository, isUniqueViolation, type PatientRepository, type PatientAccountChanges } from './repository.js';
export { createBcryptHasher, defaultPasswordFor, type PasswordHasher } from './credentials.js';

export interface PatientServiceDeps {
  patients: PatientRepository;
  hasher: PasswordHasher;
}

export interface ProvisionedAccount {
  action: 'created' | 'updated';
  accountId: string;
  /** False when an existing account already had a password, which is then kept. */
  passwordSet: boolean;
}

const log = logger.child({ module: 'patient' });

function alreadyRegistered(): Result<never, AppError> {
  log.warn({ errorCode: ErrorCode.PATIENT_ALREADY_EXISTS, retryable: false }, 'Registration for existing email rejected');
  return err(createAppError(ErrorCode.PATIENT_ALREADY_EXISTS, 'Patient already registered', false));
}

function dbError(message: string, cause: unknown, ctx: Record<string, unknown>): Result<never, AppError> {
  const details = describeCause(cause);
  log.error({ ...ctx, errorCode: ErrorCode.DB_CONNECTION_ERROR, retryable: true, details }, message);
  return err(createAppError(ErrorCode.DB_CONNECTION_ERROR, message, true, details));
}

export async function registerPatient(
  deps: PatientServiceDeps,
  input: RegisterInput,
): Promise<Result<PatientAccount, AppError>> {
  try {
    const existing = await deps.patients.findByEmail(input.email);
    if (existing) return alreadyRegistered();

    const account = await deps.patients.insert({
      id: randomUUID(),
      email: input.email,
      passwordHash: await deps.hasher.hash(input.password),
      patientName: input.patient_name || null,
      dateOfBirth: input.date_of_birth || null,
    });

    log.info({ accountId: account.id }, 'Patient registered');
    return ok(account);
  } catch (cause) {
    // A concurrent registration can win between the lookup and the insert.
    if (isUniqueViolation(cause)) return alreadyRegistered();
    return dbError('Registration failed', cause, {});
  }
}

export async function authenticatePatient(
  deps: PatientServiceDeps,
  input: LoginInput,
): Promise<Result<PatientAccount, AppError>> {
  const invalid = () => err(createAppError(ErrorCode.INVALID_CREDENTIALS, 'Invalid email or password', false));

  let account: PatientAccount | null;
  try {
    account = await deps.patients.findByEmail(input.email);
  } catch (cause) {
    return dbError('Login failed', cause, {});
  }

  if (!account || account.passwordHash === null) {
    log.warn({ errorCode: ErrorCode.INVALID_CREDENTIALS }, 'Login for unknown account');
    return invalid();
  }

  if (!(await deps.hasher.verify(input.password, account.passwordHash))) {
    log.warn({ errorCode: ErrorCode.INVALID_CREDENTIALS, accountId: account.id }, 'Login with wrong password');
    return invalid();
  }

  log.info({ accountId: account.id }, 'Patient authenticated');
  return ok(account);
}

/**
 * Creates or refreshes the account of the patient named on a consent form.
 * A password already on the account is never replaced.
 */
export async function provisionPatientAccount(
  deps: PatientServiceDeps,
  email: string,
  patientName: string,
): Promise<Result<ProvisionedAccount, AppError>> {
  const ctx = { step: 'provisioning_account' };

  try {
    const existing = await deps.patients.findByEmail(email);

    if (existing) {
      const passwordSet = existing.passwordHash === null;
      await deps.patients.update(existing.id, {
        patientName,
        email,
        ...(passwordSet && { passwordHash: await deps.hasher.hash(defaultPasswordFor(patientName)) }),
      });
      log.info({ ...ctx, accountId: existing.id, passwordSet }, 'Patient account updated');
      return ok({ action: 'updated', accountId: existing.id, passwordSet });
    }

    const account = await deps.patients.insert({
      id: randomBytes(16).toString('base64url'),
      email,
      passwordHash: await deps.hasher.hash(defaultPasswordFor(patientName)),
      patientName,
      dateOfBirth: null,
    });
    log.info({ ...ctx, accountId: account.id }, 'Patient account created');
    return ok({ action: 'created', accountId: account.id, passwordSet: true });
  } catch (cause) {
    return dbError('Failed to provision patient account', cause, ctx);
  }
}
