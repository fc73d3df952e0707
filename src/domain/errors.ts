export const ErrorCode = {
  // OCR
  OCR_FAILED: 'OCR_FAILED',
  OCR_TIMEOUT: 'OCR_TIMEOUT',
  OCR_OUTPUT_INVALID: 'OCR_OUTPUT_INVALID',
  OCR_NO_TEXT: 'OCR_NO_TEXT',
  PDF_PARSE_FAILED: 'PDF_PARSE_FAILED',
  PDF_TOO_LARGE: 'PDF_TOO_LARGE',

  // LLM
  LLM_API_ERROR: 'LLM_API_ERROR',
  LLM_RATE_LIMITED: 'LLM_RATE_LIMITED',
  LLM_MALFORMED_RESPONSE: 'LLM_MALFORMED_RESPONSE',
  LLM_AUTH_ERROR: 'LLM_AUTH_ERROR',

  // Request validation
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_UPLOAD: 'INVALID_UPLOAD',

  // Identity
  UNAUTHORIZED: 'UNAUTHORIZED',
  SESSION_EXPIRED: 'SESSION_EXPIRED',
  INVALID_CREDENTIALS: 'INVALID_CREDENTIALS',
  PATIENT_ALREADY_EXISTS: 'PATIENT_ALREADY_EXISTS',

  // Lookup
  DOCUMENT_NOT_FOUND: 'DOCUMENT_NOT_FOUND',

  // File Storage
  FILE_STORAGE_ERROR: 'FILE_STORAGE_ERROR',
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',

  // Infrastructure
  DB_CONNECTION_ERROR: 'DB_CONNECTION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface AppError {
  code: ErrorCode;
  message: string;
  details?: string;
  retryable: boolean;
}

export function createAppError(
  code: ErrorCode,
  message: string,
  retryable: boolean,
  details?: string,
): AppError {
  return { code, message, retryable, details };
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
