import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import type { ZodError } from 'zod';
import { ErrorCode, type AppError } from '../../domain/errors.js';
import { logger } from '../../infrastructure/logger.js';

export interface ApiResponse<T> {
  success: boolean;
  data: T | null;
  error: { code: string; message: string; details?: string; retryable?: boolean } | null;
}

export function successResponse<T>(data: T): ApiResponse<T> {
  return { success: true, data, error: null };
}

export function errorResponse(code: string, message: string, details?: string, retryable?: boolean): ApiResponse<null> {
  return { success: false, data: null, error: { code, message, details, retryable } };
}

function isAppError(value: unknown): value is AppError {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    'message' in value &&
    'retryable' in value
  );
}

export function mapErrorCodeToStatus(code: string): number {
  switch (code) {
    case ErrorCode.VALIDATION_ERROR:
    case ErrorCode.INVALID_UPLOAD:
    case ErrorCode.PDF_PARSE_FAILED:
    case ErrorCode.PDF_TOO_LARGE:
      return 400;

    case ErrorCode.UNAUTHORIZED:
    case ErrorCode.SESSION_EXPIRED:
    case ErrorCode.INVALID_CREDENTIALS:
      return 401;

    case ErrorCode.DOCUMENT_NOT_FOUND:
    case ErrorCode.FILE_NOT_FOUND:
      return 404;

    case ErrorCode.PATIENT_ALREADY_EXISTS:
      return 409;

    case ErrorCode.LLM_API_ERROR:
    case ErrorCode.LLM_RATE_LIMITED:
    case ErrorCode.LLM_AUTH_ERROR:
    case ErrorCode.LLM_MALFORMED_RESPONSE:
      return 503;

    default:
      return 500;
  }
}

export function sendAppError(res: Response, appError: AppError): void {
  const status = mapErrorCodeToStatus(appError.code);
  res.status(status).json(errorResponse(appError.code, appError.message, appError.details, appError.retryable));
}

/** 400 carrying the first issue as the message, e.g. "Email and password are required". */
export function sendValidationError(res: Response, error: ZodError): void {
  const details = error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
  const message = error.issues[0]?.message ?? 'Invalid request body';
  res.status(400).json(errorResponse(ErrorCode.VALIDATION_ERROR, message, details, false));
}

function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof multer.MulterError) {
    const message = err.code === 'LIMIT_FILE_SIZE' ? 'File exceeds the upload size limit' : err.message;
    res.status(400).json(errorResponse(ErrorCode.INVALID_UPLOAD, message, err.field, false));
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json(errorResponse(ErrorCode.VALIDATION_ERROR, 'Request body is not valid JSON', undefined, false));
    return;
  }

  if (isAppError(err)) {
    sendAppError(res, err);
    return;
  }

  logger.error({ err: err.message }, 'Unhandled error');
  res.status(500).json(errorResponse(ErrorCode.INTERNAL_ERROR, 'An unexpected error occurred', undefined, false));
}
