import { randomUUID } from 'node:crypto';
import { extname } from 'node:path';
import { ok, err, type Result } from '../../domain/result.js';
import { createAppError, ErrorCode, type AppError } from '../../domain/errors.js';
import { hasPdfExtension } from '../../domain/types.js';
import type { BlobStore } from '../../infrastructure/blob-store.js';
import { logger } from '../../infrastructure/logger.js';

export interface IncomingFile {
  originalName: string;
  data: Uint8Array;
}

export interface StoredUpload {
  filename: string;
  originalName: string;
}

const log = logger.child({ module: 'upload' });

function invalid(message: string): Result<never, AppError> {
  log.warn({ errorCode: ErrorCode.INVALID_UPLOAD, retryable: false }, message);
  return err(createAppError(ErrorCode.INVALID_UPLOAD, message, false));
}

export function validateUpload(file: IncomingFile | undefined, maxBytes: number): Result<IncomingFile, AppError> {
  if (!file) return invalid('No file provided');
  if (file.originalName === '') return invalid('No file selected');
  if (!hasPdfExtension(file.originalName)) return invalid('Only PDF files are allowed');
  if (file.data.length > maxBytes) return invalid(`File exceeds the ${maxBytes} byte upload limit`);
  return ok(file);
}

/** Stores the file as `<uuid><original extension>`; the store announces the new object. */
export async function storeUpload(
  blobs: BlobStore,
  bucket: string,
  file: IncomingFile,
): Promise<Result<StoredUpload, AppError>> {
  const filename = `${randomUUID()}${extname(file.originalName)}`;

  const stored = await blobs.put(bucket, filename, file.data);
  if (!stored.ok) return stored;

  log.info({ bucket, filename, sizeBytes: file.data.length }, 'File uploaded');
  return ok({ filename, originalName: file.originalName });
}
