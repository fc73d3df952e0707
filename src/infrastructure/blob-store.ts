import { EventEmitter } from 'node:events';
import { mkdir, writeFile, readFile, readdir, rm } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { ok, err, type Result } from '../domain/result.js';
import { createAppError, describeCause, ErrorCode, type AppError } from '../domain/errors.js';
import type { StorageEvent } from '../domain/types.js';
import { logger } from './logger.js';

export type ObjectCreatedListener = (event: StorageEvent) => void;

/** Flat object storage addressed by bucket and slash-separated object name. */
export interface BlobStore {
  put(bucket: string, name: string, data: Uint8Array | string): Promise<Result<void, AppError>>;
  read(bucket: string, name: string): Promise<Result<Buffer, AppError>>;
  /** Object names under `prefix`, in lexicographic order. */
  list(bucket: string, prefix: string): Promise<Result<string[], AppError>>;
  delete(bucket: string, name: string): Promise<Result<void, AppError>>;
  /** Returns an unsubscribe function. */
  onObjectCreated(listener: ObjectCreatedListener): () => void;
}

const OBJECT_CREATED = 'object-created';

const log = logger.child({ module: 'blob-store' });

function isSafeSegment(segment: string): boolean {
  return segment !== '' && segment !== '.' && segment !== '..' && !/[\\\0]/.test(segment);
}

export function toSafeSegments(name: string): string[] | null {
  const segments = name.split('/');
  return segments.every(isSafeSegment) ? segments : null;
}

export class FsBlobStore implements BlobStore {
  private readonly rootDir: string;
  private readonly events = new EventEmitter();

  constructor(rootDir: string) {
    this.rootDir = rootDir;
  }

  private resolvePath(bucket: string, name: string): Result<string, AppError> {
    const segments = toSafeSegments(name);
    if (!isSafeSegment(bucket) || bucket.includes('/') || segments === null) {
      log.error({ errorCode: ErrorCode.FILE_STORAGE_ERROR, retryable: false, bucket, name }, 'Rejected unsafe object path');
      return err(createAppError(ErrorCode.FILE_STORAGE_ERROR, 'Invalid bucket or object name', false));
    }
    return ok(join(this.rootDir, bucket, ...segments));
  }

  async put(bucket: string, name: string, data: Uint8Array | string): Promise<Result<void, AppError>> {
    const path = this.resolvePath(bucket, name);
    if (!path.ok) return path;

    try {
      await mkdir(dirname(path.value), { recursive: true });
      await writeFile(path.value, data);
    } catch (cause) {
      const details = describeCause(cause);
      log.error({ errorCode: ErrorCode.FILE_STORAGE_ERROR, retryable: true, bucket, name, details }, 'Failed to write object');
      return err(createAppError(ErrorCode.FILE_STORAGE_ERROR, 'Failed to store object', true, details));
    }

    log.info({ bucket, name, sizeBytes: data.length }, 'Object stored');
    this.events.emit(OBJECT_CREATED, { bucket, name } satisfies StorageEvent);
    return ok(undefined);
  }

  async read(bucket: string, name: string): Promise<Result<Buffer, AppError>> {
    const path = this.resolvePath(bucket, name);
    if (!path.ok) return path;

    try {
      const data = await readFile(path.value);
      log.debug({ bucket, name, sizeBytes: data.length }, 'Object read');
      return ok(data);
    } catch (cause) {
      const details = describeCause(cause);
      log.error({ errorCode: ErrorCode.FILE_NOT_FOUND, retryable: false, bucket, name, details }, 'Object not found');
      return err(createAppError(ErrorCode.FILE_NOT_FOUND, `Object ${bucket}/${name} not found`, false, details));
    }
  }

  async list(bucket: string, prefix: string): Promise<Result<string[], AppError>> {
    if (!isSafeSegment(bucket) || bucket.includes('/')) {
      return err(createAppError(ErrorCode.FILE_STORAGE_ERROR, 'Invalid bucket name', false));
    }

    try {
      const names = await walk(join(this.rootDir, bucket), '');
      return ok(names.filter((name) => name.startsWith(prefix)).sort());
    } catch (cause) {
      const details = describeCause(cause);
      log.error({ errorCode: ErrorCode.FILE_STORAGE_ERROR, retryable: true, bucket, prefix, details }, 'Failed to list objects');
      return err(createAppError(ErrorCode.FILE_STORAGE_ERROR, 'Failed to list objects', true, details));
    }
  }

  async delete(bucket: string, name: string): Promise<Result<void, AppError>> {
    const path = this.resolvePath(bucket, name);
    if (!path.ok) return path;

    try {
      await rm(path.value, { force: true });
      return ok(undefined);
    } catch (cause) {
      const details = describeCause(cause);
      log.error({ errorCode: ErrorCode.FILE_STORAGE_ERROR, retryable: true, bucket, name, details }, 'Failed to delete object');
      return err(createAppError(ErrorCode.FILE_STORAGE_ERROR, 'Failed to delete object', true, details));
    }
  }

  onObjectCreated(listener: ObjectCreatedListener): () => void {
    this.events.on(OBJECT_CREATED, listener);
    return () => {
      this.events.off(OBJECT_CREATED, listener);
    };
  }
}

async function walk(dir: string, relative: string): Promise<string[]> {
  let entries;
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (cause) {
    // A bucket nothing was written to yet has no directory.
    if (cause instanceof Error && 'code' in cause && cause.code === 'ENOENT') return [];
    throw cause;
  }

  const names: string[] = [];
  for (const entry of entries) {
    const name = relative ? `${relative}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      names.push(...(await walk(join(dir, entry.name), name)));
    } else if (entry.isFile()) {
      names.push(name);
    }
  }
  return names;
}
