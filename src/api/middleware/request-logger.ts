import type { Request, Response, NextFunction } from 'express';
import { logger } from '../../infrastructure/logger.js';

const log = logger.child({ module: 'http' });

// Probes hit this every few seconds.
const QUIET_PATHS = new Set(['/health']);

function levelFor(statusCode: number, path: string): 'debug' | 'info' | 'warn' | 'error' {
  if (statusCode >= 500) return 'error';
  if (statusCode >= 400) return 'warn';
  return QUIET_PATHS.has(path) ? 'debug' : 'info';
}

/** One access-log line per response; bodies and the Authorization header are never logged. */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const startedAt = Date.now();

  res.on('finish', () => {
    log[levelFor(res.statusCode, req.path)](
      {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs: Date.now() - startedAt,
        contentLength: res.get('content-length'),
      },
      'HTTP request',
    );
  });

  next();
}
