import pino from 'pino';

export const logger = pino({
  name: 'consent-portal',
  level: process.env.LOG_LEVEL ?? 'info',
  redact: ['password', 'passwordHash', 'sessionToken', 'req.headers.authorization'],
});

export function createIngestionLogger(documentId: string, bucket?: string) {
  return logger.child({
    documentId,
    ...(bucket !== undefined && { bucket }),
  });
}
