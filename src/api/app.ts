import express from 'express';
import cors from 'cors';
import { setupOpenAPI } from './openapi/index.js';
import { createAuthRouter } from './routes/auth.js';
import { createQueryRouter } from './routes/query.js';
import { createUploadRouter } from './routes/upload.js';
import { createAskRouter } from './routes/ask.js';
import { requestLogger } from './middleware/request-logger.js';
import { errorHandler } from './middleware/error-handler.js';
import type { AppDeps } from './deps.js';

export const SERVICE_NAME = 'consent-query-api';

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  const { corsOrigins, askEndpointEnabled } = deps.settings;

  app.use(cors({ origin: corsOrigins.includes('*') ? '*' : corsOrigins }));
  app.use(express.json({ limit: '1mb' }));
  app.use(requestLogger);

  setupOpenAPI(app);

  app.get('/health', (_req, res) => {
    res.json({ status: 'healthy', service: SERVICE_NAME, timestamp: new Date().toISOString() });
  });

  app.use(createAuthRouter(deps));
  app.use(createQueryRouter(deps));
  app.use(createUploadRouter(deps));
  if (askEndpointEnabled) {
    app.use(createAskRouter(deps));
  }

  app.use(errorHandler);

  return app;
}
