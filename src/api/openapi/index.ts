import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yaml';
import type { Express } from 'express';

const currentDir = dirname(fileURLToPath(import.meta.url));
const specPath = join(currentDir, 'spec.yaml');

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function loadOpenApiDocument(path: string = specPath): Record<string, unknown> {
  const document: unknown = YAML.parse(readFileSync(path, 'utf-8'));
  if (!isRecord(document)) {
    throw new Error(`OpenAPI document at ${path} is not a mapping`);
  }
  return document;
}

export function setupOpenAPI(app: Express): void {
  const spec = loadOpenApiDocument();

  app.use('/docs', swaggerUi.serve, swaggerUi.setup(spec, {
    customCss: '.swagger-ui .topbar { display: none }',
    customSiteTitle: 'Consent Portal API',
  }));

  app.get('/openapi.json', (_req, res) => {
    res.json(spec);
  });
}
