import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import swaggerUi from 'swagger-ui-express';
import YAML from 'yaml';
import type { Express } from 'express';

const currentDir = dirname(fileURLToPath(import.meta.url));
const documentPath = join(currentDir, 'openapi.yaml');

export function loadOpenAPIDocument(): Record<string, unknown> {
  const document: unknown = YAML.parse(readFileSync(documentPath, 'utf-8'));
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    throw new Error(`OpenAPI document at ${documentPath} is not an object`);
  }
  return Object.fromEntries(Object.entries(document));
}

export function setupOpenAPI(app: Express): void {
  const document = loadOpenAPIDocument();

  app.use('/docs', swaggerUi.serve, swaggerUi.setup(document, {
    customCss: '.swagger-ui .topbar { display: none }',
    customSiteTitle: 'Tariff Tracker API',
  }));

  app.get('/openapi.json', (_req, res) => {
    res.json(document);
  });
}
