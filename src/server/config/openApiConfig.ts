/**
 * OpenAPI/Swagger Configuration
 *
 * Loads the service's OpenAPI document and serves it with Swagger UI and ReDoc.
 */

import type { Express } from 'express';
import { existsSync, readFileSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import yaml from 'js-yaml';
import swaggerUi from 'swagger-ui-express';
import { logger } from '../utils/logger.js';
import { escapeHtml } from '../security/inputSanitizer.js';
import type { ServiceMode } from './env.js';

const docsDir = join(dirname(fileURLToPath(import.meta.url)), '..', '..', '..', 'docs', 'api');

export function openApiPath(mode: ServiceMode): string {
  return join(docsDir, `openapi.${mode}.yaml`);
}

export function loadOpenApiDocument(mode: ServiceMode): Record<string, unknown> | null {
  const path = openApiPath(mode);
  if (!existsSync(path)) {
    return null;
  }

  const document = yaml.load(readFileSync(path, 'utf-8'));
  if (typeof document !== 'object' || document === null || Array.isArray(document)) {
    throw new Error(`OpenAPI document at ${path} is not a mapping`);
  }
  return Object.fromEntries(Object.entries(document));
}

const REDOC_BUNDLE = 'https://cdn.jsdelivr.net/npm/redoc@2/bundles/redoc.standalone.js';

/**
 * ReDoc page rendering the document served at `specUrl`
 */
export function renderRedocPage(title: string, specUrl: string): string {
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    `<title>${escapeHtml(title)} - ReDoc</title>`,
    '<meta charset="utf-8"/>',
    '<meta name="viewport" content="width=device-width, initial-scale=1">',
    '</head>',
    '<body>',
    `<redoc spec-url="${escapeHtml(specUrl)}"></redoc>`,
    `<script src="${REDOC_BUNDLE}"></script>`,
    '</body>',
    '</html>',
  ].join('\n');
}

/**
 * Setup OpenAPI routes: Swagger UI at /docs, ReDoc at /redoc
 */
export function setupOpenApiConfig(app: Express, mode: ServiceMode): void {
  const swaggerDocument = loadOpenApiDocument(mode);
  if (!swaggerDocument) {
    logger.warn({ path: openApiPath(mode) }, 'OpenAPI document not found, /docs disabled');
    return;
  }

  const title = mode === 'sheets' ? 'Google Sheets ID Extraction API' : 'Data Extraction API';

  app.get('/docs/openapi.json', (_req, res) => {
    res.json(swaggerDocument);
  });

  app.get('/redoc', (_req, res) => {
    res.type('html').send(renderRedocPage(title, '/docs/openapi.json'));
  });

  app.use('/docs', swaggerUi.serve, swaggerUi.setup(swaggerDocument, {
    customCss: '.swagger-ui .topbar { display: none }',
    customSiteTitle: title,
  }));
}
