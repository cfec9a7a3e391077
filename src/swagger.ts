import { Application } from 'express';
import swaggerUi from 'swagger-ui-express';
import * as yaml from 'yamljs';
import * as path from 'path';
import * as fs from 'fs';
import logger, { errorMeta } from './utils/logger';

// Resolves to <root>/swagger from both src/ and dist/
const yamlPath = path.join(__dirname, '..', 'swagger', 'premiums.yaml');

const loadPaths = (): Record<string, unknown> => {
  try {
    if (fs.existsSync(yamlPath)) {
      const yamlContent: unknown = yaml.load(yamlPath);
      if (typeof yamlContent === 'object' && yamlContent !== null && 'paths' in yamlContent) {
        const { paths } = yamlContent;
        if (typeof paths === 'object' && paths !== null) {
          return Object.fromEntries(Object.entries(paths));
        }
      }
    }
  } catch (error) {
    logger.error('Error loading swagger YAML', { path: yamlPath, ...errorMeta(error) });
  }
  return {};
};

const errorSchema = {
  type: 'object',
  properties: {
    success: { type: 'boolean', example: false },
    code: { type: 'string', enum: ['001', '002', '003', '004'] },
    message: { type: 'string' },
    errors: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          field: { type: 'string' },
          message: { type: 'string' },
        },
      },
    },
  },
};

export const swaggerSpec = {
  openapi: '3.0.0',
  info: {
    title: 'Premium API',
    version: '1.0.0',
    description: 'Health insurance premium rating from the loaded rate matrix',
  },
  components: {
    schemas: {
      Error: errorSchema,
      PremiumRequest: {
        type: 'object',
        required: ['code', 'sumInsured', 'dateOfBirth'],
        properties: {
          code: { type: 'string', example: '1A' },
          sumInsured: { type: 'string', example: '100000' },
          dateOfBirth: { type: 'string', format: 'date', example: '1990-06-07' },
        },
      },
      PremiumQuote: {
        type: 'object',
        properties: {
          code: { type: 'string' },
          sumInsured: { type: 'string' },
          age: { type: 'integer' },
          ageBand: { type: 'integer', minimum: 1, maximum: 7 },
          premium: { type: 'string', example: '750' },
          calculatedAt: { type: 'string', format: 'date-time' },
        },
      },
    },
  },
  tags: [
    {
      name: 'Premiums',
      description: 'Premium calculation and rate matrix management',
    },
  ],
  paths: loadPaths(),
};

export function setupSwagger(app: Application): void {
  app.use('/api-docs', swaggerUi.serve, swaggerUi.setup(swaggerSpec, {
    explorer: true,
    customCss: '.swagger-ui .topbar { display: none }',
    customSiteTitle: 'Premium API',
  }));

  app.get('/api-docs.json', (req, res) => {
    res.setHeader('Content-Type', 'application/json');
    res.send(swaggerSpec);
  });
}
