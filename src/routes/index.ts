// src/routes/index.ts
import { Router } from 'express';
import { createAuthMiddleware } from '../middleware/auth.middleware';
import { DraftController } from '../controller/draft.controller';
import { ValidationController } from '../controller/validation.controller';
import { createValidationRoutes } from './validation.routes';
import { createCostRoutes } from './cost.routes';
import { createDraftRoutes } from './draft.routes';
import { createJobRoutes } from './job.routes';
import { AppServices } from '../types/services';
import { describeError } from '../utils/errors';
import { logger } from '../utils/logger';

// API versioning
const API_VERSION = 'v1';

const ENDPOINT_GROUPS = [
  {
    group: 'Validation',
    base: '/api/validation',
    endpoints: [
      { method: 'POST', path: '/field', description: 'Validate a single form field' },
      { method: 'POST', path: '/job', description: 'Validate a whole posting' },
    ],
  },
  {
    group: 'Cost',
    base: '/api/cost',
    endpoints: [{ method: 'POST', path: '/', description: 'Compute total cost of a posting' }],
  },
  {
    group: 'Drafts',
    base: '/api/drafts',
    auth: true,
    endpoints: [
      { method: 'GET', path: '/:id', description: 'Get draft' },
      { method: 'PUT', path: '/:id', description: 'Save draft' },
      { method: 'DELETE', path: '/:id', description: 'Discard draft' },
      { method: 'POST', path: '/:id/publish', description: 'Publish draft as a new posting' },
    ],
  },
  {
    group: 'Jobs',
    base: '/api/jobs',
    auth: true,
    endpoints: [
      { method: 'POST', path: '/:id/draft', description: 'Open an edit draft for a posting' },
      { method: 'PUT', path: '/:id/draft/:draftId', description: 'Apply an edit draft to its posting' },
    ],
  },
];

const checkStores = async ({ settings, supabase }: AppServices): Promise<boolean> => {
  if (!supabase) return true;

  const { error } = await supabase.from(settings.jobsTable).select('id', { count: 'exact', head: true });
  if (error) {
    logger.warn('Job store unreachable:', error.message);
    return false;
  }
  return true;
};

export const createRoutes = (services: AppServices) => {
  const router = Router();
  const authMiddleware = createAuthMiddleware(services.supabase);
  const draftController = new DraftController(services);
  const validationController = new ValidationController();

  // Root endpoint
  router.get('/', (req, res) => {
    res.json({
      name: 'Job Drafts API',
      version: API_VERSION,
      status: 'running',
      timestamp: new Date().toISOString(),
      endpoints: {
        validation: '/api/validation',
        cost: '/api/cost',
        drafts: '/api/drafts',
        jobs: '/api/jobs',
        health: '/api/health',
        docs: '/api/docs',
      },
    });
  });

  // Health check endpoint
  router.get('/health', async (req, res) => {
    try {
      const storesHealthy = await checkStores(services);

      res.status(storesHealthy ? 200 : 503).json({
        status: storesHealthy ? 'healthy' : 'unhealthy',
        timestamp: new Date().toISOString(),
        services: {
          driver: services.settings.storeDriver,
          stores: storesHealthy ? 'connected' : 'disconnected',
        },
        version: API_VERSION,
      });
    } catch (error) {
      logger.error('Health check failed:', error);
      res.status(503).json({
        status: 'unhealthy',
        timestamp: new Date().toISOString(),
        error: describeError(error),
      });
    }
  });

  // API documentation endpoint
  router.get('/docs', (req, res) => {
    res.json({ version: API_VERSION, endpoints: ENDPOINT_GROUPS });
  });

  // Public routes (no auth required)
  router.use('/validation', createValidationRoutes(validationController));
  router.use('/cost', createCostRoutes(validationController));

  // Protected routes (auth required)
  router.use('/drafts', authMiddleware, createDraftRoutes(draftController));
  router.use('/jobs', authMiddleware, createJobRoutes(draftController));

  // 404 handler for undefined routes
  router.use('*', (req, res) => {
    res.status(404).json({
      success: false,
      error: 'Endpoint not found',
      message: `The endpoint ${req.method} ${req.originalUrl} does not exist`,
      suggestion: 'Please check the API documentation at /api/docs',
    });
  });

  return router;
};
