import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';

import { errorMiddleware } from './middleware/error.middleware';
import { createRoutes } from './routes';
import { logger } from './utils/logger';
import { Settings, loadSettings } from './config/settings';
import { createSupabaseClient } from './config/supabase.config';
import { InMemoryDraftStore, InMemoryJobStore } from './services/drafts/memory.store';
import { SupabaseDraftStore, SupabaseJobStore } from './services/drafts/supabase.store';
import { AppServices } from './types/services';

const buildServices = (settings: Settings, overrides: Partial<AppServices>): AppServices => {
  if (settings.storeDriver === 'supabase') {
    const supabase = overrides.supabase ?? createSupabaseClient(settings);
    logger.info('Supabase client initialized');

    return {
      settings,
      supabase,
      jobStore: overrides.jobStore ?? new SupabaseJobStore(supabase, settings.jobsTable),
      draftStore: overrides.draftStore ?? new SupabaseDraftStore(supabase, settings.draftsTable),
    };
  }

  logger.info('Using in-memory stores');
  return {
    settings,
    jobStore: overrides.jobStore ?? new InMemoryJobStore(),
    draftStore: overrides.draftStore ?? new InMemoryDraftStore(settings.draftStoreMaxEntries),
  };
};

export const createApp = async (overrides: Partial<AppServices> = {}) => {
  const app = express();

  logger.info('Initializing services...');

  try {
    const settings = overrides.settings ?? loadSettings();
    const services = buildServices(settings, overrides);

    app.use(helmet());
    app.use(cors({
      origin: settings.corsOrigins,
      credentials: true,
    }));
    app.use(compression());
    app.use(express.json({ limit: '1mb' }));
    app.use(express.urlencoded({ extended: true }));

    app.use((req, res, next) => {
      const start = Date.now();
      res.on('finish', () => {
        const duration = Date.now() - start;
        logger.info({
          method: req.method,
          url: req.originalUrl,
          status: res.statusCode,
          duration: `${duration}ms`,
          ip: req.ip,
        });
      });
      next();
    });

    app.use('/api', createRoutes(services));

    app.use(errorMiddleware);

    logger.info('Application initialized successfully');
    return app;
  } catch (error) {
    logger.error('Failed to initialize application:', error);
    throw error;
  }
};
