import { createApp } from './app';
import { loadSettings } from './config/settings';
import { logger } from './utils/logger';

const start = async () => {
  const settings = loadSettings();
  const app = await createApp({ settings });

  const server = app.listen(settings.appPort, () => {
    logger.info(`Job drafts server running on port ${settings.appPort}`);
  });

  process.on('SIGTERM', () => {
    logger.info('SIGTERM received, closing server...');
    server.close(() => process.exit(0));
  });
};

start().catch((error) => {
  logger.error('Server failed to start:', error);
  process.exit(1);
});
