const isDebugEnabled = () =>
  process.env.NODE_ENV === 'development' || process.env.LOG_LEVEL === 'debug';

export const logger = {
  info: (...args: unknown[]) => console.info('[INFO]', ...args),
  warn: (...args: unknown[]) => console.warn('[WARN]', ...args),
  error: (...args: unknown[]) => console.error('[ERROR]', ...args),
  debug: (...args: unknown[]) => {
    if (isDebugEnabled()) {
      console.debug('[DEBUG]', ...args);
    }
  },
};
