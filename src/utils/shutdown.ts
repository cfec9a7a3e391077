import logger, { errorMeta } from './logger';

type Cleanup = () => Promise<void>;

let isShuttingDown = false;

export async function shutdown(reason: string, cleanup: Cleanup, err?: unknown): Promise<void> {
  if (isShuttingDown) {
    logger.warn('Shutdown already in progress, ignoring duplicate call', { reason });
    return;
  }

  isShuttingDown = true;
  logger.info('Shutdown triggered', { reason });
  if (err) {
    logger.error('Shutting down after fatal error', errorMeta(err));
  }

  let exitCode = err ? 1 : 0;
  try {
    await cleanup();
    logger.info('Resources released');
  } catch (shutdownErr) {
    logger.error('Error during shutdown', errorMeta(shutdownErr));
    exitCode = 1;
  } finally {
    process.exit(exitCode);
  }
}

// Set up signal handlers
export function setupShutdownHandlers(cleanup: Cleanup): void {
  const run = (reason: string, err?: unknown) => {
    shutdown(reason, cleanup, err).catch((shutdownErr: unknown) => {
      logger.error('Shutdown failed', errorMeta(shutdownErr));
      process.exit(1);
    });
  };

  process.on('SIGINT', () => run('SIGINT'));
  process.on('SIGTERM', () => run('SIGTERM'));
  process.on('uncaughtException', (err) => run('uncaughtException', err));
  process.on('unhandledRejection', (reason) => run('unhandledRejection', reason ?? new Error('Unhandled rejection')));
}
