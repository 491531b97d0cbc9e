// Evaluated before the imports below, so .env is in process.env when they load.
import 'dotenv/config';

import { loadConfig } from '@/config/app.config';
import { createApp } from '@/app';
import { initPipelineDeps } from '@/services/pipeline-deps';
import { logger, setLogLevel } from '@/services/logger';
import { errorMessage } from '@/utils/errors';
import {
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from './stability/errorHandlers';

const startServer = async (): Promise<void> => {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  setupUnhandledRejectionHandler(config.nodeEnv);
  setupUncaughtExceptionHandler();
  setupGracefulShutdown();

  const deps = await initPipelineDeps(config);
  const app = createApp(deps, config);

  const server = app.listen(config.port, '0.0.0.0', () => {
    logger.info('server:listening', {
      url: `http://localhost:${config.port}`,
      environment: config.nodeEnv,
    });
  });
  setServerInstance(server);
};

startServer().catch((error: unknown) => {
  logger.fatal('server:start_failed', { error: errorMessage(error) });
  process.exit(1);
});
