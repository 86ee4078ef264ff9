// Load environment variables FIRST
import dotenv from 'dotenv';
import path from 'path';
dotenv.config({ path: path.resolve(process.cwd(), '.env') });

import { createApp } from './app';
import { describeConfig, loadConfig } from './config/app.config';
import { logger, setLogLevel } from './services/logger';
import { createPipeline } from './services/pipeline-deps';
import {
  setServerInstance,
  setupGracefulShutdown,
  setupUncaughtExceptionHandler,
  setupUnhandledRejectionHandler,
} from './stability/errorHandlers';

function startServer(): void {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  setupUnhandledRejectionHandler(config.nodeEnv);
  setupUncaughtExceptionHandler();
  setupGracefulShutdown();

  const app = createApp(config, createPipeline(config));
  const server = app.listen(config.port, () => {
    logger.info('server:listening', { url: `http://localhost:${config.port}`, ...describeConfig(config) });
  });
  setServerInstance(server);
}

try {
  startServer();
} catch (error) {
  logger.fatal('server:start_failed', { message: error instanceof Error ? error.message : String(error) });
  process.exit(1);
}
