// node/src/app.ts — Express app: middleware, health, API and UI routes
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import rateLimit from 'express-rate-limit';

import type { AppConfig } from './config/app.config';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { createRunApiRouter, createUiRouter } from './routes/run';
import type { PipelineRunner } from './routes/run';

export function createApp(config: AppConfig, pipeline: PipelineRunner): express.Express {
  const app = express();

  // The UI page carries an inline <style>; everything else keeps helmet's defaults.
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: { 'style-src': ["'self'", "'unsafe-inline'"] },
      },
    }),
  );

  app.use(cors({ origin: config.corsOrigins, credentials: true }));

  if (config.nodeEnv === 'production') {
    app.use(
      rateLimit({
        windowMs: 60 * 1000,
        max: 30,
        standardHeaders: true,
        legacyHeaders: false,
      }),
    );
  }

  app.use(express.json({ limit: '1mb' }));
  app.use(express.urlencoded({ extended: true, limit: '1mb' }));
  app.use(compression());

  if (config.nodeEnv !== 'test') {
    app.use(morgan(config.nodeEnv === 'development' ? 'dev' : 'combined'));
  }

  app.get('/health', (_req, res) => {
    res.status(200).json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      environment: config.nodeEnv,
      generationBackend: config.generationBackend,
    });
  });

  app.use('/api', createRunApiRouter(pipeline, config));
  app.use('/', createUiRouter(pipeline, config));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
