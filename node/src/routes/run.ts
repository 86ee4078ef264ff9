import express from 'express';
import type { Request, Response } from 'express';
import type { AppConfig } from '../config/app.config';
import { createDocumentUpload, toSourceDocuments, uploadErrorMessage } from '../middleware/upload';
import type { ReasoningPipeline } from '../services/reasoning-pipeline';
import type { SourceDocument } from '../types/core';
import { createErrorResponse, createSuccessResponse } from '../utils/errorResponse';
import { renderPage } from '../views/page';
import { toRunView } from '../views/run-view';
import { validateRunRequest } from './run.validation';

export type PipelineRunner = Pick<ReasoningPipeline, 'run'>;

function filesOf(req: Request): SourceDocument[] {
  return toSourceDocuments(Array.isArray(req.files) ? req.files : undefined);
}

/** Runs multer and resolves with an upload error message, or null when the upload was fine. */
function receiveDocuments(
  upload: express.RequestHandler,
  req: Request,
  res: Response,
  maxUploadBytes: number,
): Promise<string | null> {
  return new Promise((resolve, reject) => {
    upload(req, res, (err?: unknown) => {
      if (!err) {
        resolve(null);
        return;
      }
      const message = uploadErrorMessage(err, maxUploadBytes);
      if (message === null) reject(err);
      else resolve(message);
    });
  });
}

/** JSON API: POST /api/run (multipart with `documents`, or a JSON body without files). */
export function createRunApiRouter(pipeline: PipelineRunner, config: AppConfig): express.Router {
  const router = express.Router();
  const upload = createDocumentUpload(config.maxUploadBytes);

  router.post('/run', async (req, res, next) => {
    try {
      const uploadError = await receiveDocuments(upload, req, res, config.maxUploadBytes);
      if (uploadError) {
        res.status(400).json(createErrorResponse(uploadError, { code: 'INVALID_UPLOAD' }));
        return;
      }

      const validation = validateRunRequest(req.body);
      if (!validation.success) {
        res.status(400).json(createErrorResponse('Invalid request', { errors: validation.error, code: 'VALIDATION_ERROR' }));
        return;
      }

      const run = await pipeline.run({
        query: validation.data.question,
        mode: validation.data.mode,
        documents: filesOf(req),
      });
      const view = toRunView(run);

      if (run.status === 'failed') {
        res.status(502).json(createErrorResponse(run.error.message, { code: run.error.code, data: view }));
        return;
      }
      res.json(createSuccessResponse(view));
    } catch (error) {
      next(error);
    }
  });

  return router;
}

/** Server-rendered page: GET / shows the form, POST /run shows the form plus the run. */
export function createUiRouter(pipeline: PipelineRunner, config: AppConfig): express.Router {
  const router = express.Router();
  const upload = createDocumentUpload(config.maxUploadBytes);
  const backend = config.generationBackend;

  router.get('/', (_req, res) => {
    res.type('html').send(renderPage({ backend }));
  });

  router.post('/run', async (req, res, next) => {
    try {
      const uploadError = await receiveDocuments(upload, req, res, config.maxUploadBytes);
      if (uploadError) {
        res.status(400).type('html').send(renderPage({ backend, errors: [uploadError] }));
        return;
      }

      const validation = validateRunRequest(req.body);
      if (!validation.success) {
        const question = typeof req.body?.question === 'string' ? req.body.question : '';
        res
          .status(400)
          .type('html')
          .send(renderPage({ backend, question, errors: validation.error.map((e) => e.message) }));
        return;
      }

      const { question, mode } = validation.data;
      const run = await pipeline.run({ query: question, mode, documents: filesOf(req) });
      res
        .status(run.status === 'failed' ? 502 : 200)
        .type('html')
        .send(renderPage({ backend, question, mode, run }));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
