import { Response, Router } from 'express';
import { z } from 'zod';

import { describeError, isServiceError } from '../errors/serviceError';
import { AnalysisService } from '../services/analysisService';

const amazonUrlSchema = z.string().trim().min(1, 'amazon_url must be a non-empty string');

const analyzeBodySchema = z.object({ amazon_url: amazonUrlSchema });
// Entries are not checked here: a bad URL becomes an error entry in its own slot.
const batchBodySchema = z.object({ amazon_urls: z.array(z.string()) });

function sendValidationError(res: Response, error: z.ZodError): Response {
  return res.status(400).json({
    status: 'error',
    message: error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; '),
  });
}

function sendFailure(res: Response, endpoint: string, error: unknown): Response {
  if (isServiceError(error)) {
    return res.status(error.statusCode).json(error.toJSON());
  }

  console.error(`[server] ${endpoint} endpoint error:`, describeError(error));
  return res.status(500).json({
    status: 'error',
    message: 'Unexpected error while processing the request',
  });
}

export function createAnalysisRouter(service: AnalysisService): Router {
  const router = Router();

  router.post('/analyze', async (req, res) => {
    const parsed = analyzeBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      return res.json(await service.analyze(parsed.data.amazon_url));
    } catch (error) {
      return sendFailure(res, '/analyze', error);
    }
  });

  router.post('/batch_analyze', async (req, res) => {
    const parsed = batchBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      return res.json(await service.batchAnalyze(parsed.data.amazon_urls));
    } catch (error) {
      return sendFailure(res, '/batch_analyze', error);
    }
  });

  router.post('/optimize', async (req, res) => {
    const parsed = analyzeBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return sendValidationError(res, parsed.error);
    }

    try {
      return res.json(await service.optimize(parsed.data.amazon_url));
    } catch (error) {
      return sendFailure(res, '/optimize', error);
    }
  });

  return router;
}
