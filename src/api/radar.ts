/**
 * Radar API routes.
 *
 * GET /       static liveness message
 * GET /radar  latest reflectivity points
 */

import { Router } from 'express';
import { apiError, errorLogContext } from '../domain/errors';
import { logger } from '../logger';
import { RadarPipeline, toPipelineError } from '../pipeline/radar-pipeline';
import { PipelineStage } from '../domain/radar';
import { RadarRequest } from './middleware';

export const ROOT_MESSAGE = 'Radar Weather API is running. Visit /radar for data.';

export function createRadarRoutes(pipeline: RadarPipeline): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ message: ROOT_MESSAGE });
  });

  /**
   * GET /radar
   * Runs (or joins) the pipeline. Failures map to 500 { error }.
   */
  router.get('/radar', async (req: RadarRequest, res) => {
    const log = req.log ?? logger;
    try {
      const payload = await pipeline.getPayload(log);
      res.json(payload);
    } catch (err) {
      const failure = toPipelineError(err, PipelineStage.Responding);
      log.error('Error fetching radar', { ...errorLogContext(failure.typedError), stage: failure.stage });
      res.status(500).json(apiError(failure.typedError));
    }
  });

  return router;
}
