/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency
 * injection. The grid decoder and fetcher can be swapped through the
 * application context.
 */

import express from 'express';
import { RadarConfig, resolveConfig } from './config';
import { GridDecoder } from './domain/grid';
import { Wgrib2GridDecoder } from './decoder/wgrib2-decoder';
import { Fetcher } from './pipeline/fetcher';
import { RadarPipeline } from './pipeline/radar-pipeline';
import { cors, errorHandler, notFound, requestContext } from './api/middleware';
import { createRadarRoutes } from './api/radar';
import { logger } from './logger';

export const API_VERSION = '1.0.0';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: RadarConfig;
  decoder: GridDecoder;
  pipeline: RadarPipeline;
}

export interface AppContextOverrides {
  decoder?: GridDecoder;
  fetcher?: Fetcher;
  now?: () => number;
}

/** Create the application context with all services. */
export function createAppContext(config: RadarConfig = resolveConfig(), overrides: AppContextOverrides = {}): AppContext {
  const decoder =
    overrides.decoder ??
    new Wgrib2GridDecoder({ executable: config.wgrib2Path, logger: logger.child({ component: 'wgrib2-decoder' }) });
  const pipeline = new RadarPipeline(config, {
    decoder,
    fetcher: overrides.fetcher,
    now: overrides.now,
    logger: logger.child({ component: 'radar-pipeline' }),
  });

  return { config, decoder, pipeline };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.disable('x-powered-by');
  app.use(requestContext(logger));
  app.use(cors());

  // Health check: uptime plus the age of the cached grid. Never runs the pipeline.
  app.get('/health', async (_req, res, next) => {
    try {
      const cache = await ctx.pipeline.cacheStatus();
      res.json({
        status: 'ok',
        version: API_VERSION,
        uptimeMs: Date.now() - startTime,
        cache,
      });
    } catch (err) {
      next(err);
    }
  });

  app.use('/', createRadarRoutes(ctx.pipeline));

  app.use(notFound);
  app.use(errorHandler);

  return app;
}
