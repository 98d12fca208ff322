/**
 * Radar Weather API
 *
 * Serves the latest MRMS Reflectivity at Lowest Altitude snapshot as a
 * downsampled lat/lon/value point list for map frontends.
 *
 * Entry point for the HTTP server; also exports the pipeline pieces for
 * programmatic use.
 */

import { ConfigError, RadarConfig, loadConfig } from './config';
import { createApp, createAppContext } from './server';
import { errorLogContext } from './domain/errors';
import { logger, setLogLevel } from './logger';

function main(): void {
  let config: RadarConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error('Invalid configuration', errorLogContext(err.typedError));
      process.exitCode = 1;
      return;
    }
    throw err;
  }

  setLogLevel(config.logLevel);
  const app = createApp(createAppContext(config));
  const port = config.port;

  app.listen(port, () => {
    logger.info('Radar Weather API listening', { port, source: config.sourceUrl });
  });
}

if (require.main === module) {
  main();
}

// Public exports for programmatic use
export { createApp, createAppContext } from './server';
export * from './config';
export * from './domain';
export * from './pipeline';
export * from './decoder';
export * from './logger';
