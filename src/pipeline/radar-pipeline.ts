/**
 * Radar pipeline: the per-request orchestration.
 *
 *   Idle -> CacheCheck -> (Fetching -> Extracting)? -> Decoding -> Transforming -> Responding
 *
 * A stale or missing grid triggers a download and extraction; a fresh
 * grid with an up-to-date JSON side-cache is answered from the cache.
 * Any stage failure aborts the request with a PipelineError naming the
 * stage. Runs are single-flight on the grid path, so concurrent requests
 * share one download/decode instead of each starting their own.
 */

import { mkdir } from 'fs/promises';
import { dirname } from 'path';
import { RadarConfig } from '../config';
import { TypedError, decodeError, describeError, internalError } from '../domain/errors';
import { GridDecoder, GridSet } from '../domain/grid';
import { PipelineStage, RadarPayload, canTransition } from '../domain/radar';
import { Logger, logger as rootLogger } from '../logger';
import { fileAgeSeconds, fileModifiedMs, shouldRefetch } from './cache-gate';
import { extract } from './extractor';
import { Fetcher } from './fetcher';
import { readPayloadCache, writePayloadCache } from './payload-cache';
import { SingleFlight } from './single-flight';
import { transform } from './transformer';

/** Error carrying the typed failure and the stage it happened in. */
export class PipelineError extends Error {
  constructor(
    public readonly typedError: TypedError,
    public readonly stage: PipelineStage,
  ) {
    super(typedError.message);
    this.name = 'PipelineError';
  }
}

/** Normalize anything thrown during a run into a PipelineError. */
export function toPipelineError(err: unknown, stage: PipelineStage): PipelineError {
  if (err instanceof PipelineError) return err;
  return new PipelineError(internalError(describeError(err)), stage);
}

/** Tracks the current stage and rejects transitions the lifecycle does not allow. */
class StageTracker {
  current = PipelineStage.Idle;

  constructor(private log: Logger) {}

  advance(next: PipelineStage): void {
    if (!canTransition(this.current, next)) {
      throw new PipelineError(
        internalError(`Invalid pipeline stage transition: ${this.current} -> ${next}`),
        this.current,
      );
    }
    this.log.debug('Pipeline stage', { from: this.current, to: next });
    this.current = next;
  }
}

export interface CacheStatus {
  gridAgeSeconds: number | null;
  fresh: boolean;
}

export interface RadarPipelineDeps {
  decoder: GridDecoder;
  fetcher?: Fetcher;
  logger?: Logger;
  /** Clock override for cache-age decisions. */
  now?: () => number;
}

export class RadarPipeline {
  private readonly decoder: GridDecoder;
  private readonly fetcher: Fetcher;
  private readonly log: Logger;
  private readonly now: () => number;
  private readonly flights = new SingleFlight<RadarPayload>();

  constructor(
    private readonly config: RadarConfig,
    deps: RadarPipelineDeps,
  ) {
    this.decoder = deps.decoder;
    this.log = deps.logger ?? rootLogger.child({ component: 'radar-pipeline' });
    this.fetcher =
      deps.fetcher ??
      new Fetcher({
        attempts: config.fetchAttempts,
        retryDelayMs: config.retryDelayMs,
        timeoutMs: config.fetchTimeoutMs,
        logger: this.log,
      });
    this.now = deps.now ?? Date.now;
  }

  /** Produce the current payload, joining an in-flight run if there is one. */
  getPayload(log: Logger = this.log): Promise<RadarPayload> {
    if (this.flights.isRunning(this.config.gridFile)) {
      log.info('Joining in-flight radar pipeline run');
    }
    return this.flights.run(this.config.gridFile, () => this.execute(log));
  }

  async cacheStatus(): Promise<CacheStatus> {
    const gridAgeSeconds = await fileAgeSeconds(this.config.gridFile, this.now());
    return {
      gridAgeSeconds,
      fresh: gridAgeSeconds !== null && gridAgeSeconds < this.config.maxAgeSeconds,
    };
  }

  private async execute(log: Logger): Promise<RadarPayload> {
    const stages = new StageTracker(log);
    const { sourceUrl, rawFile, gridFile, maxAgeSeconds } = this.config;

    try {
      stages.advance(PipelineStage.CacheCheck);
      const stale = await shouldRefetch(gridFile, maxAgeSeconds, this.now());

      if (stale) {
        stages.advance(PipelineStage.Fetching);
        await mkdir(dirname(rawFile), { recursive: true });
        const fetched = await this.fetcher.fetch(sourceUrl, rawFile, log);

        if (fetched.success) {
          stages.advance(PipelineStage.Extracting);
          log.info('Extracting radar grid', { from: rawFile, to: gridFile });
          const extracted = await extract(rawFile, gridFile);
          if (!extracted.success) {
            throw new PipelineError(extracted.error, PipelineStage.Extracting);
          }
          log.info('Extraction complete', { bytes: extracted.value.bytes });
        } else {
          if ((await fileModifiedMs(gridFile)) === null) {
            throw new PipelineError(fetched.error, PipelineStage.Fetching);
          }
          log.warn('Refetch failed, serving stale radar grid', { error: fetched.error.message });
          const cached = await this.reuseCachedPayload(log);
          if (cached) {
            stages.advance(PipelineStage.Responding);
            return cached;
          }
        }
      } else {
        const cached = await this.reuseCachedPayload(log);
        if (cached) {
          stages.advance(PipelineStage.Responding);
          return cached;
        }
      }

      stages.advance(PipelineStage.Decoding);
      const grid = await this.decode(gridFile, log);

      stages.advance(PipelineStage.Transforming);
      const result = transform(grid, { sourceUrl, stride: this.config.stride });
      if (!result.success) {
        throw new PipelineError(result.error, PipelineStage.Transforming);
      }
      const payload = result.value;
      await this.persist(payload, log);

      stages.advance(PipelineStage.Responding);
      log.info('Radar payload ready', { points: payload.points.length, timestamp: payload.timestamp });
      return payload;
    } catch (err) {
      throw toPipelineError(err, stages.current);
    }
  }

  private async decode(gridFile: string, log: Logger): Promise<GridSet> {
    log.info('Decoding radar grid', { path: gridFile });
    try {
      const grid = await this.decoder.decode(gridFile);
      log.info('Decoded radar grid', { variables: grid.variables.map((v) => v.name) });
      return grid;
    } catch (err) {
      throw new PipelineError(decodeError(gridFile, describeError(err)), PipelineStage.Decoding);
    }
  }

  /** Side-cached payload at least as new as the grid and built with this source and stride. */
  private async reuseCachedPayload(log: Logger): Promise<RadarPayload | null> {
    const { gridFile, payloadFile, sourceUrl, stride } = this.config;
    try {
      const gridModified = await fileModifiedMs(gridFile);
      if (gridModified === null) return null;
      const payload = await readPayloadCache(payloadFile, { notBeforeMs: gridModified, sourceUrl, stride });
      if (payload) {
        log.info('Serving cached radar payload', { path: payloadFile, points: payload.points.length });
      }
      return payload;
    } catch (err) {
      log.debug('Payload cache unreadable, decoding grid', { path: payloadFile, error: describeError(err) });
      return null;
    }
  }

  private async persist(payload: RadarPayload, log: Logger): Promise<void> {
    try {
      await writePayloadCache(this.config.payloadFile, payload, this.config.stride);
      log.info('Saved radar payload cache', { path: this.config.payloadFile, points: payload.points.length });
    } catch (err) {
      log.warn('Failed to write radar payload cache', {
        path: this.config.payloadFile,
        error: describeError(err),
      });
    }
  }
}
