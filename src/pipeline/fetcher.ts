/**
 * Fetcher: downloads the compressed snapshot to local storage.
 *
 * Each attempt streams the response body into a temporary file and only
 * renames it over the destination once the body has been fully written,
 * so a failed refetch never truncates a previously good artifact.
 *
 * Attempts report their outcome as an AttemptResult; the retry driver
 * inspects those results and waits a fixed delay between attempts.
 */

import { open, stat } from 'fs/promises';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { TypedError, describeError, fetchError } from '../domain/errors';
import { StageResult, fail, ok } from '../domain/result';
import { Logger, logger as rootLogger } from '../logger';
import { commit, discard, tempPathFor } from './atomic-file';

/** Outcome of a single download attempt. */
export type AttemptResult =
  | { success: true; bytes: number }
  | { success: false; error: string; statusCode?: number };

/** Summary of a completed download. */
export interface FetchSummary {
  attempts: number;
  bytes: number;
}

/** fetch-compatible function (injectable for testing). */
export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface FetcherOptions {
  /** Maximum number of attempts. Default: 3 */
  attempts?: number;
  /** Fixed delay between attempts in ms. Default: 3000 */
  retryDelayMs?: number;
  /** Per-attempt timeout in ms, covering headers and body. Default: 60000 */
  timeoutMs?: number;
  fetchImpl?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class Fetcher {
  private readonly attempts: number;
  private readonly retryDelayMs: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly log: Logger;

  constructor(options: FetcherOptions = {}) {
    this.attempts = options.attempts ?? 3;
    this.retryDelayMs = options.retryDelayMs ?? 3_000;
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? sleep;
    this.log = options.logger ?? rootLogger.child({ stage: 'fetch' });
  }

  /** Download `url` to `destination`, retrying on any transport failure. */
  async fetch(url: string, destination: string, log: Logger = this.log): Promise<StageResult<FetchSummary>> {
    let lastFailure: { error: string; statusCode?: number } = { error: 'no attempt made' };

    for (let attempt = 1; attempt <= this.attempts; attempt++) {
      log.info('Downloading radar snapshot', { url, attempt, maxAttempts: this.attempts });
      const result = await this.attempt(url, destination);

      if (result.success) {
        log.info('Download complete', { url, attempt, bytes: result.bytes });
        return ok({ attempts: attempt, bytes: result.bytes });
      }

      lastFailure = result;
      log.warn('Download attempt failed', {
        url,
        attempt,
        maxAttempts: this.attempts,
        error: result.error,
        statusCode: result.statusCode,
      });

      if (attempt < this.attempts) {
        await this.sleep(this.retryDelayMs);
      }
    }

    const error: TypedError = fetchError(url, this.attempts, lastFailure.error, lastFailure.statusCode);
    return fail(error);
  }

  /** One download attempt. Transport failures are reported, not thrown. */
  async attempt(url: string, destination: string): Promise<AttemptResult> {
    const tempPath = tempPathFor(destination);
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(url, { signal: controller.signal });
      if (!response.ok) {
        await response.body?.cancel();
        return {
          success: false,
          error: `HTTP ${response.status} ${response.statusText}`.trim(),
          statusCode: response.status,
        };
      }
      if (!response.body) {
        return { success: false, error: 'Response has no body', statusCode: response.status };
      }

      const source = Readable.fromWeb(response.body);
      // Opened before streaming so the temp file exists whenever discard() runs.
      const output = await open(tempPath, 'w').catch((err: unknown) => {
        source.destroy();
        throw err;
      });
      await pipeline(source, output.createWriteStream());
      const { size } = await stat(tempPath);
      await commit(tempPath, destination);
      return { success: true, bytes: size };
    } catch (err) {
      if (controller.signal.aborted) {
        return { success: false, error: `Timed out after ${this.timeoutMs}ms` };
      }
      return { success: false, error: describeError(err) };
    } finally {
      clearTimeout(timer);
      await discard(tempPath);
    }
  }
}
