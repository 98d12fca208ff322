/**
 * JSON side-cache of the last published payload.
 *
 * The file holds the payload together with the stride it was sampled
 * at. A cached payload is only reused by a pipeline whose source URL and
 * stride match; anything else decodes the grid again.
 */

import { readFile } from 'fs/promises';
import { RadarPayload, isRadarPayload } from '../domain/radar';
import { writeFileAtomic } from './atomic-file';
import { fileModifiedMs } from './cache-gate';

/** On-disk layout of the side-cache. */
export interface CachedPayload {
  stride: number;
  payload: RadarPayload;
}

export interface PayloadCacheQuery {
  /** The cache must be at least this recent (epoch ms), usually the grid's mtime. */
  notBeforeMs: number;
  sourceUrl: string;
  stride: number;
}

function isCachedPayload(value: unknown): value is CachedPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'stride' in value &&
    typeof value.stride === 'number' &&
    'payload' in value &&
    isRadarPayload(value.payload)
  );
}

export async function writePayloadCache(path: string, payload: RadarPayload, stride: number): Promise<void> {
  const entry: CachedPayload = { stride, payload };
  await writeFileAtomic(path, JSON.stringify(entry));
}

/**
 * Read the cached payload if it matches `query`.
 * Returns null when the file is missing, older, not a cache entry, or
 * written for another source or stride. Unparsable JSON rejects.
 */
export async function readPayloadCache(path: string, query: PayloadCacheQuery): Promise<RadarPayload | null> {
  const modifiedMs = await fileModifiedMs(path);
  if (modifiedMs === null || modifiedMs < query.notBeforeMs) return null;

  const parsed: unknown = JSON.parse(await readFile(path, 'utf8'));
  if (!isCachedPayload(parsed)) return null;
  if (parsed.stride !== query.stride || parsed.payload.metadata.source !== query.sourceUrl) return null;
  return parsed.payload;
}
