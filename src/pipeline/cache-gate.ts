/**
 * Cache gate: decides whether the decoded grid is stale.
 *
 * The modification time of the decoded grid is the only freshness
 * signal. No side effects.
 */

import { stat } from 'fs/promises';

export const DEFAULT_MAX_AGE_SECONDS = 900;

/** Modification time in epoch ms, or null when the file does not exist. */
export async function fileModifiedMs(path: string): Promise<number | null> {
  try {
    return (await stat(path)).mtimeMs;
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw err;
  }
}

/** Age of a file in seconds, or null when it does not exist. */
export async function fileAgeSeconds(path: string, now: number = Date.now()): Promise<number | null> {
  const modified = await fileModifiedMs(path);
  return modified === null ? null : (now - modified) / 1000;
}

/** True when the file is absent or at least `maxAgeSeconds` old. */
export async function shouldRefetch(
  path: string,
  maxAgeSeconds: number = DEFAULT_MAX_AGE_SECONDS,
  now: number = Date.now(),
): Promise<boolean> {
  const age = await fileAgeSeconds(path, now);
  return age === null || age >= maxAgeSeconds;
}

/** True for an ENOENT failure. Checks the code only: fs errors may come from another realm. */
export function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
