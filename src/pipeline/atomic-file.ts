/**
 * Write-then-rename helpers for the single-slot artifacts.
 *
 * Readers only ever see a complete file: content goes to a uniquely
 * named sibling first and replaces the target with one rename.
 */

import { rename, rm, writeFile } from 'fs/promises';
import { v4 as uuid } from 'uuid';

/** Unique temporary path in the same directory as `target`. */
export function tempPathFor(target: string): string {
  return `${target}.${uuid()}.tmp`;
}

/** Remove a temporary file if it is still there. */
export async function discard(tempPath: string): Promise<void> {
  await rm(tempPath, { force: true });
}

/** Move a finished temporary file over the target. */
export async function commit(tempPath: string, target: string): Promise<void> {
  await rename(tempPath, target);
}

/** Write `data` to `target` atomically. */
export async function writeFileAtomic(target: string, data: string | Uint8Array): Promise<void> {
  const tempPath = tempPathFor(target);
  try {
    await writeFile(tempPath, data);
    await commit(tempPath, target);
  } finally {
    await discard(tempPath);
  }
}
