/**
 * Extractor: gunzips the downloaded artifact into the grid file.
 *
 * Output goes to a temporary sibling and replaces the grid file only
 * after the whole stream decompressed cleanly; truncated or corrupt
 * input leaves the previous grid untouched.
 */

import { createReadStream } from 'fs';
import { open, stat } from 'fs/promises';
import { pipeline } from 'stream/promises';
import { createGunzip } from 'zlib';
import { describeError, extractError } from '../domain/errors';
import { StageResult, fail, ok } from '../domain/result';
import { commit, discard, tempPathFor } from './atomic-file';

export interface ExtractSummary {
  bytes: number;
}

export async function extract(compressedPath: string, outputPath: string): Promise<StageResult<ExtractSummary>> {
  const tempPath = tempPathFor(outputPath);
  try {
    const output = await open(tempPath, 'w');
    await pipeline(createReadStream(compressedPath), createGunzip(), output.createWriteStream());
    const { size } = await stat(tempPath);
    await commit(tempPath, outputPath);
    return ok({ bytes: size });
  } catch (err) {
    return fail(extractError(compressedPath, describeError(err)));
  } finally {
    await discard(tempPath);
  }
}
