/**
 * Transformer: turns a decoded grid into the radar point payload.
 *
 * Steps, in order:
 *   1. pick the reflectivity variable (first name containing
 *      "Reflectivity" or "DZ", else the first variable)
 *   2. sample every `stride`-th row and column starting at index 0
 *   3. replace non-finite cells (NaN becomes 0)
 *   4. keep cells strictly greater than -50
 *   5. map longitudes above 180 into [-180, 180)
 *   6. render the snapshot time, never failing the transform over it
 *   7. assemble metadata from the variable attributes
 *
 * Points come out row-major: sampled latitude index, then sampled
 * longitude index.
 */

import { GridSet, GridTime, GridVariable, attributeOr } from '../domain/grid';
import { invalidGridError, transformError } from '../domain/errors';
import { RadarPayload, RadarPoint } from '../domain/radar';
import { StageResult, fail, ok } from '../domain/result';

export const DEFAULT_STRIDE = 20;

/** Values at or below this are missing-data sentinels (-99, -999, ...). */
export const INVALID_VALUE_THRESHOLD = -50;

export const DEFAULT_LONG_NAME = 'Reflectivity at Lowest Altitude';

const REFLECTIVITY_MARKERS = ['Reflectivity', 'DZ'];

export interface TransformOptions {
  /** Reported as metadata.source. */
  sourceUrl: string;
  stride?: number;
}

/** Choose the variable to publish. Returns undefined for an empty set. */
export function selectVariable(variables: GridVariable[]): GridVariable | undefined {
  const match = variables.find((v) => REFLECTIVITY_MARKERS.some((marker) => v.name.includes(marker)));
  return match ?? variables[0];
}

/** Map a [0, 360) longitude into [-180, 180). */
export function normalizeLongitude(lon: number): number {
  return lon > 180 ? lon - 360 : lon;
}

/**
 * Replace non-finite cell values: NaN becomes 0, infinities become the
 * largest finite value of the same sign.
 */
export function sanitizeValue(value: number): number {
  if (Number.isNaN(value)) return 0;
  if (value === Infinity) return Number.MAX_VALUE;
  if (value === -Infinity) return -Number.MAX_VALUE;
  return value;
}

export function isValidValue(value: number): boolean {
  return value > INVALID_VALUE_THRESHOLD;
}

/**
 * Render the time coordinate. Dates become ISO-8601, other values use
 * their default string form, and a missing coordinate is "".
 */
export function renderTimestamp(time: GridTime | undefined): string {
  if (time === undefined) return '';
  try {
    return time instanceof Date ? time.toISOString() : String(time);
  } catch {
    // toISOString() throws for an invalid Date
    return String(time);
  }
}

function checkShape(variable: GridVariable): string | undefined {
  const { values, latitudes, longitudes } = variable;
  if (values.length !== latitudes.length) {
    return `${values.length} rows for ${latitudes.length} latitudes`;
  }
  const badRow = values.findIndex((row) => row.length !== longitudes.length);
  if (badRow !== -1) {
    return `row ${badRow} has ${values[badRow].length} cells for ${longitudes.length} longitudes`;
  }
  return undefined;
}

/** Sample, filter and normalize a variable into points. */
export function samplePoints(variable: GridVariable, stride: number = DEFAULT_STRIDE): RadarPoint[] {
  const { values, latitudes, longitudes } = variable;
  const points: RadarPoint[] = [];

  for (let i = 0; i < latitudes.length; i += stride) {
    const row = values[i];
    for (let j = 0; j < longitudes.length; j += stride) {
      const value = sanitizeValue(row[j]);
      if (!isValidValue(value)) continue;
      points.push({
        lat: latitudes[i],
        lon: normalizeLongitude(longitudes[j]),
        value,
      });
    }
  }

  return points;
}

export function transform(grid: GridSet, options: TransformOptions): StageResult<RadarPayload> {
  const stride = options.stride ?? DEFAULT_STRIDE;
  if (!Number.isInteger(stride) || stride < 1) {
    return fail(transformError(`Stride must be a positive integer, got ${stride}`, { stride }));
  }

  const variable = selectVariable(grid.variables);
  if (!variable) {
    return fail(transformError('Decoded grid contains no data variables'));
  }

  const shapeProblem = checkShape(variable);
  if (shapeProblem) {
    return fail(invalidGridError(variable.name, shapeProblem));
  }

  return ok({
    timestamp: renderTimestamp(grid.time),
    metadata: {
      units: attributeOr(variable.attributes, 'units', ''),
      long_name: attributeOr(variable.attributes, 'long_name', DEFAULT_LONG_NAME),
      source: options.sourceUrl,
    },
    points: samplePoints(variable, stride),
  });
}
