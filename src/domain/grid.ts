/**
 * Decoded grid model.
 *
 * What a GridDecoder hands to the transformer: named 2-D variables on
 * latitude/longitude axes, plus the snapshot's valid time when the file
 * carries one.
 */

/** Attribute metadata attached to a variable (units, long_name, ...). */
export type GridAttributes = Record<string, string>;

/** A single named 2-D data variable. */
export interface GridVariable {
  name: string;
  /** Row-major values: `values[latIndex][lonIndex]`. */
  values: number[][];
  latitudes: number[];
  longitudes: number[];
  attributes: GridAttributes;
}

/**
 * Time coordinate as a decoder reports it. Dates render as ISO-8601;
 * anything else renders through its default string form.
 */
export type GridTime = Date | string | number;

/** The full result of decoding one grid file. */
export interface GridSet {
  /** Variables in the order the decoder listed them. */
  variables: GridVariable[];
  time?: GridTime;
}

/** Decoding capability the pipeline depends on. */
export interface GridDecoder {
  decode(path: string): Promise<GridSet>;
}

/** Look up an attribute, falling back when the key is missing. */
export function attributeOr(attributes: GridAttributes, key: string, fallback: string): string {
  const value = attributes[key];
  return value !== undefined ? value : fallback;
}
