/**
 * GridDecoder backed by the external wgrib2 program.
 *
 * Runs `wgrib2 <file> -csv -` and streams the CSV inventory it prints,
 * one record per grid point:
 *
 *   "2025-06-01 12:00:00","2025-06-01 12:00:00","ReflectivityAtLowestAltitude","500 m above mean sea level",230.005,54.995,-999
 *
 * (reference time, valid time, field, level, longitude, latitude, value).
 * Records are grouped per field/level into variables, and each
 * variable's axes are rebuilt from the first-seen latitude and longitude
 * values in output order.
 */

import { spawn } from 'child_process';
import { createInterface } from 'readline';
import { GridAttributes, GridDecoder, GridSet, GridVariable } from '../domain/grid';
import { Logger, logger as rootLogger } from '../logger';

/** wgrib2 prints undefined grid points as 9.999e20. */
export const WGRIB2_UNDEFINED = 9.999e20;

/** Units for MRMS products wgrib2 does not annotate in CSV output. */
const KNOWN_UNITS: Record<string, string> = {
  ReflectivityAtLowestAltitude: 'dBZ',
  MergedReflectivityQCComposite: 'dBZ',
  MergedBaseReflectivityQC: 'dBZ',
  SeamlessHSR: 'dBZ',
  PrecipRate: 'mm/hr',
};

const CSV_RECORD = /^"([^"]*)","([^"]*)","([^"]*)","([^"]*)",([^,]+),([^,]+),([^,]+)$/;

export interface Wgrib2Record {
  referenceTime: string;
  validTime: string;
  field: string;
  level: string;
  lon: number;
  lat: number;
  value: number;
}

/** Parse one CSV line. Returns null for lines that are not records. */
export function parseWgrib2CsvLine(line: string): Wgrib2Record | null {
  const match = CSV_RECORD.exec(line.trim());
  if (!match) return null;
  const [, referenceTime, validTime, field, level, lonText, latText, valueText] = match;
  const lon = Number(lonText);
  const lat = Number(latText);
  const raw = Number(valueText);
  if (!Number.isFinite(lon) || !Number.isFinite(lat) || Number.isNaN(raw)) return null;
  return {
    referenceTime,
    validTime,
    field,
    level,
    lon,
    lat,
    value: raw >= WGRIB2_UNDEFINED ? NaN : raw,
  };
}

/** wgrib2 prints times as "YYYY-MM-DD hh:mm:ss" in UTC. */
export function parseWgrib2Time(text: string): Date | string {
  const date = new Date(`${text.replace(' ', 'T')}Z`);
  return Number.isNaN(date.getTime()) ? text : date;
}

/** Accumulates records for one field/level into a grid variable. */
class VariableBuilder {
  private latIndex = new Map<number, number>();
  private lonIndex = new Map<number, number>();
  private rows: number[][] = [];

  constructor(
    readonly name: string,
    private readonly attributes: GridAttributes,
  ) {}

  add(record: Wgrib2Record): void {
    let row = this.latIndex.get(record.lat);
    if (row === undefined) {
      row = this.latIndex.size;
      this.latIndex.set(record.lat, row);
      this.rows.push([]);
    }
    let col = this.lonIndex.get(record.lon);
    if (col === undefined) {
      col = this.lonIndex.size;
      this.lonIndex.set(record.lon, col);
    }
    this.rows[row][col] = record.value;
  }

  build(): GridVariable {
    const width = this.lonIndex.size;
    // Points the decoder never reported are missing data.
    const values = this.rows.map((row) => Array.from({ length: width }, (_, j) => row[j] ?? NaN));
    return {
      name: this.name,
      values,
      latitudes: [...this.latIndex.keys()],
      longitudes: [...this.lonIndex.keys()],
      attributes: { ...this.attributes },
    };
  }
}

/** Assembles a GridSet from wgrib2 CSV records in arrival order. */
export class GridAssembler {
  private builders = new Map<string, VariableBuilder>();
  private time: Date | string | undefined;
  private recordCount = 0;

  add(record: Wgrib2Record): void {
    this.recordCount++;
    if (this.time === undefined) {
      this.time = parseWgrib2Time(record.validTime);
    }
    const key = `${record.field}\u0000${record.level}`;
    let builder = this.builders.get(key);
    if (!builder) {
      const duplicateField = [...this.builders.values()].some((b) => b.name === record.field);
      const name = duplicateField ? `${record.field} (${record.level})` : record.field;
      const attributes: GridAttributes = { long_name: record.field, level: record.level };
      const units = KNOWN_UNITS[record.field];
      if (units) attributes.units = units;
      builder = new VariableBuilder(name, attributes);
      this.builders.set(key, builder);
    }
    builder.add(record);
  }

  get records(): number {
    return this.recordCount;
  }

  build(): GridSet {
    const grid: GridSet = { variables: [...this.builders.values()].map((b) => b.build()) };
    if (this.time !== undefined) grid.time = this.time;
    return grid;
  }
}

export interface Wgrib2DecoderOptions {
  /** Path to the wgrib2 executable. Default: "wgrib2" on PATH. */
  executable?: string;
  logger?: Logger;
}

const STDERR_LIMIT = 4_096;

export class Wgrib2GridDecoder implements GridDecoder {
  private readonly executable: string;
  private readonly log: Logger;

  constructor(options: Wgrib2DecoderOptions = {}) {
    this.executable = options.executable ?? 'wgrib2';
    this.log = options.logger ?? rootLogger.child({ component: 'wgrib2-decoder' });
  }

  async decode(path: string): Promise<GridSet> {
    const child = spawn(this.executable, [path, '-csv', '-'], { stdio: ['ignore', 'pipe', 'pipe'] });

    let stderr = '';
    child.stderr.setEncoding('utf8');
    child.stderr.on('data', (chunk: string) => {
      if (stderr.length < STDERR_LIMIT) stderr += chunk;
    });

    // Resolves (never rejects) so a spawn failure cannot go unhandled while stdout drains.
    const exited = new Promise<{ code: number | null; error?: Error }>((resolve) => {
      child.once('error', (error) => resolve({ code: null, error }));
      child.once('close', (code) => resolve({ code }));
    });

    const assembler = new GridAssembler();
    let skipped = 0;
    const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
    for await (const line of lines) {
      if (line.trim() === '') continue;
      const record = parseWgrib2CsvLine(line);
      if (record) {
        assembler.add(record);
      } else {
        skipped++;
      }
    }

    const { code, error } = await exited;
    if (error) {
      throw new Error(`Could not run ${this.executable}: ${error.message}`);
    }
    if (code !== 0) {
      throw new Error(`${this.executable} exited with code ${code}: ${stderr.trim() || 'no output'}`);
    }
    if (assembler.records === 0) {
      throw new Error(`${this.executable} produced no grid records${skipped > 0 ? ` (${skipped} unparsable lines)` : ''}`);
    }
    if (skipped > 0) {
      this.log.warn('Skipped unparsable wgrib2 lines', { path, skipped });
    }

    return assembler.build();
  }
}
