import { GridSet, GridVariable } from '../../src/domain/grid';
import {
  DEFAULT_LONG_NAME,
  isValidValue,
  normalizeLongitude,
  renderTimestamp,
  sanitizeValue,
  samplePoints,
  selectVariable,
  transform,
} from '../../src/pipeline/transformer';
import { sampleGrid } from '../helpers/fixtures';

const SOURCE = 'https://radar.example.test/latest.grib2.gz';

function variable(name: string, overrides: Partial<GridVariable> = {}): GridVariable {
  return {
    name,
    values: [[1]],
    latitudes: [0],
    longitudes: [0],
    attributes: {},
    ...overrides,
  };
}

/** n x n grid whose cell (i, j) holds i * 100 + j, on axes lat = i, lon = 200 + j. */
function indexedGrid(n: number): GridVariable {
  const axis = Array.from({ length: n }, (_, k) => k);
  return variable('DZ_LOWALT', {
    values: axis.map((i) => axis.map((j) => i * 100 + j)),
    latitudes: axis,
    longitudes: axis.map((j) => 200 + j),
  });
}

describe('selectVariable', () => {
  test('picks the first name containing a reflectivity marker', () => {
    const picked = selectVariable([variable('TMP'), variable('DZ_LOWALT')]);
    expect(picked?.name).toBe('DZ_LOWALT');
  });

  test('matches the full word as well as the abbreviation, first one wins', () => {
    const picked = selectVariable([variable('PRES'), variable('ReflectivityAtLowestAltitude'), variable('DZ')]);
    expect(picked?.name).toBe('ReflectivityAtLowestAltitude');
  });

  test('matching is case-sensitive', () => {
    const picked = selectVariable([variable('TMP'), variable('reflectivity'), variable('dz')]);
    expect(picked?.name).toBe('TMP');
  });

  test('falls back to the first variable when nothing matches', () => {
    expect(selectVariable([variable('TMP'), variable('PRES')])?.name).toBe('TMP');
  });

  test('returns undefined for an empty set', () => {
    expect(selectVariable([])).toBeUndefined();
  });
});

describe('normalizeLongitude', () => {
  test.each([
    [0, 0],
    [-75.5, -75.5],
    [180, 180],
    [180.5, -179.5],
    [190, -170],
    [270, -90],
    [359.75, -0.25],
  ])('%p -> %p', (raw, expected) => {
    expect(normalizeLongitude(raw)).toBe(expected);
  });
});

describe('value handling', () => {
  test('NaN becomes 0 and is then valid', () => {
    expect(sanitizeValue(NaN)).toBe(0);
    expect(isValidValue(sanitizeValue(NaN))).toBe(true);
  });

  test('infinities clamp to the largest finite value', () => {
    expect(sanitizeValue(Infinity)).toBe(Number.MAX_VALUE);
    expect(sanitizeValue(-Infinity)).toBe(-Number.MAX_VALUE);
  });

  test('the -50 threshold itself is excluded', () => {
    expect(isValidValue(-50)).toBe(false);
    expect(isValidValue(-49.999)).toBe(true);
    expect(isValidValue(-99)).toBe(false);
    expect(isValidValue(-999)).toBe(false);
  });
});

describe('renderTimestamp', () => {
  test('renders dates as ISO-8601', () => {
    expect(renderTimestamp(new Date('2025-06-01T12:02:00Z'))).toBe('2025-06-01T12:02:00.000Z');
  });

  test('uses the default string form for other values', () => {
    expect(renderTimestamp('2025-06-01 12:02')).toBe('2025-06-01 12:02');
    expect(renderTimestamp(1748779320)).toBe('1748779320');
  });

  test('falls back instead of failing for an invalid date', () => {
    expect(renderTimestamp(new Date('not a date'))).toBe('Invalid Date');
  });

  test('is empty without a time coordinate', () => {
    expect(renderTimestamp(undefined)).toBe('');
  });
});

describe('samplePoints', () => {
  test('takes every 20th cell from index 0, row-major', () => {
    const points = samplePoints(indexedGrid(41));

    expect(points.map((p) => p.value)).toEqual([0, 20, 40, 2000, 2020, 2040, 4000, 4020, 4040]);
    expect(points[4]).toEqual({ lat: 20, lon: -140, value: 2020 });
  });

  test('is deterministic across runs', () => {
    const grid = indexedGrid(45);
    expect(samplePoints(grid, 20)).toEqual(samplePoints(grid, 20));
  });

  test('every sampled position is distinct', () => {
    const points = samplePoints(indexedGrid(61), 20);
    const keys = new Set(points.map((p) => `${p.lat},${p.lon}`));
    expect(keys.size).toBe(points.length);
    expect(points).toHaveLength(16);
  });
});

describe('transform', () => {
  test('drops sentinels, normalizes longitudes and keeps NaN as 0', () => {
    const result = transform(sampleGrid(), { sourceUrl: SOURCE, stride: 1 });

    expect(result).toEqual({
      success: true,
      value: {
        timestamp: '2025-06-01T12:00:00.000Z',
        metadata: { units: 'dBZ', long_name: 'Reflectivity at Lowest Altitude', source: SOURCE },
        points: [
          { lat: 10, lon: -160, value: -10 },
          { lat: 11, lon: -170, value: 5 },
          { lat: 11, lon: -160, value: 0 },
        ],
      },
    });
  });

  test('defaults to a stride of 20', () => {
    const grid: GridSet = { variables: [indexedGrid(21)] };
    const result = transform(grid, { sourceUrl: SOURCE });

    expect(result.success && result.value.points.map((p) => p.value)).toEqual([0, 20, 2000, 2020]);
  });

  test('fills metadata defaults from missing attributes', () => {
    const result = transform({ variables: [variable('TMP')] }, { sourceUrl: SOURCE });

    expect(result.success && result.value.metadata).toEqual({
      units: '',
      long_name: DEFAULT_LONG_NAME,
      source: SOURCE,
    });
    expect(result.success && result.value.timestamp).toBe('');
  });

  test('fails on an empty variable set', () => {
    const result = transform({ variables: [] }, { sourceUrl: SOURCE });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('TRANSFORM.NO_VARIABLES');
    expect(result.error.message).toBe('Decoded grid contains no data variables');
  });

  test('fails when values do not match the axes', () => {
    const ragged = variable('DZ', { values: [[1, 2], [3]], latitudes: [0, 1], longitudes: [0, 1] });
    const result = transform({ variables: [ragged] }, { sourceUrl: SOURCE });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('TRANSFORM.INVALID_GRID');
    expect(result.error.message).toBe('Variable "DZ": row 1 has 1 cells for 2 longitudes');
  });

  test('rejects a non-positive stride', () => {
    const result = transform(sampleGrid(), { sourceUrl: SOURCE, stride: 0 });
    expect(result.success).toBe(false);
  });
});
