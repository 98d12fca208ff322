import { mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { AddressInfo } from 'net';
import express from 'express';
import { GridDecoder, GridSet } from '../../src/domain/grid';
import { LogEntry, resetLogHandler, setLogHandler } from '../../src/logger';

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'radar-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Grid used across tests: one reflectivity variable, 2x2, on a [0, 360) longitude axis. */
export function sampleGrid(): GridSet {
  return {
    variables: [
      {
        name: 'ReflectivityAtLowestAltitude',
        values: [
          [-999, -10],
          [5, NaN],
        ],
        latitudes: [10, 11],
        longitudes: [190, 200],
        attributes: { units: 'dBZ', long_name: 'Reflectivity at Lowest Altitude' },
      },
    ],
    time: new Date('2025-06-01T12:00:00Z'),
  };
}

/** GridDecoder double returning a fixed grid and recording the paths it was asked to decode. */
export class StubDecoder implements GridDecoder {
  calls: string[] = [];

  constructor(private readonly result: () => Promise<GridSet> = async () => sampleGrid()) {}

  async decode(path: string): Promise<GridSet> {
    this.calls.push(path);
    return this.result();
  }
}

/** Capture log entries for the duration of a test file. */
export function captureLogs(): LogEntry[] {
  const entries: LogEntry[] = [];
  beforeEach(() => {
    entries.length = 0;
    setLogHandler((entry) => entries.push(entry));
  });
  afterEach(() => {
    resetLogHandler();
  });
  return entries;
}

export interface TestResponse {
  status: number;
  headers: Headers;
  body: unknown;
}

/** Issue one request against an app listening on an ephemeral port. */
export async function request(
  app: express.Application,
  method: string,
  path: string,
  headers?: Record<string, string>,
): Promise<TestResponse> {
  const server = await new Promise<ReturnType<express.Application['listen']>>((resolve) => {
    const s = app.listen(0, () => resolve(s));
  });
  try {
    const address: AddressInfo | string | null = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Test server has no TCP address');
    }
    const res = await fetch(`http://127.0.0.1:${address.port}${path}`, { method, headers });
    const text = await res.text();
    return { status: res.status, headers: res.headers, body: text ? JSON.parse(text) : undefined };
  } finally {
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
}
