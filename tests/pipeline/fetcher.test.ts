import { readdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { Fetcher, FetchFn } from '../../src/pipeline/fetcher';
import { createLogger } from '../../src/logger';
import { captureLogs, makeTempDir, removeTempDir } from '../helpers/fixtures';

const SOURCE = 'https://radar.example.test/latest.grib2.gz';

function mockFetch(...responses: Array<() => Promise<Response>>) {
  const fn = jest.fn<ReturnType<FetchFn>, Parameters<FetchFn>>();
  for (const next of responses) {
    fn.mockImplementationOnce(next);
  }
  return fn;
}

const okResponse = (body: string) => async () => new Response(body, { status: 200 });
const statusResponse = (status: number, statusText: string) => async () =>
  new Response('upstream says no', { status, statusText });
const networkError = (message: string) => async (): Promise<Response> => {
  throw new TypeError(message);
};

describe('Fetcher', () => {
  const logs = captureLogs();
  let dir: string;
  let destination: string;
  let sleep: jest.Mock<Promise<void>, [number]>;

  beforeEach(async () => {
    dir = await makeTempDir();
    destination = join(dir, 'reflectivity.grib2.gz');
    sleep = jest.fn<Promise<void>, [number]>(async () => undefined);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  test('streams the body to the destination on the first attempt', async () => {
    const fetchImpl = mockFetch(okResponse('compressed-grid-bytes'));
    const fetcher = new Fetcher({ fetchImpl, sleep, logger: createLogger() });

    const result = await fetcher.fetch(SOURCE, destination);

    expect(result).toEqual({ success: true, value: { attempts: 1, bytes: 21 } });
    expect(await readFile(destination, 'utf8')).toBe('compressed-grid-bytes');
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    expect(fetchImpl.mock.calls[0][0]).toBe(SOURCE);
    expect(sleep).not.toHaveBeenCalled();
  });

  test('retries transport failures with a fixed delay and then succeeds', async () => {
    const fetchImpl = mockFetch(
      networkError('fetch failed'),
      statusResponse(503, 'Service Unavailable'),
      okResponse('third time lucky'),
    );
    const fetcher = new Fetcher({ fetchImpl, sleep });

    const result = await fetcher.fetch(SOURCE, destination);

    expect(result).toEqual({ success: true, value: { attempts: 3, bytes: 16 } });
    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls).toEqual([[3000], [3000]]);
    expect(await readFile(destination, 'utf8')).toBe('third time lucky');

    const warnings = logs.filter((e) => e.message === 'Download attempt failed');
    expect(warnings.map((e) => e.context?.error)).toEqual(['fetch failed', 'HTTP 503 Service Unavailable']);
  });

  test('gives up after three failures without a fourth attempt', async () => {
    const fetchImpl = mockFetch(
      networkError('fetch failed'),
      networkError('socket hang up'),
      statusResponse(502, 'Bad Gateway'),
      okResponse('never requested'),
    );
    const fetcher = new Fetcher({ fetchImpl, sleep });

    const result = await fetcher.fetch(SOURCE, destination);

    expect(fetchImpl).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.code).toBe('FETCH.EXHAUSTED');
    expect(result.error.message).toBe(`Failed to download ${SOURCE} after 3 attempt(s): HTTP 502 Bad Gateway`);
    expect(result.error.details).toEqual({ url: SOURCE, attempts: 3, statusCode: 502 });
    expect(result.error.retryable).toBe(true);
  });

  test('honours a custom attempt budget and delay', async () => {
    const fetchImpl = mockFetch(networkError('down'), networkError('still down'));
    const fetcher = new Fetcher({ fetchImpl, sleep, attempts: 2, retryDelayMs: 10 });

    const result = await fetcher.fetch(SOURCE, destination);

    expect(result.success).toBe(false);
    expect(fetchImpl).toHaveBeenCalledTimes(2);
    expect(sleep.mock.calls).toEqual([[10]]);
  });

  test('a failed refetch leaves the previous artifact untouched', async () => {
    await writeFile(destination, 'previous good snapshot');
    const fetchImpl = mockFetch(
      statusResponse(500, 'Internal Server Error'),
      statusResponse(500, 'Internal Server Error'),
      statusResponse(500, 'Internal Server Error'),
    );
    const fetcher = new Fetcher({ fetchImpl, sleep });

    const result = await fetcher.fetch(SOURCE, destination);

    expect(result.success).toBe(false);
    expect(await readFile(destination, 'utf8')).toBe('previous good snapshot');
    expect(await readdir(dir)).toEqual(['reflectivity.grib2.gz']);
  });

  test('a body that breaks off mid-stream is not committed', async () => {
    await writeFile(destination, 'previous good snapshot');
    const truncated = async () =>
      new Response(
        new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(new TextEncoder().encode('partial'));
            controller.error(new Error('connection reset'));
          },
        }),
        { status: 200 },
      );
    const fetcher = new Fetcher({ fetchImpl: mockFetch(truncated), sleep, attempts: 1 });

    const result = await fetcher.attempt(SOURCE, destination);

    expect(result.success).toBe(false);
    expect(await readFile(destination, 'utf8')).toBe('previous good snapshot');
    expect(await readdir(dir)).toEqual(['reflectivity.grib2.gz']);
  });

  test('a body that cannot be read fails the attempt without a temp file', async () => {
    await writeFile(destination, 'previous good snapshot');
    const consumed = async () => {
      const res = new Response('already read', { status: 200 });
      res.body?.getReader();
      return res;
    };
    const fetcher = new Fetcher({ fetchImpl: mockFetch(consumed), sleep, attempts: 1 });

    const result = await fetcher.attempt(SOURCE, destination);

    expect(result.success).toBe(false);
    expect(await readFile(destination, 'utf8')).toBe('previous good snapshot');
    expect(await readdir(dir)).toEqual(['reflectivity.grib2.gz']);
  });

  test('an unwritable destination fails the attempt', async () => {
    const fetcher = new Fetcher({ fetchImpl: mockFetch(okResponse('GRIB2')), sleep, attempts: 1 });

    const result = await fetcher.attempt(SOURCE, join(dir, 'missing-dir', 'reflectivity.grib2.gz'));

    expect(result.success).toBe(false);
    expect(await readdir(dir)).toEqual([]);
  });

  test('aborts an attempt that exceeds the timeout', async () => {
    const hanging = jest.fn<ReturnType<FetchFn>, Parameters<FetchFn>>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        }),
    );
    const fetcher = new Fetcher({ fetchImpl: hanging, sleep, timeoutMs: 20 });

    const result = await fetcher.attempt(SOURCE, destination);

    expect(result).toEqual({ success: false, error: 'Timed out after 20ms' });
  });
});
