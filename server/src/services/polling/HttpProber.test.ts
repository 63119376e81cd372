import pino from 'pino';
import { HttpProber } from './HttpProber';
import { AlertPolicy } from './types';

const mockFetch = jest.fn();
global.fetch = mockFetch;

const URL = 'https://api.example.com/health';
const logger = pino({ level: 'silent' });

/** Returns start, then start + each elapsed value in turn. */
function clockFrom(start: number, ...elapsed: number[]): () => number {
  const now = jest.fn().mockReturnValueOnce(start);
  for (const ms of elapsed) now.mockReturnValueOnce(start + ms);
  return now;
}

function createProber(policy: Partial<AlertPolicy> = {}, now?: () => number): HttpProber {
  return new HttpProber({
    policy: { cooldownMs: 60_000, latencyThresholdMs: 0, ...policy },
    logger,
    now,
  });
}

function abortError(): Error {
  const err = new Error('This operation was aborted');
  err.name = 'AbortError';
  return err;
}

/** A fetch that only settles when its signal aborts. */
function hangingFetch(_url: string, init: RequestInit): Promise<never> {
  return new Promise((_resolve, reject) => {
    init.signal?.addEventListener('abort', () => reject(abortError()));
  });
}

describe('HttpProber', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('should report a fast 200 as healthy', async () => {
    mockFetch.mockResolvedValueOnce({ status: 200, body: null });
    const prober = createProber({}, clockFrom(1_000, 50));

    const outcome = await prober.probe(URL, 5_000);

    expect(outcome).toEqual({
      url: URL,
      status: 'healthy',
      detail: 'HTTP 200 in 50ms',
      latencyMs: 50,
      timestamp: 1_000,
      statusCode: 200,
    });
  });

  it('should issue a single GET with a user agent and an abort signal', async () => {
    mockFetch.mockResolvedValueOnce({ status: 200, body: null });

    await createProber().probe(URL, 5_000);

    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch).toHaveBeenCalledWith(
      URL,
      expect.objectContaining({
        method: 'GET',
        headers: { 'User-Agent': 'endpoint-watch/1.0' },
        signal: expect.any(AbortSignal),
      }),
    );
  });

  it('should report a 500 as error', async () => {
    mockFetch.mockResolvedValueOnce({ status: 500, body: null });

    const outcome = await createProber({}, clockFrom(0, 12)).probe(URL, 5_000);

    expect(outcome.status).toBe('error');
    expect(outcome.detail).toBe('HTTP 500');
    expect(outcome.statusCode).toBe(500);
  });

  it('should report a slow 200 as slow when over the threshold', async () => {
    mockFetch.mockResolvedValueOnce({ status: 200, body: null });

    const outcome = await createProber({ latencyThresholdMs: 500 }, clockFrom(0, 800)).probe(URL, 5_000);

    expect(outcome.status).toBe('slow');
    expect(outcome.detail).toBe('HTTP 200 in 800ms exceeds latency threshold 500ms');
    expect(outcome.latencyMs).toBe(800);
  });

  it('should discard the response body without reading it', async () => {
    const cancel = jest.fn().mockResolvedValue(undefined);
    mockFetch.mockResolvedValueOnce({ status: 200, body: { cancel } });

    await createProber().probe(URL, 5_000);

    expect(cancel).toHaveBeenCalledTimes(1);
  });

  it('should still classify when discarding the body fails', async () => {
    const cancel = jest.fn().mockRejectedValue(new Error('stream locked'));
    mockFetch.mockResolvedValueOnce({ status: 204, body: { cancel } });

    const outcome = await createProber({}, clockFrom(0, 5)).probe(URL, 5_000);

    expect(outcome.status).toBe('healthy');
    expect(outcome.detail).toBe('HTTP 204 in 5ms');
  });

  it('should map connection refused to a short description', async () => {
    const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:9'), { code: 'ECONNREFUSED' });
    mockFetch.mockRejectedValueOnce(new TypeError('fetch failed', { cause }));

    const outcome = await createProber({}, clockFrom(0, 3)).probe(URL, 5_000);

    expect(outcome).toEqual({
      url: URL,
      status: 'error',
      detail: 'Connection refused',
      latencyMs: 3,
      timestamp: 0,
    });
  });

  it('should report a timeout with latency equal to the timeout', async () => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-01-01T00:00:00Z'));
    mockFetch.mockImplementationOnce(hangingFetch);

    const pending = createProber().probe(URL, 5_000);
    await jest.advanceTimersByTimeAsync(5_000);
    const outcome = await pending;

    expect(outcome.status).toBe('error');
    expect(outcome.detail).toBe('request timed out after 5.00s');
    expect(outcome.latencyMs).toBe(5_000);
    expect(outcome.statusCode).toBeUndefined();
  });

  it('should report cancellation when the caller aborts', async () => {
    mockFetch.mockImplementationOnce(hangingFetch);
    const controller = new AbortController();

    const pending = createProber().probe(URL, 5_000, controller.signal);
    controller.abort();
    const outcome = await pending;

    expect(outcome.status).toBe('error');
    expect(outcome.detail).toBe('request cancelled');
  });

  it('should not issue a request when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();

    const outcome = await createProber().probe(URL, 5_000, controller.signal);

    expect(mockFetch).not.toHaveBeenCalled();
    expect(outcome.detail).toBe('request cancelled');
  });
});
