import { AxiosError, AxiosHeaders } from 'axios';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { isTransientHttpError, mapInBatches, withRetry } from './retry.js';

function httpError(status: number): AxiosError {
  const config = { headers: new AxiosHeaders() };
  return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, {
    status,
    statusText: '',
    headers: {},
    config,
    data: {},
  });
}

describe('isTransientHttpError', () => {
  it.each([429, 500, 503, 529])('retries HTTP %s', (status) => {
    expect(isTransientHttpError(httpError(status))).toBe(true);
  });

  it.each([400, 401, 404])('does not retry HTTP %s', (status) => {
    expect(isTransientHttpError(httpError(status))).toBe(false);
  });

  it('retries network resets', () => {
    expect(isTransientHttpError(new AxiosError('socket hang up', 'ECONNRESET'))).toBe(true);
  });

  it('does not retry plain errors', () => {
    expect(isTransientHttpError(new Error('boom'))).toBe(false);
  });
});

describe('withRetry', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('backs off exponentially until the call succeeds', async () => {
    const fn = vi.fn<() => Promise<string>>()
      .mockRejectedValueOnce(httpError(503))
      .mockRejectedValueOnce(httpError(429))
      .mockResolvedValue('ok');

    const result = withRetry(fn, { attempts: 3, baseDelayMs: 100, label: 'Test' });

    await vi.advanceTimersByTimeAsync(99);
    expect(fn).toHaveBeenCalledTimes(1);
    await vi.advanceTimersByTimeAsync(1);
    expect(fn).toHaveBeenCalledTimes(2);
    await vi.advanceTimersByTimeAsync(200);
    expect(fn).toHaveBeenCalledTimes(3);
    await expect(result).resolves.toBe('ok');
    expect(console.warn).toHaveBeenCalledWith('[Test] Attempt 1/3 failed, retrying in 100ms');
    expect(console.warn).toHaveBeenCalledWith('[Test] Attempt 2/3 failed, retrying in 200ms');
  });

  it('gives up after the last attempt', async () => {
    const error = httpError(503);
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(error);

    const result = withRetry(fn, { attempts: 2, baseDelayMs: 10 });
    const assertion = expect(result).rejects.toBe(error);
    await vi.advanceTimersByTimeAsync(10);

    await assertion;
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not retry errors the predicate rejects', async () => {
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(httpError(401));

    await expect(withRetry(fn)).rejects.toThrow('Request failed with status code 401');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});

describe('mapInBatches', () => {
  it('keeps input order and passes the original index', async () => {
    const results = await mapInBatches(['a', 'b', 'c', 'd', 'e'], 2, async (item, index) => `${index}:${item}`);
    expect(results).toEqual(['0:a', '1:b', '2:c', '3:d', '4:e']);
  });

  it('runs one slice at a time', async () => {
    const started: number[] = [];
    let inFlight = 0;
    let peak = 0;

    await mapInBatches([1, 2, 3, 4, 5], 2, async (item) => {
      started.push(item);
      inFlight++;
      peak = Math.max(peak, inFlight);
      await Promise.resolve();
      inFlight--;
    });

    expect(started).toEqual([1, 2, 3, 4, 5]);
    expect(peak).toBe(2);
  });
});
