import { describe, expect, it, vi } from 'vitest';
import {
  ExhaustedRetriesError,
  OperationAbortedError,
  PermanentError,
  RemoteCallError,
  TransientError,
} from '../../src/types/errors.js';
import type { CredentialProvider } from '../../src/types/reliability.js';
import {
  RequestExecutor,
  TRANSIENT_NETWORK_CODES,
  classifyError,
  createRetryPolicy,
} from '../../src/utils/retry.js';

const codes = new Set(TRANSIENT_NETWORK_CODES);

function httpError(status: number, body = ''): RemoteCallError {
  return new RemoteCallError(`GET https://example.test returned ${status}`, { status, body });
}

describe('classifyError', () => {
  it('treats throttling, server errors and timeouts as transient', () => {
    expect(classifyError(httpError(408), codes)).toBe('transient');
    expect(classifyError(httpError(429), codes)).toBe('transient');
    expect(classifyError(httpError(500), codes)).toBe('transient');
    expect(classifyError(httpError(503), codes)).toBe('transient');
  });

  it('treats network failures without a status as transient', () => {
    expect(classifyError(new RemoteCallError('socket hang up', { code: 'ECONNRESET' }), codes)).toBe('transient');
    expect(classifyError(new RemoteCallError('no response'), codes)).toBe('transient');
  });

  it('treats an explicit TransientError as transient whatever its status', () => {
    expect(classifyError(new TransientError('busy', { status: 409 }), codes)).toBe('transient');
  });

  it('maps 401 to auth and other client errors to permanent', () => {
    expect(classifyError(httpError(401), codes)).toBe('auth');
    expect(classifyError(httpError(400), codes)).toBe('permanent');
    expect(classifyError(httpError(404), codes)).toBe('permanent');
    expect(classifyError(new Error('boom'), codes)).toBe('permanent');
  });

  it('honours extra transient codes from the policy', () => {
    const policy = createRetryPolicy({ transientCodes: ['OperationNotAllowed'] });
    const error = new RemoteCallError('conflict', { status: 409, code: 'OperationNotAllowed' });

    expect(policy.classify(error)).toBe('transient');
    expect(policy.isRetryable(httpError(409))).toBe(false);
  });
});

describe('createRetryPolicy', () => {
  it('grows the delay exponentially up to the cap', () => {
    const policy = createRetryPolicy({ baseDelayMs: 100, backoffFactor: 2, maxDelayMs: 300, jitterRatio: 0 });

    expect([1, 2, 3, 4].map((attempt) => policy.backoff(attempt))).toEqual([100, 200, 300, 300]);
  });

  it('adds jitter proportional to the exponential delay', () => {
    const policy = createRetryPolicy({ baseDelayMs: 100, jitterRatio: 0.2, random: () => 0.5 });

    expect(policy.backoff(1)).toBe(110);
    expect(policy.backoff(2)).toBe(220);
  });

  it('clamps jitter so the schedule never decreases', () => {
    const policy = createRetryPolicy({ baseDelayMs: 100, backoffFactor: 1, jitterRatio: 0.5, random: () => 0.99 });

    expect(policy.backoff(1)).toBe(100);
    expect(policy.backoff(5)).toBe(100);
  });

  it('rejects a non-positive attempt budget', () => {
    expect(() => createRetryPolicy({ maxAttempts: 0 })).toThrow(RangeError);
  });

  it('returns a frozen policy', () => {
    expect(Object.isFrozen(createRetryPolicy())).toBe(true);
  });
});

describe('RequestExecutor', () => {
  const fastPolicy = (maxAttempts: number) => createRetryPolicy({ maxAttempts, baseDelayMs: 0 });

  it('returns the value on the first success', async () => {
    const executor = new RequestExecutor({ policy: fastPolicy(3) });
    const call = vi.fn(async () => 'ok');

    const result = await executor.execute(call, { label: 'first-try' });

    expect(result.ok).toBe(true);
    expect(result.attempts).toBe(1);
    expect(call).toHaveBeenCalledTimes(1);
    expect(call).toHaveBeenCalledWith({ attempt: 1, token: undefined, signal: undefined });
  });

  it('retries 503 responses and returns the eventual 200 value', async () => {
    const executor = new RequestExecutor({ policy: fastPolicy(5) });
    const call = vi
      .fn<[], Promise<{ status: number }>>()
      .mockRejectedValueOnce(httpError(503))
      .mockRejectedValueOnce(httpError(503))
      .mockResolvedValueOnce({ status: 200 });

    const result = await executor.execute(call);

    expect(result).toMatchObject({ ok: true, value: { status: 200 }, attempts: 3 });
    expect(result.history.map((entry) => entry.outcome)).toEqual([
      'transient_failure',
      'transient_failure',
      'success',
    ]);
  });

  it('stops after exactly maxAttempts transient failures', async () => {
    const executor = new RequestExecutor({ policy: fastPolicy(3) });
    const call = vi.fn(async () => {
      throw httpError(503, 'ServerBusy');
    });

    const result = await executor.execute(call);

    expect(result.ok).toBe(false);
    expect(call).toHaveBeenCalledTimes(3);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ExhaustedRetriesError);
    expect(result.error).toMatchObject({ attempts: 3, status: 503, body: 'ServerBusy' });
    expect(result.error.message).toContain('Retries exhausted after 3 attempt(s)');
  });

  it('fails at once on a permanent error and keeps its status and body', async () => {
    const executor = new RequestExecutor({ policy: fastPolicy(5) });
    const call = vi.fn(async () => {
      throw httpError(404, '{"error":{"code":"NotFound"}}');
    });

    await expect(executor.run(call)).rejects.toMatchObject({
      name: 'PermanentError',
      attempts: 1,
      status: 404,
      body: '{"error":{"code":"NotFound"}}',
    });
    expect(call).toHaveBeenCalledTimes(1);
  });

  it('refreshes the token once on 401 without spending the retry budget', async () => {
    const getToken = vi
      .fn<Parameters<CredentialProvider['getToken']>, Promise<string>>()
      .mockResolvedValueOnce('stale-token')
      .mockResolvedValueOnce('fresh-token');
    const executor = new RequestExecutor({ policy: fastPolicy(1), credentials: { getToken } });
    const call = vi
      .fn<[{ token?: string }], Promise<string>>()
      .mockRejectedValueOnce(httpError(401))
      .mockResolvedValueOnce('done');

    const value = await executor.run(call);

    expect(value).toBe('done');
    expect(getToken).toHaveBeenNthCalledWith(1, { forceRefresh: false, signal: undefined });
    expect(getToken).toHaveBeenNthCalledWith(2, { forceRefresh: true, signal: undefined });
    expect(call.mock.calls[1]?.[0].token).toBe('fresh-token');
  });

  it('treats a second 401 as permanent', async () => {
    const getToken = vi.fn(async () => 'test-token');
    const executor = new RequestExecutor({ policy: fastPolicy(5), credentials: { getToken } });
    const call = vi.fn(async () => {
      throw httpError(401);
    });

    const result = await executor.execute(call);

    expect(call).toHaveBeenCalledTimes(2);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(PermanentError);
    expect(result.history.map((entry) => entry.outcome)).toEqual(['auth_failure', 'auth_failure']);
  });

  it('does not call at all when the signal is already aborted', async () => {
    const executor = new RequestExecutor({ policy: fastPolicy(3) });
    const controller = new AbortController();
    controller.abort();
    const call = vi.fn(async () => 'never');

    const result = await executor.execute(call, { signal: controller.signal });

    expect(call).not.toHaveBeenCalled();
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(OperationAbortedError);
  });

  it('abandons the backoff sleep when the signal fires', async () => {
    const executor = new RequestExecutor({ policy: createRetryPolicy({ maxAttempts: 5, baseDelayMs: 60_000 }) });
    const controller = new AbortController();
    const call = vi.fn(async () => {
      controller.abort();
      throw httpError(503);
    });

    await expect(executor.run(call, { signal: controller.signal })).rejects.toBeInstanceOf(OperationAbortedError);
    expect(call).toHaveBeenCalledTimes(1);
  });

  it('shares credentials with a sibling created by withPolicy', async () => {
    const getToken = vi.fn(async () => 'test-token');
    const executor = new RequestExecutor({ credentials: { getToken } }).withPolicy(fastPolicy(2));
    const call = vi.fn(async ({ token }: { token?: string }) => token);

    await expect(executor.run(call)).resolves.toBe('test-token');
    expect(executor.policy.maxAttempts).toBe(2);
  });
});
