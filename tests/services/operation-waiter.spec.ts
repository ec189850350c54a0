import { afterEach, describe, expect, it, vi } from 'vitest';
import { OperationWaiter, type StatusProbe } from '../../src/services/operation-waiter.js';
import {
  OperationAbortedError,
  PermanentError,
  RemoteCallError,
  RemoteOperationFailedError,
  ValidationError,
  WaitTimeoutError,
} from '../../src/types/errors.js';
import type { ProbeResult } from '../../src/types/operation.js';
import { RequestExecutor, createRetryPolicy } from '../../src/utils/retry.js';

const executor = new RequestExecutor({ policy: createRetryPolicy({ maxAttempts: 3, baseDelayMs: 0 }) });
const operation = { handle: 'images/img-1', kind: 'image-create' } as const;

function probeSequence(...results: Array<ProbeResult<{ id: string }> | Error>) {
  let index = 0;
  return vi.fn<Parameters<StatusProbe<{ id: string }>>, ReturnType<StatusProbe<{ id: string }>>>(async () => {
    const result = results[Math.min(index, results.length - 1)];
    index += 1;
    if (!result) throw new Error('empty probe sequence');
    if (result instanceof Error) throw result;
    return result;
  });
}

describe('OperationWaiter', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('probes at once, then every poll interval, until Succeeded', async () => {
    vi.useFakeTimers();
    const start = Date.now();
    const probedAt: number[] = [];
    const results: Array<ProbeResult<{ id: string }>> = [
      { status: 'InProgress' },
      { status: 'InProgress' },
      { status: 'Succeeded', payload: { id: 'img-1' } },
    ];
    const waiter = new OperationWaiter<{ id: string }>(
      operation,
      async () => {
        probedAt.push(Date.now() - start);
        return results[probedAt.length - 1] ?? { status: 'InProgress' };
      },
      { executor, pollIntervalMs: 5000, timeoutMs: 60_000 },
    );

    const pending = waiter.wait();
    await vi.advanceTimersByTimeAsync(10_000);
    const outcome = await pending;

    expect(probedAt).toEqual([0, 5000, 10_000]);
    expect(outcome).toEqual({
      handle: 'images/img-1',
      kind: 'image-create',
      status: 'Succeeded',
      payload: { id: 'img-1' },
      probes: 3,
      durationMs: 10_000,
    });
    expect(waiter.history).toEqual(['Pending', 'InProgress', 'Succeeded']);
  });

  it('refuses to run twice', async () => {
    const waiter = new OperationWaiter(operation, probeSequence({ status: 'Succeeded' }), { executor, pollIntervalMs: 0 });

    await waiter.wait();

    await expect(waiter.wait()).rejects.toThrow(new ValidationError('Waiter for images/img-1 has already run.'));
  });

  it('raises RemoteOperationFailedError with the remote detail', async () => {
    const probe = probeSequence({ status: 'InProgress' }, { status: 'Failed', detail: 'provisioningState Failed' });
    const waiter = new OperationWaiter(operation, probe, { executor, pollIntervalMs: 0 });

    const error = await waiter.wait().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteOperationFailedError);
    expect(error).toMatchObject({
      message: 'image-create operation images/img-1 ended as Failed: provisioningState Failed',
      status: 'Failed',
    });
    expect(waiter.status).toBe('Failed');
    expect(waiter.history).toEqual(['Pending', 'InProgress', 'Failed']);
  });

  it('times out once the deadline passes without a terminal status', async () => {
    let clock = 0;
    const waiter = new OperationWaiter(
      operation,
      async () => {
        clock += 1000;
        return { status: 'InProgress' };
      },
      { executor, pollIntervalMs: 0, timeoutMs: 2500, now: () => clock },
    );

    const error = await waiter.wait().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(WaitTimeoutError);
    expect(error).toMatchObject({
      message:
        'Timed out after 2500ms waiting for image-create operation images/img-1; last status InProgress after 3 probe(s).',
      lastStatus: 'InProgress',
      probes: 3,
    });
  });

  it('never sleeps past the deadline', async () => {
    vi.useFakeTimers();
    const probe = probeSequence({ status: 'InProgress' });
    const waiter = new OperationWaiter(operation, probe, { executor, pollIntervalMs: 5000, timeoutMs: 7000 });

    const pending = waiter.wait().catch((err: unknown) => err);
    await vi.advanceTimersByTimeAsync(7000);

    expect(await pending).toBeInstanceOf(WaitTimeoutError);
    expect(probe).toHaveBeenCalledTimes(2);
  });

  it('cuts retry backoff short at the wait deadline', async () => {
    vi.useFakeTimers();
    const slowRetry = new RequestExecutor({
      policy: createRetryPolicy({ maxAttempts: 5, baseDelayMs: 50, jitterRatio: 0 }),
    });
    const probe = probeSequence(new RemoteCallError('busy', { status: 503 }));
    const waiter = new OperationWaiter(operation, probe, { executor: slowRetry, pollIntervalMs: 10, timeoutMs: 60 });

    const pending = waiter.wait().catch((err: unknown) => err);
    await vi.advanceTimersByTimeAsync(60);
    const error = await pending;

    expect(error).toBeInstanceOf(WaitTimeoutError);
    expect(error).toMatchObject({
      message: 'Timed out after 60ms waiting for image-create operation images/img-1; last status Pending after 1 probe(s).',
      lastStatus: 'Pending',
      probes: 1,
    });
    expect(probe).toHaveBeenCalledTimes(2);
  });

  it('reports a caller abort during a status retry as a stopped wait', async () => {
    const controller = new AbortController();
    const probe = vi.fn(async (): Promise<ProbeResult<{ id: string }>> => {
      controller.abort();
      throw new RemoteCallError('busy', { status: 503 });
    });
    const waiter = new OperationWaiter(operation, probe, {
      executor,
      pollIntervalMs: 0,
      signal: controller.signal,
    });

    const error = await waiter.wait().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(OperationAbortedError);
    expect(error).toMatchObject({ message: 'Stopped waiting for image-create operation images/img-1.' });
    expect(probe).toHaveBeenCalledTimes(1);
  });

  it('absorbs transient probe failures inside one poll', async () => {
    const probe = probeSequence(new RemoteCallError('busy', { status: 503 }), { status: 'Succeeded' });
    const waiter = new OperationWaiter(operation, probe, { executor, pollIntervalMs: 0 });

    const outcome = await waiter.wait();

    expect(outcome.probes).toBe(1);
    expect(probe).toHaveBeenCalledTimes(2);
  });

  it('surfaces a permanent probe failure', async () => {
    const probe = probeSequence(new RemoteCallError('forbidden', { status: 403 }));
    const waiter = new OperationWaiter(operation, probe, { executor, pollIntervalMs: 0 });

    await expect(waiter.wait()).rejects.toBeInstanceOf(PermanentError);
  });

  it('stops waiting when the caller aborts', async () => {
    const controller = new AbortController();
    const waiter = new OperationWaiter(
      operation,
      async () => {
        controller.abort();
        return { status: 'InProgress' };
      },
      { executor, pollIntervalMs: 60_000, signal: controller.signal },
    );

    const error = await waiter.wait().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(OperationAbortedError);
    expect(error).toMatchObject({ message: 'Stopped waiting for image-create operation images/img-1.' });
  });
});
