import {
    OperationAbortedError,
    RemoteOperationFailedError,
    ValidationError,
    WaitTimeoutError,
} from '../types/errors.js';
import type {
    OperationHandle,
    OperationKind,
    OperationOutcome,
    OperationStatus,
    ProbeResult,
} from '../types/operation.js';
import type { AttemptContext } from '../types/reliability.js';
import { RequestExecutor, sleep } from '../utils/retry.js';
import { logActivity } from '../utils/logger.js';

export const DEFAULT_POLL_INTERVAL_MS = 5_000;
export const DEFAULT_WAIT_TIMEOUT_MS = 30 * 60 * 1000;

/** Reads the current remote status of an operation. Runs once per poll, through the executor. */
export type StatusProbe<T> = (context: AttemptContext) => Promise<ProbeResult<T>>;

export interface OperationWaiterOptions {
    executor: RequestExecutor;
    pollIntervalMs?: number;
    timeoutMs?: number;
    now?: () => number;
    signal?: AbortSignal;
}

const ALLOWED_TRANSITIONS: Record<OperationStatus, readonly OperationStatus[]> = {
    Pending: ['InProgress'],
    InProgress: ['InProgress', 'Succeeded', 'Failed', 'Canceled'],
    Succeeded: [],
    Failed: [],
    Canceled: [],
};

/**
 * Polls one asynchronous remote operation until it reaches a terminal status or its deadline.
 *
 * The first probe runs at once, later probes every `pollIntervalMs`; no sleep runs past the
 * deadline, including the executor's backoff between retries of a probe. A probe's transient
 * failures are absorbed by the executor, so only an exhausted probe budget, a remote
 * Failed/Canceled, the deadline, or the caller's signal ends the wait.
 * Abandoning a wait issues no remote cancellation.
 */
export class OperationWaiter<T = unknown> {
    readonly handle: string;
    readonly kind: OperationKind;
    readonly #probe: StatusProbe<T>;
    readonly #executor: RequestExecutor;
    readonly #pollIntervalMs: number;
    readonly #timeoutMs: number;
    readonly #now: () => number;
    readonly #signal?: AbortSignal;
    readonly #history: OperationStatus[] = ['Pending'];
    #status: OperationStatus = 'Pending';
    #probes = 0;

    constructor(operation: OperationHandle, probe: StatusProbe<T>, options: OperationWaiterOptions) {
        this.handle = operation.handle;
        this.kind = operation.kind;
        this.#probe = probe;
        this.#executor = options.executor;
        this.#pollIntervalMs = Math.max(0, options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);
        this.#timeoutMs = Math.max(0, options.timeoutMs ?? DEFAULT_WAIT_TIMEOUT_MS);
        this.#now = options.now ?? (() => Date.now());
        this.#signal = options.signal;
    }

    get status(): OperationStatus {
        return this.#status;
    }

    /** Distinct statuses entered so far, starting with Pending. */
    get history(): readonly OperationStatus[] {
        return [...this.#history];
    }

    get probes(): number {
        return this.#probes;
    }

    async wait(): Promise<OperationOutcome<T>> {
        if (this.#status !== 'Pending') {
            throw new ValidationError(`Waiter for ${this.handle} has already run.`);
        }

        const start = this.#now();
        const deadline = start + this.#timeoutMs;
        const label = `wait:${this.kind}`;

        for (;;) {
            this.#probes += 1;
            const result = await this.#runProbe(label, deadline);

            if (this.#status === 'Pending') {
                this.#transition('InProgress');
            }
            this.#transition(result.status);

            if (result.status === 'Succeeded') {
                const durationMs = this.#now() - start;
                void logActivity(`[Waiter] ${this.kind} ${this.handle} succeeded after ${this.#probes} probe(s).`);
                return {
                    handle: this.handle,
                    kind: this.kind,
                    status: 'Succeeded',
                    payload: result.payload,
                    probes: this.#probes,
                    durationMs,
                };
            }

            if (result.status === 'Failed' || result.status === 'Canceled') {
                throw new RemoteOperationFailedError(this.handle, this.kind, result.status, result.detail, result.payload);
            }

            const remaining = deadline - this.#now();
            if (remaining <= 0) {
                throw this.#timeout();
            }

            void logActivity(`[Waiter] ${this.kind} ${this.handle} still ${this.#status}; probe ${this.#probes}.`, 'debug');
            await sleep(Math.min(this.#pollIntervalMs, remaining), this.#signal).catch((error: unknown) => {
                throw error instanceof OperationAbortedError
                    ? new OperationAbortedError(`Stopped waiting for ${this.kind} operation ${this.handle}.`)
                    : error;
            });

            if (this.#now() >= deadline) {
                throw this.#timeout();
            }
        }
    }

    /** One probe, with its retries and backoff cut short by the deadline or the caller's signal. */
    async #runProbe(label: string, deadline: number): Promise<ProbeResult<T>> {
        const deadlineController = new AbortController();
        const timer = setTimeout(() => deadlineController.abort(), Math.max(0, deadline - this.#now()));
        const signal = this.#signal
            ? AbortSignal.any([this.#signal, deadlineController.signal])
            : deadlineController.signal;

        try {
            return await this.#executor.run(this.#probe, { label, signal });
        } catch (error) {
            if (!(error instanceof OperationAbortedError)) throw error;
            if (this.#signal?.aborted) {
                throw new OperationAbortedError(`Stopped waiting for ${this.kind} operation ${this.handle}.`);
            }
            if (deadlineController.signal.aborted) throw this.#timeout();
            throw error;
        } finally {
            clearTimeout(timer);
        }
    }

    #transition(next: OperationStatus): void {
        if (!ALLOWED_TRANSITIONS[this.#status].includes(next)) {
            throw new ValidationError(`Illegal operation transition ${this.#status} -> ${next} for ${this.handle}.`);
        }
        if (next !== this.#status) {
            this.#history.push(next);
        }
        this.#status = next;
    }

    #timeout(): WaitTimeoutError {
        void logActivity(`[Waiter] ${this.kind} ${this.handle} timed out as ${this.#status}.`, 'error');
        return new WaitTimeoutError(this.handle, this.kind, this.#status, this.#probes, this.#timeoutMs);
    }
}
