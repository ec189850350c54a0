import { logActivity } from './logger.js';
import {
    ExhaustedRetriesError,
    OperationAbortedError,
    PermanentError,
    RemoteCallError,
    TransientError,
} from '../types/errors.js';
import type {
    Attempt,
    AttemptContext,
    AttemptOutcome,
    CredentialProvider,
    ErrorClass,
    ExecutionContext,
    ExecutionResult,
    RetryOptions,
    RetryPolicy,
} from '../types/reliability.js';

const DEFAULTS = {
    maxAttempts: 5,
    baseDelayMs: 1000,
    backoffFactor: 2,
    maxDelayMs: 30_000,
    jitterRatio: 0.2,
};

/** Network-level error codes that never reached the remote service. */
export const TRANSIENT_NETWORK_CODES: readonly string[] = [
    'ECONNRESET',
    'ECONNREFUSED',
    'ECONNABORTED',
    'ETIMEDOUT',
    'EAI_AGAIN',
    'EPIPE',
    'ENETUNREACH',
    'EHOSTUNREACH',
    'UND_ERR_CONNECT_TIMEOUT',
    'UND_ERR_HEADERS_TIMEOUT',
    'UND_ERR_BODY_TIMEOUT',
    'UND_ERR_SOCKET',
    'TimeoutError',
];

function positiveInteger(value: number | undefined, fallback: number, field: string): number {
    if (value === undefined) return fallback;
    if (!Number.isInteger(value) || value < 1) {
        throw new RangeError(`${field} must be a positive integer, got ${value}.`);
    }
    return value;
}

/**
 * Classify an error as transient (retry), auth (refresh the token once) or permanent.
 */
export function classifyError(error: unknown, transientCodes: ReadonlySet<string>): ErrorClass {
    if (error instanceof TransientError) return 'transient';

    if (error instanceof RemoteCallError) {
        if (error.code && transientCodes.has(error.code)) return 'transient';
        if (error.status === undefined) return 'transient';
        if (error.status === 401) return 'auth';
        if (error.status === 408 || error.status === 429 || error.status >= 500) return 'transient';
        return 'permanent';
    }

    if (error instanceof Error && error.name === 'TimeoutError') return 'transient';
    return 'permanent';
}

/**
 * Build an immutable retry policy with capped exponential backoff and jitter.
 *
 * The delay before retry `n` is `min(maxDelayMs, base * factor^(n-1) * (1 + jitter))`
 * with jitter in `[0, min(jitterRatio, factor - 1))`, which keeps the schedule
 * non-decreasing.
 */
export function createRetryPolicy(options: RetryOptions = {}): RetryPolicy {
    const maxAttempts = positiveInteger(options.maxAttempts, DEFAULTS.maxAttempts, 'maxAttempts');
    const baseDelayMs = Math.max(0, options.baseDelayMs ?? DEFAULTS.baseDelayMs);
    const backoffFactor = Math.max(1, options.backoffFactor ?? DEFAULTS.backoffFactor);
    const maxDelayMs = Math.max(baseDelayMs, options.maxDelayMs ?? DEFAULTS.maxDelayMs);
    const jitterRatio = Math.max(0, Math.min(options.jitterRatio ?? DEFAULTS.jitterRatio, backoffFactor - 1));
    const random = options.random ?? Math.random;
    const transientCodes = new Set([...TRANSIENT_NETWORK_CODES, ...(options.transientCodes ?? [])]);

    const policy: RetryPolicy = {
        maxAttempts,
        backoff(attempt: number): number {
            const exponential = baseDelayMs * backoffFactor ** Math.max(0, attempt - 1);
            const jitter = jitterRatio > 0 ? exponential * jitterRatio * random() : 0;
            return Math.min(maxDelayMs, Math.round(exponential + jitter));
        },
        classify(error: unknown): ErrorClass {
            return classifyError(error, transientCodes);
        },
        isRetryable(error: unknown): boolean {
            return classifyError(error, transientCodes) === 'transient';
        },
    };

    return Object.freeze(policy);
}

/** Promise-based sleep that rejects with {@link OperationAbortedError} when `signal` fires. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
        return Promise.reject(new OperationAbortedError());
    }

    return new Promise((resolve, reject) => {
        const onAbort = () => {
            clearTimeout(timer);
            reject(new OperationAbortedError());
        };
        const timer = setTimeout(() => {
            signal?.removeEventListener('abort', onAbort);
            resolve();
        }, ms);
        signal?.addEventListener('abort', onAbort, { once: true });
    });
}

const OUTCOME_BY_CLASS: Record<ErrorClass, AttemptOutcome> = {
    transient: 'transient_failure',
    auth: 'auth_failure',
    permanent: 'permanent_failure',
};

export interface RequestExecutorOptions {
    policy?: RetryPolicy;
    credentials?: CredentialProvider;
}

/**
 * Runs a single logical remote call under a {@link RetryPolicy}.
 *
 * - Transient failures are retried after `policy.backoff(attempt)` until `maxAttempts`.
 * - The first 401 of a call forces one token refresh and an immediate re-attempt that does
 *   not count against the transient budget; a second 401 is permanent.
 * - Everything else fails at once.
 *
 * Holds no per-call state, so one instance may serve any number of concurrent callers.
 *
 * @example
 * ```ts
 * const result = await executor.execute(
 *   ({ token }) => sendRequest({ method: 'GET', url, token }),
 *   { label: 'image:get' },
 * );
 * ```
 */
export class RequestExecutor {
    readonly policy: RetryPolicy;
    readonly #credentials?: CredentialProvider;

    constructor(options: RequestExecutorOptions = {}) {
        this.policy = options.policy ?? createRetryPolicy();
        this.#credentials = options.credentials;
    }

    /** A sibling executor sharing the credentials but using another policy. */
    withPolicy(policy: RetryPolicy): RequestExecutor {
        return new RequestExecutor({ policy, credentials: this.#credentials });
    }

    async execute<T>(
        call: (context: AttemptContext) => Promise<T>,
        context: ExecutionContext = {},
    ): Promise<ExecutionResult<T>> {
        const label = context.label ?? 'unnamed';
        const signal = context.signal;
        const start = Date.now();
        const history: Attempt[] = [];
        let transientFailures = 0;
        let refreshedToken = false;
        let forceRefresh = false;

        const fail = (error: Error): ExecutionResult<T> => ({
            ok: false,
            error,
            attempts: history.length,
            history,
            totalDurationMs: Date.now() - start,
        });

        for (;;) {
            if (signal?.aborted) {
                return fail(new OperationAbortedError());
            }

            const attempt = history.length + 1;
            const attemptStart = Date.now();

            try {
                const token = this.#credentials
                    ? await this.#credentials.getToken({ forceRefresh, signal })
                    : undefined;
                forceRefresh = false;

                const value = await call({ attempt, token, signal });
                const completed = Date.now();
                history.push({
                    attempt,
                    startedAt: new Date(attemptStart).toISOString(),
                    completedAt: new Date(completed).toISOString(),
                    durationMs: completed - attemptStart,
                    outcome: 'success',
                });

                if (attempt > 1) {
                    void logActivity(
                        `[Retry] ${label} succeeded on attempt ${attempt} (${completed - start}ms).`,
                        'debug',
                    );
                }

                return { ok: true, value, attempts: attempt, history, totalDurationMs: completed - start };
            } catch (err) {
                if (err instanceof OperationAbortedError) {
                    return fail(err);
                }

                const errorClass = this.policy.classify(err);
                history.push(this.#recordFailure(attempt, attemptStart, errorClass, err));
                const message = err instanceof Error ? err.message : String(err);

                if (errorClass === 'auth' && this.#credentials && !refreshedToken) {
                    refreshedToken = true;
                    forceRefresh = true;
                    void logActivity(`[Retry] ${label} attempt ${attempt} was rejected (401). Refreshing token.`, 'debug');
                    continue;
                }

                if (errorClass !== 'transient') {
                    void logActivity(`[Retry] ${label} failed permanently on attempt ${attempt}: ${message}`, 'debug');
                    return fail(new PermanentError(attempt, err));
                }

                transientFailures += 1;
                if (transientFailures >= this.policy.maxAttempts) {
                    void logActivity(
                        `[Retry] ${label} exhausted all ${this.policy.maxAttempts} attempts. Last error: ${message}.`,
                        'debug',
                    );
                    return fail(new ExhaustedRetriesError(attempt, err));
                }

                const delay = this.policy.backoff(transientFailures);
                void logActivity(
                    `[Retry] ${label} attempt ${transientFailures}/${this.policy.maxAttempts} failed: ${message}. Retrying in ${delay}ms.`,
                    'debug',
                );

                try {
                    await sleep(delay, signal);
                } catch (sleepError) {
                    return fail(sleepError instanceof Error ? sleepError : new OperationAbortedError());
                }
            }
        }
    }

    /** Like {@link execute}, but returns the value or throws the terminal error. */
    async run<T>(call: (context: AttemptContext) => Promise<T>, context: ExecutionContext = {}): Promise<T> {
        const result = await this.execute(call, context);
        if (!result.ok) {
            throw result.error;
        }
        return result.value;
    }

    #recordFailure(attempt: number, attemptStart: number, errorClass: ErrorClass, err: unknown): Attempt {
        const completed = Date.now();
        const record: Attempt = {
            attempt,
            startedAt: new Date(attemptStart).toISOString(),
            completedAt: new Date(completed).toISOString(),
            durationMs: completed - attemptStart,
            outcome: OUTCOME_BY_CLASS[errorClass],
            error: err instanceof Error ? err.message : String(err),
        };
        if (err instanceof RemoteCallError) {
            record.status = err.status;
            record.body = err.body;
        }
        return record;
    }
}
