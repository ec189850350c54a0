/** How a failed attempt was classified. */
export type ErrorClass = 'transient' | 'auth' | 'permanent';

/** Outcome of one try of a remote call. */
export type AttemptOutcome = 'success' | 'transient_failure' | 'auth_failure' | 'permanent_failure';

/** Diagnostic record of a single attempt, returned in the executor's history. */
export interface Attempt {
    attempt: number;
    startedAt: string;
    completedAt: string;
    durationMs: number;
    outcome: AttemptOutcome;
    /** HTTP status of the failed response, when there was one. */
    status?: number;
    /** Response body of the failed response, when there was one. */
    body?: string;
    error?: string;
}

/**
 * Immutable retry decision object shared by every caller of a {@link RequestExecutor}.
 */
export interface RetryPolicy {
    readonly maxAttempts: number;
    /** Delay before the retry that follows failed attempt `attempt` (1-based). */
    backoff(attempt: number): number;
    classify(error: unknown): ErrorClass;
    isRetryable(error: unknown): boolean;
}

/** Configuration accepted by `createRetryPolicy`. */
export interface RetryOptions {
    /** Maximum number of attempts (including the first). @default 5 */
    maxAttempts?: number;
    /** Base delay in ms before the first retry. @default 1000 */
    baseDelayMs?: number;
    /** Multiplier applied to the delay after each failed attempt. @default 2 */
    backoffFactor?: number;
    /** Maximum delay cap in ms. @default 30000 */
    maxDelayMs?: number;
    /**
     * Fraction of the exponential delay added as random jitter. Clamped to
     * `backoffFactor - 1` so the schedule never decreases. @default 0.2
     */
    jitterRatio?: number;
    /** Extra error codes (network or remote `error.code`) treated as transient. */
    transientCodes?: readonly string[];
    /** Random source for jitter, in [0, 1). */
    random?: () => number;
}

/** Per-attempt context handed to the wrapped call. */
export interface AttemptContext {
    attempt: number;
    /** Bearer token from the credential provider, when the executor has one. */
    token?: string;
    signal?: AbortSignal;
}

/** Per-call context handed to the executor. */
export interface ExecutionContext {
    /** Label used in log messages for traceability. */
    label?: string;
    signal?: AbortSignal;
}

interface ExecutionSummary {
    attempts: number;
    history: Attempt[];
    totalDurationMs: number;
}

/** Result of a call run through the executor. */
export type ExecutionResult<T> =
    | (ExecutionSummary & { ok: true; value: T })
    | (ExecutionSummary & { ok: false; error: Error });

/** Source of bearer tokens for management-plane and storage calls. */
export interface CredentialProvider {
    getToken(options?: { forceRefresh?: boolean; signal?: AbortSignal }): Promise<string>;
}
