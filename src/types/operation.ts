/** Kinds of asynchronous remote work the waiter tracks. */
export type OperationKind =
    | 'image-create'
    | 'image-delete'
    | 'gallery-image-version-create'
    | 'gallery-image-version-delete'
    | 'offer-publish'
    | 'offer-go-live';

/** Forward-only state machine of a tracked operation. */
export type OperationStatus = 'Pending' | 'InProgress' | 'Succeeded' | 'Failed' | 'Canceled';

/** Handle returned by a triggering call. */
export interface OperationHandle {
    /** Opaque identifier or status URL. */
    handle: string;
    kind: OperationKind;
}

/** What a single status probe reported. */
export interface ProbeResult<T = unknown> {
    status: Exclude<OperationStatus, 'Pending'>;
    payload?: T;
    /** Remote-provided failure detail. */
    detail?: string;
}

export interface OperationOutcome<T = unknown> {
    handle: string;
    kind: OperationKind;
    status: 'Succeeded';
    payload?: T;
    probes: number;
    durationMs: number;
}
