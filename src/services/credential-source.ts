import * as fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
    AuthenticationError,
    MissingArgumentError,
    OperationAbortedError,
    PublisherError,
    RemoteCallError,
} from '../types/errors.js';
import type { CredentialProvider } from '../types/reliability.js';
import { sendRequest, type FetchFn } from './http-client.js';
import { logActivity } from '../utils/logger.js';

/** Service principal fields, in the shape of an SDK auth file. */
export interface ServicePrincipalCredentials {
    clientId: string;
    clientSecret: string;
    subscriptionId: string;
    tenantId: string;
    activeDirectoryEndpointUrl: string;
    resourceManagerEndpointUrl: string;
    managementEndpointUrl?: string;
}

/** Where credentials come from. Resolved once into {@link ResolvedCredentials}. */
export type CredentialSource =
    | { kind: 'inline'; credentials: Partial<ServicePrincipalCredentials> }
    | { kind: 'file'; path: string }
    | { kind: 'sas'; token: string };

export type ResolvedCredentials =
    | { kind: 'service-principal'; credentials: ServicePrincipalCredentials }
    | { kind: 'sas'; token: string };

export const MANAGEMENT_SCOPE = 'https://management.azure.com/.default';
export const STORAGE_SCOPE = 'https://storage.azure.com/.default';
export const CLOUD_PARTNER_SCOPE = 'https://cloudpartner.azure.com/.default';

const DEFAULT_AUTHORITY = 'https://login.microsoftonline.com';
const DEFAULT_RESOURCE_MANAGER = 'https://management.azure.com/';
const REQUIRED_FIELDS = ['clientId', 'clientSecret', 'subscriptionId', 'tenantId'] as const;

function expandHome(filePath: string): string {
    return filePath.startsWith('~') ? path.join(os.homedir(), filePath.slice(1)) : filePath;
}

function readString(record: Record<string, unknown>, key: string): string | undefined {
    const value = record[key];
    return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

/** Validate a loose credentials record, naming the first missing field. */
export function validateServicePrincipal(raw: unknown, origin: string): ServicePrincipalCredentials {
    const record: Record<string, unknown> = typeof raw === 'object' && raw !== null ? { ...raw } : {};

    for (const field of REQUIRED_FIELDS) {
        if (!readString(record, field)) {
            throw new MissingArgumentError(`credentials.${field}`, `Not present in ${origin}.`);
        }
    }

    return {
        clientId: readString(record, 'clientId') ?? '',
        clientSecret: readString(record, 'clientSecret') ?? '',
        subscriptionId: readString(record, 'subscriptionId') ?? '',
        tenantId: readString(record, 'tenantId') ?? '',
        activeDirectoryEndpointUrl: readString(record, 'activeDirectoryEndpointUrl') ?? DEFAULT_AUTHORITY,
        resourceManagerEndpointUrl: readString(record, 'resourceManagerEndpointUrl') ?? DEFAULT_RESOURCE_MANAGER,
        managementEndpointUrl: readString(record, 'managementEndpointUrl'),
    };
}

/** Turn a credential source into concrete credentials. Files are read here and nowhere else. */
export async function resolveCredentialSource(source: CredentialSource): Promise<ResolvedCredentials> {
    switch (source.kind) {
        case 'sas': {
            const token = source.token.trim().replace(/^\?/, '');
            if (!token) throw new MissingArgumentError('sasToken');
            return { kind: 'sas', token };
        }
        case 'inline':
            return { kind: 'service-principal', credentials: validateServicePrincipal(source.credentials, 'inline credentials') };
        case 'file': {
            const filePath = expandHome(source.path);
            let raw: string;
            try {
                raw = await fs.readFile(filePath, 'utf8');
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                throw new PublisherError(`Unable to read credentials file ${filePath}: ${message}`, { cause: error });
            }
            let parsed: unknown;
            try {
                parsed = JSON.parse(raw);
            } catch (error) {
                throw new PublisherError(`Credentials file ${filePath} is not valid JSON.`, { cause: error });
            }
            return { kind: 'service-principal', credentials: validateServicePrincipal(parsed, filePath) };
        }
    }
}

interface TokenResponse {
    access_token?: string;
    expires_in?: number | string;
}

export interface ClientCredentialsTokenProviderOptions {
    credentials: ServicePrincipalCredentials;
    scope: string;
    fetchFn?: FetchFn;
    now?: () => number;
}

/** Settle with `promise`, or reject with {@link OperationAbortedError} once `signal` fires. */
function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
    if (!signal) return promise;
    if (signal.aborted) return Promise.reject(new OperationAbortedError());

    return new Promise<T>((resolve, reject) => {
        const onAbort = () => reject(new OperationAbortedError());
        signal.addEventListener('abort', onAbort, { once: true });
        void promise.then(
            (value) => {
                signal.removeEventListener('abort', onAbort);
                resolve(value);
            },
            (error: unknown) => {
                signal.removeEventListener('abort', onAbort);
                reject(error);
            },
        );
    });
}

/** Refresh this long before the token's stated expiry. */
const EXPIRY_SKEW_MS = 60_000;

/**
 * Client-credentials token source for one scope. Caches the token until shortly before
 * it expires; `forceRefresh` discards the cache. Concurrent callers share one token request,
 * and each caller's signal only ends its own wait.
 */
export class ClientCredentialsTokenProvider implements CredentialProvider {
    readonly #credentials: ServicePrincipalCredentials;
    readonly #scope: string;
    readonly #fetchFn?: FetchFn;
    readonly #now: () => number;
    #cached: { token: string; expiresAt: number } | null = null;
    #pending: Promise<string> | null = null;

    constructor(options: ClientCredentialsTokenProviderOptions) {
        this.#credentials = options.credentials;
        this.#scope = options.scope;
        this.#fetchFn = options.fetchFn;
        this.#now = options.now ?? (() => Date.now());
    }

    get tokenEndpoint(): string {
        const authority = this.#credentials.activeDirectoryEndpointUrl.replace(/\/+$/, '');
        return `${authority}/${this.#credentials.tenantId}/oauth2/v2.0/token`;
    }

    async getToken(options: { forceRefresh?: boolean; signal?: AbortSignal } = {}): Promise<string> {
        if (!options.forceRefresh && this.#cached && this.#cached.expiresAt > this.#now()) {
            return this.#cached.token;
        }

        // Callers that find the cache cold join the request already on the wire.
        this.#pending ??= this.#requestToken().finally(() => {
            this.#pending = null;
        });
        return abortable(this.#pending, options.signal);
    }

    async #requestToken(): Promise<string> {
        const form = new URLSearchParams({
            grant_type: 'client_credentials',
            client_id: this.#credentials.clientId,
            client_secret: this.#credentials.clientSecret,
            scope: this.#scope,
        });

        let status: number;
        let data: TokenResponse | undefined;
        let text: string;
        try {
            const response = await sendRequest<TokenResponse>({
                method: 'POST',
                url: this.tokenEndpoint,
                headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
                body: form.toString(),
                fetchFn: this.#fetchFn,
            });
            status = response.status;
            data = response.data;
            text = response.text;
        } catch (error) {
            if (error instanceof RemoteCallError) {
                throw new AuthenticationError(`Unable to authenticate against ${this.#scope}`, {
                    status: error.status,
                    body: error.body,
                    code: error.code,
                    method: 'POST',
                    url: this.tokenEndpoint,
                    cause: error,
                });
            }
            throw error;
        }

        if (!data?.access_token) {
            throw new AuthenticationError(`Token response for ${this.#scope} carried no access_token.`, {
                status,
                body: text,
                method: 'POST',
                url: this.tokenEndpoint,
            });
        }

        const lifetimeSeconds = Number(data.expires_in ?? 3600);
        const lifetimeMs = (Number.isFinite(lifetimeSeconds) ? lifetimeSeconds : 3600) * 1000;
        this.#cached = {
            token: data.access_token,
            expiresAt: this.#now() + Math.max(0, lifetimeMs - EXPIRY_SKEW_MS),
        };
        void logActivity(`[Auth] Acquired token for ${this.#scope}.`, 'debug');
        return data.access_token;
    }
}
