import { createHmac } from 'node:crypto';
import { PublisherError } from '../types/errors.js';
import type { ManagementClient } from './management-client.js';

export const STORAGE_API_VERSION = '2023-01-01';
export const SAS_VERSION = '2021-08-06';

const HOUR_MS = 3_600_000;

export interface ContainerSasOptions {
    storageAccount: string;
    container: string;
    /** Base64 account key, as returned by `listKeys`. */
    accountKey: string;
    /** Permission letters in canonical order, e.g. `rl`. */
    permissions?: string;
    startHours?: number;
    expireHours?: number;
    now?: Date;
}

interface StorageAccountKeys {
    keys?: Array<{ keyName?: string; value?: string }>;
}

/** `2024-03-01T11:00:00Z`, whole seconds. */
function sasTime(date: Date): string {
    return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function containerSasStringToSign(fields: {
    permissions: string;
    start: string;
    expiry: string;
    storageAccount: string;
    container: string;
}): string {
    return [
        fields.permissions,
        fields.start,
        fields.expiry,
        `/blob/${fields.storageAccount}/${fields.container}`,
        '', // signed identifier
        '', // signed IP
        'https',
        SAS_VERSION,
        'c',
        '', // snapshot time
        '', // encryption scope
        '', // rscc
        '', // rscd
        '', // rsce
        '', // rscl
        '', // rsct
    ].join('\n');
}

/**
 * Account-key signed SAS for a whole container. Valid from `startHours` before `now`
 * to `expireHours` after it; read and list by default.
 */
export function createContainerSas(options: ContainerSasOptions): string {
    const now = options.now ?? new Date();
    const permissions = options.permissions ?? 'rl';
    const start = sasTime(new Date(now.getTime() - (options.startHours ?? 1) * HOUR_MS));
    const expiry = sasTime(new Date(now.getTime() + (options.expireHours ?? 1) * HOUR_MS));

    const stringToSign = containerSasStringToSign({
        permissions,
        start,
        expiry,
        storageAccount: options.storageAccount,
        container: options.container,
    });
    const signature = createHmac('sha256', Buffer.from(options.accountKey, 'base64'))
        .update(stringToSign, 'utf8')
        .digest('base64');

    return new URLSearchParams({
        sv: SAS_VERSION,
        st: start,
        se: expiry,
        sr: 'c',
        sp: permissions,
        spr: 'https',
        sig: signature,
    }).toString();
}

/** First key of the storage account, read through the resource manager. */
export async function getStorageAccountKey(
    client: ManagementClient,
    storageAccount: string,
    signal?: AbortSignal,
): Promise<string> {
    const response = await client.request<StorageAccountKeys>({
        method: 'POST',
        provider: 'Microsoft.Storage',
        query: `storageAccounts/${storageAccount}/listKeys`,
        apiVersion: STORAGE_API_VERSION,
        signal,
    });
    const key = response.data?.keys?.[0]?.value;
    if (!key) {
        throw new PublisherError(`Storage account ${storageAccount} returned no access keys.`);
    }
    return key;
}

export function blobUrl(storageAccount: string, container: string, blobName: string, sasToken?: string): string {
    const base = `https://${storageAccount}.blob.core.windows.net/${container}/${blobName}`;
    return sasToken ? `${base}?${sasToken.replace(/^\?/, '')}` : base;
}
