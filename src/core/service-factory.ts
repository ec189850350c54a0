import type { PublisherConfig } from '../config/config-schema.js';
import { requireConfig } from '../config/json-config.js';
import { BlobService } from '../services/blob-service.js';
import { blobUrl, createContainerSas, getStorageAccountKey } from '../services/blob-sas.js';
import { CloudPartnerClient } from '../services/cloud-partner.js';
import {
    CLOUD_PARTNER_SCOPE,
    ClientCredentialsTokenProvider,
    MANAGEMENT_SCOPE,
    STORAGE_SCOPE,
    resolveCredentialSource,
    type ServicePrincipalCredentials,
} from '../services/credential-source.js';
import type { FetchFn } from '../services/http-client.js';
import { ImageService } from '../services/image-service.js';
import { ManagementClient } from '../services/management-client.js';
import { ValidationError } from '../types/errors.js';
import { RequestExecutor, createRetryPolicy } from '../utils/retry.js';

/** Builds the services a command needs from the resolved configuration. */
export interface ServiceFactory {
    blobService(config: PublisherConfig): Promise<BlobService>;
    imageService(config: PublisherConfig, signal?: AbortSignal): Promise<ImageService>;
    cloudPartner(config: PublisherConfig): Promise<CloudPartnerClient>;
    /** URL of a blob carrying a read/list container SAS: the configured token, or one signed with the account key. */
    signedBlobUrl(config: PublisherConfig, blobName: string, signal?: AbortSignal): Promise<string>;
}

async function loadServicePrincipal(config: PublisherConfig): Promise<ServicePrincipalCredentials> {
    requireConfig(config, ['credentialsFile']);
    const resolved = await resolveCredentialSource({ kind: 'file', path: config.credentialsFile });
    if (resolved.kind !== 'service-principal') {
        throw new ValidationError(`Credentials file ${config.credentialsFile} does not describe a service principal.`);
    }
    return resolved.credentials;
}

function executorFor(
    config: PublisherConfig,
    credentials: ServicePrincipalCredentials,
    scope: string,
    fetchFn?: FetchFn,
): RequestExecutor {
    return new RequestExecutor({
        policy: createRetryPolicy({ maxAttempts: config.maxAttempts }),
        credentials: new ClientCredentialsTokenProvider({ credentials, scope, fetchFn }),
    });
}

/** Factory over the live endpoints. `fetchFn` replaces the global fetch for every call. */
export function createServiceFactory(fetchFn?: FetchFn): ServiceFactory {
    const managementClient = async (config: PublisherConfig): Promise<ManagementClient> => {
        requireConfig(config, ['resourceGroup']);
        const credentials = await loadServicePrincipal(config);
        return new ManagementClient({
            subscriptionId: credentials.subscriptionId,
            resourceGroup: config.resourceGroup,
            executor: executorFor(config, credentials, MANAGEMENT_SCOPE, fetchFn),
            endpoint: credentials.resourceManagerEndpointUrl,
            fetchFn,
        });
    };

    return {
        async blobService(config) {
            requireConfig(config, ['storageAccount', 'container']);
            const location = { storageAccount: config.storageAccount, container: config.container, fetchFn };

            if (config.sasToken) {
                const resolved = await resolveCredentialSource({ kind: 'sas', token: config.sasToken });
                if (resolved.kind === 'sas') {
                    return new BlobService({
                        ...location,
                        auth: { kind: 'sas', token: resolved.token },
                        executor: new RequestExecutor({ policy: createRetryPolicy({ maxAttempts: config.maxAttempts }) }),
                    });
                }
            }

            if (!config.credentialsFile) {
                throw new ValidationError('Blob commands need either a SAS token or a credentials file.', [
                    'Pass --sas-token, or --credentials-file for a service principal with storage access.',
                ]);
            }
            const credentials = await loadServicePrincipal(config);
            return new BlobService({
                ...location,
                auth: { kind: 'bearer' },
                executor: executorFor(config, credentials, STORAGE_SCOPE, fetchFn),
            });
        },

        async imageService(config, signal) {
            const client = await managementClient(config);
            return new ImageService({
                client,
                pollIntervalMs: config.pollInterval * 1000,
                timeoutMs: config.timeout * 1000,
                signal,
            });
        },

        async cloudPartner(config) {
            const credentials = await loadServicePrincipal(config);
            return new CloudPartnerClient({
                executor: executorFor(config, credentials, CLOUD_PARTNER_SCOPE, fetchFn),
                fetchFn,
                pollIntervalMs: config.pollInterval * 1000,
                timeoutMs: config.timeout * 1000,
            });
        },

        async signedBlobUrl(config, blobName, signal) {
            requireConfig(config, ['storageAccount', 'container']);
            if (config.sasToken) {
                return blobUrl(config.storageAccount, config.container, blobName, config.sasToken);
            }

            const client = await managementClient(config);
            const accountKey = await getStorageAccountKey(client, config.storageAccount, signal);
            const sasToken = createContainerSas({
                storageAccount: config.storageAccount,
                container: config.container,
                accountKey,
            });
            return blobUrl(config.storageAccount, config.container, blobName, sasToken);
        },
    };
}
