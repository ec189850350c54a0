import { ResourceExistsError } from '../types/errors.js';
import type { OperationKind, OperationOutcome, ProbeResult } from '../types/operation.js';
import {
    COMPUTE_API_VERSION,
    GALLERY_API_VERSION,
    ManagementClient,
    type ResourceRequest,
} from './management-client.js';
import { isNotFound } from './http-client.js';
import { OperationWaiter, type StatusProbe } from './operation-waiter.js';
import { logActivity } from '../utils/logger.js';

/** The part of a compute resource the waiter reads. */
export interface ProvisionedResource {
    id?: string;
    name?: string;
    location?: string;
    properties?: {
        provisioningState?: string;
        [key: string]: unknown;
    };
    [key: string]: unknown;
}

export interface ImageServiceOptions {
    client: ManagementClient;
    pollIntervalMs?: number;
    timeoutMs?: number;
    signal?: AbortSignal;
}

export interface CreateImageInput {
    imageName: string;
    blobName: string;
    container: string;
    region: string;
    storageAccount: string;
    forceReplace?: boolean;
    hyperVGeneration?: 'V1' | 'V2';
    wait?: boolean;
}

export interface GalleryImageVersionRef {
    galleryName: string;
    galleryImageName: string;
    version: string;
    /** Resource group of the gallery; defaults to the client's. */
    resourceGroup?: string;
}

export interface CreateGalleryImageVersionInput extends GalleryImageVersionRef {
    blobName: string;
    region: string;
    storageAccount: string;
    container: string;
    /** Resource group of the storage account holding the blob; defaults to the client's. */
    blobResourceGroup?: string;
    wait?: boolean;
}

function blobUri(storageAccount: string, container: string, blobName: string): string {
    return `https://${storageAccount}.blob.core.windows.net/${container}/${blobName}`;
}

/** Map a provisioning state onto the waiter's status vocabulary. */
export function provisioningProbeResult(resource: ProvisionedResource): ProbeResult<ProvisionedResource> {
    const state = resource.properties?.provisioningState;
    if (state === 'Succeeded') return { status: 'Succeeded', payload: resource };
    if (state === 'Failed') return { status: 'Failed', payload: resource, detail: `provisioningState ${state}` };
    if (state === 'Canceled') return { status: 'Canceled', payload: resource, detail: `provisioningState ${state}` };
    return { status: 'InProgress', payload: resource };
}

/**
 * Managed images and gallery image versions. Creation and deletion are asynchronous on the
 * remote side; with `wait` (the default) both block on an {@link OperationWaiter}.
 */
export class ImageService {
    readonly #client: ManagementClient;
    readonly #pollIntervalMs?: number;
    readonly #timeoutMs?: number;
    readonly #signal?: AbortSignal;

    constructor(options: ImageServiceOptions) {
        this.#client = options.client;
        this.#pollIntervalMs = options.pollIntervalMs;
        this.#timeoutMs = options.timeoutMs;
        this.#signal = options.signal;
    }

    // ── Managed images ──────────────────────────────────────────────────────────

    #imageRequest(imageName: string): Omit<ResourceRequest, 'method'> {
        return { provider: 'Microsoft.Compute', query: `images/${imageName}`, apiVersion: COMPUTE_API_VERSION };
    }

    getImage(imageName: string): Promise<ProvisionedResource> {
        return this.#client.getResource<ProvisionedResource>(this.#imageRequest(imageName));
    }

    imageExists(imageName: string): Promise<boolean> {
        return this.#client.resourceExists(this.#imageRequest(imageName));
    }

    async createImage(input: CreateImageInput): Promise<ProvisionedResource | undefined> {
        const exists = await this.imageExists(input.imageName);
        if (exists && !input.forceReplace) {
            throw new ResourceExistsError(
                `Image ${input.imageName} already exists. To replace it use the force replace option.`,
            );
        }
        if (exists) {
            await this.deleteImage(input.imageName);
        }

        const request = this.#imageRequest(input.imageName);
        await this.#client.request({
            ...request,
            method: 'PUT',
            body: {
                location: input.region,
                properties: {
                    hyperVGeneration: input.hyperVGeneration ?? 'V1',
                    storageProfile: {
                        osDisk: {
                            osType: 'Linux',
                            osState: 'Generalized',
                            caching: 'ReadWrite',
                            blobUri: blobUri(input.storageAccount, input.container, input.blobName),
                        },
                    },
                },
            },
            signal: this.#signal,
        });
        void logActivity(`[Images] Create requested for image ${input.imageName} in ${input.region}.`);

        if (input.wait === false) return undefined;

        const outcome = await this.#waitForProvisioning('image-create', request);
        return outcome.payload;
    }

    async deleteImage(imageName: string, options: { wait?: boolean } = {}): Promise<void> {
        const request = this.#imageRequest(imageName);
        await this.#client.request({ ...request, method: 'DELETE', signal: this.#signal });
        void logActivity(`[Images] Delete requested for image ${imageName}.`);

        if (options.wait === false) return;
        await this.#waitForRemoval('image-delete', request);
    }

    // ── Gallery image versions ──────────────────────────────────────────────────

    #versionRequest(ref: GalleryImageVersionRef): Omit<ResourceRequest, 'method'> {
        return {
            provider: 'Microsoft.Compute',
            query: `galleries/${ref.galleryName}/images/${ref.galleryImageName}/versions/${ref.version}`,
            apiVersion: GALLERY_API_VERSION,
            resourceGroup: ref.resourceGroup,
        };
    }

    getGalleryImageVersion(ref: GalleryImageVersionRef): Promise<ProvisionedResource> {
        return this.#client.getResource<ProvisionedResource>(this.#versionRequest(ref));
    }

    galleryImageVersionExists(ref: GalleryImageVersionRef): Promise<boolean> {
        return this.#client.resourceExists(this.#versionRequest(ref));
    }

    async createGalleryImageVersion(input: CreateGalleryImageVersionInput): Promise<ProvisionedResource | undefined> {
        const request = this.#versionRequest(input);
        const blobResourceGroup = input.blobResourceGroup ?? this.#client.resourceGroup;

        await this.#client.request({
            ...request,
            method: 'PUT',
            body: {
                location: input.region,
                properties: {
                    publishingProfile: { targetRegions: [{ name: input.region }] },
                    storageProfile: {
                        osDiskImage: {
                            source: {
                                id:
                                    `/subscriptions/${this.#client.subscriptionId}/resourceGroups/${blobResourceGroup}` +
                                    `/providers/Microsoft.Storage/storageAccounts/${input.storageAccount}`,
                                uri: blobUri(input.storageAccount, input.container, input.blobName),
                            },
                            hostCaching: 'ReadWrite',
                        },
                    },
                },
            },
            signal: this.#signal,
        });
        void logActivity(
            `[Images] Create requested for gallery image version ${input.galleryImageName}/${input.version}.`,
        );

        if (input.wait === false) return undefined;

        const outcome = await this.#waitForProvisioning('gallery-image-version-create', request);
        return outcome.payload;
    }

    async deleteGalleryImageVersion(ref: GalleryImageVersionRef, options: { wait?: boolean } = {}): Promise<void> {
        const request = this.#versionRequest(ref);
        await this.#client.request({ ...request, method: 'DELETE', signal: this.#signal });
        void logActivity(`[Images] Delete requested for gallery image version ${ref.galleryImageName}/${ref.version}.`);

        if (options.wait === false) return;
        await this.#waitForRemoval('gallery-image-version-delete', request);
    }

    // ── Waiting ─────────────────────────────────────────────────────────────────

    #waitForProvisioning(
        kind: OperationKind,
        request: Omit<ResourceRequest, 'method'>,
    ): Promise<OperationOutcome<ProvisionedResource>> {
        const probe: StatusProbe<ProvisionedResource> = async (attempt) => {
            try {
                const response = await this.#client.send<ProvisionedResource>({ ...request, method: 'GET' }, attempt);
                return provisioningProbeResult(response.data ?? {});
            } catch (error) {
                // the resource may not be readable yet right after the PUT
                if (isNotFound(error)) return { status: 'InProgress' };
                throw error;
            }
        };

        return this.#waiter(kind, request, probe).wait();
    }

    #waitForRemoval(kind: OperationKind, request: Omit<ResourceRequest, 'method'>): Promise<OperationOutcome<ProvisionedResource>> {
        const probe: StatusProbe<ProvisionedResource> = async (attempt) => {
            try {
                const response = await this.#client.send<ProvisionedResource>({ ...request, method: 'GET' }, attempt);
                return { status: 'InProgress', payload: response.data };
            } catch (error) {
                if (isNotFound(error)) return { status: 'Succeeded' };
                throw error;
            }
        };

        return this.#waiter(kind, request, probe).wait();
    }

    #waiter(
        kind: OperationKind,
        request: Omit<ResourceRequest, 'method'>,
        probe: StatusProbe<ProvisionedResource>,
    ): OperationWaiter<ProvisionedResource> {
        return new OperationWaiter<ProvisionedResource>(
            { handle: request.query, kind },
            probe,
            {
                executor: this.#client.executor,
                pollIntervalMs: this.#pollIntervalMs,
                timeoutMs: this.#timeoutMs,
                signal: this.#signal,
            },
        );
    }
}
