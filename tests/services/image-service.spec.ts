import { describe, expect, it } from 'vitest';
import { ManagementClient } from '../../src/services/management-client.js';
import { ImageService, provisioningProbeResult } from '../../src/services/image-service.js';
import {
  PermanentError,
  RemoteOperationFailedError,
  ResourceExistsError,
  ResourceNotFoundError,
} from '../../src/types/errors.js';
import { RequestExecutor, createRetryPolicy } from '../../src/utils/retry.js';
import { createFakeFetch, routeByMethod, type FakeHandler } from '../helpers/fake-fetch.js';

const IMAGE_URL =
  'https://management.azure.com/subscriptions/sub-id/resourceGroups/images-rg' +
  '/providers/Microsoft.Compute/images/img-1?api-version=2022-08-01';

const notFound = { status: 404, body: { error: { code: 'NotFound' } } };
const provisioned = (state: string) => ({ status: 200, body: { name: 'img-1', properties: { provisioningState: state } } });

function createService(handler: FakeHandler) {
  const fake = createFakeFetch(handler);
  const client = new ManagementClient({
    subscriptionId: 'sub-id',
    resourceGroup: 'images-rg',
    executor: new RequestExecutor({ policy: createRetryPolicy({ baseDelayMs: 0 }) }),
    fetchFn: fake.fetchFn,
  });
  return { service: new ImageService({ client, pollIntervalMs: 0, timeoutMs: 60_000 }), requests: fake.requests };
}

const imageInput = {
  imageName: 'img-1',
  blobName: 'disk-20240105.vhd',
  container: 'vhds',
  region: 'westus',
  storageAccount: 'imagesacct',
};

describe('provisioningProbeResult', () => {
  it('maps provisioning states onto operation statuses', () => {
    expect(provisioningProbeResult({ properties: { provisioningState: 'Succeeded' } }).status).toBe('Succeeded');
    expect(provisioningProbeResult({ properties: { provisioningState: 'Creating' } }).status).toBe('InProgress');
    expect(provisioningProbeResult({}).status).toBe('InProgress');
    expect(provisioningProbeResult({ properties: { provisioningState: 'Canceled' } })).toMatchObject({
      status: 'Canceled',
      detail: 'provisioningState Canceled',
    });
  });
});

describe('ImageService', () => {
  it('reports whether an image exists', async () => {
    const present = createService(() => provisioned('Succeeded'));
    const absent = createService(() => notFound);

    await expect(present.service.imageExists('img-1')).resolves.toBe(true);
    await expect(absent.service.imageExists('img-1')).resolves.toBe(false);
    expect(present.requests[0]?.url).toBe(IMAGE_URL);
  });

  it('turns a 404 into ResourceNotFoundError on get', async () => {
    const { service } = createService(() => notFound);

    const error = await service.getImage('img-1').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ResourceNotFoundError);
    if (!(error instanceof ResourceNotFoundError)) return;
    expect(error.message).toBe('Resource not found: images/img-1');
    expect(error.cause).toBeInstanceOf(PermanentError);
    expect(error.cause).toMatchObject({ status: 404, body: '{"error":{"code":"NotFound"}}' });
  });

  it('creates an image from the blob and waits for provisioning', async () => {
    const { service, requests } = createService(
      routeByMethod({
        GET: [notFound, provisioned('Creating'), provisioned('Succeeded')],
        PUT: [{ status: 201, body: {} }],
      }),
    );

    const image = await service.createImage(imageInput);

    expect(image).toEqual({ name: 'img-1', properties: { provisioningState: 'Succeeded' } });
    expect(requests.map((request) => request.method)).toEqual(['GET', 'PUT', 'GET', 'GET']);
    expect(JSON.parse(String(requests[1]?.body))).toEqual({
      location: 'westus',
      properties: {
        hyperVGeneration: 'V1',
        storageProfile: {
          osDisk: {
            osType: 'Linux',
            osState: 'Generalized',
            caching: 'ReadWrite',
            blobUri: 'https://imagesacct.blob.core.windows.net/vhds/disk-20240105.vhd',
          },
        },
      },
    });
  });

  it('treats a not-yet-readable image as still in progress', async () => {
    const { service, requests } = createService(
      routeByMethod({ GET: [notFound, notFound, provisioned('Succeeded')], PUT: [{ status: 201 }] }),
    );

    await service.createImage(imageInput);

    expect(requests).toHaveLength(4);
  });

  it('refuses to overwrite an existing image without force replace', async () => {
    const { service, requests } = createService(routeByMethod({ GET: [provisioned('Succeeded')] }));

    await expect(service.createImage(imageInput)).rejects.toThrow(
      new ResourceExistsError('Image img-1 already exists. To replace it use the force replace option.'),
    );
    expect(requests.map((request) => request.method)).toEqual(['GET']);
  });

  it('deletes and recreates an existing image with force replace', async () => {
    const { service, requests } = createService(
      routeByMethod({
        GET: [provisioned('Succeeded'), notFound, provisioned('Succeeded')],
        DELETE: [{ status: 202 }],
        PUT: [{ status: 201 }],
      }),
    );

    await service.createImage({ ...imageInput, forceReplace: true, hyperVGeneration: 'V2' });

    expect(requests.map((request) => request.method)).toEqual(['GET', 'DELETE', 'GET', 'PUT', 'GET']);
    expect(JSON.parse(String(requests[3]?.body)).properties.hyperVGeneration).toBe('V2');
  });

  it('returns right after the request when not waiting', async () => {
    const { service, requests } = createService(routeByMethod({ GET: [notFound], PUT: [{ status: 201 }] }));

    await expect(service.createImage({ ...imageInput, wait: false })).resolves.toBeUndefined();
    expect(requests.map((request) => request.method)).toEqual(['GET', 'PUT']);
  });

  it('raises RemoteOperationFailedError when provisioning fails', async () => {
    const { service } = createService(routeByMethod({ GET: [notFound, provisioned('Failed')], PUT: [{ status: 201 }] }));

    await expect(service.createImage(imageInput)).rejects.toBeInstanceOf(RemoteOperationFailedError);
  });

  it('creates a gallery image version from the blob in the gallery resource group', async () => {
    const { service, requests } = createService(
      routeByMethod({ PUT: [{ status: 201 }], GET: [provisioned('Succeeded')] }),
    );

    await service.createGalleryImageVersion({
      galleryName: 'gallery',
      galleryImageName: 'ubuntu',
      version: '2024.01.05',
      resourceGroup: 'gallery-rg',
      blobName: 'disk-20240105.vhd',
      container: 'vhds',
      region: 'westus',
      storageAccount: 'imagesacct',
    });

    expect(requests[0]?.url).toBe(
      'https://management.azure.com/subscriptions/sub-id/resourceGroups/gallery-rg' +
        '/providers/Microsoft.Compute/galleries/gallery/images/ubuntu/versions/2024.01.05?api-version=2022-03-03',
    );
    expect(JSON.parse(String(requests[0]?.body))).toEqual({
      location: 'westus',
      properties: {
        publishingProfile: { targetRegions: [{ name: 'westus' }] },
        storageProfile: {
          osDiskImage: {
            source: {
              id: '/subscriptions/sub-id/resourceGroups/images-rg/providers/Microsoft.Storage/storageAccounts/imagesacct',
              uri: 'https://imagesacct.blob.core.windows.net/vhds/disk-20240105.vhd',
            },
            hostCaching: 'ReadWrite',
          },
        },
      },
    });
  });

  it('waits for a deleted gallery image version to disappear', async () => {
    const { service, requests } = createService(
      routeByMethod({ DELETE: [{ status: 202 }], GET: [provisioned('Deleting'), notFound] }),
    );

    await service.deleteGalleryImageVersion({ galleryName: 'gallery', galleryImageName: 'ubuntu', version: '1.0.0' });

    expect(requests.map((request) => request.method)).toEqual(['DELETE', 'GET', 'GET']);
    expect(requests[0]?.url).toContain('/resourceGroups/images-rg/');
  });
});
