import { describe, expect, it } from 'vitest';
import { CloudPartnerClient, operationProbeResult } from '../../src/services/cloud-partner.js';
import { MissingArgumentError, RemoteOperationFailedError } from '../../src/types/errors.js';
import { RequestExecutor, createRetryPolicy } from '../../src/utils/retry.js';
import { createFakeFetch, routeByMethod, type FakeHandler } from '../helpers/fake-fetch.js';

const OFFER_URL = 'https://cloudpartner.azure.com/api/publishers/pub/offers/offer-1?api-version=2017-10-31';
const OPERATION_PATH = '/api/publishers/pub/offers/offer-1/submissions/7/operations/op-1';

function createClient(handler: FakeHandler) {
  const fake = createFakeFetch(handler);
  const client = new CloudPartnerClient({
    executor: new RequestExecutor({ policy: createRetryPolicy({ baseDelayMs: 0 }) }),
    fetchFn: fake.fetchFn,
    pollIntervalMs: 0,
    timeoutMs: 60_000,
  });
  return { client, requests: fake.requests };
}

describe('operationProbeResult', () => {
  it('maps operation statuses case-insensitively', () => {
    expect(operationProbeResult({ status: 'Complete' }).status).toBe('Succeeded');
    expect(operationProbeResult({ status: 'running' }).status).toBe('InProgress');
    expect(operationProbeResult({}).status).toBe('InProgress');
    expect(operationProbeResult({ status: 'cancelled' }).status).toBe('Canceled');
    expect(operationProbeResult({ status: 'failed' })).toMatchObject({
      status: 'Failed',
      detail: 'operation status failed',
    });
  });
});

describe('CloudPartnerClient', () => {
  it('builds offer URLs with the API version', () => {
    const { client } = createClient(() => ({ status: 200 }));

    expect(client.offerUrl('offer-1', 'pub')).toBe(OFFER_URL);
    expect(client.offerUrl('offer-1', 'pub', 'golive')).toBe(
      'https://cloudpartner.azure.com/api/publishers/pub/offers/offer-1/golive?api-version=2017-10-31',
    );
  });

  it('reads and replaces the offer document', async () => {
    const doc = { offerTypeId: 'microsoft-azure-virtualmachines', definition: { plans: [] } };
    const { client, requests } = createClient(routeByMethod({ GET: [{ body: doc }], PUT: [{ body: doc }] }));

    await expect(client.getOfferDocument('offer-1', 'pub')).resolves.toEqual(doc);
    await client.putOfferDocument('offer-1', 'pub', doc);

    expect(requests[1]).toMatchObject({ method: 'PUT', url: OFFER_URL });
    expect(requests[1]?.headers['if-match']).toBe('*');
    expect(JSON.parse(String(requests[1]?.body))).toEqual(doc);
  });

  it('requires notification emails to publish', async () => {
    const { client, requests } = createClient(() => ({ status: 202 }));

    await expect(client.publishOffer('offer-1', 'pub', '')).rejects.toBeInstanceOf(MissingArgumentError);
    expect(requests).toEqual([]);
  });

  it('starts a publish and returns the operation without waiting by default', async () => {
    const { client, requests } = createClient(() => ({ status: 202, headers: { location: OPERATION_PATH } }));

    const result = await client.publishOffer('offer-1', 'pub', 'owner@example.test');

    expect(result).toEqual({ operation: OPERATION_PATH });
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe(
      'https://cloudpartner.azure.com/api/publishers/pub/offers/offer-1/publish?api-version=2017-10-31',
    );
    expect(JSON.parse(String(requests[0]?.body))).toEqual({
      metadata: { 'notification-emails': 'owner@example.test' },
    });
  });

  it('follows the operation to completion when asked to wait', async () => {
    const { client, requests } = createClient(
      routeByMethod({
        POST: [{ status: 202, headers: { location: OPERATION_PATH } }],
        GET: [{ body: { status: 'running' } }, { body: { status: 'complete' } }],
      }),
    );

    const result = await client.publishOffer('offer-1', 'pub', 'owner@example.test', { wait: true });

    expect(result.outcome).toMatchObject({ status: 'Succeeded', probes: 2, payload: { status: 'complete' } });
    expect(requests[1]?.url).toBe(`https://cloudpartner.azure.com${OPERATION_PATH}`);
  });

  it('raises RemoteOperationFailedError when go-live fails', async () => {
    const { client } = createClient(
      routeByMethod({
        POST: [{ status: 202, headers: { location: OPERATION_PATH } }],
        GET: [{ body: { status: 'failed' } }],
      }),
    );

    const error = await client.goLive('offer-1', 'pub', { wait: true }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RemoteOperationFailedError);
    expect(error).toMatchObject({ kind: 'offer-go-live', detail: 'operation status failed' });
  });

  it('reports a publish parked on publisher sign-off as ready for review', async () => {
    const { client, requests } = createClient(() => ({
      body: {
        status: 'running',
        steps: [
          { stepName: 'validation', status: 'complete' },
          { stepName: 'publisher-signoff', status: 'waitingForPublisherReview' },
        ],
      },
    }));

    await expect(client.getOfferStatus('offer-1', 'pub')).resolves.toBe('waitingForPublisherReview');
    expect(requests[0]?.url).toBe(
      'https://cloudpartner.azure.com/api/publishers/pub/offers/offer-1/status?api-version=2017-10-31',
    );
  });

  it('returns the raw status otherwise', async () => {
    const running = createClient(() => ({ body: { status: 'running', steps: [] } }));
    const empty = createClient(() => ({ status: 200 }));

    await expect(running.client.getOfferStatus('offer-1', 'pub')).resolves.toBe('running');
    await expect(empty.client.getOfferStatus('offer-1', 'pub')).resolves.toBe('unknown');
  });
});
