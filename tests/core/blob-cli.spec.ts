import * as fs from 'node:fs/promises';
import path from 'node:path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { handleBlobCli } from '../../src/core/blob-cli.js';
import { apiRequests, createCliWorkspace, createFakeServices, type CliWorkspace } from '../helpers/cli-fixtures.js';
import { routeByMethod } from '../helpers/fake-fetch.js';

let consoleOutput: string[] = [];
let consoleErrors: string[] = [];
let workspace: CliWorkspace;

const storage = ['--storage-account', 'imagesacct', '--container', 'vhds'];

beforeEach(async () => {
  consoleOutput = [];
  consoleErrors = [];
  vi.spyOn(console, 'log').mockImplementation((...args) => {
    consoleOutput.push(args.join(' '));
  });
  vi.spyOn(console, 'error').mockImplementation((...args) => {
    consoleErrors.push(args.join(' '));
  });
  process.exitCode = undefined;
  workspace = await createCliWorkspace();
});

afterEach(async () => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
  await workspace.cleanup();
});

describe('handleBlobCli', () => {
  it('returns false for other commands', async () => {
    const { services } = createFakeServices(() => ({ status: 200 }));

    await expect(handleBlobCli(['image', 'exists'], services)).resolves.toBe(false);
  });

  it('prints whether a blob exists, authenticating with a SAS token', async () => {
    const { services, requests } = createFakeServices(() => ({ status: 200 }));

    const handled = await handleBlobCli(
      ['blob', 'exists', '--blob-name', 'disk.vhd', ...storage, '--sas-token', '?sig=test-secret', ...workspace.baseArgs],
      services,
    );

    expect(handled).toBe(true);
    expect(consoleOutput).toEqual(['true']);
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe('https://imagesacct.blob.core.windows.net/vhds/disk.vhd?sig=test-secret');
    expect(process.exitCode).toBeUndefined();
  });

  it('uses a storage token from the service principal without a SAS token', async () => {
    const { services, requests } = createFakeServices(() => ({ status: 404 }));

    await handleBlobCli(['blob', 'exists', '--blob-name', 'disk.vhd', ...storage, ...workspace.baseArgs], services);

    expect(consoleOutput).toEqual(['false']);
    const [head] = apiRequests(requests);
    expect(head?.headers.authorization).toBe('Bearer test-token');
  });

  it('uploads an image file as a block blob', async () => {
    const imageFile = path.join(workspace.dir, 'disk.vhd');
    await fs.writeFile(imageFile, Buffer.alloc(2048));
    const { services, requests } = createFakeServices(routeByMethod({ HEAD: [{ status: 404 }], PUT: [{ status: 201 }] }));

    await handleBlobCli(['blob', 'upload', '--image-file', imageFile, '--block-blob', ...storage, ...workspace.baseArgs], services);

    expect(consoleOutput).toEqual(['Image blob disk.vhd uploaded (2048 bytes in 1 chunk(s)).']);
    expect(apiRequests(requests).map((request) => request.method)).toEqual(['HEAD', 'PUT']);
  });

  it('reports a blob that was not there to delete', async () => {
    const { services } = createFakeServices(() => ({ status: 404 }));

    await handleBlobCli(['blob', 'delete', '--blob-name', 'disk.vhd', ...storage, ...workspace.baseArgs], services);

    expect(consoleOutput).toEqual(['Blob disk.vhd not found. Nothing deleted.']);
  });

  it('fails with the usage exit code when a required option is missing', async () => {
    const { services, requests } = createFakeServices(() => ({ status: 200 }));

    await handleBlobCli(['blob', 'exists', ...storage, ...workspace.baseArgs], services);

    expect(consoleErrors).toEqual([
      'Unable to run blob exists',
      "Missing required argument 'blob-name'. Pass --blob-name <value>.",
    ]);
    expect(process.exitCode).toBe(2);
    expect(requests).toEqual([]);
  });

  it('names the missing storage account', async () => {
    const { services } = createFakeServices(() => ({ status: 200 }));

    await handleBlobCli(['blob', 'exists', '--blob-name', 'disk.vhd', '--container', 'vhds', ...workspace.baseArgs], services);

    expect(consoleErrors[1]).toBe(
      "Missing required argument 'storageAccount'. Pass --storage-account or set it in the profile.",
    );
    expect(process.exitCode).toBe(2);
  });

  it('exits with 1 when the remote call fails', async () => {
    const { services } = createFakeServices(() => ({ status: 403, body: '<Error><Code>AuthorizationFailure</Code></Error>' }));

    await handleBlobCli(['blob', 'exists', '--blob-name', 'disk.vhd', ...storage, ...workspace.baseArgs], services);

    expect(consoleErrors[0]).toBe('Unable to run blob exists');
    expect(consoleErrors[1]).toContain('Request failed permanently after 1 attempt(s)');
    expect(process.exitCode).toBe(1);
  });

  it('prints usage for an unknown subcommand', async () => {
    const { services } = createFakeServices(() => ({ status: 200 }));

    await handleBlobCli(['blob', 'copy', ...workspace.baseArgs], services);

    expect(consoleErrors).toEqual(['Usage: vm-image-publisher blob <exists|upload|delete> [options]']);
    expect(process.exitCode).toBe(2);
  });
});
